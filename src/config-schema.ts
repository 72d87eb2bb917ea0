/**
 * Config Schema Validation
 *
 * Zod schemas for the session configuration file. Every section except
 * device.host has defaults, so a minimal file only names the controller.
 */

import { z } from 'zod';
import { DEFAULT_PARAMETERS } from './protocol/parameters';
import { isValidParameterKey } from './protocol/parameter-codec';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const durationSchema = z.number().int().min(1);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const parameterKeySchema = z.string().min(1).refine(
  isValidParameterKey,
  { message: 'Parameter key must not contain whitespace, ";", "=" or "::"' }
);

// --- Sections ---

const deviceSchema = z.object({
  host: hostSchema,
  websocketPort: portSchema.default(81),
  websocketPath: z.string().startsWith('/').default('/websocket'),
  httpPort: portSchema.default(80),
});

const refreshSchema = z.object({
  intervalMs: durationSchema.default(10000),
  commandSpacingMs: z.number().int().min(0).default(50),
});

const reconnectSchema = z.object({
  baseDelayMs: durationSchema.default(5000),
  maxDelayMs: durationSchema.default(300000),
  maxAttempts: z.number().int().min(0).default(10),
  connectTimeoutMs: durationSchema.default(10000),
  // 0 disables the ping/pong liveness check
  heartbeatIntervalMs: z.number().int().min(0).default(30000),
}).refine(
  (cfg) => cfg.maxDelayMs >= cfg.baseDelayMs,
  { message: 'maxDelayMs must be at least baseDelayMs', path: ['maxDelayMs'] }
);

const fallbackSchema = z.object({
  baseIntervalMs: durationSchema.default(10000),
  requestTimeoutMs: durationSchema.default(5000),
  batchSize: z.number().int().min(1).max(50).default(10),
});

const statusSchema = z.object({
  enabled: z.boolean().default(true),
  port: portSchema.default(8080),
});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const appConfigSchema = z.object({
  device: deviceSchema,
  refresh: refreshSchema.default({}),
  reconnect: reconnectSchema.default({}),
  fallback: fallbackSchema.default({}),
  freshnessThresholdMs: durationSchema.default(30000),
  parameters: z.array(parameterKeySchema).min(1).default([...DEFAULT_PARAMETERS]),
  status: statusSchema.default({}),
  logging: loggingSchema.default({}),
}).refine(
  (config) => new Set(config.parameters).size === config.parameters.length,
  { message: 'Duplicate parameter key', path: ['parameters'] }
);

// --- Type Exports ---

export type AppConfig = z.output<typeof appConfigSchema>;

/** The part of the configuration a device session consumes */
export type SessionConfig = Omit<AppConfig, 'status' | 'logging'>;

/**
 * Validate a parsed config file
 */
export function validateAppConfig(data: unknown): AppConfig {
  return appConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
