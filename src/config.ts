/**
 * Configuration loader
 *
 * Reads a YAML config file describing the controller and the timing of
 * the session. A missing file falls back to defaults pointed at localhost.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { AppConfig, validateAppConfig, formatZodError } from './config-schema';
import { ConfigError, errorMessage } from './errors';
import { getLogger } from './logger';

const log = getLogger('Config');

export const DEFAULT_CONFIG_FILE = 'config.yml';

/** Defaults used when no config file exists */
export function defaultConfig(host = '127.0.0.1'): AppConfig {
  return validateAppConfig({ device: { host } });
}

/**
 * Validate already-parsed config data, turning zod failures into a
 * ConfigError that lists every issue.
 */
export function parseConfig(data: unknown, source = 'config'): AppConfig {
  try {
    return validateAppConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed for ${source}:\n${formatZodError(error)}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Load and validate config from YAML.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    log.warn({ path: resolvedPath }, 'No config file found, using defaults');
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`[Config] Cannot read ${resolvedPath}: ${errorMessage(error)}`, { cause: error });
  }

  const config = parseConfig(parsed ?? {}, resolvedPath);
  log.info({ path: resolvedPath, host: config.device.host, parameters: config.parameters.length }, 'Config loaded');
  return config;
}
