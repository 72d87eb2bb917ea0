#!/usr/bin/env node

/**
 * Grow Link
 *
 * Keeps a grow controller's parameters fresh over its WebSocket, falls
 * back to HTTP polling while the socket is down, and serves the merged
 * snapshot and connection health over a small status API.
 *
 * Usage:
 *   grow-link                       # Use config.yml in current directory
 *   grow-link --config ./my.yml     # Use a specific config file
 *   grow-link --host 192.168.1.40   # Override device.host
 *   grow-link --verbose             # Debug logging
 *   grow-link --emulate             # Run against a built-in virtual controller
 */

import * as fs from 'fs';
import { loadConfig } from './config';
import { AppConfig } from './config-schema';
import { createSession } from './coordinator/session';
import { DeviceEmulator } from './emulators/device-emulator';
import { StatusServer } from './server/status-server';
import { CommandFailure } from './coordinator/hybrid-coordinator';
import { ConnectionStatus } from './health/types';
import { errorMessage } from './errors';
import { getLogger, initLogger } from './logger';

interface CliOptions {
  configPath?: string;
  host?: string;
  verbose: boolean;
  emulate: boolean;
}

function printHelp(): void {
  console.log('');
  console.log('  Grow Link');
  console.log('  Live + fallback data link for grow controllers');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./config.yml)');
  console.log('    --host <host>         Controller host, overrides device.host');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --emulate             Start a virtual controller and connect to it');
  console.log('    --help, -h            Show this help');
  console.log('');
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false, emulate: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = argv[++i];
        if (!options.configPath) {
          console.error('[Error] --config requires a file path');
          process.exit(1);
        }
        break;
      case '--host':
        options.host = argv[++i];
        if (!options.host) {
          console.error('[Error] --host requires a host name or address');
          process.exit(1);
        }
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--emulate':
        options.emulate = true;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
      default:
        console.error(`[Error] Unknown option: ${arg}`);
        printHelp();
        process.exit(1);
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);

  // An explicit config path must exist; the default one may not
  if (options.configPath && !fs.existsSync(options.configPath)) {
    console.error(`[Error] Config file not found: ${options.configPath}`);
    process.exit(1);
  }

  let config: AppConfig = loadConfig(options.configPath);

  initLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });
  const log = getLogger('Main');

  if (options.host) {
    config = { ...config, device: { ...config.device, host: options.host } };
  }

  let emulator: DeviceEmulator | null = null;
  if (options.emulate) {
    emulator = new DeviceEmulator({ websocketPath: config.device.websocketPath });
    const ports = await emulator.start();
    config = {
      ...config,
      device: { ...config.device, host: emulator.host, websocketPort: ports.websocketPort, httpPort: ports.httpPort },
    };
    log.info(ports, 'Using built-in emulator');
  }

  const { coordinator } = createSession(config);

  coordinator.subscribe(({ changes }) => {
    for (const change of changes) {
      log.info({ key: change.key, value: change.value, previous: change.previous, source: change.source }, 'Parameter changed');
    }
  });

  coordinator.on('status', (status: ConnectionStatus) => {
    log.info({ state: status.state, source: status.activeSource, fresh: status.isDataFresh }, 'Connection status');
  });

  coordinator.on('commandFailed', (failure: CommandFailure) => {
    log.warn(failure, 'Command not delivered');
  });

  let statusServer: StatusServer | null = null;
  if (config.status.enabled) {
    statusServer = new StatusServer(coordinator);
    await statusServer.start(config.status.port);
  }

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    coordinator.close();

    Promise.all([statusServer?.stop(), emulator?.stop()]).then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await coordinator.start();
  log.info({ host: config.device.host, parameters: config.parameters.length }, 'Grow Link running');
}

main().catch((err: unknown) => {
  console.error(`[Fatal] ${errorMessage(err)}`);
  process.exit(1);
});
