#!/usr/bin/env tsx
import { parseArgs } from 'node:util';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import { AuthError } from '@pbr/domain';
import { Core } from './application/orchestrator/core';

const log = createChildLogger('main');

const USAGE = `Usage: pb-relay [options]

Relays Pushbullet pushes and mirrored notifications to the desktop.

Options:
  -c, --config <path>  config.json to load (default: config/config.json)
  -e, --env <path>     .env file with credentials (default: config/.env)
  -d, --debug          log at debug level
  -h, --help           show this help
`;

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c' },
      env: { type: 'string', short: 'e' },
      debug: { type: 'boolean', short: 'd', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return;
  }

  let core: Core;
  try {
    core = new Core({ configPath: values.config, envPath: values.env, debug: values.debug });
  } catch (error) {
    log.fatal('Could not load configuration', asError(error));
    process.exitCode = 1;
    return;
  }

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      log.warn(`Received ${signal} again, exiting immediately`);
      process.exit(1);
    }
    stopping = true;
    log.info(`Received ${signal}, shutting down gracefully...`);
    void core.stop();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await core.start();
    log.info('Shutdown complete');
  } catch (error) {
    // AuthError is already reported by the core.
    if (!(error instanceof AuthError)) {
      log.fatal('Relay crashed', asError(error));
    }
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

main().catch((error: unknown) => {
  log.fatal('Unhandled error', asError(error));
  process.exitCode = 1;
});
