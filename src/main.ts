#!/usr/bin/env node
/**
 * Device health service entry point
 */

import { loadConfig } from './config/index.js';
import { bootstrapDevice } from './device/bootstrap.js';
import { startHttpServer } from './gateway/http-server.js';
import { configureLogging, createSubsystemLogger, errorMessage } from './logging/subsystem.js';

const log = createSubsystemLogger('main');

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging(config.logging);

  const context = bootstrapDevice(config);
  const running = await startHttpServer(context);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down', { signal });
    void running.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.fatal('Device health service failed to start', { error: errorMessage(error) });
  process.exitCode = 1;
});
