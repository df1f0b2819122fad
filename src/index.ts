#!/usr/bin/env node
import { start } from './bootstrap/main.js';
import { describeError } from './core/errors.js';

async function main(): Promise<void> {
  const app = await start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    app.logger.info('bootstrap', `Received ${signal}`);
    app
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.logger.error('bootstrap', `Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error(`[FATAL] ${describeError(err)}`);
  process.exit(1);
});
