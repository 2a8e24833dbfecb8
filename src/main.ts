/**
 * tandem entry point
 *
 * Usage:
 *   tsx src/main.ts            # reads ~/.tandem/config.yaml
 *   TANDEM_CONFIG=./agents.yaml tsx src/main.ts
 */

import { App } from './app';
import { loadConfig } from './config/manager';
import { OperatorConsole } from './cli/console';
import { logger, errorMessage } from './utils';
import { VERSION } from './version';

process.on('unhandledRejection', reason => {
  process.stderr.write(`Unhandled rejection: ${errorMessage(reason)}\n`);
  process.exitCode = 1;
});

process.on('uncaughtException', error => {
  process.stderr.write(`Uncaught exception: ${error.stack ?? error.message}\n`);
  process.exit(1);
});

async function main(): Promise<void> {
  logger.info(`tandem v${VERSION}`);
  const config = loadConfig();
  const operator = new OperatorConsole();
  const app = new App(config, { input: operator });

  process.once('SIGINT', () => {
    logger.info('Interrupted');
    app.stop();
    operator.close();
  });

  try {
    await app.run();
  } finally {
    operator.close();
  }
}

main().catch(error => {
  logger.error('Fatal error', error);
  process.exitCode = 1;
});
