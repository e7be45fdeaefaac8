import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { logger } from './utils/logger.js';

/**
 * recfetch - download course session recordings
 */

export async function main(args: string[]): Promise<void> {
  await run(cli, args);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  // Set up global error handlers
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });

  // Partial files stay on disk; the next run resumes from them
  process.on('SIGINT', () => {
    logger.warning('Interrupted. Run the same command again to resume.');
    process.exit(130);
  });

  main(process.argv.slice(2)).catch((error: unknown) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
