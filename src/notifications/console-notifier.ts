import { type Logger, LogLevel, logger as defaultLogger } from '../utils/logger.js';
import type { Notifier } from './notifier.js';

type ProgressStream = {
  write(chunk: string): unknown;
};

/**
 * Console notifier: routes messages to the logger and keeps one rewritable progress line
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;

  constructor(
    private readonly logger: Logger = defaultLogger,
    private readonly stream: ProgressStream = process.stdout,
  ) {}

  notify(level: LogLevel, message: string): void {
    // Clear an active progress line so the log line appears cleanly
    this.clearProgress();

    switch (level) {
      case LogLevel.DEBUG:
        this.logger.debug(message);
        break;
      case LogLevel.INFO:
        this.logger.info(message);
        break;
      case LogLevel.SUCCESS:
        this.logger.success(message);
        break;
      case LogLevel.WARNING:
        this.logger.warning(message);
        break;
      case LogLevel.ERROR:
        this.logger.error(message);
        break;
      case LogLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
    }
  }

  progress(message: string): void {
    this.clearProgress();
    this.stream.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }
}
