import type { LogLevel } from '../utils/logger.js';

/**
 * Sink for user-facing progress and status messages
 */
export type Notifier = {
  /**
   * Send a notification
   * @param level - Notification level
   * @param message - Message to send
   */
  notify(level: LogLevel, message: string): void;

  /**
   * Update progress on the same line (overwrites previous output)
   */
  progress(message: string): void;

  /**
   * Finalize progress (add newline after last progress update)
   */
  endProgress(): void;
};
