/**
 * Base error class for recfetch
 */
export class RecfetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecfetchError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends RecfetchError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid combination of command line arguments
 */
export class UsageError extends RecfetchError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * A required external tool is missing or unusable.
 * Raised before any network activity starts.
 */
export class EnvironmentError extends RecfetchError {
  constructor(
    message: string,
    public readonly tool: string,
  ) {
    super(message);
    this.name = 'EnvironmentError';
  }
}

/**
 * Browser session could not be established (sign-in failed, browser did not start)
 */
export class SessionError extends RecfetchError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionError';
  }
}

/**
 * No usable media source for a recording
 */
export class ResolutionError extends RecfetchError {
  constructor(
    message: string,
    public readonly recordingNumber: number,
  ) {
    super(message);
    this.name = 'ResolutionError';
  }
}

/**
 * Download error
 */
export class DownloadError extends RecfetchError {
  constructor(
    message: string,
    public readonly recordingNumber: number,
    public readonly locator: string,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/**
 * Merge tool failed or produced an unusable file
 */
export class MergeError extends RecfetchError {
  constructor(
    message: string,
    public readonly recordingNumber: number,
  ) {
    super(message);
    this.name = 'MergeError';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
