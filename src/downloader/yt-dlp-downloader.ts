import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { DownloadError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { LogLevel } from '../utils/logger.js';
import { probeTool, runTool, type ToolRunner } from '../utils/process.js';
import type { Downloader, DownloadRequest } from './types.js';

export type YtDlpDownloaderOptions = {
  /** yt-dlp binary */
  toolPath: string;
  /** Netscape cookie jar written by the session */
  cookieFile: string;
  /** Format selector, `bv*+ba/b` by default */
  format?: string;
  mergeOutputFormat?: string;
  retries?: number;
  timeoutMs?: number;
  notifier: Notifier;
  runner?: ToolRunner;
};

// Match: [download]  23.8% of ~ 145.41MiB at  563.37KiB/s ETA 03:34 (frag 48/203)
const PROGRESS_PATTERN = /\[download\]\s+(\d+\.?\d*)%\s+of\s+~?\s*([\d.]+\w+)\s+at\s+~?\s*([\d.]+\w+\/s)\s+ETA\s+(\S+)/;

const STATUS_PREFIXES = ['[info]', '[ffmpeg]', '[Merger]', '[merge]', '[FixupM3u8]'];

export class YtDlpDownloader implements Downloader {
  private readonly runner: ToolRunner;

  constructor(private readonly options: YtDlpDownloaderOptions) {
    this.runner = options.runner ?? runTool;
  }

  buildArgs(request: DownloadRequest): string[] {
    const { format = 'bv*+ba/b', mergeOutputFormat = 'mp4', retries = 3 } = this.options;
    const args = [
      '--cookies',
      this.options.cookieFile,
      '-o',
      join(request.outputDir, `${request.fileStem}.%(ext)s`),
      '--newline',
      '-f',
      format,
      '--merge-output-format',
      mergeOutputFormat,
      '--retries',
      String(retries),
    ];

    if (request.referer) {
      args.push('--referer', request.referer);
    }

    args.push(request.locator);
    return args;
  }

  async download(request: DownloadRequest): Promise<void> {
    const { notifier } = this.options;
    await mkdir(request.outputDir, { recursive: true });

    const args = this.buildArgs(request);
    const result = await this.runner(this.options.toolPath, args, {
      timeoutMs: this.options.timeoutMs,
      onLine: (line) => this.handleLine(line),
    });
    notifier.endProgress();

    if (result.exitCode !== 0) {
      throw new DownloadError(
        `Download failed: ${result.failureMessage ?? `exit code ${result.exitCode}`}`,
        request.recordingNumber,
        request.locator,
      );
    }
  }

  private handleLine(line: string): void {
    const { notifier } = this.options;
    const text = line.trim();
    if (!text) return;

    const progress = text.match(PROGRESS_PATTERN);
    if (progress) {
      const [, percentage, totalSize, speed, eta] = progress;
      notifier.progress(`[download] ${percentage}% of ${totalSize} at ${speed} ETA ${eta}`);
      return;
    }

    if (text.startsWith('ERROR:')) {
      notifier.notify(LogLevel.ERROR, text);
    } else if (text.startsWith('WARNING:')) {
      notifier.notify(LogLevel.WARNING, text);
    } else if (text.startsWith('[download]') || STATUS_PREFIXES.some((prefix) => text.startsWith(prefix))) {
      notifier.notify(LogLevel.INFO, text);
    } else {
      notifier.notify(LogLevel.DEBUG, text);
    }
  }

  /**
   * Version of the installed downloader, or null when it cannot be run
   */
  static async checkInstalled(toolPath: string, runner: ToolRunner = runTool): Promise<string | null> {
    return probeTool(toolPath, '--version', runner);
  }
}
