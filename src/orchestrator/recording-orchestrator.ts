import { mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { AppConfig } from '../config/resolved-config.types.js';
import type { Downloader, MediaSource } from '../downloader/types.js';
import { errorMessage, ResolutionError, SessionError } from '../errors/custom-errors.js';
import { scanFragments } from '../media/fragment-scanner.js';
import type { Reconciler } from '../media/merge-executor.js';
import { CONTAINER_EXTENSIONS, canonicalFileName, formatRecordingNumber, recordingStem } from '../media/recording-name.js';
import type { Notifier } from '../notifications/notifier.js';
import type { SessionProvider } from '../session/types.js';
import { LogLevel } from '../utils/logger.js';
import { type RunOutcome, RunReport } from './run-report.js';

export type OrchestratorConfig = Pick<
  AppConfig,
  'outputDirectory' | 'recordingPrefix' | 'forceRedownload' | 'allowUnmergedOutput'
>;

export type OrchestratorDeps = {
  session: SessionProvider;
  downloader: Downloader;
  /** Absent when no merge tool is available */
  reconciler?: Reconciler;
  notifier: Notifier;
};

/**
 * Ascending recording numbers from `start` to `end`, both included
 */
export function recordingRange(start: number, end: number): number[] {
  return Array.from({ length: Math.max(0, end - start + 1) }, (_, index) => start + index);
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Downloads recordings one at a time and finalizes each into a single file.
 *
 * A failing recording is recorded in the report and the run continues; only
 * session-level errors abort. Everything needed to resume is on disk, so a
 * re-run after a crash picks up where the files say it stopped.
 */
export class RecordingOrchestrator {
  private readonly outputDir: string;

  constructor(
    private readonly config: OrchestratorConfig,
    private readonly deps: OrchestratorDeps,
  ) {
    this.outputDir = resolve(config.outputDirectory);
  }

  async run(recordingNumbers: readonly number[]): Promise<RunReport> {
    const { notifier } = this.deps;
    const numbers = [...new Set(recordingNumbers)].sort((a, b) => a - b);
    const report = new RunReport();

    await mkdir(this.outputDir, { recursive: true });
    notifier.notify(LogLevel.INFO, `Output directory: ${this.outputDir}`);

    for (const [index, recordingNumber] of numbers.entries()) {
      notifier.notify(LogLevel.HIGHLIGHT, `--- Recording ${recordingNumber} (${index + 1}/${numbers.length}) ---`);
      report.record(recordingNumber, await this.processRecording(recordingNumber));
    }

    await this.finalize();
    return report;
  }

  /**
   * Take one recording to a terminal outcome
   */
  async processRecording(recordingNumber: number): Promise<RunOutcome> {
    const { notifier, downloader } = this.deps;

    if (!this.config.forceRedownload && (await this.isDownloaded(recordingNumber))) {
      notifier.notify(LogLevel.INFO, 'Already downloaded, skipping (use --force to re-download)');
      return { status: 'skipped', reason: 'already downloaded' };
    }

    let source: MediaSource;
    try {
      source = await this.resolveSource(recordingNumber);
    } catch (error) {
      if (error instanceof ResolutionError) return this.fail(recordingNumber, error.message);
      throw error;
    }

    try {
      await downloader.download({
        recordingNumber,
        locator: source.locator,
        referer: source.needsReferer ? source.pageUrl : undefined,
        outputDir: this.outputDir,
        fileStem: recordingStem(recordingNumber, this.config.recordingPrefix),
      });
    } catch (error) {
      return this.fail(recordingNumber, errorMessage(error));
    }

    notifier.notify(LogLevel.SUCCESS, `Recording ${formatRecordingNumber(recordingNumber)}: Download complete`);
    // Finalize now so finished recordings survive a later failure or an interrupted run
    await this.reconcile([recordingNumber]);
    return { status: 'succeeded' };
  }

  /**
   * True when a finished file for the recording exists in any container format
   */
  async isDownloaded(recordingNumber: number): Promise<boolean> {
    for (const extension of CONTAINER_EXTENSIONS) {
      const path = join(this.outputDir, canonicalFileName(recordingNumber, this.config.recordingPrefix, extension));
      if (await fileExists(path)) {
        return true;
      }
    }
    return false;
  }

  /**
   * @throws ResolutionError when the recording has no usable source
   * @throws SessionError when the session itself is gone
   */
  private async resolveSource(recordingNumber: number): Promise<MediaSource> {
    let source: MediaSource | null;
    try {
      source = await this.deps.session.resolveMediaSource(recordingNumber);
    } catch (error) {
      if (error instanceof SessionError) throw error;
      throw new ResolutionError(`Could not resolve media source: ${errorMessage(error)}`, recordingNumber);
    }
    if (!source) {
      throw new ResolutionError('No media source found', recordingNumber);
    }
    return source;
  }

  private fail(recordingNumber: number, reason: string): RunOutcome {
    this.deps.notifier.notify(LogLevel.ERROR, `Recording ${formatRecordingNumber(recordingNumber)}: ${reason}`);
    return { status: 'failed', reason };
  }

  /**
   * Best-effort merge; its outcome never changes a recording's result
   */
  private async reconcile(only?: number[]): Promise<void> {
    const { reconciler, notifier } = this.deps;
    if (!reconciler) return;

    try {
      await reconciler.reconcile(this.outputDir, only);
    } catch (error) {
      notifier.notify(LogLevel.WARNING, `Merge pass failed: ${errorMessage(error)}`);
    }
  }

  private async finalize(): Promise<void> {
    const { reconciler, notifier } = this.deps;

    if (reconciler) {
      await this.reconcile();
      return;
    }

    if (!this.config.allowUnmergedOutput) return;

    const scan = await scanFragments(this.outputDir, { prefix: this.config.recordingPrefix });
    const fragments = scan.groups.reduce((count, group) => count + group.videos.length + group.audios.length, 0);
    if (fragments > 0) {
      notifier.notify(LogLevel.WARNING, 'Split audio/video files detected!');
      notifier.notify(LogLevel.WARNING, `${fragments} split files found that need merging.`);
      notifier.notify(LogLevel.WARNING, 'Install ffmpeg and run: recfetch --merge');
    }
  }
}
