import { rename, rm, stat, unlink } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { errorMessage, MergeError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { LogLevel } from '../utils/logger.js';
import { probeTool, runTool, type ToolResult, type ToolRunner } from '../utils/process.js';
import { NOT_MERGEABLE_MESSAGES, type NotMergeableReason, selectCandidates } from './candidate-selector.js';
import { scanFragments } from './fragment-scanner.js';
import { canonicalFileName, formatRecordingNumber, mergeScratchFileName } from './recording-name.js';
import type { MediaFragment } from './types.js';

export type MergeExecutorOptions = {
  /** ffmpeg binary */
  toolPath: string;
  prefix: string;
  audioCodec: string;
  audioBitrate: string;
  /** A merged file must be strictly larger than this to count as valid */
  minOutputBytes: number;
  timeoutMs?: number;
  notifier: Notifier;
  runner?: ToolRunner;
};

export type MergeOutcome =
  | { status: 'merged'; recordingNumber: number; output: string; leftovers: string[] }
  | { status: 'failed'; recordingNumber: number; reason: string };

export type ReconcileReport = {
  merged: number[];
  failed: Array<{ recordingNumber: number; reason: string }>;
  pending: Array<{ recordingNumber: number; reason: NotMergeableReason }>;
  alreadyMerged: number[];
  /** Removed downloader resume files and unfinished merge output */
  cleaned: string[];
  /** Fragments that could not be deleted after their recording was merged */
  leftovers: string[];
};

/**
 * Anything that can bring a directory of fragments to one file per recording
 */
export type Reconciler = {
  reconcile(dir: string, only?: Iterable<number>): Promise<ReconcileReport>;
};

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Merges split video/audio fragments into `<prefix><NN>.mp4` with ffmpeg.
 *
 * ffmpeg writes to `<prefix><NN>.merging.mp4`, which is renamed to the final name
 * only after it passed the size check, and fragments are deleted only after the
 * rename. A run killed mid-merge therefore leaves the fragments and a scratch
 * file, never a truncated recording; the next `reconcile` removes the scratch
 * file and merges again.
 */
export class MergeExecutor implements Reconciler {
  private readonly runner: ToolRunner;
  private readonly notifier: Notifier;

  constructor(private readonly options: MergeExecutorOptions) {
    this.runner = options.runner ?? runTool;
    this.notifier = options.notifier;
  }

  /**
   * Merge every mergeable recording in `dir`, optionally limited to `only`
   */
  async reconcile(dir: string, only?: Iterable<number>): Promise<ReconcileReport> {
    const root = resolve(dir);
    this.notifier.notify(LogLevel.INFO, 'Scanning for unmerged audio/video files...');

    const scan = await scanFragments(root, { prefix: this.options.prefix, only });
    const report: ReconcileReport = {
      merged: [],
      failed: [],
      pending: [],
      alreadyMerged: scan.alreadyMerged,
      cleaned: await this.removeFiles(scan.mergeScratch),
      leftovers: [],
    };

    for (const recordingNumber of scan.alreadyMerged) {
      this.notifier.notify(LogLevel.INFO, `Recording ${formatRecordingNumber(recordingNumber)}: Already merged, skipping`);
    }

    for (const group of scan.groups) {
      const selection = selectCandidates(group);
      const label = `Recording ${formatRecordingNumber(group.recordingNumber)}`;

      if (selection.status === 'not-mergeable') {
        const level = selection.reason.endsWith('in-progress') ? LogLevel.INFO : LogLevel.WARNING;
        this.notifier.notify(level, `${label}: ${NOT_MERGEABLE_MESSAGES[selection.reason]}`);
        report.pending.push({ recordingNumber: group.recordingNumber, reason: selection.reason });
        continue;
      }

      const outcome = await this.mergePair(group.recordingNumber, selection.video, selection.audio, root);
      if (outcome.status === 'merged') {
        report.merged.push(outcome.recordingNumber);
        report.leftovers.push(...outcome.leftovers);
      } else {
        report.failed.push({ recordingNumber: outcome.recordingNumber, reason: outcome.reason });
      }
    }

    report.cleaned.push(...(await this.removeFiles(scan.downloadState)));

    if (report.merged.length > 0) {
      this.notifier.notify(LogLevel.SUCCESS, `Successfully merged ${report.merged.length} recording(s)`);
    } else {
      this.notifier.notify(LogLevel.INFO, 'No files needed merging');
    }

    return report;
  }

  /**
   * Merge one video/audio pair into the recording's canonical file inside `dir`
   */
  async mergePair(
    recordingNumber: number,
    video: MediaFragment,
    audio: MediaFragment,
    dir: string,
  ): Promise<MergeOutcome> {
    const label = `Recording ${formatRecordingNumber(recordingNumber)}`;
    const output = join(dir, canonicalFileName(recordingNumber, this.options.prefix));
    const scratch = join(dir, mergeScratchFileName(recordingNumber, this.options.prefix));
    this.notifier.notify(LogLevel.INFO, `${label}: Merging video + audio...`);
    this.notifier.notify(LogLevel.DEBUG, `  Video: ${video.fileName}`);
    this.notifier.notify(LogLevel.DEBUG, `  Audio: ${audio.fileName}`);

    try {
      await this.runMerge(recordingNumber, video, audio, scratch);
      await this.moveIntoPlace(recordingNumber, scratch, output);
    } catch (error) {
      const reason = errorMessage(error);
      this.notifier.notify(LogLevel.ERROR, `${label}: ${reason}`);
      return { status: 'failed', recordingNumber, reason };
    }

    this.notifier.notify(LogLevel.SUCCESS, `${label}: Merged successfully into ${canonicalFileName(recordingNumber, this.options.prefix)}`);

    const leftovers: string[] = [];
    for (const fragment of [video, audio]) {
      try {
        await unlink(fragment.path);
      } catch (error) {
        leftovers.push(fragment.path);
        this.notifier.notify(
          LogLevel.ERROR,
          `${label}: Failed to delete ${fragment.fileName} after merging, delete it by hand: ${errorMessage(error)}`,
        );
      }
    }

    return { status: 'merged', recordingNumber, output, leftovers };
  }

  /**
   * ffmpeg arguments: copy the video stream, re-encode audio, stop at the shorter input
   */
  buildArgs(videoPath: string, audioPath: string, output: string): string[] {
    return [
      '-y',
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      videoPath,
      '-i',
      audioPath,
      '-map',
      '0:v:0',
      '-map',
      '1:a:0',
      '-c:v',
      'copy',
      '-c:a',
      this.options.audioCodec,
      '-b:a',
      this.options.audioBitrate,
      '-strict',
      'experimental',
      '-shortest',
      '-movflags',
      '+faststart',
      output,
    ];
  }

  private async runMerge(
    recordingNumber: number,
    video: MediaFragment,
    audio: MediaFragment,
    output: string,
  ): Promise<void> {
    const args = this.buildArgs(video.path, audio.path, output);

    let result: ToolResult;
    try {
      result = await this.runner(this.options.toolPath, args, { timeoutMs: this.options.timeoutMs });
    } catch (error) {
      await rm(output, { force: true });
      throw new MergeError(`Error during merge: ${errorMessage(error)}`, recordingNumber);
    }

    if (result.exitCode !== 0) {
      await rm(output, { force: true });
      const stderr = result.stderr.trim().slice(0, 200);
      throw new MergeError(
        `Merge failed: ${result.failureMessage ?? `exit code ${result.exitCode}`}${stderr ? `: ${stderr}` : ''}`,
        recordingNumber,
      );
    }

    const size = await fileSize(output);
    if (size === null) {
      throw new MergeError('Merge reported success but produced no file', recordingNumber);
    }
    if (size <= this.options.minOutputBytes) {
      await rm(output, { force: true });
      throw new MergeError(`Merge produced an invalid file (${size} bytes), keeping originals`, recordingNumber);
    }
  }

  private async moveIntoPlace(recordingNumber: number, scratch: string, output: string): Promise<void> {
    try {
      await rename(scratch, output);
    } catch (error) {
      await rm(scratch, { force: true });
      throw new MergeError(`Could not move the merged file into place: ${errorMessage(error)}`, recordingNumber);
    }
  }

  private async removeFiles(paths: readonly string[]): Promise<string[]> {
    const removed: string[] = [];
    for (const path of paths) {
      try {
        await rm(path, { force: true });
        removed.push(path);
      } catch (error) {
        this.notifier.notify(LogLevel.WARNING, `Failed to remove ${path}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }

  /**
   * Version line of the merge tool, or null when it is not installed
   */
  static async checkInstalled(toolPath: string, runner: ToolRunner = runTool): Promise<string | null> {
    return probeTool(toolPath, '-version', runner);
  }
}
