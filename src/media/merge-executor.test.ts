import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Notifier } from '../notifications/notifier.js';
import { createOutputDir, createSilentNotifier, listDir, removeOutputDir, touch } from '../test-helpers.js';
import type { ToolResult, ToolRunner } from '../utils/process.js';
import { MergeExecutor } from './merge-executor.js';

const { lockedFiles } = vi.hoisted(() => ({ lockedFiles: new Set<string>() }));

// Deleting a path in lockedFiles fails the way a file held open elsewhere does
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    unlink: async (...args: Parameters<typeof actual.unlink>) => {
      const [path] = args;
      if (typeof path === 'string' && lockedFiles.has(path)) {
        throw new Error(`EBUSY: resource busy or locked, unlink '${path}'`);
      }
      return actual.unlink(...args);
    },
  };
});

const PREFIX = 'Recording_';
const MIN_OUTPUT_BYTES = 1000;

const ok: ToolResult = { exitCode: 0, stdout: '', stderr: '', timedOut: false };

/**
 * Stand-in for ffmpeg: writes `outputBytes` bytes to the last argument and exits with `exitCode`
 */
function fakeFfmpeg(outputBytes: number, exitCode = 0, stderr = '') {
  return vi.fn<ToolRunner>(async (_file, args) => {
    const output = args.at(-1);
    if (output && outputBytes > 0) {
      await writeFile(output, Buffer.alloc(outputBytes));
    }
    return exitCode === 0
      ? ok
      : { exitCode, stdout: '', stderr, timedOut: false, failureMessage: `ffmpeg exited with code ${exitCode}` };
  });
}

describe('MergeExecutor', () => {
  let dir: string;
  let notifier: Notifier;

  const createExecutor = (runner: ToolRunner) =>
    new MergeExecutor({
      toolPath: 'ffmpeg',
      prefix: PREFIX,
      audioCodec: 'aac',
      audioBitrate: '192k',
      minOutputBytes: MIN_OUTPUT_BYTES,
      timeoutMs: 60_000,
      notifier,
      runner,
    });

  beforeEach(async () => {
    dir = await createOutputDir();
    notifier = createSilentNotifier();
  });

  afterEach(async () => {
    lockedFiles.clear();
    await removeOutputDir(dir);
  });

  it('should merge a video/audio pair into one recording and remove the fragments', async () => {
    await touch(dir, {
      'Recording_02.fhls-2400.mp4': 10,
      'Recording_02.fhls-audio-high-Original.mp4': 10,
    });
    const runner = fakeFfmpeg(2000);

    const report = await createExecutor(runner).reconcile(dir);

    expect(await listDir(dir)).toEqual(['Recording_02.mp4']);
    expect(report.merged).toEqual([2]);
    expect(report.failed).toEqual([]);
    expect(runner).toHaveBeenCalledWith(
      'ffmpeg',
      [
        '-y',
        '-hide_banner',
        '-loglevel',
        'error',
        '-i',
        join(dir, 'Recording_02.fhls-2400.mp4'),
        '-i',
        join(dir, 'Recording_02.fhls-audio-high-Original.mp4'),
        '-map',
        '0:v:0',
        '-map',
        '1:a:0',
        '-c:v',
        'copy',
        '-c:a',
        'aac',
        '-b:a',
        '192k',
        '-strict',
        'experimental',
        '-shortest',
        '-movflags',
        '+faststart',
        join(dir, 'Recording_02.merging.mp4'),
      ],
      { timeoutMs: 60_000 },
    );
  });

  it('should merge the best candidates and leave the other variants alone', async () => {
    await touch(dir, {
      'Recording_03.fhls-1200.mp4': 10,
      'Recording_03.fhls-2400.mp4': 10,
      'Recording_03.fhls-audio-high-English.mp4': 10,
      'Recording_03.fhls-audio-high-Original.mp4': 10,
    });
    const runner = fakeFfmpeg(2000);

    await createExecutor(runner).reconcile(dir);

    const args = runner.mock.calls[0]?.[1];
    expect(args?.[5]).toBe(join(dir, 'Recording_03.fhls-2400.mp4'));
    expect(args?.[7]).toBe(join(dir, 'Recording_03.fhls-audio-high-Original.mp4'));
    expect(await listDir(dir)).toEqual([
      'Recording_03.fhls-1200.mp4',
      'Recording_03.fhls-audio-high-English.mp4',
      'Recording_03.mp4',
    ]);
  });

  it('should leave a recording without audio untouched', async () => {
    await touch(dir, { 'Recording_05.fhls-2400.mp4': 10 });
    const runner = fakeFfmpeg(2000);

    const report = await createExecutor(runner).reconcile(dir);

    expect(await listDir(dir)).toEqual(['Recording_05.fhls-2400.mp4']);
    expect(report.pending).toEqual([{ recordingNumber: 5, reason: 'audio-missing' }]);
    expect(runner).not.toHaveBeenCalled();
    expect(notifier.notify).toHaveBeenCalledWith('warning', 'Recording 05: Video only, no audio file found');
  });

  it('should keep the fragments when the merge tool fails', async () => {
    await touch(dir, {
      'Recording_09.fhls-2400.mp4': 10,
      'Recording_09.fhls-audio-high-Original.mp4': 10,
    });
    const runner = fakeFfmpeg(5000, 1, 'Invalid data found when processing input');

    const report = await createExecutor(runner).reconcile(dir);

    expect(await listDir(dir)).toEqual(['Recording_09.fhls-2400.mp4', 'Recording_09.fhls-audio-high-Original.mp4']);
    expect(report.merged).toEqual([]);
    expect(report.failed).toEqual([
      {
        recordingNumber: 9,
        reason: 'Merge failed: ffmpeg exited with code 1: Invalid data found when processing input',
      },
    ]);
  });

  it('should delete an undersized output and keep the fragments', async () => {
    await touch(dir, {
      'Recording_04.fhls-2400.mp4': 10,
      'Recording_04.fhls-audio-high-Original.mp4': 10,
    });

    const report = await createExecutor(fakeFfmpeg(MIN_OUTPUT_BYTES)).reconcile(dir);

    expect(await listDir(dir)).toEqual(['Recording_04.fhls-2400.mp4', 'Recording_04.fhls-audio-high-Original.mp4']);
    expect(report.failed).toEqual([
      { recordingNumber: 4, reason: 'Merge produced an invalid file (1000 bytes), keeping originals' },
    ]);
  });

  it('should fail without touching fragments when the tool reports success but writes nothing', async () => {
    await touch(dir, {
      'Recording_04.fhls-2400.mp4': 10,
      'Recording_04.fhls-audio-high-Original.mp4': 10,
    });

    const report = await createExecutor(fakeFfmpeg(0)).reconcile(dir);

    expect(report.failed).toEqual([{ recordingNumber: 4, reason: 'Merge reported success but produced no file' }]);
    expect(await listDir(dir)).toHaveLength(2);
  });

  it('should turn a thrown runner error into a failed merge', async () => {
    await touch(dir, {
      'Recording_06.fhls-2400.mp4': 10,
      'Recording_06.fhls-audio-high-Original.mp4': 10,
    });
    const runner = vi.fn<ToolRunner>(async () => {
      throw new Error('spawn EACCES');
    });

    const report = await createExecutor(runner).reconcile(dir);

    expect(report.failed).toEqual([{ recordingNumber: 6, reason: 'Error during merge: spawn EACCES' }]);
    expect(await listDir(dir)).toHaveLength(2);
  });

  it('should leave only the fragments when a merge is interrupted, and merge them on the next run', async () => {
    await touch(dir, {
      'Recording_02.fhls-2400.mp4': 10,
      'Recording_02.fhls-audio-high-Original.mp4': 10,
    });
    const interrupted = vi.fn<ToolRunner>(async (_file, args) => {
      const output = args.at(-1);
      if (output) await writeFile(output, Buffer.alloc(500));
      throw new Error('ffmpeg was killed by SIGINT');
    });

    const first = await createExecutor(interrupted).reconcile(dir);

    expect(first.failed).toEqual([{ recordingNumber: 2, reason: 'Error during merge: ffmpeg was killed by SIGINT' }]);
    expect(await listDir(dir)).toEqual(['Recording_02.fhls-2400.mp4', 'Recording_02.fhls-audio-high-Original.mp4']);

    const second = await createExecutor(fakeFfmpeg(2000)).reconcile(dir);

    expect(second.merged).toEqual([2]);
    expect(await listDir(dir)).toEqual(['Recording_02.mp4']);
  });

  it('should discard unfinished merge output from a killed run and merge again', async () => {
    await touch(dir, {
      'Recording_02.fhls-2400.mp4': 10,
      'Recording_02.fhls-audio-high-Original.mp4': 10,
      'Recording_02.merging.mp4': 50,
    });
    const runner = fakeFfmpeg(2000);

    const report = await createExecutor(runner).reconcile(dir);

    expect(report.cleaned).toEqual([join(dir, 'Recording_02.merging.mp4')]);
    expect(report.alreadyMerged).toEqual([]);
    expect(report.merged).toEqual([2]);
    expect(runner).toHaveBeenCalledOnce();
    expect(await listDir(dir)).toEqual(['Recording_02.mp4']);
  });

  it('should report fragments it could not delete after merging', async () => {
    await touch(dir, {
      'Recording_02.fhls-2400.mp4': 10,
      'Recording_02.fhls-audio-high-Original.mp4': 10,
    });
    const audio = join(dir, 'Recording_02.fhls-audio-high-Original.mp4');
    lockedFiles.add(audio);

    const report = await createExecutor(fakeFfmpeg(2000)).reconcile(dir);

    expect(report.merged).toEqual([2]);
    expect(report.leftovers).toEqual([audio]);
    expect(await listDir(dir)).toEqual(['Recording_02.fhls-audio-high-Original.mp4', 'Recording_02.mp4']);
    expect(notifier.notify).toHaveBeenCalledWith(
      'error',
      `Recording 02: Failed to delete Recording_02.fhls-audio-high-Original.mp4 after merging, delete it by hand: EBUSY: resource busy or locked, unlink '${audio}'`,
    );
  });

  it('should be a no-op on a second run', async () => {
    await touch(dir, {
      'Recording_02.fhls-2400.mp4': 10,
      'Recording_02.fhls-audio-high-Original.mp4': 10,
    });
    const runner = fakeFfmpeg(2000);
    const executor = createExecutor(runner);

    await executor.reconcile(dir);
    const second = await executor.reconcile(dir);

    expect(runner).toHaveBeenCalledTimes(1);
    expect(second.merged).toEqual([]);
    expect(await listDir(dir)).toEqual(['Recording_02.mp4']);
  });

  it('should ignore fragments of a recording that is already merged', async () => {
    await touch(dir, {
      'Recording_07.mp4': 5000,
      'Recording_07.fhls-2400.mp4': 10,
      'Recording_07.fhls-audio-high-Original.mp4': 10,
    });
    const runner = fakeFfmpeg(2000);

    const report = await createExecutor(runner).reconcile(dir);

    expect(runner).not.toHaveBeenCalled();
    expect(report.alreadyMerged).toEqual([7]);
    expect(await listDir(dir)).toEqual([
      'Recording_07.fhls-2400.mp4',
      'Recording_07.fhls-audio-high-Original.mp4',
      'Recording_07.mp4',
    ]);
  });

  it('should never select or delete a fragment that is still downloading', async () => {
    await touch(dir, {
      'Recording_08.fhls-9999.mp4': 10,
      'Recording_08.fhls-9999.mp4.part': 10,
      'Recording_08.fhls-audio-high-Original.mp4': 10,
    });
    const runner = fakeFfmpeg(2000);

    const report = await createExecutor(runner).reconcile(dir);

    expect(runner).not.toHaveBeenCalled();
    expect(report.pending).toEqual([{ recordingNumber: 8, reason: 'video-in-progress' }]);
    expect(await listDir(dir)).toEqual([
      'Recording_08.fhls-9999.mp4',
      'Recording_08.fhls-9999.mp4.part',
      'Recording_08.fhls-audio-high-Original.mp4',
    ]);
  });

  it('should only merge the requested recordings when scoped', async () => {
    await touch(dir, {
      'Recording_01.fhls-2400.mp4': 10,
      'Recording_01.fhls-audio-high-Original.mp4': 10,
      'Recording_02.fhls-2400.mp4': 10,
      'Recording_02.fhls-audio-high-Original.mp4': 10,
    });

    const report = await createExecutor(fakeFfmpeg(2000)).reconcile(dir, [2]);

    expect(report.merged).toEqual([2]);
    expect(await listDir(dir)).toEqual([
      'Recording_01.fhls-2400.mp4',
      'Recording_01.fhls-audio-high-Original.mp4',
      'Recording_02.mp4',
    ]);
  });

  it('should remove leftover downloader resume files', async () => {
    await touch(dir, { 'Recording_03.fhls-2400.mp4.ytdl': 1, 'Recording_03.mp4': 5000 });

    const report = await createExecutor(fakeFfmpeg(2000)).reconcile(dir);

    expect(report.cleaned).toEqual([join(dir, 'Recording_03.fhls-2400.mp4.ytdl')]);
    expect(await listDir(dir)).toEqual(['Recording_03.mp4']);
  });

  it('should report the installed version through the runner', async () => {
    const runner = vi.fn<ToolRunner>(async () => ({ ...ok, stdout: 'ffmpeg version 7.1\n' }));

    await expect(MergeExecutor.checkInstalled('/usr/bin/ffmpeg', runner)).resolves.toBe('ffmpeg version 7.1');
    expect(runner).toHaveBeenCalledWith('/usr/bin/ffmpeg', ['-version'], { timeoutMs: 15_000 });
  });
});
