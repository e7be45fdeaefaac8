import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { type ParsedEntry, parseEntryName } from './recording-name.js';
import type { FragmentGroup, FragmentScan, MediaFragment, StreamKind } from './types.js';

const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set(['m4a', 'aac', 'mp3', 'opus', 'ogg', 'wav']);

export type ScanOptions = {
  /** File name prefix shared by all recordings, e.g. `Recording_` */
  prefix: string;
  /** Restrict the scan to these recording numbers */
  only?: Iterable<number>;
};

/**
 * Audio when the suffix names an audio track or the extension is an audio-only container
 */
export function classifyStream(variantSuffix: string, extension: string): StreamKind {
  if (variantSuffix.toLowerCase().includes('audio')) {
    return 'audio';
  }
  return AUDIO_EXTENSIONS.has(extension.toLowerCase()) ? 'audio' : 'video';
}

async function listFileNames(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Group the fragments in `dir` by recording number.
 *
 * Fragments are staged before merged files are looked at: a recording can hold
 * both a merged file and stale fragments after an interrupted run, and the
 * merged file always wins.
 */
export async function scanFragments(dir: string, options: ScanOptions): Promise<FragmentScan> {
  const root = resolve(dir);
  const only = options.only ? new Set(options.only) : undefined;
  const included = (recordingNumber: number) => only === undefined || only.has(recordingNumber);

  const entries: Array<{ name: string; parsed: ParsedEntry }> = (await listFileNames(root)).map((name) => ({
    name,
    parsed: parseEntryName(name, options.prefix),
  }));

  const inProgressTargets = new Set<string>();
  const downloadState: string[] = [];
  const mergeScratch: string[] = [];
  for (const { name, parsed } of entries) {
    if (parsed.kind === 'in-progress') {
      inProgressTargets.add(parsed.target);
    } else if (parsed.kind === 'download-state') {
      downloadState.push(join(root, name));
    } else if (parsed.kind === 'merge-scratch') {
      mergeScratch.push(join(root, name));
    }
  }

  const staged = new Map<number, FragmentGroup>();
  for (const { name, parsed } of entries) {
    if (parsed.kind !== 'fragment' || !included(parsed.recordingNumber)) continue;

    const fragment: MediaFragment = {
      path: join(root, name),
      fileName: name,
      recordingNumber: parsed.recordingNumber,
      variantSuffix: parsed.variantSuffix,
      extension: parsed.extension,
      stream: classifyStream(parsed.variantSuffix, parsed.extension),
      inProgress: inProgressTargets.has(name),
    };

    let group = staged.get(fragment.recordingNumber);
    if (!group) {
      group = { recordingNumber: fragment.recordingNumber, videos: [], audios: [] };
      staged.set(fragment.recordingNumber, group);
    }
    (fragment.stream === 'audio' ? group.audios : group.videos).push(fragment);
  }

  const alreadyMerged: number[] = [];
  for (const { parsed } of entries) {
    if (parsed.kind !== 'canonical' || !included(parsed.recordingNumber)) continue;
    if (staged.delete(parsed.recordingNumber)) {
      alreadyMerged.push(parsed.recordingNumber);
    }
  }

  return {
    groups: [...staged.values()].sort((a, b) => a.recordingNumber - b.recordingNumber),
    alreadyMerged: alreadyMerged.sort((a, b) => a - b),
    downloadState,
    mergeScratch,
  };
}
