/**
 * Extensions a finished recording can carry
 */
export const CONTAINER_EXTENSIONS: ReadonlySet<string> = new Set(['mp4', 'mkv', 'webm']);

/**
 * Extension of the file the merge produces
 */
export const CANONICAL_EXTENSION = 'mp4';

/**
 * ffmpeg writes here first; the file is renamed to the canonical name once it is verified
 */
const MERGE_SCRATCH_SUFFIX = `.merging.${CANONICAL_EXTENSION}`;

/**
 * A directory entry name, classified once
 */
export type ParsedEntry =
  | { kind: 'canonical'; recordingNumber: number; extension: string }
  | { kind: 'fragment'; recordingNumber: number; variantSuffix: string; extension: string }
  // target: name of the file still being written
  | { kind: 'in-progress'; target: string }
  | { kind: 'download-state' }
  // unverified merge output left by an interrupted run
  | { kind: 'merge-scratch' }
  | { kind: 'unrelated' };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Classify a file name found in the output directory.
 *
 * yt-dlp writes `<name>.part` while downloading, `<name>.part-Frag<k>` for
 * fragmented streams and `<name>.ytdl` to resume; everything else under the
 * prefix is either a merged recording or a single-stream fragment.
 */
export function parseEntryName(name: string, prefix: string): ParsedEntry {
  if (name.endsWith('.ytdl')) {
    return { kind: 'download-state' };
  }

  const fragmentPart = name.match(/^(.+)\.part-Frag\d+(?:\.part)?$/);
  if (fragmentPart?.[1]) {
    return { kind: 'in-progress', target: fragmentPart[1] };
  }

  if (name.endsWith('.part')) {
    return { kind: 'in-progress', target: name.slice(0, -'.part'.length) };
  }

  const escaped = escapeRegExp(prefix);

  if (new RegExp(`^${escaped}\\d+${escapeRegExp(MERGE_SCRATCH_SUFFIX)}$`).test(name)) {
    return { kind: 'merge-scratch' };
  }

  const fragment = name.match(new RegExp(`^${escaped}(\\d+)\\.(.+)\\.([A-Za-z0-9]+)$`));
  if (fragment?.[1] && fragment[2] && fragment[3]) {
    return {
      kind: 'fragment',
      recordingNumber: Number.parseInt(fragment[1], 10),
      variantSuffix: fragment[2],
      extension: fragment[3],
    };
  }

  const merged = name.match(new RegExp(`^${escaped}(\\d+)\\.([A-Za-z0-9]+)$`));
  if (merged?.[1] && merged[2] && CONTAINER_EXTENSIONS.has(merged[2].toLowerCase())) {
    return {
      kind: 'canonical',
      recordingNumber: Number.parseInt(merged[1], 10),
      extension: merged[2],
    };
  }

  return { kind: 'unrelated' };
}

/**
 * Two-digit zero padded recording number
 */
export function formatRecordingNumber(recordingNumber: number): string {
  return String(recordingNumber).padStart(2, '0');
}

/**
 * File name stem shared by every file of one recording, e.g. `Recording_07`
 */
export function recordingStem(recordingNumber: number, prefix: string): string {
  return `${prefix}${formatRecordingNumber(recordingNumber)}`;
}

export function canonicalFileName(recordingNumber: number, prefix: string, extension = CANONICAL_EXTENSION): string {
  return `${recordingStem(recordingNumber, prefix)}.${extension}`;
}

export function mergeScratchFileName(recordingNumber: number, prefix: string): string {
  return `${recordingStem(recordingNumber, prefix)}${MERGE_SCRATCH_SUFFIX}`;
}

/**
 * Page address of one recording on the platform
 */
export function recordingPageUrl(baseUrl: string, recordingNumber: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/${recordingNumber}`;
}
