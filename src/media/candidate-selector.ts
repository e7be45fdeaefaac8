import type { FragmentGroup, MediaFragment } from './types.js';

export type NotMergeableReason = 'audio-missing' | 'video-missing' | 'audio-in-progress' | 'video-in-progress';

export type Selection =
  | { status: 'mergeable'; recordingNumber: number; video: MediaFragment; audio: MediaFragment }
  | { status: 'not-mergeable'; recordingNumber: number; reason: NotMergeableReason };

export const NOT_MERGEABLE_MESSAGES: Record<NotMergeableReason, string> = {
  'audio-missing': 'Video only, no audio file found',
  'video-missing': 'Audio only, no video file found',
  'audio-in-progress': 'Audio still downloading (.part file exists)',
  'video-in-progress': 'Video still downloading (.part file exists)',
};

/**
 * Prefer the source-language track over a dubbed one
 */
export function audioScore(variantSuffix: string): number {
  const suffix = variantSuffix.toLowerCase();
  if (suffix.includes('original')) return 3;
  if (suffix.includes('english')) return 2;
  return 1;
}

/**
 * Trailing `-<digits>` token of the suffix, -1 without one.
 *
 * Larger tokens have matched higher quality streams so far; nothing guarantees
 * the number is a bitrate or a resolution.
 */
export function videoScore(variantSuffix: string): number {
  const match = variantSuffix.match(/-(\d+)$/);
  return match?.[1] ? Number.parseInt(match[1], 10) : -1;
}

/**
 * Highest scoring fragment; ties keep the first one encountered
 */
function best(fragments: readonly MediaFragment[], score: (suffix: string) => number): MediaFragment | undefined {
  let winner: MediaFragment | undefined;
  let winnerScore = Number.NEGATIVE_INFINITY;
  for (const fragment of fragments) {
    const value = score(fragment.variantSuffix);
    if (value > winnerScore) {
      winner = fragment;
      winnerScore = value;
    }
  }
  return winner;
}

/**
 * Pick the video and audio fragment to merge for one recording
 */
export function selectCandidates(group: FragmentGroup): Selection {
  const { recordingNumber } = group;
  const video = best(group.videos, videoScore);
  const audio = best(group.audios, audioScore);

  if (!audio) {
    return { status: 'not-mergeable', recordingNumber, reason: 'audio-missing' };
  }
  if (!video) {
    return { status: 'not-mergeable', recordingNumber, reason: 'video-missing' };
  }
  // An unfinished download is never consumed
  if (audio.inProgress) {
    return { status: 'not-mergeable', recordingNumber, reason: 'audio-in-progress' };
  }
  if (video.inProgress) {
    return { status: 'not-mergeable', recordingNumber, reason: 'video-in-progress' };
  }

  return { status: 'mergeable', recordingNumber, video, audio };
}
