/**
 * Stream a single-stream fragment carries
 */
export type StreamKind = 'video' | 'audio';

/**
 * One unmerged, single-stream media file of a recording
 */
export type MediaFragment = {
  /** Absolute path */
  path: string;
  fileName: string;
  recordingNumber: number;
  /** Text between the recording stem and the extension, e.g. `fhls-2400` */
  variantSuffix: string;
  extension: string;
  stream: StreamKind;
  /** A `.part` sibling exists: the file is still being written */
  inProgress: boolean;
};

/**
 * All fragments of one recording, split by stream kind in first-encountered order
 */
export type FragmentGroup = {
  recordingNumber: number;
  videos: MediaFragment[];
  audios: MediaFragment[];
};

export type FragmentScan = {
  /** Groups still to reconcile, ascending by recording number */
  groups: FragmentGroup[];
  /** Recording numbers whose fragments were dropped because a merged file exists */
  alreadyMerged: number[];
  /** Leftover downloader resume files (absolute paths) */
  downloadState: string[];
  /** Merge output of an interrupted run, never verified (absolute paths) */
  mergeScratch: string[];
};
