import type { MediaSource } from '../downloader/types.js';

/**
 * Authenticated access to recording pages
 */
export type SessionProvider = {
  /**
   * Locate the media of one recording; null when nothing usable was found
   */
  resolveMediaSource(recordingNumber: number): Promise<MediaSource | null>;
};

/**
 * Read access to the DOM of a loaded page
 */
export type PageProbe = {
  /** Attribute of the first element matching `selector`; null without element or attribute */
  attribute(selector: string, name: string): Promise<string | null>;
};

export type SignInResult =
  | { status: 'signed-in'; via: 'existing-session' | 'marker' | 'redirect' }
  | { status: 'failed'; reason: string; pageErrors: string[] };
