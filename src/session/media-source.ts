import type { MediaSource } from '../downloader/types.js';
import { errorMessage } from '../errors/custom-errors.js';
import type { PageProbe } from './types.js';

export type StrategyResult = { found: true; source: MediaSource } | { found: false; note: string };

export type SourceStrategy = {
  name: string;
  find(probe: PageProbe, pageUrl: string): Promise<StrategyResult>;
};

const IFRAME_SELECTORS = ['iframe[src*="vimeo"]', 'iframe[src*="youtube"]', 'iframe[src*="wistia"]', 'iframe[src*="player"]'];

const PLAYER_SELECTORS = ['[data-video-url]', '[data-src]', '.video-player', '.wistia_embed', '.vimeo-player'];

const PLAYER_ATTRIBUTES = ['data-video-url', 'data-src', 'data-video-id'];

const notFound = (note: string): StrategyResult => ({ found: false, note });

/**
 * Absolute form of `src`; null for sources a downloader cannot fetch
 */
export function toDownloadableUrl(src: string, pageUrl: string): string | null {
  const trimmed = src.trim();
  if (!trimmed || trimmed.startsWith('blob:') || trimmed.startsWith('data:')) {
    return null;
  }
  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    return null;
  }
}

export const videoElementStrategy: SourceStrategy = {
  name: 'video element',
  async find(probe, pageUrl) {
    const src = await probe.attribute('video source, video', 'src');
    if (src === null) return notFound('no <video> source');

    const locator = toDownloadableUrl(src, pageUrl);
    if (locator === null) return notFound(`unusable <video> source "${src.slice(0, 40)}"`);
    return { found: true, source: { locator, needsReferer: false, pageUrl } };
  },
};

/**
 * Vimeo embeds only play with the course page as referer, so the page itself is handed on
 */
export const iframeStrategy: SourceStrategy = {
  name: 'iframe embed',
  async find(probe, pageUrl) {
    for (const selector of IFRAME_SELECTORS) {
      const src = await probe.attribute(selector, 'src');
      if (src === null) continue;

      if (src.includes('vimeo')) {
        return { found: true, source: { locator: pageUrl, needsReferer: true, pageUrl } };
      }
      const locator = toDownloadableUrl(src, pageUrl);
      if (locator !== null) {
        return { found: true, source: { locator, needsReferer: false, pageUrl } };
      }
    }
    return notFound('no player iframe');
  },
};

export const playerAttributeStrategy: SourceStrategy = {
  name: 'player attributes',
  async find(probe, pageUrl) {
    for (const selector of PLAYER_SELECTORS) {
      for (const name of PLAYER_ATTRIBUTES) {
        const value = await probe.attribute(selector, name);
        if (value === null) continue;

        const locator = toDownloadableUrl(value, pageUrl);
        if (locator !== null) {
          return { found: true, source: { locator, needsReferer: false, pageUrl } };
        }
      }
    }
    return notFound('no player container with a source attribute');
  },
};

export const pageFallbackStrategy: SourceStrategy = {
  name: 'page address',
  async find(_probe, pageUrl) {
    return { found: true, source: { locator: pageUrl, needsReferer: true, pageUrl } };
  },
};

export const DEFAULT_STRATEGIES: readonly SourceStrategy[] = [
  videoElementStrategy,
  iframeStrategy,
  playerAttributeStrategy,
  pageFallbackStrategy,
];

export type Resolution = {
  source: MediaSource | null;
  strategy: string | null;
  /** Why each earlier strategy passed */
  notes: string[];
};

/**
 * Run the strategies in order and return the first source found.
 * A probe that throws counts as "not found" for that strategy only.
 */
export async function findMediaSource(
  probe: PageProbe,
  pageUrl: string,
  strategies: readonly SourceStrategy[] = DEFAULT_STRATEGIES,
): Promise<Resolution> {
  const notes: string[] = [];

  for (const strategy of strategies) {
    let result: StrategyResult;
    try {
      result = await strategy.find(probe, pageUrl);
    } catch (error) {
      result = notFound(`probe failed: ${errorMessage(error)}`);
    }

    if (result.found) {
      return { source: result.source, strategy: strategy.name, notes };
    }
    notes.push(`${strategy.name}: ${result.note}`);
  }

  return { source: null, strategy: null, notes };
}
