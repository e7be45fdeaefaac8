import { LogLevel } from '../utils/logger.js';
import type { AppConfig } from './resolved-config.types.js';

export type DefaultConfig = Omit<AppConfig, 'credentials' | 'baseUrl' | 'session'> & {
  session: Omit<AppConfig['session'], 'loginUrl'>;
};

export const defaults: DefaultConfig = {
  outputDirectory: './recordings',
  recordingPrefix: 'Recording_',
  forceRedownload: false,
  allowUnmergedOutput: false,
  logLevel: LogLevel.INFO,
  tools: {
    mergeToolPath: 'ffmpeg',
    downloaderPath: 'yt-dlp',
  },
  download: {
    format: 'bv*+ba/b',
    mergeOutputFormat: 'mp4',
    retries: 3,
    timeoutSeconds: 4 * 60 * 60,
  },
  merge: {
    audioCodec: 'aac',
    audioBitrate: '192k',
    minOutputBytes: 1_000_000,
    timeoutSeconds: 30 * 60,
  },
  session: {
    headless: false,
    navigationTimeoutSeconds: 60,
    stateDir: '.recfetch',
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  },
};
