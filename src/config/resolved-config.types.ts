import type { LogLevel } from '../utils/logger.js';
import type { Credentials, DownloadSettings, MergeSettings, SessionSettings, ToolsSettings } from './config-schema.js';

/**
 * Resolved session settings; `loginUrl` stays optional until a base URL is known
 */
export type ResolvedSessionSettings = Required<Omit<SessionSettings, 'loginUrl'>> & Pick<SessionSettings, 'loginUrl'>;

/**
 * Full configuration after defaults, environment and command line overrides
 */
export type AppConfig = {
  credentials: Credentials;
  baseUrl?: string;
  outputDirectory: string;
  recordingPrefix: string;
  forceRedownload: boolean;
  allowUnmergedOutput: boolean;
  logLevel: LogLevel;
  tools: Required<ToolsSettings>;
  download: Required<DownloadSettings>;
  merge: Required<MergeSettings>;
  session: ResolvedSessionSettings;
};
