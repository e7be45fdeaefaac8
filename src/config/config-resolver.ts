import { defaults } from './config-defaults.js';
import type { Config } from './config-schema.js';
import type { AppConfig } from './resolved-config.types.js';

/**
 * Command line flags that override configuration values
 */
export type CliOverrides = {
  headless?: boolean;
  forceRedownload?: boolean;
  allowUnmergedOutput?: boolean;
};

/**
 * Resolve a validated configuration into a complete `AppConfig`.
 *
 * Priority, highest first: command line, configuration file (environment
 * overrides already applied), defaults.
 */
export function resolveConfig(config: Config, overrides: CliOverrides = {}): AppConfig {
  const { tools, download, merge, session } = config;

  const resolved: AppConfig = {
    credentials: { ...config.credentials },
    baseUrl: config.baseUrl,
    outputDirectory: config.outputDirectory ?? defaults.outputDirectory,
    recordingPrefix: config.recordingPrefix ?? defaults.recordingPrefix,
    forceRedownload: overrides.forceRedownload || (config.forceRedownload ?? defaults.forceRedownload),
    allowUnmergedOutput:
      overrides.allowUnmergedOutput || (config.allowUnmergedOutput ?? defaults.allowUnmergedOutput),
    logLevel: config.logLevel ?? defaults.logLevel,
    tools: {
      mergeToolPath: tools?.mergeToolPath ?? defaults.tools.mergeToolPath,
      downloaderPath: tools?.downloaderPath ?? defaults.tools.downloaderPath,
    },
    download: {
      format: download?.format ?? defaults.download.format,
      mergeOutputFormat: download?.mergeOutputFormat ?? defaults.download.mergeOutputFormat,
      retries: download?.retries ?? defaults.download.retries,
      timeoutSeconds: download?.timeoutSeconds ?? defaults.download.timeoutSeconds,
    },
    merge: {
      audioCodec: merge?.audioCodec ?? defaults.merge.audioCodec,
      audioBitrate: merge?.audioBitrate ?? defaults.merge.audioBitrate,
      minOutputBytes: merge?.minOutputBytes ?? defaults.merge.minOutputBytes,
      timeoutSeconds: merge?.timeoutSeconds ?? defaults.merge.timeoutSeconds,
    },
    session: {
      headless: overrides.headless || (session?.headless ?? defaults.session.headless),
      loginUrl: session?.loginUrl ?? defaultLoginUrl(config.baseUrl),
      navigationTimeoutSeconds: session?.navigationTimeoutSeconds ?? defaults.session.navigationTimeoutSeconds,
      stateDir: session?.stateDir ?? defaults.session.stateDir,
      userAgent: session?.userAgent ?? defaults.session.userAgent,
    },
  };

  return resolved;
}

function defaultLoginUrl(baseUrl: string | undefined): string | undefined {
  return baseUrl ? new URL('/login', baseUrl).toString() : undefined;
}
