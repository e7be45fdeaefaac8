import { boolean, command, flag, number, option, optional, string } from 'cmd-ts';
import { loadConfig } from './config/config-loader.js';
import { resolveConfig } from './config/config-resolver.js';
import type { AppConfig } from './config/resolved-config.types.js';
import type { Downloader } from './downloader/types.js';
import { YtDlpDownloader } from './downloader/yt-dlp-downloader.js';
import { ConfigError, EnvironmentError, errorMessage, UsageError } from './errors/custom-errors.js';
import { MergeExecutor, type Reconciler } from './media/merge-executor.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import type { Notifier } from './notifications/notifier.js';
import { RecordingOrchestrator, recordingRange } from './orchestrator/recording-orchestrator.js';
import { PlaywrightSession } from './session/playwright-session.js';
import type { SessionProvider } from './session/types.js';
import { LogLevel, logger } from './utils/logger.js';

export type CliOptions = {
  video?: number;
  start?: number;
  end?: number;
  merge: boolean;
  headless: boolean;
  force: boolean;
  allowSplit: boolean;
  config?: string;
};

export type RunSelection = { mode: 'merge' } | { mode: 'download'; recordingNumbers: number[] };

/**
 * Session as the application drives it
 */
export type AppSession = SessionProvider & {
  readonly cookieJarPath: string;
  open(): Promise<void>;
  close(): Promise<void>;
};

export type SessionSetup = {
  baseUrl: string;
  loginUrl: string;
  email: string;
  password: string;
};

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  checkMergeTool: (toolPath: string) => Promise<string | null>;
  checkDownloader: (toolPath: string) => Promise<string | null>;
  createNotifier: () => Notifier;
  createSession: (config: AppConfig, setup: SessionSetup, notifier: Notifier) => AppSession;
  createDownloader: (config: AppConfig, cookieFile: string, notifier: Notifier) => Downloader;
  createReconciler: (config: AppConfig, notifier: Notifier) => Reconciler;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  checkMergeTool: (toolPath) => MergeExecutor.checkInstalled(toolPath),
  checkDownloader: (toolPath) => YtDlpDownloader.checkInstalled(toolPath),
  createNotifier: () => new ConsoleNotifier(),
  createSession: (config, setup, notifier) =>
    new PlaywrightSession({
      ...setup,
      headless: config.session.headless,
      navigationTimeoutMs: config.session.navigationTimeoutSeconds * 1000,
      stateDir: config.session.stateDir,
      userAgent: config.session.userAgent,
      notifier,
    }),
  createDownloader: (config, cookieFile, notifier) =>
    new YtDlpDownloader({
      toolPath: config.tools.downloaderPath,
      cookieFile,
      format: config.download.format,
      mergeOutputFormat: config.download.mergeOutputFormat,
      retries: config.download.retries,
      timeoutMs: config.download.timeoutSeconds * 1000,
      notifier,
    }),
  createReconciler: (config, notifier) =>
    new MergeExecutor({
      toolPath: config.tools.mergeToolPath,
      prefix: config.recordingPrefix,
      audioCodec: config.merge.audioCodec,
      audioBitrate: config.merge.audioBitrate,
      minOutputBytes: config.merge.minOutputBytes,
      timeoutMs: config.merge.timeoutSeconds * 1000,
      notifier,
    }),
};

/**
 * Decide what to do from the command line options
 *
 * @throws UsageError for contradicting or incomplete options
 */
export function resolveSelection(options: Pick<CliOptions, 'video' | 'start' | 'end' | 'merge'>): RunSelection {
  const { video, start, end, merge } = options;
  const chosen = [video !== undefined, start !== undefined || end !== undefined, merge].filter(Boolean).length;

  if (chosen === 0) {
    throw new UsageError('Specify --video N, --start N --end M, or --merge');
  }
  if (chosen > 1) {
    throw new UsageError('Use only one of --video, --start/--end and --merge');
  }
  if (merge) {
    return { mode: 'merge' };
  }

  const numbers = [video, start, end].filter((value) => value !== undefined);
  if (numbers.some((value) => !Number.isInteger(value) || value < 1)) {
    throw new UsageError('Recording numbers must be positive integers');
  }

  if (video !== undefined) {
    return { mode: 'download', recordingNumbers: [video] };
  }
  if (start === undefined) {
    throw new UsageError('--end requires --start');
  }
  if (end === undefined) {
    throw new UsageError('--start requires --end');
  }
  if (start > end) {
    throw new UsageError('--start must not be greater than --end');
  }
  return { mode: 'download', recordingNumbers: recordingRange(start, end) };
}

function requireSessionSetup(config: AppConfig): SessionSetup {
  const { email, password } = config.credentials;
  if (!email || !password) {
    throw new ConfigError(
      'Credentials missing: set RECFETCH_EMAIL and RECFETCH_PASSWORD, or "credentials" in the config file',
    );
  }
  const { baseUrl } = config;
  const { loginUrl } = config.session;
  if (!baseUrl || !loginUrl) {
    throw new ConfigError('Base URL missing: set RECFETCH_BASE_URL, or "baseUrl" in the config file');
  }
  return { baseUrl, loginUrl, email, password };
}

/**
 * Run one invocation
 *
 * @returns true when nothing failed
 */
export async function runApp(options: CliOptions, deps: AppDependencies = defaultDependencies): Promise<boolean> {
  const selection = resolveSelection(options);

  const config = resolveConfig(await deps.loadConfig(options.config), {
    headless: options.headless,
    forceRedownload: options.force,
    allowUnmergedOutput: options.allowSplit,
  });
  logger.setLevel(config.logLevel);
  const notifier = deps.createNotifier();

  notifier.notify(LogLevel.INFO, 'Checking dependencies...');
  const mergeToolVersion = await deps.checkMergeTool(config.tools.mergeToolPath);
  if (mergeToolVersion) {
    notifier.notify(LogLevel.SUCCESS, `ffmpeg found: ${mergeToolVersion}`);
  } else {
    notifier.notify(LogLevel.WARNING, `ffmpeg not found at "${config.tools.mergeToolPath}"`);
  }

  if (selection.mode === 'merge') {
    if (!mergeToolVersion) {
      throw new EnvironmentError('Cannot merge files without ffmpeg installed', config.tools.mergeToolPath);
    }
    await deps.createReconciler(config, notifier).reconcile(config.outputDirectory);
    return true;
  }

  if (!mergeToolVersion && !config.allowUnmergedOutput) {
    throw new EnvironmentError(
      'ffmpeg is required for normal downloads: best-quality streams often arrive as separate video and audio ' +
        'files that only ffmpeg can merge. Install ffmpeg, or re-run with --allow-split to keep the separate files.',
      config.tools.mergeToolPath,
    );
  }

  const downloaderVersion = await deps.checkDownloader(config.tools.downloaderPath);
  if (!downloaderVersion) {
    throw new EnvironmentError(
      'yt-dlp is not installed. Please install it first:\n' +
        '  - macOS: brew install yt-dlp\n' +
        '  - Linux: pip install yt-dlp\n' +
        '  - Windows: winget install yt-dlp',
      config.tools.downloaderPath,
    );
  }
  notifier.notify(LogLevel.SUCCESS, `yt-dlp found: ${downloaderVersion}`);

  const setup = requireSessionSetup(config);
  const session = deps.createSession(config, setup, notifier);
  await session.open();

  try {
    const orchestrator = new RecordingOrchestrator(config, {
      session,
      downloader: deps.createDownloader(config, session.cookieJarPath, notifier),
      reconciler: mergeToolVersion ? deps.createReconciler(config, notifier) : undefined,
      notifier,
    });

    const { recordingNumbers } = selection;
    const first = recordingNumbers[0];
    const last = recordingNumbers.at(-1);
    notifier.notify(
      LogLevel.HIGHLIGHT,
      first === last ? `Downloading recording ${first}...` : `Downloading recordings ${first} to ${last}...`,
    );

    const report = await orchestrator.run(recordingNumbers);

    notifier.notify(LogLevel.HIGHLIGHT, 'Download Summary');
    for (const line of report.render()) {
      notifier.notify(report.isSuccess() ? LogLevel.INFO : LogLevel.WARNING, line);
    }
    notifier.notify(LogLevel.INFO, `Videos saved to: ${config.outputDirectory}`);

    return report.isSuccess();
  } finally {
    await session.close();
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof ConfigError) return `Configuration error: ${error.message}`;
  if (error instanceof UsageError) return `${error.message} (see --help)`;
  if (error instanceof EnvironmentError) return `Missing dependency: ${error.message}`;
  return `Fatal error: ${errorMessage(error)}`;
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'recfetch',
  description: 'Download course session recordings and merge split video/audio streams',
  args: {
    video: option({
      type: optional(number),
      long: 'video',
      short: 'v',
      description: 'Download a single recording',
    }),
    start: option({
      type: optional(number),
      long: 'start',
      short: 's',
      description: 'First recording of a range',
    }),
    end: option({
      type: optional(number),
      long: 'end',
      short: 'e',
      description: 'Last recording of a range (inclusive)',
    }),
    merge: flag({
      type: boolean,
      long: 'merge',
      short: 'm',
      description: 'Only merge split audio/video files already downloaded',
    }),
    headless: flag({
      type: boolean,
      long: 'headless',
      description: 'Run the browser without a window',
    }),
    force: flag({
      type: boolean,
      long: 'force',
      short: 'f',
      description: 'Re-download recordings that already exist',
    }),
    allowSplit: flag({
      type: boolean,
      long: 'allow-split',
      description: 'Download without ffmpeg and keep separate audio/video files',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to configuration file (default: ./recfetch.yaml)',
    }),
  },
  handler: async (options) => {
    try {
      const succeeded = await runApp(options);
      process.exitCode = succeeded ? 0 : 1;
    } catch (error) {
      logger.error(describeFailure(error));
      process.exitCode = 1;
    }
  },
});
