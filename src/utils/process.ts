import { execa } from 'execa';
import { errorMessage } from '../errors/custom-errors.js';

export type ToolResult = {
  /** -1 when the process never started or was killed */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the tool did not exit with code 0 */
  failureMessage?: string;
};

export type ToolRunOptions = {
  timeoutMs?: number;
  cwd?: string;
  /** Receives stdout and stderr line by line while the tool runs */
  onLine?: (line: string) => void;
};

/**
 * Runs an external tool to completion; a nonzero exit is a result, not an exception
 */
export type ToolRunner = (file: string, args: readonly string[], options?: ToolRunOptions) => Promise<ToolResult>;

export const runTool: ToolRunner = async (file, args, options = {}) => {
  const subprocess = execa(file, args, {
    all: true,
    reject: false,
    stdin: 'ignore',
    timeout: options.timeoutMs,
    cwd: options.cwd,
  });

  let streamFailure: string | undefined;
  if (options.onLine) {
    try {
      for await (const line of subprocess.iterable({ from: 'all' })) {
        options.onLine(line);
      }
    } catch (error) {
      streamFailure = errorMessage(error);
    }
  }

  const result = await subprocess;
  const exitCode = result.exitCode ?? -1;

  let failureMessage: string | undefined;
  if (result.timedOut) {
    failureMessage = `${file} timed out after ${options.timeoutMs}ms`;
  } else if (result.isTerminated) {
    failureMessage = `${file} was killed by ${result.signal ?? 'a signal'}`;
  } else if (result.exitCode === undefined) {
    failureMessage = `${file} could not be started${streamFailure ? `: ${streamFailure}` : ''}`;
  } else if (exitCode !== 0) {
    failureMessage = `${file} exited with code ${exitCode}`;
  }

  return {
    exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    failureMessage,
  };
};

/**
 * First line of a tool's version output, or null when it cannot be run
 */
export async function probeTool(file: string, versionArg: string, runner: ToolRunner = runTool): Promise<string | null> {
  const result = await runner(file, [versionArg], { timeoutMs: 15_000 });
  if (result.exitCode !== 0) {
    return null;
  }
  return result.stdout.split('\n')[0]?.trim() || file;
}
