import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

export interface ProcessOptions {
  cwd: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/** Runs a program without a shell; rejects on a non-zero exit or timeout. */
export type ProcessRunner = (file: string, args: readonly string[], options: ProcessOptions) => Promise<ProcessOutput>;

export const runProcess: ProcessRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    maxBuffer: 64 * 1024 * 1024,
    env: options.env ?? process.env
  });

  return { stdout, stderr };
};

export interface ProcessFailure {
  message: string;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/** Reads the output and kill state that `execFile` attaches to its rejection. */
export function describeProcessFailure(error: unknown): ProcessFailure {
  const message = error instanceof Error ? error.message : String(error);
  if (typeof error !== 'object' || error === null) {
    return { message, stdout: '', stderr: '', timedOut: false };
  }

  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  const killed = 'killed' in error && error.killed === true;
  const signal = 'signal' in error && error.signal === 'SIGTERM';

  return { message, stdout, stderr, timedOut: killed && signal };
}
