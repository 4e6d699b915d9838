/**
 * External command execution
 *
 * Thin wrapper over `execFile` for helm, kubectl and docker queries. The
 * runner never throws for a non-zero exit: callers inspect the outcome and
 * decide which error class applies.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandOutcome {
  /** Process exit code; null when the process could not be started or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Binary is not on PATH */
  notFound: boolean;
  timedOut: boolean;
}

export interface RunOptions {
  timeout?: number;
  signal?: AbortSignal;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<CommandOutcome>;
}

interface ExecFileError {
  code?: unknown;
  killed?: boolean;
  signal?: unknown;
  stdout?: unknown;
  stderr?: unknown;
}

function isExecFileError(error: unknown): error is ExecFileError & Error {
  return error instanceof Error;
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
}

export function createCommandRunner(): CommandRunner {
  return {
    async run(file, args, options = {}) {
      try {
        const { stdout, stderr } = await execFileAsync(file, [...args], {
          encoding: 'utf-8',
          ...(options.timeout !== undefined && { timeout: options.timeout }),
          ...(options.signal !== undefined && { signal: options.signal }),
        });
        return { exitCode: 0, stdout, stderr, notFound: false, timedOut: false };
      } catch (error) {
        if (!isExecFileError(error)) {
          throw error;
        }
        const code = error.code;
        return {
          exitCode: typeof code === 'number' ? code : null,
          stdout: asText(error.stdout),
          stderr: asText(error.stderr) || error.message,
          notFound: code === 'ENOENT',
          timedOut: error.killed === true && error.signal === 'SIGTERM',
        };
      }
    },
  };
}

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Render argv as a single shell-safe command line.
 */
export function formatCommand(argv: readonly string[]): string {
  return argv
    .map((arg) => (arg !== '' && SAFE_ARG.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
