/**
 * Process execution for the host-side tools (container manager, git, script).
 */

import { spawn } from 'child_process';
import { constants } from 'os';
import type { Readable, Writable } from 'stream';

// Exit status used when a process ended with neither a code nor a known signal
export const UNKNOWN_TERMINATION = 127;

export interface Termination {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: Readable | string;
  /** 'inherit' (default) passes stdout through, 'capture' collects it. */
  stdout?: 'inherit' | 'capture' | Writable;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  durationMs: number;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options?: ProcessOptions,
) => Promise<ProcessResult>;

/**
 * Normalize how a process ended into a single shell-style status:
 * exit code n stays n, signal s becomes 128+s, anything else is 127.
 */
export function translateExitStatus(termination: Termination | number): number {
  if (typeof termination === 'number') {
    return Number.isInteger(termination) && termination >= 0
      ? termination
      : UNKNOWN_TERMINATION;
  }

  if (termination.code !== null) {
    return termination.code;
  }

  if (termination.signal !== null) {
    const signalNumber = constants.signals[termination.signal];
    if (typeof signalNumber === 'number') {
      return 128 + signalNumber;
    }
  }

  return UNKNOWN_TERMINATION;
}

export const runProcess: ProcessRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();
    const stdoutMode = options.stdout ?? 'inherit';

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: [
        options.input === undefined ? 'ignore' : 'pipe',
        stdoutMode === 'inherit' ? 'inherit' : 'pipe',
        'inherit',
      ],
    });

    const stdoutChunks: Buffer[] = [];
    let stdinError: Error | null = null;

    if (proc.stdout) {
      if (stdoutMode === 'capture') {
        proc.stdout.on('data', (chunk: Buffer) => {
          stdoutChunks.push(chunk);
        });
      } else if (stdoutMode !== 'inherit') {
        proc.stdout.pipe(stdoutMode);
      }
    }

    if (proc.stdin && options.input !== undefined) {
      proc.stdin.on('error', (err) => {
        stdinError = err;
      });
      if (typeof options.input === 'string') {
        proc.stdin.end(options.input);
      } else {
        options.input.pipe(proc.stdin);
      }
    }

    proc.on('error', (error) => {
      reject(error);
    });

    proc.on('close', (code, signal) => {
      const exitCode = translateExitStatus({ code, signal });
      // A broken pipe only matters if the process claims success
      if (exitCode === 0 && stdinError) {
        reject(stdinError);
        return;
      }
      resolve({
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        durationMs: Date.now() - startTime,
      });
    });
  });
};
