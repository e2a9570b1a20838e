/**
 * Command Execution Wrapper
 * 
 * Wrapper for running external decoders (ffmpeg) with:
 * - Timeout handling
 * - Binary stdout capture
 * - Abort signal forwarding
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  /** Raw stdout bytes (decoded PCM for ffmpeg pipes) */
  stdout: Buffer;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Execute an external command, collecting stdout as bytes
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    timeout = 60000,
    maxOutputSize = 256 * 1024 * 1024,
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const chunks: Buffer[] = [];
    let stdoutSize = 0;
    let stderr = '';

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        chunks.push(data);
        stdoutSize += data.length;
      }
    });

    // stderr is only kept for error reporting, cap it hard
    child.stderr.on('data', (data: Buffer) => {
      if (stderr.length < 64 * 1024) {
        stderr += data.toString();
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout: Buffer.concat(chunks),
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}
