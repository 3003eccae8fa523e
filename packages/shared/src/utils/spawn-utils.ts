import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Data written to the child's stdin before it is closed.
   * When omitted, stdin is left as configured by `stdio`.
   */
  input?: Buffer | Uint8Array | string;
}

/**
 * Execute a command asynchronously and return the result
 *
 * Output is decoded as UTF-8 once the process closes, so multi-byte
 * characters split across chunks survive intact. A process killed by a
 * signal reports exit code 1.
 *
 * @param command - The command to execute
 * @param args - Arguments to pass to the command
 * @param options - Spawn options with optional output capture control
 * @returns Promise resolving to stdout, stderr, and exit code
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('tesseract', ['--version']);
 *
 * // Feed an image through stdin
 * const ocr = await spawnAsync('tesseract', ['stdin', 'stdout'], {
 *   input: pngBytes,
 * });
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    input,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });
    }

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        code: code ?? (signal ? 1 : 0),
      });
    });

    proc.on('error', reject);

    if (input !== undefined && proc.stdin) {
      // EPIPE: the child exited before draining stdin. Its exit code
      // reports the failure.
      proc.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EPIPE') {
          stderrChunks.push(Buffer.from(`stdin closed early: ${error.message}`));
          return;
        }
        reject(error);
      });
      proc.stdin.end(input);
    }
  });
}

/**
 * True when spawning failed because the executable does not exist.
 */
export function isCommandNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
