import { spawn } from 'node:child_process';
import { ProcessingError, ToolUnavailableError } from '../errors';

export interface ProcessRunOptions {
  /** Kill the child after this many milliseconds. */
  timeoutMs?: number | null;
  /** Installation hint used when the binary cannot be spawned. */
  remediation: string;
}

export interface ProcessRunResult {
  stdout: Buffer;
  stderr: string;
}

/**
 * Runs an external binary to completion, collecting stdout as bytes and stderr as text.
 * Rejects with ToolUnavailableError when the binary is missing and ProcessingError on a
 * non-zero exit or a timeout kill.
 */
export function runProcess(binary: string, args: string[], options: ProcessRunOptions): Promise<ProcessRunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs ?? undefined
    });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    child.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) {
        return;
      }
      settled = true;
      if (error.code === 'ENOENT') {
        reject(new ToolUnavailableError(binary, options.remediation));
        return;
      }
      reject(new ProcessingError(`Failed to run ${binary}`, error.message));
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) {
        return;
      }
      settled = true;
      const stderr = Buffer.concat(stderrChunks).toString('utf-8');
      if (code === 0) {
        resolve({ stdout: Buffer.concat(stdoutChunks), stderr });
        return;
      }
      const reason = signal ? `${binary} was terminated by ${signal}` : `${binary} exited with code ${code ?? 'unknown'}`;
      reject(new ProcessingError(reason, stderr));
    });
  });
}
