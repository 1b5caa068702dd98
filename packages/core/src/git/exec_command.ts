import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from './types';

/**
 * Builds the production `execCommand` for GitModule on top of
 * child_process.spawn. Never rejects: spawn failures resolve with exit
 * code 1 and the error message on stderr.
 */
export function createExecCommand(defaultCwd?: string): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      const cwd = options?.cwd || defaultCwd || process.cwd();
      const proc = spawn(command, args, {
        cwd,
        env: { ...process.env, ...options?.env },
      });

      // Decoded once on close: a chunk may end inside a multi-byte character
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      proc.stdout?.on('data', (data: Buffer) => { stdoutChunks.push(data); });
      proc.stderr?.on('data', (data: Buffer) => { stderrChunks.push(data); });

      proc.on('close', (code: number | null) => {
        resolve({
          exitCode: code ?? 1,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
        });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout: Buffer.concat(stdoutChunks).toString('utf8'), stderr: error.message });
      });
    });
  };
}
