/**
 * Command runner — executes kubectl / helm as child processes.
 *
 * Commands are spawned without a shell; arguments are passed as an array so
 * cluster names never go through shell parsing. stdout and stderr are
 * collected in full and logged once the process exits.
 */

import { spawn } from 'node:child_process';
import { CommandError } from '@raygate/shared';

export interface RunOptions {
  /** Working directory (the Ray Helm chart lives here) */
  cwd: string;
  /** Kill the process after this many ms (default 60000) */
  timeoutMs?: number;
}

export type CommandRunner = (command: string[], options: RunOptions) => Promise<string>;

/**
 * Run a command and resolve with its stdout.
 *
 * @throws CommandError on non-zero exit, spawn failure or timeout
 */
export function runCommand(command: string[], options: RunOptions): Promise<string> {
  const [file, ...args] = command;
  const timeoutMs = options.timeoutMs ?? 60_000;

  return new Promise<string>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      fn();
    };

    const proc = spawn(file, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timer = setTimeout(() => {
      proc.kill('SIGKILL');
      settle(() =>
        reject(new CommandError(command, -1, `Command timed out after ${timeoutMs}ms: ${command.join(' ')}`)),
      );
    }, timeoutMs);

    let stdout = '';
    let stderr = '';
    proc.stdout.setEncoding('utf-8');
    proc.stderr.setEncoding('utf-8');
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    proc.on('error', (err: Error) => {
      console.error(`[manager] Failed to spawn ${file}: ${err.message}`);
      settle(() => reject(new CommandError(command, -1, `${file} spawn failed: ${err.message}`)));
    });

    proc.on('close', (code: number | null) => {
      const exitCode = code ?? -1;
      console.log(
        `[manager] Executed: ${command.join(' ')}. Got: [${stdout.trim()}] and code [${exitCode}]. ERR: [${stderr.trim()}]`,
      );
      settle(() => {
        if (exitCode === 0) {
          resolve(stdout);
        } else {
          reject(new CommandError(command, exitCode, stderr));
        }
      });
    });
  });
}
