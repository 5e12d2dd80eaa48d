/**
 * Default ICommandExecutor implementation using child_process
 */

import { execFile, spawn } from 'child_process';
import type { CommandOptions, CommandResult, ICommandExecutor, InteractiveProcess } from '../types/interfaces.js';

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_BUFFER = 16 * 1024 * 1024;

/** Exit status reported when a command is killed for exceeding its timeout. */
export const TIMEOUT_EXIT_CODE = 124;

export class ShellCommandExecutor implements ICommandExecutor {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    return new Promise((resolve, reject) => {
      const child = execFile(
        command,
        args,
        { encoding: 'utf-8', timeout: timeoutMs, maxBuffer: MAX_BUFFER },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0 });
            return;
          }
          if (error.killed) {
            resolve({
              stdout,
              stderr: `${stderr}\n${command} timed out after ${timeoutMs}ms`.trim(),
              exitCode: TIMEOUT_EXIT_CODE,
            });
            return;
          }
          // A string code (ENOENT, EACCES) means the binary never ran.
          if (typeof error.code === 'string') {
            reject(new Error(`Cannot run ${command}: ${error.message}`));
            return;
          }
          resolve({ stdout, stderr, exitCode: typeof error.code === 'number' ? error.code : 1 });
        },
      );
      if (options.input !== undefined) {
        child.stdin?.end(options.input);
      } else {
        child.stdin?.end();
      }
    });
  }

  interactive(command: string, args: string[]): InteractiveProcess {
    const child = spawn(command, args, { stdio: 'inherit' });
    const exited = new Promise<number>((resolve) => {
      child.on('exit', (code) => resolve(code ?? 1));
      child.on('error', () => resolve(127));
    });
    return { pid: child.pid, exited };
  }
}
