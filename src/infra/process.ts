/**
 * Default IProcessManager implementation using child_process and process.kill
 */

import { spawn } from 'child_process';
import { closeSync, openSync } from 'fs';
import type { IProcessManager } from '../types/interfaces.js';

export class SystemProcessManager implements IProcessManager {
  spawnDetached(
    command: string,
    args: string[],
    options: { env?: Record<string, string | undefined>; logFile?: string },
  ): number | undefined {
    const out = options.logFile ? openSync(options.logFile, 'a') : 'ignore';
    try {
      const child = spawn(command, args, {
        detached: true,
        stdio: ['ignore', out, out],
        env: { ...process.env, ...options.env },
      });
      child.unref();
      return child.pid;
    } finally {
      if (typeof out === 'number') closeSync(out);
    }
  }

  isRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }

  kill(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch {
      return false;
    }
  }

  currentPid(): number {
    return process.pid;
  }
}
