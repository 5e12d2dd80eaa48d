/**
 * Per-session single flight.
 *
 * Calls for one id run one after another inside this process (FIFO), and a
 * lock file holding the owner pid keeps a second CLI process out while one is
 * working on the same session. Distinct ids never wait on each other.
 */

import { join } from 'path';
import type { IProcessManager, IStorage } from '../types/interfaces.js';
import { SessionBusyError } from '../errors.js';

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** What a lock file says about its holder. */
type LockOwner = { pid: number } | 'missing' | 'unreadable';

export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  constructor(
    private storage: IStorage,
    private processes: IProcessManager,
    private lockDir: string,
  ) {}

  /**
   * Run `fn` while holding the lock for `id`.
   */
  async run<T>(id: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(id) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(id, tail);

    await previous;
    try {
      this.acquireFile(id, operation);
      try {
        return await fn();
      } finally {
        this.releaseFile(id);
      }
    } finally {
      release();
      if (this.tails.get(id) === tail) this.tails.delete(id);
    }
  }

  /** True while an operation for `id` is queued or running in this process. */
  isHeld(id: string): boolean {
    return this.tails.has(id);
  }

  lockPath(id: string): string {
    return join(this.lockDir, `${id}.lock`);
  }

  private acquireFile(id: string, operation: string): void {
    const path = this.lockPath(id);
    if (!this.storage.exists(this.lockDir)) this.storage.mkdirp(this.lockDir);
    const self = this.processes.currentPid();

    for (let attempt = 0; attempt < 3; attempt++) {
      if (this.tryCreate(path, self)) return;

      const owner = this.readOwner(path);
      if (owner === 'missing') continue;
      if (owner === 'unreadable') {
        // Created but not yet written, or not ours to judge.
        throw new SessionBusyError(
          `Session ${id} is busy: ${path} names no owner yet; remove it if no enclave process is running`,
          { sessionId: id, operation },
        );
      }
      if (owner.pid !== self && this.processes.isRunning(owner.pid)) {
        throw new SessionBusyError(
          `Session ${id} is busy: another enclave process (pid ${owner.pid}) is running an operation on it`,
          { sessionId: id, operation },
        );
      }
      this.reclaim(path, owner.pid);
    }
    throw new SessionBusyError(`Session ${id} is busy: could not take ${path}`, { sessionId: id, operation });
  }

  /** Exclusive create; the pid goes in before the file is closed. */
  private tryCreate(path: string, pid: number): boolean {
    let fd: number;
    try {
      fd = this.storage.openSync(path, 'wx');
    } catch (error) {
      if (hasCode(error, 'EEXIST')) return false;
      throw error;
    }
    try {
      this.storage.writeSync(fd, String(pid));
    } finally {
      this.storage.closeSync(fd);
    }
    return true;
  }

  /**
   * Move a dead holder's file aside under a name only this process uses.
   * Of several processes reclaiming at once, one rename wins; a file that
   * turns out to belong to a live holder is put back.
   */
  private reclaim(path: string, deadPid: number): void {
    const aside = `${path}.${this.processes.currentPid()}.stale`;
    try {
      this.storage.rename(path, aside);
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return;
      throw error;
    }
    const owner = this.readOwner(aside);
    if (typeof owner === 'object' && owner.pid === deadPid) {
      this.storage.unlink(aside);
      return;
    }
    this.storage.rename(aside, path);
  }

  private releaseFile(id: string): void {
    const path = this.lockPath(id);
    const owner = this.readOwner(path);
    if (typeof owner === 'object' && owner.pid === this.processes.currentPid()) this.storage.unlink(path);
  }

  private readOwner(path: string): LockOwner {
    let text: string;
    try {
      text = this.storage.readFile(path, 'utf-8').trim();
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return 'missing';
      throw error;
    }
    const pid = /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
    return Number.isInteger(pid) && pid > 0 ? { pid } : 'unreadable';
  }
}
