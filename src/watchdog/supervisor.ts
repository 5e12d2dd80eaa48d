/**
 * Watchdog supervisors.
 *
 * The session manager never owns timers itself; it asks a supervisor to
 * start or stop the watchdog of a session.
 *
 * - InProcessWatchdogSupervisor: loops inside the current process
 *   (library use, tests, and the `enclave watchdog` command itself)
 * - DetachedWatchdogSupervisor: spawns `enclave watchdog <id>` in the
 *   background so the loop outlives the CLI invocation
 */

import { join } from 'path';
import type { Session } from '../types/index.js';
import type { ILogger, IProcessManager, ISessionStore, IStorage } from '../types/interfaces.js';
import type { ActivitySignal } from './signals.js';
import { sleep } from '../infra/retry.js';
import { InactivityWatchdog, type WatchdogPhase } from './watchdog.js';

/** The part of a backend the watchdog needs. */
export interface WatchdogTarget {
  activitySignals(session: Session): ActivitySignal[];
  evictCredentials(session: Session): Promise<void>;
}

export interface WatchdogSupervisor {
  readonly kind: 'in-process' | 'detached';
  /** Returns the pid of the process running the loop, when it is a separate one. */
  start(session: Session, target: WatchdogTarget): Promise<number | undefined>;
  /** Resolves once the old loop can no longer evict. */
  stop(session: Session): Promise<void>;
}

export interface WatchdogSettings {
  timeoutMinutes: number;
  checkIntervalMs: number;
}

/**
 * Record an eviction on the stored session so `list` and the next
 * `connect` see the bundle as stale.
 */
export function markCredentialsStale(store: ISessionStore, sessionId: string, at: Date): void {
  const session = store.get(sessionId);
  if (!session || !session.credentials) return;
  session.credentials = { ...session.credentials, stale: true, evictedAt: at.toISOString() };
  store.put(session);
}

export class InProcessWatchdogSupervisor implements WatchdogSupervisor {
  readonly kind = 'in-process';
  private watchdogs = new Map<string, InactivityWatchdog>();

  constructor(
    private store: ISessionStore,
    private settings: WatchdogSettings,
    private logger: ILogger,
    private options: { clock?: () => Date; unref?: boolean } = {},
  ) {}

  async start(session: Session, target: WatchdogTarget): Promise<number | undefined> {
    await this.stop(session);

    const watchdog = new InactivityWatchdog({
      sessionId: session.id,
      signals: target.activitySignals(session),
      evict: () => target.evictCredentials(session),
      onEvicted: (at) => markCredentialsStale(this.store, session.id, at),
      timeoutMinutes: this.settings.timeoutMinutes,
      checkIntervalMs: this.settings.checkIntervalMs,
      lastActivityAt: new Date(session.lastActivityAt),
      clock: this.options.clock,
      logger: this.logger.child(session.id),
      unref: this.options.unref,
    });
    this.watchdogs.set(session.id, watchdog);
    watchdog.start();
    return undefined;
  }

  async stop(session: Session): Promise<void> {
    const watchdog = this.watchdogs.get(session.id);
    if (!watchdog) return;
    watchdog.stop();
    this.watchdogs.delete(session.id);
    await watchdog.idle();
  }

  get(sessionId: string): InactivityWatchdog | undefined {
    return this.watchdogs.get(sessionId);
  }

  /** Resolves when the session's loop ends (eviction or stop). */
  async wait(sessionId: string): Promise<WatchdogPhase> {
    const watchdog = this.watchdogs.get(sessionId);
    return watchdog ? watchdog.done() : 'disarmed';
  }
}

export interface DetachedSupervisorOptions {
  processes: IProcessManager;
  storage: IStorage;
  stateDir: string;
  /** argv prefix that runs the CLI, e.g. `[process.execPath, process.argv[1]]`. */
  command: [string, ...string[]];
  logger: ILogger;
  env?: Record<string, string | undefined>;
  /** How long `stop` waits for the old process to exit before SIGKILL. Default 5000. */
  stopTimeoutMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class DetachedWatchdogSupervisor implements WatchdogSupervisor {
  readonly kind = 'detached';

  constructor(private options: DetachedSupervisorOptions) {}

  logFile(sessionId: string): string {
    return join(this.options.stateDir, 'sessions', sessionId, 'watchdog.log');
  }

  async start(session: Session, _target: WatchdogTarget): Promise<number | undefined> {
    await this.stop(session);

    const dir = join(this.options.stateDir, 'sessions', session.id);
    if (!this.options.storage.exists(dir)) this.options.storage.mkdirp(dir);

    const [executable, ...prefix] = this.options.command;
    const pid = this.options.processes.spawnDetached(executable, [...prefix, 'watchdog', session.id], {
      env: this.options.env,
      logFile: this.logFile(session.id),
    });
    if (pid === undefined) {
      this.options.logger.warn(`could not start the watchdog for ${session.id}; credentials will not be evicted`);
    } else {
      this.options.logger.debug(`watchdog for ${session.id} running as pid ${pid}`);
    }
    return pid;
  }

  async stop(session: Session): Promise<void> {
    const pid = session.watchdogPid;
    if (pid === undefined || !this.options.processes.isRunning(pid)) return;
    if (!this.options.processes.kill(pid, 'SIGTERM')) {
      this.options.logger.warn(`could not signal watchdog pid ${pid} of ${session.id}`);
      return;
    }
    if (await this.waitForExit(pid)) {
      this.options.logger.debug(`stopped watchdog pid ${pid} of ${session.id}`);
      return;
    }
    this.options.logger.warn(`watchdog pid ${pid} of ${session.id} ignored SIGTERM; killing it`);
    this.options.processes.kill(pid, 'SIGKILL');
  }

  private async waitForExit(pid: number): Promise<boolean> {
    const timeoutMs = this.options.stopTimeoutMs ?? 5000;
    const interval = this.options.pollIntervalMs ?? 100;
    const pause = this.options.sleep ?? sleep;
    for (let waited = 0; waited < timeoutMs; waited += interval) {
      if (!this.options.processes.isRunning(pid)) return true;
      await pause(interval);
    }
    return !this.options.processes.isRunning(pid);
  }
}
