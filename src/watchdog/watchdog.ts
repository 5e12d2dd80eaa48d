/**
 * Inactivity watchdog.
 *
 *   armed -> evaluating -> armed | evicted
 *   any   -> disarmed (stop)
 *
 * Every check consults the attach, CPU and file signals in that order and
 * evicts the session's credentials once nothing has happened for the
 * configured timeout. Eviction only removes credentials; the session keeps
 * running.
 */

import type { ILogger } from '../types/interfaces.js';
import { describeError } from '../errors.js';
import type { ActivitySignal } from './signals.js';

export type WatchdogPhase = 'armed' | 'evaluating' | 'evicted' | 'disarmed';

export const MIN_TIMEOUT_MINUTES = 5;
export const DEFAULT_TIMEOUT_MINUTES = 60;
export const DEFAULT_CHECK_INTERVAL_MS = 60_000;
export const DEFAULT_CPU_THRESHOLD = 10;

export interface WatchdogOptions {
  sessionId: string;
  signals: ActivitySignal[];
  /** Evict credentials from the workload. */
  evict: () => Promise<void>;
  /** Called once after a successful eviction. */
  onEvicted?: (at: Date) => void | Promise<void>;
  timeoutMinutes?: number;
  checkIntervalMs?: number;
  cpuThreshold?: number;
  lastActivityAt?: Date;
  clock?: () => Date;
  logger?: ILogger;
  /** Let the process exit while the watchdog waits; off for the dedicated watchdog process. */
  unref?: boolean;
}

/** Clamp a configured timeout to the floor. */
export function effectiveTimeoutMinutes(configured: number | undefined): number {
  const value = configured ?? DEFAULT_TIMEOUT_MINUTES;
  return Number.isFinite(value) ? Math.max(MIN_TIMEOUT_MINUTES, value) : DEFAULT_TIMEOUT_MINUTES;
}

export class InactivityWatchdog {
  readonly sessionId: string;
  readonly timeoutMs: number;
  readonly checkIntervalMs: number;

  private _phase: WatchdogPhase = 'armed';
  private _lastActivityAt: Date;
  private _checks = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inflight: Promise<WatchdogPhase> | null = null;
  private settle: (phase: WatchdogPhase) => void = () => undefined;
  private readonly finished: Promise<WatchdogPhase>;

  private readonly signals: ActivitySignal[];
  private readonly evict: () => Promise<void>;
  private readonly onEvicted?: (at: Date) => void | Promise<void>;
  private readonly cpuThreshold: number;
  private readonly clock: () => Date;
  private readonly logger?: ILogger;
  private readonly unref: boolean;

  constructor(options: WatchdogOptions) {
    this.sessionId = options.sessionId;
    this.signals = options.signals;
    this.evict = options.evict;
    this.onEvicted = options.onEvicted;
    this.timeoutMs = effectiveTimeoutMinutes(options.timeoutMinutes) * 60_000;
    this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.cpuThreshold = options.cpuThreshold ?? DEFAULT_CPU_THRESHOLD;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.unref = options.unref ?? true;
    this._lastActivityAt = options.lastActivityAt ?? this.clock();
    this.finished = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get phase(): WatchdogPhase {
    return this._phase;
  }

  get lastActivityAt(): Date {
    return this._lastActivityAt;
  }

  /** Consecutive checks since the watchdog was armed. */
  get checks(): number {
    return this._checks;
  }

  /** Resolves with the final phase once the loop stops. */
  done(): Promise<WatchdogPhase> {
    return this.finished;
  }

  start(): void {
    if (this._phase !== 'armed' || this.timer) return;
    this.logger?.debug(`armed, timeout ${this.timeoutMs / 60_000} min, check every ${this.checkIntervalMs / 1000}s`);
    this.schedule();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this._phase === 'evicted' || this._phase === 'disarmed') return;
    this._phase = 'disarmed';
    this.settle('disarmed');
  }

  /**
   * Resolves once no evaluation is running. An eviction that started before
   * `stop()` completes, and is recorded, before this resolves.
   */
  async idle(): Promise<void> {
    while (this.inflight) {
      await Promise.allSettled([this.inflight]);
    }
  }

  /**
   * Run one evaluation. Exposed for the timer loop and for tests.
   */
  async check(): Promise<WatchdogPhase> {
    if (this._phase !== 'armed') return this._phase;
    const run = this.evaluate();
    this.inflight = run;
    try {
      return await run;
    } finally {
      if (this.inflight === run) this.inflight = null;
    }
  }

  private async evaluate(): Promise<WatchdogPhase> {
    this._phase = 'evaluating';
    this._checks += 1;

    await this.observe();

    // stop() may have been called while signals were read.
    if (this.isDisarmed()) return 'disarmed';

    const now = this.clock();
    const idleMs = now.getTime() - this._lastActivityAt.getTime();
    if (idleMs < this.timeoutMs) {
      this._phase = 'armed';
      return this._phase;
    }

    this.logger?.info(`no activity for ${Math.floor(idleMs / 60_000)} min, evicting credentials`);
    try {
      await this.evict();
    } catch (error) {
      this.logger?.error(`eviction failed, will retry: ${describeError(error)}`);
      if (!this.isDisarmed()) this._phase = 'armed';
      return this._phase;
    }

    this._phase = 'evicted';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    try {
      await this.onEvicted?.(now);
    } catch (error) {
      this.logger?.warn(`could not record eviction: ${describeError(error)}`);
    }
    this.settle('evicted');
    return this._phase;
  }

  private isDisarmed(): boolean {
    return this._phase === 'disarmed';
  }

  private async observe(): Promise<void> {
    const ordered = [
      ...this.signals.filter((signal) => signal.kind === 'attach'),
      ...this.signals.filter((signal) => signal.kind === 'cpu'),
      ...this.signals.filter((signal) => signal.kind === 'file'),
    ];

    for (const signal of ordered) {
      try {
        switch (signal.kind) {
          case 'attach': {
            const clients = await signal.attachedClients();
            if (clients > signal.baseline) {
              this.markActive(this.clock(), `${clients - signal.baseline} client(s) attached`);
              return;
            }
            break;
          }
          case 'cpu': {
            const percent = await signal.cpuPercent();
            if (percent >= this.cpuThreshold) {
              this.markActive(this.clock(), `agent at ${percent}% cpu`);
              return;
            }
            break;
          }
          case 'file': {
            const modified = await signal.newestModification();
            if (modified && modified.getTime() > this._lastActivityAt.getTime()) {
              this.markActive(modified, 'activity files changed');
            }
            break;
          }
        }
      } catch (error) {
        this.logger?.debug(`${signal.kind} signal unavailable: ${describeError(error)}`);
      }
    }
  }

  private markActive(at: Date, reason: string): void {
    this._lastActivityAt = at;
    this.logger?.debug(reason);
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.check()
        .then((phase) => {
          if (phase === 'armed') this.schedule();
        })
        .catch((error: unknown) => {
          this.logger?.error(`check failed: ${describeError(error)}`);
          if (this._phase === 'armed') this.schedule();
        });
    }, this.checkIntervalMs);
    if (this.unref) this.timer.unref();
  }
}
