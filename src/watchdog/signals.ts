/**
 * Activity signal providers read by the inactivity watchdog.
 *
 * Each provider answers one question about the workload. Providers may throw;
 * the watchdog treats a throwing provider as "no signal".
 */

import type { CommandResult } from '../types/interfaces.js';

export interface AttachCountSignal {
  readonly kind: 'attach';
  /** Clients that are always attached and say nothing about the user. */
  readonly baseline: number;
  attachedClients(): Promise<number>;
}

export interface CpuSignal {
  readonly kind: 'cpu';
  /** Highest CPU percent among the agent's processes. */
  cpuPercent(): Promise<number>;
}

export interface FileActivitySignal {
  readonly kind: 'file';
  /** Newest modification time among the activity files, or null when none exist. */
  newestModification(): Promise<Date | null>;
}

export type ActivitySignal = AttachCountSignal | CpuSignal | FileActivitySignal;

/** Runs a shell script inside the workload. */
export type ProbeRunner = (script: string) => Promise<CommandResult>;

export const ACTIVITY_FILES = ['/home/agent/.claude/history.jsonl', '/home/agent/.claude/debug/*'];

export const AGENT_PROCESS_PATTERN = /\bclaude\b/;

export const CPU_PROBE = 'ps -eo pcpu=,args=';

export function fileProbe(paths: ReadonlyArray<string> = ACTIVITY_FILES): string {
  // Globs stay unquoted so the workload shell expands them.
  return `stat -c %Y ${paths.join(' ')} 2>/dev/null; true`;
}

/**
 * Parse `ps -eo pcpu=,args=` output and return the highest CPU percent of
 * the lines whose command matches `pattern`.
 */
export function parseCpuSample(stdout: string, pattern: RegExp = AGENT_PROCESS_PATTERN): number {
  let highest = 0;
  for (const line of stdout.split('\n')) {
    const match = /^\s*([\d.]+)\s+(.*)$/.exec(line);
    if (!match || !pattern.test(match[2])) continue;
    const value = parseFloat(match[1]);
    if (Number.isFinite(value) && value > highest) highest = value;
  }
  return highest;
}

/** Parse `stat -c %Y` output (epoch seconds, one per line). */
export function parseNewestMtime(stdout: string): Date | null {
  let newest = -1;
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    newest = Math.max(newest, parseInt(trimmed, 10));
  }
  return newest < 0 ? null : new Date(newest * 1000);
}

function requireSuccess(result: CommandResult, what: string): string {
  if (result.exitCode !== 0) {
    throw new Error(`${what} probe exited with ${result.exitCode}: ${result.stderr.trim()}`);
  }
  return result.stdout;
}

export function probeCpuSignal(run: ProbeRunner, pattern: RegExp = AGENT_PROCESS_PATTERN): CpuSignal {
  return {
    kind: 'cpu',
    async cpuPercent() {
      return parseCpuSample(requireSuccess(await run(CPU_PROBE), 'cpu'), pattern);
    },
  };
}

export function probeFileSignal(run: ProbeRunner, paths: ReadonlyArray<string> = ACTIVITY_FILES): FileActivitySignal {
  return {
    kind: 'file',
    async newestModification() {
      return parseNewestMtime(requireSuccess(await run(fileProbe(paths)), 'file'));
    },
  };
}

export function attachSignal(count: () => Promise<number>, baseline: number): AttachCountSignal {
  return { kind: 'attach', baseline, attachedClients: count };
}

/** Count non-empty lines, e.g. of `tmux list-clients`. */
export function countLines(stdout: string): number {
  return stdout.split('\n').filter((line) => line.trim().length > 0).length;
}
