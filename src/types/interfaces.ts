/**
 * Dependency injection interfaces
 * Enables testability by abstracting external dependencies
 */

import type { Session } from './index.js';

export interface CommandOptions {
  /** Written to the child's stdin. */
  input?: string | Buffer;
  /** Kill the child after this many milliseconds. */
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * A child process attached to the caller's terminal.
 */
export interface InteractiveProcess {
  pid?: number;
  exited: Promise<number>;
}

/**
 * Abstracts substrate tooling invocation (docker, podman, kubectl, ps)
 */
export interface ICommandExecutor {
  /** Runs to completion; never rejects on a non-zero exit, only when the binary cannot be started. */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
  /** Runs with inherited stdio (tty attach). */
  interactive(command: string, args: string[]): InteractiveProcess;
}

export interface FileStat {
  isDirectory: boolean;
  isFile: boolean;
  mtimeMs: number;
}

/**
 * Abstracts filesystem operations
 */
export interface IStorage {
  readFile(path: string, encoding: BufferEncoding): string;
  readBuffer(path: string): Buffer;
  writeFile(path: string, data: string | Buffer): void;
  exists(path: string): boolean;
  mkdirp(path: string): void;
  unlink(path: string): void;
  openSync(path: string, flags: string): number;
  writeSync(fd: number, data: string): void;
  closeSync(fd: number): void;
  /** Atomic within one filesystem; replaces `to` when it exists. */
  rename(from: string, to: string): void;
  chmod(path: string, mode: number): void;
  readdir(path: string): string[];
  stat(path: string): FileStat;
  realpath(path: string): string;
  /** Recursive, force. */
  remove(path: string): void;
}

/**
 * Abstracts environment variables and OS info
 */
export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
  platform(): string;
  cwd(): string;
}

/**
 * Abstracts session record persistence
 */
export interface ISessionStore {
  get(id: string): Session | undefined;
  put(session: Session): void;
  remove(id: string): void;
  list(): Session[];
  findByWorkspace(backend: Session['backend'], workspace: string): Session | undefined;
}

/**
 * Abstracts process management (detached spawn, liveness, signals)
 */
export interface IProcessManager {
  spawnDetached(
    command: string,
    args: string[],
    options: { env?: Record<string, string | undefined>; logFile?: string }
  ): number | undefined;
  isRunning(pid: number): boolean;
  kill(pid: number, signal: NodeJS.Signals): boolean;
  currentPid(): number;
}

export interface ILogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): ILogger;
}
