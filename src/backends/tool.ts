/**
 * Thin wrapper over a substrate CLI (docker, podman, kubectl).
 * Non-zero exits become classified substrate errors.
 */

import type { CommandOptions, CommandResult, ICommandExecutor, ILogger } from '../types/interfaces.js';
import { classifySubstrateFailure } from '../errors.js';

export interface ToolCallOptions extends CommandOptions {
  sessionId?: string;
  operation?: string;
}

export class ToolRunner {
  constructor(
    private executor: ICommandExecutor,
    readonly binary: string,
    private baseArgs: string[] = [],
    private logger?: ILogger,
  ) {}

  /** Full argv for an interactive call. */
  argv(args: string[]): string[] {
    return [...this.baseArgs, ...args];
  }

  /** `docker network create`, `kubectl apply`: the name errors carry. */
  describe(args: string[]): string {
    const words = args.filter((arg) => !arg.startsWith('-')).slice(0, 2);
    return [this.binary, ...words].join(' ');
  }

  /** Run and return the raw result, whatever the exit code. */
  async probe(args: string[], options: ToolCallOptions = {}): Promise<CommandResult> {
    this.logger?.debug(`$ ${this.binary} ${this.argv(args).join(' ')}`);
    return this.executor.run(this.binary, this.argv(args), { input: options.input, timeoutMs: options.timeoutMs });
  }

  /** Run and return stdout; throws a classified SubstrateError on failure. */
  async run(args: string[], options: ToolCallOptions = {}): Promise<string> {
    const result = await this.probe(args, options);
    if (result.exitCode !== 0) {
      throw classifySubstrateFailure(this.describe(args), result.stderr, {
        sessionId: options.sessionId,
        operation: options.operation,
        exitCode: result.exitCode,
      });
    }
    return result.stdout;
  }

  /** True when the command exits 0. */
  async succeeds(args: string[], options: ToolCallOptions = {}): Promise<boolean> {
    const result = await this.probe(args, options);
    return result.exitCode === 0;
  }
}
