/**
 * Default ILogger implementation: chalk-coloured lines on stderr,
 * prefixed with a `[scope]` tag.
 */

import chalk from 'chalk';
import type { ILogger } from '../types/interfaces.js';

export interface ConsoleLoggerOptions {
  scope?: string;
  verbose?: boolean;
  write?: (line: string) => void;
}

export class ConsoleLogger implements ILogger {
  private readonly scope?: string;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.scope = options.scope;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.error(line));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.write(chalk.gray(this.format(message)));
  }

  info(message: string): void {
    this.write(this.format(message));
  }

  warn(message: string): void {
    this.write(chalk.yellow(this.format(message)));
  }

  error(message: string): void {
    this.write(chalk.red(this.format(message)));
  }

  child(scope: string): ILogger {
    return new ConsoleLogger({
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      verbose: this.verbose,
      write: this.write,
    });
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}
