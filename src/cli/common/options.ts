import type { Argv } from 'yargs';
import type { BackendKind } from '../../types/index.js';

export interface GlobalCliOptions {
  backend?: BackendKind;
  allowDomain?: string[];
  verbose?: boolean;
}

export function addGlobalOptions<T>(y: Argv<T>) {
  return y
    .option('backend', {
      alias: 'b',
      type: 'string',
      choices: ['local', 'cluster'] as const,
      describe: 'Substrate to run the session on (defaults to the configured backend)',
    })
    .option('allow-domain', {
      type: 'string',
      array: true,
      describe: 'Domain pattern reachable from the session (repeatable); "unrestricted" lifts the restriction',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      default: false,
      describe: 'Show debug output',
    });
}

export function addSessionIdPositional<T>(y: Argv<T>) {
  return y.positional('id', {
    type: 'string',
    describe: 'Session id (defaults to the session of the current directory)',
  });
}
