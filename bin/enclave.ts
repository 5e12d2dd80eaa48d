#!/usr/bin/env node

/**
 * CLI entry point for enclave
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { BackendKind } from '../src/types/index.js';
import { createContext } from '../src/context.js';
import { ConfigManager } from '../src/config/index.js';
import { SystemEnvironment } from '../src/infra/environment.js';
import { ConsoleLogger } from '../src/infra/logger.js';
import { addGlobalOptions, addSessionIdPositional, type GlobalCliOptions } from '../src/cli/common/options.js';
import { runCommand } from '../src/cli/common/run.js';
import { createCommand } from '../src/cli/commands/create.js';
import { startCommand } from '../src/cli/commands/start.js';
import { stopCommand } from '../src/cli/commands/stop.js';
import { connectCommand } from '../src/cli/commands/connect.js';
import { deleteCommand } from '../src/cli/commands/delete.js';
import { listCommand } from '../src/cli/commands/list.js';
import { relayCommand } from '../src/cli/commands/relay.js';
import { watchdogCommand } from '../src/cli/commands/watchdog.js';
import { configCommand } from '../src/cli/commands/config.js';

function backendOption(value: string | undefined): BackendKind | undefined {
  return value === 'local' || value === 'cluster' ? value : undefined;
}

function globals(argv: { backend?: string; allowDomain?: string[]; verbose?: boolean }): GlobalCliOptions {
  return {
    backend: backendOption(argv.backend),
    allowDomain: argv.allowDomain,
    verbose: argv.verbose,
  };
}

await addGlobalOptions(yargs(hideBin(process.argv)))
  .scriptName('enclave')
  .usage('$0 <command>')
  .help()
  .strict()
  .demandCommand(1)
  .command(
    'create [id]',
    'Register a session for a workspace',
    (y) => addSessionIdPositional(y)
      .option('workspace', { alias: 'w', type: 'string', describe: 'Workspace directory (defaults to the current one)' })
      .option('image', { type: 'string', describe: 'Agent image (defaults to the configured image)' })
      .option('rebuild', { type: 'boolean', default: false, describe: 'Rebuild the built-in images first' })
      .option('dry-run', { type: 'boolean', default: false, describe: 'Show the isolation plan without creating anything' }),
    (argv) => runCommand(() =>
      createCommand(
        {
          ...globals(argv),
          id: argv.id,
          workspace: argv.workspace,
          image: argv.image,
          rebuild: argv.rebuild,
          dryRun: argv.dryRun,
        },
        createContext({ verbose: argv.verbose }),
      ))
  )
  .command(
    'start [id]',
    'Provision the isolation resources, credentials and workload',
    (y) => addSessionIdPositional(y),
    (argv) => runCommand(() => startCommand(argv.id, globals(argv), createContext({ verbose: argv.verbose })))
  )
  .command(
    'stop [id]',
    'Stop the workload, keeping its storage',
    (y) => addSessionIdPositional(y),
    (argv) => runCommand(() => stopCommand(argv.id, globals(argv), createContext({ verbose: argv.verbose })))
  )
  .command(
    'connect [id]',
    'Refresh credentials and attach a terminal',
    (y) => addSessionIdPositional(y),
    (argv) => runCommand(() => connectCommand(argv.id, globals(argv), createContext({ verbose: argv.verbose })))
  )
  .command(
    'delete [id]',
    'Remove a session and all its resources',
    (y) => addSessionIdPositional(y)
      .option('confirm', { type: 'string', describe: 'Repeat the session id to confirm' }),
    (argv) => runCommand(() =>
      deleteCommand(argv.id, { ...globals(argv), confirm: argv.confirm }, createContext({ verbose: argv.verbose })))
  )
  .command(
    ['list', 'ls'],
    'List sessions',
    (y) => y.option('verify', { type: 'boolean', default: false, describe: 'Check each workload on its substrate' }),
    (argv) => runCommand(() => listCommand({ verify: argv.verify }, createContext({ verbose: argv.verbose })))
  )
  .command(
    'relay',
    'Run the allowlisting forward proxy',
    (y) => y
      .option('port', { alias: 'p', type: 'number', describe: 'Port to listen on' })
      .option('host', { type: 'string', describe: 'Address to bind' })
      .option('allow', { type: 'string', array: true, describe: 'Allowed domain pattern (repeatable)' }),
    (argv) => runCommand(() =>
      relayCommand(
        { port: argv.port, host: argv.host, allow: argv.allow },
        new SystemEnvironment(),
        new ConsoleLogger({ verbose: argv.verbose }),
      ))
  )
  .command(
    'watchdog <id>',
    false,
    (y) => y.positional('id', { type: 'string', demandOption: true }),
    (argv) => runCommand(() => watchdogCommand(argv.id, createContext({ verbose: argv.verbose, supervisor: 'in-process' })))
  )
  .command(
    'config',
    'Show or change settings',
    (y) => y
      .option('show', { type: 'boolean', describe: 'Show current configuration' })
      .option('set', { type: 'string', array: true, describe: 'Save key=value (repeatable)' }),
    (argv) => runCommand(() => configCommand({ show: argv.show, set: argv.set }, new ConfigManager()))
  )
  .parseAsync();
