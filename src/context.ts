/**
 * Default wiring of the session manager and its collaborators.
 */

import { join } from 'path';
import type { BackendKind, EnclaveConfig } from './types/index.js';
import type { ICommandExecutor, IEnvironment, ILogger, IProcessManager, IStorage } from './types/interfaces.js';
import { ConfigManager } from './config/index.js';
import { FileStorage } from './infra/storage.js';
import { SystemEnvironment } from './infra/environment.js';
import { ShellCommandExecutor } from './infra/shell.js';
import { SystemProcessManager } from './infra/process.js';
import { ConsoleLogger } from './infra/logger.js';
import { SessionStore } from './state/index.js';
import { CredentialBundleBuilder, HostHomeView } from './credentials/bundle.js';
import { createBackend, type AnyBackend } from './backends/index.js';
import { ImageProvider } from './container/image.js';
import { SessionLock } from './session/lock.js';
import { SessionManager } from './session/manager.js';
import {
  DetachedWatchdogSupervisor,
  InProcessWatchdogSupervisor,
  type WatchdogSettings,
  type WatchdogSupervisor,
} from './watchdog/supervisor.js';

export interface ContextOptions {
  verbose?: boolean;
  /** `detached` spawns `enclave watchdog <id>`; `in-process` keeps the loop here. */
  supervisor?: 'detached' | 'in-process';
  configManager?: ConfigManager;
  storage?: IStorage;
  env?: IEnvironment;
  executor?: ICommandExecutor;
  processes?: IProcessManager;
  logger?: ILogger;
}

export interface EnclaveContext {
  config: EnclaveConfig;
  configManager: ConfigManager;
  storage: IStorage;
  env: IEnvironment;
  executor: ICommandExecutor;
  processes: IProcessManager;
  logger: ILogger;
  store: SessionStore;
  backendFor: (kind: BackendKind) => AnyBackend;
  supervisor: WatchdogSupervisor;
  manager: SessionManager;
}

export function watchdogSettings(config: EnclaveConfig): WatchdogSettings {
  return {
    timeoutMinutes: config.credentialTimeoutMinutes,
    checkIntervalMs: config.credentialCheckIntervalSeconds * 1000,
  };
}

/** argv prefix that re-runs this CLI, or null when not started from a script. */
function cliCommand(): [string, ...string[]] | null {
  const script = process.argv[1];
  return script ? [process.execPath, script] : null;
}

export function createContext(options: ContextOptions = {}): EnclaveContext {
  const storage = options.storage ?? new FileStorage();
  const env = options.env ?? new SystemEnvironment();
  const executor = options.executor ?? new ShellCommandExecutor();
  const processes = options.processes ?? new SystemProcessManager();
  const logger = options.logger ?? new ConsoleLogger({ verbose: options.verbose });
  const configManager = options.configManager ?? new ConfigManager(storage, env);
  const config = configManager.config;

  const store = new SessionStore(storage, config.stateDir);
  const home = new HostHomeView(storage, env);

  const backends = new Map<BackendKind, AnyBackend>();
  const backendFor = (kind: BackendKind): AnyBackend => {
    let backend = backends.get(kind);
    if (!backend) {
      backend = createBackend(kind, config, { executor, storage, home, logger });
      backends.set(kind, backend);
    }
    return backend;
  };

  const command = cliCommand();
  const supervisor: WatchdogSupervisor =
    options.supervisor !== 'in-process' && command
      ? new DetachedWatchdogSupervisor({
          processes,
          storage,
          stateDir: config.stateDir,
          command,
          logger: logger.child('watchdog'),
          env: { ENCLAVE_HOME: config.stateDir },
        })
      : new InProcessWatchdogSupervisor(store, watchdogSettings(config), logger.child('watchdog'), {
          unref: options.supervisor !== 'in-process',
        });

  const manager = new SessionManager({
    config,
    store,
    backendFor,
    lock: new SessionLock(storage, processes, join(config.stateDir, 'locks')),
    supervisor,
    builder: new CredentialBundleBuilder(),
    home,
    logger,
    images: new ImageProvider({
      executor,
      engine: config.containerEngine,
      storage,
      logger: logger.child('image'),
    }),
  });

  return {
    config,
    configManager,
    storage,
    env,
    executor,
    processes,
    logger,
    store,
    backendFor,
    supervisor,
    manager,
  };
}
