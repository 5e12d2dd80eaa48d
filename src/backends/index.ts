import type { BackendKind, EnclaveConfig } from '../types/index.js';
import type { ICommandExecutor, ILogger, IStorage } from '../types/interfaces.js';
import type { HomeView } from '../credentials/bundle.js';
import { LocalBackend } from './local.js';
import { ClusterBackend } from './cluster.js';

export { LocalBackend } from './local.js';
export type { ContainerEngine, LocalBackendOptions } from './local.js';
export { ClusterBackend, parseSessionLabels } from './cluster.js';
export type { ClusterBackendOptions } from './cluster.js';
export type { AttachCommand, Backend } from './types.js';

/** The two substrates. Code that needs one of them narrows on `kind`. */
export type AnyBackend = LocalBackend | ClusterBackend;

export interface BackendDeps {
  executor: ICommandExecutor;
  storage: IStorage;
  home: HomeView;
  logger: ILogger;
}

export function createBackend(kind: BackendKind, config: EnclaveConfig, deps: BackendDeps): AnyBackend {
  const readyTimeoutMs = config.readyTimeoutSeconds * 1000;
  if (kind === 'local') {
    return new LocalBackend({
      executor: deps.executor,
      engine: config.containerEngine,
      storage: deps.storage,
      home: deps.home,
      stateDir: config.stateDir,
      logger: deps.logger.child('local'),
      readyTimeoutMs,
    });
  }
  return new ClusterBackend({
    executor: deps.executor,
    home: deps.home,
    logger: deps.logger.child('cluster'),
    context: config.kubeContext,
    namespace: config.namespace,
    storageClass: config.storageClass,
    volumeSize: config.volumeSize,
    readyTimeoutMs,
  });
}
