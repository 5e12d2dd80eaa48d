/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

export type BackendKind = 'local' | 'cluster';

export type SessionState = 'created' | 'running' | 'stopped' | 'deleted';

export type NetworkMode = 'restricted' | 'unrestricted' | 'custom-allowlist';

export interface NetworkSettings {
  mode: NetworkMode;
  /** Normalized suffix patterns; empty when mode is 'unrestricted'. */
  allowedDomains: string[];
}

export interface CredentialStatus {
  syncedAt: string;
  /** Set once the watchdog evicted the bundle; cleared by the next connect. */
  stale: boolean;
  evictedAt?: string;
}

export interface Session {
  id: string;
  state: SessionState;
  backend: BackendKind;
  /** Host path of the workspace. */
  workspace: string;
  image: string;
  createdAt: string;
  lastActivityAt: string;
  network: NetworkSettings;
  credentials?: CredentialStatus;
  /** Pid of the detached watchdog process, when one was spawned. */
  watchdogPid?: number;
}

/**
 * Input to `SessionManager.create`.
 */
export interface SessionSpec {
  id?: string;
  backend: BackendKind;
  workspace: string;
  image: string;
  /**
   * Domain patterns reachable through the relay, or the sentinel
   * `'unrestricted'`. Omitted means the configured default allowlist.
   */
  allowedDomains?: string[] | 'unrestricted';
}

export interface EnclaveConfig {
  backend: BackendKind;
  image: string;
  relayImage: string;
  relayPort: number;
  containerEngine: 'docker' | 'podman';
  kubeContext?: string;
  namespace?: string;
  registry?: string;
  storageClass?: string;
  volumeSize: string;
  /** Default allowlist for sessions that do not pass one. */
  allowedDomains: string[];
  credentialTimeoutMinutes: number;
  credentialCheckIntervalSeconds: number;
  watchdogEnabled: boolean;
  provisionRetries: number;
  readyTimeoutSeconds: number;
  stateDir: string;
}

/**
 * What a substrate can do. The isolation plan and the watchdog read these
 * instead of branching on the backend kind.
 */
export interface BackendCapabilities {
  /** `namespace`: an internal network per session; `policy`: egress rules on a shared network. */
  isolation: 'namespace' | 'policy';
  storage: 'bind-mount' | 'volume-claim';
  attach: 'container-tty' | 'exec-tmux';
  imageDistribution: 'local' | 'registry';
  /** One relay may serve every session with the same allowlist. */
  sharedRelay: boolean;
  /** Attached clients always present, not counted as user activity. */
  attachBaseline: number;
}
