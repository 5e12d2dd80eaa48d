/**
 * Main entry point for enclave
 */

export * from './types/index.js';
export * from './errors.js';
export { ConfigManager, DEFAULT_ALLOWED_DOMAINS, DEFAULT_IMAGE, DEFAULT_RELAY_IMAGE } from './config/index.js';
export type { StoredConfig } from './config/index.js';
export { SessionStore } from './state/index.js';
export { SessionManager } from './session/manager.js';
export type { CreateOptions, CreateResult, SessionManagerDeps, SessionPresence } from './session/manager.js';
export { SessionLock } from './session/lock.js';
export { assertTransition, canTransition } from './session/lifecycle.js';
export { names, sessionIdForWorkspace } from './session/naming.js';
export { compileIsolationPlan, assertPlanInvariants } from './network/plan.js';
export type { NetworkIsolationPlan, PlanResource, RelaySpec } from './network/plan.js';
export { hostMatches, normalizeAllowlist, resolveNetworkSettings } from './network/allowlist.js';
export { RelayServer } from './network/relay-server.js';
export type { RelayServerOptions } from './network/relay-server.js';
export { CredentialBundleBuilder, HostHomeView, extractGitIdentity } from './credentials/bundle.js';
export type { CredentialArtifact, CredentialBundle, HomeView } from './credentials/bundle.js';
export { InactivityWatchdog } from './watchdog/watchdog.js';
export type { WatchdogOptions, WatchdogPhase } from './watchdog/watchdog.js';
export { DetachedWatchdogSupervisor, InProcessWatchdogSupervisor } from './watchdog/supervisor.js';
export type { WatchdogSupervisor, WatchdogTarget } from './watchdog/supervisor.js';
export { ClusterBackend, LocalBackend, createBackend } from './backends/index.js';
export type { AnyBackend, AttachCommand, Backend } from './backends/index.js';
export { ImageProvider } from './container/image.js';
export { createContext } from './context.js';
export type { ContextOptions, EnclaveContext } from './context.js';
