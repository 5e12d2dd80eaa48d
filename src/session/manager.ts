/**
 * Session lifecycle.
 *
 *   create -> created --start--> running --stop--> stopped --start--> running
 *   any of created | running | stopped --delete--> deleted (record removed)
 *
 * Every operation on one id runs under that id's lock. Validation happens
 * before any substrate call; a failed start leaves the record as it was.
 */

import { resolve } from 'path';
import type { BackendKind, Session, SessionSpec, EnclaveConfig } from '../types/index.js';
import type { ILogger, ISessionStore } from '../types/interfaces.js';
import type { AnyBackend, AttachCommand } from '../backends/index.js';
import type { CredentialBundleBuilder, HomeView } from '../credentials/bundle.js';
import type { ImageProvider } from '../container/image.js';
import type { WatchdogSupervisor } from '../watchdog/supervisor.js';
import { compileIsolationPlan, type NetworkIsolationPlan } from '../network/plan.js';
import { resolveNetworkSettings } from '../network/allowlist.js';
import { ValidationError, describeError, isTransient } from '../errors.js';
import { withRetry } from '../infra/retry.js';
import { assertTransition } from './lifecycle.js';
import { assertValidSessionId, sessionIdForWorkspace } from './naming.js';
import type { SessionLock } from './lock.js';

export interface SessionManagerDeps {
  config: EnclaveConfig;
  store: ISessionStore;
  backendFor: (kind: BackendKind) => AnyBackend;
  lock: SessionLock;
  supervisor: WatchdogSupervisor;
  builder: CredentialBundleBuilder;
  home: HomeView;
  logger: ILogger;
  /** Without one, images are assumed to be present wherever the substrate runs. */
  images?: ImageProvider;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface CreateOptions {
  dryRun?: boolean;
  rebuild?: boolean;
}

export interface CreateResult {
  session: Session;
  plan: NetworkIsolationPlan;
}

export interface SessionPresence {
  session: Session;
  /** False when the record says running or stopped but the substrate has no workload. */
  present: boolean;
}

const RETRY_BASE_DELAY_MS = 2_000;
const RETRY_MAX_DELAY_MS = 30_000;

export class SessionManager {
  private config: EnclaveConfig;
  private store: ISessionStore;
  private backendFor: (kind: BackendKind) => AnyBackend;
  private lock: SessionLock;
  private supervisor: WatchdogSupervisor;
  private builder: CredentialBundleBuilder;
  private home: HomeView;
  private logger: ILogger;
  private images?: ImageProvider;
  private clock: () => Date;
  private sleep?: (ms: number) => Promise<void>;

  constructor(deps: SessionManagerDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.backendFor = deps.backendFor;
    this.lock = deps.lock;
    this.supervisor = deps.supervisor;
    this.builder = deps.builder;
    this.home = deps.home;
    this.logger = deps.logger;
    this.images = deps.images;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep;
  }

  async create(spec: SessionSpec, options: CreateOptions = {}): Promise<CreateResult> {
    const workspace = resolve(spec.workspace);
    const id = spec.id ?? sessionIdForWorkspace(workspace);
    assertValidSessionId(id);
    const network = resolveNetworkSettings(spec.allowedDomains, this.config.allowedDomains);
    const now = this.clock().toISOString();

    const session: Session = {
      id,
      state: 'created',
      backend: spec.backend,
      workspace,
      image: spec.image,
      createdAt: now,
      lastActivityAt: now,
      network,
    };

    const run = async (): Promise<CreateResult> => {
      if (this.store.get(id)) {
        throw new ValidationError(`Session ${id} already exists`, { sessionId: id, operation: 'create' });
      }
      const existing = this.store.findByWorkspace(spec.backend, workspace);
      if (existing) {
        throw new ValidationError(
          `Workspace ${workspace} already has ${spec.backend} session ${existing.id}`,
          { sessionId: id, operation: 'create' },
        );
      }

      const plan = this.planFor(session);
      this.warnIfHighRisk(plan);
      if (options.dryRun) return { session, plan };

      if (options.rebuild && this.images) {
        await this.images.ensure(session.image, { rebuild: true });
        if (plan.relay) await this.images.ensure(plan.relay.image, { rebuild: true });
      }

      this.store.put(session);
      this.logger.info(`session ${id} created (${spec.backend}, ${network.mode})`);
      return { session: { ...session }, plan };
    };

    return options.dryRun ? run() : this.lock.run(id, 'create', run);
  }

  async start(id: string): Promise<Session> {
    return this.lock.run(id, 'start', async () => {
      const session = this.require(id);
      assertTransition('start', session.state, id);
      const backend = this.backendFor(session.backend);

      const { image, relayImage } = await this.prepareImages(session, backend);
      const plan = this.planFor(session, relayImage);
      this.warnIfHighRisk(plan);
      const bundle = this.builder.build(this.home);
      this.logger.debug(`bundle for ${id}: ${bundle.artifacts.map((a) => a.name).join(', ') || 'empty'}`);

      await withRetry(() => backend.provision({ ...session, image }, plan, bundle), {
        attempts: this.config.provisionRetries,
        baseDelayMs: RETRY_BASE_DELAY_MS,
        maxDelayMs: RETRY_MAX_DELAY_MS,
        shouldRetry: isTransient,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(`start of ${id} failed (attempt ${attempt}): ${describeError(error)}; retrying in ${delayMs}ms`);
        },
      });

      const now = this.clock().toISOString();
      const running: Session = {
        ...session,
        state: 'running',
        lastActivityAt: now,
        credentials: { syncedAt: bundle.builtAt, stale: false },
      };
      delete running.watchdogPid;
      this.store.put(running);

      const supervised = await this.startWatchdog(running, backend);
      this.logger.info(`session ${id} running`);
      return supervised;
    });
  }

  async stop(id: string): Promise<Session> {
    return this.lock.run(id, 'stop', async () => {
      const session = this.require(id);
      assertTransition('stop', session.state, id);
      const backend = this.backendFor(session.backend);

      await this.supervisor.stop(session);
      await backend.teardownWorkload(session, this.planFor(session));

      const stopped: Session = { ...session, state: 'stopped' };
      delete stopped.credentials;
      delete stopped.watchdogPid;
      this.store.put(stopped);
      this.logger.info(`session ${id} stopped`);
      return stopped;
    });
  }

  /**
   * Refresh credentials, rearm the watchdog and return the command that
   * attaches a terminal. The caller runs the command outside the lock.
   */
  async connect(id: string): Promise<AttachCommand> {
    return this.lock.run(id, 'connect', async () => {
      const session = this.require(id);
      assertTransition('connect', session.state, id);
      const backend = this.backendFor(session.backend);

      // An eviction still running in the old loop would wipe the new bundle.
      await this.supervisor.stop(session);

      const bundle = this.builder.build(this.home);
      await backend.syncCredentials(session, bundle);

      const refreshed: Session = {
        ...this.require(id),
        lastActivityAt: this.clock().toISOString(),
        credentials: { syncedAt: bundle.builtAt, stale: false },
      };
      delete refreshed.watchdogPid;
      this.store.put(refreshed);
      await this.startWatchdog(refreshed, backend);
      return backend.attach(refreshed);
    });
  }

  /**
   * Remove the session and everything it owns. `confirm` must repeat the id.
   */
  async delete(id: string, confirm: string | undefined): Promise<Session> {
    if (confirm !== id) {
      throw new ValidationError(
        `Refusing to delete session ${id}: pass --confirm ${id} to confirm`,
        { sessionId: id, operation: 'delete' },
      );
    }
    return this.lock.run(id, 'delete', async () => {
      const session = this.require(id);
      assertTransition('delete', session.state, id);
      const backend = this.backendFor(session.backend);

      await this.supervisor.stop(session);
      await backend.destroy(session, this.planFor(session));
      this.store.remove(id);
      this.logger.info(`session ${id} deleted`);
      return { ...session, state: 'deleted' };
    });
  }

  list(): Session[] {
    return this.store.list();
  }

  /** `list` plus a substrate check of every session that should have a workload. */
  async verify(): Promise<SessionPresence[]> {
    const sessions = this.list();
    return Promise.all(
      sessions.map(async (session) => {
        if (session.state === 'created') return { session, present: true };
        const present = await this.backendFor(session.backend).exists(session);
        return { session, present };
      }),
    );
  }

  get(id: string): Session {
    return this.require(id);
  }

  /** The isolation plan the session would be provisioned with. */
  plan(id: string): NetworkIsolationPlan {
    return this.planFor(this.require(id));
  }

  /**
   * Pick the session id for a command: the explicit one, else the session
   * registered for `workspace` (preferring `backend` when several exist).
   */
  resolveId(id: string | undefined, workspace: string, backend?: BackendKind): string {
    if (id) return id;
    const kinds: BackendKind[] = backend ? [backend] : ['local', 'cluster'];
    for (const kind of kinds) {
      const match = this.store.findByWorkspace(kind, workspace);
      if (match) return match.id;
    }
    throw new ValidationError(`No session registered for ${resolve(workspace)}; pass a session id`);
  }

  private require(id: string): Session {
    const session = this.store.get(id);
    if (!session) {
      throw new ValidationError(`Unknown session ${id}`, { sessionId: id });
    }
    return session;
  }

  private planFor(session: Session, relayImage: string = this.config.relayImage): NetworkIsolationPlan {
    return compileIsolationPlan({
      sessionId: session.id,
      network: session.network,
      capabilities: this.backendFor(session.backend).capabilities,
      relayImage,
      relayPort: this.config.relayPort,
    });
  }

  private warnIfHighRisk(plan: NetworkIsolationPlan): void {
    if (!plan.highRisk) return;
    this.logger.warn(`session ${plan.sessionId} has UNRESTRICTED network access.`);
    this.logger.warn('The agent can reach any host, and with it send workspace content and credentials anywhere.');
  }

  /**
   * Local sessions need both images on this host; cluster sessions need
   * them in the registry when one is configured.
   */
  private async prepareImages(session: Session, backend: AnyBackend): Promise<{ image: string; relayImage: string }> {
    const needsRelay = session.network.mode !== 'unrestricted';
    const images = { image: session.image, relayImage: this.config.relayImage };
    if (!this.images) return images;

    if (backend.kind === 'local') {
      await this.images.ensure(images.image);
      if (needsRelay) await this.images.ensure(images.relayImage);
      return images;
    }

    const registry = this.config.registry;
    if (!registry) return images;
    await this.images.ensure(images.image);
    const image = await this.images.publish(images.image, registry);
    let relayImage = images.relayImage;
    if (needsRelay) {
      await this.images.ensure(relayImage);
      relayImage = await this.images.publish(relayImage, registry);
    }
    return { image, relayImage };
  }

  private async startWatchdog(session: Session, backend: AnyBackend): Promise<Session> {
    if (!this.config.watchdogEnabled) return session;
    const pid = await this.supervisor.start(session, backend);
    if (pid === undefined) return session;
    const supervised = { ...session, watchdogPid: pid };
    this.store.put(supervised);
    return supervised;
  }
}
