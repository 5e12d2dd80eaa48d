/**
 * Local container backend (docker or podman CLI).
 *
 * Per session:
 * - an internal network `enclave-net-<id>` with no route out
 * - a relay container on that network, also joined to the default bridge
 * - the workload container `enclave-<id>` on the internal network only,
 *   with the workspace bind-mounted at its host path
 *
 * Mounted credentials are staged under `<stateDir>/sessions/<id>/credentials`
 * and bound read-only; eviction empties the staged directories, which
 * empties the mounts inside the container.
 */

import { dirname, join, posix } from 'path';
import type { BackendCapabilities, Session } from '../types/index.js';
import type { ICommandExecutor, ILogger, IStorage } from '../types/interfaces.js';
import {
  artifactMountPath,
  copiedArtifacts,
  mountedArtifacts,
  readArtifactFiles,
  type CredentialArtifact,
  type CredentialBundle,
  type HomeView,
} from '../credentials/bundle.js';
import { LABEL_ROLE, LABEL_SESSION, assertPlanInvariants, type NetworkIsolationPlan, type PlanResource } from '../network/plan.js';
import { names } from '../session/naming.js';
import { ProvisioningError, SubstrateError, TransientSubstrateError, describeError } from '../errors.js';
import { sleep } from '../infra/retry.js';
import { attachSignal, probeCpuSignal, probeFileSignal, type ActivitySignal } from '../watchdog/signals.js';
import { RollbackStack, type AttachCommand, type Backend } from './types.js';
import { ToolRunner } from './tool.js';

export type ContainerEngine = 'docker' | 'podman';

const DEFAULT_NETWORK: Record<ContainerEngine, string> = {
  docker: 'bridge',
  podman: 'podman',
};

const AGENT_UID = '1000:1000';

export interface LocalBackendOptions {
  executor: ICommandExecutor;
  engine: ContainerEngine;
  storage: IStorage;
  home: HomeView;
  stateDir: string;
  logger: ILogger;
  readyTimeoutMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class LocalBackend implements Backend {
  readonly kind = 'local';
  readonly capabilities: BackendCapabilities = {
    isolation: 'namespace',
    storage: 'bind-mount',
    attach: 'container-tty',
    imageDistribution: 'local',
    sharedRelay: false,
    attachBaseline: 0,
  };

  readonly engine: ContainerEngine;
  private tool: ToolRunner;
  private ps: ToolRunner;
  private storage: IStorage;
  private home: HomeView;
  private stateDir: string;
  private logger: ILogger;
  private readyTimeoutMs: number;
  private pollIntervalMs: number;
  private wait: (ms: number) => Promise<void>;

  constructor(options: LocalBackendOptions) {
    this.engine = options.engine;
    this.logger = options.logger;
    this.tool = new ToolRunner(options.executor, options.engine, [], options.logger);
    this.ps = new ToolRunner(options.executor, 'ps', [], options.logger);
    this.storage = options.storage;
    this.home = options.home;
    this.stateDir = options.stateDir;
    this.readyTimeoutMs = options.readyTimeoutMs ?? 300_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.wait = options.sleep ?? sleep;
  }

  sessionDir(sessionId: string): string {
    return join(this.stateDir, 'sessions', sessionId);
  }

  /** Host directory bound at an artifact's mount point. */
  stagePath(sessionId: string, artifact: string): string {
    return join(this.sessionDir(sessionId), 'credentials', artifact);
  }

  async provision(session: Session, plan: NetworkIsolationPlan, bundle: CredentialBundle): Promise<void> {
    assertPlanInvariants(plan);
    const rollback = new RollbackStack();
    const ctx = { sessionId: session.id, operation: 'start' };

    try {
      for (const resource of plan.resources) {
        await this.applyResource(resource, plan, rollback);
      }

      this.stageCredentials(session.id, bundle);
      rollback.push('credential stage', async () => this.wipeStage(session.id));

      const workload = names.workload(session.id);
      if (await this.containerExists(workload)) {
        await this.tool.run(['rm', '-f', workload], ctx);
      }
      await this.tool.run(this.createArgs(session, plan, bundle), ctx);
      rollback.push(`container ${workload}`, async () => {
        await this.tool.run(['rm', '-f', workload], ctx);
      });

      await this.copyCredentials(session, bundle);
      await this.tool.run(['start', workload], ctx);
      await this.waitRunning(session.id);
      await this.fixOwnership(session, bundle);
    } catch (error) {
      await rollback.unwind((label, undoError) => {
        this.logger.warn(`rollback of ${label} failed: ${describeError(undoError)}`);
      });
      throw new ProvisioningError(
        `Starting session ${session.id} failed and was rolled back: ${describeError(error)}`,
        ctx,
        { cause: error },
      );
    }
  }

  async teardownWorkload(session: Session, plan: NetworkIsolationPlan): Promise<void> {
    const ctx = { sessionId: session.id, operation: 'stop' };
    const workload = names.workload(session.id);
    if (await this.containerExists(workload)) {
      await this.tool.run(['rm', '-f', workload], ctx);
    }
    for (const resource of [...plan.resources].reverse()) {
      await this.removeResource(resource, ctx);
    }
    this.wipeStage(session.id);
  }

  async destroy(session: Session, plan: NetworkIsolationPlan): Promise<void> {
    await this.teardownWorkload(session, plan);
    this.storage.remove(this.sessionDir(session.id));
  }

  async syncCredentials(session: Session, bundle: CredentialBundle): Promise<void> {
    this.stageCredentials(session.id, bundle);
    await this.copyCredentials(session, bundle);
    await this.fixOwnership(session, bundle);
  }

  async evictCredentials(session: Session): Promise<void> {
    const root = join(this.sessionDir(session.id), 'credentials');
    if (!this.storage.exists(root)) return;
    for (const artifact of this.storage.readdir(root)) {
      this.clearDir(join(root, artifact));
    }
    this.logger.info(`evicted credentials of ${session.id}`);
  }

  attach(session: Session): AttachCommand {
    return { command: this.engine, args: ['attach', names.workload(session.id)] };
  }

  activitySignals(session: Session): ActivitySignal[] {
    const workload = names.workload(session.id);
    const attachLine = new RegExp(`(^|/)${this.engine} attach ${workload}$`);
    const probe = (script: string) => this.tool.probe(['exec', workload, 'sh', '-c', script]);

    return [
      attachSignal(async () => {
        const stdout = await this.ps.run(['-axo', 'command='], { sessionId: session.id, operation: 'watchdog' });
        return stdout.split('\n').filter((line) => attachLine.test(line.trim())).length;
      }, this.capabilities.attachBaseline),
      probeCpuSignal(probe),
      probeFileSignal(probe),
    ];
  }

  async exists(session: Session): Promise<boolean> {
    return this.containerExists(names.workload(session.id));
  }

  private async containerExists(name: string): Promise<boolean> {
    return this.tool.succeeds(['container', 'inspect', name]);
  }

  private networkName(plan: NetworkIsolationPlan): string | undefined {
    return plan.resources.find((resource) => resource.kind === 'network')?.name;
  }

  private async applyResource(resource: PlanResource, plan: NetworkIsolationPlan, rollback: RollbackStack): Promise<void> {
    const ctx = { sessionId: plan.sessionId, operation: 'start' };
    const label = ['--label', `${LABEL_SESSION}=${plan.sessionId}`];

    if (resource.kind === 'network') {
      if (await this.tool.succeeds(['network', 'inspect', resource.name])) return;
      await this.tool.run(['network', 'create', '--internal', ...label, resource.name], ctx);
      rollback.push(`network ${resource.name}`, async () => {
        await this.tool.run(['network', 'rm', resource.name], ctx);
      });
      return;
    }

    if (resource.kind === 'relay') {
      const relay = plan.relay;
      const network = this.networkName(plan);
      if (!relay || !network) {
        throw new SubstrateError(`relay ${resource.name} has no internal network to join`, ctx);
      }
      if (await this.containerExists(relay.name)) {
        await this.tool.run(['start', relay.name], ctx);
        return;
      }
      await this.tool.run(
        [
          'run', '-d',
          '--name', relay.name,
          '--network', network,
          ...label,
          '--label', `${LABEL_ROLE}=relay`,
          '-e', `ENCLAVE_ALLOWED_DOMAINS=${relay.allowedDomains.join(',')}`,
          relay.image,
          'relay', '--port', String(relay.port),
        ],
        ctx,
      );
      rollback.push(`relay ${relay.name}`, async () => {
        await this.tool.run(['rm', '-f', relay.name], ctx);
      });
      await this.tool.run(['network', 'connect', DEFAULT_NETWORK[this.engine], relay.name], ctx);
      return;
    }

    throw new SubstrateError(`${this.engine} backend cannot apply ${resource.kind} ${resource.name}`, ctx);
  }

  private async removeResource(resource: PlanResource, ctx: { sessionId: string; operation: string }): Promise<void> {
    if (resource.kind === 'relay' && (await this.containerExists(resource.name))) {
      await this.tool.run(['rm', '-f', resource.name], ctx);
    } else if (resource.kind === 'network' && (await this.tool.succeeds(['network', 'inspect', resource.name]))) {
      await this.tool.run(['network', 'rm', resource.name], ctx);
    }
  }

  createArgs(session: Session, plan: NetworkIsolationPlan, bundle: CredentialBundle): string[] {
    const workload = names.workload(session.id);
    const args = [
      'create',
      '--name', workload,
      '-it',
      '--label', `${LABEL_SESSION}=${session.id}`,
      '--label', `${LABEL_ROLE}=workload`,
      '-u', AGENT_UID,
      '-w', session.workspace,
      '-v', `${session.workspace}:${session.workspace}:rw`,
    ];

    const network = this.networkName(plan);
    if (network) args.push('--network', network);

    for (const artifact of mountedArtifacts(bundle)) {
      args.push('-v', `${this.stagePath(session.id, artifact.name)}:${artifactMountPath(artifact)}:ro`);
    }

    if (plan.relay) {
      const url = `http://${plan.relay.host}:${plan.relay.port}`;
      for (const key of ['HTTP_PROXY', 'HTTPS_PROXY', 'http_proxy', 'https_proxy']) {
        args.push('-e', `${key}=${url}`);
      }
      args.push('-e', 'NO_PROXY=localhost,127.0.0.1', '-e', 'no_proxy=localhost,127.0.0.1');
    }

    args.push(session.image);
    return args;
  }

  private stageCredentials(sessionId: string, bundle: CredentialBundle): void {
    const root = join(this.sessionDir(sessionId), 'credentials');
    if (!this.storage.exists(root)) this.storage.mkdirp(root);
    this.storage.chmod(root, 0o700);

    for (const artifact of mountedArtifacts(bundle)) {
      const dir = this.stagePath(sessionId, artifact.name);
      if (this.storage.exists(dir)) this.clearDir(dir);
      this.writeFiles(dir, artifact);
    }
  }

  /**
   * Empty a staged directory without replacing it: a running container's
   * bind mount stays on the directory it was created with.
   */
  private clearDir(dir: string): void {
    for (const entry of this.storage.readdir(dir)) {
      this.storage.remove(join(dir, entry));
    }
  }

  private writeFiles(dir: string, artifact: CredentialArtifact): void {
    this.storage.mkdirp(dir);
    for (const file of readArtifactFiles(this.home, artifact)) {
      const path = join(dir, file.path);
      this.storage.mkdirp(dirname(path));
      this.storage.writeFile(path, file.content);
      this.storage.chmod(path, 0o644);
    }
  }

  private wipeStage(sessionId: string): void {
    this.storage.remove(join(this.sessionDir(sessionId), 'credentials'));
  }

  private async copyCredentials(session: Session, bundle: CredentialBundle): Promise<void> {
    const workload = names.workload(session.id);
    const ctx = { sessionId: session.id, operation: 'credentials' };
    const scratch = join(this.sessionDir(session.id), 'copy');
    try {
      for (const artifact of copiedArtifacts(bundle)) {
        const dir = join(scratch, artifact.name);
        this.writeFiles(dir, artifact);
        const source = artifact.kind === 'directory' ? `${dir}/.` : join(dir, posix.basename(artifact.target));
        await this.tool.run(['cp', source, `${workload}:${artifact.target}`], ctx);
      }
    } finally {
      this.storage.remove(scratch);
    }
  }

  /** `cp` lands files as root; hand copied artifacts to the agent user. */
  private async fixOwnership(session: Session, bundle: CredentialBundle): Promise<void> {
    const targets = copiedArtifacts(bundle).map((artifact) => artifact.target);
    if (targets.length === 0) return;
    await this.tool.run(['exec', '-u', '0', names.workload(session.id), 'chown', '-R', AGENT_UID, ...targets], {
      sessionId: session.id,
      operation: 'credentials',
    });
  }

  private async waitRunning(sessionId: string): Promise<void> {
    const workload = names.workload(sessionId);
    const polls = Math.max(1, Math.ceil(this.readyTimeoutMs / this.pollIntervalMs));
    for (let poll = 1; ; poll++) {
      const state = (
        await this.tool.run(['inspect', '-f', '{{.State.Status}}', workload], { sessionId, operation: 'start' })
      ).trim();
      if (state === 'running') return;
      if (state === 'exited' || state === 'dead') {
        throw new SubstrateError(`${this.engine} start failed (session ${sessionId}): workload ${workload} is ${state}`, {
          sessionId,
          operation: 'start',
          command: `${this.engine} start`,
        });
      }
      if (poll >= polls) {
        throw new TransientSubstrateError(
          `${this.engine} start timed out (session ${sessionId}): workload ${workload} still ${state} after ${this.readyTimeoutMs / 1000}s`,
          { sessionId, operation: 'start', command: `${this.engine} start` },
        );
      }
      await this.wait(this.pollIntervalMs);
    }
  }
}

