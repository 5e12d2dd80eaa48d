/**
 * Cluster backend (kubectl).
 *
 * Resources are applied in plan order with `kubectl apply`, followed by one
 * Secret per mounted credential artifact and the workload StatefulSet
 * `enclave-<id>`. The workspace lives on the claim `workspace-enclave-<id>-0`,
 * which survives stop/start and is removed only by destroy.
 *
 * Relays are shared by every session with the same allowlist. A session
 * uses a relay from the moment its allow-egress policy is applied, which
 * happens before the relay objects and the workload; the relay is removed
 * only when no other session has such a policy.
 */

import type { BackendCapabilities, Session } from '../types/index.js';
import type { ICommandExecutor, ILogger } from '../types/interfaces.js';
import {
  copiedArtifacts,
  mountedArtifacts,
  readArtifactFiles,
  type CredentialBundle,
  type HomeView,
} from '../credentials/bundle.js';
import {
  LABEL_RELAY_SCOPE,
  LABEL_ROLE,
  LABEL_SESSION,
  assertPlanInvariants,
  type NetworkIsolationPlan,
} from '../network/plan.js';
import {
  CREDENTIALS_ROLE,
  RELAY_CLIENT_ROLE,
  credentialSecret,
  list,
  planResourceManifest,
  planResourceRef,
  workloadStatefulSet,
  type KubeObject,
} from '../cluster/manifests.js';
import { names } from '../session/naming.js';
import {
  AuthorizationError,
  ProvisioningError,
  SubstrateError,
  TransientSubstrateError,
  describeError,
} from '../errors.js';
import { sleep } from '../infra/retry.js';
import { escapeShellArg } from '../infra/shell-escape.js';
import { attachSignal, countLines, probeCpuSignal, probeFileSignal, type ActivitySignal } from '../watchdog/signals.js';
import { RollbackStack, type AttachCommand, type Backend } from './types.js';
import { ToolRunner } from './tool.js';

export const TMUX_SESSION = 'agent';

export interface ClusterBackendOptions {
  executor: ICommandExecutor;
  home: HomeView;
  logger: ILogger;
  context?: string;
  namespace?: string;
  storageClass?: string;
  volumeSize: string;
  readyTimeoutMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface Ctx {
  sessionId: string;
  operation: string;
}

function field(record: unknown, key: string): unknown {
  return record && typeof record === 'object' ? Reflect.get(record, key) : undefined;
}

/**
 * Session ids named by the objects in `kubectl get <kind> -o json`.
 */
export function parseSessionLabels(stdout: string): string[] {
  const parsed: unknown = JSON.parse(stdout);
  const items = field(parsed, 'items');
  if (!Array.isArray(items)) return [];
  const ids = new Set<string>();
  for (const item of items) {
    const id = field(field(field(item, 'metadata'), 'labels'), LABEL_SESSION);
    if (typeof id === 'string') ids.add(id);
  }
  return [...ids];
}

export class ClusterBackend implements Backend {
  readonly kind = 'cluster';
  readonly capabilities: BackendCapabilities = {
    isolation: 'policy',
    storage: 'volume-claim',
    attach: 'exec-tmux',
    imageDistribution: 'registry',
    sharedRelay: true,
    attachBaseline: 1,
  };

  private kubectl: ToolRunner;
  private home: HomeView;
  private logger: ILogger;
  private namespace?: string;
  private storageClass?: string;
  private volumeSize: string;
  private readyTimeoutMs: number;
  private pollIntervalMs: number;
  private wait: (ms: number) => Promise<void>;

  constructor(options: ClusterBackendOptions) {
    const base: string[] = [];
    if (options.context) base.push('--context', options.context);
    if (options.namespace) base.push('-n', options.namespace);
    this.kubectl = new ToolRunner(options.executor, 'kubectl', base, options.logger);
    this.home = options.home;
    this.logger = options.logger;
    this.namespace = options.namespace;
    this.storageClass = options.storageClass;
    this.volumeSize = options.volumeSize;
    this.readyTimeoutMs = options.readyTimeoutMs ?? 300_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Fail early when the caller may not create workloads or the namespace
   * is missing. Nothing is applied before this passes.
   */
  async preflight(sessionId: string): Promise<void> {
    const ctx = { sessionId, operation: 'start' };
    const result = await this.kubectl.probe(['auth', 'can-i', 'create', 'statefulsets']);
    if (result.stdout.trim() !== 'yes') {
      throw new AuthorizationError(
        `kubectl auth can-i failed (session ${sessionId}): not allowed to create statefulsets${
          this.namespace ? ` in namespace ${this.namespace}` : ''
        }`,
        { ...ctx, command: 'kubectl auth can-i', stderr: result.stderr, exitCode: result.exitCode },
      );
    }
    if (this.namespace) {
      await this.kubectl.run(['get', 'namespace', this.namespace], ctx);
    }
  }

  async provision(session: Session, plan: NetworkIsolationPlan, bundle: CredentialBundle): Promise<void> {
    assertPlanInvariants(plan);
    const ctx = { sessionId: session.id, operation: 'start' };
    await this.preflight(session.id);

    const rollback = new RollbackStack();
    const workload = names.workload(session.id);
    try {
      let relayPushed = false;
      for (const resource of plan.resources) {
        const manifest = planResourceManifest(resource, plan, this.namespace);
        const ref = planResourceRef(resource);
        if (!manifest || !ref) continue;
        const existed = await this.kubectl.succeeds(['get', ref.kind, ref.name]);
        await this.apply(manifest, ctx);
        if (existed) continue;
        if (!resource.shared) {
          rollback.push(`${ref.kind} ${ref.name}`, () => this.delete(ref.kind, ref.name, ctx));
        } else if (!relayPushed) {
          relayPushed = true;
          rollback.push(`relay ${plan.relay?.name ?? plan.fingerprint}`, () => this.releaseRelay(plan, session.id, ctx));
        }
      }

      await this.applySecrets(session, bundle, ctx);
      rollback.push('credential secrets', () => this.deleteSecrets(session.id, ctx));

      const workloadExisted = await this.kubectl.succeeds(['get', 'statefulset', workload]);
      await this.apply(
        workloadStatefulSet(session, plan, {
          image: session.image,
          namespace: this.namespace,
          storageClass: this.storageClass,
          volumeSize: this.volumeSize,
          mounted: mountedArtifacts(bundle),
        }),
        ctx,
      );
      if (workloadExisted) {
        rollback.push(`statefulset ${workload}`, () => this.scale(workload, 0, ctx));
      } else {
        rollback.push(`statefulset ${workload}`, async () => {
          await this.delete('statefulset', workload, ctx);
          await this.delete('pvc', names.volumeClaim(session.id), ctx);
        });
      }

      await this.waitRunning(session.id);
      await this.copyCredentials(session, bundle);
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
    if (await this.kubectl.succeeds(['get', 'statefulset', workload])) {
      await this.scale(workload, 0, ctx);
    }
    await this.deleteSecrets(session.id, ctx);
    if (plan.relay) {
      // The stopped session no longer counts as a user of the relay.
      await this.kubectl.run(
        ['delete', 'networkpolicy', '-l', `${LABEL_SESSION}=${session.id},${LABEL_ROLE}=${RELAY_CLIENT_ROLE}`, '--ignore-not-found'],
        ctx,
      );
    }
    await this.releaseRelay(plan, session.id, ctx);
  }

  async destroy(session: Session, plan: NetworkIsolationPlan): Promise<void> {
    const ctx = { sessionId: session.id, operation: 'delete' };
    await this.delete('statefulset', names.workload(session.id), ctx);
    await this.delete('pvc', names.volumeClaim(session.id), ctx);
    await this.kubectl.run(
      ['delete', 'networkpolicy,secret,configmap', '-l', `${LABEL_SESSION}=${session.id}`, '--ignore-not-found'],
      ctx,
    );
    await this.releaseRelay(plan, session.id, ctx);
  }

  async syncCredentials(session: Session, bundle: CredentialBundle): Promise<void> {
    const ctx = { sessionId: session.id, operation: 'connect' };
    await this.applySecrets(session, bundle, ctx);
    await this.copyCredentials(session, bundle);
  }

  async evictCredentials(session: Session): Promise<void> {
    await this.deleteSecrets(session.id, { sessionId: session.id, operation: 'evict' });
    this.logger.info(`evicted credentials of ${session.id}`);
  }

  attach(session: Session): AttachCommand {
    return {
      command: 'kubectl',
      args: this.kubectl.argv(['exec', '-it', names.pod(session.id), '--', 'tmux', 'new-session', '-A', '-s', TMUX_SESSION]),
    };
  }

  activitySignals(session: Session): ActivitySignal[] {
    const pod = names.pod(session.id);
    const probe = (script: string) => this.kubectl.probe(['exec', pod, '--', 'sh', '-c', script]);
    return [
      attachSignal(async () => {
        const stdout = await this.kubectl.run(['exec', pod, '--', 'tmux', 'list-clients', '-t', TMUX_SESSION], {
          sessionId: session.id,
          operation: 'watchdog',
        });
        return countLines(stdout);
      }, this.capabilities.attachBaseline),
      probeCpuSignal(probe),
      probeFileSignal(probe),
    ];
  }

  async exists(session: Session): Promise<boolean> {
    return this.kubectl.succeeds(['get', 'statefulset', names.workload(session.id)]);
  }

  private async apply(manifest: KubeObject, ctx: Ctx): Promise<void> {
    await this.kubectl.run(['apply', '-f', '-'], { ...ctx, input: JSON.stringify(manifest) });
  }

  private async delete(kind: string, name: string, ctx: Ctx): Promise<void> {
    await this.kubectl.run(['delete', kind, name, '--ignore-not-found'], ctx);
  }

  private async scale(workload: string, replicas: number, ctx: Ctx): Promise<void> {
    await this.kubectl.run(['scale', 'statefulset', workload, `--replicas=${replicas}`], ctx);
  }

  private async applySecrets(session: Session, bundle: CredentialBundle, ctx: Ctx): Promise<void> {
    const secrets = mountedArtifacts(bundle).map((artifact) =>
      credentialSecret(session.id, artifact, readArtifactFiles(this.home, artifact), this.namespace),
    );
    if (secrets.length === 0) return;
    await this.kubectl.run(['apply', '-f', '-'], { ...ctx, input: JSON.stringify(list(secrets)) });
  }

  private async deleteSecrets(sessionId: string, ctx: Ctx): Promise<void> {
    await this.kubectl.run(
      ['delete', 'secret', '-l', `${LABEL_SESSION}=${sessionId},${LABEL_ROLE}=${CREDENTIALS_ROLE}`, '--ignore-not-found'],
      ctx,
    );
  }

  /** Copied artifacts are written through `kubectl exec` into the running pod. */
  private async copyCredentials(session: Session, bundle: CredentialBundle): Promise<void> {
    const pod = names.pod(session.id);
    const ctx = { sessionId: session.id, operation: 'credentials' };
    for (const artifact of copiedArtifacts(bundle)) {
      for (const file of readArtifactFiles(this.home, artifact)) {
        const target = artifact.kind === 'directory' ? `${artifact.target}/${file.path}` : artifact.target;
        const dir = target.slice(0, target.lastIndexOf('/')) || '/';
        const script = `mkdir -p ${escapeShellArg(dir)} && cat > ${escapeShellArg(target)}`;
        await this.kubectl.run(['exec', '-i', pod, '--', 'sh', '-c', script], { ...ctx, input: file.content });
      }
    }
  }

  /** True when a session other than `exceptSession` has an allow-egress policy for this relay scope. */
  private async scopeInUse(scope: string, exceptSession: string): Promise<boolean> {
    const stdout = await this.kubectl.run(
      ['get', 'networkpolicies', '-l', `${LABEL_RELAY_SCOPE}=${scope},${LABEL_ROLE}=${RELAY_CLIENT_ROLE}`, '-o', 'json'],
      { sessionId: exceptSession, operation: 'relay' },
    );
    return parseSessionLabels(stdout).some((id) => id !== exceptSession);
  }

  /**
   * Remove the shared relay objects unless another session uses them. A
   * session that applied its policy while they were being removed gets
   * them back; one that applies it later recreates them itself.
   */
  private async releaseRelay(plan: NetworkIsolationPlan, sessionId: string, ctx: Ctx): Promise<void> {
    const shared = plan.resources.filter((resource) => resource.shared);
    if (shared.length === 0) return;
    const relayName = plan.relay?.name ?? plan.fingerprint;
    if (await this.scopeInUse(plan.fingerprint, sessionId)) {
      this.logger.debug(`relay ${relayName} still in use, keeping it`);
      return;
    }
    for (const resource of [...shared].reverse()) {
      const ref = planResourceRef(resource);
      if (ref) await this.delete(ref.kind, ref.name, ctx);
    }
    if (!(await this.scopeInUse(plan.fingerprint, sessionId))) return;

    this.logger.debug(`relay ${relayName} was picked up while being removed, restoring it`);
    for (const resource of shared) {
      const manifest = planResourceManifest(resource, plan, this.namespace);
      if (manifest) await this.apply(manifest, ctx);
    }
  }

  private async waitRunning(sessionId: string): Promise<void> {
    const pod = names.pod(sessionId);
    const polls = Math.max(1, Math.ceil(this.readyTimeoutMs / this.pollIntervalMs));
    let phase = '';
    for (let poll = 1; poll <= polls; poll++) {
      const result = await this.kubectl.probe(['get', 'pod', pod, '-o', 'jsonpath={.status.phase}']);
      phase = result.exitCode === 0 ? result.stdout.trim() : '';
      if (phase === 'Running') return;
      if (phase === 'Failed' || phase === 'Succeeded') {
        throw new SubstrateError(`kubectl get pod failed (session ${sessionId}): pod ${pod} is ${phase}`, {
          sessionId,
          operation: 'start',
          command: 'kubectl get pod',
        });
      }
      if (poll < polls) await this.wait(this.pollIntervalMs);
    }
    throw new TransientSubstrateError(
      `kubectl get pod timed out (session ${sessionId}): pod ${pod} not running after ${this.readyTimeoutMs / 1000}s (last phase: ${phase || 'unknown'})`,
      { sessionId, operation: 'start', command: 'kubectl get pod' },
    );
  }
}
