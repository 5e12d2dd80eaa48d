import type { BackendCapabilities, BackendKind, Session } from '../types/index.js';
import type { CredentialBundle } from '../credentials/bundle.js';
import type { NetworkIsolationPlan } from '../network/plan.js';
import type { ActivitySignal } from '../watchdog/signals.js';

/** A command that attaches the caller's terminal to the session. */
export interface AttachCommand {
  command: string;
  args: string[];
}

/**
 * Operations every substrate offers. Implementations are independent
 * classes; see `AnyBackend`.
 */
export interface Backend {
  readonly kind: BackendKind;
  readonly capabilities: BackendCapabilities;

  /**
   * Bring up the isolation resources, credentials and workload. Either
   * everything ends up running or everything this call created is removed
   * again before it throws.
   */
  provision(session: Session, plan: NetworkIsolationPlan, bundle: CredentialBundle): Promise<void>;

  /** Stop the workload, keeping durable storage. */
  teardownWorkload(session: Session, plan: NetworkIsolationPlan): Promise<void>;

  /** Remove every resource of the session, durable storage included. */
  destroy(session: Session, plan: NetworkIsolationPlan): Promise<void>;

  syncCredentials(session: Session, bundle: CredentialBundle): Promise<void>;

  /** Make mounted credentials unreadable inside the workload. */
  evictCredentials(session: Session): Promise<void>;

  attach(session: Session): AttachCommand;

  activitySignals(session: Session): ActivitySignal[];

  /** Whether the workload still exists on the substrate. */
  exists(session: Session): Promise<boolean>;
}

/** Undo steps recorded while provisioning, run newest first. */
export class RollbackStack {
  private steps: Array<{ label: string; undo: () => Promise<void> }> = [];

  push(label: string, undo: () => Promise<void>): void {
    this.steps.push({ label, undo });
  }

  get size(): number {
    return this.steps.length;
  }

  /** Returns the labels of steps that failed to undo. */
  async unwind(onError: (label: string, error: unknown) => void): Promise<string[]> {
    const failed: string[] = [];
    while (this.steps.length > 0) {
      const step = this.steps.pop();
      if (!step) break;
      try {
        await step.undo();
      } catch (error) {
        onError(step.label, error);
        failed.push(step.label);
      }
    }
    return failed;
  }
}
