/**
 * Network isolation plan compiler.
 *
 * Turns a session's network settings and its backend's isolation capability
 * into an ordered list of substrate resources. Compiling is pure: the same
 * input always yields a deep-equal plan, and every resource name is derived
 * from the session id or the allowlist fingerprint, so applying a plan twice
 * converges on one resource set.
 *
 * Every resource in `resources` is applied before the workload and removed
 * after it.
 */

import type { BackendCapabilities, NetworkSettings } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { names } from '../session/naming.js';
import { allowlistFingerprint } from './allowlist.js';

export type IsolationMechanism = 'namespace-isolation' | 'policy-isolation' | 'direct';

export type Labels = Record<string, string>;

export const LABEL_SESSION = 'enclave.dev/session-id';
export const LABEL_ROLE = 'enclave.dev/role';
export const LABEL_RELAY_SCOPE = 'enclave.dev/relay-scope';

export interface RelaySpec {
  name: string;
  /** Address the workload's proxy variables point at. */
  host: string;
  port: number;
  /** Allowlist fingerprint; sessions with equal scope can share the relay. */
  scope: string;
  shared: boolean;
  image: string;
  allowedDomains: string[];
  labels: Labels;
}

export interface PortRule {
  port: number;
  protocol: 'TCP' | 'UDP';
}

export type PlanResource =
  | { kind: 'network'; name: string; shared: false; internal: true }
  | { kind: 'relay'; name: string; shared: boolean }
  | { kind: 'deny-egress'; name: string; shared: false; podSelector: Labels }
  | { kind: 'allow-egress'; name: string; shared: false; podSelector: Labels; to: Labels; ports: PortRule[] }
  | { kind: 'relay-egress'; name: string; shared: boolean; podSelector: Labels; ports: PortRule[] }
  | { kind: 'relay-service'; name: string; shared: boolean; selector: Labels; port: number };

export type PlanResourceKind = PlanResource['kind'];

export interface NetworkIsolationPlan {
  sessionId: string;
  mechanism: IsolationMechanism;
  relay: RelaySpec | null;
  allowedDomains: string[];
  resources: PlanResource[];
  /** Labels the backend puts on the workload. */
  workloadLabels: Labels;
  highRisk: boolean;
  fingerprint: string;
}

export interface CompilePlanInput {
  sessionId: string;
  network: NetworkSettings;
  capabilities: Pick<BackendCapabilities, 'isolation' | 'sharedRelay'>;
  relayImage: string;
  relayPort: number;
}

const DNS_PORTS: PortRule[] = [
  { port: 53, protocol: 'UDP' },
  { port: 53, protocol: 'TCP' },
];

const RELAY_UPSTREAM_PORTS: PortRule[] = [
  { port: 80, protocol: 'TCP' },
  { port: 443, protocol: 'TCP' },
  ...DNS_PORTS,
];

export function workloadLabels(sessionId: string): Labels {
  return { [LABEL_SESSION]: sessionId, [LABEL_ROLE]: 'workload' };
}

export function relayLabels(scope: string): Labels {
  return { [LABEL_ROLE]: 'relay', [LABEL_RELAY_SCOPE]: scope };
}

export function compileIsolationPlan(input: CompilePlanInput): NetworkIsolationPlan {
  const { sessionId, network } = input;
  const workload = workloadLabels(sessionId);

  if (network.mode === 'unrestricted') {
    return {
      sessionId,
      mechanism: 'direct',
      relay: null,
      allowedDomains: [],
      resources: [],
      workloadLabels: workload,
      highRisk: true,
      fingerprint: allowlistFingerprint([]),
    };
  }

  if (network.allowedDomains.length === 0) {
    throw new ValidationError(`Session ${sessionId} has a restricted network with an empty allowlist`, {
      sessionId,
      operation: 'plan',
    });
  }

  const allowedDomains = [...network.allowedDomains];
  const fingerprint = allowlistFingerprint(allowedDomains);
  const relaySelector = relayLabels(fingerprint);

  if (input.capabilities.isolation === 'namespace') {
    const relayName = names.localRelay(sessionId);
    return {
      sessionId,
      mechanism: 'namespace-isolation',
      relay: {
        name: relayName,
        host: relayName,
        port: input.relayPort,
        scope: fingerprint,
        shared: false,
        image: input.relayImage,
        allowedDomains,
        labels: { ...relaySelector, [LABEL_SESSION]: sessionId },
      },
      allowedDomains,
      resources: [
        { kind: 'network', name: names.network(sessionId), shared: false, internal: true },
        { kind: 'relay', name: relayName, shared: false },
      ],
      workloadLabels: workload,
      highRisk: false,
      fingerprint,
    };
  }

  const shared = input.capabilities.sharedRelay;
  const relayName = shared ? names.sharedRelay(fingerprint) : names.localRelay(sessionId);
  const relayPods = shared ? relaySelector : { ...relaySelector, [LABEL_SESSION]: sessionId };

  return {
    sessionId,
    mechanism: 'policy-isolation',
    relay: {
      name: relayName,
      host: relayName,
      port: input.relayPort,
      scope: fingerprint,
      shared,
      image: input.relayImage,
      allowedDomains,
      labels: relayPods,
    },
    allowedDomains,
    resources: [
      { kind: 'deny-egress', name: `enclave-${sessionId}-deny-egress`, shared: false, podSelector: workload },
      {
        kind: 'allow-egress',
        name: `enclave-${sessionId}-allow-egress`,
        shared: false,
        podSelector: workload,
        to: relaySelector,
        ports: [{ port: input.relayPort, protocol: 'TCP' }, ...DNS_PORTS],
      },
      { kind: 'relay-egress', name: `${relayName}-egress`, shared, podSelector: relaySelector, ports: RELAY_UPSTREAM_PORTS },
      { kind: 'relay', name: relayName, shared },
      { kind: 'relay-service', name: relayName, shared, selector: relaySelector, port: input.relayPort },
    ],
    workloadLabels: workload,
    highRisk: false,
    fingerprint,
  };
}

function selects(selector: Labels, labels: Labels): boolean {
  return Object.entries(selector).every(([key, value]) => labels[key] === value);
}

/**
 * Structural checks every plan must pass before a backend applies it.
 * Throws ValidationError naming the broken rule.
 */
export function assertPlanInvariants(plan: NetworkIsolationPlan): void {
  const fail = (reason: string): never => {
    throw new ValidationError(`Isolation plan for session ${plan.sessionId} is invalid: ${reason}`, {
      sessionId: plan.sessionId,
      operation: 'plan',
    });
  };

  const keys = plan.resources.map((resource) => `${resource.kind}/${resource.name}`);
  if (new Set(keys).size !== keys.length) fail('duplicate resource');

  if (plan.mechanism === 'direct') {
    if (plan.relay || plan.resources.length > 0) fail('direct egress must not carry isolation resources');
    if (!plan.highRisk) fail('direct egress must be flagged high risk');
    return;
  }

  const relay = plan.relay;
  if (!relay) return fail('restricted egress needs a relay');
  if (plan.highRisk) fail('restricted egress must not be flagged high risk');
  if (plan.allowedDomains.length === 0) fail('restricted egress needs at least one allowed domain');
  if (relay.name === names.workload(plan.sessionId)) fail('relay and workload must be separate units');
  if (selects(plan.workloadLabels, relay.labels)) fail('relay carries workload labels');

  if (plan.mechanism === 'namespace-isolation') {
    if (plan.resources[0]?.kind !== 'network') fail('the internal network must be created first');
    return;
  }

  if (plan.resources[0]?.kind !== 'deny-egress') fail('default-deny egress must be the first resource');
  for (const resource of plan.resources) {
    if (resource.kind === 'deny-egress' || resource.kind === 'allow-egress') {
      if (!selects(resource.podSelector, plan.workloadLabels)) fail(`${resource.name} does not select the workload`);
      if (selects(resource.podSelector, relay.labels)) fail(`${resource.name} selects the relay`);
    }
  }
}
