import { describe, expect, it } from 'vitest';
import {
  LABEL_RELAY_SCOPE,
  LABEL_ROLE,
  LABEL_SESSION,
  assertPlanInvariants,
  compileIsolationPlan,
  type CompilePlanInput,
  type NetworkIsolationPlan,
} from '../../src/network/plan.js';
import { allowlistFingerprint } from '../../src/network/allowlist.js';
import { ValidationError } from '../../src/errors.js';

const restricted = { mode: 'custom-allowlist' as const, allowedDomains: ['.example-api.com'] };

function input(overrides: Partial<CompilePlanInput> = {}): CompilePlanInput {
  return {
    sessionId: 'api',
    network: restricted,
    capabilities: { isolation: 'policy', sharedRelay: true },
    relayImage: 'enclave-relay:latest',
    relayPort: 3128,
    ...overrides,
  };
}

describe('compileIsolationPlan', () => {
  describe('policy isolation', () => {
    const plan = compileIsolationPlan(input());
    const fingerprint = allowlistFingerprint(['.example-api.com']);

    it('puts default-deny egress first, before anything that opens a path', () => {
      expect(plan.mechanism).toBe('policy-isolation');
      expect(plan.resources.map((resource) => resource.kind)).toEqual([
        'deny-egress',
        'allow-egress',
        'relay-egress',
        'relay',
        'relay-service',
      ]);
    });

    it('selects only the workload with its deny and allow rules', () => {
      const deny = plan.resources[0];
      expect(deny).toMatchObject({
        kind: 'deny-egress',
        name: 'enclave-api-deny-egress',
        podSelector: { [LABEL_SESSION]: 'api', [LABEL_ROLE]: 'workload' },
      });
    });

    it('lets the workload reach the relay port and DNS only', () => {
      const allow = plan.resources[1];
      expect(allow).toMatchObject({
        kind: 'allow-egress',
        to: { [LABEL_ROLE]: 'relay', [LABEL_RELAY_SCOPE]: fingerprint },
        ports: [
          { port: 3128, protocol: 'TCP' },
          { port: 53, protocol: 'UDP' },
          { port: 53, protocol: 'TCP' },
        ],
      });
    });

    it('shares the relay between sessions with the same allowlist', () => {
      const other = compileIsolationPlan(input({ sessionId: 'web' }));
      expect(plan.relay?.name).toBe(`relay-${fingerprint}`);
      expect(other.relay?.name).toBe(plan.relay?.name);
      expect(plan.relay?.shared).toBe(true);
      expect(plan.relay?.host).toBe(plan.relay?.name);
    });

    it('keeps relay labels apart from workload labels', () => {
      expect(plan.relay?.labels).toEqual({ [LABEL_ROLE]: 'relay', [LABEL_RELAY_SCOPE]: fingerprint });
      expect(plan.workloadLabels).toEqual({ [LABEL_SESSION]: 'api', [LABEL_ROLE]: 'workload' });
    });

    it('gives each session its own relay when the substrate cannot share one', () => {
      const own = compileIsolationPlan(input({ capabilities: { isolation: 'policy', sharedRelay: false } }));
      expect(own.relay?.name).toBe('enclave-relay-api');
      expect(own.relay?.labels[LABEL_SESSION]).toBe('api');
      expect(() => assertPlanInvariants(own)).not.toThrow();
    });
  });

  describe('namespace isolation', () => {
    const plan = compileIsolationPlan(input({ capabilities: { isolation: 'namespace', sharedRelay: false } }));

    it('creates the internal network, then the per-session relay', () => {
      expect(plan.mechanism).toBe('namespace-isolation');
      expect(plan.resources).toEqual([
        { kind: 'network', name: 'enclave-net-api', shared: false, internal: true },
        { kind: 'relay', name: 'enclave-relay-api', shared: false },
      ]);
    });

    it('points the workload at the relay by container name', () => {
      expect(plan.relay).toMatchObject({ host: 'enclave-relay-api', port: 3128, image: 'enclave-relay:latest' });
    });
  });

  describe('unrestricted', () => {
    const plan = compileIsolationPlan(input({ network: { mode: 'unrestricted', allowedDomains: [] } }));

    it('has no relay, no resources and is flagged high risk', () => {
      expect(plan.mechanism).toBe('direct');
      expect(plan.relay).toBeNull();
      expect(plan.resources).toEqual([]);
      expect(plan.highRisk).toBe(true);
    });
  });

  it('rejects a restricted network with no domains', () => {
    expect(() => compileIsolationPlan(input({ network: { mode: 'restricted', allowedDomains: [] } }))).toThrow(
      ValidationError,
    );
  });

  it('is deterministic, so applying two compilations yields one resource set', () => {
    for (const isolation of ['policy', 'namespace'] as const) {
      const capabilities = { isolation, sharedRelay: isolation === 'policy' };
      const first = compileIsolationPlan(input({ capabilities }));
      const second = compileIsolationPlan(input({ capabilities }));
      expect(second).toEqual(first);

      const applied = new Map<string, unknown>();
      for (const resource of [...first.resources, ...second.resources]) {
        applied.set(`${resource.kind}/${resource.name}`, resource);
      }
      expect(applied.size).toBe(first.resources.length);
    }
  });

  it('produces plans that pass their own invariants', () => {
    expect(() => assertPlanInvariants(compileIsolationPlan(input()))).not.toThrow();
    expect(() =>
      assertPlanInvariants(compileIsolationPlan(input({ capabilities: { isolation: 'namespace', sharedRelay: false } }))),
    ).not.toThrow();
    expect(() =>
      assertPlanInvariants(compileIsolationPlan(input({ network: { mode: 'unrestricted', allowedDomains: [] } }))),
    ).not.toThrow();
  });
});

describe('assertPlanInvariants', () => {
  const base = (): NetworkIsolationPlan => compileIsolationPlan(input());

  it('rejects a policy plan whose first resource is not default-deny', () => {
    const plan = base();
    plan.resources = [plan.resources[1], plan.resources[0], ...plan.resources.slice(2)];
    expect(() => assertPlanInvariants(plan)).toThrow(/default-deny egress must be the first resource/);
  });

  it('rejects a relay that carries the workload labels', () => {
    const plan = base();
    if (!plan.relay) throw new Error('expected a relay');
    plan.relay = { ...plan.relay, labels: { ...plan.relay.labels, ...plan.workloadLabels } };
    expect(() => assertPlanInvariants(plan)).toThrow(/relay carries workload labels/);
  });

  it('rejects a relay named like the workload', () => {
    const plan = base();
    if (!plan.relay) throw new Error('expected a relay');
    plan.relay = { ...plan.relay, name: 'enclave-api' };
    expect(() => assertPlanInvariants(plan)).toThrow(/separate units/);
  });

  it('rejects duplicate resources', () => {
    const plan = base();
    plan.resources = [...plan.resources, plan.resources[0]];
    expect(() => assertPlanInvariants(plan)).toThrow(/duplicate resource/);
  });

  it('rejects direct egress that is not flagged high risk', () => {
    const plan = compileIsolationPlan(input({ network: { mode: 'unrestricted', allowedDomains: [] } }));
    plan.highRisk = false;
    expect(() => assertPlanInvariants(plan)).toThrow(ValidationError);
  });
});
