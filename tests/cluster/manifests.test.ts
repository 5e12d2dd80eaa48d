import { describe, expect, it } from 'vitest';
import {
  credentialSecret,
  list,
  planResourceManifest,
  planResourceRef,
  secretKey,
  workloadStatefulSet,
} from '../../src/cluster/manifests.js';
import type { CredentialArtifact } from '../../src/credentials/bundle.js';
import { compileIsolationPlan } from '../../src/network/plan.js';
import { makeSession } from '../helpers/fakes.js';

const session = makeSession({ backend: 'cluster' });
const plan = compileIsolationPlan({
  sessionId: 'api',
  network: session.network,
  capabilities: { isolation: 'policy', sharedRelay: true },
  relayImage: 'enclave-relay:latest',
  relayPort: 3128,
});

const gcloud: CredentialArtifact = {
  name: 'gcloud',
  kind: 'directory',
  files: [{ path: 'application_default_credentials.json', source: { type: 'inline', content: 'x' } }],
  target: '/home/agent/.config/gcloud',
  readOnly: true,
  delivery: 'mount',
};

function resource(kind: string) {
  const found = plan.resources.find((candidate) => candidate.kind === kind);
  if (!found) throw new Error(`plan has no ${kind}`);
  return found;
}

describe('planResourceManifest', () => {
  it('denies all egress of the workload', () => {
    expect(planResourceManifest(resource('deny-egress'), plan, 'agents')).toEqual({
      apiVersion: 'networking.k8s.io/v1',
      kind: 'NetworkPolicy',
      metadata: {
        name: 'enclave-api-deny-egress',
        namespace: 'agents',
        labels: { 'enclave.dev/session-id': 'api', 'enclave.dev/relay-scope': plan.fingerprint },
      },
      spec: {
        podSelector: { matchLabels: { 'enclave.dev/session-id': 'api', 'enclave.dev/role': 'workload' } },
        policyTypes: ['Egress'],
        egress: [],
      },
    });
  });

  it('lets the workload reach only the relay port and DNS', () => {
    const manifest = planResourceManifest(resource('allow-egress'), plan);
    expect(manifest?.metadata).toEqual({
      name: 'enclave-api-allow-egress',
      labels: {
        'enclave.dev/session-id': 'api',
        'enclave.dev/relay-scope': plan.fingerprint,
        'enclave.dev/role': 'relay-client',
      },
    });
    expect(manifest?.spec).toEqual({
      podSelector: { matchLabels: { 'enclave.dev/session-id': 'api', 'enclave.dev/role': 'workload' } },
      policyTypes: ['Egress'],
      egress: [
        {
          to: [{ podSelector: { matchLabels: { 'enclave.dev/role': 'relay', 'enclave.dev/relay-scope': plan.fingerprint } } }],
          ports: [{ port: 3128, protocol: 'TCP' }],
        },
        {
          to: [{ namespaceSelector: {} }],
          ports: [
            { port: 53, protocol: 'UDP' },
            { port: 53, protocol: 'TCP' },
          ],
        },
      ],
    });
  });

  it('labels shared relay objects by scope, not by session', () => {
    const manifest = planResourceManifest(resource('relay'), plan);
    expect(manifest?.kind).toBe('Deployment');
    expect(manifest?.metadata.labels).toEqual({ 'enclave.dev/relay-scope': plan.fingerprint, 'enclave.dev/role': 'relay' });
  });

  it('exposes the relay through a service on the relay port', () => {
    expect(planResourceManifest(resource('relay-service'), plan)?.spec).toEqual({
      selector: { 'enclave.dev/role': 'relay', 'enclave.dev/relay-scope': plan.fingerprint },
      ports: [{ name: 'proxy', port: 3128, targetPort: 3128, protocol: 'TCP' }],
    });
  });

  it('has nothing to apply for an unrestricted plan', () => {
    const direct = compileIsolationPlan({
      sessionId: 'api',
      network: { mode: 'unrestricted', allowedDomains: [] },
      capabilities: { isolation: 'policy', sharedRelay: true },
      relayImage: 'enclave-relay:latest',
      relayPort: 3128,
    });
    expect(direct.resources).toEqual([]);
  });
});

describe('planResourceRef', () => {
  it('maps plan kinds onto kubectl kinds', () => {
    expect(planResourceRef(resource('deny-egress'))).toEqual({ kind: 'networkpolicy', name: 'enclave-api-deny-egress' });
    expect(planResourceRef(resource('relay'))).toEqual({ kind: 'deployment', name: `relay-${plan.fingerprint}` });
    expect(planResourceRef(resource('relay-service'))).toEqual({ kind: 'service', name: `relay-${plan.fingerprint}` });
    expect(planResourceRef({ kind: 'network', name: 'enclave-net-api', shared: false, internal: true })).toBeNull();
  });
});

describe('credentialSecret', () => {
  it('flattens paths into secret keys', () => {
    expect(secretKey('configurations/config_default')).toBe('configurations_config_default');
  });

  it('stores file content base64-encoded', () => {
    const secret = credentialSecret('api', gcloud, [{ path: 'active_config', content: Buffer.from('default') }]);
    expect(secret.metadata).toEqual({
      name: 'enclave-api-gcloud',
      labels: { 'enclave.dev/session-id': 'api', 'enclave.dev/role': 'credentials' },
    });
    expect(secret.data).toEqual({ active_config: 'ZGVmYXVsdA==' });
  });
});

describe('workloadStatefulSet', () => {
  const manifest = workloadStatefulSet(session, plan, {
    image: 'registry.test/enclave-agent:abc',
    namespace: 'agents',
    storageClass: 'standard',
    volumeSize: '20Gi',
    mounted: [gcloud],
  });

  it('claims the workspace through a volume claim template', () => {
    expect(manifest.spec).toMatchObject({
      replicas: 1,
      serviceName: 'enclave-api',
      volumeClaimTemplates: [
        {
          metadata: { name: 'workspace', labels: { 'enclave.dev/session-id': 'api' } },
          spec: {
            accessModes: ['ReadWriteOnce'],
            resources: { requests: { storage: '20Gi' } },
            storageClassName: 'standard',
          },
        },
      ],
    });
  });

  it('carries the relay scope so shared relays know who uses them', () => {
    expect(manifest.metadata.labels).toEqual({
      'enclave.dev/session-id': 'api',
      'enclave.dev/role': 'workload',
      'enclave.dev/relay-scope': plan.fingerprint,
    });
  });

  it('mounts each credential secret read-only at its target', () => {
    expect(manifest.spec).toMatchObject({
      template: {
        spec: {
          containers: [
            {
              volumeMounts: [
                { name: 'workspace', mountPath: '/workspace' },
                { name: 'cred-gcloud', mountPath: '/home/agent/.config/gcloud', readOnly: true },
              ],
            },
          ],
          volumes: [
            {
              name: 'cred-gcloud',
              secret: {
                secretName: 'enclave-api-gcloud',
                optional: true,
                defaultMode: 0o440,
                items: [{ key: 'application_default_credentials.json', path: 'application_default_credentials.json' }],
              },
            },
          ],
        },
      },
    });
  });

  it('points the proxy variables at the relay service', () => {
    expect(manifest.spec).toMatchObject({
      template: {
        spec: {
          containers: [
            {
              env: expect.arrayContaining([{ name: 'HTTPS_PROXY', value: `http://relay-${plan.fingerprint}:3128` }]),
            },
          ],
        },
      },
    });
  });
});

describe('list', () => {
  it('wraps objects in a List', () => {
    expect(list([])).toEqual({ apiVersion: 'v1', kind: 'List', items: [] });
  });
});
