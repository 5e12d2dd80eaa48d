/**
 * Kubernetes objects for the cluster backend, built from an isolation plan.
 * All objects are applied with `kubectl apply`, so building them twice
 * from the same plan converges on the same objects.
 */

import type { Session } from '../types/index.js';
import { artifactMountPath, type CredentialArtifact } from '../credentials/bundle.js';
import {
  LABEL_ROLE,
  LABEL_RELAY_SCOPE,
  LABEL_SESSION,
  type Labels,
  type NetworkIsolationPlan,
  type PlanResource,
  type PortRule,
  type RelaySpec,
} from '../network/plan.js';
import { names } from '../session/naming.js';

export interface KubeObject {
  apiVersion: string;
  kind: string;
  metadata: { name: string; namespace?: string; labels?: Labels };
  [field: string]: unknown;
}

export const WORKSPACE_MOUNT = '/workspace';
export const CREDENTIALS_ROLE = 'credentials';
/** Role of the policy a session reaches its relay through; counts the relay's users. */
export const RELAY_CLIENT_ROLE = 'relay-client';

export interface WorkloadOptions {
  image: string;
  namespace?: string;
  storageClass?: string;
  volumeSize: string;
  /** Mounted artifacts, each backed by the Secret `names.credentialSecret`. */
  mounted: CredentialArtifact[];
}

function meta(name: string, labels: Labels, namespace?: string): KubeObject['metadata'] {
  return namespace ? { name, namespace, labels } : { name, labels };
}

function ports(rules: PortRule[]): Array<{ port: number; protocol: string }> {
  return rules.map((rule) => ({ port: rule.port, protocol: rule.protocol }));
}

function ownerLabels(resource: PlanResource, plan: NetworkIsolationPlan, relay: RelaySpec): Labels {
  if (resource.shared) return { [LABEL_RELAY_SCOPE]: relay.scope, [LABEL_ROLE]: 'relay' };
  const labels: Labels = { [LABEL_SESSION]: plan.sessionId, [LABEL_RELAY_SCOPE]: relay.scope };
  if (resource.kind === 'allow-egress') labels[LABEL_ROLE] = RELAY_CLIENT_ROLE;
  return labels;
}

/**
 * Manifest for one plan resource. The `network` kind has no cluster object.
 */
export function planResourceManifest(
  resource: PlanResource,
  plan: NetworkIsolationPlan,
  namespace?: string,
): KubeObject | null {
  const relay = plan.relay;
  if (!relay) return null;
  const labels = ownerLabels(resource, plan, relay);

  switch (resource.kind) {
    case 'network':
      return null;
    case 'deny-egress':
      return {
        apiVersion: 'networking.k8s.io/v1',
        kind: 'NetworkPolicy',
        metadata: meta(resource.name, labels, namespace),
        spec: {
          podSelector: { matchLabels: resource.podSelector },
          policyTypes: ['Egress'],
          egress: [],
        },
      };
    case 'allow-egress':
      return {
        apiVersion: 'networking.k8s.io/v1',
        kind: 'NetworkPolicy',
        metadata: meta(resource.name, labels, namespace),
        spec: {
          podSelector: { matchLabels: resource.podSelector },
          policyTypes: ['Egress'],
          egress: [
            {
              to: [{ podSelector: { matchLabels: resource.to } }],
              ports: ports(resource.ports.filter((rule) => rule.port !== 53)),
            },
            {
              to: [{ namespaceSelector: {} }],
              ports: ports(resource.ports.filter((rule) => rule.port === 53)),
            },
          ],
        },
      };
    case 'relay-egress':
      return {
        apiVersion: 'networking.k8s.io/v1',
        kind: 'NetworkPolicy',
        metadata: meta(resource.name, labels, namespace),
        spec: {
          podSelector: { matchLabels: resource.podSelector },
          policyTypes: ['Egress'],
          egress: [{ ports: ports(resource.ports) }],
        },
      };
    case 'relay':
      return {
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: meta(resource.name, labels, namespace),
        spec: {
          replicas: 1,
          selector: { matchLabels: relay.labels },
          template: {
            metadata: { labels: relay.labels },
            spec: {
              containers: [
                {
                  name: 'relay',
                  image: relay.image,
                  args: ['relay', '--port', String(relay.port)],
                  env: [{ name: 'ENCLAVE_ALLOWED_DOMAINS', value: relay.allowedDomains.join(',') }],
                  ports: [{ containerPort: relay.port, protocol: 'TCP' }],
                  resources: {
                    requests: { cpu: '50m', memory: '64Mi' },
                    limits: { cpu: '500m', memory: '256Mi' },
                  },
                },
              ],
            },
          },
        },
      };
    case 'relay-service':
      return {
        apiVersion: 'v1',
        kind: 'Service',
        metadata: meta(resource.name, labels, namespace),
        spec: {
          selector: resource.selector,
          ports: [{ name: 'proxy', port: resource.port, targetPort: resource.port, protocol: 'TCP' }],
        },
      };
  }
}

/** `kubectl delete` target for a plan resource. */
export function planResourceRef(resource: PlanResource): { kind: string; name: string } | null {
  switch (resource.kind) {
    case 'network':
      return null;
    case 'deny-egress':
    case 'allow-egress':
    case 'relay-egress':
      return { kind: 'networkpolicy', name: resource.name };
    case 'relay':
      return { kind: 'deployment', name: resource.name };
    case 'relay-service':
      return { kind: 'service', name: resource.name };
  }
}

/** Secret keys allow `[-._a-zA-Z0-9]`; nested paths are flattened. */
export function secretKey(path: string): string {
  return path.replace(/[^-._a-zA-Z0-9]/g, '_');
}

export function credentialSecret(
  sessionId: string,
  artifact: CredentialArtifact,
  files: Array<{ path: string; content: Buffer }>,
  namespace?: string,
): KubeObject {
  const data: Record<string, string> = {};
  for (const file of files) {
    data[secretKey(file.path)] = file.content.toString('base64');
  }
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: meta(
      names.credentialSecret(sessionId, artifact.name),
      { [LABEL_SESSION]: sessionId, [LABEL_ROLE]: CREDENTIALS_ROLE },
      namespace,
    ),
    type: 'Opaque',
    data,
  };
}

function proxyEnv(plan: NetworkIsolationPlan): Array<{ name: string; value: string }> {
  if (!plan.relay) return [];
  const url = `http://${plan.relay.host}:${plan.relay.port}`;
  return [
    { name: 'HTTP_PROXY', value: url },
    { name: 'HTTPS_PROXY', value: url },
    { name: 'http_proxy', value: url },
    { name: 'https_proxy', value: url },
    { name: 'NO_PROXY', value: 'localhost,127.0.0.1' },
    { name: 'no_proxy', value: 'localhost,127.0.0.1' },
  ];
}

export function workloadStatefulSet(session: Session, plan: NetworkIsolationPlan, options: WorkloadOptions): KubeObject {
  const name = names.workload(session.id);
  const labels: Labels = { ...plan.workloadLabels };
  if (plan.relay) labels[LABEL_RELAY_SCOPE] = plan.relay.scope;

  const volumes = options.mounted.map((artifact) => ({
    name: `cred-${artifact.name}`,
    secret: {
      secretName: names.credentialSecret(session.id, artifact.name),
      optional: true,
      defaultMode: 0o440,
      items: artifact.files.map((file) => ({ key: secretKey(file.path), path: file.path })),
    },
  }));
  const volumeMounts = [
    { name: 'workspace', mountPath: WORKSPACE_MOUNT },
    ...options.mounted.map((artifact) => ({
      name: `cred-${artifact.name}`,
      mountPath: artifactMountPath(artifact),
      readOnly: true,
    })),
  ];

  const claimSpec: Record<string, unknown> = {
    accessModes: ['ReadWriteOnce'],
    resources: { requests: { storage: options.volumeSize } },
  };
  if (options.storageClass) claimSpec.storageClassName = options.storageClass;

  return {
    apiVersion: 'apps/v1',
    kind: 'StatefulSet',
    metadata: meta(name, labels, options.namespace),
    spec: {
      replicas: 1,
      serviceName: name,
      selector: { matchLabels: { [LABEL_SESSION]: session.id, [LABEL_ROLE]: 'workload' } },
      template: {
        metadata: { labels },
        spec: {
          securityContext: { runAsUser: 1000, runAsGroup: 1000, fsGroup: 1000 },
          containers: [
            {
              name: 'agent',
              image: options.image,
              imagePullPolicy: 'Always',
              workingDir: WORKSPACE_MOUNT,
              stdin: true,
              tty: true,
              env: proxyEnv(plan),
              volumeMounts,
              resources: {
                requests: { cpu: '1', memory: '4Gi' },
                limits: { cpu: '4', memory: '8Gi' },
              },
            },
          ],
          volumes,
        },
      },
      volumeClaimTemplates: [
        {
          metadata: { name: 'workspace', labels: { [LABEL_SESSION]: session.id } },
          spec: claimSpec,
        },
      ],
    },
  };
}

/** `kubectl apply` takes a List as one document. */
export function list(items: KubeObject[]): { apiVersion: 'v1'; kind: 'List'; items: KubeObject[] } {
  return { apiVersion: 'v1', kind: 'List', items };
}
