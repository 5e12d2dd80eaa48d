/**
 * Session ids and the substrate resource names derived from them.
 */

import { createHash } from 'crypto';
import { basename, resolve } from 'path';
import { ValidationError } from '../errors.js';

const MAX_PREFIX_LENGTH = 20;
const SESSION_ID_PATTERN = /^[a-z0-9]([a-z0-9-]{0,38}[a-z0-9])?$/;

/**
 * Lowercase, collapse everything outside `[a-z0-9-]` into single dashes,
 * trim dashes from both ends.
 */
export function sanitizeName(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * `<dir-name>-<8 hex of sha256(path)>`, stable for one workspace path.
 */
export function sessionIdForWorkspace(workspace: string): string {
  const absolute = resolve(workspace);
  const prefix = sanitizeName(basename(absolute)).slice(0, MAX_PREFIX_LENGTH).replace(/-$/, '') || 'session';
  const digest = createHash('sha256').update(absolute).digest('hex').slice(0, 8);
  return `${prefix}-${digest}`;
}

/**
 * Ids end up in container, network and Kubernetes object names, so they
 * must be DNS labels short enough to take the longest prefix we add.
 */
export function assertValidSessionId(id: string): void {
  if (!SESSION_ID_PATTERN.test(id)) {
    throw new ValidationError(
      `Invalid session id '${id}': use 1-40 lowercase letters, digits or dashes, starting and ending with a letter or digit`,
      { sessionId: id },
    );
  }
}

export const names = {
  workload: (id: string): string => `enclave-${id}`,
  pod: (id: string): string => `enclave-${id}-0`,
  volumeClaim: (id: string): string => `workspace-enclave-${id}-0`,
  network: (id: string): string => `enclave-net-${id}`,
  localRelay: (id: string): string => `enclave-relay-${id}`,
  sharedRelay: (fingerprint: string): string => `relay-${fingerprint}`,
  credentialSecret: (id: string, artifact: string): string => `enclave-${id}-${artifact}`,
};
