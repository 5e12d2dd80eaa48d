/**
 * Domain allowlist patterns.
 *
 *   example.com      the host itself
 *   .example.com     the domain and every subdomain
 *   *.example.com    same as .example.com
 *
 * Patterns are stored normalized: lowercase, no trailing dot, wildcard
 * written as a leading dot.
 */

import { createHash } from 'crypto';
import type { NetworkSettings } from '../types/index.js';
import { ValidationError } from '../errors.js';

export const UNRESTRICTED = 'unrestricted';

const LABEL = /^[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?$/;

function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.$/, '');
}

function isValidHostname(host: string): boolean {
  return host.length > 0 && host.length <= 253 && host.split('.').every((label) => label.length <= 63 && LABEL.test(label));
}

export function normalizePattern(raw: string): string {
  let pattern = normalizeHost(raw);
  let wildcard = false;
  if (pattern.startsWith('*.')) {
    wildcard = true;
    pattern = pattern.slice(2);
  } else if (pattern.startsWith('.')) {
    wildcard = true;
    pattern = pattern.slice(1);
  }
  if (!isValidHostname(pattern)) {
    throw new ValidationError(`Invalid domain pattern '${raw}'`);
  }
  return wildcard ? `.${pattern}` : pattern;
}

/**
 * Normalize and de-duplicate, keeping first-seen order.
 */
export function normalizeAllowlist(patterns: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  for (const raw of patterns) {
    seen.add(normalizePattern(raw));
  }
  return [...seen];
}

export function hostMatches(host: string, patterns: ReadonlyArray<string>): boolean {
  const target = normalizeHost(host);
  if (!target) return false;
  return patterns.some((pattern) =>
    pattern.startsWith('.') ? target === pattern.slice(1) || target.endsWith(pattern) : target === pattern,
  );
}

/**
 * Resolve what the user asked for into the session's network settings.
 * `undefined` means "use the configured default allowlist".
 */
export function resolveNetworkSettings(
  requested: ReadonlyArray<string> | typeof UNRESTRICTED | undefined,
  defaults: ReadonlyArray<string>,
): NetworkSettings {
  if (requested === UNRESTRICTED) {
    return { mode: 'unrestricted', allowedDomains: [] };
  }
  if (requested === undefined || requested.length === 0) {
    const allowedDomains = normalizeAllowlist(defaults);
    if (allowedDomains.length === 0) {
      throw new ValidationError('The default allowlist is empty; pass --allow-domain or configure allowedDomains');
    }
    return { mode: 'restricted', allowedDomains };
  }
  if (requested.some((entry) => entry.trim().toLowerCase() === UNRESTRICTED)) {
    if (requested.length > 1) {
      throw new ValidationError(`'${UNRESTRICTED}' cannot be combined with domain patterns`);
    }
    return { mode: 'unrestricted', allowedDomains: [] };
  }
  return { mode: 'custom-allowlist', allowedDomains: normalizeAllowlist(requested) };
}

/** Stable short digest of the allowlist, independent of order. */
export function allowlistFingerprint(patterns: ReadonlyArray<string>): string {
  const sorted = [...new Set(patterns)].sort();
  return createHash('sha256').update(sorted.join('\n')).digest('hex').slice(0, 10);
}
