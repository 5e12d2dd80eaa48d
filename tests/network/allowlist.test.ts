import { describe, expect, it } from 'vitest';
import {
  allowlistFingerprint,
  hostMatches,
  normalizeAllowlist,
  normalizePattern,
  resolveNetworkSettings,
} from '../../src/network/allowlist.js';
import { ValidationError } from '../../src/errors.js';

describe('normalizePattern', () => {
  it('writes wildcards as a leading dot', () => {
    expect(normalizePattern('*.Example-API.com')).toBe('.example-api.com');
    expect(normalizePattern('.example-api.com')).toBe('.example-api.com');
  });

  it('lowercases and drops a trailing dot', () => {
    expect(normalizePattern('API.Anthropic.com.')).toBe('api.anthropic.com');
  });

  it.each(['', '*.', 'exa mple.com', 'http://example.com', '-bad.com'])('rejects %j', (raw) => {
    expect(() => normalizePattern(raw)).toThrow(ValidationError);
  });
});

describe('normalizeAllowlist', () => {
  it('de-duplicates equivalent patterns in first-seen order', () => {
    expect(normalizeAllowlist(['*.b.com', 'a.com', '.B.com', 'A.com'])).toEqual(['.b.com', 'a.com']);
  });
});

describe('hostMatches', () => {
  const patterns = ['.example-api.com', 'registry.npmjs.org'];

  it('matches subdomains of a wildcard pattern and the domain itself', () => {
    expect(hostMatches('foo.example-api.com', patterns)).toBe(true);
    expect(hostMatches('a.b.example-api.com', patterns)).toBe(true);
    expect(hostMatches('example-api.com', patterns)).toBe(true);
  });

  it('matches exact patterns only exactly', () => {
    expect(hostMatches('registry.npmjs.org', patterns)).toBe(true);
    expect(hostMatches('evil.registry.npmjs.org', patterns)).toBe(false);
  });

  it('does not match look-alike suffixes', () => {
    expect(hostMatches('other.com', patterns)).toBe(false);
    expect(hostMatches('notexample-api.com', patterns)).toBe(false);
    expect(hostMatches('example-api.com.evil.net', patterns)).toBe(false);
  });

  it('ignores case and a trailing dot', () => {
    expect(hostMatches('FOO.Example-API.com.', patterns)).toBe(true);
  });

  it('never matches an empty host', () => {
    expect(hostMatches('', patterns)).toBe(false);
  });
});

describe('resolveNetworkSettings', () => {
  const defaults = ['.anthropic.com', '.googleapis.com'];

  it('uses the defaults when nothing is requested', () => {
    expect(resolveNetworkSettings(undefined, defaults)).toEqual({ mode: 'restricted', allowedDomains: defaults });
    expect(resolveNetworkSettings([], defaults)).toEqual({ mode: 'restricted', allowedDomains: defaults });
  });

  it('treats a requested list as a custom allowlist', () => {
    expect(resolveNetworkSettings(['*.example-api.com'], defaults)).toEqual({
      mode: 'custom-allowlist',
      allowedDomains: ['.example-api.com'],
    });
  });

  it('accepts the unrestricted sentinel as a value or a single entry', () => {
    expect(resolveNetworkSettings('unrestricted', defaults)).toEqual({ mode: 'unrestricted', allowedDomains: [] });
    expect(resolveNetworkSettings(['Unrestricted'], defaults)).toEqual({ mode: 'unrestricted', allowedDomains: [] });
  });

  it('refuses to mix the sentinel with domains', () => {
    expect(() => resolveNetworkSettings(['unrestricted', 'a.com'], defaults)).toThrow(ValidationError);
  });

  it('refuses an empty default allowlist', () => {
    expect(() => resolveNetworkSettings(undefined, [])).toThrow(ValidationError);
  });
});

describe('allowlistFingerprint', () => {
  it('ignores order and duplicates', () => {
    expect(allowlistFingerprint(['b.com', 'a.com'])).toBe(allowlistFingerprint(['a.com', 'b.com', 'a.com']));
  });

  it('differs between allowlists', () => {
    expect(allowlistFingerprint(['a.com'])).not.toBe(allowlistFingerprint(['b.com']));
  });

  it('is ten hex characters', () => {
    expect(allowlistFingerprint(['a.com'])).toMatch(/^[0-9a-f]{10}$/);
  });
});
