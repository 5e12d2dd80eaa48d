/**
 * Credential bundle builder.
 *
 * Collects the authentication material a session needs from a fixed list of
 * host locations. Nothing outside that list is ever considered, and sources
 * that resolve into push-capable or identity-store locations are dropped.
 */

import { join, relative, isAbsolute, posix } from 'path';
import type { IEnvironment, IStorage } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';

export const AGENT_HOME = '/home/agent';

export type ArtifactSource = { type: 'path'; path: string } | { type: 'inline'; content: string };

export interface ArtifactFile {
  /** Path relative to the artifact target. */
  path: string;
  source: ArtifactSource;
}

export interface CredentialArtifact {
  name: string;
  kind: 'directory' | 'file';
  /** For `file` artifacts, the file itself; for `directory`, a listing of what goes in it. */
  files: ArtifactFile[];
  target: string;
  readOnly: true;
  /**
   * `mount`: bound read-only, removed on eviction.
   * `copy`: placed in the workload's writable area so the agent may update it.
   */
  delivery: 'mount' | 'copy';
}

export interface CredentialBundle {
  artifacts: CredentialArtifact[];
  builtAt: string;
}

/**
 * Read-only view of a home directory.
 */
export interface HomeView {
  readonly home: string;
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  /** Symlinks resolved. */
  realpath(path: string): string;
  readFile(path: string): string;
  readBytes(path: string): Buffer;
}

export class HostHomeView implements HomeView {
  readonly home: string;

  constructor(
    private storage: IStorage = new FileStorage(),
    env: IEnvironment = new SystemEnvironment(),
  ) {
    this.home = env.homedir();
  }

  exists(path: string): boolean {
    return this.storage.exists(path);
  }

  isDirectory(path: string): boolean {
    return this.storage.stat(path).isDirectory;
  }

  realpath(path: string): string {
    return this.storage.realpath(path);
  }

  readFile(path: string): string {
    return this.storage.readFile(path, 'utf-8');
  }

  readBytes(path: string): Buffer {
    return this.storage.readBuffer(path);
  }
}

interface Candidate {
  name: string;
  /** Relative to home. */
  source: string;
  kind: 'directory' | 'file';
  /** Directory candidates: the only entries taken from it. */
  entries?: string[];
  target: string;
  delivery: 'mount' | 'copy';
  transform?: (content: string) => string | null;
}

const CANDIDATES: Candidate[] = [
  {
    name: 'gcloud',
    source: '.config/gcloud',
    kind: 'directory',
    entries: [
      'application_default_credentials.json',
      'credentials.db',
      'access_tokens.db',
      'active_config',
    ],
    target: `${AGENT_HOME}/.config/gcloud`,
    delivery: 'mount',
  },
  {
    name: 'git-identity',
    source: '.gitconfig',
    kind: 'file',
    target: `${AGENT_HOME}/.config/git/config`,
    delivery: 'mount',
    transform: extractGitIdentity,
  },
  {
    name: 'agent-config',
    source: '.claude',
    kind: 'directory',
    entries: ['settings.json', '.credentials.json', 'statsig.json'],
    target: `${AGENT_HOME}/.claude`,
    delivery: 'copy',
  },
  {
    name: 'agent-settings',
    source: '.claude.json',
    kind: 'file',
    target: `${AGENT_HOME}/.claude.json`,
    delivery: 'copy',
  },
];

/** Never leave the host, whatever a symlink points at. Relative to home. */
const EXCLUDED = [
  '.ssh',
  '.git-credentials',
  '.config/gh',
  '.config/git/credentials',
  '.docker',
  '.kube',
  '.config/gcloud/configurations',
];

/**
 * Reduce a git config to its `[user]` section. Credential helpers, url
 * rewrites and everything else stay on the host. Returns null when there
 * is no identity to carry.
 */
export function extractGitIdentity(content: string): string | null {
  const lines: string[] = [];
  let inUser = false;
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    const section = /^\[([^\]]+)\]/.exec(line);
    if (section) {
      inUser = section[1].trim().toLowerCase() === 'user';
      continue;
    }
    if (!inUser || line === '' || line.startsWith('#') || line.startsWith(';')) continue;
    const entry = /^(name|email|signingkey)\s*=\s*(.*)$/i.exec(line);
    if (entry) lines.push(`\t${entry[1].toLowerCase()} = ${entry[2].trim()}`);
  }
  return lines.length > 0 ? `[user]\n${lines.join('\n')}\n` : null;
}

export class CredentialBundleBuilder {
  constructor(private clock: () => Date = () => new Date()) {}

  build(home: HomeView): CredentialBundle {
    const artifacts: CredentialArtifact[] = [];
    for (const candidate of CANDIDATES) {
      const artifact = this.collect(home, candidate);
      if (artifact) artifacts.push(artifact);
    }
    return { artifacts, builtAt: this.clock().toISOString() };
  }

  private collect(home: HomeView, candidate: Candidate): CredentialArtifact | null {
    const sourcePath = join(home.home, candidate.source);
    if (!home.exists(sourcePath)) return null;

    if (candidate.kind === 'file') {
      const file = this.resolveFile(home, sourcePath, candidate.transform);
      if (!file) return null;
      return {
        name: candidate.name,
        kind: 'file',
        files: [{ path: posix.basename(candidate.target), source: file }],
        target: candidate.target,
        readOnly: true,
        delivery: candidate.delivery,
      };
    }

    const realDir = this.resolveAllowed(home, sourcePath);
    if (!realDir || !home.isDirectory(realDir)) return null;

    const files: ArtifactFile[] = [];
    for (const entry of candidate.entries ?? []) {
      const source = this.resolveFile(home, join(sourcePath, entry));
      if (source) files.push({ path: entry, source });
    }
    if (files.length === 0) return null;

    return {
      name: candidate.name,
      kind: 'directory',
      files,
      target: candidate.target,
      readOnly: true,
      delivery: candidate.delivery,
    };
  }

  private resolveFile(
    home: HomeView,
    path: string,
    transform?: (content: string) => string | null,
  ): ArtifactSource | null {
    if (!home.exists(path)) return null;
    const real = this.resolveAllowed(home, path);
    if (!real || home.isDirectory(real)) return null;
    if (!transform) return { type: 'path', path: real };
    const content = transform(home.readFile(real));
    return content === null ? null : { type: 'inline', content };
  }

  /** Real path of `path`, or null when it lands somewhere excluded. */
  private resolveAllowed(home: HomeView, path: string): string | null {
    const real = home.realpath(path);
    const realHome = home.realpath(home.home);
    if (isExcluded(real, realHome) || isExcluded(path, home.home)) return null;
    return real;
  }
}

function isExcluded(path: string, home: string): boolean {
  const rel = relative(home, path);
  if (rel.startsWith('..') || isAbsolute(rel)) return false;
  const normalized = rel.split('\\').join('/');
  return EXCLUDED.some((excluded) => normalized === excluded || normalized.startsWith(`${excluded}/`));
}

/**
 * Directory an artifact is mounted at. File artifacts are mounted through
 * their parent directory so that emptying the mount source removes them.
 */
export function artifactMountPath(artifact: CredentialArtifact): string {
  return artifact.kind === 'file' ? posix.dirname(artifact.target) : artifact.target;
}

/**
 * Artifacts that are bound into the workload (and must vanish on eviction).
 */
export function mountedArtifacts(bundle: CredentialBundle): CredentialArtifact[] {
  return bundle.artifacts.filter((artifact) => artifact.delivery === 'mount');
}

export function copiedArtifacts(bundle: CredentialBundle): CredentialArtifact[] {
  return bundle.artifacts.filter((artifact) => artifact.delivery === 'copy');
}

/**
 * Load every file of an artifact, for substrates that need the content
 * rather than a host path (Secrets, `kubectl exec` writes).
 */
export function readArtifactFiles(
  home: Pick<HomeView, 'readBytes'>,
  artifact: CredentialArtifact,
): Array<{ path: string; content: Buffer }> {
  return artifact.files.map((file) => ({
    path: file.path,
    content: file.source.type === 'inline' ? Buffer.from(file.source.content, 'utf-8') : home.readBytes(file.source.path),
  }));
}
