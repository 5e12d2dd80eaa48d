/**
 * Session registry
 * Persists session records under ~/.enclave/sessions/
 */

import { join, resolve } from 'path';
import { homedir } from 'os';
import type { BackendKind, NetworkMode, Session, SessionState } from '../types/index.js';
import type { IStorage, ISessionStore } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';

const RECORD_FILE = 'session.json';

const STATES: ReadonlyArray<SessionState> = ['created', 'running', 'stopped', 'deleted'];
const NETWORK_MODES: ReadonlyArray<NetworkMode> = ['restricted', 'unrestricted', 'custom-allowlist'];

function isBackendKind(value: unknown): value is BackendKind {
  return value === 'local' || value === 'cluster';
}

function isSessionState(value: unknown): value is SessionState {
  return typeof value === 'string' && (STATES as ReadonlyArray<string>).includes(value);
}

function isNetworkMode(value: unknown): value is NetworkMode {
  return typeof value === 'string' && (NETWORK_MODES as ReadonlyArray<string>).includes(value);
}

function field(record: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, key) ? Reflect.get(record, key) : undefined;
}

/**
 * Rebuild a session record from parsed JSON, dropping records that are
 * missing required fields.
 */
export function normalizeSession(raw: unknown): Session | undefined {
  if (!raw || typeof raw !== 'object') return undefined;
  const id = field(raw, 'id');
  const state = field(raw, 'state');
  const backend = field(raw, 'backend');
  const workspace = field(raw, 'workspace');
  const image = field(raw, 'image');
  const createdAt = field(raw, 'createdAt');
  if (typeof id !== 'string' || !isSessionState(state) || !isBackendKind(backend)) return undefined;
  if (typeof workspace !== 'string' || typeof image !== 'string' || typeof createdAt !== 'string') return undefined;

  const lastActivityAt = field(raw, 'lastActivityAt');
  const network = field(raw, 'network');
  let mode: NetworkMode = 'restricted';
  let allowedDomains: string[] = [];
  if (network && typeof network === 'object') {
    const rawMode = field(network, 'mode');
    if (isNetworkMode(rawMode)) mode = rawMode;
    const rawDomains = field(network, 'allowedDomains');
    if (Array.isArray(rawDomains)) {
      allowedDomains = rawDomains.filter((d): d is string => typeof d === 'string');
    }
  }

  const session: Session = {
    id,
    state,
    backend,
    workspace,
    image,
    createdAt,
    lastActivityAt: typeof lastActivityAt === 'string' ? lastActivityAt : createdAt,
    network: { mode, allowedDomains },
  };

  const credentials = field(raw, 'credentials');
  if (credentials && typeof credentials === 'object') {
    const syncedAt = field(credentials, 'syncedAt');
    const stale = field(credentials, 'stale');
    const evictedAt = field(credentials, 'evictedAt');
    if (typeof syncedAt === 'string') {
      session.credentials = { syncedAt, stale: stale === true };
      if (typeof evictedAt === 'string') session.credentials.evictedAt = evictedAt;
    }
  }
  const watchdogPid = field(raw, 'watchdogPid');
  if (typeof watchdogPid === 'number' && Number.isInteger(watchdogPid)) {
    session.watchdogPid = watchdogPid;
  }
  return session;
}

/**
 * One record file per session, `<stateDir>/sessions/<id>/session.json`.
 *
 * Nothing is cached: every read goes to disk and every write replaces one
 * session's file through a rename, so processes working on different ids
 * never overwrite each other's records.
 */
export class SessionStore implements ISessionStore {
  private storage: IStorage;
  private sessionsDir: string;

  constructor(storage?: IStorage, stateDir?: string) {
    this.storage = storage || new FileStorage();
    this.sessionsDir = join(stateDir || join(homedir(), '.enclave'), 'sessions');
  }

  recordPath(id: string): string {
    return join(this.sessionsDir, id, RECORD_FILE);
  }

  get(id: string): Session | undefined {
    return this.read(id);
  }

  put(session: Session): void {
    const dir = join(this.sessionsDir, session.id);
    if (!this.storage.exists(dir)) this.storage.mkdirp(dir);
    const path = this.recordPath(session.id);
    const temp = `${path}.${process.pid}.tmp`;
    this.storage.writeFile(temp, JSON.stringify(session, null, 2));
    this.storage.rename(temp, path);
  }

  /** Drops the record together with the rest of the session's directory. */
  remove(id: string): void {
    this.storage.remove(join(this.sessionsDir, id));
  }

  list(): Session[] {
    if (!this.storage.exists(this.sessionsDir)) return [];
    const sessions: Session[] = [];
    for (const id of this.storage.readdir(this.sessionsDir)) {
      const session = this.read(id);
      if (session) sessions.push(session);
    }
    return sessions.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  findByWorkspace(backend: BackendKind, workspace: string): Session | undefined {
    const target = resolve(workspace);
    return this.list().find((session) => session.backend === backend && resolve(session.workspace) === target);
  }

  /** A missing, unreadable or mismatched record reads as no session. */
  private read(id: string): Session | undefined {
    const path = this.recordPath(id);
    if (!this.storage.exists(path)) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.storage.readFile(path, 'utf-8'));
    } catch {
      return undefined;
    }
    const session = normalizeSession(parsed);
    return session && session.id === id ? session : undefined;
  }
}
