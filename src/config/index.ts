/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import type { BackendKind, EnclaveConfig } from '../types/index.js';
import type { IStorage, IEnvironment } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { ValidationError } from '../errors.js';

export const DEFAULT_IMAGE = 'enclave-agent:latest';
export const DEFAULT_RELAY_IMAGE = 'enclave-relay:latest';
export const DEFAULT_RELAY_PORT = 3128;
export const DEFAULT_VOLUME_SIZE = '10Gi';
export const DEFAULT_CREDENTIAL_TIMEOUT_MINUTES = 60;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;

/** Domains the agent needs to reach its model provider and cloud auth. */
export const DEFAULT_ALLOWED_DOMAINS = [
  '.googleapis.com',
  '.google.com',
  '.anthropic.com',
];

export interface StoredConfig {
  backend?: BackendKind;
  image?: string;
  relayImage?: string;
  containerEngine?: 'docker' | 'podman';
  kubeContext?: string;
  namespace?: string;
  registry?: string;
  storageClass?: string;
  volumeSize?: string;
  allowedDomains?: string[];
  credentialTimeoutMinutes?: number;
  credentialCheckIntervalSeconds?: number;
  watchdogEnabled?: boolean;
  provisionRetries?: number;
  readyTimeoutSeconds?: number;
}

const STORED_KEYS: ReadonlyArray<keyof StoredConfig> = [
  'backend',
  'image',
  'relayImage',
  'containerEngine',
  'kubeContext',
  'namespace',
  'registry',
  'storageClass',
  'volumeSize',
  'allowedDomains',
  'credentialTimeoutMinutes',
  'credentialCheckIntervalSeconds',
  'watchdogEnabled',
  'provisionRetries',
  'readyTimeoutSeconds',
];

function parseBackend(raw: string | undefined): BackendKind | undefined {
  return raw === 'local' || raw === 'cluster' ? raw : undefined;
}

function parseEngine(raw: string | undefined): 'docker' | 'podman' | undefined {
  return raw === 'docker' || raw === 'podman' ? raw : undefined;
}

function parsePositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(raw.toLowerCase())) return false;
  return undefined;
}

export function parseDomainList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const domains = raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
  return domains.length > 0 ? domains : undefined;
}

export class ConfigManager {
  private storage: IStorage;
  private env: IEnvironment;
  private configDir: string;
  private configFile: string;
  private _config?: EnclaveConfig;
  private envLoaded = false;

  constructor(storage?: IStorage, env?: IEnvironment, configDir?: string) {
    this.storage = storage || new FileStorage();
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || this.env.get('ENCLAVE_HOME') || join(this.env.homedir(), '.enclave');
    this.configFile = join(this.configDir, 'config.json');
  }

  get config(): EnclaveConfig {
    if (!this._config) {
      // Lazy load environment variables only once
      if (!this.envLoaded) {
        loadEnv();
        this.envLoaded = true;
      }

      const stored = this.loadStoredConfig();
      const env = this.env;

      // Merge: stored config > environment variables > defaults
      const merged: EnclaveConfig = {
        backend: stored.backend || parseBackend(env.get('ENCLAVE_BACKEND')) || 'local',
        image: stored.image || env.get('ENCLAVE_IMAGE') || DEFAULT_IMAGE,
        relayImage: stored.relayImage || env.get('ENCLAVE_RELAY_IMAGE') || DEFAULT_RELAY_IMAGE,
        relayPort: DEFAULT_RELAY_PORT,
        containerEngine: stored.containerEngine || parseEngine(env.get('ENCLAVE_CONTAINER_ENGINE')) || 'docker',
        volumeSize: stored.volumeSize || env.get('ENCLAVE_VOLUME_SIZE') || DEFAULT_VOLUME_SIZE,
        allowedDomains:
          stored.allowedDomains || parseDomainList(env.get('ENCLAVE_ALLOWED_DOMAINS')) || [...DEFAULT_ALLOWED_DOMAINS],
        credentialTimeoutMinutes:
          stored.credentialTimeoutMinutes ||
          parsePositiveInt(env.get('ENCLAVE_CREDENTIAL_TIMEOUT')) ||
          DEFAULT_CREDENTIAL_TIMEOUT_MINUTES,
        credentialCheckIntervalSeconds:
          stored.credentialCheckIntervalSeconds ||
          parsePositiveInt(env.get('ENCLAVE_CREDENTIAL_CHECK_INTERVAL')) ||
          DEFAULT_CHECK_INTERVAL_SECONDS,
        watchdogEnabled: stored.watchdogEnabled ?? parseFlag(env.get('ENCLAVE_CREDENTIAL_WATCHDOG')) ?? true,
        provisionRetries: stored.provisionRetries || 3,
        readyTimeoutSeconds: stored.readyTimeoutSeconds || 300,
        stateDir: this.configDir,
      };

      const kubeContext = stored.kubeContext || env.get('ENCLAVE_KUBE_CONTEXT');
      if (kubeContext) merged.kubeContext = kubeContext;
      const namespace = stored.namespace || env.get('ENCLAVE_NAMESPACE');
      if (namespace) merged.namespace = namespace;
      const registry = stored.registry || env.get('ENCLAVE_REGISTRY');
      if (registry) merged.registry = registry;
      const storageClass = stored.storageClass || env.get('ENCLAVE_STORAGE_CLASS');
      if (storageClass) merged.storageClass = storageClass;

      this._config = merged;
    }
    return this._config;
  }

  loadStoredConfig(): StoredConfig {
    if (!this.storage.exists(this.configFile)) {
      return {};
    }
    try {
      const data = this.storage.readFile(this.configFile, 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return normalizeStoredConfig(parsed);
    } catch {
      return {};
    }
  }

  saveConfig(updates: Partial<StoredConfig>): void {
    if (!this.storage.exists(this.configDir)) {
      this.storage.mkdirp(this.configDir);
    }

    const current = this.loadStoredConfig();
    const newConfig = normalizeStoredConfig({ ...current, ...updates });
    this.storage.writeFile(this.configFile, JSON.stringify(newConfig, null, 2));
    this.storage.chmod(this.configFile, 0o600);

    // Invalidate cached config
    this._config = undefined;
  }

  /**
   * Apply a `key=value` assignment from the command line.
   */
  setFromString(assignment: string): void {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      throw new ValidationError(`Expected key=value, got '${assignment}'`);
    }
    const key = assignment.slice(0, eq).trim();
    const raw = assignment.slice(eq + 1).trim();
    if (!isStoredKey(key)) {
      throw new ValidationError(`Unknown config key '${key}'. Known keys: ${STORED_KEYS.join(', ')}`);
    }
    const normalized = normalizeStoredConfig({ [key]: coerceValue(key, raw) });
    if (normalized[key] === undefined) {
      throw new ValidationError(`Invalid value for ${key}: '${raw}'`);
    }
    this.saveConfig(normalized);
  }

  getConfigValue<K extends keyof StoredConfig>(key: K): StoredConfig[K] {
    const stored = this.loadStoredConfig();
    return stored[key];
  }

  getConfigPath(): string {
    return this.configFile;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  resetConfig(): void {
    this._config = undefined;
    this.envLoaded = false;
  }
}

function isStoredKey(key: string): key is keyof StoredConfig {
  return (STORED_KEYS as ReadonlyArray<string>).includes(key);
}

function coerceValue(key: keyof StoredConfig, raw: string): unknown {
  switch (key) {
    case 'allowedDomains':
      return parseDomainList(raw);
    case 'credentialTimeoutMinutes':
    case 'credentialCheckIntervalSeconds':
    case 'provisionRetries':
    case 'readyTimeoutSeconds':
      return parsePositiveInt(raw);
    case 'watchdogEnabled':
      return parseFlag(raw);
    default:
      return raw;
  }
}

/**
 * Drop unknown keys and values of the wrong shape from a parsed config file.
 */
export function normalizeStoredConfig(raw: unknown): StoredConfig {
  if (!raw || typeof raw !== 'object') return {};
  const source = new Map(Object.entries(raw));
  const result: StoredConfig = {};

  const str = (key: keyof StoredConfig): string | undefined => {
    const value = source.get(key);
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
  };
  const int = (key: keyof StoredConfig): number | undefined => {
    const value = source.get(key);
    return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
  };

  const backend = parseBackend(str('backend'));
  if (backend) result.backend = backend;
  const engine = parseEngine(str('containerEngine'));
  if (engine) result.containerEngine = engine;

  for (const key of ['image', 'relayImage', 'kubeContext', 'namespace', 'registry', 'storageClass', 'volumeSize'] as const) {
    const value = str(key);
    if (value) result[key] = value;
  }
  for (const key of ['credentialTimeoutMinutes', 'credentialCheckIntervalSeconds', 'provisionRetries', 'readyTimeoutSeconds'] as const) {
    const value = int(key);
    if (value) result[key] = value;
  }

  const domains = source.get('allowedDomains');
  if (Array.isArray(domains)) {
    const cleaned = domains.filter((d): d is string => typeof d === 'string' && d.trim().length > 0).map((d) => d.trim());
    if (cleaned.length > 0) result.allowedDomains = cleaned;
  }
  const watchdog = source.get('watchdogEnabled');
  if (typeof watchdog === 'boolean') result.watchdogEnabled = watchdog;

  return result;
}
