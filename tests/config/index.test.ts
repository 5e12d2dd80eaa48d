/**
 * Tests for ConfigManager
 */

import { ConfigManager, DEFAULT_ALLOWED_DOMAINS, normalizeStoredConfig, type StoredConfig } from '../../src/config/index.js';
import { ValidationError } from '../../src/errors.js';
import { FakeEnvironment, MemoryStorage } from '../helpers/fakes.js';

describe('ConfigManager', () => {
  const configDir = '/test/config';
  const configFile = '/test/config/config.json';

  describe('initialization and defaults', () => {
    it('returns default config when no file and no env vars', () => {
      const manager = new ConfigManager(new MemoryStorage(), new FakeEnvironment(), configDir);
      const config = manager.config;

      expect(config).toEqual({
        backend: 'local',
        image: 'enclave-agent:latest',
        relayImage: 'enclave-relay:latest',
        relayPort: 3128,
        containerEngine: 'docker',
        volumeSize: '10Gi',
        allowedDomains: DEFAULT_ALLOWED_DOMAINS,
        credentialTimeoutMinutes: 60,
        credentialCheckIntervalSeconds: 60,
        watchdogEnabled: true,
        provisionRetries: 3,
        readyTimeoutSeconds: 300,
        stateDir: configDir,
      });
    });

    it('defaults the config dir to ENCLAVE_HOME, then ~/.enclave', () => {
      const storage = new MemoryStorage();
      expect(new ConfigManager(storage, new FakeEnvironment({ ENCLAVE_HOME: '/srv/enclave' })).getConfigPath()).toBe(
        '/srv/enclave/config.json',
      );
      expect(new ConfigManager(storage, new FakeEnvironment()).getConfigDir()).toBe('/home/user/.enclave');
    });

    it('loads values from the stored config file', () => {
      const storage = new MemoryStorage();
      const stored: StoredConfig = {
        backend: 'cluster',
        kubeContext: 'dev',
        namespace: 'agents',
        registry: 'registry.test/team',
        allowedDomains: ['.example-api.com'],
        credentialTimeoutMinutes: 15,
        watchdogEnabled: false,
      };
      storage.put(configFile, JSON.stringify(stored));

      const config = new ConfigManager(storage, new FakeEnvironment(), configDir).config;

      expect(config.backend).toBe('cluster');
      expect(config.kubeContext).toBe('dev');
      expect(config.namespace).toBe('agents');
      expect(config.registry).toBe('registry.test/team');
      expect(config.allowedDomains).toEqual(['.example-api.com']);
      expect(config.credentialTimeoutMinutes).toBe(15);
      expect(config.watchdogEnabled).toBe(false);
    });

    it('falls back to env vars when nothing is stored', () => {
      const env = new FakeEnvironment({
        ENCLAVE_BACKEND: 'cluster',
        ENCLAVE_CONTAINER_ENGINE: 'podman',
        ENCLAVE_ALLOWED_DOMAINS: 'a.example.com, .b.example.com',
        ENCLAVE_CREDENTIAL_TIMEOUT: '20',
        ENCLAVE_CREDENTIAL_WATCHDOG: 'off',
        ENCLAVE_NAMESPACE: 'agents',
      });
      const config = new ConfigManager(new MemoryStorage(), env, configDir).config;

      expect(config.backend).toBe('cluster');
      expect(config.containerEngine).toBe('podman');
      expect(config.allowedDomains).toEqual(['a.example.com', '.b.example.com']);
      expect(config.credentialTimeoutMinutes).toBe(20);
      expect(config.watchdogEnabled).toBe(false);
      expect(config.namespace).toBe('agents');
    });

    it('stored config takes priority over env vars', () => {
      const storage = new MemoryStorage();
      storage.put(configFile, JSON.stringify({ image: 'stored-image:1' }));
      const env = new FakeEnvironment({ ENCLAVE_IMAGE: 'env-image:2' });

      expect(new ConfigManager(storage, env, configDir).config.image).toBe('stored-image:1');
    });

    it('ignores env values of the wrong shape', () => {
      const env = new FakeEnvironment({ ENCLAVE_BACKEND: 'cloud', ENCLAVE_CREDENTIAL_TIMEOUT: 'soon' });
      const config = new ConfigManager(new MemoryStorage(), env, configDir).config;

      expect(config.backend).toBe('local');
      expect(config.credentialTimeoutMinutes).toBe(60);
    });

    it('treats an unreadable config file as empty', () => {
      const storage = new MemoryStorage();
      storage.put(configFile, '{not json');

      expect(new ConfigManager(storage, new FakeEnvironment(), configDir).loadStoredConfig()).toEqual({});
    });
  });

  describe('config persistence', () => {
    it('saveConfig writes to storage and invalidates cache', () => {
      const storage = new MemoryStorage();
      const manager = new ConfigManager(storage, new FakeEnvironment(), configDir);

      expect(manager.config.namespace).toBeUndefined();
      manager.saveConfig({ namespace: 'agents' });

      expect(manager.config.namespace).toBe('agents');
      expect(JSON.parse(storage.readFile(configFile, 'utf-8'))).toEqual({ namespace: 'agents' });
      expect(storage.modes.get(configFile)).toBe(0o600);
    });

    it('merges with existing stored values', () => {
      const storage = new MemoryStorage();
      const manager = new ConfigManager(storage, new FakeEnvironment(), configDir);

      manager.saveConfig({ backend: 'cluster' });
      manager.saveConfig({ kubeContext: 'dev' });

      expect(manager.loadStoredConfig()).toEqual({ backend: 'cluster', kubeContext: 'dev' });
      expect(manager.getConfigValue('backend')).toBe('cluster');
    });
  });

  describe('setFromString', () => {
    it('coerces values by key', () => {
      const manager = new ConfigManager(new MemoryStorage(), new FakeEnvironment(), configDir);

      manager.setFromString('allowedDomains=.example-api.com,pypi.org');
      manager.setFromString('credentialTimeoutMinutes=45');
      manager.setFromString('watchdogEnabled=no');

      expect(manager.loadStoredConfig()).toEqual({
        allowedDomains: ['.example-api.com', 'pypi.org'],
        credentialTimeoutMinutes: 45,
        watchdogEnabled: false,
      });
    });

    it('rejects malformed assignments, unknown keys and bad values', () => {
      const manager = new ConfigManager(new MemoryStorage(), new FakeEnvironment(), configDir);

      expect(() => manager.setFromString('backend')).toThrow("Expected key=value, got 'backend'");
      expect(() => manager.setFromString('token=test-secret')).toThrow(ValidationError);
      expect(() => manager.setFromString('backend=cloud')).toThrow("Invalid value for backend: 'cloud'");
      expect(() => manager.setFromString('provisionRetries=0')).toThrow("Invalid value for provisionRetries: '0'");
    });
  });

  describe('normalizeStoredConfig', () => {
    it('drops unknown keys and values of the wrong type', () => {
      expect(
        normalizeStoredConfig({
          backend: 'local',
          containerEngine: 'lxc',
          image: '  ',
          provisionRetries: 2.5,
          readyTimeoutSeconds: 60,
          allowedDomains: ['x.example.com', 3, ''],
          watchdogEnabled: 'yes',
          token: 'test-secret',
        }),
      ).toEqual({ backend: 'local', readyTimeoutSeconds: 60, allowedDomains: ['x.example.com'] });
    });

    it('returns an empty config for non-objects', () => {
      expect(normalizeStoredConfig(null)).toEqual({});
      expect(normalizeStoredConfig('backend=local')).toEqual({});
    });
  });
});
