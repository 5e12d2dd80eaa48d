import { closeSync, fstatSync, mkdirSync, mkdtempSync, openSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalBackend } from '../../src/backends/local.js';
import { CredentialBundleBuilder, HostHomeView, type CredentialBundle } from '../../src/credentials/bundle.js';
import { ProvisioningError } from '../../src/errors.js';
import { FileStorage } from '../../src/infra/storage.js';
import { compileIsolationPlan, type NetworkIsolationPlan } from '../../src/network/plan.js';
import {
  FakeEnvironment,
  FakeExecutor,
  ManualClock,
  MemoryStorage,
  RecordingLogger,
  fail,
  ok,
  makeSession,
} from '../helpers/fakes.js';

const STAGE = '/home/user/.enclave/sessions/api/credentials';
const ADC = '{"type":"authorized_user","client_secret":"test-secret"}';

describe('LocalBackend', () => {
  let executor: FakeExecutor;
  let storage: MemoryStorage;
  let backend: LocalBackend;
  let bundle: CredentialBundle;
  let plan: NetworkIsolationPlan;
  /** Whether `inspect` finds containers and networks. */
  let present: boolean;
  const session = makeSession();

  beforeEach(() => {
    present = false;
    executor = new FakeExecutor()
      .on('inspect', () => (present ? ok('[]') : fail('Error: No such object')))
      .on('inspect -f', ok('running\n'));
    storage = new MemoryStorage();
    storage.put('/home/user/.config/gcloud/application_default_credentials.json', ADC);
    storage.put('/home/user/.claude.json', '{"theme":"dark"}');
    const home = new HostHomeView(storage, new FakeEnvironment());
    backend = new LocalBackend({
      executor,
      engine: 'docker',
      storage,
      home,
      stateDir: '/home/user/.enclave',
      logger: new RecordingLogger(),
      sleep: async () => undefined,
    });
    bundle = new CredentialBundleBuilder(new ManualClock().now).build(home);
    plan = compileIsolationPlan({
      sessionId: 'api',
      network: session.network,
      capabilities: backend.capabilities,
      relayImage: 'enclave-relay:latest',
      relayPort: 3128,
    });
  });

  it('creates the internal network and relay before the workload', async () => {
    await backend.provision(session, plan, bundle);

    expect(executor.lines()).toEqual([
      'docker network inspect enclave-net-api',
      'docker network create --internal --label enclave.dev/session-id=api enclave-net-api',
      'docker container inspect enclave-relay-api',
      'docker run -d --name enclave-relay-api --network enclave-net-api --label enclave.dev/session-id=api ' +
        '--label enclave.dev/role=relay -e ENCLAVE_ALLOWED_DOMAINS=.anthropic.com enclave-relay:latest relay --port 3128',
      'docker network connect bridge enclave-relay-api',
      'docker container inspect enclave-api',
      'docker create --name enclave-api -it --label enclave.dev/session-id=api --label enclave.dev/role=workload ' +
        '-u 1000:1000 -w /work/api -v /work/api:/work/api:rw --network enclave-net-api ' +
        `-v ${STAGE}/gcloud:/home/agent/.config/gcloud:ro ` +
        '-e HTTP_PROXY=http://enclave-relay-api:3128 -e HTTPS_PROXY=http://enclave-relay-api:3128 ' +
        '-e http_proxy=http://enclave-relay-api:3128 -e https_proxy=http://enclave-relay-api:3128 ' +
        '-e NO_PROXY=localhost,127.0.0.1 -e no_proxy=localhost,127.0.0.1 enclave-agent:latest',
      'docker cp /home/user/.enclave/sessions/api/copy/agent-settings/.claude.json enclave-api:/home/agent/.claude.json',
      'docker start enclave-api',
      'docker inspect -f {{.State.Status}} enclave-api',
      'docker exec -u 0 enclave-api chown -R 1000:1000 /home/agent/.claude.json',
    ]);
    expect(storage.text(`${STAGE}/gcloud/application_default_credentials.json`)).toBe(ADC);
    expect(storage.exists('/home/user/.enclave/sessions/api/copy')).toBe(false);
  });

  it('removes everything it created when a step fails', async () => {
    executor.on('docker start enclave-api', fail('boom'));

    const attempt = backend.provision(session, plan, bundle);
    await expect(attempt).rejects.toThrow(ProvisioningError);
    await expect(attempt).rejects.toThrow(
      'Starting session api failed and was rolled back: docker start enclave-api failed (session api): boom',
    );

    const start = executor.indexOf('docker start enclave-api');
    expect(executor.lines().slice(start + 1)).toEqual([
      'docker rm -f enclave-api',
      'docker rm -f enclave-relay-api',
      'docker network rm enclave-net-api',
    ]);
    expect(storage.exists(STAGE)).toBe(false);
  });

  it('rolls back when the workload exits during start', async () => {
    executor.on('inspect -f', ok('exited\n'));
    await expect(backend.provision(session, plan, bundle)).rejects.toThrow(
      'docker start failed (session api): workload enclave-api is exited',
    );
    expect(executor.lines().at(-1)).toBe('docker network rm enclave-net-api');
  });

  it('tears down the workload and isolation but keeps the workspace bind', async () => {
    await backend.provision(session, plan, bundle);
    const firstCreate = executor.lines().find((line) => line.startsWith('docker create'));

    executor.reset();
    present = true;
    await backend.teardownWorkload(session, plan);
    expect(executor.lines()).toEqual([
      'docker container inspect enclave-api',
      'docker rm -f enclave-api',
      'docker container inspect enclave-relay-api',
      'docker rm -f enclave-relay-api',
      'docker network inspect enclave-net-api',
      'docker network rm enclave-net-api',
    ]);
    expect(storage.exists(STAGE)).toBe(false);

    executor.reset();
    present = false;
    await backend.provision(session, plan, bundle);
    expect(executor.lines().find((line) => line.startsWith('docker create'))).toBe(firstCreate);
  });

  it('empties the staged mounts on eviction and restores them on sync', async () => {
    await backend.provision(session, plan, bundle);

    await backend.evictCredentials(session);
    expect(storage.readdir(`${STAGE}/gcloud`)).toEqual([]);

    await backend.syncCredentials(session, bundle);
    expect(storage.text(`${STAGE}/gcloud/application_default_credentials.json`)).toBe(ADC);
  });

  it('attaches to the container terminal', () => {
    expect(backend.attach(session)).toEqual({ command: 'docker', args: ['attach', 'enclave-api'] });
  });

  it('counts attached clients from host processes', async () => {
    executor.on('ps -axo', ok('docker attach enclave-api\n/usr/bin/docker attach enclave-api\ndocker attach enclave-api2\n'));
    const [attach] = backend.activitySignals(session);
    expect(attach.kind).toBe('attach');
    if (attach.kind !== 'attach') return;
    await expect(attach.attachedClients()).resolves.toBe(2);
  });

  it('probes CPU inside the workload', async () => {
    executor.on('ps -eo', ok('25.0 claude\n'));
    const cpu = backend.activitySignals(session).find((signal) => signal.kind === 'cpu');
    if (cpu?.kind !== 'cpu') throw new Error('no cpu signal');
    await expect(cpu.cpuPercent()).resolves.toBe(25);
    expect(executor.lines().at(-1)).toBe('docker exec enclave-api sh -c ps -eo pcpu=,args=');
  });
});

describe('LocalBackend staged credentials on disk', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'enclave-local-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('refills the directory the container was created with', async () => {
    const home = join(root, 'home');
    mkdirSync(join(home, '.config', 'gcloud'), { recursive: true });
    writeFileSync(join(home, '.config', 'gcloud', 'application_default_credentials.json'), ADC);

    const storage = new FileStorage();
    const view = new HostHomeView(storage, new FakeEnvironment({}, home));
    const backend = new LocalBackend({
      executor: new FakeExecutor().on('inspect', fail('Error: No such object')).on('inspect -f', ok('running\n')),
      engine: 'docker',
      storage,
      home: view,
      stateDir: join(root, 'state'),
      logger: new RecordingLogger(),
      sleep: async () => undefined,
    });
    const session = makeSession();
    const plan = compileIsolationPlan({
      sessionId: 'api',
      network: session.network,
      capabilities: backend.capabilities,
      relayImage: 'enclave-relay:latest',
      relayPort: 3128,
    });
    const bundle = new CredentialBundleBuilder(new ManualClock().now).build(view);

    await backend.provision(session, plan, bundle);
    const staged = backend.stagePath('api', 'gcloud');
    const inode = statSync(staged).ino;
    // Held open the way a bind mount pins its source.
    const fd = openSync(staged, 'r');
    try {
      await backend.evictCredentials(session);
      expect(readdirSync(staged)).toEqual([]);

      await backend.syncCredentials(session, bundle);
      expect(fstatSync(fd).nlink).toBeGreaterThan(0);
    } finally {
      closeSync(fd);
    }
    expect(statSync(staged).ino).toBe(inode);
    expect(readFileSync(join(staged, 'application_default_credentials.json'), 'utf-8')).toBe(ADC);
  });
});
