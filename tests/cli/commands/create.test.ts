import { afterEach, describe, expect, it, vi } from 'vitest';
import { createCommand } from '../../../src/cli/commands/create.js';
import { cliHarness } from '../helpers.js';

describe('createCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the plan and writes nothing on a dry run', async () => {
    const { ctx, storage, executor, output } = cliHarness();

    await createCommand(
      { id: 'api', workspace: '/work/api', allowDomain: ['.example-api.com'], dryRun: true },
      ctx,
    );

    expect(output()).toEqual([
      '',
      '🔍 Dry run for session api (local)',
      '',
      '   Workspace: /work/api',
      '   Image: enclave-agent:latest',
      '   Network: custom-allowlist (.example-api.com)',
      '   Isolation: namespace-isolation',
      '   Relay: enclave-relay-api (per session, port 3128)',
      '   - network enclave-net-api',
      '   - relay enclave-relay-api',
      '',
      'Nothing was created.',
    ]);
    expect(storage.exists('/home/user/.enclave/sessions')).toBe(false);
    expect(executor.calls).toEqual([]);
  });

  it('registers the session for the current directory', async () => {
    const { ctx, output } = cliHarness();

    await createCommand({ id: 'project' }, ctx);

    expect(ctx.store.get('project')?.workspace).toBe('/work/project');
    expect(output()[0]).toBe('✅ Session project created (local)');
    expect(output().at(-1)).toBe('   Next: enclave start project');
  });

  it('uses the configured backend unless one is passed', async () => {
    const { ctx } = cliHarness({ ENCLAVE_BACKEND: 'cluster' });

    await createCommand({ id: 'remote', workspace: '/work/remote' }, ctx);
    await createCommand({ id: 'here', workspace: '/work/here', backend: 'local' }, ctx);

    expect(ctx.store.get('remote')?.backend).toBe('cluster');
    expect(ctx.store.get('here')?.backend).toBe('local');
  });
});
