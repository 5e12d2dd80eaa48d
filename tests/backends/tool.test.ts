import { describe, expect, it } from 'vitest';
import { ToolRunner } from '../../src/backends/tool.js';
import { RollbackStack } from '../../src/backends/types.js';
import { AuthorizationError } from '../../src/errors.js';
import { FakeExecutor, fail, ok } from '../helpers/fakes.js';

describe('ToolRunner', () => {
  it('prefixes base args and returns stdout', async () => {
    const executor = new FakeExecutor().on('get pods', ok('pod-a\n'));
    const kubectl = new ToolRunner(executor, 'kubectl', ['--context', 'dev']);

    await expect(kubectl.run(['get', 'pods'])).resolves.toBe('pod-a\n');
    expect(executor.lines()).toEqual(['kubectl --context dev get pods']);
  });

  it('names the failing command by its first two words', async () => {
    const executor = new FakeExecutor().on('apply', fail('Error from server (Forbidden): nope'));
    const kubectl = new ToolRunner(executor, 'kubectl', ['-n', 'agents']);

    const attempt = kubectl.run(['apply', '-f', '-'], { sessionId: 'api', input: '{}' });
    await expect(attempt).rejects.toThrow(AuthorizationError);
    await expect(attempt).rejects.toThrow('kubectl apply failed (session api): Error from server (Forbidden): nope');
    expect(executor.calls[0].input).toBe('{}');
  });

  it('reports success without throwing', async () => {
    const executor = new FakeExecutor().on('inspect', fail('missing'));
    const docker = new ToolRunner(executor, 'docker');
    await expect(docker.succeeds(['inspect', 'x'])).resolves.toBe(false);
    await expect(docker.succeeds(['ps'])).resolves.toBe(true);
  });
});

describe('RollbackStack', () => {
  it('undoes newest first and keeps going past failures', async () => {
    const undone: string[] = [];
    const rollback = new RollbackStack();
    rollback.push('network', async () => {
      undone.push('network');
    });
    rollback.push('relay', async () => {
      throw new Error('already gone');
    });
    rollback.push('workload', async () => {
      undone.push('workload');
    });

    const errors: string[] = [];
    const failed = await rollback.unwind((label, error) => {
      errors.push(`${label}: ${error instanceof Error ? error.message : String(error)}`);
    });

    expect(undone).toEqual(['workload', 'network']);
    expect(failed).toEqual(['relay']);
    expect(errors).toEqual(['relay: already gone']);
    expect(rollback.size).toBe(0);
  });
});
