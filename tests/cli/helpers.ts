import { vi } from 'vitest';
import { ConfigManager } from '../../src/config/index.js';
import { createContext, type EnclaveContext } from '../../src/context.js';
import { FakeEnvironment, FakeExecutor, FakeProcesses, MemoryStorage, RecordingLogger } from '../helpers/fakes.js';

export interface CliHarness {
  ctx: EnclaveContext;
  storage: MemoryStorage;
  executor: FakeExecutor;
  output: () => string[];
}

function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

/** A context wired to in-memory fakes, with console output captured. */
export function cliHarness(vars: Record<string, string> = {}): CliHarness {
  const storage = new MemoryStorage();
  const env = new FakeEnvironment(vars);
  const executor = new FakeExecutor();
  const ctx = createContext({
    supervisor: 'in-process',
    configManager: new ConfigManager(storage, env),
    storage,
    env,
    executor,
    processes: new FakeProcesses(),
    logger: new RecordingLogger(),
  });
  const lines: string[] = [];
  const capture = (...args: unknown[]) => {
    lines.push(stripAnsi(args.map(String).join(' ')));
  };
  vi.spyOn(console, 'log').mockImplementation(capture);
  vi.spyOn(console, 'error').mockImplementation(capture);
  return { ctx, storage, executor, output: () => lines.join('\n').split('\n') };
}
