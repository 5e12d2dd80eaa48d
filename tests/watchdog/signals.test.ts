import { describe, expect, it } from 'vitest';
import {
  countLines,
  fileProbe,
  parseCpuSample,
  parseNewestMtime,
  probeCpuSignal,
  probeFileSignal,
} from '../../src/watchdog/signals.js';
import { fail, ok } from '../helpers/fakes.js';

describe('parseCpuSample', () => {
  it('returns the highest CPU of the agent processes only', () => {
    const stdout = [
      ' 0.0 tmux new-session -A -s agent',
      ' 3.5 node /usr/local/bin/claude',
      '12.0 claude --resume',
      '95.0 npm run build',
    ].join('\n');
    expect(parseCpuSample(stdout)).toBe(12);
  });

  it('is zero when no agent process is running', () => {
    expect(parseCpuSample(' 1.0 bash\n')).toBe(0);
  });
});

describe('parseNewestMtime', () => {
  it('picks the newest epoch second', () => {
    expect(parseNewestMtime('1767607200\n1767607260\n\n')).toEqual(new Date(1767607260 * 1000));
  });

  it('is null when no file exists', () => {
    expect(parseNewestMtime('')).toBeNull();
  });
});

describe('fileProbe', () => {
  it('leaves globs unquoted and never fails', () => {
    expect(fileProbe(['/a/history.jsonl', '/a/debug/*'])).toBe('stat -c %Y /a/history.jsonl /a/debug/* 2>/dev/null; true');
  });
});

describe('probe signals', () => {
  it('reads CPU through the probe runner', async () => {
    const scripts: string[] = [];
    const signal = probeCpuSignal(async (script) => {
      scripts.push(script);
      return ok('42.0 claude\n');
    });
    await expect(signal.cpuPercent()).resolves.toBe(42);
    expect(scripts).toEqual(['ps -eo pcpu=,args=']);
  });

  it('throws when the probe fails, so the watchdog sees no signal', async () => {
    const signal = probeFileSignal(async () => fail('container not running'));
    await expect(signal.newestModification()).rejects.toThrow('file probe exited with 1: container not running');
  });
});

describe('countLines', () => {
  it('counts non-empty lines', () => {
    expect(countLines('/dev/pts/0: agent\n/dev/pts/1: agent\n')).toBe(2);
    expect(countLines('')).toBe(0);
  });
});
