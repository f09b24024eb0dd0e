import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { BenchmarkExecutionError, BenchmarkRunner, ExecutionError } from '@vmbench/core';
import { loadConfig } from '../src/config.js';
import { cpuPerformance, listJobs } from '../src/scenarios/cpu.js';
import {
  compileCommand,
  createMemoryScenario,
  parseL3CacheKib,
  streamArraySize,
} from '../src/scenarios/memory.js';
import { getScenarios } from '../src/scenarios/index.js';
import type { ScenarioContext } from '../src/types.js';
import { STRESS_NG_DONE, ScriptedTarget, streamOutput, stressNgYaml } from './helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'vmbench-scenario-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function context(host: ScriptedTarget, guest: ScriptedTarget, options: Record<string, unknown> = {}): ScenarioContext {
  return {
    host,
    guest,
    runner: new BenchmarkRunner(),
    config: loadConfig({ jobs: join(dir, 'configs'), source: join(dir, 'stream.c'), ...options }),
  };
}

describe('cpu-performance', () => {
  beforeEach(async () => {
    await mkdir(join(dir, 'configs', 'notes'), { recursive: true });
    await writeFile(join(dir, 'configs', 'matrix.job'), 'run sequential\nmatrix 1\n');
    await writeFile(join(dir, 'configs', 'cpu.job'), 'run sequential\ncpu 1\n');
  });

  const hostScript = (): Array<[string, { stdout?: string; stderr?: string }]> => [
    ['taskset', { stderr: STRESS_NG_DONE }],
    ['cat out.yaml', { stdout: stressNgYaml(200) }],
  ];

  it('lists job files in order, skipping directories', async () => {
    expect(await listJobs(join(dir, 'configs'))).toEqual(['cpu.job', 'matrix.job']);
  });

  it('runs each job on the host before the guest and cleans up the guest', async () => {
    const log: string[] = [];
    const host = new ScriptedTarget('host', hostScript(), log);
    const guest = new ScriptedTarget('guest', [
      ['taskset', { stderr: STRESS_NG_DONE }],
      ['cat out.yaml', { stdout: stressNgYaml(190) }],
    ], log);
    const localDir = join(dir, 'configs');

    const comparisons = await cpuPerformance.run(context(host, guest));

    expect(guest.transfers).toEqual([
      { localPath: localDir, remotePath: '/tmp/configs', direction: 'upload', options: { recursive: true } },
    ]);
    expect(log).toEqual([
      `guest: transfer ${localDir} -> /tmp/configs`,
      `host: taskset -c 71 stress-ng --job ${join(localDir, 'cpu.job')} --yaml out.yaml`,
      'host: cat out.yaml',
      'host: rm -f out.yaml',
      'guest: taskset -c 3 stress-ng --job /tmp/configs/cpu.job --yaml out.yaml',
      'guest: cat out.yaml',
      'guest: rm -f out.yaml',
      `host: taskset -c 71 stress-ng --job ${join(localDir, 'matrix.job')} --yaml out.yaml`,
      'host: cat out.yaml',
      'host: rm -f out.yaml',
      'guest: taskset -c 3 stress-ng --job /tmp/configs/matrix.job --yaml out.yaml',
      'guest: cat out.yaml',
      'guest: rm -f out.yaml',
      'guest: rm -rf /tmp/configs',
    ]);
    expect(comparisons.map(c => c.benchmark)).toEqual(['stress-ng:cpu.job', 'stress-ng:matrix.job']);
    expect(comparisons.map(c => c.passed)).toEqual([true, true]);
    expect(comparisons[0]?.metrics[0]?.ratio).toBe(0.95);
  });

  it('fails a job whose guest ratio is under the target', async () => {
    const host = new ScriptedTarget('host', hostScript());
    const guest = new ScriptedTarget('guest', [
      ['taskset', { stderr: STRESS_NG_DONE }],
      ['cat out.yaml', { stdout: stressNgYaml(180) }],
    ]);

    const comparisons = await cpuPerformance.run(context(host, guest));

    expect(comparisons[0]?.metrics[0]?.ratio).toBe(0.9);
    expect(comparisons.every(c => !c.passed)).toBe(true);
  });

  it('still removes the guest copy when a guest run fails', async () => {
    const host = new ScriptedTarget('host', hostScript());
    const guest = new ScriptedTarget('guest', [['taskset', { stderr: 'stress-ng: fail: [7] cpu exited\n' }]]);

    await expect(cpuPerformance.run(context(host, guest))).rejects.toBeInstanceOf(BenchmarkExecutionError);
    expect(guest.commands.at(-1)).toBe('rm -rf /tmp/configs');
  });

  it('removes the guest copy when the upload fails partway', async () => {
    const host = new ScriptedTarget('host', hostScript());
    const guest = new ScriptedTarget('guest', []);
    guest.transferError = new ExecutionError('Remote transfer failed: SFTP operation failed: Failure', { target: 'guest' });

    await expect(cpuPerformance.run(context(host, guest))).rejects.toThrow('Remote transfer failed');
    expect(guest.commands).toEqual(['rm -rf /tmp/configs']);
    expect(host.commands).toEqual([]);
  });

  it('refuses an empty jobs directory', async () => {
    const empty = join(dir, 'empty');
    await mkdir(empty);
    const host = new ScriptedTarget('host', []);
    const guest = new ScriptedTarget('guest', []);

    await expect(cpuPerformance.run(context(host, guest, { jobs: empty }))).rejects.toBeInstanceOf(ExecutionError);
    expect(guest.transfers).toEqual([]);
  });
});

describe('memory-performance', () => {
  it('compiles, runs on the host, copies to the guest and compares Triad', async () => {
    const log: string[] = [];
    const host = new ScriptedTarget('host', [['chmod', { stdout: streamOutput(1, '12000.0') }]], log);
    const guest = new ScriptedTarget('guest', [['chmod', { stdout: streamOutput(1, '11000.0') }]], log);
    const binary = join(dir, 'stream_mpi');
    const libPath = '/usr/lib/x86_64-linux-gnu/libgomp.so.1';

    const [strict] = await createMemoryScenario(1).run(context(host, guest));
    const [lenient] = await createMemoryScenario(1).run(context(
      new ScriptedTarget('host', [['chmod', { stdout: streamOutput(1, '12000.0') }]]),
      new ScriptedTarget('guest', [['chmod', { stdout: streamOutput(1, '11000.0') }]]),
      { target: '0.90' }
    ));

    expect(log).toEqual([
      `host: gcc -ffreestanding -fopenmp -mcmodel=medium -O3 -march=znver1 -DSTREAM_ARRAY_SIZE=5120000 -DNTIMES=100 -DOFFSET=512 ${join(dir, 'stream.c')} -o ${binary}`,
      `host: chmod +x ${binary} && ${binary}`,
      `guest: transfer ${binary} -> /root/stream_mpi`,
      `guest: transfer ${libPath} -> ${libPath}`,
      'guest: chmod +x /root/stream_mpi && /root/stream_mpi',
    ]);
    expect(guest.options[0]?.env).toEqual({ OMP_NUM_THREADS: '1', OMP_PROC_BIND: 'SPREAD', KMP_AFFINITY: 'compact' });
    expect(strict?.metrics.find(m => m.name === 'Triad/Best Rate MB/s')?.ratio).toBeCloseTo(0.9167, 4);
    expect(strict?.passed).toBe(false);
    expect(lenient?.passed).toBe(true);
  });

  it('sizes the arrays from the L3 cache when asked', async () => {
    const host = new ScriptedTarget('host', [
      ['lscpu', { stdout: 'L3 cache:                       32 MiB (1 instance)\n' }],
      ['chmod', { stdout: streamOutput(1, '12000.0') }],
    ]);
    const guest = new ScriptedTarget('guest', [['chmod', { stdout: streamOutput(1, '12000.0') }]]);

    await createMemoryScenario(1).run(context(host, guest, { sizeFromL3: true }));

    expect(host.commands[0]).toBe('lscpu | grep "L3 cache"');
    expect(host.commands[1]).toContain('-DSTREAM_ARRAY_SIZE=16777216 ');
  });

  it('does not touch the guest when compilation fails', async () => {
    const host = new ScriptedTarget('host', [['gcc', { exitCode: 1, stderr: 'stream.c: No such file or directory\n' }]]);
    const guest = new ScriptedTarget('guest', []);

    await expect(createMemoryScenario(1).run(context(host, guest))).rejects.toThrow(/Compiling .*stream\.c failed/);
    expect(guest.transfers).toEqual([]);
    expect(guest.commands).toEqual([]);
  });
});

describe('memory helpers', () => {
  it('sizes arrays per vCPU by default', () => {
    expect(streamArraySize(4)).toBe(20_480_000);
  });

  it('reads both lscpu formats', () => {
    expect(parseL3CacheKib('L3 cache:             32768K\n')).toBe(32768);
    expect(parseL3CacheKib('L3 cache:  1.5 MiB (1 instance)')).toBe(1536);
    expect(() => parseL3CacheKib('L2 cache: 512K')).toThrow(ExecutionError);
  });

  it('quotes paths in the compile command', () => {
    expect(compileCommand({
      source: '/src/my bench/stream.c',
      binary: '/src/stream_mpi',
      arraySize: 10,
      ntimes: 20,
      offset: 0,
      march: 'native',
    })).toBe("gcc -ffreestanding -fopenmp -mcmodel=medium -O3 -march=native -DSTREAM_ARRAY_SIZE=10 -DNTIMES=20 -DOFFSET=0 '/src/my bench/stream.c' -o /src/stream_mpi");
  });
});

describe('getScenarios', () => {
  it('creates one memory scenario per vCPU count', () => {
    expect(getScenarios(['cpu', 'memory'], [1, 4]).map(s => s.name)).toEqual([
      'cpu-performance',
      'memory-performance-1vcpu',
      'memory-performance-4vcpu',
    ]);
  });
});
