import { dirname, join, posix, resolve } from 'node:path';
import {
  ExecutionError,
  compare,
  formatComparison,
  parseResult,
  shellQuote,
  streamDescriptor,
  STREAM_HEADLINE,
  type ComparisonResult,
  type IExecutionTarget,
} from '@vmbench/core';
import type { Scenario, ScenarioContext } from '../types.js';

export const STREAM_BINARY = 'stream_mpi';

/** KiB occupied by one 8-byte STREAM array element */
export const BYTE_IN_KBYTE = 8 / 1024;

/** Array elements per vCPU when not sizing from the L3 cache */
export const DEFAULT_ELEMENTS_PER_VCPU = 5_120_000;

/**
 * Elements per STREAM array. Sized from L3 the arrays are four times the
 * cache of the vCPUs in use, so the run measures main memory.
 */
export function streamArraySize(vcpus: number, l3CacheKib?: number): number {
  if (l3CacheKib === undefined) {
    return DEFAULT_ELEMENTS_PER_VCPU * vcpus;
  }
  return Math.floor((4 * vcpus * l3CacheKib) / BYTE_IN_KBYTE);
}

/**
 * Read the L3 size in KiB from an `lscpu` line such as `L3 cache: 32 MiB (1 instance)`
 */
export function parseL3CacheKib(lscpuLine: string): number {
  const match = lscpuLine.match(/L3 cache:\s*(\d+(?:\.\d+)?)\s*(K|KiB|M|MiB)\b/);
  const [, size, unit] = match ?? [];
  if (size === undefined || unit === undefined) {
    throw new ExecutionError(`Cannot read L3 cache size from: ${lscpuLine.trim()}`, {
      target: 'host',
      stdout: lscpuLine,
    });
  }
  return unit.startsWith('M') ? Number(size) * 1024 : Number(size);
}

export async function detectL3CacheKib(host: IExecutionTarget, timeoutMs?: number): Promise<number> {
  const command = 'lscpu | grep "L3 cache"';
  const result = await host.execute(command, { timeoutMs });
  if (!result.succeeded || result.stderr !== '') {
    throw new ExecutionError('lscpu did not report an L3 cache', {
      target: 'host',
      command,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }
  return parseL3CacheKib(result.stdout);
}

export interface CompileOptions {
  source: string;
  binary: string;
  arraySize: number;
  ntimes: number;
  offset: number;
  march: string;
}

export function compileCommand(options: CompileOptions): string {
  return [
    'gcc -ffreestanding -fopenmp -mcmodel=medium -O3',
    `-march=${shellQuote(options.march)}`,
    `-DSTREAM_ARRAY_SIZE=${options.arraySize}`,
    `-DNTIMES=${options.ntimes}`,
    `-DOFFSET=${options.offset}`,
    shellQuote(options.source),
    '-o',
    shellQuote(options.binary),
  ].join(' ');
}

export async function compileStream(
  host: IExecutionTarget,
  options: CompileOptions,
  timeoutMs?: number
): Promise<void> {
  const command = compileCommand(options);
  const result = await host.execute(command, { timeoutMs });
  if (!result.succeeded) {
    throw new ExecutionError(`Compiling ${options.source} failed`, {
      target: 'host',
      command,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }
}

/**
 * STREAM with OpenMP threads equal to the guest's vCPU count.
 * The guest must already have been started with that many vCPUs.
 */
export function createMemoryScenario(vcpus: number): Scenario {
  return {
    name: `memory-performance-${vcpus}vcpu`,
    description: `STREAM memory bandwidth with ${vcpus} thread(s), host vs guest`,
    async run(ctx: ScenarioContext): Promise<ComparisonResult[]> {
      const { memory, timeoutMs, targetRatio, verbose } = ctx.config;
      const onCommand = verbose ? (command: string) => console.log(`  $ ${command}`) : undefined;

      const source = resolve(memory.source);
      const binary = join(dirname(source), STREAM_BINARY);
      const l3CacheKib = memory.sizeFromL3 ? await detectL3CacheKib(ctx.host, timeoutMs) : undefined;

      await compileStream(ctx.host, {
        source,
        binary,
        arraySize: streamArraySize(vcpus, l3CacheKib),
        ntimes: memory.ntimes,
        offset: memory.offset,
        march: memory.march,
      }, timeoutMs);

      const descriptor = streamDescriptor({ threads: vcpus });

      const hostRun = await ctx.runner.run(ctx.host, descriptor, binary, { timeoutMs, onCommand });
      const hostRecord = parseResult(hostRun.output, descriptor);

      const remoteBinary = posix.join(memory.remoteRoot, STREAM_BINARY);
      await ctx.guest.transfer(binary, remoteBinary, 'upload');
      await ctx.guest.transfer(memory.libPath, memory.libPath, 'upload');

      const guestRun = await ctx.runner.run(ctx.guest, descriptor, remoteBinary, { timeoutMs, onCommand });
      const guestRecord = parseResult(guestRun.output, descriptor);

      const comparison = compare(hostRecord, guestRecord, targetRatio, descriptor.verdict);
      const headline = comparison.metrics.find(
        m => m.kernel === STREAM_HEADLINE.kernel && m.metric === STREAM_HEADLINE.metric
      );

      if (verbose) {
        for (const line of formatComparison(comparison)) {
          console.log(`  ${line}`);
        }
      }
      console.log(`  vCPUs : ${vcpus} | Performance : ${headline ? headline.ratio.toFixed(4) : 'n/a'}`);

      return [comparison];
    },
  };
}
