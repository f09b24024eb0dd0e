import { readdir } from 'node:fs/promises';
import { basename, join, posix, resolve } from 'node:path';
import {
  ExecutionError,
  compare,
  formatComparison,
  parseResult,
  shellQuote,
  stressNgDescriptor,
  type ComparisonResult,
} from '@vmbench/core';
import type { Scenario, ScenarioContext } from '../types.js';

/**
 * List the job files a CPU run covers, in a stable order
 */
export async function listJobs(jobsDir: string): Promise<string[]> {
  const entries = await readdir(jobsDir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort();
}

/**
 * Runs every stress-ng job file on the host, then on the guest, and
 * compares bogo-ops per second of each job.
 */
export const cpuPerformance: Scenario = {
  name: 'cpu-performance',
  description: 'stress-ng job files, pinned to one CPU, host vs guest',
  async run(ctx: ScenarioContext): Promise<ComparisonResult[]> {
    const { cpu, timeoutMs, targetRatio, verbose } = ctx.config;
    const localDir = resolve(cpu.jobsDir);
    const jobs = await listJobs(localDir);
    if (jobs.length === 0) {
      throw new ExecutionError(`No job files in ${localDir}`, { target: 'host' });
    }

    const remoteDir = posix.join(cpu.remoteDir, basename(localDir));
    const onCommand = verbose ? (command: string) => console.log(`  $ ${command}`) : undefined;
    const comparisons: ComparisonResult[] = [];

    try {
      await ctx.guest.transfer(localDir, remoteDir, 'upload', { recursive: true });

      for (const job of jobs) {
        const descriptor = stressNgDescriptor(job, { outputFile: cpu.outputFile });

        const hostRun = await ctx.runner.run(ctx.host, descriptor, join(localDir, job), {
          vars: { cpu: String(cpu.hostCpu) },
          timeoutMs,
          onCommand,
        });
        const hostRecord = parseResult(hostRun.output, descriptor);

        const guestRun = await ctx.runner.run(ctx.guest, descriptor, posix.join(remoteDir, job), {
          vars: { cpu: String(cpu.guestCpu) },
          timeoutMs,
          onCommand,
        });
        const guestRecord = parseResult(guestRun.output, descriptor);

        const comparison = compare(hostRecord, guestRecord, targetRatio, descriptor.verdict);
        comparisons.push(comparison);

        for (const line of formatComparison(comparison)) {
          console.log(`  ${line}`);
        }
      }
    } finally {
      await removeRemoteDir(ctx, remoteDir);
    }

    return comparisons;
  },
};

async function removeRemoteDir(ctx: ScenarioContext, remoteDir: string): Promise<void> {
  const command = `rm -rf ${shellQuote(remoteDir)}`;
  try {
    const result = await ctx.guest.execute(command, { timeoutMs: ctx.config.timeoutMs });
    if (!result.succeeded) {
      console.warn(`  Failed to remove ${remoteDir} on guest: ${result.stderr.trim()}`);
    }
  } catch (err) {
    // keep the error that ended the run, if any
    console.warn(`  Failed to remove ${remoteDir} on guest:`, err instanceof Error ? err.message : err);
  }
}
