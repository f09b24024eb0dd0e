import type { BenchmarkDescriptor, PositionalColumn, PositionalRow } from './types.js';

/** stress-ng prints this to stderr once every stressor has finished */
export const STRESS_NG_SUCCESS = 'successful run completed';
export const STRESS_NG_METRIC = 'bogo-ops-per-second-real-time';
export const STRESS_NG_OUTPUT = 'out.yaml';

/** Printed by STREAM after the result table when its checksums match */
export const STREAM_VALIDATES = 'Solution Validates';
export const STREAM_HEADLINE = { kernel: 'Triad', metric: 'Best Rate MB/s' } as const;

// Table rows sit at fixed distances from the end of STREAM's output
const STREAM_KERNELS: PositionalRow[] = [
  { kernel: 'Copy', line: -8 },
  { kernel: 'Scale', line: -7 },
  { kernel: 'Add', line: -6 },
  { kernel: 'Triad', line: -5 },
];

const STREAM_COLUMNS: PositionalColumn[] = [
  { metric: 'Best Rate MB/s', index: 1, unit: 'MB/s' },
  { metric: 'Avg time', index: 2, unit: 's' },
  { metric: 'Min time', index: 3, unit: 's' },
  { metric: 'Max time', index: 4, unit: 's' },
];

export interface StressNgOptions {
  /** Artifact path stress-ng writes its YAML report to */
  outputFile?: string;
}

/**
 * stress-ng running one job file, pinned with taskset to the `{cpu}` variable
 */
export function stressNgDescriptor(jobName: string, options: StressNgOptions = {}): BenchmarkDescriptor {
  return {
    name: `stress-ng:${jobName}`,
    command: 'taskset -c {cpu} stress-ng --job {workload} --yaml {output}',
    successMarker: { text: STRESS_NG_SUCCESS, stream: 'stderr' },
    requireCleanStderr: false,
    output: { kind: 'artifact', path: options.outputFile ?? STRESS_NG_OUTPUT },
    env: {},
    extraction: {
      strategy: 'structured',
      fields: [
        {
          kernel: jobName,
          metric: STRESS_NG_METRIC,
          path: ['metrics', 0, STRESS_NG_METRIC],
          unit: 'bogo ops/s',
        },
      ],
    },
    verdict: { mode: 'headline', kernel: jobName, metric: STRESS_NG_METRIC },
  };
}

export interface StreamOptions {
  /** OpenMP thread count, normally the guest's vCPU count */
  threads: number;
}

/**
 * The STREAM memory bandwidth binary, reporting on stdout
 */
export function streamDescriptor(options: StreamOptions): BenchmarkDescriptor {
  return {
    name: `stream:${options.threads}`,
    command: 'chmod +x {workload} && {workload}',
    successMarker: { text: `Number of Threads requested = ${options.threads}`, stream: 'stdout' },
    requireCleanStderr: true,
    output: { kind: 'stdout' },
    env: {
      OMP_NUM_THREADS: String(options.threads),
      OMP_PROC_BIND: 'SPREAD',
      KMP_AFFINITY: 'compact',
    },
    extraction: {
      strategy: 'positional',
      marker: { text: STREAM_VALIDATES, line: -3 },
      rows: STREAM_KERNELS,
      columns: STREAM_COLUMNS,
    },
    verdict: { mode: 'headline', ...STREAM_HEADLINE },
  };
}
