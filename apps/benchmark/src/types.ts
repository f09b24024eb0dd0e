import type {
  BenchmarkRunner,
  ComparisonResult,
  FailureStage,
  IExecutionTarget,
} from '@vmbench/core';

export interface GuestConnectionConfig {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKeyPath?: string;
  readyTimeoutMs: number;
  /** Connection attempts before giving up on the guest */
  connectRetries: number;
}

export interface CpuScenarioConfig {
  /** Local directory of stress-ng job files */
  jobsDir: string;
  /** Guest directory the jobs directory is copied into */
  remoteDir: string;
  hostCpu: number;
  guestCpu: number;
  outputFile: string;
}

export interface MemoryScenarioConfig {
  /** STREAM C source */
  source: string;
  /** vCPU counts to test, one scenario each */
  vcpus: number[];
  /** Guest directory the binary is copied to */
  remoteRoot: string;
  /** OpenMP runtime copied to the same path on the guest */
  libPath: string;
  march: string;
  /** Size the arrays from the host L3 cache instead of the fixed per-vCPU size */
  sizeFromL3: boolean;
  ntimes: number;
  offset: number;
}

export interface HarnessConfig {
  guest: GuestConnectionConfig;
  /** Minimum acceptable guest/host ratio */
  targetRatio: number;
  /** Per-command timeout */
  timeoutMs: number;
  /** Output directory for results */
  outputDir: string;
  /** Verbose output */
  verbose: boolean;
  cpu: CpuScenarioConfig;
  memory: MemoryScenarioConfig;
}

export interface ScenarioContext {
  host: IExecutionTarget;
  guest: IExecutionTarget;
  runner: BenchmarkRunner;
  config: HarnessConfig;
}

export type ScenarioFn = (ctx: ScenarioContext) => Promise<ComparisonResult[]>;

export interface Scenario {
  name: string;
  description: string;
  run: ScenarioFn;
}

export interface ScenarioFailure {
  stage: FailureStage | 'unknown';
  message: string;
  /** Formatted diagnosis including captured output */
  detail: string;
}

export interface ScenarioResult {
  scenario: string;
  passed: boolean;
  comparisons: ComparisonResult[];
  failure?: ScenarioFailure;
  durationMs: number;
  timestamp: string;
  metadata: {
    nodeVersion: string;
    platform: string;
    arch: string;
  };
}
