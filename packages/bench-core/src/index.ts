// Types
export type {
  TargetKind,
  TransferDirection,
  ExecOptions,
  ExecResult,
  TransferOptions,
  TransferResult,
  IExecutionTarget,
  IRemoteShellSession,
  MetricUnit,
  StructuredField,
  PositionalRow,
  PositionalColumn,
  MetricExtraction,
  BenchmarkOutput,
  VerdictGate,
  BenchmarkDescriptor,
  RawRunResult,
  KernelMetrics,
  MetricRecord,
  MetricComparison,
  ComparisonResult,
} from './types.js';

// Errors
export {
  HarnessError,
  ExecutionError,
  BenchmarkExecutionError,
  OutputCollectionError,
  ParseError,
  MetricMismatchError,
  isHarnessError,
} from './errors.js';
export type { FailureStage, FailureDetails } from './errors.js';

// Targets
export { LocalTarget } from './targets/local.js';
export type { LocalTargetOptions } from './targets/local.js';
export { RemoteTarget } from './targets/remote.js';
export type { RemoteTargetOptions } from './targets/remote.js';
export { SSHClient, waitForSSH } from './ssh-client.js';
export type { SSHClientConfig } from './ssh-client.js';

// Pipeline
export { BenchmarkRunner } from './runner.js';
export type { RunOptions } from './runner.js';
export { parseResult } from './parser.js';
export { compare, metricName } from './comparison.js';
export {
  stressNgDescriptor,
  streamDescriptor,
  STRESS_NG_SUCCESS,
  STRESS_NG_METRIC,
  STRESS_NG_OUTPUT,
  STREAM_VALIDATES,
  STREAM_HEADLINE,
} from './descriptors.js';
export type { StressNgOptions, StreamOptions } from './descriptors.js';

// Utilities
export { formatComparison, formatFailure, verdictLabel } from './report.js';
export { shellQuote, renderCommand, withEnv, formatMs, sleep } from './utils.js';
