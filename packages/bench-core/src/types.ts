/**
 * Where a command runs: the machine hosting the VM, or the VM itself
 */
export type TargetKind = 'host' | 'guest';

/**
 * Direction of a file transfer, seen from the harness process
 */
export type TransferDirection = 'upload' | 'download';

/**
 * Per-invocation execution options
 */
export interface ExecOptions {
  /** Environment overrides scoped to this single command */
  env?: Record<string, string>;
  /** Kill the command and fail after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Result of executing a command on a target
 */
export interface ExecResult {
  /** Exit code */
  exitCode: number;
  /** Standard output, untrimmed */
  stdout: string;
  /** Standard error, untrimmed */
  stderr: string;
  /** Execution time in milliseconds */
  durationMs: number;
  /** True when the command exited with status 0 */
  succeeded: boolean;
}

export interface TransferOptions {
  recursive?: boolean;
}

export interface TransferResult {
  direction: TransferDirection;
  localPath: string;
  remotePath: string;
  /** Number of regular files copied */
  files: number;
  durationMs: number;
}

/**
 * Something a benchmark can run on
 */
export interface IExecutionTarget {
  readonly kind: TargetKind;

  /**
   * Execute a shell command and collect its output
   */
  execute(command: string, options?: ExecOptions): Promise<ExecResult>;

  /**
   * Copy a file (or a directory, when recursive) to or from the target.
   * `remotePath` is the full destination/source path on the target.
   */
  transfer(
    localPath: string,
    remotePath: string,
    direction: TransferDirection,
    options?: TransferOptions
  ): Promise<TransferResult>;
}

/**
 * Remote shell session handed to the harness by whoever started the VM
 */
export interface IRemoteShellSession {
  exec(command: string, options?: { timeoutMs?: number }): Promise<Omit<ExecResult, 'succeeded'>>;
  upload(localPath: string, remotePath: string, options?: TransferOptions): Promise<number>;
  download(remotePath: string, localPath: string, options?: TransferOptions): Promise<number>;
}

/**
 * A metric and the unit conversion applied to its raw value
 */
export interface MetricUnit {
  /** Unit of the value after conversion */
  unit?: string;
  /** The raw value is divided by this (default 1) */
  divisor?: number;
}

export interface StructuredField extends MetricUnit {
  kernel: string;
  metric: string;
  /** Key path into the decoded document; numbers index arrays */
  path: ReadonlyArray<string | number>;
}

export interface PositionalRow {
  kernel: string;
  /** Line index; negative values count from the end */
  line: number;
}

export interface PositionalColumn extends MetricUnit {
  metric: string;
  /** Column index after whitespace normalization */
  index: number;
}

export type MetricExtraction =
  | {
      strategy: 'structured';
      /** Substring that must be present before decoding */
      marker?: string;
      fields: ReadonlyArray<StructuredField>;
    }
  | {
      strategy: 'positional';
      /** Text that must appear on the given line */
      marker?: { text: string; line: number };
      rows: ReadonlyArray<PositionalRow>;
      columns: ReadonlyArray<PositionalColumn>;
    };

export type BenchmarkOutput =
  | { kind: 'artifact'; path: string }
  | { kind: 'stdout' };

export type VerdictGate =
  | { mode: 'all' }
  | { mode: 'headline'; kernel: string; metric: string };

/**
 * Everything needed to run and interpret one benchmark
 */
export interface BenchmarkDescriptor {
  readonly name: string;
  /** Command template; `{workload}`, `{output}` and run variables are substituted */
  readonly command: string;
  readonly successMarker: { readonly text: string; readonly stream: 'stdout' | 'stderr' };
  /** Treat any stderr from the run step as a failed run */
  readonly requireCleanStderr: boolean;
  readonly output: BenchmarkOutput;
  readonly env: Readonly<Record<string, string>>;
  readonly extraction: MetricExtraction;
  readonly verdict: VerdictGate;
}

/**
 * Unparsed output of one benchmark run on one target
 */
export interface RawRunResult {
  benchmark: string;
  target: TargetKind;
  stdout: string;
  stderr: string;
  succeeded: boolean;
  /** Retrieved artifact contents, or the run stdout */
  output: string;
}

export type KernelMetrics = Readonly<Record<string, number>>;

/**
 * Parsed metrics of one run, keyed by kernel then metric name
 */
export interface MetricRecord {
  readonly benchmark: string;
  readonly kernels: Readonly<Record<string, KernelMetrics>>;
}

export interface MetricComparison {
  /** `<kernel>/<metric>` */
  name: string;
  kernel: string;
  metric: string;
  host: number;
  guest: number;
  ratio: number;
  passed: boolean;
}

export interface ComparisonResult {
  benchmark: string;
  host: MetricRecord;
  guest: MetricRecord;
  targetRatio: number;
  gate: VerdictGate;
  metrics: MetricComparison[];
  passed: boolean;
}
