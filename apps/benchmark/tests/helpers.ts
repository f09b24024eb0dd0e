import type {
  ExecOptions,
  ExecResult,
  IExecutionTarget,
  TargetKind,
  TransferDirection,
  TransferOptions,
  TransferResult,
} from '@vmbench/core';

export interface ScriptedResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

/**
 * In-process stand-in for a host or guest. Commands are answered from a
 * script matched by prefix; every call lands in a log shared across targets.
 */
export class ScriptedTarget implements IExecutionTarget {
  readonly commands: string[] = [];
  readonly options: ExecOptions[] = [];
  readonly transfers: Array<{ localPath: string; remotePath: string; direction: TransferDirection; options: TransferOptions }> = [];
  /** Thrown by every transfer once set */
  transferError: Error | null = null;

  constructor(
    readonly kind: TargetKind,
    private readonly script: Array<[prefix: string, response: ScriptedResponse]>,
    private readonly log: string[] = []
  ) {}

  async execute(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    this.commands.push(command);
    this.options.push(options);
    this.log.push(`${this.kind}: ${command}`);
    const entry = this.script.find(([prefix]) => command.startsWith(prefix));
    const response = entry ? entry[1] : {};
    const exitCode = response.exitCode ?? 0;
    return {
      exitCode,
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? '',
      durationMs: 1,
      succeeded: exitCode === 0,
    };
  }

  async transfer(
    localPath: string,
    remotePath: string,
    direction: TransferDirection,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    this.transfers.push({ localPath, remotePath, direction, options });
    this.log.push(`${this.kind}: transfer ${localPath} -> ${remotePath}`);
    if (this.transferError) throw this.transferError;
    return { direction, localPath, remotePath, files: 1, durationMs: 1 };
  }
}

export function streamOutput(threads: number, triad: string): string {
  return [
    '-------------------------------------------------------------',
    `Number of Threads requested = ${threads}`,
    `Number of Threads counted = ${threads}`,
    '-------------------------------------------------------------',
    'Function    Best Rate MB/s  Avg time     Min time     Max time',
    'Copy:           13542.1     0.012345     0.012100     0.012900',
    'Scale:          12876.4     0.012900     0.012700     0.013200',
    'Add:            12990.0     0.019100     0.018900     0.019400',
    `Triad:          ${triad}     0.019800     0.019600     0.020100`,
    '-------------------------------------------------------------',
    'Solution Validates: avg error less than 1.000000e-13 on all three arrays',
    '-------------------------------------------------------------',
    '',
  ].join('\n');
}

export function stressNgYaml(bogoOpsPerSecond: number): string {
  return [
    '---',
    'metrics:',
    '    - stressor: cpu',
    `      bogo-ops-per-second-real-time: ${bogoOpsPerSecond}`,
    '...',
    '',
  ].join('\n');
}

export const STRESS_NG_DONE = 'stress-ng: info:  [7] successful run completed in 10.00s\n';
