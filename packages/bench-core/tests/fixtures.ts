import type {
  ExecOptions,
  ExecResult,
  IExecutionTarget,
  TargetKind,
  TransferDirection,
  TransferOptions,
  TransferResult,
} from '../src/types.js';

export interface StreamFixture {
  threads?: number;
  copy?: string;
  triad?: string;
}

/**
 * Tail of a STREAM run as printed by the benchmark, trailing newline included
 */
export function streamOutput(fixture: StreamFixture = {}): string {
  const threads = fixture.threads ?? 1;
  return [
    '-------------------------------------------------------------',
    'STREAM version $Revision: 5.10 $',
    '-------------------------------------------------------------',
    `Number of Threads requested = ${threads}`,
    `Number of Threads counted = ${threads}`,
    '-------------------------------------------------------------',
    'Function    Best Rate MB/s  Avg time     Min time     Max time',
    `Copy:           ${fixture.copy ?? '13542.1'}     0.012345     0.012100     0.012900`,
    'Scale:          12876.4     0.012900     0.012700     0.013200',
    'Add:            12990.0     0.019100     0.018900     0.019400',
    `Triad:          ${fixture.triad ?? '12345.6'}     0.019800     0.019600     0.020100`,
    '-------------------------------------------------------------',
    'Solution Validates: avg error less than 1.000000e-13 on all three arrays',
    '-------------------------------------------------------------',
    '',
  ].join('\n');
}

export function stressNgYaml(bogoOpsPerSecond = '194.300000'): string {
  return [
    '---',
    'system-info:',
    '      stress-ng-version: 0.13.12',
    '      hostname: bench-host',
    'metrics:',
    '    - stressor: cpu',
    '      bogo-ops: 5829',
    '      bogo-ops-per-second-usr-sys-time: 194.880000',
    `      bogo-ops-per-second-real-time: ${bogoOpsPerSecond}`,
    '      wall-clock-time: 30.000000',
    '...',
    '',
  ].join('\n');
}

export interface ScriptedResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

export interface ExecutedCommand {
  command: string;
  options: ExecOptions;
}

/**
 * Target that answers commands from a script, matched by prefix in order
 */
export class ScriptedTarget implements IExecutionTarget {
  readonly executed: ExecutedCommand[] = [];
  readonly transfers: Array<{ localPath: string; remotePath: string; direction: TransferDirection; options: TransferOptions }> = [];

  constructor(
    readonly kind: TargetKind,
    private readonly script: Array<[prefix: string, response: ScriptedResponse]>
  ) {}

  async execute(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    this.executed.push({ command, options });
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
    return { direction, localPath, remotePath, files: 1, durationMs: 1 };
  }

  get commands(): string[] {
    return this.executed.map(e => e.command);
  }
}
