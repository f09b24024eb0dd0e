import type { TargetKind } from './types.js';

export type FailureStage = 'execution' | 'benchmark' | 'retrieval' | 'parse' | 'comparison';

export interface FailureDetails {
  target?: TargetKind;
  command?: string;
  stdout?: string;
  stderr?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the harness reports.
 * Carries the failed stage and the captured text for diagnosis.
 */
export class HarnessError extends Error {
  public readonly stage: FailureStage;
  public readonly target?: TargetKind;
  public readonly command?: string;
  public readonly stdout?: string;
  public readonly stderr?: string;

  constructor(stage: FailureStage, message: string, details: FailureDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.target = details.target;
    this.command = details.command;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

/** Transport or process failure: connection drop, timeout, unexpected exit */
export class ExecutionError extends HarnessError {
  constructor(message: string, details: FailureDetails = {}) {
    super('execution', message, details);
  }
}

/** The workload ran but did not report a completed run */
export class BenchmarkExecutionError extends HarnessError {
  constructor(message: string, details: FailureDetails = {}) {
    super('benchmark', message, details);
  }
}

/** Reading back or cleaning up the result artifact failed */
export class OutputCollectionError extends HarnessError {
  constructor(message: string, details: FailureDetails = {}) {
    super('retrieval', message, details);
  }
}

export class ParseError extends HarnessError {
  constructor(message: string, details: FailureDetails = {}) {
    super('parse', message, details);
  }
}

/** Host and guest records cannot be compared metric by metric */
export class MetricMismatchError extends HarnessError {
  public readonly hostMetrics: string[];
  public readonly guestMetrics: string[];

  constructor(message: string, hostMetrics: string[], guestMetrics: string[]) {
    super('comparison', message);
    this.hostMetrics = hostMetrics;
    this.guestMetrics = guestMetrics;
  }
}

export function isHarnessError(err: unknown): err is HarnessError {
  return err instanceof HarnessError;
}
