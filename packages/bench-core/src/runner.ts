import {
  BenchmarkExecutionError,
  ExecutionError,
  OutputCollectionError,
} from './errors.js';
import type { BenchmarkDescriptor, IExecutionTarget, RawRunResult } from './types.js';
import { renderCommand, shellQuote } from './utils.js';

export interface RunOptions {
  /** Extra template variables, e.g. `{ cpu: '3' }` */
  vars?: Record<string, string>;
  /** Environment overrides layered over the descriptor's own */
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Called with each command before it runs */
  onCommand?: (command: string) => void;
}

/**
 * Runs a benchmark on a target in two steps.
 *
 * The workload run is validated on its own (exit status, success marker,
 * optionally clean stderr) because some tools write progress to stderr.
 * The machine-readable artifact is then read back in a separate command,
 * where any stderr means the result cannot be trusted, and deleted.
 */
export class BenchmarkRunner {
  async run(
    target: IExecutionTarget,
    descriptor: BenchmarkDescriptor,
    workloadPath: string,
    options: RunOptions = {}
  ): Promise<RawRunResult> {
    const vars: Record<string, string> = { ...options.vars, workload: workloadPath };
    if (descriptor.output.kind === 'artifact') {
      vars.output = descriptor.output.path;
    }

    const command = renderCommand(descriptor.command, vars);
    options.onCommand?.(command);

    const result = await target.execute(command, {
      env: { ...descriptor.env, ...options.env },
      timeoutMs: options.timeoutMs,
    });

    const details = { target: target.kind, command, stdout: result.stdout, stderr: result.stderr };

    if (!result.succeeded) {
      throw new ExecutionError(
        `${descriptor.name} exited with status ${result.exitCode} on ${target.kind}`,
        details
      );
    }

    const markerStream = descriptor.successMarker.stream === 'stderr' ? result.stderr : result.stdout;
    if (!markerStream.includes(descriptor.successMarker.text)) {
      throw new BenchmarkExecutionError(
        `${descriptor.name} on ${target.kind}: "${descriptor.successMarker.text}" not found in ${descriptor.successMarker.stream}`,
        details
      );
    }

    if (descriptor.requireCleanStderr && result.stderr !== '') {
      throw new BenchmarkExecutionError(`${descriptor.name} on ${target.kind} wrote to stderr`, details);
    }

    const output = descriptor.output.kind === 'artifact'
      ? await this.collect(target, descriptor, descriptor.output.path, options)
      : result.stdout;

    return {
      benchmark: descriptor.name,
      target: target.kind,
      stdout: result.stdout,
      stderr: result.stderr,
      succeeded: true,
      output,
    };
  }

  /**
   * Read the artifact back, then delete it so the next run starts clean
   */
  private async collect(
    target: IExecutionTarget,
    descriptor: BenchmarkDescriptor,
    artifactPath: string,
    options: RunOptions
  ): Promise<string> {
    const path = shellQuote(artifactPath);

    const readCommand = `cat ${path}`;
    options.onCommand?.(readCommand);
    const read = await target.execute(readCommand, { timeoutMs: options.timeoutMs });
    if (!read.succeeded || read.stderr !== '') {
      throw new OutputCollectionError(`Could not read ${artifactPath} for ${descriptor.name} on ${target.kind}`, {
        target: target.kind,
        command: readCommand,
        stdout: read.stdout,
        stderr: read.stderr,
      });
    }

    const cleanCommand = `rm -f ${path}`;
    options.onCommand?.(cleanCommand);
    const clean = await target.execute(cleanCommand, { timeoutMs: options.timeoutMs });
    if (!clean.succeeded || clean.stderr !== '') {
      throw new OutputCollectionError(`Could not remove ${artifactPath} on ${target.kind}`, {
        target: target.kind,
        command: cleanCommand,
        stdout: clean.stdout,
        stderr: clean.stderr,
      });
    }

    return read.stdout;
  }
}
