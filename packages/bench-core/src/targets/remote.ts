import { ExecutionError, isHarnessError } from '../errors.js';
import type {
  ExecOptions,
  ExecResult,
  IExecutionTarget,
  IRemoteShellSession,
  TransferDirection,
  TransferOptions,
  TransferResult,
} from '../types.js';
import { withEnv } from '../utils.js';

export interface RemoteTargetOptions {
  /** Applied when a call passes no timeout of its own */
  defaultTimeoutMs?: number;
}

/**
 * Runs commands inside the guest over a session someone else opened.
 * The target never connects, reconnects or closes the session.
 */
export class RemoteTarget implements IExecutionTarget {
  readonly kind = 'guest' as const;
  private readonly session: IRemoteShellSession;
  private readonly defaultTimeoutMs: number | undefined;

  constructor(session: IRemoteShellSession, options: RemoteTargetOptions = {}) {
    this.session = session;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  async execute(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const fullCommand = withEnv(command, options.env);
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    try {
      const result = await this.session.exec(fullCommand, timeoutMs === undefined ? {} : { timeoutMs });
      return { ...result, succeeded: result.exitCode === 0 };
    } catch (err) {
      throw toExecutionError(err, `Remote command failed`, fullCommand);
    }
  }

  async transfer(
    localPath: string,
    remotePath: string,
    direction: TransferDirection,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const startTime = performance.now();
    let files: number;

    try {
      files = direction === 'upload'
        ? await this.session.upload(localPath, remotePath, options)
        : await this.session.download(remotePath, localPath, options);
    } catch (err) {
      throw toExecutionError(err, `Transfer (${direction}) ${localPath} <-> ${remotePath} failed`);
    }

    return {
      direction,
      localPath,
      remotePath,
      files,
      durationMs: performance.now() - startTime,
    };
  }
}

function toExecutionError(err: unknown, message: string, command?: string): Error {
  if (isHarnessError(err)) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new ExecutionError(`${message}: ${detail}`, { target: 'guest', command, cause: err });
}
