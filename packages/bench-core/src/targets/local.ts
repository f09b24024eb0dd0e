import { spawn } from 'node:child_process';
import { cp, stat } from 'node:fs/promises';
import { ExecutionError } from '../errors.js';
import type {
  ExecOptions,
  ExecResult,
  IExecutionTarget,
  TransferDirection,
  TransferOptions,
  TransferResult,
} from '../types.js';
import { countFiles } from './files.js';

export interface LocalTargetOptions {
  /** Shell used to interpret commands (default: /bin/sh) */
  shell?: string;
  /** Applied when a call passes no timeout of its own */
  defaultTimeoutMs?: number;
}

/**
 * Runs commands directly on the host machine
 */
export class LocalTarget implements IExecutionTarget {
  readonly kind = 'host' as const;
  private readonly shell: string;
  private readonly defaultTimeoutMs: number | undefined;

  constructor(options: LocalTargetOptions = {}) {
    this.shell = options.shell ?? '/bin/sh';
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  async execute(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const startTime = performance.now();

    return new Promise((resolve, reject) => {
      // own process group, so a timeout reaches everything the shell started
      const proc = spawn(this.shell, ['-c', command], {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...options.env },
        detached: true,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = timeoutMs === undefined
        ? null
        : setTimeout(() => {
            settled = true;
            killGroup(proc.pid);
            reject(new ExecutionError(`Command timed out after ${timeoutMs}ms`, {
              target: 'host',
              command,
              stdout,
              stderr,
            }));
          }, timeoutMs);

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(new ExecutionError(`Failed to start command: ${err.message}`, {
          target: 'host',
          command,
          stderr,
          cause: err,
        }));
      });

      proc.on('close', (code) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        const exitCode = code ?? -1;
        resolve({
          exitCode,
          stdout,
          stderr,
          durationMs: performance.now() - startTime,
          succeeded: exitCode === 0,
        });
      });
    });
  }

  /**
   * Both ends are on the host, so a transfer is a filesystem copy
   */
  async transfer(
    localPath: string,
    remotePath: string,
    direction: TransferDirection,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const [from, to] = direction === 'upload' ? [localPath, remotePath] : [remotePath, localPath];
    const startTime = performance.now();

    try {
      const info = await stat(from);
      if (info.isDirectory() && !options.recursive) {
        throw new ExecutionError(`${from} is a directory; recursive transfer required`, { target: 'host' });
      }
      await cp(from, to, { recursive: options.recursive ?? false, force: true });
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      throw new ExecutionError(`Copy ${from} -> ${to} failed: ${err instanceof Error ? err.message : err}`, {
        target: 'host',
        cause: err,
      });
    }

    return {
      direction,
      localPath,
      remotePath,
      files: await countFiles(from),
      durationMs: performance.now() - startTime,
    };
  }
}

function killGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group already exited
    if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
  }
}
