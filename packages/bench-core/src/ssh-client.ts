import { mkdir, readdir, stat } from 'node:fs/promises';
import { join, posix } from 'node:path';
import { Client, type ConnectConfig, type SFTPWrapper } from 'ssh2';
import { ExecutionError } from './errors.js';
import type { ExecResult, IRemoteShellSession, TransferOptions } from './types.js';
import { sleep } from './utils.js';

export interface SSHClientConfig {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string | Buffer;
  readyTimeout?: number;
}

interface InternalSSHConfig {
  host: string;
  port: number;
  username: string;
  readyTimeout: number;
  password: string | null;
  privateKey: string | Buffer | null;
}

/**
 * SSH session to a running guest: command execution plus SFTP copies
 */
export class SSHClient implements IRemoteShellSession {
  private client: Client | null = null;
  private readonly config: InternalSSHConfig;

  constructor(config: SSHClientConfig) {
    this.config = {
      host: config.host,
      port: config.port,
      username: config.username,
      readyTimeout: config.readyTimeout ?? 10000,
      password: config.password ?? null,
      privateKey: config.privateKey ?? null,
    };
  }

  /**
   * Connect to SSH server
   */
  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const client = new Client();
      this.client = client;

      const connectConfig: ConnectConfig = {
        host: this.config.host,
        port: this.config.port,
        username: this.config.username,
        readyTimeout: this.config.readyTimeout,
      };

      if (this.config.password !== null) {
        connectConfig.password = this.config.password;
      }
      if (this.config.privateKey !== null) {
        connectConfig.privateKey = this.config.privateKey;
      }

      client.on('ready', () => resolve());
      client.on('error', (err) => reject(err));
      client.connect(connectConfig);
    });
  }

  /**
   * Execute command via SSH. Output is returned as received.
   */
  async exec(command: string, options: { timeoutMs?: number } = {}): Promise<Omit<ExecResult, 'succeeded'>> {
    const client = this.requireClient();
    const startTime = performance.now();

    return new Promise((resolve, reject) => {
      client.exec(command, (err, stream) => {
        if (err) {
          reject(new ExecutionError(`SSH exec failed: ${err.message}`, { target: 'guest', command, cause: err }));
          return;
        }

        let stdout = '';
        let stderr = '';
        let exitCode: number | null = null;
        let settled = false;

        const timer = options.timeoutMs === undefined
          ? null
          : setTimeout(() => {
              settled = true;
              stream.close();
              reject(new ExecutionError(`Command timed out after ${options.timeoutMs}ms`, {
                target: 'guest',
                command,
                stdout,
                stderr,
              }));
            }, options.timeoutMs);

        stream.on('data', (data: Buffer) => {
          stdout += data.toString();
        });

        stream.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });

        stream.on('exit', (code: number | null) => {
          exitCode = code;
        });

        stream.on('close', () => {
          if (timer) clearTimeout(timer);
          if (settled) return;
          settled = true;
          resolve({
            // no exit status means the channel was torn down (signal or dropped session)
            exitCode: exitCode ?? -1,
            stdout,
            stderr,
            durationMs: performance.now() - startTime,
          });
        });

        stream.on('error', (streamErr: Error) => {
          if (timer) clearTimeout(timer);
          if (settled) return;
          settled = true;
          reject(new ExecutionError(`SSH channel error: ${streamErr.message}`, {
            target: 'guest',
            command,
            stdout,
            stderr,
            cause: streamErr,
          }));
        });
      });
    });
  }

  /**
   * Copy a local file or directory to `remotePath` over SFTP
   */
  async upload(localPath: string, remotePath: string, options: TransferOptions = {}): Promise<number> {
    const sftp = await this.openSftp();
    try {
      const info = await stat(localPath);
      if (info.isDirectory()) {
        if (!options.recursive) {
          throw new ExecutionError(`${localPath} is a directory; recursive upload required`, { target: 'guest' });
        }
        return await uploadDir(sftp, localPath, remotePath);
      }
      await sftpCall<void>((cb) => sftp.fastPut(localPath, remotePath, (err) => cb(err, undefined)));
      return 1;
    } finally {
      sftp.end();
    }
  }

  /**
   * Copy a remote file or directory to `localPath` over SFTP
   */
  async download(remotePath: string, localPath: string, options: TransferOptions = {}): Promise<number> {
    const sftp = await this.openSftp();
    try {
      const info = await sftpCall<{ isDirectory(): boolean }>((cb) => sftp.stat(remotePath, cb));
      if (info.isDirectory()) {
        if (!options.recursive) {
          throw new ExecutionError(`${remotePath} is a directory; recursive download required`, { target: 'guest' });
        }
        return await downloadDir(sftp, remotePath, localPath);
      }
      await sftpCall<void>((cb) => sftp.fastGet(remotePath, localPath, (err) => cb(err, undefined)));
      return 1;
    } finally {
      sftp.end();
    }
  }

  /**
   * Check if connected
   */
  isConnected(): boolean {
    return this.client !== null;
  }

  /**
   * Disconnect from SSH server
   */
  disconnect(): void {
    if (this.client) {
      this.client.end();
      this.client = null;
    }
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new ExecutionError('SSH client not connected', { target: 'guest' });
    }
    return this.client;
  }

  private async openSftp(): Promise<SFTPWrapper> {
    const client = this.requireClient();
    return sftpCall<SFTPWrapper>((cb) => client.sftp(cb));
  }
}

function sftpCall<T>(fn: (cb: (err: Error | null | undefined, value: T) => void) => void): Promise<T> {
  return new Promise((resolve, reject) => {
    fn((err, value) => {
      if (err) {
        reject(new ExecutionError(`SFTP operation failed: ${err.message}`, { target: 'guest', cause: err }));
        return;
      }
      resolve(value);
    });
  });
}

async function ensureRemoteDir(sftp: SFTPWrapper, dir: string): Promise<void> {
  try {
    await sftpCall<unknown>((cb) => sftp.stat(dir, cb));
  } catch {
    await sftpCall<void>((cb) => sftp.mkdir(dir, (err) => cb(err, undefined)));
  }
}

async function uploadDir(sftp: SFTPWrapper, localDir: string, remoteDir: string): Promise<number> {
  await ensureRemoteDir(sftp, remoteDir);
  let files = 0;
  for (const entry of await readdir(localDir, { withFileTypes: true })) {
    const localPath = join(localDir, entry.name);
    const remotePath = posix.join(remoteDir, entry.name);
    if (entry.isDirectory()) {
      files += await uploadDir(sftp, localPath, remotePath);
    } else if (entry.isFile()) {
      await sftpCall<void>((cb) => sftp.fastPut(localPath, remotePath, (err) => cb(err, undefined)));
      files++;
    }
  }
  return files;
}

async function downloadDir(sftp: SFTPWrapper, remoteDir: string, localDir: string): Promise<number> {
  await mkdir(localDir, { recursive: true });
  const entries = await sftpCall<Array<{ filename: string; attrs: { isDirectory(): boolean; isFile(): boolean } }>>(
    (cb) => sftp.readdir(remoteDir, cb)
  );
  let files = 0;
  for (const entry of entries) {
    const remotePath = posix.join(remoteDir, entry.filename);
    const localPath = join(localDir, entry.filename);
    if (entry.attrs.isDirectory()) {
      files += await downloadDir(sftp, remotePath, localPath);
    } else if (entry.attrs.isFile()) {
      await sftpCall<void>((cb) => sftp.fastGet(remotePath, localPath, (err) => cb(err, undefined)));
      files++;
    }
  }
  return files;
}

/**
 * Wait for SSH to become available with retries
 */
export async function waitForSSH(
  config: SSHClientConfig,
  options: { maxRetries?: number; retryDelayMs?: number } = {}
): Promise<SSHClient> {
  const { maxRetries = 30, retryDelayMs = 1000 } = options;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const client = new SSHClient(config);
    try {
      await client.connect();
      return client;
    } catch (err) {
      client.disconnect();
      if (attempt === maxRetries) {
        throw new ExecutionError(`SSH not available after ${maxRetries} attempts: ${err}`, {
          target: 'guest',
          cause: err,
        });
      }
      await sleep(retryDelayMs);
    }
  }

  throw new ExecutionError('SSH connection failed', { target: 'guest' });
}
