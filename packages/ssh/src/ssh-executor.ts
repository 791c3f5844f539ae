import { NodeSSH } from 'node-ssh';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CommandResult,
  ConnectionError,
  ExecOptions,
  NodeSpec,
  RemoteExecutor,
  RemoteSession,
  TimeoutError,
  Timeouts,
  TransferOptions,
  errorMessage,
  expandKeyPath,
  shellQuote,
  sleep,
  withTimeout,
} from '@kubeforge/core';
import { ElevatedCommand, SshExecutorConfig } from './types';

const DEFAULT_CONNECT_MS = 30_000;
const DEFAULT_COMMAND_MS = 600_000;
const DEFAULT_TRANSFER_MS = 1_800_000;

/**
 * Wraps a command for sudo. With a password, sudo reads it from stdin ahead of
 * anything the command itself consumes; without one, sudo must not prompt.
 */
export function buildElevatedCommand(
  command: string,
  sudoPassword?: string,
  stdin?: string,
): ElevatedCommand {
  const wrapped = `bash -c ${shellQuote(command)}`;
  if (sudoPassword) {
    return {
      command: `sudo -S -p '' ${wrapped}`,
      stdin: `${sudoPassword}\n${stdin ?? ''}`,
    };
  }
  return { command: `sudo -n ${wrapped}`, stdin };
}

export class SshSession implements RemoteSession {
  constructor(
    readonly node: NodeSpec,
    private ssh: NodeSSH,
    private timeouts: Pick<Timeouts, 'commandMs' | 'transferMs'>,
  ) {}

  async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    const prepared: ElevatedCommand = options.elevate
      ? buildElevatedCommand(command, this.node.sudoPassword, options.stdin)
      : { command, stdin: options.stdin };
    const timeoutMs = options.timeoutMs ?? this.timeouts.commandMs;

    let closeChannel: (() => void) | undefined;
    const running = this.ssh.execCommand(prepared.command, {
      cwd: options.cwd,
      stdin: prepared.stdin,
      onChannel: channel => {
        closeChannel = () => channel.close();
      },
    });

    try {
      const result = await withTimeout(running, timeoutMs, () => {
        closeChannel?.();
        return new TimeoutError(`'${command}' on ${this.node.hostname}`, timeoutMs);
      });
      return {
        stdout: result.stdout,
        stderr: result.stderr,
        // a null code means the remote side was killed by a signal
        exitCode: result.code ?? 255,
      };
    } catch (error) {
      if (error instanceof TimeoutError) throw error;
      throw new ConnectionError(this.node.ip, `exec failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async upload(localPath: string, remotePath: string, options: TransferOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.timeouts.transferMs;
    try {
      await withTimeout(
        this.ssh.putFile(localPath, remotePath),
        timeoutMs,
        () => new TimeoutError(`upload of ${path.basename(localPath)} to ${this.node.hostname}`, timeoutMs),
      );
    } catch (error) {
      if (error instanceof TimeoutError) throw error;
      throw new ConnectionError(this.node.ip, `upload of ${localPath} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async download(remotePath: string, localPath: string, options: TransferOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.timeouts.transferMs;
    try {
      await withTimeout(
        this.ssh.getFile(localPath, remotePath),
        timeoutMs,
        () => new TimeoutError(`download of ${remotePath} from ${this.node.hostname}`, timeoutMs),
      );
    } catch (error) {
      if (error instanceof TimeoutError) throw error;
      throw new ConnectionError(this.node.ip, `download of ${remotePath} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async writeFile(remotePath: string, content: string): Promise<void> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kubeforge-'));
    const localPath = path.join(dir, path.basename(remotePath));
    try {
      await fs.writeFile(localPath, content, { mode: 0o600 });
      await this.upload(localPath, remotePath);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  async close(): Promise<void> {
    this.ssh.dispose();
  }
}

export class SshExecutor implements RemoteExecutor {
  constructor(private config: SshExecutorConfig = {}) {}

  async connect(node: NodeSpec, timeouts: Partial<Timeouts> = {}): Promise<RemoteSession> {
    const merged = { ...this.config.timeouts, ...timeouts };
    const connectMs = merged.connectMs ?? DEFAULT_CONNECT_MS;
    const attempts = this.config.connectAttempts ?? 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const ssh = new NodeSSH();
      try {
        await ssh.connect({
          host: node.ip,
          port: node.port,
          username: node.user,
          privateKeyPath: expandKeyPath(node.sshKey),
          readyTimeout: connectMs,
        });
        return new SshSession(node, ssh, {
          commandMs: merged.commandMs ?? DEFAULT_COMMAND_MS,
          transferMs: merged.transferMs ?? DEFAULT_TRANSFER_MS,
        });
      } catch (error) {
        lastError = error;
        ssh.dispose();
        if (attempt < attempts) {
          await sleep(this.config.retryDelayMs ?? 5000);
        }
      }
    }

    throw new ConnectionError(
      node.ip,
      `could not connect as ${node.user} with key ${node.sshKey}: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
  }
}
