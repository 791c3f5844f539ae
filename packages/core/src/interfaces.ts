import type { CommandResult, NodeSpec, Timeouts } from './types';

export interface ExecOptions {
  /** run through sudo */
  elevate?: boolean;
  timeoutMs?: number;
  stdin?: string;
  cwd?: string;
}

export interface TransferOptions {
  timeoutMs?: number;
}

/**
 * An open, authenticated session to one node. Non-zero exit codes are returned,
 * not thrown; a timeout rejects with TimeoutError and a broken transport with
 * ConnectionError.
 */
export interface RemoteSession {
  readonly node: NodeSpec;
  exec(command: string, options?: ExecOptions): Promise<CommandResult>;
  upload(localPath: string, remotePath: string, options?: TransferOptions): Promise<void>;
  download(remotePath: string, localPath: string, options?: TransferOptions): Promise<void>;
  /** unprivileged write of a small file, e.g. a rendered config staged under /tmp */
  writeFile(remotePath: string, content: string): Promise<void>;
  close(): Promise<void>;
}

export interface RemoteExecutor {
  connect(node: NodeSpec, timeouts?: Partial<Timeouts>): Promise<RemoteSession>;
}
