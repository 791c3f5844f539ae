import {
  CommandError,
  TimeoutError,
  errorMessage,
  isProvisioningError,
  shellQuote,
  sleep,
  type ClusterLogger,
  type CommandResult,
  type ExecOptions,
  type NodeSpec,
  type RemoteSession,
  type RenderedFile,
  type Timeouts,
} from '@kubeforge/core';

/** mktemp template for rendered files waiting to be installed in place with sudo. */
export const SCRATCH_TEMPLATE = '/tmp/kubeforge.XXXXXXXXXX';

/**
 * Node-scoped helper over a RemoteSession. Commands are elevated unless the
 * caller opts out, and every command is logged at debug.
 */
export class CommandRunner {
  constructor(
    readonly session: RemoteSession,
    readonly log: ClusterLogger,
    readonly timeouts: Timeouts,
  ) {}

  get node(): NodeSpec {
    return this.session.node;
  }

  /** Runs a command and returns stdout; a non-zero exit throws CommandError. */
  async run(command: string, options: ExecOptions = {}): Promise<string> {
    const result = await this.exec(command, options);
    if (result.exitCode !== 0) {
      throw new CommandError(command, result.exitCode, result.stderr);
    }
    return result.stdout;
  }

  async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    this.log.debug({ command }, 'exec');
    const result = await this.session.exec(command, { elevate: true, ...options });
    if (result.exitCode !== 0) {
      this.log.debug({ command, exitCode: result.exitCode, stderr: result.stderr.trim() }, 'command exited non-zero');
    }
    return result;
  }

  /**
   * Best-effort variant: timeouts and transport errors come back as a failed
   * result instead of rejecting.
   */
  async tryRun(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    try {
      return await this.exec(command, options);
    } catch (error) {
      if (!isProvisioningError(error)) throw error;
      return { stdout: '', stderr: error.message, exitCode: error.kind === 'timeout' ? 124 : 255 };
    }
  }

  async check(command: string, options: ExecOptions = {}): Promise<boolean> {
    const result = await this.tryRun(command, options);
    return result.exitCode === 0;
  }

  /**
   * Installs a rendered file with its mode, creating parent directories. The
   * content passes through a private mktemp file owned by the SSH user.
   */
  async putFile(file: RenderedFile): Promise<void> {
    const scratch = (await this.run(`mktemp ${SCRATCH_TEMPLATE}`, { elevate: false })).trim();
    if (!scratch) {
      throw new CommandError(`mktemp ${SCRATCH_TEMPLATE}`, 0, 'mktemp printed no path');
    }
    await this.session.writeFile(scratch, file.content);
    await this.run(
      `install -D -m ${file.mode} ${shellQuote(scratch)} ${shellQuote(file.path)} && rm -f ${shellQuote(scratch)}`,
    );
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    this.log.debug({ localPath, remotePath }, 'upload');
    await this.session.upload(localPath, remotePath, { timeoutMs: this.timeouts.transferMs });
  }

  /**
   * Polls `probe` every pollIntervalMs until it returns true. Gives up with
   * TimeoutError once `timeoutMs` has passed.
   */
  async waitFor(what: string, probe: () => Promise<boolean>, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (await probe()) return;
      if (Date.now() >= deadline) {
        throw new TimeoutError(`${what} on ${this.node.hostname}`, timeoutMs);
      }
      await sleep(this.timeouts.pollIntervalMs);
    }
  }

  async close(): Promise<void> {
    try {
      await this.session.close();
    } catch (error) {
      this.log.debug({ error: errorMessage(error) }, 'closing session failed');
    }
  }
}
