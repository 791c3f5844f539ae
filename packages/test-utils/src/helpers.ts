/**
 * In-process stand-in for the SSH executor. Every call is recorded in order so
 * tests can assert sequencing across nodes.
 */

import {
  ConnectionError,
  TimeoutError,
  type CommandResult,
  type ExecOptions,
  type NodeSpec,
  type RemoteExecutor,
  type RemoteSession,
  shellQuote,
} from '@kubeforge/core';

export const FAKE_JOIN_TOKEN = 'K10fake-join-token::server:0123456789abcdef';

export type RecordedCall =
  | { type: 'connect'; host: string }
  | { type: 'exec'; host: string; command: string; elevate: boolean; stdin?: string }
  | { type: 'upload'; host: string; localPath: string; remotePath: string }
  | { type: 'download'; host: string; remotePath: string; localPath: string }
  | { type: 'write'; host: string; remotePath: string; content: string }
  | { type: 'close'; host: string };

type Reply = Partial<CommandResult> | ((command: string, node: NodeSpec) => Partial<CommandResult>);

interface Rule {
  match: string | RegExp;
  host?: string;
  reply?: Reply;
  timeout?: boolean;
}

function matches(rule: Rule, command: string, node: NodeSpec): boolean {
  if (rule.host && rule.host !== node.hostname && rule.host !== node.ip) return false;
  return typeof rule.match === 'string' ? command.includes(rule.match) : rule.match.test(command);
}

const defaultRules: Rule[] = [
  { match: 'systemctl is-active', reply: { stdout: 'active\n' } },
  { match: '/server/node-token', reply: { stdout: `${FAKE_JOIN_TOKEN}\n` } },
  { match: 'stat -c %s', reply: { exitCode: 1, stderr: 'stat: cannot stat: No such file or directory' } },
  { match: 'ufw status', reply: { stdout: 'Status: active\n' } },
];

export class FakeExecutor implements RemoteExecutor {
  readonly calls: RecordedCall[] = [];
  /** remote files written through writeFile, keyed by `${hostname}:${path}` */
  readonly files = new Map<string, string>();
  private rules: Rule[] = [];
  private refused = new Set<string>();
  private scratchCount = 0;
  private defaults: Rule[] = [
    ...defaultRules,
    // mktemp hands out a fresh path per call
    {
      match: /^mktemp /,
      reply: command => ({
        stdout: `${command.slice('mktemp '.length).replace(/X+$/, '')}${String(++this.scratchCount).padStart(6, '0')}\n`,
      }),
    },
  ];

  /** Later rules win over earlier ones and over the defaults. */
  respond(match: string | RegExp, reply: Reply, host?: string): this {
    this.rules.unshift({ match, reply, host });
    return this;
  }

  fail(match: string | RegExp, host?: string, stderr = 'simulated failure', exitCode = 1): this {
    return this.respond(match, { exitCode, stderr }, host);
  }

  timeout(match: string | RegExp, host?: string): this {
    this.rules.unshift({ match, host, timeout: true });
    return this;
  }

  refuseConnection(host: string): this {
    this.refused.add(host);
    return this;
  }

  async connect(node: NodeSpec): Promise<RemoteSession> {
    this.calls.push({ type: 'connect', host: node.hostname });
    if (this.refused.has(node.hostname) || this.refused.has(node.ip)) {
      throw new ConnectionError(node.ip, 'connection refused');
    }
    return new FakeSession(node, this);
  }

  execute(node: NodeSpec, command: string, options: ExecOptions): CommandResult {
    this.calls.push({
      type: 'exec',
      host: node.hostname,
      command,
      elevate: options.elevate ?? false,
      stdin: options.stdin,
    });
    const rule = [...this.rules, ...this.defaults].find(r => matches(r, command, node));
    if (rule?.timeout) {
      throw new TimeoutError(`'${command}' on ${node.hostname}`, options.timeoutMs ?? 0);
    }
    const reply = typeof rule?.reply === 'function' ? rule.reply(command, node) : rule?.reply;
    return { stdout: reply?.stdout ?? '', stderr: reply?.stderr ?? '', exitCode: reply?.exitCode ?? 0 };
  }

  /** Hostnames in the order sessions were opened. */
  connections(): string[] {
    return this.calls.filter(c => c.type === 'connect').map(c => c.host);
  }

  commands(host?: string): string[] {
    const out: string[] = [];
    for (const call of this.calls) {
      if (call.type === 'exec' && (!host || call.host === host)) out.push(call.command);
    }
    return out;
  }

  uploads(host?: string): Array<{ localPath: string; remotePath: string }> {
    const out: Array<{ localPath: string; remotePath: string }> = [];
    for (const call of this.calls) {
      if (call.type === 'upload' && (!host || call.host === host)) {
        out.push({ localPath: call.localPath, remotePath: call.remotePath });
      }
    }
    return out;
  }

  file(host: string, remotePath: string): string | undefined {
    return this.files.get(`${host}:${remotePath}`);
  }

  /** Content last moved to `destination` by an `install <scratch> <destination>` command. */
  installed(host: string, destination: string): string | undefined {
    let content: string | undefined;
    for (const call of this.calls) {
      if (call.type !== 'exec' || call.host !== host) continue;
      const parts = call.command.split(' && ')[0].split(' ');
      if (parts[0] !== 'install' || parts.at(-1) !== shellQuote(destination)) continue;
      const scratch = parts.at(-2);
      if (scratch) content = this.file(host, scratch);
    }
    return content;
  }
}

class FakeSession implements RemoteSession {
  constructor(readonly node: NodeSpec, private executor: FakeExecutor) {}

  async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    return this.executor.execute(this.node, command, options);
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    this.executor.calls.push({ type: 'upload', host: this.node.hostname, localPath, remotePath });
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    this.executor.calls.push({ type: 'download', host: this.node.hostname, remotePath, localPath });
  }

  async writeFile(remotePath: string, content: string): Promise<void> {
    this.executor.calls.push({ type: 'write', host: this.node.hostname, remotePath, content });
    this.executor.files.set(`${this.node.hostname}:${remotePath}`, content);
  }

  async close(): Promise<void> {
    this.executor.calls.push({ type: 'close', host: this.node.hostname });
  }
}
