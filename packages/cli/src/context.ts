import { confirm } from '@inquirer/prompts';
import { createLogger, type ClusterLogger, type RemoteExecutor } from '@kubeforge/core';
import { ConfigStore } from '@kubeforge/provisioner';
import { SshExecutor } from '@kubeforge/ssh';

export interface CliContext {
  executor: RemoteExecutor;
  log: ClusterLogger;
  store: ConfigStore;
  /** report output, kept apart from the log stream */
  print: (text: string) => void;
  confirm: (message: string) => Promise<boolean>;
}

export interface CreateCliContextOptions {
  debug?: boolean;
}

export function createCliContext(options: CreateCliContextOptions = {}): CliContext {
  return {
    // sshd on freshly imaged hosts can take a moment to accept connections
    executor: new SshExecutor({ connectAttempts: 3, retryDelayMs: 5000 }),
    log: createLogger({ pretty: true, level: options.debug ? 'debug' : undefined }),
    store: new ConfigStore(),
    print: text => {
      process.stdout.write(`${text}\n`);
    },
    confirm: message => confirm({ message, default: false }),
  };
}
