import type { Timeouts } from '@kubeforge/core';

export interface SshExecutorConfig {
  /** Defaults applied to every session unless the caller passes its own. */
  timeouts?: Partial<Timeouts>;
  /** Retries while the SSH daemon is not accepting connections yet. */
  connectAttempts?: number;
  retryDelayMs?: number;
}

export interface ElevatedCommand {
  command: string;
  stdin?: string;
}
