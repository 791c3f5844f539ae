import { ConfigurationError, OsFamily } from '@kubeforge/core';
import { RhelHandler } from './rhel';
import { UbuntuHandler } from './ubuntu';
import type { OSHandler } from './types';

const handlers: Record<OsFamily, () => OSHandler> = {
  rhel: () => new RhelHandler(),
  rocky: () => new RhelHandler(),
  centos: () => new RhelHandler(),
  ubuntu: () => new UbuntuHandler(),
  debian: () => new UbuntuHandler(),
};

export function createOsHandler(family: string): OSHandler {
  const parsed = OsFamily.safeParse(family);
  if (!parsed.success) {
    throw new ConfigurationError(
      `unsupported operating system '${family}'`,
      [`supported: ${OsFamily.options.join(', ')}`],
    );
  }
  return handlers[parsed.data]();
}

export { RhelHandler, UbuntuHandler };
export * from './types';
export { firewallPorts, kernelModuleFiles, KERNEL_MODULES } from './base';
