import { ConfigurationError, Distribution } from '@kubeforge/core';
import { EksAnywhereHandler } from './eks-anywhere';
import { K3sHandler } from './k3s';
import { KubeadmHandler } from './kubeadm';
import { Rke2Handler } from './rke2';
import type { DistributionHandler } from './types';

const handlers: Record<Distribution, () => DistributionHandler> = {
  rke2: () => new Rke2Handler(),
  k3s: () => new K3sHandler(),
  vanilla: () => new KubeadmHandler('vanilla'),
  kubeadm: () => new KubeadmHandler('kubeadm'),
  'eks-anywhere': () => new EksAnywhereHandler(),
};

export function createDistributionHandler(distribution: string): DistributionHandler {
  const parsed = Distribution.safeParse(distribution);
  if (!parsed.success) {
    throw new ConfigurationError(
      `unsupported distribution '${distribution}'`,
      [`supported: ${Distribution.options.join(', ')}`],
    );
  }
  return handlers[parsed.data]();
}

export { EksAnywhereHandler, K3sHandler, KubeadmHandler, Rke2Handler };
export { rke2RpmOrder, RKE2_IMAGES_DIR } from './rke2';
export { minorVersion } from './kubeadm';
export type { ArtifactRequirement, DistributionContext, DistributionHandler } from './types';
