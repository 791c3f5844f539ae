import type { ClusterSpecInput, Distribution, OsFamily } from '@kubeforge/core';

export interface TemplateOptions {
  distribution: Distribution;
  os: OsFamily;
  airgap: boolean;
}

const DEFAULT_OS_VERSIONS: Record<OsFamily, string> = {
  rhel: '9',
  rocky: '9',
  centos: '8',
  ubuntu: '22.04',
  debian: '12',
};

const DEFAULT_VERSIONS: Record<Distribution, string> = {
  rke2: 'v1.32.3+rke2r1',
  k3s: 'v1.32.3+k3s1',
  vanilla: 'v1.32.3',
  kubeadm: 'v1.32.3',
  'eks-anywhere': 'v0.18.0',
};

const REGISTRY = 'registry.internal.local:5000';
const BUNDLE_DIR = '/opt/k8s-bundles';

function bundlesFor(distribution: Distribution, os: OsFamily): ClusterSpecInput['settings']['bundles'] {
  const rpm = os === 'rhel' || os === 'rocky' || os === 'centos';
  switch (distribution) {
    case 'rke2':
      return rpm
        ? { rpmBundle: `${BUNDLE_DIR}/rke2-rpms.tar.gz`, imagesBundle: `${BUNDLE_DIR}/rke2-images.linux-amd64.tar.gz` }
        : { airgapBundle: `${BUNDLE_DIR}/rke2.linux-amd64.tar.gz`, imagesBundle: `${BUNDLE_DIR}/rke2-images.linux-amd64.tar.gz` };
    case 'k3s':
      return {
        binary: `${BUNDLE_DIR}/k3s`,
        imagesBundle: `${BUNDLE_DIR}/k3s-airgap-images-amd64.tar.gz`,
        installScript: `${BUNDLE_DIR}/install.sh`,
      };
    case 'vanilla':
    case 'kubeadm':
      return { airgapBundle: `${BUNDLE_DIR}/kubeadm-bundle.tar.gz`, imagesBundle: `${BUNDLE_DIR}/k8s-images.tar` };
    case 'eks-anywhere':
      return {
        airgapBundle: `${BUNDLE_DIR}/eks-anywhere-bundle.tar.gz`,
        imagesBundle: `${BUNDLE_DIR}/eks-anywhere-images.tar.gz`,
      };
  }
}

/** A starting-point spec for `generate-config`; it parses as a ClusterSpec as-is. */
export function generateConfigTemplate(options: TemplateOptions): ClusterSpecInput {
  const { distribution, os, airgap } = options;
  const kubeadm = distribution === 'kubeadm' || distribution === 'vanilla';
  const staging = { bundles: '/home/k8s-admin/staging/bundles', images: '/home/k8s-admin/staging/images' };

  return {
    name: `${airgap ? 'airgapped' : 'online'}-${distribution}-cluster`,
    distribution,
    os: { family: os, version: DEFAULT_OS_VERSIONS[os] },
    runtime: 'containerd',
    airgap: airgap
      ? { enabled: true, localRegistry: REGISTRY, bundleStagingPath: BUNDLE_DIR, imageStagingPath: '/opt/container-images' }
      : { enabled: false },
    settings: {
      version: DEFAULT_VERSIONS[distribution],
      ...(airgap ? { bundles: bundlesFor(distribution, os) } : {}),
      clusterCidr: '10.42.0.0/16',
      serviceCidr: '10.43.0.0/16',
      cni: distribution === 'rke2' ? ['multus', 'canal'] : ['canal'],
      disable: distribution === 'rke2' ? ['rke2-ingress-nginx'] : [],
      domain: 'internal.local',
      writeKubeconfigMode: '0644',
      ...(kubeadm ? { token: 'abcdef.0123456789abcdef' } : {}),
      ...(airgap
        ? {
            registry: {
              mirrors: {
                'docker.io': { endpoint: [`https://${REGISTRY}/docker.io`] },
                'quay.io': { endpoint: [`https://${REGISTRY}/quay.io`] },
                'registry.k8s.io': { endpoint: [`https://${REGISTRY}/registry.k8s.io`] },
              },
              configs: {
                [REGISTRY]: { tls: { insecure_skip_verify: true }, auth: { username: 'registry-user', password: 'change-me' } },
              },
            },
          }
        : {}),
    },
    nodes: {
      servers: [
        {
          hostname: `${distribution}-server-1`,
          ip: '10.0.4.10',
          user: 'k8s-admin',
          sshKey: '~/.ssh/cluster_key',
          ...(airgap ? { stagingPaths: staging } : {}),
        },
      ],
      agents: [
        {
          hostname: `${distribution}-agent-1`,
          ip: '10.0.4.177',
          user: 'k8s-admin',
          sshKey: '~/.ssh/cluster_key',
          gpuEnabled: false,
          labels: { 'node-role.kubernetes.io/worker': 'true', environment: 'production' },
          ...(airgap ? { stagingPaths: staging } : {}),
        },
      ],
    },
    extraTools: ['k9s', 'helm', 'flux'],
    ...(airgap
      ? {
          packages: {
            [os]: { bundlePath: `${BUNDLE_DIR}/${os}-packages.tar.gz` },
          },
          tools: {
            k9s: `${BUNDLE_DIR}/k9s`,
            helm: `${BUNDLE_DIR}/helm`,
            flux: `${BUNDLE_DIR}/flux`,
          },
        }
      : {}),
  };
}
