/**
 * Shared cluster fixtures. Addresses come from the documentation ranges and
 * secrets are placeholders.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ClusterSpec, type ClusterSpecInput, type NodeSpec } from '@kubeforge/core';

export const TEST_SSH_KEY = '/tmp/kubeforge-test/id_ed25519';

export function node(hostname: string, ip: string, overrides: Partial<NodeSpec> = {}): ClusterSpecInput['nodes']['servers'][number] {
  return { hostname, ip, user: 'k8s-admin', sshKey: TEST_SSH_KEY, ...overrides };
}

// fast polling so bounded waits finish inside a test
const testTimeouts = {
  serviceActiveMs: 50,
  kubeconfigMs: 50,
  tokenMs: 50,
  pollIntervalMs: 5,
};

export const fixtures = {
  inputs: {
    /** servers A and B, agent C; RKE2 pulled from the internet */
    rke2Online(): ClusterSpecInput {
      return {
        name: 'test-cluster',
        distribution: 'rke2',
        os: { family: 'rhel', version: '9' },
        settings: { version: 'v1.30.4+rke2r1', domain: 'lab.internal' },
        nodes: {
          servers: [node('server-a', '192.0.2.10'), node('server-b', '192.0.2.11')],
          agents: [node('agent-c', '192.0.2.20')],
        },
        timeouts: testTimeouts,
      };
    },

    rke2Airgap(bundleDir: string): ClusterSpecInput {
      return {
        ...fixtures.inputs.rke2Online(),
        airgap: { enabled: true, localRegistry: 'registry.lab.internal:5000' },
        settings: {
          version: 'v1.30.4+rke2r1',
          domain: 'lab.internal',
          bundles: {
            airgapBundle: path.join(bundleDir, 'rke2.linux-amd64.tar.gz'),
            imagesBundle: path.join(bundleDir, 'rke2-images.linux-amd64.tar.zst'),
            rpmBundle: path.join(bundleDir, 'rke2-rpms.tar.gz'),
            installScript: path.join(bundleDir, 'install.sh'),
          },
        },
      };
    },

    k3sOnline(): ClusterSpecInput {
      return {
        ...fixtures.inputs.rke2Online(),
        distribution: 'k3s',
        os: { family: 'ubuntu', version: '22.04' },
        settings: { version: 'v1.30.4+k3s1' },
      };
    },

    kubeadm(): ClusterSpecInput {
      return {
        ...fixtures.inputs.rke2Online(),
        distribution: 'kubeadm',
        os: { family: 'ubuntu', version: '22.04' },
        settings: { version: '1.30.4', token: 'abcdef.0123456789abcdef', certificateKey: 'test-secret' },
      };
    },
  },

  rke2Online(): ClusterSpec {
    return ClusterSpec.parse(fixtures.inputs.rke2Online());
  },

  rke2Airgap(bundleDir: string): ClusterSpec {
    return ClusterSpec.parse(fixtures.inputs.rke2Airgap(bundleDir));
  },

  k3sOnline(): ClusterSpec {
    return ClusterSpec.parse(fixtures.inputs.k3sOnline());
  },

  kubeadm(): ClusterSpec {
    return ClusterSpec.parse(fixtures.inputs.kubeadm());
  },
};

/**
 * Creates a scratch directory holding placeholder files with the given names.
 * Returns the directory; callers remove it with `removeScratch`.
 */
export async function createScratchFiles(names: string[], content = 'placeholder'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kubeforge-test-'));
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), content);
  }
  return dir;
}

export async function removeScratch(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const RKE2_BUNDLE_FILES = [
  'rke2.linux-amd64.tar.gz',
  'rke2-images.linux-amd64.tar.zst',
  'rke2-rpms.tar.gz',
  'install.sh',
];
