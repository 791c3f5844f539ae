import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { ClusterSpec, ConfigurationError } from '@kubeforge/core';
import { fixtures } from '@kubeforge/test-utils';
import { ConfigStore } from '../config/store';
import { generateConfigTemplate } from '../config/template';

const store = new ConfigStore();

const legacyRke2 = `
cluster:
  name: legacy-lab
  version: v1.28.9+rke2r1
  airgap_bundle_path: /srv/rke2.linux-amd64.tar.gz
  images_bundle_path: /srv/rke2-images.tar.zst
  local_registry: registry.lab.internal:5000
  token: test-secret
nodes:
  servers:
    - hostname: server-a
      ip: 192.0.2.10
      user: root
      ssh_key: ~/.ssh/id_ed25519
      sudo_password: ""
  agents:
    - hostname: agent-c
      ip: 192.0.2.20
      user: k8s-admin
      ssh_key: ~/.ssh/id_ed25519
      gpu_enabled: true
`;

const deploymentLayout = `
deployment:
  k8s_distribution: eks-a
  os:
    type: ubuntu
    version: "22.04"
  airgap:
    enabled: false
  eks_anywhere:
    version: v0.19.0
cluster:
  eks-a:
    name: edge
    cluster_cidr: 10.244.0.0/16
    registry:
      mirrors:
        docker.io:
          endpoints: ["https://mirror.lab.internal"]
nodes:
  servers:
    - hostname: admin-1
      ip: 192.0.2.30
      user: k8s-admin
      ssh_key: /tmp/key
packages:
  ubuntu:
    bundle_path: /srv/ubuntu-packages.tar.gz
    base_packages: [curl]
`;

describe('ConfigStore', () => {
  it('should convert the legacy RKE2 layout', () => {
    const { spec, notes } = store.parse(legacyRke2);

    expect(notes).toEqual([
      'converted the legacy RKE2-only layout',
      'converted the deployment/cluster layout (rke2)',
      'renamed 4 snake_case node keys',
    ]);
    expect(spec.name).toBe('legacy-lab');
    expect(spec.distribution).toBe('rke2');
    expect(spec.os).toEqual({ family: 'rhel', version: '8' });
    expect(spec.airgap).toMatchObject({ enabled: true, localRegistry: 'registry.lab.internal:5000' });
    expect(spec.settings.bundles).toEqual({
      airgapBundle: '/srv/rke2.linux-amd64.tar.gz',
      imagesBundle: '/srv/rke2-images.tar.zst',
    });
    expect(spec.settings.token).toBe('test-secret');
    expect(spec.nodes.servers[0].sshKey).toBe('~/.ssh/id_ed25519');
    expect(spec.nodes.servers[0].sudoPassword).toBeUndefined();
    expect(spec.nodes.agents[0].gpuEnabled).toBe(true);
  });

  it('should replace root with the promoted user when asked', () => {
    const { spec, notes } = store.parse(legacyRke2, { promoteRootTo: 'k8s-admin' });

    expect(spec.nodes.servers[0].user).toBe('k8s-admin');
    expect(notes).toContain('SSH user root replaced by k8s-admin on server-a');
  });

  it('should convert the deployment layout and its aliases', () => {
    const { spec, notes } = store.parse(deploymentLayout);

    expect(notes).toEqual(['converted the deployment/cluster layout (eks-anywhere)', 'renamed 1 snake_case node keys']);
    expect(spec.distribution).toBe('eks-anywhere');
    expect(spec.name).toBe('edge');
    expect(spec.os).toEqual({ family: 'ubuntu', version: '22.04' });
    expect(spec.settings.version).toBe('v0.19.0');
    expect(spec.settings.clusterCidr).toBe('10.244.0.0/16');
    expect(spec.settings.registry?.mirrors['docker.io'].endpoint).toEqual(['https://mirror.lab.internal']);
    expect(spec.packages.ubuntu).toEqual({ bundlePath: '/srv/ubuntu-packages.tar.gz', basePackages: ['curl'] });
  });

  it('should load the current layout without notes', () => {
    const { spec, notes } = store.fromDocument({ ...fixtures.inputs.rke2Online() });

    expect(notes).toEqual([]);
    expect(spec.nodes.servers.map(n => n.hostname)).toEqual(['server-a', 'server-b']);
  });

  it('should reject malformed YAML', () => {
    expect(() => store.parse('nodes: [unterminated', {}, 'broken.yaml')).toThrow(ConfigurationError);
  });

  it('should reject a document that is not a mapping', () => {
    expect(() => store.parse('- a\n- b\n', {}, 'list.yaml')).toThrow('list.yaml must contain a mapping at the top level');
  });

  it('should list every schema problem with its path', () => {
    try {
      store.parse('name: lab\ndistribution: openshift\n', {}, 'bad.yaml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues.map(i => i.split(':')[0])).toEqual(['distribution', 'os', 'settings', 'nodes']);
    }
  });

  it('should write a file that loads back unchanged', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kubeforge-config-'));
    const file = path.join(dir, 'cluster.yaml');
    try {
      await store.save(file, fixtures.inputs.rke2Online());
      const { spec } = await store.load(file);
      expect(spec).toEqual(fixtures.rke2Online());
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should fail to load a file that does not exist', async () => {
    await expect(store.load('/nonexistent/cluster.yaml')).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('generateConfigTemplate', () => {
  it.each([
    ['rke2', 'rhel', true],
    ['rke2', 'ubuntu', false],
    ['k3s', 'ubuntu', true],
    ['kubeadm', 'rocky', true],
    ['eks-anywhere', 'ubuntu', false],
  ] as const)('should produce a valid %s/%s template (airgap %s)', (distribution, family, airgap) => {
    const result = ClusterSpec.safeParse(generateConfigTemplate({ distribution, os: family, airgap }));
    expect(result.success).toBe(true);
  });

  it('should include bundle paths only in airgap templates', () => {
    const spec = ClusterSpec.parse(generateConfigTemplate({ distribution: 'rke2', os: 'rhel', airgap: true }));

    expect(spec.airgap.enabled).toBe(true);
    expect(spec.settings.bundles.rpmBundle).toBe('/opt/k8s-bundles/rke2-rpms.tar.gz');
    expect(spec.tools.helm).toBe('/opt/k8s-bundles/helm');
  });
});
