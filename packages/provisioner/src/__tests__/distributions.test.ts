import { describe, it, expect } from 'vitest';
import { load, loadAll } from 'js-yaml';
import { ConfigurationError, TokenNotReadyError, type ClusterSpec, type NodeAssignment } from '@kubeforge/core';
import { fixtures } from '@kubeforge/test-utils';
import { createDistributionHandler, minorVersion, rke2RpmOrder } from '../distributions';
import type { DistributionContext, DistributionHandler } from '../distributions/types';
import { createOsHandler } from '../os';
import { assignRoles } from '../plan';

function contextFor(spec: ClusterSpec, assignment: NodeAssignment, token?: string): DistributionContext {
  return {
    spec,
    assignment,
    firstServer: spec.nodes.servers[0],
    token,
    staging: { bundles: '/opt/k8s-bundles', images: '/opt/container-images' },
    os: createOsHandler(spec.os.family),
  };
}

function renderMain(dist: DistributionHandler, ctx: DistributionContext): unknown {
  return load(dist.renderConfig(ctx)[0].content);
}

describe('createDistributionHandler', () => {
  it('should map vanilla and kubeadm to the kubeadm handler', () => {
    expect(createDistributionHandler('vanilla').name).toBe('vanilla');
    expect(createDistributionHandler('kubeadm').name).toBe('kubeadm');
  });

  it('should reject an unknown distribution', () => {
    expect(() => createDistributionHandler('openshift')).toThrow(ConfigurationError);
  });
});

describe('Rke2Handler', () => {
  const spec = fixtures.rke2Online();
  const dist = createDistributionHandler('rke2');
  const [first, joining, agent] = assignRoles(spec);

  it('should initialize the cluster on the first server without a token', () => {
    expect(renderMain(dist, contextFor(spec, first))).toEqual({
      'cluster-init': true,
      'node-name': 'server-a',
      'write-kubeconfig-mode': '0644',
      'tls-san': ['192.0.2.10', 'server-a', 'server-a.lab.internal'],
      'cluster-cidr': '10.42.0.0/16',
      'service-cidr': '10.43.0.0/16',
      cni: ['canal'],
    });
  });

  it('should point joining servers at the supervisor port with the token', () => {
    const config = renderMain(dist, contextFor(spec, joining, 'test-secret'));

    expect(config).toMatchObject({
      server: 'https://192.0.2.10:9345',
      token: 'test-secret',
      'node-name': 'server-b',
      'tls-san': ['192.0.2.11', 'server-b', 'server-b.lab.internal'],
    });
  });

  it('should keep server-only keys out of agent configs', () => {
    expect(renderMain(dist, contextFor(spec, agent, 'test-secret'))).toEqual({
      server: 'https://192.0.2.10:9345',
      token: 'test-secret',
      'node-name': 'agent-c',
    });
  });

  it('should refuse to render a join config without a token', () => {
    expect(() => dist.renderConfig(contextFor(spec, agent))).toThrow(TokenNotReadyError);
  });

  it('should write config files with mode 0600 and no registries file online', () => {
    const files = dist.renderConfig(contextFor(spec, first));

    expect(files.map(f => f.path)).toEqual(['/etc/rancher/rke2/config.yaml']);
    expect(files[0].mode).toBe('0600');
  });

  it('should mirror every registry through the local one in airgap mode', () => {
    const airgap = fixtures.rke2Airgap('/srv/bundles');
    const files = dist.renderConfig(contextFor(airgap, assignRoles(airgap)[0]));

    expect(files.map(f => f.path)).toEqual(['/etc/rancher/rke2/config.yaml', '/etc/rancher/rke2/registries.yaml']);
    expect(load(files[0].content)).toMatchObject({ 'system-default-registry': 'registry.lab.internal:5000' });
    expect(load(files[1].content)).toEqual({
      mirrors: { '*': { endpoint: ['https://registry.lab.internal:5000'] } },
      configs: {},
    });
  });

  it('should render node labels as key=value pairs', () => {
    const labelled: ClusterSpec = {
      ...spec,
      nodes: {
        ...spec.nodes,
        agents: [{ ...spec.nodes.agents[0], labels: { 'node-role.kubernetes.io/worker': 'true' } }],
      },
    };
    const [, , labelledAgent] = assignRoles(labelled);

    expect(renderMain(dist, contextFor(labelled, labelledAgent, 'test-secret'))).toMatchObject({
      'node-label': ['node-role.kubernetes.io/worker=true'],
    });
  });

  it('should use a static token when one is configured', () => {
    expect(dist.tokenSource(spec.settings)).toBe('dynamic');
    expect(dist.tokenSource({ ...spec.settings, token: 'test-secret' })).toBe('static');
  });

  it('should ship RPMs on rpm systems and the tarball elsewhere', () => {
    const rpm = dist.requiredArtifacts(spec, createOsHandler('rhel')).map(a => a.key);
    const deb = dist.requiredArtifacts(spec, createOsHandler('ubuntu')).map(a => a.key);

    expect(rpm).toEqual(['rpmBundle', 'imagesBundle']);
    expect(deb).toEqual(['airgapBundle', 'imagesBundle']);
  });

  it('should install RPMs in dependency order', () => {
    expect(rke2RpmOrder('server')).toEqual(['rke2-selinux', 'rke2-common', 'rke2-server']);
    expect(rke2RpmOrder('agent')).toEqual(['rke2-selinux', 'rke2-common', 'rke2-agent']);
  });
});

describe('K3sHandler', () => {
  const spec = fixtures.k3sOnline();
  const dist = createDistributionHandler('k3s');

  it('should join through the API server port', () => {
    const agent = assignRoles(spec)[2];
    expect(renderMain(dist, contextFor(spec, agent, 'test-secret'))).toEqual({
      server: 'https://192.0.2.10:6443',
      token: 'test-secret',
      'node-name': 'agent-c',
    });
  });

  it('should name the agent unit k3s-agent', () => {
    expect(dist.serviceName('server')).toBe('k3s');
    expect(dist.serviceName('agent')).toBe('k3s-agent');
  });
});

describe('KubeadmHandler', () => {
  const spec = fixtures.kubeadm();
  const dist = createDistributionHandler('kubeadm');
  const [first, joining, agent] = assignRoles(spec);

  it('should always use the static bootstrap token', () => {
    expect(dist.tokenSource(spec.settings)).toBe('static');
  });

  it('should render init and cluster configuration for the first server', () => {
    const [init, cluster] = loadAll(dist.renderConfig(contextFor(spec, first, 'abcdef.0123456789abcdef'))[0].content);

    expect(init).toMatchObject({
      kind: 'InitConfiguration',
      bootstrapTokens: [{ token: 'abcdef.0123456789abcdef', ttl: '24h0m0s' }],
      localAPIEndpoint: { advertiseAddress: '192.0.2.10', bindPort: 6443 },
      certificateKey: 'test-secret',
    });
    expect(cluster).toMatchObject({
      kind: 'ClusterConfiguration',
      clusterName: 'test-cluster',
      kubernetesVersion: 'v1.30.4',
      controlPlaneEndpoint: '192.0.2.10:6443',
      networking: { podSubnet: '10.42.0.0/16', serviceSubnet: '10.43.0.0/16' },
    });
  });

  it('should add a control plane section only for joining servers', () => {
    const server = renderMain(dist, contextFor(spec, joining, 'abcdef.0123456789abcdef'));
    const worker = renderMain(dist, contextFor(spec, agent, 'abcdef.0123456789abcdef'));

    expect(server).toMatchObject({
      kind: 'JoinConfiguration',
      controlPlane: { localAPIEndpoint: { advertiseAddress: '192.0.2.11', bindPort: 6443 }, certificateKey: 'test-secret' },
    });
    expect(worker).toMatchObject({
      kind: 'JoinConfiguration',
      discovery: { bootstrapToken: { apiServerEndpoint: '192.0.2.10:6443', token: 'abcdef.0123456789abcdef' } },
    });
    expect(worker).not.toHaveProperty('controlPlane');
  });

  it('should derive the package repository minor version', () => {
    expect(minorVersion('1.30.4')).toBe('v1.30');
    expect(minorVersion('v1.29.1')).toBe('v1.29');
  });
});

describe('EksAnywhereHandler', () => {
  const spec: ClusterSpec = { ...fixtures.rke2Online(), distribution: 'eks-anywhere' };
  const dist = createDistributionHandler('eks-anywhere');

  it('should only drive the first server', () => {
    const [first, joining, agent] = assignRoles(spec);

    expect(dist.participates(first)).toBe(true);
    expect(dist.participates(joining)).toBe(false);
    expect(dist.participates(agent)).toBe(false);
    expect(dist.tokenSource(spec.settings)).toBe('none');
  });
});
