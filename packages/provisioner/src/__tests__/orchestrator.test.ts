import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { load } from 'js-yaml';
import { ClusterSpec, ValidationError, silentLogger, type ClusterSpecInput } from '@kubeforge/core';
import {
  FAKE_JOIN_TOKEN,
  FakeExecutor,
  RKE2_BUNDLE_FILES,
  createScratchFiles,
  fixtures,
  node,
  removeScratch,
} from '@kubeforge/test-utils';
import { ClusterOrchestrator } from '../orchestrator';

const RKE2_CONFIG = '/etc/rancher/rke2/config.yaml';

function orchestrate(spec: ClusterSpec, executor: FakeExecutor) {
  const orchestrator = new ClusterOrchestrator(spec, { executor, log: silentLogger() });
  const timeline: string[] = [];
  orchestrator.events.on('node:start', a => timeline.push(`start:${a.node.hostname}`));
  orchestrator.events.on('token:acquired', a => timeline.push(`token:${a.node.hostname}`));
  orchestrator.events.on('config:rendered', a => timeline.push(`config:${a.node.hostname}`));
  orchestrator.events.on('node:skipped', a => timeline.push(`skipped:${a.node.hostname}`));
  orchestrator.events.on('health:result', r => timeline.push(`health:${r.hostname}`));
  return { orchestrator, timeline };
}

function withAgents(...agents: ClusterSpecInput['nodes']['servers']): ClusterSpec {
  const input = fixtures.inputs.rke2Online();
  return ClusterSpec.parse({ ...input, nodes: { ...input.nodes, agents } });
}

function airgapWithAgents(bundleDir: string, ...agents: ClusterSpecInput['nodes']['servers']): ClusterSpec {
  const input = fixtures.inputs.rke2Airgap(bundleDir);
  return ClusterSpec.parse({ ...input, nodes: { ...input.nodes, agents } });
}

describe('ClusterOrchestrator', () => {
  describe('online RKE2 with two servers and one agent', () => {
    it('should provision the first server, then the joining server, then the agent', async () => {
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('success');
      expect(result.results.map(r => [r.node.hostname, r.role, r.status])).toEqual([
        ['server-a', 'first-server', 'success'],
        ['server-b', 'joining-server', 'success'],
        ['agent-c', 'agent', 'success'],
      ]);
      // health checks reconnect to the servers afterwards
      expect(executor.connections()).toEqual(['server-a', 'server-b', 'agent-c', 'server-a', 'server-b']);
    });

    it('should acquire the join token before any other node renders its config', async () => {
      const { orchestrator, timeline } = orchestrate(fixtures.rke2Online(), new FakeExecutor());

      await orchestrator.deploy({ skipValidation: true });

      expect(timeline).toEqual([
        'start:server-a',
        'config:server-a',
        'token:server-a',
        'start:server-b',
        'config:server-b',
        'start:agent-c',
        'config:agent-c',
        'health:server-a',
        'health:server-b',
      ]);
    });

    it('should hand joining nodes the supervisor URL and the acquired token', async () => {
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      await orchestrator.deploy({ skipValidation: true });

      for (const host of ['server-b', 'agent-c']) {
        expect(load(executor.installed(host, RKE2_CONFIG) ?? '')).toMatchObject({
          server: 'https://192.0.2.10:9345',
          token: FAKE_JOIN_TOKEN,
        });
      }
      expect(load(executor.installed('server-a', RKE2_CONFIG) ?? '')).toMatchObject({ 'cluster-init': true });
      expect(executor.installed('server-a', RKE2_CONFIG)).not.toContain('token');
    });

    it('should install each node with its own role and start its service', async () => {
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      await orchestrator.deploy({ skipValidation: true });

      expect(executor.commands('server-b')).toContain(
        'curl -sfL https://get.rke2.io | INSTALL_RKE2_TYPE=server INSTALL_RKE2_VERSION=v1.30.4+rke2r1 sh -',
      );
      expect(executor.commands('agent-c')).toContain(
        'curl -sfL https://get.rke2.io | INSTALL_RKE2_TYPE=agent INSTALL_RKE2_VERSION=v1.30.4+rke2r1 sh -',
      );
      expect(executor.commands('agent-c')).toContain('systemctl enable --now rke2-agent');
      // the agent never reads the token file
      expect(executor.commands('agent-c').some(c => c.includes('node-token'))).toBe(false);
    });

    it('should succeed again when the same cluster is deployed twice', async () => {
      const executor = new FakeExecutor();
      const { orchestrator, timeline } = orchestrate(fixtures.rke2Online(), executor);
      const configs = () => ['server-a', 'server-b', 'agent-c'].map(host => executor.installed(host, RKE2_CONFIG));

      const first = await orchestrator.deploy({ skipValidation: true });
      const firstConfigs = configs();
      const firstTimeline = timeline.splice(0);
      const second = await orchestrator.deploy({ skipValidation: true });

      expect([first.status, second.status]).toEqual(['success', 'success']);
      expect(timeline).toEqual(firstTimeline);
      expect(timeline.indexOf('token:server-a')).toBeLessThan(timeline.indexOf('config:server-b'));
      expect(configs()).toEqual(firstConfigs);
      expect(load(configs()[2] ?? '')).toMatchObject({ token: FAKE_JOIN_TOKEN });
      // each run rewrites every config file
      const writes = executor.commands().filter(c => c.startsWith('install -D') && c.includes(` ${RKE2_CONFIG} && `));
      expect(writes).toHaveLength(6);
    });

    it('should health-check the servers only', async () => {
      const { orchestrator } = orchestrate(fixtures.rke2Online(), new FakeExecutor());

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.health.map(h => [h.hostname, h.serviceActive])).toEqual([
        ['server-a', true],
        ['server-b', true],
      ]);
    });
  });

  describe('failures', () => {
    it('should stop before the agents when a joining server fails', async () => {
      const executor = new FakeExecutor().fail('get.rke2.io', 'server-b');
      const { orchestrator, timeline } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('failure');
      expect(result.skipped).toEqual(['agent-c']);
      expect(executor.connections()).toEqual(['server-a', 'server-b']);
      expect(timeline).toContain('skipped:agent-c');
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toMatchObject({ state: 'distribution-install', kind: 'command' });
      expect(result.reason).toBe(
        "server-b (joining-server) failed during distribution-install: 'curl -sfL https://get.rke2.io | " +
          "INSTALL_RKE2_TYPE=server INSTALL_RKE2_VERSION=v1.30.4+rke2r1 sh -' exited with 1: simulated failure",
      );
    });

    it('should not contact any other node when the first server fails', async () => {
      const executor = new FakeExecutor().fail('dnf install', 'server-a');
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(executor.connections()).toEqual(['server-a']);
      expect(result.skipped).toEqual(['server-b', 'agent-c']);
      expect(result.failures[0]).toMatchObject({ state: 'os-prepare' });
    });

    it('should keep provisioning agents after one agent fails', async () => {
      const spec = withAgents(node('agent-c', '192.0.2.20'), node('agent-d', '192.0.2.21'));
      const executor = new FakeExecutor().fail('get.rke2.io', 'agent-c');
      const { orchestrator } = orchestrate(spec, executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('failure');
      expect(result.skipped).toEqual([]);
      expect(result.results.map(r => [r.node.hostname, r.status])).toEqual([
        ['server-a', 'success'],
        ['server-b', 'success'],
        ['agent-c', 'failure'],
        ['agent-d', 'success'],
      ]);
      expect(result.health).toHaveLength(2);
    });

    it('should fail the node, not hang, when its service never becomes active', async () => {
      const executor = new FakeExecutor().respond('systemctl is-active rke2-server', { stdout: 'activating\n' }, 'server-a');
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.failures[0]).toMatchObject({ state: 'service-start', kind: 'timeout' });
      expect(result.failures[0].reason).toMatch(/^rke2-server to become active on server-a did not finish/);
      expect(result.skipped).toEqual(['server-b', 'agent-c']);
    });

    it('should fail the first server when the token file never appears', async () => {
      const executor = new FakeExecutor().respond('/server/node-token', { stdout: '' }, 'server-a');
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.failures[0]).toMatchObject({ state: 'service-start', kind: 'timeout' });
      expect(executor.connections()).toEqual(['server-a']);
    });

    it('should warn and carry on when the kubeconfig does not appear', async () => {
      const executor = new FakeExecutor().fail('test -s /etc/rancher/rke2/rke2.yaml', 'server-a');
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('success');
      expect(result.results[0].warnings[0]).toMatch(
        /^kubeconfig at \/etc\/rancher\/rke2\/rke2\.yaml on server-a did not finish within \d+s; kubectl setup skipped$/,
      );
      expect(executor.commands('server-a').some(c => c.includes('.kube/config'))).toBe(false);
    });

    it('should report a refused connection against the connect state', async () => {
      const executor = new FakeExecutor().refuseConnection('agent-c');
      const { orchestrator } = orchestrate(fixtures.rke2Online(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toMatchObject({ state: 'connect', kind: 'connection' });
      expect(result.failures[0].reason).toBe('192.0.2.20: connection refused');
    });
  });

  describe('airgap', () => {
    let scratch: string | undefined;

    afterEach(async () => {
      if (scratch) await removeScratch(scratch);
      scratch = undefined;
    });

    it('should refuse to start when an artifact is missing', async () => {
      scratch = await createScratchFiles(RKE2_BUNDLE_FILES);
      const images = path.join(scratch, 'rke2-images.linux-amd64.tar.zst');
      await removeScratch(images);
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.rke2Airgap(scratch), executor);

      const rejection = orchestrator.deploy();

      await expect(rejection).rejects.toBeInstanceOf(ValidationError);
      await expect(rejection).rejects.toMatchObject({
        failedChecks: expect.arrayContaining([`bundle 'images-bundle' not found at ${images}`]),
      });
      expect(executor.connections()).toEqual([]);
    });

    it('should stage every node before provisioning any of them', async () => {
      scratch = await createScratchFiles(RKE2_BUNDLE_FILES);
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.rke2Airgap(scratch), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('success');
      expect(result.staged).toEqual(['server-a', 'server-b', 'agent-c']);
      expect(executor.connections()).toEqual([
        'server-a', 'server-b', 'agent-c',
        'server-a', 'server-b', 'agent-c',
        'server-a', 'server-b',
      ]);
      expect(executor.commands('agent-c')).toContain(
        "dnf install -y --disablerepo='*' /opt/k8s-bundles/rpms/rke2-agent-[0-9]*.rpm",
      );
    });

    it('should stop after staging in stage-only mode', async () => {
      scratch = await createScratchFiles(RKE2_BUNDLE_FILES);
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.rke2Airgap(scratch), executor);

      const result = await orchestrator.deploy({ skipValidation: true, stageOnly: true });

      expect(result.staged).toEqual(['server-a', 'server-b', 'agent-c']);
      expect(result.results).toEqual([]);
      expect(executor.commands().some(c => c.includes('systemctl enable'))).toBe(false);
    });

    it('should abort when staging fails on a server', async () => {
      scratch = await createScratchFiles(RKE2_BUNDLE_FILES);
      const executor = new FakeExecutor().refuseConnection('server-b');
      const { orchestrator } = orchestrate(fixtures.rke2Airgap(scratch), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.failures[0]).toMatchObject({ state: 'bundle-stage', kind: 'connection' });
      expect(result.skipped).toEqual(['agent-c']);
      expect(executor.connections()).toEqual(['server-a', 'server-b']);
    });

    it('should fail only the agent whose staging fails and provision the rest', async () => {
      scratch = await createScratchFiles(RKE2_BUNDLE_FILES);
      const spec = airgapWithAgents(scratch, node('agent-c', '192.0.2.20'), node('agent-d', '192.0.2.21'));
      const executor = new FakeExecutor().refuseConnection('agent-c');
      const { orchestrator } = orchestrate(spec, executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('failure');
      expect(result.skipped).toEqual([]);
      expect(result.staged).toEqual(['server-a', 'server-b', 'agent-d']);
      expect(result.results.map(r => [r.node.hostname, r.status])).toEqual([
        ['agent-c', 'failure'],
        ['server-a', 'success'],
        ['server-b', 'success'],
        ['agent-d', 'success'],
      ]);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toMatchObject({ state: 'bundle-stage', kind: 'connection' });
      expect(executor.connections()).toEqual([
        'server-a', 'server-b', 'agent-c', 'agent-d',
        'server-a', 'server-b', 'agent-d',
        'server-a', 'server-b',
      ]);
    });

    it('should stage and install a tool chosen for this run', async () => {
      scratch = await createScratchFiles([...RKE2_BUNDLE_FILES, 'helm']);
      const spec: ClusterSpec = { ...fixtures.rke2Airgap(scratch), tools: { helm: path.join(scratch, 'helm') } };
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(spec, executor);

      const result = await orchestrator.deploy({ skipValidation: true, tools: ['helm'] });

      expect(result.status).toBe('success');
      expect(executor.uploads('server-a').map(u => u.remotePath)).toEqual([
        '/opt/k8s-bundles/rke2-rpms.tar.gz',
        '/opt/container-images/rke2-images.tar.gz',
        '/opt/k8s-bundles/helm',
      ]);
      expect(executor.uploads('agent-c').map(u => u.remotePath)).not.toContain('/opt/k8s-bundles/helm');
      expect(executor.commands('server-a')).toContain('install -m 0755 /opt/k8s-bundles/helm /usr/local/bin/helm');
      expect(result.results[0].warnings).toEqual([]);
    });

    it('should include a tool chosen for this run in the dry-run plan', async () => {
      scratch = await createScratchFiles(RKE2_BUNDLE_FILES);
      const helm = path.join(scratch, 'helm');
      const spec: ClusterSpec = { ...fixtures.rke2Airgap(scratch), tools: { helm } };
      const { orchestrator } = orchestrate(spec, new FakeExecutor());

      const plan = await orchestrator.plan({ tools: ['helm'] });

      expect(plan.extraTools).toEqual(['helm']);
      expect(plan.artifacts.map(a => [a.name, a.status])).toEqual([
        ['rpm-bundle', 'present'],
        ['images-bundle', 'present'],
        ['helm', 'missing'],
      ]);
      expect(plan.bundlesReady).toBe(false);
      await fs.writeFile(helm, 'placeholder');
      expect((await orchestrator.plan({ tools: ['helm'] })).bundlesReady).toBe(true);
    });
  });

  describe('GPU agents', () => {
    it('should install the GPU stack after base provisioning', async () => {
      const spec = withAgents(node('agent-c', '192.0.2.20', { gpuEnabled: true }));
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(spec, executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.gpu.map(r => [r.node.hostname, r.status])).toEqual([['agent-c', 'success']]);
      const commands = executor.commands('agent-c');
      expect(commands.indexOf('dnf install -y nvidia-container-toolkit')).toBeGreaterThan(
        commands.indexOf('systemctl enable --now rke2-agent'),
      );
      expect(commands.at(-1)).toBe('systemctl restart rke2-agent');
    });
  });

  describe('kubeadm', () => {
    it('should init the first server and join the rest with the static token', async () => {
      const executor = new FakeExecutor()
        .fail('test -f /etc/kubernetes/admin.conf')
        .fail('test -f /etc/kubernetes/kubelet.conf');
      const { orchestrator, timeline } = orchestrate(fixtures.kubeadm(), executor);

      const result = await orchestrator.deploy({ skipValidation: true });

      expect(result.status).toBe('success');
      expect(timeline.some(entry => entry.startsWith('token:'))).toBe(false);
      expect(executor.commands('server-a')).toContain(
        'kubeadm init --config /etc/kubernetes/kubeadm-config.yaml --upload-certs',
      );
      expect(executor.commands('agent-c')).toContain('kubeadm join --config /etc/kubernetes/kubeadm-config.yaml');
      expect(load(executor.installed('agent-c', '/etc/kubernetes/kubeadm-config.yaml') ?? '')).toMatchObject({
        discovery: { bootstrapToken: { token: 'abcdef.0123456789abcdef' } },
      });
    });

    it('should not re-run init on a node that already has a control plane', async () => {
      const executor = new FakeExecutor();
      const { orchestrator } = orchestrate(fixtures.kubeadm(), executor);

      await orchestrator.deploy({ skipValidation: true });

      expect(executor.commands().some(c => c.startsWith('kubeadm init') || c.startsWith('kubeadm join'))).toBe(false);
    });
  });
});
