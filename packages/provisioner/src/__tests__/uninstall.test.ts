import { describe, it, expect } from 'vitest';
import { silentLogger, type ClusterSpec } from '@kubeforge/core';
import { FakeExecutor, fixtures } from '@kubeforge/test-utils';
import { assignRoles } from '../plan';
import { UninstallOrchestrator, teardownOrder } from '../uninstall';

function uninstall(spec: ClusterSpec, executor: FakeExecutor) {
  return new UninstallOrchestrator(spec, { executor, log: silentLogger() }).uninstall();
}

describe('teardownOrder', () => {
  it('should remove agents first and the first server last', () => {
    const order = teardownOrder(assignRoles(fixtures.rke2Online())).map(a => a.node.hostname);
    expect(order).toEqual(['agent-c', 'server-b', 'server-a']);
  });
});

describe('UninstallOrchestrator', () => {
  it('should visit nodes in teardown order', async () => {
    const executor = new FakeExecutor();

    const report = await uninstall(fixtures.rke2Online(), executor);

    expect(executor.connections()).toEqual(['agent-c', 'server-b', 'server-a']);
    expect(report.failedNodes).toEqual([]);
    expect(report.results.map(r => r.script)).toEqual([
      '/usr/local/bin/rke2-uninstall.sh',
      '/usr/local/bin/rke2-uninstall.sh',
      '/usr/local/bin/rke2-uninstall.sh',
    ]);
  });

  it('should stop the service before running the uninstall script', async () => {
    const executor = new FakeExecutor();

    await uninstall(fixtures.rke2Online(), executor);

    expect(executor.commands('agent-c').slice(0, 4)).toEqual([
      'systemctl stop rke2-agent',
      'systemctl disable rke2-agent',
      'test -x /usr/local/bin/rke2-uninstall.sh',
      '/usr/local/bin/rke2-uninstall.sh',
    ]);
  });

  it('should fall back to the next uninstall script location', async () => {
    const executor = new FakeExecutor().fail('test -x /usr/local/bin/rke2-uninstall.sh');

    const report = await uninstall(fixtures.rke2Online(), executor);

    expect(report.results.every(r => r.script === '/usr/bin/rke2-uninstall.sh')).toBe(true);
  });

  it('should delete leftover CNI interfaces that exist', async () => {
    const executor = new FakeExecutor().fail('ip link show cni0').fail('ip link show vxlan.calico');

    await uninstall(fixtures.rke2Online(), executor);

    const deletes = executor.commands('agent-c').filter(c => c.startsWith('ip link delete'));
    expect(deletes).toEqual(['ip link delete flannel.1']);
  });

  it('should close firewall ports on servers only', async () => {
    const executor = new FakeExecutor();

    await uninstall(fixtures.rke2Online(), executor);

    expect(executor.commands('server-a')).toContain('firewall-cmd --permanent --remove-port=9345/tcp');
    expect(executor.commands('agent-c').some(c => c.startsWith('firewall-cmd'))).toBe(false);
  });

  it('should keep going after a node fails and report it', async () => {
    const executor = new FakeExecutor().refuseConnection('server-b');

    const report = await uninstall(fixtures.rke2Online(), executor);

    expect(executor.connections()).toEqual(['agent-c', 'server-b', 'server-a']);
    expect(report.failedNodes).toEqual(['server-b']);
    expect(report.results[1].failures).toEqual(['192.0.2.11: connection refused']);
  });

  it('should treat a failed stop as a warning', async () => {
    const executor = new FakeExecutor().fail('systemctl stop rke2-agent', 'agent-c', 'Unit rke2-agent.service not loaded.');

    const report = await uninstall(fixtures.rke2Online(), executor);

    expect(report.results[0].ok).toBe(true);
    expect(report.results[0].warnings).toEqual(['systemctl stop rke2-agent: Unit rke2-agent.service not loaded.']);
  });

  it('should fail a node whose cleanup command fails', async () => {
    const executor = new FakeExecutor().fail('rm -rf /var/lib/rancher/rke2', 'server-a', 'Device or resource busy');

    const report = await uninstall(fixtures.rke2Online(), executor);

    expect(report.failedNodes).toEqual(['server-a']);
    expect(report.results[2].failures).toEqual([
      "'rm -rf /var/lib/rancher/rke2 /etc/rancher/rke2 /var/lib/kubelet /opt/rke2' exited with 1: Device or resource busy",
    ]);
  });

  it('should only touch the admin machine for EKS Anywhere', async () => {
    const spec: ClusterSpec = { ...fixtures.rke2Online(), distribution: 'eks-anywhere' };
    const executor = new FakeExecutor();

    const report = await uninstall(spec, executor);

    expect(executor.connections()).toEqual(['server-a']);
    expect(report.results.map(r => r.ok)).toEqual([true, true, true]);
  });
});
