import type { ContainerRuntimeName } from '@kubeforge/core';
import type { CommandRunner } from '../runner';
import { BaseOsHandler } from './base';
import type { PackageRepository } from './types';

/** RHEL, Rocky and CentOS: dnf, firewalld and SELinux. */
export class RhelHandler extends BaseOsHandler {
  readonly name = 'rhel';
  readonly packageExtension = 'rpm';

  protected readonly defaultBasePackages = [
    'container-selinux',
    'iptables',
    'libnetfilter_conntrack',
    'libnfnetlink',
    'libnftnl',
    'libseccomp',
    'tar',
    'curl',
    'socat',
    'conntrack-tools',
  ];
  protected readonly defaultGpuPackages = ['nvidia-container-toolkit'];

  async installPackages(runner: CommandRunner, packages: string[]): Promise<void> {
    if (packages.length === 0) return;
    await runner.run(`dnf install -y ${packages.join(' ')}`);
  }

  async addPackageRepository(runner: CommandRunner, repo: PackageRepository): Promise<void> {
    await runner.putFile({
      path: `/etc/yum.repos.d/${repo.name}.repo`,
      content: [
        `[${repo.name}]`,
        `name=${repo.name}`,
        `baseurl=${repo.baseUrl}`,
        'enabled=1',
        'gpgcheck=1',
        `gpgkey=${repo.gpgKeyUrl}`,
        '',
      ].join('\n'),
      mode: '0644',
    });
  }

  async installLocalPackages(runner: CommandRunner, files: string[]): Promise<void> {
    await runner.run(`dnf install -y --disablerepo='*' ${files.join(' ')}`);
  }

  async configureSecurityPolicy(runner: CommandRunner): Promise<void> {
    // setenforce fails when SELinux is already disabled
    if (await runner.check('selinuxenabled')) {
      await runner.run('setenforce 0');
    }
    await runner.run(`sed -i 's/^SELINUX=enforcing/SELINUX=permissive/' /etc/selinux/config`);
  }

  protected async firewallActive(runner: CommandRunner): Promise<boolean> {
    const result = await runner.tryRun('systemctl is-active firewalld');
    return result.stdout.trim() === 'active';
  }

  protected async openPorts(runner: CommandRunner, ports: string[]): Promise<void> {
    for (const port of ports) {
      await runner.run(`firewall-cmd --permanent --add-port=${port}`);
    }
    await runner.run('firewall-cmd --reload');
  }

  protected async closePorts(runner: CommandRunner, ports: string[]): Promise<void> {
    for (const port of ports) {
      await runner.tryRun(`firewall-cmd --permanent --remove-port=${port}`);
    }
    await runner.run('firewall-cmd --reload');
  }

  protected runtimePackage(runtime: ContainerRuntimeName): string {
    return runtime === 'containerd' ? 'containerd.io' : 'cri-o';
  }
}
