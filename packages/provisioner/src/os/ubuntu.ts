import type { ContainerRuntimeName } from '@kubeforge/core';
import type { CommandRunner } from '../runner';
import { BaseOsHandler } from './base';
import type { PackageRepository } from './types';

const APT = 'DEBIAN_FRONTEND=noninteractive apt-get';

/** Ubuntu and Debian: apt, ufw and AppArmor. */
export class UbuntuHandler extends BaseOsHandler {
  readonly name = 'ubuntu';
  readonly packageExtension = 'deb';

  protected readonly defaultBasePackages = [
    'apt-transport-https',
    'ca-certificates',
    'curl',
    'gnupg',
    'iptables',
    'socat',
    'conntrack',
  ];
  protected readonly defaultGpuPackages = ['nvidia-driver-535', 'nvidia-container-toolkit'];

  async installPackages(runner: CommandRunner, packages: string[]): Promise<void> {
    if (packages.length === 0) return;
    await runner.run(`${APT} update && ${APT} install -y ${packages.join(' ')}`);
  }

  async addPackageRepository(runner: CommandRunner, repo: PackageRepository): Promise<void> {
    const keyring = `/etc/apt/keyrings/${repo.name}.gpg`;
    await runner.run(`mkdir -p /etc/apt/keyrings && curl -fsSL ${repo.gpgKeyUrl} | gpg --dearmor --yes -o ${keyring}`);
    await runner.putFile({
      path: `/etc/apt/sources.list.d/${repo.name}.list`,
      content: `deb [signed-by=${keyring}] ${repo.baseUrl} /\n`,
      mode: '0644',
    });
  }

  async installLocalPackages(runner: CommandRunner, files: string[]): Promise<void> {
    await runner.run(`dpkg -i ${files.join(' ')}`);
  }

  async configureSecurityPolicy(runner: CommandRunner): Promise<void> {
    if (!(await runner.check('command -v aa-complain'))) {
      runner.log.warn('aa-complain not found (apparmor-utils missing), leaving AppArmor profiles as they are');
      return;
    }
    await runner.run('aa-complain /etc/apparmor.d/*');
  }

  protected async firewallActive(runner: CommandRunner): Promise<boolean> {
    const result = await runner.tryRun('ufw status');
    return result.stdout.includes('Status: active');
  }

  protected async openPorts(runner: CommandRunner, ports: string[]): Promise<void> {
    for (const port of ports) {
      await runner.run(`ufw allow ${ufwPort(port)}`);
    }
  }

  protected async closePorts(runner: CommandRunner, ports: string[]): Promise<void> {
    for (const port of ports) {
      await runner.tryRun(`ufw delete allow ${ufwPort(port)}`);
    }
  }

  protected runtimePackage(runtime: ContainerRuntimeName): string {
    return runtime === 'containerd' ? 'containerd' : 'cri-o';
  }
}

/** ufw writes ranges with a colon */
function ufwPort(port: string): string {
  return port.replace('-', ':');
}
