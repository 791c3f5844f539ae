import { shellQuote, type ContainerRuntimeName, type RenderedFile, type ServiceRole } from '@kubeforge/core';
import type { CommandRunner } from '../runner';
import {
  GPU_PACKAGE_BUNDLE,
  OS_PACKAGE_BUNDLE,
  type OSHandler,
  type OsContext,
  type PackageRepository,
} from './types';

const SERVER_PORTS = ['6443/tcp', '2379-2380/tcp', '9345/tcp', '10251/tcp', '10252/tcp'];
const SHARED_PORTS = ['10250/tcp', '30000-32767/tcp'];

export function firewallPorts(role: ServiceRole): string[] {
  return role === 'server' ? [...SERVER_PORTS, ...SHARED_PORTS] : [...SHARED_PORTS];
}

export const KERNEL_MODULES = ['overlay', 'br_netfilter'];

export const kernelModuleFiles: RenderedFile[] = [
  { path: '/etc/modules-load.d/k8s.conf', content: `${KERNEL_MODULES.join('\n')}\n`, mode: '0644' },
  {
    path: '/etc/sysctl.d/k8s.conf',
    content: [
      'net.bridge.bridge-nf-call-iptables = 1',
      'net.bridge.bridge-nf-call-ip6tables = 1',
      'net.ipv4.ip_forward = 1',
      '',
    ].join('\n'),
    mode: '0644',
  },
];

/**
 * Steps that read the same on every supported family. Subclasses supply the
 * package manager and firewall front end.
 */
export abstract class BaseOsHandler implements OSHandler {
  abstract readonly name: 'rhel' | 'ubuntu';
  abstract readonly packageExtension: 'rpm' | 'deb';

  protected abstract readonly defaultBasePackages: string[];
  protected abstract readonly defaultGpuPackages: string[];

  abstract installPackages(runner: CommandRunner, packages: string[]): Promise<void>;
  abstract addPackageRepository(runner: CommandRunner, repo: PackageRepository): Promise<void>;
  abstract installLocalPackages(runner: CommandRunner, files: string[]): Promise<void>;
  abstract configureSecurityPolicy(runner: CommandRunner): Promise<void>;
  protected abstract firewallActive(runner: CommandRunner): Promise<boolean>;
  protected abstract openPorts(runner: CommandRunner, ports: string[]): Promise<void>;
  protected abstract closePorts(runner: CommandRunner, ports: string[]): Promise<void>;
  protected abstract runtimePackage(runtime: ContainerRuntimeName): string;

  async installBasePackages(runner: CommandRunner, ctx: OsContext): Promise<void> {
    if (ctx.airgap) {
      if (!ctx.packages.bundlePath) {
        runner.log.warn('no OS package bundle configured, assuming base packages are preinstalled');
        return;
      }
      await this.installBundle(runner, `${ctx.bundleDir}/${OS_PACKAGE_BUNDLE}`, `${ctx.bundleDir}/os-packages`);
      return;
    }
    await this.installPackages(runner, ctx.packages.basePackages ?? this.defaultBasePackages);
  }

  async disableSwap(runner: CommandRunner): Promise<void> {
    await runner.run('swapoff -a');
    await runner.run(`sed -i '/\\sswap\\s/ s/^#*/#/' /etc/fstab`);
  }

  async configureKernelModules(runner: CommandRunner): Promise<void> {
    for (const file of kernelModuleFiles) {
      await runner.putFile(file);
    }
    for (const module of KERNEL_MODULES) {
      await runner.run(`modprobe ${module}`);
    }
    await runner.run('sysctl --system');
  }

  async configureFirewall(runner: CommandRunner, role: ServiceRole): Promise<void> {
    if (!(await this.firewallActive(runner))) {
      runner.log.info('firewall inactive, skipping port configuration');
      return;
    }
    await this.openPorts(runner, firewallPorts(role));
  }

  async removeFirewallRules(runner: CommandRunner, role: ServiceRole): Promise<void> {
    if (!(await this.firewallActive(runner))) return;
    await this.closePorts(runner, firewallPorts(role));
  }

  async installContainerRuntime(runner: CommandRunner, runtime: ContainerRuntimeName, ctx: OsContext): Promise<void> {
    // airgapped nodes get the runtime from the OS package bundle
    if (!ctx.airgap) {
      await this.installPackages(runner, [this.runtimePackage(runtime)]);
    }
    if (runtime === 'containerd') {
      await runner.run('mkdir -p /etc/containerd && containerd config default > /etc/containerd/config.toml');
      await runner.run(`sed -i 's/SystemdCgroup = false/SystemdCgroup = true/' /etc/containerd/config.toml`);
      await runner.run('systemctl enable --now containerd && systemctl restart containerd');
      return;
    }
    await runner.run('systemctl enable --now crio');
  }

  async installGpuPackages(runner: CommandRunner, ctx: OsContext): Promise<void> {
    if (ctx.airgap) {
      if (!ctx.packages.gpuBundlePath) {
        runner.log.warn('no GPU package bundle configured, assuming drivers are preinstalled');
        return;
      }
      await this.installBundle(runner, `${ctx.bundleDir}/${GPU_PACKAGE_BUNDLE}`, `${ctx.bundleDir}/gpu-packages`);
      return;
    }
    await this.installPackages(runner, ctx.packages.gpuPackages ?? this.defaultGpuPackages);
  }

  protected async installBundle(runner: CommandRunner, archive: string, into: string): Promise<void> {
    await runner.run(`mkdir -p ${shellQuote(into)} && tar -xzf ${shellQuote(archive)} -C ${shellQuote(into)}`);
    await this.installLocalPackages(runner, [`${into}/*.${this.packageExtension}`]);
  }
}
