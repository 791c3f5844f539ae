import type { ContainerRuntimeName, OsPackages, ServiceRole } from '@kubeforge/core';
import type { CommandRunner } from '../runner';

/** What an OS handler needs to know about the node it is preparing. */
export interface OsContext {
  airgap: boolean;
  packages: OsPackages;
  /** remote directory holding the staged bundles for this node */
  bundleDir: string;
}

export interface PackageRepository {
  name: string;
  baseUrl: string;
  gpgKeyUrl: string;
}

export interface OSHandler {
  readonly name: 'rhel' | 'ubuntu';
  readonly packageExtension: 'rpm' | 'deb';

  installBasePackages(runner: CommandRunner, ctx: OsContext): Promise<void>;
  installPackages(runner: CommandRunner, packages: string[]): Promise<void>;
  addPackageRepository(runner: CommandRunner, repo: PackageRepository): Promise<void>;
  disableSwap(runner: CommandRunner): Promise<void>;
  configureKernelModules(runner: CommandRunner): Promise<void>;
  configureSecurityPolicy(runner: CommandRunner): Promise<void>;
  configureFirewall(runner: CommandRunner, role: ServiceRole): Promise<void>;
  removeFirewallRules(runner: CommandRunner, role: ServiceRole): Promise<void>;
  installContainerRuntime(runner: CommandRunner, runtime: ContainerRuntimeName, ctx: OsContext): Promise<void>;
  /** installs package files already present on the node; globs are expanded remotely */
  installLocalPackages(runner: CommandRunner, files: string[]): Promise<void>;
  installGpuPackages(runner: CommandRunner, ctx: OsContext): Promise<void>;
}

export const OS_PACKAGE_BUNDLE = 'os-packages.tar.gz';
export const GPU_PACKAGE_BUNDLE = 'gpu-packages.tar.gz';
