import { dump } from 'js-yaml';
import {
  TokenNotReadyError,
  serviceRole,
  type ClusterSpec,
  type DistributionSettings,
  type NodeAssignment,
  type NodeSpec,
  type RegistryConfig,
  type RenderedFile,
  type ServiceRole,
} from '@kubeforge/core';
import type { OSHandler } from '../os/types';
import type { CommandRunner } from '../runner';
import type { TokenSource } from '../token';
import type { ArtifactRequirement, DistributionContext, DistributionHandler } from './types';

export function toYaml(value: unknown): string {
  return dump(value, { lineWidth: -1, noRefs: true });
}

export function nodeLabels(node: NodeSpec): string[] {
  return Object.entries(node.labels ?? {}).map(([key, value]) => `${key}=${value}`);
}

export function tlsSans(node: NodeSpec, domain?: string): string[] {
  const sans = [node.ip, node.hostname];
  if (domain) sans.push(`${node.hostname}.${domain}`);
  return sans;
}

/**
 * Registry mirrors for containerd. An airgapped cluster with a local registry
 * and no explicit mirrors pulls everything through that registry.
 */
export function registryFor(spec: ClusterSpec): RegistryConfig | undefined {
  if (spec.settings.registry) return spec.settings.registry;
  if (spec.airgap.enabled && spec.airgap.localRegistry) {
    return {
      mirrors: { '*': { endpoint: [`https://${spec.airgap.localRegistry}`] } },
      configs: {},
    };
  }
  return undefined;
}

export function joinToken(ctx: DistributionContext): string {
  if (!ctx.token) throw new TokenNotReadyError();
  return ctx.token;
}

/** Distributions that run as a systemd unit installed by their own installer. */
export abstract class SystemdDistribution implements DistributionHandler {
  abstract readonly name: string;
  abstract readonly bundlesRuntime: boolean;

  abstract joinUrl(firstServer: NodeSpec): string;
  abstract requiredArtifacts(spec: ClusterSpec, os: OSHandler): ArtifactRequirement[];
  abstract directories(role: ServiceRole): string[];
  abstract renderConfig(ctx: DistributionContext): RenderedFile[];
  abstract install(runner: CommandRunner, ctx: DistributionContext): Promise<void>;
  abstract serviceName(role: ServiceRole): string;
  abstract kubeconfigPath(spec: ClusterSpec): string;
  abstract kubectlPath(): string;
  abstract tokenPath(): string | undefined;
  abstract uninstallScripts(role: ServiceRole): string[];
  abstract cleanupCommands(role: ServiceRole): string[];

  tokenSource(settings: DistributionSettings): TokenSource {
    return settings.token ? 'static' : 'dynamic';
  }

  participates(_assignment: NodeAssignment): boolean {
    return true;
  }

  async startService(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    const service = this.serviceName(serviceRole(ctx.assignment.role));
    await runner.run('systemctl daemon-reload');
    await runner.run(`systemctl enable --now ${service}`);
  }
}
