import type {
  ClusterSpec,
  DistributionSettings,
  NodeAssignment,
  NodeSpec,
  RenderedFile,
  ServiceRole,
} from '@kubeforge/core';
import type { CommandRunner } from '../runner';
import type { TokenSource } from '../token';
import { toYaml } from './base';
import type { ArtifactRequirement, DistributionContext, DistributionHandler } from './types';

const WORK_DIR = '/opt/eks-anywhere';

/**
 * EKS Anywhere bootstraps every machine itself from one admin machine, the
 * first server. The remaining nodes are listed in the cluster definition and
 * left alone here.
 */
export class EksAnywhereHandler implements DistributionHandler {
  readonly name = 'eks-anywhere';
  // the admin machine runs the bootstrap cluster in docker
  readonly bundlesRuntime = true;

  tokenSource(_settings: DistributionSettings): TokenSource {
    return 'none';
  }

  joinUrl(firstServer: NodeSpec): string {
    return `https://${firstServer.ip}:6443`;
  }

  requiredArtifacts(spec: ClusterSpec): ArtifactRequirement[] {
    const admin: ServiceRole[] = ['server'];
    const artifacts: ArtifactRequirement[] = [
      { name: 'eks-anywhere-bundle', key: 'airgapBundle', remoteName: 'eks-anywhere-bundle.tar.gz', roles: admin, target: 'bundles', executable: false },
      { name: 'images-bundle', key: 'imagesBundle', remoteName: 'eks-anywhere-images.tar.gz', roles: admin, target: 'images', executable: false },
    ];
    if (spec.settings.bundles.clusterSpec) {
      artifacts.push({ name: 'cluster-spec', key: 'clusterSpec', remoteName: 'cluster.yaml', roles: admin, target: 'bundles', executable: false });
    }
    return artifacts;
  }

  participates(assignment: NodeAssignment): boolean {
    return assignment.role === 'first-server';
  }

  directories(): string[] {
    return [WORK_DIR];
  }

  clusterSpecPath(spec: ClusterSpec): string {
    return `${WORK_DIR}/${spec.name}.yaml`;
  }

  renderConfig(ctx: DistributionContext): RenderedFile[] {
    // a supplied definition is staged as a bundle and copied during install
    if (ctx.spec.settings.bundles.clusterSpec) return [];
    const { spec } = ctx;
    const cluster = {
      apiVersion: 'anywhere.eks.amazonaws.com/v1alpha1',
      kind: 'Cluster',
      metadata: { name: spec.name },
      spec: {
        kubernetesVersion: spec.settings.version.replace(/^v/, '').split('.').slice(0, 2).join('.'),
        clusterNetwork: {
          cniConfig: { cilium: {} },
          pods: { cidrBlocks: [spec.settings.clusterCidr] },
          services: { cidrBlocks: [spec.settings.serviceCidr] },
        },
        controlPlaneConfiguration: {
          count: spec.nodes.servers.length,
          endpoint: { host: ctx.firstServer.ip },
        },
        workerNodeGroupConfigurations: [{ name: 'md-0', count: spec.nodes.agents.length }],
        ...(spec.airgap.localRegistry
          ? { registryMirrorConfiguration: { endpoint: spec.airgap.localRegistry.split(':')[0], port: spec.airgap.localRegistry.split(':')[1] ?? '443' } }
          : {}),
      },
    };
    return [{ path: this.clusterSpecPath(spec), content: toYaml(cluster), mode: '0644' }];
  }

  async install(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    const { spec, staging } = ctx;
    if (spec.airgap.enabled) {
      await runner.run(`tar -xzf ${staging.bundles}/eks-anywhere-bundle.tar.gz -C /usr/local/bin eksctl eksctl-anywhere`);
      await runner.run(`docker load -i ${staging.images}/eks-anywhere-images.tar.gz`);
    } else {
      await runner.run(
        'curl -sL https://github.com/weaveworks/eksctl/releases/latest/download/eksctl_Linux_amd64.tar.gz | tar xz -C /usr/local/bin',
      );
      await runner.run(
        `curl -sL https://anywhere-assets.eks.amazonaws.com/releases/eks-a/${spec.settings.version}/eksctl-anywhere-linux-amd64.tar.gz | tar xz -C /usr/local/bin`,
      );
    }
    if (spec.settings.bundles.clusterSpec) {
      await runner.run(`cp ${staging.bundles}/cluster.yaml ${this.clusterSpecPath(spec)}`);
    }
  }

  async startService(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    await runner.run('systemctl enable --now docker');
    if (await runner.check(`test -f ${this.kubeconfigPath(ctx.spec)}`)) return;
    await runner.run(`eksctl anywhere create cluster -f ${this.clusterSpecPath(ctx.spec)}`, {
      cwd: WORK_DIR,
      timeoutMs: ctx.spec.timeouts.transferMs,
    });
  }

  serviceName(): string {
    return 'docker';
  }

  kubeconfigPath(spec: ClusterSpec): string {
    return `${WORK_DIR}/${spec.name}/${spec.name}-eks-a-cluster.kubeconfig`;
  }

  kubectlPath(): string {
    return '/usr/local/bin/kubectl';
  }

  tokenPath(): undefined {
    return undefined;
  }

  uninstallScripts(): string[] {
    return [];
  }

  cleanupCommands(): string[] {
    return [`rm -rf ${WORK_DIR}`, 'rm -f /usr/local/bin/eksctl /usr/local/bin/eksctl-anywhere'];
  }
}
