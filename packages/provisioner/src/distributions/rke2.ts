import { serviceRole, type ClusterSpec, type NodeSpec, type RenderedFile, type ServiceRole } from '@kubeforge/core';
import type { OSHandler } from '../os/types';
import type { CommandRunner } from '../runner';
import { SystemdDistribution, joinToken, nodeLabels, registryFor, tlsSans, toYaml } from './base';
import type { ArtifactRequirement, DistributionContext } from './types';

const CONFIG_DIR = '/etc/rancher/rke2';
const DATA_DIR = '/var/lib/rancher/rke2';
export const RKE2_IMAGES_DIR = `${DATA_DIR}/agent/images`;

/** RPMs depend on each other in this order. */
export function rke2RpmOrder(role: ServiceRole): string[] {
  return ['rke2-selinux', 'rke2-common', `rke2-${role}`];
}

export class Rke2Handler extends SystemdDistribution {
  readonly name = 'rke2';
  readonly bundlesRuntime = true;

  joinUrl(firstServer: NodeSpec): string {
    return `https://${firstServer.ip}:9345`;
  }

  requiredArtifacts(_spec: ClusterSpec, os: OSHandler): ArtifactRequirement[] {
    const both: ServiceRole[] = ['server', 'agent'];
    const packages: ArtifactRequirement = os.packageExtension === 'rpm'
      ? { name: 'rpm-bundle', key: 'rpmBundle', remoteName: 'rke2-rpms.tar.gz', roles: both, target: 'bundles', executable: false }
      : { name: 'airgap-bundle', key: 'airgapBundle', remoteName: 'rke2-airgap-bundle.tar.gz', roles: both, target: 'bundles', executable: false };
    return [
      packages,
      { name: 'images-bundle', key: 'imagesBundle', remoteName: 'rke2-images.tar.gz', roles: both, target: 'images', executable: false },
    ];
  }

  directories(role: ServiceRole): string[] {
    const dirs = [CONFIG_DIR, RKE2_IMAGES_DIR];
    if (role === 'server') dirs.push(`${DATA_DIR}/server/manifests`);
    return dirs;
  }

  renderConfig(ctx: DistributionContext): RenderedFile[] {
    const { spec, assignment } = ctx;
    const { node, role } = assignment;
    const settings = spec.settings;
    const config: Record<string, unknown> = {};

    if (role === 'first-server') {
      config['cluster-init'] = true;
      if (settings.token) config.token = settings.token;
    } else {
      config.server = this.joinUrl(ctx.firstServer);
      config.token = joinToken(ctx);
    }

    config['node-name'] = node.hostname;

    if (role !== 'agent') {
      config['write-kubeconfig-mode'] = settings.writeKubeconfigMode;
      config['tls-san'] = tlsSans(node, settings.domain);
      config['cluster-cidr'] = settings.clusterCidr;
      config['service-cidr'] = settings.serviceCidr;
      config.cni = settings.cni;
      if (settings.disable.length > 0) config.disable = settings.disable;
      if (settings.kubeApiserverArgs.length > 0) config['kube-apiserver-arg'] = settings.kubeApiserverArgs;
    }

    const labels = nodeLabels(node);
    if (labels.length > 0) config['node-label'] = labels;

    if (spec.airgap.enabled && spec.airgap.localRegistry) {
      config['system-default-registry'] = spec.airgap.localRegistry;
    }

    const files: RenderedFile[] = [{ path: `${CONFIG_DIR}/config.yaml`, content: toYaml(config), mode: '0600' }];
    const registry = registryFor(spec);
    if (registry) {
      files.push({ path: `${CONFIG_DIR}/registries.yaml`, content: toYaml(registry), mode: '0600' });
    }
    return files;
  }

  async install(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    const role = serviceRole(ctx.assignment.role);
    if (!ctx.spec.airgap.enabled) {
      await runner.run(
        `curl -sfL https://get.rke2.io | INSTALL_RKE2_TYPE=${role} INSTALL_RKE2_VERSION=${ctx.spec.settings.version} sh -`,
      );
      return;
    }

    const bundles = ctx.staging.bundles;
    if (ctx.os.packageExtension === 'rpm') {
      await runner.run(`mkdir -p ${bundles}/rpms && tar -xzf ${bundles}/rke2-rpms.tar.gz -C ${bundles}/rpms`);
      for (const pkg of rke2RpmOrder(role)) {
        await ctx.os.installLocalPackages(runner, [`${bundles}/rpms/${pkg}-[0-9]*.rpm`]);
      }
    } else {
      await runner.run(`tar -xzf ${bundles}/rke2-airgap-bundle.tar.gz -C /usr/local`);
      await runner.run(`cp /usr/local/lib/systemd/system/rke2-${role}.service /etc/systemd/system/`);
    }

    await runner.run(`mkdir -p ${RKE2_IMAGES_DIR} && cp ${ctx.staging.images}/rke2-images.tar.gz ${RKE2_IMAGES_DIR}/`);
  }

  serviceName(role: ServiceRole): string {
    return `rke2-${role}`;
  }

  kubeconfigPath(): string {
    return `${CONFIG_DIR}/rke2.yaml`;
  }

  kubectlPath(): string {
    return `${DATA_DIR}/bin/kubectl`;
  }

  tokenPath(): string {
    return `${DATA_DIR}/server/node-token`;
  }

  uninstallScripts(): string[] {
    return ['/usr/local/bin/rke2-uninstall.sh', '/usr/bin/rke2-uninstall.sh'];
  }

  cleanupCommands(): string[] {
    return [
      `rm -rf ${DATA_DIR} ${CONFIG_DIR} /var/lib/kubelet /opt/rke2`,
      'rm -f /usr/local/bin/rke2 /usr/local/bin/kubectl /usr/bin/rke2',
      'rm -f /etc/systemd/system/rke2-*.service',
      'systemctl daemon-reload',
    ];
  }
}
