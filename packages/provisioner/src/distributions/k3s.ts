import { serviceRole, type NodeSpec, type RenderedFile, type ServiceRole } from '@kubeforge/core';
import type { CommandRunner } from '../runner';
import { SystemdDistribution, joinToken, nodeLabels, registryFor, tlsSans, toYaml } from './base';
import type { ArtifactRequirement, DistributionContext } from './types';

const CONFIG_DIR = '/etc/rancher/k3s';
const DATA_DIR = '/var/lib/rancher/k3s';
const IMAGES_DIR = `${DATA_DIR}/agent/images`;

export class K3sHandler extends SystemdDistribution {
  readonly name = 'k3s';
  readonly bundlesRuntime = true;

  joinUrl(firstServer: NodeSpec): string {
    return `https://${firstServer.ip}:6443`;
  }

  requiredArtifacts(): ArtifactRequirement[] {
    const both: ServiceRole[] = ['server', 'agent'];
    return [
      { name: 'k3s-binary', key: 'binary', remoteName: 'k3s', roles: both, target: 'bundles', executable: true },
      { name: 'images-bundle', key: 'imagesBundle', remoteName: 'k3s-airgap-images.tar.gz', roles: both, target: 'images', executable: false },
      { name: 'install-script', key: 'installScript', remoteName: 'install.sh', roles: both, target: 'bundles', executable: true },
    ];
  }

  directories(): string[] {
    return [CONFIG_DIR, IMAGES_DIR];
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
      if (settings.disable.length > 0) config.disable = settings.disable;
      if (settings.kubeApiserverArgs.length > 0) config['kube-apiserver-arg'] = settings.kubeApiserverArgs;
    }

    const labels = nodeLabels(node);
    if (labels.length > 0) config['node-label'] = labels;

    const files: RenderedFile[] = [{ path: `${CONFIG_DIR}/config.yaml`, content: toYaml(config), mode: '0600' }];
    const registry = registryFor(spec);
    if (registry) {
      files.push({ path: `${CONFIG_DIR}/registries.yaml`, content: toYaml(registry), mode: '0600' });
    }
    return files;
  }

  async install(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    const exec = serviceRole(ctx.assignment.role);
    const env = `INSTALL_K3S_SKIP_START=true INSTALL_K3S_EXEC=${exec}`;
    if (!ctx.spec.airgap.enabled) {
      await runner.run(`curl -sfL https://get.k3s.io | INSTALL_K3S_VERSION=${ctx.spec.settings.version} ${env} sh -`);
      return;
    }

    const bundles = ctx.staging.bundles;
    await runner.run(`install -m 0755 ${bundles}/k3s /usr/local/bin/k3s`);
    await runner.run(`mkdir -p ${IMAGES_DIR} && cp ${ctx.staging.images}/k3s-airgap-images.tar.gz ${IMAGES_DIR}/`);
    await runner.run(`INSTALL_K3S_SKIP_DOWNLOAD=true ${env} sh ${bundles}/install.sh`);
  }

  serviceName(role: ServiceRole): string {
    return role === 'server' ? 'k3s' : 'k3s-agent';
  }

  kubeconfigPath(): string {
    return `${CONFIG_DIR}/k3s.yaml`;
  }

  kubectlPath(): string {
    return '/usr/local/bin/kubectl';
  }

  tokenPath(): string {
    return `${DATA_DIR}/server/node-token`;
  }

  uninstallScripts(role: ServiceRole): string[] {
    return role === 'server' ? ['/usr/local/bin/k3s-uninstall.sh'] : ['/usr/local/bin/k3s-agent-uninstall.sh'];
  }

  cleanupCommands(): string[] {
    return [
      `rm -rf ${DATA_DIR} ${CONFIG_DIR} /var/lib/kubelet`,
      'rm -f /usr/local/bin/k3s /etc/systemd/system/k3s*.service',
      'systemctl daemon-reload',
    ];
  }
}
