import type {
  ClusterSpec,
  ContainerRuntimeName,
  DistributionSettings,
  NodeSpec,
  RenderedFile,
  ServiceRole,
} from '@kubeforge/core';
import type { CommandRunner } from '../runner';
import type { TokenSource } from '../token';
import { SystemdDistribution, joinToken, nodeLabels, tlsSans, toYaml } from './base';
import type { ArtifactRequirement, DistributionContext } from './types';

const KUBEADM_API = 'kubeadm.k8s.io/v1beta3';
const CONFIG_PATH = '/etc/kubernetes/kubeadm-config.yaml';
const ADMIN_CONF = '/etc/kubernetes/admin.conf';
const KUBELET_CONF = '/etc/kubernetes/kubelet.conf';

const criSockets: Record<ContainerRuntimeName, string> = {
  containerd: 'unix:///run/containerd/containerd.sock',
  crio: 'unix:///var/run/crio/crio.sock',
};

/** "1.30.4" or "v1.30.4" -> "v1.30" */
export function minorVersion(version: string): string {
  const [major, minor] = version.replace(/^v/, '').split('.');
  return `v${major}.${minor ?? '0'}`;
}

function kubernetesVersion(version: string): string {
  return version.startsWith('v') ? version : `v${version}`;
}

/** Upstream Kubernetes bootstrapped with kubeadm; serves both `vanilla` and `kubeadm`. */
export class KubeadmHandler extends SystemdDistribution {
  readonly bundlesRuntime = false;

  constructor(readonly name: 'vanilla' | 'kubeadm' = 'kubeadm') {
    super();
  }

  // kubeadm bootstrap tokens are chosen up front
  tokenSource(_settings: DistributionSettings): TokenSource {
    return 'static';
  }

  joinUrl(firstServer: NodeSpec): string {
    return `${firstServer.ip}:6443`;
  }

  requiredArtifacts(): ArtifactRequirement[] {
    const both: ServiceRole[] = ['server', 'agent'];
    return [
      { name: 'kubernetes-packages', key: 'airgapBundle', remoteName: 'kubernetes-packages.tar.gz', roles: both, target: 'bundles', executable: false },
      { name: 'images-bundle', key: 'imagesBundle', remoteName: 'kubernetes-images.tar', roles: both, target: 'images', executable: false },
    ];
  }

  directories(): string[] {
    return ['/etc/kubernetes'];
  }

  renderConfig(ctx: DistributionContext): RenderedFile[] {
    const { spec, assignment, firstServer } = ctx;
    const { node, role } = assignment;
    const token = joinToken(ctx);
    const nodeRegistration: Record<string, unknown> = {
      name: node.hostname,
      criSocket: criSockets[spec.runtime],
    };
    const labels = nodeLabels(node);
    if (labels.length > 0) {
      nodeRegistration.kubeletExtraArgs = { 'node-labels': labels.join(',') };
    }

    if (role === 'first-server') {
      const init: Record<string, unknown> = {
        apiVersion: KUBEADM_API,
        kind: 'InitConfiguration',
        bootstrapTokens: [{ token, ttl: '24h0m0s' }],
        localAPIEndpoint: { advertiseAddress: node.ip, bindPort: 6443 },
        nodeRegistration,
      };
      if (spec.settings.certificateKey) init.certificateKey = spec.settings.certificateKey;

      const cluster: Record<string, unknown> = {
        apiVersion: KUBEADM_API,
        kind: 'ClusterConfiguration',
        clusterName: spec.name,
        kubernetesVersion: kubernetesVersion(spec.settings.version),
        controlPlaneEndpoint: this.joinUrl(firstServer),
        networking: {
          podSubnet: spec.settings.clusterCidr,
          serviceSubnet: spec.settings.serviceCidr,
          ...(spec.settings.domain ? { dnsDomain: spec.settings.domain } : {}),
        },
        apiServer: {
          certSANs: tlsSans(node, spec.settings.domain),
          ...(spec.settings.kubeApiserverArgs.length > 0 ? { extraArgs: apiserverArgs(spec.settings.kubeApiserverArgs) } : {}),
        },
      };
      if (spec.airgap.enabled && spec.airgap.localRegistry) {
        cluster.imageRepository = spec.airgap.localRegistry;
      }

      return [{ path: CONFIG_PATH, content: `${toYaml(init)}---\n${toYaml(cluster)}`, mode: '0600' }];
    }

    const join: Record<string, unknown> = {
      apiVersion: KUBEADM_API,
      kind: 'JoinConfiguration',
      discovery: {
        bootstrapToken: {
          apiServerEndpoint: this.joinUrl(firstServer),
          token,
          unsafeSkipCAVerification: true,
        },
      },
      nodeRegistration,
    };
    if (role === 'joining-server') {
      join.controlPlane = {
        localAPIEndpoint: { advertiseAddress: node.ip, bindPort: 6443 },
        ...(spec.settings.certificateKey ? { certificateKey: spec.settings.certificateKey } : {}),
      };
    }
    return [{ path: CONFIG_PATH, content: toYaml(join), mode: '0600' }];
  }

  async install(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    const { spec, os, staging } = ctx;
    if (spec.airgap.enabled) {
      const dir = `${staging.bundles}/kubernetes-packages`;
      await runner.run(`mkdir -p ${dir} && tar -xzf ${staging.bundles}/kubernetes-packages.tar.gz -C ${dir}`);
      await os.installLocalPackages(runner, [`${dir}/*.${os.packageExtension}`]);
      const archive = `${staging.images}/kubernetes-images.tar`;
      await runner.run(
        spec.runtime === 'containerd' ? `ctr -n k8s.io images import ${archive}` : `podman load -i ${archive}`,
      );
    } else {
      const minor = minorVersion(spec.settings.version);
      const repo = `https://pkgs.k8s.io/core:/stable:/${minor}/${os.packageExtension}/`;
      await os.addPackageRepository(runner, {
        name: 'kubernetes',
        baseUrl: repo,
        gpgKeyUrl: os.packageExtension === 'rpm' ? `${repo}repodata/repomd.xml.key` : `${repo}Release.key`,
      });
      await os.installPackages(runner, ['kubelet', 'kubeadm', 'kubectl']);
    }
    await runner.run('systemctl enable kubelet');
  }

  /** `kubeadm init|join` is what brings the kubelet up; both are skipped on re-runs. */
  async startService(runner: CommandRunner, ctx: DistributionContext): Promise<void> {
    if (ctx.assignment.role === 'first-server') {
      if (!(await runner.check(`test -f ${ADMIN_CONF}`))) {
        await runner.run(`kubeadm init --config ${CONFIG_PATH} --upload-certs`);
      }
    } else if (!(await runner.check(`test -f ${KUBELET_CONF}`))) {
      await runner.run(`kubeadm join --config ${CONFIG_PATH}`);
    }
    await runner.run('systemctl enable --now kubelet');
  }

  serviceName(): string {
    return 'kubelet';
  }

  kubeconfigPath(_spec?: ClusterSpec): string {
    return ADMIN_CONF;
  }

  kubectlPath(): string {
    return '/usr/bin/kubectl';
  }

  tokenPath(): undefined {
    return undefined;
  }

  uninstallScripts(): string[] {
    return [];
  }

  cleanupCommands(): string[] {
    return [
      'kubeadm reset -f',
      'rm -rf /etc/kubernetes /var/lib/kubelet /var/lib/etcd /etc/cni/net.d',
    ];
  }
}

function apiserverArgs(args: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of args) {
    const [key, ...rest] = arg.split('=');
    if (key) out[key] = rest.join('=');
  }
  return out;
}
