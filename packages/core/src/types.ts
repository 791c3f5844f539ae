import { z } from 'zod';

export const Distribution = z.enum(['rke2', 'eks-anywhere', 'k3s', 'vanilla', 'kubeadm']);
export type Distribution = z.infer<typeof Distribution>;

export const OsFamily = z.enum(['rhel', 'rocky', 'centos', 'ubuntu', 'debian']);
export type OsFamily = z.infer<typeof OsFamily>;

export const ContainerRuntimeName = z.enum(['containerd', 'crio']);
export type ContainerRuntimeName = z.infer<typeof ContainerRuntimeName>;

export const ExtraTool = z.enum(['k9s', 'helm', 'flux']);
export type ExtraTool = z.infer<typeof ExtraTool>;

export const OsSpec = z.object({
  family: OsFamily,
  version: z.string().min(1),
});
export type OsSpec = z.infer<typeof OsSpec>;

export const StagingPaths = z.object({
  bundles: z.string().min(1).default('/tmp/k8s-bundles'),
  images: z.string().min(1).default('/tmp/k8s-images'),
});
export type StagingPaths = z.infer<typeof StagingPaths>;

export const NodeSpec = z.object({
  hostname: z.string().min(1),
  ip: z.string().min(1),
  user: z.string().min(1),
  sshKey: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(22),
  sudoPassword: z.string().optional(),
  os: OsSpec.optional(),
  gpuEnabled: z.boolean().default(false),
  stagingPaths: StagingPaths.partial().optional(),
  labels: z.record(z.string()).optional(),
});
export type NodeSpec = z.infer<typeof NodeSpec>;

export const RegistryConfig = z.object({
  mirrors: z.record(z.object({
    endpoint: z.array(z.string()),
    rewrite: z.record(z.string()).optional(),
  })).default({}),
  configs: z.record(z.object({
    tls: z.object({
      insecure_skip_verify: z.boolean().optional(),
      ca_file: z.string().optional(),
      cert_file: z.string().optional(),
      key_file: z.string().optional(),
    }).optional(),
    auth: z.object({
      username: z.string().optional(),
      password: z.string().optional(),
      token: z.string().optional(),
    }).optional(),
  })).default({}),
});
export type RegistryConfig = z.infer<typeof RegistryConfig>;

// Local paths (on the machine running the CLI) of the offline artifacts.
export const BundlePaths = z.object({
  airgapBundle: z.string().optional(),
  imagesBundle: z.string().optional(),
  rpmBundle: z.string().optional(),
  installScript: z.string().optional(),
  binary: z.string().optional(),
  // EKS Anywhere cluster definition; rendered from the inventory when absent
  clusterSpec: z.string().optional(),
});
export type BundlePaths = z.infer<typeof BundlePaths>;

export const DistributionSettings = z.object({
  version: z.string().min(1),
  bundles: BundlePaths.default({}),
  clusterCidr: z.string().default('10.42.0.0/16'),
  serviceCidr: z.string().default('10.43.0.0/16'),
  cni: z.array(z.string()).default(['canal']),
  disable: z.array(z.string()).default([]),
  token: z.string().optional(),
  domain: z.string().optional(),
  writeKubeconfigMode: z.string().default('0644'),
  kubeApiserverArgs: z.array(z.string()).default([]),
  registry: RegistryConfig.optional(),
  // kubeadm control-plane joins share certificates through this key
  certificateKey: z.string().optional(),
});
export type DistributionSettings = z.infer<typeof DistributionSettings>;

export const AirgapSpec = z.object({
  enabled: z.boolean().default(false),
  localRegistry: z.string().optional(),
  bundleStagingPath: z.string().default('/opt/k8s-bundles'),
  imageStagingPath: z.string().default('/opt/container-images'),
});
export type AirgapSpec = z.infer<typeof AirgapSpec>;

export const OsPackages = z.object({
  bundlePath: z.string().optional(),
  basePackages: z.array(z.string()).optional(),
  gpuPackages: z.array(z.string()).optional(),
  gpuBundlePath: z.string().optional(),
});
export type OsPackages = z.infer<typeof OsPackages>;

export const Timeouts = z.object({
  connectMs: z.number().int().positive().default(30_000),
  commandMs: z.number().int().positive().default(600_000),
  transferMs: z.number().int().positive().default(1_800_000),
  serviceActiveMs: z.number().int().positive().default(300_000),
  kubeconfigMs: z.number().int().positive().default(300_000),
  tokenMs: z.number().int().positive().default(600_000),
  pollIntervalMs: z.number().int().positive().default(5_000),
});
export type Timeouts = z.infer<typeof Timeouts>;

export const ClusterSpec = z.object({
  name: z.string().min(1),
  distribution: Distribution,
  os: OsSpec,
  runtime: ContainerRuntimeName.default('containerd'),
  airgap: AirgapSpec.default({}),
  settings: DistributionSettings,
  nodes: z.object({
    servers: z.array(NodeSpec).min(1, 'at least one server is required'),
    agents: z.array(NodeSpec).default([]),
  }),
  packages: z.record(OsPackages).default({}),
  extraTools: z.array(ExtraTool).default([]),
  // airgap binaries for extraTools, keyed by tool name
  tools: z.record(z.string()).default({}),
  timeouts: Timeouts.default({}),
});
export type ClusterSpec = z.infer<typeof ClusterSpec>;
export type ClusterSpecInput = z.input<typeof ClusterSpec>;

export type NodeRole = 'first-server' | 'joining-server' | 'agent';
export type ServiceRole = 'server' | 'agent';

export function serviceRole(role: NodeRole): ServiceRole {
  return role === 'agent' ? 'agent' : 'server';
}

export interface NodeAssignment {
  node: NodeSpec;
  role: NodeRole;
  /** position in the servers or agents list it was declared in */
  index: number;
}

export const ProvisioningState = z.enum([
  'bundle-stage',
  'connect',
  'os-prepare',
  'runtime-prepare',
  'distribution-prepare',
  'distribution-install',
  'service-start',
  'post-install-extras',
  'gpu-setup',
]);
export type ProvisioningState = z.infer<typeof ProvisioningState>;

export type ProvisioningResult =
  | {
      status: 'success';
      node: NodeSpec;
      role: NodeRole;
      warnings: string[];
    }
  | {
      status: 'failure';
      node: NodeSpec;
      role: NodeRole;
      state: ProvisioningState;
      kind: string;
      reason: string;
      warnings: string[];
    };

export type ProvisioningFailure = Extract<ProvisioningResult, { status: 'failure' }>;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RenderedFile {
  path: string;
  content: string;
  mode: string;
}
