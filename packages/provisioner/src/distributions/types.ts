import type {
  BundlePaths,
  ClusterSpec,
  DistributionSettings,
  NodeAssignment,
  NodeSpec,
  RenderedFile,
  ServiceRole,
  StagingPaths,
} from '@kubeforge/core';
import type { OSHandler } from '../os/types';
import type { CommandRunner } from '../runner';
import type { TokenSource } from '../token';

/** An offline artifact a distribution needs on its nodes. */
export interface ArtifactRequirement {
  name: string;
  /** which `settings.bundles` entry points at the local file */
  key: keyof BundlePaths;
  remoteName: string;
  roles: ServiceRole[];
  /** images go to the node's image staging directory, everything else to bundles */
  target: keyof StagingPaths;
  executable: boolean;
}

export interface DistributionContext {
  spec: ClusterSpec;
  assignment: NodeAssignment;
  firstServer: NodeSpec;
  /** populated for every node that joins an existing cluster */
  token?: string;
  staging: StagingPaths;
  os: OSHandler;
}

export interface DistributionHandler {
  readonly name: string;
  /** the distribution ships and manages its own container runtime */
  readonly bundlesRuntime: boolean;

  tokenSource(settings: DistributionSettings): TokenSource;
  joinUrl(firstServer: NodeSpec): string;
  /** artifacts an airgapped node running `os` needs staged */
  requiredArtifacts(spec: ClusterSpec, os: OSHandler): ArtifactRequirement[];
  /** whether this node is driven directly (EKS Anywhere drives everything from one machine) */
  participates(assignment: NodeAssignment): boolean;
  directories(role: ServiceRole): string[];
  renderConfig(ctx: DistributionContext): RenderedFile[];
  install(runner: CommandRunner, ctx: DistributionContext): Promise<void>;
  startService(runner: CommandRunner, ctx: DistributionContext): Promise<void>;
  serviceName(role: ServiceRole): string;
  kubeconfigPath(spec: ClusterSpec): string;
  kubectlPath(): string;
  tokenPath(): string | undefined;
  uninstallScripts(role: ServiceRole): string[];
  cleanupCommands(role: ServiceRole): string[];
}
