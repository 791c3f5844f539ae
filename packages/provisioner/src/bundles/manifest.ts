import {
  serviceRole,
  type ClusterSpec,
  type NodeAssignment,
  type NodeSpec,
  type OsSpec,
  type ServiceRole,
  type StagingPaths,
} from '@kubeforge/core';
import type { DistributionHandler } from '../distributions/types';
import { createOsHandler } from '../os';
import { GPU_PACKAGE_BUNDLE, OS_PACKAGE_BUNDLE } from '../os/types';

export interface BundleArtifact {
  name: string;
  /** local file on the machine running the deployment; undefined when not configured */
  localPath: string | undefined;
  /** the configuration entry that should point at it */
  source: string;
  remoteName: string;
  roles: ServiceRole[];
  target: keyof StagingPaths;
  executable: boolean;
  gpuOnly: boolean;
}

export function nodeOs(spec: ClusterSpec, node: NodeSpec): OsSpec {
  return node.os ?? spec.os;
}

/** Remote staging directories; per-node overrides win over the cluster-wide airgap paths. */
export function stagingPaths(spec: ClusterSpec, node: NodeSpec): StagingPaths {
  return {
    bundles: node.stagingPaths?.bundles ?? spec.airgap.bundleStagingPath,
    images: node.stagingPaths?.images ?? spec.airgap.imageStagingPath,
  };
}

/** Every artifact a node of this OS could need, before filtering by role. */
export function resolveManifest(spec: ClusterSpec, dist: DistributionHandler, os: OsSpec): BundleArtifact[] {
  const handler = createOsHandler(os.family);
  const both: ServiceRole[] = ['server', 'agent'];

  const artifacts: BundleArtifact[] = dist.requiredArtifacts(spec, handler).map(req => ({
    name: req.name,
    localPath: spec.settings.bundles[req.key],
    source: `settings.bundles.${req.key}`,
    remoteName: req.remoteName,
    roles: req.roles,
    target: req.target,
    executable: req.executable,
    gpuOnly: false,
  }));

  const packages = spec.packages[os.family];
  if (packages?.bundlePath) {
    artifacts.push({
      name: `${os.family}-packages`,
      localPath: packages.bundlePath,
      source: `packages.${os.family}.bundlePath`,
      remoteName: OS_PACKAGE_BUNDLE,
      roles: both,
      target: 'bundles',
      executable: false,
      gpuOnly: false,
    });
  }
  if (packages?.gpuBundlePath) {
    artifacts.push({
      name: `${os.family}-gpu-packages`,
      localPath: packages.gpuBundlePath,
      source: `packages.${os.family}.gpuBundlePath`,
      remoteName: GPU_PACKAGE_BUNDLE,
      roles: both,
      target: 'bundles',
      executable: false,
      gpuOnly: true,
    });
  }

  for (const tool of spec.extraTools) {
    const localPath = spec.tools[tool];
    // tools without a staged binary are skipped with a warning at install time
    if (!localPath) continue;
    artifacts.push({
      name: tool,
      localPath,
      source: `tools.${tool}`,
      remoteName: tool,
      roles: ['server'],
      target: 'bundles',
      executable: true,
      gpuOnly: false,
    });
  }

  return artifacts;
}

export function artifactsFor(manifest: BundleArtifact[], assignment: NodeAssignment): BundleArtifact[] {
  const role = serviceRole(assignment.role);
  return manifest.filter(a => a.roles.includes(role) && (!a.gpuOnly || assignment.node.gpuEnabled));
}

export function nodeManifest(spec: ClusterSpec, dist: DistributionHandler, assignment: NodeAssignment): BundleArtifact[] {
  if (!dist.participates(assignment)) return [];
  return artifactsFor(resolveManifest(spec, dist, nodeOs(spec, assignment.node)), assignment);
}

export function remotePath(staging: StagingPaths, artifact: BundleArtifact): string {
  return `${staging[artifact.target]}/${artifact.remoteName}`;
}
