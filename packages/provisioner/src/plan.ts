import * as fs from 'fs/promises';
import type { ClusterSpec, NodeAssignment, NodeRole, StagingPaths } from '@kubeforge/core';
import { nodeManifest, nodeOs, resolveManifest, stagingPaths } from './bundles/manifest';
import { createDistributionHandler } from './distributions';
import type { TokenSource } from './token';

/** servers[0] initializes the cluster; nothing downstream looks at list positions. */
export function assignRoles(spec: ClusterSpec): NodeAssignment[] {
  return [
    ...spec.nodes.servers.map((node, index): NodeAssignment => ({
      node,
      role: index === 0 ? 'first-server' : 'joining-server',
      index,
    })),
    ...spec.nodes.agents.map((node, index): NodeAssignment => ({ node, role: 'agent', index })),
  ];
}

export type ArtifactStatus = 'present' | 'missing' | 'not-configured';

export interface PlannedArtifact {
  name: string;
  source: string;
  localPath?: string;
  status: ArtifactStatus;
}

export interface PlannedNode {
  hostname: string;
  ip: string;
  user: string;
  role: NodeRole;
  os: string;
  gpu: boolean;
  /** false when another node drives this one */
  managed: boolean;
  staging?: StagingPaths;
  artifacts: string[];
}

export interface DeploymentPlan {
  cluster: string;
  distribution: string;
  runtime: string;
  airgap: boolean;
  localRegistry?: string;
  tokenSource: TokenSource;
  extraTools: string[];
  nodes: PlannedNode[];
  artifacts: PlannedArtifact[];
  /** every artifact resolves to a local file */
  bundlesReady: boolean;
}

async function statusOf(path: string | undefined): Promise<ArtifactStatus> {
  if (!path) return 'not-configured';
  try {
    return (await fs.stat(path)).isFile() ? 'present' : 'missing';
  } catch {
    return 'missing';
  }
}

/** Resolves what a deployment would do. Reads local files only. */
export async function buildPlan(spec: ClusterSpec): Promise<DeploymentPlan> {
  const dist = createDistributionHandler(spec.distribution);
  const assignments = assignRoles(spec);

  const nodes: PlannedNode[] = assignments.map(assignment => {
    const osSpec = nodeOs(spec, assignment.node);
    return {
      hostname: assignment.node.hostname,
      ip: assignment.node.ip,
      user: assignment.node.user,
      role: assignment.role,
      os: `${osSpec.family} ${osSpec.version}`,
      gpu: assignment.node.gpuEnabled,
      managed: dist.participates(assignment),
      staging: spec.airgap.enabled ? stagingPaths(spec, assignment.node) : undefined,
      artifacts: spec.airgap.enabled ? nodeManifest(spec, dist, assignment).map(a => a.name) : [],
    };
  });

  const artifacts: PlannedArtifact[] = [];
  if (spec.airgap.enabled) {
    const seen = new Set<string>();
    for (const assignment of assignments) {
      for (const artifact of resolveManifest(spec, dist, nodeOs(spec, assignment.node))) {
        const key = `${artifact.source}:${artifact.name}`;
        if (seen.has(key)) continue;
        seen.add(key);
        artifacts.push({
          name: artifact.name,
          source: artifact.source,
          localPath: artifact.localPath,
          status: await statusOf(artifact.localPath),
        });
      }
    }
  }

  return {
    cluster: spec.name,
    distribution: spec.distribution,
    runtime: dist.bundlesRuntime ? `managed by ${dist.name}` : spec.runtime,
    airgap: spec.airgap.enabled,
    localRegistry: spec.airgap.localRegistry,
    tokenSource: dist.tokenSource(spec.settings),
    extraTools: spec.extraTools,
    nodes,
    artifacts,
    bundlesReady: artifacts.every(a => a.status === 'present'),
  };
}

const tokenDescriptions: Record<TokenSource, string> = {
  static: 'static (from settings.token)',
  dynamic: 'dynamic (read from the first server once its service is active)',
  none: 'not used',
};

export function formatPlan(plan: DeploymentPlan): string {
  const lines = [
    `Deployment plan for cluster '${plan.cluster}'`,
    `  distribution: ${plan.distribution}`,
    `  runtime:      ${plan.runtime}`,
    `  mode:         ${plan.airgap ? `airgap (registry ${plan.localRegistry ?? 'not set'})` : 'online'}`,
    `  join token:   ${tokenDescriptions[plan.tokenSource]}`,
  ];
  if (plan.extraTools.length > 0) lines.push(`  extra tools:  ${plan.extraTools.join(', ')}`);

  lines.push('', 'Nodes (in provisioning order):');
  plan.nodes.forEach((node, i) => {
    const flags = [node.gpu ? 'gpu' : '', node.managed ? '' : 'managed by first server'].filter(Boolean);
    lines.push(
      `  ${i + 1}. ${node.hostname.padEnd(20)} ${node.ip.padEnd(16)} ${node.role.padEnd(15)} ${node.os}` +
        (flags.length > 0 ? ` [${flags.join(', ')}]` : ''),
    );
    if (node.staging && node.artifacts.length > 0) {
      lines.push(`     stages ${node.artifacts.join(', ')} to ${node.staging.bundles}`);
    }
  });

  if (plan.airgap) {
    lines.push('', 'Bundles:');
    for (const artifact of plan.artifacts) {
      lines.push(`  [${artifact.status}] ${artifact.name.padEnd(24)} ${artifact.localPath ?? `(${artifact.source})`}`);
    }
  }
  return lines.join('\n');
}
