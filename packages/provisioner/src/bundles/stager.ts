import * as fs from 'fs/promises';
import {
  BundleMissingError,
  shellQuote,
  type ClusterSpec,
  type NodeAssignment,
} from '@kubeforge/core';
import type { DistributionHandler } from '../distributions/types';
import type { CommandRunner } from '../runner';
import { nodeManifest, remotePath, stagingPaths, type BundleArtifact } from './manifest';

export interface StageOutcome {
  uploaded: string[];
  /** already present on the node with the same size */
  skipped: string[];
}

interface LocalArtifact {
  artifact: BundleArtifact;
  localPath: string;
  size: number;
}

async function localSize(path: string): Promise<number | undefined> {
  try {
    const stat = await fs.stat(path);
    return stat.isFile() ? stat.size : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Copies a node's offline artifacts into its staging directories. Re-staging
 * uploads nothing when every remote copy already matches the local size.
 */
export class BundleStager {
  constructor(
    private spec: ClusterSpec,
    private dist: DistributionHandler,
  ) {}

  async stage(runner: CommandRunner, assignment: NodeAssignment): Promise<StageOutcome> {
    const artifacts = await this.resolveLocal(nodeManifest(this.spec, this.dist, assignment));
    const outcome: StageOutcome = { uploaded: [], skipped: [] };
    if (artifacts.length === 0) return outcome;

    const staging = stagingPaths(this.spec, assignment.node);
    const user = assignment.node.user;
    const dirs = [...new Set([staging.bundles, staging.images])].map(shellQuote).join(' ');
    await runner.run(`mkdir -p ${dirs}`);
    await runner.run(`chown ${user}:${user} ${dirs}`);

    for (const { artifact, localPath, size } of artifacts) {
      const target = remotePath(staging, artifact);
      if (await this.remoteMatches(runner, target, size)) {
        runner.log.debug({ artifact: artifact.name, target }, 'already staged');
        outcome.skipped.push(artifact.name);
        continue;
      }
      runner.log.info({ artifact: artifact.name, target }, 'uploading bundle');
      await runner.upload(localPath, target);
      if (artifact.executable || target.endsWith('.sh')) {
        await runner.run(`chmod +x ${shellQuote(target)}`, { elevate: false });
      }
      outcome.uploaded.push(artifact.name);
    }

    if (outcome.uploaded.length === 0) {
      runner.log.info('all bundles already staged');
    }
    return outcome;
  }

  private async resolveLocal(artifacts: BundleArtifact[]): Promise<LocalArtifact[]> {
    const resolved: LocalArtifact[] = [];
    for (const artifact of artifacts) {
      if (!artifact.localPath) {
        throw new BundleMissingError(artifact.name, `<${artifact.source} is not set>`);
      }
      const size = await localSize(artifact.localPath);
      if (size === undefined) {
        throw new BundleMissingError(artifact.name, artifact.localPath);
      }
      resolved.push({ artifact, localPath: artifact.localPath, size });
    }
    return resolved;
  }

  private async remoteMatches(runner: CommandRunner, target: string, size: number): Promise<boolean> {
    const result = await runner.tryRun(`stat -c %s ${shellQuote(target)}`, { elevate: false });
    return result.exitCode === 0 && Number.parseInt(result.stdout.trim(), 10) === size;
  }
}
