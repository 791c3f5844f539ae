import * as fs from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { expandKeyPath, type ClusterLogger, type ClusterSpec, type NodeSpec } from '@kubeforge/core';
import { nodeOs, resolveManifest, stagingPaths, type BundleArtifact } from './bundles/manifest';
import { createDistributionHandler } from './distributions';
import type { DistributionHandler } from './distributions/types';

export type CheckSeverity = 'error' | 'warning';

export interface CheckResult {
  name: string;
  ok: boolean;
  severity: CheckSeverity;
  message: string;
}

export interface ValidationReport {
  ok: boolean;
  checks: CheckResult[];
  /** messages of the failed error-level checks */
  failures: string[];
  warnings: string[];
}

const KUBEADM_TOKEN = /^[a-z0-9]{6}\.[a-z0-9]{16}$/;

async function fileExists(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Pre-flight checks. Every check runs and is logged, so one pass shows the
 * operator every problem.
 */
export class Validator {
  constructor(private log: ClusterLogger) {}

  async runFullValidation(spec: ClusterSpec): Promise<boolean> {
    const report = await this.validate(spec);
    return report.ok;
  }

  async validate(spec: ClusterSpec): Promise<ValidationReport> {
    const checks: CheckResult[] = [];
    const dist = createDistributionHandler(spec.distribution);

    if (spec.airgap.enabled) {
      checks.push(...(await this.checkBundles(spec, dist)));
      checks.push({
        name: 'local-registry',
        ok: Boolean(spec.airgap.localRegistry),
        severity: 'error',
        message: spec.airgap.localRegistry
          ? `local registry ${spec.airgap.localRegistry}`
          : 'airgap mode requires airgap.localRegistry',
      });
      checks.push(...this.checkStaging(spec));
    }

    checks.push(...this.checkToken(spec, dist));
    checks.push(...this.checkDuplicates(spec));

    const allNodes = [...spec.nodes.servers, ...spec.nodes.agents];
    for (const node of allNodes) {
      checks.push(...(await this.checkNode(node)));
    }

    for (const check of checks) {
      if (check.ok) {
        this.log.debug({ check: check.name }, check.message);
      } else if (check.severity === 'warning') {
        this.log.warn({ check: check.name }, check.message);
      } else {
        this.log.error({ check: check.name }, check.message);
      }
    }

    const failures = checks.filter(c => !c.ok && c.severity === 'error').map(c => c.message);
    const warnings = checks.filter(c => !c.ok && c.severity === 'warning').map(c => c.message);
    if (failures.length === 0) {
      this.log.success(`validation passed (${checks.length} checks, ${warnings.length} warnings)`);
    } else {
      this.log.error(`validation failed: ${failures.length} of ${checks.length} checks`);
    }
    return { ok: failures.length === 0, checks, failures, warnings };
  }

  private async checkBundles(spec: ClusterSpec, dist: DistributionHandler): Promise<CheckResult[]> {
    // one entry per local file, across every OS in the inventory
    const seen = new Map<string, BundleArtifact>();
    const families = new Set([spec.os, ...[...spec.nodes.servers, ...spec.nodes.agents].map(n => nodeOs(spec, n))]);
    for (const osSpec of families) {
      for (const artifact of resolveManifest(spec, dist, osSpec)) {
        seen.set(`${artifact.source}:${artifact.name}`, artifact);
      }
    }

    const results: CheckResult[] = [];
    for (const artifact of seen.values()) {
      const name = `bundle:${artifact.name}`;
      if (!artifact.localPath) {
        results.push({ name, ok: false, severity: 'error', message: `bundle '${artifact.name}' is not configured (${artifact.source})` });
        continue;
      }
      const present = await fileExists(artifact.localPath);
      results.push({
        name,
        ok: present,
        severity: 'error',
        message: present
          ? `bundle '${artifact.name}' found at ${artifact.localPath}`
          : `bundle '${artifact.name}' not found at ${artifact.localPath}`,
      });
    }
    return results;
  }

  private checkStaging(spec: ClusterSpec): CheckResult[] {
    const results: CheckResult[] = [];
    for (const node of [...spec.nodes.servers, ...spec.nodes.agents]) {
      const staging = stagingPaths(spec, node);
      for (const dir of [staging.bundles, staging.images]) {
        const ok = path.posix.isAbsolute(dir) && !dir.split('/').includes('..');
        results.push({
          name: `staging:${node.hostname}`,
          ok,
          severity: 'error',
          message: ok
            ? `${node.hostname}: staging directory ${dir}`
            : `${node.hostname}: staging directory '${dir}' must be an absolute path without '..'`,
        });
      }
    }
    return results;
  }

  private checkToken(spec: ClusterSpec, dist: DistributionHandler): CheckResult[] {
    if (dist.tokenSource(spec.settings) !== 'static') return [];
    const token = spec.settings.token;
    if (!token) {
      return [{ name: 'token', ok: false, severity: 'error', message: `${spec.distribution} requires settings.token` }];
    }
    if ((spec.distribution === 'kubeadm' || spec.distribution === 'vanilla') && !KUBEADM_TOKEN.test(token)) {
      return [{
        name: 'token',
        ok: false,
        severity: 'error',
        message: 'settings.token must look like a kubeadm bootstrap token ([a-z0-9]{6}.[a-z0-9]{16})',
      }];
    }
    return [{ name: 'token', ok: true, severity: 'error', message: 'static join token configured' }];
  }

  private checkDuplicates(spec: ClusterSpec): CheckResult[] {
    const results: CheckResult[] = [];
    const nodes = [...spec.nodes.servers, ...spec.nodes.agents];
    for (const field of ['hostname', 'ip'] as const) {
      const counts = new Map<string, number>();
      for (const node of nodes) counts.set(node[field], (counts.get(node[field]) ?? 0) + 1);
      const dupes = [...counts].filter(([, n]) => n > 1).map(([value]) => value);
      results.push({
        name: `unique-${field}`,
        ok: dupes.length === 0,
        severity: 'error',
        message: dupes.length === 0
          ? `node ${field}s are unique`
          : `duplicate node ${field}: ${dupes.join(', ')}`,
      });
    }
    return results;
  }

  private async checkNode(node: NodeSpec): Promise<CheckResult[]> {
    const name = `node:${node.hostname}`;
    const results: CheckResult[] = [];

    const missing = (['hostname', 'ip', 'user', 'sshKey'] as const).filter(field => !node[field].trim());
    results.push({
      name,
      ok: missing.length === 0,
      severity: 'error',
      message: missing.length === 0
        ? `${node.hostname}: identity fields present`
        : `${node.hostname || '<unnamed>'}: missing ${missing.join(', ')}`,
    });

    const validIp = net.isIP(node.ip) !== 0;
    results.push({
      name,
      ok: validIp,
      severity: 'error',
      message: validIp ? `${node.hostname}: address ${node.ip}` : `${node.hostname}: '${node.ip}' is not an IP address`,
    });

    const keyPath = expandKeyPath(node.sshKey);
    const keyFound = await fileExists(keyPath);
    results.push({
      name,
      ok: keyFound,
      severity: 'error',
      message: keyFound ? `${node.hostname}: ssh key ${keyPath}` : `${node.hostname}: ssh key not found at ${keyPath}`,
    });

    results.push({
      name,
      ok: node.user !== 'root',
      severity: 'warning',
      message: node.user === 'root'
        ? `${node.hostname}: connecting as root; a non-root user with sudo is expected`
        : `${node.hostname}: user ${node.user}`,
    });

    return results;
  }
}
