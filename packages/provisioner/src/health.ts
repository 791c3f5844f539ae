import {
  errorMessage,
  serviceRole,
  type ClusterLogger,
  type ClusterSpec,
  type NodeAssignment,
  type RemoteExecutor,
} from '@kubeforge/core';
import type { DistributionHandler } from './distributions/types';
import { CommandRunner } from './runner';

export interface HealthReport {
  hostname: string;
  role: NodeAssignment['role'];
  serviceActive: boolean;
  /** `kubectl get nodes` output, servers only */
  nodes?: string;
  error?: string;
}

export class HealthChecker {
  constructor(
    private spec: ClusterSpec,
    private dist: DistributionHandler,
    private executor: RemoteExecutor,
    private log: ClusterLogger,
  ) {}

  /** Never throws; problems are reported on the result. */
  async check(assignment: NodeAssignment): Promise<HealthReport> {
    const { node, role } = assignment;
    const log = this.log.child({ node: node.hostname });
    const report: HealthReport = { hostname: node.hostname, role, serviceActive: false };

    let runner: CommandRunner | undefined;
    try {
      runner = new CommandRunner(await this.executor.connect(node, this.spec.timeouts), log, this.spec.timeouts);
      const service = this.dist.serviceName(serviceRole(role));
      const status = await runner.tryRun(`systemctl is-active ${service}`);
      report.serviceActive = status.stdout.trim() === 'active';

      if (role !== 'agent') {
        const kubeconfig = this.dist.kubeconfigPath(this.spec);
        const nodes = await runner.tryRun(`${this.dist.kubectlPath()} --kubeconfig ${kubeconfig} get nodes -o wide`);
        if (nodes.exitCode === 0) {
          report.nodes = nodes.stdout.trim();
        } else {
          report.error = `listing nodes failed: ${nodes.stderr.trim() || `exit ${nodes.exitCode}`}`;
        }
      }
    } catch (error) {
      report.error = errorMessage(error);
    } finally {
      await runner?.close();
    }

    if (report.serviceActive && !report.error) {
      log.success(`${this.dist.serviceName(serviceRole(role))} active`);
    } else {
      log.warn({ serviceActive: report.serviceActive, error: report.error }, 'health check found problems');
    }
    return report;
  }
}
