import {
  errorMessage,
  serviceRole,
  type ClusterLogger,
  type ClusterSpec,
  type NodeAssignment,
  type RemoteExecutor,
} from '@kubeforge/core';
import { nodeOs } from './bundles/manifest';
import { createDistributionHandler } from './distributions';
import type { DistributionHandler } from './distributions/types';
import { createOsHandler } from './os';
import { assignRoles } from './plan';
import { CommandRunner } from './runner';

export const CNI_INTERFACES = ['flannel.1', 'cni0', 'vxlan.calico'];

export interface UninstallNodeReport {
  hostname: string;
  role: NodeAssignment['role'];
  ok: boolean;
  /** the uninstall script that succeeded, if any */
  script?: string;
  failures: string[];
  warnings: string[];
}

export interface UninstallReport {
  results: UninstallNodeReport[];
  failedNodes: string[];
}

/** Agents first, then servers from the last joined to the first. */
export function teardownOrder(assignments: NodeAssignment[]): NodeAssignment[] {
  const agents = assignments.filter(a => a.role === 'agent');
  const servers = assignments.filter(a => a.role !== 'agent').reverse();
  return [...agents, ...servers];
}

/** Best-effort teardown. No node failure stops the sweep. */
export class UninstallOrchestrator {
  private dist: DistributionHandler;

  constructor(
    private spec: ClusterSpec,
    private options: { executor: RemoteExecutor; log: ClusterLogger },
  ) {
    this.dist = createDistributionHandler(spec.distribution);
  }

  async uninstall(): Promise<UninstallReport> {
    const results: UninstallNodeReport[] = [];
    for (const assignment of teardownOrder(assignRoles(this.spec))) {
      results.push(await this.teardown(assignment));
    }
    const failedNodes = results.filter(r => !r.ok).map(r => r.hostname);
    if (failedNodes.length === 0) {
      this.options.log.success(`cluster ${this.spec.name} removed from ${results.length} nodes`);
    } else {
      this.options.log.error(`uninstall finished with failures on ${failedNodes.join(', ')}`);
    }
    return { results, failedNodes };
  }

  private async teardown(assignment: NodeAssignment): Promise<UninstallNodeReport> {
    const { node, role } = assignment;
    const log = this.options.log.child({ node: node.hostname });
    const report: UninstallNodeReport = { hostname: node.hostname, role, ok: true, failures: [], warnings: [] };

    if (!this.dist.participates(assignment)) {
      log.info('managed from the first server, nothing to remove');
      return report;
    }

    let runner: CommandRunner | undefined;
    try {
      runner = new CommandRunner(
        await this.options.executor.connect(node, this.spec.timeouts),
        log,
        this.spec.timeouts,
      );
      await this.stopService(runner, assignment, report);
      await this.runUninstallScript(runner, assignment, report);
      await this.cleanup(runner, assignment, report);
    } catch (error) {
      report.failures.push(errorMessage(error));
    } finally {
      await runner?.close();
    }

    for (const warning of report.warnings) log.warn(warning);
    report.ok = report.failures.length === 0;
    if (report.ok) {
      log.success('removed');
    } else {
      for (const failure of report.failures) log.error(failure);
    }
    return report;
  }

  private async stopService(runner: CommandRunner, assignment: NodeAssignment, report: UninstallNodeReport): Promise<void> {
    const service = this.dist.serviceName(serviceRole(assignment.role));
    for (const action of ['stop', 'disable']) {
      const result = await runner.tryRun(`systemctl ${action} ${service}`);
      if (result.exitCode !== 0) {
        report.warnings.push(`systemctl ${action} ${service}: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
      }
    }
  }

  private async runUninstallScript(runner: CommandRunner, assignment: NodeAssignment, report: UninstallNodeReport): Promise<void> {
    const candidates = this.dist.uninstallScripts(serviceRole(assignment.role));
    let found = false;
    for (const script of candidates) {
      if (!(await runner.check(`test -x ${script}`))) continue;
      found = true;
      const result = await runner.tryRun(script);
      if (result.exitCode === 0) {
        report.script = script;
        return;
      }
      report.warnings.push(`${script} exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
    if (found) {
      report.failures.push(`no uninstall script succeeded (tried ${candidates.join(', ')})`);
    } else if (candidates.length > 0) {
      report.warnings.push('no uninstall script found, relying on cleanup');
    }
  }

  private async cleanup(runner: CommandRunner, assignment: NodeAssignment, report: UninstallNodeReport): Promise<void> {
    const role = serviceRole(assignment.role);
    for (const command of this.dist.cleanupCommands(role)) {
      const result = await runner.tryRun(command);
      if (result.exitCode !== 0) {
        report.failures.push(`'${command}' exited with ${result.exitCode}: ${result.stderr.trim()}`);
      }
    }

    for (const iface of CNI_INTERFACES) {
      if (!(await runner.check(`ip link show ${iface}`))) continue;
      const result = await runner.tryRun(`ip link delete ${iface}`);
      if (result.exitCode !== 0) {
        report.warnings.push(`could not delete interface ${iface}: ${result.stderr.trim()}`);
      }
    }

    if (role === 'server') {
      const os = createOsHandler(nodeOs(this.spec, assignment.node).family);
      try {
        await os.removeFirewallRules(runner, role);
      } catch (error) {
        report.warnings.push(`firewall rules: ${errorMessage(error)}`);
      }
    }
  }
}
