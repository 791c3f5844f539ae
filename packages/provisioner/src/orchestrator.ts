import { v4 as uuidv4 } from 'uuid';
import {
  ConfigurationError,
  ValidationError,
  toProvisioningError,
  type ClusterLogger,
  type ClusterSpec,
  type DistributionSettings,
  type ExtraTool,
  type NodeAssignment,
  type NodeSpec,
  type ProvisioningFailure,
  type ProvisioningResult,
  type RemoteExecutor,
} from '@kubeforge/core';
import { BundleStager } from './bundles/stager';
import { createDistributionHandler } from './distributions';
import type { DistributionHandler } from './distributions/types';
import { createEmitter, type ProvisioningEmitter } from './events';
import { HealthChecker, type HealthReport } from './health';
import { NodeProvisioner } from './node-provisioner';
import { assignRoles, buildPlan, type DeploymentPlan } from './plan';
import { CommandRunner } from './runner';
import { ClusterToken } from './token';
import { Validator } from './validator';

export interface DeployOptions {
  skipValidation?: boolean;
  /** stop once the bundles are staged */
  stageOnly?: boolean;
  /** replaces the configured extraTools */
  tools?: ExtraTool[];
}

export interface DeploymentResult {
  runId: string;
  status: 'success' | 'failure';
  /** per-node outcomes in provisioning order, staging failures included */
  results: ProvisioningResult[];
  /** hostnames never attempted because an earlier failure aborted the run */
  skipped: string[];
  staged: string[];
  gpu: ProvisioningResult[];
  health: HealthReport[];
  failures: ProvisioningFailure[];
  reason?: string;
}

export interface OrchestratorOptions {
  executor: RemoteExecutor;
  log: ClusterLogger;
  events?: ProvisioningEmitter;
}

export function describeFailure(failure: ProvisioningFailure): string {
  return `${failure.node.hostname} (${failure.role}) failed during ${failure.state}: ${failure.reason}`;
}

/** The spec a run works from: `tools` replaces the configured extraTools. */
export function effectiveSpec(spec: ClusterSpec, tools?: ExtraTool[]): ClusterSpec {
  return tools ? { ...spec, extraTools: tools } : spec;
}

export function createClusterToken(dist: DistributionHandler, settings: DistributionSettings): ClusterToken {
  switch (dist.tokenSource(settings)) {
    case 'static':
      if (!settings.token) {
        throw new ConfigurationError(`${dist.name} requires settings.token`);
      }
      return ClusterToken.fixed(settings.token);
    case 'dynamic':
      return ClusterToken.dynamic();
    case 'none':
      return ClusterToken.none();
  }
}

/**
 * Provisions the inventory in order: first server, joining servers, agents.
 * A server failure aborts the run, staging included; agent failures are
 * collected.
 */
export class ClusterOrchestrator {
  readonly events: ProvisioningEmitter;
  private log: ClusterLogger;
  private executor: RemoteExecutor;

  constructor(private spec: ClusterSpec, options: OrchestratorOptions) {
    this.executor = options.executor;
    this.log = options.log;
    this.events = options.events ?? createEmitter();
  }

  /** Dry run: resolves the plan without touching any node. */
  plan(options: Pick<DeployOptions, 'tools'> = {}): Promise<DeploymentPlan> {
    return buildPlan(effectiveSpec(this.spec, options.tools));
  }

  async deploy(options: DeployOptions = {}): Promise<DeploymentResult> {
    const runId = uuidv4();
    const log = this.log.child({ runId });
    const spec = effectiveSpec(this.spec, options.tools);

    if (options.skipValidation) {
      log.warn('pre-flight validation skipped');
    } else {
      const report = await new Validator(log).validate(spec);
      if (!report.ok) {
        throw new ValidationError(`pre-flight validation failed with ${report.failures.length} problems`, report.failures);
      }
    }

    const dist = createDistributionHandler(spec.distribution);
    const token = createClusterToken(dist, spec.settings);
    const assignments = assignRoles(spec);
    const servers = assignments.filter(a => a.role !== 'agent');
    const agents = assignments.filter(a => a.role === 'agent');
    const result: DeploymentResult = {
      runId, status: 'success', results: [], skipped: [], staged: [], gpu: [], health: [], failures: [],
    };

    log.info(
      { distribution: spec.distribution, servers: servers.length, agents: agents.length, airgap: spec.airgap.enabled },
      `deploying cluster ${spec.name}`,
    );

    const unstaged = new Set<NodeSpec>();
    if (spec.airgap.enabled) {
      const stager = new BundleStager(spec, dist);
      for (const [i, assignment] of assignments.entries()) {
        const staged = await this.stageNode(spec, stager, assignment, log);
        if (staged.status === 'success') {
          result.staged.push(assignment.node.hostname);
          continue;
        }
        result.results.push(staged);
        if (assignment.role !== 'agent') {
          return this.abort(result, staged, assignments.slice(i + 1), log);
        }
        unstaged.add(assignment.node);
      }
      log.success(`bundles staged on ${result.staged.length} nodes`);
    }

    if (options.stageOnly) {
      if (!spec.airgap.enabled) log.warn('stage-only requested but airgap mode is off, nothing to stage');
      return this.complete(result, log);
    }

    const provisioner = new NodeProvisioner({
      spec,
      dist,
      executor: this.executor,
      token,
      firstServer: servers[0].node,
      log,
      events: this.events,
    });

    for (const [i, assignment] of servers.entries()) {
      const outcome = await provisioner.provision(assignment);
      result.results.push(outcome);
      if (outcome.status === 'failure') {
        // agents and later servers depend on this one
        return this.abort(result, outcome, [...servers.slice(i + 1), ...agents], log);
      }
    }

    for (const assignment of agents) {
      // its staging failure is already recorded
      if (unstaged.has(assignment.node)) continue;
      result.results.push(await provisioner.provision(assignment));
    }

    for (const assignment of agents) {
      if (!assignment.node.gpuEnabled) continue;
      const base = result.results.find(r => r.node === assignment.node);
      if (base?.status !== 'success') continue;
      result.gpu.push(await provisioner.installGpuStack(assignment));
    }

    // non-fatal: the cluster may be up even when a check fails
    const health = new HealthChecker(spec, dist, this.executor, log);
    for (const assignment of servers) {
      if (!dist.participates(assignment)) continue;
      const report = await health.check(assignment);
      result.health.push(report);
      this.events.emit('health:result', report);
    }

    return this.complete(result, log);
  }

  private async stageNode(
    spec: ClusterSpec,
    stager: BundleStager,
    assignment: NodeAssignment,
    log: ClusterLogger,
  ): Promise<ProvisioningResult> {
    const { node, role } = assignment;
    const nodeLog = log.child({ node: node.hostname });
    let runner: CommandRunner | undefined;
    try {
      runner = new CommandRunner(await this.executor.connect(node, spec.timeouts), nodeLog, spec.timeouts);
      const outcome = await stager.stage(runner, assignment);
      nodeLog.info({ uploaded: outcome.uploaded, skipped: outcome.skipped }, 'bundles staged');
      return { status: 'success', node, role, warnings: [] };
    } catch (error) {
      const failure = toProvisioningError(error, node.ip);
      nodeLog.error({ state: 'bundle-stage', kind: failure.kind }, failure.message);
      return { status: 'failure', node, role, state: 'bundle-stage', kind: failure.kind, reason: failure.message, warnings: [] };
    } finally {
      await runner?.close();
    }
  }

  private abort(
    result: DeploymentResult,
    failure: ProvisioningFailure,
    remaining: NodeAssignment[],
    log: ClusterLogger,
  ): DeploymentResult {
    for (const assignment of remaining) {
      result.skipped.push(assignment.node.hostname);
      this.events.emit('node:skipped', assignment, `aborted after ${failure.node.hostname} failed`);
    }
    if (remaining.length > 0) {
      log.error(`aborting: ${remaining.length} nodes not attempted (${result.skipped.join(', ')})`);
    }
    return this.complete(result, log);
  }

  private complete(result: DeploymentResult, log: ClusterLogger): DeploymentResult {
    result.failures = [...result.results, ...result.gpu].filter(
      (r): r is ProvisioningFailure => r.status === 'failure',
    );
    if (result.failures.length === 0) {
      result.status = 'success';
      log.success(`cluster ${this.spec.name}: run finished without failures`);
      return result;
    }
    result.status = 'failure';
    result.reason = result.failures.map(describeFailure).join('; ');
    for (const failure of result.failures) log.error(describeFailure(failure));
    return result;
  }
}
