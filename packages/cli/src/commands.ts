import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ConfigurationError,
  Distribution,
  ExtraTool,
  OsFamily,
  ValidationError,
  isProvisioningError,
  type ClusterSpec,
} from '@kubeforge/core';
import {
  ClusterOrchestrator,
  HealthChecker,
  UninstallOrchestrator,
  Validator,
  assignRoles,
  createDistributionHandler,
  formatPlan,
  generateConfigTemplate,
  supportedDistributions,
  supportedOperatingSystems,
  supportedTools,
  type DeploymentResult,
  type HealthReport,
  type UninstallReport,
} from '@kubeforge/provisioner';
import type { CliContext } from './context';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface ConfigOptions {
  config: string;
  promoteRootUser?: string;
}

export interface DeployCommandOptions extends ConfigOptions {
  dryRun?: boolean;
  skipValidation?: boolean;
  stageOnly?: boolean;
  tools?: string;
}

export interface UninstallCommandOptions extends ConfigOptions {
  force?: boolean;
}

export interface StageCommandOptions extends ConfigOptions {
  skipValidation?: boolean;
}

export interface HealthCommandOptions extends ConfigOptions {
  node?: string;
}

export interface GenerateConfigOptions {
  output: string;
  distribution: string;
  os: string;
  online?: boolean;
  force?: boolean;
}

/**
 * Runs a command body and maps provisioning errors to exit code 1. Anything
 * else is a bug and propagates.
 */
export async function runCommand(ctx: CliContext, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof ValidationError) {
      ctx.log.error(error.message);
      for (const check of error.failedChecks) ctx.log.error(`  - ${check}`);
      return EXIT_FAILURE;
    }
    if (isProvisioningError(error)) {
      ctx.log.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

async function loadSpec(ctx: CliContext, options: ConfigOptions): Promise<ClusterSpec> {
  const { spec, notes } = await ctx.store.load(path.resolve(options.config), {
    promoteRootTo: options.promoteRootUser,
  });
  for (const note of notes) ctx.log.warn(`configuration migrated: ${note}`);
  return spec;
}

/** "k9s, helm" -> ['k9s', 'helm'] */
export function parseTools(value: string | undefined): ExtraTool[] | undefined {
  if (value === undefined) return undefined;
  const tools: ExtraTool[] = [];
  const unknown: string[] = [];
  for (const name of value.split(',').map(t => t.trim()).filter(Boolean)) {
    const parsed = ExtraTool.safeParse(name);
    if (parsed.success) {
      tools.push(parsed.data);
    } else {
      unknown.push(name);
    }
  }
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown tools: ${unknown.join(', ')}`, [`supported: ${ExtraTool.options.join(', ')}`]);
  }
  return tools;
}

export function formatDeployment(result: DeploymentResult): string {
  const lines = [`Run ${result.runId}: ${result.status}`];
  if (result.staged.length > 0) lines.push(`  bundles staged on: ${result.staged.join(', ')}`);
  for (const outcome of result.results) {
    const label = `  ${outcome.node.hostname.padEnd(20)} ${outcome.role.padEnd(15)}`;
    if (outcome.status === 'success') {
      lines.push(`${label} ok${outcome.warnings.length > 0 ? ` (${outcome.warnings.length} warnings)` : ''}`);
    } else {
      lines.push(`${label} failed during ${outcome.state}: ${outcome.reason}`);
    }
  }
  for (const gpu of result.gpu) {
    lines.push(`  ${gpu.node.hostname.padEnd(20)} ${'gpu'.padEnd(15)} ${gpu.status === 'success' ? 'ok' : 'failed'}`);
  }
  if (result.skipped.length > 0) lines.push(`  not attempted: ${result.skipped.join(', ')}`);
  for (const report of result.health) lines.push(formatHealth(report));
  return lines.join('\n');
}

export function formatHealth(report: HealthReport): string {
  const status = report.serviceActive ? 'active' : 'inactive';
  const lines = [`  health ${report.hostname}: service ${status}${report.error ? `, ${report.error}` : ''}`];
  if (report.nodes) {
    for (const line of report.nodes.split('\n')) lines.push(`    ${line}`);
  }
  return lines.join('\n');
}

function formatUninstall(report: UninstallReport): string {
  return report.results
    .map(r => {
      const detail = r.ok ? 'removed' : `failed: ${r.failures.join('; ')}`;
      return `  ${r.hostname.padEnd(20)} ${r.role.padEnd(15)} ${detail}`;
    })
    .join('\n');
}

export function deployCommand(ctx: CliContext, options: DeployCommandOptions): Promise<number> {
  return runCommand(ctx, async () => {
    const spec = await loadSpec(ctx, options);
    const orchestrator = new ClusterOrchestrator(spec, { executor: ctx.executor, log: ctx.log });
    const tools = parseTools(options.tools);

    if (options.dryRun) {
      const plan = await orchestrator.plan({ tools });
      ctx.print(formatPlan(plan));
      if (!plan.bundlesReady) {
        ctx.log.warn('some bundles are missing or not configured; a real run would stop at validation');
      }
      return EXIT_OK;
    }

    const result = await orchestrator.deploy({
      skipValidation: options.skipValidation,
      stageOnly: options.stageOnly,
      tools,
    });
    ctx.print(formatDeployment(result));
    return result.status === 'success' ? EXIT_OK : EXIT_FAILURE;
  });
}

export function uninstallCommand(ctx: CliContext, options: UninstallCommandOptions): Promise<number> {
  return runCommand(ctx, async () => {
    const spec = await loadSpec(ctx, options);
    const count = spec.nodes.servers.length + spec.nodes.agents.length;
    if (!options.force) {
      const proceed = await ctx.confirm(
        `Remove ${spec.distribution} cluster '${spec.name}' from ${count} nodes? Cluster data on them is deleted.`,
      );
      if (!proceed) {
        ctx.log.info('uninstall cancelled');
        return EXIT_OK;
      }
    }

    const report = await new UninstallOrchestrator(spec, { executor: ctx.executor, log: ctx.log }).uninstall();
    ctx.print(formatUninstall(report));
    return report.failedNodes.length === 0 ? EXIT_OK : EXIT_FAILURE;
  });
}

export function validateCommand(ctx: CliContext, options: ConfigOptions): Promise<number> {
  return runCommand(ctx, async () => {
    const spec = await loadSpec(ctx, options);
    const report = await new Validator(ctx.log).validate(spec);
    const lines = [
      `Validation ${report.ok ? 'passed' : 'failed'}: ${report.checks.length} checks, ` +
        `${report.failures.length} failures, ${report.warnings.length} warnings`,
      ...report.failures.map(f => `  error: ${f}`),
      ...report.warnings.map(w => `  warning: ${w}`),
    ];
    ctx.print(lines.join('\n'));
    return report.ok ? EXIT_OK : EXIT_FAILURE;
  });
}

export function stageBundlesCommand(ctx: CliContext, options: StageCommandOptions): Promise<number> {
  return runCommand(ctx, async () => {
    const spec = await loadSpec(ctx, options);
    if (!spec.airgap.enabled) {
      throw new ConfigurationError('stage-bundles needs airgap.enabled: true in the configuration');
    }
    const result = await new ClusterOrchestrator(spec, { executor: ctx.executor, log: ctx.log }).deploy({
      skipValidation: options.skipValidation,
      stageOnly: true,
    });
    ctx.print(formatDeployment(result));
    return result.status === 'success' ? EXIT_OK : EXIT_FAILURE;
  });
}

export function healthCheckCommand(ctx: CliContext, options: HealthCommandOptions): Promise<number> {
  return runCommand(ctx, async () => {
    const spec = await loadSpec(ctx, options);
    const dist = createDistributionHandler(spec.distribution);
    const assignments = assignRoles(spec).filter(a =>
      options.node ? a.node.hostname === options.node || a.node.ip === options.node : dist.participates(a),
    );
    if (assignments.length === 0) {
      throw new ConfigurationError(`no node '${options.node ?? ''}' in the inventory`);
    }

    const checker = new HealthChecker(spec, dist, ctx.executor, ctx.log);
    const reports: HealthReport[] = [];
    for (const assignment of assignments) {
      reports.push(await checker.check(assignment));
    }
    ctx.print(reports.map(formatHealth).join('\n'));
    return reports.every(r => r.serviceActive && !r.error) ? EXIT_OK : EXIT_FAILURE;
  });
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export function generateConfigCommand(ctx: CliContext, options: GenerateConfigOptions): Promise<number> {
  return runCommand(ctx, async () => {
    const distribution = Distribution.safeParse(options.distribution);
    if (!distribution.success) {
      throw new ConfigurationError(`unsupported distribution '${options.distribution}'`, [
        `supported: ${Distribution.options.join(', ')}`,
      ]);
    }
    const family = OsFamily.safeParse(options.os);
    if (!family.success) {
      throw new ConfigurationError(`unsupported OS '${options.os}'`, [`supported: ${OsFamily.options.join(', ')}`]);
    }
    if (!options.force && (await exists(options.output))) {
      throw new ConfigurationError(`${options.output} already exists; pass --force to overwrite it`);
    }

    const template = generateConfigTemplate({
      distribution: distribution.data,
      os: family.data,
      airgap: !options.online,
    });
    await ctx.store.save(options.output, template);
    ctx.log.info(`Configuration template written to ${options.output}`);
    ctx.log.info(`Edit the node list and SSH keys, then run: kubeforge deploy -c ${options.output} --dry-run`);
    return EXIT_OK;
  });
}

export function listSupportedCommand(ctx: CliContext): Promise<number> {
  return runCommand(ctx, async () => {
    const lines = ['Distributions:'];
    for (const entry of supportedDistributions()) lines.push(`  ${entry.name.padEnd(14)} ${entry.notes}`);
    lines.push('', 'Operating systems:');
    for (const entry of supportedOperatingSystems()) lines.push(`  ${entry.name.padEnd(14)} ${entry.notes}`);
    lines.push('', `Extra tools: ${supportedTools().join(', ')}`);
    ctx.print(lines.join('\n'));
    return EXIT_OK;
  });
}
