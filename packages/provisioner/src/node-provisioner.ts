import {
  ConfigurationError,
  TimeoutError,
  errorMessage,
  redact,
  serviceRole,
  shellQuote,
  toProvisioningError,
  type ClusterLogger,
  type ClusterSpec,
  type NodeAssignment,
  type NodeSpec,
  type ProvisioningResult,
  type ProvisioningState,
  type RemoteExecutor,
} from '@kubeforge/core';
import { nodeOs, stagingPaths } from './bundles/manifest';
import type { DistributionContext, DistributionHandler } from './distributions/types';
import type { ProvisioningEmitter } from './events';
import { createOsHandler } from './os';
import type { OSHandler, OsContext } from './os/types';
import { CommandRunner } from './runner';
import type { ClusterToken } from './token';
import { deployKubectl, installExtraTools } from './tools';

export interface NodeProvisionerOptions {
  spec: ClusterSpec;
  dist: DistributionHandler;
  executor: RemoteExecutor;
  token: ClusterToken;
  firstServer: NodeSpec;
  log: ClusterLogger;
  events: ProvisioningEmitter;
}

interface StateTracker {
  state: ProvisioningState;
}

interface NodeSetup {
  os: OSHandler;
  osContext: OsContext;
}

/**
 * Drives one node through connect, OS prep, runtime, distribution config,
 * install, service start and extras. The first fatal error ends the node with
 * a failure result naming the state it happened in.
 */
export class NodeProvisioner {
  constructor(private options: NodeProvisionerOptions) {}

  async provision(assignment: NodeAssignment): Promise<ProvisioningResult> {
    const { spec, dist, events } = this.options;
    const { node, role } = assignment;
    const log = this.options.log.child({ node: node.hostname });
    const warnings: string[] = [];
    const tracker: StateTracker = { state: 'connect' };

    events.emit('node:start', assignment);
    log.info({ role }, 'provisioning');

    if (!dist.participates(assignment)) {
      warnings.push(`${dist.name} manages ${node.hostname} from the first server`);
      log.info('managed from the first server, nothing to do');
      return this.finish({ status: 'success', node, role, warnings }, log);
    }

    let opened: CommandRunner | undefined;
    try {
      const runner = await this.step(assignment, tracker, 'connect', () => this.connect(node, log));
      opened = runner;
      const setup = this.setup(node);

      await this.step(assignment, tracker, 'os-prepare', async () => {
        const { os, osContext } = setup;
        await os.installBasePackages(runner, osContext);
        await os.disableSwap(runner);
        await os.configureKernelModules(runner);
        await os.configureSecurityPolicy(runner);
        await os.configureFirewall(runner, serviceRole(role));
      });

      await this.step(assignment, tracker, 'runtime-prepare', async () => {
        if (dist.bundlesRuntime) {
          log.debug(`${dist.name} manages its own container runtime`);
          return;
        }
        await setup.os.installContainerRuntime(runner, spec.runtime, setup.osContext);
      });

      const ctx = await this.step(assignment, tracker, 'distribution-prepare', () =>
        this.prepareDistribution(runner, assignment, setup.os),
      );

      await this.step(assignment, tracker, 'distribution-install', () => dist.install(runner, ctx));

      const kubeconfigReady = await this.step(assignment, tracker, 'service-start', () =>
        this.startService(runner, assignment, ctx, warnings),
      );

      if (role !== 'agent') {
        await this.step(assignment, tracker, 'post-install-extras', async () => {
          warnings.push(...(await this.postInstallExtras(runner, kubeconfigReady)));
        });
      }
    } catch (error) {
      const failure = toProvisioningError(error, node.ip);
      log.error({ state: tracker.state, kind: failure.kind }, failure.message);
      return this.finish(
        { status: 'failure', node, role, state: tracker.state, kind: failure.kind, reason: failure.message, warnings },
        log,
      );
    } finally {
      await opened?.close();
    }

    return this.finish({ status: 'success', node, role, warnings }, log);
  }

  /** GPU drivers and runtime hook, run once the node's base provisioning succeeded. */
  async installGpuStack(assignment: NodeAssignment): Promise<ProvisioningResult> {
    const { spec, dist, events } = this.options;
    const { node, role } = assignment;
    const log = this.options.log.child({ node: node.hostname });
    const tracker: StateTracker = { state: 'gpu-setup' };

    let opened: CommandRunner | undefined;
    try {
      const runner = await this.connect(node, log);
      opened = runner;
      await this.step(assignment, tracker, 'gpu-setup', async () => {
        const { os, osContext } = this.setup(node);
        await os.installGpuPackages(runner, osContext);
        if (!dist.bundlesRuntime) {
          await runner.run(`nvidia-ctk runtime configure --runtime=${spec.runtime === 'crio' ? 'crio' : 'containerd'}`);
          await runner.run(`systemctl restart ${spec.runtime}`);
        }
        await runner.run(`systemctl restart ${dist.serviceName(serviceRole(role))}`);
      });
    } catch (error) {
      const failure = toProvisioningError(error, node.ip);
      log.error({ state: tracker.state, kind: failure.kind }, failure.message);
      const result: ProvisioningResult = {
        status: 'failure', node, role, state: 'gpu-setup', kind: failure.kind, reason: failure.message, warnings: [],
      };
      events.emit('node:result', result);
      return result;
    } finally {
      await opened?.close();
    }

    log.success('GPU stack installed');
    const result: ProvisioningResult = { status: 'success', node, role, warnings: [] };
    events.emit('node:result', result);
    return result;
  }

  private async step<T>(
    assignment: NodeAssignment,
    tracker: StateTracker,
    state: ProvisioningState,
    work: () => Promise<T>,
  ): Promise<T> {
    tracker.state = state;
    this.options.events.emit('state:enter', assignment, state);
    const value = await work();
    this.options.events.emit('state:complete', assignment, state);
    return value;
  }

  private async connect(node: NodeSpec, log: ClusterLogger): Promise<CommandRunner> {
    const session = await this.options.executor.connect(node, this.options.spec.timeouts);
    log.debug({ ip: node.ip, user: node.user }, 'connected');
    return new CommandRunner(session, log, this.options.spec.timeouts);
  }

  private setup(node: NodeSpec): NodeSetup {
    const { spec } = this.options;
    const osSpec = nodeOs(spec, node);
    return {
      os: createOsHandler(osSpec.family),
      osContext: {
        airgap: spec.airgap.enabled,
        packages: spec.packages[osSpec.family] ?? {},
        bundleDir: stagingPaths(spec, node).bundles,
      },
    };
  }

  private async prepareDistribution(
    runner: CommandRunner,
    assignment: NodeAssignment,
    os: OSHandler,
  ): Promise<DistributionContext> {
    const { spec, dist, token, events } = this.options;
    const ctx: DistributionContext = {
      spec,
      assignment,
      firstServer: this.options.firstServer,
      staging: stagingPaths(spec, assignment.node),
      os,
    };

    if (assignment.role === 'first-server') {
      if (token.isSet()) ctx.token = token.value();
    } else if (token.source !== 'none') {
      // joining before the first server produced the token is a defect: bounded wait, then fail
      ctx.token = await token.wait(spec.timeouts.tokenMs);
    }

    const dirs = dist.directories(serviceRole(assignment.role));
    if (dirs.length > 0) {
      await runner.run(`mkdir -p ${dirs.map(shellQuote).join(' ')}`);
    }

    const files = dist.renderConfig(ctx);
    for (const file of files) {
      await runner.putFile(file);
    }
    runner.log.info({ files: files.map(f => f.path) }, 'configuration written');
    events.emit('config:rendered', assignment, files);
    return ctx;
  }

  /** Returns whether the kubeconfig appeared; only the service check is fatal. */
  private async startService(
    runner: CommandRunner,
    assignment: NodeAssignment,
    ctx: DistributionContext,
    warnings: string[],
  ): Promise<boolean> {
    const { spec, dist, token, events } = this.options;
    const service = dist.serviceName(serviceRole(assignment.role));

    await dist.startService(runner, ctx);
    await runner.waitFor(
      `${service} to become active`,
      async () => (await runner.tryRun(`systemctl is-active ${service}`)).stdout.trim() === 'active',
      spec.timeouts.serviceActiveMs,
    );
    runner.log.success(`${service} is active`);

    if (assignment.role === 'agent') return false;

    if (assignment.role === 'first-server' && token.source === 'dynamic') {
      const tokenPath = dist.tokenPath();
      if (!tokenPath) {
        throw new ConfigurationError(`${dist.name} has no token file to read a dynamic join token from`);
      }
      let value = '';
      await runner.waitFor(
        `join token at ${tokenPath}`,
        async () => {
          const result = await runner.tryRun(`cat ${tokenPath}`);
          value = result.exitCode === 0 ? result.stdout.trim() : '';
          return value.length > 0;
        },
        spec.timeouts.tokenMs,
      );
      token.set(value);
      runner.log.info({ token: redact(value) }, 'join token acquired');
      events.emit('token:acquired', assignment, redact(value));
    }

    const kubeconfig = dist.kubeconfigPath(spec);
    try {
      await runner.waitFor(
        `kubeconfig at ${kubeconfig}`,
        () => runner.check(`test -s ${kubeconfig}`),
        spec.timeouts.kubeconfigMs,
      );
      return true;
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      warnings.push(`${error.message}; kubectl setup skipped`);
      runner.log.warn(error.message);
      return false;
    }
  }

  /** Best-effort: every problem becomes a warning. */
  private async postInstallExtras(runner: CommandRunner, kubeconfigReady: boolean): Promise<string[]> {
    const { spec, dist } = this.options;
    const warnings: string[] = [];
    try {
      if (kubeconfigReady) {
        warnings.push(...(await deployKubectl(runner, runner.node, dist.kubectlPath(), dist.kubeconfigPath(spec))));
      }
      if (spec.extraTools.length > 0) {
        warnings.push(...(await installExtraTools(runner, spec.extraTools, {
          airgap: spec.airgap.enabled,
          staged: spec.tools,
          bundleDir: stagingPaths(spec, runner.node).bundles,
        })));
      }
    } catch (error) {
      warnings.push(`post-install extras: ${errorMessage(error)}`);
    }
    for (const warning of warnings) runner.log.warn(warning);
    return warnings;
  }

  private finish(result: ProvisioningResult, log: ClusterLogger): ProvisioningResult {
    if (result.status === 'success') {
      log.success(result.warnings.length > 0 ? `provisioned with ${result.warnings.length} warnings` : 'provisioned');
    }
    this.options.events.emit('node:result', result);
    return result;
  }
}
