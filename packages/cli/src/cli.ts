#!/usr/bin/env tsx

import { Command } from 'commander';
import { debugEnabled } from '@kubeforge/core';
import {
  deployCommand,
  generateConfigCommand,
  healthCheckCommand,
  listSupportedCommand,
  stageBundlesCommand,
  uninstallCommand,
  validateCommand,
  type ConfigOptions,
  type DeployCommandOptions,
  type GenerateConfigOptions,
  type HealthCommandOptions,
  type StageCommandOptions,
  type UninstallCommandOptions,
} from './commands';
import { createCliContext } from './context';

const ctx = createCliContext({ debug: debugEnabled() });
const program = new Command();

program
  .name('kubeforge')
  .description('Bootstrap RKE2, K3s, kubeadm and EKS Anywhere clusters over SSH, online or airgapped')
  .version('0.1.0');

function withConfig(command: Command): Command {
  return command
    .requiredOption('-c, --config <file>', 'Cluster configuration (YAML)')
    .option('--promote-root-user <name>', 'Connect as <name> wherever the configuration says root');
}

withConfig(program.command('deploy'))
  .description('Provision every node in the configuration')
  .option('--dry-run', 'Print the deployment plan without connecting to any node')
  .option('--skip-validation', 'Skip the pre-flight checks')
  .option('--stage-only', 'Stop once airgap bundles are staged')
  .option('--tools <list>', 'Extra tools to install, comma separated (overrides extraTools)')
  .action(async (options: DeployCommandOptions) => {
    process.exitCode = await deployCommand(ctx, options);
  });

withConfig(program.command('uninstall'))
  .description('Remove the cluster from every node')
  .option('-y, --force', 'Do not ask for confirmation')
  .action(async (options: UninstallCommandOptions) => {
    process.exitCode = await uninstallCommand(ctx, options);
  });

withConfig(program.command('validate'))
  .description('Run the pre-flight checks only')
  .action(async (options: ConfigOptions) => {
    process.exitCode = await validateCommand(ctx, options);
  });

withConfig(program.command('stage-bundles'))
  .description('Copy airgap bundles to every node without installing')
  .option('--skip-validation', 'Skip the pre-flight checks')
  .action(async (options: StageCommandOptions) => {
    process.exitCode = await stageBundlesCommand(ctx, options);
  });

withConfig(program.command('health-check'))
  .description('Check service state and list cluster nodes')
  .option('--node <hostname>', 'Check a single node')
  .action(async (options: HealthCommandOptions) => {
    process.exitCode = await healthCheckCommand(ctx, options);
  });

program
  .command('generate-config')
  .description('Write a configuration template')
  .option('-o, --output <file>', 'Output file', 'cluster.yaml')
  .option('--distribution <name>', 'rke2, k3s, vanilla, kubeadm or eks-anywhere', 'rke2')
  .option('--os <family>', 'rhel, rocky, centos, ubuntu or debian', 'rhel')
  .option('--online', 'Template for nodes with internet access')
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options: GenerateConfigOptions) => {
    process.exitCode = await generateConfigCommand(ctx, options);
  });

program
  .command('list-supported')
  .description('List supported distributions, operating systems and tools')
  .action(async () => {
    process.exitCode = await listSupportedCommand(ctx);
  });

program.parseAsync().catch((error: unknown) => {
  ctx.log.fatal({ err: error }, 'unexpected error');
  process.exitCode = 1;
});
