import { shellQuote, type ExtraTool, type NodeSpec } from '@kubeforge/core';
import type { CommandRunner } from './runner';

const onlineInstallers: Record<ExtraTool, string> = {
  helm: 'curl -fsSL https://raw.githubusercontent.com/helm/helm/main/scripts/get-helm-3 | bash',
  k9s: 'curl -fsSL https://github.com/derailed/k9s/releases/latest/download/k9s_Linux_amd64.tar.gz | tar -xz -C /usr/local/bin k9s',
  flux: 'curl -fsSL https://fluxcd.io/install.sh | bash',
};

export function homeDir(user: string): string {
  return user === 'root' ? '/root' : `/home/${user}`;
}

/** kubectl on PATH plus a kubeconfig for the SSH user and for root. */
export async function deployKubectl(
  runner: CommandRunner,
  node: NodeSpec,
  kubectlPath: string,
  kubeconfigPath: string,
): Promise<string[]> {
  const warnings: string[] = [];
  if (kubectlPath !== '/usr/local/bin/kubectl') {
    const linked = await runner.tryRun(`ln -sf ${kubectlPath} /usr/local/bin/kubectl`);
    if (linked.exitCode !== 0) warnings.push(`kubectl link failed: ${linked.stderr.trim()}`);
  }

  const users = node.user === 'root' ? ['root'] : [node.user, 'root'];
  for (const user of users) {
    const kubeDir = `${homeDir(user)}/.kube`;
    const copied = await runner.tryRun(
      `mkdir -p ${kubeDir} && cp ${kubeconfigPath} ${kubeDir}/config && chown -R ${user}:${user} ${kubeDir} && chmod 600 ${kubeDir}/config`,
    );
    if (copied.exitCode !== 0) warnings.push(`kubeconfig for ${user} failed: ${copied.stderr.trim()}`);
  }
  return warnings;
}

/**
 * Installs each tool from its staged binary (airgap) or upstream installer.
 * Returns one warning per tool that could not be installed.
 */
export async function installExtraTools(
  runner: CommandRunner,
  tools: ExtraTool[],
  options: { airgap: boolean; staged: Record<string, string>; bundleDir: string },
): Promise<string[]> {
  const warnings: string[] = [];
  for (const tool of tools) {
    let command: string;
    if (options.airgap) {
      if (!options.staged[tool]) {
        warnings.push(`${tool}: no staged binary in airgap mode, skipped`);
        continue;
      }
      command = `install -m 0755 ${shellQuote(`${options.bundleDir}/${tool}`)} /usr/local/bin/${tool}`;
    } else {
      command = onlineInstallers[tool];
    }

    const result = await runner.tryRun(command);
    if (result.exitCode === 0) {
      runner.log.info({ tool }, 'installed');
    } else {
      warnings.push(`${tool}: install failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }
  }
  return warnings;
}
