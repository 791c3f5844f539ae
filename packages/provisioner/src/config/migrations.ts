/**
 * Forward migrations for older configuration files. Each takes the raw parsed
 * document and returns the rewritten document plus a note when it changed
 * anything. They run before schema validation.
 */

export type RawDocument = Record<string, unknown>;

export interface MigrationResult {
  document: RawDocument;
  notes: string[];
}

export interface MigrationOptions {
  /** replaces `root` as the SSH user on every node */
  promoteRootTo?: string;
}

export function isRecord(value: unknown): value is RawDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown): RawDocument {
  return isRecord(value) ? value : {};
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Drops undefined entries so schema defaults apply. */
function compact(doc: RawDocument): RawDocument {
  return Object.fromEntries(Object.entries(doc).filter(([, v]) => v !== undefined));
}

const DISTRIBUTION_ALIASES: Record<string, string> = { 'eks-a': 'eks-anywhere' };

// per-distribution settings blocks under `deployment`
const SETTINGS_BLOCKS: Record<string, string> = {
  rke2: 'rke2',
  k3s: 'k3s',
  vanilla: 'vanilla_k8s',
  kubeadm: 'vanilla_k8s',
  'eks-anywhere': 'eks_anywhere',
};

/**
 * The first release only deployed RKE2 and kept everything under `cluster`.
 * Rewrites it into the `deployment` layout, which the next step converts.
 */
export function migrateLegacyRke2(doc: RawDocument): MigrationResult {
  if ('deployment' in doc || 'distribution' in doc || !isRecord(doc.cluster) || !('nodes' in doc)) {
    return { document: doc, notes: [] };
  }
  const cluster = doc.cluster;
  const bundlePath = cluster.airgap_bundle_path;
  const document: RawDocument = {
    deployment: {
      k8s_distribution: 'rke2',
      os: record(cluster.os).type ? cluster.os : { type: 'rhel', version: '8' },
      airgap: {
        enabled: typeof bundlePath === 'string',
        local_registry: cluster.local_registry,
      },
      rke2: {
        version: cluster.version,
        airgap_bundle_path: bundlePath,
        images_bundle_path: cluster.images_bundle_path,
        rpm_bundle_path: cluster.rpm_bundle_path,
        install_script_path: cluster.install_script_path,
      },
    },
    cluster,
    nodes: doc.nodes,
    extra_tools: doc.extra_tools,
  };
  return { document, notes: ['converted the legacy RKE2-only layout'] };
}

function normalizeRegistry(value: unknown): RawDocument | undefined {
  if (!isRecord(value)) return undefined;
  const mirrors: RawDocument = {};
  for (const [host, mirror] of Object.entries(record(value.mirrors))) {
    const m = record(mirror);
    // older files spelled it `endpoints`
    mirrors[host] = compact({ endpoint: m.endpoint ?? m.endpoints, rewrite: m.rewrite });
  }
  return { mirrors, configs: record(value.configs) };
}

/**
 * The `deployment` + `cluster.<distribution>` layout, with snake_case keys,
 * becomes the flat `distribution` / `os` / `settings` layout.
 */
export function migrateDeploymentLayout(doc: RawDocument): MigrationResult {
  if (!isRecord(doc.deployment) || 'distribution' in doc) {
    return { document: doc, notes: [] };
  }
  const deployment = doc.deployment;
  const rawDistribution = String(deployment.k8s_distribution ?? 'rke2');
  const distribution = DISTRIBUTION_ALIASES[rawDistribution] ?? rawDistribution;
  const osBlock = record(deployment.os);
  const airgap = record(deployment.airgap);
  const clusterRoot = record(doc.cluster);
  // the cluster block was either keyed by distribution or flat
  const cluster = record(clusterRoot[rawDistribution] ?? clusterRoot[distribution] ?? clusterRoot);
  const block = record(deployment[SETTINGS_BLOCKS[distribution] ?? distribution]);

  const packages: RawDocument = {};
  for (const [family, value] of Object.entries(record(doc.packages))) {
    const p = record(value);
    packages[family] = compact({
      bundlePath: p.bundle_path,
      basePackages: p.base_packages,
      gpuPackages: p.gpu_packages,
      gpuBundlePath: p.gpu_bundle_path,
    });
  }

  const document: RawDocument = compact({
    name: cluster.name ?? clusterRoot.name,
    distribution,
    os: { family: osBlock.type ?? osBlock.family, version: String(osBlock.version ?? '') },
    runtime: block.container_runtime,
    airgap: compact({
      enabled: airgap.enabled,
      localRegistry: airgap.local_registry,
      bundleStagingPath: airgap.bundle_staging_path,
      imageStagingPath: airgap.image_staging_path,
    }),
    settings: compact({
      version: block.version ?? cluster.version,
      bundles: compact({
        airgapBundle: block.airgap_bundle_path ?? block.kubeadm_bundle_path ?? block.bundle_path,
        imagesBundle: block.images_bundle_path,
        rpmBundle: block.rpm_bundle_path,
        installScript: block.install_script_path,
        binary: block.binary_path,
        clusterSpec: block.cluster_spec_path,
      }),
      clusterCidr: cluster.cluster_cidr,
      serviceCidr: cluster.service_cidr,
      cni: cluster.cni,
      disable: cluster.disable,
      token: cluster.token,
      domain: cluster.domain,
      writeKubeconfigMode: cluster.write_kubeconfig_mode,
      kubeApiserverArgs: cluster.kube_apiserver_args,
      registry: normalizeRegistry(cluster.registry),
    }),
    nodes: doc.nodes,
    packages,
    extraTools: doc.extra_tools,
    tools: doc.tools,
    timeouts: doc.timeouts,
  });
  return { document, notes: [`converted the deployment/cluster layout (${distribution})`] };
}

const NODE_KEYS: Record<string, string> = {
  ssh_key: 'sshKey',
  sudo_password: 'sudoPassword',
  gpu_enabled: 'gpuEnabled',
  staging_paths: 'stagingPaths',
};

function nodeLists(doc: RawDocument): unknown[][] {
  const nodes = record(doc.nodes);
  return [list(nodes.servers), list(nodes.agents)];
}

export function migrateNodeKeys(doc: RawDocument): MigrationResult {
  let renamed = 0;
  for (const nodes of nodeLists(doc)) {
    for (const node of nodes) {
      if (!isRecord(node)) continue;
      for (const [from, to] of Object.entries(NODE_KEYS)) {
        if (!(from in node)) continue;
        if (!(to in node)) node[to] = node[from];
        delete node[from];
        renamed++;
      }
      // an empty sudo password meant "passwordless sudo"
      if (node.sudoPassword === '') delete node.sudoPassword;
    }
  }
  return { document: doc, notes: renamed > 0 ? [`renamed ${renamed} snake_case node keys`] : [] };
}

export function promoteRootUser(doc: RawDocument, user: string | undefined): MigrationResult {
  if (!user) return { document: doc, notes: [] };
  const promoted: string[] = [];
  for (const nodes of nodeLists(doc)) {
    for (const node of nodes) {
      if (!isRecord(node) || node.user !== 'root') continue;
      node.user = user;
      promoted.push(String(node.hostname ?? node.ip));
    }
  }
  return {
    document: doc,
    notes: promoted.length > 0 ? [`SSH user root replaced by ${user} on ${promoted.join(', ')}`] : [],
  };
}

export function migrate(input: RawDocument, options: MigrationOptions = {}): MigrationResult {
  const notes: string[] = [];
  let document = structuredClone(input);
  for (const step of [migrateLegacyRke2, migrateDeploymentLayout, migrateNodeKeys]) {
    const result = step(document);
    document = result.document;
    notes.push(...result.notes);
  }
  const promoted = promoteRootUser(document, options.promoteRootTo);
  notes.push(...promoted.notes);
  return { document: promoted.document, notes };
}
