import { Distribution, ExtraTool, OsFamily } from '@kubeforge/core';

export interface SupportEntry {
  name: string;
  notes: string;
}

const distributionNotes: Record<Distribution, string> = {
  rke2: 'full support, online and airgapped (RPMs on RHEL family, tarball on Debian family)',
  k3s: 'online and airgapped, embedded etcd via cluster-init',
  vanilla: 'kubeadm with a static bootstrap token',
  kubeadm: 'kubeadm with a static bootstrap token',
  'eks-anywhere': 'partial: prepares the admin machine (first server) and runs eksctl anywhere',
};

const osNotes: Record<OsFamily, string> = {
  rhel: 'dnf, firewalld, SELinux permissive',
  rocky: 'handled as RHEL',
  centos: 'handled as RHEL',
  ubuntu: 'apt, ufw, AppArmor complain mode',
  debian: 'handled as Ubuntu',
};

export function supportedDistributions(): SupportEntry[] {
  return Distribution.options.map(name => ({ name, notes: distributionNotes[name] }));
}

export function supportedOperatingSystems(): SupportEntry[] {
  return OsFamily.options.map(name => ({ name, notes: osNotes[name] }));
}

export function supportedTools(): ExtraTool[] {
  return [...ExtraTool.options];
}
