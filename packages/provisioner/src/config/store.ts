import * as fs from 'fs/promises';
import { dump, load, YAMLException } from 'js-yaml';
import type { ZodIssue } from 'zod';
import { ClusterSpec, ConfigurationError, type ClusterSpecInput } from '@kubeforge/core';
import { isRecord, migrate, type MigrationOptions } from './migrations';

export interface LoadedConfig {
  spec: ClusterSpec;
  /** what the migrations changed, for the operator */
  notes: string[];
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

export class ConfigStore {
  async load(path: string, options: MigrationOptions = {}): Promise<LoadedConfig> {
    let text: string;
    try {
      text = await fs.readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`cannot read configuration ${path}`, [String(error)]);
    }
    return this.parse(text, options, path);
  }

  parse(text: string, options: MigrationOptions = {}, source = '<inline>'): LoadedConfig {
    let raw: unknown;
    try {
      raw = load(text);
    } catch (error) {
      if (error instanceof YAMLException) {
        throw new ConfigurationError(`${source} is not valid YAML`, [error.message]);
      }
      throw error;
    }
    if (!isRecord(raw)) {
      throw new ConfigurationError(`${source} must contain a mapping at the top level`);
    }
    return this.fromDocument(raw, options, source);
  }

  fromDocument(document: Record<string, unknown>, options: MigrationOptions = {}, source = '<inline>'): LoadedConfig {
    const { document: migrated, notes } = migrate(document, options);
    const parsed = ClusterSpec.safeParse(migrated);
    if (!parsed.success) {
      throw new ConfigurationError(`${source} is not a valid cluster specification`, parsed.error.issues.map(formatIssue));
    }
    return { spec: parsed.data, notes };
  }

  async save(path: string, spec: ClusterSpecInput): Promise<void> {
    await fs.writeFile(path, dump(spec, { lineWidth: -1, noRefs: true }), 'utf-8');
  }
}
