import EventEmitter from 'eventemitter3';
import type {
  NodeAssignment,
  ProvisioningResult,
  ProvisioningState,
  RenderedFile,
} from '@kubeforge/core';
import type { HealthReport } from './health';

export interface ProvisioningEvents {
  'node:start': (assignment: NodeAssignment) => void;
  'node:skipped': (assignment: NodeAssignment, reason: string) => void;
  'state:enter': (assignment: NodeAssignment, state: ProvisioningState) => void;
  'state:complete': (assignment: NodeAssignment, state: ProvisioningState) => void;
  'config:rendered': (assignment: NodeAssignment, files: RenderedFile[]) => void;
  /** carries the redacted token only */
  'token:acquired': (assignment: NodeAssignment, preview: string) => void;
  'node:result': (result: ProvisioningResult) => void;
  'health:result': (report: HealthReport) => void;
}

export type ProvisioningEmitter = EventEmitter<ProvisioningEvents>;

export function createEmitter(): ProvisioningEmitter {
  return new EventEmitter<ProvisioningEvents>();
}
