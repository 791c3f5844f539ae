export * from './orchestrator';
export * from './node-provisioner';
export * from './uninstall';
export * from './health';
export * from './validator';
export * from './plan';
export * from './token';
export * from './events';
export * from './runner';
export * from './support';
export * from './tools';
export * from './bundles/manifest';
export * from './bundles/stager';
export * from './distributions';
export * from './os';
export * from './config/store';
export * from './config/migrations';
export * from './config/template';
