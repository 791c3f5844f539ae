export * from './types';
export * from './errors';
export * from './logger';
export * from './shell';
export type { ExecOptions, TransferOptions, RemoteSession, RemoteExecutor } from './interfaces';
