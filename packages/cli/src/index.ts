export * from './commands';
export * from './context';
