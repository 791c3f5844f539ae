export * from './types';
export * from './ssh-executor';
