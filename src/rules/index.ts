export * from './types';
export * from './tables';
export * from './registry';
export * from './engine';
export { formatPortBinding } from './network-rules';
