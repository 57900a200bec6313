export * from './auth-errors.js';
export * from './base.js';
export * from './cluster-errors.js';
export * from './k8s-errors.js';
export * from './monitoring-errors.js';
export * from './porch-errors.js';
export * from './setting-errors.js';
export * from './terminal-errors.js';
export * from './validation-errors.js';
