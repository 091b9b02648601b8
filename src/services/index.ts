// Export all services

export * from './workspace.js';
export * from './id-generator.js';
export * from './serialization/index.js';
export * from './validation/validator.js';
export * from './storage/file-store.js';
export * from './storage/cache.js';
export * from './config/config-service.js';
export * from './audit/index.js';
export * from './prompt/index.js';
export * from './git/git-tag-service.js';

// Lifecycle and lineage
export * from './lifecycle/state-machine.js';
export * from './lifecycle/lifecycle-service.js';
export * from './artifact/artifact-service.js';
export * from './link/index.js';
export * from './graph/index.js';
export * from './impact/index.js';

// Outside the lineage
export * from './playbook/playbook-service.js';
export * from './verify/verify-service.js';
