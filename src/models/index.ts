// Export all domain models

export * from './types.js';
export * from './reference.js';
export * from './artifact.js';
export * from './prd.js';
export * from './daa.js';
export * from './tip.js';
export * from './rfc.js';
export * from './adr.js';
export * from './bolt.js';
export * from './postmortem.js';
export * from './any-artifact.js';
export * from './playbook.js';
export * from './validation.js';
