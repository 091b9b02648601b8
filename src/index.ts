// Library entry point

export * from './models/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/validation.js';
export * from './core/integrity.js';
export * from './services/index.js';
