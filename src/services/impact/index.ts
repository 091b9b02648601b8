/**
 * Impact Analysis Service Module
 * 
 * Provides impact analysis capabilities to understand
 * the blast radius of artifact changes.
 * 
 * @module services/impact
 */

export * from './impact-service.js';
