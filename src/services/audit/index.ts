/**
 * Audit Service Module
 *
 * @module services/audit
 */

export * from './audit-service.js';
