/**
 * Link Service Module
 *
 * Links between artifacts and the lineage rules they obey.
 *
 * @module services/link
 */

export * from './link-service.js';
export * from './lineage.js';
