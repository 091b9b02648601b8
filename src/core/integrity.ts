// Content checksums for sealed artifacts

import { createHash } from 'crypto';
import type { AnyArtifact } from '../models/any-artifact.js';

/**
 * Fields that may legitimately change after an artifact is sealed
 */
const VOLATILE_FIELDS: ReadonlySet<string> = new Set([
  'updatedAt',
  'status',
  'references',
  'supersededBy',
  'checksum',
  'sealedAt'
]);

/**
 * Result of checking an artifact against its seal
 */
export interface IntegrityResult {
  valid: boolean;
  reason?: string;
}

function normalizeValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (value !== null && typeof value === 'object') {
    const normalized: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        normalized[key] = normalizeValue(entry);
      }
    }
    return normalized;
  }
  return value;
}

/**
 * Deterministic representation of an artifact's content.
 * Status, links, timestamps of edits and the seal itself are excluded.
 */
function normalizeArtifact(artifact: AnyArtifact): Record<string, unknown> {
  const content: Record<string, unknown> = {};
  const entries = Object.entries(artifact).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, value] of entries) {
    if (VOLATILE_FIELDS.has(key) || value === undefined) continue;
    content[key] = key === 'tags' && Array.isArray(value)
      ? [...value].map(String).sort()
      : normalizeValue(value);
  }
  return content;
}

/**
 * Computes a SHA-256 checksum of an artifact's content
 */
export function computeChecksum(artifact: AnyArtifact): string {
  const content = JSON.stringify(normalizeArtifact(artifact));
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Returns a copy of the artifact carrying a fresh seal
 */
export function seal<A extends AnyArtifact>(artifact: A, sealedAt: Date = new Date()): A {
  return {
    ...artifact,
    checksum: computeChecksum(artifact),
    sealedAt
  };
}

/**
 * Verifies a sealed artifact's content against its recorded checksum.
 * Unsealed artifacts are always valid.
 */
export function verifyIntegrity(artifact: AnyArtifact): IntegrityResult {
  if (!artifact.checksum) {
    return { valid: true };
  }

  const current = computeChecksum(artifact);
  if (current !== artifact.checksum) {
    return {
      valid: false,
      reason: `Checksum mismatch: ${artifact.id} was modified after it was sealed`
    };
  }

  return { valid: true };
}
