// In-memory cache for FileStore.list results

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { ArtifactFilters } from './file-store.js';

export const DEFAULT_LIST_TTL_MS = 30000;

interface CachedList {
  artifacts: AnyArtifact[];
  expiresAt: number;
}

/**
 * Key that does not depend on property order, unset filters or tag order
 */
export function filterKey(filters?: ArtifactFilters): string {
  if (!filters) return '*';
  const parts: string[] = [];
  for (const [name, value] of Object.entries(filters).sort(([a], [b]) => a.localeCompare(b))) {
    if (value === undefined) continue;
    if (value instanceof Date) {
      parts.push(`${name}=${value.toISOString()}`);
    } else if (Array.isArray(value)) {
      parts.push(`${name}=${[...value].map(String).sort().join(',')}`);
    } else {
      parts.push(`${name}=${String(value)}`);
    }
  }
  return parts.length > 0 ? parts.join('&') : '*';
}

/**
 * Holds list results until the store writes or the TTL runs out.
 * Any write can move an artifact between filters, so writes drop
 * every entry rather than patching them.
 */
export class ListCache {
  private readonly entries = new Map<string, CachedList>();

  constructor(private readonly ttlMs: number = DEFAULT_LIST_TTL_MS) {}

  get(filters?: ArtifactFilters): AnyArtifact[] | null {
    const key = filterKey(filters);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    // Callers sort and filter the result in place
    return [...entry.artifacts];
  }

  set(artifacts: readonly AnyArtifact[], filters?: ArtifactFilters): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(filterKey(filters), {
      artifacts: [...artifacts],
      expiresAt: Date.now() + this.ttlMs
    });
  }

  invalidate(): void {
    this.entries.clear();
  }
}
