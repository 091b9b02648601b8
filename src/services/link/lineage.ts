/**
 * Lineage helpers shared by the link, graph, lifecycle and verify services.
 *
 * Lineage edges are the `derives-from` (child to parent) and `supersedes`
 * (newer to older) links. Together they must form a DAG.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { LinkType } from '../../models/types.js';

export const LINEAGE_LINK_TYPES: readonly LinkType[] = ['derives-from', 'supersedes'];

export function isLineageLink(linkType: LinkType): boolean {
  return LINEAGE_LINK_TYPES.includes(linkType);
}

/**
 * IDs of every `derives-from` target, in reference order
 */
export function getParentIds(artifact: AnyArtifact): string[] {
  return artifact.references
    .filter(ref => ref.linkType === 'derives-from')
    .map(ref => ref.targetId);
}

/**
 * The lineage parent, when the artifact has exactly one
 */
export function getParentId(artifact: AnyArtifact): string | undefined {
  const parents = getParentIds(artifact);
  return parents.length === 1 ? parents[0] : undefined;
}

/**
 * Outgoing lineage edges of every artifact, keyed by ID
 */
export function buildLineageMap(artifacts: readonly AnyArtifact[]): Map<string, string[]> {
  const edges = new Map<string, string[]>();
  for (const artifact of artifacts) {
    edges.set(
      artifact.id,
      artifact.references.filter(ref => isLineageLink(ref.linkType)).map(ref => ref.targetId)
    );
  }
  return edges;
}

/**
 * True when `toId` can be reached from `fromId` by following lineage edges
 */
export function reaches(edges: ReadonlyMap<string, readonly string[]>, fromId: string, toId: string): boolean {
  const visited = new Set<string>();
  const stack = [fromId];

  let current = stack.pop();
  while (current !== undefined) {
    if (current === toId) {
      return true;
    }
    if (!visited.has(current)) {
      visited.add(current);
      stack.push(...(edges.get(current) ?? []));
    }
    current = stack.pop();
  }

  return false;
}

/**
 * Would a lineage edge from `sourceId` to `targetId` close a cycle
 */
export function wouldCreateCycle(artifacts: readonly AnyArtifact[], sourceId: string, targetId: string): boolean {
  return sourceId === targetId || reaches(buildLineageMap(artifacts), targetId, sourceId);
}

/**
 * Every distinct cycle through lineage edges, each closed by repeating its
 * first ID (e.g. `[A, B, A]`)
 */
export function findLineageCycles(artifacts: readonly AnyArtifact[]): string[][] {
  const edges = buildLineageMap(artifacts);
  const cycles: string[][] = [];
  const seen = new Set<string>();
  const visited = new Set<string>();
  const onPath = new Set<string>();
  const path: string[] = [];

  const dfs = (nodeId: string): void => {
    visited.add(nodeId);
    onPath.add(nodeId);
    path.push(nodeId);

    for (const next of edges.get(nodeId) ?? []) {
      if (!visited.has(next)) {
        dfs(next);
      } else if (onPath.has(next)) {
        const cycle = [...path.slice(path.indexOf(next)), next];
        const key = [...new Set(cycle)].sort().join(',');
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      }
    }

    path.pop();
    onPath.delete(nodeId);
  };

  for (const id of [...edges.keys()].sort()) {
    if (!visited.has(id)) {
      dfs(id);
    }
  }

  return cycles;
}
