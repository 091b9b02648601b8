/**
 * Graph Service
 *
 * Traces lineage up and down from an artifact and renders the
 * traceability graph in Mermaid and DOT formats with artifact type
 * coloring and status styling.
 */

import type { ArtifactType, ArtifactStatus, LinkType } from '../../models/types.js';
import type { AnyArtifact } from '../../models/any-artifact.js';
import { FileStore } from '../storage/file-store.js';
import { validateId } from '../../core/validation.js';
import { NotFoundError } from '../../core/errors.js';
import { findLineageCycles, getParentId } from '../link/lineage.js';

/**
 * Graph output format options
 */
export type GraphFormat = 'mermaid' | 'dot';

export const GRAPH_FORMATS: readonly GraphFormat[] = ['mermaid', 'dot'];

/**
 * Options for graph generation
 */
export interface GraphOptions {
  format: GraphFormat;
  /** Only render the artifacts connected to this one */
  rootId?: string;
  includeTypes?: ArtifactType[];
}

/**
 * Represents a cycle through lineage links
 */
export interface CircularDependency {
  cycle: string[];
  severity: 'warning' | 'critical';
}

/**
 * One artifact reached while tracing
 */
export interface TraceNode {
  id: string;
  title: string;
  type: ArtifactType;
  status: ArtifactStatus;
  /** Hops from the traced artifact */
  depth: number;
  /** Link followed to reach this artifact */
  linkType: LinkType;
}

export interface TraceResult {
  id: string;
  /** What the artifact derives from, supersedes or traces to */
  upstream: TraceNode[];
  /** What derives from, supersedes or traces to the artifact */
  downstream: TraceNode[];
}

/**
 * Internal representation of a graph edge
 */
interface GraphEdge {
  sourceId: string;
  targetId: string;
  type: LinkType;
}

/**
 * Links followed by `trace`; `relates-to` carries no direction
 */
const TRACE_LINK_TYPES: readonly LinkType[] = ['derives-from', 'supersedes', 'traces-to'];

/**
 * Color mapping for artifact types (DOT)
 */
const DOT_TYPE_COLORS: Record<ArtifactType, string> = {
  prd: 'purple',
  daa: 'brown',
  tip: 'teal',
  rfc: 'blue',
  adr: 'green',
  bolt: 'orange',
  postmortem: 'red'
};

/**
 * Status to style mapping for DOT
 */
const DOT_STATUS_STYLES: Record<ArtifactStatus, string> = {
  draft: 'style=dashed',
  proposed: 'style=dashed',
  todo: 'style=dashed',
  review: 'style=dashed',
  'in-progress': 'style=bold',
  validated: 'style=solid',
  locked: 'style=solid',
  approved: 'style=solid',
  accepted: 'style=solid',
  published: 'style=solid',
  done: 'style=solid',
  rejected: 'style=filled, fillcolor=gray',
  deprecated: 'style=filled, fillcolor=gray',
  superseded: 'style=filled, fillcolor=gray'
};

const MERMAID_TYPE_CLASSES: Record<ArtifactType, string> = {
  prd: 'fill:#8e44ad,stroke:#6c3483,color:#fff',
  daa: 'fill:#a04000,stroke:#873600,color:#fff',
  tip: 'fill:#16a085,stroke:#117a65,color:#fff',
  rfc: 'fill:#3498db,stroke:#2980b9,color:#fff',
  adr: 'fill:#27ae60,stroke:#229954,color:#fff',
  bolt: 'fill:#e67e22,stroke:#d35400,color:#fff',
  postmortem: 'fill:#c0392b,stroke:#922b21,color:#fff'
};

const MERMAID_DASHED_STATUSES: readonly ArtifactStatus[] = ['draft', 'proposed', 'todo'];
const MERMAID_RETIRED_STATUSES: readonly ArtifactStatus[] = ['deprecated', 'superseded', 'rejected'];

/**
 * Graph Service Interface
 */
export interface IGraphService {
  trace(id: string): Promise<TraceResult>;
  getLineage(id: string): Promise<string[]>;
  generateGraph(options?: GraphOptions): Promise<string>;
  getConnectedArtifacts(rootId: string): Promise<string[]>;
  detectCycles(): Promise<CircularDependency[]>;
}

/**
 * Graph Service Implementation
 */
export class GraphService implements IGraphService {
  private readonly fileStore: FileStore;

  constructor(fileStore: FileStore) {
    this.fileStore = fileStore;
  }

  private async loadIndex(): Promise<Map<string, AnyArtifact>> {
    const artifacts = await this.fileStore.list();
    return new Map(artifacts.map(a => [a.id, a]));
  }

  private requireIn(index: ReadonlyMap<string, AnyArtifact>, id: string): AnyArtifact {
    const normalized = validateId(id);
    const artifact = index.get(normalized);
    if (!artifact) {
      throw new NotFoundError('Artifact', normalized);
    }
    return artifact;
  }

  /**
   * Walks lineage and trace links in both directions from an artifact.
   * Each artifact appears once, at its shortest distance.
   */
  async trace(id: string): Promise<TraceResult> {
    const index = await this.loadIndex();
    const start = this.requireIn(index, id);

    const outgoing = (artifact: AnyArtifact): GraphEdge[] =>
      artifact.references
        .filter(ref => TRACE_LINK_TYPES.includes(ref.linkType))
        .map(ref => ({ sourceId: artifact.id, targetId: ref.targetId, type: ref.linkType }));

    const incoming = new Map<string, GraphEdge[]>();
    for (const artifact of index.values()) {
      for (const edge of outgoing(artifact)) {
        incoming.set(edge.targetId, [...(incoming.get(edge.targetId) ?? []), edge]);
      }
    }

    const walk = (next: (artifactId: string) => Array<{ id: string; type: LinkType }>): TraceNode[] => {
      const nodes: TraceNode[] = [];
      const visited = new Set<string>([start.id]);
      let frontier = [start.id];

      for (let depth = 1; frontier.length > 0; depth++) {
        const following: string[] = [];
        for (const currentId of frontier) {
          for (const step of next(currentId)) {
            const artifact = index.get(step.id);
            if (!artifact || visited.has(step.id)) continue;

            visited.add(step.id);
            following.push(step.id);
            nodes.push({
              id: artifact.id,
              title: artifact.title,
              type: artifact.type,
              status: artifact.status,
              depth,
              linkType: step.type
            });
          }
        }
        frontier = following.sort();
      }

      return nodes;
    };

    const upstream = walk(artifactId => {
      const artifact = index.get(artifactId);
      return artifact ? outgoing(artifact).map(edge => ({ id: edge.targetId, type: edge.type })) : [];
    });
    const downstream = walk(artifactId =>
      (incoming.get(artifactId) ?? [])
        .map(edge => ({ id: edge.sourceId, type: edge.type }))
        .sort((a, b) => a.id.localeCompare(b.id))
    );

    return { id: start.id, upstream, downstream };
  }

  /**
   * IDs from the lineage root down to the artifact, following
   * `derives-from` links
   */
  async getLineage(id: string): Promise<string[]> {
    const index = await this.loadIndex();
    const start = this.requireIn(index, id);

    const chain = [start.id];
    let current: AnyArtifact | undefined = start;
    while (current) {
      const parentId = getParentId(current);
      if (!parentId || chain.includes(parentId)) break;
      chain.unshift(parentId);
      current = index.get(parentId);
    }

    return chain;
  }

  /**
   * Generates a graph visualization of artifacts and their links
   *
   * @returns Graph output in the specified format (Mermaid or DOT)
   */
  async generateGraph(options?: GraphOptions): Promise<string> {
    const format = options?.format ?? 'mermaid';
    const includeTypes = options?.includeTypes;

    let artifacts = [...(await this.fileStore.list())].sort((a, b) => a.id.localeCompare(b.id));

    if (options?.rootId) {
      const rootId = validateId(options.rootId);
      const connected = new Set([rootId, ...(await this.getConnectedArtifacts(rootId))]);
      artifacts = artifacts.filter(a => connected.has(a.id));
    }

    if (includeTypes && includeTypes.length > 0) {
      artifacts = artifacts.filter(a => includeTypes.includes(a.type));
    }

    const artifactIds = new Set(artifacts.map(a => a.id));
    const edges: GraphEdge[] = [];
    for (const artifact of artifacts) {
      for (const ref of artifact.references) {
        if (artifactIds.has(ref.targetId)) {
          edges.push({ sourceId: artifact.id, targetId: ref.targetId, type: ref.linkType });
        }
      }
    }

    return format === 'mermaid'
      ? this.generateMermaidGraph(artifacts, edges)
      : this.generateDotGraph(artifacts, edges);
  }

  /**
   * Generates Mermaid flowchart syntax
   */
  private generateMermaidGraph(nodes: readonly AnyArtifact[], edges: readonly GraphEdge[]): string {
    const lines: string[] = ['graph TB'];

    lines.push('');
    lines.push('%% Style definitions');
    for (const [type, style] of Object.entries(MERMAID_TYPE_CLASSES)) {
      lines.push(`classDef ${type} ${style}`);
    }
    lines.push('classDef pending stroke-dasharray: 5 5');
    lines.push('classDef retired fill:#95a5a6,stroke:#7f8c8d');
    lines.push('');

    lines.push('%% Nodes');
    for (const node of nodes) {
      lines.push(`${this.sanitizeNodeId(node.id)}["${node.id}: ${this.escapeMermaidText(node.title)}"]`);
    }
    lines.push('');

    if (edges.length > 0) {
      lines.push('%% Edges');
      for (const edge of edges) {
        const arrow = edge.type === 'relates-to' ? '-.->' : '-->';
        lines.push(`${this.sanitizeNodeId(edge.sourceId)} ${arrow}|${edge.type}| ${this.sanitizeNodeId(edge.targetId)}`);
      }
      lines.push('');
    }

    lines.push('%% Apply styles');
    for (const node of nodes) {
      const nodeId = this.sanitizeNodeId(node.id);
      lines.push(`class ${nodeId} ${node.type}`);
      if (MERMAID_DASHED_STATUSES.includes(node.status)) {
        lines.push(`class ${nodeId} pending`);
      } else if (MERMAID_RETIRED_STATUSES.includes(node.status)) {
        lines.push(`class ${nodeId} retired`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Generates Graphviz DOT syntax
   */
  private generateDotGraph(nodes: readonly AnyArtifact[], edges: readonly GraphEdge[]): string {
    const lines: string[] = ['digraph G {'];
    lines.push('  rankdir=TB;');
    lines.push('  node [shape=box];');
    lines.push('');

    for (const node of nodes) {
      const nodeId = this.sanitizeNodeId(node.id);
      const color = DOT_TYPE_COLORS[node.type];
      const statusStyle = DOT_STATUS_STYLES[node.status];
      lines.push(`  ${nodeId} [label="${node.id}\\n${this.escapeDotText(node.title)}", color=${color}, ${statusStyle}];`);
    }
    lines.push('');

    for (const edge of edges) {
      const style = edge.type === 'relates-to' ? ', style=dotted' : '';
      lines.push(`  ${this.sanitizeNodeId(edge.sourceId)} -> ${this.sanitizeNodeId(edge.targetId)} [label="${edge.type}"${style}];`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  /**
   * Gets every artifact connected to a root artifact through links of any
   * type and direction
   *
   * @returns Connected artifact IDs, without the root
   */
  async getConnectedArtifacts(rootId: string): Promise<string[]> {
    const index = await this.loadIndex();
    const root = this.requireIn(index, rootId);

    const neighbours = new Map<string, string[]>();
    const connect = (from: string, to: string): void => {
      neighbours.set(from, [...(neighbours.get(from) ?? []), to]);
    };
    for (const artifact of index.values()) {
      for (const ref of artifact.references) {
        connect(artifact.id, ref.targetId);
        connect(ref.targetId, artifact.id);
      }
    }

    const visited = new Set<string>();
    const queue: string[] = [root.id];
    let currentId = queue.shift();
    while (currentId !== undefined) {
      if (!visited.has(currentId)) {
        visited.add(currentId);
        queue.push(...(neighbours.get(currentId) ?? []).filter(id => !visited.has(id)));
      }
      currentId = queue.shift();
    }

    visited.delete(root.id);
    return [...visited].filter(id => index.has(id)).sort();
  }

  /**
   * Detects cycles through `derives-from` and `supersedes` links
   */
  async detectCycles(): Promise<CircularDependency[]> {
    const artifacts = await this.fileStore.list();
    return findLineageCycles(artifacts).map((cycle): CircularDependency => ({
      cycle,
      severity: cycle.length > 3 ? 'critical' : 'warning'
    }));
  }

  /**
   * Sanitizes a node ID for use in graph syntax
   */
  private sanitizeNodeId(id: string): string {
    return id.replace(/-/g, '_');
  }

  /**
   * Escapes text for Mermaid syntax
   */
  private escapeMermaidText(text: string): string {
    return text
      .replace(/"/g, "'")
      .replace(/\[/g, '(')
      .replace(/\]/g, ')')
      .replace(/\n/g, ' ');
  }

  /**
   * Escapes text for DOT syntax
   */
  private escapeDotText(text: string): string {
    return text
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n');
  }
}
