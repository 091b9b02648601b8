/**
 * Graph Service Module
 *
 * Lineage tracing and graph visualization with Mermaid and DOT output.
 *
 * @module services/graph
 */

export {
  GraphService,
  GRAPH_FORMATS,
  type IGraphService,
  type GraphFormat,
  type GraphOptions,
  type CircularDependency,
  type TraceNode,
  type TraceResult
} from './graph-service.js';
