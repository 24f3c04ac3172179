/**
 * DOT graph object model and serializer
 *
 * Nodes, edges and nested clusters with per-scope defaults and style
 * stacks, written out through an indentation-aware emitter.
 */

export type { AttributeValue, AttributeMap, AttributeInput } from './attributes.js';
export {
  toAttributeMap,
  mergeAttributes,
  escapeQuoted,
  quoteIdentifier,
  formatAttribute,
  formatAttributes,
} from './attributes.js';
export type { TextSink } from './emitter.js';
export { TextEmitter, StringSink, withEmitter, DEFAULT_TABSTYLE } from './emitter.js';
export { GraphNode } from './node.js';
export { GraphEdge } from './edge.js';
export { NodeScope, EdgeScope } from './scopes.js';
export { Cluster, ClusterScope, CLUSTER_PREFIX } from './cluster.js';
export type { GraphOptions } from './graph.js';
export { Graph } from './graph.js';
