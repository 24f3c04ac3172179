import {
  type AttributeInput,
  type AttributeMap,
  formatAttribute,
  toAttributeMap,
} from './attributes.js';
import { type Cluster, ClusterScope } from './cluster.js';
import type { GraphEdge } from './edge.js';
import { DEFAULT_TABSTYLE, StringSink, type TextSink, withEmitter } from './emitter.js';
import type { GraphNode } from './node.js';
import { EdgeScope, NodeScope } from './scopes.js';

export interface GraphOptions {
  /** Graph-level attributes such as `rankdir`, written after the label. */
  attributes?: AttributeInput;
  nodeDefaults?: AttributeInput;
  edgeDefaults?: AttributeInput;
  /** Indentation unit (default: two spaces) */
  tabstyle?: string;
}

/**
 * Root of a DOT `digraph`. Owns its nodes, every cluster (transitively)
 * and all edges.
 *
 * @example
 * ```typescript
 * const graph = new Graph('deps', { attributes: { rankdir: 'LR' } });
 * graph.createNode('app', 'app');
 * graph.link('lib', 'app');
 * graph.serialize(process.stdout);
 * ```
 */
export class Graph {
  readonly attributes: AttributeMap;
  readonly nodes: NodeScope;
  readonly edges: EdgeScope;
  readonly clusters: ClusterScope;
  private readonly tabstyle: string;

  constructor(
    readonly label: string,
    options: GraphOptions = {},
  ) {
    this.attributes = toAttributeMap(options.attributes);
    this.nodes = new NodeScope(options.nodeDefaults);
    this.edges = new EdgeScope(options.edgeDefaults);
    this.clusters = new ClusterScope();
    this.tabstyle = options.tabstyle ?? DEFAULT_TABSTYLE;
  }

  createNode(id: string, label: string, attributes?: AttributeInput): GraphNode {
    return this.nodes.createNode(id, label, attributes);
  }

  link(source: string, target: string, attributes?: AttributeInput): GraphEdge {
    return this.edges.link(source, target, attributes);
  }

  createCluster(id: string, label: string, attributes?: AttributeInput): Cluster {
    return this.clusters.createCluster(id, label, attributes);
  }

  withNodeStyle<T>(style: AttributeInput, body: () => T): T {
    return this.nodes.withStyle(style, body);
  }

  withEdgeStyle<T>(style: AttributeInput, body: () => T): T {
    return this.edges.withStyle(style, body);
  }

  /**
   * Write the whole document to `sink`.
   *
   * Nodes come before clusters and clusters before edges: the renderer
   * binds an identifier to the first statement that mentions it, so
   * explicitly labelled nodes must be declared before subgraph
   * membership or edges can create them implicitly.
   */
  serialize(sink: TextSink): void {
    withEmitter(
      sink,
      emitter => {
        emitter.writeln('digraph {');
        emitter.indented(() => {
          emitter.writeln(`${formatAttribute('label', this.label)};`);
          for (const [key, value] of this.attributes) {
            if (key === 'label') continue;
            emitter.writeln(`${formatAttribute(key, value)};`);
          }
          this.nodes.serialize(emitter);
          this.clusters.serialize(emitter, true);
          emitter.writeln();
          this.edges.serialize(emitter);
        });
        emitter.writeln('}');
      },
      this.tabstyle,
    );
  }

  /** Serialize into a string. */
  render(): string {
    const sink = new StringSink();
    this.serialize(sink);
    return sink.toString();
  }
}
