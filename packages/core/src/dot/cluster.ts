import {
  type AttributeInput,
  type AttributeMap,
  formatAttribute,
  quoteIdentifier,
  toAttributeMap,
} from './attributes.js';
import type { TextEmitter } from './emitter.js';
import type { GraphNode } from './node.js';
import { NodeScope } from './scopes.js';

/** Graphviz only draws a subgraph as a box when its name starts with this. */
export const CLUSTER_PREFIX = 'cluster_';

/**
 * Owns nested clusters. `owner` is the cluster the scope belongs to,
 * or undefined when it belongs to the root graph.
 */
export class ClusterScope implements Iterable<Cluster> {
  private readonly clusters: Cluster[] = [];

  constructor(private readonly owner?: Cluster) {}

  get size(): number {
    return this.clusters.length;
  }

  [Symbol.iterator](): Iterator<Cluster> {
    return this.clusters[Symbol.iterator]();
  }

  createCluster(id: string, label: string, attributes?: AttributeInput): Cluster {
    const cluster = new Cluster(id, label, toAttributeMap(attributes), this.owner);
    this.clusters.push(cluster);
    return cluster;
  }

  /**
   * @param separate - write a blank line before each cluster
   */
  serialize(emitter: TextEmitter, separate = false): void {
    for (const cluster of this.clusters) {
      if (separate) emitter.writeln();
      cluster.serialize(emitter);
    }
  }
}

/**
 * A labeled subgraph holding nodes and further clusters. Edges always
 * live on the root graph, whichever cluster their endpoints sit in.
 */
export class Cluster {
  readonly nodes: NodeScope;
  readonly clusters: ClusterScope;

  constructor(
    readonly id: string,
    readonly label: string,
    readonly attributes: AttributeMap,
    /** Enclosing cluster; not an owning reference. */
    readonly parent?: Cluster,
  ) {
    this.nodes = new NodeScope();
    this.clusters = new ClusterScope(this);
  }

  clusterIdentifier(): string {
    return quoteIdentifier(CLUSTER_PREFIX + this.id);
  }

  /** Enclosing clusters, nearest first. */
  ancestors(): Cluster[] {
    const chain: Cluster[] = [];
    for (let current = this.parent; current; current = current.parent) {
      chain.push(current);
    }
    return chain;
  }

  createNode(id: string, label: string, attributes?: AttributeInput): GraphNode {
    return this.nodes.createNode(id, label, attributes);
  }

  createCluster(id: string, label: string, attributes?: AttributeInput): Cluster {
    return this.clusters.createCluster(id, label, attributes);
  }

  withNodeStyle<T>(style: AttributeInput, body: () => T): T {
    return this.nodes.withStyle(style, body);
  }

  serialize(emitter: TextEmitter): void {
    emitter.writeln(`subgraph ${this.clusterIdentifier()} {`);
    emitter.indented(() => {
      emitter.writeln(`${formatAttribute('label', this.label)};`);
      for (const [key, value] of this.attributes) {
        if (key === 'label') continue;
        emitter.writeln(`${formatAttribute(key, value)};`);
      }
      this.clusters.serialize(emitter);
      this.nodes.serialize(emitter);
    });
    emitter.writeln('}');
  }
}
