import { StyleStackError } from '../errors/index.js';
import {
  type AttributeInput,
  type AttributeMap,
  type AttributeValue,
  formatAttributes,
  mergeAttributes,
  toAttributeMap,
} from './attributes.js';
import { GraphEdge } from './edge.js';
import type { TextEmitter } from './emitter.js';
import { GraphNode } from './node.js';

/**
 * Push/pop stack of attribute maps. The top is what new elements inherit.
 */
class StyleStack {
  private readonly frames: AttributeMap[] = [];

  constructor(private readonly scope: 'node' | 'edge') {}

  get depth(): number {
    return this.frames.length;
  }

  get current(): ReadonlyMap<string, AttributeValue> {
    return this.frames[this.frames.length - 1] ?? new Map();
  }

  push(style: AttributeInput): void {
    this.frames.push(toAttributeMap(style));
  }

  pop(): void {
    if (this.frames.pop() === undefined) {
      throw new StyleStackError(this.scope);
    }
  }

  /** Push `style`, run `body`, and pop on every exit path. */
  with<T>(style: AttributeInput, body: () => T): T {
    this.push(style);
    try {
      return body();
    } finally {
      this.pop();
    }
  }

  /** Current style with `attributes` laid over it. */
  resolve(attributes?: AttributeInput): AttributeMap {
    return mergeAttributes(this.current, toAttributeMap(attributes));
  }
}

/**
 * Owns a sequence of nodes, the `node [...]` defaults of its scope,
 * and the node style stack.
 */
export class NodeScope implements Iterable<GraphNode> {
  readonly defaults: AttributeMap;
  private readonly nodes: GraphNode[] = [];
  private readonly styles = new StyleStack('node');

  constructor(defaults?: AttributeInput) {
    this.defaults = toAttributeMap(defaults);
  }

  get size(): number {
    return this.nodes.length;
  }

  get styleDepth(): number {
    return this.styles.depth;
  }

  get currentStyle(): ReadonlyMap<string, AttributeValue> {
    return this.styles.current;
  }

  [Symbol.iterator](): Iterator<GraphNode> {
    return this.nodes[Symbol.iterator]();
  }

  setDefault(key: string, value: AttributeValue): this {
    this.defaults.set(key, value);
    return this;
  }

  createNode(id: string, label: string, attributes?: AttributeInput): GraphNode {
    const node = new GraphNode(id, label, this.styles.resolve(attributes));
    this.nodes.push(node);
    return node;
  }

  pushStyle(style: AttributeInput): void {
    this.styles.push(style);
  }

  popStyle(): void {
    this.styles.pop();
  }

  withStyle<T>(style: AttributeInput, body: () => T): T {
    return this.styles.with(style, body);
  }

  /**
   * Writes the defaults line, then every node padded to the widest
   * quoted id so the attribute lists form one column.
   */
  serialize(emitter: TextEmitter): void {
    if (this.defaults.size > 0) {
      emitter.writeln(`node ${formatAttributes(this.defaults)};`);
    }
    if (this.nodes.length === 0) return;

    const width = Math.max(...this.nodes.map(node => node.idWidth));
    for (const node of this.nodes) {
      emitter.writeln(`${node.render(width)};`);
    }
  }
}

/**
 * Owns a sequence of edges, the `edge [...]` defaults of its scope,
 * and the edge style stack.
 */
export class EdgeScope implements Iterable<GraphEdge> {
  readonly defaults: AttributeMap;
  private readonly edges: GraphEdge[] = [];
  private readonly styles = new StyleStack('edge');

  constructor(defaults?: AttributeInput) {
    this.defaults = toAttributeMap(defaults);
  }

  get size(): number {
    return this.edges.length;
  }

  get styleDepth(): number {
    return this.styles.depth;
  }

  get currentStyle(): ReadonlyMap<string, AttributeValue> {
    return this.styles.current;
  }

  [Symbol.iterator](): Iterator<GraphEdge> {
    return this.edges[Symbol.iterator]();
  }

  setDefault(key: string, value: AttributeValue): this {
    this.defaults.set(key, value);
    return this;
  }

  link(source: string, target: string, attributes?: AttributeInput): GraphEdge {
    const edge = new GraphEdge(source, target, this.styles.resolve(attributes));
    this.edges.push(edge);
    return edge;
  }

  pushStyle(style: AttributeInput): void {
    this.styles.push(style);
  }

  popStyle(): void {
    this.styles.pop();
  }

  withStyle<T>(style: AttributeInput, body: () => T): T {
    return this.styles.with(style, body);
  }

  /** Edges are written in insertion order without column alignment. */
  serialize(emitter: TextEmitter): void {
    if (this.defaults.size > 0) {
      emitter.writeln(`edge ${formatAttributes(this.defaults)};`);
    }
    for (const edge of this.edges) {
      emitter.writeln(`${edge.render()};`);
    }
  }
}
