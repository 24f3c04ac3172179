import type { AttributeInput } from '../dot/attributes.js';
import type { Cluster } from '../dot/cluster.js';
import { Graph } from '../dot/graph.js';
import type { NodeScope } from '../dot/scopes.js';
import { type Logger, silentLogger } from '../logger.js';
import { type DependencyEntry, type ParseOptions, parseDependencyListing } from './parse.js';

export const DEFAULT_GRAPH_LABEL = 'dependencies';

export const DEFAULT_HIGHLIGHT_STYLE: Readonly<Record<string, string>> = {
  style: 'filled',
  fillcolor: 'lightyellow',
};

export interface BuildOptions {
  label?: string;
  /** Graph-level attributes, e.g. `{ rankdir: 'LR' }` */
  graphAttributes?: AttributeInput;
  nodeDefaults?: AttributeInput;
  edgeDefaults?: AttributeInput;
  /**
   * Group names into nested clusters by path prefix. With `/`,
   * `core/parser/ast` lands in `core` → `core/parser`.
   */
  clusterSeparator?: string;
  /** Names drawn with `highlightStyle` */
  highlight?: readonly string[];
  highlightStyle?: AttributeInput;
  logger?: Logger;
}

/**
 * Every name that takes part in at least one relation, on either side.
 */
export function collectUsedNames(entries: readonly DependencyEntry[]): Set<string> {
  const used = new Set<string>();
  for (const { name, dependencies } of entries) {
    if (dependencies.length === 0) continue;
    used.add(name);
    for (const dependency of dependencies) {
      used.add(dependency);
    }
  }
  return used;
}

/**
 * Lazily creates one cluster per name prefix, nested by segment.
 */
class ClusterIndex {
  private readonly byPrefix = new Map<string, Cluster>();

  constructor(
    private readonly graph: Graph,
    private readonly separator: string,
  ) {}

  /** Scope a node named `name` belongs in. */
  scopeFor(name: string): NodeScope {
    const segments = name.split(this.separator);
    const prefixSegments = segments.slice(0, -1);
    if (prefixSegments.length === 0 || prefixSegments.some(segment => segment === '')) {
      return this.graph.nodes;
    }

    let cluster: Cluster | undefined;
    for (let i = 1; i <= prefixSegments.length; i++) {
      const prefix = prefixSegments.slice(0, i).join(this.separator);
      cluster = this.byPrefix.get(prefix) ?? this.open(prefix, prefixSegments[i - 1], cluster);
    }
    return cluster ? cluster.nodes : this.graph.nodes;
  }

  private open(prefix: string, label: string, parent: Cluster | undefined): Cluster {
    const cluster = parent ? parent.createCluster(prefix, label) : this.graph.createCluster(prefix, label);
    this.byPrefix.set(prefix, cluster);
    return cluster;
  }
}

/**
 * Build a graph from parsed entries. Edges run from each dependency to
 * its dependent; entries with no relation in either direction are left out.
 */
export function buildDependencyGraph(
  entries: readonly DependencyEntry[],
  options: BuildOptions = {},
): Graph {
  const logger = options.logger ?? silentLogger;
  const graph = new Graph(options.label ?? DEFAULT_GRAPH_LABEL, {
    attributes: options.graphAttributes,
    nodeDefaults: options.nodeDefaults,
    edgeDefaults: options.edgeDefaults,
  });

  const used = collectUsedNames(entries);
  const highlighted = new Set(options.highlight ?? []);
  const highlightStyle = options.highlightStyle ?? DEFAULT_HIGHLIGHT_STYLE;
  const clusters = options.clusterSeparator
    ? new ClusterIndex(graph, options.clusterSeparator)
    : undefined;

  let skipped = 0;
  for (const { name, dependencies } of entries) {
    if (!used.has(name)) {
      skipped++;
      continue;
    }

    const scope = clusters ? clusters.scopeFor(name) : graph.nodes;
    if (highlighted.has(name)) {
      scope.withStyle(highlightStyle, () => scope.createNode(name, name));
    } else {
      scope.createNode(name, name);
    }

    for (const dependency of dependencies) {
      graph.link(dependency, name);
    }
  }

  logger.debug(
    `Built graph from ${entries.length} entries: ${used.size} used names, ` +
      `${skipped} isolated entries skipped, ${graph.edges.size} edges`,
  );
  return graph;
}

/**
 * Parse a listing and render it as a DOT document.
 */
export function renderDependencyGraph(
  text: string,
  options: BuildOptions & ParseOptions = {},
): string {
  const entries = parseDependencyListing(text, options);
  return buildDependencyGraph(entries, options).render();
}
