import { describe, it, expect, vi } from 'vitest';
import { buildDependencyGraph, collectUsedNames, renderDependencyGraph } from './builder.js';
import type { DependencyEntry } from './parse.js';
import type { Logger } from '../logger.js';

const entry = (name: string, dependencies: string[], line = 1): DependencyEntry => ({
  name,
  dependencies,
  line,
});

describe('collectUsedNames', () => {
  it('collects names on either side of a relation', () => {
    const used = collectUsedNames([entry('a', ['b']), entry('c', [])]);
    expect([...used]).toEqual(['a', 'b']);
  });
});

describe('buildDependencyGraph', () => {
  it('leaves out entries without any relation', () => {
    const graph = buildDependencyGraph([entry('a', ['b']), entry('c', [])]);

    expect([...graph.nodes].map(node => node.id)).toEqual(['a']);
    expect(graph.render()).toBe(
      ['digraph {', '  label="dependencies";', '  "a" [label="a"];', '', '  "b" -> "a";', '}', ''].join(
        '\n',
      ),
    );
  });

  it('points edges from each dependency to its dependent', () => {
    const graph = buildDependencyGraph([entry('app', ['lib1', 'lib2'])]);

    expect([...graph.edges].map(edge => [edge.source, edge.target])).toEqual([
      ['lib1', 'app'],
      ['lib2', 'app'],
    ]);
  });

  it('passes label, graph attributes and defaults through', () => {
    const graph = buildDependencyGraph([entry('a', ['b'])], {
      label: 'build order',
      graphAttributes: { rankdir: 'LR' },
      nodeDefaults: { shape: 'box' },
      edgeDefaults: { arrowhead: 'vee' },
    });

    expect(graph.render()).toBe(
      [
        'digraph {',
        '  label="build order";',
        '  rankdir="LR";',
        '  node [shape="box"];',
        '  "a" [label="a"];',
        '',
        '  edge [arrowhead="vee"];',
        '  "b" -> "a";',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('draws highlighted names with the highlight style', () => {
    const graph = buildDependencyGraph([entry('a', ['b']), entry('b', [])], { highlight: ['b'] });
    const [a, b] = [...graph.nodes];

    expect(a.render()).toBe('"a" [label="a"]');
    expect(b.render()).toBe('"b" [style="filled",fillcolor="lightyellow",label="b"]');
    expect(graph.nodes.styleDepth).toBe(0);
  });

  it('accepts a custom highlight style', () => {
    const graph = buildDependencyGraph([entry('a', ['b'])], {
      highlight: ['a'],
      highlightStyle: { color: 'red' },
    });

    expect([...graph.nodes][0].render()).toBe('"a" [color="red",label="a"]');
  });

  it('groups names into nested clusters by prefix', () => {
    const text = 'app:core/parser/ast\ncore/parser/ast:core/io\ncore/io:\ntool:\n';
    const output = renderDependencyGraph(text, { clusterSeparator: '/' });

    expect(output).toBe(
      [
        'digraph {',
        '  label="dependencies";',
        '  "app" [label="app"];',
        '',
        '  subgraph "cluster_core" {',
        '    label="core";',
        '    subgraph "cluster_core/parser" {',
        '      label="parser";',
        '      "core/parser/ast" [label="core/parser/ast"];',
        '    }',
        '    "core/io" [label="core/io"];',
        '  }',
        '',
        '  "core/parser/ast" -> "app";',
        '  "core/io" -> "core/parser/ast";',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('keeps names with an empty prefix segment at the root', () => {
    const graph = buildDependencyGraph([entry('/abs', ['x']), entry('x', [])], {
      clusterSeparator: '/',
    });

    expect(graph.clusters.size).toBe(0);
    expect([...graph.nodes].map(node => node.id)).toEqual(['/abs', 'x']);
  });

  it('reports a summary through the logger', () => {
    const logger: Logger = { info: vi.fn(), warning: vi.fn(), error: vi.fn(), debug: vi.fn() };
    buildDependencyGraph([entry('a', ['b']), entry('b', []), entry('c', [])], { logger });

    expect(logger.debug).toHaveBeenCalledWith(
      'Built graph from 3 entries: 2 used names, 1 isolated entries skipped, 1 edges',
    );
  });
});

describe('renderDependencyGraph', () => {
  it('renders a small listing end to end', () => {
    expect(renderDependencyGraph('x:y\ny:\n')).toBe(
      [
        'digraph {',
        '  label="dependencies";',
        '  "x" [label="x"];',
        '  "y" [label="y"];',
        '',
        '  "y" -> "x";',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('honours the malformed-line policy', () => {
    expect(() => renderDependencyGraph('x:y\nbad\n')).toThrow('Line 2');
    expect(renderDependencyGraph('x:y\nbad\n', { onMalformed: 'skip' })).toContain('"y" -> "x";');
  });
});
