import { describe, it, expect } from 'vitest';
import { Graph } from './graph.js';
import { StringSink } from './emitter.js';

function buildSample(): Graph {
  const graph = new Graph('deps', {
    attributes: { rankdir: 'LR' },
    nodeDefaults: { shape: 'box' },
    edgeDefaults: { color: 'gray' },
  });
  graph.createNode('app', 'app');
  graph.createNode('lib', 'lib');
  graph.createCluster('core', 'core').createNode('core/io', 'io');
  graph.link('lib', 'app');
  graph.link('core/io', 'lib');
  return graph;
}

describe('Graph', () => {
  it('writes nodes, then clusters, then edges', () => {
    expect(buildSample().render()).toBe(
      [
        'digraph {',
        '  label="deps";',
        '  rankdir="LR";',
        '  node [shape="box"];',
        '  "app" [label="app"];',
        '  "lib" [label="lib"];',
        '',
        '  subgraph "cluster_core" {',
        '    label="core";',
        '    "core/io" [label="io"];',
        '  }',
        '',
        '  edge [color="gray"];',
        '  "lib" -> "app";',
        '  "core/io" -> "lib";',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('writes an empty graph', () => {
    expect(new Graph('g').render()).toBe('digraph {\n  label="g";\n\n}\n');
  });

  it('skips a label attribute in favour of the graph label', () => {
    const graph = new Graph('real', { attributes: { label: 'other', splines: 'ortho' } });
    expect(graph.render()).toBe('digraph {\n  label="real";\n  splines="ortho";\n\n}\n');
  });

  it('escapes quotes in the label', () => {
    expect(new Graph('a "b"').render()).toBe('digraph {\n  label="a \\"b\\"";\n\n}\n');
  });

  it('produces identical output when serialized twice', () => {
    const graph = buildSample();
    const first = new StringSink();
    const second = new StringSink();

    graph.serialize(first);
    graph.serialize(second);

    expect(second.toString()).toBe(first.toString());
  });

  it('indents with a custom tabstyle', () => {
    const graph = new Graph('g', { tabstyle: '\t' });
    graph.createNode('a', 'a');
    expect(graph.render()).toBe('digraph {\n\tlabel="g";\n\t"a" [label="a"];\n\n}\n');
  });

  it('applies edge styles through withEdgeStyle', () => {
    const graph = new Graph('g');
    graph.withEdgeStyle({ style: 'dashed' }, () => graph.link('a', 'b'));
    graph.link('b', 'c');

    expect(graph.render()).toBe(
      'digraph {\n  label="g";\n\n  "a" -> "b" [style="dashed"];\n  "b" -> "c";\n}\n',
    );
  });

  it('propagates sink failures', () => {
    const graph = buildSample();
    let writes = 0;
    const failing = {
      write(): void {
        writes++;
        if (writes === 3) throw new Error('EPIPE');
      },
    };

    expect(() => graph.serialize(failing)).toThrow('EPIPE');
  });
});
