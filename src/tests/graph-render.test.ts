import * as test from 'node:test';
import * as assert from 'node:assert';
import { DotGraphRenderer, SvgGraphRenderer, graphNodeId, graphView } from '../graph-render.js';
import { buildIndex } from '../graph-index.js';
import { parseModel } from '../model.js';
import { BEETLE_KEY, modelOf } from './fixtures.js';

const { describe, it } = test;

describe('graphView', () => {
  const index = buildIndex(parseModel(BEETLE_KEY).model);

  it('should list nodes with their kind and edges by id', () => {
    const { nodes, edges } = graphView(index);

    assert.deepStrictEqual(nodes.slice(0, 3), [
      { id: '1', kind: 'characteristic' },
      { id: '2', kind: 'characteristic' },
      { id: 'SpeciesA', kind: 'species' }
    ]);
    assert.deepStrictEqual(edges[0], { from: '1', to: '2' });
  });

  it('should attach links from the caller', () => {
    const { nodes } = graphView(index, node => `page/${node.kind}/${node.id}.html`);

    assert.strictEqual(nodes[1].href, 'page/characteristic/2.html');
    assert.strictEqual(nodes[4].href, 'page/species/SpeciesC.html');
  });

  it('should draw a species named like a characteristic as its own node', () => {
    const shared = buildIndex(modelOf('Lasius', {
      Lasius: [{ description: 'one node', next: 'Formica' }],
      Formica: [{ description: 'large', target: { label: 'Formica' } }]
    }));
    const { nodes, edges } = graphView(shared);

    assert.deepStrictEqual(nodes, [
      { id: 'Lasius', kind: 'characteristic' },
      { id: 'Formica', kind: 'characteristic' },
      { id: 'species:Formica', label: 'Formica', kind: 'species' }
    ]);
    assert.deepStrictEqual(edges, [
      { from: 'Lasius', to: 'Formica' },
      { from: 'Formica', to: 'species:Formica' }
    ]);
    assert.strictEqual(graphNodeId(shared, 'Formica', 'species'), 'species:Formica');
    assert.strictEqual(graphNodeId(shared, 'Formica', 'characteristic'), 'Formica');
  });
});

describe('DotGraphRenderer', () => {
  it('should emit a digraph with the highlighted node filled', () => {
    const dot = new DotGraphRenderer().render(
      [{ id: 'a', kind: 'characteristic', href: 'a.html' }, { id: 'say "hi"', kind: 'species' }],
      [{ from: 'a', to: 'say "hi"' }],
      'a'
    );

    assert.strictEqual(dot, [
      'digraph model_graph {',
      '    "a" [shape=ellipse, style=filled, fillcolor=yellow, href="a.html"];',
      '    "say \\"hi\\"" [shape=ellipse, style=filled, fillcolor=white];',
      '    "a" -> "say \\"hi\\"";',
      '}',
      ''
    ].join('\n'));
  });

  it('should label nodes whose id differs from their name', () => {
    const dot = new DotGraphRenderer().render(
      [{ id: 'species:Formica', label: 'Formica', kind: 'species' }],
      []
    );

    assert.strictEqual(
      dot.split('\n')[1],
      '    "species:Formica" [shape=ellipse, style=filled, fillcolor=white, label="Formica"];'
    );
  });
});

describe('SvgGraphRenderer', () => {
  const renderer = new SvgGraphRenderer();

  it('should draw one ellipse per node and one line per edge', () => {
    const svg = renderer.render(
      [{ id: 'a', kind: 'characteristic' }, { id: 'b', kind: 'species' }, { id: 'c', kind: 'species' }],
      [{ from: 'a', to: 'b' }, { from: 'a', to: 'c' }]
    );

    assert.strictEqual(svg.match(/<ellipse /g)?.length, 3);
    assert.strictEqual(svg.match(/<line /g)?.length, 2);
    assert.match(svg, /^<svg xmlns="http:\/\/www\.w3\.org\/2000\/svg" viewBox="0 0 [\d.]+ 130" class="model_graph">\n/);
    assert.ok(svg.endsWith('</svg>'));
  });

  it('should highlight the requested node and link nodes with an href', () => {
    const svg = renderer.render(
      [{ id: 'a', kind: 'characteristic', href: 'x.html' }, { id: 'b', kind: 'species' }],
      [{ from: 'a', to: 'b' }],
      'b'
    );
    const lines = svg.split('\n');

    assert.strictEqual(
      lines[3],
      '<a href="x.html" class="graph_node characteristic">' +
      '<ellipse cx="30" cy="25" rx="20" ry="15" fill="white" stroke="black"/>' +
      '<text x="30" y="25" text-anchor="middle" dominant-baseline="central">a</text></a>'
    );
    assert.strictEqual(
      lines[4],
      '<g class="graph_node species">' +
      '<ellipse cx="30" cy="105" rx="20" ry="15" fill="yellow" stroke="black"/>' +
      '<text x="30" y="105" text-anchor="middle" dominant-baseline="central">b</text></g>'
    );
  });

  it('should keep each layer on its own row and nodes of a row apart', () => {
    const svg = renderer.render(
      [
        { id: 'root', kind: 'characteristic' },
        { id: 'left', kind: 'species' },
        { id: 'middle', kind: 'species' },
        { id: 'right', kind: 'species' }
      ],
      [{ from: 'root', to: 'left' }, { from: 'root', to: 'middle' }, { from: 'root', to: 'right' }]
    );
    const ellipses = Array.from(svg.matchAll(/<ellipse cx="([\d.-]+)" cy="([\d.-]+)" rx="([\d.]+)"/g), m => ({
      cx: Number(m[1]),
      cy: Number(m[2]),
      rx: Number(m[3])
    }));

    assert.deepStrictEqual(ellipses.map(e => e.cy), [25, 105, 105, 105]);
    const row = ellipses.slice(1).sort((a, b) => a.cx - b.cx);
    for (let i = 1; i < row.length; i++) {
      assert.ok(row[i].cx - row[i].rx >= row[i - 1].cx + row[i - 1].rx, 'row nodes overlap');
    }
    assert.ok(Math.min(...ellipses.map(e => e.cx - e.rx)) >= 10);
  });

  it('should name the arrow marker after the highlighted node', () => {
    const svg = renderer.render(
      [{ id: 'a', kind: 'characteristic' }, { id: 'b c', kind: 'species' }],
      [{ from: 'a', to: 'b c' }],
      'b c'
    );
    const lines = svg.split('\n');

    assert.ok(lines[1].startsWith('<defs><marker id="arrow_b_c" '));
    assert.ok(lines[2].endsWith(' marker-end="url(#arrow_b_c)"/>'));
  });

  it('should ignore edges to unknown nodes', () => {
    const svg = renderer.render([{ id: 'a', kind: 'characteristic' }], [{ from: 'a', to: 'zz' }]);

    assert.strictEqual(svg.match(/<line /g), null);
  });
});
