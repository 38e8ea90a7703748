import * as test from 'node:test';
import * as assert from 'node:assert';
import { buildIndex } from '../graph-index.js';
import { parseModel } from '../model.js';
import { CycleDetectedError, DanglingReferenceError } from '../errors.js';
import { BEETLE_KEY, modelOf } from './fixtures.js';

const { describe, it } = test;

describe('GraphIndex', () => {
  const index = buildIndex(parseModel(BEETLE_KEY).model);

  it('should number characteristics before species', () => {
    assert.deepStrictEqual(index.nodes().map(node => node.id), ['1', '2', 'SpeciesA', 'SpeciesB', 'SpeciesC']);
    assert.strictEqual(index.kindOf('2'), 'characteristic');
    assert.strictEqual(index.kindOf('SpeciesA'), 'species');
    assert.strictEqual(index.kindOf('nope'), undefined);
  });

  it('should list children in choice order', () => {
    assert.deepStrictEqual(index.children('1'), ['2', 'SpeciesA']);
    assert.deepStrictEqual(index.childLinks('2'), [
      { parent: '2', child: 'SpeciesB', childKind: 'species', choiceIndex: 0 },
      { parent: '2', child: 'SpeciesC', childKind: 'species', choiceIndex: 1 }
    ]);
    assert.deepStrictEqual(index.children('SpeciesA'), []);
    assert.deepStrictEqual(index.children('nope'), []);
  });

  it('should map children back to their parents', () => {
    assert.deepStrictEqual(index.parents('SpeciesB'), ['2']);
    assert.deepStrictEqual(index.parentLink('2'), { parent: '1', child: '2', childKind: 'characteristic', choiceIndex: 0 });
    assert.strictEqual(index.parentLink('1'), undefined);
    assert.deepStrictEqual(index.roots(), ['1']);
  });

  it('should build the ancestor chain from the root', () => {
    assert.deepStrictEqual(index.ancestorChain('SpeciesB'), ['1', '2', 'SpeciesB']);
    assert.deepStrictEqual(index.ancestorChain('SpeciesA'), ['1', 'SpeciesA']);
    assert.deepStrictEqual(index.ancestorChain('1'), ['1']);
  });

  it('should end every ancestor chain at the node and start it at a root', () => {
    for (const { id, kind } of index.nodes()) {
      const chain = index.ancestorChain(id, kind);
      assert.strictEqual(chain[chain.length - 1], id);
      assert.strictEqual(index.parentLink(chain[0]), undefined);
    }
  });

  it('should return the steps taken to reach a species', () => {
    assert.deepStrictEqual(index.ancestorLinks('SpeciesC'), [
      { parent: '1', child: '2', childKind: 'characteristic', choiceIndex: 0 },
      { parent: '2', child: 'SpeciesC', childKind: 'species', choiceIndex: 1 }
    ]);
  });

  it('should throw for unknown ids', () => {
    assert.throws(
      () => index.ancestorChain('nope'),
      (err: unknown) => err instanceof DanglingReferenceError && err.reference === 'nope'
    );
  });

  it('should list every edge', () => {
    assert.strictEqual(index.edges().length, 4);
    assert.deepStrictEqual(index.warnings, []);
  });
});

describe('GraphIndex with converging paths', () => {
  const model = modelOf('a', {
    a: [{ description: 'x', next: 'b' }, { description: 'y', next: 'c' }],
    b: [{ description: 'x', next: 'd' }],
    c: [{ description: 'y', next: 'd' }],
    d: [{ description: 'z', target: { label: 'S' } }]
  });
  const index = buildIndex(model);

  it('should keep every parent', () => {
    assert.deepStrictEqual(index.parents('d'), ['b', 'c']);
  });

  it('should report an ambiguous parent', () => {
    assert.deepStrictEqual(index.warnings, [{
      kind: 'AmbiguousParent',
      message: '"d" is reached from 2 choices (b, c); using b for navigation',
      subject: 'd'
    }]);
  });

  it('should use the first parent in tree mode', () => {
    assert.deepStrictEqual(index.ancestorChain('S'), ['a', 'b', 'd', 'S']);
  });

  it('should list every ancestor in multi-parent mode', () => {
    assert.deepStrictEqual(index.ancestors('S'), ['d', 'b', 'c', 'a']);
    assert.deepStrictEqual(index.ancestors('a'), []);
  });
});

describe('GraphIndex with a cycle', () => {
  // c is listed first so it becomes b's navigation parent
  const model = modelOf('a', {
    c: [{ description: 'w', next: 'b' }],
    a: [{ description: 'x', next: 'b' }],
    b: [{ description: 'y', next: 'c' }, { description: 'z', target: { label: 'S' } }]
  });
  const index = buildIndex(model);

  it('should fail with the offending chain instead of looping', () => {
    assert.throws(
      () => index.ancestorChain('S'),
      (err: unknown) => {
        assert.ok(err instanceof CycleDetectedError);
        assert.deepStrictEqual(err.chain, ['b', 'c', 'b', 'S']);
        assert.strictEqual(err.message, 'Cycle detected above "S": b -> c -> b -> S');
        return true;
      }
    );
  });

  it('should still answer multi-parent queries', () => {
    assert.deepStrictEqual(index.ancestors('S'), ['b', 'c', 'a']);
  });
});

describe('GraphIndex with a species named like a characteristic', () => {
  const model = modelOf('Lasius', {
    Lasius: [{ description: 'petiole with one node', next: 'Formica' }, { description: 'two nodes', target: { label: 'Myrmica' } }],
    Formica: [{ description: 'large', target: { label: 'Formica' } }]
  });
  const index = buildIndex(model);

  it('should keep both nodes', () => {
    assert.deepStrictEqual(index.nodes(), [
      { id: 'Lasius', kind: 'characteristic' },
      { id: 'Formica', kind: 'characteristic' },
      { id: 'Myrmica', kind: 'species' },
      { id: 'Formica', kind: 'species' }
    ]);
    assert.strictEqual(index.edges().length, 3);
    assert.deepStrictEqual(index.warnings, []);
  });

  it('should resolve each kind on its own', () => {
    assert.ok(index.has('Formica', 'species'));
    assert.ok(!index.has('Lasius', 'species'));
    assert.strictEqual(index.kindOf('Formica'), 'characteristic');
    assert.deepStrictEqual(index.parents('Formica', 'characteristic'), ['Lasius']);
    assert.deepStrictEqual(index.parents('Formica', 'species'), ['Formica']);
    assert.deepStrictEqual(index.children('Formica'), ['Formica']);
  });

  it('should walk from the species through the characteristic', () => {
    assert.deepStrictEqual(index.ancestorChain('Formica', 'species'), ['Lasius', 'Formica', 'Formica']);
    assert.deepStrictEqual(index.ancestorChain('Formica', 'characteristic'), ['Lasius', 'Formica']);
    assert.deepStrictEqual(index.ancestors('Formica', 'species'), ['Formica', 'Lasius']);
  });
});
