import { Model } from './types.js';
import { GraphIndex } from './graph-index.js';
import { allSpecies, isLeaf } from './model.js';

const EMPTY: ReadonlySet<string> = new Set<string>();

/**
 * Species reachable beneath every characteristic of a key.
 */
export class SpeciesClosure {
  constructor(
    private readonly closures: ReadonlyMap<string, ReadonlySet<string>>,
    private readonly species: readonly string[]
  ) {}

  /**
   * Species reachable from `id`. A species label maps to itself;
   * unknown ids map to the empty set.
   */
  closureOf(id: string): ReadonlySet<string> {
    const closure = this.closures.get(id);
    if (closure) return closure;
    return this.species.includes(id) ? new Set([id]) : EMPTY;
  }

  /** Every species of the key, sorted */
  allSpecies(): string[] {
    return [...this.species].sort();
  }

  /** Characteristic ids that have a closure */
  nodeIds(): string[] {
    return Array.from(this.closures.keys());
  }
}

function sameSet(a: ReadonlySet<string> | undefined, b: ReadonlySet<string>): boolean {
  if (!a || a.size !== b.size) return false;
  for (const item of b) {
    if (!a.has(item)) return false;
  }
  return true;
}

/**
 * Compute the species closure of every characteristic.
 *
 * Worklist seeded with the leaves. A node whose closure changed pushes its
 * parents back onto the list, so shared descendants converge to a fixed
 * point. Closures only grow, which bounds the work even on cyclic input.
 */
export function computeClosures(model: Model, index: GraphIndex): SpeciesClosure {
  const closures = new Map<string, Set<string>>();
  const queue: string[] = [];
  const dirty = new Set<string>();

  function enqueue(id: string): void {
    if (!dirty.has(id) && model.nodes.has(id)) {
      dirty.add(id);
      queue.push(id);
    }
  }

  function drain(): void {
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      dirty.delete(id);

      const choices = model.nodes.get(id) ?? [];
      const result = new Set<string>();
      for (const choice of choices) {
        if (choice.target) {
          result.add(choice.target.label);
        }
      }
      for (const choice of choices) {
        if (choice.next !== undefined) {
          for (const label of closures.get(choice.next) ?? EMPTY) {
            result.add(label);
          }
        }
      }

      if (!sameSet(closures.get(id), result)) {
        closures.set(id, result);
        for (const parent of index.parents(id, 'characteristic')) {
          enqueue(parent);
        }
      }
    }
  }

  for (const [id, choices] of model.nodes) {
    if (isLeaf(choices)) enqueue(id);
  }
  drain();

  // Characteristics no leaf leads back to (a closed cycle)
  for (const id of model.nodes.keys()) {
    if (!closures.has(id)) enqueue(id);
  }
  drain();

  return new SpeciesClosure(closures, allSpecies(model));
}
