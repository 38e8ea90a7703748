import { KeyWarning, Model } from './types.js';
import { CycleDetectedError, DanglingReferenceError } from './errors.js';

export type NodeKind = 'characteristic' | 'species';

/**
 * One edge of the key: `parent` offers a choice at `choiceIndex` that
 * leads to `child`, a characteristic id or a species label as `childKind`
 * says. A species may share its label with a characteristic.
 */
export interface GraphLink {
  parent: string;
  child: string;
  childKind: NodeKind;
  choiceIndex: number;
}

export interface GraphNode {
  id: string;
  kind: NodeKind;
}

interface EdgeRecord {
  from: number;
  to: number;
  choiceIndex: number;
}

/**
 * Forward and reverse navigation over a Model.
 *
 * Nodes live in an arena: each (kind, id) pair gets a stable slot number
 * on first sight, edges are slot pairs, adjacency lists hold edge numbers.
 * Built once; nothing mutates it afterwards, so concurrent readers are safe.
 *
 * Lookups by id take an optional kind. Without one a characteristic wins
 * over a species of the same name.
 */
export class GraphIndex {
  private readonly ids: string[] = [];
  private readonly kinds: NodeKind[] = [];
  private readonly slots: Record<NodeKind, Map<string, number>> = {
    characteristic: new Map(),
    species: new Map()
  };
  private readonly records: EdgeRecord[] = [];
  private readonly outgoing: number[][] = [];
  private readonly incoming: number[][] = [];

  /** AmbiguousParent warnings found while building */
  readonly warnings: readonly KeyWarning[];

  constructor(model: Model) {
    for (const nodeId of model.nodes.keys()) {
      this.slotFor(nodeId, 'characteristic');
    }

    for (const [nodeId, choices] of model.nodes) {
      const from = this.slotFor(nodeId, 'characteristic');
      choices.forEach((choice, choiceIndex) => {
        if (choice.next !== undefined) {
          this.addEdge(from, this.slotFor(choice.next, 'characteristic'), choiceIndex);
        } else if (choice.target) {
          this.addEdge(from, this.slotFor(choice.target.label, 'species'), choiceIndex);
        }
      });
    }

    const warnings: KeyWarning[] = [];
    this.incoming.forEach((edges, slot) => {
      if (edges.length > 1) {
        const id = this.ids[slot];
        const parents = edges.map(e => this.ids[this.records[e].from]);
        warnings.push({
          kind: 'AmbiguousParent',
          message: `"${id}" is reached from ${edges.length} choices (${parents.join(', ')}); using ${parents[0]} for navigation`,
          subject: id
        });
      }
    });
    this.warnings = warnings;
  }

  private slotFor(id: string, kind: NodeKind): number {
    const existing = this.slots[kind].get(id);
    if (existing !== undefined) {
      return existing;
    }
    const slot = this.ids.length;
    this.ids.push(id);
    this.kinds.push(kind);
    this.slots[kind].set(id, slot);
    this.outgoing.push([]);
    this.incoming.push([]);
    return slot;
  }

  private addEdge(from: number, to: number, choiceIndex: number): void {
    const edge = this.records.length;
    this.records.push({ from, to, choiceIndex });
    this.outgoing[from].push(edge);
    this.incoming[to].push(edge);
  }

  private findSlot(id: string, kind?: NodeKind): number | undefined {
    if (kind) return this.slots[kind].get(id);
    return this.slots.characteristic.get(id) ?? this.slots.species.get(id);
  }

  private requireSlot(id: string, kind?: NodeKind): number {
    const slot = this.findSlot(id, kind);
    if (slot === undefined) {
      throw new DanglingReferenceError(`Unknown ${kind ?? 'node'}: ${id}`, id);
    }
    return slot;
  }

  private toLink(edge: number): GraphLink {
    const { from, to, choiceIndex } = this.records[edge];
    return { parent: this.ids[from], child: this.ids[to], childKind: this.kinds[to], choiceIndex };
  }

  has(id: string, kind?: NodeKind): boolean {
    return this.findSlot(id, kind) !== undefined;
  }

  kindOf(id: string): NodeKind | undefined {
    const slot = this.findSlot(id);
    return slot === undefined ? undefined : this.kinds[slot];
  }

  /** All nodes in slot order: characteristics first, then species */
  nodes(): GraphNode[] {
    return this.ids.map((id, slot) => ({ id, kind: this.kinds[slot] }));
  }

  edges(): GraphLink[] {
    return this.records.map((_, edge) => this.toLink(edge));
  }

  /** Nodes nothing leads to */
  roots(): string[] {
    return this.ids.filter((_, slot) => this.incoming[slot].length === 0);
  }

  children(id: string): string[] {
    return this.childLinks(id).map(link => link.child);
  }

  /** Only characteristics have children */
  childLinks(id: string): GraphLink[] {
    const slot = this.slots.characteristic.get(id);
    if (slot === undefined) return [];
    return this.outgoing[slot].map(edge => this.toLink(edge));
  }

  /**
   * Every parent of a node, in discovery order
   */
  parents(id: string, kind?: NodeKind): string[] {
    return this.parentLinks(id, kind).map(link => link.parent);
  }

  parentLinks(id: string, kind?: NodeKind): GraphLink[] {
    const slot = this.findSlot(id, kind);
    if (slot === undefined) return [];
    return this.incoming[slot].map(edge => this.toLink(edge));
  }

  /**
   * Tree mode: the first parent discovered. When there are several the
   * index carries an AmbiguousParent warning for the node.
   */
  parentLink(id: string, kind?: NodeKind): GraphLink | undefined {
    const slot = this.findSlot(id, kind);
    if (slot === undefined) return undefined;
    const first = this.incoming[slot][0];
    return first === undefined ? undefined : this.toLink(first);
  }

  /**
   * Tree-mode steps from the root down to `id`, each step being the
   * parent and the choice taken there.
   */
  ancestorLinks(id: string, kind?: NodeKind): GraphLink[] {
    let current = this.requireSlot(id, kind);
    const steps: GraphLink[] = [];
    const walked: string[] = [id];
    const visited = new Set<number>([current]);

    for (;;) {
      const edge = this.incoming[current][0];
      if (edge === undefined) break;
      const parent = this.records[edge].from;
      if (visited.has(parent)) {
        const chain = [...walked, this.ids[parent]].reverse();
        throw new CycleDetectedError(`Cycle detected above "${id}": ${chain.join(' -> ')}`, chain);
      }
      visited.add(parent);
      walked.push(this.ids[parent]);
      steps.push(this.toLink(edge));
      current = parent;
    }

    return steps.reverse();
  }

  /**
   * Ids from the root to `id`, inclusive
   */
  ancestorChain(id: string, kind?: NodeKind): string[] {
    const steps = this.ancestorLinks(id, kind);
    if (steps.length === 0) {
      return [id];
    }
    return [...steps.map(step => step.parent), id];
  }

  /**
   * Multi-parent mode: every node from which `id` can be reached,
   * nearest first, each once.
   */
  ancestors(id: string, kind?: NodeKind): string[] {
    const start = this.requireSlot(id, kind);
    const seen = new Set<number>([start]);
    const queue = [start];
    const result: string[] = [];
    while (queue.length > 0) {
      const slot = queue.shift();
      if (slot === undefined) break;
      for (const edge of this.incoming[slot]) {
        const parent = this.records[edge].from;
        if (!seen.has(parent)) {
          seen.add(parent);
          result.push(this.ids[parent]);
          queue.push(parent);
        }
      }
    }
    return result;
  }
}

export function buildIndex(model: Model): GraphIndex {
  return new GraphIndex(model);
}
