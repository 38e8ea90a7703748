import { forceSimulation, forceLink, forceManyBody, forceX, forceCollide } from 'd3-force';
import type { SimulationNodeDatum, SimulationLinkDatum } from 'd3-force';
import { GraphIndex, GraphNode, NodeKind } from './graph-index.js';
import { anchorPart } from './annotator.js';

/**
 * A node as the renderer sees it
 */
export interface GraphNodeView {
  /** Unique within one drawing */
  id: string;
  /** Text shown on the node (default: id) */
  label?: string;
  kind: NodeKind;
  /** Link target of the node, if any */
  href?: string;
}

export interface GraphEdgeView {
  from: string;
  to: string;
}

/**
 * Draws the key. Implementations know nothing about pages or models.
 */
export interface GraphRenderer {
  render(nodes: readonly GraphNodeView[], edges: readonly GraphEdgeView[], highlighted?: string): string;
}

/**
 * Drawing id of a node. A species that shares its name with a
 * characteristic is drawn as a separate node with a prefixed id.
 */
export function graphNodeId(index: GraphIndex, id: string, kind: NodeKind): string {
  return kind === 'species' && index.has(id, 'characteristic') ? `species:${id}` : id;
}

/**
 * Nodes and edges of an index, with links supplied by the caller
 */
export function graphView(
  index: GraphIndex,
  hrefFor?: (node: GraphNode) => string
): { nodes: GraphNodeView[]; edges: GraphEdgeView[] } {
  const nodes = index.nodes().map(node => {
    const view: GraphNodeView = { id: graphNodeId(index, node.id, node.kind), kind: node.kind };
    if (view.id !== node.id) view.label = node.id;
    if (hrefFor) view.href = hrefFor(node);
    return view;
  });
  const edges = index.edges().map(link => ({
    from: link.parent,
    to: graphNodeId(index, link.child, link.childKind)
  }));
  return { nodes, edges };
}

function labelOf(node: GraphNodeView): string {
  return node.label ?? node.id;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const NODE_HEIGHT = 30;
const H_GAP = 20;
const V_GAP = 50;
const MARGIN = 10;
const CHAR_WIDTH = 7;
const LAYOUT_TICKS = 300;

interface LayoutNode extends SimulationNodeDatum {
  node: GraphNodeView;
  x: number;
  y: number;
  rx: number;
  /** Layered position the layout starts from and is pulled back to */
  seedX: number;
}

interface LayoutLink extends SimulationLinkDatum<LayoutNode> {
  source: LayoutNode;
  target: LayoutNode;
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Layer of every node: its breadth-first distance from the nearest root.
 * Nodes only reachable through a cycle sit on layer 0.
 */
function layersOf(nodes: readonly GraphNodeView[], edges: readonly GraphEdgeView[]): GraphNodeView[][] {
  const outgoing = new Map<string, string[]>();
  const hasParent = new Set<string>();
  for (const edge of edges) {
    const list = outgoing.get(edge.from) ?? [];
    list.push(edge.to);
    outgoing.set(edge.from, list);
    hasParent.add(edge.to);
  }

  const depth = new Map<string, number>();
  const queue: string[] = [];
  for (const node of nodes) {
    if (!hasParent.has(node.id)) {
      depth.set(node.id, 0);
      queue.push(node.id);
    }
  }
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    const next = (depth.get(id) ?? 0) + 1;
    for (const child of outgoing.get(id) ?? []) {
      if (!depth.has(child)) {
        depth.set(child, next);
        queue.push(child);
      }
    }
  }

  const layers: GraphNodeView[][] = [];
  for (const node of nodes) {
    const level = depth.get(node.id) ?? 0;
    while (layers.length <= level) layers.push([]);
    layers[level].push(node);
  }
  return layers;
}

/**
 * SVG drawing with a force-directed layout. Layers are fixed rows; within
 * a row nodes start in input order and the simulation spreads them so
 * that linked nodes line up and labels do not overlap.
 */
export class SvgGraphRenderer implements GraphRenderer {
  render(nodes: readonly GraphNodeView[], edges: readonly GraphEdgeView[], highlighted?: string): string {
    const known = new Set(nodes.map(n => n.id));
    const usable = edges.filter(e => known.has(e.from) && known.has(e.to));
    const layers = layersOf(nodes, usable);

    const widthOf = (node: GraphNodeView) => Math.max(40, labelOf(node).length * CHAR_WIDTH + 20);
    const layerWidths = layers.map(layer =>
      layer.reduce((sum, node) => sum + widthOf(node), 0) + H_GAP * Math.max(0, layer.length - 1)
    );
    const seedWidth = Math.max(0, ...layerWidths);
    const totalHeight = layers.length * NODE_HEIGHT + Math.max(0, layers.length - 1) * V_GAP + MARGIN * 2;

    const layout: LayoutNode[] = [];
    layers.forEach((layer, level) => {
      let x = MARGIN + (seedWidth - layerWidths[level]) / 2;
      const y = MARGIN + level * (NODE_HEIGHT + V_GAP) + NODE_HEIGHT / 2;
      for (const node of layer) {
        const rx = widthOf(node) / 2;
        layout.push({ node, x: x + rx, y, fy: y, rx, seedX: x + rx });
        x += rx * 2 + H_GAP;
      }
    });

    const byId = new Map(layout.map(n => [n.node.id, n]));
    const links: LayoutLink[] = [];
    for (const edge of usable) {
      const source = byId.get(edge.from);
      const target = byId.get(edge.to);
      if (source && target) links.push({ source, target });
    }

    forceSimulation<LayoutNode, LayoutLink>(layout)
      .force('link', forceLink<LayoutNode, LayoutLink>(links).distance(NODE_HEIGHT + V_GAP).strength(0.1))
      .force('charge', forceManyBody<LayoutNode>().strength(-30))
      .force('x', forceX<LayoutNode>(d => d.seedX).strength(0.2))
      .force('collide', forceCollide<LayoutNode>(d => d.rx + H_GAP / 2))
      .stop()
      .tick(LAYOUT_TICKS);

    const left = Math.min(...layout.map(n => n.x - n.rx));
    const right = Math.max(...layout.map(n => n.x + n.rx));
    const shift = layout.length > 0 ? MARGIN - left : 0;
    const totalWidth = layout.length > 0 ? round(right - left + MARGIN * 2) : MARGIN * 2;

    const placed = new Map(layout.map(n => [n.node.id, { node: n.node, cx: round(n.x + shift), cy: n.y, rx: n.rx }]));
    const markerId = highlighted === undefined ? 'arrow' : `arrow_${anchorPart(highlighted)}`;

    const parts: string[] = [];
    parts.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${totalWidth} ${totalHeight}" class="model_graph">`);
    parts.push(
      `<defs><marker id="${escapeXml(markerId)}" viewBox="0 0 10 10" refX="10" refY="5" markerWidth="6" markerHeight="6" orient="auto">` +
      '<path d="M 0 0 L 10 5 L 0 10 z" fill="black"/></marker></defs>'
    );

    const ry = NODE_HEIGHT / 2;
    for (const edge of usable) {
      const from = placed.get(edge.from);
      const to = placed.get(edge.to);
      if (!from || !to) continue;
      parts.push(
        `<line x1="${from.cx}" y1="${from.cy + ry}" x2="${to.cx}" y2="${to.cy - ry}" stroke="black" marker-end="url(#${escapeXml(markerId)})"/>`
      );
    }

    for (const { node, cx, cy, rx } of placed.values()) {
      const fill = node.id === highlighted ? 'yellow' : 'white';
      const shape =
        `<ellipse cx="${cx}" cy="${cy}" rx="${rx}" ry="${ry}" fill="${fill}" stroke="black"/>` +
        `<text x="${cx}" y="${cy}" text-anchor="middle" dominant-baseline="central">${escapeXml(labelOf(node))}</text>`;
      if (node.href) {
        parts.push(`<a href="${escapeXml(node.href)}" class="graph_node ${node.kind}">${shape}</a>`);
      } else {
        parts.push(`<g class="graph_node ${node.kind}">${shape}</g>`);
      }
    }

    parts.push('</svg>');
    return parts.join('\n');
  }
}

function dotString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Graphviz DOT source, for drawing the key with external tools
 */
export class DotGraphRenderer implements GraphRenderer {
  render(nodes: readonly GraphNodeView[], edges: readonly GraphEdgeView[], highlighted?: string): string {
    const lines = ['digraph model_graph {'];
    for (const node of nodes) {
      const attributes = [
        'shape=ellipse',
        'style=filled',
        `fillcolor=${node.id === highlighted ? 'yellow' : 'white'}`
      ];
      if (node.label !== undefined && node.label !== node.id) attributes.push(`label=${dotString(node.label)}`);
      if (node.href) attributes.push(`href=${dotString(node.href)}`);
      lines.push(`    ${dotString(node.id)} [${attributes.join(', ')}];`);
    }
    for (const edge of edges) {
      lines.push(`    ${dotString(edge.from)} -> ${dotString(edge.to)};`);
    }
    lines.push('}');
    return lines.join('\n') + '\n';
  }
}
