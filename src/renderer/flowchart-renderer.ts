import { FlowchartConfigSchema, type FlowchartConfig } from '../core/config.js';
import { renderFrontmatter } from '../core/frontmatter.js';
import { nodeRef, type NodeId } from '../core/ids.js';
import {
  FLOWCHART_ARROW_HEADS,
  FLOWCHART_SHAPE_TOKENS,
  type FlowchartDiagram,
  type FlowchartEdge,
  type FlowchartLineStyle,
  type FlowchartNode,
} from '../diagrams/flowchart/types.js';
import type { IRenderer } from './interfaces.js';
import { clickLine, escapeLabel, indent, toDocument } from './utils.js';

const DEFAULTS = FlowchartConfigSchema.parse({});
const FRONTMATTER_KEYS = ['theme', 'look', 'renderer', 'curve'] as const;

const SEGMENTS: Record<FlowchartLineStyle, (length: number) => string> = {
  solid: (length) => '-'.repeat(2 + length),
  thick: (length) => '='.repeat(2 + length),
  dashed: (length) => `-${'.'.repeat(length)}-`,
};

export type ArrowSpec = Pick<FlowchartEdge, 'arrow' | 'leftArrow' | 'lineStyle' | 'length'>;

/** Link token: left head, segment, right head (`--->`, `<===>`, `-.-o`, ...) */
export function flowchartArrowToken(edge: ArrowSpec): string {
  const left = edge.leftArrow ? FLOWCHART_ARROW_HEADS[edge.leftArrow].left : '';
  const right = FLOWCHART_ARROW_HEADS[edge.arrow].right;
  return `${left}${SEGMENTS[edge.lineStyle](edge.length)}${right}`;
}

/**
 * Renders flowcharts using the typed node syntax (`v0@{shape: rect, label: "..."}`)
 */
export class FlowchartRenderer implements IRenderer<FlowchartDiagram> {
  render(diagram: FlowchartDiagram): string {
    const config = diagram.configuration;
    const lines: string[] = [];

    if (this.needsFrontmatter(config)) {
      lines.push(...renderFrontmatter({
        title: config.title,
        config: {
          theme: config.theme,
          look: config.look,
          flowchart: { defaultRenderer: config.renderer, curve: config.curve },
        },
      }));
    }

    lines.push(`flowchart ${config.direction}`);
    const byId = new Map<NodeId, FlowchartNode>(diagram.nodes.map((node): [NodeId, FlowchartNode] => [node.id, node]));
    const nested = new Set(diagram.nodes.flatMap((node) => node.subnodes));
    for (const node of diagram.nodes) {
      if (!nested.has(node.id)) this.renderNode(node, 1, byId, lines);
    }
    for (const edge of diagram.edges) lines.push(indent(1) + this.renderEdge(edge));

    return toDocument(lines);
  }

  // Plain diagrams stay header-free; the block only appears when it carries information.
  private needsFrontmatter(config: Readonly<FlowchartConfig>): boolean {
    return config.title !== undefined || FRONTMATTER_KEYS.some((key) => config[key] !== DEFAULTS[key]);
  }

  private renderNode(node: FlowchartNode, depth: number, byId: ReadonlyMap<NodeId, FlowchartNode>, out: string[]): void {
    const pad = indent(depth);
    if (node.subnodes.length === 0) {
      out.push(`${pad}${nodeRef(node.id)}@{shape: ${FLOWCHART_SHAPE_TOKENS[node.shape]}, label: "${escapeLabel(node.label)}"}`);
      if (node.click) out.push(pad + clickLine(node.id, node.click));
      return;
    }
    out.push(`${pad}subgraph ${nodeRef(node.id)} ["${escapeLabel(node.label)}"]`);
    if (node.direction) out.push(`${indent(depth + 1)}direction ${node.direction}`);
    for (const id of node.subnodes) {
      const child = byId.get(id);
      if (child) this.renderNode(child, depth + 1, byId, out);
    }
    out.push(`${pad}end`);
  }

  private renderEdge(edge: Readonly<FlowchartEdge>): string {
    const label = edge.label !== undefined ? `|"${escapeLabel(edge.label)}"|` : '';
    return `${nodeRef(edge.source)} ${flowchartArrowToken(edge)}${label} ${nodeRef(edge.destination)}`;
  }
}
