import { renderFrontmatter } from '../core/frontmatter.js';
import { nodeRef } from '../core/ids.js';
import {
  CLASS_ARROW_HEADS,
  CLASS_LINE_SEGMENTS,
  MULTIPLICITY_TOKENS,
  type ClassDiagram,
  type ClassEdge,
  type ClassNode,
} from '../diagrams/class/types.js';
import type { IRenderer } from './interfaces.js';
import { clickLine, escapeLabel, flattenLine, indent, toDocument } from './utils.js';

export type ClassArrowSpec = Pick<ClassEdge, 'arrow' | 'leftArrow' | 'lineStyle'>;

/** Relation token: `-->`, `--|>`, `<|--|>`, `..*` and so on */
export function classArrowToken(edge: ClassArrowSpec): string {
  const left = edge.leftArrow ? CLASS_ARROW_HEADS[edge.leftArrow].left : '';
  return `${left}${CLASS_LINE_SEGMENTS[edge.lineStyle]}${CLASS_ARROW_HEADS[edge.arrow].right}`;
}

export class ClassRenderer implements IRenderer<ClassDiagram> {
  render(diagram: ClassDiagram): string {
    const config = diagram.configuration;
    const lines = renderFrontmatter({
      title: config.title,
      config: {
        layout: config.renderer,
        theme: config.theme,
        look: config.look,
        class: { hideEmptyMembersBox: config.hideEmptyMembersBox },
      },
    });

    lines.push('classDiagram');
    lines.push(`${indent(1)}direction ${config.direction}`);
    for (const node of diagram.nodes) lines.push(...this.renderClass(node));
    for (const edge of diagram.edges) lines.push(indent(1) + this.renderRelation(edge));

    return toDocument(lines);
  }

  private renderClass(node: ClassNode): string[] {
    const head = `${indent(1)}class ${nodeRef(node.id)}["${escapeLabel(node.label)}"]`;
    const body: string[] = [];
    if (node.annotation !== undefined) body.push(`<<${flattenLine(node.annotation)}>>`);
    for (const member of node.members) body.push(flattenLine(member));
    const lines = body.length === 0
      ? [`${head} { }`]
      : [`${head} {`, ...body.map((line) => indent(2) + line), `${indent(1)}}`];
    if (node.click) lines.push(indent(1) + clickLine(node.id, node.click));
    return lines;
  }

  private renderRelation(edge: Readonly<ClassEdge>): string {
    const parts = [nodeRef(edge.source)];
    if (edge.leftMultiplicity) parts.push(`"${MULTIPLICITY_TOKENS[edge.leftMultiplicity]}"`);
    parts.push(classArrowToken(edge));
    if (edge.rightMultiplicity) parts.push(`"${MULTIPLICITY_TOKENS[edge.rightMultiplicity]}"`);
    parts.push(nodeRef(edge.destination));
    const label = edge.label !== undefined ? ` : ${escapeLabel(edge.label)}` : '';
    return parts.join(' ') + label;
  }
}
