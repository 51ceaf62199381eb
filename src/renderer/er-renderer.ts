import { renderFrontmatter } from '../core/frontmatter.js';
import { nodeRef } from '../core/ids.js';
import { CARDINALITY_TOKENS, type ERAttribute, type ERDiagram, type EREdge, type ERNode } from '../diagrams/er/types.js';
import type { IRenderer } from './interfaces.js';
import { escapeLabel, indent, toDocument } from './utils.js';

export type ERRelationSpec = Pick<EREdge, 'left' | 'right' | 'identifying'>;

/** `}|--|{`, `||..o{` and so on */
export function erRelationToken(edge: ERRelationSpec): string {
  const line = edge.identifying ? '--' : '..';
  return `${CARDINALITY_TOKENS[edge.left].left}${line}${CARDINALITY_TOKENS[edge.right].right}`;
}

export class ERRenderer implements IRenderer<ERDiagram> {
  render(diagram: ERDiagram): string {
    const config = diagram.configuration;
    const lines = renderFrontmatter({
      title: config.title,
      config: { layout: config.renderer, theme: config.theme, look: config.look },
    });

    lines.push('erDiagram');
    lines.push(`${indent(1)}direction ${config.direction}`);
    for (const node of diagram.nodes) lines.push(...this.renderEntity(node));
    for (const edge of diagram.edges) lines.push(indent(1) + this.renderRelationship(edge));

    return toDocument(lines);
  }

  private renderEntity(node: ERNode): string[] {
    const head = `${indent(1)}${nodeRef(node.id)}["${escapeLabel(node.label)}"]`;
    if (node.attributes.length === 0) return [head];
    return [`${head} {`, ...node.attributes.map((a) => indent(2) + this.renderAttribute(a)), `${indent(1)}}`];
  }

  private renderAttribute(attribute: ERAttribute): string {
    let line = `${attribute.type} ${attribute.name}`;
    if (attribute.keys.length > 0) line += ` ${attribute.keys.join(', ')}`;
    if (attribute.comment !== undefined) line += ` "${escapeLabel(attribute.comment)}"`;
    return line;
  }

  // The label is mandatory in erDiagram syntax, so an unlabelled edge gets "".
  private renderRelationship(edge: Readonly<EREdge>): string {
    const label = escapeLabel(edge.label ?? '');
    return `${nodeRef(edge.source)} ${erRelationToken(edge)} ${nodeRef(edge.destination)} : "${label}"`;
  }
}
