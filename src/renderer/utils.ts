// Shared utilities for the dialect renderers (flowchart, class, er)
import type { ClickEvent } from '../core/click.js';
import { nodeRef, type NodeId } from '../core/ids.js';

const LINE_BREAK = /\r\n|\r|\n/g;

/** Escape text for a double-quoted Mermaid string */
export function escapeLabel(text: string): string {
  return text.replace(/"/g, '#quot;').replace(LINE_BREAK, '<br>');
}

// Class members and annotations must stay on one line of the class body.
export function flattenLine(text: string): string {
  return text.replace(LINE_BREAK, ' ');
}

export function indent(depth: number): string {
  return '  '.repeat(depth);
}

export function toDocument(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

export function clickLine(id: NodeId, click: Readonly<ClickEvent>): string {
  const parts = ['click', nodeRef(id)];
  if (click.anchor) parts.push('href');
  parts.push(`"${click.url}"`);
  if (click.tooltip !== undefined) parts.push(`"${escapeLabel(click.tooltip)}"`);
  if (click.newTab) parts.push('_blank');
  return parts.join(' ');
}
