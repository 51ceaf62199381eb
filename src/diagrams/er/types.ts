import type { ERDiagramConfig } from '../../core/config.js';
import type { Diagram } from '../../core/diagram.js';
import type { EdgeAttributes, NodeAttributes, NodeDescriptor } from '../../core/types.js';

export const CARDINALITIES = ['exactly-one', 'zero-or-one', 'one-or-more', 'zero-or-more'] as const;
export type Cardinality = (typeof CARDINALITIES)[number];

/** Crow's foot markers as written on each side of the relationship line */
export const CARDINALITY_TOKENS: Record<Cardinality, { left: string; right: string }> = {
  'exactly-one': { left: '||', right: '||' },
  'zero-or-one': { left: '|o', right: 'o|' },
  'one-or-more': { left: '}|', right: '|{' },
  'zero-or-more': { left: '}o', right: 'o{' },
};

export const ER_ATTRIBUTE_KEYS = ['PK', 'FK', 'UK'] as const;
export type ERAttributeKey = (typeof ER_ATTRIBUTE_KEYS)[number];

export interface ERAttributeSpec {
  type: string;
  name: string;
  keys?: ERAttributeKey[];
  comment?: string;
}

export interface ERAttribute {
  readonly type: string;
  readonly name: string;
  readonly keys: readonly ERAttributeKey[];
  readonly comment?: string;
}

export interface ERNodeAttributes extends NodeAttributes {
  attributes: readonly ERAttribute[];
}

export interface EREdge extends EdgeAttributes {
  left: Cardinality;
  right: Cardinality;
  /** Identifying relationships draw a solid line, others a dashed one */
  identifying: boolean;
}

export type ERNode = NodeDescriptor<ERNodeAttributes>;
export type ERDiagram = Diagram<'er', ERNodeAttributes, EREdge, ERDiagramConfig>;
