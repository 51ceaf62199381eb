import type { NodeId } from './ids.js';

export type Dialect = 'flowchart' | 'class' | 'er';

/** Attributes every node carries, whatever the dialect */
export interface NodeAttributes {
  label: string;
}

export interface EdgeAttributes {
  source: NodeId;
  destination: NodeId;
  label?: string;
}

/** Validated node record as stored in a diagram */
export type NodeDescriptor<A extends NodeAttributes> = Readonly<A & { id: NodeId }>;

export type EdgeDescriptor<E extends EdgeAttributes> = Readonly<E>;

/**
 * Staging object for one node. `build()` validates the collected fields and
 * throws a BuildError when a required one is missing.
 */
export interface NodeBuilder<A extends NodeAttributes> {
  build(): A;
}

export interface EdgeBuilder<E extends EdgeAttributes> {
  build(): E;
}
