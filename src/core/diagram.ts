import type { IRenderer } from '../renderer/interfaces.js';
import type { NodeId } from './ids.js';
import type { Dialect, EdgeAttributes, EdgeDescriptor, NodeAttributes, NodeDescriptor } from './types.js';

/** What a graph builder needs to know about its dialect */
export interface DialectDefinition<K extends Dialect, A extends NodeAttributes, E extends EdgeAttributes, C> {
  readonly dialect: K;
  readonly renderer: IRenderer<Diagram<K, A, E, C>>;
  /**
   * Nodes a new node groups under itself. Each must already be in the builder
   * and may belong to one parent at most.
   */
  children?(attributes: Readonly<A>): readonly NodeId[];
}

/**
 * Immutable snapshot produced by finalizing a graph builder.
 * Node ids run 0..N-1 in insertion order and every edge endpoint is one of them.
 */
export class Diagram<K extends Dialect, A extends NodeAttributes, E extends EdgeAttributes, C> {
  readonly dialect: K;
  readonly nodes: ReadonlyArray<NodeDescriptor<A>>;
  readonly edges: ReadonlyArray<EdgeDescriptor<E>>;
  readonly configuration: Readonly<C>;
  private readonly renderer: IRenderer<Diagram<K, A, E, C>>;

  constructor(
    definition: DialectDefinition<K, A, E, C>,
    nodes: ReadonlyArray<NodeDescriptor<A>>,
    edges: ReadonlyArray<EdgeDescriptor<E>>,
    configuration: Readonly<C>,
  ) {
    this.dialect = definition.dialect;
    this.renderer = definition.renderer;
    this.nodes = Object.freeze([...nodes]);
    this.edges = Object.freeze([...edges]);
    this.configuration = configuration;
    Object.freeze(this);
  }

  render(): string {
    return this.renderer.render(this);
  }
}
