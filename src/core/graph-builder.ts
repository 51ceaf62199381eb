import { Diagram, type DialectDefinition } from './diagram.js';
import { builderFinalized, invalidValue, unknownNodeReference } from './errors.js';
import { IdAllocator, NodeId } from './ids.js';
import type {
  Dialect,
  EdgeAttributes,
  EdgeBuilder,
  EdgeDescriptor,
  NodeAttributes,
  NodeBuilder,
  NodeDescriptor,
} from './types.js';

/**
 * Accumulates validated nodes and edges for one diagram.
 *
 * Appending is the only mutation and insertion order is render order. A failed
 * append leaves the builder as it was; in particular no id is consumed.
 */
export class GraphBuilder<K extends Dialect, A extends NodeAttributes, E extends EdgeAttributes, C> {
  private readonly allocator = new IdAllocator();
  private readonly issued = new Set<NodeId>();
  private readonly nested = new Set<NodeId>();
  private readonly nodes: NodeDescriptor<A>[] = [];
  private readonly edges: EdgeDescriptor<E>[] = [];
  private sealed: Diagram<K, A, E, C> | null = null;

  constructor(
    private readonly definition: DialectDefinition<K, A, E, C>,
    readonly configuration: Readonly<C>,
  ) {}

  get dialect(): K {
    return this.definition.dialect;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  get finalized(): boolean {
    return this.sealed !== null;
  }

  hasNode(id: NodeId): boolean {
    return this.issued.has(id);
  }

  addNode(builder: NodeBuilder<A>): NodeId {
    this.assertOpen();
    const attributes = builder.build();
    const children = this.checkChildren(attributes);
    const id = this.allocator.next();
    this.nodes.push(Object.freeze({ ...attributes, id }));
    this.issued.add(id);
    for (const child of children) this.nested.add(child);
    return id;
  }

  addEdge(builder: EdgeBuilder<E>): void {
    this.assertOpen();
    const edge = builder.build();
    if (!this.issued.has(edge.source)) throw unknownNodeReference(String(edge.source), 'source');
    if (!this.issued.has(edge.destination)) throw unknownNodeReference(String(edge.destination), 'destination');
    this.edges.push(Object.freeze({ ...edge }));
  }

  /** Seal the builder. Calling it again returns the same diagram. */
  finalize(): Diagram<K, A, E, C> {
    if (this.sealed === null) {
      this.sealed = new Diagram(this.definition, this.nodes, this.edges, this.configuration);
    }
    return this.sealed;
  }

  private checkChildren(attributes: A): readonly NodeId[] {
    const children = this.definition.children?.(attributes) ?? [];
    const seen = new Set<NodeId>();
    for (const child of children) {
      if (!this.issued.has(child)) throw unknownNodeReference(String(child), 'subnode');
      if (this.nested.has(child) || seen.has(child)) {
        throw invalidValue('subnodes', `Node '${child}' already has a parent node.`, 'A node can be nested in one place only.');
      }
      seen.add(child);
    }
    return children;
  }

  private assertOpen(): void {
    if (this.sealed !== null) throw builderFinalized();
  }
}
