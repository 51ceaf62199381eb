/**
 * Opaque handle for a node inside one graph builder.
 *
 * Handles are compared by identity: an id created by another builder, or by
 * calling the constructor directly, never resolves in a builder that did not
 * issue it.
 */
export class NodeId {
  constructor(readonly index: number) {
    Object.freeze(this);
  }

  toString(): string {
    return nodeRef(this);
  }
}

export const NODE_PREFIX = 'v';

export function nodeRef(id: NodeId): string {
  return `${NODE_PREFIX}${id.index}`;
}

export class IdAllocator {
  private counter = 0;

  next(): NodeId {
    const id = new NodeId(this.counter);
    this.counter += 1;
    return id;
  }

  /** Number of ids handed out so far */
  get issued(): number {
    return this.counter;
  }
}
