/**
 * Branded type for syntax node identifiers.
 * Ids are unique within one tree and survive cloning, so a transformation
 * planned against the input tree can find its target in the rewriter's copy.
 */
export type NodeId = number & { readonly __brand: "NodeId" };

/**
 * Create a NodeId from a number.
 * @internal - prefer using IdGenerator.next()
 */
export function createNodeId(n: number): NodeId {
  return n as NodeId;
}

/**
 * Generates unique sequential node IDs for a parse session.
 */
export class IdGenerator {
  private nextId: number;

  constructor(start = 0) {
    this.nextId = start;
  }

  /**
   * Generate the next unique NodeId.
   */
  next(): NodeId {
    return createNodeId(this.nextId++);
  }

  /**
   * Number of ids handed out so far (also the next id's value).
   */
  get count(): number {
    return this.nextId;
  }
}
