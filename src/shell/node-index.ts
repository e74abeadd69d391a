import type { NodeId } from "../core/node-id.ts";
import type * as AST from "./ast.ts";
import { walk } from "./walk.ts";

/**
 * Maps node ids to nodes (and their parents) within one tree.
 * The rewriter builds one over its clone to find transformation targets.
 */
export class NodeIndex {
  private nodes: Map<NodeId, AST.Node> = new Map();
  private parents: Map<NodeId, AST.Node> = new Map();

  constructor(root?: AST.Node) {
    if (root) this.rebuild(root);
  }

  /**
   * Re-index after structural edits.
   */
  rebuild(root: AST.Node): void {
    this.nodes.clear();
    this.parents.clear();
    walk(root, (node, parent) => {
      this.nodes.set(node.id, node);
      if (parent) this.parents.set(node.id, parent);
    });
  }

  get(id: NodeId): AST.Node | undefined {
    return this.nodes.get(id);
  }

  parentOf(id: NodeId): AST.Node | undefined {
    return this.parents.get(id);
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  /**
   * Forget a node and everything under it, e.g. after it was replaced.
   */
  remove(node: AST.Node): void {
    walk(node, (n) => {
      this.nodes.delete(n.id);
      this.parents.delete(n.id);
    });
  }

  get size(): number {
    return this.nodes.size;
  }

  entries(): IterableIterator<[NodeId, AST.Node]> {
    return this.nodes.entries();
  }
}
