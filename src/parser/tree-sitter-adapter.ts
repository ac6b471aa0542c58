import type { Node } from "web-tree-sitter";
import type { ConcreteNode } from "./concrete";

function present(node: Node | null): node is Node {
  return node !== null;
}

class TreeSitterNode implements ConcreteNode {
  private readonly node: Node;
  private cachedChildren: readonly ConcreteNode[] | null = null;

  constructor(node: Node) {
    this.node = node;
  }

  get kind(): string {
    return this.node.type;
  }

  get startIndex(): number {
    return this.node.startIndex;
  }

  get endIndex(): number {
    return this.node.endIndex;
  }

  get isNamed(): boolean {
    return this.node.isNamed;
  }

  get isError(): boolean {
    return this.node.isError;
  }

  get isMissing(): boolean {
    return this.node.isMissing;
  }

  children(): readonly ConcreteNode[] {
    if (!this.cachedChildren) {
      this.cachedChildren = this.node.children.filter(present).map(fromTreeSitter);
    }
    return this.cachedChildren;
  }

  field(name: string): ConcreteNode | null {
    const child = this.node.childForFieldName(name);
    return child ? fromTreeSitter(child) : null;
  }

  fieldAll(name: string): readonly ConcreteNode[] {
    return this.node.childrenForFieldName(name).filter(present).map(fromTreeSitter);
  }
}

/** Wraps a web-tree-sitter node. Children are wrapped on first access. */
export function fromTreeSitter(node: Node): ConcreteNode {
  return new TreeSitterNode(node);
}
