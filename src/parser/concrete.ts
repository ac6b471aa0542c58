/**
 * Read-only view of a grammar engine's syntax node. Offsets are whatever unit
 * the engine reports; `kind` is the grammar's node type name, `ERROR` for
 * error nodes and the expected kind for missing nodes.
 */
export interface ConcreteNode {
  readonly kind: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly isNamed: boolean;
  readonly isError: boolean;
  readonly isMissing: boolean;
  children(): readonly ConcreteNode[];
  field(name: string): ConcreteNode | null;
  fieldAll(name: string): readonly ConcreteNode[];
}

export const ERROR_KIND = "ERROR";

export function isIgnorableNode(node: ConcreteNode | null | undefined): boolean {
  if (!node) return false;
  switch (node.kind) {
    case "comment":
    case "php_tag":
    case "php_end_tag":
      return true;
    default:
      return false;
  }
}

export function isErrorNode(node: ConcreteNode): boolean {
  return node.isError || node.kind === ERROR_KIND;
}

export function sliceText(node: ConcreteNode | null | undefined, source: string): string {
  if (!node) return "";
  const start = node.startIndex;
  const end = node.endIndex;
  if (start < 0 || end < start || end > source.length) {
    return "";
  }
  return source.slice(start, end);
}

export function namedChildren(node: ConcreteNode | null | undefined): ConcreteNode[] {
  if (!node) return [];
  return node.children().filter((child) => child.isNamed && !isIgnorableNode(child));
}

export function childrenOfKind(node: ConcreteNode | null | undefined, kind: string): ConcreteNode[] {
  if (!node) return [];
  return node.children().filter((child) => child.kind === kind);
}

export function childOfKind(node: ConcreteNode | null | undefined, kind: string): ConcreteNode | null {
  return childrenOfKind(node, kind)[0] ?? null;
}

/** True when an anonymous token with this text appears among the direct children. */
export function hasToken(node: ConcreteNode | null | undefined, text: string, source: string): boolean {
  if (!node) return false;
  const lowered = text.toLowerCase();
  return node
    .children()
    .some((child) => !child.isNamed && sliceText(child, source).toLowerCase() === lowered);
}

/** Pre-order walk. Returning false from `visit` skips the node's children. */
export function walkConcrete(root: ConcreteNode, visit: (node: ConcreteNode) => boolean | void): void {
  if (visit(root) === false) return;
  for (const child of root.children()) {
    walkConcrete(child, visit);
  }
}
