import { NODE_CATEGORIES, type Node } from "./ast";
import { compareSpans } from "./span";

export type ChildEntry = {
  readonly key: string;
  readonly index: number | null;
  readonly node: Node;
};

export function isAstNode(value: unknown): value is Node {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !("span" in value)) return false;
  const type = value.type;
  return typeof type === "string" && Object.prototype.hasOwnProperty.call(NODE_CATEGORIES, type);
}

/** Direct children of a node in source order, with the field they live in. */
export function childEntries(node: Node): ChildEntry[] {
  const entries: ChildEntry[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key === "type" || key === "span") continue;
    if (isAstNode(value)) {
      entries.push({ key, index: null, node: value });
      continue;
    }
    if (Array.isArray(value)) {
      value.forEach((item: unknown, index) => {
        if (isAstNode(item)) {
          entries.push({ key, index, node: item });
        }
      });
    }
  }
  return entries.sort((a, b) => compareSpans(a.node.span, b.node.span));
}

export function childNodes(node: Node): Node[] {
  return childEntries(node).map((entry) => entry.node);
}

export class NodePath {
  readonly node: Node;
  readonly parent: NodePath | null;
  readonly key: string | null;
  readonly index: number | null;
  readonly depth: number;

  constructor(node: Node, parent: NodePath | null = null, key: string | null = null, index: number | null = null) {
    this.node = node;
    this.parent = parent;
    this.key = key;
    this.index = index;
    this.depth = parent ? parent.depth + 1 : 0;
  }

  *ancestors(): Generator<NodePath> {
    let current = this.parent;
    while (current) {
      yield current;
      current = current.parent;
    }
  }

  children(): NodePath[] {
    return childEntries(this.node).map((entry) => new NodePath(entry.node, this, entry.key, entry.index));
  }
}

/**
 * Depth-first pre-order walk. The result is lazy and restartable: every
 * iteration starts a fresh walk from the root.
 */
export function traverse(root: Node): Iterable<NodePath> {
  return {
    [Symbol.iterator]: () => walk(new NodePath(root)),
  };
}

function* walk(path: NodePath): Generator<NodePath> {
  yield path;
  for (const child of path.children()) {
    yield* walk(child);
  }
}

export function findAll<T extends Node>(root: Node, predicate: (node: Node) => node is T): T[];
export function findAll(root: Node, predicate: (node: Node) => boolean): Node[];
export function findAll(root: Node, predicate: (node: Node) => boolean): Node[] {
  const matches: Node[] = [];
  for (const path of traverse(root)) {
    if (predicate(path.node)) matches.push(path.node);
  }
  return matches;
}

export function findFirst<T extends Node>(root: Node, predicate: (node: Node) => node is T): T | null;
export function findFirst(root: Node, predicate: (node: Node) => boolean): Node | null;
export function findFirst(root: Node, predicate: (node: Node) => boolean): Node | null {
  for (const path of traverse(root)) {
    if (predicate(path.node)) return path.node;
  }
  return null;
}

export function nodesOfType<K extends Node["type"]>(root: Node, type: K): Extract<Node, { type: K }>[] {
  return findAll(root, (node): node is Extract<Node, { type: K }> => node.type === type);
}

/** Deepest node whose span covers `offset`, with its ancestry. */
export function nodeAt(root: Node, offset: number): NodePath | null {
  if (offset < root.span.start.offset || offset >= root.span.end.offset) return null;
  let current = new NodePath(root);
  while (true) {
    const next = current
      .children()
      .find((child) => child.node.span.start.offset <= offset && offset < child.node.span.end.offset);
    if (!next) return current;
    current = next;
  }
}
