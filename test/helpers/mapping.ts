import type { Node, NodeOfType, NodeType } from "../../src/ast";
import { mapConcreteTree, type MappingResult } from "../../src/parser/mapper";
import { build, type Blueprint } from "./concrete-builder";

export type MappedSource = MappingResult & { source: string };

export function mapBlueprint(blueprint: Blueprint, dialect?: string): MappedSource {
  const { root, source } = build(blueprint);
  return { ...mapConcreteTree(root, source, dialect === undefined ? {} : { dialect }), source };
}

function hasType<K extends NodeType>(node: Node, type: K): node is NodeOfType<K> {
  return node.type === type;
}

/** Narrows a node to the expected type, failing the test otherwise. */
export function expectNode<K extends NodeType>(node: Node | null | undefined, type: K): NodeOfType<K> {
  if (!node || !hasType(node, type)) {
    throw new Error(`expected ${type}, got ${node ? node.type : String(node)}`);
  }
  return node;
}

/** Diagnostics as [severity, code, message] triples. */
export function summarize(result: MappingResult): [string, string, string][] {
  return result.diagnostics.map((diagnostic) => [diagnostic.severity, diagnostic.code, diagnostic.message]);
}
