import * as AST from "../ast";
import type { BuiltinTypeName, TypeHint } from "../ast";
import type { ConstructId } from "../dialect/constructs";
import type { Span } from "../span";
import { isErrorNode, namedChildren } from "./concrete";
import { isKnownKind, isTypeKind } from "./grammar-kinds";
import {
  gateConstruct,
  malformed,
  MapperError,
  nameOf,
  placeholderType,
  recover,
  spanOf,
  syntaxError,
  textOf,
  unexpectedKind,
  unknownKind,
  type ConcreteNode,
  type MapperContext,
  type MutableMapperContext,
} from "./shared";

export function registerTypeMappers(ctx: MutableMapperContext): void {
  ctx.mapType = (node) => mapTypeHint(ctx, node);
}

const BUILTIN_TYPES: ReadonlyMap<string, BuiltinTypeName> = new Map(
  (
    ["array", "callable", "iterable", "bool", "float", "int", "string", "void", "mixed", "object", "static", "never", "null", "false", "true"] as const
  ).map((name): [string, BuiltinTypeName] => [name, name]),
);

// Builtins that only exist from some dialect on. Anything else (array, callable)
// has always been accepted.
const BUILTIN_CONSTRUCTS: ReadonlyMap<BuiltinTypeName, ConstructId> = new Map<BuiltinTypeName, ConstructId>([
  ["bool", "scalar_types"],
  ["float", "scalar_types"],
  ["int", "scalar_types"],
  ["string", "scalar_types"],
  ["void", "void_type"],
  ["iterable", "iterable_type"],
  ["object", "object_type"],
  ["mixed", "mixed_type"],
  ["static", "static_return_type"],
  ["never", "never_type"],
]);

const LITERAL_TYPES: ReadonlySet<BuiltinTypeName> = new Set<BuiltinTypeName>(["null", "false", "true"]);

/**
 * Maps a type position. Returns null when there is no type or when a gated
 * part of it is unavailable in the dialect; in that case the whole hint is
 * dropped and a dialect-mismatch warning has been recorded.
 */
export function mapTypeHint(ctx: MapperContext, node: ConcreteNode | null | undefined): TypeHint | null {
  if (!node) return null;
  if (node.kind === "return_type" || node.kind === "type") {
    const inner = namedChildren(node)[0];
    if (!inner) return null;
    return mapTypeHint(ctx, inner);
  }
  return recover(
    () => mapTypeNode(ctx, node, true),
    (error) => placeholderType(ctx, node, malformed(error)),
  );
}

function mapTypeNode(ctx: MapperContext, node: ConcreteNode, standalone: boolean): TypeHint | null {
  if (isErrorNode(node)) {
    return placeholderType(ctx, node, syntaxError(node));
  }
  if (node.kind === "name" || node.kind === "qualified_name" || node.kind === "relative_name") {
    return mapNamedType(ctx, node, node, standalone);
  }
  const kind = node.kind;
  if (!isTypeKind(kind)) {
    return placeholderType(ctx, node, isKnownKind(kind) ? unexpectedKind(node, "type") : unknownKind(node));
  }
  switch (kind) {
    case "named_type": {
      const inner = namedChildren(node)[0];
      if (!inner) throw new MapperError("mapper: named_type without a name", node);
      return mapNamedType(ctx, node, inner, standalone);
    }
    case "primitive_type":
    case "bottom_type": {
      const builtin = BUILTIN_TYPES.get(textOf(ctx, node).trim().toLowerCase());
      if (!builtin) throw new MapperError(`mapper: unrecognized builtin type '${textOf(ctx, node)}'`, node);
      return mapBuiltin(ctx, node, builtin, standalone);
    }
    case "optional_type": {
      const innerNode = namedChildren(node)[0];
      if (!innerNode) throw new MapperError("mapper: optional_type without an inner type", node);
      const inner = mapTypeNode(ctx, innerNode, false);
      if (!inner || !gateConstruct(ctx, "nullable_types", node)) return null;
      return AST.nullableType(spanOf(ctx, node), inner);
    }
    case "union_type":
    case "disjunctive_normal_form_type": {
      const members = mapMembers(ctx, node);
      if (!members) return null;
      if (!gateConstruct(ctx, kind === "union_type" ? "union_types" : "dnf_types", node)) return null;
      return AST.unionType(spanOf(ctx, node), members);
    }
    case "intersection_type": {
      const members = mapMembers(ctx, node);
      if (!members || !gateConstruct(ctx, "intersection_types", node)) return null;
      return AST.intersectionType(spanOf(ctx, node), members);
    }
  }
}

function mapMembers(ctx: MapperContext, node: ConcreteNode): TypeHint[] | null {
  const children = namedChildren(node);
  if (children.length < 2) {
    throw new MapperError(`mapper: ${node.kind} needs at least two members`, node);
  }
  const members: TypeHint[] = [];
  let dropped = false;
  for (const child of children) {
    const member = mapTypeNode(ctx, child, false);
    if (member) {
      members.push(member);
    } else {
      dropped = true;
    }
  }
  return dropped ? null : members;
}

function mapNamedType(ctx: MapperContext, node: ConcreteNode, nameNode: ConcreteNode, standalone: boolean): TypeHint | null {
  const builtin = BUILTIN_TYPES.get(textOf(ctx, nameNode).trim().toLowerCase());
  if (builtin) {
    return mapBuiltin(ctx, node, builtin, standalone);
  }
  return AST.namedType(spanOf(ctx, node), nameOf(ctx, nameNode));
}

function mapBuiltin(ctx: MapperContext, node: ConcreteNode, builtin: BuiltinTypeName, standalone: boolean): TypeHint | null {
  const construct = BUILTIN_CONSTRUCTS.get(builtin);
  if (construct && !gateConstruct(ctx, construct, node)) return null;
  if (LITERAL_TYPES.has(builtin) && (standalone || builtin === "true") && !gateConstruct(ctx, "standalone_literal_types", node)) {
    return null;
  }
  return AST.builtinType(spanOf(ctx, node), builtin);
}

/**
 * Copies a type hint with every span collapsed to `anchor`. Used when one
 * written type is shared by several declarations that cannot all contain it.
 * A hint with an unknown part is not copied: its diagnostic sits at the
 * written type, outside the anchor.
 */
export function reanchorType(type: TypeHint, anchor: Span): TypeHint | null {
  switch (type.type) {
    case "NamedType":
      return AST.namedType(anchor, AST.name(anchor, type.name.value, type.name.resolution));
    case "BuiltinType":
      return AST.builtinType(anchor, type.name);
    case "NullableType": {
      const inner = reanchorType(type.inner, anchor);
      return inner && AST.nullableType(anchor, inner);
    }
    case "UnionType":
    case "IntersectionType": {
      const members: TypeHint[] = [];
      for (const member of type.types) {
        const copy = reanchorType(member, anchor);
        if (!copy) return null;
        members.push(copy);
      }
      return type.type === "UnionType" ? AST.unionType(anchor, members) : AST.intersectionType(anchor, members);
    }
    case "UnknownType":
      return null;
  }
}
