import * as AST from "../ast";
import type { Attribute, Visibility } from "../ast";
import { DialectTableError } from "../errors";
import { childOfKind, namedChildren } from "./concrete";
import {
  gateConstruct,
  MapperError,
  nameOf,
  spanOf,
  textOf,
  type ConcreteNode,
  type MapperContext,
  type MutableMapperContext,
} from "./shared";

export function registerModifierMappers(ctx: MutableMapperContext): void {
  ctx.mapAttributes = (owner) => mapAttributes(ctx, owner);
}

export type Modifiers = {
  visibility: Visibility | null;
  visibilityNode: ConcreteNode | null;
  /** From a `private(set)` style modifier. */
  setVisibility: Visibility | null;
  setVisibilityNode: ConcreteNode | null;
  staticNode: ConcreteNode | null;
  abstractNode: ConcreteNode | null;
  finalNode: ConcreteNode | null;
  readonlyNode: ConcreteNode | null;
  varNode: ConcreteNode | null;
};

const VISIBILITY_PATTERN = /^(public|protected|private)\s*(\(\s*set\s*\))?$/i;

export function readModifiers(ctx: MapperContext, owner: ConcreteNode): Modifiers {
  const modifiers: Modifiers = {
    visibility: null,
    visibilityNode: null,
    setVisibility: null,
    setVisibilityNode: null,
    staticNode: null,
    abstractNode: null,
    finalNode: null,
    readonlyNode: null,
    varNode: null,
  };
  for (const child of owner.children()) {
    switch (child.kind) {
      case "visibility_modifier": {
        const match = VISIBILITY_PATTERN.exec(textOf(ctx, child).trim());
        if (!match) throw new MapperError(`mapper: unrecognized visibility '${textOf(ctx, child)}'`, child);
        const visibility = toVisibility(match[1].toLowerCase());
        if (match[2]) {
          modifiers.setVisibility = visibility;
          modifiers.setVisibilityNode = child;
        } else {
          modifiers.visibility = visibility;
          modifiers.visibilityNode = child;
        }
        break;
      }
      case "static_modifier":
        modifiers.staticNode = child;
        break;
      case "abstract_modifier":
        modifiers.abstractNode = child;
        break;
      case "final_modifier":
        modifiers.finalNode = child;
        break;
      case "readonly_modifier":
        modifiers.readonlyNode = child;
        break;
      case "var_modifier":
        modifiers.varNode = child;
        break;
    }
  }
  return modifiers;
}

function toVisibility(text: string): Visibility {
  switch (text) {
    case "public":
    case "protected":
    case "private":
      return text;
    default:
      throw new MapperError(`mapper: unrecognized visibility '${text}'`);
  }
}

/** Declared visibility, with `var` and a bare `(set)` modifier resolved. */
export function effectiveVisibility(ctx: MapperContext, modifiers: Modifiers): Visibility {
  if (modifiers.visibility) return modifiers.visibility;
  if (modifiers.varNode) {
    const choice = ctx.resolver.resolveAmbiguity("var_modifier", ctx.dialect);
    if (choice !== "public") {
      throw new DialectTableError(`dialect table: '${choice}' is not a visibility for var_modifier`);
    }
    return choice;
  }
  return "public";
}

/** Write visibility, or null when it is absent or the dialect predates it. */
export function effectiveSetVisibility(ctx: MapperContext, modifiers: Modifiers): Visibility | null {
  if (!modifiers.setVisibility || !modifiers.setVisibilityNode) return null;
  return gateConstruct(ctx, "asymmetric_visibility", modifiers.setVisibilityNode) ? modifiers.setVisibility : null;
}

export function effectiveReadonly(ctx: MapperContext, modifiers: Modifiers): boolean {
  return modifiers.readonlyNode !== null && gateConstruct(ctx, "readonly_properties", modifiers.readonlyNode);
}

export function attributeListOf(owner: ConcreteNode): ConcreteNode | null {
  return owner.field("attributes") ?? childOfKind(owner, "attribute_list");
}

/** Attributes written on `owner`. Before 8.0 they are dropped with one warning per list. */
export function mapAttributes(ctx: MapperContext, owner: ConcreteNode): Attribute[] {
  const list = attributeListOf(owner);
  if (!list) return [];
  if (!gateConstruct(ctx, "attributes", list)) return [];
  const attributes: Attribute[] = [];
  for (const group of namedChildren(list)) {
    const entries = group.kind === "attribute_group" ? namedChildren(group) : [group];
    for (const entry of entries) {
      if (entry.kind !== "attribute") continue;
      const nameNode = namedChildren(entry).find((child) => child.kind === "name" || child.kind === "qualified_name" || child.kind === "relative_name");
      if (!nameNode) throw new MapperError("mapper: attribute without a name", entry);
      const argsNode = entry.field("parameters") ?? childOfKind(entry, "arguments");
      const args = argsNode ? ctx.mapArguments(argsNode).arguments : [];
      attributes.push(AST.attribute(spanOf(ctx, entry), nameOf(ctx, nameNode), args));
    }
  }
  return attributes;
}
