import * as AST from "../ast";
import type { ClassMember, ClassModifiers, Expression, Identifier, Name, PropertyHook, Statement, TraitAdaptation } from "../ast";
import { childOfKind, childrenOfKind, isErrorNode, isIgnorableNode, namedChildren } from "./concrete";
import { isKnownKind, isMemberKind, isTypeKind } from "./grammar-kinds";
import { mapMethodDeclaration, mapPropertyHooks } from "./functions";
import { effectiveReadonly, effectiveSetVisibility, effectiveVisibility, readModifiers, type Modifiers } from "./modifiers";
import { reanchorType } from "./types";
import {
  DIALECT_REJECTED,
  docCommentBefore,
  gateConstruct,
  identifierOf,
  malformed,
  MapperError,
  nameOf,
  placeholderExpression,
  placeholderMember,
  placeholderStatement,
  recover,
  requireField,
  spanOf,
  syntaxError,
  textOf,
  unexpectedKind,
  unknownKind,
  variableNameText,
  withEnclosing,
  type ConcreteNode,
  type EnclosingKind,
  type MapperContext,
  type MutableMapperContext,
} from "./shared";

export function registerClassMappers(ctx: MutableMapperContext): void {
  ctx.mapMembers = (node) => mapMembers(ctx, node);
}

const NAME_KINDS: ReadonlySet<string> = new Set(["name", "qualified_name", "relative_name", "named_type"]);

function namesIn(ctx: MapperContext, clause: ConcreteNode | null): Name[] {
  return namedChildren(clause)
    .filter((child) => NAME_KINDS.has(child.kind))
    .map((child) => nameOf(ctx, child));
}

function baseClauseOf(node: ConcreteNode): ConcreteNode | null {
  return node.field("base_clause") ?? childOfKind(node, "base_clause");
}

function interfaceClauseOf(node: ConcreteNode): ConcreteNode | null {
  return node.field("interfaces") ?? childOfKind(node, "class_interface_clause");
}

function bodyOf(node: ConcreteNode): ConcreteNode | null {
  return node.field("body") ?? childOfKind(node, "declaration_list") ?? childOfKind(node, "enum_declaration_list");
}

function classModifiers(ctx: MapperContext, modifiers: Modifiers): ClassModifiers {
  return {
    abstract: modifiers.abstractNode !== null,
    final: modifiers.finalNode !== null,
    readonly: modifiers.readonlyNode !== null && gateConstruct(ctx, "readonly_classes", modifiers.readonlyNode),
  };
}

function mapClassBody(ctx: MapperContext, node: ConcreteNode, kind: EnclosingKind, readonly: boolean): ClassMember[] {
  const members = withEnclosing(ctx, kind, () => ctx.mapMembers(bodyOf(node)));
  return readonly ? members.map(makeReadonly) : members;
}

/** Members of a readonly class: every property, promoted ones included, is readonly. */
function makeReadonly(member: ClassMember): ClassMember {
  if (member.type === "PropertyDeclaration") {
    return { ...member, readonly: true };
  }
  if (member.type === "MethodDeclaration" && member.parameters.some((parameter) => parameter.promoted)) {
    return {
      ...member,
      parameters: member.parameters.map((parameter) => (parameter.promoted ? { ...parameter, readonly: true } : parameter)),
    };
  }
  return member;
}

export function mapClassDeclaration(ctx: MapperContext, node: ConcreteNode): Statement {
  const attributes = ctx.mapAttributes(node);
  const modifiers = classModifiers(ctx, readModifiers(ctx, node));
  const name = identifierOf(ctx, requireField(node, "name"));
  const [extendsName] = namesIn(ctx, baseClauseOf(node));
  const implementsNames = namesIn(ctx, interfaceClauseOf(node));
  const members = mapClassBody(ctx, node, "class", modifiers.readonly);
  return AST.classDeclaration(spanOf(ctx, node), {
    attributes,
    docComment: docCommentBefore(ctx, node),
    modifiers,
    name,
    extends: extendsName ?? null,
    implements: implementsNames,
    members,
  });
}

export function mapInterfaceDeclaration(ctx: MapperContext, node: ConcreteNode): Statement {
  const attributes = ctx.mapAttributes(node);
  const name = identifierOf(ctx, requireField(node, "name"));
  const extendsNames = namesIn(ctx, baseClauseOf(node));
  const members = mapClassBody(ctx, node, "interface", false);
  return AST.interfaceDeclaration(spanOf(ctx, node), {
    attributes,
    docComment: docCommentBefore(ctx, node),
    name,
    extends: extendsNames,
    members,
  });
}

export function mapTraitDeclaration(ctx: MapperContext, node: ConcreteNode): Statement {
  const attributes = ctx.mapAttributes(node);
  const name = identifierOf(ctx, requireField(node, "name"));
  const members = mapClassBody(ctx, node, "trait", false);
  return AST.traitDeclaration(spanOf(ctx, node), {
    attributes,
    docComment: docCommentBefore(ctx, node),
    name,
    members,
  });
}

export function mapEnumDeclaration(ctx: MapperContext, node: ConcreteNode): Statement {
  if (!gateConstruct(ctx, "enums", node)) {
    return placeholderStatement(ctx, node, DIALECT_REJECTED);
  }
  const attributes = ctx.mapAttributes(node);
  const nameNode = requireField(node, "name");
  const name = identifierOf(ctx, nameNode);
  const backingNode =
    node.field("type") ??
    namedChildren(node).find((child) => child.startIndex > nameNode.startIndex && (child.kind === "return_type" || isTypeKind(child.kind)));
  const implementsNames = namesIn(ctx, interfaceClauseOf(node));
  const members = mapClassBody(ctx, node, "enum", false);
  return AST.enumDeclaration(spanOf(ctx, node), {
    attributes,
    docComment: docCommentBefore(ctx, node),
    name,
    backingType: ctx.mapType(backingNode),
    implements: implementsNames,
    members,
  });
}

export function mapAnonymousClass(ctx: MapperContext, node: ConcreteNode, outer: ConcreteNode): Expression {
  if (!gateConstruct(ctx, "anonymous_classes", outer)) {
    return placeholderExpression(ctx, outer, DIALECT_REJECTED);
  }
  const attributes = ctx.mapAttributes(node);
  const modifiers = classModifiers(ctx, readModifiers(ctx, node));
  const args = ctx.mapArguments(childOfKind(node, "arguments")).arguments;
  const [extendsName] = namesIn(ctx, baseClauseOf(node));
  const implementsNames = namesIn(ctx, interfaceClauseOf(node));
  const members = mapClassBody(ctx, node, "anonymous_class", modifiers.readonly);
  return AST.anonymousClass(spanOf(ctx, outer), {
    attributes,
    modifiers,
    arguments: args,
    extends: extendsName ?? null,
    implements: implementsNames,
    members,
  });
}

// -----------------------------------------------------------------------------
// Members
// -----------------------------------------------------------------------------

export function mapMembers(ctx: MapperContext, list: ConcreteNode | null | undefined): ClassMember[] {
  if (!list) return [];
  const members: ClassMember[] = [];
  for (const child of list.children()) {
    if (isIgnorableNode(child) || (!child.isNamed && !isErrorNode(child))) continue;
    members.push(...mapMember(ctx, child));
  }
  return members;
}

/** Member boundary: a malformed member becomes an UnknownMember. */
function mapMember(ctx: MapperContext, node: ConcreteNode): ClassMember[] {
  return recover(
    () => dispatchMember(ctx, node),
    (error) => [placeholderMember(ctx, node, malformed(error))],
  );
}

function dispatchMember(ctx: MapperContext, node: ConcreteNode): ClassMember[] {
  if (isErrorNode(node)) {
    return [placeholderMember(ctx, node, syntaxError(node))];
  }
  const kind = node.kind;
  if (!isMemberKind(kind)) {
    return [placeholderMember(ctx, node, isKnownKind(kind) ? unexpectedKind(node, "class member") : unknownKind(node))];
  }
  switch (kind) {
    case "property_declaration":
      return mapPropertyDeclaration(ctx, node);
    case "method_declaration":
      return mapMethodDeclaration(ctx, node);
    case "const_declaration":
      return mapClassConstants(ctx, node);
    case "use_declaration":
      return [mapTraitUse(ctx, node)];
    case "enum_case":
      return [mapEnumCase(ctx, node)];
  }
}

/**
 * Span of the index-th declaration of a comma list: the first one reaches back
 * to the start of the statement and the last one forward to its end.
 */
function elementSpan(ctx: MapperContext, declaration: ConcreteNode, elements: readonly ConcreteNode[], index: number) {
  const element = elements[index];
  const start = index === 0 ? declaration.startIndex : element.startIndex;
  const end = index === elements.length - 1 ? declaration.endIndex : element.endIndex;
  return ctx.spans.span(start, end);
}

const noHooks: readonly PropertyHook[] = [];

function mapPropertyDeclaration(ctx: MapperContext, node: ConcreteNode): ClassMember[] {
  const attributes = ctx.mapAttributes(node);
  const docComment = docCommentBefore(ctx, node);
  const modifiers = readModifiers(ctx, node);
  const visibility = effectiveVisibility(ctx, modifiers);
  const setVisibility = effectiveSetVisibility(ctx, modifiers);
  const readonly = effectiveReadonly(ctx, modifiers);
  const typeNode = node.field("type");
  const typeHint = typeNode && gateConstruct(ctx, "typed_properties", typeNode) ? ctx.mapType(typeNode) : null;
  const elements = childrenOfKind(node, "property_element");
  if (elements.length === 0) {
    throw new MapperError("mapper: property declaration without a property", node);
  }
  // the hook list closes the declaration, so it belongs to the last element
  const hooks = mapPropertyHooks(ctx, childOfKind(node, "property_hook_list"));
  return elements.map((element, index) => {
    const nameNode = element.field("name") ?? childOfKind(element, "variable_name");
    if (!nameNode) throw new MapperError("mapper: property without a name", element);
    const initializer = childOfKind(element, "property_initializer");
    const defaultNode = element.field("default_value") ?? (initializer ? namedChildren(initializer)[0] : null);
    const anchor = ctx.spans.zeroWidth(element.startIndex);
    return AST.propertyDeclaration(elementSpan(ctx, node, elements, index), {
      attributes: index === 0 ? attributes : [],
      docComment,
      visibility,
      setVisibility,
      isStatic: modifiers.staticNode !== null,
      readonly,
      promoted: false,
      typeHint: typeHint && index > 0 ? reanchorType(typeHint, anchor) : typeHint,
      name: AST.identifier(spanOf(ctx, nameNode), variableNameText(ctx, nameNode)),
      defaultValue: defaultNode ? ctx.mapExpression(defaultNode) : null,
      hooks: index === elements.length - 1 ? hooks : noHooks,
    });
  });
}

type ConstElement = { element: ConcreteNode; name: AST.Identifier; value: Expression };

export function constElements(ctx: MapperContext, node: ConcreteNode): { elements: ConcreteNode[]; entries: ConstElement[] } {
  const elements = childrenOfKind(node, "const_element");
  if (elements.length === 0) {
    throw new MapperError("mapper: const declaration without a constant", node);
  }
  const entries = elements.map((element) => {
    const nameNode = element.field("name") ?? namedChildren(element)[0];
    const valueNode = element.field("value") ?? namedChildren(element).slice(1).pop();
    if (!nameNode || !valueNode) {
      throw new MapperError("mapper: const element needs a name and a value", element);
    }
    return { element, name: AST.identifier(spanOf(ctx, nameNode), textOf(ctx, nameNode).trim()), value: ctx.mapExpression(valueNode) };
  });
  return { elements, entries };
}

function mapClassConstants(ctx: MapperContext, node: ConcreteNode): ClassMember[] {
  const attributes = ctx.mapAttributes(node);
  const docComment = docCommentBefore(ctx, node);
  const modifiers = readModifiers(ctx, node);
  const visibility =
    modifiers.visibilityNode && !gateConstruct(ctx, "class_constant_visibility", modifiers.visibilityNode)
      ? "public"
      : effectiveVisibility(ctx, modifiers);
  const isFinal = modifiers.finalNode !== null && gateConstruct(ctx, "final_class_constants", modifiers.finalNode);
  const typeNode = node.field("type");
  const typeHint = typeNode && gateConstruct(ctx, "typed_class_constants", typeNode) ? ctx.mapType(typeNode) : null;
  const { elements, entries } = constElements(ctx, node);
  return entries.map((entry, index) =>
    AST.classConstantDeclaration(elementSpan(ctx, node, elements, index), {
      attributes: index === 0 ? attributes : [],
      docComment,
      visibility,
      isFinal,
      typeHint: typeHint && index > 0 ? reanchorType(typeHint, ctx.spans.zeroWidth(entry.element.startIndex)) : typeHint,
      name: entry.name,
      value: entry.value,
    }),
  );
}

export function mapTopLevelConstants(ctx: MapperContext, node: ConcreteNode): Statement[] {
  const { elements, entries } = constElements(ctx, node);
  return entries.map((entry, index) => AST.constDeclaration(elementSpan(ctx, node, elements, index), entry.name, entry.value));
}

function mapTraitUse(ctx: MapperContext, node: ConcreteNode): ClassMember {
  const traits = namesIn(ctx, node);
  if (traits.length === 0) {
    throw new MapperError("mapper: trait use without a trait", node);
  }
  return AST.traitUse(spanOf(ctx, node), traits, mapTraitAdaptations(ctx, childOfKind(node, "use_list")));
}

function mapTraitAdaptations(ctx: MapperContext, list: ConcreteNode | null): TraitAdaptation[] {
  return namedChildren(list)
    .filter((clause) => !isErrorNode(clause))
    .map((clause) => {
      switch (clause.kind) {
        case "use_instead_of_clause":
          return mapTraitPrecedence(ctx, clause);
        case "use_as_clause":
          return mapTraitAlias(ctx, clause);
        default:
          throw new MapperError(`mapper: unexpected ${clause.kind} in trait adaptations`, clause);
      }
    });
}

/** `hello` or `A::hello`. */
function methodReference(ctx: MapperContext, node: ConcreteNode): { trait: Name | null; method: Identifier } {
  if (node.kind === "class_constant_access_expression") {
    const [scope, member] = namedChildren(node);
    if (!scope || !member) throw new MapperError("mapper: trait method reference needs a trait and a method", node);
    return { trait: nameOf(ctx, scope), method: identifierOf(ctx, member) };
  }
  if (node.kind !== "name") throw new MapperError(`mapper: unexpected ${node.kind} as a trait method`, node);
  return { trait: null, method: identifierOf(ctx, node) };
}

function mapTraitPrecedence(ctx: MapperContext, clause: ConcreteNode): TraitAdaptation {
  const [referenceNode, ...excluded] = namedChildren(clause);
  if (!referenceNode || excluded.length === 0) {
    throw new MapperError("mapper: insteadof needs a method and at least one trait", clause);
  }
  const { trait, method } = methodReference(ctx, referenceNode);
  if (!trait) throw new MapperError("mapper: insteadof needs a Trait::method reference", referenceNode);
  return AST.traitPrecedence(spanOf(ctx, clause), trait, method, excluded.map((child) => nameOf(ctx, child)));
}

function mapTraitAlias(ctx: MapperContext, clause: ConcreteNode): TraitAdaptation {
  const named = namedChildren(clause);
  const referenceNode = named[0];
  if (!referenceNode) throw new MapperError("mapper: trait alias without a method", clause);
  const { trait, method } = methodReference(ctx, referenceNode);
  const aliasNode = named.slice(1).find((child) => child.kind === "name") ?? null;
  const { visibility } = readModifiers(ctx, clause);
  if (!aliasNode && !visibility) {
    throw new MapperError("mapper: trait alias needs a new name or a visibility", clause);
  }
  return AST.traitAlias(spanOf(ctx, clause), {
    trait,
    method,
    visibility,
    alias: aliasNode ? identifierOf(ctx, aliasNode) : null,
  });
}

function mapEnumCase(ctx: MapperContext, node: ConcreteNode): ClassMember {
  const attributes = ctx.mapAttributes(node);
  const name = identifierOf(ctx, requireField(node, "name"));
  const valueNode = node.field("value");
  return AST.enumCase(spanOf(ctx, node), attributes, name, valueNode ? ctx.mapExpression(valueNode) : null);
}
