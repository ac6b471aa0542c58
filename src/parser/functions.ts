import * as AST from "../ast";
import type { ClassMember, ClosureUse, Expression, Parameter, PropertyDeclaration, PropertyHook, TypeHint } from "../ast";
import { childOfKind, hasToken, isErrorNode, namedChildren } from "./concrete";
import { effectiveReadonly, effectiveSetVisibility, effectiveVisibility, readModifiers } from "./modifiers";
import { reanchorType } from "./types";
import {
  currentEnclosing,
  DIALECT_REJECTED,
  docCommentBefore,
  gateConstruct,
  identifierOf,
  MapperError,
  placeholderExpression,
  requireField,
  spanOf,
  variableNameText,
  withEnclosing,
  type ConcreteNode,
  type MapperContext,
  type MutableMapperContext,
  type ParameterList,
} from "./shared";

export function registerFunctionMappers(ctx: MutableMapperContext): void {
  ctx.mapParameters = (node) => mapParameters(ctx, node);
}

export function mapParameters(ctx: MapperContext, node: ConcreteNode | null | undefined): ParameterList {
  const result: ParameterList = { parameters: [], promoted: [] };
  for (const child of namedChildren(node)) {
    switch (child.kind) {
      case "simple_parameter":
      case "variadic_parameter":
        result.parameters.push(mapPlainParameter(ctx, child));
        break;
      case "property_promotion_parameter": {
        const { parameter, property } = mapPromotionParameter(ctx, child);
        result.parameters.push(parameter);
        if (property) result.promoted.push(property);
        break;
      }
      default:
        throw new MapperError(`mapper: unexpected ${child.kind} in a parameter list`, child);
    }
  }
  return result;
}

function isByRef(ctx: MapperContext, node: ConcreteNode): boolean {
  return node.field("reference_modifier") !== null || childOfKind(node, "reference_modifier") !== null || hasToken(node, "&", ctx.source);
}

type ParameterParts = {
  typeHint: TypeHint | null;
  byRef: boolean;
  name: AST.Identifier;
  defaultValue: Expression | null;
};

function parameterParts(ctx: MapperContext, node: ConcreteNode): ParameterParts {
  let nameNode = requireField(node, "name");
  let byRef = isByRef(ctx, node);
  if (nameNode.kind === "by_ref") {
    byRef = true;
    nameNode = namedChildren(nameNode)[0] ?? nameNode;
  }
  const defaultNode = node.field("default_value");
  return {
    typeHint: ctx.mapType(node.field("type")),
    byRef,
    name: AST.identifier(spanOf(ctx, nameNode), variableNameText(ctx, nameNode)),
    defaultValue: defaultNode ? ctx.mapExpression(defaultNode) : null,
  };
}

function mapPlainParameter(ctx: MapperContext, node: ConcreteNode): Parameter {
  const attributes = ctx.mapAttributes(node);
  const parts = parameterParts(ctx, node);
  return AST.parameter(spanOf(ctx, node), {
    attributes,
    visibility: null,
    readonly: false,
    promoted: false,
    typeHint: parts.typeHint,
    byRef: parts.byRef,
    variadic: node.kind === "variadic_parameter",
    name: parts.name,
    defaultValue: parts.defaultValue,
    hooks: [],
  });
}

/**
 * A constructor parameter with a visibility (or readonly) modifier declares a
 * property too. The synthesized property sits at a zero-width span on the
 * first modifier and shares the parameter's readonly decision.
 */
function mapPromotionParameter(ctx: MapperContext, node: ConcreteNode): { parameter: Parameter; property: PropertyDeclaration | null } {
  const modifiers = readModifiers(ctx, node);
  const anchorNode = modifiers.visibilityNode ?? modifiers.setVisibilityNode ?? modifiers.readonlyNode ?? node;
  const attributes = ctx.mapAttributes(node);

  const plain = (): { parameter: Parameter; property: null } => {
    const parts = parameterParts(ctx, node);
    const parameter = AST.parameter(spanOf(ctx, node), {
      attributes,
      visibility: null,
      readonly: false,
      promoted: false,
      typeHint: parts.typeHint,
      byRef: parts.byRef,
      variadic: false,
      name: parts.name,
      defaultValue: parts.defaultValue,
      hooks: mapPropertyHooks(ctx, childOfKind(node, "property_hook_list")),
    });
    return { parameter, property: null };
  };

  if (currentEnclosing(ctx) !== "constructor") {
    ctx.diagnostics.error("malformed-node", "mapper: property promotion is only allowed in a constructor", spanOf(ctx, anchorNode));
    return plain();
  }
  if (!gateConstruct(ctx, "constructor_promotion", anchorNode)) {
    return plain();
  }

  const visibility = effectiveVisibility(ctx, modifiers);
  const setVisibility = effectiveSetVisibility(ctx, modifiers);
  const readonly = effectiveReadonly(ctx, modifiers);
  const parts = parameterParts(ctx, node);
  const parameter = AST.parameter(spanOf(ctx, node), {
    attributes,
    visibility,
    readonly,
    promoted: true,
    typeHint: parts.typeHint,
    byRef: parts.byRef,
    variadic: false,
    name: parts.name,
    defaultValue: parts.defaultValue,
    hooks: mapPropertyHooks(ctx, childOfKind(node, "property_hook_list")),
  });
  const anchor = ctx.spans.zeroWidth(anchorNode.startIndex);
  const property = AST.propertyDeclaration(anchor, {
    attributes: [],
    docComment: null,
    visibility,
    setVisibility,
    isStatic: false,
    readonly,
    promoted: true,
    typeHint: parts.typeHint ? reanchorType(parts.typeHint, anchor) : null,
    name: AST.identifier(anchor, parts.name.name),
    defaultValue: null,
    hooks: [],
  });
  return { parameter, property };
}

/**
 * The `{ get => ...; set { ... } }` list of a property. Before 8.4 the hooks
 * are dropped with a warning at the list.
 */
export function mapPropertyHooks(ctx: MapperContext, list: ConcreteNode | null): PropertyHook[] {
  if (!list || !gateConstruct(ctx, "property_hooks", list)) return [];
  return withEnclosing(ctx, "method", () =>
    namedChildren(list)
      .filter((hook) => !isErrorNode(hook))
      .map((hook) => mapPropertyHook(ctx, hook)),
  );
}

function mapPropertyHook(ctx: MapperContext, node: ConcreteNode): PropertyHook {
  if (node.kind !== "property_hook") {
    throw new MapperError(`mapper: unexpected ${node.kind} in a property hook list`, node);
  }
  const nameNode = node.field("name") ?? childOfKind(node, "name");
  if (!nameNode) throw new MapperError("mapper: property hook without a name", node);
  const parametersNode = node.field("parameters") ?? childOfKind(node, "formal_parameters");
  const headerEnd = (parametersNode ?? nameNode).endIndex;
  const bodyNode = node.field("body") ?? namedChildren(node).filter((child) => child.startIndex >= headerEnd).pop() ?? null;
  const attributes = ctx.mapAttributes(node);
  return AST.propertyHook(spanOf(ctx, node), {
    attributes,
    isFinal: childOfKind(node, "final_modifier") !== null,
    byRef: isByRef(ctx, node),
    name: identifierOf(ctx, nameNode),
    parameters: ctx.mapParameters(parametersNode).parameters,
    body: !bodyNode ? null : bodyNode.kind === "compound_statement" ? ctx.mapBlock(bodyNode, node) : ctx.mapExpression(bodyNode),
  });
}

export function mapReturnType(ctx: MapperContext, node: ConcreteNode): TypeHint | null {
  const returnNode = node.field("return_type");
  if (!returnNode) return null;
  if (!gateConstruct(ctx, "return_types", returnNode)) return null;
  return ctx.mapType(returnNode);
}

export function mapFunctionDefinition(ctx: MapperContext, node: ConcreteNode): AST.FunctionDeclaration {
  const attributes = ctx.mapAttributes(node);
  const name = identifierOf(ctx, requireField(node, "name"));
  return withEnclosing(ctx, "function", () => {
    const { parameters } = ctx.mapParameters(requireField(node, "parameters"));
    const returnType = mapReturnType(ctx, node);
    const body = ctx.mapBlock(node.field("body"), node);
    return AST.functionDeclaration(spanOf(ctx, node), {
      attributes,
      docComment: docCommentBefore(ctx, node),
      byRef: isByRef(ctx, node),
      name,
      parameters,
      returnType,
      body,
    });
  });
}

/** A method, followed by the properties its constructor promotes. */
export function mapMethodDeclaration(ctx: MapperContext, node: ConcreteNode): ClassMember[] {
  const attributes = ctx.mapAttributes(node);
  const modifiers = readModifiers(ctx, node);
  const name = identifierOf(ctx, requireField(node, "name"));
  const isConstructor = name.name.toLowerCase() === "__construct";
  return withEnclosing(ctx, isConstructor ? "constructor" : "method", () => {
    const { parameters, promoted } = ctx.mapParameters(requireField(node, "parameters"));
    const returnType = mapReturnType(ctx, node);
    const bodyNode = node.field("body");
    const method = AST.methodDeclaration(spanOf(ctx, node), {
      attributes,
      docComment: docCommentBefore(ctx, node),
      visibility: effectiveVisibility(ctx, modifiers),
      isStatic: modifiers.staticNode !== null,
      isAbstract: modifiers.abstractNode !== null,
      isFinal: modifiers.finalNode !== null,
      byRef: isByRef(ctx, node),
      name,
      parameters,
      returnType,
      body: bodyNode ? ctx.mapBlock(bodyNode, node) : null,
    });
    return [method, ...promoted];
  });
}

function isStaticFunction(node: ConcreteNode): boolean {
  return node.field("static_modifier") !== null || childOfKind(node, "static_modifier") !== null;
}

export function mapClosure(ctx: MapperContext, node: ConcreteNode): Expression {
  const attributes = ctx.mapAttributes(node);
  return withEnclosing(ctx, "closure", () => {
    const { parameters } = ctx.mapParameters(requireField(node, "parameters"));
    const uses = mapClosureUses(ctx, childOfKind(node, "anonymous_function_use_clause"));
    const returnType = mapReturnType(ctx, node);
    const body = ctx.mapBlock(node.field("body"), node);
    return AST.closure(spanOf(ctx, node), {
      attributes,
      isStatic: isStaticFunction(node),
      byRef: isByRef(ctx, node),
      parameters,
      uses,
      returnType,
      body,
    });
  });
}

function mapClosureUses(ctx: MapperContext, clause: ConcreteNode | null): ClosureUse[] {
  return namedChildren(clause).map((child) => {
    const byRef = child.kind === "by_ref";
    const variableNode = byRef ? namedChildren(child)[0] : child;
    if (!variableNode || variableNode.kind !== "variable_name") {
      throw new MapperError("mapper: closure use entries must be variables", child);
    }
    const variable = AST.variable(spanOf(ctx, variableNode), variableNameText(ctx, variableNode));
    return AST.closureUse(spanOf(ctx, child), variable, byRef);
  });
}

export function mapArrowFunction(ctx: MapperContext, node: ConcreteNode): Expression {
  if (!gateConstruct(ctx, "arrow_functions", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const attributes = ctx.mapAttributes(node);
  return withEnclosing(ctx, "closure", () => {
    const { parameters } = ctx.mapParameters(requireField(node, "parameters"));
    const returnType = mapReturnType(ctx, node);
    const body = ctx.mapExpression(requireField(node, "body"));
    return AST.arrowFunction(spanOf(ctx, node), {
      attributes,
      isStatic: isStaticFunction(node),
      byRef: isByRef(ctx, node),
      parameters,
      returnType,
      body,
    });
  });
}
