import * as AST from "../ast";
import type { Argument, Expression, Identifier } from "../ast";
import { childOfKind, hasToken, namedChildren } from "./concrete";
import { mapAnonymousClass } from "./classes";
import {
  DIALECT_REJECTED,
  gateConstruct,
  identifierOf,
  MapperError,
  placeholderExpression,
  requireField,
  spanOf,
  type ArgumentList,
  type ConcreteNode,
  type MapperContext,
  type MutableMapperContext,
} from "./shared";

export function registerCallMappers(ctx: MutableMapperContext): void {
  ctx.mapArguments = (node) => mapArguments(ctx, node);
}

export function mapArguments(ctx: MapperContext, node: ConcreteNode | null | undefined): ArgumentList {
  if (!node) return { arguments: [], callableReference: false };
  const args: Argument[] = [];
  let callableReference = false;
  for (const child of namedChildren(node)) {
    if (child.kind === "variadic_placeholder") {
      callableReference = true;
      continue;
    }
    if (child.kind === "argument") {
      args.push(mapArgument(ctx, child));
      continue;
    }
    args.push(AST.argument(spanOf(ctx, child), ctx.mapExpression(child)));
  }
  return { arguments: args, callableReference };
}

function mapArgument(ctx: MapperContext, node: ConcreteNode): Argument {
  const named = namedChildren(node);
  let nameNode = node.field("name");
  if (!nameNode && named.length > 1 && named[0].kind === "name" && hasToken(node, ":", ctx.source)) {
    nameNode = named[0];
  }
  const byRef = named.some((child) => child.kind === "reference_modifier") || hasToken(node, "&", ctx.source);
  let valueNode = named.filter((child) => child.startIndex !== nameNode?.startIndex && child.kind !== "reference_modifier").pop();
  if (!valueNode) {
    throw new MapperError("mapper: argument without a value", node);
  }
  let spread = false;
  if (valueNode.kind === "variadic_unpacking") {
    spread = true;
    valueNode = namedChildren(valueNode)[0];
  }
  let name: Identifier | null = null;
  if (nameNode && gateConstruct(ctx, "named_arguments", nameNode)) {
    name = identifierOf(ctx, nameNode);
  }
  return AST.argument(spanOf(ctx, node), ctx.mapExpression(valueNode), { name, spread, byRef });
}

/** `f(...)` creates a closure; before 8.1 the whole call is rejected. */
function rejectsCallableReference(ctx: MapperContext, argsNode: ConcreteNode | null): boolean {
  if (!argsNode || !childOfKind(argsNode, "variadic_placeholder")) return false;
  return !gateConstruct(ctx, "first_class_callable", argsNode);
}

export function mapCallExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const argsNode = requireField(node, "arguments");
  if (rejectsCallableReference(ctx, argsNode)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const callee = ctx.mapExpression(requireField(node, "function"));
  const args = ctx.mapArguments(argsNode);
  return AST.callExpression(spanOf(ctx, node), callee, args.arguments, args.callableReference);
}

function isNullsafe(node: ConcreteNode): boolean {
  return node.kind.startsWith("nullsafe_");
}

/** A member name: a plain identifier, or an expression for `$obj->$name` and `$obj->{expr}`. */
function mapMemberName(ctx: MapperContext, node: ConcreteNode): Identifier | Expression {
  const nameNode = requireField(node, "name");
  return nameNode.kind === "name" ? identifierOf(ctx, nameNode) : ctx.mapExpression(nameNode);
}

export function mapMemberCall(ctx: MapperContext, node: ConcreteNode): Expression {
  const nullsafe = isNullsafe(node);
  if (nullsafe && !gateConstruct(ctx, "nullsafe_operator", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const argsNode = requireField(node, "arguments");
  if (rejectsCallableReference(ctx, argsNode)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const object = ctx.mapExpression(requireField(node, "object"));
  const name = mapMemberName(ctx, node);
  const args = ctx.mapArguments(argsNode);
  return AST.methodCallExpression(spanOf(ctx, node), {
    object,
    nullsafe,
    name,
    arguments: args.arguments,
    callableReference: args.callableReference,
  });
}

export function mapScopedCall(ctx: MapperContext, node: ConcreteNode): Expression {
  const argsNode = requireField(node, "arguments");
  if (rejectsCallableReference(ctx, argsNode)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const scope = ctx.mapExpression(requireField(node, "scope"));
  const name = mapMemberName(ctx, node);
  const args = ctx.mapArguments(argsNode);
  return AST.staticCallExpression(spanOf(ctx, node), {
    scope,
    name,
    arguments: args.arguments,
    callableReference: args.callableReference,
  });
}

export function mapMemberAccess(ctx: MapperContext, node: ConcreteNode): Expression {
  const nullsafe = isNullsafe(node);
  if (nullsafe && !gateConstruct(ctx, "nullsafe_operator", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const object = ctx.mapExpression(requireField(node, "object"));
  return AST.propertyFetch(spanOf(ctx, node), object, mapMemberName(ctx, node), nullsafe);
}

export function mapScopedPropertyAccess(ctx: MapperContext, node: ConcreteNode): Expression {
  const scope = ctx.mapExpression(requireField(node, "scope"));
  const name = ctx.mapExpression(requireField(node, "name"));
  if (name.type !== "Variable") {
    throw new MapperError("mapper: static property name must be a variable", node);
  }
  return AST.staticPropertyFetch(spanOf(ctx, node), scope, name);
}

export function mapClassConstantAccess(ctx: MapperContext, node: ConcreteNode): Expression {
  const named = namedChildren(node);
  if (named.length < 2) {
    throw new MapperError("mapper: class constant access needs a scope and a name", node);
  }
  const nameNode = named[named.length - 1];
  if (nameNode.kind !== "name" && !gateConstruct(ctx, "dynamic_class_constant_fetch", nameNode)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const scope = ctx.mapExpression(named[0]);
  const name = nameNode.kind === "name" ? identifierOf(ctx, nameNode) : ctx.mapExpression(nameNode);
  return AST.classConstantFetch(spanOf(ctx, node), scope, name);
}

export function mapObjectCreation(ctx: MapperContext, node: ConcreteNode): Expression {
  const anonymous = childOfKind(node, "anonymous_class");
  if (anonymous) {
    return mapAnonymousClass(ctx, anonymous, node);
  }
  if (hasToken(node, "class", ctx.source)) {
    return mapAnonymousClass(ctx, node, node);
  }
  const argsNode = childOfKind(node, "arguments");
  const classNode = namedChildren(node).find((child) => child.kind !== "arguments");
  if (!classNode) {
    throw new MapperError("mapper: new without a class", node);
  }
  const className = ctx.mapExpression(classNode);
  return AST.newExpression(spanOf(ctx, node), className, ctx.mapArguments(argsNode).arguments);
}
