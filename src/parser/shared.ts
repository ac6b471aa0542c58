import * as AST from "../ast";
import type {
  Argument,
  Attribute,
  Block,
  ClassMember,
  Expression,
  Identifier,
  Name,
  Parameter,
  PropertyDeclaration,
  Statement,
  TypeHint,
  UnknownReason,
} from "../ast";
import type { DiagnosticCode, DiagnosticsCollector } from "../diagnostics";
import type { ConstructId } from "../dialect/constructs";
import type { Dialect } from "../dialect/dialects";
import type { DialectResolver } from "../dialect/resolver";
import type { Span, SpanTracker } from "../span";
import { isErrorNode, sliceText, type ConcreteNode } from "./concrete";

export type { ConcreteNode } from "./concrete";

/**
 * Raised by a rule when the concrete node does not have the shape the rule
 * needs. It never leaves a pass: the nearest statement, member, expression or
 * type boundary turns it into a placeholder plus an error diagnostic.
 */
export class MapperError extends Error {
  readonly node?: ConcreteNode;

  constructor(message: string, node?: ConcreteNode) {
    super(message);
    this.name = "MapperError";
    this.node = node;
  }
}

export type EnclosingKind =
  | "class"
  | "interface"
  | "trait"
  | "enum"
  | "anonymous_class"
  | "function"
  | "method"
  | "constructor"
  | "closure";

export type ParameterList = {
  parameters: Parameter[];
  /** Properties synthesized from promoted constructor parameters. */
  promoted: PropertyDeclaration[];
};

export type ArgumentList = {
  arguments: Argument[];
  callableReference: boolean;
};

type ContextFns = {
  mapStatement: (node: ConcreteNode) => Statement[];
  mapBody: (node: ConcreteNode | null | undefined, owner: ConcreteNode) => Statement;
  mapBlock: (node: ConcreteNode | null | undefined, owner: ConcreteNode) => Block;
  mapExpression: (node: ConcreteNode | null | undefined) => Expression;
  mapType: (node: ConcreteNode | null | undefined) => TypeHint | null;
  mapMembers: (node: ConcreteNode | null | undefined) => ClassMember[];
  mapParameters: (node: ConcreteNode | null | undefined) => ParameterList;
  mapArguments: (node: ConcreteNode | null | undefined) => ArgumentList;
  mapAttributes: (owner: ConcreteNode) => Attribute[];
};

export interface MapperContext extends ContextFns {
  readonly source: string;
  readonly dialect: Dialect;
  readonly resolver: DialectResolver;
  readonly spans: SpanTracker;
  readonly diagnostics: DiagnosticsCollector;
  /** Innermost last. Pushed and popped around declaration bodies. */
  readonly enclosing: EnclosingKind[];
  /** Start/end keys of error nodes that already produced a diagnostic. */
  readonly reportedErrors: Set<string>;
}

export type MutableMapperContext = { -readonly [K in keyof MapperContext]: MapperContext[K] };

export function createMapperContext(options: {
  source: string;
  dialect: Dialect;
  resolver: DialectResolver;
  spans: SpanTracker;
  diagnostics: DiagnosticsCollector;
}): MutableMapperContext {
  const uninitialized = (name: string) => (): never => {
    throw new Error(`mapper: ${name} has not been configured on the MapperContext`);
  };
  return {
    ...options,
    enclosing: [],
    reportedErrors: new Set(),
    mapStatement: uninitialized("mapStatement"),
    mapBody: uninitialized("mapBody"),
    mapBlock: uninitialized("mapBlock"),
    mapExpression: uninitialized("mapExpression"),
    mapType: uninitialized("mapType"),
    mapMembers: uninitialized("mapMembers"),
    mapParameters: uninitialized("mapParameters"),
    mapArguments: uninitialized("mapArguments"),
    mapAttributes: uninitialized("mapAttributes"),
  };
}

export function spanOf(ctx: MapperContext, node: ConcreteNode): Span {
  return ctx.spans.span(node.startIndex, node.endIndex);
}

/** Span from the start of `first` to the end of `last`. */
export function spanBetween(ctx: MapperContext, first: ConcreteNode, last: ConcreteNode): Span {
  return ctx.spans.span(first.startIndex, last.endIndex);
}

export function textOf(ctx: MapperContext, node: ConcreteNode | null | undefined): string {
  return sliceText(node, ctx.source);
}

export function requireField(node: ConcreteNode, field: string): ConcreteNode {
  const child = node.field(field);
  if (!child) {
    throw new MapperError(`mapper: ${node.kind} is missing its ${field}`, node);
  }
  return child;
}

export function identifierOf(ctx: MapperContext, node: ConcreteNode): Identifier {
  return AST.identifier(spanOf(ctx, node), textOf(ctx, node).trim());
}

export function nameOf(ctx: MapperContext, node: ConcreteNode): Name {
  return AST.name(spanOf(ctx, node), textOf(ctx, node).replace(/\s+/g, ""));
}

/** Variable name without its `$` sigil. */
export function variableNameText(ctx: MapperContext, node: ConcreteNode): string {
  return textOf(ctx, node).trim().replace(/^\$/, "");
}

export function currentEnclosing(ctx: MapperContext): EnclosingKind | null {
  return ctx.enclosing.length > 0 ? ctx.enclosing[ctx.enclosing.length - 1] : null;
}

export function withEnclosing<T>(ctx: MapperContext, kind: EnclosingKind, fn: () => T): T {
  ctx.enclosing.push(kind);
  try {
    return fn();
  } finally {
    ctx.enclosing.pop();
  }
}

export function isConstructEnabled(ctx: MapperContext, construct: ConstructId): boolean {
  return ctx.resolver.isConstructEnabled(construct, ctx.dialect);
}

/**
 * Returns true when the construct is legal in the active dialect. Otherwise
 * records a dialect-mismatch warning at `at` and returns false; the caller
 * then applies the construct's policy.
 */
export function gateConstruct(ctx: MapperContext, construct: ConstructId, at: ConcreteNode | Span): boolean {
  if (isConstructEnabled(ctx, construct)) return true;
  const span = "start" in at ? at : spanOf(ctx, at);
  ctx.diagnostics.warning("dialect-mismatch", `mapper: ${ctx.resolver.describeMismatch(construct, ctx.dialect)}`, span, construct);
  return false;
}

export function rejectsConstruct(ctx: MapperContext, construct: ConstructId): boolean {
  return ctx.resolver.constructInfo(construct).policy === "reject";
}

function errorKey(node: ConcreteNode): string {
  return `${node.startIndex}:${node.endIndex}`;
}

export function markErrorReported(ctx: MapperContext, node: ConcreteNode): void {
  ctx.reportedErrors.add(errorKey(node));
}

export function isErrorReported(ctx: MapperContext, node: ConcreteNode): boolean {
  return ctx.reportedErrors.has(errorKey(node));
}

type Placeholder = {
  reason: UnknownReason;
  message: string;
};

function recordPlaceholder(ctx: MapperContext, node: ConcreteNode, placeholder: Placeholder): Span {
  const span = spanOf(ctx, node);
  const code: DiagnosticCode = placeholder.reason;
  if (placeholder.reason === "syntax-error" || placeholder.reason === "malformed-node") {
    ctx.diagnostics.error(code, placeholder.message, span);
  } else if (placeholder.reason !== "dialect-mismatch") {
    // dialect mismatches are reported by gateConstruct before the placeholder is built
    ctx.diagnostics.warning(code, placeholder.message, span);
  }
  if (isErrorNode(node)) {
    markErrorReported(ctx, node);
  }
  return span;
}

export function placeholderStatement(ctx: MapperContext, node: ConcreteNode, placeholder: Placeholder): AST.UnknownStatement {
  const span = recordPlaceholder(ctx, node, placeholder);
  return AST.unknownStatement(span, textOf(ctx, node), placeholder.reason);
}

export function placeholderExpression(ctx: MapperContext, node: ConcreteNode, placeholder: Placeholder): AST.UnknownExpression {
  const span = recordPlaceholder(ctx, node, placeholder);
  return AST.unknownExpression(span, textOf(ctx, node), placeholder.reason);
}

export function placeholderMember(ctx: MapperContext, node: ConcreteNode, placeholder: Placeholder): AST.UnknownMember {
  const span = recordPlaceholder(ctx, node, placeholder);
  return AST.unknownMember(span, textOf(ctx, node), placeholder.reason);
}

export function placeholderType(ctx: MapperContext, node: ConcreteNode, placeholder: Placeholder): AST.UnknownType {
  const span = recordPlaceholder(ctx, node, placeholder);
  return AST.unknownType(span, textOf(ctx, node), placeholder.reason);
}

export function syntaxError(node: ConcreteNode): Placeholder {
  return { reason: "syntax-error", message: "parser: syntax error" + (node.kind === "ERROR" ? "" : ` in ${node.kind}`) };
}

export function unknownKind(node: ConcreteNode): Placeholder {
  return { reason: "unknown-kind", message: `mapper: no rule for grammar kind '${node.kind}'` };
}

export function unexpectedKind(node: ConcreteNode, position: string): Placeholder {
  return { reason: "unexpected-kind", message: `mapper: ${node.kind} is not valid in ${position} position` };
}

export function malformed(error: MapperError): Placeholder {
  return { reason: "malformed-node", message: error.message };
}

export const DIALECT_REJECTED: Placeholder = { reason: "dialect-mismatch", message: "" };

/**
 * Runs a rule and converts a MapperError into the fallback the caller builds.
 * Any other error is a bug or a contract violation and propagates.
 */
export function recover<T>(fn: () => T, fallback: (error: MapperError) => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof MapperError) {
      return fallback(error);
    }
    throw error;
  }
}

/** The `/** ... *\/` comment directly before a declaration, if any. */
export function docCommentBefore(ctx: MapperContext, node: ConcreteNode): string | null {
  const { source } = ctx;
  let end = node.startIndex;
  while (end > 0 && /\s/.test(source[end - 1])) end--;
  if (source.slice(end - 2, end) !== "*/") return null;
  const start = source.lastIndexOf("/**", end - 2);
  if (start < 0) return null;
  const text = source.slice(start, end);
  if (text.indexOf("*/") !== text.length - 2) return null;
  return text;
}
