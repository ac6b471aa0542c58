import * as AST from "../ast";
import type { ArrayItem, Expression, StringQuote } from "../ast";
import { DialectTableError } from "../errors";
import { childOfKind, isIgnorableNode, namedChildren } from "./concrete";
import {
  DIALECT_REJECTED,
  gateConstruct,
  MapperError,
  placeholderExpression,
  spanBetween,
  spanOf,
  textOf,
  type ConcreteNode,
  type MapperContext,
} from "./shared";

const PHP_INT_MAX = 9223372036854775807n;

export function mapIntegerLiteral(ctx: MapperContext, node: ConcreteNode): Expression {
  const raw = textOf(ctx, node).trim();
  if (!raw) {
    throw new MapperError("mapper: empty integer literal", node);
  }
  if (raw.includes("_") && !gateConstruct(ctx, "numeric_literal_separator", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const sanitized = raw.replace(/_/g, "").toLowerCase();
  if (sanitized.startsWith("0o") && !gateConstruct(ctx, "explicit_octal", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  if (/^0\d+$/.test(sanitized) && /[89]/.test(sanitized)) {
    throw new MapperError(`mapper: invalid octal literal ${raw}`, node);
  }
  const normalized = /^0[0-7]+$/.test(sanitized) ? `0o${sanitized.slice(1)}` : sanitized;
  let value: bigint;
  try {
    value = BigInt(normalized);
  } catch (error) {
    throw new MapperError(`mapper: invalid integer literal ${raw}: ${String(error)}`, node);
  }
  // Integers past the platform range are floats at run time.
  if (value > PHP_INT_MAX) {
    return AST.floatLiteral(spanOf(ctx, node), Number(value), raw);
  }
  const safe = value <= BigInt(Number.MAX_SAFE_INTEGER);
  return AST.integerLiteral(spanOf(ctx, node), safe ? Number(value) : value, raw);
}

export function mapFloatLiteral(ctx: MapperContext, node: ConcreteNode): Expression {
  const raw = textOf(ctx, node).trim();
  if (raw.includes("_") && !gateConstruct(ctx, "numeric_literal_separator", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const value = Number(raw.replace(/_/g, ""));
  if (Number.isNaN(value)) {
    throw new MapperError(`mapper: invalid float literal ${raw}`, node);
  }
  return AST.floatLiteral(spanOf(ctx, node), value, raw);
}

export function mapBooleanLiteral(ctx: MapperContext, node: ConcreteNode): Expression {
  const value = textOf(ctx, node).trim().toLowerCase();
  if (value === "true") return AST.booleanLiteral(spanOf(ctx, node), true);
  if (value === "false") return AST.booleanLiteral(spanOf(ctx, node), false);
  throw new MapperError(`mapper: invalid boolean literal ${value}`, node);
}

// -----------------------------------------------------------------------------
// Strings
// -----------------------------------------------------------------------------

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["v", "\v"],
  ["e", "\x1b"],
  ["f", "\f"],
  ["\\", "\\"],
  ["$", "$"],
  ['"', '"'],
]);

const ESCAPE_PATTERN = /\\(?:([ntrvef\\$"])|([0-7]{1,3})|x([0-9A-Fa-f]{1,2})|u\{([0-9A-Fa-f]+)\})/g;

/** Resolves the escapes of a double-quoted or heredoc string body. Unknown escapes stay as written. */
export function unescapeDoubleQuoted(raw: string, quote: "double" | "heredoc"): string {
  return raw.replace(ESCAPE_PATTERN, (match: string, simple?: string, octal?: string, hex?: string, unicode?: string) => {
    if (simple !== undefined) {
      if (simple === '"' && quote === "heredoc") return match;
      return SIMPLE_ESCAPES.get(simple) ?? match;
    }
    if (octal !== undefined) return String.fromCharCode(Number.parseInt(octal, 8) & 0xff);
    if (hex !== undefined) return String.fromCharCode(Number.parseInt(hex, 16));
    if (unicode !== undefined) {
      const codePoint = Number.parseInt(unicode, 16);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return match;
  });
}

export function unescapeSingleQuoted(raw: string): string {
  return raw.replace(/\\([\\'])/g, "$1");
}

export function mapSingleQuotedString(ctx: MapperContext, node: ConcreteNode): Expression {
  const raw = textOf(ctx, node);
  const body = raw.replace(/^[bB]?'/, "").replace(/'$/, "");
  return AST.stringLiteral(spanOf(ctx, node), unescapeSingleQuoted(body), "single");
}

const LITERAL_PART_KINDS: ReadonlySet<string> = new Set(["string_content", "string_value", "escape_sequence", "string", "nowdoc_string"]);

export function mapEncapsedString(ctx: MapperContext, node: ConcreteNode): Expression {
  const parts = namedChildren(node);
  if (parts.every((part) => LITERAL_PART_KINDS.has(part.kind))) {
    const body = textOf(ctx, node).replace(/^[bB]?"/, "").replace(/"$/, "");
    return AST.stringLiteral(spanOf(ctx, node), unescapeDoubleQuoted(body, "double"), "double");
  }
  return AST.interpolatedString(spanOf(ctx, node), "double", interpolationParts(ctx, parts, (text) => unescapeDoubleQuoted(text, "double")));
}

/** A backtick command. Escapes read as in heredocs; a backslash also escapes the backtick. */
export function mapShellCommand(ctx: MapperContext, node: ConcreteNode): Expression {
  const decode = (text: string) => unescapeDoubleQuoted(text, "heredoc").replace(/\\`/g, "`");
  const parts = namedChildren(node);
  if (parts.every((part) => LITERAL_PART_KINDS.has(part.kind))) {
    const start = node.startIndex + 1;
    const end = Math.max(start, node.endIndex - 1);
    const body = ctx.source.slice(start, end);
    const fragments = body ? [AST.stringLiteral(ctx.spans.span(start, end), decode(body), "fragment")] : [];
    return AST.shellCommandExpression(spanOf(ctx, node), fragments);
  }
  return AST.shellCommandExpression(spanOf(ctx, node), interpolationParts(ctx, parts, decode));
}

function interpolationParts(ctx: MapperContext, parts: readonly ConcreteNode[], decode: (text: string) => string): Expression[] {
  const result: Expression[] = [];
  let run: ConcreteNode[] = [];
  const flush = () => {
    if (run.length === 0) return;
    const first = run[0];
    const last = run[run.length - 1];
    const text = ctx.source.slice(first.startIndex, last.endIndex);
    result.push(AST.stringLiteral(spanBetween(ctx, first, last), decode(text), "fragment"));
    run = [];
  };
  for (const part of parts) {
    if (LITERAL_PART_KINDS.has(part.kind)) {
      run.push(part);
      continue;
    }
    flush();
    result.push(ctx.mapExpression(part));
  }
  flush();
  return result;
}

type HeredocLayout = {
  /** Offset of the first body character. */
  bodyStart: number;
  /** Offset just past the body, before the newline that precedes the closing marker. */
  bodyEnd: number;
  indent: string;
};

function heredocLayout(ctx: MapperContext, node: ConcreteNode): HeredocLayout {
  const { source } = ctx;
  const end = childOfKind(node, "heredoc_end");
  if (!end) {
    throw new MapperError(`mapper: ${node.kind} without a closing marker`, node);
  }
  const firstNewline = source.indexOf("\n", node.startIndex);
  if (firstNewline < 0 || firstNewline >= end.startIndex) {
    throw new MapperError(`mapper: ${node.kind} without a body line`, node);
  }
  const bodyStart = firstNewline + 1;
  const closingLineStart = source.lastIndexOf("\n", end.startIndex - 1) + 1;
  const leading = source.slice(closingLineStart, end.startIndex);
  const indent = /^[ \t]*$/.test(leading) ? leading : "";
  let bodyEnd = Math.max(bodyStart, closingLineStart - 1);
  if (bodyEnd > bodyStart && source[bodyEnd - 1] === "\r") bodyEnd--;
  return { bodyStart, bodyEnd, indent };
}

function dedent(text: string, indent: string, atLineStart: boolean): string {
  if (!indent) return text;
  const lines = text.split("\n");
  return lines
    .map((line, index) => ((index > 0 || atLineStart) && line.startsWith(indent) ? line.slice(indent.length) : line))
    .join("\n");
}

export function mapHeredoc(ctx: MapperContext, node: ConcreteNode): Expression {
  const quote: StringQuote = node.kind === "nowdoc" ? "nowdoc" : "heredoc";
  const decode = (text: string) => (quote === "nowdoc" ? text : unescapeDoubleQuoted(text, "heredoc"));
  const layout = heredocLayout(ctx, node);
  const bodyNode = childOfKind(node, quote === "nowdoc" ? "nowdoc_body" : "heredoc_body");
  const parts = namedChildren(bodyNode);
  if (parts.every((part) => LITERAL_PART_KINDS.has(part.kind))) {
    const body = ctx.source.slice(layout.bodyStart, layout.bodyEnd);
    return AST.stringLiteral(spanOf(ctx, node), decode(dedent(body, layout.indent, true)), quote);
  }
  const pieces = interpolationParts(ctx, parts, (text) => text);
  return AST.interpolatedString(
    spanOf(ctx, node),
    quote,
    pieces.map((piece) => {
      if (piece.type !== "StringLiteral") return piece;
      const startOffset = piece.span.start.offset;
      const endOffset = Math.min(piece.span.end.offset, layout.bodyEnd);
      const text = ctx.source.slice(startOffset, Math.max(startOffset, endOffset));
      const atLineStart = startOffset === layout.bodyStart || ctx.source[startOffset - 1] === "\n";
      return AST.stringLiteral(piece.span, decode(dedent(text, layout.indent, atLineStart)), "fragment");
    }),
  );
}

// -----------------------------------------------------------------------------
// Arrays and destructuring
// -----------------------------------------------------------------------------

/** Children between the opening bracket and its closer, split at commas. */
function itemGroups(node: ConcreteNode): ConcreteNode[][] {
  const groups: ConcreteNode[][] = [];
  let current: ConcreteNode[] = [];
  let open = false;
  for (const child of node.children()) {
    if (!open) {
      if (child.kind === "(" || child.kind === "[") open = true;
      continue;
    }
    if (child.kind === ",") {
      groups.push(current);
      current = [];
      continue;
    }
    if (child.kind === ")" || child.kind === "]") break;
    if (isIgnorableNode(child)) continue;
    current.push(child);
  }
  groups.push(current);
  // A trailing comma leaves one empty group behind.
  if (groups.length > 0 && groups[groups.length - 1].length === 0) {
    groups.pop();
  }
  return groups;
}

function mapItems(ctx: MapperContext, node: ConcreteNode, asTarget: boolean): (ArrayItem | null)[] {
  return itemGroups(node).map((group) => {
    const named = group.filter((child) => child.isNamed);
    if (named.length === 0) return null;
    if (named.length === 1 && named[0].kind === "array_element_initializer") {
      const initializer = named[0];
      return mapItemParts(ctx, initializer.children().filter((child) => !isIgnorableNode(child)), initializer, initializer, asTarget);
    }
    return mapItemParts(ctx, group, group[0], group[group.length - 1], asTarget);
  });
}

function mapItemParts(
  ctx: MapperContext,
  parts: readonly ConcreteNode[],
  first: ConcreteNode,
  last: ConcreteNode,
  asTarget: boolean,
): ArrayItem {
  const named = parts.filter((part) => part.isNamed);
  const hasKey = parts.some((part) => part.kind === "=>");
  if (named.length !== (hasKey ? 2 : 1)) {
    throw new MapperError("mapper: malformed array element", first);
  }
  const key = hasKey ? ctx.mapExpression(named[0]) : null;
  let valueNode = named[named.length - 1];
  let byRef = parts.some((part) => part.kind === "&");
  let spread = false;
  if (valueNode.kind === "by_ref") {
    byRef = true;
    valueNode = innerOf(valueNode);
  } else if (valueNode.kind === "variadic_unpacking") {
    spread = true;
    const unpacking = valueNode;
    if (!asTarget && !gateConstruct(ctx, "array_spread", unpacking)) {
      return AST.arrayItem(spanBetween(ctx, first, last), null, placeholderExpression(ctx, unpacking, DIALECT_REJECTED), false, true);
    }
    valueNode = innerOf(unpacking);
  }
  const value = asTarget ? mapAssignmentTarget(ctx, valueNode) : ctx.mapExpression(valueNode);
  return AST.arrayItem(spanBetween(ctx, first, last), key, value, byRef, spread);
}

function innerOf(node: ConcreteNode): ConcreteNode {
  const inner = namedChildren(node)[0];
  if (!inner) throw new MapperError(`mapper: empty ${node.kind}`, node);
  return inner;
}

export function mapArrayLiteral(ctx: MapperContext, node: ConcreteNode): Expression {
  const items: ArrayItem[] = [];
  for (const item of mapItems(ctx, node, false)) {
    if (!item) throw new MapperError("mapper: empty element in array literal", node);
    items.push(item);
  }
  return AST.arrayLiteral(spanOf(ctx, node), items);
}

function isShortForm(node: ConcreteNode): boolean {
  return node.children()[0]?.kind === "[";
}

/**
 * Left-hand side of an assignment or a foreach value. `[...]` there is list
 * destructuring from 7.1 on and a plain array before that.
 */
export function mapAssignmentTarget(ctx: MapperContext, node: ConcreteNode): Expression {
  if (node.kind !== "array_creation_expression" && node.kind !== "list_literal") {
    return ctx.mapExpression(node);
  }
  if (node.kind === "list_literal" && !isShortForm(node)) {
    return AST.listExpression(spanOf(ctx, node), mapItems(ctx, node, true));
  }
  const choice = ctx.resolver.resolveAmbiguity("array_destructuring", ctx.dialect);
  switch (choice) {
    case "list_destructuring":
      return AST.listExpression(spanOf(ctx, node), mapItems(ctx, node, true));
    case "array_literal":
      gateConstruct(ctx, "short_list_destructuring", node);
      return mapArrayLiteral(ctx, node);
    default:
      throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of array_destructuring`);
  }
}
