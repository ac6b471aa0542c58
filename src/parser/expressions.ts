import * as AST from "../ast";
import type { CastType, Expression, IncludeKind, UnaryOperator } from "../ast";
import { DialectTableError } from "../errors";
import { isErrorNode, namedChildren } from "./concrete";
import { assertNever, isExpressionKind, isKnownKind } from "./grammar-kinds";
import {
  mapArrayLiteral,
  mapAssignmentTarget,
  mapBooleanLiteral,
  mapEncapsedString,
  mapFloatLiteral,
  mapHeredoc,
  mapIntegerLiteral,
  mapShellCommand,
  mapSingleQuotedString,
} from "./literals";
import {
  mapCallExpression,
  mapClassConstantAccess,
  mapMemberAccess,
  mapMemberCall,
  mapObjectCreation,
  mapScopedCall,
  mapScopedPropertyAccess,
} from "./calls";
import { mapAnonymousClass } from "./classes";
import { mapArrowFunction, mapClosure } from "./functions";
import {
  DIALECT_REJECTED,
  gateConstruct,
  malformed,
  MapperError,
  nameOf,
  placeholderExpression,
  recover,
  requireField,
  spanOf,
  syntaxError,
  textOf,
  unexpectedKind,
  unknownKind,
  variableNameText,
  type ConcreteNode,
  type MapperContext,
  type MutableMapperContext,
} from "./shared";

export function registerExpressionMappers(ctx: MutableMapperContext): void {
  ctx.mapExpression = (node) => mapExpression(ctx, node);
}

/** Expression boundary: a malformed subtree becomes an UnknownExpression. */
export function mapExpression(ctx: MapperContext, node: ConcreteNode | null | undefined): Expression {
  if (!node) {
    throw new MapperError("mapper: expected an expression");
  }
  return recover(
    () => dispatchExpression(ctx, node),
    (error) => placeholderExpression(ctx, node, malformed(error)),
  );
}

function dispatchExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  if (isErrorNode(node)) {
    return placeholderExpression(ctx, node, syntaxError(node));
  }
  const kind = node.kind;
  if (!isExpressionKind(kind)) {
    return placeholderExpression(ctx, node, isKnownKind(kind) ? unexpectedKind(node, "expression") : unknownKind(node));
  }
  switch (kind) {
    case "parenthesized_expression":
      return ctx.mapExpression(onlyChild(node));
    case "assignment_expression":
      return AST.assignmentExpression(
        spanOf(ctx, node),
        "=",
        mapAssignmentTarget(ctx, requireField(node, "left")),
        ctx.mapExpression(requireField(node, "right")),
      );
    case "reference_assignment_expression":
      return AST.assignmentExpression(
        spanOf(ctx, node),
        "=",
        ctx.mapExpression(requireField(node, "left")),
        ctx.mapExpression(requireField(node, "right")),
        true,
      );
    case "augmented_assignment_expression":
      return mapAugmentedAssignment(ctx, node);
    case "binary_expression":
      return mapBinaryExpression(ctx, node);
    case "unary_op_expression":
      return mapUnaryExpression(ctx, node);
    case "error_suppression_expression":
      return AST.unaryExpression(spanOf(ctx, node), "@", ctx.mapExpression(onlyChild(node)));
    case "update_expression":
      return mapUpdateExpression(ctx, node);
    case "cast_expression":
      return mapCastExpression(ctx, node);
    case "conditional_expression":
      return mapConditionalExpression(ctx, node);
    case "function_call_expression":
      return mapCallExpression(ctx, node);
    case "member_call_expression":
    case "nullsafe_member_call_expression":
      return mapMemberCall(ctx, node);
    case "scoped_call_expression":
      return mapScopedCall(ctx, node);
    case "member_access_expression":
    case "nullsafe_member_access_expression":
      return mapMemberAccess(ctx, node);
    case "scoped_property_access_expression":
      return mapScopedPropertyAccess(ctx, node);
    case "class_constant_access_expression":
      return mapClassConstantAccess(ctx, node);
    case "object_creation_expression":
      return mapObjectCreation(ctx, node);
    case "anonymous_class":
      return mapAnonymousClass(ctx, node, node);
    case "subscript_expression":
      return mapSubscriptExpression(ctx, node);
    case "anonymous_function":
      return mapClosure(ctx, node);
    case "arrow_function":
      return mapArrowFunction(ctx, node);
    case "match_expression":
      return mapMatchExpression(ctx, node);
    case "throw_expression":
      return mapThrowExpression(ctx, node, false);
    case "clone_expression":
      return AST.cloneExpression(spanOf(ctx, node), ctx.mapExpression(onlyChild(node)));
    case "print_intrinsic":
      return AST.printExpression(spanOf(ctx, node), ctx.mapExpression(onlyChild(node)));
    case "include_expression":
    case "include_once_expression":
    case "require_expression":
    case "require_once_expression":
      return AST.includeExpression(spanOf(ctx, node), includeKind(kind), ctx.mapExpression(onlyChild(node)));
    case "yield_expression":
      return mapYieldExpression(ctx, node);
    case "array_creation_expression":
      return mapArrayLiteral(ctx, node);
    case "list_literal":
      return mapAssignmentTarget(ctx, node);
    case "variable_name":
      return AST.variable(spanOf(ctx, node), variableNameText(ctx, node));
    case "dynamic_variable_name":
      return AST.variable(spanOf(ctx, node), ctx.mapExpression(onlyChild(node)));
    case "by_ref":
      return ctx.mapExpression(onlyChild(node));
    case "name":
    case "qualified_name":
    case "relative_name":
    case "relative_scope":
      return nameOf(ctx, node);
    case "integer":
      return mapIntegerLiteral(ctx, node);
    case "float":
      return mapFloatLiteral(ctx, node);
    case "string":
      return mapSingleQuotedString(ctx, node);
    case "encapsed_string":
      return mapEncapsedString(ctx, node);
    case "shell_command_expression":
      return mapShellCommand(ctx, node);
    case "heredoc":
    case "nowdoc":
      return mapHeredoc(ctx, node);
    case "boolean":
      return mapBooleanLiteral(ctx, node);
    case "null":
      return AST.nullLiteral(spanOf(ctx, node));
    case "sequence_expression":
      return placeholderExpression(ctx, node, unexpectedKind(node, "single expression"));
    default:
      return assertNever(kind);
  }
}

function onlyChild(node: ConcreteNode): ConcreteNode {
  const child = namedChildren(node)[0];
  if (!child) {
    throw new MapperError(`mapper: ${node.kind} has no operand`, node);
  }
  return child;
}

/** Comma lists (`echo a, b`, for-loop clauses) arrive as right-nested sequence expressions. */
export function flattenSequence(ctx: MapperContext, node: ConcreteNode | null | undefined): Expression[] {
  if (!node) return [];
  if (node.kind !== "sequence_expression") return [ctx.mapExpression(node)];
  return namedChildren(node).flatMap((child) => flattenSequence(ctx, child));
}

function includeKind(kind: "include_expression" | "include_once_expression" | "require_expression" | "require_once_expression"): IncludeKind {
  switch (kind) {
    case "include_expression":
      return "include";
    case "include_once_expression":
      return "include_once";
    case "require_expression":
      return "require";
    case "require_once_expression":
      return "require_once";
  }
}

/** Text of the operator token: the `operator` field, or the first anonymous child. */
function operatorText(ctx: MapperContext, node: ConcreteNode): string {
  const field = node.field("operator");
  const token = field ?? node.children().find((child) => !child.isNamed);
  if (!token) {
    throw new MapperError(`mapper: ${node.kind} without an operator`, node);
  }
  return textOf(ctx, token).trim();
}

const KEYWORD_OPERATORS: ReadonlyMap<string, string> = new Map([
  ["and", "&&"],
  ["or", "||"],
  ["<>", "!="],
]);

function spellOperator(ctx: MapperContext, written: string): string {
  const lowered = /^[a-z]+$/i.test(written) ? written.toLowerCase() : written;
  const choice = ctx.resolver.resolveAmbiguity("operator_spelling", ctx.dialect);
  switch (choice) {
    case "canonical_symbol":
      return KEYWORD_OPERATORS.get(lowered) ?? lowered;
    case "source_spelling":
      return lowered;
    default:
      throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of operator_spelling`);
  }
}

function mapBinaryExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const operator = spellOperator(ctx, operatorText(ctx, node));
  if (operator === "??" && !gateConstruct(ctx, "null_coalescing", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  if (operator === "<=>" && !gateConstruct(ctx, "spaceship_operator", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const left = ctx.mapExpression(requireField(node, "left"));
  const right = ctx.mapExpression(requireField(node, "right"));
  return AST.binaryExpression(spanOf(ctx, node), operator, left, right);
}

function mapAugmentedAssignment(ctx: MapperContext, node: ConcreteNode): Expression {
  const operator = operatorText(ctx, node);
  if (operator === "??=" && !gateConstruct(ctx, "null_coalescing_assignment", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const left = ctx.mapExpression(requireField(node, "left"));
  const right = ctx.mapExpression(requireField(node, "right"));
  return AST.assignmentExpression(spanOf(ctx, node), operator, left, right);
}

function toUnaryOperator(text: string, node: ConcreteNode): UnaryOperator {
  switch (text) {
    case "+":
    case "-":
    case "!":
    case "~":
    case "@":
      return text;
    default:
      throw new MapperError(`mapper: unrecognized unary operator '${text}'`, node);
  }
}

function mapUnaryExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const operator = toUnaryOperator(operatorText(ctx, node), node);
  const operand = ctx.mapExpression(node.field("argument") ?? onlyChild(node));
  return AST.unaryExpression(spanOf(ctx, node), operator, operand);
}

function mapUpdateExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const children = node.children();
  const token = children.find((child) => child.kind === "++" || child.kind === "--");
  if (!token) {
    throw new MapperError("mapper: update_expression without ++ or --", node);
  }
  const operator = token.kind === "++" ? "++" : "--";
  const prefix = children[0] === token;
  return AST.updateExpression(spanOf(ctx, node), operator, prefix, ctx.mapExpression(node.field("argument") ?? onlyChild(node)));
}

const CAST_SPELLINGS: ReadonlyMap<string, CastType> = new Map<string, CastType>([
  ["int", "int"],
  ["integer", "int"],
  ["bool", "bool"],
  ["boolean", "bool"],
  ["float", "float"],
  ["double", "float"],
  ["real", "float"],
  ["string", "string"],
  ["binary", "string"],
  ["array", "array"],
  ["object", "object"],
  ["unset", "unset"],
]);

function mapCastExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const typeNode = node.field("type") ?? namedChildren(node).find((child) => child.kind === "cast_type");
  if (!typeNode) {
    throw new MapperError("mapper: cast_expression without a cast type", node);
  }
  const spelling = textOf(ctx, typeNode).replace(/[()\s]/g, "").toLowerCase();
  const castType = CAST_SPELLINGS.get(spelling);
  if (!castType) {
    throw new MapperError(`mapper: unrecognized cast '${spelling}'`, typeNode);
  }
  if (spelling === "unset" && !gateConstruct(ctx, "unset_cast", typeNode)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  if (spelling === "real") {
    gateConstruct(ctx, "real_cast", typeNode);
  }
  const valueNode = node.field("value") ?? namedChildren(node).filter((child) => child.startIndex >= typeNode.endIndex && child.kind !== "cast_type").pop();
  return AST.castExpression(spanOf(ctx, node), castType, ctx.mapExpression(valueNode));
}

function isShortTernary(node: ConcreteNode): boolean {
  return node.field("body") === null;
}

function mapConditionalExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const conditionNode = requireField(node, "condition");
  const alternativeNode = requireField(node, "alternative");
  const nested = [conditionNode, alternativeNode].find(
    (child) => child.kind === "conditional_expression" && !(isShortTernary(child) && isShortTernary(node)),
  );
  if (nested) {
    const choice = ctx.resolver.resolveAmbiguity("nested_ternary", ctx.dialect);
    if (choice === "reject") {
      ctx.diagnostics.warning(
        "dialect-mismatch",
        `mapper: nested ternary without parentheses is not allowed (active dialect ${ctx.dialect})`,
        spanOf(ctx, node),
      );
      return placeholderExpression(ctx, node, DIALECT_REJECTED);
    }
    if (choice !== "left_associative") {
      throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of nested_ternary`);
    }
  }
  const condition = ctx.mapExpression(conditionNode);
  const bodyNode = node.field("body");
  const consequent = bodyNode ? ctx.mapExpression(bodyNode) : null;
  const alternate = ctx.mapExpression(alternativeNode);
  return AST.ternaryExpression(spanOf(ctx, node), condition, consequent, alternate);
}

function mapSubscriptExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const [objectNode, indexNode] = namedChildren(node);
  if (!objectNode) {
    throw new MapperError("mapper: subscript_expression without a subject", node);
  }
  if (node.children().some((child) => child.kind === "{")) {
    gateConstruct(ctx, "curly_brace_offset", node);
  }
  const object = ctx.mapExpression(objectNode);
  const index = indexNode ? ctx.mapExpression(indexNode) : null;
  return AST.subscriptExpression(spanOf(ctx, node), object, index);
}

function mapMatchExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  if (!gateConstruct(ctx, "match_expression", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  const subject = ctx.mapExpression(requireField(node, "condition"));
  const block = requireField(node, "body");
  const arms: AST.MatchArm[] = [];
  for (const arm of namedChildren(block)) {
    const bodyNode = arm.field("return_expression") ?? namedChildren(arm).pop();
    if (arm.kind === "match_default_expression") {
      arms.push(AST.matchArm(spanOf(ctx, arm), null, ctx.mapExpression(bodyNode)));
      continue;
    }
    if (arm.kind !== "match_conditional_expression") {
      throw new MapperError(`mapper: unexpected ${arm.kind} in match block`, arm);
    }
    const conditionList = arm.field("conditional_expressions") ?? namedChildren(arm)[0];
    const conditions = namedChildren(conditionList).map((condition) => ctx.mapExpression(condition));
    arms.push(AST.matchArm(spanOf(ctx, arm), conditions, ctx.mapExpression(bodyNode)));
  }
  return AST.matchExpression(spanOf(ctx, node), subject, arms);
}

/** `throw` is a statement before 8.0 and may only appear as one there. */
export function mapThrowExpression(ctx: MapperContext, node: ConcreteNode, asStatement: boolean): Expression {
  if (!asStatement && !gateConstruct(ctx, "throw_expression", node)) {
    return placeholderExpression(ctx, node, DIALECT_REJECTED);
  }
  return AST.throwExpression(spanOf(ctx, node), ctx.mapExpression(onlyChild(node)));
}

function mapYieldExpression(ctx: MapperContext, node: ConcreteNode): Expression {
  const delegate = node.children().some((child) => !child.isNamed && textOf(ctx, child).toLowerCase() === "from");
  const operand = namedChildren(node)[0];
  if (!operand) {
    return AST.yieldExpression(spanOf(ctx, node), null, null, false);
  }
  if (operand.kind === "array_element_initializer") {
    const [keyNode, valueNode] = namedChildren(operand);
    if (valueNode) {
      return AST.yieldExpression(spanOf(ctx, node), ctx.mapExpression(keyNode), ctx.mapExpression(valueNode), false);
    }
    return AST.yieldExpression(spanOf(ctx, node), null, ctx.mapExpression(keyNode), false);
  }
  return AST.yieldExpression(spanOf(ctx, node), null, ctx.mapExpression(operand), delegate);
}
