import * as AST from "../ast";
import type { Block, CatchClause, ElseIfClause, Expression, Name, Statement, SwitchCase } from "../ast";
import { DialectTableError } from "../errors";
import { childOfKind, childrenOfKind, isErrorNode, isIgnorableNode, namedChildren } from "./concrete";
import { flattenSequence } from "./expressions";
import { mapAssignmentTarget } from "./literals";
import {
  gateConstruct,
  MapperError,
  nameOf,
  requireField,
  spanOf,
  variableNameText,
  type ConcreteNode,
  type MapperContext,
  type MutableMapperContext,
} from "./shared";

export function registerControlFlowMappers(ctx: MutableMapperContext): void {
  ctx.mapBody = (node, owner) => mapBody(ctx, node, owner);
  ctx.mapBlock = (node, owner) => mapBlock(ctx, node, owner);
}

/** Statements of a list of concrete children, skipping tokens and comments. */
export function mapStatementList(ctx: MapperContext, children: readonly ConcreteNode[]): Statement[] {
  const statements: Statement[] = [];
  for (const child of children) {
    if (isIgnorableNode(child) || (!child.isNamed && !isErrorNode(child))) continue;
    statements.push(...ctx.mapStatement(child));
  }
  return statements;
}

function colonBlock(ctx: MapperContext, node: ConcreteNode): Block {
  const choice = ctx.resolver.resolveAmbiguity("alternative_control_syntax", ctx.dialect);
  if (choice !== "block") {
    throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of alternative_control_syntax`);
  }
  return AST.block(spanOf(ctx, node), mapStatementList(ctx, node.children()));
}

/** A body that is neither braced nor a colon block: a single statement. */
function bracelessBody(ctx: MapperContext, node: ConcreteNode, statements: Statement[]): Statement {
  const choice = ctx.resolver.resolveAmbiguity("braceless_body", ctx.dialect);
  switch (choice) {
    case "block":
      return AST.block(spanOf(ctx, node), statements);
    case "statement":
      return statements.length === 1 ? statements[0] : AST.block(spanOf(ctx, node), statements);
    default:
      throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of braceless_body`);
  }
}

export function mapBody(ctx: MapperContext, node: ConcreteNode | null | undefined, owner: ConcreteNode): Statement {
  if (!node) {
    throw new MapperError(`mapper: ${owner.kind} is missing its body`, owner);
  }
  switch (node.kind) {
    case "colon_block":
      return colonBlock(ctx, node);
    case "compound_statement":
      return AST.block(spanOf(ctx, node), mapStatementList(ctx, node.children()));
    default:
      return bracelessBody(ctx, node, ctx.mapStatement(node));
  }
}

export function mapBlock(ctx: MapperContext, node: ConcreteNode | null | undefined, owner: ConcreteNode): Block {
  const body = mapBody(ctx, node, owner);
  return body.type === "Block" ? body : AST.block(body.span, [body]);
}

// -----------------------------------------------------------------------------
// if / elseif / else
// -----------------------------------------------------------------------------

type IfParts = {
  condition: Expression;
  body: Statement;
  elseIfs: ElseIfClause[];
  elseBody: Statement | null;
};

function alternativesOf(node: ConcreteNode): readonly ConcreteNode[] {
  const fromField = node.fieldAll("alternative");
  if (fromField.length > 0) return fromField;
  return namedChildren(node).filter((child) => child.kind === "else_if_clause" || child.kind === "else_clause");
}

function mapIfParts(ctx: MapperContext, node: ConcreteNode): IfParts {
  const condition = ctx.mapExpression(requireField(node, "condition"));
  const body = mapBody(ctx, node.field("body"), node);
  const elseIfs: ElseIfClause[] = [];
  let elseBody: Statement | null = null;
  for (const alternative of alternativesOf(node)) {
    if (alternative.kind === "else_if_clause") {
      elseIfs.push(
        AST.elseIfClause(
          spanOf(ctx, alternative),
          ctx.mapExpression(requireField(alternative, "condition")),
          mapBody(ctx, alternative.field("body"), alternative),
        ),
      );
      continue;
    }
    const elseNode = alternative.field("body") ?? namedChildren(alternative)[0];
    if (elseNode?.kind === "if_statement" && elseIfSpelling(ctx) === "elseif_clause") {
      // `else if` reads as `elseif`: the nested if's branches join this chain.
      const nested = mapIfParts(ctx, elseNode);
      const nestedBody = elseNode.field("body");
      const end = nestedBody ? nestedBody.endIndex : elseNode.endIndex;
      elseIfs.push(AST.elseIfClause(ctx.spans.span(alternative.startIndex, end), nested.condition, nested.body));
      elseIfs.push(...nested.elseIfs);
      elseBody = nested.elseBody;
      continue;
    }
    elseBody = mapBody(ctx, elseNode, alternative);
  }
  return { condition, body, elseIfs, elseBody };
}

function elseIfSpelling(ctx: MapperContext): "elseif_clause" | "nested_if" {
  const choice = ctx.resolver.resolveAmbiguity("else_if_spelling", ctx.dialect);
  if (choice !== "elseif_clause" && choice !== "nested_if") {
    throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of else_if_spelling`);
  }
  return choice;
}

export function mapIfStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const parts = mapIfParts(ctx, node);
  return AST.ifStatement(spanOf(ctx, node), parts.condition, parts.body, parts.elseIfs, parts.elseBody);
}

// -----------------------------------------------------------------------------
// Loops
// -----------------------------------------------------------------------------

export function mapWhileStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  return AST.whileStatement(
    spanOf(ctx, node),
    ctx.mapExpression(requireField(node, "condition")),
    mapBody(ctx, node.field("body"), node),
  );
}

export function mapDoStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  return AST.doWhileStatement(
    spanOf(ctx, node),
    mapBody(ctx, node.field("body"), node),
    ctx.mapExpression(requireField(node, "condition")),
  );
}

type LoopHeader = {
  /** Named children between the parentheses, split at `;` (for) or `as` (foreach). */
  sections: ConcreteNode[][];
  tail: ConcreteNode[];
};

export function splitHeader(node: ConcreteNode, separator: string): LoopHeader {
  const sections: ConcreteNode[][] = [[]];
  const tail: ConcreteNode[] = [];
  let state: "before" | "inside" | "after" = "before";
  for (const child of node.children()) {
    if (isIgnorableNode(child)) continue;
    if (state === "before") {
      if (child.kind === "(") state = "inside";
      continue;
    }
    if (state === "inside") {
      if (child.kind === ")") {
        state = "after";
      } else if (child.kind === separator) {
        sections.push([]);
      } else if (child.isNamed) {
        sections[sections.length - 1].push(child);
      }
      continue;
    }
    tail.push(child);
  }
  if (state !== "after") {
    throw new MapperError(`mapper: ${node.kind} header is not closed`, node);
  }
  return { sections, tail };
}

/**
 * Body after a header's closing parenthesis: a statement, a bare `;`, or the
 * `: ... endfor;` form.
 */
export function mapTrailingBody(ctx: MapperContext, node: ConcreteNode, tail: readonly ConcreteNode[]): Statement {
  const fromField = node.field("body");
  const first = tail[0];
  if (first?.kind === ":") {
    const statements = tail.filter((child) => child.isNamed || isErrorNode(child));
    const last = statements.length > 0 ? statements[statements.length - 1] : first;
    const choice = ctx.resolver.resolveAmbiguity("alternative_control_syntax", ctx.dialect);
    if (choice !== "block") {
      throw new DialectTableError(`dialect table: '${choice}' is not an interpretation of alternative_control_syntax`);
    }
    return AST.block(ctx.spans.span(first.startIndex, last.endIndex), mapStatementList(ctx, statements));
  }
  if (fromField) return mapBody(ctx, fromField, node);
  if (first?.kind === ";") {
    return bracelessBody(ctx, first, [AST.emptyStatement(spanOf(ctx, first))]);
  }
  return mapBody(ctx, tail.find((child) => child.isNamed || isErrorNode(child)), node);
}

function sectionExpressions(ctx: MapperContext, section: readonly ConcreteNode[] | undefined): Expression[] {
  return (section ?? []).flatMap((child) => flattenSequence(ctx, child));
}

export function mapForStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const { sections, tail } = splitHeader(node, ";");
  if (sections.length !== 3) {
    throw new MapperError("mapper: for header needs three clauses", node);
  }
  return AST.forStatement(spanOf(ctx, node), {
    initializers: sectionExpressions(ctx, sections[0]),
    conditions: sectionExpressions(ctx, sections[1]),
    updates: sectionExpressions(ctx, sections[2]),
    body: mapTrailingBody(ctx, node, tail),
  });
}

export function mapForeachStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const { sections, tail } = splitHeader(node, "as");
  const [subjectNodes, targetNodes] = sections;
  if (sections.length !== 2 || subjectNodes.length !== 1 || targetNodes.length !== 1) {
    throw new MapperError("mapper: foreach header needs a subject and a target", node);
  }
  const subject = ctx.mapExpression(subjectNodes[0]);
  let keyNode: ConcreteNode | null = null;
  let valueNode = targetNodes[0];
  if (valueNode.kind === "pair" || valueNode.kind === "foreach_pair") {
    const pair = namedChildren(valueNode);
    if (pair.length !== 2) throw new MapperError("mapper: malformed foreach pair", valueNode);
    [keyNode, valueNode] = pair;
  }
  let byRef = false;
  if (valueNode.kind === "by_ref") {
    byRef = true;
    const inner = namedChildren(valueNode)[0];
    if (!inner) throw new MapperError("mapper: empty by-reference target", valueNode);
    valueNode = inner;
  }
  return AST.foreachStatement(spanOf(ctx, node), {
    subject,
    key: keyNode ? ctx.mapExpression(keyNode) : null,
    byRef,
    value: mapAssignmentTarget(ctx, valueNode),
    body: mapTrailingBody(ctx, node, tail),
  });
}

// -----------------------------------------------------------------------------
// switch
// -----------------------------------------------------------------------------

export function mapSwitchStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const subject = ctx.mapExpression(requireField(node, "condition"));
  const block = node.field("body") ?? childOfKind(node, "switch_block");
  const cases: SwitchCase[] = [];
  for (const child of namedChildren(block)) {
    if (child.kind === "case_statement") {
      const valueNode = child.field("value") ?? namedChildren(child)[0];
      if (!valueNode) throw new MapperError("mapper: case without a value", child);
      const rest = child.children().filter((part) => part.startIndex >= valueNode.endIndex);
      cases.push(AST.switchCase(spanOf(ctx, child), ctx.mapExpression(valueNode), mapStatementList(ctx, rest)));
    } else if (child.kind === "default_statement") {
      cases.push(AST.switchCase(spanOf(ctx, child), null, mapStatementList(ctx, child.children())));
    } else if (!isIgnorableNode(child)) {
      throw new MapperError(`mapper: unexpected ${child.kind} in a switch`, child);
    }
  }
  return AST.switchStatement(spanOf(ctx, node), subject, cases);
}

// -----------------------------------------------------------------------------
// try / catch / finally
// -----------------------------------------------------------------------------

function mapCatchClause(ctx: MapperContext, node: ConcreteNode): CatchClause {
  const typeList = node.field("type") ?? childOfKind(node, "type_list");
  let types: Name[] = namedChildren(typeList).map((child) => nameOf(ctx, child));
  if (types.length === 0) {
    throw new MapperError("mapper: catch clause without a type", node);
  }
  if (types.length > 1 && typeList && !gateConstruct(ctx, "multi_catch", typeList)) {
    types = types.slice(0, 1);
  }
  const variableNode = node.field("name") ?? childOfKind(node, "variable_name");
  const variable = variableNode ? AST.variable(spanOf(ctx, variableNode), variableNameText(ctx, variableNode)) : null;
  return AST.catchClause(spanOf(ctx, node), types, variable, mapBlock(ctx, node.field("body"), node));
}

export function mapTryStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const body = mapBlock(ctx, node.field("body"), node);
  const catches = childrenOfKind(node, "catch_clause").map((clause) => mapCatchClause(ctx, clause));
  const finallyNode = childOfKind(node, "finally_clause");
  const finallyBody = finallyNode ? mapBlock(ctx, finallyNode.field("body") ?? childOfKind(finallyNode, "compound_statement"), finallyNode) : null;
  return AST.tryStatement(spanOf(ctx, node), body, catches, finallyBody);
}
