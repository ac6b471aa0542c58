import * as AST from "../ast";
import type { DeclareDirective, Expression, Name, Statement, UseItem, UseKind } from "../ast";
import { childOfKind, childrenOfKind, hasToken, isErrorNode, namedChildren } from "./concrete";
import {
  mapClassDeclaration,
  mapEnumDeclaration,
  mapInterfaceDeclaration,
  mapTopLevelConstants,
  mapTraitDeclaration,
} from "./classes";
import {
  mapDoStatement,
  mapForeachStatement,
  mapForStatement,
  mapIfStatement,
  mapStatementList,
  mapSwitchStatement,
  mapTrailingBody,
  mapTryStatement,
  mapWhileStatement,
  splitHeader,
} from "./control-flow";
import { flattenSequence, mapThrowExpression } from "./expressions";
import { mapFunctionDefinition } from "./functions";
import { assertNever, isKnownKind, isStatementKind } from "./grammar-kinds";
import {
  DIALECT_REJECTED,
  gateConstruct,
  identifierOf,
  malformed,
  MapperError,
  nameOf,
  placeholderStatement,
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

export function registerStatementMappers(ctx: MutableMapperContext): void {
  ctx.mapStatement = (node) => mapStatement(ctx, node);
}

/**
 * Statement boundary. Most kinds produce one statement; comma lists of
 * constants produce several, and an empty `?>` section produces none.
 */
export function mapStatement(ctx: MapperContext, node: ConcreteNode): Statement[] {
  return recover(
    () => dispatchStatement(ctx, node),
    (error) => [placeholderStatement(ctx, node, malformed(error))],
  );
}

function dispatchStatement(ctx: MapperContext, node: ConcreteNode): Statement[] {
  if (isErrorNode(node)) {
    return [placeholderStatement(ctx, node, syntaxError(node))];
  }
  const kind = node.kind;
  if (!isStatementKind(kind)) {
    return [placeholderStatement(ctx, node, isKnownKind(kind) ? unexpectedKind(node, "statement") : unknownKind(node))];
  }
  switch (kind) {
    case "empty_statement":
      return [AST.emptyStatement(spanOf(ctx, node))];
    case "compound_statement":
      return [AST.block(spanOf(ctx, node), mapStatementList(ctx, node.children()))];
    case "named_label_statement":
      return [AST.labelStatement(spanOf(ctx, node), identifierOf(ctx, onlyNamed(node)))];
    case "expression_statement":
      return [mapExpressionStatement(ctx, node)];
    case "if_statement":
      return [mapIfStatement(ctx, node)];
    case "switch_statement":
      return [mapSwitchStatement(ctx, node)];
    case "while_statement":
      return [mapWhileStatement(ctx, node)];
    case "do_statement":
      return [mapDoStatement(ctx, node)];
    case "for_statement":
      return [mapForStatement(ctx, node)];
    case "foreach_statement":
      return [mapForeachStatement(ctx, node)];
    case "goto_statement":
      return [AST.gotoStatement(spanOf(ctx, node), identifierOf(ctx, onlyNamed(node)))];
    case "exit_statement":
      return [AST.exitStatement(spanOf(ctx, node), optionalExpression(ctx, node))];
    case "continue_statement":
      return [AST.continueStatement(spanOf(ctx, node), optionalExpression(ctx, node))];
    case "break_statement":
      return [AST.breakStatement(spanOf(ctx, node), optionalExpression(ctx, node))];
    case "return_statement":
      return [AST.returnStatement(spanOf(ctx, node), optionalExpression(ctx, node))];
    case "try_statement":
      return [mapTryStatement(ctx, node)];
    case "declare_statement":
      return [mapDeclareStatement(ctx, node)];
    case "echo_statement":
      return [AST.echoStatement(spanOf(ctx, node), namedChildren(node).flatMap((child) => flattenSequence(ctx, child)))];
    case "unset_statement":
      return [AST.unsetStatement(spanOf(ctx, node), namedChildren(node).map((child) => ctx.mapExpression(child)))];
    case "const_declaration":
      return mapTopLevelConstants(ctx, node);
    case "function_definition":
      return [mapFunctionDefinition(ctx, node)];
    case "class_declaration":
      return [mapClassDeclaration(ctx, node)];
    case "interface_declaration":
      return [mapInterfaceDeclaration(ctx, node)];
    case "trait_declaration":
      return [mapTraitDeclaration(ctx, node)];
    case "enum_declaration":
      return [mapEnumDeclaration(ctx, node)];
    case "namespace_definition":
      return [mapNamespaceDefinition(ctx, node)];
    case "namespace_use_declaration":
      return [mapUseDeclaration(ctx, node)];
    case "global_declaration":
      return [AST.globalStatement(spanOf(ctx, node), namedChildren(node).map((child) => ctx.mapExpression(child)))];
    case "function_static_declaration":
      return [mapStaticDeclaration(ctx, node)];
    case "text_interpolation": {
      const text = childOfKind(node, "text");
      return text ? [AST.inlineHtml(spanOf(ctx, text), textOf(ctx, text))] : [];
    }
    case "text":
      return [AST.inlineHtml(spanOf(ctx, node), textOf(ctx, node))];
    default:
      return assertNever(kind);
  }
}

function onlyNamed(node: ConcreteNode): ConcreteNode {
  const child = namedChildren(node)[0];
  if (!child) throw new MapperError(`mapper: ${node.kind} is empty`, node);
  return child;
}

function optionalExpression(ctx: MapperContext, node: ConcreteNode): Expression | null {
  const children = namedChildren(node);
  if (children.length === 0) return null;
  if (children.length > 1 || children[0].kind === "sequence_expression") {
    throw new MapperError(`mapper: ${node.kind} takes a single expression`, node);
  }
  return ctx.mapExpression(children[0]);
}

function mapExpressionStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const expressionNode = onlyNamed(node);
  const expression =
    expressionNode.kind === "throw_expression" ? mapThrowExpression(ctx, expressionNode, true) : ctx.mapExpression(expressionNode);
  return AST.expressionStatement(spanOf(ctx, node), expression);
}

function mapStaticDeclaration(ctx: MapperContext, node: ConcreteNode): Statement {
  const variables = childrenOfKind(node, "static_variable_declaration").map((declaration) => {
    const nameNode = requireField(declaration, "name");
    const valueNode = declaration.field("value");
    return AST.staticVariable(
      spanOf(ctx, declaration),
      AST.variable(spanOf(ctx, nameNode), variableNameText(ctx, nameNode)),
      valueNode ? ctx.mapExpression(valueNode) : null,
    );
  });
  return AST.staticStatement(spanOf(ctx, node), variables);
}

function mapNamespaceDefinition(ctx: MapperContext, node: ConcreteNode): Statement {
  const nameNode = node.field("name") ?? childOfKind(node, "namespace_name");
  const bodyNode = node.field("body") ?? childOfKind(node, "compound_statement");
  return AST.namespaceDeclaration(
    spanOf(ctx, node),
    nameNode ? nameOf(ctx, nameNode) : null,
    bodyNode ? AST.block(spanOf(ctx, bodyNode), mapStatementList(ctx, bodyNode.children())) : null,
  );
}

// -----------------------------------------------------------------------------
// use
// -----------------------------------------------------------------------------

function useKindOf(ctx: MapperContext, node: ConcreteNode): UseKind | null {
  if (hasToken(node, "function", ctx.source)) return "function";
  if (hasToken(node, "const", ctx.source)) return "const";
  return null;
}

const USE_NAME_KINDS = new Set(["name", "qualified_name", "namespace_name"]);

function mapUseClause(ctx: MapperContext, clause: ConcreteNode): UseItem {
  const named = namedChildren(clause);
  const aliasNode = clause.field("alias") ?? (hasToken(clause, "as", ctx.source) && named.length > 1 ? named[named.length - 1] : null);
  const nameNode = named.find((child) => USE_NAME_KINDS.has(child.kind) && child.startIndex !== aliasNode?.startIndex);
  if (!nameNode) {
    throw new MapperError("mapper: use clause without a name", clause);
  }
  return AST.useItem(spanOf(ctx, clause), nameOf(ctx, nameNode), aliasNode ? identifierOf(ctx, aliasNode) : null);
}

function mapUseDeclaration(ctx: MapperContext, node: ConcreteNode): Statement {
  const group = childOfKind(node, "namespace_use_group");
  if (group && !gateConstruct(ctx, "group_use", group)) {
    return placeholderStatement(ctx, node, DIALECT_REJECTED);
  }
  const kind = useKindOf(ctx, node) ?? "class";
  if (!group) {
    const clauses = childrenOfKind(node, "namespace_use_clause");
    if (clauses.length === 0) throw new MapperError("mapper: use declaration without a clause", node);
    return AST.useStatement(spanOf(ctx, node), kind, null, clauses.map((clause) => mapUseClause(ctx, clause)));
  }
  const prefixNode = childOfKind(node, "namespace_name") ?? childOfKind(node, "qualified_name") ?? childOfKind(node, "name");
  const prefix: Name | null = prefixNode ? nameOf(ctx, prefixNode) : null;
  const items = namedChildren(group)
    .filter((child) => child.kind === "namespace_use_group_clause" || child.kind === "namespace_use_clause")
    .map((clause) => mapUseClause(ctx, clause));
  if (items.length === 0) throw new MapperError("mapper: group use without a clause", group);
  return AST.useStatement(spanOf(ctx, node), kind, prefix, items);
}

// -----------------------------------------------------------------------------
// declare
// -----------------------------------------------------------------------------

function mapDeclareDirective(ctx: MapperContext, node: ConcreteNode): DeclareDirective {
  const nameToken = node.children().find((child) => !child.isNamed && child.kind !== "=" && child.kind !== ",");
  const valueNode = namedChildren(node).pop();
  if (!nameToken || !valueNode) {
    throw new MapperError("mapper: declare directive needs a name and a value", node);
  }
  return AST.declareDirective(spanOf(ctx, node), identifierOf(ctx, nameToken), ctx.mapExpression(valueNode));
}

function mapDeclareStatement(ctx: MapperContext, node: ConcreteNode): Statement {
  const directives = childrenOfKind(node, "declare_directive").map((directive) => mapDeclareDirective(ctx, directive));
  if (directives.length === 0) {
    throw new MapperError("mapper: declare without a directive", node);
  }
  const { tail } = splitHeader(node, ",");
  const body = tail.length === 0 || tail[0].kind === ";" ? null : mapTrailingBody(ctx, node, tail);
  return AST.declareStatement(spanOf(ctx, node), directives, body);
}
