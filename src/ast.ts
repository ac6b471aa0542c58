// =============================================================================
// PHP AST (typed, version-aware; every node carries a span)
// =============================================================================

import type { Span } from "./span";

export type { Position, Span } from "./span";

export interface AstNode {
  readonly type: string;
  readonly span: Span;
}

export type Visibility = "public" | "protected" | "private";

/** Diagnostic codes that can leave a placeholder behind. */
export type UnknownReason = "syntax-error" | "unknown-kind" | "unexpected-kind" | "malformed-node" | "dialect-mismatch";

// -----------------------------------------------------------------------------
// Names and supporting clauses
// -----------------------------------------------------------------------------

export interface Identifier extends AstNode {
  readonly type: "Identifier";
  readonly name: string;
}
export function identifier(span: Span, name: string): Identifier {
  return { type: "Identifier", span, name };
}

export type NameResolution = "unqualified" | "qualified" | "fully_qualified" | "relative" | "special";

export interface Name extends AstNode {
  readonly type: "Name";
  readonly value: string;
  readonly resolution: NameResolution;
}
export function name(span: Span, value: string, resolution?: NameResolution): Name {
  return { type: "Name", span, value, resolution: resolution ?? classifyName(value) };
}

const SPECIAL_NAMES = new Set(["self", "parent", "static"]);

export function classifyName(value: string): NameResolution {
  if (value.startsWith("\\")) return "fully_qualified";
  if (/^namespace\\/i.test(value)) return "relative";
  if (value.includes("\\")) return "qualified";
  if (SPECIAL_NAMES.has(value.toLowerCase())) return "special";
  return "unqualified";
}

export interface Argument extends AstNode {
  readonly type: "Argument";
  readonly name: Identifier | null;
  readonly value: Expression;
  readonly spread: boolean;
  readonly byRef: boolean;
}
export function argument(
  span: Span,
  value: Expression,
  options: { name?: Identifier | null; spread?: boolean; byRef?: boolean } = {},
): Argument {
  return { type: "Argument", span, name: options.name ?? null, value, spread: options.spread ?? false, byRef: options.byRef ?? false };
}

export interface Attribute extends AstNode {
  readonly type: "Attribute";
  readonly name: Name;
  readonly arguments: readonly Argument[];
}
export function attribute(span: Span, attributeName: Name, args: readonly Argument[]): Attribute {
  return { type: "Attribute", span, name: attributeName, arguments: args };
}

// -----------------------------------------------------------------------------
// Type hints
// -----------------------------------------------------------------------------

export type BuiltinTypeName =
  | "array"
  | "callable"
  | "iterable"
  | "bool"
  | "float"
  | "int"
  | "string"
  | "void"
  | "mixed"
  | "object"
  | "static"
  | "never"
  | "null"
  | "false"
  | "true";

export interface NamedType extends AstNode { readonly type: "NamedType"; readonly name: Name; }
export interface BuiltinType extends AstNode { readonly type: "BuiltinType"; readonly name: BuiltinTypeName; }
export interface NullableType extends AstNode { readonly type: "NullableType"; readonly inner: TypeHint; }
export interface UnionType extends AstNode { readonly type: "UnionType"; readonly types: readonly TypeHint[]; }
export interface IntersectionType extends AstNode { readonly type: "IntersectionType"; readonly types: readonly TypeHint[]; }
export interface UnknownType extends AstNode { readonly type: "UnknownType"; readonly text: string; readonly reason: UnknownReason; }

export type TypeHint = NamedType | BuiltinType | NullableType | UnionType | IntersectionType | UnknownType;

export function namedType(span: Span, typeName: Name): NamedType { return { type: "NamedType", span, name: typeName }; }
export function builtinType(span: Span, typeName: BuiltinTypeName): BuiltinType { return { type: "BuiltinType", span, name: typeName }; }
export function nullableType(span: Span, inner: TypeHint): NullableType { return { type: "NullableType", span, inner }; }
export function unionType(span: Span, types: readonly TypeHint[]): UnionType { return { type: "UnionType", span, types }; }
export function intersectionType(span: Span, types: readonly TypeHint[]): IntersectionType {
  return { type: "IntersectionType", span, types };
}
export function unknownType(span: Span, text: string, reason: UnknownReason): UnknownType {
  return { type: "UnknownType", span, text, reason };
}

// -----------------------------------------------------------------------------
// Declarations
// -----------------------------------------------------------------------------

type Fields<T extends AstNode> = Omit<T, "type" | "span">;

export type ClassModifiers = {
  readonly abstract: boolean;
  readonly final: boolean;
  readonly readonly: boolean;
};

export interface ClassDeclaration extends AstNode {
  readonly type: "ClassDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly modifiers: ClassModifiers;
  readonly name: Identifier;
  readonly extends: Name | null;
  readonly implements: readonly Name[];
  readonly members: readonly ClassMember[];
}
export function classDeclaration(span: Span, fields: Fields<ClassDeclaration>): ClassDeclaration {
  return { type: "ClassDeclaration", span, ...fields };
}

export interface InterfaceDeclaration extends AstNode {
  readonly type: "InterfaceDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly name: Identifier;
  readonly extends: readonly Name[];
  readonly members: readonly ClassMember[];
}
export function interfaceDeclaration(span: Span, fields: Fields<InterfaceDeclaration>): InterfaceDeclaration {
  return { type: "InterfaceDeclaration", span, ...fields };
}

export interface TraitDeclaration extends AstNode {
  readonly type: "TraitDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly name: Identifier;
  readonly members: readonly ClassMember[];
}
export function traitDeclaration(span: Span, fields: Fields<TraitDeclaration>): TraitDeclaration {
  return { type: "TraitDeclaration", span, ...fields };
}

export interface EnumDeclaration extends AstNode {
  readonly type: "EnumDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly name: Identifier;
  readonly backingType: TypeHint | null;
  readonly implements: readonly Name[];
  readonly members: readonly ClassMember[];
}
export function enumDeclaration(span: Span, fields: Fields<EnumDeclaration>): EnumDeclaration {
  return { type: "EnumDeclaration", span, ...fields };
}

export interface EnumCase extends AstNode {
  readonly type: "EnumCase";
  readonly attributes: readonly Attribute[];
  readonly name: Identifier;
  readonly value: Expression | null;
}
export function enumCase(span: Span, attributes: readonly Attribute[], caseName: Identifier, value: Expression | null): EnumCase {
  return { type: "EnumCase", span, attributes, name: caseName, value };
}

export interface FunctionDeclaration extends AstNode {
  readonly type: "FunctionDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly byRef: boolean;
  readonly name: Identifier;
  readonly parameters: readonly Parameter[];
  readonly returnType: TypeHint | null;
  readonly body: Block;
}
export function functionDeclaration(span: Span, fields: Fields<FunctionDeclaration>): FunctionDeclaration {
  return { type: "FunctionDeclaration", span, ...fields };
}

export interface MethodDeclaration extends AstNode {
  readonly type: "MethodDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly visibility: Visibility;
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
  readonly isFinal: boolean;
  readonly byRef: boolean;
  readonly name: Identifier;
  readonly parameters: readonly Parameter[];
  readonly returnType: TypeHint | null;
  readonly body: Block | null;
}
export function methodDeclaration(span: Span, fields: Fields<MethodDeclaration>): MethodDeclaration {
  return { type: "MethodDeclaration", span, ...fields };
}

export interface PropertyDeclaration extends AstNode {
  readonly type: "PropertyDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly visibility: Visibility;
  /** Write visibility from `private(set)` style modifiers; null when it matches `visibility`. */
  readonly setVisibility: Visibility | null;
  readonly isStatic: boolean;
  readonly readonly: boolean;
  /** True for properties synthesized from promoted constructor parameters. */
  readonly promoted: boolean;
  readonly typeHint: TypeHint | null;
  readonly name: Identifier;
  readonly defaultValue: Expression | null;
  /** `get`/`set` hooks of the `{ ... }` list that replaces the semicolon. */
  readonly hooks: readonly PropertyHook[];
}
export function propertyDeclaration(span: Span, fields: Fields<PropertyDeclaration>): PropertyDeclaration {
  return { type: "PropertyDeclaration", span, ...fields };
}

export interface PropertyHook extends AstNode {
  readonly type: "PropertyHook";
  readonly attributes: readonly Attribute[];
  readonly isFinal: boolean;
  readonly byRef: boolean;
  readonly name: Identifier;
  readonly parameters: readonly Parameter[];
  /** A block, the expression of a `=>` hook, or null for an abstract `get;`. */
  readonly body: Block | Expression | null;
}
export function propertyHook(span: Span, fields: Fields<PropertyHook>): PropertyHook {
  return { type: "PropertyHook", span, ...fields };
}

export interface ClassConstantDeclaration extends AstNode {
  readonly type: "ClassConstantDeclaration";
  readonly attributes: readonly Attribute[];
  readonly docComment: string | null;
  readonly visibility: Visibility;
  readonly isFinal: boolean;
  readonly typeHint: TypeHint | null;
  readonly name: Identifier;
  readonly value: Expression;
}
export function classConstantDeclaration(span: Span, fields: Fields<ClassConstantDeclaration>): ClassConstantDeclaration {
  return { type: "ClassConstantDeclaration", span, ...fields };
}

export interface ConstDeclaration extends AstNode {
  readonly type: "ConstDeclaration";
  readonly name: Identifier;
  readonly value: Expression;
}
export function constDeclaration(span: Span, constName: Identifier, value: Expression): ConstDeclaration {
  return { type: "ConstDeclaration", span, name: constName, value };
}

/** `A::hello insteadof B, C;` */
export interface TraitPrecedence extends AstNode {
  readonly type: "TraitPrecedence";
  readonly trait: Name;
  readonly method: Identifier;
  readonly insteadOf: readonly Name[];
}
export function traitPrecedence(span: Span, trait: Name, method: Identifier, insteadOf: readonly Name[]): TraitPrecedence {
  return { type: "TraitPrecedence", span, trait, method, insteadOf };
}

/** `hello as protected greet;`, `A::hello as private;` */
export interface TraitAlias extends AstNode {
  readonly type: "TraitAlias";
  readonly trait: Name | null;
  readonly method: Identifier;
  readonly visibility: Visibility | null;
  readonly alias: Identifier | null;
}
export function traitAlias(span: Span, fields: Fields<TraitAlias>): TraitAlias {
  return { type: "TraitAlias", span, ...fields };
}

export type TraitAdaptation = TraitPrecedence | TraitAlias;

export interface TraitUse extends AstNode {
  readonly type: "TraitUse";
  readonly traits: readonly Name[];
  readonly adaptations: readonly TraitAdaptation[];
}
export function traitUse(span: Span, traits: readonly Name[], adaptations: readonly TraitAdaptation[]): TraitUse {
  return { type: "TraitUse", span, traits, adaptations };
}

export interface Parameter extends AstNode {
  readonly type: "Parameter";
  readonly attributes: readonly Attribute[];
  /** Set only on promoted constructor parameters. */
  readonly visibility: Visibility | null;
  readonly readonly: boolean;
  readonly promoted: boolean;
  readonly typeHint: TypeHint | null;
  readonly byRef: boolean;
  readonly variadic: boolean;
  readonly name: Identifier;
  readonly defaultValue: Expression | null;
  /** Hooks written on a promoted constructor parameter. */
  readonly hooks: readonly PropertyHook[];
}
export function parameter(span: Span, fields: Fields<Parameter>): Parameter {
  return { type: "Parameter", span, ...fields };
}

export interface UnknownMember extends AstNode {
  readonly type: "UnknownMember";
  readonly text: string;
  readonly reason: UnknownReason;
}
export function unknownMember(span: Span, text: string, reason: UnknownReason): UnknownMember {
  return { type: "UnknownMember", span, text, reason };
}

export type ClassMember =
  | PropertyDeclaration
  | MethodDeclaration
  | ClassConstantDeclaration
  | TraitUse
  | EnumCase
  | UnknownMember;

export type Declaration =
  | ClassDeclaration
  | InterfaceDeclaration
  | TraitDeclaration
  | EnumDeclaration
  | EnumCase
  | FunctionDeclaration
  | MethodDeclaration
  | PropertyDeclaration
  | ClassConstantDeclaration
  | ConstDeclaration
  | TraitUse
  | Parameter;

// -----------------------------------------------------------------------------
// Statements
// -----------------------------------------------------------------------------

export interface Block extends AstNode { readonly type: "Block"; readonly statements: readonly Statement[]; }
export function block(span: Span, statements: readonly Statement[]): Block { return { type: "Block", span, statements }; }

export interface ExpressionStatement extends AstNode { readonly type: "ExpressionStatement"; readonly expression: Expression; }
export function expressionStatement(span: Span, expression: Expression): ExpressionStatement {
  return { type: "ExpressionStatement", span, expression };
}

export interface EchoStatement extends AstNode { readonly type: "EchoStatement"; readonly values: readonly Expression[]; }
export function echoStatement(span: Span, values: readonly Expression[]): EchoStatement { return { type: "EchoStatement", span, values }; }

export interface ReturnStatement extends AstNode { readonly type: "ReturnStatement"; readonly value: Expression | null; }
export function returnStatement(span: Span, value: Expression | null): ReturnStatement { return { type: "ReturnStatement", span, value }; }

export interface ElseIfClause extends AstNode {
  readonly type: "ElseIfClause";
  readonly condition: Expression;
  readonly body: Statement;
}
export function elseIfClause(span: Span, condition: Expression, body: Statement): ElseIfClause {
  return { type: "ElseIfClause", span, condition, body };
}

export interface IfStatement extends AstNode {
  readonly type: "IfStatement";
  readonly condition: Expression;
  readonly body: Statement;
  readonly elseIfs: readonly ElseIfClause[];
  readonly elseBody: Statement | null;
}
export function ifStatement(
  span: Span,
  condition: Expression,
  body: Statement,
  elseIfs: readonly ElseIfClause[],
  elseBody: Statement | null,
): IfStatement {
  return { type: "IfStatement", span, condition, body, elseIfs, elseBody };
}

export interface WhileStatement extends AstNode { readonly type: "WhileStatement"; readonly condition: Expression; readonly body: Statement; }
export function whileStatement(span: Span, condition: Expression, body: Statement): WhileStatement {
  return { type: "WhileStatement", span, condition, body };
}

export interface DoWhileStatement extends AstNode { readonly type: "DoWhileStatement"; readonly body: Statement; readonly condition: Expression; }
export function doWhileStatement(span: Span, body: Statement, condition: Expression): DoWhileStatement {
  return { type: "DoWhileStatement", span, body, condition };
}

export interface ForStatement extends AstNode {
  readonly type: "ForStatement";
  readonly initializers: readonly Expression[];
  readonly conditions: readonly Expression[];
  readonly updates: readonly Expression[];
  readonly body: Statement;
}
export function forStatement(span: Span, fields: Fields<ForStatement>): ForStatement {
  return { type: "ForStatement", span, ...fields };
}

export interface ForeachStatement extends AstNode {
  readonly type: "ForeachStatement";
  readonly subject: Expression;
  readonly key: Expression | null;
  readonly byRef: boolean;
  readonly value: Expression;
  readonly body: Statement;
}
export function foreachStatement(span: Span, fields: Fields<ForeachStatement>): ForeachStatement {
  return { type: "ForeachStatement", span, ...fields };
}

export interface SwitchCase extends AstNode {
  readonly type: "SwitchCase";
  /** Null for `default:`. */
  readonly test: Expression | null;
  readonly body: readonly Statement[];
}
export function switchCase(span: Span, test: Expression | null, body: readonly Statement[]): SwitchCase {
  return { type: "SwitchCase", span, test, body };
}

export interface SwitchStatement extends AstNode {
  readonly type: "SwitchStatement";
  readonly subject: Expression;
  readonly cases: readonly SwitchCase[];
}
export function switchStatement(span: Span, subject: Expression, cases: readonly SwitchCase[]): SwitchStatement {
  return { type: "SwitchStatement", span, subject, cases };
}

export interface BreakStatement extends AstNode { readonly type: "BreakStatement"; readonly depth: Expression | null; }
export function breakStatement(span: Span, depth: Expression | null): BreakStatement { return { type: "BreakStatement", span, depth }; }

export interface ContinueStatement extends AstNode { readonly type: "ContinueStatement"; readonly depth: Expression | null; }
export function continueStatement(span: Span, depth: Expression | null): ContinueStatement {
  return { type: "ContinueStatement", span, depth };
}

export interface CatchClause extends AstNode {
  readonly type: "CatchClause";
  readonly types: readonly Name[];
  readonly variable: Variable | null;
  readonly body: Block;
}
export function catchClause(span: Span, types: readonly Name[], variable: Variable | null, body: Block): CatchClause {
  return { type: "CatchClause", span, types, variable, body };
}

export interface TryStatement extends AstNode {
  readonly type: "TryStatement";
  readonly body: Block;
  readonly catches: readonly CatchClause[];
  readonly finallyBody: Block | null;
}
export function tryStatement(span: Span, body: Block, catches: readonly CatchClause[], finallyBody: Block | null): TryStatement {
  return { type: "TryStatement", span, body, catches, finallyBody };
}

export interface GlobalStatement extends AstNode { readonly type: "GlobalStatement"; readonly variables: readonly Expression[]; }
export function globalStatement(span: Span, variables: readonly Expression[]): GlobalStatement {
  return { type: "GlobalStatement", span, variables };
}

export interface StaticVariable extends AstNode {
  readonly type: "StaticVariable";
  readonly variable: Variable;
  readonly defaultValue: Expression | null;
}
export function staticVariable(span: Span, variable: Variable, defaultValue: Expression | null): StaticVariable {
  return { type: "StaticVariable", span, variable, defaultValue };
}

export interface StaticStatement extends AstNode { readonly type: "StaticStatement"; readonly variables: readonly StaticVariable[]; }
export function staticStatement(span: Span, variables: readonly StaticVariable[]): StaticStatement {
  return { type: "StaticStatement", span, variables };
}

export interface UnsetStatement extends AstNode { readonly type: "UnsetStatement"; readonly values: readonly Expression[]; }
export function unsetStatement(span: Span, values: readonly Expression[]): UnsetStatement { return { type: "UnsetStatement", span, values }; }

export interface NamespaceDeclaration extends AstNode {
  readonly type: "NamespaceDeclaration";
  readonly name: Name | null;
  readonly body: Block | null;
}
export function namespaceDeclaration(span: Span, namespaceName: Name | null, body: Block | null): NamespaceDeclaration {
  return { type: "NamespaceDeclaration", span, name: namespaceName, body };
}

export type UseKind = "class" | "function" | "const";

export interface UseItem extends AstNode {
  readonly type: "UseItem";
  readonly name: Name;
  readonly alias: Identifier | null;
}
export function useItem(span: Span, itemName: Name, alias: Identifier | null): UseItem {
  return { type: "UseItem", span, name: itemName, alias };
}

export interface UseStatement extends AstNode {
  readonly type: "UseStatement";
  readonly kind: UseKind;
  /** Shared prefix of a group use (`use A\{B, C}`). */
  readonly prefix: Name | null;
  readonly items: readonly UseItem[];
}
export function useStatement(span: Span, kind: UseKind, prefix: Name | null, items: readonly UseItem[]): UseStatement {
  return { type: "UseStatement", span, kind, prefix, items };
}

export interface DeclareDirective extends AstNode {
  readonly type: "DeclareDirective";
  readonly name: Identifier;
  readonly value: Expression;
}
export function declareDirective(span: Span, directiveName: Identifier, value: Expression): DeclareDirective {
  return { type: "DeclareDirective", span, name: directiveName, value };
}

export interface DeclareStatement extends AstNode {
  readonly type: "DeclareStatement";
  readonly directives: readonly DeclareDirective[];
  readonly body: Statement | null;
}
export function declareStatement(span: Span, directives: readonly DeclareDirective[], body: Statement | null): DeclareStatement {
  return { type: "DeclareStatement", span, directives, body };
}

export interface InlineHtml extends AstNode { readonly type: "InlineHtml"; readonly value: string; }
export function inlineHtml(span: Span, value: string): InlineHtml { return { type: "InlineHtml", span, value }; }

export interface EmptyStatement extends AstNode { readonly type: "EmptyStatement"; }
export function emptyStatement(span: Span): EmptyStatement { return { type: "EmptyStatement", span }; }

export interface GotoStatement extends AstNode { readonly type: "GotoStatement"; readonly label: Identifier; }
export function gotoStatement(span: Span, label: Identifier): GotoStatement { return { type: "GotoStatement", span, label }; }

/** `exit;`, `exit(1);` */
export interface ExitStatement extends AstNode { readonly type: "ExitStatement"; readonly value: Expression | null; }
export function exitStatement(span: Span, value: Expression | null): ExitStatement { return { type: "ExitStatement", span, value }; }

export interface LabelStatement extends AstNode { readonly type: "LabelStatement"; readonly label: Identifier; }
export function labelStatement(span: Span, label: Identifier): LabelStatement { return { type: "LabelStatement", span, label }; }

export interface UnknownStatement extends AstNode {
  readonly type: "UnknownStatement";
  readonly text: string;
  readonly reason: UnknownReason;
}
export function unknownStatement(span: Span, text: string, reason: UnknownReason): UnknownStatement {
  return { type: "UnknownStatement", span, text, reason };
}

export type Statement =
  | ClassDeclaration
  | InterfaceDeclaration
  | TraitDeclaration
  | EnumDeclaration
  | FunctionDeclaration
  | ConstDeclaration
  | Block
  | ExpressionStatement
  | EchoStatement
  | ReturnStatement
  | IfStatement
  | WhileStatement
  | DoWhileStatement
  | ForStatement
  | ForeachStatement
  | SwitchStatement
  | BreakStatement
  | ContinueStatement
  | TryStatement
  | GlobalStatement
  | StaticStatement
  | UnsetStatement
  | NamespaceDeclaration
  | UseStatement
  | DeclareStatement
  | InlineHtml
  | EmptyStatement
  | GotoStatement
  | ExitStatement
  | LabelStatement
  | UnknownStatement;

// -----------------------------------------------------------------------------
// Expressions
// -----------------------------------------------------------------------------

export interface IntegerLiteral extends AstNode { readonly type: "IntegerLiteral"; readonly value: number | bigint; readonly raw: string; }
export function integerLiteral(span: Span, value: number | bigint, raw: string): IntegerLiteral {
  return { type: "IntegerLiteral", span, value, raw };
}

export interface FloatLiteral extends AstNode { readonly type: "FloatLiteral"; readonly value: number; readonly raw: string; }
export function floatLiteral(span: Span, value: number, raw: string): FloatLiteral { return { type: "FloatLiteral", span, value, raw }; }

export type StringQuote = "single" | "double" | "heredoc" | "nowdoc" | "fragment";

export interface StringLiteral extends AstNode { readonly type: "StringLiteral"; readonly value: string; readonly quote: StringQuote; }
export function stringLiteral(span: Span, value: string, quote: StringQuote): StringLiteral {
  return { type: "StringLiteral", span, value, quote };
}

export interface InterpolatedString extends AstNode {
  readonly type: "InterpolatedString";
  readonly quote: StringQuote;
  /** Literal fragments are StringLiterals with quote "fragment". */
  readonly parts: readonly Expression[];
}
export function interpolatedString(span: Span, quote: StringQuote, parts: readonly Expression[]): InterpolatedString {
  return { type: "InterpolatedString", span, quote, parts };
}

/** A backtick command; literal fragments are StringLiterals with quote "fragment". */
export interface ShellCommandExpression extends AstNode { readonly type: "ShellCommandExpression"; readonly parts: readonly Expression[]; }
export function shellCommandExpression(span: Span, parts: readonly Expression[]): ShellCommandExpression {
  return { type: "ShellCommandExpression", span, parts };
}

export interface BooleanLiteral extends AstNode { readonly type: "BooleanLiteral"; readonly value: boolean; }
export function booleanLiteral(span: Span, value: boolean): BooleanLiteral { return { type: "BooleanLiteral", span, value }; }

export interface NullLiteral extends AstNode { readonly type: "NullLiteral"; }
export function nullLiteral(span: Span): NullLiteral { return { type: "NullLiteral", span }; }

export interface ArrayItem extends AstNode {
  readonly type: "ArrayItem";
  readonly key: Expression | null;
  readonly value: Expression;
  readonly byRef: boolean;
  readonly spread: boolean;
}
export function arrayItem(span: Span, key: Expression | null, value: Expression, byRef = false, spread = false): ArrayItem {
  return { type: "ArrayItem", span, key, value, byRef, spread };
}

export interface ArrayLiteral extends AstNode { readonly type: "ArrayLiteral"; readonly items: readonly ArrayItem[]; }
export function arrayLiteral(span: Span, items: readonly ArrayItem[]): ArrayLiteral { return { type: "ArrayLiteral", span, items }; }

export interface ListExpression extends AstNode {
  readonly type: "ListExpression";
  /** Null entries are skipped positions (`[, $b] = ...`). */
  readonly items: readonly (ArrayItem | null)[];
}
export function listExpression(span: Span, items: readonly (ArrayItem | null)[]): ListExpression {
  return { type: "ListExpression", span, items };
}

export interface Variable extends AstNode {
  readonly type: "Variable";
  /** Name without the `$`, or the expression of a variable variable. */
  readonly name: string | Expression;
}
export function variable(span: Span, variableName: string | Expression): Variable { return { type: "Variable", span, name: variableName }; }

export interface BinaryExpression extends AstNode {
  readonly type: "BinaryExpression";
  readonly operator: string;
  readonly left: Expression;
  readonly right: Expression;
}
export function binaryExpression(span: Span, operator: string, left: Expression, right: Expression): BinaryExpression {
  return { type: "BinaryExpression", span, operator, left, right };
}

export type UnaryOperator = "+" | "-" | "!" | "~" | "@";

export interface UnaryExpression extends AstNode { readonly type: "UnaryExpression"; readonly operator: UnaryOperator; readonly operand: Expression; }
export function unaryExpression(span: Span, operator: UnaryOperator, operand: Expression): UnaryExpression {
  return { type: "UnaryExpression", span, operator, operand };
}

export interface UpdateExpression extends AstNode {
  readonly type: "UpdateExpression";
  readonly operator: "++" | "--";
  readonly prefix: boolean;
  readonly operand: Expression;
}
export function updateExpression(span: Span, operator: "++" | "--", prefix: boolean, operand: Expression): UpdateExpression {
  return { type: "UpdateExpression", span, operator, prefix, operand };
}

export interface AssignmentExpression extends AstNode {
  readonly type: "AssignmentExpression";
  readonly operator: string;
  readonly byRef: boolean;
  readonly left: Expression;
  readonly right: Expression;
}
export function assignmentExpression(span: Span, operator: string, left: Expression, right: Expression, byRef = false): AssignmentExpression {
  return { type: "AssignmentExpression", span, operator, byRef, left, right };
}

export type CastType = "int" | "float" | "string" | "bool" | "array" | "object" | "unset";

export interface CastExpression extends AstNode { readonly type: "CastExpression"; readonly castType: CastType; readonly operand: Expression; }
export function castExpression(span: Span, castType: CastType, operand: Expression): CastExpression {
  return { type: "CastExpression", span, castType, operand };
}

export interface TernaryExpression extends AstNode {
  readonly type: "TernaryExpression";
  readonly condition: Expression;
  /** Null for the short form `a ?: b`. */
  readonly consequent: Expression | null;
  readonly alternate: Expression;
}
export function ternaryExpression(span: Span, condition: Expression, consequent: Expression | null, alternate: Expression): TernaryExpression {
  return { type: "TernaryExpression", span, condition, consequent, alternate };
}

export interface CallExpression extends AstNode {
  readonly type: "CallExpression";
  readonly callee: Expression;
  readonly arguments: readonly Argument[];
  /** `strlen(...)`: first-class callable creation instead of a call. */
  readonly callableReference: boolean;
}
export function callExpression(span: Span, callee: Expression, args: readonly Argument[], callableReference = false): CallExpression {
  return { type: "CallExpression", span, callee, arguments: args, callableReference };
}

export interface MethodCallExpression extends AstNode {
  readonly type: "MethodCallExpression";
  readonly object: Expression;
  readonly nullsafe: boolean;
  readonly name: Identifier | Expression;
  readonly arguments: readonly Argument[];
  readonly callableReference: boolean;
}
export function methodCallExpression(span: Span, fields: Fields<MethodCallExpression>): MethodCallExpression {
  return { type: "MethodCallExpression", span, ...fields };
}

export interface StaticCallExpression extends AstNode {
  readonly type: "StaticCallExpression";
  readonly scope: Expression;
  readonly name: Identifier | Expression;
  readonly arguments: readonly Argument[];
  readonly callableReference: boolean;
}
export function staticCallExpression(span: Span, fields: Fields<StaticCallExpression>): StaticCallExpression {
  return { type: "StaticCallExpression", span, ...fields };
}

export interface PropertyFetch extends AstNode {
  readonly type: "PropertyFetch";
  readonly object: Expression;
  readonly nullsafe: boolean;
  readonly name: Identifier | Expression;
}
export function propertyFetch(span: Span, object: Expression, propertyName: Identifier | Expression, nullsafe: boolean): PropertyFetch {
  return { type: "PropertyFetch", span, object, nullsafe, name: propertyName };
}

export interface StaticPropertyFetch extends AstNode {
  readonly type: "StaticPropertyFetch";
  readonly scope: Expression;
  readonly name: Variable;
}
export function staticPropertyFetch(span: Span, scope: Expression, propertyName: Variable): StaticPropertyFetch {
  return { type: "StaticPropertyFetch", span, scope, name: propertyName };
}

export interface ClassConstantFetch extends AstNode {
  readonly type: "ClassConstantFetch";
  readonly scope: Expression;
  readonly name: Identifier | Expression;
}
export function classConstantFetch(span: Span, scope: Expression, constantName: Identifier | Expression): ClassConstantFetch {
  return { type: "ClassConstantFetch", span, scope, name: constantName };
}

export interface AnonymousClass extends AstNode {
  readonly type: "AnonymousClass";
  readonly attributes: readonly Attribute[];
  readonly modifiers: ClassModifiers;
  readonly arguments: readonly Argument[];
  readonly extends: Name | null;
  readonly implements: readonly Name[];
  readonly members: readonly ClassMember[];
}
export function anonymousClass(span: Span, fields: Fields<AnonymousClass>): AnonymousClass {
  return { type: "AnonymousClass", span, ...fields };
}

export interface NewExpression extends AstNode {
  readonly type: "NewExpression";
  readonly className: Expression;
  readonly arguments: readonly Argument[];
}
export function newExpression(span: Span, className: Expression, args: readonly Argument[]): NewExpression {
  return { type: "NewExpression", span, className, arguments: args };
}

export interface SubscriptExpression extends AstNode {
  readonly type: "SubscriptExpression";
  readonly object: Expression;
  /** Null for the append form `$a[]`. */
  readonly index: Expression | null;
}
export function subscriptExpression(span: Span, object: Expression, index: Expression | null): SubscriptExpression {
  return { type: "SubscriptExpression", span, object, index };
}

export interface ClosureUse extends AstNode { readonly type: "ClosureUse"; readonly variable: Variable; readonly byRef: boolean; }
export function closureUse(span: Span, usedVariable: Variable, byRef: boolean): ClosureUse {
  return { type: "ClosureUse", span, variable: usedVariable, byRef };
}

export interface Closure extends AstNode {
  readonly type: "Closure";
  readonly attributes: readonly Attribute[];
  readonly isStatic: boolean;
  readonly byRef: boolean;
  readonly parameters: readonly Parameter[];
  readonly uses: readonly ClosureUse[];
  readonly returnType: TypeHint | null;
  readonly body: Block;
}
export function closure(span: Span, fields: Fields<Closure>): Closure {
  return { type: "Closure", span, ...fields };
}

export interface ArrowFunction extends AstNode {
  readonly type: "ArrowFunction";
  readonly attributes: readonly Attribute[];
  readonly isStatic: boolean;
  readonly byRef: boolean;
  readonly parameters: readonly Parameter[];
  readonly returnType: TypeHint | null;
  readonly body: Expression;
}
export function arrowFunction(span: Span, fields: Fields<ArrowFunction>): ArrowFunction {
  return { type: "ArrowFunction", span, ...fields };
}

export interface MatchArm extends AstNode {
  readonly type: "MatchArm";
  /** Null for the `default` arm. */
  readonly conditions: readonly Expression[] | null;
  readonly body: Expression;
}
export function matchArm(span: Span, conditions: readonly Expression[] | null, body: Expression): MatchArm {
  return { type: "MatchArm", span, conditions, body };
}

export interface MatchExpression extends AstNode { readonly type: "MatchExpression"; readonly subject: Expression; readonly arms: readonly MatchArm[]; }
export function matchExpression(span: Span, subject: Expression, arms: readonly MatchArm[]): MatchExpression {
  return { type: "MatchExpression", span, subject, arms };
}

export interface ThrowExpression extends AstNode { readonly type: "ThrowExpression"; readonly value: Expression; }
export function throwExpression(span: Span, value: Expression): ThrowExpression { return { type: "ThrowExpression", span, value }; }

export interface CloneExpression extends AstNode { readonly type: "CloneExpression"; readonly value: Expression; }
export function cloneExpression(span: Span, value: Expression): CloneExpression { return { type: "CloneExpression", span, value }; }

export interface PrintExpression extends AstNode { readonly type: "PrintExpression"; readonly value: Expression; }
export function printExpression(span: Span, value: Expression): PrintExpression { return { type: "PrintExpression", span, value }; }

export type IncludeKind = "include" | "include_once" | "require" | "require_once";

export interface IncludeExpression extends AstNode { readonly type: "IncludeExpression"; readonly kind: IncludeKind; readonly target: Expression; }
export function includeExpression(span: Span, kind: IncludeKind, target: Expression): IncludeExpression {
  return { type: "IncludeExpression", span, kind, target };
}

export interface YieldExpression extends AstNode {
  readonly type: "YieldExpression";
  readonly key: Expression | null;
  readonly value: Expression | null;
  /** `yield from`. */
  readonly delegate: boolean;
}
export function yieldExpression(span: Span, key: Expression | null, value: Expression | null, delegate: boolean): YieldExpression {
  return { type: "YieldExpression", span, key, value, delegate };
}

export interface UnknownExpression extends AstNode {
  readonly type: "UnknownExpression";
  readonly text: string;
  readonly reason: UnknownReason;
}
export function unknownExpression(span: Span, text: string, reason: UnknownReason): UnknownExpression {
  return { type: "UnknownExpression", span, text, reason };
}

export type Expression =
  | IntegerLiteral
  | FloatLiteral
  | StringLiteral
  | InterpolatedString
  | ShellCommandExpression
  | BooleanLiteral
  | NullLiteral
  | ArrayLiteral
  | ListExpression
  | Variable
  | Name
  | BinaryExpression
  | UnaryExpression
  | UpdateExpression
  | AssignmentExpression
  | CastExpression
  | TernaryExpression
  | CallExpression
  | MethodCallExpression
  | StaticCallExpression
  | PropertyFetch
  | StaticPropertyFetch
  | ClassConstantFetch
  | NewExpression
  | AnonymousClass
  | SubscriptExpression
  | Closure
  | ArrowFunction
  | MatchExpression
  | ThrowExpression
  | CloneExpression
  | PrintExpression
  | IncludeExpression
  | YieldExpression
  | UnknownExpression;

// -----------------------------------------------------------------------------
// Root and categories
// -----------------------------------------------------------------------------

export interface Program extends AstNode { readonly type: "Program"; readonly statements: readonly Statement[]; }
export function program(span: Span, statements: readonly Statement[]): Program { return { type: "Program", span, statements }; }

export type Clause =
  | Identifier
  | Argument
  | Attribute
  | ArrayItem
  | ElseIfClause
  | SwitchCase
  | CatchClause
  | StaticVariable
  | UseItem
  | DeclareDirective
  | ClosureUse
  | MatchArm
  | PropertyHook
  | TraitPrecedence
  | TraitAlias;

export type Node = Program | Statement | Expression | ClassMember | Declaration | TypeHint | Clause;

export type NodeType = Node["type"];

export type NodeOfType<K extends NodeType> = Extract<Node, { type: K }>;

export type NodeCategory = "root" | "declaration" | "statement" | "expression" | "type" | "clause";

export const NODE_CATEGORIES = {
  Program: "root",
  ClassDeclaration: "declaration",
  InterfaceDeclaration: "declaration",
  TraitDeclaration: "declaration",
  EnumDeclaration: "declaration",
  EnumCase: "declaration",
  FunctionDeclaration: "declaration",
  MethodDeclaration: "declaration",
  PropertyDeclaration: "declaration",
  ClassConstantDeclaration: "declaration",
  ConstDeclaration: "declaration",
  TraitUse: "declaration",
  Parameter: "declaration",
  UnknownMember: "declaration",
  Block: "statement",
  ExpressionStatement: "statement",
  EchoStatement: "statement",
  ReturnStatement: "statement",
  IfStatement: "statement",
  WhileStatement: "statement",
  DoWhileStatement: "statement",
  ForStatement: "statement",
  ForeachStatement: "statement",
  SwitchStatement: "statement",
  BreakStatement: "statement",
  ContinueStatement: "statement",
  TryStatement: "statement",
  GlobalStatement: "statement",
  StaticStatement: "statement",
  UnsetStatement: "statement",
  NamespaceDeclaration: "statement",
  UseStatement: "statement",
  DeclareStatement: "statement",
  InlineHtml: "statement",
  EmptyStatement: "statement",
  GotoStatement: "statement",
  ExitStatement: "statement",
  LabelStatement: "statement",
  UnknownStatement: "statement",
  IntegerLiteral: "expression",
  FloatLiteral: "expression",
  StringLiteral: "expression",
  InterpolatedString: "expression",
  ShellCommandExpression: "expression",
  BooleanLiteral: "expression",
  NullLiteral: "expression",
  ArrayLiteral: "expression",
  ListExpression: "expression",
  Variable: "expression",
  Name: "expression",
  BinaryExpression: "expression",
  UnaryExpression: "expression",
  UpdateExpression: "expression",
  AssignmentExpression: "expression",
  CastExpression: "expression",
  TernaryExpression: "expression",
  CallExpression: "expression",
  MethodCallExpression: "expression",
  StaticCallExpression: "expression",
  PropertyFetch: "expression",
  StaticPropertyFetch: "expression",
  ClassConstantFetch: "expression",
  NewExpression: "expression",
  AnonymousClass: "expression",
  SubscriptExpression: "expression",
  Closure: "expression",
  ArrowFunction: "expression",
  MatchExpression: "expression",
  ThrowExpression: "expression",
  CloneExpression: "expression",
  PrintExpression: "expression",
  IncludeExpression: "expression",
  YieldExpression: "expression",
  UnknownExpression: "expression",
  NamedType: "type",
  BuiltinType: "type",
  NullableType: "type",
  UnionType: "type",
  IntersectionType: "type",
  UnknownType: "type",
  Identifier: "clause",
  Argument: "clause",
  Attribute: "clause",
  ArrayItem: "clause",
  ElseIfClause: "clause",
  SwitchCase: "clause",
  CatchClause: "clause",
  StaticVariable: "clause",
  UseItem: "clause",
  DeclareDirective: "clause",
  ClosureUse: "clause",
  MatchArm: "clause",
  PropertyHook: "clause",
  TraitPrecedence: "clause",
  TraitAlias: "clause",
} as const satisfies Record<NodeType, NodeCategory>;

export function nodeCategory(type: NodeType): NodeCategory {
  return NODE_CATEGORIES[type];
}

export type UnknownNode = UnknownStatement | UnknownExpression | UnknownMember | UnknownType;

export function isUnknownNode(node: Node): node is UnknownNode {
  return (
    node.type === "UnknownStatement" ||
    node.type === "UnknownExpression" ||
    node.type === "UnknownMember" ||
    node.type === "UnknownType"
  );
}
