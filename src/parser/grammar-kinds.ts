// Node kinds of the tree-sitter-php grammar that the mapper has rules for,
// grouped by the position they are mapped in. Anything outside these lists is
// an unknown kind and maps to a placeholder.

export const GRAMMAR_VERSION = "tree-sitter-php 0.23.12";

export const STATEMENT_KINDS = [
  "empty_statement",
  "compound_statement",
  "named_label_statement",
  "expression_statement",
  "if_statement",
  "switch_statement",
  "while_statement",
  "do_statement",
  "for_statement",
  "foreach_statement",
  "goto_statement",
  "exit_statement",
  "continue_statement",
  "break_statement",
  "return_statement",
  "try_statement",
  "declare_statement",
  "echo_statement",
  "unset_statement",
  "const_declaration",
  "function_definition",
  "class_declaration",
  "interface_declaration",
  "trait_declaration",
  "enum_declaration",
  "namespace_definition",
  "namespace_use_declaration",
  "global_declaration",
  "function_static_declaration",
  "text_interpolation",
  "text",
] as const;

export const EXPRESSION_KINDS = [
  "parenthesized_expression",
  "assignment_expression",
  "reference_assignment_expression",
  "augmented_assignment_expression",
  "binary_expression",
  "unary_op_expression",
  "update_expression",
  "cast_expression",
  "conditional_expression",
  "error_suppression_expression",
  "function_call_expression",
  "member_call_expression",
  "nullsafe_member_call_expression",
  "scoped_call_expression",
  "member_access_expression",
  "nullsafe_member_access_expression",
  "scoped_property_access_expression",
  "class_constant_access_expression",
  "object_creation_expression",
  "anonymous_class",
  "subscript_expression",
  "anonymous_function",
  "arrow_function",
  "match_expression",
  "throw_expression",
  "clone_expression",
  "print_intrinsic",
  "include_expression",
  "include_once_expression",
  "require_expression",
  "require_once_expression",
  "yield_expression",
  "array_creation_expression",
  "list_literal",
  "variable_name",
  "dynamic_variable_name",
  "by_ref",
  "name",
  "qualified_name",
  "relative_name",
  "relative_scope",
  "integer",
  "float",
  "string",
  "encapsed_string",
  "shell_command_expression",
  "heredoc",
  "nowdoc",
  "boolean",
  "null",
  "sequence_expression",
] as const;

export const TYPE_KINDS = [
  "named_type",
  "primitive_type",
  "optional_type",
  "union_type",
  "intersection_type",
  "disjunctive_normal_form_type",
  "bottom_type",
] as const;

export const MEMBER_KINDS = [
  "property_declaration",
  "method_declaration",
  "const_declaration",
  "use_declaration",
  "enum_case",
] as const;

export type StatementKind = (typeof STATEMENT_KINDS)[number];
export type ExpressionKind = (typeof EXPRESSION_KINDS)[number];
export type TypeKind = (typeof TYPE_KINDS)[number];
export type MemberKind = (typeof MEMBER_KINDS)[number];

const STATEMENT_SET: ReadonlySet<string> = new Set(STATEMENT_KINDS);
const EXPRESSION_SET: ReadonlySet<string> = new Set(EXPRESSION_KINDS);
const TYPE_SET: ReadonlySet<string> = new Set(TYPE_KINDS);
const MEMBER_SET: ReadonlySet<string> = new Set(MEMBER_KINDS);

// Kinds that only appear inside the constructs above and are read by their
// parent's rule rather than dispatched on their own.
export const SUPPORT_KINDS = [
  "program",
  "php_tag",
  "comment",
  "colon_block",
  "else_if_clause",
  "else_clause",
  "switch_block",
  "case_statement",
  "default_statement",
  "catch_clause",
  "finally_clause",
  "type_list",
  "declaration_list",
  "enum_declaration_list",
  "base_clause",
  "class_interface_clause",
  "formal_parameters",
  "simple_parameter",
  "variadic_parameter",
  "property_promotion_parameter",
  "property_element",
  "property_initializer",
  "const_element",
  "arguments",
  "argument",
  "variadic_placeholder",
  "variadic_unpacking",
  "array_element_initializer",
  "pair",
  "attribute_list",
  "attribute_group",
  "attribute",
  "visibility_modifier",
  "static_modifier",
  "final_modifier",
  "abstract_modifier",
  "readonly_modifier",
  "var_modifier",
  "reference_modifier",
  "anonymous_function_use_clause",
  "match_block",
  "match_conditional_expression",
  "match_condition_list",
  "match_default_expression",
  "namespace_name",
  "namespace_use_clause",
  "namespace_use_group",
  "namespace_use_group_clause",
  "declare_directive",
  "static_variable_declaration",
  "string_content",
  "string_value",
  "escape_sequence",
  "nowdoc_string",
  "heredoc_body",
  "nowdoc_body",
  "heredoc_start",
  "heredoc_end",
  "use_list",
  "use_as_clause",
  "use_instead_of_clause",
  "property_hook_list",
  "property_hook",
  "cast_type",
  "return_type",
] as const;

const SUPPORT_SET: ReadonlySet<string> = new Set(SUPPORT_KINDS);

export const GRAMMAR_KINDS = {
  statement: STATEMENT_KINDS,
  expression: EXPRESSION_KINDS,
  type: TYPE_KINDS,
  member: MEMBER_KINDS,
  support: SUPPORT_KINDS,
} as const;

export function isStatementKind(kind: string): kind is StatementKind {
  return STATEMENT_SET.has(kind);
}

export function isExpressionKind(kind: string): kind is ExpressionKind {
  return EXPRESSION_SET.has(kind);
}

export function isTypeKind(kind: string): kind is TypeKind {
  return TYPE_SET.has(kind);
}

export function isMemberKind(kind: string): kind is MemberKind {
  return MEMBER_SET.has(kind);
}

/** True for any kind the mapper knows, whatever position it belongs to. */
export function isKnownKind(kind: string): boolean {
  return STATEMENT_SET.has(kind) || EXPRESSION_SET.has(kind) || TYPE_SET.has(kind) || MEMBER_SET.has(kind) || SUPPORT_SET.has(kind);
}

export function assertNever(value: never): never {
  throw new Error(`unhandled grammar kind: ${String(value)}`);
}
