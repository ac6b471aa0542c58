// Closed vocabularies for the dialect table. data/dialects.yaml must describe
// exactly these identifiers; the loader rejects anything else.

export const CONSTRUCT_IDS = [
  "return_types",
  "scalar_types",
  "null_coalescing",
  "spaceship_operator",
  "anonymous_classes",
  "group_use",
  "nullable_types",
  "void_type",
  "iterable_type",
  "class_constant_visibility",
  "multi_catch",
  "short_list_destructuring",
  "object_type",
  "typed_properties",
  "arrow_functions",
  "null_coalescing_assignment",
  "array_spread",
  "numeric_literal_separator",
  "union_types",
  "mixed_type",
  "static_return_type",
  "named_arguments",
  "nullsafe_operator",
  "match_expression",
  "constructor_promotion",
  "attributes",
  "throw_expression",
  "curly_brace_offset",
  "real_cast",
  "unset_cast",
  "enums",
  "readonly_properties",
  "first_class_callable",
  "explicit_octal",
  "never_type",
  "intersection_types",
  "final_class_constants",
  "readonly_classes",
  "dnf_types",
  "standalone_literal_types",
  "typed_class_constants",
  "dynamic_class_constant_fetch",
  "asymmetric_visibility",
  "property_hooks",
] as const;

export type ConstructId = (typeof CONSTRUCT_IDS)[number];

export const AMBIGUITY_IDS = [
  "alternative_control_syntax",
  "braceless_body",
  "else_if_spelling",
  "array_destructuring",
  "nested_ternary",
  "var_modifier",
  "operator_spelling",
] as const;

export type AmbiguityId = (typeof AMBIGUITY_IDS)[number];

export const INTERPRETATIONS = [
  "block",
  "statement",
  "elseif_clause",
  "nested_if",
  "list_destructuring",
  "array_literal",
  "left_associative",
  "reject",
  "public",
  "canonical_symbol",
  "source_spelling",
] as const;

export type InterpretationChoice = (typeof INTERPRETATIONS)[number];

export type ConstructPolicy = "downgrade" | "reject";

export function isConstructId(value: string): value is ConstructId {
  return (CONSTRUCT_IDS as readonly string[]).includes(value);
}

export function isAmbiguityId(value: string): value is AmbiguityId {
  return (AMBIGUITY_IDS as readonly string[]).includes(value);
}

export function isInterpretation(value: string): value is InterpretationChoice {
  return (INTERPRETATIONS as readonly string[]).includes(value);
}
