import type { ConcreteNode } from "../../src/parser/concrete";

// Builds tree-sitter-php shaped concrete trees together with the source text
// they cover, so mapper tests run without the WASM grammar.

export type Blueprint = {
  readonly kind: string;
  readonly named: boolean;
  readonly error: boolean;
  readonly missing: boolean;
  readonly text?: string;
  readonly children: readonly Blueprint[];
  readonly field?: string;
  readonly sep: string;
};

type Part = Blueprint | string;

function toBlueprint(part: Part): Blueprint {
  return typeof part === "string" ? token(part) : part;
}

/** A named node whose children are laid out left to right, `sep` apart. */
export function node(kind: string, parts: readonly Part[] = [], options: { sep?: string } = {}): Blueprint {
  return { kind, named: true, error: false, missing: false, children: parts.map(toBlueprint), sep: options.sep ?? " " };
}

/** A named node with no children, covering `text`. */
export function leaf(kind: string, text: string): Blueprint {
  return { kind, named: true, error: false, missing: false, text, children: [], sep: "" };
}

/** An anonymous token. Its kind defaults to its text, as tree-sitter does for literal tokens. */
export function token(text: string, kind: string = text): Blueprint {
  return { kind, named: false, error: false, missing: false, text, children: [], sep: "" };
}

export function field(name: string, part: Part): Blueprint {
  return { ...toBlueprint(part), field: name };
}

export function error(parts: readonly Part[], options: { sep?: string } = {}): Blueprint {
  return { ...node("ERROR", parts, options), error: true };
}

/** A zero-width node the engine inserted to recover, e.g. a missing `;`. */
export function missing(kind: string): Blueprint {
  return { kind, named: false, error: false, missing: true, text: "", children: [], sep: "" };
}

class BuiltNode implements ConcreteNode {
  constructor(
    readonly kind: string,
    readonly startIndex: number,
    readonly endIndex: number,
    readonly isNamed: boolean,
    readonly isError: boolean,
    readonly isMissing: boolean,
    private readonly kids: readonly BuiltNode[],
    private readonly fields: ReadonlyMap<string, readonly BuiltNode[]>,
  ) {}

  children(): readonly ConcreteNode[] {
    return this.kids;
  }

  field(name: string): ConcreteNode | null {
    return this.fields.get(name)?.[0] ?? null;
  }

  fieldAll(name: string): readonly ConcreteNode[] {
    return this.fields.get(name) ?? [];
  }
}

function isEmpty(blueprint: Blueprint): boolean {
  return blueprint.text !== undefined ? blueprint.text === "" : blueprint.children.every(isEmpty);
}

export type BuiltTree = {
  root: ConcreteNode;
  source: string;
};

export function build(root: Blueprint): BuiltTree {
  let source = "";

  const layout = (blueprint: Blueprint): BuiltNode => {
    const start = source.length;
    if (blueprint.text !== undefined) {
      source += blueprint.text;
    }
    const kids: BuiltNode[] = [];
    const fields = new Map<string, BuiltNode[]>();
    blueprint.children.forEach((child, index) => {
      if (index > 0 && !isEmpty(child)) source += blueprint.sep;
      const built = layout(child);
      kids.push(built);
      if (child.field) {
        fields.set(child.field, [...(fields.get(child.field) ?? []), built]);
      }
    });
    return new BuiltNode(blueprint.kind, start, source.length, blueprint.named, blueprint.error, blueprint.missing, kids, fields);
  };

  const built = layout(root);
  return { root: built, source };
}

// -----------------------------------------------------------------------------
// PHP shapes
// -----------------------------------------------------------------------------

/** `<?php` followed by the statements, one per line. */
export function php(...statements: Part[]): Blueprint {
  return node("program", [leaf("php_tag", "<?php"), ...statements], { sep: "\n" });
}

export const v = (name: string) => leaf("variable_name", `$${name}`);
export const name = (text: string) => leaf("name", text);
export const int = (raw: string) => leaf("integer", raw);
export const str = (raw: string) => leaf("string", raw);
export const primitive = (text: string) => leaf("primitive_type", text);
export const namedType = (text: string) => node("named_type", [name(text)]);

export function stmt(expression: Part): Blueprint {
  return node("expression_statement", [expression, ";"], { sep: "" });
}

export function assign(left: Part, right: Part): Blueprint {
  return node("assignment_expression", [field("left", left), "=", field("right", right)]);
}

export function binary(left: Part, operator: string, right: Part): Blueprint {
  return node("binary_expression", [field("left", left), field("operator", operator), field("right", right)]);
}

export function parens(inner: Part): Blueprint {
  return node("parenthesized_expression", ["(", inner, ")"], { sep: "" });
}

export function compound(...statements: Part[]): Blueprint {
  return node("compound_statement", ["{", ...statements, "}"]);
}

export function args(...values: Part[]): Blueprint {
  const parts: Part[] = ["("];
  values.forEach((value, index) => {
    if (index > 0) parts.push(",");
    parts.push(node("argument", [value]));
  });
  parts.push(")");
  return node("arguments", parts, { sep: "" });
}

export function call(callee: Part, argumentList: Blueprint = args()): Blueprint {
  return node("function_call_expression", [field("function", callee), field("arguments", argumentList)], { sep: "" });
}

export function params(...parameters: Part[]): Blueprint {
  const parts: Part[] = ["("];
  parameters.forEach((parameter, index) => {
    if (index > 0) parts.push(",");
    parts.push(parameter);
  });
  parts.push(")");
  return node("formal_parameters", parts, { sep: "" });
}

export function visibility(text: string): Blueprint {
  return node("visibility_modifier", [token(text)]);
}

export function readonlyModifier(): Blueprint {
  return node("readonly_modifier", [token("readonly")]);
}

export function classDeclaration(className: string, ...members: Part[]): Blueprint {
  return node("class_declaration", [
    "class",
    field("name", name(className)),
    field("body", node("declaration_list", ["{", ...members, "}"])),
  ]);
}

export function method(methodName: string, parameterList: Blueprint, ...prefix: Part[]): Blueprint {
  return node("method_declaration", [
    ...prefix,
    "function",
    field("name", name(methodName)),
    field("parameters", parameterList),
    field("body", compound()),
  ]);
}
