import { describe, expect, test } from "vitest";

import { nodesOfType } from "../../src/ast-traversal";
import {
  assign,
  call,
  compound,
  field,
  int,
  leaf,
  name,
  node,
  php,
  stmt,
  str,
  token,
  v,
  type Blueprint,
} from "../helpers/concrete-builder";
import { expectNode, mapBlueprint, summarize } from "../helpers/mapping";

function mapOne(blueprint: Blueprint, dialect?: string) {
  const result = mapBlueprint(php(blueprint), dialect);
  return { result, statement: result.root.statements[0] };
}

describe("simple statements", () => {
  test("echo flattens its comma list", () => {
    const { statement } = mapOne(node("echo_statement", ["echo", node("sequence_expression", [str("'a'"), ",", v("b")]), ";"]));
    expect(expectNode(statement, "EchoStatement").values).toMatchObject([
      { type: "StringLiteral", value: "a" },
      { type: "Variable", name: "b" },
    ]);
  });

  test("return takes at most one expression", () => {
    expect(expectNode(mapOne(node("return_statement", ["return", ";"])).statement, "ReturnStatement").value).toBeNull();
    const { result, statement } = mapOne(node("return_statement", ["return", node("sequence_expression", [v("a"), ",", v("b")]), ";"]));
    expect(expectNode(statement, "UnknownStatement").reason).toBe("malformed-node");
    expect(summarize(result)).toEqual([["error", "malformed-node", "mapper: return_statement takes a single expression"]]);
  });

  test("break with a depth", () => {
    expect(mapOne(node("break_statement", ["break", int("2"), ";"])).statement).toMatchObject({
      type: "BreakStatement",
      depth: { type: "IntegerLiteral", value: 2 },
    });
  });

  test("global, static and unset", () => {
    const globals = expectNode(mapOne(node("global_declaration", ["global", v("a"), ",", v("b"), ";"])).statement, "GlobalStatement");
    expect(globals.variables).toMatchObject([{ name: "a" }, { name: "b" }]);

    const statics = expectNode(
      mapOne(node("function_static_declaration", ["static", node("static_variable_declaration", [field("name", v("n")), "=", field("value", int("0"))]), ";"]))
        .statement,
      "StaticStatement",
    );
    expect(statics.variables).toHaveLength(1);
    expect(statics.variables[0].variable.name).toBe("n");
    expect(statics.variables[0].defaultValue).toMatchObject({ type: "IntegerLiteral", value: 0 });

    const unset = expectNode(mapOne(node("unset_statement", ["unset", "(", v("a"), ")", ";"])).statement, "UnsetStatement");
    expect(unset.values).toMatchObject([{ type: "Variable", name: "a" }]);
  });

  test("labels and goto", () => {
    const result = mapBlueprint(php(node("named_label_statement", [name("done"), ":"], { sep: "" }), node("goto_statement", ["goto", name("done"), ";"])));
    expect(result.root.statements).toMatchObject([
      { type: "LabelStatement", label: { name: "done" } },
      { type: "GotoStatement", label: { name: "done" } },
    ]);
  });

  test("exit with and without a status", () => {
    expect(mapOne(node("exit_statement", ["exit", "(", int("1"), ")", ";"], { sep: "" })).statement).toMatchObject({
      type: "ExitStatement",
      value: { type: "IntegerLiteral", value: 1 },
    });
    expect(expectNode(mapOne(node("exit_statement", ["die", ";"], { sep: "" })).statement, "ExitStatement").value).toBeNull();
  });

  test("a throw statement is legal in every dialect", () => {
    const { result, statement } = mapOne(stmt(node("throw_expression", ["throw", v("e")])), "5.6");
    expect(expectNode(statement, "ExpressionStatement").expression.type).toBe("ThrowExpression");
    expect(result.diagnostics).toEqual([]);
  });

  test("throw as an expression needs 8.0", () => {
    const { result, statement } = mapOne(stmt(assign(v("x"), node("throw_expression", ["throw", v("e")]))), "7.4");
    const assignment = expectNode(expectNode(statement, "ExpressionStatement").expression, "AssignmentExpression");
    expect(assignment.right.type).toBe("UnknownExpression");
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: throw expressions: requires PHP 8.0 (active dialect 7.4)"]]);
  });
});

describe("constants", () => {
  test("a comma list of constants becomes one declaration each", () => {
    // <?php
    // const A = 1 , B = 2 ;
    const { result } = mapOne(
      node("const_declaration", ["const", node("const_element", [name("A"), "=", int("1")]), ",", node("const_element", [name("B"), "=", int("2")]), ";"]),
    );
    expect(result.root.statements).toMatchObject([
      { type: "ConstDeclaration", name: { name: "A" }, value: { value: 1 }, span: { start: { offset: 6 }, end: { offset: 17 } } },
      { type: "ConstDeclaration", name: { name: "B" }, value: { value: 2 }, span: { start: { offset: 20 }, end: { offset: 27 } } },
    ]);
  });
});

describe("namespaces and imports", () => {
  test("statement-form namespace", () => {
    const { statement } = mapOne(node("namespace_definition", ["namespace", field("name", leaf("namespace_name", "App\\Models")), ";"]));
    const namespace = expectNode(statement, "NamespaceDeclaration");
    expect(namespace.name).toMatchObject({ value: "App\\Models", resolution: "qualified" });
    expect(namespace.body).toBeNull();
  });

  test("braced namespace", () => {
    const { statement } = mapOne(
      node("namespace_definition", ["namespace", field("name", leaf("namespace_name", "App")), field("body", compound(stmt(call(name("boot")))))]),
    );
    expect(expectNode(statement, "NamespaceDeclaration").body?.statements).toHaveLength(1);
  });

  test("use with an alias", () => {
    const { statement } = mapOne(
      node("namespace_use_declaration", ["use", node("namespace_use_clause", [leaf("qualified_name", "App\\User"), "as", field("alias", name("U"))]), ";"]),
    );
    const use = expectNode(statement, "UseStatement");
    expect(use.kind).toBe("class");
    expect(use.prefix).toBeNull();
    expect(use.items).toMatchObject([{ name: { value: "App\\User" }, alias: { name: "U" } }]);
  });

  test("use function", () => {
    const { statement } = mapOne(
      node("namespace_use_declaration", ["use", "function", node("namespace_use_clause", [leaf("qualified_name", "App\\helper")]), ";"]),
    );
    const use = expectNode(statement, "UseStatement");
    expect(use.kind).toBe("function");
    expect(use.items[0].alias).toBeNull();
  });

  const groupUse = node("namespace_use_declaration", [
    "use",
    leaf("namespace_name", "App"),
    token("\\"),
    node("namespace_use_group", ["{", node("namespace_use_group_clause", [name("A")]), ",", node("namespace_use_group_clause", [name("B")]), "}"]),
    ";",
  ]);

  test("group use", () => {
    const use = expectNode(mapOne(groupUse, "7.0").statement, "UseStatement");
    expect(use.prefix?.value).toBe("App");
    expect(use.items.map((item) => item.name.value)).toEqual(["A", "B"]);
  });

  test("group use before 7.0 is rejected", () => {
    const { result, statement } = mapOne(groupUse, "5.6");
    expect(expectNode(statement, "UnknownStatement").reason).toBe("dialect-mismatch");
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: group use declarations: requires PHP 7.0 (active dialect 5.6)"]]);
  });
});

describe("declare and inline html", () => {
  const directive = node("declare_directive", [token("strict_types"), "=", int("1")]);

  test("declare without a body", () => {
    const declare = expectNode(mapOne(node("declare_statement", ["declare", "(", directive, ")", ";"])).statement, "DeclareStatement");
    expect(declare.directives).toMatchObject([{ name: { name: "strict_types" }, value: { type: "IntegerLiteral", value: 1 } }]);
    expect(declare.body).toBeNull();
  });

  test("declare with a block", () => {
    const declare = expectNode(
      mapOne(node("declare_statement", ["declare", "(", directive, ")", field("body", compound())])).statement,
      "DeclareStatement",
    );
    expect(declare.body).toMatchObject({ type: "Block", statements: [] });
  });

  test("text between closing and opening tags", () => {
    const result = mapBlueprint(php(node("text_interpolation", ["?>", leaf("text", "<b>hi</b>"), "<?php"]), node("text_interpolation", ["?>", "<?php"])));
    expect(result.root.statements).toHaveLength(1);
    expect(result.root.statements[0]).toMatchObject({ type: "InlineHtml", value: "<b>hi</b>" });
  });
});

describe("functions", () => {
  const definition = (...extra: (Blueprint | string)[]) =>
    node("function_definition", [
      "function",
      field("name", name("f")),
      field("parameters", node("formal_parameters", ["(", ")"], { sep: "" })),
      ...extra,
      field("body", compound()),
    ]);

  test("return types need 7.0", () => {
    const { result, statement } = mapOne(definition(":", field("return_type", leaf("primitive_type", "array"))), "5.6");
    expect(expectNode(statement, "FunctionDeclaration").returnType).toBeNull();
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: return type declarations: requires PHP 7.0 (active dialect 5.6)"]]);
  });

  test("void needs 7.1", () => {
    const { result, statement } = mapOne(definition(":", field("return_type", leaf("primitive_type", "void"))), "7.0");
    expect(expectNode(statement, "FunctionDeclaration").returnType).toBeNull();
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: the void type: requires PHP 7.1 (active dialect 7.0)"]]);
  });

  test("attributes from 8.0", () => {
    const attributes = node("attribute_list", [node("attribute_group", ["#[", node("attribute", [name("Pure")]), "]"], { sep: "" })]);
    const modern = mapOne(node("function_definition", [field("attributes", attributes), "function", field("name", name("f")), field("parameters", node("formal_parameters", ["(", ")"], { sep: "" })), field("body", compound())]), "8.0");
    expect(expectNode(modern.statement, "FunctionDeclaration").attributes).toMatchObject([{ type: "Attribute", name: { value: "Pure" }, arguments: [] }]);

    const older = mapOne(node("function_definition", [field("attributes", attributes), "function", field("name", name("f")), field("parameters", node("formal_parameters", ["(", ")"], { sep: "" })), field("body", compound())]), "7.4");
    expect(expectNode(older.statement, "FunctionDeclaration").attributes).toEqual([]);
    expect(summarize(older.result)).toEqual([["warning", "dialect-mismatch", "mapper: attributes: requires PHP 8.0 (active dialect 7.4)"]]);
  });

  test("closures capture by value and by reference", () => {
    const closure = node("anonymous_function", [
      "function",
      field("parameters", node("formal_parameters", ["(", ")"], { sep: "" })),
      node("anonymous_function_use_clause", ["use", "(", v("x"), ",", node("by_ref", ["&", v("y")], { sep: "" }), ")"]),
      field("body", compound()),
    ]);
    const { statement } = mapOne(stmt(assign(v("f"), closure)));
    const [mapped] = nodesOfType(statement, "Closure");
    expect(mapped.uses.map((use) => [use.variable.name, use.byRef])).toEqual([
      ["x", false],
      ["y", true],
    ]);
    expect(mapped.isStatic).toBe(false);
  });

  test("arrow functions need 7.4", () => {
    const arrow = node("arrow_function", ["fn", field("parameters", node("formal_parameters", ["(", ")"], { sep: "" })), "=>", field("body", int("1"))]);
    const modern = nodesOfType(mapOne(stmt(arrow), "7.4").statement, "ArrowFunction");
    expect(modern[0].body).toMatchObject({ type: "IntegerLiteral", value: 1 });

    const { result, statement } = mapOne(stmt(arrow), "7.3");
    expect(expectNode(statement, "ExpressionStatement").expression.type).toBe("UnknownExpression");
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: arrow functions: requires PHP 7.4 (active dialect 7.3)"]]);
  });
});
