import { describe, expect, test } from "vitest";

import { nodesOfType } from "../../src/ast-traversal";
import {
  assign,
  classDeclaration,
  error,
  field,
  int,
  leaf,
  method,
  missing,
  name,
  node,
  params,
  php,
  primitive,
  readonlyModifier,
  stmt,
  v,
  visibility,
} from "../helpers/concrete-builder";
import { expectNode, mapBlueprint, summarize } from "../helpers/mapping";

// <?php
// class Point { public function __construct (public readonly int $x) { } }
const promotedPoint = php(
  classDeclaration(
    "Point",
    method(
      "__construct",
      params(
        node("property_promotion_parameter", [visibility("public"), readonlyModifier(), field("type", primitive("int")), field("name", v("x"))]),
      ),
      visibility("public"),
    ),
  ),
);

describe("readonly constructor promotion", () => {
  test("8.1 builds a readonly parameter and a matching synthesized property", () => {
    const result = mapBlueprint(promotedPoint, "8.1");
    expect(result.diagnostics).toEqual([]);

    const [declaration] = nodesOfType(result.root, "ClassDeclaration");
    expect(declaration.members.map((member) => member.type)).toEqual(["MethodDeclaration", "PropertyDeclaration"]);

    const constructor = expectNode(declaration.members[0], "MethodDeclaration");
    const [parameter] = constructor.parameters;
    expect(parameter.visibility).toBe("public");
    expect(parameter.readonly).toBe(true);
    expect(parameter.promoted).toBe(true);
    expect(parameter.name.name).toBe("x");
    expect(parameter.typeHint).toMatchObject({ type: "BuiltinType", name: "int" });

    const property = expectNode(declaration.members[1], "PropertyDeclaration");
    expect(property.readonly).toBe(true);
    expect(property.promoted).toBe(true);
    expect(property.visibility).toBe("public");
    expect(property.name.name).toBe("x");
    expect(property.typeHint).toMatchObject({ type: "BuiltinType", name: "int" });
    // zero-width, at the `public` of the parameter
    expect(property.span.start.offset).toBe(result.source.indexOf("public readonly"));
    expect(property.span.end.offset).toBe(property.span.start.offset);
  });

  test("8.0 downgrades readonly on both nodes with one warning at the modifier", () => {
    const result = mapBlueprint(promotedPoint, "8.0");
    const readonlyAt = result.source.indexOf("readonly");
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      severity: "warning",
      code: "dialect-mismatch",
      construct: "readonly_properties",
      message: "mapper: readonly properties: requires PHP 8.1 (active dialect 8.0)",
      span: { start: { offset: readonlyAt }, end: { offset: readonlyAt + "readonly".length } },
    });

    const [parameter] = nodesOfType(result.root, "Parameter");
    const [property] = nodesOfType(result.root, "PropertyDeclaration");
    expect(parameter.readonly).toBe(false);
    expect(parameter.promoted).toBe(true);
    expect(property.readonly).toBe(false);
  });

  test("7.4 keeps a plain parameter and warns about promotion", () => {
    const result = mapBlueprint(promotedPoint, "7.4");
    expect(summarize(result)).toEqual([
      ["warning", "dialect-mismatch", "mapper: constructor property promotion: requires PHP 8.0 (active dialect 7.4)"],
    ]);
    const [parameter] = nodesOfType(result.root, "Parameter");
    expect(parameter.promoted).toBe(false);
    expect(parameter.visibility).toBeNull();
    expect(nodesOfType(result.root, "PropertyDeclaration")).toEqual([]);
  });

  test("an unknown promoted type stays on the parameter only", () => {
    const blueprint = php(
      classDeclaration(
        "Point",
        method("__construct", params(node("property_promotion_parameter", [visibility("public"), field("type", leaf("future_type", "int!")), field("name", v("x"))])), visibility("public")),
      ),
    );
    const result = mapBlueprint(blueprint, "8.3");
    expect(summarize(result)).toEqual([["warning", "unknown-kind", "mapper: no rule for grammar kind 'future_type'"]]);
    const [parameter] = nodesOfType(result.root, "Parameter");
    const [property] = nodesOfType(result.root, "PropertyDeclaration");
    expect(parameter.typeHint).toMatchObject({ type: "UnknownType", text: "int!" });
    expect(property.promoted).toBe(true);
    expect(property.typeHint).toBeNull();
  });

  test("promotion outside a constructor is an error and yields a plain parameter", () => {
    const blueprint = php(
      classDeclaration(
        "Point",
        method("move", params(node("property_promotion_parameter", [visibility("private"), field("name", v("x"))]))),
      ),
    );
    const result = mapBlueprint(blueprint, "8.3");
    expect(summarize(result)).toEqual([["error", "malformed-node", "mapper: property promotion is only allowed in a constructor"]]);
    const [parameter] = nodesOfType(result.root, "Parameter");
    expect(parameter.promoted).toBe(false);
    expect(nodesOfType(result.root, "PropertyDeclaration")).toEqual([]);
  });
});

describe("dialect selection", () => {
  test("an unknown dialect falls back to the latest with a warning at the start", () => {
    const result = mapBlueprint(php(stmt(v("a"))), "9.9");
    expect(result.dialect).toBe("8.4");
    expect(summarize(result)).toEqual([["warning", "dialect-fallback", "mapper: unknown dialect '9.9', using 8.4"]]);
    expect(result.diagnostics[0].span.start.offset).toBe(0);
    expect(result.diagnostics[0].span.end.offset).toBe(0);
  });

  test("a patch release resolves to its minor dialect", () => {
    const result = mapBlueprint(php(stmt(v("a"))), "7.4.33");
    expect(result.dialect).toBe("7.4");
    expect(result.diagnostics).toEqual([]);
  });
});

describe("recovery", () => {
  test("a broken statement between two valid ones", () => {
    // <?php
    // $a = 1;
    // = =
    // $b = 2;
    const result = mapBlueprint(php(stmt(assign(v("a"), int("1"))), error(["=", "="]), stmt(assign(v("b"), int("2")))));
    expect(result.root.statements.map((statement) => statement.type)).toEqual([
      "ExpressionStatement",
      "UnknownStatement",
      "ExpressionStatement",
    ]);
    const broken = expectNode(result.root.statements[1], "UnknownStatement");
    expect(broken.text).toBe("= =");
    expect(broken.reason).toBe("syntax-error");
    expect(summarize(result)).toEqual([["error", "syntax-error", "parser: syntax error"]]);
    expect(result.diagnostics[0].span.start).toEqual({ offset: 14, line: 3, column: 1 });

    const last = expectNode(result.root.statements[2], "ExpressionStatement");
    const assignment = expectNode(last.expression, "AssignmentExpression");
    expect(assignment.left).toMatchObject({ type: "Variable", name: "b" });
    expect(assignment.right).toMatchObject({ type: "IntegerLiteral", value: 2, raw: "2" });
  });

  test("a missing token is reported and the statement still maps", () => {
    const result = mapBlueprint(php(node("expression_statement", [assign(v("a"), int("1")), missing(";")], { sep: "" })));
    expect(summarize(result)).toEqual([["error", "missing-token", "parser: expected ';'"]]);
    expect(result.diagnostics[0].span.start.offset).toBe(12);
    expect(result.root.statements[0].type).toBe("ExpressionStatement");
  });

  test("an error nested in a dropped construct is still reported once", () => {
    // attributes are dropped before 8.0 without being mapped
    const attributes = node("attribute_list", [node("attribute_group", ["#[", error(["?"]), "]"], { sep: "" })]);
    const blueprint = php(
      node("function_definition", [
        field("attributes", attributes),
        "function",
        field("name", name("f")),
        field("parameters", params()),
        field("body", node("compound_statement", ["{", "}"])),
      ]),
    );
    const result = mapBlueprint(blueprint, "7.4");
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["dialect-mismatch", "syntax-error"]);
  });
});
