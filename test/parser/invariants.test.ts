import { describe, expect, test } from "vitest";

import { isUnknownNode, type Node } from "../../src/ast";
import { isAstNode, traverse } from "../../src/ast-traversal";
import { structurallyEqual } from "../../src/ast-equality";
import { spanContains, spansOverlap } from "../../src/span";
import {
  assign,
  classDeclaration,
  compound,
  error,
  field,
  int,
  leaf,
  method,
  name,
  node,
  params,
  parens,
  php,
  primitive,
  readonlyModifier,
  stmt,
  v,
  visibility,
} from "../helpers/concrete-builder";
import { mapBlueprint } from "../helpers/mapping";

const program = php(
  classDeclaration(
    "Point",
    node("property_declaration", [
      visibility("public"),
      field("type", primitive("int")),
      node("property_element", [v("a")]),
      ",",
      node("property_element", [v("b")]),
      ";",
    ]),
    node("property_declaration", [
      visibility("public"),
      field("type", leaf("future_type", "int!")),
      node("property_element", [v("c")]),
      ",",
      node("property_element", [v("d")]),
      ";",
    ]),
    method(
      "__construct",
      params(
        node("property_promotion_parameter", [visibility("public"), readonlyModifier(), field("type", primitive("int")), field("name", v("x"))]),
        node("property_promotion_parameter", [visibility("public"), field("type", leaf("future_type", "int!")), field("name", v("y"))]),
      ),
      visibility("public"),
    ),
  ),
  node("if_statement", [
    "if",
    field("condition", parens(v("a"))),
    field("body", compound(stmt(assign(v("b"), int("1"))))),
    field(
      "alternative",
      node("else_clause", ["else", field("body", node("if_statement", ["if", field("condition", parens(v("c"))), field("body", compound())]))]),
    ),
  ]),
  error(["=", "="]),
  node("const_declaration", ["const", node("const_element", [name("A"), "=", int("1")]), ",", node("const_element", [name("B"), "=", int("2")]), ";"]),
  node("foreach_statement", ["foreach", "(", v("xs"), "as", v("x"), ")", ":", stmt(v("x")), "endforeach", ";"]),
  stmt(leaf("mystery_expression", "???")),
);

function nodeLists(node: Node): Node[][] {
  const values: unknown[] = Object.values(node);
  return values.filter((value): value is unknown[] => Array.isArray(value)).map((value) => value.filter(isAstNode));
}

describe.each(["5.6", "7.4", "8.0", "8.4"])("mapping under %s", (dialect) => {
  const result = mapBlueprint(program, dialect);

  test("every node lies within its parent", () => {
    for (const path of traverse(result.root)) {
      if (!path.parent) continue;
      expect(spanContains(path.parent.node.span, path.node.span), `${path.node.type} in ${path.parent.node.type}`).toBe(true);
    }
  });

  test("node lists are in source order and do not overlap", () => {
    for (const path of traverse(result.root)) {
      for (const list of nodeLists(path.node)) {
        list.forEach((item, index) => {
          const next = list[index + 1];
          if (!next) return;
          expect(next.span.start.offset >= item.span.start.offset, `${item.type} before ${next.type}`).toBe(true);
          expect(spansOverlap(item.span, next.span), `${item.type} and ${next.type}`).toBe(false);
        });
      }
    }
  });

  test("every unknown node has a diagnostic inside its span", () => {
    const unknowns = [...traverse(result.root)].map((path) => path.node).filter(isUnknownNode);
    expect(unknowns.length).toBeGreaterThan(0);
    for (const unknown of unknowns) {
      const reported = result.diagnostics.some((diagnostic) => spanContains(unknown.span, diagnostic.span));
      expect(reported, `${unknown.type} at ${unknown.span.start.offset}`).toBe(true);
    }
  });

  test("the tree is frozen", () => {
    for (const path of traverse(result.root)) {
      expect(Object.isFrozen(path.node)).toBe(true);
    }
    expect(Reflect.set(result.root, "statements", [])).toBe(false);
    expect(Object.isFrozen(result.diagnostics)).toBe(true);
  });

  test("every top-level statement is accounted for", () => {
    expect(result.root.statements.map((statement) => statement.type)).toEqual([
      "ClassDeclaration",
      "IfStatement",
      "UnknownStatement",
      "ConstDeclaration",
      "ConstDeclaration",
      "ForeachStatement",
      "ExpressionStatement",
    ]);
  });

  test("mapping is deterministic", () => {
    const again = mapBlueprint(program, dialect);
    expect(structurallyEqual(result.root, again.root)).toBe(true);
    expect(again.diagnostics).toEqual(result.diagnostics);
  });
});

test("newer dialects never report more dialect mismatches for this program", () => {
  const counts = ["5.6", "7.0", "7.4", "8.0", "8.1", "8.4"].map(
    (dialect) => mapBlueprint(program, dialect).diagnostics.filter((diagnostic) => diagnostic.code === "dialect-mismatch").length,
  );
  const sorted = [...counts].sort((a, b) => b - a);
  expect(counts).toEqual(sorted);
  expect(counts[counts.length - 1]).toBe(0);
});
