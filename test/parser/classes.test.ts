import { describe, expect, test } from "vitest";

import { nodesOfType } from "../../src/ast-traversal";
import {
  assign,
  classDeclaration,
  compound,
  field,
  int,
  leaf,
  method,
  name,
  namedType,
  node,
  params,
  php,
  primitive,
  readonlyModifier,
  stmt,
  str,
  v,
  visibility,
  type Blueprint,
} from "../helpers/concrete-builder";
import { expectNode, mapBlueprint, summarize } from "../helpers/mapping";

const property = (...parts: (Blueprint | string)[]) => node("property_declaration", [...parts, ";"]);
const element = (variable: Blueprint, initial?: Blueprint) =>
  node("property_element", initial ? [variable, node("property_initializer", ["=", initial])] : [variable]);
const constant = (...parts: (Blueprint | string)[]) => node("const_declaration", [...parts, ";"]);
const constElement = (constantName: string, value: Blueprint) => node("const_element", [name(constantName), "=", value]);

describe("properties", () => {
  // <?php
  // class C { public int $a = 1 , $b ; }
  const twoProperties = php(classDeclaration("C", property(visibility("public"), field("type", primitive("int")), element(v("a"), int("1")), ",", element(v("b")))));

  test("a comma list becomes one declaration per property", () => {
    const result = mapBlueprint(twoProperties, "7.4");
    expect(result.diagnostics).toEqual([]);
    const [first, second] = nodesOfType(result.root, "PropertyDeclaration");

    expect(first.name.name).toBe("a");
    expect(first.span.start.offset).toBe(16);
    expect(first.span.end.offset).toBe(33);
    expect(first.defaultValue).toMatchObject({ type: "IntegerLiteral", value: 1 });
    expect(first.typeHint).toMatchObject({ type: "BuiltinType", name: "int", span: { start: { offset: 23 }, end: { offset: 26 } } });

    expect(second.name.name).toBe("b");
    expect(second.span.start.offset).toBe(36);
    expect(second.span.end.offset).toBe(40);
    expect(second.defaultValue).toBeNull();
    expect(second.visibility).toBe("public");
    // the shared type is re-anchored, zero-width, at the second property
    expect(second.typeHint).toMatchObject({ type: "BuiltinType", name: "int", span: { start: { offset: 36 }, end: { offset: 36 } } });
  });

  test("an unknown shared type is not copied to the later properties", () => {
    const result = mapBlueprint(php(classDeclaration("C", property(visibility("public"), field("type", leaf("future_type", "int!")), element(v("a")), ",", element(v("b"))))));
    const [first, second] = nodesOfType(result.root, "PropertyDeclaration");
    expect(first.typeHint?.type).toBe("UnknownType");
    expect(second.typeHint).toBeNull();
    expect(summarize(result)).toEqual([["warning", "unknown-kind", "mapper: no rule for grammar kind 'future_type'"]]);
  });

  test("property types are dropped before 7.4", () => {
    const result = mapBlueprint(twoProperties, "7.3");
    expect(nodesOfType(result.root, "PropertyDeclaration").map((declaration) => declaration.typeHint)).toEqual([null, null]);
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: typed properties: requires PHP 7.4 (active dialect 7.3)"]]);
  });

  test("var means public", () => {
    const result = mapBlueprint(php(classDeclaration("C", property(node("var_modifier", ["var"]), element(v("legacy"))))), "5.6");
    const [declaration] = nodesOfType(result.root, "PropertyDeclaration");
    expect(declaration.visibility).toBe("public");
    expect(result.diagnostics).toEqual([]);
  });

  test("static and private", () => {
    const result = mapBlueprint(php(classDeclaration("C", property(visibility("private"), node("static_modifier", ["static"]), element(v("count"), int("0"))))));
    const [declaration] = nodesOfType(result.root, "PropertyDeclaration");
    expect(declaration.visibility).toBe("private");
    expect(declaration.isStatic).toBe(true);
  });
});

describe("property hooks", () => {
  // <?php
  // class C { public int $x { get => 1 ; set($value) { $y = $value; } } }
  const hooked = php(
    classDeclaration(
      "C",
      node("property_declaration", [
        visibility("public"),
        field("type", primitive("int")),
        element(v("x")),
        node("property_hook_list", [
          "{",
          node("property_hook", [name("get"), "=>", field("body", int("1")), ";"]),
          node("property_hook", [
            name("set"),
            params(node("simple_parameter", [field("name", v("value"))])),
            field("body", compound(stmt(assign(v("y"), v("value"))))),
          ]),
          "}",
        ]),
      ]),
    ),
  );

  test("hooks attach to the property from 8.4", () => {
    const result = mapBlueprint(hooked, "8.4");
    expect(result.diagnostics).toEqual([]);
    const [declaration] = nodesOfType(result.root, "PropertyDeclaration");
    expect(declaration.span.end.offset).toBe(74);
    expect(declaration.hooks.map((hook) => [hook.name.name, hook.parameters.map((parameter) => parameter.name.name), hook.body?.type])).toEqual([
      ["get", [], "IntegerLiteral"],
      ["set", ["value"], "Block"],
    ]);
    expect(declaration.hooks[1].span.start.offset).toBe(43);
    expect(declaration.hooks[1].span.end.offset).toBe(72);
  });

  test("hooks are dropped with a warning before 8.4", () => {
    const result = mapBlueprint(hooked, "8.3");
    const [declaration] = nodesOfType(result.root, "PropertyDeclaration");
    expect(declaration.hooks).toEqual([]);
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: property hooks: requires PHP 8.4 (active dialect 8.3)"]]);
    expect(result.diagnostics[0].span.start.offset).toBe(30);
    expect(result.diagnostics[0].span.end.offset).toBe(74);
  });
});

describe("readonly classes", () => {
  const readonlyClass = php(
    node("class_declaration", [
      readonlyModifier(),
      "class",
      field("name", name("P")),
      field(
        "body",
        node("declaration_list", [
          "{",
          property(visibility("public"), field("type", primitive("int")), element(v("x"))),
          method("__construct", params(node("property_promotion_parameter", [visibility("private"), field("type", primitive("int")), field("name", v("y"))])), visibility("public")),
          "}",
        ]),
      ),
    ]),
  );

  test("every property of a readonly class is readonly", () => {
    const result = mapBlueprint(readonlyClass, "8.2");
    expect(result.diagnostics).toEqual([]);
    const declaration = expectNode(result.root.statements[0], "ClassDeclaration");
    expect(declaration.modifiers).toEqual({ abstract: false, final: false, readonly: true });
    expect(nodesOfType(result.root, "PropertyDeclaration").map((property) => [property.name.name, property.readonly])).toEqual([
      ["x", true],
      ["y", true],
    ]);
    const [parameter] = nodesOfType(result.root, "Parameter");
    expect(parameter.readonly).toBe(true);
  });

  test("before 8.2 the class modifier is dropped", () => {
    const result = mapBlueprint(readonlyClass, "8.1");
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: readonly classes: requires PHP 8.2 (active dialect 8.1)"]]);
    expect(nodesOfType(result.root, "PropertyDeclaration").map((property) => property.readonly)).toEqual([false, false]);
  });
});

describe("class constants", () => {
  test("visibility before 7.1 falls back to public", () => {
    const result = mapBlueprint(php(classDeclaration("C", constant(visibility("private"), "const", constElement("X", int("1"))))), "7.0");
    const [declaration] = nodesOfType(result.root, "ClassConstantDeclaration");
    expect(declaration.visibility).toBe("public");
    expect(declaration.name.name).toBe("X");
    expect(declaration.value).toMatchObject({ type: "IntegerLiteral", value: 1 });
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: class constant visibility: requires PHP 7.1 (active dialect 7.0)"]]);
  });

  test("final and typed constants", () => {
    const blueprint = php(
      classDeclaration("C", constant(node("final_modifier", ["final"]), "const", field("type", primitive("string")), constElement("A", str("'a'")), ",", constElement("B", str("'b'")))),
    );
    const modern = nodesOfType(mapBlueprint(blueprint, "8.3").root, "ClassConstantDeclaration");
    expect(modern.map((declaration) => [declaration.name.name, declaration.isFinal, declaration.typeHint?.type])).toEqual([
      ["A", true, "BuiltinType"],
      ["B", true, "BuiltinType"],
    ]);

    const older = mapBlueprint(blueprint, "8.0");
    expect(nodesOfType(older.root, "ClassConstantDeclaration").map((declaration) => [declaration.isFinal, declaration.typeHint])).toEqual([
      [false, null],
      [false, null],
    ]);
    expect(summarize(older)).toEqual([
      ["warning", "dialect-mismatch", "mapper: final class constants: requires PHP 8.1 (active dialect 8.0)"],
      ["warning", "dialect-mismatch", "mapper: typed class constants: requires PHP 8.3 (active dialect 8.0)"],
    ]);
  });
});

describe("other declarations", () => {
  test("trait use lists its traits", () => {
    const result = mapBlueprint(php(classDeclaration("C", node("use_declaration", ["use", name("A"), ",", name("B"), ";"]))));
    const [use] = nodesOfType(result.root, "TraitUse");
    expect(use.traits.map((trait) => trait.value)).toEqual(["A", "B"]);
    expect(use.adaptations).toEqual([]);
  });

  test("trait adaptations resolve conflicts and alias methods", () => {
    // <?php
    // class C { use A , B { A::hello insteadof B ; hello as protected greet ; } }
    const useList = node("use_list", [
      "{",
      node("use_instead_of_clause", [node("class_constant_access_expression", [name("A"), "::", name("hello")], { sep: "" }), "insteadof", name("B")]),
      ";",
      node("use_as_clause", [name("hello"), "as", visibility("protected"), name("greet")]),
      ";",
      "}",
    ]);
    const result = mapBlueprint(php(classDeclaration("C", node("use_declaration", ["use", name("A"), ",", name("B"), useList]))));
    expect(result.diagnostics).toEqual([]);
    const [use] = nodesOfType(result.root, "TraitUse");
    expect(use.traits.map((trait) => trait.value)).toEqual(["A", "B"]);
    expect(use.adaptations).toHaveLength(2);
    const [precedence, alias] = use.adaptations;
    expect(precedence).toMatchObject({ type: "TraitPrecedence", trait: { value: "A" }, method: { name: "hello" } });
    expect(expectNode(precedence, "TraitPrecedence").insteadOf.map((trait) => trait.value)).toEqual(["B"]);
    expect(alias).toMatchObject({ type: "TraitAlias", trait: null, method: { name: "hello" }, visibility: "protected", alias: { name: "greet" } });
  });

  test("an insteadof clause needs a trait-qualified method", () => {
    const useList = node("use_list", ["{", node("use_instead_of_clause", [name("hello"), "insteadof", name("B")]), ";", "}"]);
    const result = mapBlueprint(php(classDeclaration("C", node("use_declaration", ["use", name("A"), useList]))));
    expect(nodesOfType(result.root, "UnknownMember")).toHaveLength(1);
    expect(summarize(result)).toEqual([["error", "malformed-node", "mapper: insteadof needs a Trait::method reference"]]);
  });

  test("interfaces extend several interfaces", () => {
    const result = mapBlueprint(
      php(
        node("interface_declaration", [
          "interface",
          field("name", name("I")),
          node("base_clause", ["extends", name("J"), ",", name("K")]),
          field("body", node("declaration_list", ["{", "}"])),
        ]),
      ),
    );
    const declaration = expectNode(result.root.statements[0], "InterfaceDeclaration");
    expect(declaration.name.name).toBe("I");
    expect(declaration.extends.map((parent) => parent.value)).toEqual(["J", "K"]);
  });

  test("a class keeps its parent and interfaces", () => {
    const result = mapBlueprint(
      php(
        node("class_declaration", [
          "class",
          field("name", name("C")),
          node("base_clause", ["extends", name("Base")]),
          node("class_interface_clause", ["implements", name("Countable"), ",", leaf("qualified_name", "\\Stringable")]),
          field("body", node("declaration_list", ["{", "}"])),
        ]),
      ),
    );
    const declaration = expectNode(result.root.statements[0], "ClassDeclaration");
    expect(declaration.extends?.value).toBe("Base");
    expect(declaration.implements.map((parent) => [parent.value, parent.resolution])).toEqual([
      ["Countable", "unqualified"],
      ["\\Stringable", "fully_qualified"],
    ]);
  });

  const suit = php(
    node("enum_declaration", [
      "enum",
      field("name", name("Suit")),
      ":",
      primitive("string"),
      field(
        "body",
        node("enum_declaration_list", ["{", node("enum_case", ["case", field("name", name("Hearts")), "=", field("value", str("'H'")), ";"]), "}"]),
      ),
    ]),
  );

  test("backed enums", () => {
    const result = mapBlueprint(suit, "8.1");
    expect(result.diagnostics).toEqual([]);
    const declaration = expectNode(result.root.statements[0], "EnumDeclaration");
    expect(declaration.backingType).toMatchObject({ type: "BuiltinType", name: "string" });
    const hearts = expectNode(declaration.members[0], "EnumCase");
    expect(hearts.name.name).toBe("Hearts");
    expect(hearts.value).toMatchObject({ type: "StringLiteral", value: "H" });
  });

  test("enums are rejected before 8.1", () => {
    const result = mapBlueprint(suit, "8.0");
    expect(expectNode(result.root.statements[0], "UnknownStatement").reason).toBe("dialect-mismatch");
    expect(summarize(result)).toEqual([["warning", "dialect-mismatch", "mapper: enumerations: requires PHP 8.1 (active dialect 8.0)"]]);
  });

  test("doc comments attach to the member after them", () => {
    const result = mapBlueprint(php(classDeclaration("C", leaf("comment", "/** Runs it. */"), method("run", params()))));
    const [run] = nodesOfType(result.root, "MethodDeclaration");
    expect(run.docComment).toBe("/** Runs it. */");
    expect(run.visibility).toBe("public");
  });

  test("anonymous classes", () => {
    const creation = node("object_creation_expression", [
      "new",
      node("anonymous_class", ["class", node("base_clause", ["extends", namedType("Base")]), node("declaration_list", ["{", "}"])]),
    ]);
    const statement = node("expression_statement", [creation, ";"], { sep: "" });

    const modern = mapBlueprint(php(statement), "7.0");
    const expression = expectNode(expectNode(modern.root.statements[0], "ExpressionStatement").expression, "AnonymousClass");
    expect(expression.extends?.value).toBe("Base");
    expect(expression.span.start.offset).toBe(6);

    const older = mapBlueprint(php(statement), "5.6");
    expect(expectNode(older.root.statements[0], "ExpressionStatement").expression.type).toBe("UnknownExpression");
    expect(summarize(older)).toEqual([["warning", "dialect-mismatch", "mapper: anonymous classes: requires PHP 7.0 (active dialect 5.6)"]]);
  });

  test("an unknown member kind becomes an UnknownMember", () => {
    const result = mapBlueprint(php(classDeclaration("C", leaf("frob_member", "??"))));
    const declaration = expectNode(result.root.statements[0], "ClassDeclaration");
    expect(declaration.members[0]).toMatchObject({ type: "UnknownMember", text: "??", reason: "unknown-kind" });
  });
});
