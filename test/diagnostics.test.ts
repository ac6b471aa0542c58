import { describe, expect, test } from "vitest";

import { resolveReportingMode } from "../src/config";
import { DiagnosticsCollector, formatDiagnostic, formatExpectedKind, isAcceptable } from "../src/diagnostics";
import { createSpanTracker } from "../src/span";

const spans = createSpanTracker("<?php\n$a = 1;\n");

describe("diagnostics collector", () => {
  test("keeps insertion order and severities", () => {
    const collector = new DiagnosticsCollector();
    collector.warning("dialect-mismatch", "first", spans.span(6, 8), "readonly_properties");
    collector.error("syntax-error", "second", spans.span(9, 10));
    expect(collector.count).toBe(2);
    expect(collector.hasErrors()).toBe(true);
    expect(collector.all().map((entry) => [entry.severity, entry.code, entry.message, entry.construct])).toEqual([
      ["warning", "dialect-mismatch", "first", "readonly_properties"],
      ["error", "syntax-error", "second", undefined],
    ]);
  });

  test("snapshots are frozen and unaffected by later entries", () => {
    const collector = new DiagnosticsCollector();
    collector.warning("unknown-kind", "one", spans.zeroWidth(0));
    const snapshot = collector.all();
    collector.warning("unknown-kind", "two", spans.zeroWidth(0));
    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  test("formats with origin, line and column", () => {
    const collector = new DiagnosticsCollector();
    collector.error("missing-token", "parser: expected ';'", spans.zeroWidth(12));
    expect(formatDiagnostic(collector.all()[0], "index.php")).toBe("index.php:2:7: error[missing-token]: parser: expected ';'");
    expect(formatDiagnostic(collector.all()[0])).toBe("<source>:2:7: error[missing-token]: parser: expected ';'");
  });
});

describe("reporting modes", () => {
  const warning = new DiagnosticsCollector();
  warning.warning("dialect-mismatch", "w", spans.zeroWidth(0));
  const error = new DiagnosticsCollector();
  error.error("syntax-error", "e", spans.zeroWidth(0));

  test("lenient accepts warnings but not errors", () => {
    expect(isAcceptable({ diagnostics: [] }, "lenient")).toBe(true);
    expect(isAcceptable({ diagnostics: warning.all() }, "lenient")).toBe(true);
    expect(isAcceptable({ diagnostics: error.all() }, "lenient")).toBe(false);
  });

  test("strict rejects any diagnostic", () => {
    expect(isAcceptable({ diagnostics: [] }, "strict")).toBe(true);
    expect(isAcceptable({ diagnostics: warning.all() }, "strict")).toBe(false);
  });

  test("mode names resolve with aliases", () => {
    expect(resolveReportingMode(undefined)).toBe("lenient");
    expect(resolveReportingMode(" Strict ")).toBe("strict");
    expect(resolveReportingMode("error")).toBe("strict");
    expect(resolveReportingMode("warn")).toBe("lenient");
  });
});

describe("formatExpectedKind", () => {
  test("quotes symbols and spells out named kinds", () => {
    expect(formatExpectedKind(";")).toBe("';'");
    expect(formatExpectedKind("=>")).toBe("'=>'");
    expect(formatExpectedKind("variable_name")).toBe("variable name");
    expect(formatExpectedKind("  ")).toBe("token");
  });
});
