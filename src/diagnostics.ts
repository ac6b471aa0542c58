import type { ConstructId } from "./dialect/constructs";
import type { Span } from "./span";
import { trace, traceEnabled } from "./trace";

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticCode =
  | "syntax-error"
  | "missing-token"
  | "unknown-kind"
  | "unexpected-kind"
  | "malformed-node"
  | "dialect-mismatch"
  | "dialect-fallback";

export type Diagnostic = {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly construct?: ConstructId;
};

export type ReportingMode = "lenient" | "strict";

/**
 * Append-only log for a single mapping pass. Entries keep their insertion
 * order and are never removed or rewritten.
 */
export class DiagnosticsCollector {
  private readonly entries: Diagnostic[] = [];
  private readonly tracing: boolean;

  /** `tracing` defaults to the process-wide trace setting. */
  constructor(tracing: boolean = traceEnabled()) {
    this.tracing = tracing;
  }

  report(diagnostic: Diagnostic): void {
    this.entries.push(Object.freeze({ ...diagnostic }));
    trace(`${diagnostic.severity}[${diagnostic.code}] ${diagnostic.message}`, this.tracing);
  }

  warning(code: DiagnosticCode, message: string, span: Span, construct?: ConstructId): void {
    this.report(construct ? { severity: "warning", code, message, span, construct } : { severity: "warning", code, message, span });
  }

  error(code: DiagnosticCode, message: string, span: Span): void {
    this.report({ severity: "error", code, message, span });
  }

  get count(): number {
    return this.entries.length;
  }

  hasErrors(): boolean {
    return this.entries.some((entry) => entry.severity === "error");
  }

  all(): readonly Diagnostic[] {
    return Object.freeze(this.entries.slice());
  }
}

/** Strict mode treats any warning as a failure; lenient mode only errors. */
export function isAcceptable(result: { readonly diagnostics: readonly Diagnostic[] }, mode: ReportingMode): boolean {
  return result.diagnostics.every((diagnostic) => diagnostic.severity === "warning" && mode === "lenient");
}

export function formatDiagnostic(diagnostic: Diagnostic, origin?: string): string {
  const { start } = diagnostic.span;
  const location = `${origin ?? "<source>"}:${start.line}:${start.column}`;
  return `${location}: ${diagnostic.severity}[${diagnostic.code}]: ${diagnostic.message}`;
}

export function formatExpectedKind(kind: string): string {
  const trimmed = kind.trim();
  if (!trimmed) {
    return "token";
  }
  const isSymbol = /^[^A-Za-z0-9_]+$/.test(trimmed);
  if (trimmed.length === 1 || isSymbol) {
    return `'${trimmed}'`;
  }
  return trimmed.replace(/_/g, " ");
}
