import type { ReportingMode } from "./diagnostics";

export type MapperOptions = {
  /** Requested dialect tag, e.g. "8.1". Absent means the latest known dialect. */
  dialect?: string;
  reporting: ReportingMode;
  trace: boolean;
  grammarWasmPath?: string;
};

type Env = Record<string, string | undefined>;

export function resolveMapperOptions(env: Env = process.env): MapperOptions {
  const dialect = env.PHP_AST_DIALECT?.trim();
  const grammarWasmPath = env.PHP_AST_GRAMMAR_WASM?.trim();
  return {
    dialect: dialect ? dialect : undefined,
    reporting: resolveReportingMode(env.PHP_AST_REPORTING),
    trace: resolveTraceFlag(env.PHP_AST_TRACE),
    grammarWasmPath: grammarWasmPath ? grammarWasmPath : undefined,
  };
}

export function resolveTraceFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const normalized = raw.trim().toLowerCase();
  return !(normalized === "" || normalized === "0" || normalized === "off" || normalized === "false");
}

export function resolveReportingMode(raw: string | undefined): ReportingMode {
  if (raw === undefined) return "lenient";
  const normalized = raw.trim().toLowerCase();
  if (normalized === "strict" || normalized === "error" || normalized === "errors" || normalized === "1" || normalized === "true") {
    return "strict";
  }
  return "lenient";
}
