import * as AST from "../ast";
import type { Program, Statement } from "../ast";
import { DiagnosticsCollector, formatExpectedKind, isAcceptable, type Diagnostic, type ReportingMode } from "../diagnostics";
import { resolveDialect, type Dialect } from "../dialect/dialects";
import { getDialectResolver, type DialectResolver } from "../dialect/resolver";
import { createSpanTracker } from "../span";
import { trace, traceEnabled } from "../trace";
import { registerCallMappers } from "./calls";
import { registerClassMappers } from "./classes";
import { isErrorNode, isIgnorableNode, walkConcrete, type ConcreteNode } from "./concrete";
import { assertConcreteContract } from "./contract";
import { registerControlFlowMappers } from "./control-flow";
import { registerExpressionMappers } from "./expressions";
import { registerFunctionMappers } from "./functions";
import { registerModifierMappers } from "./modifiers";
import { createMapperContext, isErrorReported, markErrorReported, spanOf, type MapperContext } from "./shared";
import { registerStatementMappers } from "./statements";
import { registerTypeMappers } from "./types";

export type MapOptions = {
  /** Dialect tag such as "8.1" or "7.4.33". Defaults to the latest known dialect. */
  dialect?: string;
  /** File name used in trace output and by callers formatting diagnostics. */
  origin?: string;
  /** Decides `acceptable` on the result. Defaults to lenient. */
  reporting?: ReportingMode;
  /** Trace this pass; defaults to the process-wide setting. */
  trace?: boolean;
  resolver?: DialectResolver;
};

export type MappingResult = {
  readonly root: Program;
  readonly diagnostics: readonly Diagnostic[];
  readonly dialect: Dialect;
  readonly reporting: ReportingMode;
  /** False on any error, and in strict reporting on any warning too. */
  readonly acceptable: boolean;
  readonly origin?: string;
};

/**
 * Maps one concrete tree into a frozen Program. Input problems are reported
 * as diagnostics; only a broken concrete tree throws.
 */
export function mapConcreteTree(root: ConcreteNode, source: string, options: MapOptions = {}): MappingResult {
  assertConcreteContract(root, source.length);

  const spans = createSpanTracker(source);
  const tracing = options.trace ?? traceEnabled();
  const reporting = options.reporting ?? "lenient";
  const diagnostics = new DiagnosticsCollector(tracing);
  const resolution = resolveDialect(options.dialect);
  if (resolution.fallbackFrom !== undefined) {
    diagnostics.warning(
      "dialect-fallback",
      `mapper: unknown dialect '${resolution.fallbackFrom}', using ${resolution.dialect}`,
      spans.zeroWidth(0),
    );
  }

  const ctx = createMapperContext({
    source,
    dialect: resolution.dialect,
    resolver: options.resolver ?? getDialectResolver(),
    spans,
    diagnostics,
  });
  registerTypeMappers(ctx);
  registerModifierMappers(ctx);
  registerFunctionMappers(ctx);
  registerCallMappers(ctx);
  registerClassMappers(ctx);
  registerExpressionMappers(ctx);
  registerControlFlowMappers(ctx);
  registerStatementMappers(ctx);

  const statements: Statement[] = [];
  for (const child of root.children()) {
    if (isIgnorableNode(child)) continue;
    if (!child.isNamed && !isErrorNode(child)) continue;
    statements.push(...ctx.mapStatement(child));
  }
  const program = AST.program(spans.span(root.startIndex, root.endIndex), statements);

  reportUnvisitedProblems(ctx, root);

  trace(
    `mapped ${options.origin ?? "<source>"}: ${statements.length} statement(s), ${diagnostics.count} diagnostic(s), dialect ${resolution.dialect}`,
    tracing,
  );
  const recorded = diagnostics.all();
  return {
    root: deepFreeze(program),
    diagnostics: recorded,
    dialect: resolution.dialect,
    reporting,
    acceptable: isAcceptable({ diagnostics: recorded }, reporting),
    ...(options.origin !== undefined ? { origin: options.origin } : {}),
  };
}

/**
 * Error nodes the walk never reached (inside a construct that was rejected
 * or dropped) and every missing token.
 */
function reportUnvisitedProblems(ctx: MapperContext, root: ConcreteNode): void {
  walkConcrete(root, (node) => {
    if (isErrorNode(node)) {
      if (!isErrorReported(ctx, node)) {
        ctx.diagnostics.error("syntax-error", "parser: syntax error", spanOf(ctx, node));
        markErrorReported(ctx, node);
      }
      return false;
    }
    if (node.isMissing) {
      ctx.diagnostics.error("missing-token", `parser: expected ${formatExpectedKind(node.kind)}`, spanOf(ctx, node));
    }
    return true;
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Reflect.ownKeys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
