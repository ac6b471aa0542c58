import { resolveMapperOptions } from "./config";
import type { MappingResult } from "./parser/mapper";
import { PhpParser } from "./parser/tree-sitter-loader";

export * as AST from "./ast";
export type { Node, NodeType, NodeCategory, Program, Statement, Expression, ClassMember, TypeHint, Declaration } from "./ast";
export { nodeCategory, isUnknownNode } from "./ast";
export { childNodes, findAll, findFirst, nodeAt, nodesOfType, traverse, NodePath } from "./ast-traversal";
export { structurallyEqual } from "./ast-equality";
export {
  DiagnosticsCollector,
  formatDiagnostic,
  isAcceptable,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSeverity,
  type ReportingMode,
} from "./diagnostics";
export { DIALECTS, LATEST_DIALECT, OLDEST_DIALECT, resolveDialect, type Dialect } from "./dialect/dialects";
export { DialectResolver, getDialectResolver } from "./dialect/resolver";
export { loadDialectTable, parseDialectTable } from "./dialect/table";
export { AMBIGUITY_IDS, CONSTRUCT_IDS, INTERPRETATIONS } from "./dialect/constructs";
export type { AmbiguityId, ConstructId, InterpretationChoice } from "./dialect/constructs";
export { compareSpans, createSpanTracker, formatSpan, spanContains, spansOverlap, type Position, type Span } from "./span";
export { resolveMapperOptions, type MapperOptions } from "./config";
export { setTraceEnabled } from "./trace";
export { ConcreteTreeContractError, DialectTableError, GrammarLoadError } from "./errors";
export type { ConcreteNode } from "./parser/concrete";
export { assertConcreteContract } from "./parser/contract";
export { GRAMMAR_KINDS, GRAMMAR_VERSION, isKnownKind } from "./parser/grammar-kinds";
export { mapConcreteTree, type MapOptions, type MappingResult } from "./parser/mapper";
export { fromTreeSitter } from "./parser/tree-sitter-adapter";
export { PhpParser, resolveGrammarWasm, type ParsedSource } from "./parser/tree-sitter-loader";

/**
 * Parses and maps one source string with the environment's options: the
 * dialect defaults to `PHP_AST_DIALECT`, then to the latest known dialect;
 * `PHP_AST_REPORTING` decides `acceptable`; `PHP_AST_TRACE` traces the pass.
 */
export async function mapSource(source: string, dialect?: string): Promise<MappingResult> {
  const options = resolveMapperOptions();
  const parser = await PhpParser.load({ wasmPath: options.grammarWasmPath });
  try {
    const { tree, ...result } = parser.map(source, {
      dialect: dialect ?? options.dialect,
      reporting: options.reporting,
      trace: options.trace,
    });
    tree.delete();
    return result;
  } finally {
    parser.delete();
  }
}
