import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import path from "node:path";
import type { Language, Parser, Tree } from "web-tree-sitter";
import { resolveMapperOptions } from "../config";
import { GrammarLoadError } from "../errors";
import { trace } from "../trace";
import { mapConcreteTree, type MapOptions, type MappingResult } from "./mapper";
import { fromTreeSitter } from "./tree-sitter-adapter";

const WASM_FILE = "tree-sitter-php.wasm";

/** Grammar location: `PHP_AST_GRAMMAR_WASM`, else the installed tree-sitter-php package. */
export function resolveGrammarWasm(explicitPath?: string): string {
  const configured = explicitPath ?? resolveMapperOptions().grammarWasmPath;
  if (configured) return path.resolve(configured);
  const require = createRequire(import.meta.url);
  let packageJson: string;
  try {
    packageJson = require.resolve("tree-sitter-php/package.json");
  } catch (error) {
    throw new GrammarLoadError("grammar: the tree-sitter-php package is not installed", undefined, { cause: error });
  }
  return path.join(path.dirname(packageJson), WASM_FILE);
}

let languagePromise: Promise<Language> | null = null;
let languagePath: string | null = null;

async function loadLanguage(wasmPath: string): Promise<Language> {
  if (!existsSync(wasmPath)) {
    throw new GrammarLoadError(`grammar: ${wasmPath} does not exist`, wasmPath);
  }
  try {
    const { Parser, Language } = await import("web-tree-sitter");
    await Parser.init();
    const language = await Language.load(wasmPath);
    trace(`loaded grammar ${wasmPath}`);
    return language;
  } catch (error) {
    throw new GrammarLoadError(`grammar: failed to load ${wasmPath}`, wasmPath, { cause: error });
  }
}

function cachedLanguage(wasmPath: string): Promise<Language> {
  if (!languagePromise || languagePath !== wasmPath) {
    languagePath = wasmPath;
    languagePromise = loadLanguage(wasmPath).catch((error: unknown) => {
      // a failed load is not cached; the next call retries
      languagePromise = null;
      languagePath = null;
      throw error;
    });
  }
  return languagePromise;
}

export type ParsedSource = MappingResult & {
  /** Keep this for incremental reparsing after `tree.edit(...)`. */
  readonly tree: Tree;
};

/**
 * A web-tree-sitter parser bound to the PHP grammar. The grammar is loaded once
 * per process and shared between instances.
 */
export class PhpParser {
  private readonly parser: Parser;

  private constructor(parser: Parser) {
    this.parser = parser;
  }

  static async load(options: { wasmPath?: string } = {}): Promise<PhpParser> {
    const language = await cachedLanguage(resolveGrammarWasm(options.wasmPath));
    const { Parser } = await import("web-tree-sitter");
    const parser = new Parser();
    parser.setLanguage(language);
    return new PhpParser(parser);
  }

  parse(source: string, previousTree?: Tree): Tree {
    const tree = this.parser.parse(source, previousTree ?? null);
    if (!tree) {
      throw new GrammarLoadError("grammar: the parser returned no tree");
    }
    return tree;
  }

  /** `options` is a dialect tag or the full mapping options. */
  map(source: string, options: string | MapOptions = {}, previousTree?: Tree): ParsedSource {
    const tree = this.parse(source, previousTree);
    const result = mapConcreteTree(fromTreeSitter(tree.rootNode), source, typeof options === "string" ? { dialect: options } : options);
    return { ...result, tree };
  }

  delete(): void {
    this.parser.delete();
  }
}
