// Failures that escape a mapping pass. Recoverable input problems never use these;
// they are reported through the diagnostics sequence instead.

export class ConcreteTreeContractError extends Error {
  readonly kind?: string;
  readonly startIndex?: number;
  readonly endIndex?: number;

  constructor(message: string, node?: { kind: string; startIndex: number; endIndex: number }) {
    super(message);
    this.name = "ConcreteTreeContractError";
    if (node) {
      this.kind = node.kind;
      this.startIndex = node.startIndex;
      this.endIndex = node.endIndex;
    }
  }
}

export class DialectTableError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = "DialectTableError";
    this.path = path;
  }
}

export class GrammarLoadError extends Error {
  readonly wasmPath?: string;

  constructor(message: string, wasmPath?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GrammarLoadError";
    this.wasmPath = wasmPath;
  }
}
