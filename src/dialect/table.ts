import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { parse as parseYAML } from "yaml";

import { DialectTableError } from "../errors";
import {
  AMBIGUITY_IDS,
  CONSTRUCT_IDS,
  isAmbiguityId,
  isConstructId,
  isInterpretation,
  type AmbiguityId,
  type ConstructId,
  type ConstructPolicy,
  type InterpretationChoice,
} from "./constructs";
import { compareDialects, isDialect, type Dialect } from "./dialects";

export type ConstructRule = {
  readonly since: Dialect;
  readonly removedIn?: Dialect;
  readonly policy: ConstructPolicy;
  readonly label: string;
};

export type AmbiguityCandidate = {
  readonly interpretation: InterpretationChoice;
  readonly since?: Dialect;
  readonly until?: Dialect;
};

export type DialectTable = {
  readonly constructs: ReadonlyMap<ConstructId, ConstructRule>;
  readonly ambiguities: ReadonlyMap<AmbiguityId, readonly AmbiguityCandidate[]>;
};

export const DEFAULT_TABLE_PATH = fileURLToPath(new URL("../../data/dialects.yaml", import.meta.url));

export function loadDialectTable(tablePath: string = DEFAULT_TABLE_PATH): DialectTable {
  let text: string;
  try {
    text = fs.readFileSync(tablePath, "utf8");
  } catch (error) {
    throw new DialectTableError(`dialect table: cannot read ${tablePath}: ${String(error)}`, tablePath);
  }
  return parseDialectTable(text, tablePath);
}

export function parseDialectTable(text: string, origin?: string): DialectTable {
  let raw: unknown;
  try {
    raw = parseYAML(text);
  } catch (error) {
    throw new DialectTableError(`dialect table: invalid YAML: ${String(error)}`, origin);
  }
  if (!isRecord(raw)) {
    throw new DialectTableError("dialect table: expected a mapping at the top level", origin);
  }
  const constructs = parseConstructs(raw.constructs, origin);
  const ambiguities = parseAmbiguities(raw.ambiguities, origin);
  return Object.freeze({ constructs, ambiguities });
}

function parseConstructs(raw: unknown, origin?: string): ReadonlyMap<ConstructId, ConstructRule> {
  if (!isRecord(raw)) {
    throw new DialectTableError("dialect table: 'constructs' must be a mapping", origin);
  }
  const rules = new Map<ConstructId, ConstructRule>();
  for (const [key, value] of Object.entries(raw)) {
    if (!isConstructId(key)) {
      throw new DialectTableError(`dialect table: unknown construct '${key}'`, origin);
    }
    if (!isRecord(value)) {
      throw new DialectTableError(`dialect table: construct '${key}' must be a mapping`, origin);
    }
    const since = expectDialect(value.since, `${key}.since`, origin);
    const removedIn = value.removedIn === undefined ? undefined : expectDialect(value.removedIn, `${key}.removedIn`, origin);
    if (removedIn && compareDialects(removedIn, since) <= 0) {
      throw new DialectTableError(`dialect table: construct '${key}' is removed before it is introduced`, origin);
    }
    const policy = value.policy;
    if (policy !== "downgrade" && policy !== "reject") {
      throw new DialectTableError(`dialect table: construct '${key}' has invalid policy ${String(policy)}`, origin);
    }
    const label = typeof value.label === "string" && value.label.trim() ? value.label.trim() : key.replace(/_/g, " ");
    rules.set(key, Object.freeze(removedIn ? { since, removedIn, policy, label } : { since, policy, label }));
  }
  requireAll(rules, CONSTRUCT_IDS, "construct", origin);
  return rules;
}

function parseAmbiguities(raw: unknown, origin?: string): ReadonlyMap<AmbiguityId, readonly AmbiguityCandidate[]> {
  if (!isRecord(raw)) {
    throw new DialectTableError("dialect table: 'ambiguities' must be a mapping", origin);
  }
  const rules = new Map<AmbiguityId, readonly AmbiguityCandidate[]>();
  for (const [key, value] of Object.entries(raw)) {
    if (!isAmbiguityId(key)) {
      throw new DialectTableError(`dialect table: unknown ambiguity '${key}'`, origin);
    }
    if (!Array.isArray(value) || value.length === 0) {
      throw new DialectTableError(`dialect table: ambiguity '${key}' needs at least one candidate`, origin);
    }
    const candidates = value.map((entry, index): AmbiguityCandidate => {
      if (!isRecord(entry) || typeof entry.interpretation !== "string" || !isInterpretation(entry.interpretation)) {
        throw new DialectTableError(`dialect table: ambiguity '${key}' candidate ${index} has no valid interpretation`, origin);
      }
      const since = entry.since === undefined ? undefined : expectDialect(entry.since, `${key}[${index}].since`, origin);
      const until = entry.until === undefined ? undefined : expectDialect(entry.until, `${key}[${index}].until`, origin);
      return Object.freeze({ interpretation: entry.interpretation, since, until });
    });
    // The last candidate is the fallback and must be valid in every dialect.
    const last = candidates[candidates.length - 1];
    if (last.since !== undefined || last.until !== undefined) {
      throw new DialectTableError(`dialect table: ambiguity '${key}' has no unconditional fallback candidate`, origin);
    }
    rules.set(key, Object.freeze(candidates));
  }
  requireAll(rules, AMBIGUITY_IDS, "ambiguity", origin);
  return rules;
}

function requireAll<K extends string>(entries: ReadonlyMap<K, unknown>, keys: readonly K[], label: string, origin?: string): void {
  for (const key of keys) {
    if (!entries.has(key)) {
      throw new DialectTableError(`dialect table: missing ${label} '${key}'`, origin);
    }
  }
}

function expectDialect(value: unknown, where: string, origin?: string): Dialect {
  const text = typeof value === "number" ? value.toFixed(1) : value;
  if (typeof text !== "string" || !isDialect(text)) {
    throw new DialectTableError(`dialect table: ${where} is not a known dialect (${String(value)})`, origin);
  }
  return text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
