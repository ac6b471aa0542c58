import { DialectTableError } from "../errors";
import type { AmbiguityId, ConstructId, InterpretationChoice } from "./constructs";
import { compareDialects, dialectAtLeast, type Dialect } from "./dialects";
import { loadDialectTable, type AmbiguityCandidate, type ConstructRule, type DialectTable } from "./table";

/**
 * Answers version questions for the mapper. Holds no per-pass state, so one
 * instance is shared by every pass in the process.
 */
export class DialectResolver {
  private readonly table: DialectTable;

  constructor(table: DialectTable) {
    this.table = table;
  }

  constructInfo(construct: ConstructId): ConstructRule {
    const rule = this.table.constructs.get(construct);
    if (!rule) {
      throw new DialectTableError(`dialect table: missing construct '${construct}'`);
    }
    return rule;
  }

  isConstructEnabled(construct: ConstructId, dialect: Dialect): boolean {
    const rule = this.constructInfo(construct);
    if (!dialectAtLeast(dialect, rule.since)) return false;
    return rule.removedIn === undefined || compareDialects(dialect, rule.removedIn) < 0;
  }

  /** Candidates are tried in table order; the first one valid in the dialect wins. */
  resolveAmbiguity(ambiguity: AmbiguityId, dialect: Dialect): InterpretationChoice {
    const candidates = this.table.ambiguities.get(ambiguity);
    if (!candidates || candidates.length === 0) {
      throw new DialectTableError(`dialect table: missing ambiguity '${ambiguity}'`);
    }
    for (const candidate of candidates) {
      if (candidateApplies(candidate, dialect)) {
        return candidate.interpretation;
      }
    }
    return candidates[candidates.length - 1].interpretation;
  }

  /** Short human description of why a construct is unavailable in a dialect. */
  describeMismatch(construct: ConstructId, dialect: Dialect): string {
    const rule = this.constructInfo(construct);
    if (rule.removedIn !== undefined && dialectAtLeast(dialect, rule.removedIn)) {
      return `${rule.label}: removed in PHP ${rule.removedIn} (active dialect ${dialect})`;
    }
    return `${rule.label}: requires PHP ${rule.since} (active dialect ${dialect})`;
  }
}

function candidateApplies(candidate: AmbiguityCandidate, dialect: Dialect): boolean {
  if (candidate.since !== undefined && !dialectAtLeast(dialect, candidate.since)) return false;
  if (candidate.until !== undefined && dialectAtLeast(dialect, candidate.until)) return false;
  return true;
}

let defaultResolver: DialectResolver | null = null;

export function getDialectResolver(): DialectResolver {
  if (!defaultResolver) {
    defaultResolver = new DialectResolver(loadDialectTable());
  }
  return defaultResolver;
}
