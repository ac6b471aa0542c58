import type { Node } from "./ast";

/**
 * Structural equality: same node kinds, same fields, same children, compared
 * recursively. Spans are ignored so formatting-only differences compare equal.
 */
export function structurallyEqual(a: Node, b: Node): boolean {
  return valuesEqual(a, b);
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!valuesEqual(a[i], b[i])) return false;
    }
    return true;
  }
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false;
  }
  const aKeys = comparableKeys(a);
  const bKeys = comparableKeys(b);
  if (aKeys.length !== bKeys.length) return false;
  for (const key of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!valuesEqual(Reflect.get(a, key), Reflect.get(b, key))) return false;
  }
  return true;
}

function comparableKeys(value: object): string[] {
  return Object.keys(value).filter((key) => key !== "span");
}
