export const DIALECTS = ["5.6", "7.0", "7.1", "7.2", "7.3", "7.4", "8.0", "8.1", "8.2", "8.3", "8.4"] as const;

export type Dialect = (typeof DIALECTS)[number];

export const OLDEST_DIALECT: Dialect = DIALECTS[0];
export const LATEST_DIALECT: Dialect = DIALECTS[DIALECTS.length - 1];

export type DialectResolution = {
  dialect: Dialect;
  /** Set when the requested tag was not a known dialect and a fallback was chosen. */
  fallbackFrom?: string;
};

export function isDialect(value: string): value is Dialect {
  return (DIALECTS as readonly string[]).includes(value);
}

export function dialectIndex(dialect: Dialect): number {
  return DIALECTS.indexOf(dialect);
}

export function compareDialects(a: Dialect, b: Dialect): number {
  return dialectIndex(a) - dialectIndex(b);
}

export function dialectAtLeast(dialect: Dialect, minimum: Dialect): boolean {
  return compareDialects(dialect, minimum) >= 0;
}

/**
 * Normalizes a version tag ("8", "8.1", "8.1.12", "php8.2") to a known dialect.
 * Tags past the newest dialect, or ones that do not parse, resolve to the newest;
 * tags before the oldest resolve to the oldest.
 */
export function resolveDialect(tag: string | undefined): DialectResolution {
  if (tag === undefined) {
    return { dialect: LATEST_DIALECT };
  }
  const raw = tag.trim();
  const match = /^(?:php)?\s*(\d+)(?:\.(\d+))?(?:\.\d+)*$/i.exec(raw);
  if (!match) {
    return { dialect: LATEST_DIALECT, fallbackFrom: tag };
  }
  const major = Number.parseInt(match[1], 10);
  const minor = match[2] === undefined ? 0 : Number.parseInt(match[2], 10);
  const normalized = `${major}.${minor}`;
  if (isDialect(normalized)) {
    return { dialect: normalized };
  }
  const oldest = parseVersion(OLDEST_DIALECT);
  if (major < oldest.major || (major === oldest.major && minor < oldest.minor)) {
    return { dialect: OLDEST_DIALECT, fallbackFrom: tag };
  }
  return { dialect: LATEST_DIALECT, fallbackFrom: tag };
}

function parseVersion(dialect: Dialect): { major: number; minor: number } {
  const [major, minor] = dialect.split(".");
  return { major: Number.parseInt(major, 10), minor: Number.parseInt(minor, 10) };
}
