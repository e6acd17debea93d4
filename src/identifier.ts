/**
 * Message-ID normalization and the heuristics derived from an identifier's text.
 */

export interface MessageIdentifier {
  /** Without enclosing angle brackets. */
  readonly bare: string;
  /** `<bare>` */
  readonly bracketed: string;
}

export function normalizeIdentifier(raw: string): MessageIdentifier {
  let bare = raw.trim();
  if (bare.startsWith("<") && bare.endsWith(">") && bare.length >= 2) {
    bare = bare.slice(1, -1).trim();
  }
  return Object.freeze({ bare, bracketed: `<${bare}>` });
}

export function identifiersEqual(a: MessageIdentifier, b: MessageIdentifier): boolean {
  return a.bare === b.bare;
}

const EMBEDDED_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})[.\-@]/;

/**
 * Leading `YYYYMMDDHHMMSS` followed by `.`, `-` or `@`, as some mailers generate.
 * Read on the UTC calendar; no timezone conversion is applied.
 */
export function extractTimestamp(id: MessageIdentifier): Date | undefined {
  const m = EMBEDDED_TIMESTAMP.exec(id.bare);
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1).map((part) => parseInt(part, 10));
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  const ts = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls overflowing fields over (month 13, Feb 30); reject those.
  if (ts.getUTCFullYear() !== year || ts.getUTCMonth() !== month - 1 || ts.getUTCDate() !== day) {
    return undefined;
  }
  return ts;
}

export type DomainHintExtractor = (id: MessageIdentifier) => string | undefined;

/**
 * Hint extractor for a fixed list of sender domains: returns the first domain
 * that appears as `@domain` inside the identifier.
 */
export function createDomainHintExtractor(domains: readonly string[]): DomainHintExtractor {
  const normalized = domains.map((d) => d.trim().toLowerCase().replace(/^@/, "")).filter(Boolean);
  return (id) => {
    const haystack = id.bare.toLowerCase();
    return normalized.find((domain) => haystack.includes(`@${domain}`));
  };
}

export const noDomainHint: DomainHintExtractor = () => undefined;

/** One identifier per line; blank lines ignored. */
export function parseIdentifierLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}
