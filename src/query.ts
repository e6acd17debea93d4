import type { MessageIdentifier } from "./identifier.js";
import type { Logger } from "./logger.js";
import {
  describeCriteria,
  type HeaderField,
  type MailSession,
  type SearchCriteria,
  type SearchEncoding,
} from "./session.js";

export enum SearchTier {
  ExactHeaderMatch = "ExactHeaderMatch",
  ReferenceChainMatch = "ReferenceChainMatch",
  TimeWindowMatch = "TimeWindowMatch",
}

export interface HeaderQuery {
  tier: SearchTier.ExactHeaderMatch | SearchTier.ReferenceChainMatch;
  field: HeaderField;
  value: string;
}

export interface HeaderTierMatch {
  tier: SearchTier;
  criteria: SearchCriteria;
  seqs: number[];
}

const TIER_FIELDS: ReadonlyArray<[HeaderQuery["tier"], readonly HeaderField[]]> = [
  // Servers disagree on header-name case sensitivity, so both spellings are tried.
  [SearchTier.ExactHeaderMatch, ["Message-ID", "Message-Id"]],
  [SearchTier.ReferenceChainMatch, ["References", "In-Reply-To"]],
];

const ENCODINGS: readonly SearchEncoding[] = ["structured", "quoted"];

/** Ordered logical queries for the two header tiers. */
export function buildHeaderQueries(id: MessageIdentifier): HeaderQuery[] {
  const queries: HeaderQuery[] = [];
  for (const [tier, fields] of TIER_FIELDS) {
    for (const field of fields) {
      for (const value of [id.bracketed, id.bare]) {
        queries.push({ tier, field, value });
      }
    }
  }
  return queries;
}

/** One remote request per attempt: every logical query in both encodings. */
export function buildHeaderAttempts(id: MessageIdentifier): Array<{ tier: HeaderQuery["tier"]; criteria: SearchCriteria }> {
  return buildHeaderQueries(id).flatMap((q) =>
    ENCODINGS.map((encoding) => ({
      tier: q.tier,
      criteria: { kind: "header" as const, field: q.field, value: q.value, encoding },
    }))
  );
}

/**
 * Run ExactHeaderMatch then ReferenceChainMatch in the selected mailbox,
 * stopping at the first attempt that returns anything.
 */
export async function runHeaderTiers(
  session: MailSession,
  id: MessageIdentifier,
  logger: Logger
): Promise<HeaderTierMatch | undefined> {
  for (const attempt of buildHeaderAttempts(id)) {
    const outcome = await session.search(attempt.criteria);
    if (!outcome.ok) {
      logger.debug(
        { request: describeCriteria(attempt.criteria), err: outcome.error.message },
        "search attempt failed"
      );
      continue;
    }
    if (outcome.value.length > 0) {
      return { tier: attempt.tier, criteria: attempt.criteria, seqs: outcome.value };
    }
  }
  return undefined;
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const DAY_MS = 24 * 60 * 60 * 1000;

/** `DD-Mon-YYYY` on the UTC calendar. */
export function formatImapDate(d: Date): string {
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${day}-${MONTHS[d.getUTCMonth()]}-${d.getUTCFullYear()}`;
}

const IMAP_DATE = /^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/;

/** Inverse of formatImapDate; midnight UTC. */
export function parseImapDate(value: string): Date | undefined {
  const m = IMAP_DATE.exec(value);
  if (!m) return undefined;
  const month = MONTHS.findIndex((name) => name.toLowerCase() === m[2].toLowerCase());
  if (month < 0) return undefined;
  return new Date(Date.UTC(parseInt(m[3], 10), month, parseInt(m[1], 10)));
}

/** Date-range criteria spanning one calendar day either side of the timestamp. */
export function buildTimeWindow(ts: Date): SearchCriteria & { kind: "dateRange" } {
  return {
    kind: "dateRange",
    since: formatImapDate(new Date(ts.getTime() - DAY_MS)),
    before: formatImapDate(new Date(ts.getTime() + DAY_MS)),
  };
}
