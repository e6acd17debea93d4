import { extractTimestamp, type MessageIdentifier } from "./identifier.js";
import type { Logger } from "./logger.js";
import { buildTimeWindow } from "./query.js";
import { describeCriteria, type MailSession } from "./session.js";

export interface TimeWindowOptions {
  senderDomainHint?: string;
  logger: Logger;
}

export interface TimeWindowMatch {
  seq: number;
  /** Size of the pool that was verified, after any sender filtering. */
  poolSize: number;
}

/**
 * Parse a raw header block into lowercased name -> value, unfolding
 * continuation lines. The first occurrence of a header wins.
 */
export function parseHeaderBlock(raw: string): Map<string, string> {
  const headers = new Map<string, string>();
  let current: { name: string; value: string } | undefined;
  const flush = (): void => {
    if (current && !headers.has(current.name)) headers.set(current.name, current.value.trim());
    current = undefined;
  };
  for (const line of raw.split(/\r?\n/)) {
    if (/^[ \t]/.test(line) && current) {
      current.value += ` ${line.trim()}`;
      continue;
    }
    flush();
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    current = { name: line.slice(0, colon).trim().toLowerCase(), value: line.slice(colon + 1) };
  }
  flush();
  return headers;
}

async function filterBySender(
  session: MailSession,
  candidates: number[],
  hint: string,
  logger: Logger
): Promise<number[]> {
  const needle = hint.toLowerCase();
  const filtered: number[] = [];
  for (const seq of candidates) {
    const outcome = await session.fetchHeaders(seq, ["from"]);
    if (!outcome.ok) {
      logger.debug({ seq, err: outcome.error.message }, "sender header fetch failed");
      continue;
    }
    const from = parseHeaderBlock(outcome.value).get("from") ?? "";
    if (from.toLowerCase().includes(needle)) filtered.push(seq);
  }
  return filtered;
}

/**
 * TimeWindowMatch tier: candidates delivered within a day of the identifier's
 * embedded timestamp, verified against their raw Message-ID header.
 */
export async function scanTimeWindow(
  session: MailSession,
  id: MessageIdentifier,
  options: TimeWindowOptions
): Promise<TimeWindowMatch | undefined> {
  const { logger, senderDomainHint } = options;
  const ts = extractTimestamp(id);
  if (!ts) return undefined;

  const window = buildTimeWindow(ts);
  const outcome = await session.search(window);
  if (!outcome.ok) {
    logger.debug({ request: describeCriteria(window), err: outcome.error.message }, "time window search failed");
    return undefined;
  }
  const candidates = outcome.value;
  if (candidates.length === 0) return undefined;

  let pool = candidates;
  if (senderDomainHint) {
    const filtered = await filterBySender(session, candidates, senderDomainHint, logger);
    // An empty filter result means the hint was wrong, not that the message is absent.
    if (filtered.length > 0) pool = filtered;
  }

  for (const seq of pool) {
    const header = await session.fetchHeaders(seq, ["message-id"]);
    if (!header.ok) {
      logger.debug({ seq, err: header.error.message }, "message-id header fetch failed");
      continue;
    }
    if (header.value.includes(id.bare) || header.value.includes(id.bracketed)) {
      return { seq, poolSize: pool.length };
    }
  }
  return undefined;
}
