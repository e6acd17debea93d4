/**
 * Mailbox scan orchestration for Message-ID resolution.
 *
 * For one identifier: build a scan plan, then visit mailboxes one at a time.
 * Each selected mailbox runs the header tiers and then the time-window tier;
 * the first match in plan order ends the scan. Selection and search failures
 * are contained to their mailbox or attempt. A TransportError propagates and
 * aborts the run.
 */

import { noDomainHint, normalizeIdentifier, type DomainHintExtractor, type MessageIdentifier } from "./identifier.js";
import defaultLogger, { type Logger } from "./logger.js";
import { buildScanPlan } from "./plan.js";
import { runHeaderTiers, SearchTier } from "./query.js";
import {
  buildHeaderSnapshot,
  matchedResult,
  unmatchedResult,
  type ResolutionResult,
  type SkippedMailbox,
} from "./result.js";
import { scanTimeWindow } from "./scanner.js";
import type { MailboxDescriptor, MailSession } from "./session.js";

export interface ResolveOptions {
  /** Names visited right after the active mailbox. */
  priorityMailboxes: readonly string[];
  /** Restrict the scan to these mailboxes. */
  mailboxes?: readonly string[];
  /** Explicit sender-domain hint; takes precedence over hintExtractor. */
  senderDomainHint?: string;
  hintExtractor?: DomainHintExtractor;
  /** Characters of body text to include in the snapshot; omit for none. */
  bodyPreviewLength?: number;
  logger?: Logger;
}

type MailboxMatch = { tier: SearchTier; seq: number };

async function scanSelectedMailbox(
  session: MailSession,
  id: MessageIdentifier,
  senderDomainHint: string | undefined,
  logger: Logger
): Promise<MailboxMatch | undefined> {
  const header = await runHeaderTiers(session, id, logger);
  if (header) return { tier: header.tier, seq: header.seqs[0] };

  const windowed = await scanTimeWindow(session, id, { senderDomainHint, logger });
  if (windowed) return { tier: SearchTier.TimeWindowMatch, seq: windowed.seq };
  return undefined;
}

async function resolveWithMailboxes(
  session: MailSession,
  id: MessageIdentifier,
  mailboxes: readonly MailboxDescriptor[],
  options: ResolveOptions
): Promise<ResolutionResult> {
  const logger = (options.logger ?? defaultLogger).child({ messageId: id.bare });
  const visited: string[] = [];
  const skipped: SkippedMailbox[] = [];

  // An empty identifier would match every message on servers that treat it as a substring.
  if (!id.bare) {
    logger.info("empty identifier, nothing to resolve");
    return unmatchedResult({ id, visited, skipped });
  }

  const plan = buildScanPlan({
    mailboxes,
    active: session.activeMailbox(),
    priority: options.priorityMailboxes,
    restrictTo: options.mailboxes,
  });
  const senderDomainHint = options.senderDomainHint ?? (options.hintExtractor ?? noDomainHint)(id);

  for (const mailbox of plan) {
    const selected = await session.select(mailbox);
    if (!selected.ok) {
      logger.warn({ mailbox, err: selected.error.message }, "mailbox skipped");
      skipped.push({ mailbox, reason: selected.error.message });
      continue;
    }
    visited.push(mailbox);

    const match = await scanSelectedMailbox(session, id, senderDomainHint, logger);
    if (!match) continue;

    const headers = await buildHeaderSnapshot(session, match.seq, {
      bodyPreviewLength: options.bodyPreviewLength,
      logger,
    });
    logger.info({ mailbox, tier: match.tier, seq: match.seq }, "message found");
    return matchedResult({ id, mailbox, tier: match.tier, sequenceRef: match.seq, headers, visited, skipped });
  }

  logger.info({ visited: visited.length, skipped: skipped.length }, "message not found");
  return unmatchedResult({ id, visited, skipped });
}

export async function resolveIdentifier(
  session: MailSession,
  rawIdentifier: string,
  options: ResolveOptions
): Promise<ResolutionResult> {
  const mailboxes = await session.listMailboxes();
  return resolveWithMailboxes(session, normalizeIdentifier(rawIdentifier), mailboxes, options);
}

/** Normalize and drop repeats (by bare form), keeping first-seen order. */
export function uniqueIdentifiers(rawIdentifiers: readonly string[]): MessageIdentifier[] {
  const seen = new Set<string>();
  const out: MessageIdentifier[] = [];
  for (const raw of rawIdentifiers) {
    const id = normalizeIdentifier(raw);
    if (seen.has(id.bare)) continue;
    seen.add(id.bare);
    out.push(id);
  }
  return out;
}

/**
 * Resolve several identifiers over one session, strictly in sequence.
 * Mailboxes are enumerated once; each identifier gets a fresh scan plan.
 */
export async function resolveIdentifiers(
  session: MailSession,
  rawIdentifiers: readonly string[],
  options: ResolveOptions & { onResult?: (result: ResolutionResult) => void }
): Promise<ResolutionResult[]> {
  const ids = uniqueIdentifiers(rawIdentifiers);
  if (ids.length === 0) return [];
  const mailboxes = await session.listMailboxes();
  const results: ResolutionResult[] = [];
  for (const id of ids) {
    const result = await resolveWithMailboxes(session, id, mailboxes, options);
    options.onResult?.(result);
    results.push(result);
  }
  return results;
}
