/**
 * Resolution outcomes: immutable records, the header snapshot attached to a
 * match, and the tabular export shape.
 */

import { simpleParser } from "mailparser";
import type { AddressObject, ParsedMail } from "mailparser";
import type { MessageIdentifier } from "./identifier.js";
import type { Logger } from "./logger.js";
import type { SearchTier } from "./query.js";
import { parseHeaderBlock } from "./scanner.js";
import type { MailSession } from "./session.js";

export interface HeaderSnapshot {
  from: string;
  to: string;
  subject: string;
  date: string;
  messageId: string;
  bodyPreview?: string;
}

export interface SkippedMailbox {
  mailbox: string;
  reason: string;
}

interface ResolutionTrace {
  identifier: string;
  /** Mailboxes selected, in order. */
  visited: readonly string[];
  skipped: readonly SkippedMailbox[];
}

export type ResolutionResult = Readonly<
  | (ResolutionTrace & {
      matched: true;
      mailbox: string;
      tier: SearchTier;
      sequenceRef: number;
      headers: Readonly<HeaderSnapshot>;
    })
  | (ResolutionTrace & { matched: false })
>;

export function matchedResult(input: {
  id: MessageIdentifier;
  mailbox: string;
  tier: SearchTier;
  sequenceRef: number;
  headers: HeaderSnapshot;
  visited: readonly string[];
  skipped: readonly SkippedMailbox[];
}): ResolutionResult {
  return Object.freeze({
    identifier: input.id.bare,
    matched: true as const,
    mailbox: input.mailbox,
    tier: input.tier,
    sequenceRef: input.sequenceRef,
    headers: Object.freeze({ ...input.headers }),
    visited: Object.freeze([...input.visited]),
    skipped: Object.freeze([...input.skipped]),
  });
}

export function unmatchedResult(input: {
  id: MessageIdentifier;
  visited: readonly string[];
  skipped: readonly SkippedMailbox[];
}): ResolutionResult {
  return Object.freeze({
    identifier: input.id.bare,
    matched: false as const,
    visited: Object.freeze([...input.visited]),
    skipped: Object.freeze([...input.skipped]),
  });
}

/** Format address list to string, one address (or name) per entry. */
function formatAddresses(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) return "";
  const objects = Array.isArray(value) ? value : [value];
  return objects
    .flatMap((o) => o.value)
    .map((a) => a.address || a.name || "")
    .filter(Boolean)
    .join(", ");
}

export function toPreview(text: string, maxLength: number): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (maxLength <= 0 || normalized.length <= maxLength) return normalized;
  return normalized.slice(0, maxLength) + "...";
}

function parsedBodyText(parsed: ParsedMail): string {
  if (parsed.text) return parsed.text;
  if (parsed.html) return parsed.html.replace(/<[^>]+>/g, " ");
  return "";
}

export async function snapshotFromSource(source: Buffer | string, bodyPreviewLength?: number): Promise<HeaderSnapshot> {
  const parsed = await simpleParser(source);
  const snapshot: HeaderSnapshot = {
    from: formatAddresses(parsed.from),
    to: formatAddresses(parsed.to),
    subject: parsed.subject ?? "",
    date: parsed.date ? parsed.date.toISOString() : "",
    messageId: parsed.messageId ?? "",
  };
  if (bodyPreviewLength != null) snapshot.bodyPreview = toPreview(parsedBodyText(parsed), bodyPreviewLength);
  return snapshot;
}

export function snapshotFromHeaderBlock(raw: string): HeaderSnapshot {
  const headers = parseHeaderBlock(raw);
  return {
    from: headers.get("from") ?? "",
    to: headers.get("to") ?? "",
    subject: headers.get("subject") ?? "",
    date: headers.get("date") ?? "",
    messageId: headers.get("message-id") ?? "",
  };
}

const SNAPSHOT_FIELDS = ["from", "to", "subject", "date", "message-id"] as const;

/**
 * Display record for a confirmed match. Prefers the decoded full message and
 * falls back to the raw header block when the source cannot be fetched.
 */
export async function buildHeaderSnapshot(
  session: MailSession,
  seq: number,
  options: { bodyPreviewLength?: number; logger: Logger }
): Promise<HeaderSnapshot> {
  const source = await session.fetchSource(seq);
  if (source.ok) return snapshotFromSource(source.value, options.bodyPreviewLength);
  options.logger.debug({ seq, err: source.error.message }, "full message fetch failed, using header block");

  const headers = await session.fetchHeaders(seq, SNAPSHOT_FIELDS);
  if (headers.ok) return snapshotFromHeaderBlock(headers.value);
  options.logger.debug({ seq, err: headers.error.message }, "header fetch failed");
  return snapshotFromHeaderBlock("");
}

export interface ExportRow {
  identifier: string;
  mailbox: string;
  tier: string;
  sequenceRef: string;
  from: string;
  to: string;
  subject: string;
  date: string;
}

export const EXPORT_COLUMNS: ReadonlyArray<keyof ExportRow> = [
  "identifier",
  "mailbox",
  "tier",
  "sequenceRef",
  "from",
  "to",
  "subject",
  "date",
];

export function toExportRow(result: ResolutionResult): ExportRow {
  if (!result.matched) {
    return { identifier: result.identifier, mailbox: "", tier: "", sequenceRef: "", from: "", to: "", subject: "", date: "" };
  }
  return {
    identifier: result.identifier,
    mailbox: result.mailbox,
    tier: result.tier,
    sequenceRef: String(result.sequenceRef),
    from: result.headers.from,
    to: result.headers.to,
    subject: result.headers.subject,
    date: result.headers.date,
  };
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** RFC 4180: header line, CRLF line endings. */
export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(",")];
  for (const row of rows) lines.push(EXPORT_COLUMNS.map((c) => csvField(row[c])).join(","));
  return lines.join("\r\n") + "\r\n";
}
