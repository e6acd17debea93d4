/**
 * Contract between the resolution engine and a mailbox session.
 * Recoverable failures come back as values; connection failures throw TransportError.
 */

import type { SearchError, SelectionError } from "./errors.js";

export type Outcome<T, E extends Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type SpecialUse = "\\All" | "\\Archive" | "\\Drafts" | "\\Flagged" | "\\Junk" | "\\Sent" | "\\Trash";

export interface MailboxDescriptor {
  name: string;
  selectable: boolean;
  specialUse?: SpecialUse;
}

/** How a header search is put on the wire; servers differ in which they accept. */
export type SearchEncoding = "structured" | "quoted";

export type HeaderField = "Message-ID" | "Message-Id" | "References" | "In-Reply-To";

export type SearchCriteria =
  | { kind: "header"; field: HeaderField; value: string; encoding: SearchEncoding }
  /** IMAP dates (`DD-Mon-YYYY`); `before` is exclusive per IMAP SEARCH. */
  | { kind: "dateRange"; since: string; before: string };

export interface MailSession {
  listMailboxes(): Promise<MailboxDescriptor[]>;
  activeMailbox(): string | undefined;
  /** Always read-only. */
  select(mailbox: string): Promise<Outcome<void, SelectionError>>;
  /** Sequence numbers in the selected mailbox; empty means no match. */
  search(criteria: SearchCriteria): Promise<Outcome<number[], SearchError>>;
  /** Raw header block for the requested fields. */
  fetchHeaders(seq: number, fields: readonly string[]): Promise<Outcome<string, SearchError>>;
  fetchSource(seq: number): Promise<Outcome<Buffer, SearchError>>;
  close(): Promise<void>;
}

export function describeCriteria(criteria: SearchCriteria): string {
  if (criteria.kind === "dateRange") return `SINCE ${criteria.since} BEFORE ${criteria.before}`;
  return `HEADER ${criteria.field} ${criteria.value} (${criteria.encoding})`;
}
