/**
 * In-process MailSession for tests. Records every call so ordering can be asserted.
 */

import { SearchError, SelectionError } from "./errors.js";
import { parseImapDate } from "./query.js";
import {
  describeCriteria,
  fail,
  ok,
  type MailboxDescriptor,
  type MailSession,
  type Outcome,
  type SearchCriteria,
  type SpecialUse,
} from "./session.js";

export interface MemoryMessage {
  /** Header name -> value; names are matched case-insensitively. */
  headers: Record<string, string>;
  /** Internal delivery date, `YYYY-MM-DD`. */
  delivered: string;
  body?: string;
  /** Simulates a server whose header index lost this message's identifier. */
  unsearchable?: boolean;
}

export interface MemoryMailbox {
  name: string;
  selectable?: boolean;
  specialUse?: SpecialUse;
  failSelect?: boolean;
  messages: MemoryMessage[];
}

export interface MemorySessionOptions {
  active?: string;
  /** Return a SearchError for matching requests instead of results. */
  failSearch?: (criteria: SearchCriteria) => boolean;
  failFetchSource?: boolean;
}

export class MemorySession implements MailSession {
  readonly calls: string[] = [];
  private active?: string;

  constructor(
    private readonly mailboxes: MemoryMailbox[],
    private readonly options: MemorySessionOptions = {}
  ) {
    this.active = options.active;
  }

  async listMailboxes(): Promise<MailboxDescriptor[]> {
    this.calls.push("list");
    return this.mailboxes.map((m) => {
      const descriptor: MailboxDescriptor = { name: m.name, selectable: m.selectable ?? true };
      if (m.specialUse) descriptor.specialUse = m.specialUse;
      return descriptor;
    });
  }

  activeMailbox(): string | undefined {
    return this.active;
  }

  async select(mailbox: string): Promise<Outcome<void, SelectionError>> {
    this.calls.push(`select ${mailbox}`);
    this.active = undefined;
    const box = this.mailboxes.find((m) => m.name === mailbox);
    if (!box || box.failSelect || box.selectable === false) {
      return fail(new SelectionError({ mailbox, message: `NO [NOPERM] cannot select ${mailbox}` }));
    }
    this.active = mailbox;
    return ok(undefined);
  }

  async search(criteria: SearchCriteria): Promise<Outcome<number[], SearchError>> {
    const request = describeCriteria(criteria);
    this.calls.push(`search ${this.active} ${request}`);
    if (this.options.failSearch?.(criteria)) {
      return fail(new SearchError({ request, message: "BAD Could not parse command" }));
    }
    const messages = this.selected().messages;
    const seqs: number[] = [];
    messages.forEach((msg, index) => {
      if (matches(msg, criteria)) seqs.push(index + 1);
    });
    return ok(seqs);
  }

  async fetchHeaders(seq: number, fields: readonly string[]): Promise<Outcome<string, SearchError>> {
    this.calls.push(`fetchHeaders ${this.active} ${seq} ${fields.join(",")}`);
    const msg = this.selected().messages[seq - 1];
    if (!msg) return fail(new SearchError({ request: `FETCH ${seq}`, message: "NO no such message" }));
    const wanted = new Set(fields.map((f) => f.toLowerCase()));
    const lines = Object.entries(msg.headers)
      .filter(([name]) => wanted.has(name.toLowerCase()))
      .map(([name, value]) => `${name}: ${value}\r\n`);
    return ok(lines.join("") + "\r\n");
  }

  async fetchSource(seq: number): Promise<Outcome<Buffer, SearchError>> {
    this.calls.push(`fetchSource ${this.active} ${seq}`);
    const msg = this.selected().messages[seq - 1];
    if (!msg || this.options.failFetchSource) {
      return fail(new SearchError({ request: `FETCH ${seq}`, message: "NO fetch failed" }));
    }
    const head = Object.entries(msg.headers).map(([name, value]) => `${name}: ${value}\r\n`);
    return ok(Buffer.from(head.join("") + "\r\n" + (msg.body ?? ""), "utf8"));
  }

  async close(): Promise<void> {
    this.calls.push("close");
    this.active = undefined;
  }

  private selected(): MemoryMailbox {
    const box = this.mailboxes.find((m) => m.name === this.active);
    if (!box) throw new Error("No mailbox selected");
    return box;
  }
}

function headerValue(msg: MemoryMessage, field: string): string | undefined {
  const entry = Object.entries(msg.headers).find(([name]) => name.toLowerCase() === field.toLowerCase());
  return entry?.[1];
}

function matches(msg: MemoryMessage, criteria: SearchCriteria): boolean {
  if (criteria.kind === "header") {
    if (msg.unsearchable) return false;
    const value = headerValue(msg, criteria.field);
    return value != null && value.includes(criteria.value);
  }
  const delivered = new Date(`${msg.delivered}T00:00:00Z`).getTime();
  const since = parseImapDate(criteria.since);
  const before = parseImapDate(criteria.before);
  if (!since || !before) return false;
  return delivered >= since.getTime() && delivered < before.getTime();
}
