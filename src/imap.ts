/**
 * Read-only IMAP session backed by imapflow.
 * Only list, select (read-only), search and fetch; no mutating command is issued.
 */

import { ImapFlow } from "imapflow";
import type { ImapConfig } from "./config.js";
import { SearchError, SelectionError, TransportError, errorCode } from "./errors.js";
import defaultLogger, { type Logger } from "./logger.js";
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

export interface ImapAttribute {
  type: string;
  value: string;
}

/** Parsed response node: a typed value, or a parenthesized list. */
export type ImapNode = ImapAttribute | ImapNode[];

export interface UntaggedResponse {
  command?: string;
  attributes?: ImapNode[];
}

export interface ListedMailbox {
  path: string;
  flags?: Set<string>;
  specialUse?: string;
}

export interface FetchedMessage {
  seq?: number;
  headers?: Buffer;
  source?: Buffer;
}

export type ImapClientLike = {
  /** False once the connection is closed or broken. */
  usable?: boolean;
  connect(): Promise<void>;
  logout(): Promise<void>;
  list(): Promise<ListedMailbox[]>;
  getMailboxLock(mailbox: string, options?: { readOnly?: boolean }): Promise<{ release(): void }>;
  search(query: Record<string, unknown>, options?: { uid?: boolean }): Promise<number[] | false>;
  fetchOne(
    range: string,
    query: Record<string, unknown>,
    options?: { uid?: boolean }
  ): Promise<FetchedMessage | false>;
  /** Low-level command execution; used for SEARCH criteria imapflow would re-encode. */
  exec(
    command: string,
    attributes: ImapAttribute[],
    options?: { untagged?: Record<string, (untagged: UntaggedResponse) => Promise<void>> }
  ): Promise<{ next(): void }>;
};

export type ImapClientFactory = (config: ImapConfig) => ImapClientLike;

function defaultClientFactory(config: ImapConfig): ImapClientLike {
  return new ImapFlow({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: {
      user: config.user,
      pass: config.pass,
    },
    tls: { rejectUnauthorized: config.tlsRejectUnauthorized },
    socketTimeout: config.socketTimeoutMs,
    logger: false,
  }) as unknown as ImapClientLike;
}

let clientFactory: ImapClientFactory = defaultClientFactory;

export function __setClientFactoryForTests(factory?: ImapClientFactory): void {
  clientFactory = factory ?? defaultClientFactory;
}

const CONNECTION_ERROR_CODES = new Set(["NoConnection", "EConnectionClosed", "ETIMEOUT", "ECONNRESET", "EPIPE"]);

function isConnectionError(err: unknown, client: ImapClientLike): boolean {
  if (client.usable === false) return true;
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  const code = errorCode(err);
  return (
    msg.includes("connection not available") ||
    msg.includes("connection closed") ||
    msg.includes("socket timeout") ||
    (code != null && CONNECTION_ERROR_CODES.has(code))
  );
}

function toTransportError(err: unknown, context: string): TransportError {
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError({ message: `${context}: ${message}`, cause: err, code: errorCode(err) });
}

const SPECIAL_USES: ReadonlySet<string> = new Set(["\\All", "\\Archive", "\\Drafts", "\\Flagged", "\\Junk", "\\Sent", "\\Trash"]);

function isSpecialUse(value: string | undefined): value is SpecialUse {
  return value != null && SPECIAL_USES.has(value);
}

export function toMailboxDescriptor(entry: ListedMailbox): MailboxDescriptor {
  const flags = entry.flags ?? new Set<string>();
  const selectable = !Array.from(flags).some((f) => {
    const lower = f.toLowerCase();
    return lower === "\\noselect" || lower === "\\nonexistent";
  });
  const descriptor: MailboxDescriptor = { name: entry.path, selectable };
  if (isSpecialUse(entry.specialUse)) descriptor.specialUse = entry.specialUse;
  return descriptor;
}

export class ImapSession implements MailSession {
  private lock?: { release(): void };
  private active?: string;

  constructor(
    private readonly client: ImapClientLike,
    private readonly logger: Logger = defaultLogger
  ) {}

  activeMailbox(): string | undefined {
    return this.active;
  }

  async listMailboxes(): Promise<MailboxDescriptor[]> {
    try {
      const list = await this.client.list();
      return list.map(toMailboxDescriptor).filter((m) => m.selectable);
    } catch (err) {
      throw toTransportError(err, "LIST failed");
    }
  }

  async select(mailbox: string): Promise<Outcome<void, SelectionError>> {
    this.releaseLock();
    try {
      this.lock = await this.client.getMailboxLock(mailbox, { readOnly: true });
      this.active = mailbox;
      return ok(undefined);
    } catch (err) {
      if (isConnectionError(err, this.client)) throw toTransportError(err, `SELECT ${mailbox} failed`);
      return fail(new SelectionError({ mailbox, message: `Cannot select ${mailbox}: ${errMessage(err)}`, cause: err }));
    }
  }

  async search(criteria: SearchCriteria): Promise<Outcome<number[], SearchError>> {
    try {
      if (criteria.kind === "header" && criteria.encoding === "quoted") {
        return ok(await this.searchRaw(quotedHeaderCriteria(criteria.field, criteria.value)));
      }
      const found = await this.client.search(toSearchObject(criteria), { uid: false });
      // imapflow answers false instead of throwing on NO/BAD or a lost mailbox.
      if (found === false) return this.rejected(describeCriteria(criteria), "search rejected by server");
      return ok(found);
    } catch (err) {
      return this.recover(err, describeCriteria(criteria));
    }
  }

  async fetchHeaders(seq: number, fields: readonly string[]): Promise<Outcome<string, SearchError>> {
    const request = `FETCH ${seq} BODY.PEEK[HEADER.FIELDS (${fields.join(" ").toUpperCase()})]`;
    try {
      const msg = await this.client.fetchOne(String(seq), { headers: [...fields] }, { uid: false });
      if (!msg || !msg.headers) return this.rejected(request, `No headers returned for ${seq}`);
      return ok(msg.headers.toString("utf8"));
    } catch (err) {
      return this.recover(err, request);
    }
  }

  async fetchSource(seq: number): Promise<Outcome<Buffer, SearchError>> {
    const request = `FETCH ${seq} BODY.PEEK[]`;
    try {
      const msg = await this.client.fetchOne(String(seq), { source: true }, { uid: false });
      if (!msg || !msg.source) return this.rejected(request, `No source returned for ${seq}`);
      return ok(msg.source);
    } catch (err) {
      return this.recover(err, request);
    }
  }

  async close(): Promise<void> {
    this.releaseLock();
    try {
      await this.client.logout();
    } catch (err) {
      // Connection may already be closed (server BYE or timeout).
      this.logger.debug({ err: errMessage(err) }, "logout failed");
    }
  }

  private releaseLock(): void {
    this.lock?.release();
    this.lock = undefined;
    this.active = undefined;
  }

  private recover(err: unknown, request: string): { ok: false; error: SearchError } {
    if (isConnectionError(err, this.client)) throw toTransportError(err, request);
    return fail(new SearchError({ request, message: `${request}: ${errMessage(err)}`, cause: err }));
  }

  /** An empty answer from imapflow: a dropped connection if the client says so, else a failed request. */
  private rejected(request: string, message: string): { ok: false; error: SearchError } {
    if (this.client.usable === false) {
      throw new TransportError({ message: `${request}: connection not available`, code: "NoConnection" });
    }
    return fail(new SearchError({ request, message: `${request}: ${message}` }));
  }

  /** SEARCH with hand-built criteria, collecting numbers from SEARCH or ESEARCH replies. */
  private async searchRaw(criteria: ImapAttribute[]): Promise<number[]> {
    const seqs = new Set<number>();
    const response = await this.client.exec("SEARCH", criteria, {
      untagged: {
        SEARCH: async (untagged) => {
          for (const attr of untagged.attributes ?? []) {
            if (Array.isArray(attr)) continue;
            const n = Number(attr.value);
            if (Number.isInteger(n) && n > 0) seqs.add(n);
          }
        },
        ESEARCH: async (untagged) => {
          for (const n of esearchMatches(untagged.attributes ?? [])) seqs.add(n);
        },
      },
    });
    response.next();
    return Array.from(seqs).sort((a, b) => a - b);
  }
}

/**
 * `HEADER "field" "value"` as separate nodes. The field name keeps its
 * spelling on the wire; imapflow's search object upper-cases it.
 */
export function quotedHeaderCriteria(field: string, value: string): ImapAttribute[] {
  return [
    { type: "ATOM", value: "HEADER" },
    { type: "STRING", value: field },
    { type: "STRING", value },
  ];
}

/** Expand an IMAP sequence set such as `2:4,9`. */
export function expandSequenceSet(set: string): number[] {
  const out: number[] = [];
  for (const part of set.split(",")) {
    const [startText, endText = startText] = part.split(":");
    const start = Number(startText);
    const end = Number(endText);
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < 1) continue;
    for (let n = Math.min(start, end); n <= Math.max(start, end); n++) out.push(n);
  }
  return out;
}

/** Sequence numbers from an `* ESEARCH (TAG "A1") ALL 2:4,9` reply. */
export function esearchMatches(attributes: ImapNode[]): number[] {
  for (let i = 0; i < attributes.length - 1; i++) {
    const attr = attributes[i];
    const next = attributes[i + 1];
    if (Array.isArray(attr) || Array.isArray(next)) continue;
    if (attr.value.toUpperCase() === "ALL") return expandSequenceSet(next.value);
  }
  return [];
}

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toSearchObject(criteria: SearchCriteria): Record<string, unknown> {
  if (criteria.kind === "header") return { header: { [criteria.field]: criteria.value } };
  const since = parseImapDate(criteria.since);
  const before = parseImapDate(criteria.before);
  if (!since || !before) throw new Error(`Invalid date range ${criteria.since}..${criteria.before}`);
  return { since, before };
}

/** Connect and authenticate. Any failure here is fatal to the run. */
export async function openImapSession(config: ImapConfig, logger: Logger = defaultLogger): Promise<ImapSession> {
  const client = clientFactory(config);
  try {
    await client.connect();
  } catch (err) {
    throw toTransportError(err, `Cannot connect to ${config.host}:${config.port} as ${config.user}`);
  }
  logger.debug({ host: config.host, port: config.port }, "imap session open");
  return new ImapSession(client, logger);
}

/** Open a session, run `fn`, and always log out. */
export async function withImapSession<T>(
  config: ImapConfig,
  fn: (session: ImapSession) => Promise<T>,
  logger: Logger = defaultLogger
): Promise<T> {
  const session = await openImapSession(config, logger);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
