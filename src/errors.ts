/**
 * Error taxonomy for Message-ID resolution.
 * Only TransportError is fatal; the rest are returned as values and recovered locally.
 */

export class TransportError extends Error {
  readonly code?: string;

  constructor(input: { message: string; cause?: unknown; code?: string }) {
    super(input.message, { cause: input.cause });
    this.name = "TransportError";
    this.code = input.code;
  }
}

export class SelectionError extends Error {
  readonly mailbox: string;

  constructor(input: { mailbox: string; message?: string; cause?: unknown }) {
    super(input.message ?? `Unable to select mailbox ${input.mailbox}`, { cause: input.cause });
    this.name = "SelectionError";
    this.mailbox = input.mailbox;
  }
}

export class SearchError extends Error {
  /** Human-readable description of the request that failed. */
  readonly request: string;

  constructor(input: { request: string; message?: string; cause?: unknown }) {
    super(input.message ?? `Search request failed: ${input.request}`, { cause: input.cause });
    this.name = "SearchError";
    this.request = input.request;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type ImapResponseDetails = { message: string; responseText?: unknown; responseStatus?: unknown; code?: unknown };

/** Message plus imapflow response details, for tool and CLI output. */
export function describeError(err: unknown): string {
  const e = err instanceof Error ? err : new Error(String(err));
  const details: ImapResponseDetails = e;
  const parts = [e.message];
  if (typeof details.responseText === "string" && details.responseText) parts.push(details.responseText);
  if (typeof details.responseStatus === "string" && details.responseStatus) parts.push(`(${details.responseStatus})`);
  if (typeof details.code === "string" && details.code) parts.push(`code: ${details.code}`);
  return parts.join(" ");
}

export function errorCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  const details: ImapResponseDetails = err;
  return typeof details.code === "string" ? details.code : undefined;
}
