import assert from "node:assert/strict";
import test from "node:test";
import { normalizeIdentifier } from "./identifier.js";
import { silentLogger } from "./logger.js";
import { MemorySession } from "./memory-session.js";
import { SearchTier } from "./query.js";
import {
  buildHeaderSnapshot,
  matchedResult,
  snapshotFromSource,
  toCsv,
  toExportRow,
  toPreview,
  unmatchedResult,
} from "./result.js";

const SOURCE = [
  "From: Alice Example <alice@example.com>",
  "To: bob@example.org, Carol <carol@example.org>",
  "Subject: Quarterly report",
  "Date: Tue, 13 Feb 2024 21:21:26 +0000",
  "Message-ID: <abc@example.com>",
  "",
  "Hello   there,",
  "see attached.",
  "",
].join("\r\n");

const HEADERS = {
  from: "alice@example.com",
  to: "bob@example.org",
  subject: "Quarterly report",
  date: "2024-02-13T21:21:26.000Z",
  messageId: "<abc@example.com>",
};

test("snapshotFromSource decodes addresses, subject, date and Message-ID", async () => {
  const snapshot = await snapshotFromSource(SOURCE);
  assert.deepEqual(snapshot, {
    from: "alice@example.com",
    to: "bob@example.org, carol@example.org",
    subject: "Quarterly report",
    date: "2024-02-13T21:21:26.000Z",
    messageId: "<abc@example.com>",
  });
});

test("snapshotFromSource adds a whitespace-collapsed body preview when asked", async () => {
  const snapshot = await snapshotFromSource(SOURCE, 10);
  assert.equal(snapshot.bodyPreview, "Hello ther...");
});

test("toPreview leaves short text alone and treats 0 as no limit", () => {
  assert.equal(toPreview("  a \n b  ", 10), "a b");
  assert.equal(toPreview("abcdef", 0), "abcdef");
});

test("buildHeaderSnapshot falls back to the raw header block when the source fetch fails", async () => {
  const session = new MemorySession(
    [
      {
        name: "INBOX",
        messages: [
          {
            headers: { From: "Alice <alice@example.com>", Subject: "Hi", Date: "Tue, 13 Feb 2024 21:21:26 +0000", "Message-ID": "<abc@example.com>" },
            delivered: "2024-02-13",
          },
        ],
      },
    ],
    { failFetchSource: true }
  );
  await session.select("INBOX");
  const snapshot = await buildHeaderSnapshot(session, 1, { logger: silentLogger });

  assert.deepEqual(snapshot, {
    from: "Alice <alice@example.com>",
    to: "",
    subject: "Hi",
    date: "Tue, 13 Feb 2024 21:21:26 +0000",
    messageId: "<abc@example.com>",
  });
  assert.deepEqual(session.calls.slice(1), [
    "fetchSource INBOX 1",
    "fetchHeaders INBOX 1 from,to,subject,date,message-id",
  ]);
});

test("matched results are frozen and carry the snapshot", () => {
  const result = matchedResult({
    id: normalizeIdentifier("<abc@example.com>"),
    mailbox: "Archive",
    tier: SearchTier.ExactHeaderMatch,
    sequenceRef: 7,
    headers: HEADERS,
    visited: ["INBOX", "Archive"],
    skipped: [],
  });
  assert.ok(Object.isFrozen(result));
  assert.ok(result.matched);
  assert.ok(Object.isFrozen(result.headers));
  assert.equal(result.identifier, "abc@example.com");
  assert.equal(result.sequenceRef, 7);
});

test("unmatched results carry no sequence reference or headers", () => {
  const result = unmatchedResult({ id: normalizeIdentifier("abc@example.com"), visited: ["INBOX"], skipped: [] });
  assert.equal(result.matched, false);
  assert.equal("sequenceRef" in result, false);
  assert.equal("headers" in result, false);
});

test("toExportRow leaves every column but the identifier empty for misses", () => {
  const row = toExportRow(unmatchedResult({ id: normalizeIdentifier("abc@example.com"), visited: [], skipped: [] }));
  assert.deepEqual(row, {
    identifier: "abc@example.com",
    mailbox: "",
    tier: "",
    sequenceRef: "",
    from: "",
    to: "",
    subject: "",
    date: "",
  });
});

test("toCsv writes a header line and quotes fields that need it", () => {
  const matched = matchedResult({
    id: normalizeIdentifier("abc@example.com"),
    mailbox: "Archive",
    tier: SearchTier.TimeWindowMatch,
    sequenceRef: 12,
    headers: { ...HEADERS, subject: 'Re: "Q1", final' },
    visited: ["Archive"],
    skipped: [],
  });
  const missed = unmatchedResult({ id: normalizeIdentifier("missing@example.com"), visited: [], skipped: [] });

  assert.equal(
    toCsv([toExportRow(matched), toExportRow(missed)]),
    "identifier,mailbox,tier,sequenceRef,from,to,subject,date\r\n" +
      'abc@example.com,Archive,TimeWindowMatch,12,alice@example.com,bob@example.org,"Re: ""Q1"", final",2024-02-13T21:21:26.000Z\r\n' +
      "missing@example.com,,,,,,,\r\n"
  );
});
