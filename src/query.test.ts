import assert from "node:assert/strict";
import test from "node:test";
import { normalizeIdentifier } from "./identifier.js";
import { silentLogger } from "./logger.js";
import { MemorySession } from "./memory-session.js";
import {
  buildHeaderAttempts,
  buildHeaderQueries,
  buildTimeWindow,
  formatImapDate,
  parseImapDate,
  runHeaderTiers,
  SearchTier,
} from "./query.js";
import { describeCriteria } from "./session.js";

const ID = normalizeIdentifier("abc123@mail.example.com");

test("buildHeaderQueries orders exact header spellings before reference headers, bracketed first", () => {
  const queries = buildHeaderQueries(ID).map((q) => `${q.tier}:${q.field}:${q.value}`);
  assert.deepEqual(queries, [
    "ExactHeaderMatch:Message-ID:<abc123@mail.example.com>",
    "ExactHeaderMatch:Message-ID:abc123@mail.example.com",
    "ExactHeaderMatch:Message-Id:<abc123@mail.example.com>",
    "ExactHeaderMatch:Message-Id:abc123@mail.example.com",
    "ReferenceChainMatch:References:<abc123@mail.example.com>",
    "ReferenceChainMatch:References:abc123@mail.example.com",
    "ReferenceChainMatch:In-Reply-To:<abc123@mail.example.com>",
    "ReferenceChainMatch:In-Reply-To:abc123@mail.example.com",
  ]);
});

test("buildHeaderAttempts tries each query in structured then quoted encoding", () => {
  const attempts = buildHeaderAttempts(ID);
  assert.equal(attempts.length, 16);
  assert.deepEqual(
    attempts.slice(0, 3).map((a) => describeCriteria(a.criteria)),
    [
      "HEADER Message-ID <abc123@mail.example.com> (structured)",
      "HEADER Message-ID <abc123@mail.example.com> (quoted)",
      "HEADER Message-ID abc123@mail.example.com (structured)",
    ]
  );
});

test("buildTimeWindow spans one calendar day either side of the timestamp", () => {
  const window = buildTimeWindow(new Date(Date.UTC(2024, 1, 13, 21, 21, 26)));
  assert.deepEqual(window, { kind: "dateRange", since: "12-Feb-2024", before: "14-Feb-2024" });
});

test("buildTimeWindow crosses month and year boundaries", () => {
  const window = buildTimeWindow(new Date(Date.UTC(2024, 0, 1, 0, 30, 0)));
  assert.deepEqual(window, { kind: "dateRange", since: "31-Dec-2023", before: "02-Jan-2024" });
});

test("formatImapDate and parseImapDate agree", () => {
  assert.equal(formatImapDate(new Date(Date.UTC(2024, 2, 5))), "05-Mar-2024");
  assert.equal(parseImapDate("05-Mar-2024")?.toISOString(), "2024-03-05T00:00:00.000Z");
  assert.equal(parseImapDate("5-mar-2024")?.toISOString(), "2024-03-05T00:00:00.000Z");
  assert.equal(parseImapDate("2024-03-05"), undefined);
  assert.equal(parseImapDate("05-Foo-2024"), undefined);
});

test("runHeaderTiers stops at the first non-empty exact match", async () => {
  const session = new MemorySession([
    {
      name: "INBOX",
      messages: [{ headers: { "Message-ID": "<abc123@mail.example.com>" }, delivered: "2024-02-13" }],
    },
  ]);
  await session.select("INBOX");
  const match = await runHeaderTiers(session, ID, silentLogger);

  assert.equal(match?.tier, SearchTier.ExactHeaderMatch);
  assert.deepEqual(match?.seqs, [1]);
  assert.equal(session.calls.filter((c) => c.startsWith("search")).length, 1);
});

test("runHeaderTiers falls through to the reference chain", async () => {
  const session = new MemorySession([
    {
      name: "INBOX",
      messages: [
        { headers: { "Message-ID": "<other@example.com>" }, delivered: "2024-02-13" },
        {
          headers: { "Message-ID": "<reply@example.com>", References: "<root@example.com> <abc123@mail.example.com>" },
          delivered: "2024-02-14",
        },
      ],
    },
  ]);
  await session.select("INBOX");
  const match = await runHeaderTiers(session, ID, silentLogger);

  assert.equal(match?.tier, SearchTier.ReferenceChainMatch);
  assert.deepEqual(match?.seqs, [2]);
  // 8 exact-header attempts, then the first References attempt matches.
  assert.equal(session.calls.filter((c) => c.startsWith("search")).length, 9);
});

test("runHeaderTiers treats a failed attempt as a miss and moves to the next encoding", async () => {
  const session = new MemorySession(
    [{ name: "INBOX", messages: [{ headers: { "Message-ID": "<abc123@mail.example.com>" }, delivered: "2024-02-13" }] }],
    { failSearch: (c) => c.kind === "header" && c.encoding === "structured" }
  );
  await session.select("INBOX");
  const match = await runHeaderTiers(session, ID, silentLogger);

  assert.equal(match?.tier, SearchTier.ExactHeaderMatch);
  assert.equal(match?.criteria.kind === "header" ? match.criteria.encoding : undefined, "quoted");
});

test("runHeaderTiers returns undefined when every attempt is empty", async () => {
  const session = new MemorySession([{ name: "INBOX", messages: [] }]);
  await session.select("INBOX");
  assert.equal(await runHeaderTiers(session, ID, silentLogger), undefined);
  assert.equal(session.calls.filter((c) => c.startsWith("search")).length, 16);
});
