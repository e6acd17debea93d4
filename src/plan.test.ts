import assert from "node:assert/strict";
import test from "node:test";
import { buildScanPlan } from "./plan.js";
import type { MailboxDescriptor } from "./session.js";

const PRIORITY = ["Trash", "Junk", "Spam", "Sent", "Drafts", "Archive"];

function boxes(...names: string[]): MailboxDescriptor[] {
  return names.map((name) => ({ name, selectable: true }));
}

test("buildScanPlan starts at INBOX, then priority mailboxes, then the rest in server order", () => {
  const plan = buildScanPlan({
    mailboxes: boxes("INBOX", "Projects", "Archive", "Sent", "Receipts", "Trash"),
    priority: PRIORITY,
  });
  assert.deepEqual(plan, ["INBOX", "Trash", "Sent", "Archive", "Projects", "Receipts"]);
});

test("buildScanPlan starts from the active mailbox when one is selected", () => {
  const plan = buildScanPlan({
    mailboxes: boxes("INBOX", "Trash", "Projects"),
    active: "Projects",
    priority: PRIORITY,
  });
  assert.deepEqual(plan, ["Projects", "Trash", "INBOX"]);
});

test("buildScanPlan skips priority names the server does not have", () => {
  const plan = buildScanPlan({ mailboxes: boxes("INBOX", "Drafts"), priority: PRIORITY });
  assert.deepEqual(plan, ["INBOX", "Drafts"]);
});

test("buildScanPlan moves special-use mailboxes ahead of ordinary ones", () => {
  const plan = buildScanPlan({
    mailboxes: [
      { name: "INBOX", selectable: true },
      { name: "Notes", selectable: true },
      { name: "Papierkorb", selectable: true, specialUse: "\\Trash" },
      { name: "Flagged", selectable: true, specialUse: "\\Flagged" },
    ],
    priority: PRIORITY,
  });
  assert.deepEqual(plan, ["INBOX", "Papierkorb", "Notes", "Flagged"]);
});

test("buildScanPlan never includes non-selectable mailboxes, even as the active one", () => {
  const plan = buildScanPlan({
    mailboxes: [
      { name: "INBOX", selectable: true },
      { name: "[Gmail]", selectable: false },
      { name: "[Gmail]/Trash", selectable: true },
    ],
    active: "[Gmail]",
    priority: ["[Gmail]/Trash"],
  });
  assert.deepEqual(plan, ["[Gmail]/Trash", "INBOX"]);
});

test("buildScanPlan lists each mailbox once and treats INBOX case-insensitively", () => {
  const plan = buildScanPlan({
    mailboxes: boxes("Inbox", "Trash", "trash"),
    active: "INBOX",
    priority: ["Trash", "Trash"],
  });
  assert.deepEqual(plan, ["Inbox", "Trash", "trash"]);
});

test("buildScanPlan honours a restriction list", () => {
  const plan = buildScanPlan({
    mailboxes: boxes("INBOX", "Trash", "Archive", "Projects"),
    priority: PRIORITY,
    restrictTo: ["Projects", "Archive"],
  });
  assert.deepEqual(plan, ["Archive", "Projects"]);
});

test("buildScanPlan falls back to INBOX alone when nothing is enumerated", () => {
  assert.deepEqual(buildScanPlan({ mailboxes: [], priority: PRIORITY }), ["INBOX"]);
});
