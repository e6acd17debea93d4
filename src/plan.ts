import type { MailboxDescriptor, SpecialUse } from "./session.js";

export interface ScanPlanInput {
  mailboxes: readonly MailboxDescriptor[];
  /** Currently selected mailbox; INBOX when nothing is selected yet. */
  active?: string;
  /** Conventionally important names, visited ahead of the rest in this order. */
  priority: readonly string[];
  /** When set, only these mailboxes are scanned. */
  restrictTo?: readonly string[];
}

const PRIORITY_SPECIAL_USE: ReadonlySet<SpecialUse> = new Set<SpecialUse>([
  "\\Trash",
  "\\Junk",
  "\\Sent",
  "\\Drafts",
  "\\Archive",
  "\\All",
]);

/** INBOX is case-insensitive per RFC 3501; every other name is compared exactly. */
export function mailboxKey(name: string): string {
  return name.toUpperCase() === "INBOX" ? "INBOX" : name;
}

/**
 * Ordered, duplicate-free list of mailbox names to visit for one identifier.
 * Non-selectable mailboxes never appear.
 */
export function buildScanPlan(input: ScanPlanInput): string[] {
  const restrict = input.restrictTo?.length ? new Set(input.restrictTo.map(mailboxKey)) : undefined;
  const blocked = new Set(input.mailboxes.filter((m) => !m.selectable).map((m) => mailboxKey(m.name)));
  const selectable = input.mailboxes.filter((m) => m.selectable && (!restrict || restrict.has(mailboxKey(m.name))));
  const byKey = new Map(selectable.map((m) => [mailboxKey(m.name), m.name]));

  const plan: string[] = [];
  const seen = new Set<string>();
  const push = (name: string): void => {
    const key = mailboxKey(name);
    if (seen.has(key) || blocked.has(key)) return;
    seen.add(key);
    plan.push(name);
  };

  const active = input.active ?? "INBOX";
  if (!restrict || restrict.has(mailboxKey(active))) push(byKey.get(mailboxKey(active)) ?? active);

  for (const name of input.priority) {
    const existing = byKey.get(mailboxKey(name));
    if (existing) push(existing);
  }
  for (const m of selectable) {
    if (m.specialUse && PRIORITY_SPECIAL_USE.has(m.specialUse)) push(m.name);
  }
  for (const m of selectable) push(m.name);
  return plan;
}
