#!/usr/bin/env node
/**
 * Batch Message-ID resolution with CSV export.
 *
 * Usage:
 *   message-id-resolve --ids 20240213212126.4429A161827048B0@mail.example.com
 *   message-id-resolve --ids-file ids.txt --mailboxes INBOX Trash --out matches.csv
 */

import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import { Command } from "commander";
import { loadImapConfig, loadResolverConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { createDomainHintExtractor, parseIdentifierLines } from "./identifier.js";
import { withImapSession } from "./imap.js";
import logger from "./logger.js";
import { resolveIdentifiers } from "./resolver.js";
import { toCsv, toExportRow } from "./result.js";

interface CliOptions {
  ids?: string[];
  idsFile?: string;
  mailboxes?: string[];
  hintDomain?: string;
  out: string;
  includeBody?: boolean;
}

const program = new Command();

program
  .name("message-id-resolve")
  .description("Search IMAP mailboxes by Message-ID and export matches to CSV")
  .version("1.0.0")
  .option("--ids <ids...>", "Message-IDs, with or without <>")
  .option("--ids-file <path>", "Text file with one Message-ID per line")
  .option("--mailboxes <names...>", "Only scan these mailboxes (default: all selectable)")
  .option("--hint-domain <domain>", "Sender domain used to narrow time-window candidates")
  .option("--include-body", "Log a short body preview for each match")
  .option("--out <path>", "Output CSV path", "imap_messageid_matches.csv")
  .showHelpAfterError(true)
  .action(async (options: CliOptions) => {
    const ids = [...(options.ids ?? [])];
    if (options.idsFile) ids.push(...parseIdentifierLines(await readFile(options.idsFile, "utf8")));
    if (ids.length === 0) {
      throw new ConfigError("No Message-IDs provided via --ids or --ids-file");
    }

    const imapConfig = loadImapConfig();
    const resolverConfig = loadResolverConfig();
    const started = Date.now();
    logger.info({ host: imapConfig.host, port: imapConfig.port, user: imapConfig.user }, "connecting");

    const results = await withImapSession(
      imapConfig,
      (session) =>
        resolveIdentifiers(session, ids, {
          priorityMailboxes: resolverConfig.priorityMailboxes,
          mailboxes: options.mailboxes,
          senderDomainHint: options.hintDomain,
          hintExtractor: createDomainHintExtractor(resolverConfig.hintDomains),
          bodyPreviewLength: options.includeBody ? resolverConfig.bodyPreviewLength : undefined,
          logger,
          onResult: (result) => {
            if (result.matched) {
              logger.info(
                {
                  messageId: result.identifier,
                  mailbox: result.mailbox,
                  seq: result.sequenceRef,
                  date: result.headers.date,
                  subject: result.headers.subject,
                  bodyPreview: result.headers.bodyPreview,
                },
                "found"
              );
            } else {
              logger.info({ messageId: result.identifier }, "not found");
            }
          },
        }),
      logger
    );

    await writeFile(options.out, toCsv(results.map(toExportRow)), "utf8");
    const found = results.filter((r) => r.matched).length;
    logger.info(
      { found, total: results.length, elapsedMs: Date.now() - started, out: options.out },
      "done"
    );
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    logger.error({ err: describeError(err) }, "resolution failed");
    process.exit(err instanceof ConfigError ? 2 : 1);
  }
}

main().catch((err) => {
  logger.fatal({ err: describeError(err) }, "unexpected error");
  process.exit(1);
});
