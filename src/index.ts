#!/usr/bin/env node
/**
 * Message-ID resolver MCP server (read-only).
 * Locates messages by Message-ID across mailboxes via MCP tools.
 */

import "dotenv/config";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadImapConfig, loadResolverConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createDomainHintExtractor } from "./identifier.js";
import { withImapSession } from "./imap.js";
import logger from "./logger.js";
import { resolveIdentifier, resolveIdentifiers, type ResolveOptions } from "./resolver.js";
import { toCsv, toExportRow } from "./result.js";

const IMAP_CONFIG = loadImapConfig();
const RESOLVER_CONFIG = loadResolverConfig();

const server = new Server(
  {
    name: "message-id-resolver",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

const COMMON_RESOLVE_OPTIONS_SCHEMA = {
  mailboxes: {
    type: "array",
    items: { type: "string" },
    description: "Only scan these mailboxes (default: every selectable mailbox)",
  },
  senderDomainHint: {
    type: "string",
    description: "Sender domain used to narrow time-window candidates, e.g. example.com",
  },
} as const;

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: "mail_list_folders",
        description: "List selectable mail folders (mailboxes) with their special-use flags.",
        inputSchema: {
          type: "object",
          properties: {},
        },
      },
      {
        name: "mail_resolve_message_id",
        description:
          "Find one message by Message-ID across mailboxes: exact header, then References/In-Reply-To, then a ±1 day window around a timestamp embedded in the ID.",
        inputSchema: {
          type: "object",
          properties: {
            messageId: { type: "string", description: "Message-ID, with or without <>" },
            includeBody: {
              type: "boolean",
              description: "Include a short body preview of the matched message",
              default: false,
            },
            ...COMMON_RESOLVE_OPTIONS_SCHEMA,
          },
          required: ["messageId"],
        },
      },
      {
        name: "mail_resolve_message_ids",
        description: "Resolve several Message-IDs in sequence. One result per distinct ID, in input order.",
        inputSchema: {
          type: "object",
          properties: {
            messageIds: {
              type: "array",
              items: { type: "string" },
              description: "Message-IDs, with or without <>",
            },
            format: {
              type: "string",
              enum: ["json", "csv"],
              description: "json: result records; csv: export table",
              default: "json",
            },
            ...COMMON_RESOLVE_OPTIONS_SCHEMA,
          },
          required: ["messageIds"],
        },
      },
    ],
  };
});

function toOptString(v: unknown): string | undefined {
  if (v == null) return undefined;
  const s = String(v).trim();
  return s.length > 0 ? s : undefined;
}

function toStringList(v: unknown): string[] | undefined {
  if (!Array.isArray(v)) return undefined;
  const out = v.map((item) => String(item).trim()).filter(Boolean);
  return out.length > 0 ? out : undefined;
}

function buildResolveOptions(a: Record<string, unknown>, includeBody: boolean): ResolveOptions {
  return {
    priorityMailboxes: RESOLVER_CONFIG.priorityMailboxes,
    mailboxes: toStringList(a.mailboxes),
    senderDomainHint: toOptString(a.senderDomainHint),
    hintExtractor: createDomainHintExtractor(RESOLVER_CONFIG.hintDomains),
    bodyPreviewLength: includeBody ? RESOLVER_CONFIG.bodyPreviewLength : undefined,
    logger,
  };
}

function textResult(text: string, isError: boolean = false) {
  return { content: [{ type: "text" as const, text }], isError };
}

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const a: Record<string, unknown> = args ?? {};

  try {
    if (name === "mail_list_folders") {
      const folders = await withImapSession(IMAP_CONFIG, (session) => session.listMailboxes(), logger);
      return textResult(JSON.stringify(folders.filter((f) => f.selectable), null, 2));
    }

    if (name === "mail_resolve_message_id") {
      const messageId = toOptString(a.messageId);
      if (!messageId) return textResult("Error: messageId must be a non-empty string", true);
      const options = buildResolveOptions(a, a.includeBody === true);
      const result = await withImapSession(
        IMAP_CONFIG,
        (session) => resolveIdentifier(session, messageId, options),
        logger
      );
      return textResult(JSON.stringify(result, null, 2));
    }

    if (name === "mail_resolve_message_ids") {
      const messageIds = toStringList(a.messageIds);
      if (!messageIds) return textResult("Error: messageIds must be a non-empty array of strings", true);
      const options = buildResolveOptions(a, false);
      const results = await withImapSession(
        IMAP_CONFIG,
        (session) => resolveIdentifiers(session, messageIds, options),
        logger
      );
      if (a.format === "csv") return textResult(toCsv(results.map(toExportRow)));
      return textResult(JSON.stringify(results, null, 2));
    }

    return textResult(`Unknown tool: ${name}`, true);
  } catch (err) {
    return textResult(`Error: ${describeError(err)}`, true);
  }
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  logger.fatal({ err: describeError(err) }, "server failed");
  process.exit(1);
});
