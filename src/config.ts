/**
 * Configuration for the IMAP session and the resolver.
 * Loaded from environment (see .env.example) and passed explicitly to whoever needs it.
 */

import { readFileSync } from "node:fs";
import { ConfigError } from "./errors.js";

export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  /** When true, reject self-signed TLS certs. */
  tlsRejectUnauthorized: boolean;
  user: string;
  pass: string;
  /** Socket inactivity timeout in milliseconds. */
  socketTimeoutMs: number;
}

export interface ResolverConfig {
  priorityMailboxes: string[];
  /** Sender domains recognised inside identifiers for the time-window filter. */
  hintDomains: string[];
  /** Characters of body text included with a match. */
  bodyPreviewLength: number;
}

export interface ProviderPreset {
  server: string;
  port: number;
}

export type Env = Record<string, string | undefined>;

export const BUILTIN_PROVIDERS: Readonly<Record<string, ProviderPreset>> = {
  gmail: { server: "imap.gmail.com", port: 993 },
  outlook: { server: "outlook.office365.com", port: 993 },
  yahoo: { server: "imap.mail.yahoo.com", port: 993 },
};

export const DEFAULT_PRIORITY_MAILBOXES: readonly string[] = [
  "Trash",
  "Junk",
  "Spam",
  "Sent",
  "Drafts",
  "Archive",
  "[Gmail]/All Mail",
  "[Gmail]/Trash",
  "[Gmail]/Spam",
  "[Gmail]/Sent Mail",
  "[Gmail]/Drafts",
];

function isProviderPreset(value: unknown): value is ProviderPreset {
  if (typeof value !== "object" || value === null || !("server" in value) || !("port" in value)) return false;
  const { server, port } = value;
  return typeof server === "string" && server.length > 0 && typeof port === "number" && Number.isInteger(port);
}

/** Validate a provider table read from JSON: `{ name: { server, port } }`. */
export function parseProviderTable(json: string, source: string): Record<string, ProviderPreset> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError(`${source} must contain a JSON object of providers`);
  }
  const out: Record<string, ProviderPreset> = {};
  for (const [name, entry] of Object.entries(data)) {
    if (!isProviderPreset(entry)) {
      throw new ConfigError(`${source}: provider "${name}" needs a string server and an integer port`);
    }
    out[name.toLowerCase()] = { server: entry.server, port: entry.port };
  }
  return out;
}

export function loadProviderPresets(env: Env = process.env): Record<string, ProviderPreset> {
  const presets: Record<string, ProviderPreset> = { ...BUILTIN_PROVIDERS };
  const file = env.IMAP_PROVIDERS_FILE?.trim();
  if (!file) return presets;
  let json: string;
  try {
    json = readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read IMAP_PROVIDERS_FILE ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return { ...presets, ...parseProviderTable(json, file) };
}

function read(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value == null) return defaultValue;
  return value.toLowerCase() === "true";
}

function parseNonNegativeInt(value: string | undefined, defaultValue: number): number {
  const n = parseInt(value ?? "", 10);
  return Number.isNaN(n) || n < 0 ? defaultValue : n;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value == null) return undefined;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadImapConfig(env: Env = process.env): ImapConfig {
  const providerName = read(env, "IMAP_PROVIDER")?.toLowerCase();
  let preset: ProviderPreset | undefined;
  if (providerName) {
    const presets = loadProviderPresets(env);
    preset = presets[providerName];
    if (!preset) {
      throw new ConfigError(
        `Unknown IMAP_PROVIDER "${providerName}". Known providers: ${Object.keys(presets).sort().join(", ")}`
      );
    }
  }

  const host = read(env, "IMAP_HOST") ?? preset?.server;
  if (!host) {
    throw new ConfigError("Missing IMAP host: set IMAP_HOST or IMAP_PROVIDER.");
  }
  const user = read(env, "IMAP_USER");
  const pass = read(env, "IMAP_PASS") ?? read(env, "IMAP_PASSWORD");
  if (!user || !pass) {
    throw new ConfigError(
      `Missing required env: ${!user ? "IMAP_USER" : "IMAP_PASS"}. Copy .env.example to .env and set IMAP_USER and IMAP_PASS.`
    );
  }

  const defaultPort = preset?.port ?? 993;
  const port = parseInt(read(env, "IMAP_PORT") ?? String(defaultPort), 10) || defaultPort;
  return {
    host,
    port,
    secure: parseBool(read(env, "IMAP_SECURE"), true),
    tlsRejectUnauthorized: parseBool(read(env, "IMAP_TLS_REJECT_UNAUTHORIZED"), true),
    user,
    pass,
    socketTimeoutMs: parseNonNegativeInt(read(env, "IMAP_SOCKET_TIMEOUT"), 60) * 1000,
  };
}

export function loadResolverConfig(env: Env = process.env): ResolverConfig {
  return {
    priorityMailboxes: parseList(read(env, "RESOLVER_PRIORITY_MAILBOXES")) ?? [...DEFAULT_PRIORITY_MAILBOXES],
    hintDomains: parseList(read(env, "RESOLVER_HINT_DOMAINS")) ?? [],
    bodyPreviewLength: parseNonNegativeInt(read(env, "RESOLVER_BODY_PREVIEW_LENGTH"), 200),
  };
}
