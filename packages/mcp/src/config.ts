/**
 * Tool-server configuration: raw entry schema, transport inference and validation
 */

import { z } from "zod";
import type { TimeoutConfig } from "./timeouts.js";

export const TRANSPORT_KINDS = ["stdio", "sse", "http", "streamable_http"] as const;

export type TransportKind = (typeof TRANSPORT_KINDS)[number];

/**
 * One entry of an mcp.json `mcpServers` mapping. Timeouts are in seconds.
 */
export const ServerEntrySchema = z
  .object({
    type: z.string().optional(),
    command: z.string().optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    url: z.string().optional(),
    headers: z.record(z.string()).default({}),
    disabled: z.boolean().default(false),
    connect_timeout: z.number().positive().optional(),
    execute_timeout: z.number().positive().optional(),
    sse_read_timeout: z.number().positive().optional(),
  })
  .passthrough();

export type ServerEntry = z.infer<typeof ServerEntrySchema>;

type ServerBase = {
  name: string;
  timeouts: Partial<TimeoutConfig>;
};

export type StdioServerConfig = ServerBase & {
  kind: "stdio";
  command: string;
  args: string[];
  env: Record<string, string>;
};

export type UrlServerConfig = ServerBase & {
  kind: "sse" | "http" | "streamable_http";
  url: string;
  headers: Record<string, string>;
};

export type ServerConfig = StdioServerConfig | UrlServerConfig;

export type ParseResult =
  | { ok: true; config: ServerConfig }
  | { ok: false; reason: string };

function isTransportKind(value: string): value is TransportKind {
  return TRANSPORT_KINDS.some((kind) => kind === value);
}

/**
 * Pick the transport for an entry: explicit `type` (case-insensitive), then
 * `command` without `url` means stdio, then `url` means streamable_http, else stdio.
 */
export function determineTransport(entry: {
  type?: string;
  command?: string;
  url?: string;
}): TransportKind {
  const explicit = entry.type?.toLowerCase();
  if (explicit !== undefined && isTransportKind(explicit)) {
    return explicit;
  }
  if (entry.command !== undefined && entry.url === undefined) {
    return "stdio";
  }
  if (entry.url !== undefined) {
    return "streamable_http";
  }
  return "stdio";
}

const toMs = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

function timeoutsOf(entry: ServerEntry): Partial<TimeoutConfig> {
  const timeouts: Partial<TimeoutConfig> = {};
  const connect = toMs(entry.connect_timeout);
  const execute = toMs(entry.execute_timeout);
  const read = toMs(entry.sse_read_timeout);
  if (connect !== undefined) timeouts.connect = connect;
  if (execute !== undefined) timeouts.execute = execute;
  if (read !== undefined) timeouts.read = read;
  return timeouts;
}

/**
 * Whether a raw entry is switched off; malformed entries count as enabled so
 * validation reports them.
 */
export function isDisabled(raw: unknown): boolean {
  const parsed = ServerEntrySchema.safeParse(raw);
  return parsed.success && parsed.data.disabled;
}

/**
 * Validate one raw entry into a transport-specific config
 */
export function parseServerEntry(name: string, raw: unknown): ParseResult {
  const parsed = ServerEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "entry"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason: `Invalid config for '${name}': ${issues}` };
  }

  const entry = parsed.data;
  const kind = determineTransport(entry);
  const timeouts = timeoutsOf(entry);

  if (kind === "stdio") {
    if (!entry.command) {
      return { ok: false, reason: `Server '${name}' uses stdio but has no command` };
    }
    return {
      ok: true,
      config: { kind, name, command: entry.command, args: entry.args, env: entry.env, timeouts },
    };
  }

  if (!entry.url) {
    return { ok: false, reason: `Server '${name}' uses ${kind} but has no url` };
  }
  return {
    ok: true,
    config: { kind, name, url: entry.url, headers: entry.headers, timeouts },
  };
}
