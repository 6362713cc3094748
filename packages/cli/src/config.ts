/**
 * CLI settings: settings file, then environment, then command-line flags
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";

export const PROVIDERS = ["anthropic", "openai"] as const;

export type ProviderName = (typeof PROVIDERS)[number];

export const DEFAULT_SYSTEM_PROMPT =
  "You are a capable assistant. Use the available tools when they help, and answer concisely once the task is done.";

const RetrySettingsSchema = z.object({
  enabled: z.boolean().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  initialDelay: z.number().positive().optional(),
  maxDelay: z.number().positive().optional(),
  exponentialBase: z.number().min(1).optional(),
});

// Seconds, like the tool-server config
const TimeoutSettingsSchema = z.object({
  connect: z.number().positive().optional(),
  execute: z.number().positive().optional(),
  read: z.number().positive().optional(),
});

export const SettingsSchema = z.object({
  provider: z.enum(PROVIDERS).default("anthropic"),
  model: z.string().min(1).optional(),
  apiKey: z.string({ required_error: "no API key; set ANTHROPIC_API_KEY or OPENAI_API_KEY" }).min(1),
  baseURL: z.string().url().optional(),
  maxSteps: z.number().int().positive().default(50),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  mcpConfig: z.string().min(1).optional(),
  notesFile: z.string().min(1).optional(),
  /** Directory the file and bash tools work in (default: the current directory) */
  workspaceDir: z.string().min(1).optional(),
  fileTools: z.boolean().default(true),
  bashTool: z.boolean().default(true),
  prefixToolNames: z.boolean().default(false),
  retry: RetrySettingsSchema.default({}),
  timeouts: TimeoutSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type LoadSettingsOptions = {
  /** JSON settings file; a missing file is an error when named explicitly */
  file?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from command-line flags */
  overrides?: Record<string, unknown>;
};

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

async function readSettingsFile(file: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch {
    throw new ConfigError(`Settings file not found: ${file}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Settings file ${file} is not valid JSON: ${reason}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Settings file ${file} must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function fromEnv(env: NodeJS.ProcessEnv, provider: unknown): Record<string, unknown> {
  const apiKey = provider === "openai" ? env.OPENAI_API_KEY : env.ANTHROPIC_API_KEY;
  return withoutUndefined({
    provider: env.STEPWISE_PROVIDER?.toLowerCase(),
    apiKey,
    model: env.STEPWISE_MODEL,
    baseURL: env.STEPWISE_BASE_URL,
  });
}

export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const fromFile = options.file ? await readSettingsFile(options.file) : {};
  const fromFlags = withoutUndefined(options.overrides ?? {});

  // The provider decides which API key variable applies
  const provider =
    fromFlags.provider ?? env.STEPWISE_PROVIDER?.toLowerCase() ?? fromFile.provider ?? "anthropic";

  const merged = { ...fromFile, ...fromEnv(env, provider), ...fromFlags };
  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid settings",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
