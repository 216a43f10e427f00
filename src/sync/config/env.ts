import { z } from "zod";
import { ConfigError, type ConfigIssue } from "@/sync/errors";

const MISSING = "missing";
const PLACEHOLDER = "placeholder";

const DEFAULT_DATABASE_URL = "./sync_tracker.db";

/** Template values shipped in .env.example, e.g. `your-dify-api-key` or `<token>`. */
export function isPlaceholder(value: string): boolean {
  const trimmed = value.trim();
  return /^your[-_]/i.test(trimmed) || /^<.*>$/.test(trimmed);
}

function required() {
  return z
    .string({ required_error: MISSING })
    .trim()
    .min(1, MISSING)
    .refine((v) => !isPlaceholder(v), PLACEHOLDER);
}

function optionalSetting() {
  return z
    .string()
    .optional()
    .transform((v) => (v && v.trim() && !isPlaceholder(v) ? v.trim() : undefined));
}

// `KEY=` in a .env file arrives as "" and falls back to the default.
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function withDefault<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankAsUnset, schema);
}

function flag(defaultValue: "true" | "false") {
  return withDefault(
    z
      .string()
      .default(defaultValue)
      .transform((v) => v.trim().toLowerCase() === "true"),
  );
}

// Everything a run needs. Checked at the start of every run, before any fetch.
const syncEnvSchema = z.object({
  ATLASSIAN_URL: required(),
  ATLASSIAN_EMAIL: required(),
  ATLASSIAN_API_TOKEN: required(),
  DIFY_API_KEY: required(),
  DIFY_API_URL: required(),
  DIFY_DATASET_ID: required(),

  JIRA_PROJECT_KEY: withDefault(z.string().trim().min(1).default("PROJ")),
  JIRA_SINCE: withDefault(z.string().trim().min(1).default("-30d")),
  CONFLUENCE_SPACE_KEY: optionalSetting(),
  CONFLUENCE_SINCE_DAYS: withDefault(z.coerce.number().int().min(1).default(30)),

  // One page per source; there is no pagination loop.
  SYNC_PAGE_SIZE: withDefault(z.coerce.number().int().min(1).max(1000).default(100)),
  SYNC_REQUEST_TIMEOUT_MS: withDefault(z.coerce.number().int().min(1).default(30_000)),
  SYNC_RETRY_FAILED: flag("true"),

  DATABASE_URL: optionalSetting().transform((v) => v ?? DEFAULT_DATABASE_URL),

  SYNC_LOG_LEVEL: withDefault(z.enum(["debug", "info", "warn", "error"]).default("info")),
});

export type SyncEnv = z.infer<typeof syncEnvSchema>;

/**
 * Validate the run configuration. Throws a ConfigError that names every
 * offending setting.
 */
export function loadSyncEnv(source: NodeJS.ProcessEnv = process.env): SyncEnv {
  const result = syncEnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }
  return result.data;
}

const serverEnvSchema = z.object({
  API_HOST: withDefault(z.string().default("0.0.0.0")),
  API_PORT: withDefault(z.coerce.number().int().min(1).max(65535).default(5000)),
  SCHEDULE_ENABLED: flag("true"),
  SCHEDULE_HOUR: withDefault(z.coerce.number().int().min(0).max(23).default(4)),
  SCHEDULE_MINUTE: withDefault(z.coerce.number().int().min(0).max(59).default(0)),
  SCHEDULE_TIMEZONE: withDefault(z.string().trim().min(1).default("Asia/Shanghai")),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const result = serverEnvSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Server environment validation failed:\n${problems}\n\nCopy .env.example to .env and fill in the values.`
    );
  }
  return result.data;
}

let _serverEnv: ServerEnv | null = null;

export function getServerEnv(): ServerEnv {
  if (!_serverEnv) {
    _serverEnv = loadServerEnv();
  }
  return _serverEnv;
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  const seen = new Set<string>();
  const issues: ConfigIssue[] = [];

  for (const issue of error.issues) {
    const setting = issue.path.join(".");
    if (seen.has(setting)) continue;
    seen.add(setting);

    if (issue.message === MISSING) {
      issues.push({ setting, problem: "missing", detail: "is required" });
    } else if (issue.message === PLACEHOLDER) {
      issues.push({ setting, problem: "placeholder", detail: "still holds a template value" });
    } else {
      issues.push({ setting, problem: "invalid", detail: issue.message });
    }
  }
  return issues;
}
