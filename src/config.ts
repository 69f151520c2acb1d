import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ============================================================================
// Schema
// ============================================================================

const DirectoryConfigSchema = Type.Object({
  baseUrl: Type.String({ default: "" }),
  tokenUrl: Type.String({ default: "" }),
  clientId: Type.String({ default: "" }),
  clientSecret: Type.String({ default: "" }),
  pageSize: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
  requestTimeoutMs: Type.Integer({ minimum: 1, default: 15_000 }),
  fetchDeadlineMs: Type.Integer({ minimum: 1, default: 120_000 }),
});

const AppConfigSchema = Type.Object({
  databaseUrl: Type.String({
    default: "postgresql://localhost:5432/directory_mirror",
  }),
  directory: DirectoryConfigSchema,
  sync: Type.Object({
    intervalMs: Type.Integer({ minimum: 1000, default: 60_000 }),
    onStart: Type.Boolean({ default: true }),
  }),
  server: Type.Object({
    port: Type.Integer({ minimum: 0, maximum: 65_535, default: 3000 }),
    host: Type.String({ default: "0.0.0.0" }),
  }),
});

export type DirectoryConfig = Static<typeof DirectoryConfigSchema>;
export type AppConfig = Static<typeof AppConfigSchema>;

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

// ============================================================================
// Loading
// ============================================================================

type Env = Record<string, string | undefined>;

/**
 * Drop unset and empty variables so schema defaults apply to them
 */
function present(entries: Record<string, string | undefined>) {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value.trim();
    }
  }
  return out;
}

/**
 * Read the environment into a typed configuration.
 * Numbers and booleans are converted from their string form; anything
 * that still does not match the schema is reported in one ConfigError.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const raw = {
    ...present({ databaseUrl: env.DATABASE_URL }),
    directory: present({
      baseUrl: env.SCIM_BASE_URL,
      tokenUrl: env.SCIM_TOKEN_URL,
      clientId: env.SCIM_CLIENT_ID,
      clientSecret: env.SCIM_CLIENT_SECRET,
      pageSize: env.SCIM_PAGE_SIZE,
      requestTimeoutMs: env.DIRECTORY_REQUEST_TIMEOUT_MS,
      fetchDeadlineMs: env.DIRECTORY_FETCH_DEADLINE_MS,
    }),
    sync: present({
      intervalMs: env.SYNC_INTERVAL_MS,
      onStart: env.SYNC_ON_START,
    }),
    server: present({ port: env.PORT, host: env.HOST }),
  };

  const value = Value.Convert(
    AppConfigSchema,
    Value.Default(AppConfigSchema, raw)
  );

  if (!Value.Check(AppConfigSchema, value)) {
    const problems = [...Value.Errors(AppConfigSchema, value)].map(
      (error) => `${error.path} ${error.message}`
    );
    throw new ConfigError(problems);
  }

  return value;
}

/**
 * The directory credentials are only needed by commands that talk to it
 */
export function assertDirectoryConfigured(config: DirectoryConfig): void {
  const missing: string[] = [];
  if (config.baseUrl === "") missing.push("SCIM_BASE_URL");
  if (config.tokenUrl === "") missing.push("SCIM_TOKEN_URL");
  if (config.clientId === "") missing.push("SCIM_CLIENT_ID");
  if (config.clientSecret === "") missing.push("SCIM_CLIENT_SECRET");

  if (missing.length > 0) {
    throw new ConfigError(missing.map((name) => `${name} is required`));
  }
}
