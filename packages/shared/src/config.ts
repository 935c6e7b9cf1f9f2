import { z } from "zod";
import { parseLogLevel, type LogLevel } from "./logger";

export const DEFAULT_EMBEDDER_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-large";
export const DEFAULT_SCHEMA = "public";

export const TlsBackendZ = z.enum(["undici", "node"]);
export type TlsBackend = z.infer<typeof TlsBackendZ>;

export const TlsMinVersionZ = z.enum(["TLSv1.2", "TLSv1.3"]);
export type TlsMinVersion = z.infer<typeof TlsMinVersionZ>;

export type AppConfig = {
  readonly database: {
    readonly url: string;
    readonly serviceKey: string;
    readonly schema: string;
    readonly plainBase: boolean;
  };
  readonly embedder: {
    readonly apiKey?: string;
    readonly baseUrl: string;
    readonly model: string;
    readonly dims?: number;
    readonly useFake: boolean;
  };
  readonly tls: {
    readonly backend: TlsBackend;
    readonly minVersion: TlsMinVersion;
    readonly acceptInvalidCerts: boolean;
  };
  readonly logLevel: LogLevel;
  readonly maxConcurrentTools?: number;
};

export class ConfigError extends Error {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

// Empty strings behave like unset variables.
const OptionalStringZ = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const FlagZ = OptionalStringZ.transform((value) => {
  if (!value) return false;
  return value.toLowerCase() === "true" || value === "1";
});

const PositiveIntZ = OptionalStringZ.transform((value, ctx) => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a positive integer" });
    return z.NEVER;
  }
  return parsed;
});

const TlsMinVersionInputZ = OptionalStringZ.transform((value, ctx) => {
  if (value === undefined || value === "1.2" || value === "TLSv1.2") return "TLSv1.2" as const;
  if (value === "1.3" || value === "TLSv1.3") return "TLSv1.3" as const;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be 1.2 or 1.3" });
  return z.NEVER;
});

const TlsBackendInputZ = OptionalStringZ.transform((value, ctx) => {
  const parsed = TlsBackendZ.safeParse((value ?? "undici").toLowerCase());
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be undici or node" });
    return z.NEVER;
  }
  return parsed.data;
});

const EnvZ = z.object({
  DATABASE_URL: OptionalStringZ,
  DATABASE_SERVICE_KEY: OptionalStringZ,
  DATABASE_SCHEMA: OptionalStringZ,
  DATABASE_PLAIN_BASE: FlagZ,
  EMBEDDER_API_KEY: OptionalStringZ,
  EMBEDDER_BASE_URL: OptionalStringZ,
  EMBEDDING_MODEL: OptionalStringZ,
  EMBEDDING_DIMS: PositiveIntZ,
  EMBEDDER_USE_FAKE: FlagZ,
  LOG_LEVEL: OptionalStringZ,
  TLS_BACKEND: TlsBackendInputZ,
  TLS_MIN_VERSION: TlsMinVersionInputZ,
  DANGER_ACCEPT_INVALID_CERTS: FlagZ,
  MAX_CONCURRENT_TOOLS: PositiveIntZ,
});

/**
 * Parses the process environment into an immutable config object.
 * Called once at startup; everything downstream receives the result explicitly.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvZ.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const vars = parsed.data;

  // `memory:` URLs select the in-process store, which needs no credential.
  const inMemory = vars.DATABASE_URL?.startsWith("memory:") ?? false;
  const serviceKey = vars.DATABASE_SERVICE_KEY ?? (inMemory ? "" : undefined);

  const missing: string[] = [];
  if (!vars.DATABASE_URL) missing.push("DATABASE_URL");
  if (serviceKey === undefined) missing.push("DATABASE_SERVICE_KEY");
  if (!vars.EMBEDDER_USE_FAKE && !vars.EMBEDDER_API_KEY) missing.push("EMBEDDER_API_KEY");

  if (!vars.DATABASE_URL || serviceKey === undefined || missing.length > 0) {
    throw new ConfigError(`Missing required env vars: ${missing.join(", ")}`, missing);
  }

  return Object.freeze({
    database: Object.freeze({
      url: vars.DATABASE_URL,
      serviceKey,
      schema: vars.DATABASE_SCHEMA ?? DEFAULT_SCHEMA,
      plainBase: vars.DATABASE_PLAIN_BASE,
    }),
    embedder: Object.freeze({
      apiKey: vars.EMBEDDER_API_KEY,
      baseUrl: vars.EMBEDDER_BASE_URL ?? DEFAULT_EMBEDDER_BASE_URL,
      model: vars.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODEL,
      dims: vars.EMBEDDING_DIMS,
      useFake: vars.EMBEDDER_USE_FAKE,
    }),
    tls: Object.freeze({
      backend: vars.TLS_BACKEND,
      minVersion: vars.TLS_MIN_VERSION,
      acceptInvalidCerts: vars.DANGER_ACCEPT_INVALID_CERTS,
    }),
    logLevel: parseLogLevel(vars.LOG_LEVEL),
    maxConcurrentTools: vars.MAX_CONCURRENT_TOOLS,
  });
}

/** Host part of the database URL, for startup logs that must not print credentials. */
export function describeDatabaseUrl(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "<invalid url>";
  }
}
