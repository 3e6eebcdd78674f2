import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { DEFAULT_DENYLIST } from "../sanitizer/sanitize";
import type { RateLimitPolicy } from "../types/policy";
import type { OriginPolicyConfig } from "../middleware/cors.middleware";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, "must be an http(s) URL");

export const EnvSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    BACKEND_URL: httpUrl,
    MONGO_URI: z.string().regex(/^mongodb(\+srv)?:\/\//, "must be a mongodb:// or mongodb+srv:// URI"),
    MONGO_DB: z.string().min(1).default("Middleware_Logs"),
    MONGO_COLLECTION: z.string().min(1).default("graphql_logs"),
    GUARD_PATH: z.string().startsWith("/", "must start with /").default("/public"),
    SANITIZE_DENYLIST: z.string().default(DEFAULT_DENYLIST),
    CORS_ALLOWED_ORIGIN: z.string().min(1).default("http://localhost:3000"),
    CORS_ALLOWED_METHODS: z.string().min(1).default("POST, OPTIONS"),
    CORS_ALLOWED_HEADERS: z.string().min(1).default("Content-Type, Authorization"),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(50),
    RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().positive().default(60),
    RATE_LIMIT_STORE: z.enum(["memory", "redis"]).default("memory"),
    RATE_LIMIT_FAILURE_STRATEGY: z
      .enum(["fail-open", "fail-closed", "local-fallback"])
      .default("fail-open"),
    REDIS_URL: z.string().optional(),
    MAX_BODY_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
    AUDIT_QUEUE_SIZE: z.coerce.number().int().positive().default(1000),
    AUDIT_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    UPSTREAM_HEADERS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    UPSTREAM_BODY_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  })
  .superRefine((env, ctx) => {
    if (env.RATE_LIMIT_STORE === "redis" && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REDIS_URL"],
        message: "is required when RATE_LIMIT_STORE=redis",
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export interface GuardConfig {
  nodeEnv: Env["NODE_ENV"];
  port: number;
  guardPath: string;
  upstreamUrl: URL;
  denylist: string;
  maxBodyBytes: number;
  cors: OriginPolicyConfig;
  rateLimit: RateLimitPolicy;
  rateLimitStore: Env["RATE_LIMIT_STORE"];
  redisUrl?: string;
  mongo: {
    uri: string;
    database: string;
    collection: string;
  };
  audit: {
    queueSize: number;
    writeTimeoutMs: number;
  };
  upstream: {
    headersTimeoutMs: number;
    bodyTimeoutMs: number;
  };
}

/**
 * Validates the environment and maps it onto the runtime configuration.
 * Throws ConfigError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    guardPath: e.GUARD_PATH,
    upstreamUrl: new URL(e.BACKEND_URL),
    denylist: e.SANITIZE_DENYLIST,
    maxBodyBytes: e.MAX_BODY_BYTES,
    cors: {
      allowedOrigin: e.CORS_ALLOWED_ORIGIN,
      allowedMethods: e.CORS_ALLOWED_METHODS,
      allowedHeaders: e.CORS_ALLOWED_HEADERS,
    },
    rateLimit: {
      limit: e.RATE_LIMIT_MAX,
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
      failureStrategy: e.RATE_LIMIT_FAILURE_STRATEGY,
    },
    rateLimitStore: e.RATE_LIMIT_STORE,
    redisUrl: e.REDIS_URL,
    mongo: {
      uri: e.MONGO_URI,
      database: e.MONGO_DB,
      collection: e.MONGO_COLLECTION,
    },
    audit: {
      queueSize: e.AUDIT_QUEUE_SIZE,
      writeTimeoutMs: e.AUDIT_WRITE_TIMEOUT_MS,
    },
    upstream: {
      headersTimeoutMs: e.UPSTREAM_HEADERS_TIMEOUT_MS,
      bodyTimeoutMs: e.UPSTREAM_BODY_TIMEOUT_MS,
    },
  };
}

/**
 * Reads `.env` (if present) into process.env, then validates it.
 */
export function loadConfigFromEnvironment(): GuardConfig {
  loadDotenv();
  return loadConfig(process.env);
}
