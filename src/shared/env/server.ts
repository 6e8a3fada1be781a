// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for server runtime; provides lazy server environment access. Does not handle client-side env vars.
 * Invariants: All required env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV drives adapter wiring; DATABASE_URL from direct var or component vars; token lifetimes in seconds.
 *        Lazy init prevents build-time access.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

import { buildDatabaseUrl } from "@/shared/db/db-url";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),
  APP_BASE_URL: z.string().url().default("http://localhost:3000"),

  // Database connection: either provide DATABASE_URL directly OR component pieces
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_USER: z.string().min(1).optional(),
  POSTGRES_PASSWORD: z.string().min(1).optional(),
  POSTGRES_DB: z.string().min(1).optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().default(5432),

  // Token signing
  AUTH_SECRET: z.string().min(32),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(18_000),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(86_400),
  EMAIL_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(7_200),

  // Mail transport
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().min(1).optional(),
  SMTP_PASSWORD: z.string().min(1).optional(),
  SMTP_SECURE: booleanFlag,
  MAIL_FROM: z.string().min(3).default("DevSearch <no-reply@devsearch.local>"),

  // Uploads
  UPLOAD_DIR: z.string().min(1).default("public/uploads"),
  UPLOAD_PUBLIC_PATH: z.string().startsWith("/").default("/uploads"),
  UPLOAD_MAX_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),

  // Observability
  METRICS_TOKEN: z.string().min(32).optional(),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  DATABASE_URL: string;
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

function resolveDatabaseUrl(parsed: z.infer<typeof serverSchema>): string {
  if (parsed.DATABASE_URL) {
    return parsed.DATABASE_URL;
  }
  if (
    !parsed.POSTGRES_USER ||
    !parsed.POSTGRES_PASSWORD ||
    !parsed.POSTGRES_DB ||
    !parsed.DB_HOST
  ) {
    throw new EnvValidationError({
      code: "INVALID_ENV",
      missing: ["DATABASE_URL"],
      invalid: [],
    });
  }
  return buildDatabaseUrl({
    POSTGRES_USER: parsed.POSTGRES_USER,
    POSTGRES_PASSWORD: parsed.POSTGRES_PASSWORD,
    POSTGRES_DB: parsed.POSTGRES_DB,
    DB_HOST: parsed.DB_HOST,
    DB_PORT: parsed.DB_PORT,
  });
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);

      ENV = {
        ...parsed,
        DATABASE_URL: resolveDatabaseUrl(parsed),
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // invalid_type covers undefined (missing) values
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

export type { ServerEnv };
