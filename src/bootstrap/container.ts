// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for runtime dependency injection. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; config.unhandledErrorPolicy set by env.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: APP_ENV=test swaps the mailer and image store for in-memory fakes and lowers the bcrypt cost; the database stays real.
 *        Without SMTP_HOST the mailer logs and skips delivery.
 * Links: Used by facades and route wrappers; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  BcryptPasswordHasher,
  DEFAULT_BCRYPT_COST,
  DrizzleMessageRepository,
  DrizzleOneTimeTokenRepository,
  DrizzleProfileRepository,
  DrizzleProjectRepository,
  DrizzleReviewRepository,
  DrizzleSearchRepository,
  DrizzleSkillRepository,
  DrizzleUserRepository,
  getDb,
  JwtTokenService,
  LocalImageStore,
  LogOnlyMailer,
  SharpImageProcessor,
  SmtpMailer,
  SystemClock,
} from "@/adapters/server";
import { getTestMailer, InMemoryImageStore } from "@/adapters/test";
import type {
  Clock,
  ImageProcessor,
  ImageStore,
  Mailer,
  MessageRepository,
  OneTimeTokenRepository,
  PasswordHasher,
  ProfileRepository,
  ProjectRepository,
  ReviewRepository,
  SearchRepository,
  SkillRepository,
  TokenService,
  UserRepository,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export type UnhandledErrorPolicy = "rethrow" | "respond_500";

export interface RateLimitBypassConfig {
  enabled: boolean;
  headerName: string;
  headerValue: string;
}

export interface ContainerConfig {
  /** How to handle unhandled errors in route wrappers: rethrow for dev/test, respond_500 for production safety */
  unhandledErrorPolicy: UnhandledErrorPolicy;
  /** Rate limit bypass for stack tests; only enabled when APP_ENV=test */
  rateLimitBypass: RateLimitBypassConfig;
  appBaseUrl: string;
  emailTokenTtlSeconds: number;
  maxUploadBytes: number;
  /** Cookie `Secure` flag */
  secureCookies: boolean;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  clock: Clock;
  users: UserRepository;
  oneTimeTokens: OneTimeTokenRepository;
  profiles: ProfileRepository;
  skills: SkillRepository;
  projects: ProjectRepository;
  reviews: ReviewRepository;
  messages: MessageRepository;
  search: SearchRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  mailer: Mailer;
  imageProcessor: ImageProcessor;
  imageStore: ImageStore;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createMailer(env: ReturnType<typeof serverEnv>, log: Logger): Mailer {
  if (env.isTestMode) {
    return getTestMailer();
  }
  if (!env.SMTP_HOST) {
    log.warn("SMTP_HOST not configured; outgoing mail will be logged and skipped");
    return new LogOnlyMailer();
  }
  return new SmtpMailer({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    user: env.SMTP_USER,
    password: env.SMTP_PASSWORD,
    from: env.MAIL_FROM,
  });
}

function createContainer(): Container {
  const env = serverEnv();
  const db = getDb();
  const log = makeLogger({ service: "devsearch" });
  const clock = new SystemClock();

  // Startup log - no URLs/secrets
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      smtp: env.SMTP_HOST ? "configured" : "log_only",
    },
    "container initialized"
  );

  const config: ContainerConfig = {
    unhandledErrorPolicy: env.isProd ? "respond_500" : "rethrow",
    // Security: production builds never enable bypass regardless of header
    rateLimitBypass: {
      enabled: env.isTestMode,
      headerName: "x-stack-test",
      headerValue: "1",
    },
    appBaseUrl: env.APP_BASE_URL,
    emailTokenTtlSeconds: env.EMAIL_TOKEN_TTL_SECONDS,
    maxUploadBytes: env.UPLOAD_MAX_BYTES,
    secureCookies: env.isProd,
  };

  return {
    log,
    config,
    clock,
    users: new DrizzleUserRepository(db),
    oneTimeTokens: new DrizzleOneTimeTokenRepository(db),
    profiles: new DrizzleProfileRepository(db),
    skills: new DrizzleSkillRepository(db),
    projects: new DrizzleProjectRepository(db),
    reviews: new DrizzleReviewRepository(db),
    messages: new DrizzleMessageRepository(db),
    search: new DrizzleSearchRepository(db),
    passwordHasher: new BcryptPasswordHasher(
      env.isTestMode ? 4 : DEFAULT_BCRYPT_COST
    ),
    tokenService: new JwtTokenService({
      secret: env.AUTH_SECRET,
      accessTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
      refreshTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
    }),
    mailer: createMailer(env, log),
    imageProcessor: new SharpImageProcessor(),
    imageStore: env.isTestMode
      ? new InMemoryImageStore()
      : new LocalImageStore(
          { uploadDir: env.UPLOAD_DIR, publicPath: env.UPLOAD_PUBLIC_PATH },
          clock
        ),
  };
}
