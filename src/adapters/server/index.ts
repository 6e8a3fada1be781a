// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Notes: Bootstrap imports adapters only through this file
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { DrizzleOneTimeTokenRepository } from "./accounts/drizzle-one-time-token.adapter";
export { DrizzleUserRepository } from "./accounts/drizzle-user.adapter";
export {
  BcryptPasswordHasher,
  DEFAULT_BCRYPT_COST,
} from "./auth/bcrypt-password-hasher.adapter";
export {
  JwtTokenService,
  type JwtTokenServiceConfig,
} from "./auth/jwt-token-service.adapter";
export { type Database, getDb } from "./db/client";
export {
  LocalImageStore,
  type LocalImageStoreConfig,
} from "./images/local-image-store.adapter";
export { SharpImageProcessor } from "./images/sharp-image-processor.adapter";
export { LogOnlyMailer } from "./mail/log-only-mailer.adapter";
export { SmtpMailer, type SmtpMailerConfig } from "./mail/smtp-mailer.adapter";
export { DrizzleMessageRepository } from "./messaging/drizzle-message.adapter";
export { DrizzleProfileRepository } from "./profiles/drizzle-profile.adapter";
export { DrizzleSkillRepository } from "./profiles/drizzle-skill.adapter";
export { DrizzleProjectRepository } from "./projects/drizzle-project.adapter";
export { DrizzleReviewRepository } from "./projects/drizzle-review.adapter";
export { DrizzleSearchRepository } from "./search/drizzle-search.adapter";
export { SystemClock } from "./time/system.adapter";
