// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export {
  type CompressedImage,
  ImageDecodePortError,
  type ImageProcessor,
  type ImageStore,
  isImageDecodePortError,
} from "./image.port";
export {
  isMailDeliveryPortError,
  MailDeliveryPortError,
  type MailMessage,
  type Mailer,
} from "./mailer.port";
export type { Message, MessageRepository, NewMessage } from "./message.port";
export type {
  CreateOneTimeTokenParams,
  OneTimeToken,
  OneTimeTokenPurpose,
  OneTimeTokenRepository,
  TokenEffect,
} from "./one-time-token.port";
export type { PasswordHasher } from "./password-hasher.port";
export type {
  CreateSkillParams,
  Profile,
  ProfilePatch,
  ProfileRepository,
  Skill,
  SkillPatch,
  SkillRepository,
} from "./profile.port";
export type {
  AddTagResult,
  CreateProjectParams,
  CreateReviewParams,
  Project,
  ProjectDetail,
  ProjectPatch,
  ProjectRepository,
  Review,
  ReviewPatch,
  ReviewRepository,
  ReviewWithAuthor,
  Tag,
} from "./project.port";
export type {
  DeveloperSearchCriteria,
  DeveloperSummary,
  ProjectSearchCriteria,
  SearchRepository,
  SearchSlice,
} from "./search.port";
export type {
  IssuedToken,
  TokenKind,
  TokenService,
} from "./token-service.port";
export {
  AccountConflictPortError,
  type CreateUserParams,
  isAccountConflictPortError,
  type User,
  type UserRepository,
} from "./user.port";
