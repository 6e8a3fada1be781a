// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by ports, features and adapters via the \@/core alias
 * @public
 */

export type {
  AuthenticatedUser,
  OneTimeToken,
  OneTimeTokenPurpose,
  User,
} from "./accounts/public";
export {
  assertTokenRedeemable,
  EMAIL_MAX_LENGTH,
  InvalidCredentialsError,
  InvalidTokenError,
  isInvalidCredentialsError,
  isInvalidTokenError,
  isTokenAlreadyUsedError,
  isTokenExpiredError,
  isValidEmailFormat,
  normalizeEmail,
  passwordPolicyViolations,
  TokenAlreadyUsedError,
  TokenExpiredError,
  usernameFormatViolations,
} from "./accounts/public";
export type { EntityKind, FieldErrors } from "./common/public";
export {
  FieldValidationError,
  ForbiddenError,
  isFieldValidationError,
  isForbiddenError,
  isNotFoundError,
  isUnauthorizedError,
  NotFoundError,
  UnauthorizedError,
} from "./common/public";
export type {
  Message,
  MessageParticipation,
  NewMessage,
} from "./messaging/public";
export {
  compareInbox,
  countUnread,
  isParticipant,
  isPurgeable,
  MESSAGE_BODY_MAX_LENGTH,
  MESSAGE_SUBJECT_MAX_LENGTH,
  participation,
} from "./messaging/public";
export type {
  DeveloperSummary,
  Profile,
  ProfileLinkField,
  ProfileLinks,
  ProfilePatch,
  Skill,
  SkillPatch,
} from "./profiles/public";
export {
  DEFAULT_IMAGES,
  isHttpUrl,
  isRemovableImage,
  nextSkillPosition,
  PROFILE_LINK_FIELDS,
  PROFILE_TEXT_MAX_LENGTH,
  SKILL_NAME_MAX_LENGTH,
  sortSkills,
} from "./profiles/public";
export type {
  NewProjectInput,
  Project,
  ProjectDetail,
  ProjectOwner,
  ProjectPatch,
  Review,
  ReviewWithAuthor,
  Tag,
  VoteAggregate,
  VoteValue,
} from "./projects/public";
export {
  AlreadyVotedError,
  assertCanReview,
  assertProjectOwner,
  computeVoteAggregate,
  DuplicateTagError,
  isAlreadyVotedError,
  isDuplicateTagError,
  normalizeTagName,
  normalizeTagNames,
  PROJECT_TITLE_MAX_LENGTH,
  TAG_NAME_MAX_LENGTH,
} from "./projects/public";
export type {
  DeveloperSearchCriteria,
  Page,
  PageRangeItem,
  PageRequest,
  ProjectSearchCriteria,
} from "./search/public";
export {
  buildPageRange,
  DEFAULT_PAGE_SIZE,
  escapeLikePattern,
  MAX_PAGE_SIZE,
  normalizeDeveloperCriteria,
  normalizePageRequest,
  normalizeProjectCriteria,
  normalizeQuery,
  PAGE_GAP,
  pageCount,
  pageOffset,
  toPage,
} from "./search/public";
export type {
  ImageUpload,
  InvalidImageReason,
  StoredImagePath,
} from "./uploads/public";
export {
  ALLOWED_IMAGE_TYPES,
  checkImageUpload,
  COMPRESSED_JPEG_QUALITY,
  COMPRESSED_MAX_DIMENSION,
  InvalidImageError,
  isInvalidImageError,
} from "./uploads/public";
