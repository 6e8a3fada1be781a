// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http/handleRouteError`
 * Purpose: Single mapping from domain and validation errors to HTTP responses for all v1 routes.
 * Scope: Translates known error classes to status codes and client-safe bodies. Does not handle unknown errors.
 * Invariants: Returns null for unrecognized errors so the route wrapper produces the generic 500. Auth failures never say which credential failed.
 * Side-effects: IO (warn log for every mapped error)
 * Links: bootstrap/http/wrapRouteHandlerWithLogging, core/public
 * @public
 */
import { NextResponse } from "next/server";
import { ZodError } from "zod";

import {
  isAlreadyVotedError,
  isDuplicateTagError,
  isFieldValidationError,
  isForbiddenError,
  isInvalidCredentialsError,
  isInvalidImageError,
  isInvalidTokenError,
  isNotFoundError,
  isTokenAlreadyUsedError,
  isTokenExpiredError,
  isUnauthorizedError,
} from "@/core";
import { logRequestWarn, type RequestContext } from "@/shared/observability";

import { isInvalidRequestBodyError } from "./request";

function reject(
  ctx: RequestContext,
  error: unknown,
  code: string,
  status: number,
  body: Record<string, unknown>
): NextResponse {
  logRequestWarn(ctx.log, error, code);
  return NextResponse.json(body, { status });
}

export function handleRouteError(
  ctx: RequestContext,
  error: unknown
): NextResponse | null {
  if (error instanceof ZodError) {
    return reject(ctx, error, "VALIDATION_ERROR", 400, {
      error: "Invalid input",
      fieldErrors: error.flatten().fieldErrors,
    });
  }

  if (isInvalidRequestBodyError(error)) {
    return reject(ctx, error, "INVALID_BODY", 400, { error: error.message });
  }

  if (isFieldValidationError(error)) {
    return reject(ctx, error, "VALIDATION_ERROR", 400, {
      error: "Invalid input",
      fieldErrors: error.fieldErrors,
    });
  }

  if (isInvalidCredentialsError(error)) {
    return reject(ctx, error, "INVALID_CREDENTIALS", 401, {
      error: "Invalid credentials",
    });
  }

  if (isUnauthorizedError(error)) {
    return reject(ctx, error, `UNAUTHORIZED_${error.reason.toUpperCase()}`, 401, {
      error: "Unauthorized",
    });
  }

  if (isForbiddenError(error)) {
    return reject(ctx, error, "FORBIDDEN", 403, { error: "Forbidden" });
  }

  if (isNotFoundError(error)) {
    return reject(ctx, error, "NOT_FOUND", 404, {
      error: "Not found",
      entity: error.entity,
    });
  }

  if (isAlreadyVotedError(error)) {
    return reject(ctx, error, "ALREADY_VOTED", 409, {
      error: "You have already submitted your review for this project",
    });
  }

  if (isTokenAlreadyUsedError(error)) {
    return reject(ctx, error, "TOKEN_ALREADY_USED", 409, {
      error: "This link has already been used",
    });
  }

  if (isDuplicateTagError(error)) {
    return reject(ctx, error, "DUPLICATE_TAG", 409, {
      error: "Tag already added to this project",
    });
  }

  if (isTokenExpiredError(error)) {
    return reject(ctx, error, "TOKEN_EXPIRED", 400, {
      error: "This link has expired",
    });
  }

  if (isInvalidTokenError(error)) {
    return reject(ctx, error, "INVALID_TOKEN", 400, {
      error: "This link is invalid",
    });
  }

  if (isInvalidImageError(error)) {
    return reject(ctx, error, "INVALID_IMAGE", 400, {
      error: error.message,
      fieldErrors: { image: [error.message] },
    });
  }

  return null;
}
