// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http/request`
 * Purpose: Request body and route parameter readers shared by v1 route handlers.
 * Scope: Parses JSON bodies, multipart image fields and Next.js 15 async params. Does not validate shapes; contracts do that.
 * Invariants: Malformed bodies surface as InvalidRequestBodyError (400), never as 500.
 * Side-effects: none
 * Links: app/_lib/http/handleRouteError
 * @public
 */
import type { NextRequest } from "next/server";

import { IdSchema } from "@/contracts/common.v1.contract";
import {
  type EntityKind,
  FieldValidationError,
  type ImageUpload,
  NotFoundError,
} from "@/core";

export class InvalidRequestBodyError extends Error {
  public readonly code = "INVALID_BODY" as const;
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestBodyError";
  }
}

export function isInvalidRequestBodyError(
  error: unknown
): error is InvalidRequestBodyError {
  return error instanceof InvalidRequestBodyError;
}

export async function readJsonBody(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new InvalidRequestBodyError("Invalid JSON body");
  }
}

export async function requireParams<T>(
  context: { params: Promise<T> } | undefined
): Promise<T> {
  if (!context) {
    throw new Error("Route params missing from handler context");
  }
  return context.params;
}

/**
 * Path ids that are not UUIDs cannot match a row; answer 404 instead of a database error.
 */
export function parseEntityId(entity: EntityKind, value: string): string {
  if (!IdSchema.safeParse(value).success) {
    throw new NotFoundError(entity, value);
  }
  return value;
}

/**
 * Reads a single file field from a multipart body.
 */
export async function readImageUpload(
  request: NextRequest,
  field = "image"
): Promise<ImageUpload> {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    throw new InvalidRequestBodyError("Expected a multipart/form-data body");
  }

  const file = form.get(field);
  if (!(file instanceof File)) {
    throw new FieldValidationError({ [field]: ["An image file is required."] });
  }

  return {
    filename: file.name,
    mimeType: file.type,
    bytes: new Uint8Array(await file.arrayBuffer()),
  };
}

/**
 * Plain record of query parameters; repeated keys are returned as arrays.
 */
export function searchParamsRecord(
  request: NextRequest,
  repeated: readonly string[] = []
): Record<string, string | string[]> {
  const params = request.nextUrl.searchParams;
  const record: Record<string, string | string[]> = {};
  for (const key of new Set(params.keys())) {
    record[key] = repeated.includes(key)
      ? params.getAll(key)
      : (params.get(key) ?? "");
  }
  return record;
}
