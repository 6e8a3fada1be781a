// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/forms/useApiForm`
 * Purpose: Client hook that submits a JSON or multipart body to a v1 endpoint and exposes pending state, a form-level error and per-field errors.
 * Scope: Transport and error-shape parsing only. Does not own form values; callers keep them so submitted input survives a failed attempt.
 * Invariants: Never throws; network failures become a form-level error. Field errors come verbatim from the API `fieldErrors`.
 *             A FormData body is sent as multipart (the browser sets the boundary); anything else as JSON.
 * Side-effects: IO (fetch)
 * Links: app/_lib/http/handleRouteError
 * @public
 */

"use client";

import { useCallback, useState } from "react";
import { z } from "zod";

const ApiErrorBodySchema = z.object({
  error: z.string().optional(),
  fieldErrors: z.record(z.array(z.string())).optional(),
});

export interface ApiFormState {
  pending: boolean;
  error: string | null;
  fieldErrors: Record<string, string[]>;
}

export interface UseApiFormOptions {
  url: string;
  method?: "POST" | "PATCH" | "PUT" | "DELETE";
  onSuccess?: (data: unknown) => void;
}

const IDLE: ApiFormState = { pending: false, error: null, fieldErrors: {} };

async function readBody(response: Response): Promise<unknown> {
  if (response.status === 204) return null;
  try {
    return await response.json();
  } catch {
    return null;
  }
}

export function useApiForm(options: UseApiFormOptions): {
  state: ApiFormState;
  submit: (body: unknown) => Promise<boolean>;
} {
  const { url, method = "POST", onSuccess } = options;
  const [state, setState] = useState<ApiFormState>(IDLE);

  const submit = useCallback(
    async (body: unknown): Promise<boolean> => {
      setState({ ...IDLE, pending: true });

      let response: Response;
      try {
        response = await fetch(
          url,
          body instanceof FormData
            ? { method, body }
            : {
                method,
                headers: { "content-type": "application/json" },
                body: JSON.stringify(body),
              }
        );
      } catch {
        setState({ ...IDLE, error: "Network error, please try again." });
        return false;
      }

      const data = await readBody(response);
      if (response.ok) {
        setState(IDLE);
        onSuccess?.(data);
        return true;
      }

      const parsed = ApiErrorBodySchema.safeParse(data);
      const errorBody = parsed.success ? parsed.data : {};
      setState({
        pending: false,
        error: errorBody.error ?? `Request failed (${response.status})`,
        fieldErrors: errorBody.fieldErrors ?? {},
      });
      return false;
    },
    [url, method, onSuccess]
  );

  return { state, submit };
}
