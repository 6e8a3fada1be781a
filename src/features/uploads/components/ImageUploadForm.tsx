// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/uploads/components/ImageUploadForm`
 * Purpose: Single-file image upload for profile and project images.
 * Scope: Client component. PUTs multipart form data with one `image` field to the given endpoint.
 * Invariants: Nothing is sent without a selected file; server-side type and size errors show under the field.
 * Side-effects: IO (fetch, router refresh)
 * Links: app/api/v1/me/profile/image, app/api/v1/projects/[projectId]/image
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, useApiForm } from "@/components";

export function ImageUploadForm({
  url,
  label,
  currentImage,
}: {
  url: string;
  label: string;
  currentImage: string;
}): ReactElement {
  const router = useRouter();
  const [file, setFile] = useState<File | null>(null);
  const { state, submit } = useApiForm({
    url,
    method: "PUT",
    onSuccess: () => {
      setFile(null);
      router.refresh();
    },
  });
  const errors = state.fieldErrors.image ?? [];

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    if (!file) return;
    const body = new FormData();
    body.append("image", file);
    void submit(body);
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <img src={currentImage} alt="" width={160} height={160} />
      <FormError message={state.error} />
      <div className="form-field">
        <label htmlFor="image">{label}</label>
        <input
          id="image"
          name="image"
          type="file"
          accept="image/png,image/jpeg,image/gif"
          aria-invalid={errors.length > 0}
          onChange={(e) => setFile(e.target.files?.item(0) ?? null)}
        />
        {errors.length > 0 && (
          <ul className="form-field-errors">
            {errors.map((message) => (
              <li key={message}>{message}</li>
            ))}
          </ul>
        )}
      </div>
      <button type="submit" disabled={state.pending || file === null}>
        Upload
      </button>
    </form>
  );
}
