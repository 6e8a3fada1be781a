// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/messaging/components/DeleteMessageButton`
 * Purpose: Removes a message from the caller's side of the conversation and returns to the inbox.
 * Scope: Client component.
 * Side-effects: IO (fetch, navigation)
 * Links: app/api/v1/messages/[messageId]
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import type { ReactElement } from "react";

import { FormError, useApiForm } from "@/components";

export function DeleteMessageButton({
  messageId,
}: {
  messageId: string;
}): ReactElement {
  const router = useRouter();
  const { state, submit } = useApiForm({
    url: `/api/v1/messages/${messageId}`,
    method: "DELETE",
    onSuccess: () => {
      router.push("/inbox");
      router.refresh();
    },
  });

  return (
    <>
      <FormError message={state.error} />
      <button
        type="button"
        disabled={state.pending}
        onClick={() => void submit({})}
      >
        Delete
      </button>
    </>
  );
}
