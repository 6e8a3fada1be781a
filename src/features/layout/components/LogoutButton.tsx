// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/layout/components/LogoutButton`
 * Purpose: Clears the session cookie through the logout endpoint and returns to the home page.
 * Scope: Client component.
 * Side-effects: IO (fetch, navigation)
 * Links: app/api/v1/auth/logout
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import type { ReactElement } from "react";

import { useApiForm } from "@/components";

export function LogoutButton(): ReactElement {
  const router = useRouter();
  const { state, submit } = useApiForm({
    url: "/api/v1/auth/logout",
    onSuccess: () => {
      router.push("/");
      router.refresh();
    },
  });

  return (
    <button
      type="button"
      disabled={state.pending}
      onClick={() => void submit({})}
    >
      Log out
    </button>
  );
}
