// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/layout`
 * Purpose: Root layout for the App Router: document shell and site header.
 * Scope: Resolves the session from the cookie and the unread count for the header. Does not guard routes; guarded pages redirect themselves.
 * Invariants: Renders valid HTML5 structure; anonymous visitors never trigger a message query.
 * Side-effects: IO (unread count query when signed in)
 * Links: features/layout/components/SiteHeader, app/_lib/auth/session
 * @public
 */

import type { Metadata } from "next";
import type { ReactNode } from "react";

import { unreadCountFacade } from "@/app/_facades/messaging/messages.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { SiteHeader } from "@/features/layout";

export const metadata: Metadata = {
  title: "DevSearch",
  description: "Find developers, browse their projects and get in touch.",
};

export default async function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>): Promise<ReactNode> {
  const user = await getSessionUser();
  const unreadCount = user ? await unreadCountFacade({ sessionUser: user }) : 0;

  return (
    <html lang="en">
      <body>
        <SiteHeader user={user} unreadCount={unreadCount} />
        <main id="main">{children}</main>
      </body>
    </html>
  );
}
