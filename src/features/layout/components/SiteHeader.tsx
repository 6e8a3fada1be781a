// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/layout/components/SiteHeader`
 * Purpose: Site navigation with the signed-in user's inbox badge, or login and signup links.
 * Scope: Presentational server component. The root layout resolves the session and unread count and passes them in.
 * Invariants: The unread badge renders only when the count is positive.
 * Side-effects: none
 * @public
 */

import Link from "next/link";
import type { ReactElement } from "react";

import { LogoutButton } from "./LogoutButton";

export interface SiteHeaderProps {
  user: { id: string; username: string } | null;
  unreadCount: number;
}

export function SiteHeader({ user, unreadCount }: SiteHeaderProps): ReactElement {
  return (
    <header className="site-header">
      <nav aria-label="Main">
        <Link href="/">DevSearch</Link>
        <Link href="/">Developers</Link>
        <Link href="/projects">Projects</Link>
        {user ? (
          <>
            <Link href="/inbox">
              Inbox
              {unreadCount > 0 && (
                <span className="badge" aria-label={`${unreadCount} unread`}>
                  {unreadCount}
                </span>
              )}
            </Link>
            <Link href={`/profiles/${user.id}`}>{user.username}</Link>
            <Link href="/account">Account</Link>
            <LogoutButton />
          </>
        ) : (
          <>
            <Link href="/login">Log in</Link>
            <Link href="/register">Sign up</Link>
          </>
        )}
      </nav>
    </header>
  );
}
