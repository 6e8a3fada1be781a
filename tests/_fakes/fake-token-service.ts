// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-token-service`
 * Purpose: Readable TokenService double: tokens look like `<kind>:<userId>:<username>`.
 * Scope: Service-level tests of login and refresh. Expiry is not modelled; the JWT adapter tests cover it.
 * Invariants: Same failure surface as the real adapter (UnauthorizedError with a reason).
 * Side-effects: none
 * Links: ports/token-service.port.ts
 * @public
 */

import { UnauthorizedError } from "@/core";
import type { IssuedToken, TokenKind, TokenService } from "@/ports";
import type { SessionUser } from "@/shared/auth";

import type { FakeClock } from "./fake-clock";

export class FakeTokenService implements TokenService {
  constructor(
    private readonly clock: FakeClock,
    private readonly ttlSeconds = 900
  ) {}

  async issue(identity: SessionUser, kind: TokenKind): Promise<IssuedToken> {
    return {
      token: `${kind}:${identity.id}:${identity.username}`,
      expiresAt: new Date(Date.parse(this.clock.now()) + this.ttlSeconds * 1000),
    };
  }

  async verify(
    token: string | null | undefined,
    kind: TokenKind
  ): Promise<SessionUser> {
    if (!token) throw new UnauthorizedError("missing");

    const [tokenKind, id, username] = token.split(":");
    if (!id || !username) throw new UnauthorizedError("invalid");
    if (tokenKind !== kind) throw new UnauthorizedError("wrong_kind");
    return { id, username };
  }
}
