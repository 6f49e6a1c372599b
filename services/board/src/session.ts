import type { Pool } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { bearerToken, verifySessionToken, type IdentityContext, type SessionIdentity } from '@board/shared';
import type { SessionStore } from './types';

type SessionRow = {
  identifier: string;
  display_name: string;
  is_admin: boolean;
};

export class PgSessionStore implements SessionStore {
  constructor(
    private readonly pool: Pool,
    private readonly ttlSeconds: number,
  ) {}

  async get(sessionId: string): Promise<SessionIdentity | null> {
    const res = await this.pool.query<SessionRow>(
      'select identifier, display_name, is_admin from sessions where id = $1 and expires_at > now()',
      [sessionId],
    );
    const row = res.rows[0];
    if (!row) return null;
    return { identifier: row.identifier, displayName: row.display_name, isAdmin: row.is_admin };
  }

  async set(sessionId: string, identity: SessionIdentity): Promise<void> {
    await this.pool.query(
      `insert into sessions (id, identifier, display_name, is_admin, expires_at)
       values ($1, $2, $3, $4, now() + make_interval(secs => $5))
       on conflict (id) do update
         set identifier = excluded.identifier,
             display_name = excluded.display_name,
             is_admin = excluded.is_admin,
             expires_at = excluded.expires_at`,
      [sessionId, identity.identifier, identity.displayName, identity.isAdmin, this.ttlSeconds],
    );
  }
}

export type ResolvedSession = {
  sessionId: string | null;
  identity: IdentityContext;
};

/**
 * Maps an `Authorization` header to the session it names and the identity
 * projected into that session. Missing, forged or expired tokens resolve to the
 * anonymous caller.
 */
export const resolveSession = async (
  sessions: SessionStore,
  authorization: string | string[] | undefined,
  secret: string,
): Promise<ResolvedSession> => {
  const token = bearerToken(authorization);
  if (!token) return { sessionId: null, identity: null };
  const payload = verifySessionToken(token, secret);
  if (!payload || !isUuid(payload.sid)) return { sessionId: null, identity: null };
  const identity = await sessions.get(payload.sid);
  return { sessionId: payload.sid, identity };
};

export const newSessionId = (): string => uuidv4();
