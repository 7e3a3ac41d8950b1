import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import type { OAuthTokenVerifier } from '@modelcontextprotocol/sdk/server/auth/provider.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { InvalidTokenError } from '@modelcontextprotocol/sdk/server/auth/errors.js';

/** Client id reported in AuthInfo for first-party session tokens. */
export const SESSION_CLIENT_ID = 'calorie-log';
export const SESSION_SCOPES = ['log:read', 'log:write'];

/** Session lifetimes in seconds. */
export interface SessionLifetimes {
  session: number;
  remember: number;
}

export const DEFAULT_LIFETIMES: SessionLifetimes = {
  session: 12 * 60 * 60, // 12 hours
  remember: 30 * 24 * 60 * 60, // 30 days
};

/** A freshly issued session, as returned to the client. */
export interface IssuedSession {
  username: string;
  token: string;
  expiresAt: number;
  remember: boolean;
}

interface SessionRow {
  token: string;
  username: string;
  remember: number;
  expires_at: number;
  revoked: number;
}

/** Reads the username a session token was issued to, if any. */
export function usernameOf(auth: AuthInfo | undefined): string | null {
  const username = auth?.extra?.username;
  return typeof username === 'string' ? username : null;
}

/**
 * SQLite-backed bearer tokens for logged-in users. Doubles as the token
 * verifier for the MCP SDK's requireBearerAuth middleware.
 *
 * verifyAccessToken is async to satisfy OAuthTokenVerifier but uses
 * synchronous better-sqlite3 calls, so it contains no await expressions.
 */
export class SessionStore implements OAuthTokenVerifier {
  private stmts: {
    insert: Database.Statement<[string, string, number, number, number]>;
    get: Database.Statement<[string], SessionRow>;
    revoke: Database.Statement<[string]>;
    purgeExpired: Database.Statement<[number]>;
  };

  constructor(
    db: Database.Database,
    private readonly lifetimes: SessionLifetimes = DEFAULT_LIFETIMES,
  ) {
    this.stmts = {
      insert: db.prepare<[string, string, number, number, number]>(
        `INSERT INTO sessions (token, username, remember, expires_at, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      ),
      get: db.prepare<[string], SessionRow>(
        'SELECT * FROM sessions WHERE token = ?',
      ),
      revoke: db.prepare<[string]>(
        'UPDATE sessions SET revoked = 1 WHERE token = ? AND revoked = 0',
      ),
      purgeExpired: db.prepare<[number]>(
        'DELETE FROM sessions WHERE expires_at <= ?',
      ),
    };
  }

  /** Issues a token for `username`; remembered sessions live longer. */
  issue(username: string, remember: boolean): IssuedSession {
    const now = Math.floor(Date.now() / 1000);

    // Purge expired rows opportunistically
    this.stmts.purgeExpired.run(now);

    const token = randomUUID();
    const lifetime = remember ? this.lifetimes.remember : this.lifetimes.session;
    const expiresAt = now + lifetime;
    this.stmts.insert.run(token, username, remember ? 1 : 0, expiresAt, now);

    return { username, token, expiresAt, remember };
  }

  async verifyAccessToken(token: string): Promise<AuthInfo> {
    const row = this.stmts.get.get(token);

    if (!row) {
      throw new InvalidTokenError('Session token not found');
    }

    if (row.revoked) {
      throw new InvalidTokenError('Session token has been revoked');
    }

    const now = Math.floor(Date.now() / 1000);
    if (row.expires_at <= now) {
      throw new InvalidTokenError('Session token has expired');
    }

    return {
      token,
      clientId: SESSION_CLIENT_ID,
      scopes: SESSION_SCOPES,
      expiresAt: row.expires_at,
      extra: { username: row.username },
    };
  }

  /** Revokes one token. Unknown or already revoked tokens are ignored. */
  revoke(token: string): boolean {
    return this.stmts.revoke.run(token).changes === 1;
  }
}
