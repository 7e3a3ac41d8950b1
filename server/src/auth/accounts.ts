import type { UserStore } from '../store/user-store.js';
import { hashPassword, verifyPassword } from './passwords.js';
import type { IssuedSession, SessionStore } from './sessions.js';

export type AccountErrorCode =
  | 'invalid_input'
  | 'invalid_credentials'
  | 'username_taken'
  | 'no_remembered_user';

/** An expected account failure, reported to the client with its code. */
export class AccountError extends Error {
  constructor(
    message: string,
    readonly code: AccountErrorCode,
  ) {
    super(message);
    this.name = 'AccountError';
  }
}

interface AccountDeps {
  users: UserStore;
  sessions: SessionStore;
}

interface Credentials {
  username: string;
  password: string;
}

interface LoginParams extends Credentials {
  remember: boolean;
}

/** Creates an account (remembered by default) and logs it in. */
export function handleSignup(
  deps: AccountDeps,
  params: Credentials,
): IssuedSession {
  if (!params.username || !params.password) {
    throw new AccountError(
      'Please enter both username and password.',
      'invalid_input',
    );
  }

  const created = deps.users.createUser(
    params.username,
    hashPassword(params.password),
    true,
  );
  if (!created) {
    throw new AccountError(
      'Username already exists. Pick another.',
      'username_taken',
    );
  }

  return deps.sessions.issue(params.username, true);
}

/** Checks credentials and issues a session. `remember` also flags the account for auto-login. */
export function handleLogin(
  deps: AccountDeps,
  params: LoginParams,
): IssuedSession {
  const user = deps.users.getUser(params.username);
  if (!user || !verifyPassword(params.password, user.passwordHash)) {
    throw new AccountError(
      'Invalid credentials. Try again or sign up.',
      'invalid_credentials',
    );
  }

  if (params.remember) {
    deps.users.setRemember(user.username, true);
  }

  return deps.sessions.issue(user.username, params.remember);
}

/**
 * Logs in the only remembered account on this server, for single-user
 * installs. Fails when auto-login is off or zero or several accounts are
 * remembered.
 */
export function handleResume(
  deps: AccountDeps & { autoLoginEnabled: boolean },
): IssuedSession {
  if (!deps.autoLoginEnabled) {
    throw new AccountError('Auto-login is disabled.', 'no_remembered_user');
  }

  const remembered = deps.users.rememberedUsers();
  if (remembered.length !== 1) {
    throw new AccountError(
      remembered.length === 0
        ? 'No remembered user on this server.'
        : 'More than one remembered user; log in instead.',
      'no_remembered_user',
    );
  }

  return deps.sessions.issue(remembered[0], true);
}

/** Revokes the presented session token. */
export function handleLogout(
  deps: Pick<AccountDeps, 'sessions'>,
  token: string,
): { revoked: boolean } {
  return { revoked: deps.sessions.revoke(token) };
}
