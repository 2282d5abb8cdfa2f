import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthService, createAuthService, resolveRedirect } from '../modules/auth/auth.service';
import { InMemorySessionsRepository, InMemoryUsersRepository } from './helpers/fakes';

const JWT_SECRET = 'test-secret';
const TTL_SECONDS = 3600;

describe('resolveRedirect', () => {
  it('honours local paths', () => {
    expect(resolveRedirect('/stock-movements', '/purchases')).toBe('/stock-movements');
    expect(resolveRedirect('/purchases/top?start_date=2026-01-01', '/purchases')).toBe(
      '/purchases/top?start_date=2026-01-01'
    );
  });

  it('falls back for absent or off-site targets', () => {
    expect(resolveRedirect(undefined, '/purchases')).toBe('/purchases');
    expect(resolveRedirect('', '/purchases')).toBe('/purchases');
    expect(resolveRedirect('https://example.com', '/purchases')).toBe('/purchases');
    expect(resolveRedirect('//example.com', '/purchases')).toBe('/purchases');
    expect(resolveRedirect('/\\example.com', '/purchases')).toBe('/purchases');
  });
});

describe('AuthService', () => {
  let users: InMemoryUsersRepository;
  let sessions: InMemorySessionsRepository;
  let current: Date;
  let auth: AuthService;

  afterEach(() => {
    vi.restoreAllMocks();
  });

  beforeEach(async () => {
    users = new InMemoryUsersRepository();
    sessions = new InMemorySessionsRepository(users);
    current = new Date(2026, 9, 19, 9, 0);
    auth = createAuthService(users, sessions, {
      jwtSecret: JWT_SECRET,
      sessionTtlSeconds: TTL_SECONDS,
      defaultRedirect: '/purchases',
      defaultUser: { username: 'admin', password: 'admin123' },
      now: () => current,
    });
    await auth.ensureDefaultUser();
  });

  describe('authenticate', () => {
    it('opens a session for valid credentials', async () => {
      const result = await auth.authenticate('admin', 'admin123');

      expect(result.user).toEqual({ id: 1, username: 'admin' });
      expect(result.redirectTo).toBe('/purchases');
      expect(result.expiresAt.getTime()).toBe(current.getTime() + TTL_SECONDS * 1000);
      expect(sessions.sessions.size).toBe(1);
    });

    it('trims the username', async () => {
      const result = await auth.authenticate('  admin ', 'admin123');
      expect(result.user.username).toBe('admin');
    });

    it('redirects to the requested local page', async () => {
      const result = await auth.authenticate('admin', 'admin123', '/purchases/top');
      expect(result.redirectTo).toBe('/purchases/top');
    });

    it('rejects a wrong password and an unknown user alike', async () => {
      const expected = { code: 'INVALID_CREDENTIALS', statusCode: 401, message: 'Invalid username or password' };

      await expect(auth.authenticate('admin', 'wrong')).rejects.toMatchObject(expected);
      await expect(auth.authenticate('nobody', 'admin123')).rejects.toMatchObject(expected);
      expect(sessions.sessions.size).toBe(0);
    });

    it('checks a password hash for unknown users too', async () => {
      const compare = vi.spyOn(bcrypt, 'compare');

      await expect(auth.authenticate('admin', 'wrong')).rejects.toMatchObject({ code: 'INVALID_CREDENTIALS' });
      await expect(auth.authenticate('nobody', 'wrong')).rejects.toMatchObject({ code: 'INVALID_CREDENTIALS' });

      expect(compare).toHaveBeenCalledTimes(2);
      expect(compare.mock.calls[0][1]).toBe(users.users[0].password_hash);
      expect(String(compare.mock.calls[1][1])).toMatch(/^\$2[ab]\$10\$/);
    });

    it('drops expired sessions when a new one is opened', async () => {
      for (let login = 0; login < 5; login++) {
        await auth.authenticate('admin', 'admin123');
        current = new Date(current.getTime() + (TTL_SECONDS + 1) * 1000);
      }

      expect(sessions.sessions.size).toBe(1);

      const active = await auth.authenticate('admin', 'admin123');
      await expect(auth.resolveSession(active.token)).resolves.toMatchObject({ username: 'admin' });
      expect(sessions.sessions.size).toBe(1);
    });

    it('keeps sessions that are still active', async () => {
      await auth.authenticate('admin', 'admin123');
      current = new Date(current.getTime() + 60 * 1000);
      await auth.authenticate('admin', 'admin123');

      expect(sessions.sessions.size).toBe(2);
    });

    it('matches usernames case-sensitively', async () => {
      await expect(auth.authenticate('Admin', 'admin123')).rejects.toMatchObject({ code: 'INVALID_CREDENTIALS' });
    });

    it('requires both fields', async () => {
      const expected = { code: 'MISSING_CREDENTIALS', statusCode: 400 };

      await expect(auth.authenticate('', 'admin123')).rejects.toMatchObject(expected);
      await expect(auth.authenticate('   ', 'admin123')).rejects.toMatchObject(expected);
      await expect(auth.authenticate('admin', '')).rejects.toMatchObject(expected);
    });
  });

  describe('resolveSession', () => {
    it('returns the session owner', async () => {
      const { token } = await auth.authenticate('admin', 'admin123');
      const user = await auth.resolveSession(token);

      expect(user.id).toBe(1);
      expect(user.username).toBe('admin');
      expect(sessions.sessions.has(user.sessionId)).toBe(true);
    });

    it('rejects a session past its expiry', async () => {
      const { token } = await auth.authenticate('admin', 'admin123');
      current = new Date(current.getTime() + (TTL_SECONDS + 1) * 1000);

      await expect(auth.resolveSession(token)).rejects.toMatchObject({ code: 'UNAUTHENTICATED' });
    });

    it('rejects tokens signed with another secret', async () => {
      const { token } = await auth.authenticate('admin', 'admin123');
      const payload = jwt.decode(token);
      const forged = jwt.sign(typeof payload === 'object' && payload !== null ? payload : {}, 'other-secret');

      await expect(auth.resolveSession(forged)).rejects.toMatchObject({ code: 'UNAUTHENTICATED' });
    });

    it('rejects garbage', async () => {
      await expect(auth.resolveSession('not-a-token')).rejects.toMatchObject({ code: 'UNAUTHENTICATED' });
    });
  });

  describe('logout', () => {
    it('ends the session', async () => {
      const { token } = await auth.authenticate('admin', 'admin123');

      await auth.logout(token);

      expect(sessions.sessions.size).toBe(0);
      await expect(auth.resolveSession(token)).rejects.toMatchObject({ code: 'UNAUTHENTICATED' });
    });

    it('is idempotent', async () => {
      const { token } = await auth.authenticate('admin', 'admin123');

      await auth.logout(token);
      await expect(auth.logout(token)).resolves.toBeUndefined();
      await expect(auth.logout(undefined)).resolves.toBeUndefined();
      await expect(auth.logout('not-a-token')).resolves.toBeUndefined();
    });

    it('only ends the session it names', async () => {
      const first = await auth.authenticate('admin', 'admin123');
      const second = await auth.authenticate('admin', 'admin123');

      await auth.logout(first.token);

      expect(sessions.sessions.size).toBe(1);
      await expect(auth.resolveSession(second.token)).resolves.toMatchObject({ username: 'admin' });
    });
  });

  describe('ensureDefaultUser', () => {
    it('creates the user once', async () => {
      const [admin] = users.users;

      expect(users.users).toHaveLength(1);
      expect(await bcrypt.compare('admin123', admin.password_hash)).toBe(true);
      await expect(auth.ensureDefaultUser()).resolves.toBe(false);
      expect(users.users).toHaveLength(1);
      expect(users.users[0].password_hash).toBe(admin.password_hash);
    });

    it('does not overwrite an existing password', async () => {
      const freshUsers = new InMemoryUsersRepository();
      await freshUsers.create({ username: 'admin', password_hash: await bcrypt.hash('changed-password', 4) });
      const freshAuth = createAuthService(freshUsers, new InMemorySessionsRepository(freshUsers), {
        jwtSecret: JWT_SECRET,
        sessionTtlSeconds: TTL_SECONDS,
        defaultRedirect: '/purchases',
        defaultUser: { username: 'admin', password: 'admin123' },
      });

      await expect(freshAuth.ensureDefaultUser()).resolves.toBe(false);
      await expect(freshAuth.authenticate('admin', 'admin123')).rejects.toMatchObject({ code: 'INVALID_CREDENTIALS' });
      await expect(freshAuth.authenticate('admin', 'changed-password')).resolves.toMatchObject({
        user: { username: 'admin' },
      });
    });
  });
});
