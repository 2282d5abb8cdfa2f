import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { SessionUser } from '../../types/request.types';
import { logger } from '../../utils/logging';
import { AuthError } from './auth.errors';
import { SessionTokenPayload, sessionTokenSchema } from './auth.validation';
import { SessionsRepository } from './sessions.repository';
import { UsersRepository } from './users.repository';

const BCRYPT_ROUNDS = 10;

// Unknown usernames are still checked against a hash
let dummyPasswordHash: Promise<string> | undefined;
const getDummyPasswordHash = (): Promise<string> => {
  dummyPasswordHash ??= bcrypt.hash('unknown-user-placeholder', BCRYPT_ROUNDS);
  return dummyPasswordHash;
};

export interface AuthServiceOptions {
  jwtSecret: string;
  sessionTtlSeconds: number;
  defaultRedirect: string;
  defaultUser: {
    username: string;
    password: string;
  };
  now?: () => Date;
}

export interface LoginResult {
  token: string;
  expiresAt: Date;
  redirectTo: string;
  user: {
    id: number;
    username: string;
  };
}

export interface AuthService {
  authenticate(username: string, password: string, next?: string): Promise<LoginResult>;
  logout(token: string | undefined): Promise<void>;
  resolveSession(token: string): Promise<SessionUser>;
  ensureDefaultUser(): Promise<boolean>;
}

/**
 * Only same-site paths are honoured as post-login targets
 */
export const resolveRedirect = (next: string | undefined, fallback: string): string => {
  if (!next || !next.startsWith('/') || next.startsWith('//') || next.startsWith('/\\')) {
    return fallback;
  }
  return next;
};

export const createAuthService = (
  users: UsersRepository,
  sessions: SessionsRepository,
  options: AuthServiceOptions
): AuthService => {
  const now = options.now ?? (() => new Date());

  const decodeToken = (token: string, ignoreExpiration: boolean): SessionTokenPayload | null => {
    try {
      const decoded = jwt.verify(token, options.jwtSecret, { ignoreExpiration });
      const parsed = sessionTokenSchema.safeParse(decoded);
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.debug('[Auth] Rejected session token', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  };

  return {
    async authenticate(username, password, next) {
      const login = username.trim();
      if (!login || !password) {
        throw new AuthError('MISSING_CREDENTIALS');
      }

      const user = await users.findByUsername(login);
      const passwordHash = user ? user.password_hash : await getDummyPasswordHash();
      const isValidPassword = await bcrypt.compare(password, passwordHash);

      if (!user || !isValidPassword) {
        logger.warn('[Login] Invalid credentials', { username: login });
        throw new AuthError('INVALID_CREDENTIALS');
      }

      const issuedAt = now();
      const expiresAt = new Date(issuedAt.getTime() + options.sessionTtlSeconds * 1000);
      await sessions.deleteExpired(issuedAt);
      const session = await sessions.create({
        id: uuidv4(),
        user_id: user.id,
        expires_at: expiresAt,
      });

      const payload: SessionTokenPayload = { userId: user.id, sessionId: session.id };
      const token = jwt.sign(payload, options.jwtSecret, { expiresIn: options.sessionTtlSeconds });

      return {
        token,
        expiresAt,
        redirectTo: resolveRedirect(next, options.defaultRedirect),
        user: { id: user.id, username: user.username },
      };
    },

    async logout(token) {
      if (!token) {
        return;
      }

      // An expired token still names a session worth deleting
      const payload = decodeToken(token, true);
      if (!payload) {
        return;
      }

      await sessions.delete(payload.sessionId);
    },

    async resolveSession(token) {
      const payload = decodeToken(token, false);
      if (!payload) {
        throw new AuthError('UNAUTHENTICATED');
      }

      const session = await sessions.findActive(payload.sessionId, now());
      if (!session || session.user_id !== payload.userId) {
        throw new AuthError('UNAUTHENTICATED');
      }

      return { id: session.user_id, username: session.username, sessionId: session.id };
    },

    async ensureDefaultUser() {
      const { username, password } = options.defaultUser;
      const existing = await users.findByUsername(username);

      if (existing) {
        logger.info(`Default user '${username}' already exists`);
        return false;
      }

      const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
      await users.create({ username, password_hash: passwordHash });

      logger.warn(`Default user '${username}' created. Please change its password after first login!`);
      return true;
    },
  };
};
