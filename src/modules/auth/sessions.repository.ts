import { Database } from '../../connections/db/connection';
import { CreateSessionInput, Session, SessionWithUser } from '../../connections/db/models/session.model';

export interface SessionsRepository {
  create(input: CreateSessionInput): Promise<Session>;
  /** Session and owner, or null when unknown or expired at `now` */
  findActive(id: string, now: Date): Promise<SessionWithUser | null>;
  /** No-op for unknown ids */
  delete(id: string): Promise<void>;
  /** Drops every session that has expired at `now` */
  deleteExpired(now: Date): Promise<void>;
}

export const createSessionsRepository = (db: Database): SessionsRepository => ({
  async create({ id, user_id, expires_at }) {
    const rows = await db.query<Session & Record<string, unknown>>(
      `INSERT INTO sessions (id, user_id, expires_at)
       VALUES ($1, $2, $3)
       RETURNING id, user_id, created_at, expires_at`,
      [id, user_id, expires_at]
    );
    return rows[0];
  },

  async findActive(id, now) {
    const rows = await db.query<SessionWithUser & Record<string, unknown>>(
      `SELECT s.id, s.user_id, u.username, s.expires_at
       FROM sessions s
       JOIN users u ON u.id = s.user_id
       WHERE s.id = $1 AND s.expires_at > $2`,
      [id, now]
    );
    return rows[0] ?? null;
  },

  async delete(id) {
    await db.query('DELETE FROM sessions WHERE id = $1', [id]);
  },

  async deleteExpired(now) {
    await db.query('DELETE FROM sessions WHERE expires_at <= $1', [now]);
  },
});
