import { Database } from '../../connections/db/connection';
import { CreateUserInput, User } from '../../connections/db/models/user.model';

type UserRow = User & Record<string, unknown>;

export interface UsersRepository {
  findByUsername(username: string): Promise<User | null>;
  create(input: CreateUserInput): Promise<User>;
}

export const createUsersRepository = (db: Database): UsersRepository => ({
  async findByUsername(username) {
    // Exact, case-sensitive match
    const rows = await db.query<UserRow>(
      `SELECT id, username, password_hash, created_at, updated_at
       FROM users WHERE username = $1`,
      [username]
    );
    return rows[0] ?? null;
  },

  async create({ username, password_hash }) {
    const rows = await db.query<UserRow>(
      `INSERT INTO users (username, password_hash)
       VALUES ($1, $2)
       RETURNING id, username, password_hash, created_at, updated_at`,
      [username, password_hash]
    );
    return rows[0];
  },
});
