// Session Model - Based on migration 20261019_000002_create_sessions_table

export interface Session {
  id: string; // UUID
  user_id: number;
  created_at: Date;
  expires_at: Date;
}

export interface CreateSessionInput {
  id: string;
  user_id: number;
  expires_at: Date;
}

/**
 * Session joined with its owner, as read by the auth middleware
 */
export interface SessionWithUser {
  id: string;
  user_id: number;
  username: string;
  expires_at: Date;
}
