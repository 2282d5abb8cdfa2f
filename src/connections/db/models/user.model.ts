// User Model - Based on migration 20261019_000001_create_users_table

export interface User {
  id: number;
  username: string;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

export interface CreateUserInput {
  username: string;
  password_hash: string;
}
