/**
 * Response payloads of the auth module
 */

export interface AuthUserResponse {
  id: number;
  username: string;
}

export interface LoginResponse {
  token: string;
  expiresAt: string;
  redirectTo: string;
  user: AuthUserResponse;
}

export interface CurrentUserResponse {
  user: AuthUserResponse;
}
