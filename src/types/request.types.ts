import { Request } from 'express';

/**
 * Auth Request - Request with the session resolved by the auth middleware
 */
export interface AuthRequest extends Request {
  user?: SessionUser;
}

export interface SessionUser {
  id: number;
  username: string;
  sessionId: string;
}
