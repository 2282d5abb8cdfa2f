export type AuthErrorCode = 'MISSING_CREDENTIALS' | 'INVALID_CREDENTIALS' | 'UNAUTHENTICATED';

const AUTH_ERRORS: Record<AuthErrorCode, { statusCode: number; message: string }> = {
  MISSING_CREDENTIALS: { statusCode: 400, message: 'Username and password are required' },
  // Shared by unknown users and wrong passwords
  INVALID_CREDENTIALS: { statusCode: 401, message: 'Invalid username or password' },
  UNAUTHENTICATED: { statusCode: 401, message: 'Please log in to access this page' },
};

export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly statusCode: number;

  constructor(code: AuthErrorCode) {
    super(AUTH_ERRORS[code].message);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = AUTH_ERRORS[code].statusCode;
  }
}
