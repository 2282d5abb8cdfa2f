import { z } from 'zod';

// Empty credentials are not a validation error: the auth service reports
// them as MISSING_CREDENTIALS
export const loginSchema = z.object({
  username: z.string().trim().default(''),
  password: z.string().default(''),
  next: z.string().optional(),
});

export const sessionTokenSchema = z.object({
  userId: z.number().int().positive(),
  sessionId: z.string().uuid(),
});

export type LoginInput = z.infer<typeof loginSchema>;
export type SessionTokenPayload = z.infer<typeof sessionTokenSchema>;
