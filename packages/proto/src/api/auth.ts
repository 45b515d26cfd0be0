import { z } from 'zod';

export const UsernameSchema = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(30, 'Username must be at most 30 characters')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Username may only contain letters, numbers, underscores, and hyphens');

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .max(160, 'Email must be at most 160 characters')
  .regex(/^[^\s]+@[^\s]+$/, 'Email must have the @ sign and no spaces');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(72, 'Password must be at most 72 characters')
  .regex(/[a-z]/, 'Password needs at least one lower case character')
  .regex(/[A-Z]/, 'Password needs at least one upper case character')
  .regex(/[!?@#$%^&*_0-9]/, 'Password needs at least one digit or punctuation character');

const NamePartSchema = z.string().trim().max(50).nullish();

export const RegisterRequestSchema = z.object({
  username: UsernameSchema,
  email: EmailSchema,
  password: PasswordSchema,
  firstName: NamePartSchema,
  lastName: NamePartSchema,
});

export const LoginRequestSchema = z.object({
  email: EmailSchema,
  password: z.string().min(1, 'Password is required'),
});

export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1),
});

export const LogoutRequestSchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type LogoutRequest = z.infer<typeof LogoutRequestSchema>;
