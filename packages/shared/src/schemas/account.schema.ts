import { z } from 'zod';

const emailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => v.includes('@') && v.includes('.'), 'Please enter a valid email.');

export const signupRequestSchema = z.object({
  firstName: z.string().trim().min(1, 'First and last name are required.').max(50),
  lastName: z.string().trim().min(1, 'First and last name are required.').max(50),
  email: emailSchema,
  password: z.string().min(8, 'Password must be at least 8 characters.').max(200),
});

export type SignupRequest = z.infer<typeof signupRequestSchema>;

export const loginRequestSchema = z.object({
  email: z.string().trim().toLowerCase().min(1),
  password: z.string().min(1),
});

export const adminEmailRequestSchema = z.object({
  email: emailSchema,
});
