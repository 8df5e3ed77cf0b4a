import { z } from 'zod';

export const createPostRequestSchema = z.object({
  title: z.string().trim().min(1, 'Please add a title and details.').max(200),
  body: z.string().trim().min(1, 'Please add a title and details.').max(5000),
});

export type CreatePostRequest = z.infer<typeof createPostRequestSchema>;

export const createReplyRequestSchema = z.object({
  body: z.string().trim().min(1, 'Reply cannot be empty.').max(5000),
});

export const lockPostRequestSchema = z.object({
  locked: z.boolean(),
});
