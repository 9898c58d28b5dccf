import { z } from 'zod';

/**
 * Response shapes of the placeholder REST API
 */

export const userSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    username: z.string(),
    email: z.string().email(),
    address: z.record(z.unknown()).optional(),
    phone: z.string().optional(),
    website: z.string().optional(),
    company: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const postSchema = z.object({
  userId: z.number().int(),
  id: z.number().int(),
  title: z.string(),
  body: z.string(),
});

export const commentSchema = z.object({
  postId: z.number().int(),
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  body: z.string(),
});

export const albumSchema = z.object({
  userId: z.number().int(),
  id: z.number().int(),
  title: z.string(),
});

export const photoSchema = z.object({
  albumId: z.number().int(),
  id: z.number().int(),
  title: z.string(),
  url: z.string(),
  thumbnailUrl: z.string(),
});

/** Echo of a created or updated post; the API accepts anything */
export const postEchoSchema = z.record(z.unknown());

export type User = z.infer<typeof userSchema>;
export type Post = z.infer<typeof postSchema>;
export type Comment = z.infer<typeof commentSchema>;
export type Album = z.infer<typeof albumSchema>;
export type Photo = z.infer<typeof photoSchema>;
