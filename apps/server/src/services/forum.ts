import { randomUUID } from 'crypto';
import type { CreatePostRequest, ForumAuthor, ForumPost, ForumReply } from '@volunteer-portal/shared';
import type { ForumRepository } from '../lib/forumRepository.js';
import { fail, succeed, type Outcome } from '../lib/errors.js';

export const POST_LIST_LIMIT = 100;

export async function createPost(
  forum: ForumRepository,
  author: ForumAuthor,
  input: CreatePostRequest,
  now = new Date()
): Promise<Outcome<ForumPost>> {
  const title = input.title.trim();
  const body = input.body.trim();
  if (!title || !body) return fail('INVALID_INPUT', 'Please add a title and details.');

  const post: ForumPost = {
    id: randomUUID(),
    createdAt: now,
    authorEmail: author.email.trim().toLowerCase(),
    authorName: author.name,
    title,
    body,
    locked: false,
    deleted: false,
  };
  await forum.insertPost(post);
  return succeed(post, 'Posted!');
}

export function listPosts(forum: ForumRepository, includeDeleted = false): Promise<ForumPost[]> {
  return forum.listPosts(POST_LIST_LIMIT, includeDeleted);
}

export async function createReply(
  forum: ForumRepository,
  postId: string,
  author: ForumAuthor,
  rawBody: string,
  now = new Date()
): Promise<Outcome<ForumReply>> {
  const body = rawBody.trim();
  if (!body) return fail('INVALID_INPUT', 'Reply cannot be empty.');

  const post = await forum.getPost(postId);
  if (!post || post.deleted) return fail('POST_NOT_FOUND', 'Post not found.');
  if (post.locked) return fail('THREAD_LOCKED', 'Thread is locked.');

  const reply: ForumReply = {
    id: randomUUID(),
    postId,
    createdAt: now,
    authorEmail: author.email.trim().toLowerCase(),
    authorName: author.name,
    body,
    deleted: false,
  };
  await forum.insertReply(reply);
  return succeed(reply, 'Replied!');
}

export async function listReplies(
  forum: ForumRepository,
  postId: string,
  includeDeleted = false
): Promise<Outcome<ForumReply[]>> {
  const post = await forum.getPost(postId);
  if (!post || (post.deleted && !includeDeleted)) return fail('POST_NOT_FOUND', 'Post not found.');
  return succeed(await forum.listReplies(postId, includeDeleted), '');
}

export async function setLock(forum: ForumRepository, postId: string, locked: boolean): Promise<Outcome<boolean>> {
  const updated = await forum.updatePost(postId, { locked });
  if (!updated) return fail('POST_NOT_FOUND', 'Post not found.');
  return succeed(locked, locked ? 'Thread locked.' : 'Thread unlocked.');
}

/** Soft-deletes the post and every reply under it */
export async function deletePost(forum: ForumRepository, postId: string): Promise<Outcome<string>> {
  const updated = await forum.updatePost(postId, { deleted: true });
  if (!updated) return fail('POST_NOT_FOUND', 'Post not found.');
  await forum.markRepliesDeleted(postId);
  return succeed(postId, 'Post deleted.');
}

export async function deleteReply(forum: ForumRepository, postId: string, replyId: string): Promise<Outcome<string>> {
  const updated = await forum.markReplyDeleted(postId, replyId);
  if (!updated) return fail('REPLY_NOT_FOUND', 'Reply not found.');
  return succeed(replyId, 'Reply deleted.');
}
