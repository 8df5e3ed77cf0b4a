import { Timestamp } from '@google-cloud/firestore';
import type { DocumentSnapshot, Firestore } from '@google-cloud/firestore';
import { z } from 'zod';
import type { ForumPost, ForumReply } from '@volunteer-portal/shared';

export type PostPatch = Partial<Pick<ForumPost, 'locked' | 'deleted'>>;

export interface ForumRepository {
  insertPost(post: ForumPost): Promise<void>;
  getPost(postId: string): Promise<ForumPost | null>;
  /** Newest first */
  listPosts(limit: number, includeDeleted: boolean): Promise<ForumPost[]>;
  /** Resolves false when the post does not exist */
  updatePost(postId: string, patch: PostPatch): Promise<boolean>;
  insertReply(reply: ForumReply): Promise<void>;
  /** Oldest first */
  listReplies(postId: string, includeDeleted: boolean): Promise<ForumReply[]>;
  markRepliesDeleted(postId: string): Promise<void>;
  /** Resolves false when the reply does not exist */
  markReplyDeleted(postId: string, replyId: string): Promise<boolean>;
}

const POSTS_COLLECTION = 'forumPosts';
const REPLIES_COLLECTION = 'replies';

const postDocSchema = z.object({
  createdAt: z.instanceof(Timestamp),
  authorEmail: z.string(),
  authorName: z.string(),
  title: z.string(),
  body: z.string(),
  locked: z.boolean().default(false),
  deleted: z.boolean().default(false),
});

const replyDocSchema = z.object({
  createdAt: z.instanceof(Timestamp),
  authorEmail: z.string(),
  authorName: z.string(),
  body: z.string(),
  deleted: z.boolean().default(false),
});

function toPost(snap: DocumentSnapshot): ForumPost | null {
  const parsed = postDocSchema.safeParse(snap.data());
  if (!parsed.success) {
    console.warn(`[forum] Ignoring malformed post ${snap.id}`);
    return null;
  }
  return { id: snap.id, ...parsed.data, createdAt: parsed.data.createdAt.toDate() };
}

function toReply(postId: string, snap: DocumentSnapshot): ForumReply | null {
  const parsed = replyDocSchema.safeParse(snap.data());
  if (!parsed.success) {
    console.warn(`[forum] Ignoring malformed reply ${postId}/${snap.id}`);
    return null;
  }
  return { id: snap.id, postId, ...parsed.data, createdAt: parsed.data.createdAt.toDate() };
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

/**
 * Posts in `forumPosts/{postId}`, replies in `forumPosts/{postId}/replies/{replyId}`
 */
export class FirestoreForumRepository implements ForumRepository {
  constructor(private readonly db: Firestore) {}

  private posts() {
    return this.db.collection(POSTS_COLLECTION);
  }

  private replies(postId: string) {
    return this.posts().doc(postId).collection(REPLIES_COLLECTION);
  }

  async insertPost(post: ForumPost): Promise<void> {
    const { id, createdAt, ...rest } = post;
    await this.posts().doc(id).create({ ...rest, createdAt: Timestamp.fromDate(createdAt) });
  }

  async getPost(postId: string): Promise<ForumPost | null> {
    const snap = await this.posts().doc(postId).get();
    return snap.exists ? toPost(snap) : null;
  }

  async listPosts(limit: number, includeDeleted: boolean): Promise<ForumPost[]> {
    let q = this.posts().orderBy('createdAt', 'desc');
    if (!includeDeleted) q = q.where('deleted', '==', false);
    const snap = await q.limit(limit).get();
    return snap.docs.map(toPost).filter(isPresent);
  }

  async updatePost(postId: string, patch: PostPatch): Promise<boolean> {
    const ref = this.posts().doc(postId);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (!snap.exists) return false;
      tx.update(ref, patch);
      return true;
    });
  }

  async insertReply(reply: ForumReply): Promise<void> {
    const { id, postId, createdAt, ...rest } = reply;
    await this.replies(postId).doc(id).create({ ...rest, createdAt: Timestamp.fromDate(createdAt) });
  }

  async listReplies(postId: string, includeDeleted: boolean): Promise<ForumReply[]> {
    let q = this.replies(postId).orderBy('createdAt', 'asc');
    if (!includeDeleted) q = q.where('deleted', '==', false);
    const snap = await q.get();
    return snap.docs.map((d) => toReply(postId, d)).filter(isPresent);
  }

  async markRepliesDeleted(postId: string): Promise<void> {
    const snap = await this.replies(postId).where('deleted', '==', false).get();
    // Firestore caps a batch at 500 writes
    for (let i = 0; i < snap.docs.length; i += 500) {
      const batch = this.db.batch();
      for (const doc of snap.docs.slice(i, i + 500)) batch.update(doc.ref, { deleted: true });
      await batch.commit();
    }
  }

  async markReplyDeleted(postId: string, replyId: string): Promise<boolean> {
    const ref = this.replies(postId).doc(replyId);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (!snap.exists) return false;
      tx.update(ref, { deleted: true });
      return true;
    });
  }
}
