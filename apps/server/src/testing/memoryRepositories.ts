import type { ForumPost, ForumReply } from '@volunteer-portal/shared';
import type { AccountRecord, AccountRepository } from '../lib/accountRepository.js';
import type { ForumRepository, PostPatch } from '../lib/forumRepository.js';

export class MemoryAccountRepository implements AccountRepository {
  readonly records = new Map<string, AccountRecord>();

  async findByEmail(email: string): Promise<AccountRecord | null> {
    const record = this.records.get(email.trim().toLowerCase());
    return record ? { ...record } : null;
  }

  async insert(account: AccountRecord): Promise<boolean> {
    const key = account.email.trim().toLowerCase();
    if (this.records.has(key)) return false;
    this.records.set(key, { ...account });
    return true;
  }

  async setAdmin(email: string, isAdmin: boolean): Promise<boolean> {
    const record = this.records.get(email.trim().toLowerCase());
    if (!record) return false;
    record.isAdmin = isAdmin;
    return true;
  }
}

export class MemoryForumRepository implements ForumRepository {
  readonly posts = new Map<string, ForumPost>();
  readonly replies = new Map<string, ForumReply>();

  async insertPost(post: ForumPost): Promise<void> {
    this.posts.set(post.id, { ...post });
  }

  async getPost(postId: string): Promise<ForumPost | null> {
    const post = this.posts.get(postId);
    return post ? { ...post } : null;
  }

  async listPosts(limit: number, includeDeleted: boolean): Promise<ForumPost[]> {
    return [...this.posts.values()]
      .filter((p) => includeDeleted || !p.deleted)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((p) => ({ ...p }));
  }

  async updatePost(postId: string, patch: PostPatch): Promise<boolean> {
    const post = this.posts.get(postId);
    if (!post) return false;
    Object.assign(post, patch);
    return true;
  }

  async insertReply(reply: ForumReply): Promise<void> {
    this.replies.set(reply.id, { ...reply });
  }

  async listReplies(postId: string, includeDeleted: boolean): Promise<ForumReply[]> {
    return [...this.replies.values()]
      .filter((r) => r.postId === postId && (includeDeleted || !r.deleted))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((r) => ({ ...r }));
  }

  async markRepliesDeleted(postId: string): Promise<void> {
    for (const reply of this.replies.values()) {
      if (reply.postId === postId) reply.deleted = true;
    }
  }

  async markReplyDeleted(postId: string, replyId: string): Promise<boolean> {
    const reply = this.replies.get(replyId);
    if (!reply || reply.postId !== postId) return false;
    reply.deleted = true;
    return true;
  }
}
