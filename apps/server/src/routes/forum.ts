import type express from 'express';
import { createPostRequestSchema, createReplyRequestSchema, type SessionUser } from '@volunteer-portal/shared';
import { getUserFromReq, requireUser } from '../lib/auth.js';
import type { Env } from '../lib/env.js';
import type { ForumRepository } from '../lib/forumRepository.js';
import { parseOr400, sendError, sendOutcome } from '../lib/http.js';
import { createPost, createReply, listPosts, listReplies } from '../services/forum.js';

export type ForumRouteDeps = {
  env: Env;
  forum: ForumRepository;
};

function authorOf(user: SessionUser) {
  return { email: user.email, name: `${user.firstName} ${user.lastName}`.trim() };
}

function wantsDeleted(req: express.Request, user: SessionUser): boolean {
  return user.isAdmin && req.query.includeDeleted === 'true';
}

export function registerForumRoutes(app: express.Express, deps: ForumRouteDeps) {
  const { env, forum } = deps;
  const requireUserMw = requireUser(env.JWT_SECRET);

  app.get('/api/forum/posts', requireUserMw, async (req, res) => {
    const user = getUserFromReq(req);
    try {
      const items = await listPosts(forum, wantsDeleted(req, user));
      return res.json({ items });
    } catch (e) {
      return sendError(res, e, 'List posts failed');
    }
  });

  app.post('/api/forum/posts', requireUserMw, async (req, res) => {
    const body = parseOr400(createPostRequestSchema, req.body, res);
    if (!body) return;
    const user = getUserFromReq(req);

    try {
      const outcome = await createPost(forum, authorOf(user), body);
      return sendOutcome(res, outcome, (post) => ({ post }));
    } catch (e) {
      return sendError(res, e, 'Create post failed');
    }
  });

  app.get('/api/forum/posts/:postId/replies', requireUserMw, async (req, res) => {
    const user = getUserFromReq(req);
    try {
      const outcome = await listReplies(forum, req.params.postId, user.isAdmin);
      return sendOutcome(res, outcome, (items) => ({ items }));
    } catch (e) {
      return sendError(res, e, 'List replies failed');
    }
  });

  app.post('/api/forum/posts/:postId/replies', requireUserMw, async (req, res) => {
    const body = parseOr400(createReplyRequestSchema, req.body, res);
    if (!body) return;
    const user = getUserFromReq(req);

    try {
      const outcome = await createReply(forum, req.params.postId, authorOf(user), body.body);
      return sendOutcome(res, outcome, (reply) => ({ reply }));
    } catch (e) {
      return sendError(res, e, 'Reply failed');
    }
  });
}
