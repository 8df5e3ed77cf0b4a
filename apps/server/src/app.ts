import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import multer from 'multer';

import type { AccountRepository } from './lib/accountRepository.js';
import type { Env } from './lib/env.js';
import type { ForumRepository } from './lib/forumRepository.js';
import { sendError } from './lib/http.js';
import type { Mailer } from './lib/mailer.js';
import type { ProfilePictureStore } from './lib/profilePictures.js';
import type { SlotStore } from './lib/slotStore.js';
import { registerAdminRoutes } from './routes/admin.js';
import { registerForumRoutes } from './routes/forum.js';
import { registerPublicRoutes } from './routes/public.js';
import { registerSlotRoutes } from './routes/slots.js';

export type CreateAppDeps = {
  env: Env;
  store: SlotStore;
  mailer: Mailer;
  accounts: AccountRepository;
  forum: ForumRepository;
  pictures: ProfilePictureStore;
};

export function createApp(deps: CreateAppDeps) {
  const { env, store, mailer, accounts, forum, pictures } = deps;

  const app = express();
  app.use(helmet());
  app.use(
    cors({
      origin: env.WEB_ORIGIN ? [env.WEB_ORIGIN] : true,
      credentials: false,
    })
  );
  app.use(express.json({ limit: '1mb' }));

  registerPublicRoutes(app, { env, accounts, pictures });
  registerSlotRoutes(app, { env, store, mailer });
  registerForumRoutes(app, { env, forum });
  registerAdminRoutes(app, { env, store, mailer, accounts, forum });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  const handleError: express.ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      const message = err.code === 'LIMIT_FILE_SIZE' ? 'Image must be 5 MB or smaller.' : err.message;
      res.status(400).json({ error: message, code: 'INVALID_INPUT' });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_INPUT' });
      return;
    }
    sendError(res, err, 'Unhandled route error');
  };
  app.use(handleError);

  return app;
}
