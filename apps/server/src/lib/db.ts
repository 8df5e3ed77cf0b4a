import { Firestore } from '@google-cloud/firestore';
import { FirestoreAccountRepository, type AccountRepository } from './accountRepository.js';
import type { Env } from './env.js';
import { FirestoreForumRepository, type ForumRepository } from './forumRepository.js';

export interface Repositories {
  accounts: AccountRepository;
  forum: ForumRepository;
}

export function createRepositories(env: Pick<Env, 'GCP_PROJECT_ID'>): Repositories {
  const db = new Firestore({
    ...(env.GCP_PROJECT_ID ? { projectId: env.GCP_PROJECT_ID } : {}),
    ignoreUndefinedProperties: true,
  });
  return {
    accounts: new FirestoreAccountRepository(db),
    forum: new FirestoreForumRepository(db),
  };
}
