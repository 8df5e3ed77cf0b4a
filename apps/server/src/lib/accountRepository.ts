import { Timestamp } from '@google-cloud/firestore';
import type { Firestore } from '@google-cloud/firestore';
import { z } from 'zod';

export type AccountRecord = {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  isAdmin: boolean;
  createdAt: Date;
};

export interface AccountRepository {
  findByEmail(email: string): Promise<AccountRecord | null>;
  /** Resolves false when the email is already registered */
  insert(account: AccountRecord): Promise<boolean>;
  /** Resolves false when no account has that email */
  setAdmin(email: string, isAdmin: boolean): Promise<boolean>;
}

const USERS_COLLECTION = 'users';

const accountDocSchema = z.object({
  id: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  passwordHash: z.string(),
  isAdmin: z.boolean().default(false),
  createdAt: z.instanceof(Timestamp),
});

/**
 * Accounts keyed by lowercased email (`users/{email}`)
 */
export class FirestoreAccountRepository implements AccountRepository {
  constructor(private readonly db: Firestore) {}

  private ref(email: string) {
    return this.db.collection(USERS_COLLECTION).doc(email.trim().toLowerCase());
  }

  async findByEmail(email: string): Promise<AccountRecord | null> {
    const snap = await this.ref(email).get();
    if (!snap.exists) return null;
    const parsed = accountDocSchema.safeParse(snap.data());
    if (!parsed.success) {
      console.warn(`[accounts] Ignoring malformed account document ${snap.id}`);
      return null;
    }
    return { ...parsed.data, createdAt: parsed.data.createdAt.toDate() };
  }

  async insert(account: AccountRecord): Promise<boolean> {
    const ref = this.ref(account.email);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (snap.exists) return false;
      tx.create(ref, { ...account, createdAt: Timestamp.fromDate(account.createdAt) });
      return true;
    });
  }

  async setAdmin(email: string, isAdmin: boolean): Promise<boolean> {
    const ref = this.ref(email);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (!snap.exists) return false;
      tx.update(ref, { isAdmin });
      return true;
    });
  }
}
