export interface Account {
  id: string;
  firstName: string;
  lastName: string;
  email: string; // lowercased
  isAdmin: boolean;
}

/**
 * Claims carried by a session token
 */
export type SessionUser = Account;
