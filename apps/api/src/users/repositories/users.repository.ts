import type { User } from '@clm/database';

export interface NewUser {
  id: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
}

export type UserChanges = Partial<Pick<User, 'firstName' | 'lastName'>>;

export abstract class UsersRepository {
  abstract findById(id: string): Promise<User | null>;

  /**
   * Inserts a user. Resolves to null when the id or email is already taken,
   * which is how a lost provisioning race shows up.
   */
  abstract insert(input: NewUser): Promise<User | null>;

  abstract update(id: string, changes: UserChanges): Promise<User | null>;
}
