import type { User } from '@clm/database';

/**
 * Public user profile.
 *
 * Built only through fromEntity so the mapping from the entity stays explicit.
 */
export class UserProfileDto {
  id: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  role: string;
  createdAt: string;

  private constructor(user: User) {
    this.id = user.id;
    this.email = user.email;
    this.firstName = user.firstName;
    this.lastName = user.lastName;
    this.role = user.role;
    this.createdAt = user.createdAt.toISOString();
  }

  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(user);
  }
}
