import { Injectable, Logger } from '@nestjs/common';
import type { User } from '@clm/database';
import type { RequestUser } from '../auth';
import { UsersRepository } from './repositories/users.repository';
import { UserProfileDto } from './dto/user-profile.dto';
import { UpdateProfileDto } from './dto/update-profile.dto';
import {
  UserNotFoundException,
  UserProvisioningException,
} from './exceptions/user.exceptions';

const MAX_PROVISION_ATTEMPTS = 3;

/**
 * UsersService - profiles for identity-provider users.
 *
 * A user row is created the first time a verified identity asks for its
 * profile. Two first requests can race; the loser's insert is rejected by
 * the unique key and it re-reads the winner's row.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly users: UsersRepository) {}

  async getProfile(identity: RequestUser): Promise<UserProfileDto> {
    const user = await this.getOrCreate(identity);
    return UserProfileDto.fromEntity(user);
  }

  async updateProfile(
    identity: RequestUser,
    dto: UpdateProfileDto,
  ): Promise<UserProfileDto> {
    await this.getOrCreate(identity);

    const updated = await this.users.update(identity.userId, {
      ...(dto.firstName !== undefined && { firstName: dto.firstName }),
      ...(dto.lastName !== undefined && { lastName: dto.lastName }),
    });
    if (!updated) {
      throw new UserNotFoundException(identity.userId);
    }

    this.logger.log(`Profile updated for user ${identity.userId}`);
    return UserProfileDto.fromEntity(updated);
  }

  /**
   * Returns the existing row unchanged, or inserts one from the token's
   * claims. Gives up after MAX_PROVISION_ATTEMPTS lost races.
   */
  async getOrCreate(identity: RequestUser): Promise<User> {
    const { firstName, lastName } = splitDisplayName(identity.name);

    for (let attempt = 1; attempt <= MAX_PROVISION_ATTEMPTS; attempt++) {
      const existing = await this.users.findById(identity.userId);
      if (existing) {
        return existing;
      }

      const created = await this.users.insert({
        id: identity.userId,
        email: identity.email,
        firstName,
        lastName,
      });
      if (created) {
        this.logger.log(`Auto-provisioned user ${identity.userId} (${identity.email})`);
        return created;
      }

      this.logger.warn(
        `Provisioning race for user ${identity.userId} (attempt ${attempt}/${MAX_PROVISION_ATTEMPTS})`,
      );
    }

    this.logger.error(`Giving up provisioning user ${identity.userId}`);
    throw new UserProvisioningException(identity.email);
  }
}

/** "John Michael Doe" → { firstName: "John", lastName: "Michael Doe" } */
export function splitDisplayName(name: string | undefined): {
  firstName: string | null;
  lastName: string | null;
} {
  const parts = (name ?? '').trim().split(/\s+/).filter(Boolean);
  return {
    firstName: parts[0] ?? null,
    lastName: parts.length > 1 ? parts.slice(1).join(' ') : null,
  };
}
