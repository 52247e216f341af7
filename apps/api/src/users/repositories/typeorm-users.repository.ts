import { Injectable } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { User } from '@clm/database';
import { NewUser, UserChanges, UsersRepository } from './users.repository';
import { isUniqueViolation } from '../../common/database/unique-violation';

@Injectable()
export class TypeOrmUsersRepository extends UsersRepository {
  private readonly repository: Repository<User>;

  constructor(dataSource: DataSource) {
    super();
    this.repository = dataSource.getRepository(User);
  }

  findById(id: string): Promise<User | null> {
    return this.repository.findOne({ where: { id } });
  }

  async insert(input: NewUser): Promise<User | null> {
    try {
      await this.repository.insert(input);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return null;
      }
      throw error;
    }
    return this.findById(input.id);
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
    if (Object.keys(changes).length > 0) {
      await this.repository.update({ id }, changes);
    }
    return this.findById(id);
  }
}
