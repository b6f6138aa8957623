import { Injectable } from '@nestjs/common';

import { UserContext } from '../../domain/model/user';
import { UserDirectory } from '../../domain/ports/user-directory';
import { UserInput, UserSchema } from './catalog.schema';

@Injectable()
export class InMemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, UserContext>();

  async findById(userId: string): Promise<UserContext | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  register(input: UserInput): UserContext {
    const user: UserContext = UserSchema.parse(input);
    this.users.set(user.id, user);
    return { ...user };
  }
}
