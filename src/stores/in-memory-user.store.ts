import { IdentityAlreadyExistsError } from '../errors/auth.errors';
import type { User } from '../types/user.types';
import type { UserStore } from './store.types';

/**
 * Process-local credential store backed by a Map.
 * Records are copied on the way in and out so callers cannot mutate stored buffers.
 */
export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, User>();

  async findByIdentity(username: string): Promise<User | null> {
    const user = this.users.get(username);
    return user ? cloneUser(user) : null;
  }

  async insert(user: User): Promise<void> {
    // Check and set happen in one synchronous step
    if (this.users.has(user.username)) {
      throw new IdentityAlreadyExistsError(user.username);
    }
    this.users.set(user.username, cloneUser(user));
  }

  async listAll(): Promise<User[]> {
    return Array.from(this.users.values(), cloneUser);
  }
}

function cloneUser(user: User): User {
  return {
    username: user.username,
    passwordHash: Buffer.from(user.passwordHash),
    passwordSalt: Buffer.from(user.passwordSalt),
    createdAt: new Date(user.createdAt.getTime()),
  };
}
