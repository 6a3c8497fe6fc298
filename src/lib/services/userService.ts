import { z } from 'zod';
import type { CategoryRule, User } from '../../types';
import type { RuleRepository } from '../storage/rules';
import type { UserRepository } from '../storage/users';

const newUserSchema = z.object({
  username: z.string().trim().min(1).max(50),
  email: z.string().trim().email().max(100),
});

export interface UserServiceDeps {
  users: UserRepository;
  rules: RuleRepository;
  defaultRules: readonly CategoryRule[];
}

export interface UserSummary {
  user: User;
  categories: string[];
  ruleCount: number;
}

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  /**
   * Create a user and copy the default category rules into their scope.
   */
  createUser(username: string, email: string): User {
    const input = newUserSchema.parse({ username, email });
    const user = this.deps.users.create(input.username, input.email);
    const imported = this.deps.rules.importDefaults(user.id, this.deps.defaultRules);

    console.info(`[user_create] Created user ${user.username} with ${imported.length} default rules`);
    return user;
  }

  getByUsername(username: string): User | null {
    return this.deps.users.getByUsername(username);
  }

  listUsers(): User[] {
    return this.deps.users.list();
  }

  getUserSummary(userId: number): UserSummary | null {
    const user = this.deps.users.getById(userId);
    if (!user) return null;

    return {
      user,
      categories: this.deps.rules.categoriesFor(userId),
      ruleCount: this.deps.rules.listByUser(userId).length,
    };
  }
}
