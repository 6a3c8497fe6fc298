import { asc, eq } from 'drizzle-orm';
import type { User } from '../../types';
import type { LedgerDatabase } from './database';
import { users, type UserRow } from './schema';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    active: row.isActive,
    createdAt: new Date(row.createdAt),
  };
}

export class UserRepository {
  constructor(private readonly db: LedgerDatabase) {}

  create(username: string, email: string): User {
    const row = this.db
      .insert(users)
      .values({ username, email, createdAt: new Date().toISOString() })
      .returning()
      .get();
    return toUser(row);
  }

  getById(id: number): User | null {
    const row = this.db.select().from(users).where(eq(users.id, id)).get();
    return row ? toUser(row) : null;
  }

  getByUsername(username: string): User | null {
    const row = this.db.select().from(users).where(eq(users.username, username)).get();
    return row ? toUser(row) : null;
  }

  list(): User[] {
    return this.db.select().from(users).where(eq(users.isActive, true)).orderBy(asc(users.id)).all().map(toUser);
  }
}
