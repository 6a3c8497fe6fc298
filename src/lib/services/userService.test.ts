import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLedger, type Ledger } from '../ledger';

describe('UserService', () => {
  let ledger: Ledger;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    ledger = await createLedger(
      { databasePath: ':memory:', topCategories: 5 },
      { extractLines: async () => [] }
    );
  });

  afterEach(() => {
    ledger.close();
    vi.restoreAllMocks();
  });

  it('creates a user with their own copy of the default rules', () => {
    const user = ledger.users.createUser('  test_user ', 'test@example.com');

    expect(user).toMatchObject({ username: 'test_user', email: 'test@example.com', active: true });
    expect(ledger.users.getUserSummary(user.id)).toMatchObject({ user: { id: user.id }, ruleCount: 48 });
    expect(ledger.users.getUserSummary(user.id)?.categories).toEqual([
      'bank_charges',
      'banking',
      'education',
      'entertainment',
      'food_dining',
      'healthcare',
      'income',
      'shopping',
      'subscriptions',
      'transport',
      'travel',
      'utilities',
    ]);
  });

  it('rejects invalid input', () => {
    expect(() => ledger.users.createUser('', 'test@example.com')).toThrow();
    expect(() => ledger.users.createUser('test_user', 'not-an-email')).toThrow();
  });

  it('rejects a duplicate username', () => {
    ledger.users.createUser('test_user', 'test@example.com');
    expect(() => ledger.users.createUser('test_user', 'other@example.com')).toThrow();
  });

  it('finds and lists users', () => {
    const first = ledger.users.createUser('first_user', 'first@example.com');
    ledger.users.createUser('second_user', 'second@example.com');

    expect(ledger.users.getByUsername('first_user')?.id).toBe(first.id);
    expect(ledger.users.getByUsername('nobody')).toBeNull();
    expect(ledger.users.listUsers().map((u) => u.username)).toEqual(['first_user', 'second_user']);
    expect(ledger.users.getUserSummary(9999)).toBeNull();
  });
});
