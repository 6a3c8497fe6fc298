import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadDefaultRules } from '../parsers/categorizer';
import { createRepositories, openDatabase, type DatabaseHandle, type Repositories } from './index';

describe('RuleRepository', () => {
  let handle: DatabaseHandle;
  let repos: Repositories;

  beforeEach(async () => {
    handle = await openDatabase(':memory:');
    repos = createRepositories(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  it('seeds the global defaults once', () => {
    const defaults = loadDefaultRules();

    expect(repos.rules.seedGlobal(defaults)).toBe(48);
    expect(repos.rules.seedGlobal(defaults)).toBe(0);
    expect(repos.rules.listByUser(null)).toHaveLength(48);
  });

  it('falls back to the global rules for a user without rules', async () => {
    repos.rules.seedGlobal(loadDefaultRules());
    const user = repos.users.create('test_user', 'test@example.com');

    expect(await repos.rules.activeRules(user.id)).toHaveLength(48);

    repos.rules.create(user.id, { pattern: 'rent', category: 'housing', priority: 3 });
    const active = await repos.rules.activeRules(user.id);
    expect(active.map((rule) => rule.pattern)).toEqual(['rent']);
  });

  it('lists active rules by priority, then pattern', () => {
    const user = repos.users.create('test_user', 'test@example.com');
    repos.rules.importDefaults(user.id, [
      { pattern: 'beta', isRegex: false, category: 'b', priority: 1, active: true },
      { pattern: 'alpha', isRegex: false, category: 'a', priority: 1, active: true },
      { pattern: 'gamma', isRegex: false, category: 'c', priority: 5, active: true },
    ]);

    expect(repos.rules.listByUser(user.id).map((rule) => rule.pattern)).toEqual(['gamma', 'alpha', 'beta']);
    expect(repos.rules.categoriesFor(user.id)).toEqual(['a', 'b', 'c']);
  });

  it('deactivates rules instead of deleting them', () => {
    const user = repos.users.create('test_user', 'test@example.com');
    const rule = repos.rules.create(user.id, { pattern: 'swiggy', category: 'food_dining', priority: 10 });
    if (rule.id === undefined) throw new Error('rule was not stored');

    expect(repos.rules.deactivate(rule.id)).toBe(true);
    expect(repos.rules.listByUser(user.id)).toEqual([]);
    expect(repos.rules.deactivate(9999)).toBe(false);
  });

  it('validates new rules', () => {
    expect(() => repos.rules.create(null, { pattern: '', category: 'x' })).toThrow();
  });
});
