import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  applyDecay,
  closeMemoryDatabase,
  createGoal,
  createMemory,
  findActiveGoalByTitle,
  getGoal,
  getMemory,
  getMemoryStats,
  getProfileAttributes,
  initMemoryDatabase,
  listGoals,
  listMemories,
  listTopMemories,
  mergeMemories,
  searchMemoryCandidates,
  touchMemory,
  updateGoal,
  updateMemoryImportance,
  upsertProfileAttribute,
} from '../../src/memory/db.js';
import { ConstraintViolationError, NotFoundError } from '../../src/memory/errors.js';

beforeEach(() => {
  initMemoryDatabase(':memory:');
});

afterEach(() => {
  closeMemoryDatabase();
});

describe('memories', () => {
  it('creates a record with zero accesses', () => {
    const record = createMemory({ content: 'Lives in Osaka', category: 'fact', importance: 0.7 });

    expect(record.id).toBe(1);
    expect(record.access_count).toBe(0);
    expect(record.last_accessed_at).toBeNull();
    expect(record.created_at).toBe(record.updated_at);
    expect(getMemory(record.id)).toEqual(record);
  });

  it('rejects importance outside [0, 1] and writes nothing', () => {
    expect(() => createMemory({ content: 'x y', category: 'fact', importance: 1.5 })).toThrow(
      ConstraintViolationError,
    );
    expect(() => createMemory({ content: 'x y', category: 'fact', importance: -0.1 })).toThrow(
      ConstraintViolationError,
    );
    expect(listMemories()).toEqual([]);
  });

  it('rejects an unknown category instead of coercing it', () => {
    expect(() =>
      createMemory({ content: 'Plays chess', category: 'hobby', importance: 0.5 }),
    ).toThrow(ConstraintViolationError);
  });

  it('rejects empty content', () => {
    expect(() => createMemory({ content: '   ', category: 'fact', importance: 0.5 })).toThrow(
      ConstraintViolationError,
    );
  });

  it('throws NotFound for a missing id', () => {
    expect(() => getMemory(42)).toThrow(NotFoundError);
    expect(() => touchMemory(42)).toThrow(NotFoundError);
  });

  it('touch increments the access counter', () => {
    const record = createMemory({ content: 'Likes tea', category: 'preference', importance: 0.5 });
    touchMemory(record.id);
    const touched = touchMemory(record.id);

    expect(touched.access_count).toBe(2);
    expect(touched.last_accessed_at).not.toBeNull();
  });

  it('updateMemoryImportance validates the range', () => {
    const record = createMemory({ content: 'Likes tea', category: 'preference', importance: 0.5 });
    expect(() => updateMemoryImportance(record.id, 2)).toThrow(ConstraintViolationError);
    expect(updateMemoryImportance(record.id, 0.9).importance).toBe(0.9);
  });

  it('filters listing by category', () => {
    createMemory({ content: 'Lives in Osaka', category: 'fact', importance: 0.7 });
    createMemory({ content: 'Likes tea', category: 'preference', importance: 0.5 });

    expect(listMemories({ category: 'preference' }).map((m) => m.content)).toEqual(['Likes tea']);
  });

  it('lists top memories by importance', () => {
    createMemory({ content: 'Likes tea', category: 'preference', importance: 0.3 });
    createMemory({ content: 'Has a daughter', category: 'fact', importance: 0.9 });
    createMemory({ content: 'Lives in Osaka', category: 'fact', importance: 0.7 });

    expect(listTopMemories(2).map((m) => m.content)).toEqual(['Has a daughter', 'Lives in Osaka']);
  });

  it('merges into the survivor and archives the absorbed record', () => {
    const short = createMemory({ content: 'likes coffee', category: 'preference', importance: 0.4 });
    const long = createMemory({
      content: 'likes coffee in the morning',
      category: 'preference',
      importance: 0.7,
    });
    touchMemory(short.id);
    const lastTouch = touchMemory(short.id).last_accessed_at;

    const merged = mergeMemories(long.id, short.id);

    expect(merged.importance).toBe(0.7);
    expect(merged.access_count).toBe(2);
    expect(merged.last_accessed_at).toBe(lastTouch);
    const absorbed = getMemory(short.id);
    expect(absorbed.archived_at).not.toBeNull();
    expect(absorbed.merged_into).toBe(long.id);
    expect(listMemories().map((m) => m.id)).toEqual([long.id]);
    expect(listMemories({ includeArchived: true })).toHaveLength(2);
  });

  it('refuses to merge across categories', () => {
    const a = createMemory({ content: 'likes coffee', category: 'preference', importance: 0.4 });
    const b = createMemory({ content: 'likes coffee a lot', category: 'fact', importance: 0.4 });
    expect(() => mergeMemories(a.id, b.id)).toThrow(ConstraintViolationError);
  });

  it('records the decay reference', () => {
    const record = createMemory({ content: 'Likes tea', category: 'preference', importance: 0.5 });
    const decayed = applyDecay(record.id, 0.4, '2026-01-08T00:00:00.000Z');
    expect(decayed.importance).toBe(0.4);
    expect(decayed.decayed_at).toBe('2026-01-08T00:00:00.000Z');
  });
});

describe('searchMemoryCandidates', () => {
  it('matches stemmed prefixes', () => {
    const record = createMemory({
      content: 'Works as a teacher in Osaka',
      category: 'fact',
      importance: 0.8,
    });

    const results = searchMemoryCandidates({ terms: ['work'], text: 'work' }, { limit: 5 });
    expect(results).toHaveLength(1);
    expect(results[0].record.id).toBe(record.id);
    expect(results[0].textScore).toBe(1);
  });

  it('skips archived records and other categories', () => {
    const short = createMemory({ content: 'likes coffee', category: 'preference', importance: 0.4 });
    const long = createMemory({
      content: 'likes coffee in the morning',
      category: 'preference',
      importance: 0.4,
    });
    createMemory({ content: 'coffee shop owner', category: 'fact', importance: 0.4 });
    mergeMemories(long.id, short.id);

    const results = searchMemoryCandidates(
      { terms: ['coffee'], text: 'coffee' },
      { category: 'preference', limit: 5 },
    );
    expect(results.map((r) => r.record.id)).toEqual([long.id]);
  });
});

describe('goals', () => {
  it('creates goals with defaults', () => {
    const goal = createGoal({ title: 'Run a marathon' });
    expect(goal).toMatchObject({
      title: 'Run a marathon',
      description: null,
      deadline: null,
      priority: 'medium',
      status: 'active',
      progress: 0,
    });
  });

  it('rejects a malformed deadline and an unknown priority', () => {
    expect(() => createGoal({ title: 'Learn piano', deadline: '31/12/2026' })).toThrow(
      ConstraintViolationError,
    );
    expect(() => createGoal({ title: 'Learn piano', priority: 'urgent' })).toThrow(
      ConstraintViolationError,
    );
    expect(listGoals('all')).toEqual([]);
  });

  it('rejects a deadline that is not on the calendar', () => {
    expect(() => createGoal({ title: 'Learn piano', deadline: '2026-02-30' })).toThrow(
      ConstraintViolationError,
    );
    const goal = createGoal({ title: 'Learn piano', deadline: '2028-02-29' });
    expect(() => updateGoal(goal.id, { deadline: '2026-13-01' })).toThrow(
      ConstraintViolationError,
    );
    expect(getGoal(goal.id).deadline).toBe('2028-02-29');
  });

  it('rejects progress 150 and leaves the goal unchanged', () => {
    const goal = createGoal({ title: 'Learn piano' });
    updateGoal(goal.id, { progress: 40 });

    expect(() => updateGoal(goal.id, { progress: 150 })).toThrow(ConstraintViolationError);
    expect(getGoal(goal.id).progress).toBe(40);
  });

  it('rejects an unknown status', () => {
    const goal = createGoal({ title: 'Learn piano' });
    expect(() => updateGoal(goal.id, { status: 'paused' })).toThrow(ConstraintViolationError);
    expect(getGoal(goal.id).status).toBe('active');
  });

  it('throws NotFound when updating a missing goal', () => {
    expect(() => updateGoal(999, { progress: 10 })).toThrow(NotFoundError);
  });

  it('lists by status', () => {
    const done = createGoal({ title: 'Move to Osaka' });
    createGoal({ title: 'Learn piano' });
    updateGoal(done.id, { status: 'completed', progress: 100 });

    expect(listGoals().map((g) => g.title)).toEqual(['Learn piano']);
    expect(listGoals('completed').map((g) => g.title)).toEqual(['Move to Osaka']);
    expect(listGoals('all')).toHaveLength(2);
  });

  it('finds an active goal by title regardless of case', () => {
    const goal = createGoal({ title: 'Learn Piano' });
    expect(findActiveGoalByTitle('learn piano')?.id).toBe(goal.id);

    updateGoal(goal.id, { status: 'archived' });
    expect(findActiveGoalByTitle('learn piano')).toBeNull();
  });
});

describe('profile', () => {
  it('upserts values and keeps the category when none is given', () => {
    upsertProfileAttribute('city', 'Osaka', 'personal');
    upsertProfileAttribute('city', 'Kyoto');

    const [city] = getProfileAttributes(['city']);
    expect(city.value).toBe('Kyoto');
    expect(city.category).toBe('personal');
  });

  it('returns every attribute sorted by key when no keys are given', () => {
    upsertProfileAttribute('occupation', 'teacher', 'work');
    upsertProfileAttribute('city', 'Osaka');

    expect(getProfileAttributes().map((p) => p.key)).toEqual(['city', 'occupation']);
  });
});

describe('getMemoryStats', () => {
  it('counts active and archived records, goals and profile entries', () => {
    const a = createMemory({ content: 'likes coffee', category: 'preference', importance: 0.4 });
    const b = createMemory({ content: 'likes coffee a lot', category: 'preference', importance: 0.4 });
    mergeMemories(b.id, a.id);
    createGoal({ title: 'Learn piano' });
    upsertProfileAttribute('city', 'Osaka');

    expect(getMemoryStats()).toEqual({
      memory_count: 1,
      archived_memory_count: 1,
      profile_count: 1,
      goal_count: 1,
      active_goals: 1,
    });
  });
});
