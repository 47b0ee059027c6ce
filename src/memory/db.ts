import Database from 'better-sqlite3';
import uFuzzy from '@leeoniya/ufuzzy';
import fs from 'fs';
import path from 'path';

import { MEMORY_DB_PATH } from '../config.js';
import {
  ConstraintViolationError,
  NotFoundError,
  StoreError,
  guardStore,
} from './errors.js';
import {
  isGoalPriority,
  isGoalStatus,
  isMemoryCategory,
  type Goal,
  type GoalPriority,
  type GoalStatus,
  type MemoryCategory,
  type MemoryRecord,
  type ProfileAttribute,
} from './types.js';

// ==================== Fuzzy search index ====================

const fuzzy = new uFuzzy({
  intraMode: 1, // allow insertions within words (typos)
  interLft: 2, // allow chars before match
  interRgt: 0, // strict right boundary
});

// In-memory haystack of active (non-archived) memories
let fuzzyHaystack: string[] = [];
let fuzzyIds: number[] = []; // parallel array of memory ids
let fuzzyCategories: MemoryCategory[] = []; // parallel array of categories

function rebuildFuzzyIndex(): void {
  const rows = db
    .prepare<[], { id: number; content: string; category: MemoryCategory }>(
      'SELECT id, content, category FROM memories WHERE archived_at IS NULL',
    )
    .all();
  fuzzyHaystack = rows.map((r) => r.content);
  fuzzyIds = rows.map((r) => r.id);
  fuzzyCategories = rows.map((r) => r.category);
}

function syncFuzzy(record: MemoryRecord): void {
  const idx = fuzzyIds.indexOf(record.id);
  if (idx >= 0) {
    fuzzyHaystack[idx] = record.content;
    fuzzyCategories[idx] = record.category;
  } else {
    fuzzyIds.push(record.id);
    fuzzyHaystack.push(record.content);
    fuzzyCategories.push(record.category);
  }
}

function removeFuzzy(id: number): void {
  const idx = fuzzyIds.indexOf(id);
  if (idx >= 0) {
    fuzzyIds.splice(idx, 1);
    fuzzyHaystack.splice(idx, 1);
    fuzzyCategories.splice(idx, 1);
  }
}

let db: Database.Database;

export function initMemoryDatabase(dbPath: string = MEMORY_DB_PATH): void {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS memories (
      id                INTEGER PRIMARY KEY AUTOINCREMENT,
      content           TEXT NOT NULL,
      category          TEXT NOT NULL CHECK(category IN ('fact','preference','personality','skill','goal-related')),
      importance        REAL NOT NULL CHECK(importance >= 0 AND importance <= 1),
      access_count      INTEGER NOT NULL DEFAULT 0 CHECK(access_count >= 0),
      last_accessed_at  TEXT,
      created_at        TEXT NOT NULL,
      updated_at        TEXT NOT NULL,
      decayed_at        TEXT,
      archived_at       TEXT,
      merged_into       INTEGER REFERENCES memories(id)
    );

    CREATE TABLE IF NOT EXISTS goals (
      id           INTEGER PRIMARY KEY AUTOINCREMENT,
      title        TEXT NOT NULL,
      description  TEXT,
      deadline     TEXT,
      priority     TEXT NOT NULL DEFAULT 'medium' CHECK(priority IN ('low','medium','high')),
      status       TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active','completed','archived')),
      progress     INTEGER NOT NULL DEFAULT 0 CHECK(progress >= 0 AND progress <= 100),
      created_at   TEXT NOT NULL,
      updated_at   TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS user_profile (
      key          TEXT PRIMARY KEY,
      value        TEXT NOT NULL,
      category     TEXT,
      updated_at   TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_memories_category ON memories(category);
    CREATE INDEX IF NOT EXISTS idx_memories_archived ON memories(archived_at);
    CREATE INDEX IF NOT EXISTS idx_goals_status ON goals(status);

    CREATE VIRTUAL TABLE IF NOT EXISTS memory_fts USING fts5(
      memory_id UNINDEXED,
      content,
      tokenize='porter unicode61 remove_diacritics 2'
    );
  `);

  // Rebuild search indices from main table (ensures consistency after restart)
  rebuildFtsIndex();
  rebuildFuzzyIndex();
}

function rebuildFtsIndex(): void {
  db.transaction(() => {
    db.exec('DELETE FROM memory_fts');
    const rows = db
      .prepare<[], { id: number; content: string }>(
        'SELECT id, content FROM memories WHERE archived_at IS NULL',
      )
      .all();
    const insert = db.prepare('INSERT INTO memory_fts (memory_id, content) VALUES (?, ?)');
    for (const row of rows) {
      insert.run(row.id, row.content);
    }
  })();
}

// Callers run these inside the same transaction as the row write.
function writeFts(id: number, content: string): void {
  db.prepare('DELETE FROM memory_fts WHERE memory_id = ?').run(id);
  db.prepare('INSERT INTO memory_fts (memory_id, content) VALUES (?, ?)').run(id, content);
}

function deleteFts(id: number): void {
  db.prepare('DELETE FROM memory_fts WHERE memory_id = ?').run(id);
}

// ==================== Validation ====================

export function assertImportance(value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConstraintViolationError(
      `importance must be between 0.0 and 1.0 (got ${value})`,
    );
  }
}

export function assertCategory(value: string): asserts value is MemoryCategory {
  if (!isMemoryCategory(value)) {
    throw new ConstraintViolationError(`unknown memory category "${value}"`);
  }
}

function assertProgress(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new ConstraintViolationError(
      `progress must be an integer between 0 and 100 (got ${value})`,
    );
  }
}

function assertGoalStatus(value: string): asserts value is GoalStatus {
  if (!isGoalStatus(value)) {
    throw new ConstraintViolationError(`unknown goal status "${value}"`);
  }
}

function assertGoalPriority(value: string): asserts value is GoalPriority {
  if (!isGoalPriority(value)) {
    throw new ConstraintViolationError(`unknown goal priority "${value}"`);
  }
}

// Date.parse rolls 2026-02-30 over to March; the round trip catches it
function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const time = Date.parse(`${value}T00:00:00.000Z`);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

function assertDeadline(value: string): void {
  if (!isCalendarDate(value)) {
    throw new ConstraintViolationError(`deadline must be YYYY-MM-DD (got "${value}")`);
  }
}

export function assertContent(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new ConstraintViolationError(`${field} must not be empty`);
  }
}

// ==================== Memories ====================

export function findMemory(id: number): MemoryRecord | null {
  return guardStore('findMemory', () => {
    const row = db
      .prepare<[number], MemoryRecord>('SELECT * FROM memories WHERE id = ?')
      .get(id);
    return row || null;
  });
}

export function getMemory(id: number): MemoryRecord {
  const row = findMemory(id);
  if (!row) throw new NotFoundError(`Memory ${id} not found`);
  return row;
}

export function createMemory(input: {
  content: string;
  category: string;
  importance: number;
}): MemoryRecord {
  assertContent(input.content, 'content');
  assertCategory(input.category);
  assertImportance(input.importance);
  const category = input.category;
  const content = input.content.trim();

  const record = guardStore('createMemory', () =>
    db.transaction(() => {
      const now = new Date().toISOString();
      const result = db
        .prepare(
          `INSERT INTO memories (content, category, importance, access_count, created_at, updated_at)
           VALUES (?, ?, ?, 0, ?, ?)`,
        )
        .run(content, category, input.importance, now, now);
      const id = Number(result.lastInsertRowid);
      writeFts(id, content);
      return getMemory(id);
    })(),
  );

  syncFuzzy(record);
  return record;
}

export function listMemories(options?: {
  category?: MemoryCategory;
  includeArchived?: boolean;
}): MemoryRecord[] {
  const clauses: string[] = [];
  const params: string[] = [];
  if (!options?.includeArchived) clauses.push('archived_at IS NULL');
  if (options?.category) {
    clauses.push('category = ?');
    params.push(options.category);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

  return guardStore('listMemories', () =>
    db
      .prepare<string[], MemoryRecord>(
        `SELECT * FROM memories ${where} ORDER BY created_at DESC, id DESC`,
      )
      .all(...params),
  );
}

/** Highest-importance active memories, for the system instruction. */
export function listTopMemories(limit: number): MemoryRecord[] {
  return guardStore('listTopMemories', () =>
    db
      .prepare<[number], MemoryRecord>(
        `SELECT * FROM memories WHERE archived_at IS NULL
         ORDER BY importance DESC, access_count DESC, updated_at DESC
         LIMIT ?`,
      )
      .all(limit),
  );
}

export function touchMemory(id: number): MemoryRecord {
  return guardStore('touchMemory', () => {
    const now = new Date().toISOString();
    const result = db
      .prepare(
        'UPDATE memories SET access_count = access_count + 1, last_accessed_at = ? WHERE id = ?',
      )
      .run(now, id);
    if (result.changes === 0) throw new NotFoundError(`Memory ${id} not found`);
    return getMemory(id);
  });
}

/** A duplicate was seen again: refresh updated_at and set importance. */
export function updateMemoryImportance(id: number, importance: number): MemoryRecord {
  assertImportance(importance);
  return guardStore('updateMemoryImportance', () => {
    const now = new Date().toISOString();
    const result = db
      .prepare('UPDATE memories SET importance = ?, updated_at = ? WHERE id = ?')
      .run(importance, now, id);
    if (result.changes === 0) throw new NotFoundError(`Memory ${id} not found`);
    return getMemory(id);
  });
}

function laterOf(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return a >= b ? a : b;
}

/**
 * Fold `absorbedId` into `survivorId`: higher importance wins, access counts
 * add up, the more recent timestamps are kept. The absorbed row is archived.
 */
export function mergeMemories(survivorId: number, absorbedId: number): MemoryRecord {
  if (survivorId === absorbedId) {
    throw new ConstraintViolationError('cannot merge a memory into itself');
  }

  const merged = guardStore('mergeMemories', () =>
    db.transaction(() => {
      const survivor = getMemory(survivorId);
      const absorbed = getMemory(absorbedId);
      if (survivor.archived_at || absorbed.archived_at) {
        throw new ConstraintViolationError('cannot merge archived memories');
      }
      if (survivor.category !== absorbed.category) {
        throw new ConstraintViolationError('cannot merge memories across categories');
      }

      const now = new Date().toISOString();
      db.prepare(
        `UPDATE memories SET
          importance = ?,
          access_count = ?,
          updated_at = ?,
          last_accessed_at = ?
        WHERE id = ?`,
      ).run(
        Math.max(survivor.importance, absorbed.importance),
        survivor.access_count + absorbed.access_count,
        laterOf(survivor.updated_at, absorbed.updated_at),
        laterOf(survivor.last_accessed_at, absorbed.last_accessed_at),
        survivorId,
      );
      db.prepare('UPDATE memories SET archived_at = ?, merged_into = ? WHERE id = ?').run(
        now,
        survivorId,
        absorbedId,
      );
      deleteFts(absorbedId);
      return getMemory(survivorId);
    })(),
  );

  removeFuzzy(absorbedId);
  return merged;
}

export function applyDecay(id: number, importance: number, decayedAt: string): MemoryRecord {
  assertImportance(importance);
  return guardStore('applyDecay', () => {
    const result = db
      .prepare('UPDATE memories SET importance = ?, decayed_at = ? WHERE id = ?')
      .run(importance, decayedAt, id);
    if (result.changes === 0) throw new NotFoundError(`Memory ${id} not found`);
    return getMemory(id);
  });
}

// ==================== Text match ====================

export interface KeywordQuery {
  /** Stemmed-prefix terms for FTS5 (already expanded). */
  terms: string[];
  /** Raw text for the typo-tolerant channel. */
  text: string;
}

function buildFtsQuery(terms: string[]): string | null {
  const words = terms
    .map((w) => w.toLowerCase().replace(/[^\p{L}\p{N}]/gu, ''))
    .filter((w) => w.length >= 2);
  if (words.length === 0) return null;
  // Prefix matching with OR for broad recall
  return [...new Set(words)].map((w) => `${w}*`).join(' OR ');
}

/**
 * Text-match candidates with a normalised score in [0, 1].
 * Channels: exact content (score 1), FTS5 bm25, and uFuzzy (typo-tolerant,
 * scored 0.7× by position). The category filter applies inside each channel,
 * before its cap.
 */
export function searchMemoryCandidates(
  query: KeywordQuery,
  options: { category?: MemoryCategory; limit: number },
): { record: MemoryRecord; textScore: number }[] {
  const scoreMap = new Map<number, number>();
  const cap = options.limit * 3;
  const categoryClause = options.category ? 'AND m.category = ?' : '';
  const categoryParams: string[] = options.category ? [options.category] : [];

  // Channel 0: exact content, so a stored sentence always finds itself
  const exactText = query.text.trim();
  if (exactText.length > 0) {
    const exact = guardStore('searchMemoryCandidates', () =>
      db
        .prepare<(string | number)[], { id: number }>(
          `SELECT m.id FROM memories m
           WHERE m.archived_at IS NULL AND lower(m.content) = lower(?) ${categoryClause}
           ORDER BY m.id DESC LIMIT ?`,
        )
        .all(exactText, ...categoryParams, cap),
    );
    for (const row of exact) scoreMap.set(row.id, 1);
  }

  // Channel 1: FTS5 prefix matching
  const ftsQuery = buildFtsQuery(query.terms);
  if (ftsQuery) {
    const ftsMatches = guardStore('searchMemoryCandidates', () =>
      db
        .prepare<(string | number)[], { memory_id: number; rank: number }>(
          `SELECT memory_fts.memory_id AS memory_id, memory_fts.rank AS rank
           FROM memory_fts JOIN memories m ON m.id = memory_fts.memory_id
           WHERE memory_fts MATCH ? AND m.archived_at IS NULL ${categoryClause}
           ORDER BY memory_fts.rank LIMIT ?`,
        )
        .all(ftsQuery, ...categoryParams, cap),
    );

    // Normalize FTS ranks to 0-1 (rank is negative, further from 0 = better)
    const maxAbsRank = Math.max(...ftsMatches.map((m) => Math.abs(m.rank)), 1e-9);
    for (const match of ftsMatches) {
      const id = Number(match.memory_id);
      scoreMap.set(id, Math.max(scoreMap.get(id) || 0, Math.abs(match.rank) / maxAbsRank));
    }
  }

  // Channel 2: uFuzzy (typo-tolerant), over the requested category only
  const needle = query.text.trim();
  const pool = fuzzyIds
    .map((_, i) => i)
    .filter((i) => !options.category || fuzzyCategories[i] === options.category);
  if (needle.length > 0 && pool.length > 0) {
    const haystack = pool.map((i) => fuzzyHaystack[i]);
    const [idxs, , order] = fuzzy.search(haystack, needle);
    if (idxs && order) {
      const maxScore = order.length;
      for (let i = 0; i < Math.min(order.length, cap); i++) {
        const id = fuzzyIds[pool[idxs[order[i]]]];
        // Position-based (first result = best), penalized 0.7×
        const fuzzyScore = ((maxScore - i) / maxScore) * 0.7;
        scoreMap.set(id, Math.max(scoreMap.get(id) || 0, fuzzyScore));
      }
    }
  }

  const results: { record: MemoryRecord; textScore: number }[] = [];
  for (const [id, textScore] of scoreMap) {
    const record = findMemory(id);
    if (!record || record.archived_at) continue;
    if (options.category && record.category !== options.category) continue;
    results.push({ record, textScore });
  }
  return results;
}

// ==================== Profile ====================

export function upsertProfileAttribute(
  key: string,
  value: string,
  category: string | null = null,
): ProfileAttribute {
  assertContent(key, 'key');
  return guardStore('upsertProfileAttribute', () => {
    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO user_profile (key, value, category, updated_at) VALUES (?, ?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET
         value = excluded.value,
         category = COALESCE(excluded.category, user_profile.category),
         updated_at = excluded.updated_at`,
    ).run(key, value, category, now);
    const row = db
      .prepare<[string], ProfileAttribute>('SELECT * FROM user_profile WHERE key = ?')
      .get(key);
    if (!row) throw new StoreError(`profile attribute "${key}" vanished after upsert`);
    return row;
  });
}

export function getProfileAttributes(keys?: string[]): ProfileAttribute[] {
  return guardStore('getProfileAttributes', () => {
    if (keys && keys.length > 0) {
      const placeholders = keys.map(() => '?').join(', ');
      return db
        .prepare<string[], ProfileAttribute>(
          `SELECT * FROM user_profile WHERE key IN (${placeholders}) ORDER BY key`,
        )
        .all(...keys);
    }
    return db
      .prepare<[], ProfileAttribute>('SELECT * FROM user_profile ORDER BY key')
      .all();
  });
}

// ==================== Goals ====================

export interface GoalInput {
  title: string;
  description?: string | null;
  deadline?: string | null;
  priority?: string;
}

export interface GoalPatch {
  title?: string;
  description?: string | null;
  deadline?: string | null;
  priority?: string;
  status?: string;
  progress?: number;
}

export function findGoal(id: number): Goal | null {
  return guardStore('findGoal', () => {
    const row = db.prepare<[number], Goal>('SELECT * FROM goals WHERE id = ?').get(id);
    return row || null;
  });
}

export function getGoal(id: number): Goal {
  const goal = findGoal(id);
  if (!goal) throw new NotFoundError(`Goal ${id} not found`);
  return goal;
}

export function createGoal(input: GoalInput): Goal {
  assertContent(input.title, 'title');
  const priority = input.priority ?? 'medium';
  assertGoalPriority(priority);
  if (input.deadline) assertDeadline(input.deadline);

  return guardStore('createGoal', () => {
    const now = new Date().toISOString();
    const result = db
      .prepare(
        `INSERT INTO goals (title, description, deadline, priority, status, progress, created_at, updated_at)
         VALUES (?, ?, ?, ?, 'active', 0, ?, ?)`,
      )
      .run(
        input.title.trim(),
        input.description ?? null,
        input.deadline ?? null,
        priority,
        now,
        now,
      );
    return getGoal(Number(result.lastInsertRowid));
  });
}

export function updateGoal(id: number, patch: GoalPatch): Goal {
  if (patch.progress !== undefined) assertProgress(patch.progress);
  if (patch.status !== undefined) assertGoalStatus(patch.status);
  if (patch.priority !== undefined) assertGoalPriority(patch.priority);
  if (patch.deadline) assertDeadline(patch.deadline);
  if (patch.title !== undefined) assertContent(patch.title, 'title');

  return guardStore('updateGoal', () =>
    db.transaction(() => {
      const existing = getGoal(id);
      const now = new Date().toISOString();
      db.prepare(
        `UPDATE goals SET
          title = ?, description = ?, deadline = ?, priority = ?,
          status = ?, progress = ?, updated_at = ?
        WHERE id = ?`,
      ).run(
        patch.title?.trim() ?? existing.title,
        patch.description !== undefined ? patch.description : existing.description,
        patch.deadline !== undefined ? patch.deadline : existing.deadline,
        patch.priority ?? existing.priority,
        patch.status ?? existing.status,
        patch.progress ?? existing.progress,
        now,
        id,
      );
      return getGoal(id);
    })(),
  );
}

export function listGoals(status: GoalStatus | 'all' = 'active'): Goal[] {
  return guardStore('listGoals', () => {
    if (status === 'all') {
      return db
        .prepare<[], Goal>('SELECT * FROM goals ORDER BY created_at ASC, id ASC')
        .all();
    }
    return db
      .prepare<[string], Goal>(
        'SELECT * FROM goals WHERE status = ? ORDER BY created_at ASC, id ASC',
      )
      .all(status);
  });
}

export function findActiveGoalByTitle(title: string): Goal | null {
  return guardStore('findActiveGoalByTitle', () => {
    const row = db
      .prepare<[string], Goal>(
        "SELECT * FROM goals WHERE status = 'active' AND lower(title) = lower(?) LIMIT 1",
      )
      .get(title.trim());
    return row || null;
  });
}

// ==================== Stats & lifecycle ====================

export interface MemoryStats {
  memory_count: number;
  archived_memory_count: number;
  profile_count: number;
  goal_count: number;
  active_goals: number;
}

export function getMemoryStats(): MemoryStats {
  return guardStore('getMemoryStats', () => {
    const count = (sql: string): number =>
      db.prepare<[], { n: number }>(sql).get()?.n ?? 0;
    return {
      memory_count: count('SELECT COUNT(*) AS n FROM memories WHERE archived_at IS NULL'),
      archived_memory_count: count(
        'SELECT COUNT(*) AS n FROM memories WHERE archived_at IS NOT NULL',
      ),
      profile_count: count('SELECT COUNT(*) AS n FROM user_profile'),
      goal_count: count('SELECT COUNT(*) AS n FROM goals'),
      active_goals: count("SELECT COUNT(*) AS n FROM goals WHERE status = 'active'"),
    };
  });
}

export function checkpointWal(): void {
  db.pragma('wal_checkpoint(TRUNCATE)');
}

export function closeMemoryDatabase(): void {
  if (db && db.open) {
    checkpointWal();
    db.close();
  }
  fuzzyHaystack = [];
  fuzzyIds = [];
  fuzzyCategories = [];
}
