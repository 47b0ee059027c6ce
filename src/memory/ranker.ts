import fs from 'fs';
import { z } from 'zod';

import {
  RANK_RECENCY_HALF_LIFE_DAYS,
  RANK_WEIGHT_ACCESS,
  RANK_WEIGHT_IMPORTANCE,
  RANK_WEIGHT_RECENCY,
  SEARCH_DEFAULT_LIMIT,
} from '../config.js';
import { logger } from '../logger.js';
import { searchMemoryCandidates, touchMemory } from './db.js';
import { ConstraintViolationError, errorMessage } from './errors.js';
import { memoryKey, memoryLocks } from './locks.js';
import { normalizeContent, tokenize } from './similarity.js';
import type { MemoryCategory, MemoryRecord } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// --- Query expansion (concept groups) ---

const ExpansionFileSchema = z.object({
  groups: z.array(z.array(z.string().min(1))),
});

let expansionIndex: Map<string, string[]> | null = null;

function loadExpansions(): Map<string, string[]> {
  if (expansionIndex) return expansionIndex;
  // Same relative location from src/memory and dist/memory
  const file = new URL('../../data/query-expansions.json', import.meta.url);
  const parsed = ExpansionFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));

  const index = new Map<string, string[]>();
  for (const group of parsed.groups) {
    const words = group.map((w) => w.toLowerCase());
    for (const word of words) {
      const existing = index.get(word) ?? [];
      index.set(word, [...new Set([...existing, ...words])]);
    }
  }
  expansionIndex = index;
  return index;
}

/** Query words plus every word sharing a concept group with one of them. */
export function expandQuery(query: string): string[] {
  const index = loadExpansions();
  const terms = new Set<string>();
  for (const word of tokenize(query)) {
    terms.add(word);
    for (const related of index.get(word) ?? []) terms.add(related);
  }
  return [...terms];
}

// --- Scoring ---

export function boostScore(record: MemoryRecord, now: number = Date.now()): number {
  const lastTouch = Date.parse(record.last_accessed_at ?? record.created_at);
  const elapsedDays = Math.max(0, (now - lastTouch) / DAY_MS);
  const recency = Math.pow(0.5, elapsedDays / RANK_RECENCY_HALF_LIFE_DAYS);
  return (
    RANK_WEIGHT_IMPORTANCE * record.importance +
    RANK_WEIGHT_ACCESS * Math.log(1 + record.access_count) +
    RANK_WEIGHT_RECENCY * recency
  );
}

interface Scored {
  record: MemoryRecord;
  exact: boolean;
  score: number;
}

function compareScored(a: Scored, b: Scored): number {
  if (a.exact !== b.exact) return a.exact ? -1 : 1;
  if (b.score !== a.score) return b.score - a.score;
  if (a.record.created_at !== b.record.created_at) {
    return a.record.created_at < b.record.created_at ? 1 : -1;
  }
  return b.record.id - a.record.id;
}

// --- Access tracking ---

const pendingTouches = new Set<Promise<void>>();

function queueTouch(id: number): void {
  const pending: Promise<void> = memoryLocks
    .run(memoryKey(id), () => {
      touchMemory(id);
    })
    .catch((err) => {
      logger.warn({ memoryId: id, err: errorMessage(err) }, 'Deferred memory touch failed');
    })
    .finally(() => {
      pendingTouches.delete(pending);
    });
  pendingTouches.add(pending);
}

/**
 * Record a retrieval hit. Free records are touched immediately; a record held
 * by consolidation gets its touch queued behind the lock.
 */
function recordAccess(record: MemoryRecord): MemoryRecord {
  if (memoryLocks.isLocked(memoryKey(record.id))) {
    queueTouch(record.id);
    return record;
  }
  try {
    return touchMemory(record.id);
  } catch (err) {
    logger.warn({ memoryId: record.id, err: errorMessage(err) }, 'Memory touch failed');
    return record;
  }
}

/** Resolves once every queued touch has been applied. */
export async function flushPendingTouches(): Promise<void> {
  while (pendingTouches.size > 0) {
    await Promise.all([...pendingTouches]);
  }
}

// --- Search ---

export interface SearchOptions {
  category?: MemoryCategory;
  limit?: number;
}

/**
 * Ranked memory retrieval: text relevance plus an importance/access/recency
 * boost, exact content matches first.
 */
export function searchMemories(query: string, options: SearchOptions = {}): MemoryRecord[] {
  const limit = options.limit ?? SEARCH_DEFAULT_LIMIT;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConstraintViolationError(`limit must be a positive integer (got ${limit})`);
  }

  const candidates = searchMemoryCandidates(
    { terms: expandQuery(query), text: query },
    { category: options.category, limit },
  );

  const now = Date.now();
  const normalizedQuery = normalizeContent(query);
  const ranked = candidates
    .map(
      ({ record, textScore }): Scored => ({
        record,
        exact: normalizedQuery.length > 0 && normalizeContent(record.content) === normalizedQuery,
        score: textScore + boostScore(record, now),
      }),
    )
    .sort(compareScored)
    .slice(0, limit);

  logger.debug(
    { query, category: options.category, candidates: candidates.length, returned: ranked.length },
    'Memory search',
  );

  return ranked.map((r) => recordAccess(r.record));
}
