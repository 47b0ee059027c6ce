import { DEDUP_SIMILARITY_THRESHOLD } from '../config.js';
import { logger } from '../logger.js';
import {
  assertCategory,
  assertContent,
  assertImportance,
  createMemory,
  listMemories,
  updateMemoryImportance,
} from './db.js';
import { memoryKey, memoryLocks } from './locks.js';
import { levenshteinRatio, normalizeContent } from './similarity.js';
import type { MemoryRecord } from './types.js';

export interface CommitResult {
  record: MemoryRecord;
  /** True when the content matched an existing record instead of creating one. */
  merged: boolean;
}

const COMMIT_KEY = 'memory:commit';

// Near-identical phrasing only. Richer variants ("likes coffee in the
// morning") are kept and folded in later by consolidation.
function findDuplicate(content: string, candidates: MemoryRecord[]): MemoryRecord | null {
  const normalized = normalizeContent(content);
  let best: MemoryRecord | null = null;
  let bestScore = 0;
  for (const candidate of candidates) {
    const score = levenshteinRatio(normalized, normalizeContent(candidate.content));
    if (score >= DEDUP_SIMILARITY_THRESHOLD && score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Store a memory unless a near-duplicate already exists in the same category,
 * in which case that record is reinforced: importance = max(old, new).
 * Commits are serialised so two identical writes can't both insert.
 */
export async function commitMemory(input: {
  content: string;
  category: string;
  importance: number;
}): Promise<CommitResult> {
  assertContent(input.content, 'content');
  assertCategory(input.category);
  assertImportance(input.importance);
  const category = input.category;

  return memoryLocks.run(COMMIT_KEY, async () => {
    const duplicate = findDuplicate(input.content, listMemories({ category }));
    if (!duplicate) {
      const record = createMemory({ content: input.content, category, importance: input.importance });
      logger.debug({ memoryId: record.id, category }, 'Memory created');
      return { record, merged: false };
    }

    const record = await memoryLocks.run(memoryKey(duplicate.id), () =>
      updateMemoryImportance(duplicate.id, Math.max(duplicate.importance, input.importance)),
    );
    logger.debug({ memoryId: record.id, category }, 'Duplicate memory reinforced');
    return { record, merged: true };
  });
}
