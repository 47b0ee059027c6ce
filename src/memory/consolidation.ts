import {
  DECAY_FACTOR,
  DECAY_MIN_IMPORTANCE,
  DECAY_PERIOD_DAYS,
  DECAY_WINDOW_DAYS,
  MERGE_SIMILARITY_THRESHOLD,
  TURN_RETENTION_DAYS,
} from '../config.js';
import {
  archiveTurnsBefore,
  getSessionTurns,
  listConsolidationCandidates,
  listSummarizedSessions,
  setSessionSummary,
} from '../db.js';
import { logger } from '../logger.js';
import { applyDecay, listMemories, mergeMemories } from './db.js';
import { ConsolidationError, errorMessage } from './errors.js';
import type { TextCompletion } from './inference.js';
import { memoryKey, memoryLocks, sessionKey } from './locks.js';
import { contentSimilarity } from './similarity.js';
import { SUMMARY_SYSTEM_PROMPT } from './system-prompt.js';
import { MEMORY_CATEGORIES, type MemoryRecord, type Session } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ConsolidationReport {
  summarized: number;
  summaryFailures: number;
  merged: number;
  decayed: number;
  archivedTurns: number;
  /** Units skipped because a lock was held; retried next run. */
  deferred: number;
}

export interface ConsolidationOptions {
  textCompletion: TextCompletion;
  now?: Date;
}

const log = logger.child({ component: 'consolidation' });

// ==================== a. Session summaries ====================

async function summarizeSession(session: Session, textCompletion: TextCompletion): Promise<string> {
  const turns = getSessionTurns(session.id, { includeArchived: true });
  const transcript = turns.map((t) => `${t.role}: ${t.content}`).join('\n');
  const prompt = `Session started ${session.started_at}, ended ${session.ended_at}.

<transcript>
${transcript}
</transcript>`;

  let summary: string;
  try {
    summary = (await textCompletion.complete(prompt, { systemPrompt: SUMMARY_SYSTEM_PROMPT })).trim();
  } catch (err) {
    throw new ConsolidationError(`Summary request failed for session ${session.id}`, {
      cause: err,
    });
  }
  if (!summary) {
    throw new ConsolidationError(`Empty summary for session ${session.id}`);
  }
  setSessionSummary(session.id, summary);
  return summary;
}

async function summarizeClosedSessions(
  textCompletion: TextCompletion,
  report: ConsolidationReport,
): Promise<void> {
  for (const session of listConsolidationCandidates()) {
    try {
      const outcome = await memoryLocks.tryRun(sessionKey(session.id), () =>
        summarizeSession(session, textCompletion),
      );
      if (outcome.acquired) {
        report.summarized++;
      } else {
        report.deferred++;
      }
    } catch (err) {
      report.summaryFailures++;
      log.warn({ sessionId: session.id, err: errorMessage(err) }, 'Session summary deferred');
    }
  }
}

// ==================== b. Merge near-duplicates ====================

/** Longer content survives; on equal length the older record does. */
export function pickSurvivor(a: MemoryRecord, b: MemoryRecord): [MemoryRecord, MemoryRecord] {
  if (a.content.length !== b.content.length) {
    return a.content.length > b.content.length ? [a, b] : [b, a];
  }
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? [a, b] : [b, a];
  }
  return a.id < b.id ? [a, b] : [b, a];
}

async function mergeDuplicates(report: ConsolidationReport): Promise<void> {
  for (const category of MEMORY_CATEGORIES) {
    const records = listMemories({ category }).sort((a, b) => a.id - b.id);
    const absorbed = new Set<number>();

    for (let i = 0; i < records.length; i++) {
      for (let j = i + 1; j < records.length; j++) {
        const a = records[i];
        const b = records[j];
        if (absorbed.has(a.id)) break;
        if (absorbed.has(b.id)) continue;
        if (contentSimilarity(a.content, b.content) < MERGE_SIMILARITY_THRESHOLD) continue;

        const [survivor, loser] = pickSurvivor(a, b);
        try {
          const outcome = await memoryLocks.tryRunAll(
            [memoryKey(survivor.id), memoryKey(loser.id)],
            () => mergeMemories(survivor.id, loser.id),
          );
          if (!outcome.acquired) {
            report.deferred++;
            continue;
          }
          absorbed.add(loser.id);
          report.merged++;
          log.info({ survivorId: survivor.id, absorbedId: loser.id, category }, 'Memories merged');
        } catch (err) {
          report.deferred++;
          log.warn(
            { survivorId: survivor.id, absorbedId: loser.id, err: errorMessage(err) },
            'Memory merge deferred',
          );
        }
      }
    }
  }
}

// ==================== c. Importance decay ====================

export interface DecayStep {
  importance: number;
  decayedAt: string;
}

/**
 * Decay owed by a record at `now`, or null when nothing applies. Periods are
 * counted from the later of the last touch and the previous decay, so a rerun
 * never applies the same period twice.
 */
export function computeDecay(record: MemoryRecord, now: Date): DecayStep | null {
  const lastTouch = Date.parse(record.last_accessed_at ?? record.created_at);
  if (now.getTime() - lastTouch <= DECAY_WINDOW_DAYS * DAY_MS) return null;
  if (record.importance <= DECAY_MIN_IMPORTANCE) return null;

  const reference = Math.max(
    lastTouch,
    record.decayed_at ? Date.parse(record.decayed_at) : lastTouch,
  );
  const periodMs = DECAY_PERIOD_DAYS * DAY_MS;
  const periods = Math.floor((now.getTime() - reference) / periodMs);
  if (periods <= 0) return null;

  return {
    importance: Math.max(DECAY_MIN_IMPORTANCE, record.importance * Math.pow(DECAY_FACTOR, periods)),
    decayedAt: new Date(reference + periods * periodMs).toISOString(),
  };
}

async function decayStaleMemories(now: Date, report: ConsolidationReport): Promise<void> {
  for (const record of listMemories()) {
    const step = computeDecay(record, now);
    if (!step) continue;
    try {
      const outcome = await memoryLocks.tryRun(memoryKey(record.id), () =>
        applyDecay(record.id, step.importance, step.decayedAt),
      );
      if (outcome.acquired) {
        report.decayed++;
      } else {
        report.deferred++;
      }
    } catch (err) {
      report.deferred++;
      log.warn({ memoryId: record.id, err: errorMessage(err) }, 'Memory decay deferred');
    }
  }
}

// ==================== d. Turn archival ====================

async function archiveOldTurns(now: Date, report: ConsolidationReport): Promise<void> {
  const cutoff = new Date(now.getTime() - TURN_RETENTION_DAYS * DAY_MS).toISOString();
  for (const session of listSummarizedSessions()) {
    try {
      const outcome = await memoryLocks.tryRun(sessionKey(session.id), () =>
        archiveTurnsBefore(session.id, cutoff),
      );
      if (outcome.acquired) {
        report.archivedTurns += outcome.value;
      } else {
        report.deferred++;
      }
    } catch (err) {
      report.deferred++;
      log.warn({ sessionId: session.id, err: errorMessage(err) }, 'Turn archival deferred');
    }
  }
}

/**
 * One consolidation pass: summaries, merges, decay, archival, in that order.
 * Busy or failing units are skipped and picked up by the next pass.
 */
export async function runConsolidation(options: ConsolidationOptions): Promise<ConsolidationReport> {
  const now = options.now ?? new Date();
  const t0 = Date.now();
  const report: ConsolidationReport = {
    summarized: 0,
    summaryFailures: 0,
    merged: 0,
    decayed: 0,
    archivedTurns: 0,
    deferred: 0,
  };

  await summarizeClosedSessions(options.textCompletion, report);
  await mergeDuplicates(report);
  await decayStaleMemories(now, report);
  await archiveOldTurns(now, report);

  log.info({ ...report, ms: Date.now() - t0 }, 'Consolidation complete');
  return report;
}
