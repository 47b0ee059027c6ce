import { CronExpressionParser } from 'cron-parser';

import {
  CONSOLIDATION_CRON,
  CONSOLIDATION_POLL_INTERVAL,
  CONSOLIDATION_TURN_THRESHOLD,
  TIMEZONE,
} from './config.js';
import { countSessionsClosedSince, countTurnsSince } from './db.js';
import { logger } from './logger.js';
import { runConsolidation, type ConsolidationReport } from './memory/consolidation.js';
import type { TextCompletion } from './memory/inference.js';

export interface SchedulerState {
  now: Date;
  /** Last pass start, or scheduler start when no pass has run yet. */
  since: Date;
  lastRunAt: Date | null;
  turnsSinceLastRun: number;
  sessionsClosedSinceLastRun: number;
}

export interface ConsolidationTrigger {
  name: string;
  shouldRun(state: SchedulerState): boolean;
}

/** Fires when a cron occurrence falls between the last pass and now. */
export function cronTrigger(
  expression: string = CONSOLIDATION_CRON,
  tz: string = TIMEZONE,
): ConsolidationTrigger {
  // Fail fast on a bad expression
  CronExpressionParser.parse(expression, { tz });
  return {
    name: 'cron',
    shouldRun(state) {
      const interval = CronExpressionParser.parse(expression, {
        currentDate: state.since,
        tz,
      });
      return interval.next().toDate().getTime() <= state.now.getTime();
    },
  };
}

export function turnCountTrigger(
  threshold: number = CONSOLIDATION_TURN_THRESHOLD,
): ConsolidationTrigger {
  return {
    name: 'turn-count',
    shouldRun: (state) => state.turnsSinceLastRun >= threshold,
  };
}

export function sessionCloseTrigger(): ConsolidationTrigger {
  return {
    name: 'session-close',
    shouldRun: (state) => state.sessionsClosedSinceLastRun > 0,
  };
}

export function defaultTriggers(): ConsolidationTrigger[] {
  return [cronTrigger(), turnCountTrigger(), sessionCloseTrigger()];
}

let textCompletion: TextCompletion | null = null;
let triggers: ConsolidationTrigger[] = [];
let startedAt = new Date();
let lastRunAt: Date | null = null;
let inFlight: Promise<ConsolidationReport> | null = null;
let timer: ReturnType<typeof setTimeout> | null = null;

export function getSchedulerState(now: Date = new Date()): SchedulerState {
  const lastRunIso = lastRunAt ? lastRunAt.toISOString() : null;
  return {
    now,
    since: lastRunAt ?? startedAt,
    lastRunAt,
    turnsSinceLastRun: countTurnsSince(lastRunIso),
    sessionsClosedSinceLastRun: countSessionsClosedSince(lastRunIso),
  };
}

/** Names of the triggers that currently ask for a pass. */
export function firedTriggers(
  now: Date = new Date(),
  candidates: ConsolidationTrigger[] = triggers,
): string[] {
  const state = getSchedulerState(now);
  return candidates.filter((t) => t.shouldRun(state)).map((t) => t.name);
}

/**
 * Run a pass immediately. A pass already in flight is joined, never doubled.
 */
export function runConsolidationNow(completion?: TextCompletion): Promise<ConsolidationReport> {
  if (inFlight) return inFlight;
  const capability = completion ?? textCompletion;
  if (!capability) {
    return Promise.reject(new Error('Consolidation scheduler has no text completion configured'));
  }

  lastRunAt = new Date();
  const pass = runConsolidation({ textCompletion: capability }).finally(() => {
    inFlight = null;
  });
  inFlight = pass;
  return pass;
}

export function startConsolidationScheduler(options: {
  textCompletion: TextCompletion;
  triggers?: ConsolidationTrigger[];
  pollInterval?: number;
}): void {
  if (timer) {
    logger.debug('Consolidation scheduler already running, skipping duplicate start');
    return;
  }
  textCompletion = options.textCompletion;
  triggers = options.triggers ?? defaultTriggers();
  startedAt = new Date();
  const pollInterval = options.pollInterval ?? CONSOLIDATION_POLL_INTERVAL;
  logger.info({ triggers: triggers.map((t) => t.name) }, 'Consolidation scheduler started');

  const loop = async () => {
    try {
      const fired = firedTriggers();
      if (fired.length > 0 && !inFlight) {
        logger.info({ triggers: fired }, 'Consolidation triggered');
        await runConsolidationNow();
      }
    } catch (err) {
      logger.error({ err }, 'Error in consolidation loop');
    }
    if (timer) timer = setTimeout(tick, pollInterval);
  };
  const tick = () => {
    loop().catch((err) => logger.error({ err }, 'Consolidation loop crashed'));
  };

  timer = setTimeout(tick, pollInterval);
}

/** Stop polling. Resolves once a pass still in flight has finished. */
export async function stopConsolidationScheduler(): Promise<void> {
  if (timer) clearTimeout(timer);
  timer = null;
  textCompletion = null;
  triggers = [];
  const pass = inFlight;
  if (pass) {
    logger.info('Waiting for the running consolidation pass');
    await pass.catch((err) => logger.error({ err }, 'Consolidation pass failed during shutdown'));
  }
  lastRunAt = null;
}
