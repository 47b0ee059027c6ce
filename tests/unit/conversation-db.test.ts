import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  advanceWindow,
  appendTurn,
  archiveTurnsBefore,
  closeDatabase,
  closeSession,
  countSessionsClosedSince,
  countTurnsSince,
  getOpenSession,
  getSession,
  getSessionTurns,
  getWindowTurns,
  initDatabase,
  listConsolidationCandidates,
  listRecentSummaries,
  openSession,
  setSessionSummary,
} from '../../src/db.js';
import { ConstraintViolationError, NotFoundError } from '../../src/memory/errors.js';

const FAR_FUTURE = '2100-01-01T00:00:00.000Z';

beforeEach(() => {
  initDatabase(':memory:');
});

afterEach(() => {
  closeDatabase();
});

describe('sessions', () => {
  it('keeps a single open session per conversation', () => {
    const first = openSession('conv-1');
    expect(openSession('conv-1').id).toBe(first.id);
    expect(getOpenSession('conv-1')?.id).toBe(first.id);

    closeSession(first.id);
    expect(getOpenSession('conv-1')).toBeNull();

    const second = openSession('conv-1');
    expect(second.id).not.toBe(first.id);
    expect(openSession('conv-2').id).not.toBe(second.id);
  });

  it('throws NotFound for a missing session', () => {
    expect(() => getSession(99)).toThrow(NotFoundError);
    expect(() => closeSession(99)).toThrow(NotFoundError);
  });

  it('closing twice keeps the first end time', () => {
    const session = openSession('conv-1');
    const closed = closeSession(session.id);
    expect(closeSession(session.id).ended_at).toBe(closed.ended_at);
  });

  it('lists closed sessions with turns and no summary as candidates', () => {
    const withTurns = openSession('conv-1');
    appendTurn(withTurns.id, 'user', 'hello');
    closeSession(withTurns.id);
    closeSession(openSession('conv-2').id);
    appendTurn(openSession('conv-3').id, 'user', 'still open');

    expect(listConsolidationCandidates().map((s) => s.id)).toEqual([withTurns.id]);

    setSessionSummary(withTurns.id, 'Said hello.');
    expect(listConsolidationCandidates()).toEqual([]);
    expect(listRecentSummaries(5).map((s) => s.summary)).toEqual(['Said hello.']);
  });

  it('rejects an empty summary', () => {
    const session = openSession('conv-1');
    expect(() => setSessionSummary(session.id, '  ')).toThrow(ConstraintViolationError);
  });

  it('counts closed sessions and turns since a point in time', () => {
    const session = openSession('conv-1');
    appendTurn(session.id, 'user', 'hello');
    appendTurn(session.id, 'assistant', 'hi');
    closeSession(session.id);

    expect(countTurnsSince(null)).toBe(2);
    expect(countSessionsClosedSince(null)).toBe(1);
    expect(countTurnsSince(FAR_FUTURE)).toBe(0);
    expect(countSessionsClosedSince(FAR_FUTURE)).toBe(0);
  });
});

describe('turns', () => {
  it('appends turns in order', () => {
    const session = openSession('conv-1');
    appendTurn(session.id, 'user', 'I work as a teacher in Osaka');
    appendTurn(session.id, 'assistant', 'Nice! How long have you been teaching?');

    expect(getSessionTurns(session.id).map((t) => [t.id, t.role])).toEqual([
      [1, 'user'],
      [2, 'assistant'],
    ]);
  });

  it('refuses to append to a closed session', () => {
    const session = openSession('conv-1');
    closeSession(session.id);
    expect(() => appendTurn(session.id, 'user', 'hello?')).toThrow(ConstraintViolationError);
  });

  it('refuses to append to a missing session', () => {
    expect(() => appendTurn(42, 'user', 'hello?')).toThrow(NotFoundError);
  });
});

describe('context window', () => {
  it('shows only turns at or after the pointer', () => {
    const session = openSession('conv-1');
    appendTurn(session.id, 'user', 'one');
    appendTurn(session.id, 'assistant', 'two');
    advanceWindow(session.id, 2);
    appendTurn(session.id, 'user', 'three');

    expect(getWindowTurns(session.id).map((t) => t.content)).toEqual(['two', 'three']);
    expect(getSessionTurns(session.id)).toHaveLength(3);
  });

  it('never moves the pointer backward', () => {
    const session = openSession('conv-1');
    advanceWindow(session.id, 5);
    expect(advanceWindow(session.id, 3).window_start_turn_id).toBe(5);
    expect(advanceWindow(session.id, 8).window_start_turn_id).toBe(8);
  });
});

describe('archiveTurnsBefore', () => {
  it('does nothing for a session without summary', () => {
    const session = openSession('conv-1');
    appendTurn(session.id, 'user', 'hello');
    closeSession(session.id);

    expect(archiveTurnsBefore(session.id, FAR_FUTURE)).toBe(0);
    expect(getSessionTurns(session.id)).toHaveLength(1);
  });

  it('does nothing for an open session even with a summary', () => {
    const session = openSession('conv-1');
    appendTurn(session.id, 'user', 'hello');
    setSessionSummary(session.id, 'Said hello.');

    expect(archiveTurnsBefore(session.id, FAR_FUTURE)).toBe(0);
  });

  it('archives turns of a closed, summarised session and keeps the rows', () => {
    const session = openSession('conv-1');
    appendTurn(session.id, 'user', 'hello');
    appendTurn(session.id, 'assistant', 'hi');
    closeSession(session.id, 'Greetings were exchanged.');

    expect(archiveTurnsBefore(session.id, FAR_FUTURE)).toBe(2);
    expect(getSessionTurns(session.id)).toEqual([]);
    expect(getSessionTurns(session.id, { includeArchived: true })).toHaveLength(2);
  });
});
