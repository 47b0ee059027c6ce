import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { CONVERSATION_DB_PATH } from './config.js';
import {
  ConstraintViolationError,
  NotFoundError,
  guardStore,
} from './memory/errors.js';
import type { ConversationTurn, Session, TurnRole } from './memory/types.js';

let db: Database.Database;

export function initDatabase(dbPath: string = CONVERSATION_DB_PATH): void {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      conversation_id TEXT NOT NULL,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      summary TEXT,
      window_start_turn_id INTEGER
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_conversation ON sessions(conversation_id);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_one_open
      ON sessions(conversation_id) WHERE ended_at IS NULL;

    CREATE TABLE IF NOT EXISTS conversation_turns (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id INTEGER NOT NULL,
      role TEXT NOT NULL CHECK(role IN ('user','assistant')),
      content TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      archived_at TEXT,
      FOREIGN KEY (session_id) REFERENCES sessions(id)
    );
    CREATE INDEX IF NOT EXISTS idx_turns_session ON conversation_turns(session_id, id);
    CREATE INDEX IF NOT EXISTS idx_turns_timestamp ON conversation_turns(timestamp);
  `);
}

export function closeDatabase(): void {
  if (db && db.open) db.close();
}

// --- Sessions ---

export function getSession(sessionId: number): Session {
  return guardStore('getSession', () => {
    const row = db
      .prepare<[number], Session>('SELECT * FROM sessions WHERE id = ?')
      .get(sessionId);
    if (!row) throw new NotFoundError(`Session ${sessionId} not found`);
    return row;
  });
}

export function getOpenSession(conversationId: string): Session | null {
  return guardStore('getOpenSession', () => {
    const row = db
      .prepare<[string], Session>(
        'SELECT * FROM sessions WHERE conversation_id = ? AND ended_at IS NULL',
      )
      .get(conversationId);
    return row || null;
  });
}

/** Returns the conversation's open session, starting one if none is open. */
export function openSession(conversationId: string): Session {
  return guardStore('openSession', () =>
    db.transaction(() => {
      const existing = getOpenSession(conversationId);
      if (existing) return existing;
      const result = db
        .prepare('INSERT INTO sessions (conversation_id, started_at) VALUES (?, ?)')
        .run(conversationId, new Date().toISOString());
      return getSession(Number(result.lastInsertRowid));
    })(),
  );
}

export function closeSession(sessionId: number, summary?: string): Session {
  return guardStore('closeSession', () =>
    db.transaction(() => {
      const session = getSession(sessionId);
      if (session.ended_at) return session;
      db.prepare(
        'UPDATE sessions SET ended_at = ?, summary = COALESCE(?, summary) WHERE id = ?',
      ).run(new Date().toISOString(), summary ?? null, sessionId);
      return getSession(sessionId);
    })(),
  );
}

export function setSessionSummary(sessionId: number, summary: string): Session {
  if (summary.trim().length === 0) {
    throw new ConstraintViolationError('summary must not be empty');
  }
  return guardStore('setSessionSummary', () => {
    const result = db
      .prepare('UPDATE sessions SET summary = ? WHERE id = ?')
      .run(summary.trim(), sessionId);
    if (result.changes === 0) throw new NotFoundError(`Session ${sessionId} not found`);
    return getSession(sessionId);
  });
}

/** Closed sessions that have turns but no summary yet. */
export function listConsolidationCandidates(): Session[] {
  return guardStore('listConsolidationCandidates', () =>
    db
      .prepare<[], Session>(
        `SELECT s.* FROM sessions s
         WHERE s.ended_at IS NOT NULL AND s.summary IS NULL
           AND EXISTS (SELECT 1 FROM conversation_turns t WHERE t.session_id = s.id)
         ORDER BY s.ended_at ASC, s.id ASC`,
      )
      .all(),
  );
}

export function listSummarizedSessions(): Session[] {
  return guardStore('listSummarizedSessions', () =>
    db
      .prepare<[], Session>(
        `SELECT * FROM sessions
         WHERE ended_at IS NOT NULL AND summary IS NOT NULL
         ORDER BY id ASC`,
      )
      .all(),
  );
}

export function listRecentSummaries(limit: number): Session[] {
  return guardStore('listRecentSummaries', () =>
    db
      .prepare<[number], Session>(
        `SELECT * FROM sessions WHERE summary IS NOT NULL
         ORDER BY ended_at DESC, id DESC LIMIT ?`,
      )
      .all(limit),
  );
}

export function countSessionsClosedSince(since: string | null): number {
  return guardStore('countSessionsClosedSince', () => {
    const row = db
      .prepare<[string], { n: number }>(
        'SELECT COUNT(*) AS n FROM sessions WHERE ended_at IS NOT NULL AND ended_at > ?',
      )
      .get(since ?? '');
    return row?.n ?? 0;
  });
}

// --- Turns ---

export function appendTurn(sessionId: number, role: TurnRole, content: string): ConversationTurn {
  return guardStore('appendTurn', () =>
    db.transaction(() => {
      const session = getSession(sessionId);
      if (session.ended_at) {
        throw new ConstraintViolationError(`Session ${sessionId} is closed`);
      }
      const result = db
        .prepare(
          'INSERT INTO conversation_turns (session_id, role, content, timestamp) VALUES (?, ?, ?, ?)',
        )
        .run(sessionId, role, content, new Date().toISOString());
      const turn = db
        .prepare<[number], ConversationTurn>('SELECT * FROM conversation_turns WHERE id = ?')
        .get(Number(result.lastInsertRowid));
      if (!turn) throw new NotFoundError('Inserted turn not found');
      return turn;
    })(),
  );
}

export function getSessionTurns(
  sessionId: number,
  options?: { includeArchived?: boolean },
): ConversationTurn[] {
  const archived = options?.includeArchived ? '' : 'AND archived_at IS NULL';
  return guardStore('getSessionTurns', () =>
    db
      .prepare<[number], ConversationTurn>(
        `SELECT * FROM conversation_turns WHERE session_id = ? ${archived} ORDER BY id ASC`,
      )
      .all(sessionId),
  );
}

/** Turns at or after the session's window pointer. */
export function getWindowTurns(sessionId: number): ConversationTurn[] {
  return guardStore('getWindowTurns', () =>
    db
      .prepare<[number], ConversationTurn>(
        `SELECT t.* FROM conversation_turns t
         JOIN sessions s ON s.id = t.session_id
         WHERE t.session_id = ? AND t.archived_at IS NULL
           AND t.id >= COALESCE(s.window_start_turn_id, 0)
         ORDER BY t.id ASC`,
      )
      .all(sessionId),
  );
}

/** Moves the window pointer forward; never backward. */
export function advanceWindow(sessionId: number, fromTurnId: number): Session {
  return guardStore('advanceWindow', () => {
    const result = db
      .prepare(
        `UPDATE sessions
         SET window_start_turn_id = MAX(COALESCE(window_start_turn_id, 0), ?)
         WHERE id = ?`,
      )
      .run(fromTurnId, sessionId);
    if (result.changes === 0) throw new NotFoundError(`Session ${sessionId} not found`);
    return getSession(sessionId);
  });
}

/**
 * Archive turns older than `before`. Only closed sessions that already carry a
 * summary qualify; otherwise nothing is touched.
 */
export function archiveTurnsBefore(sessionId: number, before: string): number {
  return guardStore('archiveTurnsBefore', () => {
    const result = db
      .prepare(
        `UPDATE conversation_turns SET archived_at = ?
         WHERE session_id = ? AND timestamp < ? AND archived_at IS NULL
           AND EXISTS (
             SELECT 1 FROM sessions s
             WHERE s.id = conversation_turns.session_id
               AND s.summary IS NOT NULL AND s.ended_at IS NOT NULL
           )`,
      )
      .run(new Date().toISOString(), sessionId, before);
    return result.changes;
  });
}

export function countTurnsSince(since: string | null): number {
  return guardStore('countTurnsSince', () => {
    const row = db
      .prepare<[string], { n: number }>(
        'SELECT COUNT(*) AS n FROM conversation_turns WHERE timestamp > ?',
      )
      .get(since ?? '');
    return row?.n ?? 0;
  });
}
