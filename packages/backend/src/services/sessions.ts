import type { Session } from '@team-builder/shared';
import type { DB } from '../db.js';
import { generateId } from '../utils/id.js';

interface SessionRow {
  id: string;
  created_at: string;
}

function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    createdAt: row.created_at,
  };
}

export function createSession(db: DB): Session {
  const id = generateId();
  const now = new Date().toISOString();

  db.prepare('INSERT INTO sessions (id, created_at) VALUES (?, ?)').run(id, now);

  const session = getSessionById(db, id);
  if (!session) {
    throw new Error('Failed to create session');
  }

  return session;
}

export function getSessionById(db: DB, id: string): Session | null {
  const row = db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
  return row ? rowToSession(row) : null;
}

/**
 * Replace a session with a fresh one. The old session and its builds are kept;
 * the new id also starts a new conversation with the agent.
 */
export function resetSession(db: DB, id: string): Session | null {
  if (!getSessionById(db, id)) {
    return null;
  }
  return createSession(db);
}

export function deleteSession(db: DB, id: string): boolean {
  const result = db.prepare('DELETE FROM sessions WHERE id = ?').run(id);
  return result.changes > 0;
}
