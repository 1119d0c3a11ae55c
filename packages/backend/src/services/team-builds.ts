import type {
  AgentCitation,
  AgentTrace,
  BuildTeamResult,
  TeamBuild,
  TeamBuildError,
} from '@team-builder/shared';
import type { DB } from '../db.js';
import { generateId } from '../utils/id.js';

interface TeamBuildRow {
  id: string;
  session_id: string;
  team_type: string;
  additional_constraints: string | null;
  success: number;
  player_count: number;
  team_composition: string;
  errors: string | null;
  trace: string | null;
  citations: string | null;
  created_at: string;
}

function parseJson<T>(value: string | null, fallback: T): T {
  if (!value) return fallback;
  try {
    return JSON.parse(value);
  } catch (error) {
    console.error('[team-builds] Stored JSON could not be parsed:', error);
    return fallback;
  }
}

function rowToTeamBuild(row: TeamBuildRow): TeamBuild {
  return {
    id: row.id,
    sessionId: row.session_id,
    teamType: row.team_type,
    additionalConstraints: row.additional_constraints || undefined,
    success: row.success === 1,
    playerCount: row.player_count,
    teamComposition: row.team_composition,
    errors: parseJson<TeamBuildError[]>(row.errors, []),
    trace: parseJson<AgentTrace>(row.trace, {}),
    citations: parseJson<AgentCitation[]>(row.citations, []),
    createdAt: row.created_at,
  };
}

export function saveTeamBuild(
  db: DB,
  sessionId: string,
  additionalConstraints: string | undefined,
  result: BuildTeamResult
): TeamBuild {
  const id = generateId();
  const now = new Date().toISOString();

  db.prepare(
    `INSERT INTO team_builds (
      id, session_id, team_type, additional_constraints, success, player_count,
      team_composition, errors, trace, citations, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    id,
    sessionId,
    result.teamType,
    additionalConstraints || null,
    result.success ? 1 : 0,
    result.playerCount,
    result.teamComposition,
    result.errors.length > 0 ? JSON.stringify(result.errors) : null,
    Object.keys(result.trace).length > 0 ? JSON.stringify(result.trace) : null,
    result.citations.length > 0 ? JSON.stringify(result.citations) : null,
    now
  );

  const build = getTeamBuildById(db, id);
  if (!build) {
    throw new Error('Failed to save team build');
  }

  return build;
}

export function getTeamBuildById(db: DB, id: string): TeamBuild | null {
  const row = db.prepare<[string], TeamBuildRow>('SELECT * FROM team_builds WHERE id = ?').get(id);
  return row ? rowToTeamBuild(row) : null;
}

export function getLatestTeamBuild(db: DB, sessionId: string): TeamBuild | null {
  const row = db
    .prepare<[string], TeamBuildRow>(
      'SELECT * FROM team_builds WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT 1'
    )
    .get(sessionId);

  return row ? rowToTeamBuild(row) : null;
}

export function listTeamBuilds(db: DB, sessionId: string, limit: number = 10): TeamBuild[] {
  const rows = db
    .prepare<[string, number], TeamBuildRow>(
      'SELECT * FROM team_builds WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?'
    )
    .all(sessionId, limit);

  return rows.map(rowToTeamBuild);
}

export function deleteTeamBuild(db: DB, id: string): boolean {
  const result = db.prepare('DELETE FROM team_builds WHERE id = ?').run(id);
  return result.changes > 0;
}
