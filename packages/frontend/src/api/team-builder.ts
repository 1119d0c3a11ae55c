import type { BuildTeamRequest, BuildTeamResult, TeamBuild, TeamTypeInfo } from '@team-builder/shared';
import { API_BASE } from './config';

export async function fetchTeamTypes(): Promise<TeamTypeInfo[]> {
  const response = await fetch(`${API_BASE}/team-builder/types`);
  if (!response.ok) {
    throw new Error('Failed to fetch team types');
  }
  return response.json();
}

export async function buildTeam(request: BuildTeamRequest): Promise<BuildTeamResult> {
  const response = await fetch(`${API_BASE}/team-builder/build`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(request),
  });

  if (!response.ok) {
    throw new Error('Failed to build team');
  }

  return response.json();
}

export async function fetchTeamBuilds(sessionId: string, limit: number = 20): Promise<TeamBuild[]> {
  const response = await fetch(`${API_BASE}/team-builder/builds/${sessionId}?limit=${limit}`);

  if (!response.ok) {
    throw new Error('Failed to fetch team builds');
  }

  return response.json();
}

export async function deleteTeamBuild(id: string): Promise<void> {
  const response = await fetch(`${API_BASE}/team-builder/build/${id}`, {
    method: 'DELETE',
  });
  if (!response.ok) {
    throw new Error('Failed to delete team build');
  }
}
