import type { Session } from '@team-builder/shared';
import { API_BASE } from './config';

export async function createSession(): Promise<Session> {
  const response = await fetch(`${API_BASE}/sessions`, { method: 'POST' });
  if (!response.ok) {
    throw new Error('Failed to create session');
  }
  return response.json();
}

export async function fetchSession(id: string): Promise<Session | null> {
  const response = await fetch(`${API_BASE}/sessions/${id}`);

  if (response.status === 404) {
    return null;
  }

  if (!response.ok) {
    throw new Error('Failed to fetch session');
  }

  return response.json();
}

export async function resetSession(id: string): Promise<Session> {
  const response = await fetch(`${API_BASE}/sessions/${id}/reset`, { method: 'POST' });
  if (!response.ok) {
    throw new Error('Failed to reset session');
  }
  return response.json();
}
