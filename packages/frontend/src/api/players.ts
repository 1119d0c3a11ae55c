import type { Player } from '@team-builder/shared';
import { API_BASE } from './config';

export async function fetchPlayers(): Promise<Player[]> {
  const response = await fetch(`${API_BASE}/players`);
  if (!response.ok) {
    throw new Error('Failed to fetch players');
  }
  return response.json();
}

// The server validates each entry and rejects the batch on the first bad one
export async function importPlayers(inputs: unknown[]): Promise<Player[]> {
  const response = await fetch(`${API_BASE}/players`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(inputs),
  });
  if (!response.ok) {
    const body = await response.json().catch(() => null);
    throw new Error(body?.error ?? 'Failed to import players');
  }
  return response.json();
}

export async function deletePlayer(id: number): Promise<void> {
  const response = await fetch(`${API_BASE}/players/${id}`, {
    method: 'DELETE',
  });
  if (!response.ok) {
    throw new Error('Failed to delete player');
  }
}
