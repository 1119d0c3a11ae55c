import type { AppConfig } from '@team-builder/shared';

// API configuration
// In development, Vite proxies /api to the backend server
// In production, the backend serves the UI, so the relative path still works

export const API_BASE = import.meta.env.VITE_API_URL || '/api';

export async function fetchAppConfig(): Promise<AppConfig> {
  const response = await fetch(`${API_BASE}/config`);
  if (!response.ok) {
    throw new Error('Failed to fetch app config');
  }
  return response.json();
}
