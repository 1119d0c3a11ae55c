import type { AppConfig, Session } from '@team-builder/shared';

export interface SessionStart {
  session: Session | null;
  config: AppConfig;
}

/**
 * Restore (or create) the session and load the UI config. The two requests
 * settle independently: a failed config keeps the fallback, a failed session
 * leaves `session` null.
 */
export async function startSession(
  restore: () => Promise<Session>,
  loadConfig: () => Promise<AppConfig>,
  fallbackConfig: AppConfig
): Promise<SessionStart> {
  const [restored, appConfig] = await Promise.allSettled([restore(), loadConfig()]);

  if (restored.status === 'rejected') {
    console.error('Failed to start session:', restored.reason);
  }
  if (appConfig.status === 'rejected') {
    console.error('Failed to load app config, using defaults:', appConfig.reason);
  }

  return {
    session: restored.status === 'fulfilled' ? restored.value : null,
    config: appConfig.status === 'fulfilled' ? appConfig.value : fallbackConfig,
  };
}
