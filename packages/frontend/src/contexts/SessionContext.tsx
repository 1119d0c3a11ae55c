import { createContext, useContext, useState, useEffect, type ReactNode } from 'react';
import type { AppConfig, BuildTeamResult, Session } from '@team-builder/shared';
import { createSession, fetchSession, resetSession } from '../api/sessions';
import { fetchAppConfig } from '../api/config';
import { startSession } from './session-start';

const SESSION_STORAGE_KEY = 'team-builder.sessionId';

const DEFAULT_CONFIG: AppConfig = { title: 'VALORANT Team Builder', icon: '🎮' };

interface SessionContextType {
  session: Session | null;
  config: AppConfig;
  loading: boolean;
  lastResult: BuildTeamResult | null;
  setLastResult: (result: BuildTeamResult | null) => void;
  reset: () => Promise<void>;
}

const SessionContext = createContext<SessionContextType | undefined>(undefined);

async function restoreSession(): Promise<Session> {
  const storedId = window.localStorage.getItem(SESSION_STORAGE_KEY);
  if (storedId) {
    const existing = await fetchSession(storedId);
    if (existing) {
      return existing;
    }
  }
  return createSession();
}

export function SessionProvider({ children }: { children: ReactNode }) {
  const [session, setSession] = useState<Session | null>(null);
  const [config, setConfig] = useState<AppConfig>(DEFAULT_CONFIG);
  const [loading, setLoading] = useState(true);
  const [lastResult, setLastResult] = useState<BuildTeamResult | null>(null);

  const applySession = (next: Session) => {
    window.localStorage.setItem(SESSION_STORAGE_KEY, next.id);
    setSession(next);
  };

  useEffect(() => {
    const load = async () => {
      setLoading(true);
      const started = await startSession(restoreSession, fetchAppConfig, DEFAULT_CONFIG);
      if (started.session) {
        applySession(started.session);
      }
      setConfig(started.config);
      document.title = started.config.title;
      setLoading(false);
    };
    void load();
  }, []);

  const reset = async () => {
    try {
      const next = session ? await resetSession(session.id) : await createSession();
      applySession(next);
      setLastResult(null);
    } catch (error) {
      console.error('Failed to reset session:', error);
    }
  };

  return (
    <SessionContext.Provider value={{ session, config, loading, lastResult, setLastResult, reset }}>
      {children}
    </SessionContext.Provider>
  );
}

export function useSession() {
  const context = useContext(SessionContext);
  if (context === undefined) {
    throw new Error('useSession must be used within a SessionProvider');
  }
  return context;
}
