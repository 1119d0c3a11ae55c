/**
 * Session groups the team builds of one browser user.
 * Its id doubles as the agent's conversation session id.
 */
export interface Session {
  id: string;
  createdAt: string;
}

export interface AppConfig {
  title: string;
  icon: string;
}
