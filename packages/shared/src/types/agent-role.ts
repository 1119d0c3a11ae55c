export type AgentRole = 'Duelist' | 'Sentinel' | 'Controller' | 'Initiator';

/**
 * Agents grouped by role. An agent listed under more than one role
 * (Viper) resolves to the first role in this order.
 */
export const ROLE_CATEGORIES: Record<AgentRole, readonly string[]> = {
  Duelist: ['Jett', 'Phoenix', 'Reyna', 'Raze', 'Yoru', 'Neon'],
  Sentinel: ['Sage', 'Cypher', 'Killjoy', 'Viper'],
  Controller: ['Omen', 'Astra', 'Brimstone', 'Viper'],
  Initiator: ['Sova', 'Breach', 'Skye', 'KAY/O', 'Fade'],
};

export const AGENT_ROLES: readonly AgentRole[] = ['Duelist', 'Sentinel', 'Controller', 'Initiator'];

export function assignRole(agent: string): AgentRole | 'Undefined' {
  for (const role of AGENT_ROLES) {
    if (ROLE_CATEGORIES[role].includes(agent)) {
      return role;
    }
  }
  return 'Undefined';
}
