export const USER_ROLE = 'user';
export const AGENT_ROLE = 'agent';

export type Role = typeof USER_ROLE | typeof AGENT_ROLE;

/**
 * One line of an agent's conversation: who said it and what was said.
 */
export interface TurnRecord {
    role: Role;
    content: string;
}

/**
 * A value held in the shared context together with the time it was written (epoch ms).
 */
export interface ContextEntry {
    key: string;
    value: string;
    lastWriteTime: number;
}

export type Clock = () => number;
