import { DEFAULT_MAX_MEMORY } from '../config';
import { ConfigurationError } from '../errors';
import { AGENT_ROLE, Role, TurnRecord, USER_ROLE } from './memory_types';

const ROLE_LABELS: Record<Role, string> = {
    [USER_ROLE]: 'User',
    [AGENT_ROLE]: 'Agent',
};

/**
 * Bounded, ordered record of one agent's conversation.
 * Holds at most `maxMemory` records; every insert past the bound evicts the oldest one.
 */
export class ConversationMemory {
    private readonly records: TurnRecord[] = [];

    constructor(public readonly maxMemory: number = DEFAULT_MAX_MEMORY) {
        if (!Number.isInteger(maxMemory) || maxMemory < 1) {
            throw new ConfigurationError(`Memory bound must be a positive integer, got ${maxMemory}.`, 'ConversationMemory');
        }
    }

    append(role: Role, content: string): void {
        this.records.push({ role, content });
        while (this.records.length > this.maxMemory) {
            this.records.shift();
        }
    }

    get length(): number {
        return this.records.length;
    }

    /** Snapshot of the records, oldest first. */
    get turns(): readonly TurnRecord[] {
        return this.records.map(record => ({ ...record }));
    }

    /**
     * Renders the most recent records as `User: ...` / `Agent: ...` lines.
     *
     * @param count - How many trailing records to include; all of them when omitted.
     */
    toTranscript(count: number = this.records.length): string {
        const window = count > 0 ? this.records.slice(-count) : [];
        return window.map(record => `${ROLE_LABELS[record.role]}: ${record.content}`).join('\n');
    }

    clear(): void {
        this.records.length = 0;
    }
}
