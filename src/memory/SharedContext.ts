import { DEFAULT_CONTEXT_EXPIRY_MS } from '../config';
import { dbg } from '../utils';
import { Clock, ContextEntry } from './memory_types';

export interface SharedContextOptions {
    /** How long the store stays valid after its last write. */
    expiryMs?: number;
    clock?: Clock;
}

/**
 * Key/value store for ambient conversation slots, such as the last location the user asked about.
 *
 * Expiry is coarse and lazy: every `update` restarts the clock for the whole store, and the first
 * read that finds the store older than `expiryMs` clears all of it, not only the key being read.
 * Nothing expires in the background.
 */
export class SharedContext {
    private readonly entries = new Map<string, ContextEntry>();
    private lastUpdated: number | undefined;
    private readonly expiryMs: number;
    private readonly clock: Clock;

    constructor(options: SharedContextOptions = {}) {
        this.expiryMs = options.expiryMs ?? DEFAULT_CONTEXT_EXPIRY_MS;
        this.clock = options.clock ?? Date.now;
    }

    update(key: string, value: string): void {
        const now = this.clock();
        this.entries.set(key, { key, value, lastWriteTime: now });
        this.lastUpdated = now;
    }

    get(key: string): string | undefined {
        return this.entry(key)?.value;
    }

    entry(key: string): ContextEntry | undefined {
        this.expireIfStale();
        const entry = this.entries.get(key);
        return entry ? { ...entry } : undefined;
    }

    has(key: string): boolean {
        return this.entry(key) !== undefined;
    }

    clear(): void {
        this.entries.clear();
        this.lastUpdated = undefined;
    }

    /** Number of entries currently held, without triggering expiry. */
    get size(): number {
        return this.entries.size;
    }

    snapshot(): Record<string, string> {
        this.expireIfStale();
        return Object.fromEntries([...this.entries.values()].map(entry => [entry.key, entry.value]));
    }

    private expireIfStale(): void {
        if (this.lastUpdated === undefined) {
            return;
        }
        const age = this.clock() - this.lastUpdated;
        if (age > this.expiryMs) {
            dbg(`SharedContext: expired after ${Math.round(age / 1000)}s, clearing ${this.entries.size} entries.`);
            this.clear();
        }
    }
}
