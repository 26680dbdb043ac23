import { SlotResolutionFailure, ToolFailure, logFailure } from '../errors';
import { describeError } from '../utils';
import { FORECAST_COMPONENT } from '../services/ForecastService';

/**
 * Arguments an agent hands to a capability: a bare string, or the mapping the oracle produced.
 */
export type CapabilityArgs = string | Record<string, unknown>;

export interface CapabilityDescriptor {
    readonly name: string;
    readonly description: string;
}

/**
 * The contract every domain tool exposes to an agent.
 * `invoke` never rejects: failures come back as a sentence the user can read.
 */
export interface Capability {
    name(): string;
    description(): string;
    invoke(args: CapabilityArgs): Promise<string>;
}

export function describeCapability(capability: Capability): CapabilityDescriptor {
    return { name: capability.name(), description: capability.description() };
}

function stringifyArgValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (value === null || value === undefined) {
        return '';
    }
    if (typeof value === 'object') {
        return JSON.stringify(value);
    }
    return String(value);
}

/**
 * The one argument-shape rule between agents and capabilities:
 * a string passes through; a mapping yields its `location` value if it has one,
 * otherwise its first value coerced to a string.
 */
export function normalizeArgs(args: CapabilityArgs): string {
    if (typeof args === 'string') {
        return args;
    }
    if (Object.prototype.hasOwnProperty.call(args, 'location')) {
        return stringifyArgValue(args.location);
    }
    const [first] = Object.values(args);
    return stringifyArgValue(first);
}

/**
 * Normalizes arguments, runs the domain operation and absorbs any failure into a sentence.
 */
export abstract class BaseCapability implements Capability {
    abstract name(): string;
    abstract description(): string;

    /** What the capability fetches, as used in "Sorry, I encountered an error getting ...". */
    protected abstract readonly topic: string;

    protected abstract run(argument: string): Promise<string>;

    async invoke(args: CapabilityArgs): Promise<string> {
        const argument = normalizeArgs(args).trim();
        try {
            return await this.run(argument);
        } catch (error) {
            const failure = new ToolFailure(`${this.name()} failed: ${describeError(error)}`, this.name(), { argument }, { cause: error });
            logFailure(failure, `Capability[${this.name()}]`, { argument });
            return this.failureReply(argument, error);
        }
    }

    protected failureReply(argument: string, error: unknown): string {
        if (error instanceof SlotResolutionFailure) {
            return `Sorry, I couldn't find the location: ${argument}`;
        }
        if (error instanceof ToolFailure && error.toolName === FORECAST_COMPONENT) {
            return `Sorry, I couldn't get weather data for ${argument}`;
        }
        return `Sorry, I encountered an error getting ${this.topic}.`;
    }
}
