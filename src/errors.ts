import { dbg, describeError } from './utils';

export type FailureKind =
    | 'AgentFailure'
    | 'ToolFailure'
    | 'SlotResolutionFailure'
    | 'RoutingAmbiguity'
    | 'OracleContractViolation'
    | 'Configuration';

export type FailureDetails = Record<string, unknown>;

/**
 * Result type for steps that may fail without throwing.
 */
export type Result<T, E = string> =
    | { success: true; data: T }
    | { success: false; error: E };

/**
 * Base class for every failure the assistant knows how to describe to a user.
 * The message doubles as the human readable summary.
 */
export class AssistantError extends Error {
    constructor(
        message: string,
        public readonly kind: FailureKind,
        public readonly component: string,
        public readonly details: FailureDetails = {},
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AssistantError';
    }
}

/** The oracle call, the prompt build or the reply parse failed inside an agent. */
export class AgentFailure extends AssistantError {
    constructor(message: string, agentName: string, details: FailureDetails = {}, options?: { cause?: unknown }) {
        super(message, 'AgentFailure', `Agent[${agentName}]`, details, options);
        this.name = 'AgentFailure';
    }
}

/** A capability's own operation failed (lookup, transport, formatting). */
export class ToolFailure extends AssistantError {
    constructor(message: string, public readonly toolName: string, details: FailureDetails = {}, options?: { cause?: unknown }) {
        super(message, 'ToolFailure', `Capability[${toolName}]`, details, options);
        this.name = 'ToolFailure';
    }
}

/** No usable location could be determined. */
export class SlotResolutionFailure extends AssistantError {
    constructor(message: string, component: string, public readonly location?: string, details: FailureDetails = {}) {
        super(message, 'SlotResolutionFailure', component, { ...details, location });
        this.name = 'SlotResolutionFailure';
    }
}

/** No intent keyword matched. Never thrown; the default intents are used instead. */
export class RoutingAmbiguity extends AssistantError {
    constructor(message: string, details: FailureDetails = {}) {
        super(message, 'RoutingAmbiguity', 'IntentClassifier', details);
        this.name = 'RoutingAmbiguity';
    }
}

/** The oracle reply could not be read as an action directive. */
export class OracleContractViolation extends AssistantError {
    constructor(message: string, public readonly reply: string, details: FailureDetails = {}) {
        super(message, 'OracleContractViolation', 'DirectiveParser', details);
        this.name = 'OracleContractViolation';
    }
}

/** Invalid settings, missing credentials or an invalid agent/capability registration. */
export class ConfigurationError extends AssistantError {
    constructor(message: string, component: string, details: FailureDetails = {}) {
        super(message, 'Configuration', component, details);
        this.name = 'ConfigurationError';
    }
}

export type LogLevel = 'error' | 'warn' | 'debug';

/**
 * Logs a failure at the point where it is absorbed, with the component that absorbed it
 * and whatever context helps diagnose it. The user only ever sees a generic sentence.
 */
export function logFailure(
    error: unknown,
    component: string,
    context: Record<string, unknown> = {},
    level: LogLevel = 'error'
): void {
    const kind = error instanceof AssistantError ? error.kind : 'Unexpected';
    const details = error instanceof AssistantError ? error.details : {};
    const cause = error instanceof Error && error.cause !== undefined ? describeError(error.cause) : undefined;
    const line = `${component}: [${kind}] ${describeError(error)}`;
    const payload = { ...context, ...details, ...(cause !== undefined ? { cause } : {}) };

    switch (level) {
        case 'error':
            console.error(line, payload);
            break;
        case 'warn':
            console.warn(line, payload);
            break;
        default:
            dbg(`${line} ${JSON.stringify(payload)}`);
            break;
    }
}

export const UNEXPECTED_FAILURE_REPLY = 'I encountered an unexpected error. Please try again.';

/**
 * Converts a failure that reached the orchestrator boundary into the final user-facing sentence.
 */
export function toUserMessage(error: unknown): string {
    if (error instanceof AssistantError) {
        return `Sorry, I couldn't complete that request: ${error.message}`;
    }
    return UNEXPECTED_FAILURE_REPLY;
}
