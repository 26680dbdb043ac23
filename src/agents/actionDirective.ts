import { z } from 'zod';
import { OracleContractViolation, Result } from '../errors';
import { CapabilityArgs } from '../capabilities/Capability';
import { LiteralReader, LiteralSyntaxError, LiteralValue } from './literalReader';

/** Action an oracle uses to answer the user itself instead of calling a capability. */
export const RESPOND_TO_USER = 'respond_to_user';

/** The reply shape the oracle is asked for, written the way it is shown in the prompt. */
export const RESPONSE_FORMAT = "{'action': '', 'args': ''}";

export interface ActionDirective {
    action: string;
    args: CapabilityArgs;
}

const actionDirectiveSchema = z.object({
    action: z.string().trim(),
    args: z.union([z.string(), z.record(z.unknown())]),
});

const FENCED_BLOCK = /```[a-zA-Z0-9_-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```/g;

/**
 * Unwraps the first Markdown code fence that holds a record. Backticks anywhere else stay as written.
 */
export function stripCodeFences(text: string): string {
    for (const match of text.matchAll(FENCED_BLOCK)) {
        if (match[1].includes('{')) {
            return match[1].trim();
        }
    }
    return text.trim();
}

function isRecord(value: LiteralValue): boolean {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// A `{` directly inside `[` or `(` means the reply is a list of records
function opensSequence(text: string, start: number): boolean {
    const before = text.slice(0, start).trimEnd();
    return before.endsWith('[') || before.endsWith('(');
}

// Reports whether another readable record starts anywhere after `from`
function hasFurtherRecord(text: string, from: number): boolean {
    for (let next = text.indexOf('{', from); next !== -1; next = text.indexOf('{', next + 1)) {
        try {
            if (isRecord(new LiteralReader(text, next).read())) {
                return true;
            }
        } catch (error) {
            if (!(error instanceof LiteralSyntaxError)) {
                throw error;
            }
        }
    }
    return false;
}

function violation(message: string, reply: string, details: Record<string, unknown> = {}): Result<ActionDirective, OracleContractViolation> {
    return { success: false, error: new OracleContractViolation(message, reply, details) };
}

/**
 * Turns an oracle's free-text reply into an ActionDirective.
 *
 * The reply may wrap the record in prose or a code fence, and may write it with single quotes and capitalised keywords.
 * The first `{` starts the record; it is read, re-encoded as JSON and validated. Anything that is
 * not a single record with both `action` and `args` is a contract violation: a list of records,
 * or a second record after the first, is rejected rather than half-run.
 */
export function parseActionDirective(reply: string): Result<ActionDirective, OracleContractViolation> {
    const cleaned = stripCodeFences(reply);
    const start = cleaned.indexOf('{');
    if (start === -1) {
        return violation('Oracle reply contains no structured record', reply);
    }
    if (opensSequence(cleaned, start)) {
        return violation('Oracle reply is a list, not a single record', reply);
    }

    const reader = new LiteralReader(cleaned, start);
    let literal: LiteralValue;
    try {
        literal = reader.read();
    } catch (error) {
        const position = error instanceof LiteralSyntaxError ? error.position : undefined;
        const message = error instanceof Error ? error.message : String(error);
        return violation(`Oracle reply is not a readable record: ${message}`, reply, { position });
    }
    if (hasFurtherRecord(cleaned, reader.position)) {
        return violation('Oracle reply holds more than one record', reply);
    }

    // Strict form: whatever the literal syntax was, validation sees plain JSON data
    const strict: unknown = JSON.parse(JSON.stringify(literal));
    const parsed = actionDirectiveSchema.safeParse(strict);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        return violation(`Oracle reply is not an action directive (${issues.join('; ')})`, reply, { issues });
    }

    return { success: true, data: { action: parsed.data.action, args: parsed.data.args } };
}
