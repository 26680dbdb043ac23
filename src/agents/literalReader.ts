export type LiteralValue =
    | string
    | number
    | boolean
    | null
    | LiteralValue[]
    | { [key: string]: LiteralValue };

export class LiteralSyntaxError extends Error {
    constructor(message: string, public readonly position: number) {
        super(`${message} at position ${position}`);
        this.name = 'LiteralSyntaxError';
    }
}

const KEYWORDS: Record<string, LiteralValue> = {
    True: true,
    False: false,
    None: null,
    true: true,
    false: false,
    null: null,
};

const SIMPLE_ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    b: '\b',
    f: '\f',
    '0': '\0',
    '\\': '\\',
    "'": "'",
    '"': '"',
    '/': '/',
};

const CLOSERS: Record<string, string> = { '[': ']', '(': ')' };

/**
 * Reads one literal in the loose syntax LLMs tend to emit for structured replies: object
 * literals, lists and tuples with single- or double-quoted strings, True/False/None, and trailing
 * commas, as well as plain JSON.
 *
 * Reading stops at the end of the first complete value; whatever follows is left unread.
 */
export class LiteralReader {
    private pos: number;

    constructor(private readonly text: string, start = 0) {
        this.pos = start;
    }

    /** Position just past the last character consumed. */
    get position(): number {
        return this.pos;
    }

    read(): LiteralValue {
        this.skipWhitespace();
        const ch = this.peek();
        if (ch === undefined) {
            throw new LiteralSyntaxError('Unexpected end of input', this.pos);
        }
        if (ch === '{') {
            return this.readDict();
        }
        if (ch === '[' || ch === '(') {
            return this.readSequence(ch);
        }
        if (ch === "'" || ch === '"') {
            return this.readStrings();
        }
        if (ch === '-' || ch === '+' || ch === '.' || isDigit(ch)) {
            return this.readNumber();
        }
        if (isIdentifierStart(ch)) {
            return this.readKeyword();
        }
        throw new LiteralSyntaxError(`Unexpected character '${ch}'`, this.pos);
    }

    private readDict(): { [key: string]: LiteralValue } {
        this.expect('{');
        const result: { [key: string]: LiteralValue } = {};
        this.skipWhitespace();
        while (this.peek() !== '}') {
            const keyStart = this.pos;
            const key = this.read();
            if (typeof key !== 'string' && typeof key !== 'number') {
                throw new LiteralSyntaxError('Dictionary keys must be strings or numbers', keyStart);
            }
            this.skipWhitespace();
            this.expect(':');
            result[String(key)] = this.read();
            if (!this.consumeSeparator('}')) {
                break;
            }
        }
        this.expect('}');
        return result;
    }

    private readSequence(opener: string): LiteralValue[] {
        const closer = CLOSERS[opener];
        this.expect(opener);
        const items: LiteralValue[] = [];
        this.skipWhitespace();
        while (this.peek() !== closer) {
            items.push(this.read());
            if (!this.consumeSeparator(closer)) {
                break;
            }
        }
        this.expect(closer);
        return items;
    }

    /**
     * After an item: consumes a comma and reports whether another item may follow.
     * Returns false when the closer comes next.
     */
    private consumeSeparator(closer: string): boolean {
        this.skipWhitespace();
        if (this.peek() === ',') {
            this.pos++;
            this.skipWhitespace();
            return this.peek() !== closer;
        }
        if (this.peek() === closer) {
            return false;
        }
        throw new LiteralSyntaxError(`Expected ',' or '${closer}'`, this.pos);
    }

    // Adjacent string literals concatenate, as in 'a' 'b'
    private readStrings(): string {
        let value = this.readString();
        for (;;) {
            const save = this.pos;
            this.skipWhitespace();
            const next = this.peek();
            if (next === "'" || next === '"') {
                value += this.readString();
            } else {
                this.pos = save;
                return value;
            }
        }
    }

    private readString(): string {
        const quote = this.text[this.pos];
        const start = this.pos;
        const triple = this.text.startsWith(quote.repeat(3), this.pos);
        const delimiter = triple ? quote.repeat(3) : quote;
        this.pos += delimiter.length;

        let value = '';
        while (this.pos < this.text.length) {
            if (this.text.startsWith(delimiter, this.pos)) {
                this.pos += delimiter.length;
                return value;
            }
            const ch = this.text[this.pos];
            if (ch === '\\') {
                value += this.readEscape();
                continue;
            }
            if (ch === '\n' && !triple) {
                throw new LiteralSyntaxError('Unterminated string', start);
            }
            value += ch;
            this.pos++;
        }
        throw new LiteralSyntaxError('Unterminated string', start);
    }

    private readEscape(): string {
        const escapeStart = this.pos;
        this.pos++; // backslash
        const ch = this.text[this.pos];
        if (ch === undefined) {
            throw new LiteralSyntaxError('Unterminated escape sequence', escapeStart);
        }
        this.pos++;
        if (ch in SIMPLE_ESCAPES) {
            return SIMPLE_ESCAPES[ch];
        }
        if (ch === '\n') {
            return '';
        }
        if (ch === 'u' || ch === 'x') {
            const length = ch === 'u' ? 4 : 2;
            const hex = this.text.slice(this.pos, this.pos + length);
            if (hex.length !== length || !/^[0-9a-fA-F]+$/.test(hex)) {
                throw new LiteralSyntaxError(`Invalid \\${ch} escape`, escapeStart);
            }
            this.pos += length;
            return String.fromCharCode(parseInt(hex, 16));
        }
        // Unknown escapes keep the backslash
        return `\\${ch}`;
    }

    private readNumber(): number {
        const match = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/.exec(this.text.slice(this.pos));
        if (!match) {
            throw new LiteralSyntaxError('Invalid number', this.pos);
        }
        this.pos += match[0].length;
        return Number(match[0]);
    }

    private readKeyword(): LiteralValue {
        const start = this.pos;
        while (this.pos < this.text.length && isIdentifierPart(this.text[this.pos])) {
            this.pos++;
        }
        const word = this.text.slice(start, this.pos);
        if (Object.prototype.hasOwnProperty.call(KEYWORDS, word)) {
            return KEYWORDS[word];
        }
        throw new LiteralSyntaxError(`Unknown name '${word}'`, start);
    }

    private expect(ch: string): void {
        this.skipWhitespace();
        if (this.text[this.pos] !== ch) {
            throw new LiteralSyntaxError(`Expected '${ch}'`, this.pos);
        }
        this.pos++;
    }

    private peek(): string | undefined {
        return this.text[this.pos];
    }

    private skipWhitespace(): void {
        while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
            this.pos++;
        }
    }
}

function isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
    return /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string): boolean {
    return /[A-Za-z0-9_]/.test(ch);
}

/**
 * Reads the literal that starts at `start` (default: the beginning of the text).
 */
export function readLiteral(text: string, start = 0): LiteralValue {
    return new LiteralReader(text, start).read();
}
