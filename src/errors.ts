export type ErrorCategory =
    "decode conflict" |
    "sibling capability conflict" |
    "address arithmetic overflow" |
    "permission conflict" |
    "configuration";

export type Direction = "read" | "write";

/**
 * Rendering of a masked address used in diagnostics
 */
export interface PatternDiagnostic {
    /** `0x########/0x########` (value/mask) */
    formatted: string;
    /** MSB-first don't-care bit string */
    bits: string;
}

export interface Diagnostic {
    category: ErrorCategory;
    fields: string[];
    patterns: PatternDiagnostic[];
    direction?: Direction;
}

/**
 * Base class of every error that aborts compilation of a register file
 */
export class ConfigurationError extends Error {
    public readonly category: ErrorCategory = "configuration";
    public fields: string[] = [];
    public patterns: PatternDiagnostic[] = [];
    public direction?: Direction;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    get diagnostic(): Diagnostic {
        return {
            category: this.category,
            fields: this.fields,
            patterns: this.patterns,
            direction: this.direction,
        };
    }

    /**
     * Prepends `context` to the message, keeping class and diagnostic.
     */
    withContext(context: string): this {
        this.message = `${context}: ${this.message}`;
        return this;
    }
}

export class DecodeConflictError extends ConfigurationError {
    public readonly category = "decode conflict";

    constructor(message: string, fields: string[] = [], patterns: PatternDiagnostic[] = [], direction?: Direction) {
        super(message);
        this.fields = fields;
        this.patterns = patterns;
        this.direction = direction;
    }
}

export class SiblingConflictError extends ConfigurationError {
    public readonly category = "sibling capability conflict";

    constructor(message: string, fields: string[] = [], direction?: Direction) {
        super(message);
        this.fields = fields;
        this.direction = direction;
    }
}

export type ArithmeticOperation = "addition" | "shift";

export class AddressArithmeticError extends ConfigurationError {
    public readonly category = "address arithmetic overflow";

    constructor(message: string, public readonly operation: ArithmeticOperation) {
        super(message);
    }
}

export class PermissionError extends ConfigurationError {
    public readonly category = "permission conflict";
}

/**
 * Raised at run time when a field behavior breaks the hook contract
 */
export class ProtocolError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ProtocolError";
    }
}
