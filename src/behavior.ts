import { AccessCapabilitiesInit } from "./access_caps";
import { ConfigurationError, Direction } from "./errors";

export type ParamValue = string | number | boolean;

/**
 * Behavior selection of a field: the catalog kind plus behavior specific
 * parameters.
 */
export interface BehaviorConfig {
    kind: string;
    [param: string]: ParamValue;
}

/** Static information about the field a behavior instance serves */
export interface FieldInfo {
    name: string;
    /** Number of bits */
    width: number;
}

export type HookPhase = "normal" | "lookahead" | "deferred";

/**
 * One invocation of a field hook. The hook signals at most one outcome by
 * calling `ack`, `nack`, `block` or `defer`.
 */
export interface FieldAccess {
    readonly direction: Direction;
    readonly phase: HookPhase;
    /** 3-bit protection of the transaction */
    readonly prot: number;
    /** Field bits written (zero for reads and deferred completions) */
    readonly data: bigint;
    /** Field bits enabled by the byte strobes */
    readonly strobe: bigint;
    ack(data?: bigint): void;
    nack(): void;
    block(): void;
    defer(): void;
}

export interface BehaviorAccess {
    read: AccessCapabilitiesInit | null;
    write: AccessCapabilitiesInit | null;
    /** Reading returns the value a read-modify-write must write back */
    canReadForRmw?: boolean;
}

export interface BehaviorConstructor extends Function {
    readonly kind: string;
    new (field: FieldInfo, config: BehaviorConfig): Behavior;
}

/**
 * Base class of field behaviors. Subclasses declare their capabilities in
 * `access` and override the hooks they need; `both` serves the normal and
 * the lookahead phase unless either is overridden.
 */
export class Behavior {
    static kind = "";

    constructor(public readonly field: FieldInfo, public readonly config: BehaviorConfig) {
    }

    get kind(): string {
        return this.config.kind;
    }

    get access(): BehaviorAccess {
        throw new Error("pure function");
    }

    /** Mask covering the field's bits */
    get mask(): bigint {
        return (1n << BigInt(this.field.width)) - 1n;
    }

    reset(): void {
    }

    normal(access: FieldAccess): void {
        this.both(access);
    }

    lookahead(access: FieldAccess): void {
        this.both(access);
    }

    both(access: FieldAccess): void {
    }

    deferred(access: FieldAccess): void {
    }

    protected bigint(name: string, defaultValue: bigint = 0n): bigint {
        let value = this.config[name];
        if (value == null) {
            return defaultValue;
        }
        let result: bigint;
        try {
            result = BigInt(typeof value === "string" ? value.replace(/_/g, "").trim() : value);
        } catch (error) {
            throw this.paramError(name, "an integer");
        }
        if (result < 0n || result > this.mask) {
            throw new ConfigurationError(
                `parameter \`${name}\` of field \`${this.field.name}\` does not fit in ${this.field.width} bits`);
        }
        return result;
    }

    protected boolean(name: string, defaultValue: boolean = false): boolean {
        let value = this.config[name] ?? defaultValue;
        if (value === "true" || value === "yes" || value === "1") {
            return true;
        }
        if (value === "false" || value === "no" || value === "0") {
            return false;
        }
        if (typeof value !== "boolean") {
            throw this.paramError(name, "a boolean");
        }
        return value;
    }

    protected choice<T extends string>(name: string, choices: readonly T[], defaultValue: T): T {
        let value = this.config[name] ?? defaultValue;
        let found = choices.find((c) => c === value);
        if (found == null) {
            throw this.paramError(name, `one of ${choices.map((c) => `"${c}"`).join(", ")}`);
        }
        return found;
    }

    private paramError(name: string, expected: string): ConfigurationError {
        return new ConfigurationError(
            `parameter \`${name}\` of ${this.config.kind} field \`${this.field.name}\` must be ${expected}`);
    }
}
