import { ConfigurationError, Direction, PermissionError, SiblingConflictError } from "./errors";
import { MaskedAddress } from "./masked_address";

/**
 * Cheapest way to access the surrounding register without affecting a
 * field, from cheapest to impossible. For reads only `Always` and `Never`
 * are meaningful.
 */
export enum NoOpMethod {
    /** Accessing the field never has an effect */
    Always,
    /** Writing zero is a no-op */
    WriteZero,
    /** Only a read-modify-write leaves the field unchanged */
    WriteCurrent,
    /** Read-modify-write or the byte strobes can mask the field */
    WriteCurrentOrMask,
    /** Only the byte strobes can mask the field */
    Mask,
    /** The register cannot be accessed without touching the field */
    Never,
}

export type MaskingMethod = "strobe" | "zero" | "rmw";

function assertNever(value: never): never {
    throw new Error(`unhandled no-op method ${String(value)}`);
}

export interface PermissionFlags {
    data: boolean;
    instruction: boolean;
    secure: boolean;
    nonsecure: boolean;
    user: boolean;
    privileged: boolean;
}

function axis(allowA: boolean, allowB: boolean, nameA: string, nameB: string): string {
    if (allowA && allowB) {
        return "-";
    }
    if (allowA) {
        return "0";
    }
    if (allowB) {
        return "1";
    }
    throw new PermissionError(`cannot deny both ${nameA} and ${nameB} accesses`);
}

/**
 * Allowed values of the 3-bit `prot` field: bit 2 data (0) or instruction
 * (1), bit 1 secure (0) or nonsecure (1), bit 0 user (0) or privileged (1).
 */
export class Permissions {
    static readonly ALL = new Permissions(MaskedAddress.all(3));

    private constructor(public readonly pattern: MaskedAddress) {
    }

    static fromFlags(flags: Partial<PermissionFlags> = {}): Permissions {
        let f: PermissionFlags = {
            data: true, instruction: true,
            secure: true, nonsecure: true,
            user: true, privileged: true,
            ...flags,
        };
        let bits =
            axis(f.data, f.instruction, "data", "instruction") +
            axis(f.secure, f.nonsecure, "secure", "nonsecure") +
            axis(f.user, f.privileged, "user", "privileged");
        return new Permissions(MaskedAddress.fromBits(bits));
    }

    /** Don't-care string such as `-0-` */
    get mask(): string {
        return this.pattern.bits();
    }

    allows(prot: number): boolean {
        return this.pattern.matches(prot & 7);
    }

    isProtected(): boolean {
        return !this.pattern.containsAll();
    }
}

export interface AccessCapabilitiesInit {
    volatile?: boolean;
    canBlock?: boolean;
    canDefer?: boolean;
    noOpMethod?: NoOpMethod;
    permissions?: Permissions;
}

/**
 * Capabilities of one field (or one aggregated block) for one direction.
 */
export class AccessCapabilities {
    /** Performing the same access twice differs from performing it once */
    public readonly volatile: boolean;
    /** The access may stall the bus */
    public readonly canBlock: boolean;
    /** The request may be accepted before its response is known */
    public readonly canDefer: boolean;
    public readonly noOpMethod: NoOpMethod;
    public readonly permissions: Permissions;

    constructor(init: AccessCapabilitiesInit = {}) {
        this.volatile = init.volatile ?? false;
        this.canBlock = init.canBlock ?? false;
        this.canDefer = init.canDefer ?? false;
        this.noOpMethod = init.noOpMethod ?? NoOpMethod.Never;
        this.permissions = init.permissions ?? Permissions.ALL;
        Object.freeze(this);
    }

    /**
     * Validates the fields sharing one block in one direction and returns
     * their combined capabilities, or null if there are none. `names` only
     * improves the messages.
     */
    static checkSiblings(
        siblings: readonly AccessCapabilities[],
        names: readonly string[] = [],
        direction?: Direction,
    ): AccessCapabilities | null {
        if (siblings.length === 0) {
            return null;
        }
        let pick = (predicate: (caps: AccessCapabilities) => boolean): string[] =>
            siblings.flatMap((caps, i) => (predicate(caps) && names[i] != null) ? [names[i]] : []);
        let listed = (fields: string[]): string =>
            (fields.length > 0) ? ` (${fields.map((n) => `\`${n}\``).join(", ")})` : "";

        let deferring = siblings.filter((caps) => caps.canDefer);
        if (deferring.length > 0 && siblings.length > 1) {
            let fields = pick((caps) => caps.canDefer);
            throw new SiblingConflictError(
                `fields that can defer cannot be combined with other fields${listed(fields)}`,
                fields, direction);
        }
        let blocking = siblings.filter((caps) => caps.canBlock);
        if (blocking.length > 1) {
            let fields = pick((caps) => caps.canBlock);
            throw new SiblingConflictError(
                `cannot have more than one blocking field in a single register${listed(fields)}`,
                fields, direction);
        }
        if (blocking.length > 0 && siblings.some((caps) => caps.volatile && !caps.canBlock)) {
            let fields = pick((caps) => caps.canBlock || caps.volatile);
            throw new SiblingConflictError(
                `cannot have both volatile fields and blocking fields in a single register${listed(fields)}`,
                fields, direction);
        }
        return new AccessCapabilities({
            volatile: siblings.some((caps) => caps.volatile),
            canBlock: blocking.length > 0,
            canDefer: deferring.length > 0,
            noOpMethod: siblings.reduce((m, caps) => Math.max(m, caps.noOpMethod), NoOpMethod.Always),
        });
    }
}

/**
 * Read and write capabilities of a field.
 */
export class BusCapabilities {
    constructor(
        public readonly read: AccessCapabilities | null,
        public readonly write: AccessCapabilities | null,
        public readonly canReadForRmw: boolean = true,
    ) {
        if (read == null && write == null) {
            throw new ConfigurationError("must support either or both read and write mode");
        }
        if (read != null && read.noOpMethod !== NoOpMethod.Always && read.noOpMethod !== NoOpMethod.Never) {
            throw new ConfigurationError("read no-op method must be Always or Never");
        }
    }

    get(direction: Direction): AccessCapabilities | null {
        return (direction === "read") ? this.read : this.write;
    }

    canRead(): boolean {
        return this.read != null;
    }

    maskingNeeded(): boolean {
        return this.write != null && this.write.noOpMethod !== NoOpMethod.Always;
    }

    canMaskWithStrobe(): boolean {
        if (this.write == null || !this.maskingNeeded()) {
            return true;
        }
        let method = this.write.noOpMethod;
        switch (method) {
            case NoOpMethod.Always:
            case NoOpMethod.WriteZero:
            case NoOpMethod.WriteCurrentOrMask:
            case NoOpMethod.Mask:
                return true;
            case NoOpMethod.WriteCurrent:
            case NoOpMethod.Never:
                return false;
            default:
                return assertNever(method);
        }
    }

    canMaskWithZero(): boolean {
        if (this.write == null || !this.maskingNeeded()) {
            return true;
        }
        let method = this.write.noOpMethod;
        switch (method) {
            case NoOpMethod.Always:
            case NoOpMethod.WriteZero:
                return true;
            case NoOpMethod.WriteCurrent:
            case NoOpMethod.WriteCurrentOrMask:
            case NoOpMethod.Mask:
            case NoOpMethod.Never:
                return false;
            default:
                return assertNever(method);
        }
    }

    canMaskWithRmw(): boolean {
        let writeOk: boolean;
        if (this.write == null || !this.maskingNeeded()) {
            writeOk = true;
        } else {
            let method = this.write.noOpMethod;
            switch (method) {
                case NoOpMethod.Always:
                case NoOpMethod.WriteCurrent:
                case NoOpMethod.WriteCurrentOrMask:
                    writeOk = true;
                    break;
                case NoOpMethod.WriteZero:
                case NoOpMethod.Mask:
                case NoOpMethod.Never:
                    writeOk = false;
                    break;
                default:
                    return assertNever(method);
            }
        }
        return writeOk
            && this.read != null
            && this.read.noOpMethod === NoOpMethod.Always
            && this.canReadForRmw;
    }

    /**
     * Cheapest way to leave this field untouched while a sibling is written:
     * byte strobes, then writing zero, then read-modify-write.
     */
    selectMaskingMethod(fieldName: string): MaskingMethod {
        if (this.canMaskWithStrobe()) {
            return "strobe";
        }
        if (this.canMaskWithZero()) {
            return "zero";
        }
        if (this.canMaskWithRmw()) {
            return "rmw";
        }
        let method = (this.write != null) ? NoOpMethod[this.write.noOpMethod] : "none";
        let error = new ConfigurationError(
            `field \`${fieldName}\` cannot be left untouched while its siblings are written ` +
            `(write no-op method ${method}${this.canRead() ? "" : ", not readable"})`);
        error.fields = [fieldName];
        error.direction = "write";
        throw error;
    }

    isProtected(): boolean {
        return (this.read != null && this.read.permissions.isProtected())
            || (this.write != null && this.write.permissions.isProtected());
    }
}
