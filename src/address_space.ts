import { ConfigurationError, DecodeConflictError, Direction } from "./errors";
import { MaskedAddress } from "./masked_address";
import { hex8p } from "./sprintf";

export interface AddressClaim<T> {
    pattern: MaskedAddress;
    owner: T;
    name: string;
}

/**
 * All claims of one bus direction. Overlapping claims are rejected when
 * they are made.
 */
export class AddressSpace<T> {
    private _claims: AddressClaim<T>[] = [];
    private _frozen = false;

    constructor(public readonly direction: Direction, public readonly width: number = 32) {
    }

    get frozen(): boolean {
        return this._frozen;
    }

    get size(): number {
        return this._claims.length;
    }

    /**
     * Adds a claim. An identical pattern is only accepted again when
     * `allowDuplicate` is set (internal bookkeeping, never fields).
     */
    claim(pattern: MaskedAddress, owner: T, name: string, allowDuplicate: boolean = false): void {
        if (this._frozen) {
            throw new ConfigurationError(
                `cannot claim ${pattern.describe()} for ${name}: ${this.direction} address space is frozen`);
        }
        if (pattern.width !== this.width) {
            throw new ConfigurationError(
                `address ${pattern.describe()} of ${name} is ${pattern.width} bits wide, expected ${this.width}`);
        }
        for (let other of this._claims) {
            let common = pattern.common(other.pattern);
            if (common === null) {
                continue;
            }
            if (allowDuplicate && pattern.equals(other.pattern)) {
                continue;
            }
            throw new DecodeConflictError(
                `address conflict between ${other.name} (${other.pattern.format()}, 0b${other.pattern.bits()}) ` +
                `and ${name} (${pattern.format()}, 0b${pattern.bits()}) at ${hex8p(common)} in ${this.direction} mode`,
                [other.name, name],
                [other.pattern.diagnostic, pattern.diagnostic],
                this.direction);
        }
        this._claims.push({ pattern, owner, name });
    }

    freeze(): this {
        this._frozen = true;
        return this;
    }

    /** Claims in claim order */
    entries(): readonly AddressClaim<T>[] {
        return this._claims;
    }

    /**
     * Linear reference scan; returns every claim matching the address.
     */
    lookup(address: number): AddressClaim<T>[] {
        return this._claims.filter((c) => c.pattern.matches(address));
    }
}

/**
 * Read and write address spaces of one register file.
 */
export class AddressManager<T> {
    public readonly read: AddressSpace<T>;
    public readonly write: AddressSpace<T>;

    constructor(public readonly width: number = 32) {
        this.read = new AddressSpace<T>("read", width);
        this.write = new AddressSpace<T>("write", width);
    }

    space(direction: Direction): AddressSpace<T> {
        return (direction === "read") ? this.read : this.write;
    }

    claim(pattern: MaskedAddress, owner: T, name: string, read: boolean, write: boolean): void {
        if (read) {
            this.read.claim(pattern, owner, name);
        }
        if (write) {
            this.write.claim(pattern, owner, name);
        }
    }

    freeze(): void {
        this.read.freeze();
        this.write.freeze();
    }
}
