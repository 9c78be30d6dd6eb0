import { AddressArithmeticError, ConfigurationError, PatternDiagnostic } from "./errors";
import { bin, hex8p, hexw } from "./sprintf";

/** Widest pattern handled by a single masked address */
export const MAX_WIDTH = 32;

export function widthMask(width: number): number {
    return (width >= MAX_WIDTH) ? 0xffffffff : ((1 << width) >>> 0) - 1;
}

function checkRange(what: string, value: number, width: number): void {
    if (!Number.isInteger(value) || value < 0 || value > widthMask(width)) {
        throw new ConfigurationError(`${what} ${value} is out of range for ${width} bits`);
    }
}

/**
 * Bit pattern over {0, 1, -}. A mask bit of 1 marks a bit that is cared
 * about; `value` never has bits set outside the mask.
 */
export class MaskedAddress {
    public readonly value: number;
    public readonly mask: number;

    constructor(value: number, mask: number, public readonly width: number = MAX_WIDTH) {
        if (!Number.isInteger(width) || width < 1 || width > MAX_WIDTH) {
            throw new ConfigurationError(`address width ${width} is not supported (1..${MAX_WIDTH})`);
        }
        checkRange("address", value, width);
        checkRange("mask", mask, width);
        this.mask = mask >>> 0;
        this.value = (value & mask) >>> 0;
    }

    /** Pattern matching exactly one address */
    static fromValue(value: number, width: number = MAX_WIDTH): MaskedAddress {
        return new MaskedAddress(value, widthMask(width), width);
    }

    /** Pattern matching every address */
    static all(width: number = MAX_WIDTH): MaskedAddress {
        return new MaskedAddress(0, 0, width);
    }

    /**
     * Parses an MSB-first string over {0, 1, -}
     */
    static fromBits(bits: string): MaskedAddress {
        let value = 0;
        let mask = 0;
        for (let c of bits) {
            value *= 2;
            mask *= 2;
            switch (c) {
                case "1":
                    value += 1;
                    mask += 1;
                    break;
                case "0":
                    mask += 1;
                    break;
                case "-":
                    break;
                default:
                    throw new ConfigurationError(`invalid pattern character "${c}" in "${bits}"`);
            }
        }
        return new MaskedAddress(value, mask, bits.length);
    }

    get fullMask(): number {
        return widthMask(this.width);
    }

    /** True if every bit is cared about */
    isExact(): boolean {
        return this.mask === this.fullMask;
    }

    containsAll(): boolean {
        return this.mask === 0;
    }

    matches(address: number): boolean {
        return ((address & this.mask) >>> 0) === this.value;
    }

    /**
     * Returns one address matched by both patterns, or null if they are
     * disjoint.
     */
    common(other: MaskedAddress): number | null {
        if ((this.mask & other.mask & (this.value ^ other.value)) !== 0) {
            return null;
        }
        return (this.value | other.value) >>> 0;
    }

    overlaps(other: MaskedAddress): boolean {
        return this.common(other) !== null;
    }

    equals(other: MaskedAddress): boolean {
        return this.width === other.width && this.value === other.value && this.mask === other.mask;
    }

    /**
     * Adds `summand` to the cared-about bits only; carries skip the
     * don't-care positions.
     */
    add(summand: number): MaskedAddress {
        if (!Number.isSafeInteger(summand)) {
            throw new AddressArithmeticError(`address summand ${summand} is not an integer`, "addition");
        }
        let address = this.value;
        let carry = 0;
        let rest = summand;
        for (let bit = 0; bit < this.width; ++bit) {
            let bitm = (1 << bit) >>> 0;
            if ((this.mask & bitm) === 0) {
                continue;
            }
            let inBit = ((rest % 2) + 2) % 2;
            rest = Math.floor(rest / 2);
            let cur = (address & bitm) ? 1 : 0;
            let sum = inBit + carry + cur;
            if ((sum & 1) !== cur) {
                address = (address ^ bitm) >>> 0;
            }
            carry = sum >> 1;
        }
        if (rest === 0) {
            if (carry) {
                throw new AddressArithmeticError(
                    `overflow during address addition (${this.describe()} + ${summand})`, "addition");
            }
        } else if (rest === -1) {
            if (!carry) {
                throw new AddressArithmeticError(
                    `underflow during address addition (${this.describe()} - ${-summand})`, "addition");
            }
        } else {
            throw new AddressArithmeticError(
                `address summand ${summand} out of range for ${this.describe()}`, "addition");
        }
        return new MaskedAddress(address, this.mask, this.width);
    }

    /**
     * Shifts left, shifting in don't cares at the LSB side.
     */
    shiftLeft(amount: number): MaskedAddress {
        if (!Number.isInteger(amount) || amount < 0) {
            throw new AddressArithmeticError(`invalid shift amount ${amount}`, "shift");
        }
        if (amount === 0) {
            return this;
        }
        let lost = (amount >= this.width) ? this.mask : (this.mask >>> (this.width - amount));
        if (lost !== 0) {
            throw new AddressArithmeticError(
                `shifting ${this.describe()} left by ${amount} overflows ${this.width} bits`, "shift");
        }
        let scale = Math.pow(2, amount);
        return new MaskedAddress(this.value * scale, this.mask * scale, this.width);
    }

    /**
     * Intersection of two patterns that care about disjoint bits.
     */
    combine(other: MaskedAddress): MaskedAddress {
        if ((this.mask & other.mask) !== 0) {
            throw new ConfigurationError(
                `cannot combine ${this.describe()} and ${other.describe()}: they care about the same bits`);
        }
        return new MaskedAddress(
            (this.value | other.value) >>> 0, (this.mask | other.mask) >>> 0, Math.max(this.width, other.width));
    }

    /**
     * MSB-first don't-care bit string
     */
    bits(): string {
        let value = bin(this.value, this.width);
        let mask = bin(this.mask, this.width);
        let result = "";
        for (let i = 0; i < this.width; ++i) {
            result += (mask[i] === "1") ? value[i] : "-";
        }
        return result;
    }

    /** `0x########/0x########` */
    format(): string {
        return `${hex8p(this.value)}/${hex8p(this.mask)}`;
    }

    /**
     * Most readable representation: plain hex, hex with ignored LSB count,
     * or binary with dashes.
     */
    describe(): string {
        if (this.mask === 0) {
            return "-";
        }
        if (this.isExact()) {
            return hexw(this.value, this.width);
        }
        let inverted = (~this.mask & this.fullMask) >>> 0;
        let ignored = inverted.toString(2).length;
        if (inverted === widthMask(ignored)) {
            return `${hexw(this.value, this.width)}/${ignored}`;
        }
        return `0b${this.bits()}`;
    }

    get diagnostic(): PatternDiagnostic {
        return { formatted: this.format(), bits: this.bits() };
    }

    toString(): string {
        return this.describe();
    }
}
