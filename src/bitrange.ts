import { ConfigurationError } from "./errors";
import { parseAddress, parseInteger } from "./address_parser";
import { MaskedAddress } from "./masked_address";

/**
 * Placement of a field: the address of its register (first block) and the
 * bits it occupies within the logical register.
 */
export interface BitRange {
    address: MaskedAddress;
    /** Number of address LSBs ignored by each block */
    size: number;
    high: number;
    low: number;
    /** Single bit declared as `:n` rather than `:n..n` */
    scalar: boolean;
}

export function bitRangeWidth(range: BitRange): number {
    return range.high - range.low + 1;
}

/** log2 of the bus width in bytes */
export function wordShift(busWidth: number): number {
    return Math.log2(busWidth / 8);
}

/**
 * Parses `<address>[/size][:high[..low]]`. The address part uses the
 * masked address syntax; `high` defaults to the bus width minus one and
 * `low` to 0.
 */
export function parseBitRange(spec: string, busWidth: number = 32, addressWidth: number = 32): BitRange {
    let [addrPart, bitPart] = splitOnce(spec.trim(), ":");
    let size = wordShift(busWidth);
    let sizeMatch = /\/\s*([^|&]+)$/.exec(addrPart);
    if (sizeMatch != null) {
        size = parseInteger(sizeMatch[1]);
    }
    if (addrPart.trim() === "") {
        addrPart = "0";
    } else if (addrPart.trim().startsWith("/")) {
        addrPart = `0${addrPart.trim()}`;
    }
    let address = parseAddress(addrPart, { width: addressWidth, ignoreLsbs: size });

    let high = busWidth - 1;
    let low = 0;
    let scalar = false;
    if (bitPart != null) {
        let [h, l] = splitOnce(bitPart, "..");
        high = parseInteger(h);
        if (l == null) {
            low = high;
            scalar = true;
        } else {
            low = parseInteger(l);
        }
    }
    if (low < 0 || high < low) {
        throw new ConfigurationError(`invalid bit range "${spec}"`);
    }
    return { address, size, high, low, scalar };
}

export function formatBitRange(range: BitRange): string {
    let bits = range.scalar ? `${range.high}` : `${range.high}..${range.low}`;
    return `${range.address.describe()}:${bits}`;
}

function splitOnce(text: string, separator: string): [string, string | undefined] {
    let index = text.indexOf(separator);
    if (index < 0) {
        return [text, undefined];
    }
    return [text.substring(0, index), text.substring(index + separator.length)];
}
