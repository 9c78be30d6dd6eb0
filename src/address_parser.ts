import { ConfigurationError } from "./errors";
import { MaskedAddress, MAX_WIDTH, widthMask } from "./masked_address";

export interface AddressParseOptions {
    /** Width of the matched signal (default 32) */
    width?: number;
    /** Number of LSBs ignored unless the address gives a size */
    ignoreLsbs?: number;
}

export type AddressSpec = string | number;

/**
 * Parses an integer literal in decimal, `0x`, `0o` or `0b` notation.
 */
export function parseInteger(text: string): number {
    let t = text.trim().replace(/_/g, "");
    let negative = t.startsWith("-");
    if (negative) {
        t = t.substring(1);
    }
    let value: number;
    if (/^0x[0-9a-f]+$/i.test(t)) {
        value = parseInt(t.substring(2), 16);
    } else if (/^0o[0-7]+$/i.test(t)) {
        value = parseInt(t.substring(2), 8);
    } else if (/^0b[01]+$/i.test(t)) {
        value = parseInt(t.substring(2), 2);
    } else if (/^\d+$/.test(t)) {
        value = parseInt(t, 10);
    } else {
        throw new ConfigurationError(`invalid integer "${text}"`);
    }
    return negative ? -value : value;
}

/**
 * Expands a `0x`/`0b` literal with wildcard digits into an MSB-first
 * pattern string.
 */
function literalPattern(text: string): string | null {
    let lower = text.toLowerCase();
    if (lower.startsWith("0b")) {
        let bits = "";
        for (let c of lower.substring(2)) {
            if (c === "_") {
                continue;
            }
            if (c !== "0" && c !== "1" && c !== "-") {
                throw new ConfigurationError(`invalid binary digit "${c}" in "${text}"`);
            }
            bits += c;
        }
        return bits;
    }
    if (lower.startsWith("0x")) {
        let bits = "";
        let rest = lower.substring(2);
        while (rest.length > 0) {
            let c = rest[0];
            if (c === "_") {
                rest = rest.substring(1);
            } else if (c === "-") {
                bits += "----";
                rest = rest.substring(1);
            } else if (c === "[") {
                let m = /^\[([01-]{4})\]/.exec(rest);
                if (m == null) {
                    throw new ConfigurationError(`invalid bracketed nibble in "${text}"`);
                }
                bits += m[1];
                rest = rest.substring(6);
            } else if (/[0-9a-f]/.test(c)) {
                bits += parseInt(c, 16).toString(2).padStart(4, "0");
                rest = rest.substring(1);
            } else {
                throw new ConfigurationError(`invalid hexadecimal digit "${c}" in "${text}"`);
            }
        }
        return bits;
    }
    return null;
}

/**
 * Parses an address specification into a masked address. Accepted forms:
 * integers, `0x`/`0b` literals with `-` wildcard digits (and `[0-1-]`
 * bracketed nibbles in hex), followed optionally by `/size`, `|ignoremask`
 * or `&caremask`.
 */
export function parseAddress(spec: AddressSpec, options: AddressParseOptions = {}): MaskedAddress {
    let width = options.width ?? MAX_WIDTH;
    let full = widthMask(width);
    let ignoreLsbs = options.ignoreLsbs ?? 0;
    let defaultMask = (full & ~widthMask(Math.min(ignoreLsbs, MAX_WIDTH))) >>> 0;
    if (typeof spec === "number") {
        if (!Number.isInteger(spec) || spec < 0 || spec > full) {
            throw new ConfigurationError(`address ${spec} is out of range for ${width} bits`);
        }
        return new MaskedAddress(spec, defaultMask, width);
    }

    let text = spec.trim();
    let mask = defaultMask;
    let m = /^([^/|&]*)([/|&])(.*)$/.exec(text);
    if (m != null) {
        text = m[1].trim();
        let arg = m[3].trim();
        switch (m[2]) {
            case "/": {
                let size = parseInteger(arg);
                if (size < 0 || size > width) {
                    throw new ConfigurationError(`block size ${size} is out of range for ${width} bits`);
                }
                mask = (full & ~widthMask(size)) >>> 0;
                break;
            }
            case "|":
                mask = (full & ~parseInteger(arg)) >>> 0;
                break;
            case "&":
                mask = (full & parseInteger(arg)) >>> 0;
                break;
        }
    }

    let pattern = literalPattern(text);
    if (pattern == null) {
        let value = parseInteger(text);
        if (value < 0 || value > full) {
            throw new ConfigurationError(`address ${text} is out of range for ${width} bits`);
        }
        return new MaskedAddress(value, mask, width);
    }
    if (pattern.length > width) {
        let excess = pattern.substring(0, pattern.length - width);
        if (excess.includes("1")) {
            throw new ConfigurationError(`address ${text} is out of range for ${width} bits`);
        }
        pattern = pattern.substring(pattern.length - width);
    }
    let parsed = MaskedAddress.fromBits(pattern.padStart(width, "0"));
    let finalMask = (parsed.mask & mask) >>> 0;
    return new MaskedAddress((parsed.value & finalMask) >>> 0, finalMask, width);
}
