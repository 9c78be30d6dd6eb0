const RE = /%([#0 +-]*)(\*|\d*)((?:\.\d+)?)([diuoxXcs%])/g;

export type SprintfValue = string | number;

function pad(value: string, width: number, fill: string, left: boolean): string {
    while (value.length < width) {
        value = left ? (value + fill) : (fill + value);
    }
    return value;
}

function formatOne(values: SprintfValue[], flags: string, s_width: string, s_prec: string, type: string): string {
    let prefix = false;
    let zero = false;
    let sign = false;
    let lalign = false;
    for (let c of flags.split("")) {
        switch (c) {
            case "#":
                prefix = true;
                break;
            case "0":
                zero = true;
                break;
            case " ":
                zero = false;
                break;
            case "+":
                sign = true;
                break;
            case "-":
                lalign = true;
                zero = false;
                break;
        }
    }
    if (type === "%") {
        return "%";
    }
    let width: number;
    if (s_width === "") {
        width = 0;
    } else if (s_width === "*") {
        width = Number(values.shift()) || 0;
    } else {
        width = parseInt(s_width);
    }
    let prec: number | null = (s_prec === "") ? null : parseInt(s_prec.substring(1));
    let p = "";
    let s = "";
    let raw = values.shift();
    let v = (raw == null) ? "" : String(raw);
    switch (type) {
        case "d":
        case "i":
        case "u":
        case "o":
        case "x":
        case "X": {
            let n = Math.trunc(Number(raw));
            if (isNaN(n)) {
                break;
            }
            let radix = (type === "o") ? 8 : (type === "x" || type === "X") ? 16 : 10;
            if (prec == null) {
                prec = (radix === 10) ? 1 : 0;
            }
            if (prec === 0 && n === 0) {
                v = "";
                break;
            }
            s = n < 0 ? "-" : sign ? "+" : "";
            v = pad(Math.abs(n).toString(radix), prec, "0", false);
            if (type === "X") {
                v = v.toUpperCase();
            }
            if (prefix) {
                if (type === "o" && v[0] !== "0") {
                    p = "0";
                } else if (type === "x") {
                    p = "0x";
                } else if (type === "X") {
                    p = "0X";
                }
            }
            break;
        }
        case "c":
            v = String.fromCharCode(Number(raw));
            break;
        case "s":
            zero = false;
            if (prec != null) {
                v = v.substring(0, prec);
            }
            break;
    }
    if (lalign) {
        return pad(s + p + v, width, " ", true);
    }
    if (zero) {
        return s + p + pad(v, width - s.length - p.length, "0", false);
    }
    return pad(s + p + v, width, " ", false);
}

export function sprintf(format: string, ...values: SprintfValue[]): string {
    return format.replace(RE, (_match: string, flags: string, width: string, prec: string, type: string) =>
        formatOne(values, flags, width, prec, type));
}

export function hex8(value: number): string {
    return `0000000${(value >>> 0).toString(16).toUpperCase()}`.slice(-8);
}

export function hex8p(value: number): string {
    return `0x${hex8(value)}`;
}

/**
 * Hexadecimal with just enough digits for the given bit width
 */
export function hexw(value: number, width: number): string {
    let digits = Math.max(1, Math.ceil(width / 4));
    return `0x${pad((value >>> 0).toString(16).toUpperCase(), digits, "0", false)}`;
}

/**
 * Binary string of exactly `width` digits (MSB first)
 */
export function bin(value: number, width: number): string {
    if (width <= 0) {
        return "";
    }
    return pad((value >>> 0).toString(2), width, "0", false).slice(-width);
}
