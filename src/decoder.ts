import { DecodeConflictError } from "./errors";
import { MaskedAddress } from "./masked_address";
import { bin } from "./sprintf";

export interface DecoderEntry<A> {
    pattern: MaskedAddress;
    action: A;
    /** Owner name used in diagnostics */
    name?: string;
}

export interface DecoderOptions {
    /** Addresses matching no entry are assumed never to occur */
    optimize?: boolean;
    /** Overlapping patterns are allowed; every matching leaf fires */
    allowOverlap?: boolean;
    /** Identical patterns are merged into one leaf instead of rejected */
    allowDuplicate?: boolean;
}

/** Fully matched pattern; fires its actions */
export interface DecoderLeaf<A> {
    kind: "leaf";
    pattern: MaskedAddress;
    actions: A[];
}

/** Single literal test on `address(high downto low)` */
export interface DecoderGuard<A> {
    kind: "guard";
    high: number;
    low: number;
    literal: string;
    body: DecoderNode<A>;
}

export interface DecoderArm<A> {
    literal: string;
    body: DecoderNode<A>;
}

/**
 * Multi-way selection on `address(high downto low)`. Arms are sorted by
 * ascending literal; when `others` is set, the last arm also takes every
 * value not listed.
 */
export interface DecoderBranch<A> {
    kind: "branch";
    high: number;
    low: number;
    arms: DecoderArm<A>[];
    others: boolean;
}

/** Independent decoders evaluated one after the other */
export interface DecoderSequence<A> {
    kind: "sequence";
    parts: DecoderNode<A>[];
}

export type DecoderNode<A> = DecoderLeaf<A> | DecoderGuard<A> | DecoderBranch<A> | DecoderSequence<A>;

interface Group<A> {
    pattern: MaskedAddress;
    bits: string;
    actions: A[];
    names: string[];
}

interface Candidate<A> {
    rest: string;
    group: Group<A>;
}

function commonPrefix(items: string[]): string {
    let common = items[0];
    for (let item of items.slice(1)) {
        let n = 0;
        while (n < common.length && n < item.length && common[n] === item[n]) {
            ++n;
        }
        common = common.substring(0, n);
        if (common.length === 0) {
            break;
        }
    }
    return common;
}

function commonSuffix(items: string[]): string {
    let reversed = (s: string) => s.split("").reverse().join("");
    return reversed(commonPrefix(items.map(reversed)));
}

function countWhile(text: string, predicate: (c: string) => boolean): number {
    let n = 0;
    while (n < text.length && predicate(text[n])) {
        ++n;
    }
    return n;
}

function restsOverlap(a: string, b: string): boolean {
    for (let i = 0; i < a.length; ++i) {
        if (a[i] !== "-" && b[i] !== "-" && a[i] !== b[i]) {
            return false;
        }
    }
    return true;
}

function findOverlap<A>(wild: Candidate<A>[], fixed: Candidate<A>[]): [Candidate<A>, Candidate<A>] | null {
    for (let w of wild) {
        let f = fixed.find((c) => restsOverlap(w.rest, c.rest));
        if (f != null) {
            return [w, f];
        }
    }
    return null;
}

class Synthesizer<A> {
    constructor(private width: number, private optimize: boolean, private allowOverlap: boolean) {
    }

    generate(high: number, low: number, prefix: string, suffix: string,
             cands: Candidate<A>[]): DecoderNode<A> | null {
        if (cands.length === 0) {
            return null;
        }

        if (high < low) {
            // Duplicates were merged beforehand, so one fully matched group remains
            let group = cands[0].group;
            return { kind: "leaf", pattern: group.pattern, actions: group.actions.slice() };
        }

        let rests = cands.map((c) => c.rest);

        // Common prefix: don't cares are skipped, literals become a guard
        let common = commonPrefix(rests);
        if (common.length > 0) {
            let dashes = countWhile(common, (c) => c === "-");
            if (dashes > 0) {
                return this.generate(high - dashes, low, prefix + common.substring(0, dashes), suffix,
                    cands.map((c) => ({ rest: c.rest.substring(dashes), group: c.group })));
            }
            let literal = common.substring(0, countWhile(common, (c) => c !== "-"));
            let body = this.generate(high - literal.length, low, prefix + literal, suffix,
                cands.map((c) => ({ rest: c.rest.substring(literal.length), group: c.group })));
            if (this.optimize || body == null) {
                return body;
            }
            return { kind: "guard", high, low: high - literal.length + 1, literal, body };
        }

        // Same for a common suffix
        common = commonSuffix(rests);
        if (common.length > 0) {
            let dashes = countWhile(common.split("").reverse().join(""), (c) => c === "-");
            if (dashes > 0) {
                return this.generate(high, low + dashes, prefix, common.substring(common.length - dashes) + suffix,
                    cands.map((c) => ({ rest: c.rest.substring(0, c.rest.length - dashes), group: c.group })));
            }
            let n = countWhile(common.split("").reverse().join(""), (c) => c !== "-");
            let literal = common.substring(common.length - n);
            let body = this.generate(high, low + n, prefix, literal + suffix,
                cands.map((c) => ({ rest: c.rest.substring(0, c.rest.length - n), group: c.group })));
            if (this.optimize || body == null) {
                return body;
            }
            return { kind: "guard", high: low + n - 1, low, literal, body };
        }

        // Longest MSB span where every candidate is literal
        let span = countWhile(commonPrefix(rests.map((r) => r.replace(/1/g, "0"))), (c) => c !== "-");
        if (span > 0) {
            let options = Array.from(new Set(rests.map((r) => r.substring(0, span)))).sort();
            let arms: DecoderArm<A>[] = [];
            for (let option of options) {
                let body = this.generate(high - span, low, prefix + option, suffix,
                    cands.filter((c) => c.rest.startsWith(option))
                        .map((c) => ({ rest: c.rest.substring(span), group: c.group })));
                if (body != null) {
                    arms.push({ literal: option, body });
                }
            }
            return {
                kind: "branch",
                high,
                low: high - span + 1,
                arms,
                others: this.optimize || (span === 1 && options.length === 2),
            };
        }

        // Some candidates are don't care at `high`, others literal. Unless the
        // two groups really overlap they can be decoded one after the other.
        let wild = cands.filter((c) => c.rest[0] === "-");
        let fixed = cands.filter((c) => c.rest[0] !== "-");
        let clash = findOverlap(wild, fixed);
        if (clash != null && !this.allowOverlap) {
            let [w, f] = clash;
            let hashes = "#".repeat(high - low);
            throw new DecodeConflictError(
                `addresses overlap at bit ${high}: found both ${prefix}-${hashes}${suffix} and ` +
                `${prefix}0${hashes}${suffix} and/or ${prefix}1${hashes}${suffix}`,
                w.group.names.concat(f.group.names),
                [w.group.pattern.diagnostic, f.group.pattern.diagnostic]);
        }
        // Every part is evaluated, so parts keep their guards even when optimizing
        let exact = this.optimize ? new Synthesizer<A>(this.width, false, this.allowOverlap) : this;
        let parts = [
            exact.generate(high, low, prefix, suffix, fixed),
            exact.generate(high, low, prefix, suffix, wild),
        ].filter((p): p is DecoderNode<A> => p != null);
        if (parts.length === 1) {
            return parts[0];
        }
        return { kind: "sequence", parts };
    }

    run(entries: DecoderEntry<A>[], allowDuplicate: boolean): DecoderNode<A> | null {
        let groups = new Map<string, Group<A>>();
        for (let entry of entries) {
            if (entry.pattern.width !== this.width) {
                throw new DecodeConflictError(
                    `address ${entry.pattern.describe()} is ${entry.pattern.width} bits wide, expected ${this.width}`,
                    (entry.name != null) ? [entry.name] : [], [entry.pattern.diagnostic]);
            }
            let bits = entry.pattern.bits();
            let group = groups.get(bits);
            if (group == null) {
                groups.set(bits, {
                    pattern: entry.pattern,
                    bits,
                    actions: [entry.action],
                    names: (entry.name != null) ? [entry.name] : [],
                });
                continue;
            }
            if (!allowDuplicate) {
                let names = group.names.concat((entry.name != null) ? [entry.name] : []);
                throw new DecodeConflictError(
                    `duplicate address 0b${bits}${names.length > 0 ? ` (${names.join(", ")})` : ""}`,
                    names, [group.pattern.diagnostic, entry.pattern.diagnostic]);
            }
            group.actions.push(entry.action);
            if (entry.name != null) {
                group.names.push(entry.name);
            }
        }
        let cands = Array.from(groups.values()).map((group) => ({ rest: group.bits, group }));
        return this.generate(this.width - 1, 0, "", "", cands);
    }
}

/**
 * Compiles masked address patterns into a decision tree. Returns null when
 * there are no entries.
 */
export function synthesizeDecoder<A>(
    width: number, entries: DecoderEntry<A>[], options: DecoderOptions = {},
): DecoderNode<A> | null {
    let synth = new Synthesizer<A>(width, options.optimize ?? false, options.allowOverlap ?? false);
    return synth.run(entries, options.allowDuplicate ?? false);
}

function slice(address: number, high: number, low: number): string {
    return bin(address, high + 1).substring(0, high - low + 1);
}

/**
 * Actions fired by the decoder for the given address, in tree order.
 */
export function evaluateDecoder<A>(node: DecoderNode<A> | null, address: number): A[] {
    if (node == null) {
        return [];
    }
    switch (node.kind) {
        case "leaf":
            return node.actions;
        case "guard":
            return (slice(address, node.high, node.low) === node.literal) ? evaluateDecoder(node.body, address) : [];
        case "branch": {
            let value = slice(address, node.high, node.low);
            let arm = node.arms.find((a) => a.literal === value);
            if (arm == null && node.others && node.arms.length > 0) {
                arm = node.arms[node.arms.length - 1];
            }
            return (arm != null) ? evaluateDecoder(arm.body, address) : [];
        }
        case "sequence":
            return node.parts.flatMap((part) => evaluateDecoder(part, address));
    }
}

/**
 * Number of conditional nodes (guards and branches) in the tree.
 */
export function countBranches<A>(node: DecoderNode<A> | null): number {
    if (node == null) {
        return 0;
    }
    switch (node.kind) {
        case "leaf":
            return 0;
        case "guard":
            return 1 + countBranches(node.body);
        case "branch":
            return node.arms.reduce((n, arm) => n + countBranches(arm.body), 1);
        case "sequence":
            return node.parts.reduce((n, part) => n + countBranches(part), 0);
    }
}

/**
 * Leaves of the tree in tree order.
 */
export function decoderLeaves<A>(node: DecoderNode<A> | null): DecoderLeaf<A>[] {
    if (node == null) {
        return [];
    }
    switch (node.kind) {
        case "leaf":
            return [node];
        case "guard":
            return decoderLeaves(node.body);
        case "branch":
            return node.arms.flatMap((arm) => decoderLeaves(arm.body));
        case "sequence":
            return node.parts.flatMap((part) => decoderLeaves(part));
    }
}
