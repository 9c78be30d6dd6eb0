import { describe, expect, it } from "vitest";
import { parseAddress } from "../src/address_parser";
import { countBranches, decoderLeaves, DecoderEntry, evaluateDecoder, synthesizeDecoder } from "../src/decoder";
import { DecodeConflictError } from "../src/errors";
import { MaskedAddress } from "../src/masked_address";

function word(address: number, name: string): DecoderEntry<string> {
    return { pattern: parseAddress(address, { width: 32, ignoreLsbs: 2 }), action: name, name };
}

function entry(bits: string, name: string): DecoderEntry<string> {
    return { pattern: MaskedAddress.fromBits(bits), action: name, name };
}

describe("synthesizeDecoder", () => {
    it("returns null without entries", () => {
        expect(synthesizeDecoder<string>(32, [])).toBeNull();
        expect(evaluateDecoder<string>(null, 0)).toEqual([]);
    });

    it("only tests the distinguishing bit when optimizing", () => {
        let tree = synthesizeDecoder(32, [word(0, "x"), word(4, "y")], { optimize: true });
        expect(tree).toMatchObject({
            kind: "branch", high: 2, low: 2, others: true,
            arms: [
                { literal: "0", body: { kind: "leaf", actions: ["x"] } },
                { literal: "1", body: { kind: "leaf", actions: ["y"] } },
            ],
        });
        expect(countBranches(tree)).toBe(1);
        // Unclaimed addresses alias onto a claimed one
        expect(evaluateDecoder(tree, 0x100)).toEqual(["x"]);
    });

    it("guards the remaining bits without optimization", () => {
        let tree = synthesizeDecoder(32, [word(0, "x"), word(4, "y")]);
        expect(tree).toMatchObject({
            kind: "guard", high: 31, low: 3, literal: "0".repeat(29),
            body: { kind: "branch", high: 2, low: 2 },
        });
        expect(countBranches(tree)).toBe(2);
        expect(evaluateDecoder(tree, 0)).toEqual(["x"]);
        expect(evaluateDecoder(tree, 7)).toEqual(["y"]);
        expect(evaluateDecoder(tree, 8)).toEqual([]);
        expect(evaluateDecoder(tree, 0x100)).toEqual([]);
    });

    it("rejects duplicate patterns", () => {
        let build = () => synthesizeDecoder(32, [word(0, "x"), word(4, "y"), word(0, "z")]);
        expect(build).toThrow(DecodeConflictError);
        try {
            build();
        } catch (error) {
            expect(error instanceof DecodeConflictError && error.fields).toEqual(["x", "z"]);
        }
    });

    it("merges duplicate patterns into one leaf when allowed", () => {
        let tree = synthesizeDecoder(32, [word(0, "x"), word(0, "z")], { allowDuplicate: true });
        expect(decoderLeaves(tree).map((leaf) => leaf.actions)).toEqual([["x", "z"]]);
        expect(evaluateDecoder(tree, 2)).toEqual(["x", "z"]);
    });

    it("rejects overlapping patterns", () => {
        let build = () => synthesizeDecoder(5, [entry("0-1--", "a"), entry("01---", "b")]);
        expect(build).toThrow("addresses overlap at bit 3: found both 0-#-- and 00#-- and/or 01#--");
        try {
            build();
        } catch (error) {
            expect(error instanceof DecodeConflictError && error.fields).toEqual(["a", "b"]);
        }
    });

    it("fires every matching leaf when overlap is allowed", () => {
        let tree = synthesizeDecoder(5, [entry("0-1--", "a"), entry("01---", "b")], { allowOverlap: true });
        expect(evaluateDecoder(tree, 0b01100)).toEqual(["b", "a"]);
        expect(evaluateDecoder(tree, 0b01000)).toEqual(["b"]);
        expect(evaluateDecoder(tree, 0b00100)).toEqual(["a"]);
        expect(evaluateDecoder(tree, 0b10100)).toEqual([]);
    });

    it("decodes disjoint patterns that differ in their don't cares", () => {
        let tree = synthesizeDecoder(2, [entry("-0", "a"), entry("11", "b")]);
        expect(tree?.kind).toBe("sequence");
        expect(evaluateDecoder(tree, 0)).toEqual(["a"]);
        expect(evaluateDecoder(tree, 2)).toEqual(["a"]);
        expect(evaluateDecoder(tree, 3)).toEqual(["b"]);
        expect(evaluateDecoder(tree, 1)).toEqual([]);
        let optimized = synthesizeDecoder(2, [entry("-0", "a"), entry("11", "b")], { optimize: true });
        for (let address of [0, 2, 3]) {
            expect(evaluateDecoder(optimized, address)).toEqual(evaluateDecoder(tree, address));
        }
    });

    it("rejects patterns of the wrong width", () => {
        expect(() => synthesizeDecoder(4, [entry("0-1--", "a")])).toThrow(DecodeConflictError);
    });

    it("agrees with a linear scan", () => {
        let seed = 4242;
        let random = (n: number) => {
            seed = (seed * 48271) % 2147483647;
            return seed % n;
        };
        for (let round = 0; round < 40; ++round) {
            let entries: DecoderEntry<string>[] = [];
            for (let i = 0; i < 10; ++i) {
                let bits = "";
                for (let b = 0; b < 7; ++b) {
                    bits += "01-"[random(3)];
                }
                let pattern = MaskedAddress.fromBits(bits);
                if (entries.every((e) => !e.pattern.overlaps(pattern))) {
                    entries.push({ pattern, action: `e${i}`, name: `e${i}` });
                }
            }
            let exact = synthesizeDecoder(7, entries);
            let optimized = synthesizeDecoder(7, entries, { optimize: true });
            for (let address = 0; address < 128; ++address) {
                let expected = entries.filter((e) => e.pattern.matches(address)).map((e) => e.action);
                expect(evaluateDecoder(exact, address)).toEqual(expected);
                if (expected.length > 0) {
                    expect(evaluateDecoder(optimized, address)).toEqual(expected);
                }
            }
            expect(countBranches(optimized)).toBeLessThanOrEqual(countBranches(exact));
        }
    });
});
