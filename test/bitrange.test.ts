import { describe, expect, it } from "vitest";
import { formatBitRange, parseBitRange, wordShift } from "../src/bitrange";
import { ConfigurationError } from "../src/errors";

describe("parseBitRange", () => {
    it("parses an address with a vector range", () => {
        let range = parseBitRange("0x10:7..0");
        expect(range.size).toBe(2);
        expect(range.high).toBe(7);
        expect(range.low).toBe(0);
        expect(range.scalar).toBe(false);
        expect(formatBitRange(range)).toBe("0x00000010/2:7..0");
    });

    it("distinguishes scalar bits from unit vectors", () => {
        let scalar = parseBitRange("0x10:5");
        expect(scalar.scalar).toBe(true);
        expect([scalar.high, scalar.low]).toEqual([5, 5]);
        expect(parseBitRange("0x10:5..5").scalar).toBe(false);
    });

    it("defaults to the whole bus word", () => {
        let range = parseBitRange("0x8", 64);
        expect([range.high, range.low, range.size]).toEqual([63, 0, 3]);
    });

    it("accepts explicit block sizes", () => {
        let range = parseBitRange("0x300/6");
        expect(range.size).toBe(6);
        expect(range.address.describe()).toBe("0x00000300/6");
        expect(parseBitRange("/10").address.describe()).toBe("0x00000000/10");
    });

    it("rejects inverted ranges", () => {
        expect(() => parseBitRange("0x10:3..5")).toThrow(ConfigurationError);
    });

    it("computes the word shift of a bus", () => {
        expect(wordShift(32)).toBe(2);
        expect(wordShift(64)).toBe(3);
    });
});
