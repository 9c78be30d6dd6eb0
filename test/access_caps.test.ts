import { describe, expect, it } from "vitest";
import { AccessCapabilities, BusCapabilities, NoOpMethod, Permissions } from "../src/access_caps";
import { ConfigurationError, PermissionError, SiblingConflictError } from "../src/errors";

function permutations<T>(items: T[]): T[][] {
    if (items.length <= 1) {
        return [items];
    }
    return items.flatMap((item, i) =>
        permutations(items.filter((_, j) => j !== i)).map((rest) => [item, ...rest]));
}

describe("Permissions", () => {
    it("allows everything by default", () => {
        expect(Permissions.fromFlags().mask).toBe("---");
        expect(Permissions.ALL.isProtected()).toBe(false);
    });

    it("encodes denied accesses as cared bits", () => {
        let privileged = Permissions.fromFlags({ user: false });
        expect(privileged.mask).toBe("--1");
        expect(privileged.allows(0b001)).toBe(true);
        expect(privileged.allows(0b000)).toBe(false);
        expect(privileged.isProtected()).toBe(true);
        expect(Permissions.fromFlags({ nonsecure: false, instruction: false }).mask).toBe("00-");
    });

    it("refuses to deny both sides of an axis", () => {
        let build = () => Permissions.fromFlags({ data: false, instruction: false });
        expect(build).toThrow(PermissionError);
        expect(build).toThrow("cannot deny both data and instruction accesses");
        try {
            build();
        } catch (error) {
            expect(error instanceof PermissionError && error.category).toBe("permission conflict");
        }
    });
});

describe("AccessCapabilities.checkSiblings", () => {
    let plain = new AccessCapabilities({ noOpMethod: NoOpMethod.Always });
    let blocking = new AccessCapabilities({ canBlock: true });
    let volatile = new AccessCapabilities({ volatile: true, noOpMethod: NoOpMethod.WriteZero });
    let deferring = new AccessCapabilities({ canDefer: true, volatile: true });

    it("returns null without siblings", () => {
        expect(AccessCapabilities.checkSiblings([])).toBeNull();
    });

    it("combines compatible siblings", () => {
        let combined = AccessCapabilities.checkSiblings([blocking, plain]);
        expect(combined?.canBlock).toBe(true);
        expect(combined?.volatile).toBe(false);
        expect(combined?.noOpMethod).toBe(NoOpMethod.Never);
        expect(AccessCapabilities.checkSiblings([plain, volatile])?.noOpMethod).toBe(NoOpMethod.WriteZero);
        expect(AccessCapabilities.checkSiblings([deferring])?.canDefer).toBe(true);
    });

    it("allows a single blocking field", () => {
        let demoted = new AccessCapabilities({ canBlock: false });
        expect(AccessCapabilities.checkSiblings([blocking, demoted])?.canBlock).toBe(true);
    });

    it("rejects two blocking fields", () => {
        let check = () => AccessCapabilities.checkSiblings([blocking, blocking], ["a", "b"], "read");
        expect(check).toThrow(SiblingConflictError);
        expect(check).toThrow("cannot have more than one blocking field in a single register (`a`, `b`)");
        try {
            check();
        } catch (error) {
            expect(error).toBeInstanceOf(SiblingConflictError);
            if (error instanceof SiblingConflictError) {
                expect(error.fields).toEqual(["a", "b"]);
                expect(error.direction).toBe("read");
                expect(error.category).toBe("sibling capability conflict");
            }
        }
    });

    it("rejects volatile fields next to a blocking one", () => {
        expect(() => AccessCapabilities.checkSiblings([plain, blocking, volatile], ["p", "b", "v"]))
            .toThrow("cannot have both volatile fields and blocking fields in a single register (`b`, `v`)");
    });

    it("rejects deferring fields with siblings", () => {
        expect(() => AccessCapabilities.checkSiblings([plain, deferring], ["p", "d"]))
            .toThrow("fields that can defer cannot be combined with other fields (`d`)");
    });

    it("does not depend on the order of the siblings", () => {
        let cases = [[plain, volatile, plain], [plain, blocking, plain], [blocking, volatile, plain], [deferring, plain, plain]];
        for (let siblings of cases) {
            let outcomes = permutations(siblings).map((order) => {
                try {
                    let combined = AccessCapabilities.checkSiblings(order);
                    return combined && [combined.volatile, combined.canBlock, combined.canDefer, combined.noOpMethod];
                } catch (error) {
                    return (error instanceof SiblingConflictError) ? "conflict" : "other";
                }
            });
            for (let outcome of outcomes) {
                expect(outcome).toEqual(outcomes[0]);
            }
        }
    });
});

describe("BusCapabilities", () => {
    let readable = new AccessCapabilities({ noOpMethod: NoOpMethod.Always });
    let writing = (noOpMethod: NoOpMethod) => new AccessCapabilities({ noOpMethod });

    it("needs at least one direction", () => {
        expect(() => new BusCapabilities(null, null)).toThrow("must support either or both read and write mode");
    });

    it("only accepts Always or Never for reads", () => {
        expect(() => new BusCapabilities(writing(NoOpMethod.WriteZero), null)).toThrow(ConfigurationError);
    });

    it("prefers strobes, then zero, then read-modify-write", () => {
        expect(new BusCapabilities(readable, writing(NoOpMethod.Mask)).selectMaskingMethod("f")).toBe("strobe");
        expect(new BusCapabilities(readable, writing(NoOpMethod.WriteZero)).selectMaskingMethod("f")).toBe("strobe");
        expect(new BusCapabilities(readable, writing(NoOpMethod.WriteCurrent)).selectMaskingMethod("f")).toBe("rmw");
        expect(new BusCapabilities(null, writing(NoOpMethod.Always)).selectMaskingMethod("f")).toBe("strobe");
    });

    it("reports fields that cannot be masked", () => {
        expect(() => new BusCapabilities(readable, writing(NoOpMethod.Never)).selectMaskingMethod("f"))
            .toThrow("field `f` cannot be left untouched while its siblings are written (write no-op method Never)");
        expect(() => new BusCapabilities(null, writing(NoOpMethod.WriteCurrent)).selectMaskingMethod("g"))
            .toThrow("field `g` cannot be left untouched while its siblings are written " +
                "(write no-op method WriteCurrent, not readable)");
        expect(new BusCapabilities(readable, writing(NoOpMethod.WriteCurrent), false).canMaskWithRmw()).toBe(false);
    });

    it("reports protection of either direction", () => {
        let guarded = new AccessCapabilities({ permissions: Permissions.fromFlags({ nonsecure: false }) });
        expect(new BusCapabilities(readable, guarded).isProtected()).toBe(true);
        expect(new BusCapabilities(readable, null).isProtected()).toBe(false);
    });
});
