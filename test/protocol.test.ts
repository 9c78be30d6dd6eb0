import { describe, expect, it } from "vitest";
import { NoOpMethod } from "../src/access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "../src/behavior";
import { BehaviorRegistry } from "../src/behavior_registry";
import { BusResponse, strobeMask } from "../src/bus";
import { ProtocolError } from "../src/errors";
import { ControlBehavior } from "../src/field_control";
import { FlagBehavior } from "../src/field_flag";
import { RequestBehavior } from "../src/field_request";
import { StatusBehavior } from "../src/field_status";
import { StreamBehavior } from "../src/field_stream";
import { RegisterFileModel } from "../src/protocol";
import { compileRegisterFile } from "../src/regfile";
import {
    behavior, constant, control, defineField, FieldConfig, flag, request, status, stream, withDefaults,
} from "../src/regfile_config";

function model(fields: FieldConfig[], registry?: BehaviorRegistry): RegisterFileModel {
    return new RegisterFileModel(compileRegisterFile(withDefaults({ name: "t", fields }), registry));
}

class StallBehavior extends Behavior {
    static kind = "stall";

    get access(): BehaviorAccess {
        return { read: { noOpMethod: NoOpMethod.Always }, write: null };
    }

    normal(access: FieldAccess): void {
        access.block();
    }
}

class ChattyBehavior extends Behavior {
    static kind = "chatty";

    get access(): BehaviorAccess {
        return { read: { noOpMethod: NoOpMethod.Always }, write: null };
    }

    normal(access: FieldAccess): void {
        access.ack(1n);
        access.nack();
    }
}

describe("strobeMask", () => {
    it("expands byte strobes", () => {
        expect(strobeMask(0b0101, 32)).toBe(0x00ff00ffn);
        expect(strobeMask(0x80, 64)).toBe(0xff00000000000000n);
    });
});

describe("RegisterFileModel", () => {
    it("reads and writes simple registers", () => {
        let m = model([
            defineField("ctrl", "0x0:15..0", control({ reset: 0x1234 })),
            defineField("id", "0x4", constant(0xcafe)),
        ]);
        expect(m.read(0x0)).toEqual({ resp: BusResponse.OKAY, data: 0x1234n });
        expect(m.read(0x4)).toEqual({ resp: BusResponse.OKAY, data: 0xcafen });
        expect(m.write(0x0, 0xabcdn, { strobe: 0b01 })).toBe(BusResponse.OKAY);
        expect(m.behavior("ctrl", ControlBehavior).value).toBe(0x12cdn);
        expect(m.read(0x0).data).toBe(0x12cdn);
    });

    it("answers unclaimed addresses with a decode error", () => {
        let m = model([
            defineField("ctrl", "0x0:15..0", control()),
            defineField("id", "0x4", constant(1)),
        ]);
        expect(m.read(0x8)).toEqual({ resp: BusResponse.DECERR, data: 0n });
        expect(m.write(0x4, 1n)).toBe(BusResponse.DECERR);
        expect(m.write(0x100, 1n)).toBe(BusResponse.DECERR);
    });

    it("combines the fields of a register", () => {
        let m = model([
            defineField("ctrl", "0x0:7..0", control({ reset: 0x12 })),
            defineField("stat", "0x0:15..8", status()),
        ]);
        m.behavior("stat", StatusBehavior).setInput(0xabn);
        expect(m.read(0x0).data).toBe(0xab12n);
        m.write(0x0, 0xffffn);
        expect(m.behavior("ctrl", ControlBehavior).value).toBe(0xffn);
        expect(m.behavior("stat", StatusBehavior).input).toBe(0xabn);
    });

    it("clears flags written with ones", () => {
        let m = model([defineField("irq", "0x0:7..0", flag())]);
        m.behavior("irq", FlagBehavior).raise(0b101n);
        expect(m.read(0x0).data).toBe(5n);
        m.write(0x0, 1n);
        expect(m.read(0x0).data).toBe(4n);
    });

    it("skips fields the protection does not admit", () => {
        let m = model([defineField("priv", "0x0", control({ reset: 7 }), { readAllow: { user: false } })]);
        expect(m.read(0x0, 0).resp).toBe(BusResponse.DECERR);
        expect(m.read(0x0, 1)).toEqual({ resp: BusResponse.OKAY, data: 7n });
    });

    it("stalls a blocking read until data arrives", () => {
        let m = model([defineField("rx", "0x0:7..0", stream({ blocking: true }))]);
        m.bus.requestRead(0x0);
        m.run(2);
        expect(m.bus.takeReadResponse()).toBeNull();
        expect(m.bus.read.pending).toBe(1);
        m.behavior("rx", StreamBehavior).push(0x42n, 0x43n);
        m.step();
        expect(m.bus.takeReadResponse()).toEqual({ resp: BusResponse.OKAY, data: 0x42n });
        expect(m.bus.read.pending).toBe(0);
        expect(m.behavior("rx", StreamBehavior).pending).toBe(1);
        expect(m.cycles).toBe(3);
    });

    it("holds queued requests while the response slot is occupied", () => {
        let m = model([
            defineField("a", "0x0", control({ reset: 5 })),
            defineField("b", "0x4", control({ reset: 6 })),
        ]);
        m.bus.requestRead(0x0);
        m.bus.requestRead(0x4);
        m.run(4);
        expect(m.bus.read.pending).toBe(1);
        expect(m.bus.takeReadResponse()).toEqual({ resp: BusResponse.OKAY, data: 5n });
        expect(m.bus.takeReadResponse()).toBeNull();
        m.step();
        expect(m.bus.read.pending).toBe(0);
        expect(m.bus.takeReadResponse()).toEqual({ resp: BusResponse.OKAY, data: 6n });

        m.bus.requestWrite(0x0, 7n);
        m.bus.requestWrite(0x4, 8n);
        m.run(3);
        expect(m.bus.write.pending).toBe(1);
        expect(m.behavior("b", ControlBehavior).value).toBe(6n);
        expect(m.bus.takeWriteResponse()).toEqual({ resp: BusResponse.OKAY });
        m.step();
        expect(m.bus.takeWriteResponse()).toEqual({ resp: BusResponse.OKAY });
        expect(m.behavior("a", ControlBehavior).value).toBe(7n);
        expect(m.behavior("b", ControlBehavior).value).toBe(8n);
    });

    it("fails a non-blocking read of an empty stream", () => {
        let m = model([defineField("rx", "0x0:7..0", stream())]);
        expect(m.read(0x0)).toEqual({ resp: BusResponse.SLVERR, data: 0n });
    });

    it("completes deferred reads in request order", () => {
        let m = model([defineField("req", "0x0", request({ blocking: true }))]);
        for (let i = 0; i < 3; ++i) {
            m.bus.requestRead(0x0);
        }
        m.run(3);
        let req = m.behavior("req", RequestBehavior);
        expect(req.requests.length).toBe(3);
        expect(m.outstanding("read")).toBe(3);
        expect(m.bus.takeReadResponse()).toBeNull();

        req.respond(1n);
        req.respond(2n);
        req.respond(3n);
        let data: bigint[] = [];
        for (let i = 0; i < 3; ++i) {
            m.step();
            let response = m.bus.takeReadResponse();
            if (response != null) {
                data.push(response.data);
            }
        }
        expect(data).toEqual([1n, 2n, 3n]);
        expect(m.outstanding("read")).toBe(0);
    });

    it("fails a deferred access without an answer unless blocking", () => {
        let m = model([defineField("req", "0x0", request())]);
        m.bus.requestRead(0x0);
        m.step();
        expect(m.outstanding("read")).toBe(1);
        m.step();
        expect(m.bus.takeReadResponse()).toEqual({ resp: BusResponse.SLVERR, data: 0n });
    });

    it("forwards deferred writes", () => {
        let m = model([defineField("req", "0x0", request())]);
        m.bus.requestWrite(0x0, 5n);
        m.step();
        let req = m.behavior("req", RequestBehavior);
        expect(req.requests).toEqual([{ direction: "write", prot: 0, data: 5n }]);
        req.respond();
        m.step();
        expect(m.bus.takeWriteResponse()).toEqual({ resp: BusResponse.OKAY });
        req.reset();
        m.bus.requestWrite(0x0, 6n);
        m.step();
        req.fail();
        m.step();
        expect(m.bus.takeWriteResponse()).toEqual({ resp: BusResponse.SLVERR });
    });

    it("commits multi-word writes with the last word", () => {
        let m = model([defineField("wide", "0x10:63..0", control())]);
        let wide = () => m.behavior("wide", ControlBehavior).value;
        expect(m.write(0x10, 0x11111111n)).toBe(BusResponse.OKAY);
        expect(wide()).toBe(0n);
        expect(m.write(0x14, 0x22222222n)).toBe(BusResponse.OKAY);
        expect(wide()).toBe(0x2222222211111111n);
    });

    it("places the first word high in big-endian registers", () => {
        let m = model([defineField("wide", "0x10:63..0", control(), { endianness: "big" })]);
        m.write(0x10, 0xaaaaaaaan);
        m.write(0x14, 0xbbbbbbbbn);
        expect(m.behavior("wide", ControlBehavior).value).toBe(0xaaaaaaaabbbbbbbbn);
        expect(m.read(0x10).data).toBe(0xaaaaaaaan);
        expect(m.read(0x14).data).toBe(0xbbbbbbbbn);
    });

    it("serves multi-word reads from a snapshot", () => {
        let m = model([defineField("wide", "0x10:63..0", control())]);
        m.write(0x10, 0x11111111n);
        m.write(0x14, 0x22222222n);
        expect(m.read(0x10).data).toBe(0x11111111n);
        m.write(0x10, 0x33333333n);
        m.write(0x14, 0x44444444n);
        expect(m.read(0x14)).toEqual({ resp: BusResponse.OKAY, data: 0x22222222n });
        // The snapshot was released by the last word
        expect(m.read(0x14)).toEqual({ resp: BusResponse.SLVERR, data: 0n });
        expect(m.read(0x10).data).toBe(0x33333333n);
        expect(m.read(0x14).data).toBe(0x44444444n);
    });

    it("refuses less privileged accesses to held buffers", () => {
        let m = model([defineField("wide", "0x10:63..0", control())]);
        expect(m.read(0x10, 1).resp).toBe(BusResponse.OKAY);
        expect(m.read(0x14, 0)).toEqual({ resp: BusResponse.SLVERR, data: 0n });
        expect(m.read(0x14, 1).resp).toBe(BusResponse.OKAY);

        expect(m.write(0x10, 1n, { prot: 1 })).toBe(BusResponse.OKAY);
        expect(m.write(0x14, 2n, { prot: 0 })).toBe(BusResponse.SLVERR);
        expect(m.behavior("wide", ControlBehavior).value).toBe(0n);
        expect(m.write(0x14, 2n, { prot: 1 })).toBe(BusResponse.OKAY);
        expect(m.behavior("wide", ControlBehavior).value).toBe(0x0000000200000001n);
    });

    it("restores the reset state", () => {
        let m = model([defineField("ctrl", "0x0", control({ reset: 3 }))]);
        m.write(0x0, 9n);
        m.reset();
        expect(m.cycles).toBe(0);
        expect(m.read(0x0).data).toBe(3n);
    });

    it("enforces the hook contract", () => {
        let registry = new BehaviorRegistry().register(StallBehavior).register(ChattyBehavior);
        let stall = model([defineField("s", "0x0", behavior("stall"))], registry);
        expect(() => stall.read(0x0)).toThrow(ProtocolError);
        expect(() => stall.read(0x0)).toThrow("field `s` blocked but cannot block");

        let chatty = model([defineField("c", "0x0", behavior("chatty"))], registry);
        expect(() => chatty.read(0x0)).toThrow("field `c` signalled both ack and nack in its normal hook");
    });

    it("looks up behaviors by type", () => {
        let m = model([defineField("ctrl", "0x0", control())]);
        expect(() => m.behavior("nope", ControlBehavior)).toThrow("no field named `nope`");
        expect(() => m.behavior("ctrl", StreamBehavior)).toThrow("field `ctrl` is a control field, not StreamBehavior");
    });
});
