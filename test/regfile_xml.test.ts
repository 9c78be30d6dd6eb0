import { describe, expect, it } from "vitest";
import { BusResponse } from "../src/bus";
import { ConfigurationError } from "../src/errors";
import { RegisterFileModel } from "../src/protocol";
import { compileRegisterFile } from "../src/regfile";
import { RegisterFileXml } from "../src/regfile_xml";

const DEMO = `<?xml version="1.0"?>
<regfile name="demo" bus-width="32" endianness="little">
  <doc>Demo registers</doc>
  <field name="ctrl" bitrange="0x0:7..0" behavior="control">
    <param name="reset">0x12</param>
    <param name="mode">enabled</param>
    <write-allow user="false"/>
  </field>
  <field name="id" bitrange="0x4" behavior="constant">
    <param name="value">0xCAFE</param>
  </field>
  <field name="ch" bitrange="0x8:7..0" behavior="status" repeat="4"/>
</regfile>
`;

describe("RegisterFileXml", () => {
    it("converts a register file description", async () => {
        let config = await RegisterFileXml.parse(DEMO);
        expect(config).toMatchObject({
            name: "demo",
            doc: "Demo registers",
            busWidth: 32,
            addressWidth: 32,
            endianness: "little",
            optimize: false,
        });
        expect(config.fields.map((f) => f.name)).toEqual(["ctrl", "id", "ch"]);
        expect(config.fields[0]).toMatchObject({
            bitrange: "0x0:7..0",
            behavior: { kind: "control", reset: "0x12", mode: "enabled" },
            writeAllow: { user: false },
        });
        expect(config.fields[0].readAllow).toBeUndefined();
        expect(config.fields[2].repeat).toBe(4);
    });

    it("produces a configuration the compiler accepts", async () => {
        let regfile = compileRegisterFile(await RegisterFileXml.parse(DEMO));
        expect(regfile.fields.map((f) => f.name)).toEqual(["ctrl", "id", "ch0", "ch1", "ch2", "ch3"]);
        let m = new RegisterFileModel(regfile);
        expect(m.read(0x0).data).toBe(0x12n);
        expect(m.read(0x4).data).toBe(0xcafen);
        expect(m.write(0x0, 0x34n, { prot: 0 })).toBe(BusResponse.DECERR);
        expect(m.write(0x0, 0x34n, { prot: 1 })).toBe(BusResponse.OKAY);
        expect(m.read(0x0).data).toBe(0x34n);
    });

    it("reads the optimize flag", async () => {
        let config = await RegisterFileXml.parse(`<regfile name="x" optimize="yes" address-width="16"/>`);
        expect(config.optimize).toBe(true);
        expect(config.addressWidth).toBe(16);
        expect(config.fields).toEqual([]);
    });

    it("rejects documents without a register file", async () => {
        await expect(RegisterFileXml.parse("<other/>")).rejects.toThrow("document has no <regfile> root element");
        await expect(RegisterFileXml.parse("<regfile/>")).rejects.toThrow(ConfigurationError);
    });

    it("rejects invalid attribute values", async () => {
        await expect(RegisterFileXml.parse(`<regfile name="x" endianness="middle"/>`))
            .rejects.toThrow("endianness must be \"little\" or \"big\", not \"middle\"");
        await expect(RegisterFileXml.parse(`<regfile name="x"><field bitrange="0x0" behavior="flag"/></regfile>`))
            .rejects.toThrow("field without a name");
        await expect(RegisterFileXml.parse(`<regfile name="x"><field name="f" bitrange="0x0"/></regfile>`))
            .rejects.toThrow("field `f` has no behavior");
    });

    it("rejects malformed XML", async () => {
        await expect(RegisterFileXml.parse("<regfile name=")).rejects.toThrow();
    });
});
