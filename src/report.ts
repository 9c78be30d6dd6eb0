import dedent from "dedent";
import { AccessCapabilities } from "./access_caps";
import { countBranches } from "./decoder";
import { Field } from "./field";
import { CompiledRegisterFile } from "./regfile";
import { Block } from "./register";
import { sprintf } from "./sprintf";

const ROW = "%-14s %-2s %-16s %s";

function flags(caps: AccessCapabilities | null): string[] {
    if (caps == null) {
        return [];
    }
    let result: string[] = [];
    if (caps.volatile) {
        result.push("volatile");
    }
    if (caps.canBlock) {
        result.push("blocking");
    }
    if (caps.canDefer) {
        result.push("deferring");
    }
    return result;
}

/** Fields with at least one bit in the block's word */
function fieldsIn(block: Block): Field[] {
    let low = block.shift;
    let high = low + block.register.busWidth - 1;
    return block.register.fields.filter((f) => f.range.low <= high && f.range.high >= low);
}

function describeField(field: Field): string {
    let bits = field.range.scalar ? `${field.range.high}` : `${field.range.high}:${field.range.low}`;
    return `${field.name}[${bits}] ${field.descriptor.config.behavior.kind}`;
}

/**
 * Plain-text register map of a compiled register file.
 */
export function renderReport(regfile: CompiledRegisterFile): string {
    let config = regfile.config;
    let lines = [
        dedent`
            Register file ${regfile.name}
            Bus width ${config.busWidth}, address width ${config.addressWidth}, ${config.endianness} endian
        `,
        "",
        sprintf(ROW, "Address", "RW", "Block", "Fields"),
    ];
    let blocks = regfile.blocks.slice().sort((a, b) => a.address.value - b.address.value || a.index - b.index);
    for (let block of blocks) {
        let reg = block.register;
        let access = `${reg.read != null ? "R" : "-"}${reg.write != null ? "W" : "-"}`;
        let notes = Array.from(new Set([...flags(reg.read), ...flags(reg.write)]));
        let fields = fieldsIn(block).map(describeField).join(", ");
        lines.push(sprintf(ROW, block.address.describe(), access, block.name,
            fields + (notes.length > 0 ? ` (${notes.join(", ")})` : "")).trimEnd());
    }
    lines.push("");
    for (let table of [regfile.read, regfile.write]) {
        lines.push(`${table.direction} decoder: ${table.blocks.length} block(s), ${countBranches(table.decoder)} branch(es)`);
    }
    return lines.join("\n") + "\n";
}
