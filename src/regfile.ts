import { AccessCapabilities } from "./access_caps";
import { AddressManager } from "./address_space";
import { BehaviorRegistry } from "./behavior_registry";
import { countBranches, DecoderNode, synthesizeDecoder } from "./decoder";
import { ConfigurationError, Direction } from "./errors";
import { Field, FieldDescriptor } from "./field";
import { MAX_WIDTH } from "./masked_address";
import { CompilerOptions, quietOptions } from "./options";
import { Block, LogicalRegister } from "./register";
import { RegisterFileConfig } from "./regfile_config";

/**
 * Everything the bus needs to serve one direction.
 */
export interface DirectionTable {
    readonly direction: Direction;
    /** Decision tree dispatching an address to its block */
    readonly decoder: DecoderNode<Block> | null;
    /** Blocks reachable in this direction, in claim order */
    readonly blocks: readonly Block[];
    readonly capabilities: ReadonlyMap<Block, AccessCapabilities>;
    /** Blocks completing deferred accesses, indexed by defer tag */
    readonly deferTags: readonly Block[];
}

export interface CompiledRegisterFile {
    readonly name: string;
    readonly config: RegisterFileConfig;
    readonly fields: readonly Field[];
    readonly registers: readonly LogicalRegister[];
    readonly blocks: readonly Block[];
    readonly read: DirectionTable;
    readonly write: DirectionTable;
}

export function directionTable(regfile: CompiledRegisterFile, direction: Direction): DirectionTable {
    return (direction === "read") ? regfile.read : regfile.write;
}

function checkGeometry(config: RegisterFileConfig): void {
    if (!/^[a-zA-Z][a-zA-Z0-9_]*$/.test(config.name)) {
        throw new ConfigurationError(`invalid register file name "${config.name}"`);
    }
    if (config.busWidth !== 32 && config.busWidth !== 64) {
        throw new ConfigurationError(`bus width must be 32 or 64, not ${config.busWidth}`);
    }
    if (!Number.isInteger(config.addressWidth) || config.addressWidth < 1 || config.addressWidth > MAX_WIDTH) {
        throw new ConfigurationError(`address width must be between 1 and ${MAX_WIDTH}, not ${config.addressWidth}`);
    }
}

function build(config: RegisterFileConfig, registry: BehaviorRegistry, options: CompilerOptions): CompiledRegisterFile {
    checkGeometry(config);
    let geometry = { busWidth: config.busWidth, addressWidth: config.addressWidth };

    let descriptors = config.fields.map((fc) => new FieldDescriptor(fc, geometry, registry));
    let fields = descriptors.flatMap((d) => d.fields);
    let names = new Set<string>();
    for (let field of fields) {
        if (names.has(field.name)) {
            let error = new ConfigurationError(`duplicate field name \`${field.name}\``);
            error.fields = [field.name];
            error.patterns = [field.range.address.diagnostic];
            throw error;
        }
        names.add(field.name);
    }
    options.printInfo(`${fields.length} field(s) from ${descriptors.length} descriptor(s)`, 2);

    let registers = LogicalRegister.group(fields, config.busWidth, config.endianness);
    let blocks = registers.flatMap((r) => r.blocks);

    let addresses = new AddressManager<Block>(config.addressWidth);
    for (let block of blocks) {
        let reg = block.register;
        addresses.claim(block.address, block, block.name, reg.read != null, reg.write != null);
    }
    addresses.freeze();

    let table = (direction: Direction): DirectionTable => {
        let space = addresses.space(direction);
        let claimed = space.entries().map((c) => c.owner);
        let capabilities = new Map<Block, AccessCapabilities>();
        let deferTags: Block[] = [];
        for (let block of claimed) {
            let caps = block.capabilities(direction);
            if (caps == null) {
                continue;
            }
            capabilities.set(block, caps);
            // Reads complete on the first block, writes on the last
            let completes = (direction === "read") ? block.isFirst : block.isLast;
            if (caps.canDefer && completes) {
                block.deferTag[direction] = deferTags.length;
                deferTags.push(block);
            }
        }
        let decoder = synthesizeDecoder(config.addressWidth,
            space.entries().map((c) => ({ pattern: c.pattern, action: c.owner, name: c.name })),
            { optimize: config.optimize });
        options.printInfo(
            `${direction} decoder: ${claimed.length} block(s), ${countBranches(decoder)} branch(es)`, 1);
        return { direction, decoder, blocks: claimed, capabilities, deferTags };
    };
    let read = table("read");
    let write = table("write");

    for (let register of registers) {
        for (let [field, method] of register.masking) {
            options.printInfo(`register ${register.name}: field ${field} is masked by ${method}`, 3);
        }
    }

    return Object.freeze({
        name: config.name,
        config,
        fields,
        registers,
        blocks,
        read: Object.freeze(read),
        write: Object.freeze(write),
    });
}

/**
 * Validates a register file description and compiles it into its blocks,
 * address spaces and decoders. Any configuration error aborts the whole
 * compilation.
 */
export function compileRegisterFile(
    config: RegisterFileConfig,
    registry: BehaviorRegistry = new BehaviorRegistry(),
    options: CompilerOptions = quietOptions(),
): CompiledRegisterFile {
    options.printInfo(`Compiling register file: ${config.name}`, 1);
    try {
        return build(config, registry, options);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            throw error.withContext(`register file \`${config.name}\``);
        }
        throw error;
    }
}
