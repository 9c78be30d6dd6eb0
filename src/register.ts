import { AccessCapabilities, MaskingMethod } from "./access_caps";
import { AddressArithmeticError, ConfigurationError, Direction } from "./errors";
import { Field } from "./field";
import { MaskedAddress } from "./masked_address";
import { Endianness } from "./regfile_config";

const DIRECTIONS: readonly Direction[] = ["read", "write"];

/**
 * One bus word of a logical register.
 */
export class Block {
    /** Index into the register file's defer tag table, when the block completes deferred accesses */
    public readonly deferTag: { read: number | null; write: number | null } = { read: null, write: null };

    constructor(
        public readonly register: LogicalRegister,
        public readonly index: number,
        public readonly address: MaskedAddress,
    ) {
    }

    get name(): string {
        return (this.register.blocks.length > 1) ? `${this.register.name}.${this.index}` : this.register.name;
    }

    get isFirst(): boolean {
        return this.index === 0;
    }

    get isLast(): boolean {
        return this.index === this.register.blocks.length - 1;
    }

    /** Position of this block's word in the register value */
    get shift(): number {
        let word = (this.register.endianness === "little") ? this.index : this.register.blocks.length - 1 - this.index;
        return word * this.register.busWidth;
    }

    capabilities(direction: Direction): AccessCapabilities | null {
        return this.register.capabilities(direction);
    }

    toString(): string {
        return `${this.name} @ ${this.address.describe()}`;
    }
}

/**
 * Fields sharing one base address, accessed through one or more blocks.
 * Construction validates the combination of fields.
 */
export class LogicalRegister {
    public readonly address: MaskedAddress;
    public readonly blocks: Block[];
    public readonly read: AccessCapabilities | null;
    public readonly write: AccessCapabilities | null;
    /** How each write field is left untouched while a sibling is written */
    public readonly masking = new Map<string, MaskingMethod>();

    constructor(
        public readonly name: string,
        public readonly fields: readonly Field[],
        public readonly busWidth: number,
        public readonly endianness: Endianness,
    ) {
        if (fields.length === 0) {
            throw new ConfigurationError(`register \`${name}\` has no fields`);
        }
        this.address = fields[0].range.address;
        let where = `register \`${name}\` at ${this.address.describe()}`;
        for (let direction of DIRECTIONS) {
            try {
                this._checkBits(direction);
            } catch (error) {
                if (error instanceof ConfigurationError) {
                    error.patterns = [this.address.diagnostic];
                    throw error.withContext(where);
                }
                throw error;
            }
        }

        let combined = (direction: Direction): AccessCapabilities | null => {
            let members = this.fieldsFor(direction);
            try {
                return AccessCapabilities.checkSiblings(
                    members.flatMap((f) => {
                        let caps = f.capabilities.get(direction);
                        return (caps != null) ? [caps] : [];
                    }),
                    members.map((f) => f.name),
                    direction);
            } catch (error) {
                if (error instanceof ConfigurationError) {
                    error.patterns = [this.address.diagnostic];
                    throw error.withContext(`${where} (${direction} mode)`);
                }
                throw error;
            }
        };
        this.read = combined("read");
        this.write = combined("write");

        let writers = this.fieldsFor("write");
        if (writers.length > 1) {
            for (let field of writers) {
                try {
                    this.masking.set(field.name, field.capabilities.selectMaskingMethod(field.name));
                } catch (error) {
                    if (error instanceof ConfigurationError) {
                        error.patterns = [this.address.diagnostic];
                        throw error.withContext(where);
                    }
                    throw error;
                }
            }
        }

        let msb = Math.max(...fields.map((f) => f.range.high));
        let count = Math.ceil((msb + 1) / busWidth);
        this.blocks = [];
        for (let index = 0; index < count; ++index) {
            let address: MaskedAddress;
            try {
                address = this.address.add(index);
            } catch (error) {
                if (error instanceof AddressArithmeticError) {
                    error.fields = fields.map((f) => f.name);
                    error.patterns = [this.address.diagnostic];
                    throw error.withContext(`block ${index} of register \`${name}\``);
                }
                throw error;
            }
            this.blocks.push(new Block(this, index, address));
        }
    }

    /**
     * Groups fields by base address and block size into registers.
     */
    static group(fields: readonly Field[], busWidth: number, defaultEndianness: Endianness): LogicalRegister[] {
        let groups = new Map<string, Field[]>();
        for (let field of fields) {
            let key = `${field.range.address.format()}/${field.range.size}`;
            let group = groups.get(key);
            if (group == null) {
                groups.set(key, [field]);
            } else {
                group.push(field);
            }
        }
        return Array.from(groups.values()).map((group) => {
            let declared = Array.from(new Set(group.flatMap((f) => (f.endianness != null) ? [f.endianness] : [])));
            let name = group[0].registerName;
            if (declared.length > 1) {
                let address = group[0].range.address;
                let error = new ConfigurationError(
                    `conflicting endianness declarations for register \`${name}\` at ${address.describe()}`);
                error.fields = group.filter((f) => f.endianness != null).map((f) => f.name);
                error.patterns = [address.diagnostic];
                throw error;
            }
            return new LogicalRegister(name, group, busWidth, declared[0] ?? defaultEndianness);
        });
    }

    /** Width of the register value in bits */
    get width(): number {
        return this.blocks.length * this.busWidth;
    }

    get isMultiWord(): boolean {
        return this.blocks.length > 1;
    }

    capabilities(direction: Direction): AccessCapabilities | null {
        return (direction === "read") ? this.read : this.write;
    }

    fieldsFor(direction: Direction): Field[] {
        return this.fields.filter((f) => f.capabilities.get(direction) != null);
    }

    /** Fields claiming bits in the given direction must not overlap */
    private _checkBits(direction: Direction): void {
        let owners = new Map<number, Field>();
        for (let field of this.fieldsFor(direction)) {
            for (let bit = field.range.low; bit <= field.range.high; ++bit) {
                let other = owners.get(bit);
                if (other != null) {
                    let error = new ConfigurationError(
                        `fields \`${other.name}\` and \`${field.name}\` overlap in ${direction} mode at bit ${bit}`);
                    error.fields = [other.name, field.name];
                    error.direction = direction;
                    throw error;
                }
                owners.set(bit, field);
            }
        }
    }
}
