import { AccessCapabilities, AccessCapabilitiesInit, BusCapabilities, Permissions, PermissionFlags } from "./access_caps";
import { Behavior, BehaviorConstructor } from "./behavior";
import { BehaviorRegistry } from "./behavior_registry";
import { BitRange, bitRangeWidth, formatBitRange, parseBitRange } from "./bitrange";
import { AddressArithmeticError, ConfigurationError } from "./errors";
import { MaskedAddress, widthMask } from "./masked_address";
import { Endianness, FieldConfig } from "./regfile_config";

export interface BusGeometry {
    busWidth: number;
    addressWidth: number;
}

/**
 * A single field after repetition was expanded.
 */
export class Field {
    constructor(
        public readonly descriptor: FieldDescriptor,
        public readonly name: string,
        /** Index within the descriptor's array, or null for a scalar descriptor */
        public readonly index: number | null,
        public readonly range: BitRange,
        /** Name of the logical register the field belongs to */
        public readonly registerName: string,
    ) {
    }

    get width(): number {
        return bitRangeWidth(this.range);
    }

    get capabilities(): BusCapabilities {
        return this.descriptor.capabilities;
    }

    get endianness(): Endianness | undefined {
        return this.descriptor.config.endianness;
    }

    /** Fresh behavior instance in its reset state */
    instantiate(): Behavior {
        let behavior = new this.descriptor.behaviorClass({ name: this.name, width: this.width }, this.descriptor.config.behavior);
        behavior.reset();
        return behavior;
    }

    toString(): string {
        return `${this.name} (${formatBitRange(this.range)})`;
    }
}

function permissions(flags: Partial<PermissionFlags> | undefined, name: string, direction: string,
                     address: MaskedAddress): Permissions {
    try {
        return Permissions.fromFlags(flags);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            error.fields = [name];
            error.patterns = [address.diagnostic];
            throw error.withContext(`${direction} permissions of field \`${name}\``);
        }
        throw error;
    }
}

function positive(value: number | undefined, what: string, name: string): number | undefined {
    if (value != null && (!Number.isInteger(value) || value < 1)) {
        throw new ConfigurationError(`${what} of field \`${name}\` must be positive`);
    }
    return value;
}

/**
 * A field descriptor: the behavior and placement of one field or one array
 * of fields.
 */
export class FieldDescriptor {
    public readonly behaviorClass: BehaviorConstructor;
    public readonly base: BitRange;
    public readonly capabilities: BusCapabilities;
    public readonly fields: Field[];

    constructor(public readonly config: FieldConfig, geometry: BusGeometry, registry: BehaviorRegistry) {
        let name = config.name;
        if (!/^[a-zA-Z][a-zA-Z0-9_]*$/.test(name)) {
            throw new ConfigurationError(`invalid field name "${name}"`);
        }
        let base = parseBitRange(config.bitrange, geometry.busWidth, geometry.addressWidth);
        this.base = base;
        try {
            this.behaviorClass = registry.search(config.behavior.kind);

            // A prototype instance validates the parameters and reports the access capabilities
            let prototype = new this.behaviorClass({ name, width: bitRangeWidth(base) }, config.behavior);
            prototype.reset();
            let access = prototype.access;
            let caps = (init: AccessCapabilitiesInit | null, flags: Partial<PermissionFlags> | undefined,
                        direction: string): AccessCapabilities | null =>
                (init == null) ? null : new AccessCapabilities({
                    ...init,
                    permissions: permissions(flags, name, direction, base.address),
                });
            this.capabilities = new BusCapabilities(
                caps(access.read, config.readAllow, "read"),
                caps(access.write, config.writeAllow, "write"),
                access.canReadForRmw ?? true);

            this.fields = this._expand(geometry);
        } catch (error) {
            if (error instanceof ConfigurationError && error.patterns.length === 0) {
                error.patterns = [base.address.diagnostic];
            }
            throw error;
        }
    }

    get name(): string {
        return this.config.name;
    }

    private _expand(geometry: BusGeometry): Field[] {
        let name = this.config.name;
        let registerName = this.config.register ?? name;
        let repeat = positive(this.config.repeat, "repeat", name);
        if (repeat == null) {
            return [new Field(this, name, null, this.base, registerName)];
        }
        let width = bitRangeWidth(this.base);
        let fieldRepeat = positive(this.config.fieldRepeat, "field-repeat", name) ?? repeat;
        let fieldStride = this.config.fieldStride ?? width;
        if (Math.abs(fieldStride) < width) {
            throw new ConfigurationError(
                `field-stride is smaller than the width of a single field \`${name}\``);
        }

        // Layout of one logical register, used for the default stride
        let highest = this.base.high + Math.max(0, fieldStride * (Math.min(fieldRepeat, repeat) - 1));
        let blocks = Math.ceil((highest + 1) / geometry.busWidth);
        let blockBytes = Math.pow(2, this.base.size);
        let registerBytes = blocks * blockBytes;
        let stride = this.config.stride ?? registerBytes;
        let registers = Math.ceil(repeat / fieldRepeat);
        if (registers > 1) {
            if (stride % blockBytes !== 0) {
                throw new ConfigurationError(
                    `stride is not aligned to the ${blockBytes}-byte block size of field \`${name}\``);
            }
            if (Math.abs(stride) < registerBytes) {
                throw new ConfigurationError(
                    `stride is smaller than the ${registerBytes}-byte register of field \`${name}\``);
            }
        }

        let fields: Field[] = [];
        for (let index = 0; index < repeat; ++index) {
            let reg = Math.floor(index / fieldRepeat);
            let shift = (index % fieldRepeat) * fieldStride;
            let low = this.base.low + shift;
            if (low < 0) {
                throw new ConfigurationError(`negative bit index for field \`${name}${index}\``);
            }
            let address = this._offset(this.base.address, reg * stride / blockBytes, `${name}${index}`);
            let range: BitRange = {
                address,
                size: this.base.size,
                high: this.base.high + shift,
                low,
                scalar: this.base.scalar,
            };
            let register = (registers > 1) ? `${registerName}${reg}` : registerName;
            fields.push(new Field(this, `${name}${index}`, index, range, register));
        }
        return fields;
    }

    /**
     * Base address advanced by `blocks` blocks of the field's block size.
     */
    private _offset(base: MaskedAddress, blocks: number, fieldName: string): MaskedAddress {
        try {
            let count = Math.abs(blocks);
            if (count > widthMask(base.width)) {
                throw new AddressArithmeticError(
                    `address offset of ${blocks} blocks does not fit in ${base.width} bits`, "addition");
            }
            // The byte offset itself must be addressable
            let bytes = Math.pow(2, this.base.size);
            if (count * bytes > widthMask(base.width)) {
                throw new AddressArithmeticError(
                    `address offset of ${blocks} blocks of ${bytes} bytes does not fit in ${base.width} bits`, "shift");
            }
            return base.add(blocks);
        } catch (error) {
            if (error instanceof AddressArithmeticError) {
                error.fields = [fieldName];
                error.patterns = [base.diagnostic];
                throw error.withContext(`field \`${fieldName}\``);
            }
            throw error;
        }
    }
}
