import { PermissionFlags } from "./access_caps";
import { BehaviorConfig, ParamValue } from "./behavior";

export type Endianness = "little" | "big";

/**
 * One field descriptor; with `repeat` set it describes an array of fields
 * named `<name>0`, `<name>1`, ...
 */
export interface FieldConfig {
    name: string;
    /** Bit range `<address>[/size][:high[..low]]` of the first field */
    bitrange: string;
    behavior: BehaviorConfig;
    doc?: string;
    /** Name of the logical register; defaults to the first field's name */
    register?: string;
    readAllow?: Partial<PermissionFlags>;
    writeAllow?: Partial<PermissionFlags>;
    /** Word order of registers wider than the bus */
    endianness?: Endianness;
    /** Number of fields described */
    repeat?: number;
    /** Fields placed in one logical register before moving on (default all) */
    fieldRepeat?: number;
    /** Bytes between consecutive logical registers (default the register size) */
    stride?: number;
    /** Bits between consecutive fields within a register (default the field width) */
    fieldStride?: number;
}

export interface RegisterFileConfig {
    name: string;
    doc?: string;
    /** 32 or 64 */
    busWidth: number;
    addressWidth: number;
    endianness: Endianness;
    /** Let decoders assume unclaimed addresses are never accessed */
    optimize: boolean;
    fields: FieldConfig[];
}

export type RegisterFileInit = Partial<Omit<RegisterFileConfig, "name" | "fields">> & {
    name: string;
    fields?: FieldConfig[];
};

export function withDefaults(init: RegisterFileInit): RegisterFileConfig {
    return {
        name: init.name,
        doc: init.doc,
        busWidth: init.busWidth ?? 32,
        addressWidth: init.addressWidth ?? 32,
        endianness: init.endianness ?? "little",
        optimize: init.optimize ?? false,
        fields: init.fields ?? [],
    };
}

export function defineField(
    name: string, bitrange: string, behavior: BehaviorConfig,
    options: Partial<Omit<FieldConfig, "name" | "bitrange" | "behavior">> = {},
): FieldConfig {
    return { name, bitrange, behavior, ...options };
}

export function behavior(kind: string, params: { [param: string]: ParamValue } = {}): BehaviorConfig {
    return { ...params, kind };
}

export function constant(value: bigint | number): BehaviorConfig {
    return behavior("constant", { value: value.toString() });
}

export function status(): BehaviorConfig {
    return behavior("status");
}

export function control(options: { reset?: bigint | number; mode?: "enabled" | "masked" } = {}): BehaviorConfig {
    let params: { [param: string]: ParamValue } = {};
    if (options.reset != null) {
        params.reset = options.reset.toString();
    }
    if (options.mode != null) {
        params.mode = options.mode;
    }
    return behavior("control", params);
}

export function flag(): BehaviorConfig {
    return behavior("flag");
}

export function stream(options: { blocking?: boolean } = {}): BehaviorConfig {
    return behavior("stream", { blocking: options.blocking ?? false });
}

export function request(options: { blocking?: boolean } = {}): BehaviorConfig {
    return behavior("request", { blocking: options.blocking ?? false });
}
