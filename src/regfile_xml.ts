import * as xml2js from "xml2js";
import { PermissionFlags } from "./access_caps";
import { parseInteger } from "./address_parser";
import { BehaviorConfig } from "./behavior";
import { ConfigurationError } from "./errors";
import { Endianness, FieldConfig, RegisterFileConfig, withDefaults } from "./regfile_config";

interface XmlNode {
    [key: string]: unknown;
}

const PERMISSION_FLAGS: readonly (keyof PermissionFlags)[] =
    ["data", "instruction", "secure", "nonsecure", "user", "privileged"];

function isNode(value: unknown): value is XmlNode {
    return typeof value === "object" && value != null && !Array.isArray(value);
}

function children(node: XmlNode, tag: string): XmlNode[] {
    let value = node[tag];
    if (!Array.isArray(value)) {
        return [];
    }
    // Elements with neither attributes nor children come back as plain strings
    return value.map((item: unknown) => isNode(item) ? item : { _: String(item) });
}

function attributes(node: XmlNode): Map<string, string> {
    let result = new Map<string, string>();
    let attrs = node.$;
    if (isNode(attrs)) {
        for (let key of Object.keys(attrs)) {
            let value = attrs[key];
            if (typeof value === "string") {
                result.set(key, value);
            }
        }
    }
    return result;
}

function text(node: XmlNode): string {
    return (typeof node._ === "string") ? node._.trim() : "";
}

function childText(node: XmlNode, tag: string): string | undefined {
    let found = children(node, tag);
    return (found.length > 0) ? text(found[0]) : undefined;
}

function parseBoolean(value: string, what: string): boolean {
    switch (value.trim().toLowerCase()) {
        case "true":
        case "yes":
        case "1":
            return true;
        case "false":
        case "no":
        case "0":
            return false;
    }
    throw new ConfigurationError(`${what} must be true or false, not "${value}"`);
}

function parseEndianness(value: string | undefined, what: string): Endianness | undefined {
    if (value == null) {
        return undefined;
    }
    if (value !== "little" && value !== "big") {
        throw new ConfigurationError(`${what} must be "little" or "big", not "${value}"`);
    }
    return value;
}

function optionalInteger(attrs: Map<string, string>, key: string): number | undefined {
    let value = attrs.get(key);
    return (value == null) ? undefined : parseInteger(value);
}

function parsePermissions(node: XmlNode, tag: string, field: string): Partial<PermissionFlags> | undefined {
    let found = children(node, tag);
    if (found.length === 0) {
        return undefined;
    }
    let attrs = attributes(found[0]);
    let flags: Partial<PermissionFlags> = {};
    for (let flag of PERMISSION_FLAGS) {
        let value = attrs.get(flag);
        if (value != null) {
            flags[flag] = parseBoolean(value, `${tag} ${flag} of field \`${field}\``);
        }
    }
    return flags;
}

function parseField(node: XmlNode): FieldConfig {
    let attrs = attributes(node);
    let name = attrs.get("name");
    if (name == null) {
        throw new ConfigurationError("field without a name");
    }
    let kind = attrs.get("behavior");
    if (kind == null) {
        throw new ConfigurationError(`field \`${name}\` has no behavior`);
    }
    let behavior: BehaviorConfig = { kind };
    for (let param of children(node, "param")) {
        let key = attributes(param).get("name");
        if (key == null || key === "kind") {
            throw new ConfigurationError(`invalid parameter of field \`${name}\``);
        }
        behavior[key] = text(param);
    }
    let config: FieldConfig = {
        name,
        bitrange: attrs.get("bitrange") ?? attrs.get("address") ?? "0",
        behavior,
        doc: childText(node, "doc"),
        register: attrs.get("register"),
        readAllow: parsePermissions(node, "read-allow", name),
        writeAllow: parsePermissions(node, "write-allow", name),
        endianness: parseEndianness(attrs.get("endianness"), `endianness of field \`${name}\``),
        repeat: optionalInteger(attrs, "repeat"),
        fieldRepeat: optionalInteger(attrs, "field-repeat"),
        stride: optionalInteger(attrs, "stride"),
        fieldStride: optionalInteger(attrs, "field-stride"),
    };
    return config;
}

/**
 * Converts a parsed `<regfile>` document into a register file configuration.
 */
export function convertRegisterFile(document: unknown): RegisterFileConfig {
    if (!isNode(document) || !isNode(document.regfile)) {
        throw new ConfigurationError("document has no <regfile> root element");
    }
    let root = document.regfile;
    let attrs = attributes(root);
    let name = attrs.get("name");
    if (name == null) {
        throw new ConfigurationError("register file without a name");
    }
    let optimize = attrs.get("optimize");
    return withDefaults({
        name,
        doc: childText(root, "doc"),
        busWidth: optionalInteger(attrs, "bus-width"),
        addressWidth: optionalInteger(attrs, "address-width"),
        endianness: parseEndianness(attrs.get("endianness"), "endianness"),
        optimize: (optimize == null) ? undefined : parseBoolean(optimize, "optimize"),
        fields: children(root, "field").map(parseField),
    });
}

export class RegisterFileXml {
    static parse(xml: Buffer | string): Promise<RegisterFileConfig> {
        return new Promise<unknown>((resolve, reject) => {
            xml2js.parseString(xml, (error: Error | null, result: unknown) => {
                if (error != null) {
                    return reject(error);
                }
                return resolve(result);
            });
        })
        .then((document) => convertRegisterFile(document));
    }
}
