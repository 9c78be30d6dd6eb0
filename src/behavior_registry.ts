import { BehaviorConstructor } from "./behavior";
import { ConfigurationError } from "./errors";
import { ConstantBehavior } from "./field_constant";
import { ControlBehavior } from "./field_control";
import { FlagBehavior } from "./field_flag";
import { RequestBehavior } from "./field_request";
import { StatusBehavior } from "./field_status";
import { StreamBehavior } from "./field_stream";

/** Behaviors shipped with the compiler */
export const BUILTIN_BEHAVIORS: readonly BehaviorConstructor[] = [
    ConstantBehavior,
    StatusBehavior,
    ControlBehavior,
    FlagBehavior,
    StreamBehavior,
    RequestBehavior,
];

/**
 * Lookup table from behavior kind to implementation. Each compilation is
 * handed the registry it resolves field behaviors against.
 */
export class BehaviorRegistry {
    private _table = new Map<string, BehaviorConstructor>();

    constructor(behaviors: readonly BehaviorConstructor[] = BUILTIN_BEHAVIORS) {
        for (let behavior of behaviors) {
            this.register(behavior);
        }
    }

    register(constructor: BehaviorConstructor): this {
        if (constructor.kind === "") {
            throw new ConfigurationError(`behavior ${constructor.name} has no kind`);
        }
        if (this._table.has(constructor.kind)) {
            throw new ConfigurationError(`behavior kind "${constructor.kind}" is registered twice`);
        }
        this._table.set(constructor.kind, constructor);
        return this;
    }

    has(kind: string): boolean {
        return this._table.has(kind);
    }

    get kinds(): string[] {
        return Array.from(this._table.keys()).sort();
    }

    search(kind: string): BehaviorConstructor {
        let constructor = this._table.get(kind);
        if (constructor == null) {
            throw new ConfigurationError(
                `unknown behavior "${kind}" (known: ${this.kinds.join(", ")})`);
        }
        return constructor;
    }
}
