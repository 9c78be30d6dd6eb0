import { NoOpMethod } from "./access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "./behavior";

/**
 * Read-only field returning a fixed `value`.
 */
export class ConstantBehavior extends Behavior {
    static kind = "constant";

    private _value: bigint = 0n;

    get value(): bigint {
        return this._value;
    }

    get access(): BehaviorAccess {
        return {
            read: { noOpMethod: NoOpMethod.Always },
            write: null,
        };
    }

    reset(): void {
        this._value = this.bigint("value");
    }

    normal(access: FieldAccess): void {
        access.ack(this._value);
    }
}
