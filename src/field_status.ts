import { NoOpMethod } from "./access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "./behavior";

/**
 * Read-only field reflecting a value driven by the surrounding hardware.
 */
export class StatusBehavior extends Behavior {
    static kind = "status";

    private _input: bigint = 0n;

    get input(): bigint {
        return this._input;
    }

    setInput(value: bigint): void {
        this._input = value & this.mask;
    }

    get access(): BehaviorAccess {
        return {
            read: { noOpMethod: NoOpMethod.Always },
            write: null,
        };
    }

    reset(): void {
        this._input = this.bigint("reset");
    }

    normal(access: FieldAccess): void {
        access.ack(this._input);
    }
}
