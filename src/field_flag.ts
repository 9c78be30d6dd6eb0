import { NoOpMethod } from "./access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "./behavior";

/**
 * Event flags: hardware sets bits, software clears them by writing ones.
 */
export class FlagBehavior extends Behavior {
    static kind = "flag";

    private _value: bigint = 0n;

    get value(): bigint {
        return this._value;
    }

    /** Sets the given bits, as a hardware event would */
    raise(bits: bigint): void {
        this._value = (this._value | bits) & this.mask;
    }

    get access(): BehaviorAccess {
        return {
            read: { noOpMethod: NoOpMethod.Always },
            write: { noOpMethod: NoOpMethod.WriteZero },
        };
    }

    reset(): void {
        this._value = 0n;
    }

    normal(access: FieldAccess): void {
        if (access.direction === "read") {
            access.ack(this._value);
            return;
        }
        this._value &= ~(access.data & access.strobe);
        access.ack();
    }
}
