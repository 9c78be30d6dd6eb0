import { NoOpMethod } from "./access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "./behavior";

const WRITE_MODES = ["enabled", "masked"] as const;

export type ControlWriteMode = typeof WRITE_MODES[number];

/**
 * Read/write register holding its value until software changes it.
 *
 * - `reset`: value after reset (default 0)
 * - `mode`: `enabled` replaces the whole field on every write, `masked`
 *   only updates the bytes selected by the write strobes
 */
export class ControlBehavior extends Behavior {
    static kind = "control";

    private _value: bigint = 0n;

    get value(): bigint {
        return this._value;
    }

    get mode(): ControlWriteMode {
        return this.choice("mode", WRITE_MODES, "masked");
    }

    get access(): BehaviorAccess {
        return {
            read: { noOpMethod: NoOpMethod.Always },
            write: {
                noOpMethod: (this.mode === "masked") ? NoOpMethod.WriteCurrentOrMask : NoOpMethod.WriteCurrent,
            },
        };
    }

    reset(): void {
        this._value = this.bigint("reset");
    }

    normal(access: FieldAccess): void {
        if (access.direction === "read") {
            access.ack(this._value);
            return;
        }
        if (this.mode === "masked") {
            this._value = (this._value & ~access.strobe) | (access.data & access.strobe);
        } else {
            this._value = access.data;
        }
        this._value &= this.mask;
        access.ack();
    }
}
