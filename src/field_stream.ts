import { NoOpMethod } from "./access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "./behavior";

/**
 * Read side of a stream: every read pops one entry from the input queue.
 * Reading an empty queue stalls the bus when `blocking` is set and is
 * answered with a slave error otherwise.
 */
export class StreamBehavior extends Behavior {
    static kind = "stream";

    private _queue: bigint[] = [];

    get blocking(): boolean {
        return this.boolean("blocking");
    }

    /** Entries waiting to be read */
    get pending(): number {
        return this._queue.length;
    }

    push(...values: bigint[]): void {
        for (let value of values) {
            this._queue.push(value & this.mask);
        }
    }

    get access(): BehaviorAccess {
        return {
            read: { volatile: true, canBlock: this.blocking, noOpMethod: NoOpMethod.Never },
            write: null,
            canReadForRmw: false,
        };
    }

    reset(): void {
        this._queue = [];
    }

    normal(access: FieldAccess): void {
        let value = this._queue.shift();
        if (value != null) {
            access.ack(value);
        } else if (this.blocking) {
            access.block();
        } else {
            access.nack();
        }
    }
}
