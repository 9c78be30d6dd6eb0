import { NoOpMethod } from "./access_caps";
import { Behavior, BehaviorAccess, FieldAccess } from "./behavior";
import { Direction } from "./errors";

export interface PendingRequest {
    direction: Direction;
    prot: number;
    /** Written data; zero for reads */
    data: bigint;
}

export type RequestResult = { ok: true; data: bigint } | { ok: false };

/**
 * Forwards every access to an external responder. The bus request is
 * accepted immediately and completed once the responder has answered;
 * accesses are answered in the order they were made. Without `blocking`,
 * a completion that finds no answer yet becomes a slave error.
 */
export class RequestBehavior extends Behavior {
    static kind = "request";

    private _requests: PendingRequest[] = [];
    private _results: Record<Direction, RequestResult[]> = { read: [], write: [] };

    get blocking(): boolean {
        return this.boolean("blocking");
    }

    /** Requests not yet answered, oldest first */
    get requests(): readonly PendingRequest[] {
        return this._requests;
    }

    /** Answers the oldest open request */
    respond(data: bigint = 0n): void {
        this._answer({ ok: true, data: data & this.mask });
    }

    /** Fails the oldest open request */
    fail(): void {
        this._answer({ ok: false });
    }

    private _answer(result: RequestResult): void {
        let request = this._requests.shift();
        if (request == null) {
            throw new Error(`field \`${this.field.name}\` has no open request`);
        }
        this._results[request.direction].push(result);
    }

    get access(): BehaviorAccess {
        let caps = { volatile: true, canDefer: true, canBlock: this.blocking, noOpMethod: NoOpMethod.Never };
        return { read: caps, write: caps, canReadForRmw: false };
    }

    reset(): void {
        this._requests = [];
        this._results = { read: [], write: [] };
    }

    both(access: FieldAccess): void {
        this._requests.push({ direction: access.direction, prot: access.prot, data: access.data });
        access.defer();
    }

    deferred(access: FieldAccess): void {
        let result = this._results[access.direction].shift();
        if (result == null) {
            if (this.blocking) {
                access.block();
            } else {
                access.nack();
            }
        } else if (result.ok) {
            access.ack(result.data);
        } else {
            access.nack();
        }
    }
}
