import { Direction } from "./errors";

/** Response codes of the bus (value 1 is reserved) */
export enum BusResponse {
    OKAY = 0,
    SLVERR = 2,
    DECERR = 3,
}

export interface ReadRequest {
    /** Byte address */
    address: number;
    /** 3-bit protection: instruction, nonsecure, privileged */
    prot: number;
}

export interface WriteRequest extends ReadRequest {
    data: bigint;
    /** One bit per data byte */
    strobe: number;
}

export interface ReadResponse {
    resp: BusResponse;
    data: bigint;
}

export interface WriteResponse {
    resp: BusResponse;
}

/**
 * Request queue and one-entry response slot of one bus direction. The
 * slave consumes the head request; the master takes responses out of the
 * slot, and the slave may only respond while the slot is empty.
 */
export class BusChannel<Req, Resp> {
    private _requests: Req[] = [];
    private _response: Resp | null = null;

    constructor(public readonly direction: Direction) {
    }

    push(request: Req): void {
        this._requests.push(request);
    }

    get head(): Req | undefined {
        return this._requests[0];
    }

    get pending(): number {
        return this._requests.length;
    }

    consume(): void {
        this._requests.shift();
    }

    /** The response slot is empty */
    get ready(): boolean {
        return this._response == null;
    }

    respond(response: Resp): void {
        if (this._response != null) {
            throw new Error(`${this.direction} response slot is occupied`);
        }
        this._response = response;
    }

    take(): Resp | null {
        let response = this._response;
        this._response = null;
        return response;
    }

    clear(): void {
        this._requests = [];
        this._response = null;
    }
}

export interface WriteOptions {
    strobe?: number;
    prot?: number;
}

/**
 * Slave side bus port of a register file.
 */
export class BusPort {
    public readonly read = new BusChannel<ReadRequest, ReadResponse>("read");
    public readonly write = new BusChannel<WriteRequest, WriteResponse>("write");

    constructor(public readonly busWidth: number = 32) {
    }

    /** Strobe with every byte lane enabled */
    get fullStrobe(): number {
        return Math.pow(2, this.busWidth / 8) - 1;
    }

    get dataMask(): bigint {
        return (1n << BigInt(this.busWidth)) - 1n;
    }

    requestRead(address: number, prot: number = 0): void {
        this.read.push({ address, prot: prot & 7 });
    }

    requestWrite(address: number, data: bigint, options: WriteOptions = {}): void {
        this.write.push({
            address,
            prot: (options.prot ?? 0) & 7,
            data: data & this.dataMask,
            strobe: options.strobe ?? this.fullStrobe,
        });
    }

    takeReadResponse(): ReadResponse | null {
        return this.read.take();
    }

    takeWriteResponse(): WriteResponse | null {
        return this.write.take();
    }

    clear(): void {
        this.read.clear();
        this.write.clear();
    }
}

/**
 * Expands a byte strobe into a bit mask.
 */
export function strobeMask(strobe: number, busWidth: number): bigint {
    let mask = 0n;
    for (let byte = 0; byte < busWidth / 8; ++byte) {
        if ((Math.floor(strobe / Math.pow(2, byte)) & 1) !== 0) {
            mask |= 0xffn << BigInt(byte * 8);
        }
    }
    return mask;
}
