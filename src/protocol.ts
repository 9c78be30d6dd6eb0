import { Behavior, FieldAccess, HookPhase } from "./behavior";
import { BusChannel, BusPort, BusResponse, ReadRequest, strobeMask, WriteRequest } from "./bus";
import { evaluateDecoder } from "./decoder";
import { Direction, ProtocolError } from "./errors";
import { Field } from "./field";
import { CompilerOptions, quietOptions } from "./options";
import { directionTable, CompiledRegisterFile } from "./regfile";
import { Block, LogicalRegister } from "./register";
import { hex8p } from "./sprintf";

type Signal = "ack" | "nack" | "block" | "defer";

/** Combined result of the hooks of one register, strongest first */
type Outcome = "block" | "defer" | "nack" | "ack" | "none";

const PRECEDENCE: readonly Outcome[] = ["block", "defer", "nack", "ack", "none"];

class HookCall implements FieldAccess {
    public signal: Signal | null = null;
    public result: bigint = 0n;

    constructor(
        private readonly field: Field,
        public readonly direction: Direction,
        public readonly phase: HookPhase,
        public readonly prot: number,
        public readonly data: bigint,
        public readonly strobe: bigint,
    ) {
    }

    private _signal(signal: Signal): void {
        if (this.signal != null) {
            throw new ProtocolError(
                `field \`${this.field.name}\` signalled both ${this.signal} and ${signal} in its ${this.phase} hook`);
        }
        this.signal = signal;
    }

    ack(data: bigint = 0n): void {
        this._signal("ack");
        this.result = data;
    }

    nack(): void {
        this._signal("nack");
    }

    block(): void {
        this._signal("block");
    }

    defer(): void {
        this._signal("defer");
    }
}

/**
 * Holding buffers of one logical register.
 */
interface RegisterState {
    /** Read snapshot taken by the first block, null when none is active */
    snapshot: bigint | null;
    snapshotProt: number;
    /** Write data staged by the blocks before the last one */
    staged: bigint;
    stagedStrobe: bigint;
    staging: boolean;
    stagingProt: number;
}

interface DeferEntry {
    block: Block;
    prot: number;
}

/**
 * True when `prot` is less privileged or less secure than `held`.
 */
function lessPrivileged(prot: number, held: number): boolean {
    let privileged = (held & 1) !== 0 && (prot & 1) === 0;
    let secure = (held & 2) === 0 && (prot & 2) !== 0;
    return privileged || secure;
}

/**
 * Cycle-level model of a compiled register file: every `step()` is one
 * clock in which each direction makes at most one decision.
 */
export class RegisterFileModel {
    public readonly bus: BusPort;
    /** Clock cycles executed */
    public cycles: number = 0;

    private _behaviors = new Map<string, Behavior>();
    private _state = new Map<LogicalRegister, RegisterState>();
    private _deferred: Record<Direction, DeferEntry[]> = { read: [], write: [] };

    constructor(public readonly regfile: CompiledRegisterFile, public readonly options: CompilerOptions = quietOptions()) {
        this.bus = new BusPort(regfile.config.busWidth);
        this.reset();
    }

    reset(): void {
        this._behaviors.clear();
        for (let field of this.regfile.fields) {
            this._behaviors.set(field.name, field.instantiate());
        }
        this._state.clear();
        for (let register of this.regfile.registers) {
            this._state.set(register, {
                snapshot: null, snapshotProt: 0,
                staged: 0n, stagedStrobe: 0n, staging: false, stagingProt: 0,
            });
        }
        this._deferred = { read: [], write: [] };
        this.bus.clear();
        this.cycles = 0;
    }

    /**
     * Behavior instance of a field, checked against the expected class.
     */
    behavior<T extends Behavior>(name: string, type: new (...args: never[]) => T): T {
        let behavior = this._behaviors.get(name);
        if (behavior == null) {
            throw new Error(`no field named \`${name}\``);
        }
        if (!(behavior instanceof type)) {
            throw new Error(`field \`${name}\` is a ${behavior.kind} field, not ${type.name}`);
        }
        return behavior;
    }

    /** Accesses waiting for completion in the given direction */
    outstanding(direction: Direction): number {
        return this._deferred[direction].length;
    }

    step(): void {
        this._step("read", this.bus.read, (request) => this._read(request));
        this._step("write", this.bus.write, (request) => this._write(request));
        ++this.cycles;
    }

    run(cycles: number): void {
        for (let i = 0; i < cycles; ++i) {
            this.step();
        }
    }

    /**
     * Steps until the first read response is available and takes it.
     */
    read(address: number, prot: number = 0, maxCycles: number = 100): { resp: BusResponse; data: bigint } {
        this.bus.requestRead(address, prot);
        for (let i = 0; i < maxCycles; ++i) {
            this.step();
            let response = this.bus.takeReadResponse();
            if (response != null) {
                return response;
            }
        }
        throw new Error(`read from ${hex8p(address)} did not complete within ${maxCycles} cycles`);
    }

    /**
     * Steps until the first write response is available and takes it.
     */
    write(address: number, data: bigint, options: { strobe?: number; prot?: number } = {},
          maxCycles: number = 100): BusResponse {
        this.bus.requestWrite(address, data, options);
        for (let i = 0; i < maxCycles; ++i) {
            this.step();
            let response = this.bus.takeWriteResponse();
            if (response != null) {
                return response.resp;
            }
        }
        throw new Error(`write to ${hex8p(address)} did not complete within ${maxCycles} cycles`);
    }

    private _step<Req extends ReadRequest, Resp>(
        direction: Direction, channel: BusChannel<Req, Resp>, dispatch: (request: Req) => void,
    ): void {
        let fifo = this._deferred[direction];
        if (fifo.length > 0 && channel.ready) {
            this._complete(direction, fifo[0]);
        }
        let request = channel.head;
        if (request != null) {
            dispatch(request);
        }
    }

    /** The response of a new request could be delivered this cycle */
    private _ready(direction: Direction): boolean {
        let channel = (direction === "read") ? this.bus.read : this.bus.write;
        return channel.ready && this._deferred[direction].length === 0;
    }

    private _decode(direction: Direction, address: number): Block | null {
        let blocks = evaluateDecoder(directionTable(this.regfile, direction).decoder, address);
        return (blocks.length > 0) ? blocks[0] : null;
    }

    private _stateOf(register: LogicalRegister): RegisterState {
        let state = this._state.get(register);
        if (state == null) {
            throw new Error(`register \`${register.name}\` does not belong to this model`);
        }
        return state;
    }

    private _word(value: bigint, block: Block): bigint {
        return (value >> BigInt(block.shift)) & this.bus.dataMask;
    }

    private _read(request: ReadRequest): void {
        let ready = this._ready("read");
        let block = this._decode("read", request.address);
        if (block == null) {
            if (ready) {
                this._log(`read ${hex8p(request.address)}: decode error`);
                this.bus.read.respond({ resp: BusResponse.DECERR, data: 0n });
                this.bus.read.consume();
            }
            return;
        }
        let register = block.register;
        let state = this._stateOf(register);

        if (state.snapshot != null && lessPrivileged(request.prot, state.snapshotProt)) {
            if (ready) {
                this.bus.read.respond({ resp: BusResponse.SLVERR, data: 0n });
                this.bus.read.consume();
            }
            return;
        }

        if (!block.isFirst) {
            // Served from the snapshot of the first block
            if (!ready) {
                return;
            }
            if (state.snapshot == null) {
                this.bus.read.respond({ resp: BusResponse.SLVERR, data: 0n });
            } else {
                this.bus.read.respond({ resp: BusResponse.OKAY, data: this._word(state.snapshot, block) });
                if (block.isLast) {
                    state.snapshot = null;
                }
            }
            this.bus.read.consume();
            return;
        }

        let phase: HookPhase = ready ? "normal" : "lookahead";
        let { outcome, value } = this._invoke("read", register, phase, request.prot, 0n, 0n);
        this._log(`read ${hex8p(request.address)} (${block.name}, ${phase}): ${outcome}`);
        if (outcome === "block" || outcome === "none" && !ready) {
            return;
        }
        this.bus.read.consume();
        switch (outcome) {
            case "defer":
                this._deferred.read.push({ block, prot: request.prot });
                break;
            case "nack":
                this.bus.read.respond({ resp: BusResponse.SLVERR, data: 0n });
                break;
            case "ack":
                this._deliverRead(block, value, request.prot);
                break;
            case "none":
                this.bus.read.respond({ resp: BusResponse.DECERR, data: 0n });
                break;
        }
    }

    private _deliverRead(block: Block, value: bigint, prot: number): void {
        let register = block.register;
        if (register.isMultiWord) {
            let state = this._stateOf(register);
            state.snapshot = value;
            state.snapshotProt = prot;
        }
        this.bus.read.respond({ resp: BusResponse.OKAY, data: this._word(value, block) });
    }

    private _write(request: WriteRequest): void {
        let ready = this._ready("write");
        let block = this._decode("write", request.address);
        if (block == null) {
            if (ready) {
                this._log(`write ${hex8p(request.address)}: decode error`);
                this.bus.write.respond({ resp: BusResponse.DECERR });
                this.bus.write.consume();
            }
            return;
        }
        let register = block.register;
        let state = this._stateOf(register);

        if (state.staging && lessPrivileged(request.prot, state.stagingProt)) {
            if (ready) {
                this.bus.write.respond({ resp: BusResponse.SLVERR });
                this.bus.write.consume();
            }
            return;
        }

        let shift = BigInt(block.shift);
        let data = (state.staged & ~(this.bus.dataMask << shift)) | (request.data << shift);
        let strobe = (state.stagedStrobe & ~(this.bus.dataMask << shift))
            | (strobeMask(request.strobe, register.busWidth) << shift);

        if (!block.isLast) {
            // Staged until the last block commits the register
            if (!ready) {
                return;
            }
            if (!state.staging) {
                state.staging = true;
                state.stagingProt = request.prot;
            }
            state.staged = data;
            state.stagedStrobe = strobe;
            this.bus.write.respond({ resp: BusResponse.OKAY });
            this.bus.write.consume();
            return;
        }

        let phase: HookPhase = ready ? "normal" : "lookahead";
        let { outcome } = this._invoke("write", register, phase, request.prot, data, strobe);
        this._log(`write ${hex8p(request.address)} (${block.name}, ${phase}): ${outcome}`);
        if (outcome === "block" || outcome === "none" && !ready) {
            return;
        }
        this.bus.write.consume();
        state.staged = 0n;
        state.stagedStrobe = 0n;
        state.staging = false;
        switch (outcome) {
            case "defer":
                this._deferred.write.push({ block, prot: request.prot });
                break;
            case "nack":
                this.bus.write.respond({ resp: BusResponse.SLVERR });
                break;
            case "ack":
                this.bus.write.respond({ resp: BusResponse.OKAY });
                break;
            case "none":
                this.bus.write.respond({ resp: BusResponse.DECERR });
                break;
        }
    }

    /**
     * Delivers the completion of the oldest deferred access, unless its
     * field blocks.
     */
    private _complete(direction: Direction, entry: DeferEntry): void {
        let register = entry.block.register;
        let { outcome, value } = this._invoke(direction, register, "deferred", entry.prot, 0n, 0n);
        this._log(`${direction} completion (${entry.block.name}): ${outcome}`);
        switch (outcome) {
            case "block":
                return;
            case "none":
            case "defer":
                throw new ProtocolError(
                    `deferred ${direction} hook of register \`${register.name}\` must ack, nack or block`);
            case "nack":
                if (direction === "read") {
                    this.bus.read.respond({ resp: BusResponse.SLVERR, data: 0n });
                } else {
                    this.bus.write.respond({ resp: BusResponse.SLVERR });
                }
                break;
            case "ack":
                if (direction === "read") {
                    this._deliverRead(entry.block, value, entry.prot);
                } else {
                    this.bus.write.respond({ resp: BusResponse.OKAY });
                }
                break;
        }
        this._deferred[direction].shift();
    }

    /**
     * Runs the hooks of every field of the register that serves the
     * direction and admits the protection, and combines their signals.
     */
    private _invoke(direction: Direction, register: LogicalRegister, phase: HookPhase,
                    prot: number, data: bigint, strobe: bigint): { outcome: Outcome; value: bigint } {
        let signals = new Set<Signal>();
        let value = 0n;
        for (let field of register.fieldsFor(direction)) {
            let caps = field.capabilities.get(direction);
            if (caps == null || !caps.permissions.allows(prot)) {
                continue;
            }
            if (phase === "deferred" && !caps.canDefer) {
                continue;
            }
            let behavior = this.behavior(field.name, Behavior);
            let low = BigInt(field.range.low);
            let call = new HookCall(field, direction, phase,
                prot, (data >> low) & behavior.mask, (strobe >> low) & behavior.mask);
            switch (phase) {
                case "normal":
                    behavior.normal(call);
                    break;
                case "lookahead":
                    behavior.lookahead(call);
                    break;
                case "deferred":
                    behavior.deferred(call);
                    break;
            }
            let signal = call.signal;
            if (signal == null) {
                continue;
            }
            if (signal === "block" && !caps.canBlock) {
                throw new ProtocolError(`field \`${field.name}\` blocked but cannot block`);
            }
            if (signal === "defer" && !caps.canDefer) {
                throw new ProtocolError(`field \`${field.name}\` deferred but cannot defer`);
            }
            if (phase === "lookahead" && signal !== "defer") {
                throw new ProtocolError(`field \`${field.name}\` may only defer in its lookahead hook, not ${signal}`);
            }
            if (phase === "deferred" && signal === "defer") {
                throw new ProtocolError(`field \`${field.name}\` cannot defer a deferred access again`);
            }
            if (signal === "ack" && direction === "read") {
                value |= (call.result & behavior.mask) << low;
            }
            signals.add(signal);
        }
        let outcome = PRECEDENCE.find((o) => o !== "none" && signals.has(o)) ?? "none";
        return { outcome, value };
    }

    private _log(message: string): void {
        this.options.printInfo(`[${this.cycles}] ${message}`, 3);
    }
}
