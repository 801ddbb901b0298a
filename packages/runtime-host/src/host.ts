/**
 * Tollgate Runtime Host — Execution Host
 *
 * Runs contracts in-process against a journaled WorldState.
 *
 *   deploy / send / sendRaw   one transaction each: commit on success,
 *                             full rollback and rethrow on any failure
 *   read                      static call, never mutates state
 *
 * Every call frame takes a checkpoint and reverts to it when the frame
 * throws, so a caller that catches a sub-call failure sees none of the
 * callee's writes or events.
 *
 * Committed events are handed to the EventSink with a fresh ULID each and
 * the transaction's own ULID as `tx_id`.
 */

import { Args } from './abi/args.js';
import { encodeCall, decodeArgs, splitCalldata } from './abi/codec.js';
import type { AbiValue } from './abi/types.js';
import type { CallContext, Contract, ContractFactory } from './contract.js';
import { HostErrorCode, RevertError } from './errors.js';
import { NullEventSink, toJsonFields } from './logging/event-sink.js';
import type { EventSink } from './logging/event-sink.js';
import { ulid } from './logging/ulid.js';
import { Storage } from './state/storage.js';
import { WorldState } from './state/world-state.js';
import { accountAddress, deriveAddress, ZERO_ADDRESS } from './types/address.js';
import type { Address } from './types/address.js';
import type { HostEvent } from './types/event.js';

export const MAX_CALL_DEPTH = 64;

export interface HostOptions {
  readonly eventSink?: EventSink | undefined;
  /** Initial block time in seconds. Defaults to the wall clock. */
  readonly timestamp?: bigint | undefined;
}

export interface TxRequest {
  readonly from: Address;
  readonly to: Address;
  readonly signature: string;
  readonly args?: ReadonlyArray<AbiValue>;
  readonly value?: bigint;
}

export interface RawTxRequest {
  readonly from: Address;
  readonly to: Address;
  readonly data: Uint8Array;
  readonly value?: bigint;
}

export interface ReadRequest {
  readonly from?: Address;
  readonly to: Address;
  readonly signature: string;
  readonly args?: ReadonlyArray<AbiValue>;
}

export interface Receipt {
  readonly txId: string;
  readonly returnValue: AbiValue | undefined;
  readonly events: ReadonlyArray<HostEvent>;
}

export interface Deployment<T extends Contract> {
  readonly address: Address;
  readonly contract: T;
  readonly receipt: Receipt;
}

/** @internal */
export interface FrameParams {
  readonly address: Address;
  readonly codeAddress: Address;
  readonly sender: Address;
  readonly origin: Address;
  readonly value: bigint;
  readonly data: Uint8Array;
  readonly isStatic: boolean;
  readonly depth: number;
}

export class Host {
  private readonly world = new WorldState();
  private readonly sink: EventSink;
  private now: bigint;
  private inTransaction = false;

  constructor(options: HostOptions = {}) {
    this.sink = options.eventSink ?? new NullEventSink();
    this.now = options.timestamp ?? BigInt(Math.floor(Date.now() / 1000));
  }

  get timestamp(): bigint {
    return this.now;
  }

  /** Advance block time by `seconds`. */
  warp(seconds: bigint): void {
    this.now += seconds;
  }

  /** Deterministic account address for a label, e.g. `host.accountFor('alice')`. */
  accountFor(label: string): Address {
    return accountAddress(label);
  }

  hasCode(address: Address): boolean {
    return this.world.codeAt(address) !== undefined;
  }

  // -------------------------------------------------------------------------
  // Transactions
  // -------------------------------------------------------------------------

  deploy<T extends Contract>(from: Address, factory: ContractFactory<T>, value = 0n): Deployment<T> {
    const { result, receipt } = this.transact(() => this.createContract(factory, {
      address: from,
      codeAddress: from,
      sender: from,
      origin: from,
      value,
      data: new Uint8Array(0),
      isStatic: false,
      depth: 0,
    }));
    return { address: result.address, contract: result, receipt: { ...receipt, returnValue: result.address } };
  }

  send(request: TxRequest): Receipt {
    return this.sendRaw({
      from: request.from,
      to: request.to,
      data: encodeCall(request.signature, request.args ?? []),
      value: request.value ?? 0n,
    });
  }

  sendRaw(request: RawTxRequest): Receipt {
    const { result, receipt } = this.transact(() =>
      this.execute({
        address: request.to,
        codeAddress: request.to,
        sender: request.from,
        origin: request.from,
        value: request.value ?? 0n,
        data: request.data,
        isStatic: false,
        depth: 0,
      }),
    );
    return { ...receipt, returnValue: result };
  }

  /** Static call. Any state change inside fails with StaticStateChange. */
  read(request: ReadRequest): AbiValue | undefined {
    const from = request.from ?? ZERO_ADDRESS;
    return this.execute({
      address: request.to,
      codeAddress: request.to,
      sender: from,
      origin: from,
      value: 0n,
      data: encodeCall(request.signature, request.args ?? []),
      isStatic: true,
      depth: 0,
    });
  }

  private transact<T>(run: () => T): { result: T; receipt: Receipt } {
    if (this.inTransaction) {
      throw new Error('Host: a transaction is already in progress');
    }
    this.inTransaction = true;
    try {
      let result: T;
      try {
        result = run();
      } catch (err) {
        this.world.rollback();
        throw err;
      }
      const events = this.world.commit();
      const txId = ulid();
      this.publish(txId, events);
      return { result, receipt: { txId, returnValue: undefined, events } };
    } finally {
      this.inTransaction = false;
    }
  }

  private publish(txId: string, events: ReadonlyArray<HostEvent>): void {
    const timestamp = new Date(Number(this.now) * 1000).toISOString();
    for (const event of events) {
      this.sink.append({
        event_id: ulid(),
        tx_id: txId,
        timestamp,
        address: event.address,
        name: event.name,
        fields: toJsonFields(event.fields),
      });
    }
  }

  // -------------------------------------------------------------------------
  // Frames
  // -------------------------------------------------------------------------

  /** @internal */
  execute(params: FrameParams): AbiValue | undefined {
    if (params.depth > MAX_CALL_DEPTH) {
      throw new RevertError(HostErrorCode.CallDepthExceeded, { depth: params.depth });
    }
    const code = this.world.codeAt(params.codeAddress);
    if (code === undefined) {
      throw new RevertError(HostErrorCode.NoCode, { address: params.codeAddress });
    }
    const checkpoint = this.world.checkpoint();
    try {
      return dispatch(code, new ExecutionContext(this, this.world, params));
    } catch (err) {
      this.world.revertTo(checkpoint);
      throw err;
    }
  }

  /** @internal */
  createContract<T extends Contract>(factory: ContractFactory<T>, creator: FrameParams): T {
    if (creator.isStatic) {
      throw new RevertError(HostErrorCode.StaticStateChange, { address: creator.address, key: 'create' });
    }
    if (creator.depth > MAX_CALL_DEPTH) {
      throw new RevertError(HostErrorCode.CallDepthExceeded, { depth: creator.depth });
    }
    const checkpoint = this.world.checkpoint();
    try {
      const nonce = this.world.useNonce(creator.address);
      const address = deriveAddress(creator.address, nonce);
      const ctx = new ExecutionContext(this, this.world, {
        address,
        codeAddress: address,
        sender: creator.address,
        origin: creator.origin,
        value: creator.value,
        data: new Uint8Array(0),
        isStatic: false,
        depth: creator.depth,
      });
      const contract = factory(ctx);
      this.world.setCode(address, contract);
      return contract;
    } catch (err) {
      this.world.revertTo(checkpoint);
      throw err;
    }
  }
}

function dispatch(contract: Contract, ctx: ExecutionContext): AbiValue | undefined {
  if (ctx.data.length < 4) {
    return normalize(contract.fallback(ctx));
  }
  const { selector, body } = splitCalldata(ctx.data);
  const fn = contract.lookup(selector);
  if (fn === undefined) {
    return normalize(contract.fallback(ctx));
  }
  if (fn.mutability !== 'payable' && ctx.value > 0n) {
    throw new RevertError(HostErrorCode.NonPayable, { function: fn.signature.canonical, value: ctx.value });
  }
  const args = new Args(fn.signature.canonical, decodeArgs(fn.signature.params, body));
  const runCtx = fn.mutability === 'view' ? ctx.asStatic() : ctx;
  return normalize(fn.handler(runCtx, args));
}

function normalize(result: AbiValue | void): AbiValue | undefined {
  return result === undefined ? undefined : result;
}

// ---------------------------------------------------------------------------
// ExecutionContext
// ---------------------------------------------------------------------------

class ExecutionContext implements CallContext {
  readonly storage: Storage;

  constructor(
    private readonly host: Host,
    private readonly world: WorldState,
    private readonly params: FrameParams,
  ) {
    this.storage = new Storage(world, params.address, params.isStatic);
  }

  get address(): Address {
    return this.params.address;
  }

  get codeAddress(): Address {
    return this.params.codeAddress;
  }

  get sender(): Address {
    return this.params.sender;
  }

  get origin(): Address {
    return this.params.origin;
  }

  get value(): bigint {
    return this.params.value;
  }

  get data(): Uint8Array {
    return this.params.data;
  }

  get timestamp(): bigint {
    return this.host.timestamp;
  }

  get isStatic(): boolean {
    return this.params.isStatic;
  }

  asStatic(): ExecutionContext {
    if (this.params.isStatic) return this;
    return new ExecutionContext(this.host, this.world, { ...this.params, isStatic: true });
  }

  call(target: Address, signature: string, args: ReadonlyArray<AbiValue> = [], value = 0n): AbiValue | undefined {
    return this.callRaw(target, encodeCall(signature, args), value);
  }

  staticCall(target: Address, signature: string, args: ReadonlyArray<AbiValue> = []): AbiValue | undefined {
    return this.host.execute({
      address: target,
      codeAddress: target,
      sender: this.params.address,
      origin: this.params.origin,
      value: 0n,
      data: encodeCall(signature, args),
      isStatic: true,
      depth: this.params.depth + 1,
    });
  }

  callRaw(target: Address, data: Uint8Array, value = 0n): AbiValue | undefined {
    if (this.params.isStatic && value > 0n) {
      throw new RevertError(HostErrorCode.StaticStateChange, { address: this.params.address, key: 'value' });
    }
    return this.host.execute({
      address: target,
      codeAddress: target,
      sender: this.params.address,
      origin: this.params.origin,
      value,
      data,
      isStatic: this.params.isStatic,
      depth: this.params.depth + 1,
    });
  }

  delegateCall(target: Address, data: Uint8Array = this.params.data): AbiValue | undefined {
    return this.host.execute({
      ...this.params,
      codeAddress: target,
      data,
      depth: this.params.depth + 1,
    });
  }

  create<T extends Contract>(factory: ContractFactory<T>, value = 0n): T {
    return this.host.createContract(factory, { ...this.params, value, depth: this.params.depth + 1 });
  }

  emit(name: string, fields: Readonly<Record<string, AbiValue>> = {}): void {
    if (this.params.isStatic) {
      throw new RevertError(HostErrorCode.StaticStateChange, { address: this.params.address, event: name });
    }
    this.world.emit({ address: this.params.address, name, fields });
  }

  hasCode(address: Address): boolean {
    return this.world.codeAt(address) !== undefined;
  }
}
