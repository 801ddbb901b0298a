/**
 * Tollgate Runtime Host — Contracts and Call Contexts
 *
 * A Contract is a logic unit. Its constructor receives the deployment
 * context and may fix immutable fields (its own `address` among them); all
 * mutable state lives in the storage of whichever context the code runs in.
 * Code that runs behind a proxy therefore reads and writes the proxy's
 * storage while `this.address` still names the logic unit itself.
 *
 * Functions are registered with `expose()` under their canonical signature.
 * Anything the registry does not recognise is handed to `fallback()`.
 */

import type { AbiValue } from './abi/types.js';
import type { Args } from './abi/args.js';
import { parseSignature } from './abi/signature.js';
import type { ParsedSignature } from './abi/signature.js';
import { HostErrorCode, RevertError } from './errors.js';
import type { Storage } from './state/storage.js';
import type { Address, Selector } from './types/address.js';

// ---------------------------------------------------------------------------
// Call Context
// ---------------------------------------------------------------------------

/**
 * Everything a running function can see and do.
 *
 * `address` is the storage owner ("this" for state and events);
 * `codeAddress` is the logic unit whose code is executing. The two differ
 * only inside a delegate call.
 */
export interface CallContext {
  readonly address: Address;
  readonly codeAddress: Address;
  readonly sender: Address;
  readonly origin: Address;
  readonly value: bigint;
  readonly data: Uint8Array;
  /** Block time in seconds. */
  readonly timestamp: bigint;
  readonly storage: Storage;
  readonly isStatic: boolean;

  call(target: Address, signature: string, args?: ReadonlyArray<AbiValue>, value?: bigint): AbiValue | undefined;
  staticCall(target: Address, signature: string, args?: ReadonlyArray<AbiValue>): AbiValue | undefined;
  callRaw(target: Address, data: Uint8Array, value?: bigint): AbiValue | undefined;
  /** Run `target`'s code against this context's storage. `data` defaults to this frame's call data. */
  delegateCall(target: Address, data?: Uint8Array): AbiValue | undefined;
  create<T extends Contract>(factory: ContractFactory<T>, value?: bigint): T;
  emit(name: string, fields?: Readonly<Record<string, AbiValue>>): void;
  hasCode(address: Address): boolean;
}

export type Mutability = 'view' | 'nonpayable' | 'payable';

export type FunctionHandler = (ctx: CallContext, args: Args) => AbiValue | void;

export interface ContractFunction {
  readonly signature: ParsedSignature;
  readonly mutability: Mutability;
  readonly handler: FunctionHandler;
}

export type ContractFactory<T extends Contract = Contract> = (ctx: CallContext) => T;

// ---------------------------------------------------------------------------
// Contract Base
// ---------------------------------------------------------------------------

export abstract class Contract {
  /** The address this logic unit was deployed at. Fixed for its lifetime. */
  readonly address: Address;
  private readonly functions: Map<Selector, ContractFunction> = new Map();

  constructor(ctx: CallContext) {
    this.address = ctx.address;
  }

  /**
   * Register a callable function.
   *
   * @throws {Error} If another function already claims the same selector
   */
  protected expose(signature: string, mutability: Mutability, handler: FunctionHandler): void {
    const parsed = parseSignature(signature);
    const existing = this.functions.get(parsed.selector);
    if (existing !== undefined) {
      throw new Error(
        `Selector clash: ${parsed.canonical} and ${existing.signature.canonical} both map to ${parsed.selector}`,
      );
    }
    this.functions.set(parsed.selector, { signature: parsed, mutability, handler });
  }

  lookup(selector: Selector): ContractFunction | undefined {
    return this.functions.get(selector);
  }

  /** Canonical signatures of every exposed function, in registration order. */
  signatures(): string[] {
    return [...this.functions.values()].map((fn) => fn.signature.canonical);
  }

  /** Receives calls whose selector is not exposed. Reverts by default. */
  fallback(ctx: CallContext): AbiValue | void {
    throw new RevertError(HostErrorCode.UnknownFunction, {
      contract: this.address,
      data: ctx.data.subarray(0, 4),
    });
  }
}
