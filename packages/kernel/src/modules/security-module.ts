/**
 * Tollgate Kernel — Security Module Base
 *
 * A security module is a contract the Router consults to decide whether a
 * protected call may proceed. Each module is identified by
 * `moduleIdOf(name, version)` and bound to one Router at deployment.
 *
 * Validators are declared with exposeValidator(); the returned selector is
 * the 4-byte marker a payload carries to reach that validator.
 */

import { Contract, selectorOf } from '@tollgate/runtime-host';
import type { Address, Bytes32, CallContext, Selector } from '@tollgate/runtime-host';
import { MODULE, moduleIdOf, validatorSignature } from '../configuration/protocol.js';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';

/** Arguments every validator receives from the Router. */
export interface ProtectedCallRequest {
  /** Address callers reach: the proxy, or the logic unit itself. */
  readonly integration: Address;
  /** Original sender of the guarded call. */
  readonly caller: Address;
  readonly implementation: Address;
  readonly value: bigint;
  /** Marker, module id and module-specific data. */
  readonly payload: Uint8Array;
  /** Full call data of the guarded call, payload included. */
  readonly invocation: Uint8Array;
}

export type ValidatorHandler = (ctx: CallContext, request: ProtectedCallRequest) => boolean;

export abstract class SecurityModule extends Contract {
  readonly moduleId: Bytes32;

  constructor(
    ctx: CallContext,
    readonly router: Address,
    readonly name: string,
    readonly version: string,
  ) {
    super(ctx);
    this.moduleId = moduleIdOf(name, version);

    this.expose(MODULE.moduleId, 'view', () => this.moduleId);
    this.expose(MODULE.moduleVersion, 'view', () => this.version);
    this.expose(MODULE.router, 'view', () => this.router);
  }

  /**
   * Register a validator callable only by the Router.
   *
   * @returns The validator's marker selector
   */
  protected exposeValidator(name: string, handler: ValidatorHandler): Selector {
    const signature = validatorSignature(name);
    this.expose(signature, 'nonpayable', (c, args) => {
      if (c.sender !== this.router) {
        throw protocolError(ProtocolErrorCode.NotRouter, { account: c.sender });
      }
      return handler(c, {
        integration: args.address(0),
        caller: args.address(1),
        implementation: args.address(2),
        value: args.uint(3),
        payload: args.bytes(4),
        invocation: args.bytes(5),
      });
    });
    return selectorOf(signature);
  }
}
