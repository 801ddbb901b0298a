/**
 * Tollgate Runtime Host — Transparent Proxy
 *
 * The admin and everyone else see different surfaces:
 *   admin     may only call upgradeToAndCall(address,bytes)
 *   others    are always forwarded to the implementation
 *
 * so no implementation function can be shadowed by a proxy function.
 */

import { Args } from '../abi/args.js';
import { decodeArgs, splitCalldata } from '../abi/codec.js';
import { parseSignature } from '../abi/signature.js';
import type { AbiValue } from '../abi/types.js';
import { Contract } from '../contract.js';
import type { CallContext } from '../contract.js';
import { HostErrorCode, RevertError } from '../errors.js';
import type { Address } from '../types/address.js';
import { changeAdmin, getAdmin, upgradeToAndCall } from './slots.js';
import { requireImplementation } from './upgradeable-proxy.js';
import { UPGRADE_TO_AND_CALL } from './uups.js';

const UPGRADE = parseSignature(UPGRADE_TO_AND_CALL);

export class TransparentProxy extends Contract {
  constructor(ctx: CallContext, implementation: Address, admin: Address, data: Uint8Array = new Uint8Array(0)) {
    super(ctx);
    changeAdmin(ctx, admin);
    upgradeToAndCall(ctx, implementation, data);
  }

  override fallback(ctx: CallContext): AbiValue | void {
    if (ctx.sender !== getAdmin(ctx.storage)) {
      return ctx.delegateCall(requireImplementation(ctx));
    }
    if (ctx.data.length < 4 || splitCalldata(ctx.data).selector !== UPGRADE.selector) {
      throw new RevertError(HostErrorCode.ProxyDeniedAdminAccess, { admin: ctx.sender });
    }
    const args = new Args(UPGRADE.canonical, decodeArgs(UPGRADE.params, splitCalldata(ctx.data).body));
    upgradeToAndCall(ctx, args.address(0), args.bytes(1));
  }
}
