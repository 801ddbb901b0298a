/**
 * Tollgate First-Party Signature Module
 *
 * Accepts a protected call when its payload carries a fresh Ed25519
 * signature from the module's signer over that exact invocation. Each
 * (integration, caller) pair has a sequential nonce; an accepted payload
 * consumes it, so a payload can never be replayed.
 *
 * A malformed payload reverts. A well-formed payload that is expired,
 * out of sequence or wrongly signed is denied with `false`.
 */

import { verify } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { ProtocolErrorCode, protocolError, SecurityModule } from '@tollgate/kernel';
import type { ProtectedCallRequest } from '@tollgate/kernel';
import type { Address, CallContext, Selector } from '@tollgate/runtime-host';
import {
  NONCE_OF,
  SECURE_PAYLOAD_LENGTH,
  SIGNATURE_MODULE_NAME,
  SIGNATURE_MODULE_VERSION,
  SIGNATURE_VALIDATOR,
} from './manifest.js';
import { parseSecurePayload, payloadDigest } from './payload.js';

export class SignatureModule extends SecurityModule {
  readonly marker: Selector;

  constructor(
    ctx: CallContext,
    router: Address,
    private readonly signer: KeyObject,
  ) {
    super(ctx, router, SIGNATURE_MODULE_NAME, SIGNATURE_MODULE_VERSION);
    this.marker = this.exposeValidator(SIGNATURE_VALIDATOR, (c, request) => this.validate(c, request));
    this.expose(NONCE_OF, 'view', (c, args) => c.storage.getBigInt(nonceKey(args.address(0), args.address(1))));
  }

  /**
   * @throws {RevertError} InvalidPayloadLength unless the payload is exactly 116 bytes
   */
  private validate(ctx: CallContext, request: ProtectedCallRequest): boolean {
    if (request.payload.length !== SECURE_PAYLOAD_LENGTH) {
      throw protocolError(ProtocolErrorCode.InvalidPayloadLength, {
        length: BigInt(request.payload.length),
        expected: BigInt(SECURE_PAYLOAD_LENGTH),
      });
    }
    const payload = parseSecurePayload(request.payload);
    if (ctx.timestamp > payload.expiry) return false;

    const key = nonceKey(request.integration, request.caller);
    const expected = ctx.storage.getBigInt(key);
    if (payload.nonce !== expected) return false;

    const digest = payloadDigest({
      integration: request.integration,
      caller: request.caller,
      implementation: request.implementation,
      value: request.value,
      invocationPrefix: request.invocation.subarray(0, request.invocation.length - request.payload.length),
      expiry: payload.expiry,
      nonce: payload.nonce,
      moduleId: this.moduleId,
    });
    if (!verify(null, digest, this.signer, payload.signature)) return false;

    ctx.storage.set(key, expected + 1n);
    ctx.emit('NonceConsumed', { integration: request.integration, caller: request.caller, nonce: expected });
    return true;
  }
}

function nonceKey(integration: Address, caller: Address): string {
  return `signature.nonce:${integration}:${caller}`;
}
