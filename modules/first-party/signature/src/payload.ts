/**
 * Tollgate First-Party Signature Module — Secure Payloads
 *
 * The signer side (issueSecurePayload) and the parsing and digest logic the
 * module shares with it. A payload authorizes one specific invocation: the
 * digest covers the identity, the caller, the value, and the invocation's
 * call data up to (not including) the payload itself.
 */

import { createHash, sign } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { bytesToHex, concat, encodeArgs, encodeCall, hexToBytes, toBytes32, toSelector } from '@tollgate/runtime-host';
import type { AbiValue, Address, Bytes32, Selector } from '@tollgate/runtime-host';
import { EXPIRY_OFFSET, NONCE_OFFSET, SECURE_PAYLOAD_LENGTH, SIGNATURE_OFFSET } from './manifest.js';

const DIGEST_DOMAIN = new TextEncoder().encode('tollgate.signature.v1');

export interface SecurePayload {
  readonly marker: Selector;
  readonly moduleId: Bytes32;
  readonly expiry: bigint;
  readonly nonce: bigint;
  readonly signature: Uint8Array;
}

/** What a payload signature commits to. */
export interface PayloadClaim {
  readonly integration: Address;
  readonly caller: Address;
  readonly implementation: Address;
  readonly value: bigint;
  /** Call data of the guarded invocation without its trailing payload. */
  readonly invocationPrefix: Uint8Array;
  readonly expiry: bigint;
  readonly nonce: bigint;
  readonly moduleId: Bytes32;
}

export function parseSecurePayload(payload: Uint8Array): SecurePayload {
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return {
    marker: toSelector(bytesToHex(payload.subarray(0, 4))),
    moduleId: toBytes32(bytesToHex(payload.subarray(4, EXPIRY_OFFSET))),
    expiry: view.getBigUint64(EXPIRY_OFFSET),
    nonce: view.getBigUint64(NONCE_OFFSET),
    signature: payload.subarray(SIGNATURE_OFFSET, SECURE_PAYLOAD_LENGTH),
  };
}

export function payloadDigest(claim: PayloadClaim): Uint8Array {
  const invocationHash = toBytes32('0x' + createHash('sha256').update(claim.invocationPrefix).digest('hex'));
  const fields = encodeArgs(
    ['address', 'address', 'address', 'uint256', 'bytes32', 'uint64', 'uint64', 'bytes32'],
    [
      claim.integration,
      claim.caller,
      claim.implementation,
      claim.value,
      invocationHash,
      claim.expiry,
      claim.nonce,
      claim.moduleId,
    ],
  );
  return new Uint8Array(createHash('sha256').update(DIGEST_DOMAIN).update(fields).digest());
}

// ---------------------------------------------------------------------------
// Signer side
// ---------------------------------------------------------------------------

export interface SecurePayloadRequest {
  readonly integration: Address;
  readonly caller: Address;
  readonly implementation: Address;
  readonly value?: bigint;
  /** Guarded operation, e.g. `safeMint(uint256,bytes)`. */
  readonly signature: string;
  /** The operation's arguments before the payload. */
  readonly args: ReadonlyArray<AbiValue>;
  readonly marker: Selector;
  readonly moduleId: Bytes32;
  readonly expiry: bigint;
  readonly nonce: bigint;
}

/** Sign a 116-byte payload authorizing exactly the described invocation. */
export function issueSecurePayload(request: SecurePayloadRequest, privateKey: KeyObject): Uint8Array {
  const invocation = encodeCall(request.signature, [...request.args, new Uint8Array(SECURE_PAYLOAD_LENGTH)]);
  const digest = payloadDigest({
    integration: request.integration,
    caller: request.caller,
    implementation: request.implementation,
    value: request.value ?? 0n,
    invocationPrefix: invocation.subarray(0, invocation.length - SECURE_PAYLOAD_LENGTH),
    expiry: request.expiry,
    nonce: request.nonce,
    moduleId: request.moduleId,
  });

  const counters = new Uint8Array(16);
  const view = new DataView(counters.buffer);
  view.setBigUint64(0, request.expiry);
  view.setBigUint64(8, request.nonce);

  return concat([
    hexToBytes(request.marker),
    hexToBytes(request.moduleId),
    counters,
    new Uint8Array(sign(null, digest, privateKey)),
  ]);
}
