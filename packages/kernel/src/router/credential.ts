/**
 * Tollgate Kernel — Registrar Credentials
 *
 * A registrar credential is 65 bytes:
 *
 *   scheme(1) = 0x01 ‖ ed25519 signature(64)
 *
 * The signature covers the registration digest of (integration,
 * implementation, admin), so a credential issued for one identity or one
 * admin is useless for any other.
 */

import { createHash, sign, verify } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { concat, hexToBytes } from '@tollgate/runtime-host';
import type { Address } from '@tollgate/runtime-host';
import { CREDENTIAL_LENGTH, CREDENTIAL_SCHEME_ED25519 } from '../configuration/protocol.js';

const REGISTRATION_DOMAIN = new TextEncoder().encode('tollgate.registration.v1');

export interface RegistrationClaim {
  readonly integration: Address;
  readonly implementation: Address;
  readonly admin: Address;
}

/** Registrar oracle consulted by the Router before completing a registration. */
export interface CredentialVerifier {
  verify(claim: RegistrationClaim, credential: Uint8Array): boolean;
}

export function registrationDigest(claim: RegistrationClaim): Uint8Array {
  const digest = createHash('sha3-256')
    .update(REGISTRATION_DOMAIN)
    .update(hexToBytes(claim.integration))
    .update(hexToBytes(claim.implementation))
    .update(hexToBytes(claim.admin))
    .digest();
  return new Uint8Array(digest);
}

export class Ed25519CredentialVerifier implements CredentialVerifier {
  constructor(private readonly publicKey: KeyObject) {}

  verify(claim: RegistrationClaim, credential: Uint8Array): boolean {
    if (credential.length !== CREDENTIAL_LENGTH || credential[0] !== CREDENTIAL_SCHEME_ED25519) {
      return false;
    }
    return verify(null, registrationDigest(claim), this.publicKey, credential.subarray(1));
  }
}

/** Registrar side: sign a claim into a 65-byte credential. */
export function issueRegistrationCredential(claim: RegistrationClaim, privateKey: KeyObject): Uint8Array {
  const signature = sign(null, registrationDigest(claim), privateKey);
  return concat([Uint8Array.of(CREDENTIAL_SCHEME_ED25519), new Uint8Array(signature)]);
}
