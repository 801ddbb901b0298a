/**
 * @tollgate/module-signature
 *
 * Tollgate first-party signature security module.
 *
 * Exports the module contract (for installation on a Router) and the
 * signer-side helper that produces its payloads.
 */

export {
  SIGNATURE_MODULE_NAME,
  SIGNATURE_MODULE_VERSION,
  SIGNATURE_MODULE_ID,
  SIGNATURE_VALIDATOR,
  SIGNATURE_MARKER,
  SECURE_PAYLOAD_LENGTH,
  NONCE_OF,
} from './manifest.js';
export type { PayloadClaim, SecurePayload, SecurePayloadRequest } from './payload.js';
export { issueSecurePayload, parseSecurePayload, payloadDigest } from './payload.js';
export { SignatureModule } from './signature-module.js';
