/**
 * Tollgate First-Party Signature Module — Manifest
 *
 * Identity and payload layout of the signature module.
 *
 *   marker(4) ‖ moduleId(32) ‖ expiry(8) ‖ nonce(8) ‖ ed25519 signature(64)
 *
 * 116 bytes in total. `expiry` is a block time in seconds (inclusive);
 * `nonce` must equal the module's next nonce for (integration, caller).
 */

import { moduleIdOf, validatorSignature } from '@tollgate/kernel';
import { selectorOf } from '@tollgate/runtime-host';

export const SIGNATURE_MODULE_NAME = 'signature';
export const SIGNATURE_MODULE_VERSION = '1.0.0';
export const SIGNATURE_MODULE_ID = moduleIdOf(SIGNATURE_MODULE_NAME, SIGNATURE_MODULE_VERSION);

export const SIGNATURE_VALIDATOR = 'validateSignature';
export const SIGNATURE_MARKER = selectorOf(validatorSignature(SIGNATURE_VALIDATOR));

export const EXPIRY_OFFSET = 36;
export const NONCE_OFFSET = 44;
export const SIGNATURE_OFFSET = 52;
export const SECURE_PAYLOAD_LENGTH = 116;

export const NONCE_OF = 'nonceOf(address,address)';
