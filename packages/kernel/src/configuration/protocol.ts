/**
 * Tollgate Kernel — Protocol Constants
 *
 * Pure, I/O-free constants shared by the GateKeeper, Router, Integrations
 * and security modules. Everything that crosses a contract boundary by
 * signature is named here so the caller and the callee cannot drift apart.
 */

import { createHash } from 'node:crypto';
import { toBytes32 } from '@tollgate/runtime-host';
import type { AbiType, Bytes32 } from '@tollgate/runtime-host';

// ---------------------------------------------------------------------------
// Payload and credential shapes
// ---------------------------------------------------------------------------

/** Minimum protected-call payload: marker(4) + module id(32) + 28 bytes of module data. */
export const MIN_PAYLOAD_LENGTH = 64;

export const MARKER_LENGTH = 4;
export const MODULE_ID_OFFSET = 4;
export const MODULE_ID_END = 36;

/** Registrar credential: scheme tag(1) + signature(64). */
export const CREDENTIAL_LENGTH = 65;
export const CREDENTIAL_SCHEME_ED25519 = 0x01;

// ---------------------------------------------------------------------------
// GateKeeper surface
// ---------------------------------------------------------------------------

export const GATEKEEPER = {
  preRegister: 'preRegister(address)',
  completeRegistration: 'completeRegistration(address,address)',
  updateFlags: 'updateFlags(address,bytes4[],bool[])',
  isFunctionProtectionEnabled: 'isFunctionProtectionEnabled(address,bytes4)',
  functionProtectionStatus: 'functionProtectionStatus(address,address,bytes4)',
  functionProtectionStatuses: 'functionProtectionStatuses(address,address,bytes4[])',
  registrationStatus: 'registrationStatus(address,address)',
  authorizationStatus: 'authorizationStatus(address,address)',
  upgradePreAuthorization: 'upgradePreAuthorization(address,address)',
  router: 'router()',
  preAuthorizeUpgrade: 'preAuthorizeUpgrade(address,address)',
  acceptUpgrade: 'acceptUpgrade(address)',
  adminOverrideAuthorization: 'adminOverrideAuthorization(address,address,uint8)',
  adminOverrideRegistration: 'adminOverrideRegistration(address,address,uint8)',
  adminOverrideAuthorizations: 'adminOverrideAuthorizations(address[],address[],uint8[])',
  adminOverrideRegistrations: 'adminOverrideRegistrations(address[],address[],uint8[])',
} as const;

// ---------------------------------------------------------------------------
// Router surface
// ---------------------------------------------------------------------------

export const ROUTER = {
  initialize: 'initialize(address)',
  completeRegistration: 'completeRegistration(address,bytes)',
  dispatchProtectedCall: 'dispatchProtectedCall(address,address,uint256,uint256,bytes)',
  installModule: 'installModule(address)',
  deprecateModule: 'deprecateModule(bytes32)',
  moduleAddress: 'moduleAddress(bytes32)',
  setIntegrationAuthorizationStatus: 'setIntegrationAuthorizationStatus(address,address,uint8)',
  setIntegrationRegistrationStatus: 'setIntegrationRegistrationStatus(address,address,uint8)',
  setIntegrationAuthorizationStatuses: 'setIntegrationAuthorizationStatuses(address[],address[],uint8[])',
  setIntegrationRegistrationStatuses: 'setIntegrationRegistrationStatuses(address[],address[],uint8[])',
  setGateKeeper: 'setGateKeeper(address)',
  gateKeeper: 'gateKeeper()',
} as const;

// ---------------------------------------------------------------------------
// Integration surface
// ---------------------------------------------------------------------------

export const INTEGRATION = {
  securityAdmin: 'securityAdmin()',
  pendingSecurityAdmin: 'pendingSecurityAdmin()',
  registerWithDefaults: 'registerWithDefaults(bytes,bytes4[])',
  setFunctionProtectionStatus: 'setFunctionProtectionStatus(bytes4[],bool[])',
  isFunctionProtectionEnabled: 'isFunctionProtectionEnabled(bytes4)',
  functionProtectionStatuses: 'functionProtectionStatuses(bytes4[])',
  self: 'self()',
  router: 'router()',
  gateKeeper: 'gateKeeper()',
  preAuthorizeNewImplementation: 'preAuthorizeNewImplementation(address)',
  finalizeUpgrade: 'finalizeUpgrade()',
} as const;

export const ADMIN_TRANSFER = {
  transferAdministration: 'transferAdministration(address)',
  acceptAdministration: 'acceptAdministration()',
} as const;

// ---------------------------------------------------------------------------
// Security modules
// ---------------------------------------------------------------------------

/**
 * Parameter list every validator function takes:
 * (integration, caller, implementation, value, payload, invocation).
 */
export const VALIDATOR_PARAMS: ReadonlyArray<AbiType> = [
  'address',
  'address',
  'address',
  'uint256',
  'bytes',
  'bytes',
];

export const MODULE = {
  moduleId: 'moduleId()',
  moduleVersion: 'moduleVersion()',
  router: 'router()',
} as const;

/** Module identifier: SHA3-256 of `name@version`. */
export function moduleIdOf(name: string, version: string): Bytes32 {
  return toBytes32('0x' + createHash('sha3-256').update(`${name}@${version}`).digest('hex'));
}

/** Canonical signature of a validator function called `name`. */
export function validatorSignature(name: string): string {
  return `${name}(${VALIDATOR_PARAMS.join(',')})`;
}
