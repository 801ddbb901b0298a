/**
 * Tollgate Kernel — Protocol Error Codes
 *
 * Stable reason strings for every precondition the protocol enforces.
 * Callers match on `RevertError.reason`; the names never change meaning.
 *
 * Grouped by the component that raises them. Host-level failures
 * (NoCode, StaticStateChange, ...) live in HostErrorCode.
 */

import { RevertError } from '@tollgate/runtime-host';
import type { RevertArgs } from '@tollgate/runtime-host';

export enum ProtocolErrorCode {
  // AdminTransfer
  NotSecurityAdmin = 'NotSecurityAdmin',
  NotProtocolAdmin = 'NotProtocolAdmin',
  InvalidAdmin = 'InvalidAdmin',
  NotPendingAdmin = 'NotPendingAdmin',

  // GateKeeper / StatusLedger
  NotRouter = 'NotRouter',
  AlreadyRegistered = 'AlreadyRegistered',
  NotRegisteredPending = 'NotRegisteredPending',
  IntegrationNotRegistered = 'IntegrationNotRegistered',
  ArrayLengthMismatch = 'ArrayLengthMismatch',
  OnlyDistinctImplementation = 'OnlyDistinctImplementation',
  UpgradeNotPreAuthorized = 'UpgradeNotPreAuthorized',
  UpgradeTargetNotFresh = 'UpgradeTargetNotFresh',
  InvalidStatus = 'InvalidStatus',

  // Router
  InvalidCredentialLength = 'InvalidCredentialLength',
  InvalidRegistrarCredential = 'InvalidRegistrarCredential',
  RegistrationFailed = 'RegistrationFailed',
  IntegrationRevoked = 'IntegrationRevoked',
  IntegrationNotActive = 'IntegrationNotActive',
  ModuleNotInstalled = 'ModuleNotInstalled',
  ModuleAlreadyInstalled = 'ModuleAlreadyInstalled',
  InvalidModule = 'InvalidModule',
  GateKeeperAlreadySet = 'GateKeeperAlreadySet',
  GateKeeperNotSet = 'GateKeeperNotSet',
  InvalidGateKeeper = 'InvalidGateKeeper',

  // Integration
  DelegationNotPermitted = 'DelegationNotPermitted',
  PayloadTooShort = 'PayloadTooShort',
  ModuleDenied = 'ModuleDenied',
  DispatchFailed = 'DispatchFailed',

  // Security modules
  InvalidPayloadLength = 'InvalidPayloadLength',
}

export function protocolError(code: ProtocolErrorCode, args: RevertArgs = {}, cause?: unknown): RevertError {
  return cause === undefined ? new RevertError(code, args) : new RevertError(code, args, { cause });
}
