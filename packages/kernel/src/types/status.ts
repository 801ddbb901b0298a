/**
 * Tollgate Kernel — Ledger Status Types
 *
 * Both statuses travel as `uint8` on the wire, so they are numeric enums.
 *
 * RegistrationStatus moves UNREGISTERED → PENDING → REGISTERED; only an
 * administrator override moves it any other way.
 *
 * AuthorizationStatus becomes ACTIVE only when registration completes (or is
 * carried across an accepted upgrade). BYPASSED and REVOKED are set by the
 * Protocol Admin alone; REVOKED blocks every protected call.
 */

import { ProtocolErrorCode, protocolError } from './errors.js';

export enum RegistrationStatus {
  UNREGISTERED = 0,
  PENDING = 1,
  REGISTERED = 2,
}

export enum AuthorizationStatus {
  INACTIVE = 0,
  ACTIVE = 1,
  BYPASSED = 2,
  REVOKED = 3,
}

/**
 * @throws {RevertError} InvalidStatus for values outside the enum
 */
export function toRegistrationStatus(value: number): RegistrationStatus {
  switch (value) {
    case RegistrationStatus.UNREGISTERED:
      return RegistrationStatus.UNREGISTERED;
    case RegistrationStatus.PENDING:
      return RegistrationStatus.PENDING;
    case RegistrationStatus.REGISTERED:
      return RegistrationStatus.REGISTERED;
    default:
      throw protocolError(ProtocolErrorCode.InvalidStatus, { kind: 'registration', value });
  }
}

/**
 * @throws {RevertError} InvalidStatus for values outside the enum
 */
export function toAuthorizationStatus(value: number): AuthorizationStatus {
  switch (value) {
    case AuthorizationStatus.INACTIVE:
      return AuthorizationStatus.INACTIVE;
    case AuthorizationStatus.ACTIVE:
      return AuthorizationStatus.ACTIVE;
    case AuthorizationStatus.BYPASSED:
      return AuthorizationStatus.BYPASSED;
    case AuthorizationStatus.REVOKED:
      return AuthorizationStatus.REVOKED;
    default:
      throw protocolError(ProtocolErrorCode.InvalidStatus, { kind: 'authorization', value });
  }
}
