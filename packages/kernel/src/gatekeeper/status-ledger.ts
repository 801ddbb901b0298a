/**
 * Tollgate Kernel — Status Ledger
 *
 * Storage layout and transition table for Integration identities. An
 * identity is the pair (integration, implementation): the address callers
 * reach (a proxy, or the logic unit itself) and the logic unit's own
 * address.
 *
 * The ledger enforces transitions; GateKeeper decides who may ask for them
 * and emits the events. Every multi-entry write validates all of its input
 * before touching storage.
 *
 *   registration    UNREGISTERED → PENDING → REGISTERED
 *                   PENDING → PENDING is allowed (re-announce)
 *                   REGISTERED → PENDING fails (AlreadyRegistered)
 *   authorization   INACTIVE → ACTIVE on registration only;
 *                   everything else by override
 */

import type { Address, Selector, Storage } from '@tollgate/runtime-host';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';
import { AuthorizationStatus, RegistrationStatus, toAuthorizationStatus, toRegistrationStatus } from '../types/status.js';

export interface StatusChange<S> {
  readonly integration: Address;
  readonly implementation: Address;
  readonly status: S;
}

export interface UpgradeAcceptance {
  readonly previousImplementation: Address;
  readonly authorization: AuthorizationStatus;
}

export class StatusLedger {
  constructor(private readonly storage: Storage) {}

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  registration(integration: Address, implementation: Address): RegistrationStatus {
    return toRegistrationStatus(this.storage.getNumber(registrationKey(integration, implementation)));
  }

  authorization(integration: Address, implementation: Address): AuthorizationStatus {
    return toAuthorizationStatus(this.storage.getNumber(authorizationKey(integration, implementation)));
  }

  flag(integration: Address, implementation: Address, selector: Selector): boolean {
    return this.storage.getBool(flagKey(integration, implementation, selector));
  }

  /** The implementation `next` was pre-authorized to replace, if any. */
  preAuthorizedFrom(integration: Address, next: Address): Address | undefined {
    return this.storage.getAddress(preAuthorizationKey(integration, next));
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  /**
   * @throws {RevertError} AlreadyRegistered if the identity completed registration
   */
  markPending(integration: Address, implementation: Address): void {
    if (this.registration(integration, implementation) === RegistrationStatus.REGISTERED) {
      throw protocolError(ProtocolErrorCode.AlreadyRegistered, { integration, implementation });
    }
    this.writeRegistration(integration, implementation, RegistrationStatus.PENDING);
  }

  /**
   * PENDING → REGISTERED, and authorization to ACTIVE.
   *
   * @throws {RevertError} NotRegisteredPending from any other registration status
   */
  completeRegistration(integration: Address, implementation: Address): void {
    if (this.registration(integration, implementation) !== RegistrationStatus.PENDING) {
      throw protocolError(ProtocolErrorCode.NotRegisteredPending, { integration, implementation });
    }
    this.writeRegistration(integration, implementation, RegistrationStatus.REGISTERED);
    this.writeAuthorization(integration, implementation, AuthorizationStatus.ACTIVE);
  }

  /**
   * Replace the given flags. All-or-nothing.
   *
   * @throws {RevertError} IntegrationNotRegistered unless REGISTERED
   * @throws {RevertError} ArrayLengthMismatch if the arrays differ in length
   */
  setFlags(
    integration: Address,
    implementation: Address,
    selectors: ReadonlyArray<Selector>,
    flags: ReadonlyArray<boolean>,
  ): void {
    this.requireRegistered(integration, implementation);
    requireSameLength(selectors.length, flags.length);
    selectors.forEach((selector, i) => {
      this.storage.set(flagKey(integration, implementation, selector), flags[i] === true);
    });
  }

  /**
   * Record that `next` may inherit the registration of `current`.
   *
   * @throws {RevertError} OnlyDistinctImplementation if the two are the same
   * @throws {RevertError} IntegrationNotRegistered unless `current` is REGISTERED
   */
  preAuthorizeUpgrade(integration: Address, current: Address, next: Address): void {
    if (current === next) {
      throw protocolError(ProtocolErrorCode.OnlyDistinctImplementation, { implementation: current });
    }
    this.requireRegistered(integration, current);
    this.storage.set(preAuthorizationKey(integration, next), current);
  }

  /**
   * Carry a pre-authorized registration over to `next`. The authorization
   * status is copied as-is, so a REVOKED identity stays REVOKED. Flags are
   * not copied.
   *
   * `next` must still be UNREGISTERED and INACTIVE. An identity the ledger
   * already tracks only changes through registration or an override.
   *
   * @throws {RevertError} UpgradeNotPreAuthorized without a matching record
   * @throws {RevertError} UpgradeTargetNotFresh if `next` already has a status
   * @throws {RevertError} IntegrationNotRegistered if the previous identity lost its registration meanwhile
   */
  acceptUpgrade(integration: Address, next: Address): UpgradeAcceptance {
    const previousImplementation = this.preAuthorizedFrom(integration, next);
    if (previousImplementation === undefined) {
      throw protocolError(ProtocolErrorCode.UpgradeNotPreAuthorized, { integration, implementation: next });
    }
    const registration = this.registration(integration, next);
    const current = this.authorization(integration, next);
    if (registration !== RegistrationStatus.UNREGISTERED || current !== AuthorizationStatus.INACTIVE) {
      throw protocolError(ProtocolErrorCode.UpgradeTargetNotFresh, {
        integration,
        implementation: next,
        registration,
        authorization: current,
      });
    }
    this.requireRegistered(integration, previousImplementation);
    const authorization = this.authorization(integration, previousImplementation);
    this.writeRegistration(integration, next, RegistrationStatus.REGISTERED);
    this.writeAuthorization(integration, next, authorization);
    this.storage.delete(preAuthorizationKey(integration, next));
    return { previousImplementation, authorization };
  }

  // -------------------------------------------------------------------------
  // Overrides
  // -------------------------------------------------------------------------

  /**
   * Write registration statuses unconditionally. Lengths and values are
   * validated before the first write.
   */
  overrideRegistrations(
    integrations: ReadonlyArray<Address>,
    implementations: ReadonlyArray<Address>,
    statuses: ReadonlyArray<number>,
  ): StatusChange<RegistrationStatus>[] {
    const changes = zipChanges(integrations, implementations, statuses, toRegistrationStatus);
    for (const change of changes) {
      this.writeRegistration(change.integration, change.implementation, change.status);
    }
    return changes;
  }

  overrideAuthorizations(
    integrations: ReadonlyArray<Address>,
    implementations: ReadonlyArray<Address>,
    statuses: ReadonlyArray<number>,
  ): StatusChange<AuthorizationStatus>[] {
    const changes = zipChanges(integrations, implementations, statuses, toAuthorizationStatus);
    for (const change of changes) {
      this.writeAuthorization(change.integration, change.implementation, change.status);
    }
    return changes;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private requireRegistered(integration: Address, implementation: Address): void {
    if (this.registration(integration, implementation) !== RegistrationStatus.REGISTERED) {
      throw protocolError(ProtocolErrorCode.IntegrationNotRegistered, { integration, implementation });
    }
  }

  private writeRegistration(integration: Address, implementation: Address, status: RegistrationStatus): void {
    this.storage.set(registrationKey(integration, implementation), status);
  }

  private writeAuthorization(integration: Address, implementation: Address, status: AuthorizationStatus): void {
    this.storage.set(authorizationKey(integration, implementation), status);
  }
}

function registrationKey(integration: Address, implementation: Address): string {
  return `registration:${integration}:${implementation}`;
}

function authorizationKey(integration: Address, implementation: Address): string {
  return `authorization:${integration}:${implementation}`;
}

function flagKey(integration: Address, implementation: Address, selector: Selector): string {
  return `flag:${integration}:${implementation}:${selector}`;
}

function preAuthorizationKey(integration: Address, next: Address): string {
  return `upgrade:${integration}:${next}`;
}

export function requireSameLength(...lengths: number[]): void {
  const [first] = lengths;
  if (lengths.some((n) => n !== first)) {
    throw protocolError(ProtocolErrorCode.ArrayLengthMismatch, { lengths: lengths.map((n) => BigInt(n)) });
  }
}

function zipChanges<S>(
  integrations: ReadonlyArray<Address>,
  implementations: ReadonlyArray<Address>,
  statuses: ReadonlyArray<number>,
  parse: (value: number) => S,
): StatusChange<S>[] {
  requireSameLength(integrations.length, implementations.length, statuses.length);
  return integrations.map((integration, i) => {
    const implementation = implementations[i];
    const status = statuses[i];
    if (implementation === undefined || status === undefined) {
      throw protocolError(ProtocolErrorCode.ArrayLengthMismatch, { index: BigInt(i) });
    }
    return { integration, implementation, status: parse(status) };
  });
}
