/**
 * Tollgate Kernel — Two-Step Admin Transfer
 *
 * One AdminTransfer instance manages one admin role inside a contract's
 * storage. Handing the role over takes two calls:
 *
 *   transferAdministration(next)   current admin nominates `next`
 *   acceptAdministration()         `next` claims the role
 *
 * The current admin keeps full control until the nominee accepts. There is
 * no operation that leaves the role empty.
 */

import { ZERO_ADDRESS } from '@tollgate/runtime-host';
import type { Address, CallContext, FunctionHandler, Mutability, Storage } from '@tollgate/runtime-host';
import { ADMIN_TRANSFER } from '../configuration/protocol.js';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';

export interface AdminRole {
  /** Storage key prefix; the pending nominee lives under `${slot}.pending`. */
  readonly slot: string;
  /** Reverted when a non-admin calls an admin-only operation. */
  readonly notAdminError: ProtocolErrorCode;
  /** View signatures for the current and pending admin. */
  readonly adminView: string;
  readonly pendingView: string;
}

export const SECURITY_ADMIN: AdminRole = {
  slot: 'securityAdmin',
  notAdminError: ProtocolErrorCode.NotSecurityAdmin,
  adminView: 'securityAdmin()',
  pendingView: 'pendingSecurityAdmin()',
};

export const PROTOCOL_ADMIN: AdminRole = {
  slot: 'protocolAdmin',
  notAdminError: ProtocolErrorCode.NotProtocolAdmin,
  adminView: 'protocolAdmin()',
  pendingView: 'pendingProtocolAdmin()',
};

/** How a contract hands its `expose` to helpers that register functions for it. */
export type ExposeFn = (signature: string, mutability: Mutability, handler: FunctionHandler) => void;

export class AdminTransfer {
  private readonly pendingSlot: string;

  constructor(private readonly role: AdminRole) {
    this.pendingSlot = `${role.slot}.pending`;
  }

  /**
   * Register the admin views and both transfer steps on the owning contract.
   */
  register(expose: ExposeFn): void {
    expose(this.role.adminView, 'view', (ctx) => this.admin(ctx.storage));
    expose(this.role.pendingView, 'view', (ctx) => this.pendingAdmin(ctx.storage));
    expose(ADMIN_TRANSFER.transferAdministration, 'nonpayable', (ctx, args) => {
      this.transferAdministration(ctx, args.address(0));
    });
    expose(ADMIN_TRANSFER.acceptAdministration, 'nonpayable', (ctx) => {
      this.acceptAdministration(ctx);
    });
  }

  /**
   * Install the first admin. Used once, from a constructor or initializer.
   *
   * @throws {RevertError} InvalidAdmin for the zero address
   */
  initialize(ctx: CallContext, admin: Address): void {
    if (admin === ZERO_ADDRESS) {
      throw protocolError(ProtocolErrorCode.InvalidAdmin, { admin });
    }
    ctx.storage.set(this.role.slot, admin);
    ctx.emit('AdministrationTransferred', { previousAdmin: ZERO_ADDRESS, newAdmin: admin });
  }

  admin(storage: Storage): Address {
    return storage.getAddress(this.role.slot) ?? ZERO_ADDRESS;
  }

  pendingAdmin(storage: Storage): Address {
    return storage.getAddress(this.pendingSlot) ?? ZERO_ADDRESS;
  }

  /**
   * @throws {RevertError} the role's not-admin code unless `ctx.sender` holds the role
   */
  onlyAdmin(ctx: CallContext): void {
    const admin = this.admin(ctx.storage);
    if (admin === ZERO_ADDRESS || ctx.sender !== admin) {
      throw protocolError(this.role.notAdminError, { account: ctx.sender });
    }
  }

  transferAdministration(ctx: CallContext, newAdmin: Address): void {
    this.onlyAdmin(ctx);
    if (newAdmin === ZERO_ADDRESS) {
      throw protocolError(ProtocolErrorCode.InvalidAdmin, { admin: newAdmin });
    }
    ctx.storage.set(this.pendingSlot, newAdmin);
    ctx.emit('AdministrationTransferStarted', { previousAdmin: this.admin(ctx.storage), newAdmin });
  }

  acceptAdministration(ctx: CallContext): void {
    const pending = ctx.storage.getAddress(this.pendingSlot);
    if (pending === undefined || ctx.sender !== pending) {
      throw protocolError(ProtocolErrorCode.NotPendingAdmin, { account: ctx.sender });
    }
    const previousAdmin = this.admin(ctx.storage);
    ctx.storage.set(this.role.slot, pending);
    ctx.storage.delete(this.pendingSlot);
    ctx.emit('AdministrationTransferred', { previousAdmin, newAdmin: pending });
  }
}
