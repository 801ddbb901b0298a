/**
 * Tollgate Demo Integrations — Error Codes
 */

import { RevertError } from '@tollgate/runtime-host';
import type { RevertArgs } from '@tollgate/runtime-host';

export enum DemoErrorCode {
  ZeroQuantity = 'ZeroQuantity',
  WalletExists = 'WalletExists',
}

export function demoError(code: DemoErrorCode, args: RevertArgs = {}): RevertError {
  return new RevertError(code, args);
}
