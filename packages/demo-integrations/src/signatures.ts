/**
 * Tollgate Demo Integrations — Call Signatures
 */

export const COLLECTION = {
  initialize: 'initialize(address,string)',
  name: 'name()',
  safeMint: 'safeMint(uint256,bytes)',
  balanceOf: 'balanceOf(address)',
  totalSupply: 'totalSupply()',
} as const;

export const WALLET = {
  initialize: 'initialize(address)',
  setLimit: 'setLimit(uint256,bytes)',
  limit: 'limit()',
} as const;

export const WALLET_FACTORY = {
  createWallet: 'createWallet(address)',
  walletOf: 'walletOf(address)',
  implementation: 'implementation()',
} as const;
