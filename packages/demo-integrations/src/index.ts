/**
 * @tollgate/demo-integrations
 *
 * Example integrations for each way an integration can be hosted: a
 * standalone collection, the same collection behind UUPS, transparent or
 * beacon proxies, and clone-per-owner wallets.
 */

export { COLLECTION, WALLET, WALLET_FACTORY } from './signatures.js';
export { DemoErrorCode, demoError } from './errors.js';
export type { ExposeProtectedFn } from './collection.js';
export { DemoCollection, registerCollection, balanceOf, totalSupply } from './collection.js';
export { DemoCollectionUpgradeable } from './collection-upgradeable.js';
export { DemoWallet, DemoWalletFactory } from './wallet.js';
