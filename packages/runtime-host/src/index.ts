/**
 * @tollgate/runtime-host
 *
 * Deterministic in-process execution host: call-data codec, journaled world
 * state, contracts and call contexts, proxy kinds, and the event and state
 * persistence the kernel and CLI build on.
 */

// Identifiers
export type { Address, Selector, Bytes32 } from './types/address.js';
export {
  ZERO_ADDRESS,
  isAddress,
  isSelector,
  isBytes32,
  toAddress,
  toSelector,
  toBytes32,
  bytesToHex,
  hexToBytes,
  deriveAddress,
  accountAddress,
} from './types/address.js';

// Call data
export type { AbiType, AbiScalar, AbiValue, ScalarType, ArrayType } from './abi/types.js';
export { SCALAR_TYPES, isAbiType, isScalarType, isScalarValue } from './abi/types.js';
export type { ParsedSignature } from './abi/signature.js';
export { parseSignature, selectorOf } from './abi/signature.js';
export {
  encodeCall,
  encodeWithSelector,
  encodeArgs,
  decodeArgs,
  splitCalldata,
  concat,
} from './abi/codec.js';
export {
  Args,
  expectBool,
  expectAddress,
  expectBytes32,
  expectUint,
  expectUint8,
  expectBools,
} from './abi/args.js';

// Errors
export type { RevertArgs } from './errors.js';
export { HostErrorCode, RevertError, isRevert } from './errors.js';

// Execution
export type { CallContext, ContractFactory, ContractFunction, FunctionHandler, Mutability } from './contract.js';
export { Contract } from './contract.js';
export type { Deployment, HostOptions, RawTxRequest, ReadRequest, Receipt, TxRequest } from './host.js';
export { Host, MAX_CALL_DEPTH } from './host.js';
export { Storage } from './state/storage.js';
export type { StorageValue } from './state/world-state.js';

// Proxies
export { initializer, disableInitializers } from './proxy/initializable.js';
export {
  IMPLEMENTATION_SLOT,
  ADMIN_SLOT,
  BEACON_SLOT,
  PROXIABLE_UUID,
  getImplementation,
  getAdmin,
  getBeacon,
} from './proxy/slots.js';
export { UupsUpgradeable, UPGRADE_TO_AND_CALL, onlyProxy, notDelegated } from './proxy/uups.js';
export { UpgradeableProxy } from './proxy/upgradeable-proxy.js';
export { TransparentProxy } from './proxy/transparent-proxy.js';
export { UpgradeableBeacon, BeaconProxy } from './proxy/beacon.js';
export { MinimalClone, cloneOf } from './proxy/minimal-clone.js';

// Events and logs
export type { HostEvent, EventLogEntry, JsonValue } from './types/event.js';
export type { EventSink } from './logging/event-sink.js';
export { MemoryEventSink, NullEventSink, toJsonFields, toJsonValue } from './logging/event-sink.js';
export { FileEventSink, EVENTS_LOG } from './logging/file-event-sink.js';
export type { LogLine, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';
export { ulid, ulidTime, ULID_PATTERN } from './logging/ulid.js';

// State and home
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { ResolveTollgateHomeOptions } from './home.js';
export { resolveTollgateHome } from './home.js';
