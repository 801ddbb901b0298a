/**
 * @tollgate/kernel
 *
 * Tollgate protocol kernel: admin transfer, the GateKeeper status ledger,
 * the Router, both Integration bases, the security-module base and the
 * dispatch decision log.
 *
 * This package performs no I/O of its own. It contains no imports of
 * node:fs, node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for hashing and Ed25519 verification (pure
 * computation). Persistence is injected through runtime-host's StateIO.
 */

// Types
export { RegistrationStatus, AuthorizationStatus, toRegistrationStatus, toAuthorizationStatus } from './types/status.js';
export { ProtocolErrorCode, protocolError } from './types/errors.js';

// Configuration
export {
  MIN_PAYLOAD_LENGTH,
  MARKER_LENGTH,
  MODULE_ID_OFFSET,
  MODULE_ID_END,
  CREDENTIAL_LENGTH,
  CREDENTIAL_SCHEME_ED25519,
  GATEKEEPER,
  ROUTER,
  INTEGRATION,
  ADMIN_TRANSFER,
  MODULE,
  VALIDATOR_PARAMS,
  moduleIdOf,
  validatorSignature,
} from './configuration/protocol.js';

// Admin
export type { AdminRole, ExposeFn } from './admin/admin-transfer.js';
export { AdminTransfer, SECURITY_ADMIN, PROTOCOL_ADMIN } from './admin/admin-transfer.js';

// GateKeeper
export type { StatusChange, UpgradeAcceptance } from './gatekeeper/status-ledger.js';
export { StatusLedger, requireSameLength } from './gatekeeper/status-ledger.js';
export { GateKeeper } from './gatekeeper/gatekeeper.js';

// Router
export type { CredentialVerifier, RegistrationClaim } from './router/credential.js';
export { Ed25519CredentialVerifier, issueRegistrationCredential, registrationDigest } from './router/credential.js';
export type { DispatchRequest, RouterOptions } from './router/router.js';
export { Router } from './router/router.js';

// Integrations
export type { IntegrationOptions } from './integration/integration.js';
export { Integration } from './integration/integration.js';
export { IntegrationUpgradeable } from './integration/integration-upgradeable.js';
export type { GuardTarget, ProtectedMutability } from './integration/protection.js';
export { guardProtectedCall, protectedSignature } from './integration/protection.js';

// Security modules
export type { ProtectedCallRequest, ValidatorHandler } from './modules/security-module.js';
export { SecurityModule } from './modules/security-module.js';

// Decision log
export type { DecisionEntry, DecisionSink } from './logging/decision-log.js';
export {
  DecisionLogger,
  DispatchDecision,
  MemoryDecisionSink,
  JsonlDecisionSink,
  DECISIONS_LOG,
} from './logging/decision-log.js';

// Deployment
export type { DeploymentOptions, ProtocolDeployment } from './deployment/deploy.js';
export { deployProtocol, installSecurityModule } from './deployment/deploy.js';
