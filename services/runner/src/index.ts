export * from './runner-contract.js';
export * from './config.js';
export { decodeTokenClaims, getUserName, USERNAME_CLAIMS, type TokenClaims } from './identity.js';
export { withoutHttpProxy } from './proxy-env.js';
export * from './workspace-config.js';
export * from './workspace-client.js';
export { resolveStorageCredentials, type CredentialResolution } from './credentials.js';
export * from './consolidate.js';
export * from './publisher.js';
export { StageOutExecutionHandler, DEFAULT_SECRETS_PATH, type ExecutionHandlerDeps } from './handler.js';
export { runWorkflowService, loadCwl, DEFAULT_CWL_PATH, type ServiceOptions } from './service.js';
