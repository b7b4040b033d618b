export {
  WorkflowDispatcher,
  paramsFromEvent,
  triggerWorkflow,
  type DispatcherDependencies,
  type TriggerWorkflowParams
} from './dispatcher/index.js';
export { createHandler, handler, type DispatchHandler } from './dispatcher/handler.js';
export { runAction } from './dispatcher/action.js';
export {
  classifyFailure,
  toDispatchResult,
  type DispatchOutcome,
  type DispatchResult
} from './dispatcher/outcome.js';
export {
  createAppJwt,
  mintInstallationToken,
  type AppCredential
} from './shared/app-auth.js';
export {
  dispatchEventSchema,
  parseDispatchEvent,
  type DispatchEvent
} from './shared/config.js';
export {
  AwsSecretStore,
  SecretStoreError,
  extractPrivateKey,
  fetchPrivateKey,
  type SecretPayload,
  type SecretStore
} from './shared/secrets.js';
