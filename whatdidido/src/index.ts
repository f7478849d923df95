/**
 * whatdidido configuration core
 *
 * Main exports: the credential store, typed provider models, provider
 * registry and the errors they raise.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Providers
export * from '../providers/index.js';

export { CredentialStore, type ConfigPairs } from './config-store.js';
export {
  ConfigModel,
  type ConfigModelDefinition,
  type LoadResult,
  type ProviderConfigModel,
} from './config-model.js';
export {
  checkProviders,
  registerProvider,
  type ProviderCheck,
  type ProviderStatus,
  type RegisteredProvider,
} from './registry.js';
export { createAppContext, type AppContext } from './context.js';
export { loadSettings, type Settings } from './settings.js';
export {
  AuthFailureError,
  StorageError,
  ValidationError,
  WhatDidIDoError,
  getErrorMessage,
} from './errors.js';
export { log, type LogLevel } from './log.js';
