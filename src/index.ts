// Package entry point - re-exports public API
export { PushBridgeConfigSchema, BRIDGE_TYPES } from './types/index.js';

export type {
  ConnectionIdentity,
  KeyInfo,
  SubscriptionInfo,
  SubscriptionResponse,
  DispatchInfo,
  PushSubscriptionChanged,
  PushBridgeConfig,
  PushBridgeConfigInput,
  BridgeType,
  LogLevel,
  LogEntry,
} from './types/index.js';

export { loadConfig, parseConfig } from './config/index.js';

export { PushManager, createPushManager } from './manager/index.js';
export type { PushManagerDeps, CreatePushManagerOptions } from './manager/index.js';

export {
  PushBridgeError,
  StorageError,
  CommunicationError,
  CryptoError,
  RecordNotFoundError,
  RegistrationError,
} from './errors/index.js';
export type { PushBridgeErrorKind, CommunicationClassification } from './errors/index.js';

export { MemoryRecordStore, FileRecordStore } from './store/record-store.js';
export type { RecordStore } from './store/record-store.js';

export { FetchTransport } from './relay/transport.js';
export type { HttpTransport, HttpRequest, HttpResponse, HttpMethod } from './relay/transport.js';

export { BridgeLogger } from './logger/index.js';
export type { BridgeLoggerOptions } from './logger/index.js';

export { SUPPORTED_ENCODINGS } from './crypto/index.js';
export type { ContentEncoding } from './crypto/index.js';
