// Barrel export for all type definitions
export type {
  ConnectionIdentity,
  SubscriptionRecord,
  KeyInfo,
  SubscriptionInfo,
  SubscriptionResponse,
  DispatchInfo,
  PushSubscriptionChanged,
} from './subscription.js';

export { toSubscriptionResponse, toDispatchInfo } from './subscription.js';

export { PushBridgeConfigSchema, BRIDGE_TYPES } from './config.js';
export type { PushBridgeConfig, PushBridgeConfigInput, BridgeType } from './config.js';

export type {
  LogLevel,
  LogEntry,
} from './log.js';
