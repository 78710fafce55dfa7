// Subscription and identity shapes shared across the bridge.
// Key material is base64url encoded everywhere it is stored or published.

import type { BridgeType } from './config.js';

/** Server-assigned binding between this installation and the relay. */
export interface ConnectionIdentity {
  uaid: string;
  /** Bearer secret issued at registration; sent as `Authorization: webpush <secret>` */
  secret?: string;
  senderId: string;
  bridgeType: BridgeType;
  nativeToken: string;
}

/**
 * Everything the bridge knows about one channel. Never leaves the
 * package: callers only see the views below.
 */
export interface SubscriptionRecord {
  channelId: string;
  scope: string;
  endpoint: string;
  /** 65-byte uncompressed P-256 point */
  publicKey: string;
  /** 32-byte P-256 scalar */
  privateKey: string;
  /** 16 random bytes */
  authSecret: string;
  /** VAPID public key the subscription is locked to */
  appServerKey?: string;
}

export interface KeyInfo {
  p256dh: string;
  auth: string;
}

/** What an application server needs to send to this channel. */
export interface SubscriptionInfo {
  endpoint: string;
  keys: KeyInfo;
}

export interface SubscriptionResponse {
  channelId: string;
  subscriptionInfo: SubscriptionInfo;
}

export interface DispatchInfo {
  channelId: string;
  scope: string;
  endpoint: string;
  appServerKey?: string;
}

/** A channel whose endpoint is gone and must be renegotiated by the caller. */
export interface PushSubscriptionChanged {
  channelId: string;
  scope: string;
}

export function toSubscriptionResponse(record: SubscriptionRecord): SubscriptionResponse {
  return {
    channelId: record.channelId,
    subscriptionInfo: {
      endpoint: record.endpoint,
      keys: {
        p256dh: record.publicKey,
        auth: record.authSecret,
      },
    },
  };
}

export function toDispatchInfo(record: SubscriptionRecord): DispatchInfo {
  const info: DispatchInfo = {
    channelId: record.channelId,
    scope: record.scope,
    endpoint: record.endpoint,
  };
  if (record.appServerKey !== undefined) {
    info.appServerKey = record.appServerKey;
  }
  return info;
}
