// Config type definitions with Zod schema
// Config format: JSON only (.push-bridge.json)
// Environment variable prefix: PUSH_BRIDGE_

import { z } from 'zod';

export const BRIDGE_TYPES = ['fcm', 'adm', 'apns', 'test'] as const;

export const PushBridgeConfigSchema = z.object({
  // Relay service
  serverHost: z.string().min(1).default('updates.push.services.mozilla.com'),
  httpProtocol: z.enum(['https', 'http']).default('https'),
  requestTimeoutMs: z.number().int().min(0).default(10_000),

  // Native transport
  bridgeType: z.enum(BRIDGE_TYPES).default('fcm'),
  senderId: z.string().min(1),
  nativeToken: z.string().default(''),

  // Persistence (in-memory store when omitted)
  databasePath: z.string().min(1).optional(),

  // Logging
  logDir: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type PushBridgeConfig = z.infer<typeof PushBridgeConfigSchema>;
export type PushBridgeConfigInput = z.input<typeof PushBridgeConfigSchema>;
export type BridgeType = PushBridgeConfig['bridgeType'];
