/**
 * BridgeProtocolClient: typed facade over the relay's push service bridge
 * HTTP interface.
 *
 * Routes are relative to `<protocol>://<host>/v1/<bridgeType>/<senderId>`:
 *   POST   /registration                              register instance
 *   POST   /registration/<uaid>/subscription          create channel
 *   DELETE /registration/<uaid>/subscription/<chid>   delete channel
 *   DELETE /registration/<uaid>                       delete every channel
 *   PUT    /registration/<uaid>                       update native token
 *   GET    /registration/<uaid>/                      list channel ids
 *
 * A 401/410 comes back as an `identity-invalid` outcome rather than an
 * exception, because every caller has to branch on it. Everything else
 * that is not 2xx throws CommunicationError. Nothing is retried here.
 */

import { z } from 'zod';
import { CommunicationError, classifyStatus, errorMessage } from '../errors/index.js';
import type { BridgeType, ConnectionIdentity } from '../types/index.js';
import type { HttpMethod, HttpTransport } from './transport.js';

export type RelayOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'identity-invalid'; status: number };

export interface RelayEndpoint {
  serverHost: string;
  httpProtocol: 'https' | 'http';
  bridgeType: BridgeType;
  senderId: string;
}

export interface Registration {
  uaid: string;
  secret?: string;
}

const RegistrationResponseSchema = z.object({
  uaid: z.string().min(1),
  secret: z.string().min(1).optional(),
});

const ChannelResponseSchema = z.object({
  channelID: z.string().min(1),
  endpoint: z.string().url(),
});

const ChannelListResponseSchema = z.object({
  uaid: z.string().optional(),
  channelIDs: z.array(z.string()),
});

/**
 * Channel ids are compared in UUID "simple" form: no dashes, lowercase.
 * The relay may echo them back in either form.
 */
export function normalizeChannelId(channelId: string): string {
  return channelId.replace(/-/g, '').toLowerCase();
}

function ok<T>(value: T): RelayOutcome<T> {
  return { kind: 'ok', value };
}

export class BridgeProtocolClient {
  private readonly baseUrl: string;

  constructor(
    endpoint: RelayEndpoint,
    private readonly transport: HttpTransport,
  ) {
    const sender = encodeURIComponent(endpoint.senderId);
    this.baseUrl = `${endpoint.httpProtocol}://${endpoint.serverHost}/v1/${endpoint.bridgeType}/${sender}`;
  }

  /** Register this installation; the relay assigns the uaid. */
  async register(nativeToken: string): Promise<Registration> {
    const outcome = await this.call('POST', '/registration', undefined, { token: nativeToken });
    if (outcome.kind === 'identity-invalid') {
      // The relay rejected our sender id / credentials outright
      throw new CommunicationError(
        `Relay refused registration (HTTP ${outcome.status})`,
        outcome.status,
        'permanent',
      );
    }
    const reg = this.parse(RegistrationResponseSchema, outcome.value, 'registration');
    return reg.secret === undefined ? { uaid: reg.uaid } : { uaid: reg.uaid, secret: reg.secret };
  }

  /** Create a channel and return its push endpoint. */
  async createChannel(
    identity: ConnectionIdentity,
    channelId: string,
    appServerKey?: string,
  ): Promise<RelayOutcome<string>> {
    const body: Record<string, string> = { channelID: channelId };
    if (appServerKey !== undefined) body['key'] = appServerKey;

    const outcome = await this.call('POST', `/registration/${enc(identity.uaid)}/subscription`, identity, body);
    if (outcome.kind !== 'ok') return outcome;
    const channel = this.parse(ChannelResponseSchema, outcome.value, 'subscription');
    return ok(channel.endpoint);
  }

  async deleteChannel(identity: ConnectionIdentity, channelId: string): Promise<RelayOutcome<void>> {
    const outcome = await this.call(
      'DELETE',
      `/registration/${enc(identity.uaid)}/subscription/${enc(channelId)}`,
      identity,
    );
    return outcome.kind === 'ok' ? ok(undefined) : outcome;
  }

  async deleteAllChannels(identity: ConnectionIdentity): Promise<RelayOutcome<void>> {
    const outcome = await this.call('DELETE', `/registration/${enc(identity.uaid)}`, identity);
    return outcome.kind === 'ok' ? ok(undefined) : outcome;
  }

  async updateToken(identity: ConnectionIdentity, nativeToken: string): Promise<RelayOutcome<void>> {
    const outcome = await this.call('PUT', `/registration/${enc(identity.uaid)}`, identity, {
      token: nativeToken,
    });
    return outcome.kind === 'ok' ? ok(undefined) : outcome;
  }

  /** Channel ids the relay holds for this uaid, normalized. */
  async listChannels(identity: ConnectionIdentity): Promise<RelayOutcome<string[]>> {
    const outcome = await this.call('GET', `/registration/${enc(identity.uaid)}/`, identity);
    if (outcome.kind !== 'ok') return outcome;
    const list = this.parse(ChannelListResponseSchema, outcome.value, 'channel list');
    return ok(list.channelIDs.map(normalizeChannelId));
  }

  private async call(
    method: HttpMethod,
    path: string,
    identity: ConnectionIdentity | undefined,
    body?: Record<string, unknown>,
  ): Promise<RelayOutcome<unknown>> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (identity?.secret) headers['Authorization'] = `webpush ${identity.secret}`;
    const bodyStr = body ? JSON.stringify(body) : undefined;
    if (bodyStr !== undefined) headers['Content-Type'] = 'application/json';

    let res: { status: number; body: string };
    try {
      res = await this.transport.request({ method, url, headers, body: bodyStr });
    } catch (err: unknown) {
      throw new CommunicationError(
        `${method} ${path} failed: ${errorMessage(err)}`,
        0,
        'transient',
        { cause: err },
      );
    }

    if (res.status >= 200 && res.status < 300) {
      return ok(parseJsonBody(res.body));
    }

    const classification = classifyStatus(res.status);
    if (classification === 'identity-invalid') {
      return { kind: 'identity-invalid', status: res.status };
    }
    throw new CommunicationError(
      `${method} ${path} returned ${res.status}${describeError(res.body)}`,
      res.status,
      classification,
    );
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new CommunicationError(
        `Relay returned a malformed ${what} response: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        200,
        'permanent',
      );
    }
    return result.data;
  }
}

function enc(segment: string): string {
  return encodeURIComponent(segment);
}

function parseJsonBody(text: string): unknown {
  if (text.trim() === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

/** Pull a short reason out of an error body, if there is one. */
function describeError(text: string): string {
  const parsed = parseJsonBody(text);
  if (typeof parsed === 'object' && parsed !== null) {
    for (const field of ['message', 'error']) {
      if (field in parsed) {
        const value: unknown = Reflect.get(parsed, field);
        if (typeof value === 'string' && value.length > 0) return `: ${value}`;
      }
    }
  }
  return text.trim() ? `: ${text.trim().slice(0, 80)}` : '';
}
