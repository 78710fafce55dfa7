// In-process stand-in for the relay's bridge HTTP interface.
// Implements HttpTransport so tests exercise the real BridgeProtocolClient.

import type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from '../relay/transport.js';

export const RELAY_HOST = 'push.example.test';
export const RELAY_BASE = `https://${RELAY_HOST}/v1/fcm/test-sender`;

export interface FakeRegistration {
  token: string;
  secret: string;
  channels: Map<string, string>;
}

interface Failure {
  method?: HttpMethod;
  path: RegExp;
  result: HttpResponse | Error;
}

function json(status: number, body: unknown): HttpResponse {
  return { status, body: JSON.stringify(body) };
}

function parseBody(body: string | undefined): Record<string, unknown> {
  if (!body) return {};
  const parsed: unknown = JSON.parse(body);
  return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
}

export class FakeRelay implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  readonly registrations = new Map<string, FakeRegistration>();
  private readonly failures: Failure[] = [];
  private counter = 0;

  /** Answer the next matching request with `result` instead of routing it. */
  failNext(method: HttpMethod | undefined, path: RegExp, result: HttpResponse | Error): void {
    this.failures.push({ method, path, result });
  }

  /** Number of requests seen that match. */
  count(method: HttpMethod, path: RegExp): number {
    return this.requests.filter((r) => r.method === method && path.test(new URL(r.url).pathname)).length;
  }

  /** Simulate the relay losing this instance. */
  forget(uaid: string): void {
    this.registrations.delete(uaid);
  }

  channelIds(uaid: string): string[] {
    return [...(this.registrations.get(uaid)?.channels.keys() ?? [])];
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    const path = new URL(req.url).pathname;

    const failureIndex = this.failures.findIndex(
      (f) => (f.method === undefined || f.method === req.method) && f.path.test(path),
    );
    if (failureIndex >= 0) {
      const [failure] = this.failures.splice(failureIndex, 1);
      if (failure) {
        if (failure.result instanceof Error) throw failure.result;
        return failure.result;
      }
    }

    // ['v1', bridge, sender, 'registration', uaid?, 'subscription'?, chid?]
    const segments = path.split('/').filter((s) => s.length > 0);
    if (segments[3] !== 'registration') return json(404, { error: 'no such route' });

    if (segments.length === 4 && req.method === 'POST') {
      this.counter++;
      const uaid = `uaid-${this.counter}`;
      const secret = `secret-${this.counter}`;
      const token = parseBody(req.body)['token'];
      this.registrations.set(uaid, {
        token: typeof token === 'string' ? token : '',
        secret,
        channels: new Map(),
      });
      return json(200, { uaid, secret });
    }

    const uaid = segments[4];
    const reg = uaid === undefined ? undefined : this.registrations.get(decodeURIComponent(uaid));
    if (!reg) return json(410, { error: 'Unknown UAID' });
    if (req.headers['Authorization'] !== `webpush ${reg.secret}`) {
      return json(401, { error: 'Unauthorized' });
    }

    if (segments.length === 5) {
      switch (req.method) {
        case 'GET':
          return json(200, { uaid, channelIDs: [...reg.channels.keys()] });
        case 'PUT': {
          const token = parseBody(req.body)['token'];
          reg.token = typeof token === 'string' ? token : '';
          return json(200, {});
        }
        case 'DELETE':
          reg.channels.clear();
          return json(200, {});
        default:
          return json(405, { error: 'method not allowed' });
      }
    }

    if (segments[5] !== 'subscription') return json(404, { error: 'no such route' });

    if (segments.length === 6 && req.method === 'POST') {
      const channelId = parseBody(req.body)['channelID'];
      if (typeof channelId !== 'string' || channelId.length === 0) {
        return json(400, { error: 'channelID required' });
      }
      const endpoint = `https://${RELAY_HOST}/wpush/v2/${channelId}`;
      reg.channels.set(channelId, endpoint);
      return json(200, { channelID: channelId, endpoint });
    }

    const channelId = segments[6];
    if (segments.length === 7 && req.method === 'DELETE' && channelId !== undefined) {
      return reg.channels.delete(decodeURIComponent(channelId))
        ? json(200, {})
        : json(410, { error: 'Unknown channel' });
    }

    return json(404, { error: 'no such route' });
  }
}
