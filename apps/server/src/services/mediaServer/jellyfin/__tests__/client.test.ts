/**
 * JellyfinClient tests
 *
 * fetch is replaced by an in-process router, so these cover request shape,
 * pagination and status mapping without a server.
 */

import { describe, it, expect } from 'vitest';
import { JellyfinClient } from '../client.js';
import {
  AuthExpiredError,
  NotFoundError,
  UpstreamRequestError,
  UpstreamUnavailableError,
} from '../../../../utils/errors.js';
import type { FetchFn } from '../../../../utils/http.js';
import { silentLogger } from '../../../../utils/logger.js';
import { TEST_HOSTS } from '../../../../test/fakes.js';
import type { JellyfinItem } from '../../types.js';

interface RecordedCall {
  method: string;
  url: URL;
  headers: Record<string, string>;
  body: unknown;
}

type Route = (call: RecordedCall) => Response | undefined;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function empty(status = 204): Response {
  return new Response(null, { status });
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

function createRouter(routes: Route[]) {
  const calls: RecordedCall[] = [];
  const fetchStub: FetchFn = async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const rawBody = init?.body;
    const call: RecordedCall = {
      method: init?.method ?? 'GET',
      url: new URL(href),
      headers: headersOf(init),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    };
    calls.push(call);
    for (const route of routes) {
      const response = route(call);
      if (response) return response;
    }
    return json({ message: 'no route' }, 404);
  };
  return { calls, fetchStub };
}

function createClient(routes: Route[], pageSize = 200) {
  const router = createRouter(routes);
  const client = new JellyfinClient({ hosts: TEST_HOSTS, pageSize, fetch: router.fetchStub, logger: silentLogger });
  return { client, calls: router.calls };
}

const credentials = { userId: 'user-1', accessToken: 'token-1' };

async function collect(iterable: AsyncIterable<JellyfinItem>): Promise<string[]> {
  const ids: string[] = [];
  for await (const item of iterable) ids.push(item.id);
  return ids;
}

describe('JellyfinClient', () => {
  describe('headers', () => {
    it('identifies the client and passes the token', async () => {
      const { client, calls } = createClient([() => json({ Id: 'item1', Name: 'Movie' })]);

      await client.getItem(credentials, 'item1');

      expect(calls[0]?.headers['x-emby-authorization']).toBe(
        'MediaBrowser Client="SphereBridge", Device="HereSphere", DeviceId="spherebridge-gateway", Version="0.1.0", Token="token-1"'
      );
      expect(calls[0]?.url.href).toBe('http://jellyfin:8096/Users/user-1/Items/item1');
    });
  });

  describe('quickConnect', () => {
    it('initiates and returns the secret and code', async () => {
      const { client, calls } = createClient([
        ({ url }) => (url.pathname === '/QuickConnect/Initiate' ? json({ Secret: 'sec', Code: '654321' }) : undefined),
      ]);

      expect(await client.quickConnectInitiate()).toEqual({ secret: 'sec', code: '654321' });
      expect(calls[0]?.method).toBe('POST');
    });

    it('reports pending until the code is approved', async () => {
      const { client } = createClient([() => json({ Secret: 'sec', Code: '654321', Authenticated: false })]);

      expect(await client.quickConnectPoll('sec')).toEqual({ status: 'pending' });
    });

    it('exchanges an approved secret for a token', async () => {
      const { client, calls } = createClient([
        ({ url }) =>
          url.pathname === '/QuickConnect/Connect'
            ? json({ Secret: 'sec', Code: '654321', Authenticated: true })
            : undefined,
        ({ url }) =>
          url.pathname === '/Users/AuthenticateWithQuickConnect'
            ? json({ User: { Id: 'user-1', Name: 'alice' }, AccessToken: 'token-1' })
            : undefined,
      ]);

      expect(await client.quickConnectPoll('sec')).toEqual({
        status: 'approved',
        userId: 'user-1',
        username: 'alice',
        accessToken: 'token-1',
      });
      expect(calls[0]?.url.searchParams.get('Secret')).toBe('sec');
      expect(calls[1]?.body).toEqual({ Secret: 'sec' });
    });

    it('treats an unknown secret as expired', async () => {
      const { client } = createClient([() => empty(404)]);

      expect(await client.quickConnectPoll('sec')).toEqual({ status: 'expired' });
    });
  });

  describe('listLibrary', () => {
    it('pages through the library one request at a time', async () => {
      const pages = [
        [{ Id: 'a' }, { Name: 'no id' }],
        [{ Id: 'c' }],
      ];
      const { client, calls } = createClient(
        [
          ({ url }) => {
            const start = Number(url.searchParams.get('StartIndex'));
            return json({ Items: pages[start / 2] ?? [], TotalRecordCount: 3 });
          },
        ],
        2
      );

      expect(await collect(client.listLibrary(credentials))).toEqual(['a', 'c']);
      expect(calls.map((call) => call.url.searchParams.get('StartIndex'))).toEqual(['0', '2']);
      expect(calls[0]?.url.pathname).toBe('/Users/user-1/Items');
      expect(calls[0]?.url.searchParams.get('IncludeItemTypes')).toBe('Movie,Episode');
      expect(calls[0]?.url.searchParams.get('IsMissing')).toBe('false');
    });

    it('stops on an empty page', async () => {
      const { client, calls } = createClient([() => json({ Items: [], TotalRecordCount: 0 })], 2);

      expect(await collect(client.listLibrary(credentials))).toEqual([]);
      expect(calls).toHaveLength(1);
    });

    it('does not fetch before iteration starts', () => {
      const { client, calls } = createClient([() => json({ Items: [] })]);

      client.listLibrary(credentials);

      expect(calls).toHaveLength(0);
    });
  });

  describe('error mapping', () => {
    it('maps 401 to AuthExpiredError', async () => {
      const { client } = createClient([() => empty(401)]);

      await expect(client.getItem(credentials, 'item1')).rejects.toBeInstanceOf(AuthExpiredError);
    });

    it('maps a missing item to NotFoundError', async () => {
      const { client } = createClient([() => empty(404)]);

      await expect(client.getItem(credentials, 'item1')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('maps 5xx and network failures to UpstreamUnavailableError', async () => {
      const failing = createClient([() => empty(503)]);
      await expect(failing.client.getItem(credentials, 'item1')).rejects.toBeInstanceOf(UpstreamUnavailableError);

      const unreachable = new JellyfinClient({
        hosts: TEST_HOSTS,
        fetch: async () => {
          throw new TypeError('fetch failed');
        },
        logger: silentLogger,
      });
      await expect(unreachable.getItem(credentials, 'item1')).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(await unreachable.ping()).toBe(false);
    });

    it('maps other 4xx to UpstreamRequestError', async () => {
      const { client } = createClient([() => empty(400)]);

      await expect(client.getPlaybackInfo(credentials, 'item1')).rejects.toBeInstanceOf(UpstreamRequestError);
    });
  });

  describe('reportProgress', () => {
    it('posts progress with the pause state', async () => {
      const { client, calls } = createClient([() => empty()]);

      await client.reportProgress(credentials, {
        itemId: 'item1',
        positionTicks: 1234.6,
        kind: 'progress',
        isPaused: true,
        playSessionId: 'play-1',
      });

      expect(calls[0]?.url.pathname).toBe('/Sessions/Playing/Progress');
      expect(calls[0]?.body).toEqual({
        ItemId: 'item1',
        PositionTicks: 1235,
        PlaySessionId: 'play-1',
        IsPaused: true,
        CanSeek: true,
        EventName: 'Pause',
      });
    });

    it('stops and marks the item played for watched', async () => {
      const { client, calls } = createClient([() => empty()]);

      await client.reportProgress(credentials, { itemId: 'item1', positionTicks: 900, kind: 'watched' });

      expect(calls.map((call) => `${call.method} ${call.url.pathname}`)).toEqual([
        'POST /Sessions/Playing/Stopped',
        'POST /Users/user-1/PlayedItems/item1',
      ]);
    });
  });

  describe('getPlaybackInfo', () => {
    it('asks for the user and parses the first source', async () => {
      const { client, calls } = createClient([
        () => json({ PlaySessionId: 'play-1', MediaSources: [{ Id: 'src1' }] }),
      ]);

      expect(await client.getPlaybackInfo(credentials, 'item1')).toEqual({
        playSessionId: 'play-1',
        mediaSourceId: 'src1',
        transcodingUrl: undefined,
      });
      expect(calls[0]?.url.pathname).toBe('/Items/item1/PlaybackInfo');
      expect(calls[0]?.url.searchParams.get('UserId')).toBe('user-1');
    });
  });

  it('rewrites media links to the public host', () => {
    const { client } = createClient([]);

    expect(client.rewriteMediaUrl('http://jellyfin:8096/Items/1/Download')).toBe(
      'https://media.example.test/Items/1/Download'
    );
  });
});
