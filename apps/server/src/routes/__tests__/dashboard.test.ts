/**
 * Dashboard route tests
 *
 * Follows one browser through QuickConnect by carrying its signed cookies
 * from response to request.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { LightMyRequestResponse } from 'fastify';
import { COOKIE_NAMES } from '@spherebridge/shared';
import { DEFAULT_QUICK_CONNECT_TTL_MS } from '../../services/auth.js';
import { QuickConnectRecordType, SessionRecordType } from '../../db/records.js';
import { UpstreamUnavailableError } from '../../utils/errors.js';
import { createTestApp, type TestApp } from '../../test/app.js';

type CookieJar = Record<string, string>;

/** Apply Set-Cookie headers from a response to the jar */
function storeCookies(jar: CookieJar, response: LightMyRequestResponse): CookieJar {
  const next = { ...jar };
  for (const cookie of response.cookies) {
    if (cookie.value === '' || (cookie.maxAge !== undefined && cookie.maxAge <= 0)) {
      delete next[cookie.name];
    } else {
      next[cookie.name] = cookie.value;
    }
  }
  return next;
}

describe('dashboard routes', () => {
  let testApp: TestApp;
  let jar: CookieJar;

  async function visit(): Promise<LightMyRequestResponse> {
    const response = await testApp.app.inject({ method: 'GET', url: '/', cookies: jar });
    jar = storeCookies(jar, response);
    return response;
  }

  beforeEach(async () => {
    testApp = await createTestApp();
    testApp.jellyfin.codes = ['ABC123', 'DEF456'];
    jar = {};
  });

  afterEach(async () => {
    await testApp.close();
  });

  it('walks a browser from code to credentials to dashboard', async () => {
    const first = await visit();
    expect(first.statusCode).toBe(200);
    expect(first.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(first.body).toContain('<h1>Code: ABC123</h1>');
    expect(first.body).toContain('<meta http-equiv="refresh" content="5" />');
    expect(jar[COOKIE_NAMES.LOGIN]).toBeDefined();

    const pending = await visit();
    expect(pending.body).toContain('<h1>Code: ABC123</h1>');
    expect(testApp.jellyfin.initiateCount).toBe(1);

    testApp.jellyfin.approve('secret-1');
    const approved = await visit();
    expect(approved.body).toContain('<h1>User: alice</h1>');
    const password = /<h1>Pass: ([a-z]{6})<\/h1>/.exec(approved.body)?.[1];
    expect(password).toBeDefined();
    expect(jar[COOKIE_NAMES.SESSION]).toBeDefined();

    const dashboard = await visit();
    expect(dashboard.body).toContain('<h1>User: alice</h1>');
    expect(dashboard.body).not.toContain('Pass:');
    expect(jar[COOKIE_NAMES.LOGIN]).toBeUndefined();
    // The one-time password is gone from the store
    expect(await testApp.ctx.store.get(QuickConnectRecordType, 'secret-1')).toBeNull();

    const again = await visit();
    expect(again.body).toContain('<h1>User: alice</h1>');
    expect(again.body).not.toContain('<meta http-equiv="refresh"');
  });

  it('issues a new code with a notice once the old one expired', async () => {
    await visit();
    testApp.clock.advance(DEFAULT_QUICK_CONNECT_TTL_MS);

    const response = await visit();

    expect(response.body).toContain('<p>The previous code expired. Here is a new one.</p>');
    expect(response.body).toContain('<h1>Code: DEF456</h1>');
    const previous = await testApp.ctx.store.get(QuickConnectRecordType, 'secret-1');
    expect(previous?.value.status).toBe('expired');
  });

  it('restarts QuickConnect when the revealed session was invalidated', async () => {
    await visit();
    testApp.jellyfin.approve('secret-1');
    await visit();
    const [session] = await testApp.ctx.store.list(SessionRecordType);
    if (!session) throw new Error('session missing');

    await testApp.auth.invalidateSession(session.id);
    const response = await visit();

    expect(response.body).toContain('<h1>Code: DEF456</h1>');
    expect(await testApp.auth.getSession(session.id)).toBeNull();
    expect(await testApp.auth.countSessions()).toBe(0);
  });

  it('ignores a tampered cookie', async () => {
    jar = { [COOKIE_NAMES.SESSION]: 'forged-session-id' };

    const response = await visit();

    expect(response.body).toContain('<h1>Code: ABC123</h1>');
  });

  it('renders the unavailable page while Jellyfin is down', async () => {
    testApp.jellyfin.failure = new UpstreamUnavailableError('Jellyfin down');

    const response = await visit();

    expect(response.statusCode).toBe(502);
    expect(response.body).toContain('<h1>Temporarily unavailable</h1>');
    expect(response.body).toContain('<meta http-equiv="refresh" content="5" />');
  });

  it('logs out by clearing both cookies', async () => {
    await visit();

    const response = await testApp.app.inject({ method: 'POST', url: '/logout', cookies: jar });

    expect(response.statusCode).toBe(303);
    expect(response.headers.location).toBe('/');
    expect(storeCookies(jar, response)).toEqual({});
  });
});
