/**
 * Browser login routes
 *
 * The root page walks a browser through QuickConnect. Which step to show is
 * derived from two signed cookies:
 * - sb_login: the QuickConnect secret while a login is in flight
 * - sb_session: the session id once the login was approved
 *
 * All flow state lives in the store, so reloading or reconnecting resumes
 * where the browser left off.
 */

import type { CookieSerializeOptions } from '@fastify/cookie';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { COOKIE_NAMES } from '@spherebridge/shared';
import type { AuthSessionManager } from '../services/auth.js';
import { describeError, isAppError } from '../utils/errors.js';
import { renderCredentials, renderDashboard, renderPending, renderUnavailable } from './dashboardViews.js';

export interface DashboardRouteOptions {
  auth: AuthSessionManager;
}

/** The session cookie outlives any browser restart; sessions have no expiry */
const SESSION_COOKIE_MAX_AGE_S = 365 * 24 * 60 * 60;

function cookieOptions(request: FastifyRequest, maxAge?: number): CookieSerializeOptions {
  return {
    path: '/',
    httpOnly: true,
    sameSite: 'lax',
    secure: request.protocol === 'https',
    signed: true,
    maxAge,
  };
}

function readSignedCookie(request: FastifyRequest, name: string): string | undefined {
  const raw = request.cookies[name];
  if (!raw) return undefined;
  const result = request.unsignCookie(raw);
  return result.valid && result.value ? result.value : undefined;
}

function sendHtml(reply: FastifyReply, html: string, status = 200): FastifyReply {
  return reply.status(status).type('text/html; charset=utf-8').header('Cache-Control', 'no-store').send(html);
}

export const dashboardRoutes: FastifyPluginAsync<DashboardRouteOptions> = async (app, opts) => {
  const { auth } = opts;

  async function startLogin(
    request: FastifyRequest,
    reply: FastifyReply,
    previousSecret?: string,
    notice?: string
  ): Promise<FastifyReply> {
    const login = await auth.startLogin(previousSecret);
    const ttlSeconds = Math.max(1, Math.ceil((login.expiresAt - login.createdAt) / 1000));
    reply.setCookie(COOKIE_NAMES.LOGIN, login.secret, cookieOptions(request, ttlSeconds));
    reply.clearCookie(COOKIE_NAMES.SESSION, { path: '/' });
    return sendHtml(reply, renderPending(login.code, login.expiresAt, notice));
  }

  async function renderRoot(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    const loginSecret = readSignedCookie(request, COOKIE_NAMES.LOGIN);
    const sessionId = readSignedCookie(request, COOKIE_NAMES.SESSION);

    if (loginSecret && sessionId) {
      // The browser stored the session cookie, so it received the password
      await auth.acknowledgeLogin(loginSecret);
      reply.clearCookie(COOKIE_NAMES.LOGIN, { path: '/' });
    } else if (loginSecret) {
      const status = await auth.pollLogin(loginSecret);
      switch (status.status) {
        case 'pending':
          return sendHtml(reply, renderPending(status.code, status.expiresAt));
        case 'authorized': {
          const { identity } = status;
          reply.setCookie(
            COOKIE_NAMES.SESSION,
            identity.sessionId,
            cookieOptions(request, SESSION_COOKIE_MAX_AGE_S)
          );
          return sendHtml(reply, renderCredentials(identity.username, identity.password));
        }
        case 'expired':
          return startLogin(request, reply, loginSecret, 'The previous code expired. Here is a new one.');
        case 'unknown':
          return startLogin(request, reply, loginSecret);
      }
    }

    if (sessionId) {
      const session = await auth.getSession(sessionId);
      if (session) return sendHtml(reply, renderDashboard(session.username));
    }

    return startLogin(request, reply);
  }

  /**
   * GET / - QuickConnect code, one-time credentials, or the signed-in dashboard
   */
  app.get('/', async (request, reply) => {
    try {
      return await renderRoot(request, reply);
    } catch (error) {
      if (isAppError(error) && error.statusCode >= 500) {
        request.log.error({ code: error.code, error: describeError(error) }, 'Login page unavailable');
        return sendHtml(reply, renderUnavailable(), error.statusCode);
      }
      throw error;
    }
  });

  /**
   * POST /logout - Forget this browser's login so the flow restarts
   */
  app.post('/logout', async (_request, reply) => {
    reply.clearCookie(COOKIE_NAMES.LOGIN, { path: '/' });
    reply.clearCookie(COOKIE_NAMES.SESSION, { path: '/' });
    return reply.redirect('/', 303);
  });
};
