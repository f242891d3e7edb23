/**
 * HereSphere API routes
 *
 * Every response carries the HereSphere JSON header. Callers that cannot be
 * resolved to a live session get HereSphere's own `access: -1` body with a
 * 200, which the player renders as a login prompt.
 */

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import {
  HERESPHERE_ACCESS,
  HERESPHERE_AUTH_HEADER,
  HERESPHERE_JSON_HEADER,
  HERESPHERE_JSON_VERSION,
  eventParamsSchema,
  eventQuerySchema,
  heresphereAuthSchema,
  heresphereEventSchema,
  heresphereRequestSchema,
  itemIdParamSchema,
  type EventParams,
  type EventQuery,
  type HereSphereAuthRequest,
  type HereSphereAuthResponse,
  type HereSphereEvent,
  type HereSphereRequest,
  type ItemIdParam,
} from '@spherebridge/shared';
import type { SessionRecord } from '../db/records.js';
import type { HereSphereService } from '../services/heresphere/service.js';
import { AuthExpiredError } from '../utils/errors.js';

export interface HereSphereRouteOptions {
  heresphere: HereSphereService;
}

/** HereSphere sometimes posts without a body */
const requestBodySchema = heresphereRequestSchema.default({});

const DENIED = { access: HERESPHERE_ACCESS.DENIED } as const;

/**
 * Base URL the player used to reach us; links handed back must match it
 */
export function publicBaseUrl(request: FastifyRequest): string {
  return `${request.protocol}://${request.host}`;
}

function authToken(request: FastifyRequest): string | undefined {
  const header = request.headers[HERESPHERE_AUTH_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.length > 0 ? value : undefined;
}

export const heresphereRoutes: FastifyPluginAsync<HereSphereRouteOptions> = async (app, opts) => {
  const { heresphere } = opts;

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header(HERESPHERE_JSON_HEADER, HERESPHERE_JSON_VERSION);
    return payload;
  });

  /**
   * Resolve the caller and run the handler. A token Jellyfin no longer
   * accepts ends the session and reads as a denied login.
   */
  async function withSession<T>(
    request: FastifyRequest,
    body: HereSphereRequest,
    reply: FastifyReply,
    denied: object,
    handler: (session: SessionRecord) => Promise<T>
  ): Promise<T | FastifyReply> {
    const session = await heresphere.authenticate({
      token: authToken(request),
      username: body.username,
      password: body.password,
    });
    if (!session) return reply.send(denied);

    try {
      return await handler(session);
    } catch (error) {
      if (error instanceof AuthExpiredError) {
        request.log.warn({ sessionId: session.id }, 'Jellyfin rejected session token');
        return reply.send(denied);
      }
      throw error;
    }
  }

  /**
   * POST /heresphere/auth - Exchange local credentials for an auth token
   */
  app.post<{ Body: HereSphereAuthRequest }>(
    '/auth',
    {
      preHandler: [app.validateRequest({ body: heresphereAuthSchema })],
      config: { rateLimit: { max: 10, timeWindow: '1 minute' } },
    },
    async (request): Promise<HereSphereAuthResponse> => {
      const result = await heresphere.login(request.body.username, request.body.password);
      if (!result) return DENIED;
      return { 'auth-token': result.token, access: HERESPHERE_ACCESS.GRANTED };
    }
  );

  /**
   * POST /heresphere - Library index
   */
  app.post<{ Body: HereSphereRequest }>(
    '/',
    { preHandler: [app.validateRequest({ body: requestBodySchema })] },
    async (request, reply) =>
      withSession(request, request.body, reply, { ...DENIED, library: [] }, (session) =>
        heresphere.getIndex(session, publicBaseUrl(request))
      )
  );

  /**
   * POST /heresphere/scan - Bulk metadata for every library entry
   */
  app.post<{ Body: HereSphereRequest }>(
    '/scan',
    { preHandler: [app.validateRequest({ body: requestBodySchema })] },
    async (request, reply) =>
      withSession(request, request.body, reply, { ...DENIED, scanData: [] }, (session) =>
        heresphere.getScan(session, publicBaseUrl(request))
      )
  );

  /**
   * POST /heresphere/events/:sid/:id - Playback callback
   *
   * Answers as soon as the state is stored; relaying to Jellyfin continues
   * in the background.
   */
  app.post<{ Params: EventParams; Querystring: EventQuery; Body: HereSphereEvent }>(
    '/events/:sid/:id',
    {
      preHandler: [
        app.validateRequest({
          params: eventParamsSchema,
          query: eventQuerySchema,
          body: heresphereEventSchema,
        }),
      ],
    },
    async (request, reply) => {
      const { sid, id } = request.params;
      const result = await heresphere.handleEvent(sid, id, request.body, request.query.runtime);
      if (!result) {
        request.log.debug({ sessionId: sid }, 'Playback event for unknown session');
      }
      return reply.status(200).send();
    }
  );

  /**
   * POST /heresphere/:id - Video detail
   */
  app.post<{ Params: ItemIdParam; Body: HereSphereRequest }>(
    '/:id',
    {
      preHandler: [app.validateRequest({ params: itemIdParamSchema, body: requestBodySchema })],
    },
    async (request, reply) =>
      withSession(request, request.body, reply, DENIED, (session) =>
        heresphere.getVideo(
          session,
          request.params.id,
          publicBaseUrl(request),
          request.body.needsMediaSource ?? false
        )
      )
  );
};
