/**
 * Error handler plugin for Fastify
 *
 * Renders AppErrors as `{ error: code, message }` with their status code.
 * Errors that must not leak detail get a generic message; Fastify's own
 * errors (body too large, bad JSON, rate limit) keep their status.
 */

import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { isAppError, ValidationError } from '../utils/errors.js';

const GENERIC_MESSAGES: Record<number, string> = {
  502: 'Media server is unavailable',
  503: 'Service temporarily unavailable',
};

export interface ErrorBody {
  error: string;
  message: string;
  fields?: ValidationError['fields'];
}

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && typeof Reflect.get(error, 'statusCode') === 'number';
}

const errorHandlerPlugin: FastifyPluginAsync = async (app) => {
  app.setErrorHandler<Error>((error, request, reply) => {
    if (isAppError(error)) {
      const body: ErrorBody = {
        error: error.code,
        message: error.expose ? error.message : (GENERIC_MESSAGES[error.statusCode] ?? 'Internal error'),
      };
      if (error instanceof ValidationError) body.fields = error.fields;

      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      } else {
        request.log.info({ code: error.code }, error.message);
      }
      return reply.status(error.statusCode).send(body);
    }

    if (isFastifyError(error) && error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
      } satisfies ErrorBody);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Internal error' } satisfies ErrorBody);
  });
};

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});
