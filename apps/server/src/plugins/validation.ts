/**
 * Zod validation plugin for Fastify
 * Provides schema validation for request body, query, and params
 */

import type { FastifyPluginAsync, FastifyRequest, preHandlerHookHandler } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodError, ZodSchema } from 'zod';
import { ValidationError, type FieldError } from '../utils/errors.js';

// Validation schema options
export interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
  params?: ZodSchema;
}

type RequestPart = keyof ValidationSchemas;

declare module 'fastify' {
  interface FastifyInstance {
    validateRequest: (schemas: ValidationSchemas) => preHandlerHookHandler;
  }
}

/**
 * Parse Zod error into field-level errors
 */
function parseZodError(part: RequestPart, error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: `${part}.${issue.path.join('.') || 'unknown'}`,
    message: issue.message,
  }));
}

/**
 * Validate one part of the request and replace it with the parsed result
 */
function validatePart(request: FastifyRequest, part: RequestPart, schema: ZodSchema): FieldError[] {
  const result = schema.safeParse(request[part]);
  if (!result.success) return parseZodError(part, result.error);

  switch (part) {
    case 'body':
      request.body = result.data;
      break;
    case 'query':
      request.query = result.data;
      break;
    case 'params':
      request.params = result.data;
      break;
  }
  return [];
}

const validationPlugin: FastifyPluginAsync = async (app) => {
  /**
   * Create a preHandler that validates request against Zod schemas
   */
  app.decorate('validateRequest', function (schemas: ValidationSchemas): preHandlerHookHandler {
    return async function (request: FastifyRequest): Promise<void> {
      const errors: FieldError[] = [];

      if (schemas.body) errors.push(...validatePart(request, 'body', schemas.body));
      if (schemas.query) errors.push(...validatePart(request, 'query', schemas.query));
      if (schemas.params) errors.push(...validatePart(request, 'params', schemas.params));

      // If any validation errors, throw ValidationError
      if (errors.length > 0) {
        throw new ValidationError('Validation failed', errors);
      }
    };
  });
};

export default fp(validationPlugin, {
  name: 'validation',
});
