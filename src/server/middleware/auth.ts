import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Build the API key preHandler for mutating routes.
 * Validates `Authorization: Bearer <key>`; passes everything when no key is
 * configured.
 */
export function createApiKeyAuth(apiKey: string | undefined): preHandlerAsyncHookHandler {
  return async function apiKeyAuth(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | void> {
    if (!apiKey) {
      return;
    }

    const authHeader = request.headers.authorization;

    if (!authHeader) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Authorization header required',
          undefined,
          request.id
        )
      );
    }

    if (!authHeader.startsWith('Bearer ')) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Invalid authorization format. Use: Bearer <api-key>',
          undefined,
          request.id
        )
      );
    }

    const token = authHeader.slice('Bearer '.length);

    if (token !== apiKey) {
      return reply.status(401).send(
        createErrorResponse(ErrorCode.UNAUTHORIZED, 'Invalid API key', undefined, request.id)
      );
    }
  };
}
