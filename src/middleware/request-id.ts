import type { FastifyRequest, FastifyReply } from 'fastify';

// The id itself comes from the server's `requestIdHeader`/`genReqId` options.
export async function requestIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
) {
  reply.header('x-request-id', request.id);
}
