import type { FastifyRequest, FastifyReply } from 'fastify';
import { createError } from './errorHandler';

export async function requireApiKey(
  request: FastifyRequest,
  _reply: FastifyReply
) {
  const header = request.headers['x-api-key'];
  const apiKey = typeof header === 'string' ? header : undefined;
  const expectedKey = process.env.API_KEY;

  // Without a configured key, only production refuses requests
  if (!expectedKey) {
    if (process.env.NODE_ENV === 'production') {
      throw createError('API key authentication required', 401, 'AUTH_REQUIRED');
    }
    return;
  }

  if (!apiKey || apiKey !== expectedKey) {
    throw createError('Invalid or missing API key', 401, 'INVALID_API_KEY');
  }
}
