import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { isEngineError, type EngineErrorCode } from '../errors.js';

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  TEAM_NOT_FOUND: 404,
  MODELS_NOT_LOADED: 503,
  DATA_UNAVAILABLE: 503,
  FEATURE_UNAVAILABLE: 422,
  INSUFFICIENT_DATA: 422,
  MODEL_OUTPUT_INVALID: 500,
};

export function httpStatusFor(code: EngineErrorCode): number {
  return STATUS_BY_CODE[code];
}

export async function errorHandler(
  err: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply> {
  if (isEngineError(err)) {
    request.log.info({ code: err.code }, err.message);
    return reply.status(httpStatusFor(err.code)).send({ error: err.toJSON() });
  }
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    const where = issue?.path.join('.') || 'request';
    return reply.status(400).send({
      error: { code: 'BAD_REQUEST', message: `${where}: ${issue?.message ?? 'invalid'}` },
    });
  }
  if (err.statusCode && err.statusCode < 500) {
    return reply.status(err.statusCode).send({ error: { code: 'BAD_REQUEST', message: err.message } });
  }
  request.log.error({ err }, 'Unhandled error');
  return reply.status(500).send({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}
