import type { FastifySchema, FastifySchemaCompiler } from 'fastify';
import type { z } from 'zod';

// Only the status setter is needed, whatever route generics the reply carries.
interface StatusReply {
  code(statusCode: number): unknown;
}

// Route schemas only feed the OpenAPI document; zod does the validation.
export const passThroughValidator: FastifySchemaCompiler<FastifySchema> = () => {
  return data => ({ value: data });
};

export function validationError(error: z.ZodError, reply: StatusReply) {
  reply.code(422);
  return {
    error: 'Validation error',
    details: error.errors.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`),
  };
}

export function notFound(message: string, reply: StatusReply) {
  reply.code(404);
  return { error: message };
}
