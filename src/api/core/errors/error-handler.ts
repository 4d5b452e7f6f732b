import { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { AppError } from "./app-error";

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && "statusCode" in error;
}

export type ErrorHandler = (
  error: FastifyError | AppError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
) => Promise<FastifyReply>;

/**
 * Global error handler. Every failure leaves as `{ detail, code }`;
 * unexpected 5xx messages are shown only when `env` is development.
 */
export function createErrorHandler(env: string): ErrorHandler {
  const exposeInternalErrors = env === "development";

  return async function errorHandler(error, request, reply) {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) request.log.error(error);
      else request.log.warn({ code: error.code }, error.message);

      return reply.status(error.statusCode).send({
        detail: error.message,
        code: error.code,
      });
    }

    // Fastify schema validation
    if (isFastifyError(error) && error.validation) {
      request.log.warn({ validation: error.validation }, error.message);
      return reply.status(400).send({
        detail: error.message,
        code: "VALIDATION_ERROR",
      });
    }

    request.log.error(error);

    const statusCode = isFastifyError(error) && error.statusCode ? error.statusCode : 500;
    const detail =
      statusCode < 500 || exposeInternalErrors
        ? error.message
        : "Internal server error";

    return reply.status(statusCode).send({
      detail,
      code: isFastifyError(error) && error.code ? error.code : "INTERNAL_ERROR",
    });
  };
}
