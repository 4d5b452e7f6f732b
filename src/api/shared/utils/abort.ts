import type { FastifyReply } from "fastify";

/**
 * Signal that fires when the client disconnects before the reply is
 * written, e.g. an autocomplete request superseded by the next keystroke.
 */
export function abortSignalFor(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  const response = reply.raw;

  response.once("close", () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}
