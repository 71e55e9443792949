import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";

/**
 * Observability Plugin
 *
 * One structured log line per completed request, keyed by request ID.
 * Client errors log at warn, server errors at error.
 */

async function observabilityPlugin(fastify: FastifyInstance) {
  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;
    const logData = {
      event: "http.request.completed",
      request_id: request.id,
      method: request.method,
      route: request.routeOptions.url ?? request.url,
      status: statusCode,
      duration_ms: Math.round(reply.elapsedTime),
    };

    if (statusCode >= 500) {
      request.log.error(logData, "Request completed with server error");
    } else if (statusCode >= 400) {
      request.log.warn(logData, "Request completed with client error");
    } else {
      request.log.info(logData, "Request completed");
    }
  });

  // Always logged
  fastify.addHook("onError", async (request: FastifyRequest, _reply: FastifyReply, error: Error) => {
    request.log.error(
      {
        event: "http.request.error",
        request_id: request.id,
        method: request.method,
        url: request.url,
        error: { name: error.name, message: error.message },
      },
      "Request error"
    );
  });
}

export default fp(observabilityPlugin, { name: "observability" });
