import Fastify, { type FastifyInstance } from "fastify";
import { getConfig } from "./config/index.js";
import { loadConnectivityMatrix, type ConnectivityMatrix } from "./matrix/connectivity-matrix.js";
import observabilityPlugin from "./plugins/observability.js";
import blueprintRoutes from "./routes/v1.blueprints.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { getOrGenerateRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";

export interface BuildOptions {
  /** Matrix to validate against; loaded from CONNECTIVITY_MATRIX_PATH or the bundled file otherwise */
  matrix?: ConnectivityMatrix;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run from main.ts)
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();
  const matrix = options.matrix ?? loadConnectivityMatrix({ path: config.matrix.path });

  const app = Fastify({
    logger: createLoggerConfig(config.logging.level),
    genReqId: getOrGenerateRequestId,
    bodyLimit: config.server.bodyLimitBytes,
  });

  // Echo the request ID so callers can correlate logs
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request.id);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      request.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      request.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    return reply.status(statusCode).send(errorV1);
  });

  await app.register(observabilityPlugin);

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    matrix_kinds: matrix.kinds().length,
  }));

  await app.register(blueprintRoutes, { matrix });

  return app;
}
