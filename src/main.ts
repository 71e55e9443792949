// Load environment variables from .env file (local development only)
import "dotenv/config";

import { getConfig } from "./config/index.js";
import { build } from "./server.js";
import { log } from "./utils/telemetry.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";

const config = getConfig();

build()
  .then(async (app) => {
    app.log.info(
      {
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        max_attempts: config.healing.maxAttempts,
        boundary_termination: config.validation.boundaryTerminationEnabled,
        strict_transformations: config.validation.strictTransformations,
        matrix_path: config.matrix.path ?? "bundled",
        body_limit_bytes: config.server.bodyLimitBytes,
      },
      "Blueprint healing service starting"
    );

    await app.listen({ port: config.server.port, host: config.server.host });
  })
  .catch((err: unknown) => {
    log.fatal({ err }, "Failed to start server");
    process.exit(1);
  });
