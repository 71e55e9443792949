import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { parseBlueprintSource, ZodBlueprintParser } from "../blueprint/parser.js";
import { buildSystemGraph } from "../graph/system-graph.js";
import { HealingOrchestrator } from "../healing/healing-orchestrator.js";
import type { ConnectivityMatrix } from "../matrix/connectivity-matrix.js";
import { buildErrorV1, getStatusCodeForErrorCode } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import {
  ArchitecturalValidator,
  classifyArchitecture,
  hasErrors,
  resolveValidatorOptions,
  summarizeIssues,
} from "../validators/architectural-validator.js";

const ValidateInput = z
  .object({
    blueprint: z.record(z.string(), z.unknown()).optional(),
    blueprint_yaml: z.string().min(1).optional(),
  })
  .refine((body) => (body.blueprint === undefined) !== (body.blueprint_yaml === undefined), {
    message: "Provide exactly one of blueprint or blueprint_yaml",
  });

const HealInput = z
  .object({
    blueprint: z.record(z.string(), z.unknown()).optional(),
    blueprint_yaml: z.string().min(1).optional(),
    max_attempts: z.number().int().min(1).max(20).optional(),
  })
  .refine((body) => (body.blueprint === undefined) !== (body.blueprint_yaml === undefined), {
    message: "Provide exactly one of blueprint or blueprint_yaml",
  });

function resolveBlueprint(body: { blueprint?: Record<string, unknown>; blueprint_yaml?: string }): unknown {
  return body.blueprint ?? parseBlueprintSource(body.blueprint_yaml ?? "");
}

export interface BlueprintRoutesOptions {
  matrix: ConnectivityMatrix;
}

const blueprintRoutes: FastifyPluginAsync<BlueprintRoutesOptions> = async (app, opts) => {
  const parser = new ZodBlueprintParser();
  const validatorOptions = resolveValidatorOptions();
  const validator = new ArchitecturalValidator(opts.matrix, validatorOptions);
  const orchestrator = new HealingOrchestrator({ matrix: opts.matrix, parser, validator });

  app.post("/v1/blueprints/validate", async (req, reply) => {
    const parsed = ValidateInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid input", { validation_errors: parsed.error.flatten() }, req.id)
      );
    }

    const result = parser.parse(resolveBlueprint(parsed.data));
    if (!result.ok) {
      reply.code(getStatusCodeForErrorCode("BAD_INPUT"));
      return reply.send(
        buildErrorV1(
          "BAD_INPUT",
          "Blueprint failed structural validation",
          { structural_errors: result.errors },
          req.id
        )
      );
    }

    const issues = validator.validate(result.document, req.id);
    return {
      valid: !hasErrors(issues),
      pattern: classifyArchitecture(buildSystemGraph(result.document), validatorOptions),
      summary: summarizeIssues(issues),
      issues,
    };
  });

  app.post("/v1/blueprints/heal", async (req, reply) => {
    const parsed = HealInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid input", { validation_errors: parsed.error.flatten() }, req.id)
      );
    }

    const outcome = orchestrator.healAndValidate(resolveBlueprint(parsed.data), {
      maxAttempts: parsed.data.max_attempts,
      requestId: req.id,
    });

    if (outcome.status === "failed") {
      log.info(
        { event: "blueprint.heal.rejected", request_id: req.id, reason: outcome.reason, attempts: outcome.attempts },
        "Blueprint could not be healed"
      );
      reply.code(getStatusCodeForErrorCode("UNPROCESSABLE"));
      return reply.send({
        status: outcome.status,
        reason: outcome.reason,
        attempts: outcome.attempts,
        issues: outcome.issues,
        operations: outcome.operations,
      });
    }

    return {
      status: outcome.status,
      attempts: outcome.attempts,
      document: outcome.rawDocument,
      issues: outcome.issues,
      operations: outcome.operations,
    };
  });
};

export default blueprintRoutes;
