import { z } from "zod";

export const COMPONENT_KINDS = [
  "Source",
  "EventSource",
  "Transformer",
  "Filter",
  "Router",
  "Aggregator",
  "StreamProcessor",
  "Controller",
  "APIEndpoint",
  "Store",
  "Sink",
] as const;

export const ComponentKind = z.enum(COMPONENT_KINDS);

export const Statefulness = z.enum(["stateless", "stateful"]);

export const SYSTEM_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;
export const COMPONENT_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

// Kinds whose components persist data unless told otherwise
const DURABLE_BY_DEFAULT: ReadonlySet<string> = new Set(["Store"]);
const STATEFUL_BY_DEFAULT: ReadonlySet<string> = new Set(["Store", "Aggregator"]);

/**
 * Port. Accepts `schema` or the older `schema_type` key for the type label
 * and exposes it as `schema_id`.
 */
export const Port = z
  .object({
    name: z.string().min(1),
    schema: z.string().min(1).optional(),
    schema_type: z.string().min(1).optional(),
    required: z.boolean().default(true),
    boundary_ingress: z.boolean().default(false),
    boundary_egress: z.boolean().default(false),
    reply_required: z.boolean().default(false),
    satisfies_reply: z.boolean().default(false),
    data_classification: z.string().optional(),
    description: z.string().optional(),
  })
  .transform(({ schema, schema_type, ...rest }) => ({
    ...rest,
    schema_id: schema ?? schema_type,
  }));

/**
 * Component. `terminal` is accepted as an alias of `terminal_hint`.
 */
export const Component = z
  .object({
    name: z
      .string()
      .regex(COMPONENT_NAME_PATTERN, "Component name must start with a letter and contain only letters, digits, '_' or '-'"),
    type: ComponentKind,
    description: z.string().optional(),
    inputs: z.array(Port).default([]),
    outputs: z.array(Port).default([]),
    durable: z.boolean().optional(),
    terminal: z.boolean().optional(),
    terminal_hint: z.boolean().optional(),
    statefulness: Statefulness.optional(),
  })
  .transform(({ terminal, terminal_hint, durable, statefulness, ...rest }) => ({
    ...rest,
    durable: durable ?? DURABLE_BY_DEFAULT.has(rest.type),
    terminal_hint: terminal_hint ?? terminal ?? false,
    statefulness: statefulness ?? (STATEFUL_BY_DEFAULT.has(rest.type) ? "stateful" : "stateless"),
  }));

/**
 * Binding in canonical form. Other accepted shapes are rewritten into this
 * one by the healer before parsing.
 */
export const Binding = z
  .object({
    from_component: z.string().min(1),
    from_port: z.string().min(1),
    to_components: z.array(z.string().min(1)).min(1),
    to_ports: z.array(z.string().min(1)),
    transformation: z.string().min(1).optional(),
    transformation_synthesized: z.boolean().default(false),
    condition: z.string().optional(),
    description: z.string().optional(),
    generated_by: z.string().optional(),
  })
  .refine((binding) => binding.to_components.length === binding.to_ports.length, {
    message: "to_components and to_ports must have the same length",
    path: ["to_ports"],
    params: { code: "ARITY_MISMATCH" },
  });

export const SystemBlock = z.object({
  name: z
    .string()
    .regex(SYSTEM_NAME_PATTERN, "System name must be snake_case and start with a lowercase letter"),
  description: z.string().optional(),
  version: z.string().default("1.0.0"),
  components: z.array(Component).min(1),
  bindings: z.array(Binding),
});

export const Blueprint = z
  .object({
    schema_version: z.string().min(1),
    system: SystemBlock,
    policy: z.record(z.string(), z.unknown()).default({}),
    schemas: z.record(z.string(), z.unknown()).default({}),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.system.components.forEach((component, index) => {
      if (seen.has(component.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate component name '${component.name}'`,
          path: ["system", "components", index, "name"],
          params: { code: "DUPLICATE_COMPONENT" },
        });
      }
      seen.add(component.name);
    });

    doc.system.bindings.forEach((binding, index) => {
      if (!seen.has(binding.from_component)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Binding source '${binding.from_component}' is not a declared component`,
          path: ["system", "bindings", index, "from_component"],
          params: { code: "UNKNOWN_COMPONENT_REF" },
        });
      }
      binding.to_components.forEach((target, targetIndex) => {
        if (!seen.has(target)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Binding target '${target}' is not a declared component`,
            path: ["system", "bindings", index, "to_components", targetIndex],
            params: { code: "UNKNOWN_COMPONENT_REF" },
          });
        }
      });
    });
  })
  .transform((doc) => ({
    schemaVersion: doc.schema_version,
    name: doc.system.name,
    description: doc.system.description,
    version: doc.system.version,
    components: doc.system.components,
    bindings: doc.system.bindings,
    policy: doc.policy,
    schemas: doc.schemas,
  }));

export type ComponentKindT = z.infer<typeof ComponentKind>;
export type PortT = z.infer<typeof Port>;
export type ComponentT = z.infer<typeof Component>;
export type BindingT = z.infer<typeof Binding>;
export type BlueprintT = z.infer<typeof Blueprint>;
