/**
 * Default ports per component kind.
 *
 * @module healing/port-templates
 */

import type { ComponentKindT } from "../schemas/blueprint.js";

export interface PortTemplate {
  name: string;
  schema: string;
}

export interface KindPortTemplate {
  inputs: readonly PortTemplate[];
  outputs: readonly PortTemplate[];
}

const ITEM_IN: PortTemplate = { name: "input", schema: "ItemSchema" };
const ITEM_OUT: PortTemplate = { name: "output", schema: "ItemSchema" };

export const PORT_TEMPLATES: Readonly<Record<ComponentKindT, KindPortTemplate>> = {
  Source: { inputs: [], outputs: [{ name: "output", schema: "common_object_schema" }] },
  EventSource: { inputs: [], outputs: [{ name: "events", schema: "EventSchema" }] },
  Transformer: { inputs: [ITEM_IN], outputs: [ITEM_OUT] },
  Filter: { inputs: [ITEM_IN], outputs: [ITEM_OUT] },
  Router: { inputs: [ITEM_IN], outputs: [ITEM_OUT] },
  Aggregator: {
    inputs: [
      { name: "input1", schema: "ItemSchema" },
      { name: "input2", schema: "ItemSchema" },
    ],
    outputs: [ITEM_OUT],
  },
  StreamProcessor: {
    inputs: [{ name: "stream", schema: "StreamSchema" }],
    outputs: [{ name: "processed", schema: "StreamSchema" }],
  },
  Controller: {
    inputs: [{ name: "control", schema: "SignalSchema" }],
    outputs: [{ name: "command", schema: "SignalSchema" }],
  },
  APIEndpoint: {
    inputs: [{ name: "request", schema: "APIRequestSchema" }],
    outputs: [{ name: "response", schema: "APIResponseSchema" }],
  },
  Store: { inputs: [ITEM_IN], outputs: [] },
  Sink: { inputs: [ITEM_IN], outputs: [] },
};

export const FALLBACK_SCHEMA = "any";

export function defaultInputPort(kind: ComponentKindT): string {
  return PORT_TEMPLATES[kind].inputs[0]?.name ?? "input";
}

export function defaultOutputPort(kind: ComponentKindT): string {
  return PORT_TEMPLATES[kind].outputs[0]?.name ?? "output";
}
