/**
 * Port inference.
 *
 * Fills in ports a blueprint leaves out: template defaults for an empty
 * direction, plus any port a binding names that the component lacks. Only
 * ever adds ports; existing ones are kept as declared.
 *
 * @module healing/port-inference
 */

import type { BlueprintT, ComponentT, PortT } from "../schemas/blueprint.js";
import { FALLBACK_SCHEMA, PORT_TEMPLATES, type PortTemplate } from "./port-templates.js";

export interface PortInference {
  inferPorts(document: BlueprintT): BlueprintT;
}

function templatePort(template: PortTemplate): PortT {
  return {
    name: template.name,
    schema_id: template.schema,
    required: true,
    boundary_ingress: false,
    boundary_egress: false,
    reply_required: false,
    satisfies_reply: false,
  };
}

function impliedPort(name: string, templates: readonly PortTemplate[]): PortT {
  const match = templates.find((t) => t.name === name);
  return templatePort({ name, schema: match?.schema ?? FALLBACK_SCHEMA });
}

export class TemplatePortInference implements PortInference {
  inferPorts(document: BlueprintT): BlueprintT {
    const components = new Map<string, ComponentT>();

    for (const component of document.components) {
      const template = PORT_TEMPLATES[component.type];
      const inputs =
        component.inputs.length > 0 ? [...component.inputs] : template.inputs.map(templatePort);
      // A terminal component never gains outputs
      const outputs =
        component.outputs.length > 0 || component.terminal_hint
          ? [...component.outputs]
          : template.outputs.map(templatePort);
      components.set(component.name, { ...component, inputs, outputs });
    }

    for (const binding of document.bindings) {
      const source = components.get(binding.from_component);
      if (source && !source.terminal_hint && !source.outputs.some((p) => p.name === binding.from_port)) {
        source.outputs.push(impliedPort(binding.from_port, PORT_TEMPLATES[source.type].outputs));
      }

      binding.to_components.forEach((targetName, index) => {
        const target = components.get(targetName);
        const portName = binding.to_ports[index];
        if (!target || portName === undefined) return;
        if (!target.inputs.some((p) => p.name === portName)) {
          target.inputs.push(impliedPort(portName, PORT_TEMPLATES[target.type].inputs));
        }
      });
    }

    return {
      ...document,
      components: document.components.map((c) => components.get(c.name) ?? c),
    };
  }
}
