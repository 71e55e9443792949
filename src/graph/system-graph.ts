/**
 * System Graph
 *
 * Directed-graph view of a typed blueprint. Nodes are component names;
 * there is one edge per (from_component, to_component) pair, annotated
 * with every port pair that produced it.
 *
 * @module graph/system-graph
 */

import type { BlueprintT, ComponentKindT } from "../schemas/blueprint.js";

export interface GraphNode {
  name: string;
  kind: ComponentKindT;
  inputCount: number;
  outputCount: number;
  index: number;
}

export interface EdgePort {
  fromPort: string;
  toPort: string;
  bindingIndex: number;
}

export interface GraphEdge {
  from: string;
  to: string;
  ports: EdgePort[];
}

export interface SystemGraph {
  nodes: ReadonlyMap<string, GraphNode>;
  edges: ReadonlyMap<string, GraphEdge>;
  forward: ReadonlyMap<string, readonly string[]>;
  reverse: ReadonlyMap<string, readonly string[]>;
}

export function edgeKey(from: string, to: string): string {
  return `${from}->${to}`;
}

/**
 * Build the graph. Binding endpoints that do not name a component are
 * skipped; the typed parse reports them.
 */
export function buildSystemGraph(document: BlueprintT): SystemGraph {
  const nodes = new Map<string, GraphNode>();
  document.components.forEach((component, index) => {
    nodes.set(component.name, {
      name: component.name,
      kind: component.type,
      inputCount: component.inputs.length,
      outputCount: component.outputs.length,
      index,
    });
  });

  const edges = new Map<string, GraphEdge>();
  const forward = new Map<string, string[]>();
  const reverse = new Map<string, string[]>();

  document.bindings.forEach((binding, bindingIndex) => {
    if (!nodes.has(binding.from_component)) return;

    binding.to_components.forEach((target, targetIndex) => {
      if (!nodes.has(target)) return;

      const key = edgeKey(binding.from_component, target);
      const port: EdgePort = {
        fromPort: binding.from_port,
        toPort: binding.to_ports[targetIndex] ?? "",
        bindingIndex,
      };

      const existing = edges.get(key);
      if (existing) {
        existing.ports.push(port);
        return;
      }

      edges.set(key, { from: binding.from_component, to: target, ports: [port] });

      const fwdList = forward.get(binding.from_component) ?? [];
      fwdList.push(target);
      forward.set(binding.from_component, fwdList);

      const revList = reverse.get(target) ?? [];
      revList.push(binding.from_component);
      reverse.set(target, revList);
    });
  });

  return { nodes, edges, forward, reverse };
}

export function successors(graph: SystemGraph, name: string): readonly string[] {
  return graph.forward.get(name) ?? [];
}

export function predecessors(graph: SystemGraph, name: string): readonly string[] {
  return graph.reverse.get(name) ?? [];
}

export function outDegree(graph: SystemGraph, name: string): number {
  return successors(graph, name).length;
}

export function inDegree(graph: SystemGraph, name: string): number {
  return predecessors(graph, name).length;
}

/**
 * BFS forward traversal. The start node is included in the result.
 */
export function reachableFrom(graph: SystemGraph, start: string): Set<string> {
  const visited = new Set<string>([start]);
  const queue: string[] = [start];

  for (let head = 0; head < queue.length; head++) {
    for (const neighbor of successors(graph, queue[head])) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        queue.push(neighbor);
      }
    }
  }

  return visited;
}

/**
 * Whether a directed path leads from `from` to `to`. A node always
 * reaches itself.
 */
export function hasPath(graph: SystemGraph, from: string, to: string): boolean {
  if (from === to) return true;
  return reachableFrom(graph, from).has(to);
}
