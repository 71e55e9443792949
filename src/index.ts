/**
 * Blueprint validation and healing engine.
 */

export {
  BlueprintSourceError,
  HealingFailedError,
  MatrixConfigurationError,
  type HealingFailureReason,
} from "./blueprint/errors.js";
export { ZodBlueprintParser, parseBlueprintSource, type BlueprintParser, type ParseResult } from "./blueprint/parser.js";
export { resolveComponentKind, roleOf, type ComponentRole } from "./blueprint/component-kinds.js";
export {
  buildSystemGraph,
  hasPath,
  inDegree,
  outDegree,
  reachableFrom,
  type GraphEdge,
  type GraphNode,
  type SystemGraph,
} from "./graph/system-graph.js";
export {
  ConnectivityMatrix,
  checkMatrixConsistency,
  loadConnectivityMatrix,
  parseConnectivityMatrix,
  type ConnectivityRule,
} from "./matrix/connectivity-matrix.js";
export {
  COMPONENT_KINDS,
  type BindingT,
  type BlueprintT,
  type ComponentKindT,
  type ComponentT,
  type PortT,
} from "./schemas/blueprint.js";
export * from "./healing/index.js";
export * from "./validators/index.js";
