export {
  loadTopology,
  readTopologyConfig,
  validateTopology,
} from "./configGenerator";
export type { LoadOptions, ValidationResult } from "./configGenerator";
export type { TopologyConfig } from "./configTypes";
export * from "./constants";
export * from "./errors";
export {
  buildDependencyGraph,
  dependencyLevels,
  findCycle,
  restrictTo,
  topologicalOrder,
  topologyEntities,
} from "./graph";
export { orchestrate } from "./orchestrator";
export type { OrchestrateOptions } from "./orchestrator";
export { FabricCliTools, getProvider, Providers } from "./providers";
export type { Client, FabricTools, Provider } from "./providers";
export { reconcileEntity } from "./reconcilers";
export {
  EXIT_CONVERGENCE,
  EXIT_OK,
  EXIT_VALIDATION,
  exitCodeFor,
  printReport,
  reportContent,
  writeReport,
} from "./report";
export { IllegalTransitionError, StatusMap } from "./status";
export { converge } from "./supervisor";
export type { ConvergeOptions } from "./supervisor";
export type {
  ConvergenceReport,
  DependencyGraph,
  Entity,
  EntityKind,
  EntityState,
  EntityStatus,
  ReconcileResult,
  Settings,
  Topology,
} from "./types";
