export {
  buildDependencyGraph,
  referencesComponent,
  detectCycles,
  analyzeTimeoutCascades,
  analyzeErrorPropagation,
} from "./dependency-graph";
export type { GraphOptions } from "./dependency-graph";
export {
  analyzeContractCompatibility,
  analyzeAllContracts,
  contractTimeout,
  datetimeFormat,
  idFormat,
} from "./contract-compat";
