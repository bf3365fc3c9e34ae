export * from "./types";
export { runAnalysis } from "./pipeline";
export type { AnalysisOptions, AnalysisStage } from "./pipeline";
export { analyzeSource } from "./pipeline/analyze-file";
export type { FileOutcome } from "./pipeline/analyze-file";

// ── Syntax trees & rules ──

export {
  getPythonParser,
  parseSource,
  SyntaxTree,
  functionsOf,
  describeFunction,
} from "./parser";
export type { FunctionInfo, ParseError, ParseResult } from "./parser";
export { loadPatternLibrary, defaultRulesPath, MINIMAL_RULES, RuleFileSchema } from "./patterns";
export type { PatternLibrary, BusinessPattern, RequiredElement, FailureRule, LoadedPatterns, RuleFile } from "./patterns";
export { ContextWindow, checkPattern, DEFAULT_LOOKBACK_LINES } from "./context";
export type { CheckKind, GuardKind } from "./context";

// ── Analyzers ──

export { ALL_DETECTORS, runDetectors } from "./detectors";
export { verifyBusinessLogic, verifyErrorHandling, verifyInputValidation } from "./semantic";
export { scanSecurity, scanSqlInjection, scanPiiLogging, scanMissingAuthentication } from "./security";
export { checkStandards } from "./standards";
export {
  buildDependencyGraph,
  detectCycles,
  analyzeTimeoutCascades,
  analyzeErrorPropagation,
  analyzeContractCompatibility,
  analyzeAllContracts,
} from "./graphs";
export type { GraphOptions } from "./graphs";

// ── Reporting & config ──

export { ReportAggregator, compareViolations, summarize, exitCodeFor, formatJsonReport, formatTextReport } from "./report";
export { loadEngineConfig, DEFAULT_MAX_FILE_BYTES } from "./config";
export type { EngineConfig } from "./config";
export { createLogger, setQuiet } from "./logger";
export type { Logger } from "./logger";
