// ── Core Types for the codeward Analysis Engine ──

import type { SyntaxTree } from "../parser/syntax-tree";
import type { ContextWindow } from "../context/context-window";
import type { PatternLibrary } from "../patterns/library";

export type Severity = "critical" | "warning" | "info";

export const SEVERITY_ORDER: Record<Severity, number> = {
  critical: 0,
  warning: 1,
  info: 2,
};

export type ViolationType =
  | "null_safety"
  | "collection_safety"
  | "external_call_safety"
  | "timeout_presence"
  | "type_safety"
  | "bounds_safety"
  | "exception_handling"
  | "concurrency_safety"
  | "business_logic_incomplete"
  | "error_handling_missing"
  | "data_flow_validation_missing"
  | "data_flow_pii_leak"
  | "security_sql_injection"
  | "security_missing_authentication"
  | "non_standard_error_code"
  | "non_standard_timeout"
  | "unix_timestamp_usage"
  | "custom_datetime_format"
  | "raw_dict_response";

export interface Violation {
  readonly file: string;
  readonly line: number;
  readonly type: ViolationType;
  readonly severity: Severity;
  readonly description: string;
  readonly snippet: string;
  readonly suggestion: string;
}

// ── Notes (files that could not be analyzed, config fallbacks) ──

export type NoteKind = "parse_error" | "io_error" | "config_error" | "analysis_error";

export interface AnalysisNote {
  readonly kind: NoteKind;
  readonly file: string;
  readonly message: string;
}

// ── Integration Prediction ──

export type FailureType =
  | "circular_dependency"
  | "timeout_cascade"
  | "missing_error_handling"
  | "missing_retry"
  | "data_format_mismatch";

export interface PredictedFailure {
  readonly failureType: FailureType;
  readonly componentA: string;
  readonly componentB: string;
  readonly description: string;
  readonly severity: Severity;
  readonly fixStrategy: string;
  readonly cyclePath?: readonly string[];
}

export interface SourceFile {
  /** Path relative to the analysis root, always with forward slashes. */
  path: string;
  content: string;
}

export interface ComponentSource {
  name: string;
  files: SourceFile[];
  /** Declared timeout in seconds, if the component has one. */
  timeout?: number;
  contract?: Record<string, unknown>;
}

export interface ComponentEdge {
  caller: string;
  callee: string;
  hasErrorHandling: boolean;
  hasRetry: boolean;
  /** Callee's declared timeout in seconds. */
  timeout?: number;
}

export interface DependencyGraph {
  components: Map<string, ComponentSource>;
  /** Adjacency list, callee names sorted. */
  adjacency: Map<string, string[]>;
  edges: ComponentEdge[];
}

// ── Report ──

export interface ReportSummary {
  total: number;
  critical: number;
  warning: number;
  info: number;
  byType: Record<string, number>;
}

export interface AnalysisReport {
  readonly root: string;
  readonly summary: ReportSummary;
  readonly violations: readonly Violation[];
  readonly predictedFailures: readonly PredictedFailure[];
  readonly notes: readonly AnalysisNote[];
  readonly analyzedFiles: readonly string[];
  readonly cancelled: boolean;
}

/** Everything the pipeline learned about one file. */
export interface FileResult {
  file: string;
  lineCount: number;
  violations: Violation[];
  notes: AnalysisNote[];
}

// ── Detectors ──

export interface DetectorContext {
  tree: SyntaxTree;
  window: ContextWindow;
  patterns: PatternLibrary;
}

export interface Detector {
  id: number;
  name: string;
  /** Violation types this detector can emit. */
  types: readonly ViolationType[];
  detect(ctx: DetectorContext): Violation[];
}
