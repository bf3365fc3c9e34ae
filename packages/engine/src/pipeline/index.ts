import { readFile } from "fs/promises";
import { statSync } from "fs";
import { resolve, dirname } from "path";
import { availableParallelism } from "os";
import { getPythonParser } from "../parser/tree-sitter-init";
import { loadPatternLibrary, type PatternLibrary } from "../patterns/library";
import {
  buildDependencyGraph,
  detectCycles,
  analyzeTimeoutCascades,
  analyzeErrorPropagation,
} from "../graphs/dependency-graph";
import { analyzeAllContracts } from "../graphs/contract-compat";
import { ReportAggregator } from "../report/aggregator";
import { DEFAULT_MAX_FILE_BYTES } from "../config";
import { createLogger } from "../logger";
import type { Parser } from "web-tree-sitter";
import type { AnalysisNote, AnalysisReport, ComponentSource, PredictedFailure } from "../types";
import { findPythonFiles, loadComponents, toRelative, type DiscoveredFile } from "./discovery";
import { analyzeSource, type FileOutcome } from "./analyze-file";
import { mapConcurrent } from "./concurrency";

const log = createLogger("pipeline");

export type AnalysisStage = "loading_rules" | "discovery" | "analyzing" | "integration" | "done";

export interface AnalysisOptions {
  /** Directory to analyze, or a single .py file. */
  rootPath: string;
  /** Project rule file overlaid on the bundled defaults. */
  patternsPath?: string;
  /** Pre-loaded rules; takes precedence over patternsPath. */
  patterns?: PatternLibrary;
  concurrency?: number;
  lookbackLines?: number;
  timeoutOverheadSeconds?: number;
  maxFileBytes?: number;
  wasmPath?: string;
  /** Checked before each file; an aborted run reports the files completed so far. */
  signal?: AbortSignal;
  onProgress?: (stage: AnalysisStage, percent: number) => void | Promise<void>;
}

function targetOf(rootPath: string): { root: string; single: DiscoveredFile | null } {
  const abs = resolve(rootPath);
  if (statSync(abs).isFile()) {
    const root = dirname(abs);
    return { root, single: { path: abs, rel: toRelative(root, abs) } };
  }
  return { root: abs, single: null };
}

/**
 * Analyze a source tree.
 *
 * Rejects only when the grammar cannot be loaded or the root does not
 * exist; every per-file problem becomes a note in the report.
 */
export async function runAnalysis(opts: AnalysisOptions): Promise<AnalysisReport> {
  const progress = async (stage: AnalysisStage, percent: number) => {
    if (opts.onProgress) await opts.onProgress(stage, percent);
  };
  const maxFileBytes = opts.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const concurrency = opts.concurrency ?? availableParallelism();

  // ── Stage 1: Rules & grammar ──
  await progress("loading_rules", 0);
  const preloadNotes: AnalysisNote[] = [];
  let patterns = opts.patterns;
  if (!patterns) {
    const loaded = loadPatternLibrary(opts.patternsPath);
    patterns = loaded.library;
    preloadNotes.push(...loaded.notes);
  }
  const { parser } = await getPythonParser(opts.wasmPath);

  // ── Stage 2: Discovery ──
  await progress("discovery", 5);
  const { root, single } = targetOf(opts.rootPath);
  const aggregator = new ReportAggregator(root);
  for (const n of preloadNotes) aggregator.addNote(n);

  const discovery = single ? { files: [single], notes: [] } : findPythonFiles(root, maxFileBytes);
  for (const n of discovery.notes) aggregator.addNote(n);
  log.info(`analyzing ${discovery.files.length} files under ${root} (concurrency ${concurrency})`);

  // ── Stage 3: Per-file analysis ──
  await progress("analyzing", 10);
  const library = patterns;
  const finished = await mapConcurrent(
    discovery.files,
    concurrency,
    async (file) => {
      let source: string;
      try {
        source = await readFile(file.path, "utf-8");
      } catch (e: unknown) {
        aggregator.addNote({ kind: "io_error", file: file.rel, message: e instanceof Error ? e.message : String(e) });
        return true;
      }
      let outcome: FileOutcome;
      try {
        outcome = analyzeSource(parser, library, file.rel, source, opts.lookbackLines);
      } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        log.error(`analysis of ${file.rel} failed: ${message}`);
        aggregator.addNote({ kind: "analysis_error", file: file.rel, message });
        return true;
      }
      if (outcome.ok) {
        aggregator.add(outcome.result);
      } else {
        log.warn(`skipping ${file.rel}: ${outcome.note.message}`);
        aggregator.addNote(outcome.note);
      }
      return true;
    },
    opts.signal,
  );

  const completed = finished.filter((done) => done === true).length;
  const cancelled = completed < discovery.files.length;
  if (cancelled) {
    log.warn(`cancelled after ${completed} of ${discovery.files.length} files`);
    await progress("done", 100);
    return aggregator.build(true);
  }

  // ── Stage 4: Integration prediction ──
  await progress("integration", 85);
  if (!single) {
    const { components, notes } = loadComponents(root, maxFileBytes);
    for (const n of notes) aggregator.addNote(n);
    if (components.length > 0) {
      aggregator.addFailures(predictIntegrationFailures(components, library, parser, opts.timeoutOverheadSeconds));
    }
  }

  await progress("done", 100);
  const report = aggregator.build(false);
  log.info(
    `done: ${report.summary.total} findings (${report.summary.critical} critical), ${report.notes.length} notes`,
  );
  return report;
}

function predictIntegrationFailures(
  components: readonly ComponentSource[],
  patterns: PatternLibrary,
  parser: Parser,
  overhead?: number,
): PredictedFailure[] {
  const { integration } = patterns;
  const graph = buildDependencyGraph(components, {
    parser,
    errorHandlingMarkers: integration.errorHandlingMarkers,
    retryMarkers: integration.retryMarkers,
  });
  createLogger("graph").info(`${graph.components.size} components, ${graph.edges.length} edges`);
  return [
    ...detectCycles(graph, integration.failures),
    ...analyzeTimeoutCascades(graph, overhead ?? integration.timeoutOverheadSeconds, integration.failures),
    ...analyzeErrorPropagation(graph, integration.failures),
    ...analyzeAllContracts(components, integration.failures),
  ];
}
