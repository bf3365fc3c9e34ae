import type {
  AnalysisNote,
  AnalysisReport,
  FileResult,
  PredictedFailure,
  ReportSummary,
  Violation,
} from "../types";
import { SEVERITY_ORDER } from "../types";

function cmp(a: string | number, b: string | number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareViolations(a: Violation, b: Violation): number {
  return (
    SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] ||
    cmp(a.file, b.file) ||
    a.line - b.line ||
    cmp(a.type, b.type) ||
    cmp(a.description, b.description)
  );
}

function compareFailures(a: PredictedFailure, b: PredictedFailure): number {
  return (
    SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] ||
    cmp(a.failureType, b.failureType) ||
    cmp(a.componentA, b.componentA) ||
    cmp(a.componentB, b.componentB) ||
    cmp(a.description, b.description)
  );
}

function compareNotes(a: AnalysisNote, b: AnalysisNote): number {
  return cmp(a.kind, b.kind) || cmp(a.file, b.file) || cmp(a.message, b.message);
}

/**
 * Single sink for a run. Workers hand over complete per-file results only;
 * ordering and dedup happen in build(), so arrival order never shows.
 */
export class ReportAggregator {
  private readonly violations: Violation[] = [];
  private readonly failures: PredictedFailure[] = [];
  private readonly notes: AnalysisNote[] = [];
  private readonly files: string[] = [];
  private dropped = 0;

  constructor(private readonly root: string) {}

  add(result: FileResult): void {
    this.files.push(result.file);
    for (const v of result.violations) {
      // a finding must point at a real line of the file it names
      if (v.file !== result.file || v.line < 1 || v.line > result.lineCount) {
        this.dropped++;
        continue;
      }
      this.violations.push(v);
    }
    this.notes.push(...result.notes);
  }

  addFailures(failures: readonly PredictedFailure[]): void {
    this.failures.push(...failures);
  }

  addNote(note: AnalysisNote): void {
    this.notes.push(note);
  }

  /** Violations rejected by add() for pointing outside their file. */
  get droppedCount(): number {
    return this.dropped;
  }

  build(cancelled = false): AnalysisReport {
    const violations = dedupe([...this.violations].sort(compareViolations), (v) =>
      [v.file, v.line, v.type, v.description].join("\u0000"),
    );
    const predictedFailures = dedupe([...this.failures].sort(compareFailures), (f) =>
      [f.failureType, f.componentA, f.componentB, f.description].join("\u0000"),
    );
    const notes = dedupe([...this.notes].sort(compareNotes), (n) => [n.kind, n.file, n.message].join("\u0000"));

    return Object.freeze({
      root: this.root,
      summary: summarize(violations, predictedFailures),
      violations,
      predictedFailures,
      notes,
      analyzedFiles: [...this.files].sort(cmp),
      cancelled,
    });
  }
}

function dedupe<T>(sorted: T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return sorted.filter((item) => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

export function summarize(
  violations: readonly Violation[],
  failures: readonly PredictedFailure[],
): ReportSummary {
  const summary: ReportSummary = { total: 0, critical: 0, warning: 0, info: 0, byType: {} };
  const count = (severity: Violation["severity"], type: string) => {
    summary.total++;
    summary[severity]++;
    summary.byType[type] = (summary.byType[type] ?? 0) + 1;
  };
  for (const v of violations) count(v.severity, v.type);
  for (const f of failures) count(f.severity, f.failureType);

  // stable key order for byte-identical JSON
  summary.byType = Object.fromEntries(Object.entries(summary.byType).sort(([a], [b]) => cmp(a, b)));
  return summary;
}

/** 0 when nothing critical was found, 1 otherwise. */
export function exitCodeFor(report: AnalysisReport): number {
  return report.summary.critical === 0 ? 0 : 1;
}
