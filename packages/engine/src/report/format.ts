import type { AnalysisReport, Severity, Violation } from "../types";

const SEVERITIES: Severity[] = ["critical", "warning", "info"];

export function formatJsonReport(report: AnalysisReport): string {
  const body = {
    root: report.root,
    cancelled: report.cancelled,
    summary: report.summary,
    violations: report.violations.map((v) => ({
      file: v.file,
      line: v.line,
      type: v.type,
      severity: v.severity,
      description: v.description,
      suggestion: v.suggestion,
      snippet: v.snippet,
    })),
    predicted_failures: report.predictedFailures.map((f) => ({
      failure_type: f.failureType,
      component_a: f.componentA,
      component_b: f.componentB,
      severity: f.severity,
      description: f.description,
      fix_strategy: f.fixStrategy,
      ...(f.cyclePath ? { cycle_path: f.cyclePath } : {}),
    })),
    notes: report.notes,
    analyzed_files: report.analyzedFiles,
  };
  return JSON.stringify(body, null, 2) + "\n";
}

function groupByFile(violations: readonly Violation[]): Map<string, Violation[]> {
  const groups = new Map<string, Violation[]>();
  for (const v of violations) {
    const list = groups.get(v.file) ?? [];
    list.push(v);
    groups.set(v.file, list);
  }
  return groups;
}

/** Plain-text report: summary, then findings by severity and file. */
export function formatTextReport(report: AnalysisReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push(`Analysis Report: ${report.root}`);
  lines.push("=".repeat(60));
  lines.push(`Files analyzed: ${report.analyzedFiles.length}`);
  lines.push(
    `Total: ${summary.total}  Critical: ${summary.critical}  Warning: ${summary.warning}  Info: ${summary.info}`,
  );
  if (report.cancelled) lines.push("Run was cancelled; results cover completed files only.");
  lines.push("");

  for (const severity of SEVERITIES) {
    const bySeverity = report.violations.filter((v) => v.severity === severity);
    if (bySeverity.length === 0) continue;
    lines.push(`## ${severity.toUpperCase()} (${bySeverity.length})`);
    for (const [file, list] of groupByFile(bySeverity)) {
      lines.push("");
      lines.push(`  ${file}`);
      for (const v of list) {
        lines.push(`    ${v.line}: [${v.type}] ${v.description}`);
        if (v.snippet) lines.push(`        > ${v.snippet}`);
        lines.push(`        fix: ${v.suggestion.split("\n")[0] ?? ""}`);
      }
    }
    lines.push("");
  }

  if (report.predictedFailures.length > 0) {
    lines.push(`## PREDICTED INTEGRATION FAILURES (${report.predictedFailures.length})`);
    for (const f of report.predictedFailures) {
      lines.push(`  [${f.severity}] ${f.failureType}: ${f.description}`);
      lines.push(`        fix: ${f.fixStrategy}`);
    }
    lines.push("");
  }

  if (report.notes.length > 0) {
    lines.push(`## NOT ANALYZED (${report.notes.length})`);
    for (const n of report.notes) {
      lines.push(`  ${n.kind}: ${n.file}: ${n.message}`);
    }
    lines.push("");
  }

  if (summary.total === 0) lines.push("No findings.");
  return lines.join("\n") + "\n";
}
