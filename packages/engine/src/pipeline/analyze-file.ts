import type { Parser } from "web-tree-sitter";
import { parseSource } from "../parser/syntax-tree";
import { ContextWindow } from "../context/context-window";
import { runDetectors } from "../detectors";
import { verifyBusinessLogic, verifyErrorHandling, verifyInputValidation } from "../semantic";
import { scanSecurity } from "../security";
import { checkStandards } from "../standards";
import type { PatternLibrary } from "../patterns/library";
import type { DetectorContext, FileResult } from "../types";

export type FileOutcome =
  | { ok: true; result: FileResult }
  | { ok: false; note: { kind: "parse_error"; file: string; message: string } };

/**
 * Parse one file and run every per-file analyzer over it. The tree is
 * released before returning.
 */
export function analyzeSource(
  parser: Parser,
  patterns: PatternLibrary,
  file: string,
  source: string,
  lookbackLines?: number,
): FileOutcome {
  const parsed = parseSource(parser, file, source);
  if (!parsed.ok) {
    return { ok: false, note: { kind: "parse_error", file, message: parsed.error.message } };
  }

  const tree = parsed.tree;
  try {
    const ctx: DetectorContext = { tree, window: new ContextWindow(tree, lookbackLines), patterns };
    const violations = [
      ...runDetectors(ctx),
      ...verifyBusinessLogic(tree, patterns),
      ...verifyErrorHandling(ctx),
      ...verifyInputValidation(tree, patterns),
      ...scanSecurity(tree, patterns),
      ...checkStandards(tree, patterns),
    ];
    return { ok: true, result: { file, lineCount: tree.lineCount, violations, notes: [] } };
  } finally {
    tree.dispose();
  }
}
