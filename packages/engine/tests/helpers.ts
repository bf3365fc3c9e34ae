import type { Parser } from "web-tree-sitter";
import { getPythonParser } from "../src/parser/tree-sitter-init";
import { parseSource, type SyntaxTree } from "../src/parser/syntax-tree";
import { ContextWindow } from "../src/context/context-window";
import { loadPatternLibrary, type PatternLibrary } from "../src/patterns/library";
import type { Logger } from "../src/logger";
import type { DetectorContext } from "../src/types";

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export async function loadParser(): Promise<Parser> {
  const { parser } = await getPythonParser();
  return parser;
}

export function defaultPatterns(): PatternLibrary {
  return loadPatternLibrary(undefined, silentLogger).library;
}

/** Python source from lines, so line numbers in assertions are easy to read. */
export function py(...lines: string[]): string {
  return lines.join("\n") + "\n";
}

export function parse(parser: Parser, source: string, file = "app.py"): SyntaxTree {
  const result = parseSource(parser, file, source);
  if (!result.ok) throw new Error(`fixture does not parse: ${result.error.message}`);
  return result.tree;
}

export function makeContext(
  tree: SyntaxTree,
  patterns: PatternLibrary,
  lookback?: number,
): DetectorContext {
  return { tree, window: new ContextWindow(tree, lookback), patterns };
}
