/**
 * Business-logic completeness.
 *
 * Functions that look like a known flow (password reset, registration, login,
 * payment) are checked against the pattern's checklist. Everything here is
 * driven by the rule file; adding a flow needs no code change.
 */

import type { SyntaxTree } from "../parser/syntax-tree";
import { functionsOf, type FunctionInfo } from "../parser/functions";
import type { BusinessPattern, PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";

/** Functions whose name or docstring contains one of the pattern's detection keywords. */
export function matchFunctions(tree: SyntaxTree, pattern: BusinessPattern): FunctionInfo[] {
  return functionsOf(tree).filter((fn) => {
    const name = fn.name.toLowerCase();
    const doc = fn.docstring?.toLowerCase() ?? "";
    return pattern.detectionKeywords.some((k) => name.includes(k) || doc.includes(k));
  });
}

/** Element names of `pattern` with no keyword hit in the function's source. */
export function missingElements(pattern: BusinessPattern, fn: FunctionInfo): string[] {
  const code = fn.text.toLowerCase();
  return pattern.elements
    .filter((el) => !el.keywords.some((k) => code.includes(k.toLowerCase())))
    .map((el) => el.name);
}

export function verifyBusinessLogic(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  const violations: Violation[] = [];

  for (const pattern of patterns.businessPatterns) {
    for (const fn of matchFunctions(tree, pattern)) {
      const missing = new Set(missingElements(pattern, fn));
      for (const el of pattern.elements) {
        if (!missing.has(el.name)) continue;
        violations.push({
          file: tree.file,
          line: fn.line,
          type: "business_logic_incomplete",
          severity: el.severity,
          description: `${pattern.id.replace(/_/g, " ")} in '${fn.name}' is missing ${el.name}`,
          snippet: tree.lineText(fn.line),
          suggestion: el.suggestion,
        });
      }
    }
  }
  return violations;
}
