import type { SyntaxTree } from "../parser/syntax-tree";
import { functionsOf } from "../parser/functions";
import type { PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";

const RECEIVERS = new Set(["self", "cls"]);

/**
 * Public functions taking more than one argument (receivers not counted)
 * whose body never validates anything.
 */
export function verifyInputValidation(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  const violations: Violation[] = [];

  for (const fn of functionsOf(tree)) {
    if (fn.name.startsWith("_")) continue;
    const args = fn.params.filter((p, i) => !(i === 0 && RECEIVERS.has(p)));
    if (args.length <= 1) continue;

    const code = fn.text.toLowerCase();
    if (patterns.validationKeywords.some((k) => code.includes(k.toLowerCase()))) continue;

    violations.push({
      file: tree.file,
      line: fn.line,
      type: "data_flow_validation_missing",
      severity: "warning",
      description: `Function '${fn.name}' lacks input validation`,
      snippet: tree.lineText(fn.line),
      suggestion: `Validate ${args.join(", ")} at the start of '${fn.name}'`,
    });
  }
  return violations;
}
