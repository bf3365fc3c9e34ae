import type { Node as TSNode } from "web-tree-sitter";
import type { SyntaxTree } from "../parser/syntax-tree";
import type { PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";

/**
 * A `.info/.error/...` method call. Setup calls on a logger
 * (`logging.getLogger`, `logging.basicConfig`) are not log statements.
 */
export function isLoggingCall(call: TSNode, patterns: PatternLibrary): boolean {
  const fn = call.childForFieldName("function");
  if (!fn || fn.type !== "attribute") return false;
  const method = fn.childForFieldName("attribute")?.text ?? "";
  return patterns.security.logMethods.includes(method);
}

/** Field name as a whole word of letters: "pin" hits "user_pin" but not "mapping". */
function fieldPattern(field: string): RegExp {
  const f = field.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<![a-z])${f}(?![a-z])`);
}

export function scanPiiLogging(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  const violations: Violation[] = [];
  const fields = patterns.security.piiFields.map((f) => ({ field: f, re: fieldPattern(f) }));
  const seen = new Set<number>();

  for (const call of tree.findAll("call")) {
    if (!isLoggingCall(call, patterns)) continue;
    const line = tree.lineOf(call);
    if (seen.has(line)) continue;
    seen.add(line);

    const text = (tree.lines[line - 1] ?? "").toLowerCase();
    for (const { field, re } of fields) {
      if (!re.test(text)) continue;
      violations.push({
        file: tree.file,
        line,
        type: "data_flow_pii_leak",
        severity: "critical",
        description: `Potential PII leak: '${field}' in log statement`,
        snippet: tree.lineText(line),
        suggestion: `Remove or mask '${field}' before logging`,
      });
    }
  }
  return violations;
}
