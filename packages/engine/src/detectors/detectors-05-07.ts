import type { Node as TSNode } from "web-tree-sitter";
import type { Detector, DetectorContext, Violation } from "../types";
import { namedChildren } from "../parser/syntax-tree";
import { violationAt } from "./shared";

const DIVISION_OPERATORS = new Set(["/", "//", "%"]);

// ── Detector 5: Bounds Safety ──
export const BoundsSafety: Detector = {
  id: 5,
  name: "Bounds Safety",
  types: ["bounds_safety"],
  detect({ tree, window }: DetectorContext): Violation[] {
    const findings: Violation[] = [];

    for (const node of tree.findAll("binary_op")) {
      const op = node.childForFieldName("operator");
      const left = node.childForFieldName("left");
      const right = node.childForFieldName("right");
      if (!op || !left || !right || !DIVISION_OPERATORS.has(op.type)) continue;
      if (right.type !== "identifier") continue;
      // "fmt %s" % name is string formatting
      if (op.type === "%" && (left.type === "string" || left.type === "concatenated_string")) continue;

      const line = tree.lineOf(node);
      const divisor = right.text;
      if (window.hasPriorCheck(line, divisor, "zero_check")) continue;

      findings.push(
        violationAt(
          tree,
          node,
          "bounds_safety",
          "warning",
          `Division by '${divisor}' without zero check`,
          `if ${divisor} != 0:\n    ${tree.lineText(line)}`,
        ),
      );
    }
    return findings;
  },
};

// ── Detector 6: Exception Handling ──
export const ExceptionHandling: Detector = {
  id: 6,
  name: "Exception Handling",
  types: ["exception_handling"],
  detect({ tree }: DetectorContext): Violation[] {
    const findings: Violation[] = [];

    for (const handler of tree.findAll("exception_handler")) {
      const parts = namedChildren(handler).filter((c) => c.type !== "comment");
      const body = parts.find((c) => c.type === "block");
      const filters = parts.filter((c) => c.type !== "block");

      if (filters.length === 0) {
        findings.push(
          violationAt(
            tree,
            handler,
            "exception_handling",
            "critical",
            "Bare except clause catches every exception, including SystemExit and KeyboardInterrupt",
            "Catch specific exceptions, e.g. except (ValueError, KeyError) as e:",
          ),
        );
      }

      if (body && isNoOpBlock(body)) {
        findings.push(
          violationAt(
            tree,
            handler,
            "exception_handling",
            "warning",
            "Exception handler silently swallows the error",
            "Log the exception or re-raise it with context",
          ),
        );
      }
    }
    return findings;
  },
};

/** A block consisting of a single `pass` or `...`. */
function isNoOpBlock(block: TSNode): boolean {
  const statements = namedChildren(block).filter((c) => c.type !== "comment");
  if (statements.length !== 1) return false;
  const only = statements[0];
  if (!only) return false;
  if (only.type === "pass_statement") return true;
  if (only.type === "expression_statement") {
    const expr = namedChildren(only);
    return expr.length === 1 && expr[0]?.type === "ellipsis";
  }
  return false;
}

// ── Detector 7: Concurrency Safety ──
export const ConcurrencySafety: Detector = {
  id: 7,
  name: "Concurrency Safety",
  types: ["concurrency_safety"],
  detect({ tree, window }: DetectorContext): Violation[] {
    const findings: Violation[] = [];
    const assignments = [...tree.findAll("assignment"), ...tree.findAll("augmented_assignment")];

    for (const node of assignments) {
      const left = node.childForFieldName("left");
      if (!left) continue;
      for (const target of selfAttributes(left)) {
        const fn = window.enclosingFunction(node);
        if (!fn) continue;
        if (fn.childForFieldName("name")?.text === "__init__") continue;
        if (window.isInsideGuardedBlock(node, "lock")) continue;

        findings.push(
          violationAt(
            tree,
            node,
            "concurrency_safety",
            "warning",
            `Shared state '${target}' modified outside a lock`,
            `with self._lock:\n    ${tree.lineText(tree.lineOf(node))}`,
          ),
        );
      }
    }
    return findings.sort((a, b) => a.line - b.line);
  },
};

/** `self.x` targets on the left of an assignment, including tuple unpacking. */
function selfAttributes(left: TSNode): string[] {
  if (left.type === "attribute") {
    const obj = left.childForFieldName("object");
    return obj?.type === "identifier" && obj.text === "self" ? [left.text] : [];
  }
  if (left.type === "pattern_list" || left.type === "tuple_pattern") {
    return namedChildren(left).flatMap(selfAttributes);
  }
  return [];
}
