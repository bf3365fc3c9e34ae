import type { DetectorContext, Violation } from "../types";
import { dottedName } from "../parser/syntax-tree";
import { violationAt } from "../detectors/shared";

type CallCategory = "database" | "http" | "file";

const MESSAGES: Record<CallCategory, { description: string; suggestion: string }> = {
  database: {
    description: "Database operation without error handling",
    suggestion: "Wrap the database call in try/except to handle connection, timeout and constraint errors",
  },
  http: {
    description: "External API call without error handling",
    suggestion: "Wrap the API call in try/except to handle timeout, connection and response errors",
  },
  file: {
    description: "File operation without error handling",
    suggestion: "Use a with statement or wrap open() in try/except OSError",
  },
};

/**
 * Database, HTTP and file calls that sit outside any try body. A file opened
 * as a `with` context manager is accepted.
 */
export function verifyErrorHandling({ tree, window, patterns }: DetectorContext): Violation[] {
  const { databaseMethods, httpModules, fileFunctions } = patterns.errorHandling;
  const violations: Violation[] = [];

  for (const call of tree.findAll("call")) {
    const fn = call.childForFieldName("function");
    if (!fn) continue;

    let category: CallCategory | null = null;
    if (fn.type === "identifier") {
      if (fileFunctions.includes(fn.text)) category = "file";
      else if (databaseMethods.includes(fn.text)) category = "database";
    } else if (fn.type === "attribute") {
      const receiver = fn.childForFieldName("object");
      const attr = fn.childForFieldName("attribute")?.text ?? "";
      const root = receiver ? dottedName(receiver)?.split(".")[0] : undefined;
      if (root && httpModules.includes(root)) category = "http";
      else if (databaseMethods.includes(attr)) category = "database";
    }
    if (!category) continue;
    if (window.isInsideGuardedBlock(call, "try")) continue;
    if (category === "file" && window.isInsideGuardedBlock(call, "with")) continue;

    const { description, suggestion } = MESSAGES[category];
    violations.push(
      violationAt(
        tree,
        call,
        "error_handling_missing",
        category === "file" ? "warning" : "critical",
        description,
        suggestion,
      ),
    );
  }
  return violations;
}
