/**
 * Cross-component coding standards: shared error codes, the standard timeout
 * ladder, ISO8601 datetimes and typed response objects.
 */

import type { Node as TSNode } from "web-tree-sitter";
import type { SyntaxTree } from "../parser/syntax-tree";
import { namedChildren, dottedName, walk } from "../parser/syntax-tree";
import type { PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";
import { violationAt, stringBody } from "../detectors/shared";

const ISO8601_PREFIX = "%Y-%m-%dT%H:%M:%S";

function looksLikeErrorCode(value: string, markers: readonly string[]): boolean {
  return /^[A-Z0-9_]+$/.test(value) && /[A-Z]/.test(value) && value.includes("_") &&
    markers.some((m) => value.includes(m));
}

/** String literals that are assigned or passed by keyword. */
function constantStrings(tree: SyntaxTree): TSNode[] {
  const out: TSNode[] = [];
  for (const a of tree.findAll("assignment")) {
    const right = a.childForFieldName("right");
    if (right?.type === "string") out.push(right);
  }
  walk(tree.root, (n) => {
    if (n.type !== "keyword_argument") return;
    const value = n.childForFieldName("value");
    if (value?.type === "string") out.push(value);
  });
  return out;
}

export function checkStandards(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  const { errorCodeMarkers, errorCodes, timeouts } = patterns.standards;
  const violations: Violation[] = [];

  for (const s of constantStrings(tree)) {
    const code = stringBody(s);
    if (!looksLikeErrorCode(code, errorCodeMarkers) || errorCodes.has(code)) continue;
    violations.push(
      violationAt(
        tree,
        s,
        "non_standard_error_code",
        "warning",
        `Custom error code '${code}' is not in the shared error code set`,
        `Use one of: ${[...errorCodes].slice(0, 4).join(", ")}, ...`,
      ),
    );
  }

  walk(tree.root, (n) => {
    if (n.type !== "keyword_argument" || n.childForFieldName("name")?.text !== "timeout") return;
    const value = n.childForFieldName("value");
    if (!value || (value.type !== "integer" && value.type !== "float")) return;
    const seconds = Number(value.text);
    if (Number.isNaN(seconds) || timeouts.has(seconds)) return;
    const ladder = [...timeouts].sort((a, b) => a - b);
    const nearest = ladder.reduce((best, t) => (Math.abs(t - seconds) < Math.abs(best - seconds) ? t : best), ladder[0] ?? 30);
    violations.push(
      violationAt(
        tree,
        n,
        "non_standard_timeout",
        "warning",
        `Non-standard timeout value ${value.text}`,
        `Use a standard timeout such as timeout=${nearest}`,
      ),
    );
  });

  for (const call of tree.findAll("call")) {
    const fn = call.childForFieldName("function");
    if (!fn || fn.type !== "attribute") continue;
    const method = fn.childForFieldName("attribute")?.text;

    if (method === "timestamp" || dottedName(fn) === "time.time") {
      violations.push(
        violationAt(
          tree,
          call,
          "unix_timestamp_usage",
          "info",
          "Unix timestamp used instead of ISO8601",
          "Serialize datetimes with datetime.isoformat()",
        ),
      );
    } else if (method === "strftime") {
      const first = call.childForFieldName("arguments")?.namedChild(0);
      if (!first || first.type !== "string" || stringBody(first).startsWith(ISO8601_PREFIX)) continue;
      violations.push(
        violationAt(
          tree,
          call,
          "custom_datetime_format",
          "info",
          `Custom datetime format ${first.text}`,
          `Use ISO8601 (${ISO8601_PREFIX}) or datetime.isoformat()`,
        ),
      );
    }
  }

  walk(tree.root, (n) => {
    if (n.type !== "return_statement") return;
    const dict = namedChildren(n).find((c) => c.type === "dictionary");
    if (!dict) return;
    const hasSuccessKey = namedChildren(dict).some((pair) => {
      const key = pair.type === "pair" ? pair.childForFieldName("key") : null;
      return key?.type === "string" && stringBody(key) === "success";
    });
    if (!hasSuccessKey) return;
    violations.push(
      violationAt(
        tree,
        n,
        "raw_dict_response",
        "warning",
        "Raw dict returned as an API response",
        "Return the shared response type instead of a hand-built dict",
      ),
    );
  });

  return violations;
}
