/**
 * SQL built from untrusted pieces.
 *
 * Three families over string syntax: f-strings with interpolation, `+`
 * concatenation with a non-literal operand, and `"...".format(...)`. Any SQL
 * keyword in the literal part is enough; whether the interpolated value is
 * attacker-controlled is not tracked.
 */

import type { Node as TSNode } from "web-tree-sitter";
import type { SyntaxTree } from "../parser/syntax-tree";
import { namedChildren } from "../parser/syntax-tree";
import type { PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";
import { violationAt, stringBody, stringPrefix } from "../detectors/shared";

const STRING_TYPES = new Set(["string", "concatenated_string"]);

export function sqlKeywordPattern(keywords: readonly string[]): RegExp {
  const alternation = keywords.map((k) => k.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")).join("|");
  return new RegExp(`\\b(?:${alternation})\\b`, "i");
}

function literalText(node: TSNode): string {
  if (node.type === "concatenated_string") {
    return namedChildren(node).filter((c) => c.type === "string").map(stringBody).join("");
  }
  return stringBody(node);
}

function isFString(node: TSNode): boolean {
  return stringPrefix(node).includes("f") && namedChildren(node).some((c) => c.type === "interpolation");
}

function isPlus(node: TSNode): boolean {
  return node.type === "binary_operator" && node.childForFieldName("operator")?.type === "+";
}

/** Leaf operands of a `+` chain, looking through parentheses. */
function plusOperands(node: TSNode): TSNode[] {
  const out: TSNode[] = [];
  const stack: TSNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (isPlus(current)) {
      // right first so the left operand is popped first
      const right = current.childForFieldName("right");
      const left = current.childForFieldName("left");
      if (right) stack.push(right);
      if (left) stack.push(left);
      continue;
    }
    const inner = current.type === "parenthesized_expression" ? current.namedChild(0) : null;
    if (inner && isPlus(inner)) {
      stack.push(inner);
      continue;
    }
    out.push(current);
  }
  return out;
}

function outermostPlus(tree: SyntaxTree, node: TSNode): boolean {
  let parent = tree.parents.parentOf(node);
  while (parent && parent.type === "parenthesized_expression") parent = tree.parents.parentOf(parent);
  return !parent || !isPlus(parent);
}

export function scanSqlInjection(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  const sql = sqlKeywordPattern(patterns.security.sqlKeywords);
  const violations: Violation[] = [];
  const covered = new Set<number>();

  // concatenation
  for (const node of tree.findAll("binary_op")) {
    if (!isPlus(node) || !outermostPlus(tree, node)) continue;
    const operands = plusOperands(node);
    const literals = operands.filter((o) => STRING_TYPES.has(o.type) && !isFString(o));
    const dynamic = operands.some((o) => !STRING_TYPES.has(o.type) || isFString(o));
    if (!dynamic || !literals.some((l) => sql.test(literalText(l)))) continue;

    for (const o of operands) covered.add(o.id);
    violations.push(
      violationAt(
        tree,
        node,
        "security_sql_injection",
        "critical",
        "Potential SQL injection: query built by string concatenation",
        "Use parameterized queries with placeholders (?, %s) instead of concatenation",
      ),
    );
  }

  for (const node of tree.findAll("string")) {
    if (covered.has(node.id)) continue;

    if (isFString(node) && sql.test(literalText(node))) {
      violations.push(
        violationAt(
          tree,
          node,
          "security_sql_injection",
          "critical",
          "Potential SQL injection: f-string with SQL query",
          "Use parameterized queries with placeholders (?, %s) instead of f-strings",
        ),
      );
      continue;
    }

    // "...".format(...)
    const attr = tree.parents.parentOf(node);
    if (!attr || attr.type !== "attribute" || attr.childForFieldName("object")?.id !== node.id) continue;
    if (attr.childForFieldName("attribute")?.text !== "format") continue;
    const call = tree.parents.parentOf(attr);
    if (!call || call.type !== "call" || !sql.test(literalText(node))) continue;

    violations.push(
      violationAt(
        tree,
        call,
        "security_sql_injection",
        "critical",
        "Potential SQL injection: .format() on SQL query",
        "Use parameterized queries with placeholders (?, %s) instead of .format()",
      ),
    );
  }
  return violations;
}
