import type { Node as TSNode } from "web-tree-sitter";
import type { SyntaxTree } from "../parser/syntax-tree";
import { namedChildren } from "../parser/syntax-tree";
import type { Severity, Violation, ViolationType } from "../types";

export function violationAt(
  tree: SyntaxTree,
  node: TSNode,
  type: ViolationType,
  severity: Severity,
  description: string,
  suggestion: string,
): Violation {
  const line = tree.lineOf(node);
  return {
    file: tree.file,
    line,
    type,
    severity,
    description,
    snippet: tree.lineText(line),
    suggestion,
  };
}

/** True when `node` is the target (left side) of a plain assignment. */
export function isAssignmentTarget(tree: SyntaxTree, node: TSNode): boolean {
  let child = node;
  let parent = tree.parents.parentOf(node);
  while (parent && (parent.type === "pattern_list" || parent.type === "tuple_pattern")) {
    child = parent;
    parent = tree.parents.parentOf(parent);
  }
  return parent?.type === "assignment" && parent.childForFieldName("left")?.id === child.id;
}

export function hasAncestorOfType(tree: SyntaxTree, node: TSNode, type: string): boolean {
  for (const a of tree.parents.ancestors(node)) {
    if (a.type === type) return true;
  }
  return false;
}

/** Python string literal body without prefix and quotes. */
export function stringBody(node: TSNode): string {
  const content = namedChildren(node).filter((c) => c.type === "string_content");
  if (content.length > 0) return content.map((c) => c.text).join("");
  return node.text.replace(/^[a-zA-Z]*("""|'''|"|')/, "").replace(/("""|'''|"|')$/, "");
}

/** Lower-cased prefix letters of a string literal (f, r, b, rb, ...). */
export function stringPrefix(node: TSNode): string {
  const start = namedChildren(node).find((c) => c.type === "string_start");
  const text = start ? start.text : node.text;
  const m = /^[a-zA-Z]*/.exec(text);
  return m ? m[0].toLowerCase() : "";
}
