/**
 * Heuristic lookback over a file's text.
 *
 * Answers "was X already checked just above this line?" by regex over the
 * preceding source lines, and "is this node inside a try/with?" by walking
 * the tree's parent index. False negatives are accepted; a pattern only
 * matches when the check for that exact variable is spelled out.
 */

import type { Node as TSNode } from "web-tree-sitter";
import type { SyntaxTree } from "../parser/syntax-tree";

export type CheckKind =
  | "none_check"
  | "key_check"
  | "bounds_check"
  | "empty_check"
  | "zero_check";

export type GuardKind = "try" | "lock" | "with";

export const DEFAULT_LOOKBACK_LINES = 5;

function esc(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiled pattern for a check kind. `detail` is the dict key for
 * key_check and the index for bounds_check.
 */
export function checkPattern(kind: CheckKind, variable: string, detail?: string): RegExp {
  const v = esc(variable);
  switch (kind) {
    case "none_check":
      return new RegExp(`(?<![\\w.])${v}\\s+is\\s+not\\s+None\\b`);
    case "key_check":
      return new RegExp(`${esc(detail ?? "")}\\s+in\\s+${v}(?!\\w)`);
    case "bounds_check": {
      const idx = Number.parseInt(detail ?? "0", 10);
      return new RegExp(`len\\(${v}\\)\\s*(?:>\\s*${idx}|>=\\s*${idx + 1})(?!\\d)`);
    }
    case "empty_check":
      return new RegExp(`if\\s+(?:${v}(?!\\w)|len\\(${v}\\))`);
    case "zero_check":
      return new RegExp(`(?<![\\w.])${v}\\s*!=\\s*0(?!\\d)|if\\s+${v}(?!\\w)`);
  }
}

export class ContextWindow {
  constructor(
    readonly tree: SyntaxTree,
    readonly lookback: number = DEFAULT_LOOKBACK_LINES,
  ) {}

  /** The `lookback` lines strictly above a 1-based line, joined. */
  linesAbove(line: number): string {
    const end = Math.max(0, line - 1);
    const start = Math.max(0, end - this.lookback);
    return this.tree.lines.slice(start, end).join("\n");
  }

  hasPriorCheck(line: number, variable: string, kind: CheckKind, detail?: string): boolean {
    const context = this.linesAbove(line);
    if (context.length === 0) return false;
    return checkPattern(kind, variable, detail).test(context);
  }

  /** True when the literal fragment occurs in the window above. */
  windowContains(line: number, fragment: string): boolean {
    return this.linesAbove(line).includes(fragment);
  }

  isInsideGuardedBlock(node: TSNode, guard: GuardKind): boolean {
    let child = node;
    for (const parent of this.tree.parents.ancestors(node)) {
      if (guard === "try" && parent.type === "try_statement") {
        // only the protected body counts, not except/else/finally
        const body = parent.childForFieldName("body");
        if (body && body.id === child.id) return true;
      }
      if (parent.type === "with_statement") {
        if (guard === "with") return true;
        if (guard === "lock" && withMentionsLock(parent)) return true;
      }
      child = parent;
    }
    return false;
  }

  /** The innermost enclosing function definition, if any. */
  enclosingFunction(node: TSNode): TSNode | null {
    for (const parent of this.tree.parents.ancestors(node)) {
      if (parent.type === "function_definition") return parent;
    }
    return null;
  }
}

function withMentionsLock(withNode: TSNode): boolean {
  for (let i = 0; i < withNode.namedChildCount; i++) {
    const c = withNode.namedChild(i);
    if (c && c.type === "with_clause") {
      return /lock|mutex|semaphore/i.test(c.text);
    }
  }
  return false;
}
