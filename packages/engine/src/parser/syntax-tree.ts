/**
 * Syntax trees over tree-sitter-python.
 *
 * Wraps a parsed tree with its source lines and a parent index, and maps
 * grammar node types onto the closed NodeKind union detectors match on.
 */

import type { Parser, Node as TSNode, Tree } from "web-tree-sitter";

// ─── Node Kinds ─────────────────────────────────────────────

export type NodeKind =
  | "call"
  | "attribute"
  | "subscript"
  | "assignment"
  | "augmented_assignment"
  | "function_def"
  | "class_def"
  | "exception_handler"
  | "try"
  | "with"
  | "binary_op"
  | "string"
  | "import"
  | "identifier"
  | "other";

const KIND_BY_TYPE: Record<string, NodeKind> = {
  call: "call",
  attribute: "attribute",
  subscript: "subscript",
  assignment: "assignment",
  augmented_assignment: "augmented_assignment",
  function_definition: "function_def",
  class_definition: "class_def",
  except_clause: "exception_handler",
  except_group_clause: "exception_handler",
  try_statement: "try",
  with_statement: "with",
  binary_operator: "binary_op",
  string: "string",
  import_statement: "import",
  import_from_statement: "import",
  identifier: "identifier",
};

export function kindOf(node: TSNode): NodeKind {
  return KIND_BY_TYPE[node.type] ?? "other";
}

// ─── Walk Helpers ───────────────────────────────────────────

/**
 * Walk all descendants of a node (pre-order), calling fn for each.
 * Uses an explicit stack: long operator chains nest thousands deep.
 */
export function walk(node: TSNode, fn: (n: TSNode) => void): void {
  const stack: TSNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    fn(current);
    for (let i = current.childCount - 1; i >= 0; i--) {
      const c = current.child(i);
      if (c) stack.push(c);
    }
  }
}

export function findAllOfKind(node: TSNode, kind: NodeKind): TSNode[] {
  const out: TSNode[] = [];
  walk(node, (n) => {
    if (kindOf(n) === kind) out.push(n);
  });
  return out;
}

export function namedChildren(node: TSNode): TSNode[] {
  const out: TSNode[] = [];
  for (let i = 0; i < node.namedChildCount; i++) {
    const c = node.namedChild(i);
    if (c) out.push(c);
  }
  return out;
}

export function childrenOfType(node: TSNode, type: string): TSNode[] {
  return namedChildren(node).filter((c) => c.type === type);
}

/**
 * Dotted name of a call target or attribute chain: `a.b.c` → "a.b.c".
 * Returns null when the chain is rooted in anything but an identifier.
 */
export function dottedName(node: TSNode): string | null {
  const parts: string[] = [];
  let current: TSNode | null = node;
  while (current && current.type === "attribute") {
    const attr = current.childForFieldName("attribute");
    if (!attr) return null;
    parts.unshift(attr.text);
    current = current.childForFieldName("object");
  }
  if (!current || current.type !== "identifier") return null;
  parts.unshift(current.text);
  return parts.join(".");
}

/**
 * Keyword-argument names passed to a call node.
 */
export function keywordArgs(call: TSNode): string[] {
  const args = call.childForFieldName("arguments");
  if (!args) return [];
  return childrenOfType(args, "keyword_argument")
    .map((kw) => kw.childForFieldName("name")?.text ?? "")
    .filter((name) => name.length > 0);
}

export function positionalArgCount(call: TSNode): number {
  const args = call.childForFieldName("arguments");
  if (!args) return 0;
  return namedChildren(args).filter(
    (a) =>
      a.type !== "keyword_argument" &&
      a.type !== "dictionary_splat" &&
      a.type !== "comment",
  ).length;
}

// ─── Parent Index ───────────────────────────────────────────

/**
 * Node id → parent node, built by one traversal of the tree.
 */
export class ParentIndex {
  private readonly parents = new Map<number, TSNode>();

  constructor(root: TSNode) {
    const stack: TSNode[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      for (let i = 0; i < node.childCount; i++) {
        const c = node.child(i);
        if (!c) continue;
        this.parents.set(c.id, node);
        stack.push(c);
      }
    }
  }

  parentOf(node: TSNode): TSNode | null {
    return this.parents.get(node.id) ?? null;
  }

  /** Ancestors from the direct parent up to the root. */
  *ancestors(node: TSNode): Generator<TSNode> {
    let current = this.parentOf(node);
    while (current) {
      yield current;
      current = this.parentOf(current);
    }
  }
}

// ─── Syntax Tree ────────────────────────────────────────────

export class SyntaxTree {
  readonly lines: string[];
  readonly parents: ParentIndex;

  constructor(
    readonly file: string,
    readonly source: string,
    private readonly tree: Tree,
  ) {
    this.lines = source.split("\n").map((l) => l.replace(/\r$/, ""));
    this.parents = new ParentIndex(tree.rootNode);
  }

  get root(): TSNode {
    return this.tree.rootNode;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /** 1-based line of a node's first character. */
  lineOf(node: TSNode): number {
    return node.startPosition.row + 1;
  }

  /** Trimmed text of a 1-based line, "" when out of range. */
  lineText(line: number): string {
    return (this.lines[line - 1] ?? "").trim();
  }

  findAll(kind: NodeKind): TSNode[] {
    return findAllOfKind(this.root, kind);
  }

  /**
   * Names bound by `import x` / `import x as y` / `from m import x`.
   */
  importedNames(): Set<string> {
    const names = new Set<string>();
    for (const imp of this.findAll("import")) {
      for (const child of namedChildren(imp)) {
        if (imp.type === "import_from_statement" && child.id === imp.childForFieldName("module_name")?.id) {
          continue;
        }
        if (child.type === "aliased_import") {
          const alias = child.childForFieldName("alias");
          if (alias) names.add(alias.text);
        } else if (child.type === "dotted_name") {
          const first = child.text.split(".")[0];
          if (first) names.add(first);
        }
      }
    }
    return names;
  }

  /** Release the underlying WASM tree. */
  dispose(): void {
    this.tree.delete();
  }
}

// ─── Parsing ────────────────────────────────────────────────

export interface ParseError {
  kind: "parse_error";
  file: string;
  line: number;
  message: string;
}

export type ParseResult =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; error: ParseError };

function firstErrorLine(root: TSNode): number {
  let line = 0;
  walk(root, (n) => {
    if (line === 0 && (n.type === "ERROR" || n.isMissing)) {
      line = n.startPosition.row + 1;
    }
  });
  return line || 1;
}

/**
 * Parse one file. Trees containing syntax errors are reported as a
 * ParseError and released immediately.
 */
export function parseSource(parser: Parser, file: string, source: string): ParseResult {
  let tree: Tree | null;
  try {
    tree = parser.parse(source);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: { kind: "parse_error", file, line: 1, message } };
  }

  if (!tree) {
    return {
      ok: false,
      error: { kind: "parse_error", file, line: 1, message: "tree-sitter returned no tree" },
    };
  }

  if (tree.rootNode.hasError) {
    const line = firstErrorLine(tree.rootNode);
    tree.delete();
    return {
      ok: false,
      error: { kind: "parse_error", file, line, message: `syntax error near line ${line}` },
    };
  }

  return { ok: true, tree: new SyntaxTree(file, source, tree) };
}
