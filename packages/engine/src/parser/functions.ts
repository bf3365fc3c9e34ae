import type { Node as TSNode } from "web-tree-sitter";
import type { SyntaxTree } from "./syntax-tree";
import { namedChildren, dottedName } from "./syntax-tree";

// ─── Function Definitions ───────────────────────────────────

export interface FunctionInfo {
  node: TSNode;
  name: string;
  line: number;
  /** Source of the definition, decorators excluded. */
  text: string;
  docstring: string | null;
  /** Positional parameter names in order, `self`/`cls` included. */
  params: string[];
  /** Last segment of each decorator's callee: `@app.route("/")` → "route". */
  decorators: string[];
  isMethod: boolean;
}

const PARAM_TYPES = new Set([
  "identifier",
  "typed_parameter",
  "default_parameter",
  "typed_default_parameter",
]);

function paramName(p: TSNode): string | null {
  if (p.type === "identifier") return p.text;
  const named = p.childForFieldName("name");
  if (named) return named.text;
  const first = namedChildren(p).find((c) => c.type === "identifier");
  return first ? first.text : null;
}

function decoratorName(decorator: TSNode): string | null {
  const expr = namedChildren(decorator).find((c) => c.type !== "comment");
  if (!expr) return null;
  const target = expr.type === "call" ? expr.childForFieldName("function") : expr;
  if (!target) return null;
  const name = dottedName(target);
  if (!name) return null;
  const parts = name.split(".");
  return parts[parts.length - 1] ?? null;
}

function docstringOf(fn: TSNode): string | null {
  const body = fn.childForFieldName("body");
  const first = body ? namedChildren(body).find((c) => c.type !== "comment") : undefined;
  if (!first || first.type !== "expression_statement") return null;
  const expr = first.namedChild(0);
  return expr && expr.type === "string" ? expr.text : null;
}

export function describeFunction(tree: SyntaxTree, fn: TSNode): FunctionInfo {
  const paramsNode = fn.childForFieldName("parameters");
  const params = paramsNode
    ? namedChildren(paramsNode)
        .filter((p) => PARAM_TYPES.has(p.type))
        .map(paramName)
        .filter((n): n is string => n !== null)
    : [];

  const parent = tree.parents.parentOf(fn);
  const decorators =
    parent && parent.type === "decorated_definition"
      ? namedChildren(parent)
          .filter((c) => c.type === "decorator")
          .map(decoratorName)
          .filter((n): n is string => n !== null)
      : [];

  let isMethod = false;
  for (const a of tree.parents.ancestors(fn)) {
    if (a.type === "function_definition") break;
    if (a.type === "class_definition") {
      isMethod = true;
      break;
    }
  }

  return {
    node: fn,
    name: fn.childForFieldName("name")?.text ?? "",
    line: tree.lineOf(fn),
    text: fn.text,
    docstring: docstringOf(fn),
    params,
    decorators,
    isMethod,
  };
}

export function functionsOf(tree: SyntaxTree): FunctionInfo[] {
  return tree.findAll("function_def").map((fn) => describeFunction(tree, fn));
}
