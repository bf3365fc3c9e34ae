import type { Parser, Node as TSNode } from "web-tree-sitter";
import type {
  ComponentEdge,
  ComponentSource,
  DependencyGraph,
  FailureType,
  PredictedFailure,
  SourceFile,
} from "../types";
import type { FailureRule } from "../patterns/library";
import { DEFAULT_FAILURE_RULES } from "../patterns/library";
import { parseSource, walk, namedChildren, type SyntaxTree } from "../parser/syntax-tree";
import { ContextWindow } from "../context/context-window";
import { stringBody } from "../detectors/shared";

/**
 * Component Dependency Graph:
 * One node per component, an edge A→B whenever A's sources import or name B.
 * Rebuilt from scratch on every run.
 */

export interface GraphOptions {
  /** Used to locate guarded references; without it error handling is judged from text. */
  parser?: Parser;
  errorHandlingMarkers?: readonly string[];
  retryMarkers?: readonly string[];
}

type FailureRules = Readonly<Record<FailureType, FailureRule>>;

function esc(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `my-service` and `my_service` name the same component. */
function nameVariants(name: string): string[] {
  return [...new Set([name, name.replace(/-/g, "_"), name.replace(/_/g, "-")])];
}

function referencePattern(name: string): RegExp {
  const n = `(?:${nameVariants(name).map(esc).join("|")})`;
  const end = "(?![\\w-])";
  return new RegExp(
    [
      `from\\s+components\\.${n}${end}`,
      `import\\s+components\\.${n}${end}`,
      `from\\s+components\\s+import\\s+(?:[\\w\\s,]*,\\s*)?${n}${end}`,
      `^\\s*import\\s+${n}${end}`,
      `^\\s*from\\s+${n}\\s+import\\b`,
      `'${n}'`,
      `"${n}"`,
    ].join("|"),
    "m",
  );
}

export function referencesComponent(content: string, name: string): boolean {
  return referencePattern(name).test(content);
}

// ─── Build ──────────────────────────────────────────────────

export function buildDependencyGraph(
  components: readonly ComponentSource[],
  options: GraphOptions = {},
): DependencyGraph {
  const sorted = [...components].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const byName = new Map(sorted.map((c) => [c.name, c]));
  const adjacency = new Map<string, string[]>();
  const edges: ComponentEdge[] = [];

  for (const a of sorted) {
    const callees: string[] = [];
    for (const b of sorted) {
      if (a.name === b.name) continue;
      const files = a.files.filter((f) => referencesComponent(f.content, b.name));
      if (files.length === 0) continue;
      callees.push(b.name);
      edges.push({
        caller: a.name,
        callee: b.name,
        hasErrorHandling: files.some((f) => guardsReference(f, b.name, options)),
        hasRetry: files.some((f) => mentionsAny(f.content, options.retryMarkers ?? ["retry", "backoff", "tenacity"])),
        timeout: b.timeout,
      });
    }
    adjacency.set(a.name, callees);
  }

  return { components: byName, adjacency, edges };
}

function mentionsAny(content: string, markers: readonly string[]): boolean {
  const lower = content.toLowerCase();
  return markers.some((m) => lower.includes(m.toLowerCase()));
}

/**
 * True when some reference to `name` in `file` sits in a try body, or the
 * file uses a circuit-breaker or fallback idiom.
 */
function guardsReference(file: SourceFile, name: string, options: GraphOptions): boolean {
  if (mentionsAny(file.content, options.errorHandlingMarkers ?? ["circuit", "fallback"])) return true;
  if (!options.parser) {
    return /^\s*try\s*:/m.test(file.content) && /^\s*except\b/m.test(file.content);
  }

  const parsed = parseSource(options.parser, file.path, file.content);
  if (!parsed.ok) {
    return /^\s*try\s*:/m.test(file.content) && /^\s*except\b/m.test(file.content);
  }
  const tree = parsed.tree;
  try {
    const window = new ContextWindow(tree);
    return referenceNodes(tree, name).some((n) => window.isInsideGuardedBlock(n, "try"));
  } finally {
    tree.dispose();
  }
}

/** Names an import binds for component `name`, e.g. `from components.billing import Client as C` → C. */
function boundNames(tree: SyntaxTree, name: string): Set<string> {
  const variants = nameVariants(name);
  const isTarget = (module: string) =>
    variants.some((v) => module === v || module === `components.${v}`);
  const names = new Set<string>();

  for (const imp of tree.findAll("import")) {
    const moduleNode = imp.childForFieldName("module_name");
    for (const child of namedChildren(imp)) {
      if (moduleNode && child.id === moduleNode.id) continue;
      const dotted = child.type === "aliased_import" ? child.childForFieldName("name") : child;
      const alias = child.type === "aliased_import" ? child.childForFieldName("alias")?.text : undefined;
      if (!dotted || dotted.type !== "dotted_name") continue;

      if (imp.type === "import_statement") {
        if (isTarget(dotted.text)) names.add(alias ?? dotted.text.split(".")[0] ?? dotted.text);
      } else if (moduleNode) {
        const fromTarget = isTarget(moduleNode.text);
        const fromPackage = moduleNode.text === "components" && variants.includes(dotted.text);
        if (fromTarget || fromPackage) names.add(alias ?? dotted.text);
      }
    }
  }
  return names;
}

function referenceNodes(tree: SyntaxTree, name: string): TSNode[] {
  const bound = boundNames(tree, name);
  const variants = new Set(nameVariants(name));
  const out: TSNode[] = [];
  walk(tree.root, (n) => {
    if (n.type === "identifier" && bound.has(n.text)) {
      const inImport = [...tree.parents.ancestors(n)].some(
        (a) => a.type === "import_statement" || a.type === "import_from_statement",
      );
      if (!inImport) out.push(n);
    } else if (n.type === "string" && variants.has(stringBody(n))) {
      out.push(n);
    }
  });
  return out;
}

// ─── Cycles ─────────────────────────────────────────────────

/** Rotate a cycle (without its closing repeat) to start at its smallest name. */
function normalizeCycle(nodes: string[]): string[] {
  let best = 0;
  for (let i = 1; i < nodes.length; i++) {
    const current = nodes[i];
    const smallest = nodes[best];
    if (current !== undefined && smallest !== undefined && current < smallest) best = i;
  }
  return [...nodes.slice(best), ...nodes.slice(0, best)];
}

/**
 * Every elementary cycle reachable by DFS from each node in sorted order,
 * reported once per rotation-normalized path.
 */
export function detectCycles(
  graph: DependencyGraph,
  rules: FailureRules = DEFAULT_FAILURE_RULES,
): PredictedFailure[] {
  const found = new Map<string, string[]>();
  const starts = [...graph.adjacency.keys()].sort();

  for (const start of starts) {
    const visited = new Set<string>();
    const stack: string[] = [];
    const onStack = new Set<string>();

    const visit = (node: string): void => {
      visited.add(node);
      stack.push(node);
      onStack.add(node);
      for (const next of graph.adjacency.get(node) ?? []) {
        if (onStack.has(next)) {
          const cycle = normalizeCycle(stack.slice(stack.indexOf(next)));
          const key = cycle.join("\u0000");
          if (!found.has(key)) found.set(key, cycle);
        } else if (!visited.has(next)) {
          visit(next);
        }
      }
      stack.pop();
      onStack.delete(node);
    };
    visit(start);
  }

  const rule = rules.circular_dependency;
  return [...found.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, cycle]): PredictedFailure => {
      const path = [...cycle, cycle[0] ?? ""];
      const first = cycle[0] ?? "";
      return {
        failureType: "circular_dependency",
        componentA: first,
        componentB: cycle[1] ?? first,
        description: `Circular dependency detected: ${path.join(" -> ")}`,
        severity: rule.severity,
        fixStrategy: rule.fixStrategy,
        cyclePath: path,
      };
    });
}

// ─── Timeouts ───────────────────────────────────────────────

export function analyzeTimeoutCascades(
  graph: DependencyGraph,
  overhead = 5,
  rules: FailureRules = DEFAULT_FAILURE_RULES,
): PredictedFailure[] {
  const rule = rules.timeout_cascade;
  const failures: PredictedFailure[] = [];

  for (const edge of graph.edges) {
    const callerTimeout = graph.components.get(edge.caller)?.timeout;
    const calleeTimeout = edge.timeout;
    if (callerTimeout === undefined || calleeTimeout === undefined) continue;
    if (callerTimeout > calleeTimeout + overhead) continue;

    failures.push({
      failureType: "timeout_cascade",
      componentA: edge.caller,
      componentB: edge.callee,
      description:
        `Timeout cascade risk: ${edge.caller} timeout (${callerTimeout}s) is not above ` +
        `${edge.callee} timeout (${calleeTimeout}s) plus ${overhead}s overhead`,
      severity: rule.severity,
      fixStrategy: `${rule.fixStrategy}: raise ${edge.caller} timeout above ${calleeTimeout + overhead}s`,
    });
  }
  return failures;
}

// ─── Error Propagation ──────────────────────────────────────

export function analyzeErrorPropagation(
  graph: DependencyGraph,
  rules: FailureRules = DEFAULT_FAILURE_RULES,
): PredictedFailure[] {
  const failures: PredictedFailure[] = [];

  for (const edge of graph.edges) {
    if (!edge.hasErrorHandling) {
      const rule = rules.missing_error_handling;
      failures.push({
        failureType: "missing_error_handling",
        componentA: edge.caller,
        componentB: edge.callee,
        description: `${edge.caller} calls ${edge.callee} but doesn't handle its errors`,
        severity: rule.severity,
        fixStrategy: rule.fixStrategy,
      });
    }
    if (!edge.hasRetry) {
      const rule = rules.missing_retry;
      failures.push({
        failureType: "missing_retry",
        componentA: edge.caller,
        componentB: edge.callee,
        description: `${edge.caller} calls ${edge.callee} without retry or backoff`,
        severity: rule.severity,
        fixStrategy: rule.fixStrategy,
      });
    }
  }
  return failures;
}
