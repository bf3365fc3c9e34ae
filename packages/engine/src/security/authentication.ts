import type { SyntaxTree } from "../parser/syntax-tree";
import { functionsOf } from "../parser/functions";
import type { PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";

/** Route handlers with no authentication decorator. Public probes are exempt. */
export function scanMissingAuthentication(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  const { routeDecorators, authDecoratorMarkers, publicEndpoints } = patterns.security;
  const violations: Violation[] = [];

  for (const fn of functionsOf(tree)) {
    const isRoute = fn.decorators.some((d) => routeDecorators.includes(d));
    if (!isRoute || publicEndpoints.includes(fn.name)) continue;
    const hasAuth = fn.decorators.some((d) =>
      authDecoratorMarkers.some((m) => d.toLowerCase().includes(m)),
    );
    if (hasAuth) continue;

    violations.push({
      file: tree.file,
      line: fn.line,
      type: "security_missing_authentication",
      severity: "warning",
      description: `Endpoint '${fn.name}' lacks an authentication decorator`,
      snippet: tree.lineText(fn.line),
      suggestion: "Add an authentication decorator such as @login_required or @require_auth",
    });
  }
  return violations;
}
