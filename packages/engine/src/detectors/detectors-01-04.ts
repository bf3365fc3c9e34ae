import type { Node as TSNode } from "web-tree-sitter";
import type { Detector, DetectorContext, Violation } from "../types";
import { dottedName, keywordArgs, positionalArgCount } from "../parser/syntax-tree";
import { violationAt, isAssignmentTarget, hasAncestorOfType, stringBody } from "./shared";

// ── Detector 1: Null Safety ──
export const NullSafety: Detector = {
  id: 1,
  name: "Null Safety",
  types: ["null_safety"],
  detect({ tree, window, patterns }: DetectorContext): Violation[] {
    const findings: Violation[] = [];
    const imported = tree.importedNames();
    const isModuleLike = (name: string) =>
      imported.has(name) || patterns.moduleAllowlist.has(name);

    for (const node of tree.findAll("attribute")) {
      const receiver = node.childForFieldName("object");
      const attr = node.childForFieldName("attribute");
      if (!receiver || !attr || receiver.type !== "identifier") continue;
      if (patterns.safeAccessors.has(attr.text)) continue;
      if (isModuleLike(receiver.text)) continue;
      if (hasAncestorOfType(tree, node, "decorator")) continue;

      const line = tree.lineOf(node);
      const v = receiver.text;
      if (window.hasPriorCheck(line, v, "none_check")) continue;

      findings.push(
        violationAt(
          tree,
          node,
          "null_safety",
          "critical",
          `Attribute access '${v}.${attr.text}' without None check`,
          `if ${v} is not None:\n    ${tree.lineText(line)}`,
        ),
      );
    }

    // dict["key"] reads
    for (const node of tree.findAll("subscript")) {
      const value = node.childForFieldName("value");
      const key = node.childForFieldName("subscript");
      if (!value || !key || value.type !== "identifier" || key.type !== "string") continue;
      if (isAssignmentTarget(tree, node)) continue;
      if (isModuleLike(value.text)) continue;

      const line = tree.lineOf(node);
      const d = value.text;
      const body = stringBody(key);
      const checked =
        window.hasPriorCheck(line, d, "key_check", `"${body}"`) ||
        window.hasPriorCheck(line, d, "key_check", `'${body}'`) ||
        window.windowContains(line, `${d}.get(`) ||
        tree.lineText(line).includes(`${d}.get(`);
      if (checked) continue;

      findings.push(
        violationAt(
          tree,
          node,
          "null_safety",
          "critical",
          `Dictionary access '${d}[${key.text}]' without key check`,
          `${d}.get(${key.text})  # or check '${body}' in ${d} first`,
        ),
      );
    }
    return findings;
  },
};

// ── Detector 2: Collection Safety ──
export const CollectionSafety: Detector = {
  id: 2,
  name: "Collection Safety",
  types: ["collection_safety"],
  detect({ tree, window }: DetectorContext): Violation[] {
    const findings: Violation[] = [];

    for (const node of tree.findAll("subscript")) {
      const value = node.childForFieldName("value");
      const index = node.childForFieldName("subscript");
      if (!value || !index || value.type !== "identifier" || index.type !== "integer") continue;
      if (isAssignmentTarget(tree, node)) continue;

      const line = tree.lineOf(node);
      const list = value.text;
      if (window.hasPriorCheck(line, list, "bounds_check", index.text)) continue;

      findings.push(
        violationAt(
          tree,
          node,
          "collection_safety",
          "warning",
          `List access '${list}[${index.text}]' without bounds check`,
          `if len(${list}) > ${index.text}:\n    ${tree.lineText(line)}`,
        ),
      );
    }

    for (const call of tree.findAll("call")) {
      const fn = call.childForFieldName("function");
      if (!fn || fn.type !== "attribute") continue;
      const receiver = fn.childForFieldName("object");
      const attr = fn.childForFieldName("attribute");
      if (!receiver || !attr || attr.text !== "pop" || receiver.type !== "identifier") continue;

      const line = tree.lineOf(call);
      const list = receiver.text;
      if (window.hasPriorCheck(line, list, "empty_check")) continue;

      findings.push(
        violationAt(
          tree,
          call,
          "collection_safety",
          "warning",
          `Call to '${list}.pop()' without empty check`,
          `if ${list}:\n    ${tree.lineText(line)}`,
        ),
      );
    }
    return findings;
  },
};

// ── Detector 3: External Call Safety ──
export const ExternalCallSafety: Detector = {
  id: 3,
  name: "External Call Safety",
  types: ["external_call_safety", "timeout_presence"],
  detect({ tree, patterns }: DetectorContext): Violation[] {
    const findings: Violation[] = [];
    const { httpModules, httpMethods, urlopenFunctions, subprocessFunctions } = patterns.externalCalls;

    for (const call of tree.findAll("call")) {
      const fn = call.childForFieldName("function");
      const name = fn ? dottedName(fn) : null;
      if (!name) continue;
      const parts = name.split(".");
      const last = parts[parts.length - 1] ?? "";
      const hasTimeout = keywordArgs(call).includes("timeout");
      if (hasTimeout) continue;

      if (parts.length === 2 && httpModules.includes(parts[0] ?? "") && httpMethods.includes(last)) {
        findings.push(
          violationAt(
            tree,
            call,
            "external_call_safety",
            "critical",
            `HTTP request '${name}()' without timeout parameter`,
            "Pass an explicit timeout, e.g. timeout=30",
          ),
        );
      } else if (urlopenFunctions.includes(last) && positionalArgCount(call) < 2) {
        findings.push(
          violationAt(
            tree,
            call,
            "external_call_safety",
            "critical",
            `'${name}()' without timeout`,
            "Pass timeout as the second argument or timeout=30",
          ),
        );
      } else if (parts.length === 2 && parts[0] === "subprocess" && subprocessFunctions.includes(last)) {
        findings.push(
          violationAt(
            tree,
            call,
            "timeout_presence",
            "critical",
            `Subprocess call '${name}()' without timeout parameter`,
            "Pass timeout=30 and handle subprocess.TimeoutExpired",
          ),
        );
      }
    }
    return findings;
  },
};

// ── Detector 4: Type Safety ──
export const TypeSafety: Detector = {
  id: 4,
  name: "Type Safety",
  types: ["type_safety"],
  detect({ tree, window, patterns }: DetectorContext): Violation[] {
    const findings: Violation[] = [];
    const { builtins, parsers } = patterns.typeConversions;

    for (const call of tree.findAll("call")) {
      const fn = call.childForFieldName("function");
      if (!fn) continue;
      const name = fn.type === "identifier" ? fn.text : dottedName(fn);
      if (!name) continue;
      const isBuiltin = fn.type === "identifier" && builtins.includes(name);
      if (!isBuiltin && !parsers.includes(name)) continue;
      if (positionalArgCount(call) === 0 || isLiteralArgument(call)) continue;
      if (window.isInsideGuardedBlock(call, "try")) continue;

      const error = isBuiltin ? "ValueError" : "json.JSONDecodeError";
      findings.push(
        violationAt(
          tree,
          call,
          "type_safety",
          "warning",
          `Conversion '${name}()' outside a try block`,
          `Wrap in try/except ${error} and handle invalid input`,
        ),
      );
    }
    return findings;
  },
};

/** `int(3)`, `float(1.5)`: conversions of numeric literals cannot fail. */
function isLiteralArgument(call: TSNode): boolean {
  const args = call.childForFieldName("arguments");
  const first = args?.namedChild(0);
  return !!first && (first.type === "integer" || first.type === "float");
}
