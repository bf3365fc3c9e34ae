import type { ComponentSource, FailureType, PredictedFailure } from "../types";
import type { FailureRule } from "../patterns/library";
import { DEFAULT_FAILURE_RULES } from "../patterns/library";

/**
 * Contract compatibility between two components:
 * datetime format, ID format, shared enums and nullability of shared fields.
 * Contracts are OpenAPI-like documents loaded from YAML or JSON.
 */

type Contract = Record<string, unknown>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** `x-timeout` at the top level or under `info`, in seconds. */
export function contractTimeout(contract: Contract): number | undefined {
  const top = contract["x-timeout"];
  if (typeof top === "number" && Number.isFinite(top)) return top;
  const info = contract["info"];
  if (isRecord(info)) {
    const nested = info["x-timeout"];
    if (typeof nested === "number" && Number.isFinite(nested)) return nested;
  }
  return undefined;
}

function deepHas(obj: unknown, key: string, value: string): boolean {
  if (Array.isArray(obj)) return obj.some((item) => deepHas(item, key, value));
  if (!isRecord(obj)) return false;
  if (obj[key] === value) return true;
  return Object.values(obj).some((v) => deepHas(v, key, value));
}

export function datetimeFormat(contract: Contract): string | null {
  const text = JSON.stringify(contract).toLowerCase();
  if (text.includes("iso8601") || text.includes("iso-8601")) return "ISO8601";
  if (text.includes("unix") || text.includes("epoch")) return "Unix timestamp";
  if (text.includes("rfc3339")) return "RFC3339";
  if (deepHas(contract, "format", "date-time")) return "ISO8601";
  return null;
}

export function idFormat(contract: Contract): string | null {
  if (JSON.stringify(contract).toLowerCase().includes("uuid")) return "UUID";
  if (deepHas(contract, "type", "integer")) return "integer";
  if (deepHas(contract, "type", "string")) return "string";
  return null;
}

/** Every `key` found in the document, by dotted path. */
function collect(obj: unknown, key: string, path = "", out = new Map<string, unknown>()): Map<string, unknown> {
  if (Array.isArray(obj)) {
    obj.forEach((item, i) => collect(item, key, `${path}[${i}]`, out));
  } else if (isRecord(obj)) {
    if (key in obj) out.set(path, obj[key]);
    for (const [k, v] of Object.entries(obj)) collect(v, key, path ? `${path}.${k}` : k, out);
  }
  return out;
}

export function analyzeContractCompatibility(
  a: ComponentSource,
  b: ComponentSource,
  rules: Readonly<Record<FailureType, FailureRule>> = DEFAULT_FAILURE_RULES,
): PredictedFailure[] {
  if (!a.contract || !b.contract) return [];
  const rule = rules.data_format_mismatch;
  const failures: PredictedFailure[] = [];
  const mismatch = (description: string, fixStrategy: string, severity = rule.severity) =>
    failures.push({
      failureType: "data_format_mismatch",
      componentA: a.name,
      componentB: b.name,
      description,
      severity,
      fixStrategy,
    });

  const dtA = datetimeFormat(a.contract);
  const dtB = datetimeFormat(b.contract);
  if (dtA && dtB && dtA !== dtB) {
    mismatch(
      `Date/time format mismatch: ${a.name} uses ${dtA}, ${b.name} uses ${dtB}`,
      "Standardize on ISO8601 across all components",
    );
  }

  const idA = idFormat(a.contract);
  const idB = idFormat(b.contract);
  if (idA && idB && idA !== idB) {
    mismatch(`ID format mismatch: ${a.name} uses ${idA}, ${b.name} uses ${idB}`, "Standardize on UUID for all IDs");
  }

  const enumsA = collect(a.contract, "enum");
  const enumsB = collect(b.contract, "enum");
  for (const path of [...enumsA.keys()].filter((p) => enumsB.has(p)).sort()) {
    const va = JSON.stringify(enumsA.get(path));
    const vb = JSON.stringify(enumsB.get(path));
    if (va === vb) continue;
    mismatch(
      `Enum '${path}' has different values: ${a.name}=${va}, ${b.name}=${vb}`,
      `Standardize enum '${path}' values across all components`,
    );
  }

  const nullA = collect(a.contract, "nullable");
  const nullB = collect(b.contract, "nullable");
  for (const path of [...nullA.keys()].filter((p) => nullB.has(p)).sort()) {
    if (nullA.get(path) === nullB.get(path)) continue;
    mismatch(
      `Field '${path}' nullable mismatch: ${a.name}=${String(nullA.get(path))}, ${b.name}=${String(nullB.get(path))}`,
      `Standardize null handling for field '${path}'`,
      "warning",
    );
  }

  return failures;
}

/** Compatibility over every unordered pair of components that both carry a contract. */
export function analyzeAllContracts(
  components: readonly ComponentSource[],
  rules: Readonly<Record<FailureType, FailureRule>> = DEFAULT_FAILURE_RULES,
): PredictedFailure[] {
  const withContract = components
    .filter((c) => c.contract)
    .sort((x, y) => (x.name < y.name ? -1 : x.name > y.name ? 1 : 0));
  const out: PredictedFailure[] = [];
  for (let i = 0; i < withContract.length; i++) {
    for (let j = i + 1; j < withContract.length; j++) {
      const a = withContract[i];
      const b = withContract[j];
      if (a && b) out.push(...analyzeContractCompatibility(a, b, rules));
    }
  }
  return out;
}
