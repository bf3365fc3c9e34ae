/**
 * Pattern library: the read-only rule set every analyzer consults.
 *
 * Loaded once per run before any file is analyzed. A missing or malformed
 * project rule file never fails the run: the bundled defaults are used and
 * a config_error note is recorded. If even the bundled file is unreadable,
 * MINIMAL_RULES keeps the engine working.
 */

import { readFileSync, existsSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { parse as parseYAML } from "yaml";
import { RuleFileSchema, type RawBusinessPattern, type RawElement, type RuleFile } from "./schema";
import type { AnalysisNote, FailureType, Severity } from "../types";
import { createLogger, type Logger } from "../logger";

// ─── Library Types ──────────────────────────────────────────

export interface RequiredElement {
  name: string;
  keywords: readonly string[];
  severity: Severity;
  optional: boolean;
  suggestion: string;
}

/** A named business-flow checklist (PatternRule). */
export interface BusinessPattern {
  id: string;
  detectionKeywords: readonly string[];
  severity: Severity;
  fixStrategy: string;
  elements: readonly RequiredElement[];
}

export interface FailureRule {
  detectionPattern: string;
  severity: Severity;
  fixStrategy: string;
}

export interface PatternLibrary {
  /** Where the rules came from: a project file, the bundled defaults, or the built-in minimum. */
  source: "file" | "defaults" | "minimal";
  safeAccessors: ReadonlySet<string>;
  moduleAllowlist: ReadonlySet<string>;
  externalCalls: {
    httpModules: readonly string[];
    httpMethods: readonly string[];
    urlopenFunctions: readonly string[];
    subprocessFunctions: readonly string[];
  };
  typeConversions: {
    builtins: readonly string[];
    parsers: readonly string[];
  };
  businessPatterns: readonly BusinessPattern[];
  errorHandling: {
    databaseMethods: readonly string[];
    httpModules: readonly string[];
    fileFunctions: readonly string[];
  };
  validationKeywords: readonly string[];
  security: {
    piiFields: readonly string[];
    sqlKeywords: readonly string[];
    logMethods: readonly string[];
    routeDecorators: readonly string[];
    authDecoratorMarkers: readonly string[];
    publicEndpoints: readonly string[];
  };
  standards: {
    errorCodeMarkers: readonly string[];
    errorCodes: ReadonlySet<string>;
    timeouts: ReadonlySet<number>;
  };
  integration: {
    timeoutOverheadSeconds: number;
    errorHandlingMarkers: readonly string[];
    retryMarkers: readonly string[];
    failures: Readonly<Record<FailureType, FailureRule>>;
  };
}

export interface LoadedPatterns {
  library: PatternLibrary;
  notes: AnalysisNote[];
}

// ─── Built-in Minimum ───────────────────────────────────────

export const MINIMAL_RULES: RuleFile = {
  safe_accessors: ["get", "keys", "values", "items"],
  module_allowlist: ["self", "cls", "os", "sys", "json", "re", "logging", "subprocess", "requests"],
  external_calls: {
    http_modules: ["requests", "httpx"],
    http_methods: ["get", "post", "put", "delete", "patch", "request"],
    urlopen_functions: ["urlopen"],
    subprocess_functions: ["run", "call", "check_output"],
  },
  type_conversions: { builtins: ["int", "float"], parsers: ["json.loads"] },
  business_logic_patterns: {
    password_reset: {
      detection_pattern: ["reset_password", "password_reset", "forgot_password"],
      required_elements: {
        token_generation: ["secrets.token", "uuid.uuid", "generate_token"],
        expiry_check: ["expir", "ttl", "timedelta"],
      },
    },
  },
  error_handling: {
    database_methods: ["execute", "query", "commit"],
    http_modules: ["requests", "httpx"],
    file_functions: ["open"],
  },
  input_validation: { keywords: ["validate", "check", "raise", "isinstance", "if not"] },
  security: {
    pii_fields: ["password", "ssn", "token", "secret"],
    sql_keywords: ["SELECT", "INSERT", "UPDATE", "DELETE", "FROM", "WHERE"],
    log_methods: ["debug", "info", "warning", "error", "critical"],
    route_decorators: ["route", "get", "post"],
    auth_decorator_markers: ["auth", "login", "require", "permission"],
    public_endpoints: ["health", "ping"],
  },
  standards: {
    error_code_markers: ["ERROR", "FAILED", "INVALID"],
    error_codes: ["VALIDATION_FAILED", "NOT_FOUND", "INTERNAL_ERROR"],
    timeouts: [5, 10, 30, 60],
  },
  integration: {
    timeout_overhead_seconds: 5,
    error_handling_markers: ["circuit", "fallback"],
    retry_markers: ["retry", "backoff"],
  },
};

export const DEFAULT_FAILURE_RULES: Record<FailureType, FailureRule> = {
  data_format_mismatch: {
    detectionPattern: "format mismatch",
    severity: "critical",
    fixStrategy: "Standardize data formats across components",
  },
  missing_error_handling: {
    detectionPattern: "no try/except on component calls",
    severity: "critical",
    fixStrategy: "Add try/except with fallback behavior or circuit breaker",
  },
  missing_retry: {
    detectionPattern: "no retry on component calls",
    severity: "warning",
    fixStrategy: "Add exponential backoff retry mechanism",
  },
  timeout_cascade: {
    detectionPattern: "parent_timeout <= child_timeout + overhead",
    severity: "warning",
    fixStrategy: "Adjust timeout hierarchy",
  },
  circular_dependency: {
    detectionPattern: "component cycle detected",
    severity: "critical",
    fixStrategy: "Introduce event bus or mediator pattern to break cycle",
  },
};

// ─── Loading ────────────────────────────────────────────────

export function defaultRulesPath(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "config", "default-patterns.yaml");
}

type ReadOutcome = { ok: true; rules: RuleFile } | { ok: false; message: string };

function readRuleFile(path: string): ReadOutcome {
  let raw: unknown;
  try {
    raw = parseYAML(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    return { ok: false, message: e instanceof Error ? e.message : String(e) };
  }
  const parsed = RuleFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") || "(root)" : "(root)";
    return { ok: false, message: `${where}: ${issue?.message ?? "invalid rule file"}` };
  }
  return { ok: true, rules: parsed.data };
}

/**
 * Load the rule set: bundled defaults, overlaid section by section with the
 * project file at `projectPath` when given.
 */
export function loadPatternLibrary(
  projectPath?: string,
  logger: Logger = createLogger("patterns"),
): LoadedPatterns {
  const notes: AnalysisNote[] = [];

  let base: RuleFile = MINIMAL_RULES;
  let source: PatternLibrary["source"] = "minimal";
  const bundled = readRuleFile(defaultRulesPath());
  if (bundled.ok) {
    base = bundled.rules;
    source = "defaults";
  } else {
    logger.warn(`bundled rules unreadable, using built-in minimum: ${bundled.message}`);
    notes.push({ kind: "config_error", file: defaultRulesPath(), message: bundled.message });
  }

  if (projectPath) {
    if (!existsSync(projectPath)) {
      const message = `rule file not found: ${projectPath}`;
      logger.warn(`${message}, falling back to defaults`);
      notes.push({ kind: "config_error", file: projectPath, message });
    } else {
      const project = readRuleFile(projectPath);
      if (project.ok) {
        base = overlay(base, project.rules);
        source = "file";
      } else {
        logger.warn(`${projectPath} is malformed (${project.message}), falling back to defaults`);
        notes.push({ kind: "config_error", file: projectPath, message: project.message });
      }
    }
  }

  return { library: buildLibrary(base, source), notes };
}

/** Project sections replace default sections; business patterns merge by name. */
function overlay(base: RuleFile, project: RuleFile): RuleFile {
  return {
    ...base,
    ...project,
    business_logic_patterns: {
      ...(base.business_logic_patterns ?? {}),
      ...(project.business_logic_patterns ?? {}),
    },
  };
}

function toElement(name: string, raw: RawElement, patternSeverity: Severity): RequiredElement {
  if (Array.isArray(raw)) {
    return {
      name,
      keywords: raw,
      severity: patternSeverity,
      optional: false,
      suggestion: `Implement ${name.replace(/_/g, " ")}`,
    };
  }
  const optional = raw.optional ?? false;
  return {
    name,
    keywords: raw.keywords,
    severity: raw.severity ?? (optional ? "warning" : patternSeverity),
    optional,
    suggestion: raw.fix_strategy ?? `Implement ${name.replace(/_/g, " ")}`,
  };
}

function toBusinessPattern(id: string, raw: RawBusinessPattern): BusinessPattern {
  const severity = raw.severity ?? "critical";
  const elements = raw.required_elements ?? raw.must_specify ?? {};
  const detection = typeof raw.detection_pattern === "string" ? [raw.detection_pattern] : raw.detection_pattern;
  return {
    id,
    detectionKeywords: detection.map((k) => k.toLowerCase()),
    severity,
    fixStrategy: raw.fix_strategy ?? `Complete the ${id.replace(/_/g, " ")} flow`,
    elements: Object.entries(elements).map(([name, el]) => toElement(name, el, severity)),
  };
}

function buildLibrary(rules: RuleFile, source: PatternLibrary["source"]): PatternLibrary {
  const m = MINIMAL_RULES;
  const pick = <K extends keyof RuleFile>(key: K): NonNullable<RuleFile[K]> => {
    const value = rules[key] ?? m[key];
    if (value === undefined || value === null) {
      throw new Error(`[patterns] built-in rules lack section ${String(key)}`);
    }
    return value;
  };

  const external = pick("external_calls");
  const conversions = pick("type_conversions");
  const errors = pick("error_handling");
  const security = pick("security");
  const standards = pick("standards");
  const integration = pick("integration");

  const failures = { ...DEFAULT_FAILURE_RULES };
  for (const [name, rule] of Object.entries(integration.failures ?? {})) {
    if (isFailureType(name)) {
      failures[name] = {
        detectionPattern: rule.detection_pattern,
        severity: rule.severity ?? DEFAULT_FAILURE_RULES[name].severity,
        fixStrategy: rule.fix_strategy,
      };
    }
  }

  const library: PatternLibrary = {
    source,
    safeAccessors: new Set(pick("safe_accessors")),
    moduleAllowlist: new Set(pick("module_allowlist")),
    externalCalls: {
      httpModules: external.http_modules,
      httpMethods: external.http_methods,
      urlopenFunctions: external.urlopen_functions,
      subprocessFunctions: external.subprocess_functions,
    },
    typeConversions: { builtins: conversions.builtins, parsers: conversions.parsers },
    businessPatterns: Object.entries(pick("business_logic_patterns"))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([id, raw]) => toBusinessPattern(id, raw)),
    errorHandling: {
      databaseMethods: errors.database_methods,
      httpModules: errors.http_modules,
      fileFunctions: errors.file_functions,
    },
    validationKeywords: pick("input_validation").keywords,
    security: {
      piiFields: security.pii_fields.map((f) => f.toLowerCase()),
      sqlKeywords: security.sql_keywords,
      logMethods: security.log_methods,
      routeDecorators: security.route_decorators,
      authDecoratorMarkers: security.auth_decorator_markers,
      publicEndpoints: security.public_endpoints,
    },
    standards: {
      errorCodeMarkers: standards.error_code_markers,
      errorCodes: new Set(standards.error_codes),
      timeouts: new Set(standards.timeouts),
    },
    integration: {
      timeoutOverheadSeconds: integration.timeout_overhead_seconds,
      errorHandlingMarkers: integration.error_handling_markers,
      retryMarkers: integration.retry_markers,
      failures,
    },
  };
  return deepFreeze(library);
}

const FAILURE_TYPES: readonly FailureType[] = [
  "circular_dependency",
  "timeout_cascade",
  "missing_error_handling",
  "missing_retry",
  "data_format_mismatch",
];

function isFailureType(name: string): name is FailureType {
  return FAILURE_TYPES.some((t) => t === name);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof Set)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
