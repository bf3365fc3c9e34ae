import { z } from "zod";

// ── Rule File Schema ──
// Mirrors the YAML/JSON keys: detection_pattern, required_elements /
// must_specify, severity, fix_strategy. Every section is optional; missing
// sections keep the bundled defaults.

export const SeveritySchema = z.enum(["critical", "warning", "info"]);

const KeywordList = z.array(z.string().min(1));

const ElementSchema = z.union([
  KeywordList,
  z.object({
    keywords: KeywordList,
    optional: z.boolean().optional(),
    severity: SeveritySchema.optional(),
    fix_strategy: z.string().optional(),
  }),
]);

export const BusinessPatternSchema = z
  .object({
    detection_pattern: z.union([z.string().min(1), KeywordList]),
    severity: SeveritySchema.optional(),
    fix_strategy: z.string().optional(),
    required_elements: z.record(ElementSchema).optional(),
    must_specify: z.record(ElementSchema).optional(),
  })
  .refine((p) => p.required_elements !== undefined || p.must_specify !== undefined, {
    message: "pattern needs required_elements or must_specify",
  });

const FailureRuleSchema = z.object({
  detection_pattern: z.string(),
  severity: SeveritySchema.optional(),
  fix_strategy: z.string(),
});

export const RuleFileSchema = z.object({
  version: z.number().int().optional(),
  safe_accessors: KeywordList.optional(),
  module_allowlist: KeywordList.optional(),
  external_calls: z
    .object({
      http_modules: KeywordList,
      http_methods: KeywordList,
      urlopen_functions: KeywordList,
      subprocess_functions: KeywordList,
    })
    .optional(),
  type_conversions: z
    .object({
      builtins: KeywordList,
      parsers: KeywordList,
    })
    .optional(),
  business_logic_patterns: z.record(BusinessPatternSchema).optional(),
  error_handling: z
    .object({
      database_methods: KeywordList,
      http_modules: KeywordList,
      file_functions: KeywordList,
    })
    .optional(),
  input_validation: z.object({ keywords: KeywordList }).optional(),
  security: z
    .object({
      pii_fields: KeywordList,
      sql_keywords: KeywordList,
      log_methods: KeywordList,
      route_decorators: KeywordList,
      auth_decorator_markers: KeywordList,
      public_endpoints: KeywordList,
    })
    .optional(),
  standards: z
    .object({
      error_code_markers: KeywordList,
      error_codes: KeywordList,
      timeouts: z.array(z.number()),
    })
    .optional(),
  integration: z
    .object({
      timeout_overhead_seconds: z.number().nonnegative(),
      error_handling_markers: KeywordList,
      retry_markers: KeywordList,
      failures: z.record(FailureRuleSchema).optional(),
    })
    .optional(),
});

export type RuleFile = z.infer<typeof RuleFileSchema>;
export type RawBusinessPattern = z.infer<typeof BusinessPatternSchema>;
export type RawElement = z.infer<typeof ElementSchema>;
