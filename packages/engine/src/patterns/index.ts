export { loadPatternLibrary, defaultRulesPath, MINIMAL_RULES } from "./library";
export type {
  PatternLibrary,
  BusinessPattern,
  RequiredElement,
  FailureRule,
  LoadedPatterns,
} from "./library";
export { RuleFileSchema } from "./schema";
export type { RuleFile } from "./schema";
