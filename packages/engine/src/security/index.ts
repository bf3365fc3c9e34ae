import type { SyntaxTree } from "../parser/syntax-tree";
import type { PatternLibrary } from "../patterns/library";
import type { Violation } from "../types";
import { scanSqlInjection } from "./sql-injection";
import { scanPiiLogging } from "./pii-logging";
import { scanMissingAuthentication } from "./authentication";

export function scanSecurity(tree: SyntaxTree, patterns: PatternLibrary): Violation[] {
  return [
    ...scanSqlInjection(tree, patterns),
    ...scanPiiLogging(tree, patterns),
    ...scanMissingAuthentication(tree, patterns),
  ];
}

export { scanSqlInjection, sqlKeywordPattern } from "./sql-injection";
export { scanPiiLogging, isLoggingCall } from "./pii-logging";
export { scanMissingAuthentication } from "./authentication";
