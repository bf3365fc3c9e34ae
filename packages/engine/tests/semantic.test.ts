import { describe, it, expect, beforeAll } from "vitest";
import type { Parser } from "web-tree-sitter";
import {
  verifyBusinessLogic,
  matchFunctions,
  missingElements,
  verifyErrorHandling,
  verifyInputValidation,
} from "../src/semantic";
import { functionsOf } from "../src/parser/functions";
import type { PatternLibrary } from "../src/patterns/library";
import { defaultPatterns, loadParser, makeContext, parse, py } from "./helpers";

describe("BusinessLogicVerifier", () => {
  let parser: Parser;
  let patterns: PatternLibrary;

  beforeAll(async () => {
    parser = await loadParser();
    patterns = defaultPatterns();
  });

  const patternById = (id: string) => {
    const p = patterns.businessPatterns.find((bp) => bp.id === id);
    if (!p) throw new Error(`pattern ${id} missing from defaults`);
    return p;
  };

  it("loads the default flows in name order", () => {
    expect(patterns.businessPatterns.map((p) => p.id)).toEqual([
      "authentication",
      "password_reset",
      "payment_processing",
      "user_registration",
    ]);
  });

  it("reports only the missing expiry check for a reset with a secure token", () => {
    const tree = parse(
      parser,
      py(
        "import secrets",
        "def reset_password(user):",
        "    token = secrets.token_urlsafe(32)",
        "    db.save(token)",
        "    mark_used(token)",
        "    check_rate_limit(user)",
        "    return token",
      ),
    );
    const found = verifyBusinessLogic(tree, patterns);
    expect(found).toHaveLength(1);
    expect(found[0]).toMatchObject({
      line: 2,
      type: "business_logic_incomplete",
      severity: "critical",
      description: "password reset in 'reset_password' is missing expiry_check",
      suggestion: "Check if current time is before token.expires_at (typically 1 hour expiry)",
    });
    expect(found.some((v) => v.description.endsWith("token_generation"))).toBe(false);
  });

  it("lists every element of an empty flow in checklist order", () => {
    const tree = parse(parser, py("def forgot_password(email):", "    return None"));
    const [fn] = functionsOf(tree);
    if (!fn) throw new Error("fixture function missing");
    expect(missingElements(patternById("password_reset"), fn)).toEqual([
      "token_generation",
      "token_storage",
      "expiry_check",
      "invalidation_after_use",
      "rate_limiting",
    ]);
  });

  it("matches functions by docstring", () => {
    const tree = parse(
      parser,
      py("def handler(order):", '    """Process a payment for the order."""', "    return order"),
    );
    expect(matchFunctions(tree, patternById("payment_processing")).map((f) => f.name)).toEqual(["handler"]);
    expect(matchFunctions(tree, patternById("authentication"))).toEqual([]);
  });

  it("reports optional elements as warnings", () => {
    const tree = parse(
      parser,
      py(
        "def process_payment(amount, transaction_id):",
        "    log(amount, transaction_id)",
        "    rollback()",
      ),
    );
    const found = verifyBusinessLogic(tree, patterns);
    expect(found.map((v) => [v.severity, v.description])).toEqual([
      ["warning", "payment processing in 'process_payment' is missing fraud_check"],
    ]);
  });
});

describe("Error handling and input validation", () => {
  let parser: Parser;
  let patterns: PatternLibrary;

  beforeAll(async () => {
    parser = await loadParser();
    patterns = defaultPatterns();
  });

  it("flags unguarded database, HTTP and file calls", () => {
    const tree = parse(
      parser,
      py(
        "import requests",
        "def sync(cursor, path):",
        '    cursor.execute("UPDATE t SET a = 1")',
        '    requests.get("http://example.invalid", timeout=5)',
        "    fh = open(path)",
        "    with open(path) as g:",
        "        g.read()",
        "    try:",
        "        cursor.commit()",
        "    except Exception:",
        "        raise",
      ),
    );
    const found = verifyErrorHandling(makeContext(tree, patterns));
    expect(found.map((v) => [v.line, v.severity, v.description])).toEqual([
      [3, "critical", "Database operation without error handling"],
      [4, "critical", "External API call without error handling"],
      [5, "warning", "File operation without error handling"],
    ]);
    expect(found.every((v) => v.type === "error_handling_missing")).toBe(true);
  });

  it("flags public multi-argument functions that never validate", () => {
    const tree = parse(
      parser,
      py(
        "def create(name, email):",
        '    return {"name": name}',
        "def update(self, name, email):",
        "    if not name:",
        '        raise ValueError("name")',
        "    return name",
        "def _private(a, b):",
        "    return a",
        "def single(self, a):",
        "    return a",
      ),
    );
    const found = verifyInputValidation(tree, patterns);
    expect(found).toHaveLength(1);
    expect(found[0]).toMatchObject({
      line: 1,
      type: "data_flow_validation_missing",
      severity: "warning",
      description: "Function 'create' lacks input validation",
      suggestion: "Validate name, email at the start of 'create'",
    });
  });
});
