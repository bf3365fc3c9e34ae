import { describe, it, expect, beforeAll } from "vitest";
import type { Parser } from "web-tree-sitter";
import {
  scanSecurity,
  scanSqlInjection,
  scanPiiLogging,
  scanMissingAuthentication,
  sqlKeywordPattern,
} from "../src/security";
import type { PatternLibrary } from "../src/patterns/library";
import { defaultPatterns, loadParser, parse, py } from "./helpers";

describe("SecurityScanner", () => {
  let parser: Parser;
  let patterns: PatternLibrary;

  beforeAll(async () => {
    parser = await loadParser();
    patterns = defaultPatterns();
  });

  describe("SQL injection", () => {
    it("flags an interpolated f-string query exactly once", () => {
      const tree = parse(parser, py("def find(cursor, x):", '    cursor.execute(f"SELECT * FROM t WHERE id={x}")'));
      const found = scanSqlInjection(tree, patterns);
      expect(found).toHaveLength(1);
      expect(found[0]).toMatchObject({
        line: 2,
        type: "security_sql_injection",
        severity: "critical",
        description: "Potential SQL injection: f-string with SQL query",
      });
    });

    it("accepts parameterized queries", () => {
      const tree = parse(
        parser,
        py("def find(cursor, x):", '    cursor.execute("SELECT * FROM t WHERE id = %s", (x,))'),
      );
      expect(scanSqlInjection(tree, patterns)).toEqual([]);
    });

    it("reports one violation per concatenation chain", () => {
      const tree = parse(
        parser,
        py(
          "def find(cursor, name, order):",
          `    query = "SELECT * FROM users WHERE name = '" + name + "' ORDER BY " + order`,
          "    cursor.execute(query)",
          '    label = "hello " + name',
          '    sql = "SELECT 1" + " FROM dual"',
        ),
      );
      const found = scanSqlInjection(tree, patterns);
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [2, "Potential SQL injection: query built by string concatenation"],
      ]);
    });

    it("flags .format() on SQL strings", () => {
      const tree = parse(parser, py('q = "DELETE FROM t WHERE id = {}".format(x)'));
      const found = scanSqlInjection(tree, patterns);
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [1, "Potential SQL injection: .format() on SQL query"],
      ]);
    });

    it("matches keywords case-insensitively on word boundaries", () => {
      const re = sqlKeywordPattern(patterns.security.sqlKeywords);
      expect(re.test("select name from t")).toBe(true);
      expect(re.test("Selection for the day")).toBe(false);

      const tree = parse(parser, py('a = f"select name from t where id={x}"', 'b = f"Selection for {x}"'));
      expect(scanSqlInjection(tree, patterns).map((v) => v.line)).toEqual([1]);
    });
  });

  describe("PII in logs", () => {
    it("reports one violation per field on logging lines", () => {
      const tree = parse(
        parser,
        py(
          "import logging",
          "logger = logging.getLogger(__name__)",
          "def login(user, password):",
          '    logger.info(f"login {user} with password {password}")',
          '    logger.debug("mapping ready")',
          "    print(password)",
          '    log.warning("token and api_key rotated")',
        ),
      );
      const found = scanPiiLogging(tree, patterns);
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [4, "Potential PII leak: 'password' in log statement"],
        [7, "Potential PII leak: 'token' in log statement"],
        [7, "Potential PII leak: 'api_key' in log statement"],
      ]);
      expect(found.every((v) => v.type === "data_flow_pii_leak" && v.severity === "critical")).toBe(true);
    });

    it("ignores logger setup calls", () => {
      const tree = parse(
        parser,
        py(
          "import logging",
          'logger = logging.getLogger("token_service")',
          'audit = logging.getLogger("password_reset")',
          'logging.basicConfig(filename="password.log")',
        ),
      );
      expect(scanPiiLogging(tree, patterns)).toEqual([]);
    });
  });

  describe("Missing authentication", () => {
    const routes = py(
      '@app.route("/orders")',
      "def list_orders():",
      "    return []",
      '@app.route("/admin")',
      "@login_required",
      "def admin():",
      "    return []",
      '@app.get("/health")',
      "def health():",
      '    return "ok"',
      '@router.post("/items")',
      "def create_item(item):",
      "    return item",
    );

    it("flags routes without an auth decorator", () => {
      const found = scanMissingAuthentication(parse(parser, routes), patterns);
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [2, "Endpoint 'list_orders' lacks an authentication decorator"],
        [12, "Endpoint 'create_item' lacks an authentication decorator"],
      ]);
      expect(found.every((v) => v.severity === "warning")).toBe(true);
    });

    it("is part of the combined scan", () => {
      const found = scanSecurity(parse(parser, routes), patterns);
      expect(found.map((v) => v.type)).toEqual([
        "security_missing_authentication",
        "security_missing_authentication",
      ]);
    });
  });
});
