import { describe, it, expect, beforeAll } from "vitest";
import type { Parser } from "web-tree-sitter";
import {
  parseSource,
  kindOf,
  dottedName,
  keywordArgs,
  positionalArgCount,
} from "../src/parser/syntax-tree";
import { functionsOf } from "../src/parser/functions";
import { loadParser, parse, py } from "./helpers";

describe("SyntaxTreeProvider: tree-sitter Python", () => {
  let parser: Parser;

  beforeAll(async () => {
    parser = await loadParser();
  });

  describe("parseSource", () => {
    it("returns a tree with source lines", () => {
      const tree = parse(parser, py("x = 1", "y = x + 2"));
      expect(tree.file).toBe("app.py");
      expect(tree.lineCount).toBe(3);
      expect(tree.lineText(2)).toBe("y = x + 2");
      expect(tree.lineText(99)).toBe("");
    });

    it("reports syntax errors as parse_error", () => {
      const result = parseSource(parser, "broken.py", py("def broken(:", "    pass"));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("parse_error");
      expect(result.error.file).toBe("broken.py");
      expect(result.error.message).toMatch(/^syntax error near line \d+$/);
    });

    it("strips carriage returns from line text", () => {
      const tree = parse(parser, "a = 1\r\nb = 2\r\n");
      expect(tree.lines[0]).toBe("a = 1");
      expect(tree.lines[1]).toBe("b = 2");
    });
  });

  describe("Node kinds and parent index", () => {
    it("maps grammar node types onto kinds", () => {
      const tree = parse(parser, py("class A:", "    def f(self):", "        try:", "            pass", "        except ValueError:", "            pass"));
      expect(tree.findAll("class_def")).toHaveLength(1);
      expect(tree.findAll("function_def")).toHaveLength(1);
      expect(tree.findAll("try")).toHaveLength(1);
      expect(tree.findAll("exception_handler")).toHaveLength(1);
      expect(kindOf(tree.root)).toBe("other");
    });

    it("links every node to its parent", () => {
      const tree = parse(parser, py("result = compute(value)"));
      const [call] = tree.findAll("call");
      expect(call).toBeDefined();
      if (!call) return;
      expect(tree.parents.parentOf(call)?.type).toBe("assignment");
      expect(tree.parents.parentOf(tree.root)).toBeNull();
      const types = [...tree.parents.ancestors(call)].map((n) => n.type);
      expect(types).toEqual(["assignment", "expression_statement", "module"]);
    });
  });

  describe("Call helpers", () => {
    it("reads dotted callee names and arguments", () => {
      const tree = parse(parser, py("client.session.get(url, 2, timeout=3, **extra)"));
      const [call] = tree.findAll("call");
      const fn = call?.childForFieldName("function");
      expect(fn && dottedName(fn)).toBe("client.session.get");
      if (!call) return;
      expect(keywordArgs(call)).toEqual(["timeout"]);
      expect(positionalArgCount(call)).toBe(2);
    });

    it("returns null for chains not rooted in a name", () => {
      const tree = parse(parser, py("make().run()"));
      const outer = tree.findAll("call").find((c) => c.text === "make().run()");
      const fn = outer?.childForFieldName("function");
      expect(fn && dottedName(fn)).toBeNull();
    });
  });

  describe("importedNames", () => {
    it("collects bound names, not source modules", () => {
      const tree = parse(
        parser,
        py("import os.path", "import numpy as np", "from pkg.sub import alpha, beta as b"),
      );
      expect([...tree.importedNames()].sort()).toEqual(["alpha", "b", "np", "os"]);
    });
  });

  describe("functionsOf", () => {
    it("describes decorated methods", () => {
      const tree = parse(
        parser,
        py(
          "class Handlers:",
          '    @app.route("/items")',
          "    def handler(self, a: int, b=2, *args, **kwargs):",
          '        """Handle item requests."""',
          "        return a",
        ),
      );
      const [fn] = functionsOf(tree);
      expect(fn?.name).toBe("handler");
      expect(fn?.line).toBe(3);
      expect(fn?.params).toEqual(["self", "a", "b"]);
      expect(fn?.decorators).toEqual(["route"]);
      expect(fn?.isMethod).toBe(true);
      expect(fn?.docstring).toBe('"""Handle item requests."""');
    });

    it("treats nested functions as plain functions", () => {
      const tree = parse(parser, py("class A:", "    def outer(self):", "        def inner(x):", "            return x", "        return inner"));
      const inner = functionsOf(tree).find((f) => f.name === "inner");
      expect(inner?.isMethod).toBe(false);
      expect(inner?.docstring).toBeNull();
    });
  });
});
