import { describe, it, expect, beforeAll } from "vitest";
import type { Parser } from "web-tree-sitter";
import {
  ALL_DETECTORS,
  runDetectors,
  NullSafety,
  CollectionSafety,
  ExternalCallSafety,
  TypeSafety,
  BoundsSafety,
  ExceptionHandling,
  ConcurrencySafety,
} from "../src/detectors";
import type { PatternLibrary } from "../src/patterns/library";
import type { Detector } from "../src/types";
import { defaultPatterns, loadParser, makeContext, parse, py } from "./helpers";

describe("Detector registry", () => {
  it("should have 7 detectors", () => {
    expect(ALL_DETECTORS.length).toBe(7);
  });

  it("each detector has unique id", () => {
    const ids = ALL_DETECTORS.map((d) => d.id);
    expect(new Set(ids).size).toBe(7);
  });

  it("each detector has a name and at least one type", () => {
    for (const d of ALL_DETECTORS) {
      expect(d.name).toBeTruthy();
      expect(d.types.length).toBeGreaterThan(0);
    }
  });
});

describe("Detectors", () => {
  let parser: Parser;
  let patterns: PatternLibrary;

  beforeAll(async () => {
    parser = await loadParser();
    patterns = defaultPatterns();
  });

  const run = (detector: Detector, source: string) =>
    detector.detect(makeContext(parse(parser, source), patterns));

  describe("Detector 1: Null Safety", () => {
    it("flags attribute access without a None check", () => {
      const found = run(NullSafety, py("def show(user):", "    return user.name"));
      expect(found).toHaveLength(1);
      expect(found[0]).toMatchObject({
        line: 2,
        type: "null_safety",
        severity: "critical",
        description: "Attribute access 'user.name' without None check",
        snippet: "return user.name",
      });
    });

    it("emits exactly one violation per unchecked access line", () => {
      const found = run(
        NullSafety,
        py(
          "def show(user, order):",
          "    label = user.name",
          "    if order is not None:",
          "        total = order.total",
          "    return user.email + label",
        ),
      );
      expect(found.map((v) => v.line)).toEqual([2, 5]);
      expect(found.map((v) => v.description)).toEqual([
        "Attribute access 'user.name' without None check",
        "Attribute access 'user.email' without None check",
      ]);
    });

    it("skips safe accessors, modules and decorators", () => {
      const found = run(
        NullSafety,
        py(
          "import numpy as np",
          '@app.route("/")',
          "def index(self, data):",
          '    value = data.get("x")',
          "    arr = np.array(value)",
          "    return self.render(arr)",
        ),
      );
      expect(found).toEqual([]);
    });

    it("flags dictionary reads without a key check", () => {
      const found = run(NullSafety, py("def read(data):", '    return data["name"]'));
      expect(found).toHaveLength(1);
      expect(found[0]?.description).toBe(`Dictionary access 'data["name"]' without key check`);
      expect(found[0]?.line).toBe(2);
    });

    it("accepts a prior membership test or an assignment", () => {
      const found = run(
        NullSafety,
        py(
          "def read(data):",
          '    if "name" in data:',
          '        return data["name"]',
          '    data["name"] = "unknown"',
          "    return None",
        ),
      );
      expect(found).toEqual([]);
    });
  });

  describe("Detector 2: Collection Safety", () => {
    it("flags index and pop without checks", () => {
      const found = run(
        CollectionSafety,
        py(
          "def head(items, queue):",
          "    first = items[0]",
          "    if queue:",
          "        queue.pop()",
          "    return items.pop()",
        ),
      );
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [2, "List access 'items[0]' without bounds check"],
        [5, "Call to 'items.pop()' without empty check"],
      ]);
      expect(found.every((v) => v.severity === "warning")).toBe(true);
    });

    it("accepts a length check above the index", () => {
      const found = run(
        CollectionSafety,
        py("def head(items):", "    if len(items) > 0:", "        return items[0]"),
      );
      expect(found).toEqual([]);
    });
  });

  describe("Detector 3: External Call Safety", () => {
    it("flags HTTP, urlopen and subprocess calls without timeouts", () => {
      const found = run(
        ExternalCallSafety,
        py(
          "import requests",
          "import subprocess",
          "from urllib.request import urlopen",
          "requests.get(url)",
          "requests.post(url, timeout=10)",
          "urlopen(url)",
          "urlopen(url, None, 5)",
          'subprocess.run(["ls"])',
        ),
      );
      expect(found.map((v) => [v.line, v.type])).toEqual([
        [4, "external_call_safety"],
        [6, "external_call_safety"],
        [8, "timeout_presence"],
      ]);
      expect(found[0]?.description).toBe("HTTP request 'requests.get()' without timeout parameter");
      expect(found[2]?.description).toBe("Subprocess call 'subprocess.run()' without timeout parameter");
      expect(found.every((v) => v.severity === "critical")).toBe(true);
    });
  });

  describe("Detector 4: Type Safety", () => {
    it("flags conversions outside try", () => {
      const found = run(
        TypeSafety,
        py(
          "import json",
          "def load(raw, text):",
          "    n = int(raw)",
          "    k = int(5)",
          "    try:",
          "        doc = json.loads(text)",
          "    except ValueError:",
          "        doc = None",
          "    return json.loads(text)",
        ),
      );
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [3, "Conversion 'int()' outside a try block"],
        [9, "Conversion 'json.loads()' outside a try block"],
      ]);
      expect(found[0]?.suggestion).toBe("Wrap in try/except ValueError and handle invalid input");
    });
  });

  describe("Detector 5: Bounds Safety", () => {
    it("flags division by an unchecked name", () => {
      const found = run(
        BoundsSafety,
        py(
          "def ratio(a, b, c, name):",
          "    x = a / b",
          "    if c != 0:",
          "        y = a // c",
          '    label = "id-%s" % name',
          "    z = a % 3",
          "    return x, y, label, z",
        ),
      );
      expect(found).toHaveLength(1);
      expect(found[0]).toMatchObject({
        line: 2,
        type: "bounds_safety",
        severity: "warning",
        description: "Division by 'b' without zero check",
      });
    });
  });

  describe("Detector 6: Exception Handling", () => {
    it("flags bare and silent handlers", () => {
      const found = run(
        ExceptionHandling,
        py(
          "try:",
          "    work()",
          "except:",
          "    pass",
          "try:",
          "    work()",
          "except ValueError:",
          "    ...",
          "try:",
          "    work()",
          "except KeyError as e:",
          "    log(e)",
        ),
      );
      expect(found.map((v) => [v.line, v.severity])).toEqual([
        [3, "critical"],
        [3, "warning"],
        [7, "warning"],
      ]);
      expect(found[1]?.description).toBe("Exception handler silently swallows the error");
    });
  });

  describe("Detector 7: Concurrency Safety", () => {
    it("flags self attribute writes outside a lock", () => {
      const found = run(
        ConcurrencySafety,
        py(
          "import threading",
          "class Counter:",
          "    def __init__(self):",
          "        self.count = 0",
          "        self._lock = threading.Lock()",
          "    def bump(self):",
          "        self.count += 1",
          "    def safe_bump(self):",
          "        with self._lock:",
          "            self.count += 1",
          "    def swap(self, a, b):",
          "        self.left, self.right = a, b",
        ),
      );
      expect(found.map((v) => [v.line, v.description])).toEqual([
        [7, "Shared state 'self.count' modified outside a lock"],
        [12, "Shared state 'self.left' modified outside a lock"],
        [12, "Shared state 'self.right' modified outside a lock"],
      ]);
    });
  });

  describe("runDetectors", () => {
    it("returns nothing for clean code", () => {
      const ctx = makeContext(parse(parser, py("def add(a, b):", "    return a + b")), patterns);
      expect(runDetectors(ctx)).toEqual([]);
    });

    it("stamps the file on every violation", () => {
      const ctx = makeContext(parse(parser, py("def f(x):", "    return x.y"), "svc/handler.py"), patterns);
      expect(runDetectors(ctx).map((v) => v.file)).toEqual(["svc/handler.py"]);
    });
  });
});
