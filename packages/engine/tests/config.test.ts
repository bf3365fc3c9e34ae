import { describe, it, expect } from "vitest";
import { loadEngineConfig, DEFAULT_MAX_FILE_BYTES } from "../src/config";
import { DEFAULT_LOOKBACK_LINES } from "../src/context/context-window";

describe("loadEngineConfig", () => {
  it("uses defaults for an empty environment", () => {
    const { config, problems } = loadEngineConfig({});
    expect(problems).toEqual([]);
    expect(config.lookbackLines).toBe(DEFAULT_LOOKBACK_LINES);
    expect(config.timeoutOverheadSeconds).toBe(5);
    expect(config.maxFileBytes).toBe(DEFAULT_MAX_FILE_BYTES);
    expect(config.concurrency).toBeGreaterThanOrEqual(1);
    expect(config.patternsPath).toBeUndefined();
    expect(config.quiet).toBe(false);
  });

  it("reads every setting", () => {
    const { config, problems } = loadEngineConfig({
      CODEWARD_CONCURRENCY: "3",
      CODEWARD_LOOKBACK_LINES: "8",
      CODEWARD_TIMEOUT_OVERHEAD: "2.5",
      CODEWARD_MAX_FILE_BYTES: "1000",
      CODEWARD_PATTERNS: "rules.yaml",
      CODEWARD_PYTHON_WASM: "/opt/grammar.wasm",
      CODEWARD_QUIET: "true",
    });
    expect(problems).toEqual([]);
    expect(config).toEqual({
      concurrency: 3,
      lookbackLines: 8,
      timeoutOverheadSeconds: 2.5,
      maxFileBytes: 1000,
      patternsPath: "rules.yaml",
      pythonWasmPath: "/opt/grammar.wasm",
      quiet: true,
    });
  });

  it("reports bad values and keeps the defaults", () => {
    const { config, problems } = loadEngineConfig({
      CODEWARD_LOOKBACK_LINES: "abc",
      CODEWARD_CONCURRENCY: "0",
      CODEWARD_QUIET: "maybe",
    });
    expect(config.lookbackLines).toBe(DEFAULT_LOOKBACK_LINES);
    expect(config.quiet).toBe(false);
    expect(problems).toHaveLength(3);
    expect(problems[0]).toMatch(/^CODEWARD_CONCURRENCY=0: /);
  });
});
