/**
 * codeward CLI
 *
 * Usage:
 *   npx tsx packages/engine/src/cli.ts analyze <path> [options]
 *
 * Options:
 *   --json              Print the JSON report instead of text
 *   --output=PATH       Also write the report to PATH
 *   --patterns=PATH     Project rule file (YAML or JSON)
 *   --concurrency=N     Files analyzed in parallel
 *   --quiet             No progress logging
 *
 * Exit code: 0 when nothing critical was found, 1 otherwise, 2 on usage or
 * startup errors.
 */

import { writeFileSync } from "fs";
import { fileURLToPath } from "url";
import { resolve } from "path";
import { loadEngineConfig } from "./config";
import { runAnalysis } from "./pipeline";
import { formatJsonReport, formatTextReport, exitCodeFor } from "./report";
import { createLogger, setQuiet } from "./logger";

const USAGE = "Usage: codeward analyze <path> [--json] [--output=PATH] [--patterns=PATH] [--concurrency=N] [--quiet]";

export async function main(argv: string[]): Promise<number> {
  const args = argv.slice(2);
  const command = args[0] || "help";

  function getOpt(name: string): string | undefined {
    const arg = args.find((a) => a.startsWith(`--${name}=`));
    return arg?.split("=").slice(1).join("=");
  }
  function hasFlag(name: string): boolean {
    return args.includes(`--${name}`);
  }

  if (command !== "analyze") {
    console.error(USAGE);
    return command === "help" ? 0 : 2;
  }
  const target = args.slice(1).find((a) => !a.startsWith("--"));
  if (!target) {
    console.error(USAGE);
    return 2;
  }

  const { config, problems } = loadEngineConfig();
  setQuiet(config.quiet || hasFlag("quiet"));
  const log = createLogger("cli");
  for (const p of problems) log.warn(`ignoring ${p}`);

  const concurrencyOpt = getOpt("concurrency");
  const concurrency = concurrencyOpt ? Number.parseInt(concurrencyOpt, 10) : config.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    console.error(`--concurrency must be a positive integer, got ${concurrencyOpt}`);
    return 2;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const report = await runAnalysis({
      rootPath: target,
      patternsPath: getOpt("patterns") ?? config.patternsPath,
      concurrency,
      lookbackLines: config.lookbackLines,
      timeoutOverheadSeconds: config.timeoutOverheadSeconds,
      maxFileBytes: config.maxFileBytes,
      wasmPath: config.pythonWasmPath,
      signal: controller.signal,
    });

    const rendered = hasFlag("json") ? formatJsonReport(report) : formatTextReport(report);
    process.stdout.write(rendered);
    const output = getOpt("output");
    if (output) {
      writeFileSync(resolve(output), rendered);
      log.info(`report written to ${output}`);
    }
    return exitCodeFor(report);
  } catch (e: unknown) {
    console.error(`[cli] analysis failed: ${e instanceof Error ? e.message : String(e)}`);
    return 2;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(process.argv).then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error(e);
      process.exit(2);
    },
  );
}
