/**
 * Tree-sitter WASM initialization.
 *
 * Loads the web-tree-sitter runtime + tree-sitter-python grammar.
 * Singleton: only initializes once, subsequent calls return cached parser.
 */

import { Parser, Language } from "web-tree-sitter";
import { readFileSync, existsSync, statSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { createRequire } from "module";

let cached: Promise<{ parser: Parser; language: Language }> | null = null;

function wasmCandidates(override?: string): string[] {
  const candidates: string[] = [];
  if (override) candidates.push(resolve(override));

  // Installed grammar package, wherever npm hoisted it
  const installed = grammarPackageDir();
  if (installed) candidates.push(resolve(installed, "tree-sitter-python.wasm"));

  candidates.push(
    // Source tree (development)
    resolve(dirname(fileURLToPath(import.meta.url)), "wasm", "tree-sitter-python.wasm"),
    // Workspace root node_modules
    resolve(process.cwd(), "node_modules", "tree-sitter-python", "tree-sitter-python.wasm"),
    // Engine package node_modules
    resolve(process.cwd(), "packages", "engine", "node_modules", "tree-sitter-python", "tree-sitter-python.wasm"),
  );
  return candidates;
}

function grammarPackageDir(): string | null {
  try {
    const require = createRequire(import.meta.url);
    return dirname(require.resolve("tree-sitter-python/package.json"));
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "MODULE_NOT_FOUND") return null;
    throw e;
  }
}

/**
 * Get (or create) a tree-sitter Parser with the Python language loaded.
 *
 * `wasmPath` overrides the grammar location (CODEWARD_PYTHON_WASM).
 */
export function getPythonParser(
  wasmPath?: string,
): Promise<{ parser: Parser; language: Language }> {
  if (!cached) {
    cached = loadParser(wasmPath).catch((e: unknown) => {
      // allow a later call to retry with a different path
      cached = null;
      throw e;
    });
  }
  return cached;
}

async function loadParser(
  wasmPath?: string,
): Promise<{ parser: Parser; language: Language }> {
  await Parser.init();

  const candidates = wasmCandidates(wasmPath);
  // valid WASM is >1KB
  const found = candidates.find((c) => existsSync(c) && statSync(c).size > 1000);
  const wasmBuf = found ? readFileSync(found) : null;

  if (!wasmBuf) {
    throw new Error(
      `[parser] tree-sitter-python.wasm not found. Checked:\n${candidates.join("\n")}`,
    );
  }

  const language = await Language.load(wasmBuf);
  const parser = new Parser();
  parser.setLanguage(language);
  return { parser, language };
}
