import { readFileSync, readdirSync, statSync, existsSync, type Dirent } from "fs";
import { join, relative, sep, extname, basename } from "path";
import { parse as parseYAML } from "yaml";
import type { AnalysisNote, ComponentSource, SourceFile } from "../types";
import { contractTimeout } from "../graphs/contract-compat";

// ─── File Discovery ─────────────────────────────────────────

const SKIP_DIRS = new Set([
  "__pycache__",
  ".git",
  "node_modules",
  "venv",
  ".venv",
  "env",
  ".env",
  ".tox",
  ".mypy_cache",
  ".pytest_cache",
  "site-packages",
  "build",
  "dist",
]);

export interface DiscoveredFile {
  /** Absolute path. */
  path: string;
  /** Path relative to the analysis root, forward slashes. */
  rel: string;
}

export interface Discovery {
  files: DiscoveredFile[];
  notes: AnalysisNote[];
}

export function toRelative(root: string, full: string): string {
  return relative(root, full).split(sep).join("/");
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Python sources under `root`, sorted by relative path. Test modules
 * (`test_*.py`) are left out; files above `maxFileBytes` are reported.
 */
export function findPythonFiles(root: string, maxFileBytes: number): Discovery {
  const files: DiscoveredFile[] = [];
  const notes: AnalysisNote[] = [];

  function visit(dir: string): void {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (e: unknown) {
      notes.push({ kind: "io_error", file: toRelative(root, dir) || ".", message: errorMessage(e) });
      return;
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) visit(full);
        continue;
      }
      if (!entry.isFile() || !entry.name.endsWith(".py") || entry.name.startsWith("test_")) continue;

      const rel = toRelative(root, full);
      try {
        const size = statSync(full).size;
        if (size > maxFileBytes) {
          notes.push({ kind: "io_error", file: rel, message: `file is ${size} bytes, above the ${maxFileBytes} byte limit` });
          continue;
        }
      } catch (e: unknown) {
        notes.push({ kind: "io_error", file: rel, message: errorMessage(e) });
        continue;
      }
      files.push({ path: full, rel });
    }
  }

  visit(root);
  files.sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0));
  return { files, notes };
}

// ─── Components & Contracts ─────────────────────────────────

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

const CONTRACT_EXTENSIONS = [".yaml", ".yml", ".json"];

function loadContracts(root: string, notes: AnalysisNote[]): Map<string, Record<string, unknown>> {
  const contracts = new Map<string, Record<string, unknown>>();
  const dir = join(root, "contracts");
  if (!existsSync(dir)) return contracts;

  let entries: string[];
  try {
    entries = readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isFile() && CONTRACT_EXTENSIONS.includes(extname(e.name)))
      .map((e) => e.name)
      .sort();
  } catch (e: unknown) {
    notes.push({ kind: "io_error", file: "contracts", message: errorMessage(e) });
    return contracts;
  }
  for (const name of entries) {
    const full = join(dir, name);
    try {
      const raw = readFileSync(full, "utf-8");
      const doc: unknown = extname(name) === ".json" ? JSON.parse(raw) : parseYAML(raw);
      if (!isRecord(doc)) {
        notes.push({ kind: "config_error", file: toRelative(root, full), message: "contract is not a mapping" });
        continue;
      }
      const component = basename(name, extname(name));
      if (!contracts.has(component)) contracts.set(component, doc);
    } catch (e: unknown) {
      notes.push({ kind: "config_error", file: toRelative(root, full), message: errorMessage(e) });
    }
  }
  return contracts;
}

/**
 * One ComponentSource per directory under `components/`, with its Python
 * files and the matching `contracts/<name>.yaml` when present.
 */
export function loadComponents(root: string, maxFileBytes: number): { components: ComponentSource[]; notes: AnalysisNote[] } {
  const notes: AnalysisNote[] = [];
  const dir = join(root, "components");
  if (!existsSync(dir)) return { components: [], notes };

  const contracts = loadContracts(root, notes);
  let names: string[];
  try {
    names = readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isDirectory() && !SKIP_DIRS.has(e.name))
      .map((e) => e.name)
      .sort();
  } catch (e: unknown) {
    notes.push({ kind: "io_error", file: "components", message: errorMessage(e) });
    return { components: [], notes };
  }

  const components: ComponentSource[] = [];
  for (const name of names) {
    const found = findPythonFiles(join(dir, name), maxFileBytes);
    const files: SourceFile[] = [];
    for (const f of found.files) {
      try {
        files.push({ path: toRelative(root, f.path), content: readFileSync(f.path, "utf-8") });
      } catch (e: unknown) {
        notes.push({ kind: "io_error", file: toRelative(root, f.path), message: errorMessage(e) });
      }
    }
    const contract = contracts.get(name);
    components.push({
      name,
      files,
      timeout: contract ? contractTimeout(contract) : undefined,
      contract,
    });
  }
  return { components, notes };
}
