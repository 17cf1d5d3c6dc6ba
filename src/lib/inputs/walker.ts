import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import ignore, { type Ignore } from "ignore";
import { DEFAULT_IGNORE_PATTERNS } from "./ignore-patterns";

export interface WalkOptions {
  ignoreFiles?: string[];
  additionalPatterns?: string[];
}

interface IgnoreScope {
  filter: Ignore;
  dir: string; // directory the patterns are relative to
}

async function loadIgnoreFilter(
  dir: string,
  ignoreFiles: string[],
): Promise<Ignore | null> {
  let filter: Ignore | null = null;

  for (const fileName of ignoreFiles) {
    let content: string;
    try {
      content = await fs.readFile(path.join(dir, fileName), "utf-8");
    } catch {
      continue; // no ignore file here
    }
    filter = (filter ?? ignore()).add(content);
  }

  return filter;
}

function isIgnored(absPath: string, isDir: boolean, scopes: IgnoreScope[]): boolean {
  return scopes.some((scope) => {
    const rel = path.relative(scope.dir, absPath);
    if (!rel) return false;
    const candidate = rel.split(path.sep).join("/");
    return scope.filter.ignores(isDir ? `${candidate}/` : candidate);
  });
}

/**
 * Yield every file under `rootDir` (absolute paths), honouring .gitignore and
 * .docmdignore files found along the way. Patterns from a parent directory
 * keep applying inside its children.
 */
export async function* walk(
  rootDir: string,
  options: WalkOptions = {},
): AsyncGenerator<string> {
  const root = path.resolve(rootDir);
  const ignoreFiles = options.ignoreFiles ?? [".gitignore", ".docmdignore"];
  const base = ignore().add(DEFAULT_IGNORE_PATTERNS);
  if (options.additionalPatterns) {
    base.add(options.additionalPatterns);
  }

  const scopes: IgnoreScope[] = [{ filter: base, dir: root }];
  const rootFilter = await loadIgnoreFilter(root, ignoreFiles);
  if (rootFilter) {
    scopes.push({ filter: rootFilter, dir: root });
  }

  yield* walkDir(root, scopes, ignoreFiles);
}

async function* walkDir(
  currentDir: string,
  scopes: IgnoreScope[],
  ignoreFiles: string[],
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(currentDir, { withFileTypes: true });
  } catch {
    return; // unreadable directory
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const absPath = path.join(currentDir, entry.name);
    const isDir = entry.isDirectory();
    if (isIgnored(absPath, isDir, scopes)) continue;

    if (isDir) {
      const childFilter = await loadIgnoreFilter(absPath, ignoreFiles);
      if (childFilter) {
        scopes.push({ filter: childFilter, dir: absPath });
        yield* walkDir(absPath, scopes, ignoreFiles);
        scopes.pop();
      } else {
        yield* walkDir(absPath, scopes, ignoreFiles);
      }
    } else if (entry.isFile()) {
      yield absPath;
    }
  }
}
