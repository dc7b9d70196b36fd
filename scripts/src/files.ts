import fs from "fs";
import path from "path";
import { Minimatch } from "minimatch";
import { NotFoundError, locationMessage } from "./errors.js";

export function fileName(file: string): string {
  return file.slice(file.lastIndexOf("/") + 1);
}

/** Directory part of `file`; a bare name is returned unchanged. */
export function filePath(file: string): string {
  const index = file.lastIndexOf("/");
  return index < 0 ? file : file.slice(0, index);
}

export function fileBase(file: string): string {
  const name = fileName(file);
  const index = name.lastIndexOf(".");
  return index < 0 ? name : name.slice(0, index);
}

/** Text after the last "." of the file name, or the whole name without one. */
export function fileExtension(file: string): string {
  const name = fileName(file);
  return name.slice(name.lastIndexOf(".") + 1);
}

export function formatPath(...parts: string[]): string {
  return parts.join("/");
}

export function isFile(file: string): boolean {
  try {
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export function fileContents(file: string): string | undefined {
  return isFile(file) ? fs.readFileSync(file, "utf-8") : undefined;
}

export function firstFileContents(files: string[]): string | undefined {
  for (const file of files) {
    const contents = fileContents(file);
    if (contents !== undefined) {
      return contents;
    }
  }
  return undefined;
}

/**
 * Walks up from `startDir` until a directory is either named `ancestor` or
 * directly contains a file called `ancestor`.
 */
export function findAncestorDir(
  ancestor: string,
  startDir: string = process.cwd()
): string {
  let current = path.resolve(startDir);

  for (;;) {
    if (
      path.basename(current) === ancestor ||
      isFile(path.join(current, ancestor))
    ) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  throw new NotFoundError(
    locationMessage(`No "${ancestor}" found above ${startDir}.`)
  );
}

export type GlobFlags = {
  /** Let `**` span directories (globstar). */
  recursive?: boolean;
  /** Match names starting with "." (dotglob). */
  dot?: boolean;
};

const GLOB_CHARS = /[*?[]/;

function walk(root: string, visit: (relative: string) => void, relative = "") {
  const dir = relative ? path.join(root, relative) : root;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const child = relative ? `${relative}/${entry.name}` : entry.name;
    visit(child);
    if (entry.isDirectory()) {
      walk(root, visit, child);
    }
  }
}

/**
 * Matches `pattern` against the tree under `rootDir` and returns the sorted
 * matching paths, joined onto `rootDir`.
 */
export function globFiles(
  rootDir: string,
  pattern: string,
  flags: GlobFlags = {}
): string[] {
  if (!isDirectory(rootDir)) {
    return [];
  }
  // without globstar, "**" matches a single path segment like "*"
  const matcher = new Minimatch(pattern, {
    dot: flags.dot ?? false,
    noglobstar: !(flags.recursive ?? false),
  });

  const matches: string[] = [];
  walk(rootDir, (relative) => {
    if (matcher.match(relative)) {
      matches.push(relative);
    }
  });

  return matches.sort().map((relative) => path.join(rootDir, relative));
}

/** Expands one shell-style pattern, relative to `cwd` unless absolute. */
export function expandPattern(
  pattern: string,
  flags: GlobFlags & { cwd?: string } = {}
): string[] {
  const cwd = flags.cwd ?? process.cwd();
  const segments = pattern.split("/");
  const firstGlob = segments.findIndex((segment) => GLOB_CHARS.test(segment));

  if (firstGlob < 0) {
    return [path.resolve(cwd, pattern)];
  }

  const base =
    segments.slice(0, firstGlob).join("/") ||
    (pattern.startsWith("/") ? "/" : ".");
  return globFiles(
    path.resolve(cwd, base),
    segments.slice(firstGlob).join("/"),
    flags
  );
}

/**
 * Searches every pattern anywhere under `rootDir`. A matching file yields
 * its directory, a matching directory yields itself.
 */
export function findDir(
  rootDir: string,
  patterns: string[],
  flags: GlobFlags = { recursive: true }
): string | undefined {
  for (const pattern of patterns) {
    for (const match of globFiles(rootDir, `**/${pattern}`, flags)) {
      if (isFile(match)) {
        return path.dirname(match);
      }
      if (isDirectory(match)) {
        return match;
      }
    }
  }
  return undefined;
}

export function findFile(
  patterns: string[],
  flags: GlobFlags & { cwd?: string } = { recursive: true }
): string | undefined {
  for (const pattern of patterns) {
    const match = expandPattern(pattern, flags).find((file) => isFile(file));
    if (match) {
      return match;
    }
  }
  return undefined;
}

const CLEANUP_FILES = [
  /^composite_/,
  /^STATUS\.txt$/,
  /^stripped_/,
  /^ciphertext/,
  /^temp_/,
];

/**
 * Removes the intermediate files pipeline steps leave behind, and any
 * `temp_*` directory with everything inside it. Returns what was removed.
 */
export function cleanup(rootDir = "."): string[] {
  const removed: string[] = [];

  const visit = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith("temp_")) {
          fs.rmSync(full, { recursive: true, force: true });
          removed.push(full);
        } else {
          visit(full);
        }
      } else if (CLEANUP_FILES.some((name) => name.test(entry.name))) {
        fs.rmSync(full, { force: true });
        removed.push(full);
      }
    }
  };
  visit(rootDir);

  return removed;
}
