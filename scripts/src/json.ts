import fs from "fs";

export function readJSON(file: string): unknown {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function lookup(document: unknown, pattern: string): unknown {
  const keys = pattern.split(".").filter((key) => key.length > 0);
  let current = document;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Returns the first non-null value among dot paths such as
 * `.Product.Region`. Strings come back as-is, anything else as JSON text.
 */
export function getJSONValue(
  file: string,
  ...patterns: string[]
): string | undefined {
  const document = readJSON(file);
  for (const pattern of patterns) {
    const value = lookup(document, pattern);
    if (value === null || value === undefined) {
      continue;
    }
    const text = typeof value === "string" ? value : JSON.stringify(value);
    if (text) {
      return text;
    }
  }
  return undefined;
}

/** Nests the document under `ancestors`, the first being outermost. */
export function addJSONAncestorObjects(
  file: string,
  ...ancestors: string[]
): unknown {
  return ancestors.reduceRight<unknown>(
    (inner, ancestor) => ({ [ancestor]: inner }),
    readJSON(file)
  );
}
