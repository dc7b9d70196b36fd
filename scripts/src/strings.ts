export function join(separator: string, parts: readonly string[]): string {
  return parts.join(separator);
}

/** `pattern` is a regular expression, unanchored. */
export function contains(value: string, pattern: string | RegExp): boolean {
  return new RegExp(pattern).test(value);
}

/** Splits on any one of the characters in `separators`, dropping empties. */
export function splitOnAny(value: string, separators: string): string[] {
  const parts = Array.from(separators).reduce<string[]>(
    (acc, separator) => acc.flatMap((part) => part.split(separator)),
    [value]
  );
  return parts.filter((part) => part.length > 0);
}
