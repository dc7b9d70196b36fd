import { contains } from "./strings.js";

/** True when `pattern` matches anywhere in the space-joined elements. */
export function inArray(array: readonly string[], pattern: string | RegExp) {
  return contains(array.join(" "), pattern);
}

export function arraySize(array: readonly unknown[]): number {
  return array.length;
}

export function arrayIsEmpty(array: readonly unknown[]): boolean {
  return arraySize(array) === 0;
}

export function reverseArray<T>(array: readonly T[]): T[] {
  return [...array].reverse();
}

export function addToArrayWithPrefix(
  array: string[],
  prefix: string,
  ...elements: string[]
): string[] {
  for (const element of elements) {
    if (element) {
      array.push(`${prefix}${element}`);
    }
  }
  return array;
}

export function addToArray(array: string[], ...elements: string[]) {
  return addToArrayWithPrefix(array, "", ...elements);
}

/** Each element is put at the head in turn, so they end up reversed. */
export function addToArrayHeadWithPrefix(
  array: string[],
  prefix: string,
  ...elements: string[]
): string[] {
  for (const element of elements) {
    if (element) {
      array.unshift(`${prefix}${element}`);
    }
  }
  return array;
}

export function addToArrayHead(array: string[], ...elements: string[]) {
  return addToArrayHeadWithPrefix(array, "", ...elements);
}
