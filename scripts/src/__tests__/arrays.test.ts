import { describe, it, expect } from "vitest";
import {
  addToArray,
  addToArrayHead,
  addToArrayHeadWithPrefix,
  addToArrayWithPrefix,
  arrayIsEmpty,
  arraySize,
  inArray,
  reverseArray,
} from "../arrays.js";
import { contains, join, splitOnAny } from "../strings.js";

describe("strings", () => {
  it("should join parts with a separator", () => {
    expect(join(",", ["docker", "lambda"])).toBe("docker,lambda");
    expect(join(",", [])).toBe("");
  });

  it("should match a regular expression anywhere", () => {
    expect(contains("build-abc123", "[0-9]+$")).toBe(true);
    expect(contains("build-abc", "^abc")).toBe(false);
  });

  it("should split on any separator character and drop empty parts", () => {
    expect(splitOnAny("docker,lambda;;spa", ",;")).toEqual(["docker", "lambda", "spa"]);
    expect(splitOnAny("", ",")).toEqual([]);
  });
});

describe("arrays", () => {
  it("should search the joined elements", () => {
    expect(inArray(["docker", "lambda"], "^docker lambda$")).toBe(true);
    expect(inArray(["docker"], "spa")).toBe(false);
  });

  it("should report size and emptiness", () => {
    expect(arraySize(["a", "b"])).toBe(2);
    expect(arrayIsEmpty([])).toBe(true);
    expect(arrayIsEmpty(["a"])).toBe(false);
  });

  it("should reverse without touching the input", () => {
    const input = ["a", "b", "c"];

    expect(reverseArray(input)).toEqual(["c", "b", "a"]);
    expect(input).toEqual(["a", "b", "c"]);
  });

  it("should append prefixed non-empty elements", () => {
    const args = ["--region", "eu-west-1"];

    addToArrayWithPrefix(args, "--", "delete", "", "dryrun");
    addToArray(args, "", "extra");

    expect(args).toEqual(["--region", "eu-west-1", "--delete", "--dryrun", "extra"]);
  });

  it("should prepend each element in turn", () => {
    expect(addToArrayHead(["x"], "a", "b")).toEqual(["b", "a", "x"]);
    expect(addToArrayHeadWithPrefix(["x"], "p-", "a", "")).toEqual(["p-a", "x"]);
  });
});
