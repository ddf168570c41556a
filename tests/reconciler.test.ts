import { describe, expect, it } from "vitest";
import { EmptyInventoryError } from "../src/errors.js";
import {
  coveragePercentage,
  formatCoverage,
  reconcile,
  reconcileByName,
  reconcileByTag
} from "../src/reconciler.js";
import { InventoryItem } from "../src/types.js";

const inventory: InventoryItem[] = [
  { name: "a", url: "https://github.com/acme/a" },
  { name: "b", url: "https://github.com/acme/b" },
  { name: "c", url: "https://github.com/acme/c" }
];

describe("reconcileByName", () => {
  it("splits the inventory by registered project name", () => {
    const result = reconcileByName(inventory, [{ id: "1", name: "b" }]);

    expect(result.matches).toEqual([{ name: "b", url: "https://github.com/acme/b" }]);
    expect(result.nonMatches).toEqual([
      { name: "a", url: "https://github.com/acme/a" },
      { name: "c", url: "https://github.com/acme/c" }
    ]);
  });

  it("ignores registry entries without an inventory counterpart", () => {
    const result = reconcileByName(inventory, [
      { id: "1", name: "z" },
      { id: "2", name: "c" },
      { id: "3", name: "c" }
    ]);

    expect(result.matches.map(item => item.name)).toEqual(["c"]);
    expect(result.nonMatches.map(item => item.name)).toEqual(["a", "b"]);
  });

  it("compares names case-sensitively", () => {
    const result = reconcileByName(inventory, [{ id: "1", name: "A" }]);

    expect(result.matches).toEqual([]);
  });
});

describe("reconcileByTag", () => {
  it("tests membership in the tagged names", () => {
    expect(reconcileByTag(["a", "b", "c"], ["b"])).toEqual({ matches: ["b"], nonMatches: ["a", "c"] });
  });

  it("treats an empty registry as no coverage", () => {
    expect(reconcileByTag(["a", "b"], [])).toEqual({ matches: [], nonMatches: ["a", "b"] });
  });
});

describe("reconcile", () => {
  it("keeps inventory order and partitions every entry exactly once", () => {
    const names = ["q", "w", "e", "r", "t", "y", "u", "i"];
    const registry = ["y", "e", "x", "q"];

    const { matches, nonMatches } = reconcile(names, registry, name => name);

    expect(matches).toEqual(["q", "e", "y"]);
    expect(nonMatches).toEqual(["w", "r", "t", "u", "i"]);
    expect(matches.length + nonMatches.length).toBe(names.length);
    expect(matches.filter(name => nonMatches.includes(name))).toEqual([]);
  });

  it("uses the supplied key extractor", () => {
    const items = [{ slug: "Alpha" }, { slug: "beta" }];

    const result = reconcile(items, ["alpha"], item => item.slug.toLowerCase());

    expect(result.matches).toEqual([{ slug: "Alpha" }]);
  });
});

describe("coveragePercentage", () => {
  it("computes the matched share as a percentage", () => {
    expect(coveragePercentage(2, 5)).toBe(40);
  });

  it("raises EmptyInventoryError for an empty inventory", () => {
    expect(() => coveragePercentage(0, 0)).toThrow(EmptyInventoryError);
  });

  it("formats the summary line with two decimals", () => {
    expect(formatCoverage(1, 3)).toBe("Coverage: 33.33% (1/3 repositories matched)");
  });
});
