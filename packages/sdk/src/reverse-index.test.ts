import { describe, it, expect } from "vitest";
import { buildReverseIndices } from "./reverse-index.js";
import { InMemoryEngine } from "./memory-engine.js";

describe("buildReverseIndices", () => {
  const engine = new InMemoryEngine({
    recipes: {
      "a.bb": { pn: "a" },
      "b.bb": { pn: "b" },
    },
    rproviders: {
      "virtual-x": ["a.bb", "b.bb"],
      "virtual-y": ["a.bb"],
    },
    packages: {
      "a-dev": ["a.bb"],
      a: ["a.bb"],
      shared: ["a.bb", "b.bb"],
    },
    packagesDynamic: {
      "^a-plugin-.*": ["a.bb"],
    },
  });

  it("should invert package maps in source key order", () => {
    const { fnPackages } = buildReverseIndices(engine);
    expect(fnPackages.get("a.bb")).toEqual(["a-dev", "a", "shared"]);
    expect(fnPackages.get("b.bb")).toEqual(["shared"]);
  });

  it("should invert runtime provides into sets", () => {
    const { fnRprovides } = buildReverseIndices(engine);
    expect([...(fnRprovides.get("a.bb") ?? [])]).toEqual(["virtual-x", "virtual-y"]);
    expect([...(fnRprovides.get("b.bb") ?? [])]).toEqual(["virtual-x"]);
  });

  it("should invert dynamic patterns", () => {
    const { fnPackagesDynamic } = buildReverseIndices(engine);
    expect(fnPackagesDynamic.get("a.bb")).toEqual(["^a-plugin-.*"]);
    expect(fnPackagesDynamic.has("b.bb")).toBe(false);
  });
});
