import { describe, it, expect } from "vitest";
import { loadPriceTable } from "../../catalog/src/price-table.js";
import { UnknownSkuError } from "../../catalog/src/errors.js";
import { computeNodeCost } from "../src/nodes.js";

describe("computeNodeCost", () => {
  const table = loadPriceTable();

  it("multiplies the node price by the node count", () => {
    expect(computeNodeCost(table, "e2-medium", 2, false)).toBeCloseTo(97.1, 10);
    expect(computeNodeCost(table, "e2-standard-4", 6, false)).toBeCloseTo(1165.32, 10);
  });

  it("bills a single preemptible e2-small at 20%", () => {
    expect(computeNodeCost(table, "e2-small", 1, true)).toBe(24.27 * 1 * 0.2);
    expect(computeNodeCost(table, "e2-small", 1, true)).toBeCloseTo(4.854, 10);
  });

  it("preemptible cost is 0.2x on-demand for the same machine and count", () => {
    for (const machine of ["e2-small", "e2-medium", "e2-standard-2", "e2-standard-4"]) {
      for (const count of [1, 3, 7]) {
        const onDemand = computeNodeCost(table, machine, count, false);
        expect(computeNodeCost(table, machine, count, true)).toBeCloseTo(onDemand * 0.2, 10);
      }
    }
  });

  it("is zero for zero nodes", () => {
    expect(computeNodeCost(table, "e2-standard-2", 0, false)).toBe(0);
  });

  it("fails on an unknown machine type", () => {
    expect(() => computeNodeCost(table, "e2-huge", 1, false)).toThrow(UnknownSkuError);
  });
});
