import { describe, it, expect } from "vitest";
import { parseScenarioName, scenarioDefinition, SCENARIO_NAMES } from "../src/scenarios.js";
import { UnknownScenarioError } from "../src/errors.js";

describe("parseScenarioName", () => {
  it("accepts the four scenario names", () => {
    for (const n of ["demo", "staging", "production", "enterprise"]) {
      expect(parseScenarioName(n)).toBe(n);
    }
  });

  it("is case-sensitive", () => {
    expect(() => parseScenarioName("Demo")).toThrow(UnknownScenarioError);
    expect(() => parseScenarioName("PRODUCTION")).toThrow(UnknownScenarioError);
  });

  it("carries the rejected identifier", () => {
    try {
      parseScenarioName("qa");
      expect.unreachable("parseScenarioName should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownScenarioError);
      if (!(e instanceof UnknownScenarioError)) return;
      expect(e.code).toBe("UNKNOWN_SCENARIO");
      expect(e.scenario).toBe("qa");
      expect(e.message).toBe("Unknown scenario: qa");
    }
  });

  it("rejects the empty string", () => {
    expect(() => parseScenarioName("")).toThrow(UnknownScenarioError);
  });
});

describe("scenarioDefinition", () => {
  it("tags each definition with its own name", () => {
    for (const n of SCENARIO_NAMES) {
      expect(scenarioDefinition(n).kind).toBe(n);
    }
  });

  it("matches the fixed per-scenario policy", () => {
    const rows = SCENARIO_NAMES.map((n) => {
      const c = scenarioDefinition(n).components;
      return [
        n,
        `${c.compute.machine_type}x${c.compute.node_count}`,
        c.compute.preemptible,
        c.database.machine_type,
        c.database.high_availability,
        c.database.storage_gb,
        c.database.backup_gb,
        c.monitoring,
        c.serverless.web_min_instances,
        c.serverless.worker_min_instances,
      ];
    });

    expect(rows).toEqual([
      ["demo", "e2-smallx1", true, "db-f1-micro", false, 20, 5, "basic", 0, 0],
      ["staging", "e2-mediumx2", false, "db-n1-standard-1", false, 50, 15, "basic", 0, 0],
      ["production", "e2-standard-2x3", false, "db-n1-standard-2", true, 100, 50, "premium", 1, 1],
      ["enterprise", "e2-standard-4x6", false, "db-n1-standard-4", true, 200, 100, "premium", 0, 1],
    ]);
  });

  it("matches the fixed usage profiles", () => {
    expect(SCENARIO_NAMES.map((n) => scenarioDefinition(n).usage)).toEqual([
      { requests_per_month: 10_000, avg_cpu_time_ms: 200, avg_memory_mb: 256, storage_gb: 50, egress_gb: 10 },
      { requests_per_month: 50_000, avg_cpu_time_ms: 300, avg_memory_mb: 512, storage_gb: 100, egress_gb: 25 },
      { requests_per_month: 200_000, avg_cpu_time_ms: 500, avg_memory_mb: 1024, storage_gb: 200, egress_gb: 100 },
      { requests_per_month: 1_000_000, avg_cpu_time_ms: 750, avg_memory_mb: 2048, storage_gb: 500, egress_gb: 500 },
    ]);
  });

  it("gives surcharges to enterprise only", () => {
    expect(scenarioDefinition("enterprise").components.surcharges.map((s) => s.sku)).toEqual([
      "security_tooling",
      "premium_support",
    ]);
    expect(scenarioDefinition("production").components.surcharges).toEqual([]);
  });
});
