import { describe, it, expect } from "vitest";
import { loadPriceTable } from "../../catalog/src/price-table.js";
import { aggregateScenario, compareScenarios } from "../../simulate/src/aggregate.js";
import { formatTimestamp, renderCostReport } from "../src/report.js";

describe("renderCostReport", () => {
  const table = loadPriceTable();
  const generatedAt = new Date(2026, 0, 5, 9, 3, 7);

  it("renders summary, breakdowns, usage and recommendations", () => {
    const results = compareScenarios(table, ["demo", "enterprise"]);
    const text = renderCostReport([...results.values()], { generatedAt });

    expect(text.split("\n")).toEqual([
      "================================================================================",
      "GCP DEPLOYMENT COST ANALYSIS",
      "Generated: 2026-01-05 09:03:07",
      "================================================================================",
      "",
      "COST SUMMARY",
      "--------------------------------------------------",
      "Scenario        Monthly      Annual       Description",
      "--------------------------------------------------",
      "demo            $56          $673         Demo environment for demonstra",
      "enterprise      $2485        $29817       Enterprise multi-region deploy",
      "",
      "DETAILED BREAKDOWN: DEMO",
      "----------------------------------------",
      "Description: Demo environment for demonstrations",
      "Monthly Cost: $56.09",
      "Annual Cost: $673.03",
      "",
      "Cost Components:",
      "  compute_nodes       : $    4.85 (  8.7%)",
      "  managed_db          : $   18.47 ( 32.9%)",
      "  serverless_web      : $    0.05 (  0.1%)",
      "  serverless_worker   : $    0.01 (  0.0%)",
      "  storage             : $    8.50 ( 15.2%)",
      "  load_balancer       : $   18.00 ( 32.1%)",
      "  egress              : $    1.20 (  2.1%)",
      "  monitoring          : $    5.00 (  8.9%)",
      "",
      "Usage Statistics:",
      "  requests_per_month  :       10,000",
      "  avg_cpu_time_ms     :          200",
      "  avg_memory_mb       :          256",
      "  storage_gb          :           50",
      "  egress_gb           :           10",
      "",
      "",
      "DETAILED BREAKDOWN: ENTERPRISE",
      "----------------------------------------",
      "Description: Enterprise multi-region deployment",
      "Monthly Cost: $2484.73",
      "Annual Cost: $29816.76",
      "",
      "Cost Components:",
      "  compute_nodes       : $ 1165.32 ( 46.9%)",
      "  managed_db          : $  795.36 ( 32.0%)",
      "  serverless_web      : $   22.15 (  0.9%)",
      "  serverless_worker   : $   13.90 (  0.6%)",
      "  storage             : $   85.00 (  3.4%)",
      "  load_balancer       : $   18.00 (  0.7%)",
      "  egress              : $   60.00 (  2.4%)",
      "  monitoring          : $   25.00 (  1.0%)",
      "  security            : $  100.00 (  4.0%)",
      "  support             : $  200.00 (  8.0%)",
      "",
      "Usage Statistics:",
      "  requests_per_month  :    1,000,000",
      "  avg_cpu_time_ms     :          750",
      "  avg_memory_mb       :        2,048",
      "  storage_gb          :          500",
      "  egress_gb           :          500",
      "",
      "",
      "RECOMMENDATIONS",
      "----------------------------------------",
      "1. START WITH DEMO: Begin with demo environment ($65-85/month)",
      "2. STAGING FOR TESTING: Use staging for integration testing ($150-200/month)",
      "3. PRODUCTION SCALING: Scale to production when ready ($500-650/month)",
      "4. COST OPTIMIZATION:",
      "   - Use preemptible instances for development",
      "   - Enable auto-scaling to optimize costs",
      "   - Monitor usage and adjust resources accordingly",
      "   - Consider committed use discounts for production",
    ]);
  });

  it("uses a custom title", () => {
    const text = renderCostReport([aggregateScenario(table, "staging")], {
      generatedAt,
      title: "ACME PLATFORM - GCP COST ANALYSIS",
    });
    expect(text.split("\n")[1]).toBe("ACME PLATFORM - GCP COST ANALYSIS");
  });

  it("renders only the fixed blocks for no scenarios", () => {
    const lines = renderCostReport([], { generatedAt }).split("\n");
    expect(lines.slice(5, 10)).toEqual([
      "COST SUMMARY",
      "--------------------------------------------------",
      "Scenario        Monthly      Annual       Description",
      "--------------------------------------------------",
      "",
    ]);
    expect(lines[10]).toBe("RECOMMENDATIONS");
  });
});

describe("formatTimestamp", () => {
  it("zero-pads every field", () => {
    expect(formatTimestamp(new Date(2026, 10, 9, 7, 5, 3))).toBe("2026-11-09 07:05:03");
  });
});
