import type { ScenarioResult, UsageProfile } from "../../simulate/src/types.js";
import { costShare } from "./summary.js";

export const DEFAULT_REPORT_TITLE = "GCP DEPLOYMENT COST ANALYSIS";

export const RECOMMENDATIONS: readonly string[] = [
  "1. START WITH DEMO: Begin with demo environment ($65-85/month)",
  "2. STAGING FOR TESTING: Use staging for integration testing ($150-200/month)",
  "3. PRODUCTION SCALING: Scale to production when ready ($500-650/month)",
  "4. COST OPTIMIZATION:",
  "   - Use preemptible instances for development",
  "   - Enable auto-scaling to optimize costs",
  "   - Monitor usage and adjust resources accordingly",
  "   - Consider committed use discounts for production",
];

export type ReportOptions = {
  generatedAt: Date;
  title?: string;
};

const USAGE_KEYS: ReadonlyArray<keyof UsageProfile> = [
  "requests_per_month",
  "avg_cpu_time_ms",
  "avg_memory_mb",
  "storage_gb",
  "egress_gb",
];

/**
 * Render a plain-text cost report: summary table, one breakdown section per
 * scenario (with each line's share of the monthly total), usage statistics and
 * the recommendations block. Scenarios appear in the order given.
 */
export function renderCostReport(results: readonly ScenarioResult[], opts: ReportOptions): string {
  const out: string[] = [];

  out.push("=".repeat(80));
  out.push(opts.title ?? DEFAULT_REPORT_TITLE);
  out.push(`Generated: ${formatTimestamp(opts.generatedAt)}`);
  out.push("=".repeat(80));
  out.push("");

  // ---- Summary
  out.push("COST SUMMARY");
  out.push("-".repeat(50));
  out.push(`${"Scenario".padEnd(15)} ${"Monthly".padEnd(12)} ${"Annual".padEnd(12)} Description`);
  out.push("-".repeat(50));
  for (const r of results) {
    const monthly = `$${r.monthly_cost.toFixed(0)}`;
    const annual = `$${r.annual_cost.toFixed(0)}`;
    out.push(`${r.scenario.padEnd(15)} ${monthly.padEnd(12)} ${annual.padEnd(12)} ${r.description.slice(0, 30)}`);
  }
  out.push("");

  // ---- Per scenario
  for (const r of results) {
    out.push(`DETAILED BREAKDOWN: ${r.scenario.toUpperCase()}`);
    out.push("-".repeat(40));
    out.push(`Description: ${r.description}`);
    out.push(`Monthly Cost: $${r.monthly_cost.toFixed(2)}`);
    out.push(`Annual Cost: $${r.annual_cost.toFixed(2)}`);
    out.push("");

    out.push("Cost Components:");
    for (const line of r.cost_breakdown) {
      const amount = line.amount.toFixed(2).padStart(8);
      const pct = costShare(r, line).toFixed(1).padStart(5);
      out.push(`  ${line.component.padEnd(20)}: $${amount} (${pct}%)`);
    }
    out.push("");

    out.push("Usage Statistics:");
    for (const key of USAGE_KEYS) {
      out.push(`  ${key.padEnd(20)}: ${groupThousands(r.usage_stats[key]).padStart(12)}`);
    }
    out.push("");
    out.push("");
  }

  // ---- Recommendations
  out.push("RECOMMENDATIONS");
  out.push("-".repeat(40));
  out.push(...RECOMMENDATIONS);

  return out.join("\n");
}

export function formatTimestamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())} ` +
    `${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`
  );
}

function groupThousands(n: number): string {
  if (!Number.isInteger(n)) return String(n);
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}
