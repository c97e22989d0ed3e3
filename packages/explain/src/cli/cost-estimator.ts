// packages/explain/src/cli/cost-estimator.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import { UnknownSkuError } from "../../../catalog/src/errors.js";
import { checkCatalogInvariants } from "../../../catalog/src/invariants.js";
import {
  createPriceTable,
  DEFAULT_CATALOG_PATH,
  listCategories,
  listSkus,
  price,
} from "../../../catalog/src/price-table.js";
import type { PriceTable } from "../../../catalog/src/schema.js";
import { PriceCatalogSchema } from "../../../catalog/src/validate.js";
import { aggregateScenario, compareScenarios } from "../../../simulate/src/aggregate.js";
import { estimateCustomServerless, parseCustomUsageText } from "../../../simulate/src/custom.js";
import { InvalidUsageError, UnknownScenarioError } from "../../../simulate/src/errors.js";
import { SCENARIO_NAMES } from "../../../simulate/src/scenarios.js";
import type { ScenarioName } from "../../../simulate/src/types.js";
import { buildScenarioExplainTree } from "../explain-scenario-tree.js";
import { renderCostReport } from "../report.js";
import { topCostComponents } from "../summary.js";

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
  now: () => Date;
};

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => console.error(text),
  now: () => new Date(),
};

// flags that take a value; everything else starting with "--" is a switch
const VALUE_FLAGS = new Set([
  "--catalog",
  "--title",
  "--requests",
  "--cpu-ms",
  "--memory-mb",
  "--min-instances",
]);

class CliFailure extends Error {}

function usage(): string {
  return `cost-estimator - GCP deployment cost estimates

Usage:
  cost-estimator --help
  cost-estimator version

  cost-estimator scenario <name> [--json] [--catalog <file.json>]
  cost-estimator compare [name...] [--json] [--catalog <file.json>]
  cost-estimator report [name...] [--title <text>] [--catalog <file.json>]
  cost-estimator explain <name> [--catalog <file.json>]
  cost-estimator custom --requests <n> --cpu-ms <n> --memory-mb <n> [--min-instances <n>] [--json]
  cost-estimator catalog [--json] [--catalog <file.json>]

Scenarios: ${SCENARIO_NAMES.join(", ")}

Examples:
  cost-estimator scenario production
  cost-estimator compare demo production --json
  cost-estimator report > cost-report.txt
  cost-estimator custom --requests 250000 --cpu-ms 120 --memory-mb 512
`;
}

// -------------------- catalog loading --------------------

function readJsonFile(filePath: string): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(abs, "utf8");
  } catch {
    throw new CliFailure(`[cost-estimator] file not found: ${filePath}`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new CliFailure(
      `[cost-estimator] "${filePath}" is not valid JSON.\n[cost-estimator] First 120 chars: ${raw.slice(0, 120)}`
    );
  }
}

function loadCatalog(args: string[], io: CliIo): PriceTable {
  const file = getFlagValue(args, "--catalog") ?? DEFAULT_CATALOG_PATH;

  const parsed = PriceCatalogSchema.safeParse(readJsonFile(file));
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `- /${i.path.map(String).join("/")}: ${i.message}`);
    throw new CliFailure(`[cost-estimator] catalog "${file}" is invalid:\n${lines.join("\n")}`);
  }

  const violations = checkCatalogInvariants(parsed.data);
  const missing = violations.filter((v) => v.code === "MISSING_SKU");
  for (const v of violations) {
    if (v.code !== "MISSING_SKU") io.err(`[cost-estimator] WARN ${v.code} ${v.path}: ${v.message}`);
  }
  if (missing.length) {
    throw new CliFailure(
      `[cost-estimator] catalog "${file}" is incomplete:\n` +
        missing.map((v) => `- ${v.code} ${v.path}: ${v.message}`).join("\n")
    );
  }

  return createPriceTable(parsed.data);
}

// -------------------- commands --------------------

// Case-insensitive lookup; an unknown name is reported as typed.
function scenarioArg(name: string): ScenarioName {
  const lower = name.toLowerCase();
  const kind = SCENARIO_NAMES.find((n) => n === lower);
  if (!kind) throw new UnknownScenarioError(name);
  return kind;
}

function cmdScenario(table: PriceTable, name: string, asJson: boolean, io: CliIo): void {
  const r = aggregateScenario(table, scenarioArg(name));
  if (asJson) {
    io.out(JSON.stringify(r, null, 2) + "\n");
    return;
  }

  const lines = [
    `${r.scenario.toUpperCase()} Environment:`,
    `Monthly Cost: $${r.monthly_cost.toFixed(2)}`,
    `Annual Cost: $${r.annual_cost.toFixed(2)}`,
    "",
    "Top cost components:",
    ...topCostComponents(r).map((l) => `  ${l.component}: $${l.amount.toFixed(2)}`),
  ];
  io.out(lines.join("\n") + "\n");
}

function cmdCompare(table: PriceTable, names: string[], asJson: boolean, io: CliIo): void {
  const results = compareScenarios(table, names.map(scenarioArg));
  if (asJson) {
    io.out(JSON.stringify(Object.fromEntries(results), null, 2) + "\n");
    return;
  }

  const lines = [`${"Scenario".padEnd(12)} ${"Monthly".padEnd(10)} ${"Annual".padEnd(12)}`, "-".repeat(35)];
  for (const [scenario, r] of results) {
    const monthly = `$${r.monthly_cost.toFixed(0)}`;
    const annual = `$${r.annual_cost.toFixed(0)}`;
    lines.push(`${scenario.padEnd(12)} ${monthly.padEnd(10)} ${annual.padEnd(12)}`);
  }
  io.out(lines.join("\n") + "\n");
}

function cmdReport(table: PriceTable, names: string[], title: string | null, io: CliIo): void {
  const results = compareScenarios(table, names.map(scenarioArg));
  const report = renderCostReport([...results.values()], {
    generatedAt: io.now(),
    title: title ?? undefined,
  });
  io.out(report + "\n");
}

function cmdExplain(table: PriceTable, name: string, io: CliIo): void {
  io.out(JSON.stringify(buildScenarioExplainTree(table, scenarioArg(name)), null, 2) + "\n");
}

function cmdCustom(table: PriceTable, args: string[], asJson: boolean, io: CliIo): void {
  const usage = parseCustomUsageText({
    requests_per_month: getRawFlag(args, "--requests"),
    avg_cpu_time_ms: getRawFlag(args, "--cpu-ms"),
    avg_memory_mb: getRawFlag(args, "--memory-mb"),
    min_instances: getRawFlag(args, "--min-instances"),
  });
  const est = estimateCustomServerless(table, usage);

  if (asJson) {
    io.out(JSON.stringify(est, null, 2) + "\n");
    return;
  }
  io.out(`Estimated serverless cost: $${est.monthly_cost.toFixed(2)}/month\n`);
}

function cmdCatalog(table: PriceTable, asJson: boolean, io: CliIo): void {
  if (asJson) {
    io.out(JSON.stringify(table, null, 2) + "\n");
    return;
  }

  const lines = [`${table.catalog_id} (${table.currency}${table.region ? `, ${table.region}` : ""})`];
  for (const category of listCategories()) {
    lines.push(`${category}:`);
    for (const sku of listSkus(table, category)) {
      lines.push(`  ${sku.padEnd(20)} ${price(table, category, sku)}`);
    }
  }
  io.out(lines.join("\n") + "\n");
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

// undefined when the flag is absent, "" when it is present without a value
function getRawFlag(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  if (i < 0) return undefined;
  const v = args[i + 1];
  if (v === undefined || v.startsWith("--")) return "";
  return v;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith("--")) {
      if (VALUE_FLAGS.has(a) && !args[i + 1]?.startsWith("--")) i++;
      continue;
    }
    out.push(a);
  }
  return out;
}

/**
 * Run the CLI and return the process exit code.
 * Engine errors are reported as `CODE: message` on stderr.
 */
export function run(argv: string[] = process.argv, io: CliIo = defaultIo): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const [cmd, ...operands] = positionals(args);
  const asJson = args.includes("--json");

  if (cmd === "version") {
    io.out("cost-estimator cli v1\n");
    return 0;
  }

  try {
    switch (cmd) {
      case "scenario": {
        const name = operands[0];
        if (!name) {
          io.err("Missing scenario name.\n");
          io.err(usage());
          return 1;
        }
        cmdScenario(loadCatalog(args, io), name, asJson, io);
        return 0;
      }

      case "compare":
        cmdCompare(loadCatalog(args, io), operands.length ? operands : [...SCENARIO_NAMES], asJson, io);
        return 0;

      case "report":
        cmdReport(
          loadCatalog(args, io),
          operands.length ? operands : [...SCENARIO_NAMES],
          getFlagValue(args, "--title"),
          io
        );
        return 0;

      case "explain": {
        const name = operands[0];
        if (!name) {
          io.err("Missing scenario name.\n");
          io.err(usage());
          return 1;
        }
        cmdExplain(loadCatalog(args, io), name, io);
        return 0;
      }

      case "custom":
        cmdCustom(loadCatalog(args, io), args, asJson, io);
        return 0;

      case "catalog":
        cmdCatalog(loadCatalog(args, io), asJson, io);
        return 0;

      default:
        io.err(`[cost-estimator] Unknown command: ${String(cmd)}\n`);
        io.err(usage());
        return 1;
    }
  } catch (e) {
    if (e instanceof CliFailure) {
      io.err(e.message);
      return 1;
    }
    if (
      e instanceof UnknownScenarioError ||
      e instanceof UnknownSkuError ||
      e instanceof InvalidUsageError
    ) {
      io.err(`[cost-estimator] ${e.code}: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
