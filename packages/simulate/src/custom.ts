import { z } from "zod";

import type { PriceTable } from "../../catalog/src/schema.js";
import { computeServerlessCostParts, type ServerlessCostParts } from "../../compute/src/serverless.js";
import { InvalidUsageError } from "./errors.js";

const Count = z.number().int("Must be a whole number").nonnegative("Must not be negative");

export const CustomUsageSchema = z.object({
  requests_per_month: Count,
  avg_cpu_time_ms: Count,
  avg_memory_mb: Count,
  min_instances: Count.default(0),
});

// Raw text as typed on a command line or in a form: digits only, so "1e3",
// "0x10", "5.0" and blank input are rejected rather than coerced.
const CountText = z
  .string()
  .trim()
  .regex(/^\d+$/, "Must be a whole number")
  .transform(Number);

export const CustomUsageTextSchema = z.object({
  requests_per_month: CountText,
  avg_cpu_time_ms: CountText,
  avg_memory_mb: CountText,
  min_instances: CountText.default(0),
});

export type CustomUsage = z.infer<typeof CustomUsageSchema>;

export type CustomEstimate = {
  usage: CustomUsage;
  parts: ServerlessCostParts;
  monthly_cost: number;
};

function invalidUsage(error: z.ZodError): InvalidUsageError {
  return new InvalidUsageError(
    error.issues.map((i) => ({
      field: i.path.map(String).join(".") || "(root)",
      message: i.message,
    }))
  );
}

export function parseCustomUsage(input: unknown): CustomUsage {
  const r = CustomUsageSchema.safeParse(input);
  if (!r.success) throw invalidUsage(r.error);
  return r.data;
}

/**
 * Same as `parseCustomUsage`, for string fields. A field that is present but
 * empty is invalid; only an absent `min_instances` falls back to 0.
 */
export function parseCustomUsageText(input: unknown): CustomUsage {
  const r = CustomUsageTextSchema.safeParse(input);
  if (!r.success) throw invalidUsage(r.error);
  return r.data;
}

/**
 * Ad-hoc serverless estimate from caller-supplied usage.
 * Input is validated here; malformed numbers never reach the cost functions.
 */
export function estimateCustomServerless(table: PriceTable, input: unknown): CustomEstimate {
  const usage = parseCustomUsage(input);
  const parts = computeServerlessCostParts(
    table,
    usage.requests_per_month,
    usage.avg_cpu_time_ms,
    usage.avg_memory_mb,
    usage.min_instances
  );
  return { usage, parts, monthly_cost: parts.total };
}
