import type { PriceCategory } from "../../catalog/src/schema.js";
import type { CostComponent, ScenarioName } from "../../simulate/src/types.js";

export type ExplainTree = {
  scenario: ScenarioName;

  // every price lookup the scenario made, first use first
  inputs: Array<{
    category: PriceCategory;
    sku: string;
    unit_price: number;
  }>;

  computations: Array<{
    name: CostComponent;
    formula: string;
    substituted: string;
    value: number;
  }>;

  result: {
    monthly_cost: number;
    annual_cost: number;
  };

  notes: string[];
};
