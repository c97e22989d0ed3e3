export { buildScenarioExplainTree } from "./explain-scenario-tree.js";
export { topCostComponents, costShare } from "./summary.js";
export {
  renderCostReport,
  formatTimestamp,
  DEFAULT_REPORT_TITLE,
  RECOMMENDATIONS,
} from "./report.js";
export type { ReportOptions } from "./report.js";

export type { ExplainTree } from "./tree.js";
