export {
  renderEnhancedReport,
  renderScatterReport,
  writeReport,
  type EnhancedReportOptions,
  type ScatterReportOptions,
} from "./render";
export type { ActivityPoint } from "./stats";
