import type { ContributionReport, ReportFormat } from "./domain.js";
import { renderTextReport } from "./renderers.js";

export {
  REPORT_FORMATS,
  REPORT_SCHEMA_VERSION,
  type ContributionReport,
  type ReportFormat,
} from "./domain.js";
export { createReport, type CreateReportInput } from "./report.js";
export { parseReport } from "./parse.js";
export { renderTextReport } from "./renderers.js";
export { writeReportFile } from "./persistence.js";

export const formatReport = (report: ContributionReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  return renderTextReport(report);
};
