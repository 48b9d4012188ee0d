export {
  REPORT_SCHEMA_VERSION,
  type ContributionReport,
  type ReportSchemaVersion,
} from "@authorscope/core";

export type ReportFormat = "text" | "json";

export const REPORT_FORMATS: readonly ReportFormat[] = ["text", "json"];

export const formatCountRecord = (counts: Readonly<Record<string, number>>): string =>
  Object.entries(counts)
    .map(([key, count]) => `${key}=${count}`)
    .join(", ") || "none";
