import type { AnalysisRecord } from "@commitlens/core";
import type { ReportFormat, ReportOptions } from "./domain.js";
import { renderJsonReport, renderTextReport } from "./renderers.js";

export {
  NO_RESULTS_MESSAGE,
  UNKNOWN_DATE,
  shortCommitId,
  type AuthorSummary,
  type ChangeTotals,
  type JsonCommitEntry,
  type JsonReport,
  type JsonReportSummary,
  type ReportFormat,
  type ReportOptions,
  type TimeZoneMode,
} from "./domain.js";
export { accumulateRecords, computeTotals, summarizeByAuthor } from "./aggregation.js";
export { createJsonReport, renderJsonReport, renderTextReport } from "./renderers.js";
export { formatTimestamp } from "./timestamp.js";

export const formatReport = (
  records: readonly AnalysisRecord[],
  format: ReportFormat,
  options: ReportOptions,
): string => {
  if (format === "json") {
    return renderJsonReport(records, options);
  }

  return renderTextReport(records, options);
};
