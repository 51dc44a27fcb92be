/**
 * Audit/reporting module — thin facade over report/scan_report.
 */
export {
  toDisplayRow,
  formatCsv,
  formatSummary,
  renderTable,
  writeCsvToFile,
  NO_RESULTS_MESSAGE,
  type DisplayRow,
} from "../report/scan_report";
