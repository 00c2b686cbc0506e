export { compareDatabaseFiles, type CompareRequest, type CompareResult } from "./compare.js";
export { resolveConfig, type DiffConfig, type NodeOrder } from "./config.js";
export { loadDatabase, parseSnapshot } from "./dbc/loader.js";
export { parseDbc } from "./dbc/dbc-parser.js";
export {
  createDatabase,
  createMessageRecord,
  formatFrameId,
  messageKey,
  type CanDatabase,
  type MessageRecord,
} from "./dbc/types.js";
export { diffDatabases, summarizeChanges, type DiffOptions } from "./diff/differ.js";
export * from "./diff/types.js";
export { highlightNodes, splitNodeList, type NodePart } from "./report/highlight.js";
export { buildReportRows, cellText, REPORT_COLUMNS, type ReportCell, type ReportRow } from "./report/rows.js";
export { buildWorkbook, writeReport } from "./report/xlsx-writer.js";
export * from "./errors.js";
