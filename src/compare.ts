/**
 * End-to-end comparison: load both databases, diff them and write the
 * spreadsheet report. Steps run strictly one after another and any failure
 * aborts the run; no partial report is kept in memory or retried.
 */

import type { DiffConfig } from "./config.js";
import { loadDatabase } from "./dbc/loader.js";
import { diffDatabases, summarizeChanges } from "./diff/differ.js";
import type { ChangeRecord, ChangeSummary } from "./diff/types.js";
import { buildReportRows } from "./report/rows.js";
import { writeReport } from "./report/xlsx-writer.js";
import { logApplicationEvent } from "./util/logging.js";

export interface CompareRequest {
  oldPath: string;
  newPath: string;
  outputPath: string;
}

export interface CompareResult {
  outputPath: string;
  changes: ChangeRecord[];
  summary: ChangeSummary;
}

export async function compareDatabaseFiles(
  request: CompareRequest,
  config: Pick<DiffConfig, "nodeOrder" | "sheetName" | "columnWidth">
): Promise<CompareResult> {
  const oldDb = await loadDatabase(request.oldPath);
  const newDb = await loadDatabase(request.newPath);

  const changes = diffDatabases(oldDb, newDb, { nodeOrder: config.nodeOrder });
  const summary = summarizeChanges(changes);
  logApplicationEvent("differ", "diffed", {
    nodeOrder: config.nodeOrder,
    changes: changes.length,
    ...summary,
  });

  await writeReport(
    request.outputPath,
    buildReportRows(changes),
    { oldSource: oldDb.source, newSource: newDb.source },
    { sheetName: config.sheetName, columnWidth: config.columnWidth }
  );

  return { outputPath: request.outputPath, changes, summary };
}
