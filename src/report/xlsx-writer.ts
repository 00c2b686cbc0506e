/**
 * Spreadsheet output for the comparison report.
 *
 * Sheet layout:
 *   row 1  "Old DBC: <file>" (A:F merged) | "New DBC: <file>" (G:L merged) | "Comparison Results"
 *   row 2  column headers
 *   row 3+ one change per row, highlighted values in red
 *
 * Every table cell gets a thin border and the table a medium outline,
 * the header row carries an autofilter and the two header rows are frozen.
 */

import * as ExcelJS from "exceljs";
import fs from "fs/promises";
import path from "path";
import { WriteError, errorMessage } from "../errors.js";
import { logApplicationEvent } from "../util/logging.js";
import { PLACEHOLDER } from "./highlight.js";
import { REPORT_COLUMNS, SIDE_WIDTH, type ReportCell, type ReportRow } from "./rows.js";

const HIGHLIGHT_COLOR = "FFFF0000";
const PLAIN_COLOR = "FF000000";
const HEADER_ROWS = 2;

const CENTERED: Partial<ExcelJS.Alignment> = { horizontal: "center", vertical: "middle" };
const THIN: Partial<ExcelJS.Border> = { style: "thin" };
const OUTLINE: Partial<ExcelJS.Border> = { style: "medium" };

export interface ReportSources {
  /** File name shown above the old-side columns */
  oldSource: string;
  /** File name shown above the new-side columns */
  newSource: string;
}

export interface ReportLayoutOptions {
  sheetName: string;
  columnWidth: number;
}

/**
 * Build the report workbook in memory.
 */
export function buildWorkbook(
  rows: readonly ReportRow[],
  sources: ReportSources,
  options: ReportLayoutOptions
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName, {
    views: [{ state: "frozen", xSplit: 0, ySplit: HEADER_ROWS }],
  });
  const columnCount = REPORT_COLUMNS.length;

  sheet.mergeCells("A1:F1");
  sheet.mergeCells("G1:L1");
  writeHeader(sheet.getCell(1, 1), `Old DBC: ${sources.oldSource}`);
  writeHeader(sheet.getCell(1, SIDE_WIDTH + 1), `New DBC: ${sources.newSource}`);
  writeHeader(sheet.getCell(1, columnCount), "Comparison Results");

  REPORT_COLUMNS.forEach((name, index) => {
    writeHeader(sheet.getCell(2, index + 1), name);
    sheet.getColumn(index + 1).width = options.columnWidth;
  });

  rows.forEach((row, rowIndex) => {
    row.cells.forEach((cell, columnIndex) => {
      writeReportCell(sheet.getCell(HEADER_ROWS + rowIndex + 1, columnIndex + 1), cell);
    });
  });

  const lastRow = HEADER_ROWS + rows.length;
  sheet.autoFilter = {
    from: { row: HEADER_ROWS, column: 1 },
    to: { row: lastRow, column: columnCount },
  };

  for (let r = 1; r <= lastRow; r++) {
    for (let c = 1; c <= columnCount; c++) {
      const cell = sheet.getCell(r, c);
      const border: Partial<ExcelJS.Borders> = {
        top: r === 1 ? OUTLINE : THIN,
        left: c === 1 ? OUTLINE : THIN,
        bottom: r === lastRow ? OUTLINE : THIN,
        right: c === columnCount ? OUTLINE : THIN,
      };
      // merged cells share their master's style object until given their own
      cell.style = { ...cell.style, border };
    }
  }

  return workbook;
}

/**
 * Write the report to `outputPath`, creating its directory when missing.
 * The file handle is closed on every path.
 * @throws WriteError when the workbook cannot be serialized or written
 */
export async function writeReport(
  outputPath: string,
  rows: readonly ReportRow[],
  sources: ReportSources,
  options: ReportLayoutOptions
): Promise<void> {
  const workbook = buildWorkbook(rows, sources, options);

  let data: Uint8Array;
  try {
    data = new Uint8Array(await workbook.xlsx.writeBuffer());
  } catch (error) {
    throw new WriteError(outputPath, `Cannot serialize workbook: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    const handle = await fs.open(outputPath, "w");
    try {
      await handle.writeFile(data);
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new WriteError(outputPath, `Cannot write report: ${errorMessage(error)}`, { cause: error });
  }

  logApplicationEvent("reporter", "written", { output: outputPath, rows: rows.length });
}

function writeHeader(cell: ExcelJS.Cell, value: string): void {
  cell.value = value;
  cell.font = { bold: true };
  cell.alignment = CENTERED;
}

function writeReportCell(target: ExcelJS.Cell, cell: ReportCell): void {
  target.alignment = CENTERED;

  if (cell.type === "text") {
    target.value = cell.value;
    target.font = colorFont(cell.highlighted);
    return;
  }

  if (cell.parts.length === 0) {
    target.value = PLACEHOLDER;
    target.font = colorFont(false);
    return;
  }

  if (cell.parts.length === 1) {
    target.value = cell.parts[0].name;
    target.font = colorFont(cell.parts[0].highlighted);
    return;
  }

  const richText: ExcelJS.RichText[] = [];
  cell.parts.forEach((part, index) => {
    if (index > 0) richText.push({ text: ", ", font: colorFont(false) });
    richText.push({ text: part.name, font: colorFont(part.highlighted) });
  });
  target.value = { richText };
}

function colorFont(highlighted: boolean): Partial<ExcelJS.Font> {
  return { color: { argb: highlighted ? HIGHLIGHT_COLOR : PLAIN_COLOR } };
}
