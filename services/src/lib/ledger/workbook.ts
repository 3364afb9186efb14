import ExcelJS from "exceljs";

import { DataShapeError } from "@/lib/errors";
import type { LedgerRow, LedgerTable, LedgerValue } from "@/types/ledger";

export const REPORT_SHEET_NAME = "ReportOutput";
export const RESULT_SHEET_NAME = "resultado";

// The ledger exports carry a title line above the header.
const HEADER_ROW_NUMBER = 2;

export async function readReportOutput(buffer: Buffer): Promise<LedgerTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);

  const worksheet = workbook.getWorksheet(REPORT_SHEET_NAME);
  if (!worksheet) {
    throw new DataShapeError(`Worksheet ${REPORT_SHEET_NAME} not found`, {
      worksheets: workbook.worksheets.map((sheet) => sheet.name),
    });
  }

  const header = readHeader(worksheet);
  const rows: LedgerRow[] = [];

  for (let rowNumber = HEADER_ROW_NUMBER + 1; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const record: LedgerRow = {};
    let hasValue = false;

    header.forEach(({ name, colNumber }) => {
      const value = toLedgerValue(row.getCell(colNumber).value);
      if (value !== null && value !== "") {
        hasValue = true;
      }
      record[name] = value;
    });

    if (hasValue) {
      rows.push(record);
    }
  }

  return { columns: header.map((column) => column.name), rows };
}

export async function writeLedgerWorkbook(table: LedgerTable, filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(RESULT_SHEET_NAME);

  worksheet.addRow(table.columns);
  for (const row of table.rows) {
    worksheet.addRow(table.columns.map((column) => row[column] ?? null));
  }

  await workbook.xlsx.writeFile(filePath);
}

function readHeader(worksheet: ExcelJS.Worksheet): Array<{ name: string; colNumber: number }> {
  const headerRow = worksheet.getRow(HEADER_ROW_NUMBER);
  const seen = new Map<string, number>();
  const columns: Array<{ name: string; colNumber: number }> = [];

  for (let colNumber = 1; colNumber <= headerRow.cellCount; colNumber++) {
    const text = String(toLedgerValue(headerRow.getCell(colNumber).value) ?? "").trim();
    const base = text || `column_${colNumber}`;

    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    columns.push({ name: count === 0 ? base : `${base}.${count}`, colNumber });
  }

  if (columns.length === 0) {
    throw new DataShapeError(`Worksheet ${REPORT_SHEET_NAME} has no header in row ${HEADER_ROW_NUMBER}`);
  }

  return columns;
}

export function toLedgerValue(value: ExcelJS.CellValue): LedgerValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("hyperlink" in value) {
    return hyperlinkText(value.text);
  }
  if ("error" in value) {
    return null;
  }
  if ("result" in value && value.result !== undefined) {
    return toLedgerValue(value.result);
  }
  return null;
}

/** Hyperlink cells styled in the sheet keep their label as a rich-text object rather than a string. */
export function hyperlinkText(text: unknown): string {
  if (typeof text === "string") {
    return text;
  }
  if (typeof text === "object" && text !== null && "richText" in text && Array.isArray(text.richText)) {
    return text.richText
      .map((part: unknown) =>
        typeof part === "object" && part !== null && "text" in part && typeof part.text === "string" ? part.text : ""
      )
      .join("");
  }
  return "";
}
