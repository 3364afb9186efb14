export type LedgerValue = string | number | boolean | Date | null;

export type LedgerRow = Record<string, LedgerValue>;

export interface LedgerTable {
  columns: string[];
  rows: LedgerRow[];
}

export interface LedgerFile {
  id: string;
  name: string;
  modifiedTime: Date;
}

export type LedgerRefType = "po" | "pr";

export interface PoPrQuery {
  types: LedgerRefType[];
  number: string;
  /** Lowercase substrings searched for in the designated columns. */
  variants: string[];
}

export type LedgerFilter = (table: LedgerTable) => LedgerTable;

export type FileScanOutcome =
  | { status: "matched"; file: LedgerFile; rows: number }
  | { status: "empty"; file: LedgerFile }
  | { status: "failed"; file: LedgerFile; error: string };

export interface ScanResult {
  table: LedgerTable;
  outcomes: FileScanOutcome[];
}

export const SOURCE_FILE_COLUMN = "source_file";

export function cellText(value: LedgerValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
