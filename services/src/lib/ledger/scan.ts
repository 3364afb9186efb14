import type { DriveGateway } from "@/lib/drive/client";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { LedgerFileLister } from "@/lib/ledger/files";
import { readReportOutput } from "@/lib/ledger/workbook";
import {
  type FileScanOutcome,
  type LedgerFile,
  type LedgerFilter,
  type LedgerRow,
  type LedgerTable,
  type ScanResult,
  SOURCE_FILE_COLUMN,
} from "@/types/ledger";

type FileScanStep = { outcome: FileScanOutcome; table?: LedgerTable };

export class LedgerScanner {
  constructor(
    private readonly lister: LedgerFileLister,
    private readonly drive: DriveGateway
  ) {}

  async scanAndFilter(filterFn: LedgerFilter, maxFiles: number): Promise<ScanResult> {
    const files = await this.lister.listLedgerFiles(maxFiles);
    const outcomes: FileScanOutcome[] = [];
    const matches: LedgerTable[] = [];

    for (const file of files) {
      const step = await this.scanFile(file, filterFn);
      outcomes.push(step.outcome);

      if (step.outcome.status === "failed") {
        logger.warn("Skipping ledger file", { file: file.name, error: step.outcome.error });
        continue;
      }
      if (step.table) {
        matches.push(step.table);
      }
    }

    const table = concatTables(matches);
    logger.info("Ledger scan completed", {
      files: files.length,
      failed: outcomes.filter((outcome) => outcome.status === "failed").length,
      rows: table.rows.length,
    });
    return { table, outcomes };
  }

  private async scanFile(file: LedgerFile, filterFn: LedgerFilter): Promise<FileScanStep> {
    try {
      const buffer = await this.drive.download(file.id);
      const filtered = filterFn(await readReportOutput(buffer));

      if (filtered.rows.length === 0) {
        return { outcome: { status: "empty", file } };
      }

      const rows: LedgerRow[] = filtered.rows.map((row) => ({ ...row, [SOURCE_FILE_COLUMN]: file.name }));
      return {
        outcome: { status: "matched", file, rows: rows.length },
        table: { columns: [...filtered.columns, SOURCE_FILE_COLUMN], rows },
      };
    } catch (error) {
      return { outcome: { status: "failed", file, error: errorMessage(error) } };
    }
  }
}

/** Union of columns in first-seen order, provenance column last. */
export function concatTables(tables: LedgerTable[]): LedgerTable {
  const columns: string[] = [];
  const rows: LedgerRow[] = [];
  let hasSource = false;

  for (const table of tables) {
    for (const column of table.columns) {
      if (column === SOURCE_FILE_COLUMN) {
        hasSource = true;
      } else if (!columns.includes(column)) {
        columns.push(column);
      }
    }
    rows.push(...table.rows);
  }

  if (hasSource) {
    columns.push(SOURCE_FILE_COLUMN);
  }
  return { columns, rows };
}
