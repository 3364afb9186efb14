import { DataShapeError } from "@/lib/errors";
import { cellText, type LedgerRefType, type LedgerTable, type PoPrQuery } from "@/types/ledger";

const PO_PR_PATTERN = /(?:SPXBR-)?(PO|PR)-?(\d+)/i;

// Columns searched for PO/PR references, compared lowercased and trimmed.
const PO_PR_COLUMNS = ["po_number", "source desc", "line desc"];

const JOURNAL_COLUMNS = new Set(["JOURNAL_DOC_NO", "JOURNAL DOC NO", "JOURNAL_DOC"]);

export function normalizePoPrQuery(raw: string): PoPrQuery {
  const match = PO_PR_PATTERN.exec(raw);

  let types: LedgerRefType[];
  let number: string;
  if (match) {
    types = [match[1].toLowerCase() === "pr" ? "pr" : "po"];
    number = match[2];
  } else {
    // No type given: the id could be either, so search both.
    types = ["po", "pr"];
    number = raw.replace(/\D/g, "");
  }

  if (!number) {
    return { types, number, variants: [] };
  }

  const variants = types.flatMap((type) => [`${type}-${number}`, `spxbr-${type}-${number}`]);
  return { types, number, variants };
}

export function findPoPrColumns(columns: string[]): string[] {
  return columns.filter((column) => PO_PR_COLUMNS.includes(column.trim().toLowerCase()));
}

export function findJournalColumn(columns: string[]): string | undefined {
  return columns.find((column) => JOURNAL_COLUMNS.has(column.trim().toUpperCase()));
}

export function filterByPoPr(table: LedgerTable, rawQuery: string): LedgerTable {
  const searchColumns = findPoPrColumns(table.columns);
  if (searchColumns.length === 0) {
    throw new DataShapeError("None of the PO/PR columns were found", {
      expected: PO_PR_COLUMNS,
      columns: table.columns,
    });
  }

  const { variants } = normalizePoPrQuery(rawQuery);
  if (variants.length === 0) {
    return { columns: [...table.columns], rows: [] };
  }

  const rows = table.rows.filter((row) =>
    searchColumns.some((column) => {
      const text = cellText(row[column]).toLowerCase();
      return variants.some((variant) => text.includes(variant));
    })
  );

  return { columns: [...table.columns], rows };
}

/**
 * Exact, case-sensitive match of the trimmed journal cell against the
 * requested ids. Unlike the PO/PR filter there is no substring matching.
 */
export function filterByJournals(table: LedgerTable, journalIds: string[]): LedgerTable {
  const column = findJournalColumn(table.columns);
  if (!column) {
    throw new DataShapeError("Journal document column not found", {
      expected: [...JOURNAL_COLUMNS],
      columns: table.columns,
    });
  }

  const wanted = new Set(journalIds.map((id) => id.trim()).filter(Boolean));
  const rows = table.rows.filter((row) => wanted.has(cellText(row[column]).trim()));

  return { columns: [...table.columns], rows };
}
