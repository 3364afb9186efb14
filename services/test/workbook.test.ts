import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { DataShapeError } from "@/lib/errors";
import { hyperlinkText, readReportOutput, toLedgerValue, writeLedgerWorkbook } from "@/lib/ledger/workbook";
import { buildLedgerBuffer, readUploadedSheet, table } from "./helpers/ledger";

describe("readReportOutput", () => {
  it("reads the header from the second row and data below it", async () => {
    const buffer = await buildLedgerBuffer(
      ["JOURNAL_DOC_NO", "PO_Number", "Amount"],
      [
        ["J1", "PO-111", 10],
        ["J2", "PO-222", 20],
      ]
    );

    const result = await readReportOutput(buffer);

    expect(result.columns).toEqual(["JOURNAL_DOC_NO", "PO_Number", "Amount"]);
    expect(result.rows).toEqual([
      { JOURNAL_DOC_NO: "J1", PO_Number: "PO-111", Amount: 10 },
      { JOURNAL_DOC_NO: "J2", PO_Number: "PO-222", Amount: 20 },
    ]);
  });

  it("names blank headers, suffixes duplicates and drops blank rows", async () => {
    const buffer = await buildLedgerBuffer(
      ["Amount", "", "Amount"],
      [
        [1, "x", 2],
        [null, null, null],
        [3, "y", 4],
      ]
    );

    const result = await readReportOutput(buffer);

    expect(result.columns).toEqual(["Amount", "column_2", "Amount.1"]);
    expect(result.rows).toEqual([
      { Amount: 1, column_2: "x", "Amount.1": 2 },
      { Amount: 3, column_2: "y", "Amount.1": 4 },
    ]);
  });

  it("decodes rich text and formula cells", async () => {
    const buffer = await buildLedgerBuffer(
      ["po_number", "Total"],
      [[{ richText: [{ text: "PO-" }, { text: "777" }] }, { formula: "1+1", result: 2, date1904: false }]]
    );

    const result = await readReportOutput(buffer);

    expect(result.rows).toEqual([{ po_number: "PO-777", Total: 2 }]);
  });

  it("fails when the ReportOutput sheet is missing", async () => {
    const buffer = await buildLedgerBuffer(["po_number"], [["PO-1"]], "Sheet1");
    await expect(readReportOutput(buffer)).rejects.toBeInstanceOf(DataShapeError);
  });
});

describe("toLedgerValue", () => {
  it("maps hyperlinks to their text and errors to null", () => {
    expect(toLedgerValue({ text: "PO-9", hyperlink: "https://erp.test/po/9" })).toBe("PO-9");
    expect(toLedgerValue({ error: "#N/A" })).toBeNull();
    expect(toLedgerValue(undefined)).toBeNull();
  });
});

describe("hyperlinkText", () => {
  it("joins the runs of a rich-text label", () => {
    expect(hyperlinkText({ richText: [{ text: "JV-" }, { font: { bold: true }, text: "0042" }] })).toBe("JV-0042");
  });

  it("keeps plain labels and drops anything else", () => {
    expect(hyperlinkText("PO-12345")).toBe("PO-12345");
    expect(hyperlinkText(7)).toBe("");
  });
});

describe("writeLedgerWorkbook", () => {
  it("writes the header and rows in column order", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-write-"));
    const filePath = path.join(dir, "out.xlsx");

    await writeLedgerWorkbook(
      table(["po_number", "Amount", "source_file"], [
        { po_number: "PO-1", Amount: 5, source_file: "GL_FP_2025_01.xlsx" },
        { Amount: 6, po_number: "PO-2", source_file: "GL_FP_2024_12.xlsx" },
      ]),
      filePath
    );

    expect(await readUploadedSheet(fs.readFileSync(filePath))).toEqual([
      ["po_number", "Amount", "source_file"],
      ["PO-1", "5", "GL_FP_2025_01.xlsx"],
      ["PO-2", "6", "GL_FP_2024_12.xlsx"],
    ]);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
