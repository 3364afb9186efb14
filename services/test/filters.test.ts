import { describe, expect, it } from "vitest";

import { DataShapeError } from "@/lib/errors";
import { filterByJournals, filterByPoPr, normalizePoPrQuery } from "@/lib/ledger/filters";
import { table } from "./helpers/ledger";

describe("normalizePoPrQuery", () => {
  it("keeps the explicit type and builds both variants", () => {
    expect(normalizePoPrQuery("PO-12345")).toEqual({
      types: ["po"],
      number: "12345",
      variants: ["po-12345", "spxbr-po-12345"],
    });
  });

  it("accepts the SPXBR prefix and a missing hyphen", () => {
    expect(normalizePoPrQuery("spxbr-PR0099").variants).toEqual(["pr-0099", "spxbr-pr-0099"]);
  });

  it("searches both types when the type is absent", () => {
    expect(normalizePoPrQuery("ref 12-345")).toEqual({
      types: ["po", "pr"],
      number: "12345",
      variants: ["po-12345", "spxbr-po-12345", "pr-12345", "spxbr-pr-12345"],
    });
  });

  it("yields no variants without digits", () => {
    expect(normalizePoPrQuery("nothing here").variants).toEqual([]);
  });
});

describe("filterByPoPr", () => {
  const ledger = table(["PO_Number", " Line Desc ", "Amount"], [
    { PO_Number: "SPXBR-PO-12345", " Line Desc ": "Office chairs", Amount: 100 },
    { PO_Number: null, " Line Desc ": "Freight for po-12345", Amount: 50 },
    { PO_Number: "PR-12345", " Line Desc ": "Requisition", Amount: 10 },
    { PO_Number: "PO-123456", " Line Desc ": "Longer id", Amount: 5 },
    { PO_Number: "PO-99999", " Line Desc ": "Other", Amount: 1 },
  ]);

  it("matches any designated column by case-insensitive substring", () => {
    const result = filterByPoPr(ledger, "PO-12345");
    expect(result.columns).toEqual(["PO_Number", " Line Desc ", "Amount"]);
    expect(result.rows.map((row) => row.Amount)).toEqual([100, 50, 5]);
  });

  it("matches both types when the query has none", () => {
    const result = filterByPoPr(ledger, "12345");
    expect(result.rows.map((row) => row.Amount)).toEqual([100, 50, 10, 5]);
  });

  it("returns no rows for a query without digits", () => {
    expect(filterByPoPr(ledger, "PO").rows).toEqual([]);
  });

  it("fails when none of the designated columns exist", () => {
    const other = table(["Account", "Amount"], [{ Account: "PO-12345", Amount: 1 }]);
    expect(() => filterByPoPr(other, "PO-12345")).toThrow(DataShapeError);
  });
});

describe("filterByJournals", () => {
  const ledger = table(["Journal Doc No ", "Amount"], [
    { "Journal Doc No ": "J123", Amount: 1 },
    { "Journal Doc No ": " J124 ", Amount: 2 },
    { "Journal Doc No ": "j123", Amount: 3 },
    { "Journal Doc No ": 555, Amount: 4 },
    { "Journal Doc No ": "J1234", Amount: 5 },
  ]);

  it("matches trimmed values exactly and case-sensitively", () => {
    const result = filterByJournals(ledger, ["J123", " J124", "", "555"]);
    expect(result.rows.map((row) => row.Amount)).toEqual([1, 2, 4]);
  });

  it("does not match a differently cased id", () => {
    expect(filterByJournals(ledger, ["J123"]).rows.map((row) => row.Amount)).toEqual([1]);
  });

  it("accepts the underscore column variants", () => {
    const other = table(["journal_doc"], [{ journal_doc: "J9" }]);
    expect(filterByJournals(other, ["J9"]).rows).toHaveLength(1);
  });

  it("fails when the journal column is missing", () => {
    const other = table(["Document"], [{ Document: "J123" }]);
    expect(() => filterByJournals(other, ["J123"])).toThrow(DataShapeError);
  });
});
