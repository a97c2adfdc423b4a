import { describe, expect, it } from "vitest";
import { aggregateTotals, sumAggregate, toAggregateDocument } from "./aggregate";
import { normalizeRecords } from "./normalize";
import type { NormalizedRecord } from "./shared-types";

describe("aggregateTotals", () => {
  it("returns an empty map for no records", () => {
    expect(aggregateTotals([]).size).toBe(0);
  });

  it("combines receipts from the same company", () => {
    const records = normalizeRecords([
      { company_name: "Cafe A", total_amount: "10.00" },
      { company_name: "Cafe A", total_amount: "5" },
      { company_name: "Cafe B", total_amount: "" },
    ]);

    const totals = aggregateTotals(records);

    expect([...totals.keys()]).toEqual(["Cafe A", "Cafe B"]);
    expect(toAggregateDocument(totals)).toEqual({ "Cafe A": 15, "Cafe B": 0 });
  });

  it("sums rupee amounts written with an Rs. prefix", () => {
    const totals = aggregateTotals(
      normalizeRecords([
        { company_name: "Chai", total_amount: "Rs. 100" },
        { company_name: "Chai", total_amount: "Rs. 1,250.00" },
      ])
    );

    expect(toAggregateDocument(totals)).toEqual({ Chai: 1350 });
  });

  it("matches company names exactly", () => {
    const totals = aggregateTotals([
      { company_name: "Acme Corp", total_amount: 1 },
      { company_name: "Acme corp", total_amount: 2 },
      { company_name: "", total_amount: 3 },
      { company_name: "", total_amount: 4 },
    ]);

    expect(Object.fromEntries(totals)).toEqual({ "Acme Corp": 1, "Acme corp": 2, "": 7 });
  });

  it("keeps first-seen key order", () => {
    const totals = aggregateTotals([
      { company_name: "Zeta", total_amount: 1 },
      { company_name: "Alpha", total_amount: 1 },
      { company_name: "Zeta", total_amount: 1 },
    ]);

    expect([...totals.keys()]).toEqual(["Zeta", "Alpha"]);
  });

  it("conserves the total across all companies", () => {
    const records: NormalizedRecord[] = [
      { company_name: "A", total_amount: 1.25 },
      { company_name: "B", total_amount: -0.5 },
      { company_name: "A", total_amount: 3 },
      { company_name: "C", total_amount: 2.75 },
      { company_name: "B", total_amount: 0 },
    ];

    const totals = aggregateTotals(records);
    const recordSum = records.reduce((sum, r) => sum + r.total_amount, 0);

    expect(sumAggregate(totals)).toBe(recordSum);
    expect(sumAggregate(toAggregateDocument(totals))).toBe(6.5);
    expect(totals.get("A")).toBe(4.25);
  });
});
