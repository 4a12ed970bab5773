import { describe, it, expect } from "vitest";
import { ConstituentRecord } from "@sector-report/schemas";
import { formatTally, rankTally, tallySectors } from "./rollups";

const rows = (sectors: Array<string | null>) =>
  sectors.map((sector, i) => ConstituentRecord.parse({ symbol: `S${i}`, ytd: i, sector }));

describe("rollups", () => {
  it("counts by exact label and skips unlabelled rows", () => {
    const tally = tallySectors(rows(["Technology", "technology", null, "Technology"]));
    expect(tally).toEqual({ Technology: 2, technology: 1 });
  });

  it("sums to the number of labelled rows", () => {
    const input = rows(["Energy", null, "Financial", "Energy", null, "Real Estate"]);
    const total = Object.values(tallySectors(input)).reduce((a, b) => a + b, 0);
    expect(total).toBe(input.filter((r) => r.sector !== null).length);
  });

  it("handles labels that collide with object keys", () => {
    expect(tallySectors(rows(["constructor", "constructor"]))).toEqual({ constructor: 2 });
  });

  it("ranks by count, then label", () => {
    const tally = { Healthcare: 1, Technology: 3, Energy: 1 };
    expect(rankTally(tally)).toEqual([["Technology", 3], ["Energy", 1], ["Healthcare", 1]]);
    expect(formatTally(tally)).toEqual(["Technology  3", "Energy      1", "Healthcare  1"]);
  });
});
