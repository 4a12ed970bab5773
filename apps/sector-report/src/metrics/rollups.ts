import type { ConstituentRecord, SectorTally } from "@sector-report/schemas";

export function tallySectors(rows: readonly ConstituentRecord[]): SectorTally {
  const counts = new Map<string, number>();
  for (const r of rows) {
    if (r.sector === null) continue;
    counts.set(r.sector, (counts.get(r.sector) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

/** Highest count first, ties by label. */
export function rankTally(tally: SectorTally): Array<[string, number]> {
  return Object.entries(tally).sort(([a, x], [b, y]) => y - x || a.localeCompare(b));
}

export function formatTally(tally: SectorTally): string[] {
  const ranked = rankTally(tally);
  const width = Math.max(0, ...ranked.map(([label]) => label.length));
  return ranked.map(([label, count]) => `${label.padEnd(width)}  ${count}`);
}
