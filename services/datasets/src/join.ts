import { ConstituentRecord, type Cell, type Row, type Table } from '@sector-report/schemas';
import { ConstituentTable, DatasetError } from '@sector-report/pipeline-core';

export interface JoinOptions {
  on: string;
  /** Right-hand columns carried into the result; the key is among them. */
  columns: string[];
}

function requireColumn(table: Table, column: string, side: string) {
  if (!table.columns.includes(column)) {
    throw new DatasetError(`${side} table has no "${column}" column`);
  }
}

/**
 * Inner equi-join. Left order is kept; a left row with several right matches
 * yields one row per match, in right order. Rows with a null key never match.
 */
export function innerJoin(left: Table, right: Table, { on, columns }: JoinOptions): Table {
  requireColumn(left, on, 'left');
  requireColumn(right, on, 'right');
  columns.forEach((c) => requireColumn(right, c, 'right'));
  const pulled = columns.filter((c) => c !== on);

  const index = new Map<Cell, Row[]>();
  for (const row of right.rows) {
    const key = row[on];
    if (key === null) continue;
    const bucket = index.get(key) ?? [];
    bucket.push(row);
    index.set(key, bucket);
  }

  const rows: Row[] = [];
  for (const row of left.rows) {
    const key = row[on];
    if (key === null) continue;
    for (const match of index.get(key) ?? []) {
      const joined: Row = { ...row };
      for (const c of pulled) joined[c] = match[c];
      rows.push(joined);
    }
  }

  return { columns: [...left.columns, ...pulled.filter((c) => !left.columns.includes(c))], rows };
}

export function joinConstituents(constituents: Table, priceChanges: Table): ConstituentTable {
  const joined = innerJoin(constituents, priceChanges, { on: 'symbol', columns: ['symbol', 'ytd'] });
  const records = joined.rows.map((row, i) => {
    const parsed = ConstituentRecord.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new DatasetError(`joined row ${i + 1} (${String(row.symbol)}): ${issues}`, { cause: parsed.error });
    }
    return parsed.data;
  });
  return new ConstituentTable(joined.columns, records);
}
