import type { ConstituentRecord } from '@sector-report/schemas';
import { renderTable } from './render';

export type SectorPatch = Pick<ConstituentRecord, 'sector'>;

export class ConstituentTable {
  readonly columns: string[];
  private readonly records: ConstituentRecord[];

  constructor(columns: string[], records: ConstituentRecord[]) {
    this.columns = columns.includes('sector') ? [...columns] : [...columns, 'sector'];
    this.records = records;
  }

  get size(): number {
    return this.records.length;
  }

  rows(): readonly ConstituentRecord[] {
    return this.records;
  }

  /** Symbols in table order, repeated where the join fanned a symbol out. */
  symbols(): string[] {
    return this.records.map((r) => r.symbol);
  }

  /**
   * Applies the patch to every record whose symbol equals `symbol`.
   * Returns the number of records written.
   */
  updateByKey(symbol: string, patch: SectorPatch): number {
    let written = 0;
    for (const record of this.records) {
      if (record.symbol !== symbol) continue;
      record.sector = patch.sector;
      written++;
    }
    return written;
  }

  render(): string {
    return renderTable(this.columns, this.records);
  }
}
