import type { Table } from '@sector-report/schemas';
import { loadTable } from './loader';

export { castCell, loadTable, parseTable, type LoadOptions } from './loader';
export { innerJoin, joinConstituents, type JoinOptions } from './join';

export interface DatasetFiles {
  constituents: string;
  priceChange: string;
}

/** Both inputs are read before any completion request is made. */
export function loadDatasets(files: DatasetFiles): { constituents: Table; priceChanges: Table } {
  return {
    constituents: loadTable(files.constituents),
    priceChanges: loadTable(files.priceChange),
  };
}
