import { z } from 'zod';

export const SECTORS = [
  'Technology',
  'Consumer Cyclical',
  'Industrials',
  'Utilities',
  'Healthcare',
  'Communication',
  'Energy',
  'Consumer Defensive',
  'Real Estate',
  'Financial'
] as const;

export const Sector = z.enum(SECTORS);
export type Sector = z.infer<typeof Sector>;

export function isKnownSector(label: string): label is Sector {
  return Sector.safeParse(label).success;
}

export const Cell = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type Cell = z.infer<typeof Cell>;

export const Row = z.record(Cell);
export type Row = z.infer<typeof Row>;

export type Table = {
  columns: string[];
  rows: Row[];
};

export const ConstituentRecord = z.object({
  symbol: z.string(),
  ytd: Cell,
  sector: z.string().nullable().default(null)
}).catchall(Cell);
export type ConstituentRecord = z.infer<typeof ConstituentRecord>;

export type SectorTally = Record<string, number>;

export const ClassifyOnError = z.enum(['abort', 'skip']);
export type ClassifyOnError = z.infer<typeof ClassifyOnError>;

export const Provider = z.enum(['openai', 'anthropic']);
export type Provider = z.infer<typeof Provider>;
