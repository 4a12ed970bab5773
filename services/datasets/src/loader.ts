import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { Cell, Row, Table } from '@sector-report/schemas';
import { DatasetError, createLogger } from '@sector-report/pipeline-core';

const log = createLogger('datasets');

const Records = z.array(z.array(z.string()));
const NUMERIC = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

export interface LoadOptions {
  /** Columns kept as text even when they look numeric. */
  textColumns?: string[];
}

export function castCell(raw: string): Cell {
  if (raw === '') return null;
  if (NUMERIC.test(raw)) return Number(raw);
  return raw;
}

export function parseTable(text: string, source: string, options: LoadOptions = {}): Table {
  const textColumns = new Set(options.textColumns ?? ['symbol']);
  let records: string[][];
  try {
    records = Records.parse(parse(text, { bom: true, trim: true, skip_empty_lines: true }));
  } catch (err) {
    throw new DatasetError(`${source}: malformed delimited data`, { path: source, cause: err });
  }

  const [header, ...body] = records;
  if (!header) throw new DatasetError(`${source}: no header row`, { path: source });
  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) throw new DatasetError(`${source}: duplicate column "${name}"`, { path: source });
    seen.add(name);
  }

  const rows = body.map((fields) => {
    const row: Row = {};
    header.forEach((name, i) => {
      const raw = fields[i];
      row[name] = textColumns.has(name) ? raw || null : castCell(raw);
    });
    return row;
  });
  return { columns: header, rows };
}

export function loadTable(path: string, options: LoadOptions = {}): Table {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new DatasetError(`cannot read ${fullPath}`, { path: fullPath, cause: err });
  }
  const table = parseTable(text, fullPath, options);
  log.info({ file: fullPath, columns: table.columns.length, rows: table.rows.length }, 'loaded table');
  return table;
}
