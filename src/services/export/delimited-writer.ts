/**
 * Delimited file output (CSV by default)
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FieldValue } from '../data-factory/types.js';
import type { Table } from './table.js';

export interface DelimitedOptions {
  delimiter?: string;

  /**
   * Line terminator; RFC 4180 uses CRLF
   */
  newline?: string;
}

export interface OutputPaths {
  /**
   * The requested file name with a .csv extension
   */
  single: string;
  fullReport: string;
  dataOnly: string;
}

function formatCell(value: FieldValue, delimiter: string): string {
  const text = String(value);
  const needsQuoting =
    text.includes(delimiter) ||
    text.includes('"') ||
    text.includes('\n') ||
    text.includes('\r') ||
    text !== text.trim();

  return needsQuoting ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialize a table; the output always ends with a line terminator
 */
export function toDelimited(table: Table, options: DelimitedOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const newline = options.newline ?? '\n';

  const lines = [
    table.columns.map((column) => formatCell(column, delimiter)).join(delimiter),
    ...table.rows.map((row) => row.map((cell) => formatCell(cell, delimiter)).join(delimiter)),
  ];

  return lines.join(newline) + newline;
}

export async function writeDelimitedFile(
  path: string,
  table: Table,
  options?: DelimitedOptions
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, toDelimited(table, options), 'utf8');
}

/**
 * Derive output file names: `report` becomes `report.csv`,
 * `report_full_report.csv` and `report_data_only.csv`
 */
export function resolveOutputPaths(name: string): OutputPaths {
  const trimmed = name.trim();
  const single = trimmed.toLowerCase().endsWith('.csv') ? trimmed : `${trimmed}.csv`;
  const base = single.slice(0, -'.csv'.length);

  return {
    single,
    fullReport: `${base}_full_report.csv`,
    dataOnly: `${base}_data_only.csv`,
  };
}
