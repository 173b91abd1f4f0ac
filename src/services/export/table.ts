/**
 * Dataset to table conversion and the two scenario report layouts
 */

import type { Dataset, FieldValue } from '../data-factory/types.js';
import { NO_VALUE_GENERATED } from '../data-factory/sentinels.js';
import { PROVENANCE_COLUMNS } from '../test-strategist/types.js';

/**
 * Header plus rows, ready for serialization
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly FieldValue[])[];
}

export interface ScenarioReports {
  /**
   * All columns, provenance first
   */
  fullReport: Table;

  /**
   * Same rows without the provenance columns
   */
  dataOnly: Table;
}

/**
 * Lay the dataset out in the given column order (default: its own).
 * Records missing a column get the sentinel, never an empty cell.
 */
export function datasetToTable(dataset: Dataset, columns: readonly string[] = dataset.columns): Table {
  return {
    columns: [...columns],
    rows: dataset.records.map((record) =>
      columns.map((column) =>
        Object.prototype.hasOwnProperty.call(record, column) ? (record[column] ?? NO_VALUE_GENERATED) : NO_VALUE_GENERATED
      )
    ),
  };
}

/**
 * Both report layouts from one dataset
 */
export function buildScenarioReports(dataset: Dataset): ScenarioReports {
  const provenance: readonly string[] = PROVENANCE_COLUMNS;
  const dataColumns = dataset.columns.filter((column) => !provenance.includes(column));

  return {
    fullReport: datasetToTable(dataset, [...PROVENANCE_COLUMNS, ...dataColumns]),
    dataOnly: datasetToTable(dataset, dataColumns),
  };
}
