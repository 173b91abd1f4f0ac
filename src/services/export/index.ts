/**
 * Tabular export of generated datasets
 */

export { buildScenarioReports, datasetToTable } from './table.js';
export type { ScenarioReports, Table } from './table.js';
export { resolveOutputPaths, toDelimited, writeDelimitedFile } from './delimited-writer.js';
export type { DelimitedOptions, OutputPaths } from './delimited-writer.js';
