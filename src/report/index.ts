export { escapeCsvField, toCsv, parseCsv, type CsvRow } from './csv.js';
export { renderTable, renderResultsTable, RESULT_TABLE_HEADERS } from './table.js';
export { writeResultsCsv, RESULT_CSV_COLUMNS } from './results-file.js';
export { ProgressDisplay, formatBar, formatElapsed, type OutputStream } from './progress.js';
export {
  ConsoleReporter,
  NO_RESULTS_MESSAGE,
  FINISHED_MESSAGE,
  type ConsoleReporterOptions,
} from './console-reporter.js';
