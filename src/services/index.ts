export { CSV_COLUMNS, CsvSink, csvEscape, csvFileName } from './csvSink';
export type { Sink } from './sink';
