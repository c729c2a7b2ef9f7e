export { csv_table_source, parse_table_csv } from './csv_table_source';
export type { CsvTableSourceOptions } from './csv_table_source';
export { json_fact_storage } from './json_fact_storage';
export { memory_fact_storage, memory_table_source, collecting_sink } from './memory';
export { console_sink, format_event } from './console_sink';
