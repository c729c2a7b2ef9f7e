import type { RollSpecifier } from '../engine/dice';
import type { TableRow } from '../engine/tables';
import type { OutputEvent } from './run.type';

/** What a table source hands back for one identifier. */
export interface TableLoad {
  rows: readonly TableRow[];
  /** Die to roll when a statement names none; sized from the rows when absent. */
  specifier?: RollSpecifier;
}

/** Resolves a table identifier (usually a file name) into rows. Throws on failure. */
export interface TableSource {
  load(identifier: string): TableLoad;
}

/** Durable backing for persistent facts. */
export interface FactStorage {
  load_all(): Iterable<string>;
  /** Called on every persistent mutation with the fact's new presence. */
  persist(name: string, present: boolean): void;
}

export interface OutputSink {
  emit(event: OutputEvent): void;
}
