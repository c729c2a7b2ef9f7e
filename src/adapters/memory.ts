import type { FactStorage, OutputEvent, OutputSink, TableLoad, TableSource } from '../types';
import type { TableRow } from '../engine/tables';

/** Fact storage kept in a Set; `writes` records every persist call in order. */
export function memory_fact_storage(initial: Iterable<string> = []): FactStorage & {
  readonly writes: ReadonlyArray<{ name: string; present: boolean }>;
  snapshot(): string[];
} {
  const facts = new Set(initial);
  const writes: Array<{ name: string; present: boolean }> = [];
  return {
    load_all: () => [...facts],
    persist(name, present) {
      writes.push({ name, present });
      if (present) facts.add(name);
      else facts.delete(name);
    },
    snapshot: () => [...facts].sort(),
    writes,
  };
}

/** Tables given inline, either as bare rows or with an explicit die. */
export function memory_table_source(tables: Record<string, readonly TableRow[] | TableLoad>): TableSource {
  const known = new Map(Object.entries(tables));
  return {
    load(identifier) {
      const found = known.get(identifier);
      if (found === undefined) throw new Error(`no such table: ${identifier}`);
      return is_table_load(found) ? found : { rows: found };
    },
  };
}

function is_table_load(v: readonly TableRow[] | TableLoad): v is TableLoad {
  return !Array.isArray(v);
}

export function collecting_sink(): OutputSink & { readonly events: OutputEvent[] } {
  const events: OutputEvent[] = [];
  return { emit: (event) => void events.push(event), events };
}
