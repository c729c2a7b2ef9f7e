import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { FACTS_FILE_VERSION, parse_facts_file } from '../schema';
import type { FactStorage } from '../types';

function is_missing_file(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Persistent facts in a JSON file: `{ "version": 1, "facts": [...] }`.
 * A missing file reads as empty. Each persist rewrites the file through a
 * temp file + rename.
 */
export function json_fact_storage(path: string): FactStorage {
  let cache: Set<string> | null = null;

  const read = (): Set<string> => {
    if (cache) return cache;
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (e) {
      if (!is_missing_file(e)) throw e;
      cache = new Set();
      return cache;
    }
    const parsed = parse_facts_file(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`${path}: ${parsed.error.issues.map((i) => `/${i.path.join('/')} ${i.message}`).join('; ')}`);
    }
    cache = new Set(parsed.data.facts);
    return cache;
  };

  const write = (facts: Set<string>): void => {
    mkdirSync(dirname(path), { recursive: true });
    const tmp = `${path}.${process.pid}.tmp`;
    const body = { version: FACTS_FILE_VERSION, facts: [...facts].sort() };
    writeFileSync(tmp, `${JSON.stringify(body, null, 2)}\n`, 'utf8');
    renameSync(tmp, path);
  };

  return {
    load_all: () => [...read()],
    persist(name, present) {
      const next = new Set(read());
      if (present) next.add(name);
      else next.delete(name);
      write(next);
      cache = next;
    },
  };
}
