import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { TableLoad, TableSource } from '../types';
import { parse_specifier, type RollSpecifier } from '../engine/dice';
import { parse_roll_target } from '../engine/rolls';
import type { TableRow } from '../engine/tables';

export interface CsvTableSourceOptions {
  /** Table identifiers resolve against this directory. */
  base_dir: string;
}

const DICE_DIRECTIVE_RE = /^#\s*dice\s*:\s*(.+)$/i;

function unquote(field: string): string {
  if (field.length >= 2 && field.startsWith('"') && field.endsWith('"')) {
    return field.slice(1, -1).replace(/""/g, '"');
  }
  return field;
}

/**
 * Table file format, one row per line:
 *
 *   # dice: 2d6          (optional; otherwise 1dX with X the largest target)
 *   roll,result          (optional header)
 *   2-6,Goblins
 *   7,"Wolves, hungry"
 *
 * The first comma separates the target from the text. Blank lines and other
 * `#` lines are skipped.
 */
export function parse_table_csv(text: string, origin = '<table>'): TableLoad {
  const rows: TableRow[] = [];
  let specifier: RollSpecifier | undefined;
  let header_allowed = true;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i].trim();
    if (raw === '') continue;
    if (raw.startsWith('#')) {
      const directive = DICE_DIRECTIVE_RE.exec(raw);
      if (directive) specifier = parse_specifier(directive[1]);
      continue;
    }
    const comma = raw.indexOf(',');
    if (comma < 0) throw new Error(`${origin}:${i + 1}: expected 'target,text'`);
    const target_text = raw.slice(0, comma).trim();
    const target = parse_roll_target(target_text);
    if (!target) {
      if (header_allowed) {
        header_allowed = false;
        continue;
      }
      throw new Error(`${origin}:${i + 1}: '${target_text}' is not a roll value or range`);
    }
    header_allowed = false;
    rows.push({ target, text: unquote(raw.slice(comma + 1).trim()) });
  }
  return specifier ? { rows, specifier } : { rows };
}

/** Reads `<base_dir>/<identifier>` as a table file on every `load table`. */
export function csv_table_source(options: CsvTableSourceOptions): TableSource {
  return {
    load(identifier) {
      const path = resolve(options.base_dir, identifier);
      return parse_table_csv(readFileSync(path, 'utf8'), identifier);
    },
  };
}
