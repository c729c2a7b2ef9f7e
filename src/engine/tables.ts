import { issue, parse_table_rows } from '../schema';
import type { DieSource } from '../utils/rng.util';
import { create_specifier, roll_dice, specifier_issue, format_specifier, type DiceRoll, type RollSpecifier } from './dice';
import { DefinitionError, ResolutionError } from './errors';
import { first_match, target_upper, type RollTarget } from './rolls';

export interface TableRow {
  target: RollTarget;
  text: string;
}

export interface Table {
  name: string;
  entries: readonly Readonly<TableRow>[];
  /** Rolled when a statement gives no explicit specifier. */
  specifier: RollSpecifier;
}

export interface TableSample {
  table: string;
  roll: DiceRoll;
  /** null when the total matched no entry (a wasted roll). */
  entry: Readonly<TableRow> | null;
  index: number | null;
}

/** 1dX where X is the largest value any row accepts. */
export function default_table_specifier(name: string, rows: readonly TableRow[]): RollSpecifier {
  const sides = rows.reduce((max, row) => Math.max(max, target_upper(row.target)), -Infinity);
  if (sides < 2) {
    throw new DefinitionError('INVALID_TABLE', `table '${name}' needs a dice directive: its rows only reach ${sides}`, {
      resource: name,
    });
  }
  return create_specifier(1, sides);
}

/** Loaded tables of one run, keyed by the identifier used in `load table`. */
export class TableRegistry {
  private readonly tables = new Map<string, Table>();

  /** Validates and (re)registers a table. Reloading a name replaces it. */
  load(name: string, rows: unknown, options: { specifier?: RollSpecifier } = {}): Table {
    const parsed = parse_table_rows(rows);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => issue('INVALID_TABLE', `/${i.path.join('/')}`, i.message));
      throw new DefinitionError(
        'INVALID_TABLE',
        `table '${name}' is invalid: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
        { resource: name, issues }
      );
    }
    const entries = parsed.data.map((row) => Object.freeze({ target: row.target, text: row.text }));
    const specifier = options.specifier ?? default_table_specifier(name, entries);
    const problem = specifier_issue(specifier);
    if (problem) {
      throw new DefinitionError('INVALID_DICE', `table '${name}' has invalid dice '${format_specifier(specifier)}': ${problem}`, {
        resource: name,
      });
    }
    const table: Table = { name, entries: Object.freeze(entries), specifier };
    this.tables.set(name, table);
    return table;
  }

  has(name: string): boolean {
    return this.tables.has(name);
  }

  get(name: string): Table {
    const table = this.tables.get(name);
    if (!table) {
      throw new ResolutionError('TABLE_NOT_FOUND', `table '${name}' has not been loaded`, { resource: name });
    }
    return table;
  }

  names(): string[] {
    return [...this.tables.keys()];
  }

  /** Rolls on a table and returns the first matching entry. */
  sample(name: string, source: DieSource, specifier?: RollSpecifier): TableSample {
    const table = this.get(name);
    const roll = roll_dice(specifier ?? table.specifier, source);
    const hit = first_match(table.entries, roll.total);
    return { table: name, roll, entry: hit?.item ?? null, index: hit?.index ?? null };
  }
}
