import { AntecedentKind, ClauseKind, PLACEHOLDER, type AntecedentNode, type FormatClause, type FormatString } from '../ast/nodes';
import { roll_dice, type DiceRoll } from '../dice';
import { DefinitionError } from '../errors';
import { target_contains } from '../rolls';
import type { InterpreterCtx } from '../effects/types';

export interface AntecedentOutcome {
  holds: boolean;
  /** Present for dice checks. */
  roll?: DiceRoll;
}

/** Dice checks roll once; fact checks only read. */
export function evaluate_antecedent(node: AntecedentNode, ctx: InterpreterCtx): AntecedentOutcome {
  switch (node.kind) {
    case AntecedentKind.DiceRollCheck: {
      const roll = roll_dice(node.specifier, ctx.dice);
      return { holds: target_contains(node.target, roll.total), roll };
    }
    case AntecedentKind.FactCheck:
      return { holds: ctx.facts.contains(node.name, node.persistence) };
    default: {
      const _exhaustive: never = node;
      throw new Error(`unknown antecedent ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function resolve_clause(clause: FormatClause, ctx: InterpreterCtx): string | null {
  switch (clause.kind) {
    case ClauseKind.DiceRoll:
      return String(roll_dice(clause.specifier, ctx.dice).total);
    case ClauseKind.TableRoll:
      return ctx.tables.sample(clause.table, ctx.dice, clause.specifier).entry?.text ?? null;
    default: {
      const _exhaustive: never = clause;
      throw new Error(`unknown format clause ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Substitutes clause results into the placeholders, left to right.
 * Returns null as soon as a table clause matches no entry; later clauses are not rolled.
 */
export function resolve_format_string(fs: FormatString, ctx: InterpreterCtx): string | null {
  const pieces = fs.literal.split(PLACEHOLDER);
  if (pieces.length - 1 !== fs.clauses.length) {
    throw new DefinitionError(
      'FORMAT_ARITY_MISMATCH',
      `format string has ${pieces.length - 1} placeholder(s) but ${fs.clauses.length} clause(s)`
    );
  }
  let out = pieces[0];
  for (let i = 0; i < fs.clauses.length; i++) {
    const value = resolve_clause(fs.clauses[i], ctx);
    if (value === null) return null;
    out += value + pieces[i + 1];
  }
  return out;
}
