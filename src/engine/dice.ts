import type { DieSource } from '../utils/rng.util';
import { DefinitionError } from './errors';

/** `NdM+K`: roll N dice with M sides and add K (K may be negative). */
export interface RollSpecifier {
  count: number;
  sides: number;
  modifier: number;
}

export interface DiceRoll {
  /** Normalized text, e.g. "2d6+1". */
  expression: string;
  /** Individual faces in roll order. */
  rolls: number[];
  modifier: number;
  total: number;
}

export const MIN_DICE_COUNT = 1;
export const MIN_DICE_SIDES = 2;

const DICE_RE = /^(\d+)d(\d+)(?:\s*([+-])\s*(\d+))?$/i;

export function create_specifier(count: number, sides: number, modifier = 0): RollSpecifier {
  return { count, sides, modifier };
}

/** Reason the specifier cannot be rolled, or null when it is fine. */
export function specifier_issue(spec: RollSpecifier): string | null {
  if (!Number.isInteger(spec.count) || spec.count < MIN_DICE_COUNT) {
    return `dice count must be an integer >= ${MIN_DICE_COUNT}, got ${spec.count}`;
  }
  if (!Number.isInteger(spec.sides) || spec.sides < MIN_DICE_SIDES) {
    return `dice sides must be an integer >= ${MIN_DICE_SIDES}, got ${spec.sides}`;
  }
  if (!Number.isInteger(spec.modifier)) {
    return `dice modifier must be an integer, got ${spec.modifier}`;
  }
  return null;
}

export function assert_valid_specifier(spec: RollSpecifier): void {
  const problem = specifier_issue(spec);
  if (problem) {
    throw new DefinitionError('INVALID_DICE', `invalid dice '${format_specifier(spec)}': ${problem}`);
  }
}

export function format_specifier(spec: RollSpecifier): string {
  const base = `${spec.count}d${spec.sides}`;
  if (spec.modifier > 0) return `${base}+${spec.modifier}`;
  if (spec.modifier < 0) return `${base}-${-spec.modifier}`;
  return base;
}

/** Parses "2d6", "1d20+3", "3d4 - 1". Throws INVALID_DICE. */
export function parse_specifier(text: string): RollSpecifier {
  const m = DICE_RE.exec(text.trim());
  if (!m) {
    throw new DefinitionError('INVALID_DICE', `'${text}' is not a dice expression (expected NdM, NdM+K or NdM-K)`);
  }
  const magnitude = m[4] === undefined ? 0 : Number(m[4]);
  const spec = create_specifier(Number(m[1]), Number(m[2]), m[3] === '-' ? -magnitude : magnitude);
  assert_valid_specifier(spec);
  return spec;
}

/** Smallest and largest totals the specifier can produce. */
export function specifier_bounds(spec: RollSpecifier): { min: number; max: number } {
  return {
    min: spec.count + spec.modifier,
    max: spec.count * spec.sides + spec.modifier,
  };
}

export function roll_dice(spec: RollSpecifier, source: DieSource): DiceRoll {
  assert_valid_specifier(spec);
  const rolls: number[] = [];
  for (let i = 0; i < spec.count; i++) rolls.push(source.next_face(spec.sides));
  const total = rolls.reduce((sum, face) => sum + face, 0) + spec.modifier;
  return { expression: format_specifier(spec), rolls, modifier: spec.modifier, total };
}
