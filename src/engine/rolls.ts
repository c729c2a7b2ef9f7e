/** A single value (`3`) or an inclusive range (`1-3`) a roll total can land on. */
export type RollTarget =
  | { kind: 'value'; value: number }
  | { kind: 'range'; min: number; max: number };

export function value_target(value: number): RollTarget {
  return { kind: 'value', value };
}

export function range_target(min: number, max: number): RollTarget {
  return { kind: 'range', min, max };
}

export function target_contains(target: RollTarget, total: number): boolean {
  return target.kind === 'value'
    ? target.value === total
    : target.min <= total && total <= target.max;
}

/** Largest total the target accepts. */
export function target_upper(target: RollTarget): number {
  return target.kind === 'value' ? target.value : target.max;
}

/**
 * First item (in declaration order) whose target contains `total`.
 * Overlaps are allowed; earlier items shadow later ones.
 */
export function first_match<T extends { target: RollTarget }>(
  items: readonly T[],
  total: number
): { item: T; index: number } | null {
  for (let index = 0; index < items.length; index++) {
    const item = items[index];
    if (target_contains(item.target, total)) return { item, index };
  }
  return null;
}

export function format_target(target: RollTarget): string {
  return target.kind === 'value' ? String(target.value) : `${target.min}-${target.max}`;
}

const TARGET_RE = /^(\d+)(?:\s*-\s*(\d+))?$/;

/** `"4"` → value, `"2-5"` → range, anything else → null. */
export function parse_roll_target(text: string): RollTarget | null {
  const m = TARGET_RE.exec(text.trim());
  if (!m) return null;
  const first = Number(m[1]);
  return m[2] === undefined ? value_target(first) : range_target(first, Number(m[2]));
}
