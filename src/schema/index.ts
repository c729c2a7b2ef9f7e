import type { ValidationIssue } from '../types';

export * from './table.schema';
export * from './facts.schema';
export * from './config.schema';

/** Builds a ValidationIssue; shared by the compiler and the definition checks. */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string,
  line?: number
): ValidationIssue {
  const out: ValidationIssue = { code, path, message };
  if (hint !== undefined) out.hint = hint;
  if (line !== undefined) out.line = line;
  return out;
}
