import { issue } from '../schema';
import type { ValidationIssue, CompileInput, CompileOutput } from '../types';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';
import { NodeKind, type CompiledProgram, type Program, type ProcedureDeclNode } from '../engine/ast/nodes';
import { ScriptSyntaxError } from '../engine/errors';
import { validate_program } from '../engine/validate';
import { parse_source } from './parser';

export { tokenize, describe_token, KEYWORDS } from './lexer';
export type { Token, Keyword } from './lexer';
export { parse_source, parse_program } from './parser';

/**
 * Parse + definition checks. Nothing runs here: a program that compiles
 * can still fail at run time on missing tables or procedures.
 */
export async function compile(input: CompileInput): Promise<CompileOutput> {
  const t0 = Date.now();
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  let program: Program;
  try {
    program = parse_source(input.source);
  } catch (e) {
    if (!(e instanceof ScriptSyntaxError)) throw e;
    const line = e.details.line;
    errors.push(issue('SYNTAX_ERROR', `/lines/${line ?? 0}`, e.message, undefined, line));
    return { ok: false, program: null, program_id: null, errors, warnings, time_ms: Date.now() - t0 };
  }

  const checked = validate_program(program);
  errors.push(...checked.errors);
  // strict: warnings fail the compile too
  if (input.options?.strict) errors.push(...checked.warnings);
  else warnings.push(...checked.warnings);

  if (errors.length > 0) {
    return { ok: false, program: null, program_id: null, errors, warnings, time_ms: Date.now() - t0 };
  }

  const procedures_index: Record<string, ProcedureDeclNode> = {};
  const tables: string[] = [];
  for (const s of program.statements) {
    if (s.kind === NodeKind.ProcedureDecl) procedures_index[s.name] = s;
    if (s.kind === NodeKind.LoadTable && !tables.includes(s.table)) tables.push(s.table);
  }

  const program_id = hash_sha256(canonical_stringify({ statements: program.statements }));
  const compiled: CompiledProgram = { program_id, statements: program.statements, procedures_index, tables };

  return { ok: true, program: compiled, program_id, errors, warnings, time_ms: Date.now() - t0 };
}
