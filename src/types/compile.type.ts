import type { CompiledProgram } from '../engine/ast/nodes';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  Compile (input / diagnostics / output)
 * ---------------------------*/

export interface CompileInput {
  /** Script text. */
  source: string;
  options?: {
    /** Upgrade warnings (undeclared procedures, unloaded tables, recursion) to errors. */
    strict?: boolean;
  };
}

export interface CompileOutput {
  /** errors is empty on success; warnings may not be. */
  ok: boolean;
  program: CompiledProgram | null;
  /** sha256:... of the canonical statement tree; null on failure. */
  program_id: string | null;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  time_ms: number;
}
