import type { ValidationIssue } from '../types/issue.type';

/**
 * Error taxonomy of the engine.
 *
 * - syntax: malformed tokens / indentation / missing `end`, raised while parsing
 * - definition: invalid program or table definitions, raised before anything runs
 * - resolution: a statement references a procedure or table that is not there
 * - collaborator: the table source, fact storage or output sink failed
 */
export type ErrorCategory = 'syntax' | 'definition' | 'resolution' | 'collaborator';

export type ErrorCode =
  | 'SYNTAX_ERROR'
  | 'DUPLICATE_PROCEDURE'
  | 'INVALID_DICE'
  | 'FORMAT_ARITY_MISMATCH'
  | 'INVALID_RANGE'
  | 'INVALID_TABLE'
  | 'PROCEDURE_NOT_FOUND'
  | 'TABLE_NOT_FOUND'
  | 'CALL_DEPTH_EXCEEDED'
  | 'STEP_LIMIT_EXCEEDED'
  | 'TABLE_SOURCE_FAILED'
  | 'FACT_STORAGE_FAILED'
  | 'OUTPUT_SINK_FAILED';

export interface ErrorDetails {
  /** 1-based source line of the statement that failed. */
  line?: number;
  column?: number;
  /** Table id, fact name or other resource involved. */
  resource?: string;
  /** Procedure names on the call stack, outermost first. */
  procedure_trace?: string[];
  issues?: ValidationIssue[];
  /** Message of the underlying collaborator failure. */
  cause?: string;
}

/** Plain, JSON-safe shape carried by run outputs. */
export interface EngineError {
  code: string;
  category: ErrorCategory;
  message: string;
  details?: ErrorDetails;
}

export abstract class CrawlError extends Error {
  abstract readonly category: ErrorCategory;
  readonly code: ErrorCode;
  details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  /** Fill in context the throw site did not know about; keys already set win. */
  annotate(extra: ErrorDetails): this {
    this.details = { ...extra, ...this.details };
    return this;
  }

  to_engine_error(): EngineError {
    return { code: this.code, category: this.category, message: this.message, details: this.details };
  }
}

export class ScriptSyntaxError extends CrawlError {
  readonly category = 'syntax' as const;

  constructor(message: string, line: number, column: number) {
    super('SYNTAX_ERROR', `${message} (line ${line}, column ${column})`, { line, column });
  }
}

export class DefinitionError extends CrawlError {
  readonly category = 'definition' as const;
}

export class ResolutionError extends CrawlError {
  readonly category = 'resolution' as const;
}

export class CollaboratorError extends CrawlError {
  readonly category = 'collaborator' as const;

  constructor(code: ErrorCode, message: string, details: ErrorDetails, cause: unknown) {
    super(code, message, { ...details, cause: describe_error(cause) }, cause);
  }
}

export function describe_error(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
