/** Problems found while compiling a script (parse + definition checks). */
export interface ValidationIssue {
  /** Machine-readable code, e.g. SYNTAX_ERROR / DUPLICATE_PROCEDURE / TABLE_NEVER_LOADED. */
  code: string;
  /** JSON-pointer style path into the program, e.g. "/statements/2/body/0/consequent". */
  path: string;
  message: string;
  hint?: string;
  /** 1-based source line. */
  line?: number;
}
