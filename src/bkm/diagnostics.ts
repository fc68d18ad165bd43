/**
 * Diagnostics (errors/warnings) produced by parsing/validation.
 *
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: 0-based line index (when applicable).
 */
export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'MISSING_FILE_HEADER'
  | 'MISSING_TITLE_HEADER'
  | 'ODD_INDENT'
  | 'NO_ENTRIES'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'UNTERMINATED_TITLE'
  | 'TRAILING_CONTENT'
  | 'PAGE_MISMATCH'
  | 'UNWRITABLE_VALUE';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  line?: number; // 0-based
}

export function errorDiagnostic(
  code: DiagnosticCode,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'error', code, message, line };
}

export function warningDiagnostic(
  code: DiagnosticCode,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'warning', code, message, line };
}

/**
 * Render diagnostics as `CODE@line: message`, one per line (1-based line).
 */
export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map((d) => `${d.code}${d.line !== undefined ? `@${d.line + 1}` : ''}: ${d.message}`)
    .join('\n');
}

/**
 * Thrown where a result value cannot carry the failure (ex: serializing a tree
 * that breaks the page-number invariant).
 */
export class BookmarkFormatError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(message: string, diagnostics: Diagnostic[] = []) {
    super(message);
    this.name = 'BookmarkFormatError';
    this.diagnostics = diagnostics;
  }
}
