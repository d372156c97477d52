/**
 * Typed errors for the filter run.
 *
 * Every fatal condition carries the process exit code the CLI reports.
 * Per-row oddities (short rows, blank cells) are never errors.
 */

export class AppError extends Error {
  public readonly exitCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  constructor(exitCode: number, message: string, code: string = 'UNKNOWN_ERROR', isOperational: boolean = true) {
    super(message);
    this.exitCode = exitCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// EXIT 2 — INVALID ARGUMENTS
// ============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}
export class ValidationError extends AppError {
  public readonly details: ValidationIssue[];
  constructor(message: string, details: ValidationIssue[] = []) {
    super(2, message, 'VALIDATION_ERROR');
    this.details = details;
  }
}

// ============================================================================
// EXIT 1 — INPUT PRECONDITIONS
// ============================================================================

export class MissingColumnError extends AppError {
  public readonly column: string;
  constructor(column: string) {
    super(1, `Column '${column}' not found in CSV header.`, 'MISSING_COLUMN');
    this.column = column;
  }
}
export class DateColumnsNotFoundError extends AppError {
  constructor() {
    super(1, 'Could not locate date columns in CSV header.', 'DATE_COLUMNS_NOT_FOUND');
  }
}
export class EmptyInputError extends AppError {
  constructor(filePath: string) {
    super(1, `Input file "${filePath}" has no header row.`, 'EMPTY_INPUT');
  }
}
export class MalformedCsvError extends AppError {
  constructor(filePath: string, reason: string) {
    super(1, `Input file "${filePath}" is not readable as CSV: ${reason}`, 'MALFORMED_CSV');
  }
}

// ============================================================================
// EXIT 1 — FILE SYSTEM
// ============================================================================

export type FileAction = 'read' | 'write';
export class FileAccessError extends AppError {
  public readonly filePath: string;
  public readonly fsCode: string;
  constructor(action: FileAction, filePath: string, fsCode: string) {
    super(1, `Cannot ${action} file "${filePath}" (${fsCode})`, 'FILE_ACCESS');
    this.filePath = filePath;
    this.fsCode = fsCode;
  }
}

// ============================================================================
// EXIT 1 — INTERNAL
// ============================================================================

export class InternalError extends AppError {
  constructor(message: string = 'An unexpected error occurred') {
    super(1, message, 'INTERNAL_ERROR', false);
  }
}

// ============================================================================
// FS ERROR MAPPER
// ============================================================================

/**
 * Maps Node fs failures to typed AppErrors.
 * Call this in repository catch blocks.
 */
export function mapFsError(error: unknown, action: FileAction, filePath: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (code) {
    return new FileAccessError(action, filePath, code);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(`Failed to ${action} "${filePath}": ${message}`);
}
