// ============================================================================
// Error Types
// ============================================================================

export type ProtectionErrorCode =
  | 'VALIDATION_ERROR'
  | 'TOOL_EXECUTION_FAILED'
  | 'TOOL_TIMEOUT'
  | 'ENVIRONMENT_ERROR';

export class ProtectionError extends Error {
  constructor(
    message: string,
    public readonly code: ProtectionErrorCode,
    public readonly httpStatus: number,
    public readonly details?: string
  ) {
    super(message);
    this.name = 'ProtectionError';
  }
}

/** Bad input; no subprocess is ever started. */
export class UploadValidationError extends ProtectionError {
  constructor(message: string, details?: string) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'UploadValidationError';
  }
}

/** The tool ran but exited non-zero or left no usable output. */
export class ToolExecutionError extends ProtectionError {
  constructor(
    message: string,
    details?: string,
    public readonly exitCode?: number | null
  ) {
    super(message, 'TOOL_EXECUTION_FAILED', 500, details);
    this.name = 'ToolExecutionError';
  }
}

export class ToolTimeoutError extends ProtectionError {
  constructor(public readonly timeoutMs: number, details?: string) {
    super(
      `Process timed out after ${Math.round(timeoutMs / 1000)} seconds`,
      'TOOL_TIMEOUT',
      500,
      details
    );
    this.name = 'ToolTimeoutError';
  }
}

/** Runtime or tool artifact missing: a deployment problem, not a bad upload. */
export class EnvironmentError extends ProtectionError {
  constructor(message: string, details?: string) {
    super(message, 'ENVIRONMENT_ERROR', 500, details);
    this.name = 'EnvironmentError';
  }
}
