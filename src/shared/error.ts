// Error codes for the application
export const ErrorCodes = {
  // Input errors
  INVALID_CHARACTER: 'INVALID_CHARACTER',
  UNRECOGNIZED_COMMAND: 'UNRECOGNIZED_COMMAND',

  // Startup errors
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Anything we did not anticipate
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// Human-readable label printed in front of each error kind
export const ERROR_LABELS: Record<ErrorCode, string> = {
  INVALID_CHARACTER: 'Bad string',
  UNRECOGNIZED_COMMAND: 'Unrecognized command',
  INVALID_CONFIG: 'Invalid configuration',
  INTERNAL_ERROR: 'Unexpected error',
};

// Application error class
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public input: string = ''
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// Helper to create invalid character errors
export function invalidCharacterError(input: string): AppError {
  return new AppError(
    `Input may only contain letters and dashes: ${input}`,
    ErrorCodes.INVALID_CHARACTER,
    input
  );
}

// Helper to create unrecognized command errors
export function unrecognizedCommandError(input: string): AppError {
  return new AppError(`No command matches: ${input}`, ErrorCodes.UNRECOGNIZED_COMMAND, input);
}

// Helper to create configuration errors
export function configError(message: string): AppError {
  return new AppError(message, ErrorCodes.INVALID_CONFIG);
}

export interface ErrorReport {
  code: ErrorCode;
  label: string;
  input: string;
  expected: boolean;
}

// Global error handler - transforms any thrown value into a printable report.
// `input` is the line as the user typed it, echoed back unchanged.
export function describeError(error: unknown, input: string): ErrorReport {
  if (error instanceof AppError) {
    return {
      code: error.code,
      label: ERROR_LABELS[error.code],
      input,
      expected: error.code !== ErrorCodes.INTERNAL_ERROR,
    };
  }

  return {
    code: ErrorCodes.INTERNAL_ERROR,
    label: ERROR_LABELS.INTERNAL_ERROR,
    input,
    expected: false,
  };
}
