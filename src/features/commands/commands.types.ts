export type PlaybackAction = 'play' | 'pause' | 'rewind' | 'fast-forward' | 'stop' | 'quit';

export interface CommandDefinition {
  action: PlaybackAction;
  /** Full command word, lowercase. */
  word: string;
  /** Single-letter synonym for `word`. */
  abbreviation: string;
  /** Text printed when the command is recognized. */
  label: string;
  /** Ends the session once printed. */
  terminal: boolean;
}

export const VALIDATION_STRATEGIES = ['result', 'exception'] as const;

/**
 * How the validator and dispatcher report failures: `result` returns a
 * `Result` the caller inspects, `exception` throws an `AppError`.
 */
export type ValidationStrategy = typeof VALIDATION_STRATEGIES[number];
