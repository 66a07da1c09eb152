import type { CommandDefinition } from './commands.types';
import { findCommand } from './commands.table';
import { unrecognizedCommandError } from '../../shared/error';
import { failure, success, type Result } from '../../shared/result';

// Expects input already validated and normalized. `raw` is the line as
// typed, carried on the error.
export function dispatchCommand(
  normalized: string,
  raw: string = normalized,
): Result<Readonly<CommandDefinition>> {
  const definition = findCommand(normalized);
  if (!definition) {
    return failure(unrecognizedCommandError(raw));
  }
  return success(definition);
}

export function resolveCommand(normalized: string, raw: string = normalized): Readonly<CommandDefinition> {
  const result = dispatchCommand(normalized, raw);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
