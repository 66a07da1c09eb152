import type { CommandDefinition, ValidationStrategy } from './commands.types';
import { assertValidInput, validateInput } from './commands.validator';
import { normalizeCommand } from './commands.normalizer';
import { dispatchCommand, resolveCommand } from './commands.dispatcher';
import { success, type Result } from '../../shared/result';

/**
 * Turns one raw line into a command. Under the `exception` strategy the
 * returned result is always a success and failures are thrown instead.
 */
export type Interpreter = (raw: string) => Result<Readonly<CommandDefinition>>;

function interpretWithResults(raw: string): Result<Readonly<CommandDefinition>> {
  const validated = validateInput(raw);
  if (!validated.success) {
    return validated;
  }
  return dispatchCommand(normalizeCommand(validated.data), raw);
}

function interpretWithExceptions(raw: string): Result<Readonly<CommandDefinition>> {
  const validated = assertValidInput(raw);
  return success(resolveCommand(normalizeCommand(validated), raw));
}

export function createInterpreter(strategy: ValidationStrategy): Interpreter {
  switch (strategy) {
    case 'result':
      return interpretWithResults;
    case 'exception':
      return interpretWithExceptions;
  }
}
