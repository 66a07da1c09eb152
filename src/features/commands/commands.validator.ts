import { invalidCharacterError } from '../../shared/error';
import { failure, success, type Result } from '../../shared/result';

const COMMAND_CHARACTERS = /^[A-Za-z-]*$/;

/** True when every character is an ASCII letter or a dash. */
export function isValidCommandString(raw: string): boolean {
  return COMMAND_CHARACTERS.test(raw);
}

export function validateInput(raw: string): Result<string> {
  if (!isValidCommandString(raw)) {
    return failure(invalidCharacterError(raw));
  }
  return success(raw);
}

/** Throwing counterpart of {@link validateInput}. */
export function assertValidInput(raw: string): string {
  const result = validateInput(raw);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
