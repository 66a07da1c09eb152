import { test, expect, describe } from 'vitest';
import {
  AppError,
  ErrorCodes,
  configError,
  describeError,
  invalidCharacterError,
  unrecognizedCommandError,
} from './error';

describe('error helpers', () => {
  test('invalidCharacterError carries the code and input', () => {
    const error = invalidCharacterError('12-3');
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('AppError');
    expect(error.code).toBe(ErrorCodes.INVALID_CHARACTER);
    expect(error.input).toBe('12-3');
    expect(error.message).toBe('Input may only contain letters and dashes: 12-3');
  });

  test('unrecognizedCommandError carries the code and input', () => {
    const error = unrecognizedCommandError('xyz');
    expect(error.code).toBe(ErrorCodes.UNRECOGNIZED_COMMAND);
    expect(error.input).toBe('xyz');
  });

  test('configError has no input', () => {
    const error = configError('bad');
    expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
    expect(error.input).toBe('');
  });
});

describe('describeError', () => {
  test('labels known errors and echoes the raw line', () => {
    expect(describeError(unrecognizedCommandError('xyz'), 'XYZ')).toEqual({
      code: 'UNRECOGNIZED_COMMAND',
      label: 'Unrecognized command',
      input: 'XYZ',
      expected: true,
    });
  });

  test('treats plain errors as internal', () => {
    expect(describeError(new Error('boom'), 'play')).toEqual({
      code: 'INTERNAL_ERROR',
      label: 'Unexpected error',
      input: 'play',
      expected: false,
    });
  });

  test('treats non-error values as internal', () => {
    expect(describeError('oops', 'stop').code).toBe(ErrorCodes.INTERNAL_ERROR);
  });
});
