import { test, expect, describe } from 'vitest';
import { createRenderer } from './renderer';
import { colors, style, theme } from './theme';
import { findCommand } from '../features/commands/commands.table';
import { describeError, invalidCharacterError } from '../shared/error';

function capture() {
  const chunks: string[] = [];
  return {
    write: (text: string) => { chunks.push(text); },
    text: () => chunks.join(''),
  };
}

function command(token: string) {
  const definition = findCommand(token);
  if (!definition) throw new Error(`no command for ${token}`);
  return definition;
}

describe('renderer without color', () => {
  test('banner', () => {
    const out = capture();
    createRenderer({ write: out.write, color: false }).banner();
    expect(out.text()).toBe('Welcome to the Command Validator!\n\n');
  });

  test('prompt', () => {
    const renderer = createRenderer({ write: capture().write, color: false });
    expect(renderer.prompt()).toBe('P)lay, pA)use, R)ewind, F)ast-forward, S)top, or Q)uit?: ');
  });

  test.each([
    ['p', 'play\n\n'],
    ['a', 'pause\n\n'],
    ['r', 'rewind\n\n'],
    ['f', 'fast-Forward\n\n'],
    ['s', 'stop\n\n'],
  ])('action %s', (token, expected) => {
    const out = capture();
    createRenderer({ write: out.write, color: false }).action(command(token));
    expect(out.text()).toBe(expected);
  });

  test('farewell', () => {
    const out = capture();
    createRenderer({ write: out.write, color: false }).farewell(command('q'));
    expect(out.text()).toBe('quit\n\nGoodbye!\n\n');
  });

  test('failure is tagged with the error kind and input', () => {
    const out = capture();
    const report = describeError(invalidCharacterError('12-3'), '12-3');
    createRenderer({ write: out.write, color: false }).failure(report);
    expect(out.text()).toBe('Bad string [INVALID_CHARACTER]: 12-3\n\n');
  });
});

describe('renderer with color', () => {
  test('wraps the action in the success color', () => {
    const out = capture();
    createRenderer({ write: out.write, color: true }).action(command('play'));
    expect(out.text()).toBe(`${theme.success}play${colors.reset}\n\n`);
  });

  test('highlights the program name in the banner', () => {
    const out = capture();
    createRenderer({ write: out.write, color: true }).banner();
    expect(out.text()).toBe(
      `Welcome to the ${style.bold}${theme.primary}Command Validator${colors.reset}!\n\n`,
    );
  });

  test('colors the farewell', () => {
    const out = capture();
    createRenderer({ write: out.write, color: true }).farewell(command('q'));
    expect(out.text()).toBe(
      `${theme.success}quit${colors.reset}\n\n${theme.primary}Goodbye!${colors.reset}\n\n`,
    );
  });

  test('colors the failure label and mutes the error code', () => {
    const out = capture();
    const report = describeError(invalidCharacterError('12-3'), '12-3');
    createRenderer({ write: out.write, color: true }).failure(report);
    expect(out.text()).toBe(
      `${theme.error}Bad string${colors.reset} ${theme.muted}[INVALID_CHARACTER]${colors.reset}: 12-3\n\n`,
    );
  });

  test('colors the prompt', () => {
    const renderer = createRenderer({ write: capture().write });
    expect(renderer.prompt().startsWith(theme.prompt)).toBe(true);
    expect(renderer.prompt().endsWith(colors.reset)).toBe(true);
  });
});
