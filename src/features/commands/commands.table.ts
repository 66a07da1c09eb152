import type { CommandDefinition } from './commands.types';

function define(definition: CommandDefinition): Readonly<CommandDefinition> {
  return Object.freeze(definition);
}

// Order is match precedence
export const COMMAND_TABLE: readonly Readonly<CommandDefinition>[] = Object.freeze([
  define({
    action: 'play',
    word: 'play',
    abbreviation: 'p',
    label: 'play',
    terminal: false,
  }),
  define({
    action: 'pause',
    word: 'pause',
    abbreviation: 'a',
    label: 'pause',
    terminal: false,
  }),
  define({
    action: 'rewind',
    word: 'rewind',
    abbreviation: 'r',
    label: 'rewind',
    terminal: false,
  }),
  define({
    action: 'fast-forward',
    word: 'fast-forward',
    abbreviation: 'f',
    label: 'fast-Forward',
    terminal: false,
  }),
  define({
    action: 'stop',
    word: 'stop',
    abbreviation: 's',
    label: 'stop',
    terminal: false,
  }),
  define({
    action: 'quit',
    word: 'quit',
    abbreviation: 'q',
    label: 'quit',
    terminal: true,
  }),
]);

export function getAllCommandStrings(definition: CommandDefinition): string[] {
  return [definition.word, definition.abbreviation];
}

export function findCommand(token: string): Readonly<CommandDefinition> | undefined {
  return COMMAND_TABLE.find((definition) => getAllCommandStrings(definition).includes(token));
}

/** Builds the prompt from the table, marking each abbreviation with `)`. */
export function buildPrompt(): string {
  const parts = COMMAND_TABLE.map((definition) => {
    const { word, abbreviation } = definition;
    const index = word.indexOf(abbreviation);
    return word.slice(0, index) + abbreviation.toUpperCase() + ')' + word.slice(index + 1);
  });
  const last = parts.pop() ?? '';
  return `${parts.join(', ')}, or ${last}?: `;
}
