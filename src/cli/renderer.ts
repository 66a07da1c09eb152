import { colors, style, theme } from './theme';
import { buildPrompt } from '../features/commands/commands.table';
import type { CommandDefinition } from '../features/commands/commands.types';
import type { ErrorReport } from '../shared/error';

export interface Renderer {
  banner(): void;
  prompt(): string;
  action(command: CommandDefinition): void;
  farewell(command: CommandDefinition): void;
  failure(report: ErrorReport): void;
}

export interface RendererOptions {
  write?: (text: string) => void;
  color?: boolean;
}

const PROMPT = buildPrompt();

export function createRenderer(options: RendererOptions = {}): Renderer {
  const output = options.write ?? ((text: string) => { process.stdout.write(text); });
  const color = options.color ?? true;

  // Every line is followed by a blank one
  function block(text: string) {
    output(`${text}\n\n`);
  }

  function paint(text: string, ...codes: string[]): string {
    if (!color || codes.length === 0) return text;
    return `${codes.join('')}${text}${colors.reset}`;
  }

  return {
    banner() {
      block(`Welcome to the ${paint('Command Validator', style.bold, theme.primary)}!`);
    },

    prompt() {
      return paint(PROMPT, theme.prompt);
    },

    action(command: CommandDefinition) {
      block(paint(command.label, theme.success));
    },

    farewell(command: CommandDefinition) {
      block(paint(command.label, theme.success));
      block(paint('Goodbye!', theme.primary));
    },

    failure(report: ErrorReport) {
      const tag = paint(`[${report.code}]`, theme.muted);
      block(`${paint(report.label, theme.error)} ${tag}: ${report.input}`);
    },
  };
}
