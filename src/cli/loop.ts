import { InputClosedError, type InputHandler } from './input';
import type { Renderer } from './renderer';
import type { Interpreter } from '../features/commands/commands.interpreter';
import type { Logger } from '../shared/logger';
import { describeError } from '../shared/error';

export const LOOP_STATE = {
  AWAITING_INPUT: 'awaiting-input',
  DISPATCHING: 'dispatching',
  TERMINATED: 'terminated',
} as const;

export type LoopState = typeof LOOP_STATE[keyof typeof LOOP_STATE];

export const COMMAND_RESULT = {
  CONTINUE: 'continue',
  QUIT: 'quit',
} as const;

export type CommandResult = typeof COMMAND_RESULT[keyof typeof COMMAND_RESULT];

export interface CommandLoopOptions {
  input: InputHandler;
  renderer: Renderer;
  interpreter: Interpreter;
  logger: Logger;
  exit?: (code: number) => void;
}

export interface CommandLoop {
  readonly state: LoopState;
  handleLine(raw: string): CommandResult;
  run(): Promise<void>;
}

export function createCommandLoop(options: CommandLoopOptions): CommandLoop {
  const { input, renderer, interpreter, logger } = options;
  const exit = options.exit ?? ((code: number) => { process.exit(code); });
  let state: LoopState = LOOP_STATE.AWAITING_INPUT;

  function report(error: unknown, raw: string) {
    const details = describeError(error, raw);
    if (details.expected) {
      logger.info(`rejected input (${details.code})`, { input: raw });
    } else {
      logger.error('unexpected failure while dispatching', error);
    }
    renderer.failure(details);
  }

  function dispatch(raw: string): CommandResult {
    const result = interpreter(raw);
    if (!result.success) {
      report(result.error, raw);
      return COMMAND_RESULT.CONTINUE;
    }

    const command = result.data;
    logger.debug(`dispatched ${command.action}`, { input: raw });

    if (command.terminal) {
      renderer.farewell(command);
      state = LOOP_STATE.TERMINATED;
      return COMMAND_RESULT.QUIT;
    }

    renderer.action(command);
    return COMMAND_RESULT.CONTINUE;
  }

  function handleLine(raw: string): CommandResult {
    if (state === LOOP_STATE.TERMINATED) return COMMAND_RESULT.QUIT;
    if (!raw) return COMMAND_RESULT.CONTINUE;

    state = LOOP_STATE.DISPATCHING;
    try {
      return dispatch(raw);
    } catch (error) {
      // Thrown failures from the exception strategy land here too
      report(error, raw);
      return COMMAND_RESULT.CONTINUE;
    } finally {
      if (state === LOOP_STATE.DISPATCHING) {
        state = LOOP_STATE.AWAITING_INPUT;
      }
    }
  }

  return {
    get state() {
      return state;
    },

    handleLine,

    async run() {
      while (state !== LOOP_STATE.TERMINATED) {
        let line: string;
        try {
          line = await input.prompt(renderer.prompt());
        } catch (error) {
          if (!(error instanceof InputClosedError)) throw error;
          // EOF or input closed (e.g. Ctrl+D)
          logger.debug('input closed');
          state = LOOP_STATE.TERMINATED;
          break;
        }

        if (handleLine(line) === COMMAND_RESULT.QUIT) {
          input.close();
          exit(0);
          return;
        }
      }

      input.close();
    },
  };
}
