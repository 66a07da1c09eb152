import * as readline from 'node:readline';

export interface InputHandler {
  prompt(text: string): Promise<string>;
  close(): void;
}

export interface InputHandlerOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
}

export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

interface Waiter {
  resolve(line: string): void;
  reject(error: Error): void;
}

export function createInputHandler(options: InputHandlerOptions = {}): InputHandler {
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
    terminal: options.terminal ?? process.stdin.isTTY === true,
    historySize: 100,
  });

  // Piped input can deliver several lines before the next prompt is shown
  const queued: string[] = [];
  const waiters: Waiter[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const waiter = waiters.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      queued.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const waiter of waiters.splice(0)) {
      waiter.reject(new InputClosedError());
    }
  });

  // Ctrl+C ends the session like Ctrl+D
  rl.on('SIGINT', () => {
    rl.close();
  });

  return {
    prompt(text: string): Promise<string> {
      if (closed) {
        const line = queued.shift();
        if (line === undefined) {
          return Promise.reject(new InputClosedError());
        }
        output.write(text);
        return Promise.resolve(line);
      }

      rl.setPrompt(text);
      rl.prompt();

      const line = queued.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      return new Promise((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },

    close() {
      if (!closed) rl.close();
    },
  };
}
