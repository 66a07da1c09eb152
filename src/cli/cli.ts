import { loadConfig } from '../config/config';
import type { CommandValidatorConfig } from '../config/config.types';
import { createInterpreter } from '../features/commands/commands.interpreter';
import { createLogger } from '../shared/logger';
import { createRenderer } from './renderer';
import { createInputHandler } from './input';
import { createCommandLoop } from './loop';

async function main() {
  let config: CommandValidatorConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Failed to load configuration: ${message}`);
    process.exit(1);
  }

  const logger = createLogger({ level: config.logLevel });
  const renderer = createRenderer({ color: config.output.color });
  const input = createInputHandler();

  if (config.output.banner) {
    renderer.banner();
  }
  logger.debug(`using ${config.strategy} strategy`);

  const loop = createCommandLoop({
    input,
    renderer,
    interpreter: createInterpreter(config.strategy),
    logger,
  });

  await loop.run();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
