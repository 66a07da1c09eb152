import { z } from 'zod';
import type { CommandValidatorConfig } from './config.types';
import { VALIDATION_STRATEGIES } from '../features/commands/commands.types';
import { LOG_LEVELS } from '../shared/logger';
import { configError } from '../shared/error';

type Env = Record<string, string | undefined>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  COMMAND_VALIDATOR_STRATEGY: z.enum(VALIDATION_STRATEGIES).default('result'),
  COMMAND_VALIDATOR_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  COMMAND_VALIDATOR_BANNER: booleanFlag.default('true'),
  NO_COLOR: z.string().optional(),
});

// Empty strings count as unset
function definedOnly(env: Env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: Env = process.env): CommandValidatorConfig {
  const parsed = envSchema.safeParse(definedOnly(env));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'environment';
    throw configError(`${variable}: ${issue?.message ?? 'invalid value'}`);
  }

  const vars = parsed.data;

  return {
    strategy: vars.COMMAND_VALIDATOR_STRATEGY,
    logLevel: vars.COMMAND_VALIDATOR_LOG_LEVEL,
    output: {
      color: vars.NO_COLOR === undefined,
      banner: vars.COMMAND_VALIDATOR_BANNER,
    },
  };
}
