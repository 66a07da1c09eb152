import type { LogLevel } from '../shared/logger';
import type { ValidationStrategy } from '../features/commands/commands.types';

export interface OutputConfig {
  color: boolean;
  banner: boolean;
}

export interface CommandValidatorConfig {
  strategy: ValidationStrategy;
  logLevel: LogLevel;
  output: OutputConfig;
}
