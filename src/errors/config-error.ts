import { TimetableError } from './timetable-error';
import { ErrorCode, ErrorContext } from './types';

export interface ConfigErrorOptions {
  code?: Extract<ErrorCode, 'CONFIG_MISSING' | 'CONFIG_INVALID'>;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * A configuration file that is missing, unparseable or fails its schema.
 */
export class ConfigError extends TimetableError {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'CONFIG_INVALID',
      category: 'config',
      context: options.context,
      cause: options.cause,
    });
  }

  static missing(requestedPath: string, resolvedPath: string): ConfigError {
    return new ConfigError(`Config file not found: ${requestedPath}`, {
      code: 'CONFIG_MISSING',
      context: { requestedPath, resolvedPath },
    });
  }

  static unparseable(configPath: string, cause: unknown): ConfigError {
    return new ConfigError(`Failed to parse config at ${configPath}`, {
      context: { source: configPath },
      cause,
    });
  }

  /**
   * @param source - label for where the values came from, e.g. `config at <path>`
   */
  static invalid(source: string, detail: string, cause?: unknown): ConfigError {
    return new ConfigError(`Invalid ${source}: ${detail}`, { context: { source }, cause });
  }
}
