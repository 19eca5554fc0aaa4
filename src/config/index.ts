import { promises as fs } from 'fs';
import path from 'path';
import * as YAML from 'yaml';
import { ConfigError } from '../errors/config-error';
import { pathExists } from '../utils/fs';
import { normalizeValidationError } from '../validation/errors';
import { sanitize } from '../validation/middleware';
import {
  TimetableConfig,
  TimetableConfigInput,
  TimetableConfigSchema,
} from '../validation/schemas/config-schema';

export type { TimetableConfig, TimetableConfigInput } from '../validation/schemas/config-schema';

/**
 * Configuration file paths to search (in order)
 */
export const CONFIG_PATHS = [
  '.timetable/config.yml',
  '.timetable/config.yaml',
  'timetable.config.yml',
  'timetable.config.yaml',
] as const;

export interface LoadedConfig {
  readonly config: TimetableConfig;
  /** Absolute path of the file read, or null when defaults were used */
  readonly source: string | null;
  /** Directory `dataDir` resolves against: the explicit file's folder, else cwd */
  readonly baseDir: string;
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): TimetableConfig {
  return TimetableConfigSchema.parse({});
}

/**
 * Validate a raw configuration value and fill in defaults.
 *
 * @throws ConfigError with code CONFIG_INVALID
 */
export async function resolveConfig(
  raw: unknown,
  source = 'configuration'
): Promise<TimetableConfig> {
  const value = raw === null || raw === undefined ? {} : raw;
  try {
    return await sanitize(value, TimetableConfigSchema);
  } catch (error) {
    const normalized = normalizeValidationError(error);
    throw ConfigError.invalid(source, normalized.message, normalized);
  }
}

async function readConfigFile(configPath: string): Promise<TimetableConfig> {
  const content = await fs.readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw ConfigError.unparseable(configPath, error);
  }
  return resolveConfig(parsed, `config at ${configPath}`);
}

/**
 * Load configuration from an explicit file, or from the first file found
 * in CONFIG_PATHS under `cwd`, falling back to defaults.
 */
export async function loadConfig(
  options: { cwd?: string; configPath?: string } = {}
): Promise<LoadedConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    const explicit = path.resolve(cwd, options.configPath);
    if (!(await pathExists(explicit))) {
      throw ConfigError.missing(options.configPath, explicit);
    }
    return { config: await readConfigFile(explicit), source: explicit, baseDir: path.dirname(explicit) };
  }

  for (const candidate of CONFIG_PATHS) {
    const configPath = path.resolve(cwd, candidate);
    if (await pathExists(configPath)) {
      return { config: await readConfigFile(configPath), source: configPath, baseDir: cwd };
    }
  }

  return { config: getDefaultConfig(), source: null, baseDir: cwd };
}

/**
 * Overlay explicit settings (e.g. command-line flags) on a loaded config
 */
export function mergeConfig(
  base: TimetableConfig,
  override: Partial<TimetableConfigInput>
): TimetableConfig {
  return {
    dataDir: override.dataDir ?? base.dataDir,
    checkReferences: override.checkReferences ?? base.checkReferences,
    checkTimeFormat: override.checkTimeFormat ?? base.checkTimeFormat,
    maxFileSize: override.maxFileSize ?? base.maxFileSize,
    includeYaml: override.includeYaml ?? base.includeYaml,
  };
}
