#!/usr/bin/env node

/**
 * timetable-validate
 *
 * Validates timetable files and reports every violation found.
 *
 * Usage:
 *   timetable-validate [options] [paths...]
 *
 * Paths may be files or directories; directories are searched for timetable
 * files (not recursively). Without paths, the configured data directory is
 * used.
 *
 * Exit codes: 0 all valid, 1 at least one invalid document, 2 a file or the
 * configuration could not be read.
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { loadConfig, mergeConfig, TimetableConfig } from '../config';
import { ErrorHandler } from '../errors/handler';
import { ErrorLogger } from '../errors/logger';
import { IOError } from '../errors/io-error';
import { TimetableLoader } from '../loaders/timetable-loader';
import { formatViolations, summarizeResult, ValidationSummary } from '../validation/report';
import { sanitize } from '../validation/middleware';

export const VERSION = '1.0.0';

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_ERROR = 2;

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  cwd: string;
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  cwd: process.cwd(),
};

const CliOptionsSchema = z.object({
  json: z.boolean().default(false),
  references: z.boolean().default(true),
  timeFormat: z.boolean().default(false),
  yaml: z.boolean().default(false),
  verbose: z.boolean().default(false),
  config: z.string().min(1).optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

interface FailedSource {
  source: string;
  error: { code: string; message: string };
}

type Outcome = { kind: 'checked'; summary: ValidationSummary } | { kind: 'failed'; failure: FailedSource };

function settingsFrom(options: CliOptions, base: TimetableConfig): TimetableConfig {
  return mergeConfig(base, {
    checkReferences: options.references ? undefined : false,
    checkTimeFormat: options.timeFormat ? true : undefined,
    includeYaml: options.yaml ? true : undefined,
  });
}

function loaderFor(baseDir: string, settings: TimetableConfig): TimetableLoader {
  return new TimetableLoader({
    baseDir,
    maxFileSize: settings.maxFileSize,
    includeYaml: settings.includeYaml,
    checkReferences: settings.checkReferences,
    checkTimeFormat: settings.checkTimeFormat,
  });
}

class ValidationRun {
  readonly outcomes: Outcome[] = [];
  private readonly logger: ErrorLogger;

  constructor(
    private readonly io: CliIO,
    private readonly options: CliOptions,
    private readonly settings: TimetableConfig
  ) {
    this.logger = new ErrorLogger({ warn: io.stderr, error: io.stderr });
  }

  fail(source: string, error: unknown): void {
    const context = { module: 'cli', data: { source } };
    const wrapped = this.options.verbose
      ? ErrorHandler.handle(error, 'cli.validate', context, { rethrow: false, logger: this.logger })
      : ErrorHandler.wrap(error, 'cli.validate', context);
    const publicError = ErrorHandler.toPublicError(wrapped);
    this.outcomes.push({
      kind: 'failed',
      failure: { source, error: { code: publicError.code, message: publicError.message } },
    });
    if (!this.options.json) {
      this.io.stderr(`ERROR ${source}: ${publicError.message}`);
    }
  }

  private record(source: string, summary: ValidationSummary, lines: string[]): void {
    this.outcomes.push({ kind: 'checked', summary });
    if (this.options.json) {
      return;
    }
    if (summary.valid) {
      this.io.stdout(`PASS ${source}`);
      return;
    }
    const noun = summary.violationCount === 1 ? 'violation' : 'violations';
    this.io.stdout(`FAIL ${source} (${summary.violationCount} ${noun})`);
    for (const line of lines) {
      this.io.stdout(`  ${line}`);
    }
  }

  private async checkFile(loader: TimetableLoader, relativePath: string, display: string): Promise<void> {
    try {
      const loaded = await loader.load(relativePath);
      this.record(display, summarizeResult(display, loaded.result), formatViolations(loaded.result));
    } catch (error) {
      this.fail(display, error);
    }
  }

  async checkTarget(target: string): Promise<void> {
    const resolved = path.resolve(this.io.cwd, target);
    let stats: Stats;
    try {
      stats = await fs.stat(resolved);
    } catch (error) {
      this.fail(target, IOError.notFound('Path', target, resolved, error));
      return;
    }

    if (!stats.isDirectory()) {
      const loader = loaderFor(path.dirname(resolved), this.settings);
      await this.checkFile(loader, path.basename(resolved), target);
      return;
    }

    const loader = loaderFor(resolved, this.settings);
    let files: string[];
    try {
      files = await loader.discover('.');
    } catch (error) {
      this.fail(target, error);
      return;
    }
    if (files.length === 0 && !this.options.json) {
      this.io.stderr(`No timetable files found in ${target}`);
    }
    for (const file of files) {
      await this.checkFile(loader, file, path.join(target, file));
    }
  }

  exitCode(): number {
    if (this.outcomes.some((outcome) => outcome.kind === 'failed')) {
      return EXIT_ERROR;
    }
    if (this.outcomes.some((outcome) => outcome.kind === 'checked' && !outcome.summary.valid)) {
      return EXIT_INVALID;
    }
    return EXIT_VALID;
  }

  report(): void {
    if (this.options.json) {
      const entries = this.outcomes.map((outcome) =>
        outcome.kind === 'checked' ? outcome.summary : outcome.failure
      );
      this.io.stdout(JSON.stringify(entries, null, 2));
      return;
    }
    const checked = this.outcomes.filter((outcome) => outcome.kind === 'checked');
    const valid = checked.filter((outcome) => outcome.kind === 'checked' && outcome.summary.valid).length;
    const failed = this.outcomes.length - checked.length;
    this.io.stdout(
      `${this.outcomes.length} checked: ${valid} valid, ${checked.length - valid} invalid, ${failed} unreadable`
    );
  }
}

/**
 * Validate the given paths and print the results.
 *
 * @returns the process exit code
 */
export async function runValidation(paths: readonly string[], rawOptions: unknown, io: CliIO = defaultIO): Promise<number> {
  const options = await sanitize(rawOptions, CliOptionsSchema);

  let settings: TimetableConfig;
  let targets: readonly string[] = paths;
  try {
    const loaded = await loadConfig({ cwd: io.cwd, configPath: options.config });
    settings = settingsFrom(options, loaded.config);
    if (targets.length === 0) {
      targets = [path.relative(io.cwd, path.resolve(loaded.baseDir, settings.dataDir)) || '.'];
    }
  } catch (error) {
    const wrapped = ErrorHandler.wrap(error, 'cli.config', { module: 'cli' });
    io.stderr(`ERROR ${ErrorHandler.toPublicError(wrapped).message}`);
    return EXIT_ERROR;
  }

  const run = new ValidationRun(io, options, settings);
  for (const target of targets) {
    await run.checkTarget(target);
  }
  run.report();
  return run.exitCode();
}

export function createProgram(io: CliIO = defaultIO, onExit: (code: number) => void = () => undefined): Command {
  const program = new Command();

  program
    .name('timetable-validate')
    .description('Validate school timetable documents')
    .version(VERSION)
    .argument('[paths...]', 'timetable files or directories to check')
    .option('--json', 'print a JSON report instead of text')
    .option('--no-references', 'do not check that period subjects exist in subjects')
    .option('--time-format', 'require period start/end times in 24-hour HHMM form')
    .option('--yaml', 'also pick up .yaml/.yml files when scanning directories')
    .option('--verbose', 'log structured error records to stderr')
    .option('-c, --config <file>', 'configuration file to use instead of the search path')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action(async (paths: string[], options: unknown) => {
      onExit(await runValidation(paths, options, io));
    });

  return program;
}

/**
 * Parse command-line arguments (without the node and script entries) and run.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let exitCode = EXIT_VALID;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_VALID : EXIT_ERROR;
    }
    throw error;
  }
  return exitCode;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const wrapped = ErrorHandler.handle(error, 'cli.unhandled', { module: 'cli' }, { rethrow: false });
      console.error(`[FATAL] ${ErrorHandler.toPublicError(wrapped).message}`);
      process.exitCode = EXIT_ERROR;
    });
}
