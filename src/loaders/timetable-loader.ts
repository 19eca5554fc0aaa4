/**
 * Timetable Loader
 *
 * Reads timetable files from inside a base directory:
 *
 * Layer 1: Path Sanitization - files must resolve inside `baseDir`
 * Layer 2: Parsing - JSON or YAML text to a generic value tree
 * Layer 3: Validation - the tree is checked against the timetable schema
 *
 * @module loaders/timetable-loader
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { IOError } from '../errors/io-error';
import { buildTimetable, serializeTimetable } from '../model/timetable-model';
import { PathTraversalError, TimetableValidationError } from '../types/errors';
import { Timetable } from '../types/timetable';
import { ValidationResult, ValidatorOptions } from '../types/validation';
import { pathExists, writeFileAtomic } from '../utils/fs';
import {
  DEFAULT_MAX_CONTENT_SIZE,
  DocumentFormat,
  formatForPath,
  parseTimetableDocument,
} from '../validation/common';
import { TimetableValidator } from '../validation/timetable-validator';

export interface TimetableLoaderOptions extends ValidatorOptions {
  /**
   * Base directory for all file operations
   * All loaded files must be within this directory
   */
  baseDir: string;

  /**
   * Whether to follow symbolic links (default: false)
   */
  followSymlinks?: boolean;

  /**
   * Maximum file size in bytes (default: 1MB)
   */
  maxFileSize?: number;

  /**
   * Whether discover() also lists .yaml/.yml files (default: false)
   */
  includeYaml?: boolean;
}

export interface LoadedDocument {
  /** Path as requested, relative to the base directory when it was relative */
  readonly path: string;
  readonly resolvedPath: string;
  readonly format: DocumentFormat;
  readonly document: unknown;
  readonly result: ValidationResult;
}

export class TimetableLoader {
  private readonly baseDir: string;
  private readonly followSymlinks: boolean;
  private readonly maxFileSize: number;
  private readonly includeYaml: boolean;
  private readonly validator: TimetableValidator;

  constructor(options: TimetableLoaderOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.followSymlinks = options.followSymlinks ?? false;
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_CONTENT_SIZE;
    this.includeYaml = options.includeYaml ?? false;
    this.validator = new TimetableValidator({
      checkReferences: options.checkReferences,
      checkTimeFormat: options.checkTimeFormat,
    });
  }

  /**
   * Layer 1: Path Sanitization
   *
   * @param filePath - Relative or absolute file path
   * @returns Sanitized absolute path
   * @throws PathTraversalError if path escapes base directory
   */
  sanitizePath(filePath: string): string {
    const resolvedPath = path.resolve(this.baseDir, filePath);
    const relativePath = path.relative(this.baseDir, resolvedPath);

    if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
      throw new PathTraversalError(filePath);
    }

    return resolvedPath;
  }

  private async readText(filePath: string, resolvedPath: string): Promise<string> {
    if (!(await pathExists(resolvedPath))) {
      throw IOError.notFound('File', filePath, resolvedPath);
    }

    // lstat so symlinks are seen rather than followed
    const stats = await fs.lstat(resolvedPath);

    if (stats.isSymbolicLink() && !this.followSymlinks) {
      throw new PathTraversalError(`Symbolic links not allowed: ${filePath}`);
    }

    const target = stats.isSymbolicLink() ? await fs.stat(resolvedPath) : stats;
    if (!target.isFile()) {
      throw IOError.notRegularFile(filePath, resolvedPath);
    }

    if (target.size > this.maxFileSize) {
      throw IOError.tooLarge(resolvedPath, target.size, this.maxFileSize);
    }

    return fs.readFile(resolvedPath, 'utf-8');
  }

  /**
   * Read, parse and validate one file.
   *
   * @throws PathTraversalError, IOError, TimetableParseError
   */
  async load(filePath: string): Promise<LoadedDocument> {
    const resolvedPath = this.sanitizePath(filePath);
    const content = await this.readText(filePath, resolvedPath);
    const format = formatForPath(resolvedPath) ?? 'json';

    const document = parseTimetableDocument(content, {
      format,
      maxSize: this.maxFileSize,
      source: filePath,
    });

    return {
      path: filePath,
      resolvedPath,
      format,
      document,
      result: this.validator.validate(document),
    };
  }

  /**
   * Load a file and resolve it into a timetable model.
   *
   * @throws TimetableValidationError when the document is invalid
   */
  async loadTimetable(filePath: string): Promise<Timetable> {
    const loaded = await this.load(filePath);
    if (!loaded.result.valid) {
      throw new TimetableValidationError(filePath, loaded.result.violations, {
        resolvedPath: loaded.resolvedPath,
      });
    }
    return buildTimetable(loaded.document, { filename: filePath, validator: this.validator });
  }

  /**
   * List timetable files directly inside a directory, sorted by name.
   *
   * @param directory - Directory relative to the base directory
   * @returns Paths relative to the base directory
   */
  async discover(directory: string = '.'): Promise<string[]> {
    const resolvedDir = this.sanitizePath(directory);
    if (!(await pathExists(resolvedDir))) {
      throw IOError.notFound('Directory', directory, resolvedDir);
    }

    const entries = await fs.readdir(resolvedDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() || (this.followSymlinks && entry.isSymbolicLink()))
      .map((entry) => entry.name)
      .filter((name) => {
        const format = formatForPath(name);
        return format === 'json' || (this.includeYaml && format === 'yaml');
      })
      .sort()
      .map((name) => path.relative(this.baseDir, path.join(resolvedDir, name)));
  }

  /**
   * Write a model to disk in the JSON file layout
   */
  async save(timetable: Timetable, filePath: string): Promise<string> {
    const resolvedPath = this.sanitizePath(filePath);
    await writeFileAtomic(resolvedPath, `${serializeTimetable(timetable)}\n`, { encoding: 'utf-8' });
    return resolvedPath;
  }

  getBaseDir(): string {
    return this.baseDir;
  }
}
