/**
 * Timetable Loader Tests
 * Path sanitization, reading, parsing and validation of files on disk
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { IOError } from '../../src/errors/io-error';
import { TimetableLoader } from '../../src/loaders/timetable-loader';
import { buildTimetable, serializeTimetable } from '../../src/model/timetable-model';
import { PathTraversalError, TimetableParseError, TimetableValidationError } from '../../src/types/errors';
import { ensureDir, ensureTempDir, removeDir } from '../../src/utils/fs';
import { buildDocument, minimalDocument } from '../utils/timetable-fixtures';

describe('TimetableLoader', () => {
  let tempDir: string;
  let loader: TimetableLoader;

  beforeEach(async () => {
    tempDir = await ensureTempDir('timetable-loader-test-');
    loader = new TimetableLoader({ baseDir: tempDir });
  });

  afterEach(async () => {
    await removeDir(tempDir, { recursive: true, force: true });
  });

  async function writeTempFile(filename: string, content: string): Promise<string> {
    const target = path.join(tempDir, filename);
    await ensureDir(path.dirname(target));
    await fs.writeFile(target, content, 'utf-8');
    return target;
  }

  describe('Path Sanitization - Layer 1', () => {
    test('should resolve paths inside the base directory', () => {
      expect(loader.sanitizePath('week.json')).toBe(path.join(tempDir, 'week.json'));
      expect(loader.getBaseDir()).toBe(path.resolve(tempDir));
    });

    test('should reject paths that escape the base directory', async () => {
      expect(() => loader.sanitizePath('../outside.json')).toThrow(PathTraversalError);
      await expect(loader.load('../../etc/passwd')).rejects.toThrow(
        'Path traversal attempt detected: ../../etc/passwd'
      );
    });

    test('should reject symbolic links unless allowed', async () => {
      const real = await writeTempFile('real.json', JSON.stringify(minimalDocument()));
      await fs.symlink(real, path.join(tempDir, 'link.json'));

      await expect(loader.load('link.json')).rejects.toThrow(PathTraversalError);

      const following = new TimetableLoader({ baseDir: tempDir, followSymlinks: true });
      await expect(following.load('link.json')).resolves.toMatchObject({ result: { valid: true } });
    });
  });

  describe('Reading and parsing - Layer 2', () => {
    test('should load and validate a JSON document', async () => {
      await writeTempFile('week.json', JSON.stringify(buildDocument()));

      const loaded = await loader.load('week.json');
      expect(loaded.path).toBe('week.json');
      expect(loaded.resolvedPath).toBe(path.join(tempDir, 'week.json'));
      expect(loaded.format).toBe('json');
      expect(loaded.document).toEqual(buildDocument());
      expect(loaded.result).toEqual({ valid: true, violations: [] });
    });

    test('should load YAML documents by extension', async () => {
      const yaml = [
        'name: Grade 9A',
        'timetable:',
        '  - p1: { subject: art, room: Studio }',
        '  - {}',
        '  - {}',
        '  - {}',
        '  - {}',
        'subjects:',
        '  art: { name: Art, teacher: Teacher B }',
        'period_times:',
        '  p1: { name: Period 1, start: "0800", end: "0845" }',
      ].join('\n');
      await writeTempFile('week.yaml', yaml);

      const loaded = await loader.load('week.yaml');
      expect(loaded.format).toBe('yaml');
      expect(loaded.result.valid).toBe(true);
    });

    test('should report missing files', async () => {
      const error = await loader.load('missing.json').catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(IOError);
      expect(error).toHaveProperty('code', 'IO_NOT_FOUND');
      expect(error).toHaveProperty('message', 'File not found: missing.json');
    });

    test('should refuse directories', async () => {
      await ensureDir(path.join(tempDir, 'folder.json'));
      await expect(loader.load('folder.json')).rejects.toThrow('Not a regular file: folder.json');
    });

    test('should enforce the file size limit', async () => {
      const small = new TimetableLoader({ baseDir: tempDir, maxFileSize: 16 });
      await writeTempFile('big.json', JSON.stringify(minimalDocument()));

      const error = await small.load('big.json').catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(IOError);
      expect(error).toHaveProperty('code', 'IO_SIZE_LIMIT');
    });

    test('should surface parse failures', async () => {
      await writeTempFile('broken.json', '{"name": ');
      await expect(loader.load('broken.json')).rejects.toThrow(TimetableParseError);
    });
  });

  describe('Validation - Layer 3', () => {
    test('should return violations for invalid documents without throwing', async () => {
      await writeTempFile('short.json', JSON.stringify({ ...minimalDocument(), timetable: [{}, {}, {}, {}] }));

      const loaded = await loader.load('short.json');
      expect(loaded.result).toEqual({
        valid: false,
        violations: [
          { path: 'timetable', kind: 'ArityMismatch', message: 'Expected exactly 5 items but received 4' },
        ],
      });
    });

    test('should pass validator options through', async () => {
      const document = {
        ...minimalDocument(),
        timetable: [{ p1: { subject: 'math', room: '101' } }, {}, {}, {}, {}],
        period_times: { p1: { name: 'Period 1', start: '8:00', end: '0845' } },
      };
      await writeTempFile('loose.json', JSON.stringify(document));

      const lenient = new TimetableLoader({ baseDir: tempDir, checkReferences: false });
      const strict = new TimetableLoader({ baseDir: tempDir, checkTimeFormat: true });

      expect((await lenient.load('loose.json')).result.valid).toBe(true);
      expect((await strict.load('loose.json')).result.violations.map((violation) => violation.kind)).toEqual([
        'FormatMismatch',
        'ReferentialIntegrityError',
      ]);
    });

    test('loadTimetable should build the model', async () => {
      await writeTempFile('week.json', JSON.stringify(buildDocument()));

      const timetable = await loader.loadTimetable('week.json');
      expect(timetable.name).toBe('Grade 9A');
      expect(timetable.filename).toBe('week.json');
      expect(timetable.days[0]?.periods.get('p1')?.subject.name).toBe('Mathematics');
    });

    test('loadTimetable should throw for invalid documents', async () => {
      await writeTempFile('short.json', JSON.stringify({ ...minimalDocument(), timetable: [] }));

      const error = await loader.loadTimetable('short.json').catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(TimetableValidationError);
      expect(error).toHaveProperty('message', 'Timetable short.json failed validation with 1 violation');
      expect(error instanceof TimetableValidationError ? error.violations : []).toEqual([
        { path: 'timetable', kind: 'ArityMismatch', message: 'Expected exactly 5 items but received 0' },
      ]);
    });
  });

  describe('discover', () => {
    beforeEach(async () => {
      await writeTempFile('b.json', '{}');
      await writeTempFile('a.json', '{}');
      await writeTempFile('c.yaml', '{}');
      await writeTempFile('notes.txt', 'not a timetable');
      await writeTempFile(path.join('nested', 'd.json'), '{}');
    });

    test('should list JSON files in name order', async () => {
      await expect(loader.discover()).resolves.toEqual(['a.json', 'b.json']);
    });

    test('should include YAML files when enabled', async () => {
      const withYaml = new TimetableLoader({ baseDir: tempDir, includeYaml: true });
      await expect(withYaml.discover('.')).resolves.toEqual(['a.json', 'b.json', 'c.yaml']);
    });

    test('should return paths relative to the base directory', async () => {
      await expect(loader.discover('nested')).resolves.toEqual([path.join('nested', 'd.json')]);
    });

    test('should report missing directories', async () => {
      await expect(loader.discover('absent')).rejects.toThrow('Directory not found: absent');
    });
  });

  describe('save', () => {
    test('should write the model as indented JSON and load it back', async () => {
      const timetable = buildTimetable(buildDocument());

      const written = await loader.save(timetable, path.join('out', 'copy.json'));
      expect(written).toBe(path.join(tempDir, 'out', 'copy.json'));
      await expect(fs.readFile(written, 'utf-8')).resolves.toBe(`${serializeTimetable(timetable)}\n`);

      const reloaded = await loader.loadTimetable(path.join('out', 'copy.json'));
      expect(serializeTimetable(reloaded)).toBe(serializeTimetable(timetable));
    });

    test('should refuse to write outside the base directory', async () => {
      const timetable = buildTimetable(buildDocument());
      await expect(loader.save(timetable, '../escape.json')).rejects.toThrow(PathTraversalError);
    });
  });
});
