import { promises as fs, constants } from 'fs';
import type { PathLike, RmOptions, WriteFileOptions } from 'fs';
import crypto from 'crypto';
import os from 'os';
import path from 'path';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function pathExists(targetPath: PathLike): Promise<boolean> {
  try {
    await fs.access(targetPath, constants.F_OK);
    return true;
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

export async function ensureDir(directoryPath: PathLike): Promise<void> {
  await fs.mkdir(directoryPath, { recursive: true });
}

export async function writeFileAtomic(
  filePath: PathLike,
  data: string | NodeJS.ArrayBufferView,
  options: WriteFileOptions = {}
): Promise<void> {
  const resolvedPath = typeof filePath === 'string' ? filePath : filePath.toString();
  const directory = path.dirname(resolvedPath);
  await ensureDir(directory);

  const uniqueSuffix = `${process.pid}-${Date.now()}-${crypto.randomBytes(6).toString('hex')}`;
  const tempFile = path.join(directory, `.tmp-${path.basename(resolvedPath)}-${uniqueSuffix}`);

  try {
    await fs.writeFile(tempFile, data, options);
    await fs.rename(tempFile, resolvedPath);
  } catch (error) {
    if (errnoCode(error) === 'EXDEV') {
      // Cross-device rename fallback: copy + unlink
      await fs.copyFile(tempFile, resolvedPath, constants.COPYFILE_FICLONE);
      await fs.unlink(tempFile);
    } else {
      await fs.rm(tempFile, { force: true });
      throw error;
    }
  }
}

export async function removeDir(targetPath: PathLike, options: RmOptions = { recursive: true, force: true }): Promise<void> {
  await fs.rm(targetPath, options);
}

export async function ensureTempDir(prefix: string): Promise<string> {
  const base = path.join(os.tmpdir(), prefix);
  await ensureDir(base);
  return fs.mkdtemp(`${base}${path.sep}`);
}
