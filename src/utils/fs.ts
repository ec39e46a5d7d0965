import fs from 'fs';
import path from 'path';

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Like `pathExists`, but a dangling symlink counts as present.
 */
export async function entryExists(p: string): Promise<boolean> {
  try {
    await fs.promises.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isSymlink(p: string): Promise<boolean> {
  try {
    const stat = await fs.promises.lstat(p);
    return stat.isSymbolicLink();
  } catch {
    return false;
  }
}

export async function realPathOrNull(p: string): Promise<string | null> {
  try {
    return await fs.promises.realpath(p);
  } catch {
    return null;
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function readText(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf8');
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf8');
}

export async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => path.join(dir, e.name));
  } catch {
    return [];
  }
}

export async function removePath(p: string): Promise<void> {
  const stat = await fs.promises.lstat(p);
  if (stat.isDirectory()) {
    await fs.promises.rm(p, { recursive: true, force: true });
    return;
  }
  await fs.promises.unlink(p);
}

/**
 * Copy a file keeping its mode and timestamps.
 */
export async function copyFilePreserving(source: string, destination: string): Promise<void> {
  await ensureDir(path.dirname(destination));
  await fs.promises.copyFile(source, destination);
  const stat = await fs.promises.stat(source);
  await fs.promises.chmod(destination, stat.mode);
  await fs.promises.utimes(destination, stat.atime, stat.mtime);
}

/**
 * Thrown for pipes, sockets and device files, which cannot be copied without blocking
 * or reading from a device.
 */
export class SpecialFileError extends Error {
  constructor(public readonly filePath: string) {
    super(`Cannot copy special file: ${filePath}`);
    this.name = 'SpecialFileError';
  }
}

/**
 * Recursive copy. Symlinks below `source` are recreated as links, never followed.
 * The destination directory must not exist yet. Anything that is not a regular file,
 * directory or symlink throws `SpecialFileError`.
 */
export async function copyTree(source: string, destination: string): Promise<void> {
  const stat = await fs.promises.stat(source);
  await fs.promises.mkdir(destination);

  const entries = await fs.promises.readdir(source, { withFileTypes: true });
  for (const entry of entries) {
    const from = path.join(source, entry.name);
    const to = path.join(destination, entry.name);
    if (entry.isSymbolicLink()) {
      await fs.promises.symlink(await fs.promises.readlink(from), to);
    } else if (entry.isDirectory()) {
      await copyTree(from, to);
    } else if (entry.isFile()) {
      await copyFilePreserving(from, to);
    } else {
      throw new SpecialFileError(from);
    }
  }

  await fs.promises.chmod(destination, stat.mode);
  await fs.promises.utimes(destination, stat.atime, stat.mtime);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
