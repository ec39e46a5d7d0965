import fs from 'fs';
import os from 'os';
import path from 'path';

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
  return fs.promises.realpath(dir);
}

export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf8');
}

/**
 * A dotfiles root with `configs/` and `profiles/`, plus a separate fake home directory.
 */
export async function makeWorkspace(prefix: string): Promise<{ root: string; home: string }> {
  const base = await makeTempDir(prefix);
  const root = path.join(base, 'dotfiles');
  const home = path.join(base, 'home');
  await fs.promises.mkdir(path.join(root, 'configs'), { recursive: true });
  await fs.promises.mkdir(path.join(root, 'profiles'), { recursive: true });
  await fs.promises.mkdir(home, { recursive: true });
  return { root, home };
}
