import fs from 'fs';
import path from 'path';
import { entryExists, pathExists, realPathOrNull } from '../utils/fs.js';
import { resolveTarget, storePath } from './paths.js';
import type { ConflictKind, ConflictRecord, EffectiveDescriptor, EntryKind, LinkStatus } from './types.js';

export type DetectOptions = {
  configsRoot: string;
  homeDir?: string;
};

const EXTENSIONLESS_DOTFILES = new Set([
  '.zshrc',
  '.zprofile',
  '.bashrc',
  '.bash_profile',
  '.vimrc',
  '.tmux.conf',
  '.gitconfig',
  '.gitignore_global',
]);

/**
 * True when `target` is a symlink that ends up at the same real path as `source`.
 */
export async function isLinkedTo(target: string, source: string): Promise<boolean> {
  const stat = await fs.promises.lstat(target).catch(() => null);
  if (!stat?.isSymbolicLink()) return false;

  const [resolvedTarget, resolvedSource] = await Promise.all([realPathOrNull(target), realPathOrNull(source)]);
  return resolvedTarget !== null && resolvedTarget === resolvedSource;
}

/**
 * Classifies whatever sits at `target`, or returns null when nothing is there.
 */
export async function classifyTarget(target: string): Promise<ConflictKind | null> {
  const stat = await fs.promises.lstat(target).catch(() => null);
  if (!stat) return null;
  if (stat.isSymbolicLink()) return 'symlink';
  return stat.isDirectory() ? 'directory' : 'file';
}

export async function detectConflicts(
  descriptor: EffectiveDescriptor,
  opts: DetectOptions
): Promise<ConflictRecord[]> {
  const conflicts: ConflictRecord[] = [];

  for (const [name, rawTarget] of Object.entries(descriptor.config_paths)) {
    const target = resolveTarget(rawTarget, opts.homeDir);
    const kind = await classifyTarget(target);
    if (kind === null) continue;

    if (kind === 'symlink' && (await isLinkedTo(target, storePath(opts.configsRoot, name)))) {
      continue;
    }

    conflicts.push({ name, path: target, kind, isSymlink: kind === 'symlink' });
  }

  return conflicts;
}

/**
 * Guesses whether a store entry is meant to be a file or a directory. Only used to
 * word diagnostics when the entry is missing.
 */
export async function inferSourceKind(sourcePath: string): Promise<EntryKind> {
  if (await pathExists(sourcePath)) {
    const stat = await fs.promises.stat(sourcePath);
    return stat.isDirectory() ? 'directory' : 'file';
  }

  const base = path.basename(sourcePath);
  if (path.extname(base)) return 'file';
  if (EXTENSIONLESS_DOTFILES.has(base)) return 'file';
  return 'directory';
}

export async function getLinkStatus(descriptor: EffectiveDescriptor, opts: DetectOptions): Promise<LinkStatus[]> {
  const statuses: LinkStatus[] = [];

  for (const [name, rawTarget] of Object.entries(descriptor.config_paths)) {
    const source = storePath(opts.configsRoot, name);
    const target = resolveTarget(rawTarget, opts.homeDir);
    const sourceExists = await pathExists(source);

    let status: LinkStatus['status'];
    if (!(await entryExists(target))) {
      status = 'missing';
    } else if (await isLinkedTo(target, source)) {
      status = 'linked';
    } else {
      status = 'conflict';
    }

    statuses.push({ name, source, target, sourceExists, status });
  }

  return statuses;
}
