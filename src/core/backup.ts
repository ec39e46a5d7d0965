import fs from 'fs';
import path from 'path';
import {
  copyFilePreserving,
  copyTree,
  ensureDir,
  isErrnoException,
  listDirs,
  SpecialFileError,
  writeText,
} from '../utils/fs.js';
import type { Logger } from '../utils/log.js';
import { describeError, silentLogger } from '../utils/log.js';
import { resolveTarget } from './paths.js';
import type { BackupEntry } from './types.js';

export const MANIFEST_FILENAME = 'backup_log.txt';
const RULE_WIDTH = 60;

export type BackupSession = {
  root: string;
  dir: string;
  timestamp: string;
  entries: BackupEntry[];
  logger: Logger;
};

export type BackupSummary = {
  dir: string;
  timestamp: string;
  itemsBackedUp: number;
  entries: BackupEntry[];
};

export type BackupSessionOptions = {
  now?: Date;
  logger?: Logger;
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Creates this run's session directory under `backupRoot`. A directory left by another
 * run in the same second is never reused; the new one gets a `-1`, `-2`, ... suffix.
 */
export async function createBackupSession(backupRoot: string, opts: BackupSessionOptions = {}): Promise<BackupSession> {
  const timestamp = formatTimestamp(opts.now ?? new Date());
  await ensureDir(backupRoot);

  for (let attempt = 0; ; attempt++) {
    const dirName = attempt === 0 ? timestamp : `${timestamp}-${attempt}`;
    const dir = path.join(backupRoot, dirName);
    try {
      await fs.promises.mkdir(dir);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') continue;
      throw err;
    }
    return { root: backupRoot, dir, timestamp, entries: [], logger: opts.logger ?? silentLogger };
  }
}

/**
 * File name of a config's copy inside a session. Nested config names are flattened so
 * `zsh/zshrc` and `zsh` get separate copies.
 */
export function backupName(name: string): string {
  return name.split(/[\\/]+/).filter(Boolean).join('__');
}

/**
 * Copies `source` into the session as `backupName(name)`. Never throws: a failed copy
 * is logged and reported as `false`.
 */
export async function backupPath(session: BackupSession, source: string, name: string): Promise<boolean> {
  const stat = await fs.promises.stat(source).catch(() => null);
  if (!stat) return false;

  const destination = path.join(session.dir, backupName(name));
  const kind = stat.isDirectory() ? 'directory' : 'file';

  try {
    if (stat.isDirectory()) {
      await ensureDir(path.dirname(destination));
      await copyTree(source, destination);
    } else if (stat.isFile()) {
      await copyFilePreserving(source, destination);
    } else {
      throw new SpecialFileError(source);
    }
  } catch (err) {
    session.logger.error(`Error backing up ${source}: ${describeError(err)}`);
    return false;
  }

  session.entries.push({ source, destination, kind, timestamp: session.timestamp });
  return true;
}

/**
 * Backs up every existing target. Targets that do not exist map to `null`: there was
 * nothing to lose, which is not a failure.
 */
export async function backupConfigs(
  session: BackupSession,
  targets: Record<string, string>,
  opts: { homeDir?: string } = {}
): Promise<Record<string, boolean | null>> {
  const results: Record<string, boolean | null> = {};

  for (const [name, rawTarget] of Object.entries(targets)) {
    const target = resolveTarget(rawTarget, opts.homeDir);
    const exists = await fs.promises
      .stat(target)
      .then(() => true)
      .catch(() => false);

    if (!exists) {
      results[name] = null;
      continue;
    }

    const ok = await backupPath(session, target, name);
    results[name] = ok;
    if (ok) {
      session.logger.success(`Backed up: ${name} (${target})`);
    } else {
      session.logger.error(`Failed to back up: ${name} (${target})`);
    }
  }

  return results;
}

export function formatManifest(session: BackupSession): string {
  const lines = ['Dotfiles Backup Log', `Timestamp: ${session.timestamp}`, '='.repeat(RULE_WIDTH), ''];

  for (const entry of session.entries) {
    lines.push(
      `Type: ${entry.kind}`,
      `Source: ${entry.source}`,
      `Destination: ${entry.destination}`,
      '-'.repeat(RULE_WIDTH)
    );
  }

  return `${lines.join('\n')}\n`;
}

export async function saveBackupManifest(session: BackupSession): Promise<string> {
  const manifestPath = path.join(session.dir, MANIFEST_FILENAME);
  await writeText(manifestPath, formatManifest(session));
  session.logger.info(`Backup log saved to: ${manifestPath}`);
  return manifestPath;
}

export function getBackupSummary(session: BackupSession): BackupSummary {
  return {
    dir: session.dir,
    timestamp: session.timestamp,
    itemsBackedUp: session.entries.length,
    entries: [...session.entries],
  };
}

export async function listBackupSessions(backupRoot: string): Promise<string[]> {
  const dirs = await listDirs(backupRoot);
  return dirs.map((dir) => path.basename(dir)).sort().reverse();
}
