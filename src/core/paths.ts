import os from 'os';
import path from 'path';

export type RootOptions = {
  root?: string;
  homeDir?: string;
  backupRoot?: string;
  env?: NodeJS.ProcessEnv;
};

export type ResolvedRoots = {
  root: string;
  configsRoot: string;
  profilesRoot: string;
  backupRoot: string;
  homeDir: string;
};

export const CONFIGS_DIR = 'configs';
export const PROFILES_DIR = 'profiles';
export const BACKUPS_DIR = 'backups';

export function resolveRoots(opts: RootOptions = {}): ResolvedRoots {
  const env = opts.env ?? process.env;
  const homeDir = opts.homeDir || os.homedir();
  const root = path.resolve(opts.root || env.DOTLINK_ROOT || process.cwd());
  const backupRoot = path.resolve(opts.backupRoot || env.DOTLINK_BACKUP_DIR || path.join(root, BACKUPS_DIR));

  return {
    root,
    configsRoot: path.join(root, CONFIGS_DIR),
    profilesRoot: path.join(root, PROFILES_DIR),
    backupRoot,
    homeDir,
  };
}

/**
 * Expands a leading `~` to `homeDir`. `~user` forms are left alone.
 */
export function expandHome(target: string, homeDir: string = os.homedir()): string {
  if (target === '~') return homeDir;
  if (target.startsWith('~/')) return path.join(homeDir, target.slice(2));
  return target;
}

export function resolveTarget(target: string, homeDir?: string): string {
  return path.resolve(expandHome(target, homeDir));
}

export function storePath(configsRoot: string, name: string): string {
  return path.join(configsRoot, name);
}
