import fs from 'fs';
import path from 'path';
import { describe, expect, test } from 'vitest';
import { toDescriptor } from '../src/core/merge.js';
import { expandHome, resolveRoots } from '../src/core/paths.js';
import { classifyTarget, detectConflicts, getLinkStatus, inferSourceKind, isLinkedTo } from '../src/core/status.js';
import { makeWorkspace, writeFile } from './helpers.js';

describe('expandHome', () => {
  test('expands a leading tilde', () => {
    expect(expandHome('~/.zshrc', '/home/me')).toBe('/home/me/.zshrc');
    expect(expandHome('~', '/home/me')).toBe('/home/me');
  });

  test('leaves other paths alone', () => {
    expect(expandHome('/etc/zshrc', '/home/me')).toBe('/etc/zshrc');
    expect(expandHome('~other/.zshrc', '/home/me')).toBe('~other/.zshrc');
  });
});

describe('resolveRoots', () => {
  test('derives store, profiles and backups from the root', () => {
    const roots = resolveRoots({ root: '/dots', homeDir: '/home/me', env: {} });

    expect(roots).toEqual({
      root: '/dots',
      configsRoot: '/dots/configs',
      profilesRoot: '/dots/profiles',
      backupRoot: '/dots/backups',
      homeDir: '/home/me',
    });
  });

  test('falls back to environment variables', () => {
    const roots = resolveRoots({ homeDir: '/home/me', env: { DOTLINK_ROOT: '/env/dots', DOTLINK_BACKUP_DIR: '/env/bak' } });

    expect(roots.root).toBe('/env/dots');
    expect(roots.backupRoot).toBe('/env/bak');
  });

  test('explicit options win over the environment', () => {
    const roots = resolveRoots({ root: '/opt/dots', backupRoot: '/opt/bak', env: { DOTLINK_ROOT: '/env/dots' } });

    expect(roots.root).toBe('/opt/dots');
    expect(roots.backupRoot).toBe('/opt/bak');
  });
});

describe('classifyTarget', () => {
  test('distinguishes files, directories, symlinks and nothing', async () => {
    const { home } = await makeWorkspace('classify-');
    await writeFile(path.join(home, 'file'), 'x');
    await fs.promises.mkdir(path.join(home, 'dir'));
    await fs.promises.symlink(path.join(home, 'gone'), path.join(home, 'dangling'));

    expect(await classifyTarget(path.join(home, 'file'))).toBe('file');
    expect(await classifyTarget(path.join(home, 'dir'))).toBe('directory');
    expect(await classifyTarget(path.join(home, 'dangling'))).toBe('symlink');
    expect(await classifyTarget(path.join(home, 'absent'))).toBeNull();
  });
});

describe('isLinkedTo', () => {
  test('follows the link to its real path', async () => {
    const { root, home } = await makeWorkspace('linked-');
    const source = path.join(root, 'configs', 'zshrc');
    await writeFile(source, '# zsh');
    await fs.promises.symlink(source, path.join(home, '.zshrc'));

    expect(await isLinkedTo(path.join(home, '.zshrc'), source)).toBe(true);
    expect(await isLinkedTo(path.join(home, '.zshrc'), path.join(root, 'configs', 'other'))).toBe(false);
  });

  test('is false for a plain file', async () => {
    const { home } = await makeWorkspace('linked-');
    await writeFile(path.join(home, '.zshrc'), '# mine');

    expect(await isLinkedTo(path.join(home, '.zshrc'), path.join(home, '.zshrc'))).toBe(false);
  });
});

describe('detectConflicts', () => {
  test('classifies each kind of existing target', async () => {
    const { root, home } = await makeWorkspace('conflicts-');
    const configsRoot = path.join(root, 'configs');
    await writeFile(path.join(configsRoot, 'zshrc'), '# zsh');
    await writeFile(path.join(configsRoot, 'gitconfig'), '[user]');
    await fs.promises.mkdir(path.join(configsRoot, 'nvim'));
    await fs.promises.mkdir(path.join(configsRoot, 'tmux'));

    await writeFile(path.join(home, '.zshrc'), '# old');
    await fs.promises.mkdir(path.join(home, '.config', 'nvim'), { recursive: true });
    await writeFile(path.join(home, 'elsewhere'), '[user]');
    await fs.promises.symlink(path.join(home, 'elsewhere'), path.join(home, '.gitconfig'));
    await fs.promises.symlink(path.join(configsRoot, 'tmux'), path.join(home, '.tmux'));

    const descriptor = toDescriptor({
      config_paths: {
        zshrc: '~/.zshrc',
        nvim: '~/.config/nvim',
        gitconfig: '~/.gitconfig',
        tmux: '~/.tmux',
        alacritty: '~/.config/alacritty',
      },
    });

    const conflicts = await detectConflicts(descriptor, { configsRoot, homeDir: home });

    expect(conflicts).toEqual([
      { name: 'zshrc', path: path.join(home, '.zshrc'), kind: 'file', isSymlink: false },
      { name: 'nvim', path: path.join(home, '.config', 'nvim'), kind: 'directory', isSymlink: false },
      { name: 'gitconfig', path: path.join(home, '.gitconfig'), kind: 'symlink', isSymlink: true },
    ]);
  });

  test('reports a dangling symlink as a symlink conflict', async () => {
    const { root, home } = await makeWorkspace('conflicts-');
    await fs.promises.symlink(path.join(home, 'missing'), path.join(home, '.vimrc'));

    const conflicts = await detectConflicts(toDescriptor({ config_paths: { vimrc: '~/.vimrc' } }), {
      configsRoot: path.join(root, 'configs'),
      homeDir: home,
    });

    expect(conflicts).toEqual([{ name: 'vimrc', path: path.join(home, '.vimrc'), kind: 'symlink', isSymlink: true }]);
  });

  test('a link into the store is a conflict when the store entry is gone', async () => {
    const { root, home } = await makeWorkspace('conflicts-');
    const configsRoot = path.join(root, 'configs');
    await fs.promises.symlink(path.join(configsRoot, 'zshrc'), path.join(home, '.zshrc'));

    const conflicts = await detectConflicts(toDescriptor({ config_paths: { zshrc: '~/.zshrc' } }), {
      configsRoot,
      homeDir: home,
    });

    expect(conflicts.map((c) => c.kind)).toEqual(['symlink']);
  });
});

describe('inferSourceKind', () => {
  test('uses the real type when the entry exists', async () => {
    const { root } = await makeWorkspace('infer-');
    await fs.promises.mkdir(path.join(root, 'configs', 'settings.d'));
    await writeFile(path.join(root, 'configs', 'zshrc'), '# zsh');

    expect(await inferSourceKind(path.join(root, 'configs', 'settings.d'))).toBe('directory');
    expect(await inferSourceKind(path.join(root, 'configs', 'zshrc'))).toBe('file');
  });

  test('guesses from the name when the entry is missing', async () => {
    expect(await inferSourceKind('/missing/configs/starship.toml')).toBe('file');
    expect(await inferSourceKind('/missing/configs/.bashrc')).toBe('file');
    expect(await inferSourceKind('/missing/configs/.tmux.conf')).toBe('file');
    expect(await inferSourceKind('/missing/configs/nvim')).toBe('directory');
    expect(await inferSourceKind('/missing/configs/.config')).toBe('directory');
  });
});

describe('getLinkStatus', () => {
  test('reports linked, missing and conflict states', async () => {
    const { root, home } = await makeWorkspace('status-');
    const configsRoot = path.join(root, 'configs');
    await writeFile(path.join(configsRoot, 'zshrc'), '# zsh');
    await writeFile(path.join(configsRoot, 'gitconfig'), '[user]');
    await fs.promises.symlink(path.join(configsRoot, 'zshrc'), path.join(home, '.zshrc'));
    await writeFile(path.join(home, '.gitconfig'), '[old]');

    const statuses = await getLinkStatus(
      toDescriptor({ config_paths: { zshrc: '~/.zshrc', gitconfig: '~/.gitconfig', nvim: '~/.config/nvim' } }),
      { configsRoot, homeDir: home }
    );

    expect(statuses).toEqual([
      {
        name: 'zshrc',
        source: path.join(configsRoot, 'zshrc'),
        target: path.join(home, '.zshrc'),
        sourceExists: true,
        status: 'linked',
      },
      {
        name: 'gitconfig',
        source: path.join(configsRoot, 'gitconfig'),
        target: path.join(home, '.gitconfig'),
        sourceExists: true,
        status: 'conflict',
      },
      {
        name: 'nvim',
        source: path.join(configsRoot, 'nvim'),
        target: path.join(home, '.config', 'nvim'),
        sourceExists: false,
        status: 'missing',
      },
    ]);
  });
});
