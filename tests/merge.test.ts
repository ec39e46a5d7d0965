import { describe, expect, test } from 'vitest';
import { collectPackages, isMapping, mergeProfileChain, mergeProfileLayers, toDescriptor } from '../src/core/merge.js';
import type { Profile } from '../src/core/types.js';

describe('isMapping', () => {
  test('accepts plain objects only', () => {
    expect(isMapping({ a: 1 })).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isMapping('x')).toBe(false);
  });
});

describe('mergeProfileLayers', () => {
  test('merges mapping values entry by entry with the overlay winning', () => {
    const a: Profile = { config_paths: { x: '1', y: '2' } };
    const b: Profile = { config_paths: { y: '3', z: '4' } };

    expect(mergeProfileLayers(a, b).config_paths).toEqual({ x: '1', y: '3', z: '4' });
  });

  test('reversing the order only changes the shared key', () => {
    const a: Profile = { config_paths: { x: '1', y: '2' } };
    const b: Profile = { config_paths: { y: '3', z: '4' } };

    expect(mergeProfileLayers(b, a).config_paths).toEqual({ x: '1', y: '2', z: '4' });
  });

  test('keeps base key order and appends new overlay keys', () => {
    const base: Profile = { config_paths: { zshrc: '~/.zshrc', nvim: '~/.config/nvim' } };
    const overlay: Profile = { config_paths: { tmux: '~/.tmux.conf', zshrc: '~/.zshrc.work' } };

    const merged = mergeProfileLayers(base, overlay);

    expect(Object.keys(merged.config_paths ?? {})).toEqual(['zshrc', 'nvim', 'tmux']);
    expect(merged.config_paths?.zshrc).toBe('~/.zshrc.work');
  });

  test('replaces scalar values wholesale', () => {
    const merged = mergeProfileLayers({ os: 'linux', package_manager: 'apt' }, { package_manager: 'pacman' });

    expect(merged).toEqual({ os: 'linux', package_manager: 'pacman' });
  });

  test('replaces a list instead of concatenating it', () => {
    const merged = mergeProfileLayers({ packages: ['git', 'zsh'] }, { packages: ['tmux'] });

    expect(merged.packages).toEqual(['tmux']);
  });

  test('replaces when only one side is a mapping', () => {
    const merged = mergeProfileLayers({ packages: { common: ['git'] } }, { packages: ['tmux'] });

    expect(merged.packages).toEqual(['tmux']);
  });

  test('merges overrides per config name', () => {
    const base: Profile = { overrides: { gitconfig: { email: 'a@example.com' }, zshrc: { theme: 'robbyrussell' } } };
    const overlay: Profile = { overrides: { gitconfig: { name: 'A' } } };

    const merged = mergeProfileLayers(base, overlay);

    expect(merged.overrides).toEqual({ gitconfig: { name: 'A' }, zshrc: { theme: 'robbyrussell' } });
  });

  test('adds overrides when the base has none', () => {
    const merged = mergeProfileLayers({ os: 'macos' }, { overrides: { nvim: { colorscheme: 'tokyonight' } } });

    expect(merged.overrides).toEqual({ nvim: { colorscheme: 'tokyonight' } });
  });

  test('does not mutate its inputs', () => {
    const base: Profile = { config_paths: { x: '1' }, overrides: { x: { a: 1 } } };
    const overlay: Profile = { config_paths: { y: '2' }, overrides: { y: { b: 2 } } };

    mergeProfileLayers(base, overlay);

    expect(base).toEqual({ config_paths: { x: '1' }, overrides: { x: { a: 1 } } });
    expect(overlay).toEqual({ config_paths: { y: '2' }, overrides: { y: { b: 2 } } });
  });

  test('carries unknown keys through', () => {
    const merged = mergeProfileLayers({ zsh_plugins: ['a'] }, { editor: 'nvim' });

    expect(merged).toEqual({ zsh_plugins: ['a'], editor: 'nvim' });
  });
});

describe('mergeProfileChain', () => {
  test('stacks each layer on the cumulative result', () => {
    const descriptor = mergeProfileChain([
      { os: 'linux', config_paths: { a: '1' } },
      { config_paths: { a: '2', b: '2' } },
      { config_paths: { b: '3' } },
    ]);

    expect(descriptor.os).toBe('linux');
    expect(descriptor.config_paths).toEqual({ a: '2', b: '3' });
    expect(descriptor.overrides).toEqual({});
  });
});

describe('toDescriptor', () => {
  test('fills in empty config_paths and overrides', () => {
    expect(toDescriptor({ os: 'linux' })).toEqual({ os: 'linux', config_paths: {}, overrides: {} });
  });
});

describe('collectPackages', () => {
  test('returns a plain package list as is', () => {
    expect(collectPackages({ packages: ['git', 'neovim'] })).toEqual(['git', 'neovim']);
  });

  test('uses the common group of a grouped list', () => {
    expect(collectPackages({ packages: { common: ['git'], desktop: ['kitty'] } })).toEqual(['git']);
  });

  test('returns nothing when packages are absent', () => {
    expect(collectPackages({})).toEqual([]);
    expect(collectPackages({ packages: { desktop: ['kitty'] } })).toEqual([]);
  });
});
