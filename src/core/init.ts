import path from 'path';
import { ensureDir, pathExists, writeText } from '../utils/fs.js';
import { BACKUPS_DIR, CONFIGS_DIR, PROFILES_DIR } from './paths.js';

export type InitResult = {
  root: string;
  created: string[];
  skipped: string[];
};

const LINUX_PROFILE_TEMPLATE = `# Base profile for Linux machines
os: linux
package_manager: apt

# config name (entry under configs/) -> where the link goes
config_paths:
  zshrc: ~/.zshrc
  gitconfig: ~/.gitconfig
  nvim: ~/.config/nvim

packages:
  common:
    - git
    - zsh
    - neovim

zsh_plugins:
  - zsh-autosuggestions
  - zsh-syntax-highlighting
`;

const MACOS_PROFILE_TEMPLATE = `# Base profile for macOS machines
os: macos
package_manager: brew

config_paths:
  zshrc: ~/.zshrc
  gitconfig: ~/.gitconfig
  nvim: ~/.config/nvim

packages:
  - git
  - neovim

zsh_plugins:
  - zsh-autosuggestions
  - zsh-syntax-highlighting
`;

const WORK_PROFILE_TEMPLATE = `# Work overlay, stacked on the base profile
config_paths: {}

# Opaque per-config settings, carried through the merge untouched
overrides:
  gitconfig:
    email: you@work.example
`;

const PERSONAL_PROFILE_TEMPLATE = `# Personal overlay, stacked on the base profile
config_paths: {}

overrides:
  gitconfig:
    email: you@home.example
`;

const PROFILE_TEMPLATES: Record<string, string> = {
  'linux.yml': LINUX_PROFILE_TEMPLATE,
  'macos.yml': MACOS_PROFILE_TEMPLATE,
  'work.yml': WORK_PROFILE_TEMPLATE,
  'personal.yml': PERSONAL_PROFILE_TEMPLATE,
};

export async function initDotfilesRoot(root: string): Promise<InitResult> {
  const resolved = path.resolve(root);
  const created: string[] = [];
  const skipped: string[] = [];

  for (const dir of [CONFIGS_DIR, PROFILES_DIR, BACKUPS_DIR]) {
    const dirPath = path.join(resolved, dir);
    if (await pathExists(dirPath)) {
      skipped.push(`${dir}/`);
    } else {
      await ensureDir(dirPath);
      created.push(`${dir}/`);
    }
  }

  for (const [fileName, template] of Object.entries(PROFILE_TEMPLATES)) {
    const relative = path.join(PROFILES_DIR, fileName);
    const filePath = path.join(resolved, relative);
    if (await pathExists(filePath)) {
      skipped.push(relative);
    } else {
      await writeText(filePath, template);
      created.push(relative);
    }
  }

  return { root: resolved, created, skipped };
}
