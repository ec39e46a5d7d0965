export type ConfigPaths = Record<string, string>;
export type Overrides = Record<string, Record<string, unknown>>;

export type PackageList = string[] | Record<string, string[]>;

export type Profile = {
  os?: string;
  package_manager?: string;
  config_paths?: ConfigPaths;
  overrides?: Overrides;
  packages?: PackageList;
  zsh_plugins?: string[];
  [key: string]: unknown;
};

export type EffectiveDescriptor = Profile & {
  config_paths: ConfigPaths;
  overrides: Overrides;
};

export type MergedProfile = {
  descriptor: EffectiveDescriptor;
  applied: string[];
  skipped: string[];
};

export type EntryKind = 'file' | 'directory';
export type ConflictKind = EntryKind | 'symlink';

export type ConflictRecord = {
  name: string;
  path: string;
  kind: ConflictKind;
  isSymlink: boolean;
};

export type LinkState = 'linked' | 'missing' | 'conflict';

export type LinkStatus = {
  name: string;
  source: string;
  target: string;
  sourceExists: boolean;
  status: LinkState;
};

export type BackupEntry = {
  source: string;
  destination: string;
  kind: EntryKind;
  timestamp: string;
};

export type LinkFailure = 'source-missing' | 'target-exists' | 'filesystem-error';
export type LinkAction = 'created' | 'replaced' | 'unchanged';

export type LinkResult =
  | { ok: true; action: LinkAction; source: string; target: string }
  | { ok: false; reason: LinkFailure; source: string; target: string; detail: string };

export type DeploymentResult = LinkResult & { name: string };

export type DeploymentSummary = {
  attempted: number;
  succeeded: number;
  failed: number;
};

export interface ToolInstaller {
  installPackage(name: string): Promise<boolean>;
}
