import { isCancel, select } from '@clack/prompts';
import chalk from 'chalk';
import { Command } from 'commander';
import { dump } from 'js-yaml';
import path from 'path';
import type { Environment } from './core/detect.js';
import { describeEnvironment, detectEnvironment, getProfileName, isSupported } from './core/detect.js';
import { DotlinkError } from './core/errors.js';
import { initDotfilesRoot } from './core/init.js';
import { collectPackages } from './core/merge.js';
import type { RootOptions } from './core/paths.js';
import { resolveRoots } from './core/paths.js';
import { listProfiles, mergeProfiles } from './core/profiles.js';
import type { ConflictDecision } from './core/reconcile.js';
import { reconcile } from './core/reconcile.js';
import { getLinkStatus } from './core/status.js';
import type { ConflictRecord, LinkStatus, ToolInstaller } from './core/types.js';
import type { Logger } from './utils/log.js';
import { createConsoleLogger, describeError } from './utils/log.js';

const appTitle = 'dotlink';

export interface Prompter {
  /** `null` when the user cancels, `[]` for no overlay. */
  selectOverlays(choices: string[]): Promise<string[] | null>;
  decideConflicts(conflicts: ConflictRecord[]): Promise<ConflictDecision>;
}

export type ProgramDeps = {
  logger?: Logger;
  prompter?: Prompter;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  detect?: () => Promise<Environment>;
  installer?: ToolInstaller;
};

export type RootFlags = {
  root?: string;
  backupRoot?: string;
};

export type ProfileFlags = RootFlags & {
  profile?: string;
  overlay?: string[];
};

export type ApplyFlags = ProfileFlags & {
  force?: boolean;
  yes?: boolean;
  dryRun?: boolean;
};

const DECISIONS: { label: string; value: ConflictDecision }[] = [
  { label: 'Back up and overwrite conflicts', value: 'overwrite' },
  { label: 'Leave conflicts in place', value: 'keep' },
  { label: 'Cancel', value: 'cancel' },
];

export function createClackPrompter(): Prompter {
  return {
    async selectOverlays(choices) {
      const value = await select({
        message: 'Select profile type',
        options: [...choices.map((c) => ({ label: c, value: c })), { label: 'None', value: '' }],
      });
      if (isCancel(value)) return null;
      return typeof value === 'string' && value !== '' ? [value] : [];
    },
    async decideConflicts(conflicts) {
      const value = await select({
        message: `Found ${conflicts.length} existing configurations. How should they be handled?`,
        options: DECISIONS.map((d) => ({ label: d.label, value: d.value })),
      });
      if (isCancel(value)) return 'cancel';
      return DECISIONS.find((d) => d.value === value)?.value ?? 'cancel';
    },
  };
}

function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : plural || `${singular}s`;
}

export function formatConflictTable(conflicts: ConflictRecord[]): string[] {
  const header = { name: 'Config', path: 'Path', kind: 'Type' };
  const width = {
    name: Math.max(header.name.length, ...conflicts.map((c) => c.name.length)),
    path: Math.max(header.path.length, ...conflicts.map((c) => c.path.length)),
  };
  const row = (name: string, target: string, kind: string) =>
    `${name.padEnd(width.name)}  ${target.padEnd(width.path)}  ${kind}`;

  return [row(header.name, header.path, header.kind), ...conflicts.map((c) => row(c.name, c.path, c.kind))];
}

export function renderStatusLines(statuses: LinkStatus[]): string[] {
  return statuses.map((s) => {
    const icon = s.status === 'linked' ? chalk.green('✓') : s.status === 'missing' ? chalk.yellow('•') : chalk.red('⚠');
    const note = s.sourceExists ? '' : chalk.dim(' (not in store)');
    return `${icon} ${s.name} ${chalk.dim('->')} ${s.target}${note}`;
  });
}

function rootOptions(flags: RootFlags, deps: ProgramDeps): RootOptions {
  return { root: flags.root, backupRoot: flags.backupRoot, homeDir: deps.homeDir, env: deps.env };
}

async function resolveBaseProfile(flags: ProfileFlags, deps: ProgramDeps, logger: Logger): Promise<string | null> {
  if (flags.profile) return flags.profile;

  const env = await (deps.detect ?? detectEnvironment)();
  logger.info(`System: ${describeEnvironment(env)}`);

  const support = isSupported(env);
  if (!support.supported || env.os === null) {
    logger.error(`${support.reason}. Pass --profile to choose a base profile.`);
    return null;
  }
  return getProfileName(env.os);
}

export async function runApply(flags: ApplyFlags, deps: ProgramDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger();
  const prompter = deps.prompter ?? createClackPrompter();
  const roots = resolveRoots(rootOptions(flags, deps));

  logger.info(chalk.cyan(`Applying ${appTitle} profile from ${roots.root}`));

  const baseProfile = await resolveBaseProfile(flags, deps, logger);
  if (!baseProfile) return 1;

  let overlays = flags.overlay ?? [];
  if (overlays.length === 0 && !flags.yes) {
    const choices = (await listProfiles(roots.profilesRoot)).filter((name) => name !== baseProfile);
    if (choices.length > 0) {
      const selected = await prompter.selectOverlays(choices);
      if (selected === null) {
        logger.warn('Cancelled');
        return 0;
      }
      overlays = selected;
    }
  }

  logger.info(`Loading profiles: ${[baseProfile, ...overlays].join(', ')}`);
  logger.info('Scanning for existing configurations...');

  const interactive = !flags.yes && flags.force === undefined && !flags.dryRun;

  try {
    const result = await reconcile({
      roots,
      baseProfile,
      overlays,
      force: flags.force ?? false,
      dryRun: flags.dryRun,
      installer: deps.installer,
      logger,
      decide: async (conflicts) => {
        logger.warn(`Found ${conflicts.length} existing ${pluralize(conflicts.length, 'configuration')}:`);
        for (const line of formatConflictTable(conflicts)) logger.info(`  ${line}`);
        if (!interactive) return flags.force ? 'overwrite' : 'keep';
        return prompter.decideConflicts(conflicts);
      },
    });

    if (result.cancelled) {
      logger.warn('Cancelled, nothing was changed');
      return 0;
    }

    if (result.dryRun) {
      for (const line of renderStatusLines(result.status ?? [])) logger.info(line);
      logger.info('dry-run: no changes made');
      return 0;
    }

    if (result.backup) {
      logger.info(`Backed up ${result.backup.itemsBackedUp} ${pluralize(result.backup.itemsBackedUp, 'configuration')}`);
    }

    const installed = Object.values(result.packages);
    if (installed.length > 0) {
      const ok = installed.filter(Boolean).length;
      logger.info(`Installed ${ok}/${installed.length} ${pluralize(installed.length, 'package')}`);
    }

    const { attempted, succeeded } = result.summary;
    const line = `Deployed ${succeeded}/${attempted} configurations`;
    if (succeeded === attempted) {
      logger.success(line);
    } else {
      logger.warn(line);
    }
    logger.info('Done');
    return 0;
  } catch (err) {
    if (err instanceof DotlinkError) {
      logger.error(`Error loading profiles: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

export async function runStatus(flags: ProfileFlags, deps: ProgramDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger();
  const roots = resolveRoots(rootOptions(flags, deps));
  const baseProfile = await resolveBaseProfile(flags, deps, logger);
  if (!baseProfile) return 1;

  try {
    const { descriptor } = await mergeProfiles(roots.profilesRoot, baseProfile, flags.overlay ?? [], { logger });
    const statuses = await getLinkStatus(descriptor, { configsRoot: roots.configsRoot, homeDir: roots.homeDir });
    for (const line of renderStatusLines(statuses)) logger.info(line);

    const linked = statuses.filter((s) => s.status === 'linked').length;
    logger.info(`${linked}/${statuses.length} linked`);
    return 0;
  } catch (err) {
    if (err instanceof DotlinkError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
}

export async function runShow(flags: ProfileFlags, deps: ProgramDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger();
  const roots = resolveRoots(rootOptions(flags, deps));
  const baseProfile = await resolveBaseProfile(flags, deps, logger);
  if (!baseProfile) return 1;

  try {
    const { descriptor, applied, skipped } = await mergeProfiles(roots.profilesRoot, baseProfile, flags.overlay ?? [], {
      logger,
    });
    logger.info(chalk.dim(`# layers: ${applied.join(', ')}${skipped.length > 0 ? ` (skipped: ${skipped.join(', ')})` : ''}`));
    logger.info(dump(descriptor, { indent: 2, lineWidth: 80, noRefs: true }).trimEnd());

    const packages = collectPackages(descriptor);
    if (packages.length > 0) {
      logger.info(chalk.dim(`# ${packages.length} ${pluralize(packages.length, 'package')} for the tool installer`));
    }
    return 0;
  } catch (err) {
    if (err instanceof DotlinkError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
}

export async function runInit(flags: RootFlags, deps: ProgramDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger();
  const roots = resolveRoots(rootOptions(flags, deps));
  const result = await initDotfilesRoot(roots.root);

  for (const entry of result.created) logger.success(`Created ${path.join(result.root, entry)}`);
  for (const entry of result.skipped) logger.info(`Kept existing ${path.join(result.root, entry)}`);
  return 0;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  const report = (code: number) => {
    process.exitCode = code;
  };

  program
    .name(appTitle)
    .description('Link managed configuration files into place, backing up whatever they replace')
    .option('--root <dir>', 'dotfiles root holding configs/ and profiles/ (env: DOTLINK_ROOT)')
    .option('--backup-root <dir>', 'where backup sessions are written (env: DOTLINK_BACKUP_DIR)');

  const withProfiles = (command: Command) =>
    command
      .option('-p, --profile <name>', 'base profile file, e.g. linux.yml (default: detected OS)')
      .option('-o, --overlay <name>', 'overlay profile stacked on the base, repeatable', collect);

  withProfiles(program.command('apply'))
    .description('Back up conflicting files and link every configured path')
    .option('-f, --force', 'overwrite existing files after backing them up')
    .option('--no-force', 'leave existing files in place')
    .option('-y, --yes', 'do not prompt')
    .option('--dry-run', 'report what would change without touching anything')
    .action(async (opts: ApplyFlags) => {
      report(await runApply({ ...program.opts<RootFlags>(), ...opts }, deps));
    });

  withProfiles(program.command('status'))
    .description('Show the link state of every configured path')
    .action(async (opts: ProfileFlags) => {
      report(await runStatus({ ...program.opts<RootFlags>(), ...opts }, deps));
    });

  withProfiles(program.command('show'))
    .description('Print the merged profile')
    .action(async (opts: ProfileFlags) => {
      report(await runShow({ ...program.opts<RootFlags>(), ...opts }, deps));
    });

  program
    .command('init')
    .description('Create configs/, profiles/ and backups/ with starter profiles')
    .action(async () => {
      report(await runInit(program.opts<RootFlags>(), deps));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    console.error(chalk.red(`Fatal error: ${describeError(err)}`));
    process.exitCode = 1;
  }
}
