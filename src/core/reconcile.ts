import type { Logger } from '../utils/log.js';
import { describeError, silentLogger } from '../utils/log.js';
import type { BackupSummary } from './backup.js';
import { backupConfigs, createBackupSession, getBackupSummary, saveBackupManifest } from './backup.js';
import { deployConfigs, summarizeDeployment } from './deploy.js';
import { collectPackages } from './merge.js';
import type { ResolvedRoots } from './paths.js';
import { mergeProfiles } from './profiles.js';
import { detectConflicts, getLinkStatus } from './status.js';
import type {
  ConflictRecord,
  DeploymentResult,
  DeploymentSummary,
  EffectiveDescriptor,
  LinkStatus,
  ToolInstaller,
} from './types.js';

export type ReconcileOptions = {
  roots: ResolvedRoots;
  baseProfile: string;
  overlays?: string[];
  force?: boolean;
  dryRun?: boolean;
  /**
   * Asked only when conflicts exist. Its answer replaces `force`; `cancel` stops before
   * anything is written.
   */
  decide?: (conflicts: ConflictRecord[]) => ConflictDecision | Promise<ConflictDecision>;
  /** Receives `collectPackages(descriptor)` once the links are in place. */
  installer?: ToolInstaller;
  now?: Date;
  logger?: Logger;
};

export type ConflictDecision = 'overwrite' | 'keep' | 'cancel';

export type ReconcileResult = {
  descriptor: EffectiveDescriptor;
  applied: string[];
  skipped: string[];
  conflicts: ConflictRecord[];
  backup: BackupSummary | null;
  backupResults: Record<string, boolean | null>;
  deployment: DeploymentResult[];
  summary: DeploymentSummary;
  status: LinkStatus[] | null;
  /** Per-package install results; empty when no installer was given. */
  packages: Record<string, boolean>;
  cancelled: boolean;
  dryRun: boolean;
};

/**
 * Hands each package to the installer in order. A rejected install counts as a failure
 * for that package only.
 */
export async function installPackages(
  installer: ToolInstaller,
  packages: string[],
  logger: Logger = silentLogger
): Promise<Record<string, boolean>> {
  const results: Record<string, boolean> = {};

  for (const name of packages) {
    let ok: boolean;
    try {
      ok = await installer.installPackage(name);
    } catch (err) {
      logger.error(`Error installing ${name}: ${describeError(err)}`);
      ok = false;
    }
    results[name] = ok;
    if (ok) {
      logger.success(`Installed: ${name}`);
    } else {
      logger.error(`Failed to install: ${name}`);
    }
  }

  return results;
}

/**
 * Profile store -> conflict detector -> backup (only when conflicts exist) -> deployer,
 * then the tool installer when one is given.
 *
 * Only a broken base profile or a malformed overlay throws; per-item problems end up in
 * the result. A conflict whose backup failed is never overwritten.
 */
export async function reconcile(opts: ReconcileOptions): Promise<ReconcileResult> {
  const logger = opts.logger ?? silentLogger;
  const { roots } = opts;
  const dryRun = !!opts.dryRun;

  const { descriptor, applied, skipped } = await mergeProfiles(roots.profilesRoot, opts.baseProfile, opts.overlays ?? [], {
    logger,
  });

  const detectOpts = { configsRoot: roots.configsRoot, homeDir: roots.homeDir };
  const conflicts = await detectConflicts(descriptor, detectOpts);
  if (conflicts.length === 0) {
    logger.success('No conflicts found');
  }

  const result: ReconcileResult = {
    descriptor,
    applied,
    skipped,
    conflicts,
    backup: null,
    backupResults: {},
    deployment: [],
    summary: { attempted: 0, succeeded: 0, failed: 0 },
    status: null,
    packages: {},
    cancelled: false,
    dryRun,
  };

  let force = !!opts.force;
  if (conflicts.length > 0 && opts.decide) {
    const decision = await opts.decide(conflicts);
    if (decision === 'cancel') {
      return { ...result, cancelled: true };
    }
    force = decision === 'overwrite';
  }

  if (dryRun) {
    return { ...result, status: await getLinkStatus(descriptor, detectOpts) };
  }

  const failedBackups: string[] = [];
  if (conflicts.length > 0) {
    const session = await createBackupSession(roots.backupRoot, { now: opts.now, logger });
    logger.info(`Backup directory: ${session.dir}`);
    const targets = Object.fromEntries(conflicts.map((c) => [c.name, c.path]));
    result.backupResults = await backupConfigs(session, targets, { homeDir: roots.homeDir });
    await saveBackupManifest(session);
    result.backup = getBackupSummary(session);

    for (const [name, ok] of Object.entries(result.backupResults)) {
      if (ok === false) failedBackups.push(name);
    }
  }

  result.deployment = await deployConfigs(descriptor, {
    configsRoot: roots.configsRoot,
    homeDir: roots.homeDir,
    force,
    preserve: failedBackups,
    logger,
  });
  result.summary = summarizeDeployment(result.deployment);

  if (opts.installer) {
    result.packages = await installPackages(opts.installer, collectPackages(descriptor), logger);
  }

  return result;
}
