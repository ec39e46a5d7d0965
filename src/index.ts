export {
  backupConfigs,
  backupPath,
  createBackupSession,
  formatManifest,
  formatTimestamp,
  getBackupSummary,
  listBackupSessions,
  MANIFEST_FILENAME,
  saveBackupManifest,
} from './core/backup.js';
export type { BackupSession, BackupSummary } from './core/backup.js';
export { deployConfigs, linkConfig, summarizeDeployment, toStatusMap } from './core/deploy.js';
export { describeEnvironment, detectEnvironment, getProfileName, isSupported } from './core/detect.js';
export type { Environment } from './core/detect.js';
export { DotlinkError, ProfileNotFoundError, ProfileParseError } from './core/errors.js';
export { initDotfilesRoot } from './core/init.js';
export { collectPackages, mergeProfileChain, mergeProfileLayers } from './core/merge.js';
export { expandHome, resolveRoots } from './core/paths.js';
export type { ResolvedRoots, RootOptions } from './core/paths.js';
export { listProfiles, loadProfile, mergeProfiles, parseProfile } from './core/profiles.js';
export { installPackages, reconcile } from './core/reconcile.js';
export type { ConflictDecision, ReconcileOptions, ReconcileResult } from './core/reconcile.js';
export { detectConflicts, getLinkStatus, inferSourceKind } from './core/status.js';
export type * from './core/types.js';
export { createConsoleLogger, createMemoryLogger, silentLogger } from './utils/log.js';
export type { Logger } from './utils/log.js';
