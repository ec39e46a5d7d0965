import fs from 'fs';
import path from 'path';
import { ensureDir, pathExists, realPathOrNull, removePath } from '../utils/fs.js';
import type { Logger } from '../utils/log.js';
import { describeError, silentLogger } from '../utils/log.js';
import { resolveTarget, storePath } from './paths.js';
import { classifyTarget, inferSourceKind } from './status.js';
import type { DeploymentResult, DeploymentSummary, EffectiveDescriptor, LinkResult } from './types.js';

export type LinkOptions = {
  force?: boolean;
  homeDir?: string;
  logger?: Logger;
};

/**
 * Points `target` at the canonical form of `source`.
 *
 * An existing link to the same place is left alone. Anything else at `target` is only
 * removed when `force` is set. Filesystem errors come back as a failed result.
 */
export async function linkConfig(source: string, target: string, opts: LinkOptions = {}): Promise<LinkResult> {
  const logger = opts.logger ?? silentLogger;
  const targetPath = resolveTarget(target, opts.homeDir);

  const canonical = await realPathOrNull(source);
  if (canonical === null) {
    const detail = `Source does not exist: ${source}`;
    logger.error(detail);
    return { ok: false, reason: 'source-missing', source, target: targetPath, detail };
  }

  try {
    const existing = await classifyTarget(targetPath);
    let action: 'created' | 'replaced' = 'created';

    if (existing !== null) {
      if (existing === 'symlink' && (await realPathOrNull(targetPath)) === canonical) {
        logger.info(`Symlink already exists: ${targetPath} -> ${canonical}`);
        return { ok: true, action: 'unchanged', source: canonical, target: targetPath };
      }

      if (!opts.force) {
        const detail = `Target already exists: ${targetPath}`;
        logger.error(detail);
        return { ok: false, reason: 'target-exists', source: canonical, target: targetPath, detail };
      }

      await removePath(targetPath);
      action = 'replaced';
    }

    await ensureDir(path.dirname(targetPath));
    const stat = await fs.promises.stat(canonical);
    await fs.promises.symlink(canonical, targetPath, stat.isDirectory() ? 'junction' : 'file');
    logger.success(`Created symlink: ${targetPath} -> ${canonical}`);
    return { ok: true, action, source: canonical, target: targetPath };
  } catch (err) {
    const detail = `Error creating symlink ${targetPath}: ${describeError(err)}`;
    logger.error(detail);
    return { ok: false, reason: 'filesystem-error', source: canonical, target: targetPath, detail };
  }
}

export type DeployOptions = LinkOptions & {
  configsRoot: string;
  /** Config names whose existing targets must not be replaced, even with `force`. */
  preserve?: Iterable<string>;
};

/**
 * Links every `config_paths` entry in order. Failures are recorded and the loop moves on.
 */
export async function deployConfigs(
  descriptor: EffectiveDescriptor,
  opts: DeployOptions
): Promise<DeploymentResult[]> {
  const logger = opts.logger ?? silentLogger;
  const preserve = new Set(opts.preserve ?? []);
  const results: DeploymentResult[] = [];

  for (const [name, target] of Object.entries(descriptor.config_paths)) {
    const source = storePath(opts.configsRoot, name);

    if (!(await pathExists(source))) {
      const kind = await inferSourceKind(source);
      const detail = `Config ${kind} not found: ${source}`;
      logger.warn(detail);
      results.push({
        name,
        ok: false,
        reason: 'source-missing',
        source,
        target: resolveTarget(target, opts.homeDir),
        detail,
      });
      continue;
    }

    const force = opts.force && !preserve.has(name);
    const result = await linkConfig(source, target, { force, homeDir: opts.homeDir, logger });
    results.push({ ...result, name });
  }

  return results;
}

export function summarizeDeployment(results: DeploymentResult[]): DeploymentSummary {
  const failed = results.filter((r) => !r.ok).length;
  return { attempted: results.length, succeeded: results.length - failed, failed };
}

export function toStatusMap(results: DeploymentResult[]): Record<string, boolean> {
  return Object.fromEntries(results.map((r) => [r.name, r.ok]));
}
