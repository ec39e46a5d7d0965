import fs from 'fs';
import { load } from 'js-yaml';
import path from 'path';
import { z } from 'zod';
import { pathExists, readText } from '../utils/fs.js';
import type { Logger } from '../utils/log.js';
import { silentLogger } from '../utils/log.js';
import { ProfileNotFoundError, ProfileParseError } from './errors.js';
import { isMapping, mergeProfileLayers, toDescriptor } from './merge.js';
import type { MergedProfile, Profile } from './types.js';

export type ProfileRole = 'base' | 'overlay';

const ProfileSchema = z
  .object({
    os: z.string().optional(),
    package_manager: z.string().optional(),
    config_paths: z.record(z.string(), z.string()).optional(),
    overrides: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
    packages: z.union([z.array(z.string()), z.record(z.string(), z.array(z.string()))]).optional(),
    zsh_plugins: z.array(z.string()).optional(),
  })
  .passthrough();

const BASE_REQUIRED = ['os', 'config_paths'] as const;

export function getProfilePath(profilesRoot: string, name: string): string {
  return path.join(profilesRoot, name);
}

/**
 * Validates a parsed profile document. Keys holding `null` (an empty YAML value) are
 * treated as absent.
 */
export function parseProfile(document: unknown, profilePath: string, role: ProfileRole = 'overlay'): Profile {
  if (!isMapping(document)) {
    throw new ProfileParseError(profilePath, ['profile must be a mapping']);
  }

  const cleaned = Object.fromEntries(Object.entries(document).filter(([, value]) => value !== null));
  const result = ProfileSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ProfileParseError(profilePath, issues);
  }

  const profile: Profile = result.data;
  if (role === 'base') {
    const missing = BASE_REQUIRED.filter((key) => profile[key] === undefined);
    if (missing.length > 0) {
      throw new ProfileParseError(
        profilePath,
        missing.map((key) => `${key}: required in a base profile`)
      );
    }
  }

  return profile;
}

export async function loadProfile(
  profilesRoot: string,
  name: string,
  opts: { role?: ProfileRole } = {}
): Promise<Profile> {
  const profilePath = getProfilePath(profilesRoot, name);

  if (!(await pathExists(profilePath))) {
    throw new ProfileNotFoundError(profilePath);
  }

  let document: unknown;
  try {
    document = load(await readText(profilePath));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProfileParseError(profilePath, [reason], { cause: err });
  }

  return parseProfile(document, profilePath, opts.role);
}

export type MergeProfilesOptions = {
  logger?: Logger;
};

/**
 * Loads `baseName` and stacks each overlay on it in order. A missing overlay is skipped
 * with a warning; a missing or malformed base, or a malformed overlay, throws.
 */
export async function mergeProfiles(
  profilesRoot: string,
  baseName: string,
  overlayNames: string[],
  opts: MergeProfilesOptions = {}
): Promise<MergedProfile> {
  const logger = opts.logger ?? silentLogger;
  let merged = await loadProfile(profilesRoot, baseName, { role: 'base' });
  const applied = [baseName];
  const skipped: string[] = [];

  for (const name of overlayNames) {
    let overlay: Profile;
    try {
      overlay = await loadProfile(profilesRoot, name, { role: 'overlay' });
    } catch (err) {
      if (err instanceof ProfileNotFoundError) {
        logger.warn(`Profile ${name} not found, skipping`);
        skipped.push(name);
        continue;
      }
      throw err;
    }
    merged = mergeProfileLayers(merged, overlay);
    applied.push(name);
  }

  return { descriptor: toDescriptor(merged), applied, skipped };
}

export async function listProfiles(profilesRoot: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(profilesRoot, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && /\.ya?ml$/.test(e.name))
      .map((e) => e.name)
      .sort();
  } catch {
    return [];
  }
}
