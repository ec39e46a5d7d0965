import type { EffectiveDescriptor, Profile } from './types.js';

const OVERRIDES_KEY = 'overrides';

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Stacks `overlay` on top of `base` without mutating either.
 *
 * Top-level keys whose values are mappings on both sides are merged entry by entry,
 * the overlay winning on collisions; any other overlay value replaces the base value.
 * `overrides` is always merged per config name. Base keys keep their position and new
 * overlay keys are appended, so `config_paths` iteration order stays deterministic.
 */
export function mergeProfileLayers(base: Profile, overlay: Profile): Profile {
  const merged: Profile = { ...base };

  for (const [key, value] of Object.entries(overlay)) {
    if (key === OVERRIDES_KEY) continue;
    const current = merged[key];
    merged[key] = isMapping(current) && isMapping(value) ? { ...current, ...value } : value;
  }

  if (overlay.overrides !== undefined) {
    merged.overrides = { ...(base.overrides ?? {}), ...overlay.overrides };
  }

  return merged;
}

export function mergeProfileChain(layers: Profile[]): EffectiveDescriptor {
  let merged: Profile = {};
  for (const layer of layers) {
    merged = mergeProfileLayers(merged, layer);
  }
  return toDescriptor(merged);
}

export function toDescriptor(profile: Profile): EffectiveDescriptor {
  return {
    ...profile,
    config_paths: { ...(profile.config_paths ?? {}) },
    overrides: { ...(profile.overrides ?? {}) },
  };
}

/**
 * Package names for the tool-installation collaborator. Grouped package lists only
 * contribute their `common` group.
 */
export function collectPackages(profile: Profile): string[] {
  const { packages } = profile;
  if (!packages) return [];
  if (Array.isArray(packages)) return [...packages];
  return [...(packages.common ?? [])];
}
