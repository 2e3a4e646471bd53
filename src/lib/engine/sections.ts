// ============================================================
// Board Sections — settings, layers and other board-wide data
// ============================================================

import type { Layer } from '@/types';
import { SectionConflictError } from './errors';
import type { BoardSection } from './errors';
import { findFirstDifference } from './structural-diff';

export interface SettingConflict {
  key: string;
  kept: string;
  ignored: string;
}

export interface SettingsMergeResult {
  settings: Record<string, string>;
  conflicts: SettingConflict[];
}

/** Settings merge by key. On a conflicting value the first one stays. */
export function mergeSettings(
  existing: Record<string, string>,
  incoming: Record<string, string>,
): SettingsMergeResult {
  const settings = { ...existing };
  const conflicts: SettingConflict[] = [];

  for (const [key, value] of Object.entries(incoming)) {
    if (!Object.hasOwn(settings, key)) {
      settings[key] = value;
      continue;
    }
    const kept = settings[key];
    if (kept !== value) {
      conflicts.push({ key, kept, ignored: value });
    }
  }
  return { settings, conflicts };
}

/** Union by layer number; the first definition of a number wins. */
export function mergeLayers(existing: readonly Layer[], incoming: readonly Layer[]): Layer[] {
  const layers = [...existing];
  const numbers = new Set(layers.map(l => l.number));
  for (const layer of incoming) {
    if (numbers.has(layer.number)) continue;
    numbers.add(layer.number);
    layers.push(layer);
  }
  return layers.sort((a, b) => a.number - b.number);
}

/**
 * Sections the format keeps once per board. After the first input sets one,
 * every later input carrying it must agree exactly.
 */
export function syncSection<T>(section: BoardSection, existing: T | null, incoming: T | undefined): T | null {
  if (incoming === undefined) return existing;
  if (existing === null) return incoming;

  const diff = findFirstDifference(existing, incoming);
  if (diff) {
    throw new SectionConflictError(section, diff.path, diff.left, diff.right);
  }
  return existing;
}

/** Sections where the first input carrying one decides. */
export function firstOf<T>(existing: T | null, incoming: T | undefined): T | null {
  return existing ?? incoming ?? null;
}
