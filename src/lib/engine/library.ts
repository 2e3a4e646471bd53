// ============================================================
// Library Reconciler — merge embedded libraries without loss
// ============================================================

import type { Library, Package } from '@/types';
import { LibraryConflictError } from './errors';
import { findFirstDifference } from './structural-diff';

/**
 * - `library`: same-named libraries must be identical as a whole
 * - `package`: same-named libraries are unioned package by package and only
 *   same-named packages must be identical
 */
export type LibraryMatching = 'library' | 'package';

export interface LibraryMergeOptions {
  matching?: LibraryMatching;
}

export interface LibraryMergeResult {
  libraries: Library[];
  /** Names of incoming libraries that were already present and kept once */
  deduplicated: string[];
}

function mergePackages(existing: Library, incoming: Library): Library {
  const packages: Package[] = [...existing.packages];
  for (const pkg of incoming.packages) {
    const present = packages.find(p => p.name === pkg.name);
    if (!present) {
      packages.push(pkg);
      continue;
    }
    const diff = findFirstDifference(present, pkg);
    if (diff) {
      throw new LibraryConflictError(existing.name, pkg.name, diff.path, diff.left, diff.right);
    }
  }
  return {
    ...existing,
    // the first description seen wins
    description: existing.description ?? incoming.description,
    packages,
  };
}

/**
 * Fold `incoming` into `existing`. Libraries the output does not have yet
 * are appended; same-named ones must agree or a LibraryConflictError aborts
 * the merge. Neither argument is modified.
 */
export function mergeLibraries(
  existing: readonly Library[],
  incoming: readonly Library[],
  options: LibraryMergeOptions = {},
): LibraryMergeResult {
  const matching = options.matching ?? 'library';
  const libraries = [...existing];
  const deduplicated: string[] = [];

  for (const library of incoming) {
    const index = libraries.findIndex(l => l.name === library.name);
    if (index < 0) {
      libraries.push(library);
      continue;
    }

    const present = libraries[index];
    if (matching === 'package') {
      libraries[index] = mergePackages(present, library);
    } else {
      const diff = findFirstDifference(present, library);
      if (diff) {
        throw new LibraryConflictError(library.name, undefined, diff.path, diff.left, diff.right);
      }
    }
    deduplicated.push(library.name);
  }

  return { libraries, deduplicated };
}

/** Look up `packageName` inside the library named `libraryName`. */
export function resolvePackage(
  libraries: readonly Library[],
  libraryName: string,
  packageName: string,
): Package | undefined {
  return libraries.find(l => l.name === libraryName)?.packages.find(p => p.name === packageName);
}
