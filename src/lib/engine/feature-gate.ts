// ============================================================
// Feature Support Gate — reject what the merge cannot represent
// ============================================================

import type { ZodIssue } from 'zod';
import type { BoardDocument } from '@/types';
import { boardSchema } from '@/lib/schema/board-schema';
import { UnsupportedFeatureError } from './errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render an issue path against the raw input. Array items that carry a
 * name are shown by name: `elements[U1].rot` rather than `elements[3].rot`.
 */
export function describeConstruct(input: unknown, path: (string | number)[]): string {
  let rendered = '';
  let node: unknown = input;

  for (const segment of path) {
    if (typeof segment === 'number' && Array.isArray(node)) {
      const item: unknown = node[segment];
      const name = isRecord(item) && typeof item.name === 'string' ? item.name : undefined;
      rendered += `[${name ?? segment}]`;
      node = item;
    } else {
      rendered += rendered ? `.${segment}` : String(segment);
      node = isRecord(node) ? node[segment] : undefined;
    }
  }
  return rendered;
}

function toUnsupportedFeature(input: unknown, issue: ZodIssue): UnsupportedFeatureError {
  if (issue.code === 'unrecognized_keys') {
    const construct = describeConstruct(input, [...issue.path, issue.keys[0]]);
    return new UnsupportedFeatureError(construct, 'unknown property');
  }
  return new UnsupportedFeatureError(describeConstruct(input, issue.path), issue.message);
}

/**
 * Check a parsed document against the supported schema subset and return
 * a validated copy. The first offending construct aborts with an
 * UnsupportedFeatureError before any transform or merge sees the input.
 */
export function validateBoard(input: unknown): BoardDocument {
  const result = boardSchema.safeParse(input);
  if (!result.success) {
    throw toUnsupportedFeature(input, result.error.issues[0]);
  }
  return result.data;
}
