// ============================================================
// Structural Diff — pure recursive comparison of entity graphs
// ============================================================

/**
 * Deep comparison of two independently authored definitions:
 *
 * - object keys are compared as sets; an absent key equals `undefined`
 * - arrays whose items all carry a unique string `name` are matched by name
 * - collections listed in UNORDERED_COLLECTIONS are compared as multisets
 * - every other array is a sequence (`vertices`, `points`) and compared
 *   position by position
 *
 * The first divergence is reported with a path such as
 * `packages[R0805].pads[2].drill`.
 */

export interface Difference {
  path: string;
  left: unknown;
  right: unknown;
}

type Named = Record<string, unknown> & { name: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNamed(value: unknown): value is Named {
  return isRecord(value) && typeof value.name === 'string';
}

/** Collections whose order carries no meaning. Geometry sequences are never listed. */
const UNORDERED_COLLECTIONS: ReadonlySet<string> = new Set([
  'libraries',
  'packages',
  'primitives',
  'pads',
  'smds',
  'clearances',
]);

function isUnordered(key: string | undefined): boolean {
  return key !== undefined && UNORDERED_COLLECTIONS.has(key);
}

function joinKey(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

/** Stable textual form with sorted keys and sorted unordered collections, used as a sort key */
export function canonicalize(value: unknown, key?: string): string {
  if (Array.isArray(value)) {
    const items = value.map(item => canonicalize(item));
    return `[${(isUnordered(key) ? items.sort() : items).join(',')}]`;
  }
  if (isRecord(value)) {
    const keys = Object.keys(value).filter(k => value[k] !== undefined).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalize(value[k], k)}`).join(',')}}`;
  }
  return value === undefined ? 'undefined' : JSON.stringify(value);
}

function uniqueNames(items: unknown[]): Map<string, Named> | null {
  const byName = new Map<string, Named>();
  for (const item of items) {
    if (!isNamed(item) || byName.has(item.name)) return null;
    byName.set(item.name, item);
  }
  return byName;
}

function diffNamedArrays(
  left: Map<string, Named>,
  right: Map<string, Named>,
  path: string,
): Difference | null {
  const names = [...new Set([...left.keys(), ...right.keys()])].sort();
  for (const name of names) {
    const diff = findFirstDifference(left.get(name), right.get(name), `${path}[${name}]`);
    if (diff) return diff;
  }
  return null;
}

function diffArrays(left: unknown[], right: unknown[], path: string, key?: string): Difference | null {
  const leftNamed = uniqueNames(left);
  const rightNamed = uniqueNames(right);
  if (leftNamed && rightNamed && (left.length > 0 || right.length > 0)) {
    return diffNamedArrays(leftNamed, rightNamed, path);
  }

  const unordered = isUnordered(key);
  const a = unordered ? [...left].sort(compareCanonical) : left;
  const b = unordered ? [...right].sort(compareCanonical) : right;
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const diff = findFirstDifference(a[i], b[i], `${path}[${i}]`);
    if (diff) return diff;
  }
  if (a.length !== b.length) {
    return { path: `${path}[${shared}]`, left: a[shared], right: b[shared] };
  }
  return null;
}

function compareCanonical(a: unknown, b: unknown): number {
  const ca = canonicalize(a);
  const cb = canonicalize(b);
  return ca < cb ? -1 : ca > cb ? 1 : 0;
}

function diffRecords(
  left: Record<string, unknown>,
  right: Record<string, unknown>,
  path: string,
): Difference | null {
  const keys = [...new Set([...Object.keys(left), ...Object.keys(right)])].sort();
  for (const key of keys) {
    const diff = diffValues(left[key], right[key], joinKey(path, key), key);
    if (diff) return diff;
  }
  return null;
}

function diffValues(left: unknown, right: unknown, path: string, key?: string): Difference | null {
  if (left === right) return null;

  if (Array.isArray(left) && Array.isArray(right)) {
    return diffArrays(left, right, path, key);
  }
  if (isRecord(left) && isRecord(right)) {
    return diffRecords(left, right, path);
  }
  return { path, left, right };
}

export function findFirstDifference(left: unknown, right: unknown, path = ''): Difference | null {
  return diffValues(left, right, path);
}

export function structurallyEqual(left: unknown, right: unknown): boolean {
  return findFirstDifference(left, right) === null;
}
