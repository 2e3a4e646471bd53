// ============================================================
// Name Registry — collision-free names for one merge run
// ============================================================

import { produce } from 'immer';
import type { Element, NameNamespace } from '@/types';
import { NAME_ATTRIBUTE, NAME_OVERRIDE_ATTRIBUTE, RENAME_SEPARATOR } from '@/constants';

export interface ReservedName {
  name: string;
  /** True when `name` differs from the requested one */
  changed: boolean;
}

export class NameRegistry {
  private reserved: Record<NameNamespace, Set<string>> = {
    element: new Set(),
    signal: new Set(),
  };

  /**
   * Reserve `name` in `namespace`. A taken name gets the lowest numeric
   * suffix that is still free: `U1` → `U1_1` → `U1_2` ...
   */
  reserve(namespace: NameNamespace, name: string): ReservedName {
    const names = this.reserved[namespace];
    let candidate = name;
    for (let n = 1; names.has(candidate); n++) {
      candidate = `${name}${RENAME_SEPARATOR}${n}`;
    }
    names.add(candidate);
    return { name: candidate, changed: candidate !== name };
  }

  isReserved(namespace: NameNamespace, name: string): boolean {
    return this.reserved[namespace].has(name);
  }

  size(namespace: NameNamespace): number {
    return this.reserved[namespace].size;
  }
}

/** The label a renderer shows for an element. */
export function displayLabel(element: Element): string {
  return element.label ?? element.name;
}

/**
 * Keep the visible label of a renamed element. The label override carries
 * the original name (an existing override wins). A smashed NAME attribute is
 * hidden and a NAME1 copy showing the original name takes its place.
 */
export function applyLabelOverride(element: Element, originalName: string): Element {
  if (element.name === originalName) return element;

  const nameIndex = element.attributes.findIndex(a => a.name === NAME_ATTRIBUTE);
  const hasOverride = element.attributes.some(a => a.name === NAME_OVERRIDE_ATTRIBUTE);

  return produce(element, (draft) => {
    if (draft.label === undefined) draft.label = originalName;
    if (nameIndex < 0 || hasOverride) return;

    const nameAttr = element.attributes[nameIndex];
    draft.attributes.push({ ...nameAttr, name: NAME_OVERRIDE_ATTRIBUTE, value: originalName });
    draft.attributes[nameIndex].display = 'off';
  });
}
