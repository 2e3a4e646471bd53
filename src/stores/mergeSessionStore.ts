// ============================================================
// Merge Session Store — the panel being assembled in one run
// ============================================================

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type {
  AutorouterPass,
  BoardAttribute,
  BoardDocument,
  DesignRuleSet,
  Element,
  GridSettings,
  Layer,
  Library,
  MergeDiagnostic,
  NetClass,
  PlainPrimitive,
  RenameRecord,
  Signal,
  VariantDef,
} from '@/types';

/** Board sections as accumulated so far; `null` until an input sets them. */
export interface PanelAccumulator {
  version: string | null;
  designRules: DesignRuleSet | null;
  settings: Record<string, string>;
  grid: GridSettings | null;
  layers: Layer[];
  plain: PlainPrimitive[];
  libraries: Library[];
  attributes: BoardAttribute[] | null;
  variantDefs: VariantDef[] | null;
  classes: NetClass[] | null;
  autorouter: AutorouterPass[] | null;
  elements: Element[];
  signals: Signal[];
}

/**
 * Everything one input adds to the panel. Board-wide sections are complete
 * replacements; primitives, elements and signals are appended.
 */
export interface InputContribution {
  source: string;
  version: string;
  designRules: DesignRuleSet;
  settings: Record<string, string>;
  grid: GridSettings | null;
  layers: Layer[];
  libraries: Library[];
  attributes: BoardAttribute[] | null;
  variantDefs: VariantDef[] | null;
  classes: NetClass[] | null;
  autorouter: AutorouterPass[] | null;
  plain: PlainPrimitive[];
  elements: Element[];
  signals: Signal[];
  diagnostics: MergeDiagnostic[];
  renames: RenameRecord[];
}

export interface MergeSessionState {
  panel: PanelAccumulator;
  diagnostics: MergeDiagnostic[];
  renames: RenameRecord[];
  /** Sources merged so far, in order */
  mergedSources: string[];

  // Actions
  commitInput: (contribution: InputContribution) => void;
}

export function createEmptyPanel(): PanelAccumulator {
  return {
    version: null,
    designRules: null,
    settings: {},
    grid: null,
    layers: [],
    plain: [],
    libraries: [],
    attributes: null,
    variantDefs: null,
    classes: null,
    autorouter: null,
    elements: [],
    signals: [],
  };
}

// push(...items) overflows the call stack on very large sections
function append<T, U extends T>(target: T[], items: readonly U[]): void {
  for (const item of items) target.push(item);
}

/** A fresh store per run; sessions never share state. */
export function createMergeSession() {
  return createStore<MergeSessionState>()(
    immer((set) => ({
      panel: createEmptyPanel(),
      diagnostics: [],
      renames: [],
      mergedSources: [],

      commitInput: (c) =>
        set((state) => {
          const panel = state.panel;
          panel.version = c.version;
          panel.designRules = c.designRules;
          panel.settings = c.settings;
          panel.grid = c.grid;
          panel.layers = c.layers;
          panel.libraries = c.libraries;
          panel.attributes = c.attributes;
          panel.variantDefs = c.variantDefs;
          panel.classes = c.classes;
          panel.autorouter = c.autorouter;
          append(panel.plain, c.plain);
          append(panel.elements, c.elements);
          append(panel.signals, c.signals);
          append(state.diagnostics, c.diagnostics);
          append(state.renames, c.renames);
          state.mergedSources.push(c.source);
        }),
    })),
  );
}

export type MergeSession = ReturnType<typeof createMergeSession>;

/** Turn the accumulator into a document; needs at least one committed input. */
export function assemblePanel(panel: PanelAccumulator): BoardDocument {
  if (panel.version === null || panel.designRules === null) {
    throw new Error('Cannot assemble a panel before any board was merged');
  }

  const board: BoardDocument = {
    version: panel.version,
    settings: panel.settings,
    layers: panel.layers,
    plain: panel.plain,
    libraries: panel.libraries,
    designRules: panel.designRules,
    elements: panel.elements,
    signals: panel.signals,
  };
  if (panel.grid) board.grid = panel.grid;
  if (panel.attributes) board.attributes = panel.attributes;
  if (panel.variantDefs) board.variantDefs = panel.variantDefs;
  if (panel.classes) board.classes = panel.classes;
  if (panel.autorouter) board.autorouter = panel.autorouter;
  return board;
}
