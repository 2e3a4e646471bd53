// ============================================================
// Merge Orchestrator — fold boards into one panel, in order
// ============================================================

import { v4 as uuid } from 'uuid';
import type {
  BoardDocument,
  BoardRotation,
  Element,
  MergeDiagnostic,
  MergeDiagnosticType,
  Point,
  RenameRecord,
  Signal,
} from '@/types';
import { createMergeSession, assemblePanel } from '@/stores/mergeSessionStore';
import type { InputContribution, PanelAccumulator } from '@/stores/mergeSessionStore';
import { checkDesignRules } from './design-rules';
import { MergeError, UnresolvedReferenceError } from './errors';
import { validateBoard } from './feature-gate';
import { mergeLibraries, resolvePackage } from './library';
import type { LibraryMatching } from './library';
import { NameRegistry, applyLabelOverride } from './name-registry';
import { firstOf, mergeLayers, mergeSettings, syncSection } from './sections';
import { transformBoard } from './transform';

/**
 * Pipeline per input, strictly in the order given:
 * 1. gate: reject unsupported constructs
 * 2. transform: rotate, then offset
 * 3. design rules: adopt or compare
 * 4. board sections: version, settings, layers, once-per-board sections
 * 5. libraries
 * 6. elements and signals through the shared name registry
 * Any failure aborts the whole run; nothing partial is returned.
 */

export interface MergeInput {
  /** Name used in diagnostics, usually the file path */
  source: string;
  /** A parsed board; the feature gate validates it before anything else */
  document: unknown;
  /** Nanometres, applied after the rotation */
  offset?: Point;
  rotation?: BoardRotation;
}

export interface MergeOptions {
  /** Granularity of library reconciliation (default `library`) */
  libraryMatching?: LibraryMatching;
}

export interface MergeResult {
  document: BoardDocument;
  diagnostics: MergeDiagnostic[];
  renames: RenameRecord[];
}

function diagnostic(
  type: MergeDiagnosticType,
  severity: MergeDiagnostic['severity'],
  source: string,
  message: string,
): MergeDiagnostic {
  return { id: uuid(), type, severity, message, source };
}

// ---- Elements & signals ----

function mergeElements(
  board: BoardDocument,
  registry: NameRegistry,
  source: string,
  renames: Map<string, string>,
  out: InputContribution,
): void {
  for (const element of board.elements) {
    if (!resolvePackage(board.libraries, element.library, element.package)) {
      throw new UnresolvedReferenceError(element.name, element.library, element.package);
    }

    const reserved = registry.reserve('element', element.name);
    let merged: Element = element;
    if (reserved.changed) {
      merged = applyLabelOverride({ ...element, name: reserved.name }, element.name);
      renames.set(element.name, reserved.name);
      out.renames.push({ source, namespace: 'element', from: element.name, to: reserved.name });
      out.diagnostics.push(diagnostic(
        'element_renamed', 'info', source,
        `Element ${element.name} renamed to ${reserved.name}; its label still reads ${element.name}`,
      ));
    }
    out.elements.push(merged);
  }
}

function mergeSignals(
  board: BoardDocument,
  registry: NameRegistry,
  source: string,
  renames: Map<string, string>,
  out: InputContribution,
): void {
  for (const signal of board.signals) {
    const reserved = registry.reserve('signal', signal.name);
    const merged: Signal = {
      ...signal,
      name: reserved.name,
      contacts: signal.contacts.map(c => {
        const element = renames.get(c.element);
        return element ? { ...c, element } : c;
      }),
    };
    if (reserved.changed) {
      out.renames.push({ source, namespace: 'signal', from: signal.name, to: reserved.name });
      out.diagnostics.push(diagnostic(
        'signal_renamed', 'info', source,
        `Signal ${signal.name} renamed to ${reserved.name}`,
      ));
    }
    out.signals.push(merged);
  }
}

// ---- One input ----

function mergeInput(
  panel: PanelAccumulator,
  registry: NameRegistry,
  input: MergeInput,
  options: MergeOptions,
): InputContribution {
  const { source } = input;

  const validated = validateBoard(input.document);
  const board = transformBoard(validated, {
    rotation: input.rotation ?? 0,
    offset: input.offset ?? { x: 0, y: 0 },
  });

  const designRules = checkDesignRules(panel.designRules, board.designRules);
  const version = syncSection('version', panel.version, board.version) ?? board.version;

  const diagnostics: MergeDiagnostic[] = [];
  const { settings, conflicts } = mergeSettings(panel.settings, board.settings);
  for (const conflict of conflicts) {
    diagnostics.push(diagnostic(
      'setting_conflict', 'warning', source,
      `Incompatible setting ${conflict.key}: keeping "${conflict.kept}", ignoring "${conflict.ignored}"`,
    ));
  }
  if (board.compatibility?.length) {
    diagnostics.push(diagnostic(
      'compatibility_ignored', 'warning', source,
      `Compatibility notes ignored (${board.compatibility.length})`,
    ));
  }

  const { libraries, deduplicated } = mergeLibraries(panel.libraries, board.libraries, {
    matching: options.libraryMatching,
  });
  for (const name of deduplicated) {
    diagnostics.push(diagnostic('library_deduplicated', 'info', source, `Library ${name} already present; kept one copy`));
  }

  const contribution: InputContribution = {
    source,
    version,
    designRules,
    settings,
    grid: firstOf(panel.grid, board.grid),
    layers: mergeLayers(panel.layers, board.layers),
    libraries,
    attributes: syncSection('attributes', panel.attributes, board.attributes),
    variantDefs: syncSection('variantDefs', panel.variantDefs, board.variantDefs),
    classes: syncSection('classes', panel.classes, board.classes),
    autorouter: firstOf(panel.autorouter, board.autorouter),
    plain: board.plain,
    elements: [],
    signals: [],
    diagnostics,
    renames: [],
  };

  // element renames of this input, for rewriting its signal contacts
  const renames = new Map<string, string>();
  mergeElements(board, registry, source, renames, contribution);
  mergeSignals(board, registry, source, renames, contribution);
  return contribution;
}

/**
 * Merge `inputs` into one panel document. Throws the first MergeError,
 * annotated with the failing input's source; the caller gets either a
 * complete, consistent document or nothing.
 */
export function mergeBoards(inputs: readonly MergeInput[], options: MergeOptions = {}): MergeResult {
  if (inputs.length === 0) {
    throw new RangeError('At least one board is needed to build a panel');
  }

  const session = createMergeSession();
  const registry = new NameRegistry();

  for (const input of inputs) {
    try {
      const contribution = mergeInput(session.getState().panel, registry, input, options);
      session.getState().commitInput(contribution);
    } catch (err) {
      if (err instanceof MergeError) throw err.withSource(input.source);
      throw err;
    }
  }

  const { panel, diagnostics, renames } = session.getState();
  return { document: assemblePanel(panel), diagnostics, renames };
}
