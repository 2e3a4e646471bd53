// ============================================================
// Panelmerge — public API
// ============================================================

export * from './lib/engine';
export * from './lib/export';
export { parseLength, toNanometres, formatLength } from './lib/units';
export type { ParsedLength } from './lib/units';
export { createMergeSession, assemblePanel, createEmptyPanel } from './stores/mergeSessionStore';
export type { MergeSession, MergeSessionState, PanelAccumulator, InputContribution } from './stores/mergeSessionStore';
export type * from './types';
