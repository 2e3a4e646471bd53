// ============================================================
// Engine barrel export
// ============================================================

export { mergeBoards } from './merge';
export type { MergeInput, MergeOptions, MergeResult } from './merge';
export { validateBoard, describeConstruct } from './feature-gate';
export { transformBoard, rotatePoint, placePoint, rotateOrientation, offsetFromMillimetres, IDENTITY_PLACEMENT } from './transform';
export type { BoardPlacement } from './transform';
export { NameRegistry, applyLabelOverride, displayLabel } from './name-registry';
export type { ReservedName } from './name-registry';
export { mergeLibraries, resolvePackage } from './library';
export type { LibraryMatching, LibraryMergeOptions, LibraryMergeResult } from './library';
export { checkDesignRules, diffDesignRules } from './design-rules';
export { mergeSettings, mergeLayers, syncSection, firstOf } from './sections';
export { findFirstDifference, structurallyEqual, canonicalize } from './structural-diff';
export type { Difference } from './structural-diff';
export {
  MergeError,
  UnsupportedFeatureError,
  LibraryConflictError,
  DesignRuleMismatchError,
  SectionConflictError,
  UnresolvedReferenceError,
} from './errors';
export type { MergeErrorCode, BoardSection } from './errors';
