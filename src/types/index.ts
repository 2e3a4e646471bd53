// ============================================================
// Panelmerge Core Types — Boards, Libraries, Elements, Signals
// ============================================================

// All linear values are integer nanometres (see NM_PER_MM).

// ---- Geometry Primitives ----

export interface Point {
  x: number;
  y: number;
}

/** Right-angle rotations a whole board can be turned by (counter-clockwise). */
export type BoardRotation = 0 | 90 | 180 | 270;

/**
 * Orientation of a placed object: optional flags followed by `R<degrees>`,
 * e.g. `R90`, `MR180` (mirrored), `SR0` (spin). Absent means `R0`.
 */
export type Orientation = string;

// ---- Drawing Primitives ----

interface LayeredPrimitive {
  layer: number;
}

export interface WirePrimitive extends LayeredPrimitive {
  kind: 'wire';
  start: Point;
  end: Point;
  width: number;
  /** Arc angle in degrees; straight when absent */
  curve?: number;
}

export interface PolygonVertex {
  position: Point;
  curve?: number;
}

export interface PolygonPrimitive extends LayeredPrimitive {
  kind: 'polygon';
  vertices: PolygonVertex[];
  width: number;
  isolate?: number;
  rank?: number;
}

export type TextAlign =
  | 'bottom-left'
  | 'bottom-center'
  | 'bottom-right'
  | 'center-left'
  | 'center'
  | 'center-right'
  | 'top-left'
  | 'top-center'
  | 'top-right';

export interface TextPrimitive extends LayeredPrimitive {
  kind: 'text';
  text: string;
  position: Point;
  size: number;
  rot?: Orientation;
  align?: TextAlign;
}

export type DimensionType = 'parallel' | 'horizontal' | 'vertical' | 'radius' | 'diameter' | 'leader';

export interface DimensionPrimitive extends LayeredPrimitive {
  kind: 'dimension';
  /** Two measured points and the point the dimension line passes through */
  points: [Point, Point, Point];
  dimensionType?: DimensionType;
}

export interface CirclePrimitive extends LayeredPrimitive {
  kind: 'circle';
  center: Point;
  radius: number;
  width: number;
}

export interface RectanglePrimitive extends LayeredPrimitive {
  kind: 'rectangle';
  start: Point;
  end: Point;
}

export interface FramePrimitive extends LayeredPrimitive {
  kind: 'frame';
  start: Point;
  end: Point;
  columns: number;
  rows: number;
}

export interface HolePrimitive {
  kind: 'hole';
  position: Point;
  drill: number;
}

export type PlainPrimitive =
  | WirePrimitive
  | PolygonPrimitive
  | TextPrimitive
  | DimensionPrimitive
  | CirclePrimitive
  | RectanglePrimitive
  | FramePrimitive
  | HolePrimitive;

export type PackagePrimitive =
  | WirePrimitive
  | PolygonPrimitive
  | TextPrimitive
  | CirclePrimitive
  | RectanglePrimitive
  | HolePrimitive;

// ---- Library ----

export type PadShape = 'round' | 'square' | 'octagon' | 'long' | 'offset';

export interface Pad {
  name: string;
  position: Point;
  drill: number;
  diameter?: number;
  shape?: PadShape;
  rot?: Orientation;
}

export interface Smd {
  name: string;
  position: Point;
  dx: number;
  dy: number;
  layer: number;
  roundness?: number;
  rot?: Orientation;
}

export interface Package {
  name: string;
  description?: string;
  primitives: PackagePrimitive[];
  pads: Pad[];
  smds: Smd[];
}

export interface Library {
  name: string;
  description?: string;
  packages: Package[];
}

// ---- Placed Elements ----

export type AttributeDisplay = 'off' | 'value' | 'name' | 'both';

export interface ElementAttribute {
  name: string;
  value?: string;
  /** Set once the attribute has been smashed off its element */
  position?: Point;
  rot?: Orientation;
  layer?: number;
  size?: number;
  display?: AttributeDisplay;
}

export interface ElementVariant {
  name: string;
  populate?: boolean;
  value?: string;
}

export interface Element {
  name: string;
  library: string;
  package: string;
  value: string;
  position: Point;
  rot?: Orientation;
  locked?: boolean;
  smashed?: boolean;
  /** Display-label override; renderers show this instead of `name` */
  label?: string;
  attributes: ElementAttribute[];
  variants: ElementVariant[];
}

// ---- Signals ----

export interface ContactRef {
  element: string;
  pad: string;
  route?: 'all' | 'any';
}

export interface Via {
  position: Point;
  /** Layer span, e.g. "1-16" */
  extent: string;
  drill: number;
  diameter?: number;
  shape?: 'round' | 'square' | 'octagon';
}

export interface Signal {
  name: string;
  netClass?: number;
  contacts: ContactRef[];
  wires: WirePrimitive[];
  vias: Via[];
  polygons: PolygonPrimitive[];
}

// ---- Board-level Sections ----

export interface Layer {
  number: number;
  name: string;
  color: number;
  fill: number;
  visible: boolean;
  active: boolean;
}

export type GridUnit = 'mic' | 'mm' | 'mil' | 'inch';

export interface GridSettings {
  distance: number;
  unit: GridUnit;
  style: 'lines' | 'dots';
  multiple: number;
  display: boolean;
  altDistance?: number;
  altUnit?: GridUnit;
}

export interface BoardAttribute {
  name: string;
  value: string;
}

export interface VariantDef {
  name: string;
  current?: boolean;
}

export interface NetClassClearance {
  /** Number of the other net class */
  netClass: number;
  value: number;
}

export interface NetClass {
  number: number;
  name: string;
  width: number;
  drill: number;
  clearances: NetClassClearance[];
}

export interface DesignRuleSet {
  name: string;
  description?: string;
  params: Record<string, string>;
}

export interface AutorouterPass {
  name: string;
  refer?: string;
  active?: boolean;
  params: Record<string, string>;
}

// ---- Board Document ----

export interface BoardDocument {
  /** Schema version marker of the authoring tool, e.g. "7.7.0" */
  version: string;
  settings: Record<string, string>;
  grid?: GridSettings;
  layers: Layer[];
  plain: PlainPrimitive[];
  libraries: Library[];
  attributes?: BoardAttribute[];
  variantDefs?: VariantDef[];
  classes?: NetClass[];
  designRules: DesignRuleSet;
  autorouter?: AutorouterPass[];
  elements: Element[];
  signals: Signal[];
  /** Free-form compatibility notes written by the authoring tool */
  compatibility?: string[];
}

// ---- Merge Diagnostics ----

export type MergeDiagnosticType =
  | 'setting_conflict'
  | 'compatibility_ignored'
  | 'element_renamed'
  | 'signal_renamed'
  | 'library_deduplicated';

export interface MergeDiagnostic {
  id: string;
  type: MergeDiagnosticType;
  severity: 'warning' | 'info';
  message: string;
  /** The input the diagnostic was raised for */
  source: string;
}

export type NameNamespace = 'element' | 'signal';

export interface RenameRecord {
  source: string;
  namespace: NameNamespace;
  from: string;
  to: string;
}
